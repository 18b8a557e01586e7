import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DatabricksClient } from "@/lib/dbx/client";
import { listGenieWarehouses, recommendWarehouse, type Warehouse } from "@/lib/dbx/warehouses";

const HOST = "https://example.cloud.databricks.com";
const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();

const client = new DatabricksClient({ host: HOST, auth: { kind: "pat", token: "test-token" }, maxRetries: 0 });

function warehouse(id: string, state: string, clusterSize: string): Warehouse {
  return { id, name: id, state, cluster_size: clusterSize, warehouse_type: "PRO" };
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("recommendWarehouse", () => {
  it("prefers running warehouses over a better size", () => {
    const picked = recommendWarehouse([warehouse("a", "STOPPED", "X-Small"), warehouse("b", "RUNNING", "Large")]);
    expect(picked?.id).toBe("b");
  });

  it("picks the smallest preferred size for development", () => {
    const picked = recommendWarehouse([
      warehouse("a", "RUNNING", "Medium"),
      warehouse("b", "RUNNING", "Small"),
      warehouse("c", "RUNNING", "2X-Small"),
    ]);
    expect(picked?.id).toBe("c");
  });

  it("picks a large warehouse for production", () => {
    const picked = recommendWarehouse(
      [warehouse("a", "STARTING", "Small"), warehouse("b", "STOPPED", "Medium"), warehouse("c", "STOPPED", "Large")],
      "production",
    );
    expect(picked?.id).toBe("c");
  });

  it("falls back to the first candidate, and to nothing", () => {
    expect(recommendWarehouse([warehouse("a", "STOPPED", "4X-Large")])?.id).toBe("a");
    expect(recommendWarehouse([])).toBeUndefined();
  });
});

describe("listGenieWarehouses", () => {
  it("keeps existing pro warehouses and fills defaults", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          warehouses: [
            { id: "wh-1", warehouse_type: "PRO" },
            { id: "wh-2", warehouse_type: "CLASSIC", state: "RUNNING" },
            { id: "wh-3", warehouse_type: "PRO", state: "DELETED" },
          ],
        }),
        { status: 200 },
      ),
    );

    expect(await listGenieWarehouses(client)).toEqual([
      { id: "wh-1", name: "", state: "UNKNOWN", cluster_size: "", warehouse_type: "PRO" },
    ]);
    expect(fetchMock.mock.calls[0][0]).toBe(`${HOST}/api/2.0/sql/warehouses`);
  });

  it("treats a missing list as empty", async () => {
    fetchMock.mockResolvedValueOnce(new Response("{}", { status: 200 }));
    expect(await listGenieWarehouses(client)).toEqual([]);
  });
});
