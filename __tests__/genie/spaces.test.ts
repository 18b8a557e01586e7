import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DatabricksClient } from "@/lib/dbx/client";
import { ConfigValidationError, SpaceNotFoundError } from "@/lib/errors";
import { createSpace, deleteSpace, getSpace, resolveSpaceDocument, updateSpace } from "@/lib/genie/spaces";

const HOST = "https://example.cloud.databricks.com";
const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function sentBody(call = 0): Record<string, unknown> {
  return JSON.parse(String(fetchMock.mock.calls[call][1]?.body));
}

const client = new DatabricksClient({ host: HOST, auth: { kind: "pat", token: "test-token" }, maxRetries: 0 });

const salesConfig = {
  space_name: "Sales Analytics",
  description: "Order analytics",
  purpose: "Answer revenue questions",
  tables: [{ catalog_name: "main", schema_name: "sales", table_name: "orders" }],
  example_sql_queries: [{ question: "Revenue?", sql_query: "SELECT SUM(amount) FROM main.sales.orders", description: "Sum" }],
};

const wireDoc = { version: 2, data_sources: { tables: [{ identifier: "main.sales.orders" }] } };

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("resolveSpaceDocument", () => {
  it("encodes a configuration and reports what the encoding drops", () => {
    const doc = resolveSpaceDocument(JSON.stringify(salesConfig));
    expect(JSON.parse(doc.serializedSpace).data_sources).toEqual({ tables: [{ identifier: "main.sales.orders" }] });
    expect(doc.config?.space_name).toBe("Sales Analytics");
    expect(doc.warnings).toHaveLength(2);
  });

  it("passes a serialized space through canonicalized", () => {
    const doc = resolveSpaceDocument({
      version: 2,
      data_sources: { tables: [{ identifier: "main.sales.z" }, { identifier: "main.sales.a" }] },
    });
    expect(doc.serializedSpace).toBe(
      '{"version":2,"data_sources":{"tables":[{"identifier":"main.sales.a"},{"identifier":"main.sales.z"}]}}',
    );
    expect(doc.config).toBeUndefined();
    expect(doc.warnings).toEqual([]);
  });

  it("accepts a serialized space carrying entries it cannot decode", () => {
    const doc = resolveSpaceDocument({
      version: 2,
      data_sources: { tables: [{ identifier: "main.sales.orders" }, { metric: "x" }] },
    });
    expect(doc.serializedSpace).toBe(
      '{"version":2,"data_sources":{"tables":[{"metric":"x"},{"identifier":"main.sales.orders"}]}}',
    );
  });

  it("rejects a serialized space without usable tables", () => {
    expect(() => resolveSpaceDocument({ version: 2, data_sources: { tables: [{ identifier: "orders" }] } })).toThrow(
      "Serialized space has no tables with catalog.schema.table identifiers",
    );
  });

  it("rejects invalid JSON", () => {
    expect(() => resolveSpaceDocument("{")).toThrow(/^Invalid JSON: /);
  });

  it("rejects configurations that fail the schema, listing the issues", () => {
    try {
      resolveSpaceDocument({ space_name: "x", tables: [] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.message).toBe("Configuration failed schema validation");
        expect(err.issues.some((i) => i.startsWith("description: "))).toBe(true);
        expect(err.issues.some((i) => i.startsWith("purpose: "))).toBe(true);
      }
    }
  });

  it("rejects configurations without tables", () => {
    expect(() => resolveSpaceDocument({ ...salesConfig, tables: [] })).toThrow(
      "Configuration must include at least one table",
    );
  });
});

describe("createSpace", () => {
  it("creates a space from a configuration with the default warehouse", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        space_id: "s1",
        title: "Sales Analytics",
        warehouse_id: "wh-default",
        owner_user_id: 123,
        created_timestamp: 0,
      }),
    );

    const result = await createSpace(client, { config: salesConfig }, "wh-default");

    expect(result).toEqual({
      space_id: "s1",
      title: "Sales Analytics",
      description: "Order analytics",
      warehouse_id: "wh-default",
      owner_id: "123",
      created_at: "1970-01-01T00:00:00.000Z",
      warnings: [
        "Example query #1 has a description, which the serialized space format does not store; it will be dropped",
        "No instructions: purpose and table descriptions are only stored inside the text instruction and will be dropped",
      ],
    });
    const body = sentBody();
    expect(body.title).toBe("Sales Analytics");
    expect(body.description).toBe("Order analytics");
    expect(body.warehouse_id).toBe("wh-default");
    expect(fetchMock.mock.calls[0][0]).toBe(`${HOST}/api/2.0/genie/spaces`);
  });

  it("prefers the argument, then the config, for the warehouse", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ space_id: "s1" }));

    await createSpace(client, { config: { ...salesConfig, warehouse_id: "wh-config" }, warehouseId: "wh-arg" }, "wh-default");
    await createSpace(client, { config: { ...salesConfig, warehouse_id: "wh-config" } }, "wh-default");

    expect(sentBody(0).warehouse_id).toBe("wh-arg");
    expect(sentBody(1).warehouse_id).toBe("wh-config");
  });

  it("selects a running warehouse when none is given", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        warehouses: [
          { id: "wh-stopped", name: "Small idle", state: "STOPPED", cluster_size: "Small", warehouse_type: "PRO" },
          { id: "wh-classic", name: "Classic", state: "RUNNING", cluster_size: "Small", warehouse_type: "CLASSIC" },
          { id: "wh-running", name: "Shared", state: "RUNNING", cluster_size: "Medium", warehouse_type: "PRO" },
        ],
      }),
    );
    fetchMock.mockResolvedValueOnce(jsonResponse({ space_id: "s1", title: "Sales Analytics" }));

    const result = await createSpace(client, { config: salesConfig });

    expect(fetchMock.mock.calls[0][0]).toBe(`${HOST}/api/2.0/sql/warehouses`);
    expect(sentBody(1).warehouse_id).toBe("wh-running");
    expect(result.warehouse_id).toBe("wh-running");
    expect(result.auto_selected_warehouse).toEqual({ id: "wh-running", name: "Shared", state: "RUNNING" });
  });

  it("fails when no warehouse can be found and creates nothing", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ warehouses: [] }));
    await expect(createSpace(client, { config: salesConfig })).rejects.toThrow(
      "No SQL warehouse available: pass warehouse_id, set it in the config, or set DATABRICKS_WAREHOUSE_ID",
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("requires a title for a serialized space", async () => {
    await expect(createSpace(client, { config: wireDoc, warehouseId: "wh-1" })).rejects.toThrow(
      "title is required when passing a serialized space",
    );
  });

  it("sends a serialized space as given", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ space_id: "s2", title: "Orders" }));
    const result = await createSpace(client, { config: wireDoc, warehouseId: "wh-1", title: "Orders" });

    expect(sentBody().serialized_space).toBe(JSON.stringify(wireDoc));
    expect(result).toEqual({ space_id: "s2", title: "Orders", description: "", warehouse_id: "wh-1" });
  });
});

describe("getSpace", () => {
  it("maps a 404 to SpaceNotFoundError", async () => {
    fetchMock.mockResolvedValueOnce(new Response("{}", { status: 404 }));
    const run = getSpace(client, "s9");
    await expect(run).rejects.toBeInstanceOf(SpaceNotFoundError);
    await expect(run).rejects.toThrow("Genie space 's9' not found");
  });

  it("returns and decodes the stored document when asked", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        space_id: "s1",
        title: "Sales",
        description: "Sales space",
        warehouse_id: "wh-1",
        serialized_space: JSON.stringify(wireDoc),
        last_updated_timestamp: 1_000,
      }),
    );

    const space = await getSpace(client, "s1", true);
    expect(space.serialized_space).toBe(JSON.stringify(wireDoc));
    expect(space.updated_at).toBe("1970-01-01T00:00:01.000Z");
    expect(space.decoded_config?.space_name).toBe("Sales");
    expect(space.decoded_config?.description).toBe("Sales space");
    expect(space.decoded_config?.tables).toEqual([{ catalog_name: "main", schema_name: "sales", table_name: "orders" }]);
  });

  it("still returns a stored document that does not decode", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ space_id: "s1", serialized_space: "not json" }));
    const space = await getSpace(client, "s1", true);
    expect(space.serialized_space).toBe("not json");
    expect(space.decoded_config).toBeUndefined();
  });

  it("omits the document unless asked", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ space_id: "s1", title: "Sales" }));
    expect(await getSpace(client, "s1")).toEqual({ space_id: "s1", title: "Sales", description: "", warehouse_id: "" });
  });
});

describe("updateSpace", () => {
  it("requires something to change", async () => {
    await expect(updateSpace(client, "s1", {})).rejects.toThrow(
      "Nothing to update: pass config, title, description or warehouse_id",
    );
  });

  it("patches only the given fields", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ space_id: "s1", title: "Renamed", last_updated_timestamp: 0 }));
    const result = await updateSpace(client, "s1", { title: "Renamed" });

    expect(sentBody()).toEqual({ title: "Renamed" });
    expect(fetchMock.mock.calls[0][1]?.method).toBe("PATCH");
    expect(result).toEqual({
      space_id: "s1",
      title: "Renamed",
      description: "",
      warehouse_id: "",
      updated_at: "1970-01-01T00:00:00.000Z",
    });
  });
});

describe("deleteSpace", () => {
  it("moves the space to the trash", async () => {
    fetchMock.mockResolvedValueOnce(new Response("", { status: 200 }));
    expect(await deleteSpace(client, "s1")).toEqual({ status: "success", message: "Space s1 moved to trash" });
    expect(fetchMock.mock.calls[0][1]?.method).toBe("DELETE");
  });

  it("reports a missing space", async () => {
    fetchMock.mockResolvedValueOnce(new Response("{}", { status: 404 }));
    await expect(deleteSpace(client, "s1")).rejects.toBeInstanceOf(SpaceNotFoundError);
  });
});
