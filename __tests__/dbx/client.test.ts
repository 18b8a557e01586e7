import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { z } from "zod/v4";
import { DatabricksClient } from "@/lib/dbx/client";
import { DatabricksApiError, GenieApiError } from "@/lib/errors";

const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function headersOf(call: number): Record<string, unknown> {
  const headers = fetchMock.mock.calls[call][1]?.headers;
  return headers && !Array.isArray(headers) && !(headers instanceof Headers) ? headers : {};
}

const ThingSchema = z.object({ id: z.string(), count: z.number().default(0) });

const noSleep = async () => {};

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("DatabricksClient with a personal access token", () => {
  const client = new DatabricksClient({
    host: "https://example.cloud.databricks.com/",
    auth: { kind: "pat", token: "test-token" },
    maxRetries: 0,
  });

  it("sends the token and query parameters and applies schema defaults", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "x1" }));

    const thing = await client.request(ThingSchema, {
      operation: "Get thing",
      method: "GET",
      path: "/api/2.0/things",
      query: { page_size: 10, page_token: undefined, active: true },
    });

    expect(thing).toEqual({ id: "x1", count: 0 });
    expect(fetchMock.mock.calls[0][0]).toBe("https://example.cloud.databricks.com/api/2.0/things?page_size=10&active=true");
    expect(fetchMock.mock.calls[0][1]?.method).toBe("GET");
    expect(headersOf(0)).toEqual({ Authorization: "Bearer test-token", "Content-Type": "application/json" });
  });

  it("serializes the body", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "x2" }));
    await client.request(ThingSchema, { operation: "Make thing", method: "POST", path: "/api/2.0/things", body: { a: 1 } });
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"a":1}');
  });

  it("throws DatabricksApiError for non-2xx responses", async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error_code":"NOT_FOUND"}', { status: 404 }));
    const run = client.request(ThingSchema, { operation: "Get thing", method: "GET", path: "/api/2.0/things/1" });
    await expect(run).rejects.toBeInstanceOf(DatabricksApiError);
    await expect(run).rejects.toThrow('Get thing failed (404): {"error_code":"NOT_FOUND"}');
  });

  it("treats an empty body as an empty object", async () => {
    fetchMock.mockResolvedValueOnce(new Response("", { status: 200 }));
    const out = await client.request(z.object({}), { operation: "Delete thing", method: "DELETE", path: "/api/2.0/things/1" });
    expect(out).toEqual({});
  });

  it("rejects bodies that are not JSON", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
    await expect(
      client.request(ThingSchema, { operation: "Get thing", method: "GET", path: "/api/2.0/things/1" }),
    ).rejects.toThrow(new GenieApiError("Get thing returned a body that is not JSON"));
  });

  it("rejects bodies of the wrong shape", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: 7 }));
    const run = client.request(ThingSchema, { operation: "Get thing", method: "GET", path: "/api/2.0/things/1" });
    await expect(run).rejects.toBeInstanceOf(GenieApiError);
    await expect(run).rejects.toThrow(/^Get thing returned an unexpected response: id: /);
  });
});

describe("DatabricksClient retries", () => {
  const client = new DatabricksClient({
    host: "https://example.cloud.databricks.com",
    auth: { kind: "pat", token: "test-token" },
    maxRetries: 2,
    sleep: noSleep,
  });

  it("retries transient failures of idempotent calls", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("unavailable", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ id: "x1" }));

    const out = await client.request(ThingSchema, {
      operation: "Get thing",
      method: "GET",
      path: "/api/2.0/things/1",
      retry: true,
    });
    expect(out.id).toBe("x1");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    fetchMock.mockResolvedValue(new Response("missing", { status: 404 }));
    await expect(
      client.request(ThingSchema, { operation: "Get thing", method: "GET", path: "/api/2.0/things/1", retry: true }),
    ).rejects.toBeInstanceOf(DatabricksApiError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("sends non-idempotent calls once", async () => {
    fetchMock.mockResolvedValueOnce(new Response("unavailable", { status: 503 }));
    await expect(
      client.request(ThingSchema, { operation: "Make thing", method: "POST", path: "/api/2.0/things" }),
    ).rejects.toBeInstanceOf(DatabricksApiError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("DatabricksClient with OAuth M2M", () => {
  it("exchanges client credentials and caches the token", async () => {
    let now = 0;
    const client = new DatabricksClient({
      host: "https://example.cloud.databricks.com",
      auth: { kind: "oauth-m2m", clientId: "test-client", clientSecret: "test-secret" },
      now: () => now,
    });
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ access_token: "token-1", expires_in: 120 }))
      .mockResolvedValueOnce(jsonResponse({ id: "a" }))
      .mockResolvedValueOnce(jsonResponse({ id: "b" }))
      .mockResolvedValueOnce(jsonResponse({ access_token: "token-2", expires_in: 120 }))
      .mockResolvedValueOnce(jsonResponse({ id: "c" }));

    const req = { operation: "Get thing", method: "GET" as const, path: "/api/2.0/things/1" };
    await client.request(ThingSchema, req);
    now = 59_000;
    await client.request(ThingSchema, req);
    now = 61_000;
    await client.request(ThingSchema, req);

    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(fetchMock.mock.calls[0][0]).toBe("https://example.cloud.databricks.com/oidc/v1/token");
    expect(headersOf(0).Authorization).toBe(`Basic ${Buffer.from("test-client:test-secret").toString("base64")}`);
    expect(String(fetchMock.mock.calls[0][1]?.body)).toBe("grant_type=client_credentials&scope=all-apis");
    expect(headersOf(1).Authorization).toBe("Bearer token-1");
    expect(headersOf(2).Authorization).toBe("Bearer token-1");
    expect(headersOf(4).Authorization).toBe("Bearer token-2");
  });

  it("fails when the token exchange is rejected", async () => {
    const client = new DatabricksClient({
      host: "https://example.cloud.databricks.com",
      auth: { kind: "oauth-m2m", clientId: "test-client", clientSecret: "test-secret" },
    });
    fetchMock.mockResolvedValueOnce(new Response("invalid_client", { status: 401 }));
    await expect(client.getHeaders()).rejects.toThrow("OAuth token exchange failed (401): invalid_client");
  });
});
