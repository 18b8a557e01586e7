import { afterEach, describe, it, expect } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { z } from "zod";
import type { ServerConfig } from "@/lib/config";
import { createGenieContext } from "@/lib/mcp/context";
import { createGenieMcpServer } from "@/lib/mcp/server";

const config: ServerConfig = {
  host: "https://example.cloud.databricks.com",
  auth: { kind: "pat", token: "test-token" },
  timeoutSeconds: 30,
  pollIntervalSeconds: 2,
  maxRetries: 3,
  servingEndpointName: "test-endpoint",
  rateLimit: { maxRequests: 5, windowSeconds: 60 },
  conversationTtlMinutes: 30,
};

const TextResult = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
  isError: z.boolean().optional(),
});

let client: Client | undefined;

async function connect(): Promise<Client> {
  const server = createGenieMcpServer(createGenieContext(config));
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-client", version: "1.0.0" });
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return client;
}

afterEach(async () => {
  await client?.close();
  client = undefined;
});

describe("createGenieMcpServer", () => {
  it("registers every tool", async () => {
    const { tools } = await (await connect()).listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "ask",
      "bulk_delete_spaces",
      "bulk_update_spaces",
      "continue_conversation",
      "create_space",
      "delete_space",
      "diff_spaces",
      "export_space",
      "extract_table_metadata",
      "find_spaces",
      "generate_space_config",
      "get_config_schema",
      "get_config_template",
      "get_conversation_history",
      "get_query_results",
      "get_space",
      "list_conversations",
      "list_spaces",
      "space_health",
      "update_space",
      "validate_config",
    ]);
  });

  it("answers a template request with JSON text", async () => {
    const raw = await (await connect()).callTool({ name: "get_config_template", arguments: { domain: "hr" } });
    const result = TextResult.parse(raw);
    expect(result.isError).toBeUndefined();
    const body = JSON.parse(result.content[0].text);
    expect(body.domain).toBe("hr");
    expect(body.template.space_name).toBe("HR Analytics");
  });

  it("reports an invalid configuration as a normal result", async () => {
    const raw = await (await connect()).callTool({
      name: "validate_config",
      arguments: { document: { space_name: "x" } },
    });
    const result = TextResult.parse(raw);
    expect(result.isError).toBeUndefined();
    expect(JSON.parse(result.content[0].text).valid).toBe(false);
  });

  it("flags handler failures as tool errors", async () => {
    const raw = await (await connect()).callTool({ name: "get_config_template", arguments: { domain: "nope" } });
    const result = TextResult.parse(raw);
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content[0].text).error.code).toBe("VALIDATION");
  });
});
