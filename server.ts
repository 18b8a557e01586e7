/**
 * Process entry point: read the environment, build the context and serve
 * the Genie tools over stdio.
 *
 * Stdout carries the MCP protocol, so nothing else may write to it.
 * Handles SIGTERM/SIGINT by closing the server before exiting.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadServerConfig } from "@/lib/config";
import { errorMessage, logger } from "@/lib/logger";
import { createGenieContext } from "@/lib/mcp/context";
import { createGenieMcpServer } from "@/lib/mcp/server";

async function main(): Promise<void> {
  const config = loadServerConfig();
  const ctx = createGenieContext(config);
  const server = createGenieMcpServer(ctx);

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server
      .close()
      .catch((err: unknown) => logger.error("Error during shutdown", { error: errorMessage(err) }))
      .finally(() => process.exit(0));
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  await server.connect(new StdioServerTransport());
  logger.info("Genie MCP server started", {
    host: config.host,
    auth: config.auth.kind,
    defaultWarehouse: config.defaultWarehouseId ?? null,
  });
}

main().catch((err: unknown) => {
  logger.error("Server failed to start", { error: errorMessage(err) });
  process.exit(1);
});
