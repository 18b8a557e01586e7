/**
 * MCP tool surface for Genie spaces.
 *
 * Registers the space, conversation and configuration tools on an
 * `McpServer`. Every tool answers with JSON text; failures come back as an
 * `{ error }` payload flagged `isError` instead of a protocol error.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import packageJson from "@/package.json";
import { TEMPLATE_DOMAINS } from "@/lib/genie/templates";
import type { GenieContext } from "./context";
import {
  askTool,
  bulkDeleteSpacesTool,
  bulkUpdateSpacesTool,
  continueConversationTool,
  createSpaceTool,
  deleteSpaceTool,
  diffSpacesTool,
  exportSpaceTool,
  extractTableMetadataTool,
  findSpacesTool,
  generateSpaceConfigTool,
  getConfigSchemaTool,
  getConfigTemplateTool,
  getConversationHistoryTool,
  getQueryResultsTool,
  getSpaceTool,
  listConversationsTool,
  listSpacesTool,
  runTool,
  spaceHealthTool,
  updateSpaceTool,
  validateConfigTool,
} from "./tools";

export const SERVER_NAME = "genie-spaces";

const document = z
  .union([z.string(), z.record(z.string(), z.unknown())])
  .describe("Space configuration, or a serialized space (version 2), as a JSON object or JSON text");

const spaceId = z.string().min(1).describe("Genie space ID");
const conversationId = z.string().min(1).describe("Conversation ID");
const timeoutSeconds = z
  .number()
  .positive()
  .optional()
  .describe("Seconds to wait for an answer (default from DATABRICKS_TIMEOUT_SECONDS, 300)");
const pollIntervalSeconds = z
  .number()
  .positive()
  .optional()
  .describe("Seconds between status checks (default from DATABRICKS_POLL_INTERVAL_SECONDS, 2)");

export function createGenieMcpServer(ctx: GenieContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: packageJson.version },
    { capabilities: { tools: {}, logging: {} } },
  );

  // -------------------------------------------------------------------------
  // Spaces
  // -------------------------------------------------------------------------

  server.registerTool(
    "create_space",
    {
      title: "Create Genie space",
      description: [
        "Create a Genie space from a configuration or a serialized space.",
        "Configurations are schema-checked and must name at least one table.",
        "warehouse_id falls back to the config, then to DATABRICKS_WAREHOUSE_ID, then to a discovered",
        "Pro or serverless warehouse, preferring running ones.",
        "The result lists warnings for fields the space cannot store.",
      ].join("\n"),
      inputSchema: {
        config: document,
        warehouse_id: z.string().optional().describe("SQL warehouse that runs the space's queries"),
        title: z.string().optional().describe("Defaults to the config's space_name"),
        description: z.string().optional().describe("Defaults to the config's description"),
        parent_path: z.string().optional().describe("Workspace folder for the space"),
      },
    },
    async (args) => runTool("create_space", () => createSpaceTool(ctx, args)),
  );

  server.registerTool(
    "list_spaces",
    {
      title: "List Genie spaces",
      description: "List the Genie spaces visible to the caller, one page at a time.",
      inputSchema: {
        page_size: z.number().int().positive().optional(),
        page_token: z.string().optional(),
      },
    },
    async (args) => runTool("list_spaces", () => listSpacesTool(ctx, args)),
  );

  server.registerTool(
    "get_space",
    {
      title: "Get Genie space",
      description: [
        "Fetch one Genie space.",
        "With include_config the stored serialized space is returned, plus its decoded configuration.",
      ].join("\n"),
      inputSchema: {
        space_id: spaceId,
        include_config: z.boolean().optional(),
      },
    },
    async (args) => runTool("get_space", () => getSpaceTool(ctx, args)),
  );

  server.registerTool(
    "update_space",
    {
      title: "Update Genie space",
      description: "Replace a space's configuration and/or change its title, description or warehouse.",
      inputSchema: {
        space_id: spaceId,
        config: document.optional(),
        title: z.string().optional(),
        description: z.string().optional(),
        warehouse_id: z.string().optional(),
      },
    },
    async (args) => runTool("update_space", () => updateSpaceTool(ctx, args)),
  );

  server.registerTool(
    "delete_space",
    {
      title: "Delete Genie space",
      description: "Move a Genie space to the workspace trash.",
      inputSchema: { space_id: spaceId },
    },
    async (args) => runTool("delete_space", () => deleteSpaceTool(ctx, args)),
  );

  // -------------------------------------------------------------------------
  // Inspection and bulk edits
  // -------------------------------------------------------------------------

  server.registerTool(
    "space_health",
    {
      title: "Space health",
      description: [
        "Score a space 0-100 from its configuration (60%) and recent conversation activity (40%).",
        "Returns recommendations, element counts and the validator's report.",
      ].join("\n"),
      inputSchema: { space_id: spaceId },
    },
    async (args) => runTool("space_health", () => spaceHealthTool(ctx, args)),
  );

  server.registerTool(
    "export_space",
    {
      title: "Export space configuration",
      description: "The configuration decoded from a space's stored document, with element counts.",
      inputSchema: { space_id: spaceId },
    },
    async (args) => runTool("export_space", () => exportSpaceTool(ctx, args)),
  );

  server.registerTool(
    "diff_spaces",
    {
      title: "Compare two spaces",
      description: "Element counts of two spaces side by side, and the tables only one of them uses.",
      inputSchema: { space_id: spaceId, compare_with: spaceId.describe("Second Genie space ID") },
    },
    async (args) => runTool("diff_spaces", () => diffSpacesTool(ctx, args)),
  );

  server.registerTool(
    "find_spaces",
    {
      title: "Find spaces",
      description: [
        "Find spaces that use a table or mention a keyword.",
        "Tables match as case-insensitive substrings of catalog.schema.table;",
        "keywords match the title, description and instructions.",
      ].join("\n"),
      inputSchema: {
        tables: z.array(z.string()).optional(),
        keywords: z.array(z.string()).optional(),
      },
    },
    async (args) => runTool("find_spaces", () => findSpacesTool(ctx, args)),
  );

  server.registerTool(
    "bulk_update_spaces",
    {
      title: "Bulk update spaces",
      description: [
        "Add instructions and/or tables to several spaces.",
        "dry_run defaults to true: nothing is written until it is set to false.",
      ].join("\n"),
      inputSchema: {
        space_ids: z.array(z.string().min(1)).min(1),
        add_instructions: z.array(z.string()).optional(),
        add_tables: z.array(z.string()).optional().describe("catalog.schema.table identifiers"),
        dry_run: z.boolean().optional(),
      },
    },
    async (args) => runTool("bulk_update_spaces", () => bulkUpdateSpacesTool(ctx, args)),
  );

  server.registerTool(
    "bulk_delete_spaces",
    {
      title: "Bulk delete spaces",
      description: [
        "Move several spaces to the trash, by ID or by title pattern.",
        "A pattern with * or ? is a glob over the whole title; otherwise it is a regular expression.",
        "dry_run defaults to true: nothing is deleted until it is set to false.",
      ].join("\n"),
      inputSchema: {
        space_ids: z.array(z.string().min(1)).optional(),
        pattern: z.string().min(1).optional(),
        dry_run: z.boolean().optional(),
      },
    },
    async (args) => runTool("bulk_delete_spaces", () => bulkDeleteSpacesTool(ctx, args)),
  );

  // -------------------------------------------------------------------------
  // Conversations
  // -------------------------------------------------------------------------

  server.registerTool(
    "ask",
    {
      title: "Ask Genie",
      description: [
        "Ask a natural-language question in a new conversation and wait for the answer.",
        "Returns the status, response text, generated SQL and query results when available.",
        "Set follow_up to continue the space's most recent live conversation instead;",
        "without space_id a follow-up goes to the most recently active space.",
        "Questions are limited to 5 per minute; callers over the limit wait.",
      ].join("\n"),
      inputSchema: {
        space_id: spaceId.optional(),
        question: z.string().min(1),
        timeout_seconds: timeoutSeconds,
        poll_interval_seconds: pollIntervalSeconds,
        follow_up: z.boolean().optional(),
      },
    },
    async (args) => runTool("ask", () => askTool(ctx, args)),
  );

  server.registerTool(
    "continue_conversation",
    {
      title: "Continue Genie conversation",
      description: "Ask a follow-up question in an existing conversation. The previous answer must be complete.",
      inputSchema: {
        space_id: spaceId,
        conversation_id: conversationId,
        question: z.string().min(1),
        timeout_seconds: timeoutSeconds,
        poll_interval_seconds: pollIntervalSeconds,
      },
    },
    async (args) => runTool("continue_conversation", () => continueConversationTool(ctx, args)),
  );

  server.registerTool(
    "get_query_results",
    {
      title: "Get query results",
      description: "Fetch the result set of a message's query (at most 5,000 rows).",
      inputSchema: {
        space_id: spaceId,
        conversation_id: conversationId,
        message_id: z.string().min(1),
        attachment_id: z.string().optional(),
      },
    },
    async (args) => runTool("get_query_results", () => getQueryResultsTool(ctx, args)),
  );

  server.registerTool(
    "list_conversations",
    {
      title: "List conversations",
      description: "List the conversations of a Genie space.",
      inputSchema: {
        space_id: spaceId,
        page_size: z.number().int().positive().optional(),
        page_token: z.string().optional(),
      },
    },
    async (args) => runTool("list_conversations", () => listConversationsTool(ctx, args)),
  );

  server.registerTool(
    "get_conversation_history",
    {
      title: "Get conversation history",
      description: "All messages of a conversation with their status and generated SQL.",
      inputSchema: { space_id: spaceId, conversation_id: conversationId },
    },
    async (args) => runTool("get_conversation_history", () => getConversationHistoryTool(ctx, args)),
  );

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  server.registerTool(
    "validate_config",
    {
      title: "Validate space configuration",
      description: [
        "Check a configuration (or serialized space) for completeness, SQL sanity and instruction quality.",
        "Returns valid, errors, warnings and a 0-100 score. Never fails on a bad document.",
      ].join("\n"),
      inputSchema: {
        document: document.optional(),
        config: document.optional().describe("Older name of document"),
        validate_sql: z.boolean().optional(),
        catalog_name: z.string().optional().describe("Warn about tables outside this catalog"),
      },
    },
    async (args) => runTool("validate_config", () => validateConfigTool(args)),
  );

  server.registerTool(
    "get_config_schema",
    {
      title: "Get configuration schema",
      description: "JSON Schema of the space configuration with best practices, scoring rules and an example.",
    },
    async () => runTool("get_config_schema", () => getConfigSchemaTool()),
  );

  server.registerTool(
    "get_config_template",
    {
      title: "Get configuration template",
      description: `Starter configuration for a domain: ${TEMPLATE_DOMAINS.join(", ")}.`,
      inputSchema: { domain: z.string().min(1) },
    },
    async (args) => runTool("get_config_template", () => getConfigTemplateTool(args)),
  );

  server.registerTool(
    "generate_space_config",
    {
      title: "Generate space configuration",
      description: [
        "Draft a configuration from plain-language requirements with a model serving endpoint.",
        "Returns the configuration, the model's reasoning, a confidence score and a validation report.",
      ].join("\n"),
      inputSchema: {
        requirements: z.string().min(1),
        warehouse_id: z.string().min(1),
        catalog_name: z.string().min(1),
        serving_endpoint_name: z.string().optional(),
        validate_sql: z.boolean().optional(),
        table_metadata: z
          .string()
          .optional()
          .describe("Table descriptions to ground the draft, e.g. the output of extract_table_metadata"),
      },
    },
    async (args) => runTool("generate_space_config", () => generateSpaceConfigTool(ctx, args)),
  );

  server.registerTool(
    "extract_table_metadata",
    {
      title: "Extract table metadata",
      description: "Describe the tables of a Unity Catalog schema, optionally restricted to some table names.",
      inputSchema: {
        catalog_name: z.string().min(1),
        schema_name: z.string().min(1),
        table_names: z.array(z.string()).optional(),
      },
    },
    async (args) => runTool("extract_table_metadata", () => extractTableMetadataTool(ctx, args)),
  );

  return server;
}
