/**
 * Tool handlers.
 *
 * Each handler takes the shared context plus already-validated arguments and
 * resolves to a JSON-serializable value. `runTool` turns that value, or any
 * failure, into an MCP tool result; handlers never format output themselves.
 */

import { extractTableMetadata } from "@/lib/dbx/unity-catalog";
import { ConfigValidationError, toErrorPayload } from "@/lib/errors";
import { bulkDeleteSpaces, bulkUpdateSpaces } from "@/lib/genie/bulk";
import { generateSpaceConfig } from "@/lib/genie/generator";
import { diffSpaces, exportSpace, findSpaces, spaceHealth } from "@/lib/genie/inspect";
import { getConfigSchema } from "@/lib/genie/schema-export";
import { createSpace, deleteSpace, getSpace, listSpaces, updateSpace } from "@/lib/genie/spaces";
import { getConfigTemplate } from "@/lib/genie/templates";
import { validateSpaceConfig } from "@/lib/genie/validator";
import { errorMessage, logger } from "@/lib/logger";
import type { GenieContext } from "./context";

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function textResult(value: unknown, isError = false): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/** Run a handler; failures are logged and returned as an error payload. */
export async function runTool(name: string, handler: () => Promise<unknown>): Promise<ToolResult> {
  try {
    return textResult(await handler());
  } catch (err) {
    const payload = toErrorPayload(err);
    logger.error("Tool failed", { tool: name, type: payload.error.type, error: errorMessage(err) });
    return textResult(payload, true);
  }
}

const secondsToMs = (seconds: number | undefined) => (seconds === undefined ? undefined : seconds * 1000);

// ---------------------------------------------------------------------------
// Spaces
// ---------------------------------------------------------------------------

export interface CreateSpaceArgs {
  config: string | Record<string, unknown>;
  warehouse_id?: string;
  title?: string;
  description?: string;
  parent_path?: string;
}

export function createSpaceTool(ctx: GenieContext, args: CreateSpaceArgs) {
  return createSpace(
    ctx.client,
    {
      config: args.config,
      warehouseId: args.warehouse_id,
      title: args.title,
      description: args.description,
      parentPath: args.parent_path,
    },
    ctx.config.defaultWarehouseId,
  );
}

export function listSpacesTool(ctx: GenieContext, args: { page_size?: number; page_token?: string }) {
  return listSpaces(ctx.client, args.page_size, args.page_token);
}

export function getSpaceTool(ctx: GenieContext, args: { space_id: string; include_config?: boolean }) {
  return getSpace(ctx.client, args.space_id, args.include_config ?? false);
}

export interface UpdateSpaceArgs {
  space_id: string;
  config?: string | Record<string, unknown>;
  title?: string;
  description?: string;
  warehouse_id?: string;
}

export function updateSpaceTool(ctx: GenieContext, args: UpdateSpaceArgs) {
  return updateSpace(ctx.client, args.space_id, {
    config: args.config,
    title: args.title,
    description: args.description,
    warehouseId: args.warehouse_id,
  });
}

export function deleteSpaceTool(ctx: GenieContext, args: { space_id: string }) {
  return deleteSpace(ctx.client, args.space_id);
}

// ---------------------------------------------------------------------------
// Inspection and bulk edits
// ---------------------------------------------------------------------------

export function spaceHealthTool(ctx: GenieContext, args: { space_id: string }) {
  return spaceHealth(ctx, args.space_id);
}

export function exportSpaceTool(ctx: GenieContext, args: { space_id: string }) {
  return exportSpace(ctx.client, args.space_id);
}

export function diffSpacesTool(ctx: GenieContext, args: { space_id: string; compare_with: string }) {
  return diffSpaces(ctx.client, args.space_id, args.compare_with);
}

export function findSpacesTool(ctx: GenieContext, args: { tables?: string[]; keywords?: string[] }) {
  return findSpaces(ctx.client, args);
}

export interface BulkUpdateArgs {
  space_ids: string[];
  add_instructions?: string[];
  add_tables?: string[];
  dry_run?: boolean;
}

export function bulkUpdateSpacesTool(ctx: GenieContext, args: BulkUpdateArgs) {
  return bulkUpdateSpaces(ctx.client, {
    spaceIds: args.space_ids,
    addInstructions: args.add_instructions,
    addTables: args.add_tables,
    dryRun: args.dry_run,
  });
}

export function bulkDeleteSpacesTool(
  ctx: GenieContext,
  args: { space_ids?: string[]; pattern?: string; dry_run?: boolean },
) {
  return bulkDeleteSpaces(ctx.client, { spaceIds: args.space_ids, pattern: args.pattern, dryRun: args.dry_run });
}

// ---------------------------------------------------------------------------
// Conversations
// ---------------------------------------------------------------------------

export interface AskArgs {
  space_id?: string;
  question: string;
  timeout_seconds?: number;
  poll_interval_seconds?: number;
  follow_up?: boolean;
}

/** A follow-up without a space continues the most recently active live conversation. */
export async function askTool(ctx: GenieContext, args: AskArgs) {
  const followUp = args.follow_up ?? false;
  const spaceId = args.space_id ?? (followUp ? ctx.conversations.cache.lastActiveSpace() : undefined);
  if (!spaceId) {
    throw new ConfigValidationError(
      followUp ? "space_id is required: no live conversation to follow up on" : "space_id is required",
    );
  }
  return ctx.conversations.askQuestion(spaceId, args.question, {
    timeoutMs: secondsToMs(args.timeout_seconds),
    pollIntervalMs: secondsToMs(args.poll_interval_seconds),
    followUp,
  });
}

export interface ContinueConversationArgs {
  space_id: string;
  conversation_id: string;
  question: string;
  timeout_seconds?: number;
  poll_interval_seconds?: number;
}

export function continueConversationTool(ctx: GenieContext, args: ContinueConversationArgs) {
  return ctx.conversations.continueConversation(args.space_id, args.conversation_id, args.question, {
    timeoutMs: secondsToMs(args.timeout_seconds),
    pollIntervalMs: secondsToMs(args.poll_interval_seconds),
  });
}

export interface QueryResultsArgs {
  space_id: string;
  conversation_id: string;
  message_id: string;
  attachment_id?: string;
}

export function getQueryResultsTool(ctx: GenieContext, args: QueryResultsArgs) {
  return ctx.conversations.getQueryResults(args.space_id, args.conversation_id, args.message_id, args.attachment_id);
}

export function listConversationsTool(
  ctx: GenieContext,
  args: { space_id: string; page_size?: number; page_token?: string },
) {
  return ctx.conversations.listConversations(args.space_id, args.page_size, args.page_token);
}

export function getConversationHistoryTool(ctx: GenieContext, args: { space_id: string; conversation_id: string }) {
  return ctx.conversations.getConversationHistory(args.space_id, args.conversation_id);
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ValidateConfigArgs {
  document?: string | Record<string, unknown>;
  /** Older name of `document`. */
  config?: string | Record<string, unknown>;
  validate_sql?: boolean;
  catalog_name?: string;
}

export async function validateConfigTool(args: ValidateConfigArgs) {
  const document = args.document ?? args.config;
  if (document === undefined) {
    throw new ConfigValidationError("document is required");
  }
  return validateSpaceConfig(document, {
    validateSql: args.validate_sql ?? true,
    catalogName: args.catalog_name,
  });
}

export async function getConfigSchemaTool() {
  return getConfigSchema();
}

/** Unknown domains are a caller error; the valid ones are listed as issues. */
export async function getConfigTemplateTool(args: { domain: string }) {
  const lookup = getConfigTemplate(args.domain);
  if (!lookup.ok) {
    throw new ConfigValidationError(lookup.error, [...lookup.valid_domains]);
  }
  return { domain: lookup.domain, template: lookup.template, placeholders: lookup.placeholders };
}

export interface GenerateSpaceConfigArgs {
  requirements: string;
  warehouse_id: string;
  catalog_name: string;
  serving_endpoint_name?: string;
  validate_sql?: boolean;
  table_metadata?: string;
}

export function generateSpaceConfigTool(ctx: GenieContext, args: GenerateSpaceConfigArgs) {
  return generateSpaceConfig(ctx.client, {
    requirements: args.requirements,
    catalogName: args.catalog_name,
    warehouseId: args.warehouse_id,
    endpoint: args.serving_endpoint_name ?? ctx.config.servingEndpointName,
    tableMetadata: args.table_metadata,
    maxAttempts: ctx.config.maxRetries,
    validateSql: args.validate_sql ?? true,
  });
}

export async function extractTableMetadataTool(
  ctx: GenieContext,
  args: { catalog_name: string; schema_name: string; table_names?: string[] },
) {
  const tables = await extractTableMetadata(ctx.client, args.catalog_name, args.schema_name, args.table_names);
  return { catalog_name: args.catalog_name, schema_name: args.schema_name, tables };
}
