/**
 * Databricks Genie Spaces REST API client.
 *
 * Thin wrappers over `DatabricksClient.request`. Reads are retried on
 * transient failures; anything that creates or mutates state is sent once.
 *
 * API docs: https://docs.databricks.com/api/workspace/genie
 */

import { z } from "zod/v4";
import type { DatabricksClient } from "./client";
import { TIMEOUTS } from "./fetch-with-timeout";
import { canonicalizeSerializedJson } from "@/lib/genie/serialized-space";

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const Timestamp = z.union([z.number(), z.string()]).optional();

export const GenieSpaceSchema = z.object({
  space_id: z.string(),
  title: z.string().default(""),
  description: z.string().optional(),
  warehouse_id: z.string().optional(),
  serialized_space: z.string().optional(),
  owner_user_id: z.union([z.string(), z.number()]).optional(),
  created_timestamp: Timestamp,
  last_updated_timestamp: Timestamp,
});
export type GenieSpaceResponse = z.output<typeof GenieSpaceSchema>;

const GenieListSchema = z.object({
  spaces: z.array(GenieSpaceSchema).nullish().transform((v) => v ?? []),
  next_page_token: z.string().optional(),
});
export type GenieListResponse = z.output<typeof GenieListSchema>;

const QueryAttachmentSchema = z.object({
  query: z.string().optional(),
  description: z.string().optional(),
  title: z.string().optional(),
  statement_id: z.string().optional(),
});

export const GenieAttachmentSchema = z.object({
  attachment_id: z.string().optional(),
  query: QueryAttachmentSchema.optional(),
  text: z.object({ content: z.string().optional() }).optional(),
});
export type GenieAttachment = z.output<typeof GenieAttachmentSchema>;

export const GenieMessageSchema = z.object({
  id: z.string().optional(),
  message_id: z.string().optional(),
  conversation_id: z.string().optional(),
  content: z.string().optional(),
  status: z.string().default("SUBMITTED"),
  attachments: z.array(GenieAttachmentSchema).nullish().transform((v) => v ?? []),
  error: z
    .object({ error: z.string().optional(), type: z.string().optional() })
    .optional(),
  created_timestamp: Timestamp,
});
export type GenieMessage = z.output<typeof GenieMessageSchema>;

const StartConversationSchema = z.object({
  conversation_id: z.string().optional(),
  message_id: z.string().optional(),
  conversation: z.object({ id: z.string().optional() }).optional(),
  message: z.object({ id: z.string().optional(), message_id: z.string().optional() }).optional(),
});

export const StatementResponseSchema = z.object({
  statement_id: z.string().optional(),
  manifest: z
    .object({
      schema: z
        .object({
          columns: z
            .array(
              z.object({
                name: z.string(),
                type_name: z.string().optional(),
                type_text: z.string().optional(),
              }),
            )
            .default([]),
        })
        .optional(),
      total_row_count: z.number().optional(),
    })
    .optional(),
  result: z
    .object({
      data_array: z.array(z.array(z.unknown())).nullish().transform((v) => v ?? []),
    })
    .optional(),
});
export type StatementResponse = z.output<typeof StatementResponseSchema>;

const QueryResultSchema = z.object({
  statement_response: StatementResponseSchema.optional(),
});

const ConversationSchema = z.object({
  id: z.string().optional(),
  conversation_id: z.string().optional(),
  title: z.string().optional(),
  created_timestamp: Timestamp,
  last_updated_timestamp: Timestamp,
});
export type GenieConversation = z.output<typeof ConversationSchema>;

const ConversationListSchema = z.object({
  conversations: z.array(ConversationSchema).nullish().transform((v) => v ?? []),
  next_page_token: z.string().optional(),
});
export type GenieConversationList = z.output<typeof ConversationListSchema>;

const MessageListSchema = z.object({
  messages: z.array(GenieMessageSchema).nullish().transform((v) => v ?? []),
  next_page_token: z.string().optional(),
});

const EmptySchema = z.object({});

/** Epoch-ms timestamps as ISO strings; anything unparseable passes through. */
export function formatTimestamp(value: number | string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const ms = typeof value === "number" ? value : Number(value);
  return Number.isFinite(ms) ? new Date(ms).toISOString() : String(value);
}

function spacePath(spaceId: string): string {
  return `/api/2.0/genie/spaces/${encodeURIComponent(spaceId)}`;
}

function conversationPath(spaceId: string, conversationId: string): string {
  return `${spacePath(spaceId)}/conversations/${encodeURIComponent(conversationId)}`;
}

function messagePath(spaceId: string, conversationId: string, messageId: string): string {
  return `${conversationPath(spaceId, conversationId)}/messages/${encodeURIComponent(messageId)}`;
}

// ---------------------------------------------------------------------------
// Spaces
// ---------------------------------------------------------------------------

export async function listGenieSpaces(
  client: DatabricksClient,
  pageSize = 100,
  pageToken?: string,
): Promise<GenieListResponse> {
  return client.request(GenieListSchema, {
    operation: "Genie list spaces",
    method: "GET",
    path: "/api/2.0/genie/spaces",
    query: { page_size: pageSize, page_token: pageToken },
    retry: true,
  });
}

export async function getGenieSpace(
  client: DatabricksClient,
  spaceId: string,
  includeSerializedSpace = false,
): Promise<GenieSpaceResponse> {
  return client.request(GenieSpaceSchema, {
    operation: "Genie get space",
    method: "GET",
    path: spacePath(spaceId),
    query: includeSerializedSpace ? { include_serialized_space: true } : undefined,
    retry: true,
  });
}

export async function createGenieSpace(
  client: DatabricksClient,
  opts: {
    title: string;
    description?: string;
    serializedSpace: string;
    warehouseId: string;
    parentPath?: string;
  },
): Promise<GenieSpaceResponse> {
  const body: Record<string, string> = {
    title: opts.title,
    serialized_space: canonicalizeSerializedJson(opts.serializedSpace),
    warehouse_id: opts.warehouseId,
  };
  if (opts.description !== undefined) body.description = opts.description;
  if (opts.parentPath !== undefined) body.parent_path = opts.parentPath;

  return client.request(GenieSpaceSchema, {
    operation: "Genie create space",
    method: "POST",
    path: "/api/2.0/genie/spaces",
    body,
  });
}

export async function updateGenieSpace(
  client: DatabricksClient,
  spaceId: string,
  opts: {
    title?: string;
    description?: string;
    serializedSpace?: string;
    warehouseId?: string;
  },
): Promise<GenieSpaceResponse> {
  const body: Record<string, string> = {};
  if (opts.title !== undefined) body.title = opts.title;
  if (opts.description !== undefined) body.description = opts.description;
  if (opts.serializedSpace !== undefined)
    body.serialized_space = canonicalizeSerializedJson(opts.serializedSpace);
  if (opts.warehouseId !== undefined) body.warehouse_id = opts.warehouseId;

  return client.request(GenieSpaceSchema, {
    operation: "Genie update space",
    method: "PATCH",
    path: spacePath(spaceId),
    body,
  });
}

/** Moves the space to the workspace trash. */
export async function trashGenieSpace(client: DatabricksClient, spaceId: string): Promise<void> {
  await client.request(EmptySchema, {
    operation: "Genie trash space",
    method: "DELETE",
    path: spacePath(spaceId),
  });
}

// ---------------------------------------------------------------------------
// Conversations
// ---------------------------------------------------------------------------

/**
 * Ask the first question of a new conversation.
 *
 * API: POST /api/2.0/genie/spaces/{space_id}/start-conversation
 */
export async function startConversation(
  client: DatabricksClient,
  spaceId: string,
  content: string,
): Promise<{ conversationId: string; messageId: string }> {
  const data = await client.request(StartConversationSchema, {
    operation: "Genie start conversation",
    method: "POST",
    path: `${spacePath(spaceId)}/start-conversation`,
    body: { content },
  });

  const conversationId = data.conversation_id ?? data.conversation?.id;
  const messageId = data.message_id ?? data.message?.id ?? data.message?.message_id;

  if (!conversationId || !messageId) {
    throw new Error("Genie start-conversation response missing conversation_id or message_id");
  }
  return { conversationId, messageId };
}

/** Post a follow-up question to an existing conversation. */
export async function createMessage(
  client: DatabricksClient,
  spaceId: string,
  conversationId: string,
  content: string,
): Promise<{ messageId: string }> {
  const data = await client.request(GenieMessageSchema, {
    operation: "Genie create message",
    method: "POST",
    path: `${conversationPath(spaceId, conversationId)}/messages`,
    body: { content },
  });

  const messageId = data.id ?? data.message_id;
  if (!messageId) {
    throw new Error("Genie follow-up response missing message id");
  }
  return { messageId };
}

export async function getMessage(
  client: DatabricksClient,
  spaceId: string,
  conversationId: string,
  messageId: string,
): Promise<GenieMessage> {
  return client.request(GenieMessageSchema, {
    operation: "Genie get message",
    method: "GET",
    path: messagePath(spaceId, conversationId, messageId),
    retry: true,
  });
}

export async function getAttachmentQueryResult(
  client: DatabricksClient,
  spaceId: string,
  conversationId: string,
  messageId: string,
  attachmentId: string,
): Promise<StatementResponse | undefined> {
  const data = await client.request(QueryResultSchema, {
    operation: "Genie get query result",
    method: "GET",
    path: `${messagePath(spaceId, conversationId, messageId)}/attachments/${encodeURIComponent(attachmentId)}/query-result`,
    timeoutMs: TIMEOUTS.QUERY_RESULT,
    retry: true,
  });
  return data.statement_response;
}

/** Message-level result endpoint for messages whose attachment carries no id. */
export async function getMessageQueryResult(
  client: DatabricksClient,
  spaceId: string,
  conversationId: string,
  messageId: string,
): Promise<StatementResponse | undefined> {
  const data = await client.request(QueryResultSchema, {
    operation: "Genie get message query result",
    method: "GET",
    path: `${messagePath(spaceId, conversationId, messageId)}/query-result`,
    timeoutMs: TIMEOUTS.QUERY_RESULT,
    retry: true,
  });
  return data.statement_response;
}

export async function listConversations(
  client: DatabricksClient,
  spaceId: string,
  pageSize = 20,
  pageToken?: string,
): Promise<GenieConversationList> {
  return client.request(ConversationListSchema, {
    operation: "Genie list conversations",
    method: "GET",
    path: `${spacePath(spaceId)}/conversations`,
    query: { page_size: pageSize, page_token: pageToken },
    retry: true,
  });
}

export async function getConversation(
  client: DatabricksClient,
  spaceId: string,
  conversationId: string,
): Promise<GenieConversation> {
  return client.request(ConversationSchema, {
    operation: "Genie get conversation",
    method: "GET",
    path: conversationPath(spaceId, conversationId),
    retry: true,
  });
}

/** All messages of a conversation, following page tokens. */
export async function listConversationMessages(
  client: DatabricksClient,
  spaceId: string,
  conversationId: string,
  maxPages = 20,
): Promise<GenieMessage[]> {
  const messages: GenieMessage[] = [];
  let pageToken: string | undefined;

  for (let page = 0; page < maxPages; page++) {
    const data = await client.request(MessageListSchema, {
      operation: "Genie list messages",
      method: "GET",
      path: `${conversationPath(spaceId, conversationId)}/messages`,
      query: { page_size: 100, page_token: pageToken },
      retry: true,
    });
    messages.push(...data.messages);
    pageToken = data.next_page_token;
    if (!pageToken) break;
  }

  return messages;
}
