/**
 * Conversation orchestration: ask a question, long-poll the message until
 * it reaches a terminal status, and shape the answer.
 *
 * Per question:
 *   SUBMITTED -> (polling) -> COMPLETED | FAILED | CANCELLED
 *
 * FAILED and CANCELLED are returned as results, not thrown. Giving up on
 * the wait throws `GenieTimeoutError`; the remote message is left as is.
 */

import type { DatabricksClient } from "@/lib/dbx/client";
import {
  createMessage,
  formatTimestamp,
  getAttachmentQueryResult,
  getConversation,
  getMessage,
  getMessageQueryResult,
  listConversationMessages,
  listConversations,
  startConversation,
  type GenieAttachment,
  type GenieConversation,
  type GenieConversationList,
  type GenieMessage,
  type StatementResponse,
} from "@/lib/dbx/genie";
import { GenieTimeoutError } from "@/lib/errors";
import { errorMessage, logger } from "@/lib/logger";
import type { Clock } from "./clock";
import type { ConversationCache } from "./conversation-cache";
import { pollUntilComplete } from "./polling";
import type { RateLimiter } from "./rate-limiter";

// ---------------------------------------------------------------------------
// Remote surface
// ---------------------------------------------------------------------------

/** The slice of the Genie REST API the orchestrator talks to. */
export interface GenieMessageApi {
  startConversation(spaceId: string, content: string): Promise<{ conversationId: string; messageId: string }>;
  createMessage(spaceId: string, conversationId: string, content: string): Promise<{ messageId: string }>;
  getMessage(spaceId: string, conversationId: string, messageId: string): Promise<GenieMessage>;
  getAttachmentQueryResult(
    spaceId: string,
    conversationId: string,
    messageId: string,
    attachmentId: string,
  ): Promise<StatementResponse | undefined>;
  getMessageQueryResult(
    spaceId: string,
    conversationId: string,
    messageId: string,
  ): Promise<StatementResponse | undefined>;
  listConversations(spaceId: string, pageSize: number, pageToken?: string): Promise<GenieConversationList>;
  getConversation(spaceId: string, conversationId: string): Promise<GenieConversation>;
  listMessages(spaceId: string, conversationId: string): Promise<GenieMessage[]>;
}

export function restMessageApi(client: DatabricksClient): GenieMessageApi {
  return {
    startConversation: (s, content) => startConversation(client, s, content),
    createMessage: (s, c, content) => createMessage(client, s, c, content),
    getMessage: (s, c, m) => getMessage(client, s, c, m),
    getAttachmentQueryResult: (s, c, m, a) => getAttachmentQueryResult(client, s, c, m, a),
    getMessageQueryResult: (s, c, m) => getMessageQueryResult(client, s, c, m),
    listConversations: (s, size, token) => listConversations(client, s, size, token),
    getConversation: (s, c) => getConversation(client, s, c),
    listMessages: (s, c) => listConversationMessages(client, s, c),
  };
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export const TERMINAL_STATUSES = new Set(["COMPLETED", "FAILED", "CANCELLED", "CANCELLED_BY_USER"]);

export interface QueryResult {
  schema: Array<{ name: string; type: string }>;
  rows: unknown[][];
  row_count: number;
}

export interface MessageResult {
  conversation_id: string;
  message_id: string;
  status: string;
  response_text: string;
  sql_query?: string;
  attachment_id?: string;
  query_result?: QueryResult;
  error?: string;
}

export interface QueryAttachment {
  attachmentId?: string;
  sql: string;
  description?: string;
}

/** First query attachment of a message, if it has one. */
export function extractQueryAttachment(message: GenieMessage): QueryAttachment | undefined {
  const found = message.attachments.find(
    (a): a is GenieAttachment & { query: { query: string } } => typeof a.query?.query === "string",
  );
  if (!found) return undefined;
  return {
    attachmentId: found.attachment_id,
    sql: found.query.query,
    description: found.query.description,
  };
}

function responseText(message: GenieMessage): string {
  const text = message.attachments.find((a) => a.text?.content)?.text?.content;
  return text ?? extractQueryAttachment(message)?.description ?? message.content ?? "";
}

export function shapeQueryResult(statement: StatementResponse | undefined): QueryResult {
  const columns = statement?.manifest?.schema?.columns ?? [];
  const rows = statement?.result?.data_array ?? [];
  return {
    schema: columns.map((c) => ({ name: c.name, type: c.type_text ?? c.type_name ?? "UNKNOWN" })),
    rows,
    row_count: rows.length,
  };
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export interface AskOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export interface ConversationOrchestratorDeps {
  api: GenieMessageApi;
  rateLimiter: RateLimiter;
  cache: ConversationCache;
  defaults: { timeoutMs: number; pollIntervalMs: number };
  clock?: Clock;
}

export class ConversationOrchestrator {
  private readonly api: GenieMessageApi;
  private readonly rateLimiter: RateLimiter;
  readonly cache: ConversationCache;
  private readonly defaults: { timeoutMs: number; pollIntervalMs: number };
  private readonly clock?: Clock;

  constructor(deps: ConversationOrchestratorDeps) {
    this.api = deps.api;
    this.rateLimiter = deps.rateLimiter;
    this.cache = deps.cache;
    this.defaults = deps.defaults;
    this.clock = deps.clock;
  }

  /**
   * Ask a question in a new conversation. With `followUp`, a live cached
   * conversation for the space is continued instead.
   */
  async askQuestion(
    spaceId: string,
    question: string,
    options: AskOptions & { followUp?: boolean } = {},
  ): Promise<MessageResult> {
    const cached = options.followUp ? this.cache.get(spaceId) : undefined;
    if (cached) {
      logger.debug("Continuing cached conversation", { spaceId, conversationId: cached.conversationId });
      return this.continueConversation(spaceId, cached.conversationId, question, options);
    }

    return this.run(spaceId, () => this.api.startConversation(spaceId, question), options);
  }

  /** Post a follow-up. The previous message must already be terminal. */
  async continueConversation(
    spaceId: string,
    conversationId: string,
    question: string,
    options: AskOptions = {},
  ): Promise<MessageResult> {
    return this.run(
      spaceId,
      async () => {
        const { messageId } = await this.api.createMessage(spaceId, conversationId, question);
        return { conversationId, messageId };
      },
      options,
    );
  }

  private async run(
    spaceId: string,
    submit: () => Promise<{ conversationId: string; messageId: string }>,
    options: AskOptions,
  ): Promise<MessageResult> {
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    const intervalMs = options.pollIntervalMs ?? this.defaults.pollIntervalMs;

    await this.rateLimiter.acquire();
    const { conversationId, messageId } = await submit();
    logger.info("Genie question submitted", { spaceId, conversationId, messageId });

    let message: GenieMessage;
    try {
      message = await pollUntilComplete<GenieMessage>(
        async () => {
          const m = await this.api.getMessage(spaceId, conversationId, messageId);
          return TERMINAL_STATUSES.has(m.status) ? { done: true, value: m } : { done: false };
        },
        { timeoutMs, intervalMs, clock: this.clock },
      );
    } catch (err) {
      if (err instanceof GenieTimeoutError) {
        throw new GenieTimeoutError(
          `Timed out after ${timeoutMs / 1000} seconds waiting for message ${messageId} ` +
            `in conversation ${conversationId}. The question may still complete; ` +
            `retry with a larger timeout_seconds.`,
          timeoutMs,
        );
      }
      throw err;
    }

    const result: MessageResult = {
      conversation_id: conversationId,
      message_id: messageId,
      status: message.status,
      response_text: responseText(message),
    };

    if (message.status !== "COMPLETED") {
      const error = message.error?.error ?? message.error?.type;
      if (error) result.error = error;
      logger.warn("Genie message did not complete", { spaceId, messageId, status: message.status });
      return result;
    }

    this.cache.record(spaceId, conversationId, messageId);

    const attachment = extractQueryAttachment(message);
    if (attachment) {
      result.sql_query = attachment.sql;
      if (attachment.attachmentId) {
        result.attachment_id = attachment.attachmentId;
        const statement = await this.tryFetchResult(spaceId, conversationId, messageId, attachment.attachmentId);
        if (statement) result.query_result = shapeQueryResult(statement);
      }
    }

    return result;
  }

  /** A result that cannot be fetched is logged and left out. */
  private async tryFetchResult(
    spaceId: string,
    conversationId: string,
    messageId: string,
    attachmentId: string,
  ): Promise<StatementResponse | undefined> {
    try {
      return await this.api.getAttachmentQueryResult(spaceId, conversationId, messageId, attachmentId);
    } catch (err) {
      logger.warn("Query result unavailable", { spaceId, messageId, attachmentId, error: errorMessage(err) });
      return undefined;
    }
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /**
   * Result set of a message. Without an attachment id the message's first
   * query attachment is used, then the message-level endpoint.
   */
  async getQueryResults(
    spaceId: string,
    conversationId: string,
    messageId: string,
    attachmentId?: string,
  ): Promise<QueryResult> {
    let id = attachmentId;
    if (!id) {
      const message = await this.api.getMessage(spaceId, conversationId, messageId);
      id = extractQueryAttachment(message)?.attachmentId;
    }
    const statement = id
      ? await this.api.getAttachmentQueryResult(spaceId, conversationId, messageId, id)
      : await this.api.getMessageQueryResult(spaceId, conversationId, messageId);
    return shapeQueryResult(statement);
  }

  async listConversations(spaceId: string, pageSize = 50, pageToken?: string) {
    const page = await this.api.listConversations(spaceId, pageSize, pageToken);
    return {
      conversations: page.conversations.map((c) => ({
        conversation_id: c.conversation_id ?? c.id ?? "",
        title: c.title,
        created_at: formatTimestamp(c.created_timestamp),
        updated_at: formatTimestamp(c.last_updated_timestamp),
      })),
      ...(page.next_page_token ? { next_page_token: page.next_page_token } : {}),
    };
  }

  async getConversationHistory(spaceId: string, conversationId: string) {
    const [conversation, messages] = await Promise.all([
      this.api.getConversation(spaceId, conversationId),
      this.api.listMessages(spaceId, conversationId),
    ]);
    return {
      conversation_id: conversationId,
      space_id: spaceId,
      title: conversation.title,
      messages: messages.map((m) => ({
        message_id: m.message_id ?? m.id ?? "",
        content: m.content ?? "",
        status: m.status,
        created_at: formatTimestamp(m.created_timestamp),
        sql_query: extractQueryAttachment(m)?.sql,
      })),
    };
  }
}
