import type { ServerConfig } from "@/lib/config";
import { DatabricksClient } from "@/lib/dbx/client";
import { systemClock, type Clock } from "@/lib/genie/clock";
import { ConversationCache } from "@/lib/genie/conversation-cache";
import { ConversationOrchestrator, restMessageApi, type GenieMessageApi } from "@/lib/genie/conversation";
import { RateLimiter } from "@/lib/genie/rate-limiter";

/**
 * Everything a tool call needs, built once at start-up and handed to the
 * tool handlers.
 */
export interface GenieContext {
  config: ServerConfig;
  client: DatabricksClient;
  conversations: ConversationOrchestrator;
  clock: Clock;
}

export interface GenieContextOverrides {
  client?: DatabricksClient;
  api?: GenieMessageApi;
  clock?: Clock;
}

export function createGenieContext(config: ServerConfig, overrides: GenieContextOverrides = {}): GenieContext {
  const client = overrides.client ?? DatabricksClient.fromConfig(config);
  const clock = overrides.clock ?? systemClock;

  const conversations = new ConversationOrchestrator({
    api: overrides.api ?? restMessageApi(client),
    rateLimiter: new RateLimiter({
      maxRequests: config.rateLimit.maxRequests,
      windowMs: config.rateLimit.windowSeconds * 1000,
      clock,
    }),
    cache: new ConversationCache({ ttlMs: config.conversationTtlMinutes * 60_000, clock }),
    defaults: {
      timeoutMs: config.timeoutSeconds * 1000,
      pollIntervalMs: config.pollIntervalSeconds * 1000,
    },
    clock,
  });

  return { config, client, conversations, clock };
}
