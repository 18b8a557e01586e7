/**
 * Most recent conversation per space.
 *
 * Entries expire lazily: an entry whose last activity is older than the TTL
 * is dropped when it is next read. There is no background sweep.
 */

import { systemClock, type Clock } from "./clock";

export interface ConversationContext {
  spaceId: string;
  conversationId: string;
  lastMessageId: string;
  startedAt: number; // epoch ms
  lastActivity: number; // epoch ms
}

export function isExpired(ctx: ConversationContext, now: number, ttlMs: number): boolean {
  return now - ctx.lastActivity > ttlMs;
}

export class ConversationCache {
  private readonly entries = new Map<string, ConversationContext>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private lastSpaceId: string | undefined;

  constructor(options: { ttlMs?: number; clock?: Clock } = {}) {
    this.ttlMs = options.ttlMs ?? 30 * 60_000;
    this.clock = options.clock ?? systemClock;
  }

  get(spaceId: string): ConversationContext | undefined {
    const ctx = this.entries.get(spaceId);
    if (!ctx) return undefined;
    if (isExpired(ctx, this.clock.now(), this.ttlMs)) {
      this.entries.delete(spaceId);
      return undefined;
    }
    return ctx;
  }

  /** Record activity; a new conversation id for the space replaces the entry. */
  record(spaceId: string, conversationId: string, messageId: string): ConversationContext {
    const now = this.clock.now();
    const prev = this.get(spaceId);
    const ctx: ConversationContext = {
      spaceId,
      conversationId,
      lastMessageId: messageId,
      startedAt: prev && prev.conversationId === conversationId ? prev.startedAt : now,
      lastActivity: now,
    };
    this.entries.set(spaceId, ctx);
    this.lastSpaceId = spaceId;
    return ctx;
  }

  /** Space of the most recent live conversation, if any. */
  lastActiveSpace(): string | undefined {
    if (this.lastSpaceId === undefined) return undefined;
    return this.get(this.lastSpaceId) ? this.lastSpaceId : undefined;
  }
}
