import { describe, it, expect } from "vitest";
import { ConversationCache, isExpired } from "@/lib/genie/conversation-cache";
import type { Clock } from "@/lib/genie/clock";

function manualClock(): Clock & { advance(ms: number): void } {
  let t = 1_000;
  return {
    now: () => t,
    sleep: async (ms) => {
      t += ms;
    },
    advance: (ms) => {
      t += ms;
    },
  };
}

describe("isExpired", () => {
  const ctx = { spaceId: "s", conversationId: "c", lastMessageId: "m", startedAt: 0, lastActivity: 0 };

  it("expires strictly after the TTL", () => {
    expect(isExpired(ctx, 1_000, 1_000)).toBe(false);
    expect(isExpired(ctx, 1_001, 1_000)).toBe(true);
  });
});

describe("ConversationCache", () => {
  it("returns a live conversation for its space", () => {
    const clock = manualClock();
    const cache = new ConversationCache({ ttlMs: 60_000, clock });
    cache.record("space-1", "conv-1", "msg-1");

    expect(cache.get("space-1")).toEqual({
      spaceId: "space-1",
      conversationId: "conv-1",
      lastMessageId: "msg-1",
      startedAt: 1_000,
      lastActivity: 1_000,
    });
    expect(cache.get("space-2")).toBeUndefined();
  });

  it("drops entries lazily once they expire", () => {
    const clock = manualClock();
    const cache = new ConversationCache({ ttlMs: 60_000, clock });
    cache.record("space-1", "conv-1", "msg-1");

    clock.advance(60_001);
    expect(cache.get("space-1")).toBeUndefined();
    expect(cache.lastActiveSpace()).toBeUndefined();
  });

  it("keeps the start time while the conversation continues", () => {
    const clock = manualClock();
    const cache = new ConversationCache({ ttlMs: 60_000, clock });
    cache.record("space-1", "conv-1", "msg-1");
    clock.advance(30_000);
    const ctx = cache.record("space-1", "conv-1", "msg-2");

    expect(ctx.startedAt).toBe(1_000);
    expect(ctx.lastActivity).toBe(31_000);
    expect(ctx.lastMessageId).toBe("msg-2");
  });

  it("replaces the entry when a new conversation starts", () => {
    const clock = manualClock();
    const cache = new ConversationCache({ ttlMs: 60_000, clock });
    cache.record("space-1", "conv-1", "msg-1");
    clock.advance(5_000);
    const ctx = cache.record("space-1", "conv-2", "msg-9");

    expect(ctx.conversationId).toBe("conv-2");
    expect(ctx.startedAt).toBe(6_000);
  });

  it("tracks the most recently active space", () => {
    const cache = new ConversationCache({ clock: manualClock() });
    cache.record("space-1", "conv-1", "msg-1");
    cache.record("space-2", "conv-2", "msg-2");
    expect(cache.lastActiveSpace()).toBe("space-2");

    cache.record("space-1", "conv-1", "msg-3");
    expect(cache.lastActiveSpace()).toBe("space-1");
  });
});
