import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DatabricksClient } from "@/lib/dbx/client";
import { chatCompletion, ModelServingError } from "@/lib/dbx/model-serving";

const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();
const client = new DatabricksClient({
  host: "https://example.cloud.databricks.com",
  auth: { kind: "pat", token: "test-token" },
});

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("chatCompletion", () => {
  it("returns the reply text and usage", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          model: "test-model",
          choices: [{ message: { content: "hello" }, finish_reason: "stop" }],
          usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 },
        }),
        { status: 200 },
      ),
    );

    const out = await chatCompletion(client, {
      endpoint: "test-endpoint",
      messages: [{ role: "user", content: "hi" }],
      maxTokens: 100,
    });

    expect(out).toEqual({
      content: "hello",
      usage: { promptTokens: 3, completionTokens: 1, totalTokens: 4 },
      model: "test-model",
      finishReason: "stop",
    });
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.3,
      max_tokens: 100,
    });
  });

  it("joins content parts", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({ choices: [{ message: { content: [{ type: "text", text: "a" }, { type: "text", text: "b" }] } }] }),
        { status: 200 },
      ),
    );
    const out = await chatCompletion(client, { endpoint: "e", messages: [] });
    expect(out.content).toBe("ab");
    expect(out.usage).toBeNull();
    expect(out.finishReason).toBeNull();
  });

  it("wraps HTTP failures with their status", async () => {
    fetchMock.mockResolvedValueOnce(new Response("endpoint is scaling", { status: 400 }));
    const run = chatCompletion(client, { endpoint: "e", messages: [] });
    await expect(run).rejects.toBeInstanceOf(ModelServingError);
    await expect(run).rejects.toMatchObject({ statusCode: 400 });
  });

  it("rejects a response without choices", async () => {
    fetchMock.mockResolvedValueOnce(new Response("{}", { status: 200 }));
    await expect(chatCompletion(client, { endpoint: "e", messages: [] })).rejects.toThrow(
      "Model Serving response has no choices",
    );
  });
});
