/**
 * Databricks Model Serving client (chat completions).
 *
 * Endpoint: POST {host}/serving-endpoints/{endpoint}/invocations
 * OpenAI-compatible chat completions format. Non-streaming only: the
 * generator needs the full reply before it can parse it.
 *
 * Docs: https://docs.databricks.com/en/machine-learning/model-serving/score-foundation-models.html
 */

import { z } from "zod/v4";
import { DatabricksApiError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { DatabricksClient } from "./client";
import { TIMEOUTS } from "./fetch-with-timeout";

export type ChatRole = "system" | "user" | "assistant";

export interface CompletionRequest {
  endpoint: string;
  messages: Array<{ role: ChatRole; content: string }>;
  /** Defaults to 0.3. */
  temperature?: number;
  /** Left to the endpoint when omitted. */
  maxTokens?: number;
}

export interface Completion {
  content: string;
  usage: { promptTokens: number; completionTokens: number; totalTokens: number } | null;
  model: string;
  finishReason: string | null;
}

/** Failed invocation; `statusCode` is 0 when the endpoint answered but the reply was unusable. */
export class ModelServingError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = "ModelServingError";
  }
}

// Content may arrive as a string or as a list of typed parts
const ContentSchema = z.union([
  z.string(),
  z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
]);

const CompletionSchema = z.object({
  model: z.string().default(""),
  choices: z
    .array(
      z.object({
        message: z.object({ content: ContentSchema.nullish() }).optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
      total_tokens: z.number().default(0),
    })
    .nullish(),
});

export async function chatCompletion(client: DatabricksClient, request: CompletionRequest): Promise<Completion> {
  const body = {
    messages: request.messages,
    temperature: request.temperature ?? 0.3,
    ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
  };

  let data: z.output<typeof CompletionSchema>;
  try {
    data = await client.request(CompletionSchema, {
      operation: "Model Serving request",
      method: "POST",
      path: `/serving-endpoints/${encodeURIComponent(request.endpoint)}/invocations`,
      body,
      timeoutMs: TIMEOUTS.MODEL_SERVING,
    });
  } catch (err) {
    if (err instanceof DatabricksApiError) {
      throw new ModelServingError(err.message, err.statusCode);
    }
    throw err;
  }

  const choice = data.choices[0];
  if (!choice?.message) {
    throw new ModelServingError("Model Serving response has no choices", 0);
  }

  const raw = choice.message.content ?? "";
  const content = typeof raw === "string" ? raw : raw.map((part) => part.text ?? "").join("");

  const usage: Completion["usage"] = data.usage
    ? {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
      }
    : null;

  logger.debug("Model Serving completion", {
    endpoint: request.endpoint,
    model: data.model,
    totalTokens: usage?.totalTokens,
  });

  return { content, usage, model: data.model, finishReason: choice.finish_reason ?? null };
}
