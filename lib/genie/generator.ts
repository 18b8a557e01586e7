/**
 * Model-backed Genie space configuration generator.
 *
 * Prompts a serving endpoint with the best practices and the output
 * contract, extracts JSON from the reply, schema-checks the configuration
 * and runs the validator over it. Each failed attempt is retried with the
 * temperature raised by 0.1 (capped at 1.0).
 */

import { z } from "zod/v4";
import type { DatabricksClient } from "@/lib/dbx/client";
import { chatCompletion } from "@/lib/dbx/model-serving";
import { GenerationError } from "@/lib/errors";
import { errorMessage, logger } from "@/lib/logger";
import { parseLLMJson } from "./parse-llm-json";
import { buildConfigGenerationPrompt } from "./prompts";
import { parseSpaceConfig, type GenieSpaceConfig } from "./space-config";
import { validateSpaceConfig, type ValidationReport } from "./validator";

export interface GenerateConfigOptions {
  requirements: string;
  catalogName: string;
  warehouseId: string;
  endpoint: string;
  tableMetadata?: string;
  /** Attempts in total (default 3). */
  maxAttempts?: number;
  temperature?: number;
  validateSql?: boolean;
}

export interface GeneratedConfig {
  genie_space_config: GenieSpaceConfig;
  reasoning: string;
  confidence_score: number;
  validation_report: ValidationReport;
}

const ReplySchema = z.object({
  genie_space_config: z.record(z.string(), z.unknown()),
  reasoning: z.string().default(""),
  confidence_score: z.number().min(0).max(1).default(0.5),
});

const MAX_TOKENS = 4000;

/** Parse one model reply into a generated configuration. Throws on any defect. */
export function parseGenerationReply(content: string, warehouseId: string): Omit<GeneratedConfig, "validation_report"> {
  const reply = ReplySchema.safeParse(parseLLMJson(content));
  if (!reply.success) {
    throw new Error(`Reply does not match the output format: ${reply.error.issues[0]?.message ?? "unknown"}`);
  }

  const raw = reply.data.genie_space_config;
  if (typeof raw.warehouse_id !== "string" || !raw.warehouse_id) {
    raw.warehouse_id = warehouseId;
  }

  const parsed = parseSpaceConfig(raw);
  if (!parsed.success) {
    throw new Error(`Generated configuration failed schema validation: ${parsed.issues.join("; ")}`);
  }

  return {
    genie_space_config: parsed.config,
    reasoning: reply.data.reasoning,
    confidence_score: reply.data.confidence_score,
  };
}

export async function generateSpaceConfig(
  client: DatabricksClient,
  options: GenerateConfigOptions,
): Promise<GeneratedConfig> {
  const prompt = buildConfigGenerationPrompt({
    requirements: options.requirements,
    catalogName: options.catalogName,
    warehouseId: options.warehouseId,
    tableMetadata: options.tableMetadata,
  });
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  let temperature = options.temperature ?? 0.7;
  let lastError = "";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const completion = await chatCompletion(client, {
        endpoint: options.endpoint,
        messages: [{ role: "user", content: prompt }],
        temperature,
        maxTokens: MAX_TOKENS,
      });
      const generated = parseGenerationReply(completion.content, options.warehouseId);
      const validation_report = validateSpaceConfig(generated.genie_space_config, {
        validateSql: options.validateSql ?? true,
        catalogName: options.catalogName,
      });
      logger.info("Generated Genie space config", {
        attempt,
        score: validation_report.score,
        tables: generated.genie_space_config.tables.length,
      });
      return { ...generated, validation_report };
    } catch (err) {
      lastError = errorMessage(err);
      logger.warn("Config generation attempt failed", { attempt, temperature, error: lastError });
      temperature = Math.min(1, Math.round((temperature + 0.1) * 10) / 10);
    }
  }

  throw new GenerationError(`Failed to generate config after ${maxAttempts} attempts: ${lastError}`);
}
