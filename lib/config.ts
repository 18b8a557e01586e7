/**
 * Server configuration.
 *
 * Read once from environment variables at start-up and passed explicitly to
 * everything that needs it. Supports two authentication modes:
 *   1. **Personal access token**: DATABRICKS_TOKEN.
 *   2. **OAuth M2M (service principal)**: DATABRICKS_CLIENT_ID and
 *      DATABRICKS_CLIENT_SECRET, exchanged for a bearer token on demand.
 */

import { z } from "zod/v4";

export type DatabricksAuth =
  | { kind: "pat"; token: string }
  | { kind: "oauth-m2m"; clientId: string; clientSecret: string };

export interface ServerConfig {
  /** Always includes the scheme, never a trailing slash. */
  host: string;
  auth: DatabricksAuth;
  defaultWarehouseId?: string;
  timeoutSeconds: number;
  pollIntervalSeconds: number;
  maxRetries: number;
  servingEndpointName: string;
  rateLimit: { maxRequests: number; windowSeconds: number };
  conversationTtlMinutes: number;
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  DATABRICKS_HOST: z.string().trim().min(1, "DATABRICKS_HOST is not set"),
  DATABRICKS_TOKEN: optionalText,
  DATABRICKS_CLIENT_ID: optionalText,
  DATABRICKS_CLIENT_SECRET: optionalText,
  DATABRICKS_WAREHOUSE_ID: optionalText,
  DATABRICKS_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  DATABRICKS_POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(2),
  DATABRICKS_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  DATABRICKS_SERVING_ENDPOINT_NAME: z.string().trim().min(1).default("databricks-dbrx-instruct"),
  GENIE_RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(5),
  GENIE_RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().positive().default(60),
  GENIE_CONVERSATION_TTL_MINUTES: z.coerce.number().positive().default(30),
});

export function normaliseHost(raw: string): string {
  let h = raw.replace(/\/+$/, "");
  if (!h.startsWith("https://") && !h.startsWith("http://")) {
    h = `https://${h}`;
  }
  return h;
}

/**
 * Parse the server configuration from an environment map.
 * Throws with every problem listed when required variables are missing.
 */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`,
    );
    throw new Error(`Invalid server configuration:\n  - ${problems.join("\n  - ")}`);
  }
  const e = parsed.data;

  let auth: DatabricksAuth;
  if (e.DATABRICKS_TOKEN) {
    auth = { kind: "pat", token: e.DATABRICKS_TOKEN };
  } else if (e.DATABRICKS_CLIENT_ID && e.DATABRICKS_CLIENT_SECRET) {
    auth = {
      kind: "oauth-m2m",
      clientId: e.DATABRICKS_CLIENT_ID,
      clientSecret: e.DATABRICKS_CLIENT_SECRET,
    };
  } else {
    throw new Error(
      "No authentication credentials found. " +
        "Set DATABRICKS_TOKEN, or DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET.",
    );
  }

  return {
    host: normaliseHost(e.DATABRICKS_HOST),
    auth,
    defaultWarehouseId: e.DATABRICKS_WAREHOUSE_ID,
    timeoutSeconds: e.DATABRICKS_TIMEOUT_SECONDS,
    pollIntervalSeconds: e.DATABRICKS_POLL_INTERVAL_SECONDS,
    maxRetries: e.DATABRICKS_MAX_RETRIES,
    servingEndpointName: e.DATABRICKS_SERVING_ENDPOINT_NAME,
    rateLimit: {
      maxRequests: e.GENIE_RATE_LIMIT_MAX_REQUESTS,
      windowSeconds: e.GENIE_RATE_LIMIT_WINDOW_SECONDS,
    },
    conversationTtlMinutes: e.GENIE_CONVERSATION_TTL_MINUTES,
  };
}
