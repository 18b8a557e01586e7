/**
 * Error taxonomy for Genie operations.
 *
 * Remote failures are translated into one of these classes so that tool
 * handlers can report a categorised message. Anything that
 * matches no known signal becomes a generic `GenieApiError` rather than
 * being dropped.
 */

export type GenieErrorCode =
  | "AUTHENTICATION"
  | "SPACE_NOT_FOUND"
  | "RATE_LIMIT"
  | "VALIDATION"
  | "GENERATION"
  | "TIMEOUT"
  | "API";

export class GenieError extends Error {
  readonly code: GenieErrorCode;

  constructor(message: string, code: GenieErrorCode = "API") {
    super(message);
    this.name = "GenieError";
    this.code = code;
  }
}

export class AuthenticationError extends GenieError {
  constructor(message: string) {
    super(message, "AUTHENTICATION");
    this.name = "AuthenticationError";
  }
}

export class SpaceNotFoundError extends GenieError {
  constructor(message: string) {
    super(message, "SPACE_NOT_FOUND");
    this.name = "SpaceNotFoundError";
  }
}

/** Remote-side 429. The local rate limiter makes these rare but cannot rule them out. */
export class RateLimitError extends GenieError {
  constructor(message: string) {
    super(message, "RATE_LIMIT");
    this.name = "RateLimitError";
  }
}

export class ConfigValidationError extends GenieError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "VALIDATION");
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

/** The text-completion endpoint failed or returned output that could not be parsed. */
export class GenerationError extends GenieError {
  constructor(message: string) {
    super(message, "GENERATION");
    this.name = "GenerationError";
  }
}

/**
 * A local deadline expired while waiting on the remote platform.
 * Distinct from a message the remote engine reported as FAILED.
 */
export class GenieTimeoutError extends GenieError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, "TIMEOUT");
    this.name = "GenieTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class GenieApiError extends GenieError {
  constructor(message: string) {
    super(message, "API");
    this.name = "GenieApiError";
  }
}

/** Non-2xx response from a Databricks REST endpoint. */
export class DatabricksApiError extends Error {
  readonly statusCode: number;
  readonly body: string;

  constructor(operation: string, statusCode: number, body: string) {
    super(`${operation} failed (${statusCode}): ${body}`);
    this.name = "DatabricksApiError";
    this.statusCode = statusCode;
    this.body = body;
  }
}

// ---------------------------------------------------------------------------
// Translation
// ---------------------------------------------------------------------------

const CREDENTIAL_HINT =
  "Check DATABRICKS_TOKEN, or DATABRICKS_CLIENT_ID / DATABRICKS_CLIENT_SECRET, " +
  "and that DATABRICKS_HOST points at the right workspace.";

const RATE_LIMIT_HINT = "The Genie API allows 5 questions per minute per workspace.";

/**
 * Translate a Databricks transport error into the Genie taxonomy.
 *
 * HTTP status wins when present; otherwise the message text is matched
 * against known signals. Errors that are already `GenieError`s pass through.
 */
export function translateDatabricksError(error: unknown): GenieError {
  if (error instanceof GenieError) return error;

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof DatabricksApiError) {
    if (error.statusCode === 401 || error.statusCode === 403) {
      return new AuthenticationError(`Authentication failed: ${message}. ${CREDENTIAL_HINT}`);
    }
    if (error.statusCode === 404) {
      return new SpaceNotFoundError(`Resource not found: ${message}`);
    }
    if (error.statusCode === 429) {
      return new RateLimitError(`Rate limit exceeded: ${message}. ${RATE_LIMIT_HINT}`);
    }
  }

  const lower = message.toLowerCase();

  if (lower.includes("authentication") || lower.includes("unauthorized") || lower.includes("401")) {
    return new AuthenticationError(`Authentication failed: ${message}. ${CREDENTIAL_HINT}`);
  }
  if (
    lower.includes("not found") ||
    lower.includes("does_not_exist") ||
    lower.includes("does not exist") ||
    lower.includes("404")
  ) {
    return new SpaceNotFoundError(`Resource not found: ${message}`);
  }
  if (lower.includes("rate limit") || lower.includes("429")) {
    return new RateLimitError(`Rate limit exceeded: ${message}. ${RATE_LIMIT_HINT}`);
  }
  if (lower.includes("timeout") || lower.includes("timed out")) {
    return new GenieTimeoutError(`Operation timed out: ${message}`, 0);
  }

  return new GenieApiError(`Databricks API error: ${message}`);
}

/** JSON payload returned by tool handlers in place of a thrown error. */
export interface ErrorPayload {
  error: {
    type: string;
    code: GenieErrorCode;
    message: string;
    issues?: string[];
  };
}

export function toErrorPayload(error: unknown): ErrorPayload {
  const translated = translateDatabricksError(error);
  return {
    error: {
      type: translated.name,
      code: translated.code,
      message: translated.message,
      ...(translated instanceof ConfigValidationError && translated.issues.length > 0
        ? { issues: translated.issues }
        : {}),
    },
  };
}
