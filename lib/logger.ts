/**
 * Structured logging to stderr.
 *
 * stdout carries the MCP stdio transport, so nothing else may write there.
 * `LOG_FORMAT=json` (the default when NODE_ENV is production) emits one JSON
 * object per line; otherwise lines are formatted for a terminal. Every entry
 * carries the server version as `v`.
 *
 *   logger.info("Space created", { spaceId, tables: 3 });
 *   logger.warn("Query result unavailable", { messageId, error: errorMessage(err) });
 */

import packageJson from "@/package.json";

type LogLevel = "debug" | "info" | "warn" | "error";
type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

const production = process.env.NODE_ENV === "production";
const json = (process.env.LOG_FORMAT ?? (production ? "json" : "pretty")) === "json";

const requested = process.env.LOG_LEVEL?.toLowerCase();
const threshold = LEVELS[isLogLevel(requested) ? requested : production ? "info" : "debug"];

function pretty(level: LogLevel, message: string, timestamp: string, meta: LogMeta): string {
  const clock = timestamp.slice(11, 23);
  const tail = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${clock} ${level.toUpperCase().padEnd(5)} [v${packageJson.version}] ${message}${tail}`;
}

function emit(level: LogLevel, message: string, meta: LogMeta = {}): void {
  if (LEVELS[level] < threshold) return;
  const timestamp = new Date().toISOString();
  const line = json
    ? JSON.stringify({ level, message, timestamp, v: packageJson.version, ...meta })
    : pretty(level, message, timestamp, meta);
  process.stderr.write(`${line}\n`);
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => emit("debug", message, meta),
  info: (message: string, meta?: LogMeta) => emit("info", message, meta),
  warn: (message: string, meta?: LogMeta) => emit("warn", message, meta),
  error: (message: string, meta?: LogMeta) => emit("error", message, meta),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
