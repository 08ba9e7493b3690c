/**
 * Minimal Logger
 *
 * JSON lines with secret redaction.
 */

import { cfg } from "./env.js";

const SECRETS_TO_REDACT = [
  cfg.redisUrl,
  cfg.metricsApiKey,
];

/**
 * Redact secrets from string
 */
function redact(str: string): string {
  let redacted = str;
  for (const secret of SECRETS_TO_REDACT) {
    if (secret && secret.length > 4) {
      redacted = redacted.replaceAll(secret, "***REDACTED***");
    }
  }
  return redacted;
}

/**
 * Meta objects may carry bigint amounts
 */
function serializeMeta(meta: Record<string, unknown>): unknown {
  const raw = JSON.stringify(meta, (_key, value) =>
    typeof value === "bigint" ? value.toString() : value
  );
  return JSON.parse(redact(raw));
}

function emit(level: "info" | "warn", message: string, meta?: Record<string, unknown>): void {
  const log = {
    level,
    message: redact(message),
    meta: meta ? serializeMeta(meta) : undefined,
    timestamp: new Date().toISOString(),
  };
  if (level === "warn") {
    console.warn(JSON.stringify(log));
  } else {
    console.log(JSON.stringify(log));
  }
}

/**
 * Log info message
 */
export function info(message: string, meta?: Record<string, unknown>): void {
  emit("info", message, meta);
}

export function warn(message: string, meta?: Record<string, unknown>): void {
  emit("warn", message, meta);
}

/**
 * Log error message
 */
export function errorLog(message: string, error?: unknown): void {
  const log = {
    level: "error",
    message: redact(message),
    error: error instanceof Error ? {
      name: error.name,
      message: redact(error.message),
      stack: redact(error.stack || ""),
    } : error !== null && typeof error === "object"
      ? serializeMeta({ ...error })
      : redact(String(error)),
    timestamp: new Date().toISOString(),
  };
  console.error(JSON.stringify(log));
}

/**
 * Log HTTP request
 */
export function logRequest(
  method: string,
  path: string,
  status: number,
  durationMs: number
): void {
  info(`${method} ${path}`, { status, durationMs });
}
