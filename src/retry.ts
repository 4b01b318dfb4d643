/**
 * Azure DevOps Access — Retry Utilities
 *
 * Transport-level retry with exponential backoff and jitter. Only the REST
 * client uses this; resolution and encoding never retry.
 */

import type { DevOpsRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<DevOpsRetryOptions>;

export const DEVOPS_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Error codes that are safe to retry.
 */
export const DEVOPS_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "RequestTimeout",
  "ServiceUnavailable",
  "TooManyRequests",
  "GatewayTimeout",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "network error",
  "fetch failed",
];

// =============================================================================
// Error Inspection
// =============================================================================

function readField(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  return Reflect.get(error, key);
}

function readString(error: unknown, ...keys: string[]): string {
  for (const key of keys) {
    const value = readField(error, key);
    if (typeof value === "string" && value) return value;
  }
  return "";
}

/**
 * HTTP status carried by an error (`statusCode` or `status`), if any.
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  for (const key of ["statusCode", "status"]) {
    const value = readField(error, key);
    if (typeof value === "number") return value;
  }
  return undefined;
}

/**
 * Determine whether a transport error is safe to retry.
 */
export function shouldRetryDevOpsError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  const code = readString(error, "code", "Code");
  if (code && DEVOPS_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const statusCode = getErrorStatusCode(error) ?? 0;
  if (statusCode === 429) return true;
  if (statusCode >= 500 && statusCode < 600) return true;

  const message = readString(error, "message").toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Extract the Retry-After value (in ms) from an error's `retryAfter` field.
 */
export function getRetryAfterMs(error: unknown): number | null {
  const retryAfter = readString(error, "retryAfter");
  if (!retryAfter) return null;

  // Could be seconds (integer) or HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

/**
 * Execute a function with transport retry logic.
 */
export async function withDevOpsRetry<T>(
  fn: () => Promise<T>,
  options?: DevOpsRetryOptions,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? DEVOPS_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? DEVOPS_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? DEVOPS_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? DEVOPS_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryDevOpsError(error)) break;

      const retryAfterMs = getRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = Math.min(retryAfterMs, config.maxDelayMs);
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = readString(error, "code");
  const message = readString(error, "message") || "Unknown error";
  const statusCode = getErrorStatusCode(error);

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return parts.join(" ");
}
