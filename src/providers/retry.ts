/**
 * Provider retry utilities: exponential backoff with jitter, shared by
 * the AWS, Azure and GCP probes.
 */

export type RetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
};

type RetryConfig = Required<Omit<RetryOptions, "sleep">>;

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Error codes across the three SDKs that are safe to retry.
 */
export const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  // AWS
  "Throttling",
  "ThrottlingException",
  "RequestLimitExceeded",
  "TooManyRequestsException",
  "ServiceUnavailable",
  "InternalError",
  "RequestTimeout",
  // Azure
  "TooManyRequests",
  "ServerBusy",
  "OperationTimedOut",
  "GatewayTimeout",
  // GCP
  "UNAVAILABLE",
  "DEADLINE_EXCEEDED",
  "RESOURCE_EXHAUSTED",
  "rateLimitExceeded",
  "backendError",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "rate exceeded",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "network error",
  "fetch failed",
];

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

function readStatus(error: object): number | undefined {
  const direct = readField(error, "statusCode") ?? readField(error, "status");
  if (typeof direct === "number") return direct;

  const metadata = readField(error, "$metadata");
  if (typeof metadata === "object" && metadata !== null) {
    const httpStatus = readField(metadata, "httpStatusCode");
    if (typeof httpStatus === "number") return httpStatus;
  }
  return undefined;
}

// =============================================================================
// Error Checking
// =============================================================================

export function shouldRetryError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;

  for (const key of ["code", "name", "Code"]) {
    const value = readField(error, key);
    if (typeof value === "string" && RETRYABLE_CODES.has(value)) return true;
  }

  const status = readStatus(error);
  if (status === 429) return true;
  if (status !== undefined && status >= 500 && status < 600) return true;

  const message = readField(error, "message");
  if (typeof message === "string") {
    const lower = message.toLowerCase();
    if (RETRYABLE_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern))) return true;
  }

  return false;
}

/** Retry-After header value in ms, if the error carries one. */
export function getRetryAfterMs(error: unknown, now: number = Date.now()): number | null {
  if (typeof error !== "object" || error === null) return null;

  const headers = readField(error, "headers");
  if (typeof headers !== "object" || headers === null) return null;

  const retryAfter = readField(headers, "retry-after") ?? readField(headers, "Retry-After");
  if (typeof retryAfter !== "string" || retryAfter.length === 0) return null;

  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) return Math.max(0, date.getTime() - now);

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? RETRY_DEFAULTS.jitterFactor,
  };
  const sleep = options?.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryError(error)) break;

      const retryAfterMs = getRetryAfterMs(error);
      let delayMs: number;
      if (retryAfterMs !== null) {
        delayMs = Math.min(retryAfterMs, config.maxDelayMs);
      } else {
        const cappedDelay = Math.min(config.minDelayMs * 2 ** (attempt - 1), config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await sleep(delayMs);
    }
  }

  throw lastError;
}

export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (typeof error !== "object") return String(error);

  const code = readField(error, "code");
  const message = readField(error, "message");
  const status = readStatus(error);

  const parts: string[] = [];
  if (typeof code === "string" && code.length > 0) parts.push(`[${code}]`);
  if (status !== undefined) parts.push(`(HTTP ${status})`);
  parts.push(typeof message === "string" ? message : "Unknown error");
  return parts.join(" ");
}
