/**
 * Retry with exponential backoff.
 *
 * Used by the notification channels to retry transient delivery failures
 * (SMTP connection resets, SMS provider 5xx).
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 500 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 5000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 100 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 5000,
  jitterMs: 100,
};

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  readonly code = "RETRY_EXHAUSTED";

  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} delivery attempts failed. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * @param attempt - Zero-based retry index (0 = first retry)
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Execute a function with retry on failure.
 *
 * @param shouldRetry - Predicate for retryable errors (default: all errors)
 * @param sleepFn - Injectable for tests
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      if (attempt < config.maxAttempts - 1) {
        await sleepFn(computeDelay(attempt, config));
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

/** SMTP failures that will not go away on retry */
const PERMANENT_SMTP_CODES = new Set(["EAUTH", "EENVELOPE", "EMESSAGE"]);

/**
 * Delivery retry predicate.
 *
 * Permanent failures: SMTP auth / envelope errors (nodemailer `code`) and
 * provider 4xx responses (Twilio `status`). Everything else is retried.
 */
export function isRetryableDeliveryError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return true;

  if ("code" in err && typeof err.code === "string" && PERMANENT_SMTP_CODES.has(err.code)) {
    return false;
  }

  if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return false;
  }

  return true;
}
