/**
 * @stellar-compass/sdk: SDK types.
 *
 * Client configuration, the response wrapper and the error type.
 * Wire types of the API live in client.ts.
 */

// =============================================================================
// Client Configuration
// =============================================================================

/** Where the dashboard finds the API when nothing else is configured */
export const DEFAULT_BASE_URL = "http://localhost:5000/api";

export interface CompassClientConfig {
  /** Base URL of the API, including the /api prefix (default: DEFAULT_BASE_URL) */
  readonly baseUrl?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 0) */
  readonly retries?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
  /** Backoff sleep, injectable for tests */
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

export interface ApiResponse<T> {
  /** Response payload */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the API, or from reaching it.
 *
 * `statusCode` is 0 for TIMEOUT and NETWORK_ERROR.
 */
export class DashboardApiError extends Error {
  /** Error code from the API (e.g., "ACCOUNT_NOT_FOUND", "VALIDATION_ERROR") */
  readonly code: string;
  readonly statusCode: number;
  /** Additional error details (validation issues, etc.) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "DashboardApiError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
