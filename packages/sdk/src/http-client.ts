/**
 * @stellar-compass/sdk: HTTP Client.
 *
 * Wraps native fetch() with:
 * - Request ID generation
 * - Timeout handling
 * - Opt-in retries (exponential backoff for 5xx and network errors)
 * - Error normalization into DashboardApiError
 *
 * Design:
 * - Zero external dependencies (uses native fetch)
 * - Custom fetch function for testing
 */

import type { ApiResponse, CompassClientConfig } from "./types.js";
import { DEFAULT_BASE_URL, DashboardApiError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoff(attempt: number): number {
  return Math.min(1000 * Math.pow(2, attempt), 10000);
}

/**
 * Parse a response body as JSON, handling empty and non-JSON responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

interface ErrorFields {
  readonly code?: string | undefined;
  readonly message?: string | undefined;
  readonly details?: unknown;
}

/**
 * Pull `{ error: { code, message, details } }` out of an error body.
 */
function errorFields(body: unknown): ErrorFields {
  if (typeof body !== "object" || body === null) return {};
  const error = (body as Record<string, unknown>)["error"];
  if (typeof error !== "object" || error === null) return {};

  const e = error as Record<string, unknown>;
  return {
    code: typeof e["code"] === "string" ? e["code"] : undefined,
    message: typeof e["message"] === "string" ? e["message"] : undefined,
    details: e["details"],
  };
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of ["content-type", "x-request-id"]) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }
  return result;
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for the Stellar Compass API.
 */
export class HttpClient {
  readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(config: CompassClientConfig = {}) {
    // Strip trailing slash
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 0;
    // Browsers reject fetch called with any receiver other than the global
    this.fetchFn = config.fetchFn ?? ((input, init) => globalThis.fetch(input, init));
    this.sleepFn = config.sleepFn ?? sleep;
  }

  async get<T>(path: string): Promise<ApiResponse<T>> {
    return this.request<T>("GET", path);
  }

  async post<T>(path: string, body?: unknown): Promise<ApiResponse<T>> {
    return this.request<T>("POST", path, body);
  }

  async put<T>(path: string, body: unknown): Promise<ApiResponse<T>> {
    return this.request<T>("PUT", path, body);
  }

  /**
   * Core request method with retry logic.
   */
  private async request<T>(method: string, path: string, body?: unknown): Promise<ApiResponse<T>> {
    const url = `${this.baseUrl}${path}`;

    const init: RequestInit = {
      method,
      headers: {
        "Content-Type": "application/json",
        "Accept": "application/json",
        "X-Request-Id": generateRequestId(),
      },
    };

    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    for (let attempt = 0; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        if (error instanceof DashboardApiError) {
          throw error;
        }
        if (attempt < this.maxRetries) {
          await this.sleepFn(backoff(attempt));
          continue;
        }
        throw new DashboardApiError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : "Network error",
          0,
        );
      }

      const responseBody = await parseResponseBody(response);

      // 2xx → success
      if (response.ok) {
        return {
          data: responseBody as T,
          status: response.status,
          headers: extractHeaders(response),
        };
      }

      // 5xx → retry with backoff while attempts remain
      if (response.status >= 500 && attempt < this.maxRetries) {
        await this.sleepFn(backoff(attempt));
        continue;
      }

      const fields = errorFields(responseBody);
      const fallbackCode = response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR";
      throw new DashboardApiError(
        fields.code ?? fallbackCode,
        fields.message ?? `HTTP ${response.status}`,
        response.status,
        fields.details,
      );
    }
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new DashboardApiError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
          0,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
