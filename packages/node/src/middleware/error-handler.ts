/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Domain errors carry a string
 * `code`; the code decides the HTTP status.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

interface DomainError {
  readonly code?: string | undefined;
  readonly message: string;
  readonly details?: Record<string, unknown> | undefined;
}

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Request errors
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,

  // Horizon errors
  INVALID_ADDRESS: 400,
  ACCOUNT_NOT_FOUND: 404,
  HORIZON_UNAVAILABLE: 502,
  NOT_CONNECTED: 503,

  // Agent errors
  AGENTS_NOT_ACTIVE: 404,
};

function toDomainError(err: Error): DomainError {
  const record = err as unknown as Record<string, unknown>;
  const code = typeof record["code"] === "string" ? record["code"] : undefined;
  const details = record["details"];
  return {
    code,
    message: err.message,
    details:
      typeof details === "object" && details !== null && !Array.isArray(details)
        ? { ...details }
        : undefined,
  };
}

export function getStatusCode(code: string | undefined): ContentfulStatusCode {
  if (code !== undefined && code in STATUS_MAP) {
    return STATUS_MAP[code]!;
  }
  return 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the global error handler, registered as Hono's onError handler.
 * Unexpected errors are logged with their stack; the client only sees
 * a generic 500.
 */
export function createErrorHandler(logger?: Logger): (err: Error, c: Context) => Response {
  return (err, c) => {
    const domainError = toDomainError(err);
    const status = getStatusCode(domainError.code);

    if (status === 500) {
      logger?.error({ err, method: c.req.method, path: c.req.path }, "unhandled error");
      // Don't leak internal details
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const envelope = createErrorEnvelope(
      domainError.code ?? "INTERNAL_ERROR",
      domainError.message,
      domainError.details,
    );
    return c.json(envelope, status);
  };
}
