/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { z, ZodError, ZodTypeAny } from "zod";
import type { ValidatedEnv } from "../types/api-contract.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

/**
 * On success, sets `validatedBody` (the parsed output) in context variables.
 * A missing body is validated as `{}` so all-optional schemas accept it.
 */
export function validateBody<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<ValidatedEnv<z.output<S>>> {
  return async (c, next) => {
    let body: unknown = {};
    const raw = await c.req.text();
    if (raw.trim() !== "") {
      try {
        body = JSON.parse(raw);
      } catch {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
          400,
        );
      }
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Parse query or path values, throwing a VALIDATION_ERROR ApiError on failure.
 */
export function parseInput<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", `Invalid ${what}`, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
