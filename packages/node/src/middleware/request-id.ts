/**
 * Request ID middleware.
 *
 * Echoes X-Request-Id on every response. An incoming ID is kept only when it
 * is a short token of letters, digits, dots, underscores and hyphens; anything
 * else is replaced by a fresh UUID before it can reach the logs.
 */

import type { MiddlewareHandler } from "hono";
import { randomUUID } from "node:crypto";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const SAFE_REQUEST_ID = /^[\w.-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && SAFE_REQUEST_ID.test(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}
