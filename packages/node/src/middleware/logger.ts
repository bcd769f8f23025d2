/**
 * Request logging middleware.
 *
 * One entry per request goes to an injected log function; main.ts forwards
 * entries to the pino root logger. Paths that carry a wallet address are
 * tagged with its shortened form so a wallet's requests can be followed
 * without logging full keys twice.
 */

import type { MiddlewareHandler } from "hono";
import { shortenAddress } from "@stellar-compass/types";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;

  /** Shortened wallet address, when the path has one */
  readonly wallet?: string | undefined;
}

const ADDRESS_SEGMENT = /\/(G[A-Z0-9]{55})(?=\/|$)/;

export function walletFromPath(path: string): string | undefined {
  const match = ADDRESS_SEGMENT.exec(path);
  return match?.[1] !== undefined ? shortenAddress(match[1]) : undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    const wallet = walletFromPath(c.req.path);
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      ...(wallet !== undefined ? { wallet } : {}),
    });
  };
}
