/**
 * Health check routes.
 *
 * GET /api/health Liveness probe (also served at /health)
 * GET /ready      Readiness probe: Horizon must answer
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const HEALTH_MESSAGE = "Stellar Compass API is running";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  const health = (c: Context<AppEnv>) =>
    c.json({
      status: "healthy",
      message: HEALTH_MESSAGE,
      service: "Stellar Compass API",
      network: c.get("service").network.name,
      timestamp: new Date().toISOString(),
    });

  routes.get("/health", health);
  routes.get("/api/health", health);

  routes.get("/ready", async (c) => {
    const horizon = await c.get("service").horizonStatus();
    const ready = horizon.connected;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        horizon: {
          network_id: horizon.networkId,
          connected: horizon.connected,
          latest_ledger: horizon.latestLedger ?? null,
          checked_at: horizon.checkedAt,
        },
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
