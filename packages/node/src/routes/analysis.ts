/**
 * Risk and allocation routes.
 *
 * GET /api/risk/:protocol       Protocol risk score
 * GET /api/optimize/:address    Allocation plan (?risk_tolerance=)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  OpportunitiesQuerySchema,
  WalletAddressSchema,
  toAllocationPlanJson,
  toRiskScoreJson,
} from "../types/dto.js";
import { parseInput } from "../middleware/validate.js";

export function createAnalysisRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/risk/:protocol", (c) => {
    const score = c.get("service").scoreRisk(c.req.param("protocol"));
    return c.json(toRiskScoreJson(score));
  });

  routes.get("/optimize/:address", async (c) => {
    const address = parseInput(WalletAddressSchema, c.req.param("address"), "Stellar address");
    const query = parseInput(OpportunitiesQuerySchema, c.req.query(), "query parameters");

    const plan = await c.get("service").optimize(address, query.risk_tolerance);
    return c.json(toAllocationPlanJson(plan));
  });

  return routes;
}
