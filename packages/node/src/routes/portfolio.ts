/**
 * Portfolio and opportunity routes.
 *
 * GET /api/portfolio/:address       Valued balances and idle assets
 * GET /api/opportunities/:address   Matched opportunities (?risk_tolerance=)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  OpportunitiesQuerySchema,
  WalletAddressSchema,
  toOpportunityJson,
  toPortfolioJson,
} from "../types/dto.js";
import { parseInput } from "../middleware/validate.js";

export function createPortfolioRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/portfolio/:address", async (c) => {
    const address = parseInput(WalletAddressSchema, c.req.param("address"), "Stellar address");
    const portfolio = await c.get("service").analyzePortfolio(address);
    return c.json(toPortfolioJson(portfolio));
  });

  routes.get("/opportunities/:address", async (c) => {
    const address = parseInput(WalletAddressSchema, c.req.param("address"), "Stellar address");
    const query = parseInput(OpportunitiesQuerySchema, c.req.query(), "query parameters");

    const opportunities = await c
      .get("service")
      .findOpportunities(address, query.risk_tolerance);
    return c.json(opportunities.map(toOpportunityJson));
  });

  return routes;
}
