/**
 * Monitoring agent routes.
 *
 * POST /api/agents/:address/activate     Start agents (optional settings body)
 * POST /api/agents/:address/deactivate   Stop agents
 * GET  /api/agents/:address/alerts       Recent alerts (?limit=, oldest first)
 * PUT  /api/agents/:address/settings     Update notification settings
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AgentSettingsSchema,
  AlertsQuerySchema,
  WalletAddressSchema,
  fromSettingsDto,
  toSettingsJson,
} from "../types/dto.js";
import { parseInput, validateBody } from "../middleware/validate.js";

export function createAgentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:address/activate", validateBody(AgentSettingsSchema), (c) => {
    const address = parseInput(WalletAddressSchema, c.req.param("address"), "Stellar address");
    const orchestrator = c.get("agents").activate(address, fromSettingsDto(c.get("validatedBody")));

    return c.json({
      success: true,
      address,
      agents: orchestrator.agentNames(),
      settings: toSettingsJson(orchestrator.settings),
    });
  });

  routes.post("/:address/deactivate", (c) => {
    const address = parseInput(WalletAddressSchema, c.req.param("address"), "Stellar address");
    c.get("agents").deactivate(address);
    return c.json({ success: true, address });
  });

  routes.get("/:address/alerts", (c) => {
    const address = parseInput(WalletAddressSchema, c.req.param("address"), "Stellar address");
    const { limit } = parseInput(AlertsQuerySchema, c.req.query(), "query parameters");

    const alerts = c.get("agents").require(address).recentAlerts(limit);
    return c.json({ address, alerts, count: alerts.length });
  });

  routes.put("/:address/settings", validateBody(AgentSettingsSchema), (c) => {
    const address = parseInput(WalletAddressSchema, c.req.param("address"), "Stellar address");
    const settings = c
      .get("agents")
      .require(address)
      .updateSettings(fromSettingsDto(c.get("validatedBody")));

    return c.json({ success: true, settings: toSettingsJson(settings) });
  });

  return routes;
}
