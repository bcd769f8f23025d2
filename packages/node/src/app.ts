/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { AgentRegistry } from "@stellar-compass/agents";
import type { AgentSettings } from "@stellar-compass/agents";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { CompassService } from "./services/compass-service.js";
import type { CompassServiceConfig } from "./services/compass-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createWalletRoutes } from "./routes/wallet.js";
import { createPortfolioRoutes } from "./routes/portfolio.js";
import { createAnalysisRoutes } from "./routes/analysis.js";
import { createAgentRoutes } from "./routes/agents.js";
import { createNotificationRoutes } from "./routes/notifications.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: CompassServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;

  /** "*" or a list of allowed origins. Default: "*" */
  readonly corsOrigins?: string | string[] | undefined;

  /** Agent interval; the concentration monitor runs at twice this */
  readonly agentIntervalMs?: number | undefined;

  /** Settings for newly activated agents, before the request's own settings */
  readonly agentDefaults?: Partial<AgentSettings> | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CompassService;
  readonly agents: AgentRegistry;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { serviceConfig } = options;
  const service = new CompassService(serviceConfig);
  const agents = new AgentRegistry(
    {
      portfolios: service,
      opportunities: service,
      oracle: serviceConfig.oracle,
      notifier: serviceConfig.notifier,
      logger: serviceConfig.logger,
      intervalMs: options.agentIntervalMs,
      clock: serviceConfig.clock,
    },
    {
      riskTolerance: serviceConfig.defaultRiskTolerance,
      emailNotifications: true,
      smsNotifications: false,
      ...options.agentDefaults,
    },
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use(
    "*",
    cors({
      origin: options.corsOrigins ?? "*",
      exposeHeaders: ["X-Request-Id"],
    }),
  );

  app.use("*", async (c, next) => {
    c.set("service", service);
    c.set("agents", agents);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(serviceConfig.logger.child({ component: "error-handler" })));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api", createWalletRoutes());
  app.route("/api", createPortfolioRoutes());
  app.route("/api", createAnalysisRoutes());
  app.route("/api", createNotificationRoutes());
  app.route("/api/agents", createAgentRoutes());

  return { app, service, agents };
}
