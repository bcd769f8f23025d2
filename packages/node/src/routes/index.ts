/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes, HEALTH_MESSAGE } from "./health.js";
export { createWalletRoutes } from "./wallet.js";
export { createPortfolioRoutes } from "./portfolio.js";
export { createAnalysisRoutes } from "./analysis.js";
export { createAgentRoutes } from "./agents.js";
export { createNotificationRoutes } from "./notifications.js";
