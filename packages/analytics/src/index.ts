/**
 * @stellar-compass/analytics: Portfolio analysis for Stellar accounts.
 *
 * - Valuation and idle-asset detection
 * - Opportunity matching against the protocol catalog
 * - Protocol risk scoring
 * - Allocation optimization
 *
 * Everything here is pure apart from the price oracle lookups.
 */

// Protocol catalog
export type { Protocol, ProtocolMetrics, AuditStatus } from "./protocols.js";
export { PROTOCOLS, findProtocol, actionLabel } from "./protocols.js";

// Portfolio
export type { PortfolioOptions } from "./portfolio.js";
export {
  DEFAULT_IDLE_THRESHOLD_DAYS,
  REFERENCE_APY,
  valueBalances,
  daysSince,
  opportunityCost,
  detectIdleAssets,
  buildPortfolio,
} from "./portfolio.js";

// Matching
export {
  ACCEPTED_RISK,
  fitsTolerance,
  monthlyEarnings,
  matchOpportunities,
} from "./matcher.js";

// Risk
export type { RiskScore, RiskFactors, RiskRecommendation } from "./risk.js";
export { UNKNOWN_METRICS, riskLevelForScore, computeFactors, scoreProtocol } from "./risk.js";

// Optimizer
export type { Allocation, AllocationPlan } from "./optimizer.js";
export { ALLOCATION_STRATEGIES, optimizeAllocation } from "./optimizer.js";
