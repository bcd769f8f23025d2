/**
 * @stellar-compass/agents: Background monitoring for connected addresses.
 *
 * Agents poll portfolio state on an interval and raise alerts; the
 * orchestrator keeps an alert history per address and routes alerts to
 * the notifier.
 */

export type {
  PortfolioSource,
  OpportunitySource,
  AlertSink,
  Clock,
  AgentSettings,
  AgentErrorCode,
} from "./types.js";
export { AgentError } from "./types.js";

export type { AgentOptions } from "./agent.js";
export { Agent, DEFAULT_INTERVAL_MS } from "./agent.js";

export {
  IdleAssetMonitor,
  OpportunityScout,
  ConcentrationMonitor,
  PriceMovementMonitor,
  IDLE_HIGH_PRIORITY_DAYS,
  APY_SPIKE_POINTS,
  CONCENTRATION_HIGH,
  CONCENTRATION_CRITICAL,
  CONCENTRATION_INTERVAL_MS,
  PRICE_MOVE_THRESHOLD,
  PRICE_MOVE_HIGH,
} from "./monitors.js";

export type { AlertNotifier, OrchestratorDeps } from "./orchestrator.js";
export { AgentOrchestrator, ALERT_HISTORY_LIMIT, DEFAULT_ALERT_LIMIT } from "./orchestrator.js";

export { AgentRegistry } from "./registry.js";
