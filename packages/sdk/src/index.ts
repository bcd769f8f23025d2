/**
 * @stellar-compass/sdk: Typed HTTP client for the Stellar Compass API.
 *
 * Zero dependencies: uses native fetch.
 *
 * @packageDocumentation
 */

// Types
export type { CompassClientConfig, ApiResponse } from "./types.js";
export { DEFAULT_BASE_URL, DashboardApiError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Client
export {
  StellarCompassClient,
  WalletNamespace,
  PortfolioNamespace,
  AnalysisNamespace,
  AgentsNamespace,
} from "./client.js";

// Wire types
export type {
  RiskToleranceParam,
  HealthResponse,
  WalletConnectedResponse,
  AssetBalanceJson,
  IdleAssetJson,
  PortfolioResponse,
  OpportunityJson,
  RiskScoreResponse,
  AllocationPlanResponse,
  AgentSettingsJson,
  AgentSettingsUpdate,
  AlertJson,
  ActivateAgentsResponse,
  AlertsResponse,
  TestNotificationResponse,
} from "./client.js";
