/**
 * Type barrel: re-exports all public types from @stellar-compass/node.
 */

// DTOs
export {
  WalletAddressSchema,
  RiskToleranceSchema,
  WalletConnectedSchema,
  NotifyConnectionSchema,
  OpportunitiesQuerySchema,
  AlertsQuerySchema,
  AgentSettingsSchema,
  fromSettingsDto,
  toAssetJson,
  toIdleAssetJson,
  toPortfolioJson,
  toOpportunityJson,
  toRiskScoreJson,
  toAllocationPlanJson,
  toSettingsJson,
} from "./dto.js";
export type {
  WalletConnectedDto,
  NotifyConnectionDto,
  AgentSettingsDto,
  AssetBalanceJson,
  IdleAssetJson,
  PortfolioJson,
  OpportunityJson,
  AgentSettingsJson,
} from "./dto.js";

// Error
export { createErrorEnvelope, ApiError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
