/**
 * @stellar-compass/types: Shared domain types for the Stellar Compass stack.
 *
 * These types are used across all packages:
 * - Wallet addresses and their validation
 * - Valued portfolios and idle assets
 * - Yield opportunities and the risk vocabulary
 * - Monitoring alerts
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Wire formats (snake_case JSON) live in the API and SDK, not here
 */

// Wallet
export type {
  WalletAddress,
  WalletType,
  AddressValidation,
} from "./wallet.js";
export {
  WALLET_ADDRESS_LENGTH,
  WALLET_ADDRESS_PREFIX,
  WALLET_DISPLAY_NAMES,
  validateWalletAddress,
  shortenAddress,
} from "./wallet.js";

// Portfolio
export type {
  AssetType,
  AssetBalance,
  IdleAsset,
  Portfolio,
} from "./portfolio.js";

// Opportunities
export type {
  RiskLevel,
  RiskTier,
  RiskTolerance,
  YieldType,
  Opportunity,
} from "./opportunity.js";
export { toRiskTier } from "./opportunity.js";

// Alerts
export type {
  Alert,
  AlertType,
  AlertPriority,
} from "./alert.js";

// Runtime type guards
export {
  isWalletAddress,
  isWalletType,
  isAssetType,
} from "./guards.js";
