/**
 * @stellar-compass/horizon: Read-only access to Stellar account state.
 *
 * Provides:
 * - AccountObserver interface and the Horizon-backed implementation
 * - Known networks and their Horizon endpoints
 * - USD price oracle
 *
 * Design rules:
 * - Read-only: no signing, no submission
 * - Every failure surfaces as a HorizonError with a code
 */

// Networks
export type { StellarNetwork, NetworkRef } from "./networks.js";
export { NETWORKS, isStellarNetwork } from "./networks.js";

// Observer interface
export type {
  AccountObserver,
  ObserverConfig,
  ConnectionStatus,
  RawBalance,
  AccountSnapshot,
  TransactionQuery,
  TransactionSummary,
} from "./observer.js";

// Horizon implementation
export type { HorizonBalanceLine } from "./horizon-observer.js";
export { HorizonObserver, normalizeBalance } from "./horizon-observer.js";

// Errors
export type { HorizonErrorCode } from "./errors.js";
export { HorizonError } from "./errors.js";

// Prices
export type { PriceOracle } from "./prices.js";
export { StaticPriceOracle, DEFAULT_PRICES, parsePriceOverrides } from "./prices.js";
