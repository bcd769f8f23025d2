/**
 * Runtime Type Guards
 *
 * Narrowing functions for Stellar Compass domain types.
 * Used at system boundaries: API inputs and Horizon balance records.
 */

import type { WalletAddress, WalletType } from "./wallet.js";
import { validateWalletAddress } from "./wallet.js";
import type { AssetType } from "./portfolio.js";

// =============================================================================
// Wallet guards
// =============================================================================

const WALLET_TYPES = new Set<string>(["freighter", "albedo", "rabet", "xbull", "manual"]);

/**
 * Exact-match check: unlike validateWalletAddress, whitespace is not trimmed.
 */
export function isWalletAddress(value: unknown): value is WalletAddress {
  if (typeof value !== "string") return false;
  const result = validateWalletAddress(value);
  return result.valid && result.address === value;
}

export function isWalletType(value: unknown): value is WalletType {
  return typeof value === "string" && WALLET_TYPES.has(value);
}

// =============================================================================
// Portfolio guards
// =============================================================================

const ASSET_TYPES = new Set<string>([
  "native", "credit_alphanum4", "credit_alphanum12", "liquidity_pool_shares",
]);

export function isAssetType(value: unknown): value is AssetType {
  return typeof value === "string" && ASSET_TYPES.has(value);
}
