/**
 * Portfolio Types
 *
 * Balances as observed on Horizon, valued in USD.
 * Everything here is recomputed per request; nothing is persisted.
 */

import type { WalletAddress } from "./wallet.js";

/**
 * Horizon balance-line asset types.
 */
export type AssetType =
  | "native"
  | "credit_alphanum4"
  | "credit_alphanum12"
  | "liquidity_pool_shares";

/**
 * A single balance with its USD valuation.
 */
export interface AssetBalance {
  /** Asset code ("XLM" for the native asset, "POOL" for pool shares) */
  readonly asset: string;

  readonly assetType: AssetType;

  /** Issuer account for credit assets, pool id for pool shares */
  readonly assetIssuer?: string | undefined;

  /** Balance in whole units */
  readonly balance: number;

  /** balance × USD price */
  readonly value: number;
}

/**
 * A positive balance on an account with no recent activity.
 */
export interface IdleAsset extends AssetBalance {
  readonly daysIdle: number;

  /** Yield forgone while idle, at the reference APY */
  readonly opportunityCost: number;
}

/**
 * A valued snapshot of an account.
 */
export interface Portfolio {
  readonly publicKey: WalletAddress;
  readonly totalValue: number;
  readonly assets: readonly AssetBalance[];
  readonly activeAssets: readonly AssetBalance[];
  readonly idleAssets: readonly IdleAsset[];

  /** Account sequence number (string: it exceeds 2^53) */
  readonly sequence: string;

  /** ISO 8601 time of the most recent transaction, null if none */
  readonly lastActivity: string | null;

  /** ISO 8601 time of observation */
  readonly observedAt: string;
}
