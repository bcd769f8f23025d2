/**
 * Account Observer Interface
 *
 * The core abstraction for observing Stellar account state.
 * HorizonObserver is the production implementation; tests and callers
 * depend on this interface only.
 *
 * Design rules:
 * - All methods are read-only: no mutations, no signing
 * - All methods return Promises (ledger queries are inherently async)
 * - All responses include observation metadata (when, from which network)
 * - Errors are thrown as HorizonError, not returned: fail-closed
 */

import type { AssetType, WalletAddress } from "@stellar-compass/types";
import type { NetworkRef } from "./networks.js";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration for connecting to a Horizon instance.
 */
export interface ObserverConfig {
  /** Network to observe */
  readonly network: NetworkRef;

  /** Horizon URL; defaults to the network's public endpoint */
  readonly horizonUrl?: string | undefined;

  /** Optional request timeout in milliseconds */
  readonly timeoutMs?: number | undefined;
}

// =============================================================================
// Connection
// =============================================================================

export interface ConnectionStatus {
  readonly networkId: string;
  readonly connected: boolean;
  readonly latestLedger?: number;
  readonly checkedAt: string;
}

// =============================================================================
// Account Queries
// =============================================================================

/**
 * One balance line of an account, unvalued.
 */
export interface RawBalance {
  /** Asset code ("XLM" for native, "POOL" for pool shares) */
  readonly asset: string;
  readonly assetType: AssetType;

  /** Issuer for credit assets, pool id for pool shares */
  readonly assetIssuer?: string | undefined;

  /** Decimal string as returned by Horizon (7 decimal places) */
  readonly balance: string;
}

export interface AccountSnapshot {
  readonly networkId: string;
  readonly address: WalletAddress;
  readonly sequence: string;
  readonly balances: readonly RawBalance[];
  readonly observedAt: string;
}

// =============================================================================
// Transaction Queries
// =============================================================================

export interface TransactionQuery {
  readonly address: WalletAddress;

  /** Maximum results to return (Horizon caps this at 200) */
  readonly limit?: number;

  /** "desc" returns the most recent first */
  readonly order?: "asc" | "desc";
}

export interface TransactionSummary {
  readonly id: string;
  readonly hash: string;
  readonly createdAt: string;
  readonly sourceAccount: string;
  readonly successful: boolean;
}

// =============================================================================
// Observer Interface
// =============================================================================

/**
 * Guarantees:
 * - All methods are read-only
 * - Unknown accounts raise HorizonError("ACCOUNT_NOT_FOUND")
 * - Transport failures raise HorizonError("HORIZON_UNAVAILABLE")
 */
export interface AccountObserver {
  /** Which network this observer watches */
  readonly networkId: string;

  connect(): Promise<void>;

  disconnect(): Promise<void>;

  getStatus(): Promise<ConnectionStatus>;

  /** Account balances and sequence */
  getAccount(address: WalletAddress): Promise<AccountSnapshot>;

  getTransactions(query: TransactionQuery): Promise<readonly TransactionSummary[]>;

  /** ISO time of the most recent transaction, null for none */
  getLastActivity(address: WalletAddress): Promise<string | null>;
}
