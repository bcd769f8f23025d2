/**
 * Horizon Observer: Read-only Stellar account observer.
 *
 * Uses @stellar/stellar-sdk's Horizon client for all ledger interactions.
 *
 * Capabilities:
 * - Account balances (native, credit assets, pool shares)
 * - Recent transaction history
 * - Last-activity lookup for idle detection
 *
 * Non-capabilities:
 * - No signing
 * - No transaction submission
 * - No trustline changes
 *
 * Stellar-specific notes:
 * - Balances are decimal strings with 7 places (1 XLM = 10,000,000 stroops)
 * - Horizon is plain HTTP; "connect" only builds the client
 */

import { Horizon, NotFoundError, BadRequestError } from "@stellar/stellar-sdk";
import { isAssetType } from "@stellar-compass/types";
import { isStellarNetwork } from "./networks.js";
import type { WalletAddress } from "@stellar-compass/types";
import type {
  AccountObserver,
  AccountSnapshot,
  ConnectionStatus,
  ObserverConfig,
  RawBalance,
  TransactionQuery,
  TransactionSummary,
} from "./observer.js";
import { HorizonError } from "./errors.js";

// =============================================================================
// Balance normalization
// =============================================================================

/**
 * The fields of a Horizon balance line we read.
 */
export interface HorizonBalanceLine {
  readonly asset_type: string;
  readonly balance: string;
  readonly asset_code?: string;
  readonly asset_issuer?: string;
  readonly liquidity_pool_id?: string;
}

/**
 * Convert a Horizon balance line. Returns undefined for asset types
 * Horizon may add later.
 */
export function normalizeBalance(line: HorizonBalanceLine): RawBalance | undefined {
  const assetType = line.asset_type;
  if (!isAssetType(assetType)) return undefined;

  switch (assetType) {
    case "native":
      return { asset: "XLM", assetType, balance: line.balance };
    case "liquidity_pool_shares":
      return {
        asset: "POOL",
        assetType,
        assetIssuer: line.liquidity_pool_id,
        balance: line.balance,
      };
    default:
      return {
        asset: line.asset_code ?? "UNKNOWN",
        assetType,
        assetIssuer: line.asset_issuer,
        balance: line.balance,
      };
  }
}

const DEFAULT_TIMEOUT_MS = 30_000;

// =============================================================================
// Horizon Observer
// =============================================================================

export class HorizonObserver implements AccountObserver {
  readonly networkId: string;
  private server: Horizon.Server | null = null;
  private readonly horizonUrl: string;
  private readonly timeoutMs: number;

  constructor(config: ObserverConfig) {
    if (!isStellarNetwork(config.network.networkId)) {
      throw new Error(
        `HorizonObserver: expected Stellar network ID (stellar:*), got '${config.network.networkId}'`
      );
    }
    this.networkId = config.network.networkId;
    this.horizonUrl = (config.horizonUrl ?? config.network.horizonUrl).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async connect(): Promise<void> {
    this.server = new Horizon.Server(this.horizonUrl, {
      allowHttp: this.horizonUrl.startsWith("http://"),
    });
  }

  async disconnect(): Promise<void> {
    this.server = null;
  }

  async getStatus(): Promise<ConnectionStatus> {
    const now = new Date().toISOString();
    if (!this.server) {
      return { networkId: this.networkId, connected: false, checkedAt: now };
    }

    try {
      const page = await this.withTimeout(
        this.server.ledgers().order("desc").limit(1).call(),
      );
      const latest = page.records[0];
      return {
        networkId: this.networkId,
        connected: true,
        ...(latest !== undefined ? { latestLedger: latest.sequence } : {}),
        checkedAt: now,
      };
    } catch {
      return { networkId: this.networkId, connected: false, checkedAt: now };
    }
  }

  async getAccount(address: WalletAddress): Promise<AccountSnapshot> {
    const server = this.requireServer();

    try {
      const account = await this.withTimeout(
        server.accounts().accountId(address).call(),
      );

      const balances: RawBalance[] = [];
      for (const line of account.balances) {
        const balance = normalizeBalance(line);
        if (balance !== undefined) balances.push(balance);
      }

      return {
        networkId: this.networkId,
        address,
        sequence: account.sequence,
        balances,
        observedAt: new Date().toISOString(),
      };
    } catch (error) {
      throw this.translateError(error, address);
    }
  }

  async getTransactions(query: TransactionQuery): Promise<readonly TransactionSummary[]> {
    const server = this.requireServer();

    try {
      const page = await this.withTimeout(
        server
          .transactions()
          .forAccount(query.address)
          .order(query.order ?? "desc")
          .limit(Math.min(query.limit ?? 50, 200))
          .call(),
      );

      return page.records.map((tx) => ({
        id: tx.id,
        hash: tx.hash,
        createdAt: tx.created_at,
        sourceAccount: tx.source_account,
        successful: tx.successful,
      }));
    } catch (error) {
      throw this.translateError(error, query.address);
    }
  }

  async getLastActivity(address: WalletAddress): Promise<string | null> {
    const transactions = await this.getTransactions({ address, limit: 1, order: "desc" });
    return transactions[0]?.createdAt ?? null;
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private requireServer(): Horizon.Server {
    if (!this.server) {
      throw new HorizonError(
        "NOT_CONNECTED",
        "HorizonObserver: not connected. Call connect() before querying."
      );
    }
    return this.server;
  }

  private translateError(error: unknown, address: string): HorizonError {
    if (error instanceof HorizonError) return error;
    if (error instanceof NotFoundError) {
      return new HorizonError("ACCOUNT_NOT_FOUND", `Account ${address} not found`, { cause: error });
    }
    if (error instanceof BadRequestError) {
      return new HorizonError("INVALID_ADDRESS", `Horizon rejected address ${address}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new HorizonError("HORIZON_UNAVAILABLE", `Horizon request failed: ${message}`, { cause: error });
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new HorizonError("HORIZON_UNAVAILABLE", `Horizon request timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
