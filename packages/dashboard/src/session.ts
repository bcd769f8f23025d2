/**
 * Dashboard session: the wallet connection flow.
 *
 * connect → notify backend → load portfolio → load opportunities,
 * and disconnect back to an empty dashboard. All user-facing feedback
 * goes through the toast queue.
 *
 * Design rules:
 * - Invalid input never reaches the network
 * - A session connects once; connecting again requires a disconnect
 * - The wallet-connected notification is best-effort and only logged on failure
 * - Results that arrive after a disconnect are dropped
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  WALLET_DISPLAY_NAMES,
  shortenAddress,
  validateWalletAddress,
} from "@stellar-compass/types";
import type { WalletAddress, WalletType } from "@stellar-compass/types";
import { StellarCompassClient } from "@stellar-compass/sdk";
import type {
  AssetBalanceJson,
  CompassClientConfig,
  OpportunityJson,
  PortfolioResponse,
} from "@stellar-compass/sdk";
import { formatApy, formatBalance, formatTvl, formatUsd } from "./format.js";
import { ToastQueue } from "./toast.js";
import { INITIAL_STATE } from "./state.js";
import type {
  AssetView,
  DashboardState,
  OpportunityView,
  StateListener,
  Subscription,
} from "./state.js";

// =============================================================================
// Messages
// =============================================================================

export const MESSAGES = {
  invalidAddress: "Invalid Stellar address. Please check and try again.",
  alreadyConnected: "A wallet is already connected. Disconnect it first.",
  notificationSent: "Check your email for wallet connection confirmation!",
  portfolioLoaded: "Portfolio analysis sent to your email!",
  portfolioFailed: "Failed to load portfolio data. Is the backend running?",
  opportunitiesFailed: "Failed to load opportunities.",
  disconnected: "Wallet disconnected.",
  backendDown: "Backend server not running. Please start the backend on port 5000.",
} as const;

function connectedMessage(walletType: WalletType): string {
  return `${WALLET_DISPLAY_NAMES[walletType]} wallet connected! Sending notification...`;
}

function opportunitiesMessage(count: number): string {
  return `${count} opportunities found! Check your email for details.`;
}

// =============================================================================
// View mapping
// =============================================================================

function assetKey(asset: AssetBalanceJson): string {
  return `${asset.asset}:${asset.asset_issuer ?? ""}`;
}

function toAssetViews(portfolio: PortfolioResponse): AssetView[] {
  const idle = new Set(portfolio.idle_assets.map(assetKey));
  return portfolio.assets.map((asset) => ({
    asset: asset.asset,
    balance: formatBalance(asset.balance),
    value: formatUsd(asset.value),
    idle: idle.has(assetKey(asset)),
  }));
}

function toOpportunityView(opportunity: OpportunityJson): OpportunityView {
  return {
    protocol: opportunity.protocol,
    type: opportunity.type,
    asset: opportunity.asset,
    risk: opportunity.risk,
    apy: formatApy(opportunity.apy),
    tvl: formatTvl(opportunity.tvl),
    description: opportunity.description,
    action: opportunity.action,
    url: opportunity.url,
  };
}

// =============================================================================
// Session
// =============================================================================

export interface DashboardSessionOptions {
  /** Defaults to a client for http://localhost:5000/api */
  readonly client?: StellarCompassClient | undefined;
  readonly clientConfig?: CompassClientConfig | undefined;
  readonly toasts?: ToastQueue | undefined;
  readonly logger?: Logger | undefined;
}

export class DashboardSession {
  readonly toasts: ToastQueue;

  private readonly client: StellarCompassClient;
  private readonly log: Logger;
  private readonly listeners = new Set<StateListener>();
  private state: DashboardState = INITIAL_STATE;

  /** Bumped on every connect and disconnect; stale loads compare against it */
  private generation = 0;

  constructor(options: DashboardSessionOptions = {}) {
    this.client = options.client ?? new StellarCompassClient(options.clientConfig);
    this.toasts = options.toasts ?? new ToastQueue();
    this.log = (options.logger ?? pino({ name: "dashboard" })).child({ component: "session" });
  }

  getState(): DashboardState {
    return this.state;
  }

  subscribe(listener: StateListener): Subscription {
    this.listeners.add(listener);
    return {
      unsubscribe: () => {
        this.listeners.delete(listener);
      },
    };
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Ping the backend; shows an error toast when it cannot be reached.
   */
  async checkBackend(): Promise<boolean> {
    try {
      const { data } = await this.client.health();
      this.log.info({ message: data.message }, "backend connected");
      return true;
    } catch (error) {
      this.log.error({ err: error }, "backend not reachable");
      this.toasts.error(MESSAGES.backendDown);
      return false;
    }
  }

  /**
   * Connect the address typed by the user and load its dashboard.
   * Resolves to false when the input was rejected.
   */
  async connect(input: string, walletType: WalletType = "manual"): Promise<boolean> {
    if (this.state.status === "connected") {
      this.toasts.error(MESSAGES.alreadyConnected);
      return false;
    }

    const validation = validateWalletAddress(input);
    if (!validation.valid) {
      this.log.debug({ reason: validation.reason }, "address rejected");
      this.update({ input, inputInvalid: true });
      this.toasts.error(MESSAGES.invalidAddress);
      return false;
    }

    const { address } = validation;
    const generation = ++this.generation;
    this.update({
      status: "connected",
      address,
      displayAddress: shortenAddress(address),
      input: address,
      inputInvalid: false,
    });
    this.toasts.success(connectedMessage(walletType));

    await this.notifyBackend(address, walletType);
    if (generation === this.generation) {
      await this.refresh();
    }
    return true;
  }

  /**
   * Reload portfolio, then opportunities, for the connected address.
   */
  async refresh(): Promise<void> {
    const address = this.state.address;
    if (address === null) return;

    const generation = this.generation;
    await this.loadPortfolio(address, generation);
    if (generation !== this.generation) return;
    await this.loadOpportunities(address, generation);
  }

  disconnect(): void {
    this.generation++;
    this.log.info({ address: this.state.displayAddress }, "wallet disconnected");
    this.update(INITIAL_STATE);
    this.toasts.success(MESSAGES.disconnected);
  }

  /** Stop toast timers and drop listeners. */
  dispose(): void {
    this.toasts.clear();
    this.listeners.clear();
  }

  // ─── Loads ──────────────────────────────────────────────────────────

  private async notifyBackend(address: WalletAddress, walletType: WalletType): Promise<void> {
    try {
      await this.client.wallet.connected(address, walletType);
      this.toasts.success(MESSAGES.notificationSent);
    } catch (error) {
      this.log.warn({ err: error }, "could not send wallet notification");
    }
  }

  private async loadPortfolio(address: WalletAddress, generation: number): Promise<void> {
    try {
      const { data } = await this.client.portfolio.get(address);
      if (generation !== this.generation) return;

      this.update({
        totalValue: formatUsd(data.total_value),
        assetCount: data.assets.length,
        idleCount: data.idle_assets.length,
        assets: toAssetViews(data),
      });
      this.toasts.success(MESSAGES.portfolioLoaded);
    } catch (error) {
      if (generation !== this.generation) return;
      this.log.error({ err: error }, "portfolio load failed");
      this.toasts.error(MESSAGES.portfolioFailed);
    }
  }

  private async loadOpportunities(address: WalletAddress, generation: number): Promise<void> {
    try {
      const { data } = await this.client.portfolio.opportunities(address);
      if (generation !== this.generation) return;

      this.update({ opportunities: data.map(toOpportunityView) });
      if (data.length > 0) {
        this.toasts.success(opportunitiesMessage(data.length));
      }
    } catch (error) {
      if (generation !== this.generation) return;
      this.log.error({ err: error }, "opportunities load failed");
      this.toasts.error(MESSAGES.opportunitiesFailed);
    }
  }

  private update(patch: Partial<DashboardState>): void {
    const previous = this.state;
    this.state = { ...previous, ...patch };
    for (const listener of this.listeners) {
      listener(this.state, previous);
    }
  }
}
