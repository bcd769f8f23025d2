/**
 * Monitoring agents.
 *
 * - IdleAssetMonitor: idle balances that could be earning yield
 * - OpportunityScout: APY jumps on protocols the user can enter
 * - ConcentrationMonitor: too much of the portfolio in one asset
 * - PriceMovementMonitor: large moves in held assets' prices
 */

import { REFERENCE_APY } from "@stellar-compass/analytics";
import type { PriceOracle } from "@stellar-compass/horizon";
import type { Alert, AlertPriority, RiskTolerance, WalletAddress } from "@stellar-compass/types";
import { Agent } from "./agent.js";
import type { AgentOptions } from "./agent.js";
import type { AlertSink, OpportunitySource, PortfolioSource } from "./types.js";

// =============================================================================
// Idle assets
// =============================================================================

/** Idle assets at or past this many days are HIGH priority */
export const IDLE_HIGH_PRIORITY_DAYS = 60;

export class IdleAssetMonitor extends Agent {
  readonly name = "Idle Asset Monitor";

  constructor(
    private readonly address: WalletAddress,
    private readonly portfolios: PortfolioSource,
    sink: AlertSink,
    options: AgentOptions,
  ) {
    super(sink, options);
  }

  protected async check(): Promise<readonly Alert[]> {
    const portfolio = await this.portfolios.getPortfolio(this.address);

    return portfolio.idleAssets.map((idle): Alert => ({
      type: "IDLE_ASSET",
      priority: idle.daysIdle < IDLE_HIGH_PRIORITY_DAYS ? "MEDIUM" : "HIGH",
      title: `${idle.asset} sitting idle for ${idle.daysIdle} days`,
      message: `$${idle.value.toFixed(2)} could be earning $${((idle.value * REFERENCE_APY) / 12).toFixed(2)}/month`,
      action: "Activate Now",
      timestamp: this.now(),
    }));
  }
}

// =============================================================================
// Opportunity scout
// =============================================================================

/** APY increase, in percentage points, that counts as a spike */
export const APY_SPIKE_POINTS = 2;

export class OpportunityScout extends Agent {
  readonly name = "Opportunity Scout";
  private readonly trackedApys = new Map<string, number>();

  constructor(
    private readonly address: WalletAddress,
    private readonly opportunities: OpportunitySource,
    private readonly tolerance: () => RiskTolerance,
    sink: AlertSink,
    options: AgentOptions,
  ) {
    super(sink, options);
  }

  protected async check(): Promise<readonly Alert[]> {
    const current = await this.opportunities.getOpportunities(this.address, this.tolerance());

    // One APY per protocol; the list repeats a protocol once per held asset.
    const apys = new Map<string, number>();
    for (const o of current) {
      if (!apys.has(o.protocol)) apys.set(o.protocol, o.apy);
    }

    const alerts: Alert[] = [];
    for (const [protocol, apy] of apys) {
      const previous = this.trackedApys.get(protocol);
      if (previous !== undefined && apy - previous > APY_SPIKE_POINTS) {
        alerts.push({
          type: "APY_SPIKE",
          priority: "HIGH",
          title: `${protocol} APY jumped to ${apy}%`,
          message: `Up ${(apy - previous).toFixed(1)}% from ${previous.toFixed(1)}%. Time to invest?`,
          action: "View Details",
          timestamp: this.now(),
        });
      }
      this.trackedApys.set(protocol, apy);
    }
    return alerts;
  }
}

// =============================================================================
// Concentration
// =============================================================================

export const CONCENTRATION_HIGH = 0.85;
export const CONCENTRATION_CRITICAL = 0.95;

export const CONCENTRATION_INTERVAL_MS = 10 * 60_000;

export class ConcentrationMonitor extends Agent {
  readonly name = "Concentration Monitor";

  constructor(
    private readonly address: WalletAddress,
    private readonly portfolios: PortfolioSource,
    sink: AlertSink,
    options: AgentOptions,
  ) {
    super(sink, { ...options, intervalMs: options.intervalMs ?? CONCENTRATION_INTERVAL_MS });
  }

  protected async check(): Promise<readonly Alert[]> {
    const portfolio = await this.portfolios.getPortfolio(this.address);
    if (portfolio.totalValue <= 0) return [];

    let largest = portfolio.assets[0];
    for (const asset of portfolio.assets) {
      if (largest === undefined || asset.value > largest.value) largest = asset;
    }
    if (largest === undefined) return [];

    const share = largest.value / portfolio.totalValue;
    let priority: AlertPriority;
    if (share > CONCENTRATION_CRITICAL) priority = "CRITICAL";
    else if (share > CONCENTRATION_HIGH) priority = "HIGH";
    else return [];

    return [
      {
        type: "RISK_ALERT",
        priority,
        title: "Portfolio concentration risk",
        message: `${(share * 100).toFixed(1)}% of portfolio value in ${largest.asset}. Consider diversifying.`,
        action: "Review Position",
        timestamp: this.now(),
      },
    ];
  }
}

// =============================================================================
// Price movement
// =============================================================================

export const PRICE_MOVE_THRESHOLD = 0.05;
export const PRICE_MOVE_HIGH = 0.1;

export class PriceMovementMonitor extends Agent {
  readonly name = "Price Movement Monitor";
  private readonly lastPrices = new Map<string, number>();

  constructor(
    private readonly address: WalletAddress,
    private readonly portfolios: PortfolioSource,
    private readonly oracle: PriceOracle,
    sink: AlertSink,
    options: AgentOptions,
  ) {
    super(sink, options);
  }

  protected async check(): Promise<readonly Alert[]> {
    const portfolio = await this.portfolios.getPortfolio(this.address);
    const held = [...new Set(portfolio.assets.filter((a) => a.balance > 0).map((a) => a.asset))];
    const prices = await this.oracle.getPrices(held);

    const alerts: Alert[] = [];
    for (const asset of held) {
      const price = prices[asset];
      if (price === undefined) continue;

      const previous = this.lastPrices.get(asset);
      this.lastPrices.set(asset, price);
      if (previous === undefined || previous === 0) continue;

      const change = (price - previous) / previous;
      if (Math.abs(change) < PRICE_MOVE_THRESHOLD) continue;

      alerts.push({
        type: "PRICE_MOVEMENT",
        priority: Math.abs(change) < PRICE_MOVE_HIGH ? "MEDIUM" : "HIGH",
        title: `${asset} ${change > 0 ? "up" : "down"} ${(Math.abs(change) * 100).toFixed(1)}%`,
        message: `Current price: $${price.toFixed(4)}`,
        action: "Check Portfolio",
        timestamp: this.now(),
      });
    }
    return alerts;
  }
}
