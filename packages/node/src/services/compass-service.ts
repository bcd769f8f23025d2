/**
 * CompassService: the API's composition root.
 *
 * Wires the Horizon observer, the price oracle, the analytics functions and
 * the notifier into the operations the routes expose. It is also the
 * portfolio and opportunity source for the monitoring agents.
 *
 * Design rules:
 * - Stateless apart from its collaborators: every call reads Horizon afresh
 * - Notifications never affect a response; failures are logged by the notifier
 */

import type { Logger } from "pino";
import type {
  Opportunity,
  Portfolio,
  RiskTolerance,
  WalletAddress,
} from "@stellar-compass/types";
import { shortenAddress } from "@stellar-compass/types";
import type {
  AccountObserver,
  ConnectionStatus,
  NetworkRef,
  PriceOracle,
} from "@stellar-compass/horizon";
import {
  buildPortfolio,
  matchOpportunities,
  optimizeAllocation,
  scoreProtocol,
} from "@stellar-compass/analytics";
import type { AllocationPlan, RiskScore } from "@stellar-compass/analytics";
import type { Notifier, DispatchResult } from "@stellar-compass/notifier";
import type { OpportunitySource, PortfolioSource } from "@stellar-compass/agents";

// =============================================================================
// Config
// =============================================================================

export interface CompassServiceConfig {
  readonly network: NetworkRef;
  readonly observer: AccountObserver;
  readonly oracle: PriceOracle;
  readonly notifier: Notifier;
  readonly logger: Logger;
  readonly idleThresholdDays: number;
  readonly defaultRiskTolerance: RiskTolerance;

  /** Injectable for tests */
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class CompassService implements PortfolioSource, OpportunitySource {
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly config: CompassServiceConfig) {
    this.log = config.logger.child({ component: "compass-service" });
    this.clock = config.clock ?? (() => new Date());
  }

  get network(): NetworkRef {
    return this.config.network;
  }

  get defaultRiskTolerance(): RiskTolerance {
    return this.config.defaultRiskTolerance;
  }

  horizonStatus(): Promise<ConnectionStatus> {
    return this.config.observer.getStatus();
  }

  // ─── Agent sources ─────────────────────────────────────────────────

  async getPortfolio(address: WalletAddress): Promise<Portfolio> {
    const { observer, oracle, idleThresholdDays } = this.config;
    const [snapshot, lastActivity] = await Promise.all([
      observer.getAccount(address),
      observer.getLastActivity(address),
    ]);

    return buildPortfolio(snapshot, lastActivity, oracle, {
      idleThresholdDays,
      now: this.clock(),
    });
  }

  async getOpportunities(
    address: WalletAddress,
    tolerance: RiskTolerance,
  ): Promise<readonly Opportunity[]> {
    const portfolio = await this.getPortfolio(address);
    return matchOpportunities(portfolio.assets, tolerance);
  }

  // ─── API operations ────────────────────────────────────────────────

  /**
   * Portfolio for the API; emails a summary in the background.
   */
  async analyzePortfolio(address: WalletAddress): Promise<Portfolio> {
    const portfolio = await this.getPortfolio(address);
    this.log.info(
      {
        address: shortenAddress(address),
        assets: portfolio.assets.length,
        idle: portfolio.idleAssets.length,
      },
      "portfolio analyzed",
    );

    void this.config.notifier.notifyPortfolio(portfolio);
    return portfolio;
  }

  /**
   * Opportunities for the API; emails the top ones in the background.
   */
  async findOpportunities(
    address: WalletAddress,
    tolerance: RiskTolerance = this.config.defaultRiskTolerance,
  ): Promise<readonly Opportunity[]> {
    const opportunities = await this.getOpportunities(address, tolerance);
    this.log.info(
      { address: shortenAddress(address), tolerance, count: opportunities.length },
      "opportunities matched",
    );

    if (opportunities.length > 0) {
      void this.config.notifier.notifyOpportunities(opportunities);
    }
    return opportunities;
  }

  scoreRisk(protocol: string): RiskScore {
    return scoreProtocol(protocol);
  }

  async optimize(
    address: WalletAddress,
    tolerance: RiskTolerance = this.config.defaultRiskTolerance,
  ): Promise<AllocationPlan> {
    const portfolio = await this.getPortfolio(address);
    const opportunities = matchOpportunities(portfolio.assets, tolerance);
    return optimizeAllocation(portfolio.assets, opportunities, tolerance);
  }

  walletConnected(address: WalletAddress, walletType: string): Promise<DispatchResult> {
    return this.config.notifier.notifyWalletConnected(address, walletType);
  }

  sendTestNotification(): Promise<DispatchResult> {
    return this.config.notifier.sendTest();
  }
}
