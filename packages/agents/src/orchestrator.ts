/**
 * AgentOrchestrator: runs the monitoring agents for one address and routes
 * their alerts.
 *
 * Routing rules:
 * - every alert is kept in a bounded history (newest last)
 * - email when email notifications are on
 * - SMS only for HIGH / CRITICAL, when SMS is on and a phone number is set
 */

import type { Logger } from "pino";
import type { PriceOracle } from "@stellar-compass/horizon";
import type { Alert, WalletAddress } from "@stellar-compass/types";
import { shortenAddress } from "@stellar-compass/types";
import type { AlertRouting, DispatchResult } from "@stellar-compass/notifier";
import type { Agent } from "./agent.js";
import {
  ConcentrationMonitor,
  IdleAssetMonitor,
  OpportunityScout,
  PriceMovementMonitor,
} from "./monitors.js";
import type {
  AgentSettings,
  Clock,
  OpportunitySource,
  PortfolioSource,
} from "./types.js";

export const ALERT_HISTORY_LIMIT = 100;
export const DEFAULT_ALERT_LIMIT = 20;

/**
 * The notifier surface the orchestrator needs.
 */
export interface AlertNotifier {
  sendAlert(alert: Alert, routing: AlertRouting): Promise<DispatchResult>;
}

export interface OrchestratorDeps {
  readonly portfolios: PortfolioSource;
  readonly opportunities: OpportunitySource;
  readonly oracle: PriceOracle;
  readonly notifier: AlertNotifier;
  readonly logger: Logger;

  /** Interval for the 5-minute agents; the concentration monitor runs at twice this */
  readonly intervalMs?: number | undefined;
  readonly clock?: Clock | undefined;
}

export class AgentOrchestrator {
  private agents: Agent[] = [];
  private history: Alert[] = [];
  private _settings: AgentSettings;
  private readonly log: Logger;

  constructor(
    readonly address: WalletAddress,
    settings: AgentSettings,
    private readonly deps: OrchestratorDeps,
  ) {
    this._settings = settings;
    this.log = deps.logger.child({ component: "agents", address: shortenAddress(address) });
  }

  get settings(): AgentSettings {
    return this._settings;
  }

  get active(): boolean {
    return this.agents.length > 0;
  }

  agentNames(): readonly string[] {
    return this.agents.map((a) => a.name);
  }

  activate(): void {
    if (this.active) return;

    const sink = (alert: Alert): Promise<void> => this.handleAlert(alert);
    const options = { logger: this.log, clock: this.deps.clock, intervalMs: this.deps.intervalMs };
    const slowOptions = {
      ...options,
      intervalMs: this.deps.intervalMs !== undefined ? this.deps.intervalMs * 2 : undefined,
    };

    this.agents = [
      new IdleAssetMonitor(this.address, this.deps.portfolios, sink, options),
      new OpportunityScout(
        this.address,
        this.deps.opportunities,
        () => this._settings.riskTolerance,
        sink,
        options,
      ),
      new ConcentrationMonitor(this.address, this.deps.portfolios, sink, slowOptions),
      new PriceMovementMonitor(this.address, this.deps.portfolios, this.deps.oracle, sink, options),
    ];

    for (const agent of this.agents) agent.start();
    this.log.info({ agents: this.agentNames() }, "agents activated");
  }

  deactivate(): void {
    for (const agent of this.agents) agent.stop();
    this.agents = [];
    this.log.info("agents deactivated");
  }

  /**
   * Record an alert and send it on the enabled channels.
   */
  async handleAlert(alert: Alert): Promise<void> {
    this.history.push(alert);
    if (this.history.length > ALERT_HISTORY_LIMIT) {
      this.history = this.history.slice(-ALERT_HISTORY_LIMIT);
    }

    this.log.info({ priority: alert.priority, type: alert.type }, alert.title);

    const routing = this.routingFor(alert);
    if (routing.email || routing.sms) {
      await this.deps.notifier.sendAlert(alert, routing);
    }
  }

  routingFor(alert: Alert): AlertRouting {
    const { emailNotifications, smsNotifications, phoneNumber } = this._settings;
    const urgent = alert.priority === "HIGH" || alert.priority === "CRITICAL";

    return {
      email: emailNotifications,
      sms: smsNotifications && urgent && Boolean(phoneNumber),
      phone: phoneNumber,
    };
  }

  /**
   * The most recent alerts, oldest first.
   */
  recentAlerts(limit: number = DEFAULT_ALERT_LIMIT): readonly Alert[] {
    if (limit <= 0) return [];
    return this.history.slice(-limit);
  }

  updateSettings(update: Partial<AgentSettings>): AgentSettings {
    this._settings = { ...this._settings, ...definedOnly(update) };
    this.log.info("agent settings updated");
    return this._settings;
  }
}

function definedOnly(update: Partial<AgentSettings>): Partial<AgentSettings> {
  return {
    ...(update.phoneNumber !== undefined ? { phoneNumber: update.phoneNumber } : {}),
    ...(update.riskTolerance !== undefined ? { riskTolerance: update.riskTolerance } : {}),
    ...(update.emailNotifications !== undefined
      ? { emailNotifications: update.emailNotifications }
      : {}),
    ...(update.smsNotifications !== undefined ? { smsNotifications: update.smsNotifications } : {}),
  };
}
