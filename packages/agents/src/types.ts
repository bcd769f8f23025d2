/**
 * Agent types.
 *
 * Agents read portfolio state through these sources so they can run against
 * Horizon in production and against fixtures in tests.
 */

import type {
  Alert,
  Opportunity,
  Portfolio,
  RiskTolerance,
  WalletAddress,
} from "@stellar-compass/types";

export interface PortfolioSource {
  getPortfolio(address: WalletAddress): Promise<Portfolio>;
}

export interface OpportunitySource {
  getOpportunities(address: WalletAddress, tolerance: RiskTolerance): Promise<readonly Opportunity[]>;
}

/** Receives every alert an agent raises */
export type AlertSink = (alert: Alert) => Promise<void>;

export type Clock = () => Date;

export interface AgentSettings {
  readonly phoneNumber?: string | undefined;
  readonly riskTolerance: RiskTolerance;
  readonly emailNotifications: boolean;
  readonly smsNotifications: boolean;
}

export type AgentErrorCode = "AGENTS_NOT_ACTIVE";

export class AgentError extends Error {
  readonly code: AgentErrorCode;

  constructor(code: AgentErrorCode, message: string) {
    super(message);
    this.name = "AgentError";
    this.code = code;
  }
}
