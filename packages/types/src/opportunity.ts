/**
 * Opportunity Types
 *
 * Yield sources a portfolio could be moved into, and the risk vocabulary
 * shared by the matcher, the scorer and the optimizer.
 */

/**
 * Internal risk level of a protocol.
 */
export type RiskLevel = "LOW" | "MODERATE" | "HIGH";

/**
 * Risk tier as displayed to the user.
 */
export type RiskTier = "Low" | "Medium" | "High";

/**
 * How much risk the user is willing to take.
 */
export type RiskTolerance = "conservative" | "moderate" | "aggressive";

export type YieldType =
  | "liquidity_pool"
  | "lending"
  | "staking"
  | "yield_aggregator";

/**
 * A protocol position matched against a held asset.
 */
export interface Opportunity {
  readonly protocol: string;
  readonly type: YieldType;
  readonly asset: string;
  readonly riskLevel: RiskLevel;
  readonly risk: RiskTier;

  /** Annual percentage yield, in percent (12.5 = 12.5%) */
  readonly apy: number;

  /** Total value locked, USD */
  readonly tvl: number;

  readonly description: string;

  /** Suggested action label */
  readonly action: string;

  /** Monthly yield on the held asset's USD value at this APY */
  readonly potentialMonthlyEarnings: number;

  /** Protocol website, where one is known */
  readonly url?: string | undefined;
}

const RISK_TIERS: Readonly<Record<RiskLevel, RiskTier>> = {
  LOW: "Low",
  MODERATE: "Medium",
  HIGH: "High",
};

export function toRiskTier(level: RiskLevel): RiskTier {
  return RISK_TIERS[level];
}
