/**
 * Allocation optimizer.
 *
 * Splits the portfolio's value across risk levels by a fixed strategy per
 * tolerance and puts each slice into the best-APY opportunity of that level.
 * Levels without a matching opportunity are left unallocated.
 */

import type {
  AssetBalance,
  Opportunity,
  RiskLevel,
  RiskTolerance,
} from "@stellar-compass/types";

export const ALLOCATION_STRATEGIES: Readonly<
  Record<RiskTolerance, Readonly<Record<RiskLevel, number>>>
> = {
  conservative: { LOW: 0.8, MODERATE: 0.2, HIGH: 0 },
  moderate: { LOW: 0.5, MODERATE: 0.4, HIGH: 0.1 },
  aggressive: { LOW: 0.3, MODERATE: 0.4, HIGH: 0.3 },
};

const RISK_ORDER: readonly RiskLevel[] = ["LOW", "MODERATE", "HIGH"];

export interface Allocation {
  readonly protocol: string;
  readonly asset: string;
  readonly allocationUsd: number;

  /** Share of the portfolio, percent */
  readonly allocationPercentage: number;
  readonly expectedApy: number;
  readonly riskLevel: RiskLevel;
}

export interface AllocationPlan {
  readonly strategy: RiskTolerance;
  readonly allocations: readonly Allocation[];
  readonly totalAllocated: number;
  readonly projectedAnnualReturn: number;
  readonly projectedMonthlyReturn: number;
}

export function optimizeAllocation(
  assets: readonly AssetBalance[],
  opportunities: readonly Opportunity[],
  tolerance: RiskTolerance,
): AllocationPlan {
  const totalValue = assets.reduce((sum, a) => sum + a.value, 0);
  const strategy = ALLOCATION_STRATEGIES[tolerance];
  const allocations: Allocation[] = [];

  for (const level of RISK_ORDER) {
    const share = strategy[level];
    const amount = totalValue * share;
    if (amount <= 0) continue;

    const best = bestByApy(opportunities.filter((o) => o.riskLevel === level));
    if (best === undefined) continue;

    allocations.push({
      protocol: best.protocol,
      asset: best.asset,
      allocationUsd: amount,
      allocationPercentage: share * 100,
      expectedApy: best.apy,
      riskLevel: level,
    });
  }

  const projectedAnnualReturn = allocations.reduce(
    (sum, a) => sum + (a.allocationUsd * a.expectedApy) / 100,
    0,
  );

  return {
    strategy: tolerance,
    allocations,
    totalAllocated: allocations.reduce((sum, a) => sum + a.allocationUsd, 0),
    projectedAnnualReturn,
    projectedMonthlyReturn: projectedAnnualReturn / 12,
  };
}

/** First opportunity with the highest APY */
function bestByApy(candidates: readonly Opportunity[]): Opportunity | undefined {
  let best: Opportunity | undefined;
  for (const candidate of candidates) {
    if (best === undefined || candidate.apy > best.apy) best = candidate;
  }
  return best;
}
