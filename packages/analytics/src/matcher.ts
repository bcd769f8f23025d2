/**
 * Opportunity matcher.
 *
 * Pairs every held asset with each protocol that accepts it and whose risk
 * level fits the user's tolerance. Results are ordered by APY, highest
 * first; equal APYs keep holding order.
 */

import { toRiskTier } from "@stellar-compass/types";
import type {
  AssetBalance,
  Opportunity,
  RiskLevel,
  RiskTolerance,
} from "@stellar-compass/types";
import { PROTOCOLS, actionLabel } from "./protocols.js";
import type { Protocol } from "./protocols.js";

export const ACCEPTED_RISK: Readonly<Record<RiskTolerance, readonly RiskLevel[]>> = {
  conservative: ["LOW"],
  moderate: ["LOW", "MODERATE"],
  aggressive: ["LOW", "MODERATE", "HIGH"],
};

export function fitsTolerance(level: RiskLevel, tolerance: RiskTolerance): boolean {
  return ACCEPTED_RISK[tolerance].includes(level);
}

/** Monthly yield on `value` USD at `apy` percent */
export function monthlyEarnings(value: number, apy: number): number {
  return (value * apy) / 100 / 12;
}

export function matchOpportunities(
  assets: readonly AssetBalance[],
  tolerance: RiskTolerance,
  protocols: readonly Protocol[] = PROTOCOLS,
): Opportunity[] {
  const matches: Opportunity[] = [];

  for (const held of assets) {
    if (held.balance <= 0) continue;

    for (const protocol of protocols) {
      if (!protocol.assets.includes(held.asset)) continue;
      if (!fitsTolerance(protocol.riskLevel, tolerance)) continue;

      matches.push({
        protocol: protocol.name,
        type: protocol.type,
        asset: held.asset,
        riskLevel: protocol.riskLevel,
        risk: toRiskTier(protocol.riskLevel),
        apy: protocol.apy,
        tvl: protocol.metrics.tvlUsd,
        description: protocol.description,
        action: actionLabel(protocol.type),
        potentialMonthlyEarnings: monthlyEarnings(held.value, protocol.apy),
        ...(protocol.url !== undefined ? { url: protocol.url } : {}),
      });
    }
  }

  return matches.sort((a, b) => b.apy - a.apy);
}
