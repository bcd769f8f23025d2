/**
 * Protocol catalog.
 *
 * Yield sources on Stellar that opportunities are matched against, with the
 * metrics the risk scorer reads. Figures are reference values, not live data.
 */

import type { RiskLevel, YieldType } from "@stellar-compass/types";

export type AuditStatus = "audited" | "pending" | "unaudited";

export interface ProtocolMetrics {
  readonly timeActiveDays: number;
  readonly tvlUsd: number;
  readonly auditStatus: AuditStatus;

  /** One entry per known incident */
  readonly exploitHistory: readonly string[];
}

export interface Protocol {
  readonly name: string;
  readonly type: YieldType;

  /** Asset codes the protocol accepts */
  readonly assets: readonly string[];

  /** Base APY, percent */
  readonly apy: number;
  readonly riskLevel: RiskLevel;
  readonly description: string;
  readonly url?: string | undefined;
  readonly metrics: ProtocolMetrics;
}

export const PROTOCOLS: readonly Protocol[] = [
  {
    name: "Aquarius",
    type: "liquidity_pool",
    assets: ["XLM", "USDC", "USDT"],
    apy: 12.5,
    riskLevel: "MODERATE",
    description: "Provide liquidity to AMM pools and earn AQUA rewards",
    url: "https://aqua.network",
    metrics: { timeActiveDays: 730, tvlUsd: 45_000_000, auditStatus: "audited", exploitHistory: [] },
  },
  {
    name: "Stellar Lend",
    type: "lending",
    assets: ["XLM", "USDC"],
    apy: 8.3,
    riskLevel: "LOW",
    description: "Lend assets to borrowers and earn interest",
    metrics: { timeActiveDays: 365, tvlUsd: 12_000_000, auditStatus: "audited", exploitHistory: [] },
  },
  {
    name: "Ultrastellar",
    type: "staking",
    assets: ["XLM"],
    apy: 5.2,
    riskLevel: "LOW",
    description: "Stake your XLM and earn passive rewards",
    url: "https://ultrastellar.com",
    metrics: { timeActiveDays: 900, tvlUsd: 8_500_000, auditStatus: "audited", exploitHistory: [] },
  },
  {
    name: "StellarX AMM",
    type: "liquidity_pool",
    assets: ["XLM", "USDC", "BTC", "ETH"],
    apy: 15.8,
    riskLevel: "MODERATE",
    description: "Earn trading fees by providing liquidity on StellarX",
    url: "https://www.stellarx.com",
    metrics: { timeActiveDays: 1095, tvlUsd: 28_000_000, auditStatus: "audited", exploitHistory: [] },
  },
  {
    name: "Yndx Finance",
    type: "yield_aggregator",
    assets: ["XLM", "USDC"],
    apy: 10.2,
    riskLevel: "MODERATE",
    description: "Auto-compound yield across Stellar pools",
    metrics: { timeActiveDays: 180, tvlUsd: 5_000_000, auditStatus: "pending", exploitHistory: [] },
  },
];

const ACTION_LABELS: Readonly<Record<YieldType, string>> = {
  liquidity_pool: "Provide Liquidity",
  lending: "Lend",
  staking: "Stake",
  yield_aggregator: "Deposit",
};

export function actionLabel(type: YieldType): string {
  return ACTION_LABELS[type];
}

/**
 * Case-sensitive lookup by protocol name.
 */
export function findProtocol(
  name: string,
  protocols: readonly Protocol[] = PROTOCOLS,
): Protocol | undefined {
  return protocols.find((p) => p.name === name);
}
