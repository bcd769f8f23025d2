/**
 * Protocol risk scoring.
 *
 * Four factors, each 0–100 where lower is safer:
 * - time active: 100 minus one point per 10 days live
 * - TVL: 100 minus one point per $500k locked
 * - audit: 0 when audited, 50 otherwise
 * - exploits: 30 per recorded incident
 *
 * The overall score is their mean, rounded to 2 decimals.
 */

import type { RiskLevel } from "@stellar-compass/types";
import { PROTOCOLS, findProtocol } from "./protocols.js";
import type { Protocol, ProtocolMetrics } from "./protocols.js";

export interface RiskFactors {
  readonly timeActive: number;
  readonly tvl: number;
  readonly audit: number;
  readonly exploits: number;
}

export type RiskRecommendation = "Recommended" | "Use caution";

export interface RiskScore {
  readonly protocol: string;
  readonly overallScore: number;
  readonly riskLevel: RiskLevel;
  readonly factors: RiskFactors;
  readonly recommendation: RiskRecommendation;
}

/** Used for protocols the catalog does not know */
export const UNKNOWN_METRICS: ProtocolMetrics = {
  timeActiveDays: 0,
  tvlUsd: 0,
  auditStatus: "unaudited",
  exploitHistory: [],
};

export function riskLevelForScore(score: number): RiskLevel {
  if (score < 30) return "LOW";
  if (score < 60) return "MODERATE";
  return "HIGH";
}

export function computeFactors(metrics: ProtocolMetrics): RiskFactors {
  return {
    timeActive: Math.max(0, 100 - metrics.timeActiveDays / 10),
    tvl: Math.max(0, 100 - metrics.tvlUsd / 500_000),
    audit: metrics.auditStatus === "audited" ? 0 : 50,
    exploits: metrics.exploitHistory.length * 30,
  };
}

export function scoreProtocol(
  name: string,
  protocols: readonly Protocol[] = PROTOCOLS,
): RiskScore {
  const metrics = findProtocol(name, protocols)?.metrics ?? UNKNOWN_METRICS;
  const factors = computeFactors(metrics);
  const mean = (factors.timeActive + factors.tvl + factors.audit + factors.exploits) / 4;
  const overallScore = Math.round(mean * 100) / 100;

  return {
    protocol: name,
    overallScore,
    riskLevel: riskLevelForScore(overallScore),
    factors,
    recommendation: overallScore < 50 ? "Recommended" : "Use caution",
  };
}
