import { describe, it, expect } from "vitest";
import { scoreProtocol, riskLevelForScore, computeFactors } from "../src/risk.js";
import type { Protocol } from "../src/protocols.js";

describe("riskLevelForScore", () => {
  it("uses 30 and 60 as the level boundaries", () => {
    expect(riskLevelForScore(0)).toBe("LOW");
    expect(riskLevelForScore(29.99)).toBe("LOW");
    expect(riskLevelForScore(30)).toBe("MODERATE");
    expect(riskLevelForScore(59.99)).toBe("MODERATE");
    expect(riskLevelForScore(60)).toBe("HIGH");
  });
});

describe("computeFactors", () => {
  it("floors time and TVL factors at zero", () => {
    expect(
      computeFactors({ timeActiveDays: 2000, tvlUsd: 90_000_000, auditStatus: "audited", exploitHistory: [] }),
    ).toEqual({ timeActive: 0, tvl: 0, audit: 0, exploits: 0 });
  });

  it("charges 50 for an unaudited protocol and 30 per exploit", () => {
    const factors = computeFactors({
      timeActiveDays: 500,
      tvlUsd: 10_000_000,
      auditStatus: "pending",
      exploitHistory: ["bridge drain", "oracle manipulation"],
    });

    expect(factors).toEqual({ timeActive: 50, tvl: 80, audit: 50, exploits: 60 });
  });
});

describe("scoreProtocol", () => {
  it("scores Aquarius as low risk", () => {
    expect(scoreProtocol("Aquarius")).toEqual({
      protocol: "Aquarius",
      overallScore: 9.25,
      riskLevel: "LOW",
      factors: { timeActive: 27, tvl: 10, audit: 0, exploits: 0 },
      recommendation: "Recommended",
    });
  });

  it("scores the pending-audit aggregator as moderate", () => {
    const score = scoreProtocol("Yndx Finance");

    expect(score.overallScore).toBe(55.5);
    expect(score.riskLevel).toBe("MODERATE");
    expect(score.recommendation).toBe("Use caution");
  });

  it("scores unknown protocols on empty metrics", () => {
    const score = scoreProtocol("Nonexistent");

    expect(score.factors).toEqual({ timeActive: 100, tvl: 100, audit: 50, exploits: 0 });
    expect(score.overallScore).toBe(62.5);
    expect(score.riskLevel).toBe("HIGH");
    expect(score.recommendation).toBe("Use caution");
  });

  it("recommends only below 50", () => {
    const fresh: Protocol = {
      name: "Fresh",
      type: "lending",
      assets: ["XLM"],
      apy: 4,
      riskLevel: "LOW",
      description: "New lending market",
      metrics: { timeActiveDays: 0, tvlUsd: 0, auditStatus: "audited", exploitHistory: [] },
    };

    const score = scoreProtocol("Fresh", [fresh]);
    expect(score.overallScore).toBe(50);
    expect(score.recommendation).toBe("Use caution");
  });
});
