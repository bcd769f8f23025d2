import { describe, it, expect } from "vitest";
import { StaticPriceOracle } from "@stellar-compass/horizon";
import type { AccountSnapshot } from "@stellar-compass/horizon";
import {
  buildPortfolio,
  valueBalances,
  daysSince,
  detectIdleAssets,
  opportunityCost,
} from "../src/portfolio.js";

const ADDRESS = "GABCD" + "X".repeat(47) + "1234";
const NOW = new Date("2025-03-31T00:00:00.000Z");

function snapshot(): AccountSnapshot {
  return {
    networkId: "stellar:pubnet",
    address: ADDRESS,
    sequence: "987654321",
    observedAt: "2025-03-31T00:00:00.000Z",
    balances: [
      { asset: "XLM", assetType: "native", balance: "1000.0000000" },
      { asset: "USDC", assetType: "credit_alphanum4", assetIssuer: "GISSUER", balance: "250.5000000" },
      { asset: "AQUA", assetType: "credit_alphanum4", assetIssuer: "GAQUA", balance: "10.0000000" },
      { asset: "USDT", assetType: "credit_alphanum4", assetIssuer: "GTETHER", balance: "0.0000000" },
    ],
  };
}

describe("valueBalances", () => {
  it("parses balances and prices them in USD", async () => {
    const assets = await valueBalances(snapshot(), new StaticPriceOracle());

    expect(assets).toEqual([
      { asset: "XLM", assetType: "native", balance: 1000, value: 120 },
      { asset: "USDC", assetType: "credit_alphanum4", assetIssuer: "GISSUER", balance: 250.5, value: 250.5 },
      { asset: "AQUA", assetType: "credit_alphanum4", assetIssuer: "GAQUA", balance: 10, value: 0 },
      { asset: "USDT", assetType: "credit_alphanum4", assetIssuer: "GTETHER", balance: 0, value: 0 },
    ]);
  });
});

describe("daysSince", () => {
  it("counts whole days", () => {
    expect(daysSince("2025-03-01T00:00:00Z", NOW, 30)).toBe(30);
    expect(daysSince("2025-03-01T00:00:01Z", NOW, 30)).toBe(29);
  });

  it("treats no activity as the threshold", () => {
    expect(daysSince(null, NOW, 45)).toBe(45);
  });

  it("never goes negative", () => {
    expect(daysSince("2025-04-02T00:00:00Z", NOW, 30)).toBe(0);
  });
});

describe("detectIdleAssets", () => {
  const assets = [
    { asset: "XLM", assetType: "native" as const, balance: 1000, value: 120 },
    { asset: "USDC", assetType: "credit_alphanum4" as const, balance: 500, value: 500 },
    { asset: "USDT", assetType: "credit_alphanum4" as const, balance: 0, value: 0 },
  ];

  it("is empty below the threshold", () => {
    expect(detectIdleAssets(assets, 29, 30)).toEqual([]);
  });

  it("flags positive balances at exactly the threshold", () => {
    const idle = detectIdleAssets(assets, 30, 30);

    expect(idle.map((a) => a.asset)).toEqual(["USDC", "XLM"]);
    expect(idle[0]?.daysIdle).toBe(30);
    expect(idle[0]?.opportunityCost).toBeCloseTo(500 * (0.08 / 365) * 30, 10);
  });
});

describe("opportunityCost", () => {
  it("applies the 8% reference APY per idle day", () => {
    expect(opportunityCost(365, 10)).toBeCloseTo(0.8, 10);
    expect(opportunityCost(1000, 0)).toBe(0);
  });
});

describe("buildPortfolio", () => {
  it("marks every positive balance idle after 30 quiet days", async () => {
    const portfolio = await buildPortfolio(
      snapshot(),
      "2025-03-01T00:00:00.000Z",
      new StaticPriceOracle(),
      { now: NOW },
    );

    expect(portfolio.publicKey).toBe(ADDRESS);
    expect(portfolio.totalValue).toBe(370.5);
    expect(portfolio.sequence).toBe("987654321");
    expect(portfolio.lastActivity).toBe("2025-03-01T00:00:00.000Z");
    expect(portfolio.assets).toHaveLength(4);
    expect(portfolio.idleAssets.map((a) => a.asset)).toEqual(["USDC", "XLM", "AQUA"]);
    expect(portfolio.activeAssets).toEqual([]);
  });

  it("keeps recently used balances active", async () => {
    const portfolio = await buildPortfolio(
      snapshot(),
      "2025-03-02T00:00:00.000Z",
      new StaticPriceOracle(),
      { now: NOW },
    );

    expect(portfolio.idleAssets).toEqual([]);
    expect(portfolio.activeAssets.map((a) => a.asset)).toEqual(["XLM", "USDC", "AQUA"]);
  });

  it("treats an account without transactions as idle", async () => {
    const portfolio = await buildPortfolio(snapshot(), null, new StaticPriceOracle(), {
      now: NOW,
      idleThresholdDays: 60,
    });

    expect(portfolio.idleAssets).toHaveLength(3);
    expect(portfolio.idleAssets[0]?.daysIdle).toBe(60);
  });

  it("respects the configured threshold", async () => {
    const portfolio = await buildPortfolio(
      snapshot(),
      "2025-03-01T00:00:00.000Z",
      new StaticPriceOracle(),
      { now: NOW, idleThresholdDays: 31 },
    );

    expect(portfolio.idleAssets).toEqual([]);
  });

  it("uses price overrides", async () => {
    const portfolio = await buildPortfolio(
      snapshot(),
      null,
      new StaticPriceOracle({ XLM: 0.5, AQUA: 2 }),
      { now: NOW },
    );

    expect(portfolio.totalValue).toBe(500 + 250.5 + 20);
  });
});
