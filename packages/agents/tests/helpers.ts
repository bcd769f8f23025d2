/**
 * Fixtures and fakes for agent tests.
 */

import pino from "pino";
import type { PriceOracle } from "@stellar-compass/horizon";
import type { AssetBalance, IdleAsset, Opportunity, Portfolio } from "@stellar-compass/types";
import type { OpportunitySource, PortfolioSource } from "../src/types.js";

export const silentLogger = pino({ level: "silent" });

export const ADDRESS = "GABCD" + "X".repeat(47) + "1234";

export const NOW = new Date("2025-01-15T10:00:00.000Z");
export const clock = (): Date => NOW;

export function asset(code: string, value: number, balance = value): AssetBalance {
  return { asset: code, assetType: code === "XLM" ? "native" : "credit_alphanum4", balance, value };
}

export function idle(code: string, value: number, daysIdle: number): IdleAsset {
  return { ...asset(code, value), daysIdle, opportunityCost: 0 };
}

export function portfolio(assets: AssetBalance[], idleAssets: IdleAsset[] = []): Portfolio {
  return {
    publicKey: ADDRESS,
    totalValue: assets.reduce((sum, a) => sum + a.value, 0),
    assets,
    activeAssets: assets,
    idleAssets,
    sequence: "1",
    lastActivity: null,
    observedAt: NOW.toISOString(),
  };
}

export class FakePortfolios implements PortfolioSource {
  calls = 0;
  constructor(public current: Portfolio | Error) {}

  async getPortfolio(): Promise<Portfolio> {
    this.calls++;
    if (this.current instanceof Error) throw this.current;
    return this.current;
  }
}

export function opportunity(protocol: string, apy: number, assetCode = "XLM"): Opportunity {
  return {
    protocol,
    type: "liquidity_pool",
    asset: assetCode,
    riskLevel: "MODERATE",
    risk: "Medium",
    apy,
    tvl: 1_000_000,
    description: protocol,
    action: "Provide Liquidity",
    potentialMonthlyEarnings: 0,
  };
}

export class FakeOpportunities implements OpportunitySource {
  readonly requests: string[] = [];
  constructor(public current: Opportunity[] = []) {}

  async getOpportunities(_address: string, tolerance: string): Promise<readonly Opportunity[]> {
    this.requests.push(tolerance);
    return this.current;
  }
}

export class FakeOracle implements PriceOracle {
  constructor(public prices: Record<string, number>) {}

  async getPrice(code: string): Promise<number> {
    return this.prices[code] ?? 0;
  }

  async getPrices(codes: readonly string[]): Promise<Readonly<Record<string, number>>> {
    const result: Record<string, number> = {};
    for (const code of codes) result[code] = this.prices[code] ?? 0;
    return result;
  }
}
