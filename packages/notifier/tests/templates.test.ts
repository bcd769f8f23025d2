import { describe, it, expect } from "vitest";
import type { Alert, Opportunity, Portfolio } from "@stellar-compass/types";
import {
  escapeHtml,
  walletDisplayName,
  walletConnectedEmail,
  walletConnectedSms,
  portfolioSummaryEmail,
  opportunitiesEmail,
  alertEmail,
  alertSms,
} from "../src/templates.js";
import { ADDRESS } from "./helpers.js";

function opportunity(protocol: string, apy: number): Opportunity {
  return {
    protocol,
    type: "lending",
    asset: "XLM",
    riskLevel: "LOW",
    risk: "Low",
    apy,
    tvl: 1_000_000,
    description: `${protocol} lending`,
    action: "Lend",
    potentialMonthlyEarnings: 1,
  };
}

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;",
    );
  });
});

describe("walletDisplayName", () => {
  it("uses the known display names", () => {
    expect(walletDisplayName("xbull")).toBe("xBull");
    expect(walletDisplayName("manual")).toBe("Manual (Lobstr/Other)");
  });

  it("capitalizes unknown wallet types", () => {
    expect(walletDisplayName("lobstr")).toBe("Lobstr");
    expect(walletDisplayName("")).toBe("Unknown");
  });
});

describe("wallet connection messages", () => {
  it("builds the SMS with a shortened address", () => {
    expect(walletConnectedSms(ADDRESS, "freighter")).toBe(
      "Stellar Compass: Freighter connected successfully! Address: GABCDXXX...XXXX1234",
    );
  });

  it("names the wallet and network in the email", () => {
    const email = walletConnectedEmail(ADDRESS, "albedo", "Stellar Testnet");

    expect(email.subject).toBe("Stellar Compass: Wallet Connected Successfully");
    expect(email.text).toContain("Wallet Type: Albedo");
    expect(email.text).toContain("Public Key: GABCDXXX...XXXX1234");
    expect(email.html).toContain("<p><strong>Network:</strong> Stellar Testnet</p>");
  });
});

describe("portfolioSummaryEmail", () => {
  const assets = ["XLM", "USDC", "USDT", "BTC", "ETH", "AQUA", "yXLM"].map((asset, i) => ({
    asset,
    assetType: "credit_alphanum4" as const,
    balance: i + 0.5,
    value: i,
  }));

  const portfolio: Portfolio = {
    publicKey: ADDRESS,
    totalValue: 123.456,
    assets,
    activeAssets: assets.slice(0, 4),
    idleAssets: [],
    sequence: "1",
    lastActivity: null,
    observedAt: "2025-01-01T00:00:00.000Z",
  };

  it("summarizes totals and the first five assets", () => {
    const email = portfolioSummaryEmail(portfolio);

    expect(email.subject).toBe("Your Stellar Portfolio Summary");
    expect(email.text.split("\n")).toEqual([
      "Portfolio analysis complete.",
      "",
      "Total Value: $123.46",
      "Total Assets: 7",
      "Active Assets: 4",
      "Idle Assets: 0",
      "",
      "XLM: 0.5000",
      "USDC: 1.5000",
      "USDT: 2.5000",
      "BTC: 3.5000",
      "ETH: 4.5000",
      "...and 2 more assets",
    ]);
  });
});

describe("opportunitiesEmail", () => {
  it("lists the top three and counts all", () => {
    const email = opportunitiesEmail([
      opportunity("A", 9),
      opportunity("B", 8),
      opportunity("C", 7),
      opportunity("D", 6),
    ]);

    expect(email.subject).toBe("4 DeFi Opportunities Available");
    expect(email.text).toContain("C (XLM)\nC lending\nAPY: 7% | Risk: Low");
    expect(email.text).not.toContain("D (XLM)");
  });
});

describe("alert messages", () => {
  const alert: Alert = {
    type: "RISK_ALERT",
    priority: "CRITICAL",
    title: "Portfolio concentration risk",
    message: "x".repeat(200),
    action: "Review Position",
    timestamp: "2025-01-01T00:00:00.000Z",
  };

  it("prefixes the subject with the priority", () => {
    expect(alertEmail(alert).subject).toBe("[CRITICAL] Portfolio concentration risk");
  });

  it("truncates the SMS message to 120 characters", () => {
    expect(alertSms(alert)).toBe(`[CRITICAL] Stellar Compass: ${"x".repeat(120)}`);
  });
});
