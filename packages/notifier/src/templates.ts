/**
 * Message templates.
 *
 * Every email has a plain-text and an HTML body. Interpolated values are
 * HTML-escaped; SMS bodies are plain text kept under one segment where
 * the content allows.
 */

import {
  WALLET_DISPLAY_NAMES,
  isWalletType,
  shortenAddress,
} from "@stellar-compass/types";
import type { Alert, Opportunity, Portfolio } from "@stellar-compass/types";
import type { EmailContent } from "./channels.js";

/** Assets listed in a portfolio summary */
export const SUMMARY_ASSET_LIMIT = 5;

/** Opportunities listed in an opportunities email */
export const TOP_OPPORTUNITIES = 3;

/** Alert message characters kept in an SMS */
export const SMS_MESSAGE_LIMIT = 120;

// =============================================================================
// Helpers
// =============================================================================

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function layout(heading: string, body: string, footer: string): string {
  return [
    `<html><body style="font-family: Arial, sans-serif; padding: 20px;">`,
    `<h2 style="color: #667eea;">${escapeHtml(heading)}</h2>`,
    body,
    `<p style="color: #666; font-size: 12px;">${escapeHtml(footer)}</p>`,
    `</body></html>`,
  ].join("\n");
}

/**
 * Display name for a wallet type; unknown types are capitalized.
 */
export function walletDisplayName(walletType: string): string {
  if (isWalletType(walletType)) return WALLET_DISPLAY_NAMES[walletType];
  if (walletType === "") return "Unknown";
  return walletType.charAt(0).toUpperCase() + walletType.slice(1);
}

// =============================================================================
// Wallet connection
// =============================================================================

export function walletConnectedEmail(
  address: string,
  walletType: string,
  networkName: string,
): EmailContent {
  const wallet = walletDisplayName(walletType);
  const short = shortenAddress(address);

  return {
    subject: "Stellar Compass: Wallet Connected Successfully",
    text: [
      "Wallet connected successfully.",
      "",
      `Wallet Type: ${wallet}`,
      `Public Key: ${short}`,
      `Network: ${networkName}`,
      "",
      "Your portfolio is being analyzed and DeFi opportunities are loading.",
    ].join("\n"),
    html: layout(
      "Wallet Connected Successfully!",
      [
        `<p><strong>Wallet Type:</strong> ${escapeHtml(wallet)}</p>`,
        `<p><strong>Public Key:</strong> ${escapeHtml(short)}</p>`,
        `<p><strong>Network:</strong> ${escapeHtml(networkName)}</p>`,
        `<ul><li>Your portfolio is being analyzed</li><li>DeFi opportunities are loading</li></ul>`,
      ].join("\n"),
      "This notification was sent by Stellar Compass.",
    ),
  };
}

export function walletConnectedSms(address: string, walletType: string): string {
  return `Stellar Compass: ${walletDisplayName(walletType)} connected successfully! Address: ${shortenAddress(address)}`;
}

// =============================================================================
// Portfolio
// =============================================================================

export function portfolioSummaryEmail(portfolio: Portfolio): EmailContent {
  const total = portfolio.totalValue.toFixed(2);
  const listed = portfolio.assets.slice(0, SUMMARY_ASSET_LIMIT);
  const more = portfolio.assets.length - listed.length;

  const lines = listed.map((a) => `${a.asset}: ${a.balance.toFixed(4)}`);
  if (more > 0) lines.push(`...and ${more} more assets`);

  const counts = [
    `Total Value: $${total}`,
    `Total Assets: ${portfolio.assets.length}`,
    `Active Assets: ${portfolio.activeAssets.length}`,
    `Idle Assets: ${portfolio.idleAssets.length}`,
  ];

  return {
    subject: "Your Stellar Portfolio Summary",
    text: ["Portfolio analysis complete.", "", ...counts, "", ...lines].join("\n"),
    html: layout(
      "Portfolio Analysis Complete",
      [
        ...counts.map((c) => `<p>${escapeHtml(c)}</p>`),
        `<h3>Your Assets</h3>`,
        ...lines.map((l) => `<p>${escapeHtml(l)}</p>`),
      ].join("\n"),
      "Portfolio data fetched from Stellar Horizon.",
    ),
  };
}

// =============================================================================
// Opportunities
// =============================================================================

export function opportunitiesEmail(opportunities: readonly Opportunity[]): EmailContent {
  const top = opportunities.slice(0, TOP_OPPORTUNITIES);

  const text = top.map((o) =>
    [`${o.protocol} (${o.asset})`, o.description, `APY: ${o.apy}% | Risk: ${o.risk}`].join("\n"),
  );

  const html = top.map((o) =>
    [
      `<div style="border-left: 4px solid #4caf50; padding: 10px; margin: 10px 0;">`,
      `<h3>${escapeHtml(o.protocol)} (${escapeHtml(o.asset)})</h3>`,
      `<p>${escapeHtml(o.description)}</p>`,
      `<p>APY: ${o.apy}% | Risk: ${escapeHtml(o.risk)}</p>`,
      o.url !== undefined ? `<a href="${escapeHtml(o.url)}">Learn More</a>` : "",
      `</div>`,
    ].join("\n"),
  );

  const intro = `We found ${opportunities.length} opportunities to earn yield on your assets:`;

  return {
    subject: `${opportunities.length} DeFi Opportunities Available`,
    text: [intro, "", ...text].join("\n"),
    html: layout(
      "DeFi Opportunities for You",
      [`<p>${escapeHtml(intro)}</p>`, ...html].join("\n"),
      "Always do your own research before investing in DeFi protocols.",
    ),
  };
}

// =============================================================================
// Alerts
// =============================================================================

export function alertEmail(alert: Alert): EmailContent {
  return {
    subject: `[${alert.priority}] ${alert.title}`,
    text: [alert.title, "", alert.message, "", `Suggested action: ${alert.action}`].join("\n"),
    html: layout(
      alert.title,
      [
        `<p>${escapeHtml(alert.message)}</p>`,
        `<p><strong>Suggested action:</strong> ${escapeHtml(alert.action)}</p>`,
      ].join("\n"),
      `Alert raised ${alert.timestamp}.`,
    ),
  };
}

export function alertSms(alert: Alert): string {
  return `[${alert.priority}] Stellar Compass: ${alert.message.slice(0, SMS_MESSAGE_LIMIT)}`;
}

// =============================================================================
// Test message
// =============================================================================

export function testEmail(): EmailContent {
  return {
    subject: "Test Notification from Stellar Compass",
    text: "If you're reading this, your email notifications are working.",
    html: layout(
      "Test Successful!",
      "<p>If you're reading this, your email notifications are working.</p>",
      "Sent from the Stellar Compass test endpoint.",
    ),
  };
}

export const TEST_SMS = "Test notification from Stellar Compass - Your SMS is working!";
