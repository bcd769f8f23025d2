/**
 * Portfolio valuation and idle-asset detection.
 *
 * Turns an account snapshot from Horizon into a valued Portfolio:
 * - each balance line is parsed and priced in USD
 * - positive balances on an account with no activity for at least the
 *   idle threshold are idle; other positive balances are active
 *
 * Rules:
 * - An account with no transactions is idle since the threshold
 * - Idle assets are ordered by opportunity cost, largest first
 * - Assets without a price are valued at 0
 */

import type { AssetBalance, IdleAsset, Portfolio } from "@stellar-compass/types";
import type { AccountSnapshot, PriceOracle } from "@stellar-compass/horizon";

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_IDLE_THRESHOLD_DAYS = 30;

/** APY used to price the yield an idle asset is missing */
export const REFERENCE_APY = 0.08;

const MS_PER_DAY = 86_400_000;

// =============================================================================
// Options
// =============================================================================

export interface PortfolioOptions {
  readonly idleThresholdDays?: number | undefined;

  /** Clock override */
  readonly now?: Date | undefined;
}

// =============================================================================
// Valuation
// =============================================================================

/**
 * Price every balance line of a snapshot.
 */
export async function valueBalances(
  snapshot: AccountSnapshot,
  oracle: PriceOracle,
): Promise<AssetBalance[]> {
  const prices = await oracle.getPrices(snapshot.balances.map((b) => b.asset));

  return snapshot.balances.map((line) => {
    const balance = Number(line.balance);
    const price = prices[line.asset] ?? 0;
    return {
      asset: line.asset,
      assetType: line.assetType,
      ...(line.assetIssuer !== undefined ? { assetIssuer: line.assetIssuer } : {}),
      balance,
      value: balance * price,
    };
  });
}

/**
 * Whole days between the last activity and now.
 * No activity counts as exactly the threshold.
 */
export function daysSince(lastActivity: string | null, now: Date, thresholdDays: number): number {
  if (lastActivity === null) return thresholdDays;

  const last = Date.parse(lastActivity);
  if (Number.isNaN(last)) return thresholdDays;

  return Math.max(0, Math.floor((now.getTime() - last) / MS_PER_DAY));
}

export function opportunityCost(value: number, daysIdle: number): number {
  return value * (REFERENCE_APY / 365) * daysIdle;
}

/**
 * Positive balances that have been idle at least `thresholdDays`,
 * largest opportunity cost first.
 */
export function detectIdleAssets(
  assets: readonly AssetBalance[],
  daysIdle: number,
  thresholdDays: number = DEFAULT_IDLE_THRESHOLD_DAYS,
): IdleAsset[] {
  if (daysIdle < thresholdDays) return [];

  return assets
    .filter((a) => a.balance > 0)
    .map((a) => ({ ...a, daysIdle, opportunityCost: opportunityCost(a.value, daysIdle) }))
    .sort((a, b) => b.opportunityCost - a.opportunityCost);
}

/**
 * Build a valued portfolio from an account snapshot and its last activity.
 */
export async function buildPortfolio(
  snapshot: AccountSnapshot,
  lastActivity: string | null,
  oracle: PriceOracle,
  options: PortfolioOptions = {},
): Promise<Portfolio> {
  const threshold = options.idleThresholdDays ?? DEFAULT_IDLE_THRESHOLD_DAYS;
  const now = options.now ?? new Date();

  const assets = await valueBalances(snapshot, oracle);
  const totalValue = assets.reduce((sum, a) => sum + a.value, 0);

  const idleAssets = detectIdleAssets(assets, daysSince(lastActivity, now, threshold), threshold);
  const idle = new Set(idleAssets.map((a) => assetKey(a)));
  const activeAssets = assets.filter((a) => a.balance > 0 && !idle.has(assetKey(a)));

  return {
    publicKey: snapshot.address,
    totalValue,
    assets,
    activeAssets,
    idleAssets,
    sequence: snapshot.sequence,
    lastActivity,
    observedAt: snapshot.observedAt,
  };
}

function assetKey(asset: AssetBalance): string {
  return `${asset.asset}:${asset.assetIssuer ?? ""}`;
}
