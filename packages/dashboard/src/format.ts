/**
 * Display formatting for the dashboard.
 *
 * Every number the dashboard renders goes through one of these, so the
 * view never calls toFixed() itself.
 */

/**
 * "$123.45". Non-finite values render as "$0.00".
 */
export function formatUsd(value: number): string {
  if (!Number.isFinite(value)) return "$0.00";
  return `$${value.toFixed(2)}`;
}

/** Asset balance with four decimals, e.g. "1000.0000". */
export function formatBalance(balance: number): string {
  return balance.toFixed(4);
}

/** "12.3%" */
export function formatApy(apy: number): string {
  return `${apy.toFixed(1)}%`;
}

const TVL_UNITS: readonly (readonly [number, string])[] = [
  [1_000_000_000, "B"],
  [1_000_000, "M"],
  [1_000, "K"],
];

/**
 * Compact total value locked: "$25.0M", "$1.2B", "$850.00" below a thousand.
 */
export function formatTvl(tvl: number): string {
  for (const [threshold, suffix] of TVL_UNITS) {
    if (tvl >= threshold) {
      return `$${(tvl / threshold).toFixed(1)}${suffix}`;
    }
  }
  return formatUsd(tvl);
}
