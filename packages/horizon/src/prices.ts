/**
 * USD price oracle.
 *
 * The shipped oracle is a static table with per-asset overrides from config.
 * Anything that can quote a price (an exchange feed, a Horizon orderbook)
 * plugs in behind the same interface.
 */

export interface PriceOracle {
  /** USD price for one unit of the asset; 0 when the asset has no quote */
  getPrice(asset: string): Promise<number>;

  getPrices(assets: readonly string[]): Promise<Readonly<Record<string, number>>>;
}

export const DEFAULT_PRICES: Readonly<Record<string, number>> = {
  XLM: 0.12,
  USDC: 1,
  USDT: 1,
  BTC: 45000,
  ETH: 2500,
};

/**
 * Parse `CODE:price,CODE:price` into a price map.
 *
 * Throws on malformed pairs or non-finite / negative prices so that a bad
 * PRICE_OVERRIDES value fails at startup.
 */
export function parsePriceOverrides(raw: string): Record<string, number> {
  const prices: Record<string, number> = {};

  for (const pair of raw.split(",")) {
    const trimmed = pair.trim();
    if (trimmed === "") continue;

    const [code, price, ...rest] = trimmed.split(":");
    if (code === undefined || code.trim() === "" || price === undefined || rest.length > 0) {
      throw new Error(`Invalid price override '${trimmed}': expected CODE:price`);
    }

    const value = Number(price);
    if (price.trim() === "" || !Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid price override '${trimmed}': price must be a non-negative number`);
    }

    prices[code.trim().toUpperCase()] = value;
  }

  return prices;
}

export class StaticPriceOracle implements PriceOracle {
  private readonly prices: ReadonlyMap<string, number>;

  constructor(overrides: Readonly<Record<string, number>> = {}) {
    this.prices = new Map(Object.entries({ ...DEFAULT_PRICES, ...overrides }));
  }

  async getPrice(asset: string): Promise<number> {
    return this.prices.get(asset.toUpperCase()) ?? 0;
  }

  async getPrices(assets: readonly string[]): Promise<Readonly<Record<string, number>>> {
    const result: Record<string, number> = {};
    for (const asset of assets) {
      result[asset] = await this.getPrice(asset);
    }
    return result;
  }
}
