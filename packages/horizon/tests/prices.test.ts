import { describe, it, expect } from "vitest";
import { StaticPriceOracle, parsePriceOverrides, DEFAULT_PRICES } from "../src/prices.js";

describe("StaticPriceOracle", () => {
  it("quotes the default table", async () => {
    const oracle = new StaticPriceOracle();

    expect(await oracle.getPrice("XLM")).toBe(0.12);
    expect(await oracle.getPrice("USDC")).toBe(1);
    expect(await oracle.getPrice("BTC")).toBe(45000);
  });

  it("values unknown assets at zero", async () => {
    const oracle = new StaticPriceOracle();
    expect(await oracle.getPrice("AQUA")).toBe(0);
  });

  it("matches asset codes case-insensitively", async () => {
    const oracle = new StaticPriceOracle();
    expect(await oracle.getPrice("eth")).toBe(2500);
  });

  it("applies overrides on top of the defaults", async () => {
    const oracle = new StaticPriceOracle({ XLM: 0.1, AQUA: 0.002 });

    expect(await oracle.getPrice("XLM")).toBe(0.1);
    expect(await oracle.getPrice("AQUA")).toBe(0.002);
    expect(await oracle.getPrice("USDT")).toBe(1);
    expect(DEFAULT_PRICES["XLM"]).toBe(0.12);
  });

  it("quotes several assets at once, keyed as requested", async () => {
    const oracle = new StaticPriceOracle();

    expect(await oracle.getPrices(["XLM", "usdc", "POOL"])).toEqual({
      XLM: 0.12,
      usdc: 1,
      POOL: 0,
    });
  });
});

describe("parsePriceOverrides", () => {
  it("parses CODE:price pairs", () => {
    expect(parsePriceOverrides("XLM:0.1, aqua:0.002")).toEqual({ XLM: 0.1, AQUA: 0.002 });
  });

  it("ignores empty segments", () => {
    expect(parsePriceOverrides("")).toEqual({});
    expect(parsePriceOverrides("XLM:0.1,,")).toEqual({ XLM: 0.1 });
  });

  it("rejects malformed pairs", () => {
    expect(() => parsePriceOverrides("XLM")).toThrow("expected CODE:price");
    expect(() => parsePriceOverrides("XLM:1:2")).toThrow("expected CODE:price");
    expect(() => parsePriceOverrides(":1")).toThrow("expected CODE:price");
  });

  it("rejects bad prices", () => {
    expect(() => parsePriceOverrides("XLM:abc")).toThrow("non-negative number");
    expect(() => parsePriceOverrides("XLM:-1")).toThrow("non-negative number");
    expect(() => parsePriceOverrides("XLM:")).toThrow("non-negative number");
  });
});
