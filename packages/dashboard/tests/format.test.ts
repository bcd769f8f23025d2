import { describe, it, expect } from "vitest";
import { formatApy, formatBalance, formatTvl, formatUsd } from "../src/format.js";

describe("formatUsd", () => {
  it("renders two decimals with a dollar sign", () => {
    expect(formatUsd(123.45)).toBe("$123.45");
    expect(formatUsd(370.5)).toBe("$370.50");
    expect(formatUsd(0)).toBe("$0.00");
  });

  it("renders non-finite values as zero", () => {
    expect(formatUsd(Number.NaN)).toBe("$0.00");
    expect(formatUsd(Number.POSITIVE_INFINITY)).toBe("$0.00");
  });
});

describe("formatBalance", () => {
  it("renders four decimals", () => {
    expect(formatBalance(1000)).toBe("1000.0000");
    expect(formatBalance(250.5)).toBe("250.5000");
  });
});

describe("formatApy", () => {
  it("renders one decimal and a percent sign", () => {
    expect(formatApy(12.3)).toBe("12.3%");
    expect(formatApy(5)).toBe("5.0%");
  });
});

describe("formatTvl", () => {
  it("uses compact units", () => {
    expect(formatTvl(1_200_000_000)).toBe("$1.2B");
    expect(formatTvl(25_000_000)).toBe("$25.0M");
    expect(formatTvl(12_500)).toBe("$12.5K");
  });

  it("falls back to dollars below a thousand", () => {
    expect(formatTvl(850)).toBe("$850.00");
  });
});
