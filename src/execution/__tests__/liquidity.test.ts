import { describe, it, expect } from "vitest";
import { checkLiquidity, type LiquidityLimits } from "../liquidity.js";
import { LiquidityRejected } from "../../errors.js";
import { twoSided } from "../../__tests__/helpers.js";

const limits: LiquidityLimits = { maxSpreadPct: 0.15, minBid: 0.1, minBidSize: 10 };

function reasonsFor(quote: Parameters<typeof checkLiquidity>[1]): string[] {
  try {
    checkLiquidity("X", quote, limits);
  } catch (e: unknown) {
    if (e instanceof LiquidityRejected) return e.reasons;
    throw e;
  }
  return [];
}

describe("checkLiquidity", () => {
  it("passes a tight two-sided quote", () => {
    const q = checkLiquidity("X", twoSided(1.0, 1.1), limits);
    expect(q.mid).toBeCloseTo(1.05);
    expect(q.spreadPct).toBeCloseTo(0.0952, 3);
  });

  it("collects every failing condition", () => {
    expect(reasonsFor({ bid: 0.05, ask: 0.5, bidSize: 2, askSize: 2, last: null })).toEqual([
      "spread 163.6% > 15.0%",
      "bid 0.05 < 0.1",
      "bid size 2 < 10",
    ]);
  });

  it("rejects a crossed market", () => {
    expect(reasonsFor(twoSided(1.2, 1.0))).toEqual(["crossed market 1.2/1"]);
  });

  it("rejects a one-sided quote", () => {
    expect(reasonsFor({ bid: null, ask: 1.0, bidSize: null, askSize: 10, last: null })).toEqual(["no two-sided quote"]);
  });
});
