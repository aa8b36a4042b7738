import { describe, it, expect } from "vitest";
import { computeGreeks, greeksFromMark, impliedVolatility, normCdf, theoreticalPrice } from "../greeks.js";

const atm = { spot: 100, strike: 100, dte: 30, iv: 0.3, rate: 0.045, optionType: "call" as const };

describe("normCdf", () => {
  it("matches reference points", () => {
    expect(normCdf(0)).toBeCloseTo(0.5, 7);
    expect(normCdf(1.96)).toBeCloseTo(0.975, 3);
    expect(normCdf(-1.96)).toBeCloseTo(0.025, 3);
  });
});

describe("computeGreeks", () => {
  it("gives an at-the-money call a delta just above one half", () => {
    const g = computeGreeks(atm);
    expect(g.delta).toBeGreaterThan(0.5);
    expect(g.delta).toBeLessThan(0.6);
    expect(g.gamma).toBeGreaterThan(0);
    expect(g.theta).toBeLessThan(0);
    expect(g.vega).toBeGreaterThan(0);
  });

  it("keeps put-call delta parity and shares gamma and vega", () => {
    const call = computeGreeks(atm);
    const put = computeGreeks({ ...atm, optionType: "put" });
    expect(call.delta - put.delta).toBeCloseTo(1, 10);
    expect(put.gamma).toBeCloseTo(call.gamma, 12);
    expect(put.vega).toBeCloseTo(call.vega, 12);
  });

  it("returns zeros for expired or degenerate inputs", () => {
    const zero = { delta: 0, gamma: 0, theta: 0, vega: 0 };
    expect(computeGreeks({ ...atm, dte: 0 })).toEqual(zero);
    expect(computeGreeks({ ...atm, iv: 0 })).toEqual(zero);
    expect(computeGreeks({ ...atm, spot: 0 })).toEqual(zero);
  });
});

describe("theoreticalPrice", () => {
  it("prices an expired option at intrinsic value", () => {
    expect(theoreticalPrice({ ...atm, spot: 110, dte: 0 })).toBe(10);
    expect(theoreticalPrice({ ...atm, spot: 90, dte: 0 })).toBe(0);
  });
});

describe("impliedVolatility", () => {
  it("recovers the volatility a price was generated from", () => {
    const price = theoreticalPrice(atm);
    const iv = impliedVolatility(price, atm);
    expect(iv).not.toBeNull();
    expect(iv ?? 0).toBeCloseTo(0.3, 3);
  });

  it("returns null for prices outside the model range", () => {
    expect(impliedVolatility(0, atm)).toBeNull();
    expect(impliedVolatility(500, atm)).toBeNull();
  });
});

describe("greeksFromMark", () => {
  const args = { spot: 100, strike: 100, dte: 30, optionType: "call" as const, rate: 0.045, fallbackIv: 0.35 };

  it("uses the implied volatility when the mark is solvable", () => {
    const mark = theoreticalPrice({ ...atm, iv: 0.4 });
    const { iv } = greeksFromMark({ ...args, mark });
    expect(iv ?? 0).toBeCloseTo(0.4, 3);
  });

  it("falls back when there is no mark", () => {
    const { greeks, iv } = greeksFromMark({ ...args, mark: null });
    expect(iv).toBe(0.35);
    expect(greeks).toEqual(computeGreeks({ ...atm, iv: 0.35 }));
  });

  it("returns zero greeks without a spot price", () => {
    expect(greeksFromMark({ ...args, spot: null, mark: 3 })).toEqual({
      greeks: { delta: 0, gamma: 0, theta: 0, vega: 0 },
      iv: null,
    });
  });
});
