import { describe, it, expect } from "vitest";
import { MAX_SCORE, scoreSignal, withScore } from "../scoring.js";
import { makeSignal } from "../../__tests__/helpers.js";

const neutral = { trend: "neutral" as const, asOf: "2025-02-20" };

describe("scoreSignal", () => {
  it("scores a $150K opening sweep at vol/OI 2.0 as 5", () => {
    const signal = makeSignal({ premium: 150_000, isSweep: true, isOpening: true, volOiRatio: 2.0 });
    const result = scoreSignal(signal, neutral);
    expect(result.score).toBe(5);
    expect(result.factors).toEqual(["sweep", "opening", "volOiMid"]);
  });

  it("is independent of evaluation order", () => {
    const a = makeSignal({ id: "a", isSweep: true, premium: 600_000 });
    const b = makeSignal({ id: "b", isFloor: true, volOiRatio: 4 });
    const first = [a, b].map((s) => scoreSignal(s, neutral).score);
    const second = [b, a].map((s) => scoreSignal(s, neutral).score).reverse();
    expect(first).toEqual(second);
  });

  it("adds the trend bonus for aligned flow and the penalty for counter-trend", () => {
    const call = makeSignal({ isSweep: true, isOpening: true });
    expect(scoreSignal(call, { ...neutral, trend: "bullish" }).score).toBe(2 + 2 + 1 + 1);
    expect(scoreSignal(call, { ...neutral, trend: "bearish" }).score).toBe(2 + 2 + 1 - 3);
  });

  it("penalises high IV rank and short expirations", () => {
    const signal = makeSignal({ isSweep: true, isFloor: true, isOpening: true, ivRank: 80, expiration: "2025-02-25" });
    // 2 + 2 + 2 + 1 (vol/OI 2.0) - 3 (IV rank) - 2 (5 DTE)
    expect(scoreSignal(signal, neutral)).toEqual({
      score: 2,
      factors: ["sweep", "floor", "opening", "volOiMid", "highIvRank", "dteVeryShort"],
    });
  });

  it("clamps to the 0..10 range", () => {
    const strong = makeSignal({
      isSweep: true,
      isFloor: true,
      isOpening: true,
      volOiRatio: 5,
      premium: 1_000_000,
    });
    expect(scoreSignal(strong, { ...neutral, trend: "bullish" }).score).toBe(MAX_SCORE);

    const weak = makeSignal({ volOiRatio: 0.5, isOtm: true, ivRank: 90, expiration: "2025-02-22" });
    expect(scoreSignal(weak, { ...neutral, trend: "bearish" }).score).toBe(0);
  });

  it("withScore freezes the scored signal", () => {
    const scored = withScore(makeSignal({ isSweep: true }), neutral);
    expect(scored.score).toBe(3);
    expect(Object.isFrozen(scored)).toBe(true);
    expect(Object.isFrozen(scored.scoreFactors)).toBe(true);
  });
});
