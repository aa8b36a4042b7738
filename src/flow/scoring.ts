import { daysBetween } from "../time.js";
import type { FlowSignal, ScoredSignal, TrendLabel } from "./types.js";

export const SCORE_WEIGHTS = {
  sweep: 2,
  floor: 2,
  opening: 2,
  volOiHigh: 2,
  volOiMid: 1,
  premiumHigh: 2,
  premiumMid: 1,
  trendAligned: 1,
  counterTrend: -3,
  otm: -1,
  highIvRank: -3,
  dteVeryShort: -2,
  dteShort: -1,
} as const;

export const SCORE_TIERS = {
  volOiHigh: 3,
  volOiMid: 1.5,
  premiumHigh: 500_000,
  premiumMid: 250_000,
  ivRankHigh: 70,
  dteVeryShort: 7,
  dteShort: 14,
} as const;

export const MAX_SCORE = 10;

export interface ScoreContext {
  trend: TrendLabel;
  /** Venue-local evaluation date (YYYY-MM-DD); DTE is measured from here. */
  asOf: string;
}

export interface ScoreBreakdown {
  score: number;
  factors: string[];
}

export function isTrendAligned(optionType: FlowSignal["optionType"], trend: TrendLabel): boolean {
  return (optionType === "call" && trend === "bullish") || (optionType === "put" && trend === "bearish");
}

export function isCounterTrend(optionType: FlowSignal["optionType"], trend: TrendLabel): boolean {
  return (optionType === "call" && trend === "bearish") || (optionType === "put" && trend === "bullish");
}

/**
 * Deterministic weighted-factor score, clamped to [0, MAX_SCORE].
 * Reads nothing but its arguments.
 */
export function scoreSignal(signal: FlowSignal, ctx: ScoreContext): ScoreBreakdown {
  let score = 0;
  const factors: string[] = [];
  const add = (name: keyof typeof SCORE_WEIGHTS) => {
    score += SCORE_WEIGHTS[name];
    factors.push(name);
  };

  if (signal.isSweep) add("sweep");
  if (signal.isFloor) add("floor");
  if (signal.isOpening) add("opening");

  if (signal.volOiRatio >= SCORE_TIERS.volOiHigh) add("volOiHigh");
  else if (signal.volOiRatio >= SCORE_TIERS.volOiMid) add("volOiMid");

  if (signal.premium >= SCORE_TIERS.premiumHigh) add("premiumHigh");
  else if (signal.premium >= SCORE_TIERS.premiumMid) add("premiumMid");

  if (isTrendAligned(signal.optionType, ctx.trend)) add("trendAligned");
  else if (isCounterTrend(signal.optionType, ctx.trend)) add("counterTrend");

  if (signal.isOtm) add("otm");
  if (signal.ivRank !== null && signal.ivRank > SCORE_TIERS.ivRankHigh) add("highIvRank");

  const dte = daysBetween(ctx.asOf, signal.expiration);
  if (dte < SCORE_TIERS.dteVeryShort) add("dteVeryShort");
  else if (dte < SCORE_TIERS.dteShort) add("dteShort");

  return { score: Math.max(0, Math.min(MAX_SCORE, score)), factors };
}

export function withScore(signal: FlowSignal, ctx: ScoreContext): ScoredSignal {
  const { score, factors } = scoreSignal(signal, ctx);
  return Object.freeze({ ...signal, score, scoreFactors: Object.freeze(factors) });
}
