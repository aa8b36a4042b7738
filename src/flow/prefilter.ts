import { logFlow } from "../logging.js";
import { daysBetween } from "../time.js";
import { isCounterTrend, withScore } from "./scoring.js";
import type { FlowLimits, FlowSignal, RejectReason, ScoredSignal, TrendLabel } from "./types.js";

export interface ScreenContext {
  seen: ReadonlySet<string>;
  excluded: ReadonlySet<string>;
  trend: TrendLabel;
  asOf: string;
  limits: FlowLimits;
}

export interface ScreenResult {
  passed: FlowSignal[];
  rejected: Partial<Record<RejectReason, number>>;
}

function bump(rejected: Partial<Record<RejectReason, number>>, reason: RejectReason): void {
  rejected[reason] = (rejected[reason] ?? 0) + 1;
}

/** First reason a signal fails the pre-filter, checked in a fixed order. */
export function rejectReason(signal: FlowSignal, ctx: ScreenContext): RejectReason | null {
  const { limits } = ctx;
  if (ctx.seen.has(signal.id)) return "seen";
  if (signal.premium < limits.minPremium) return "premium_below_floor";
  if (ctx.excluded.has(signal.underlying.toUpperCase())) return "excluded_ticker";

  const dte = daysBetween(ctx.asOf, signal.expiration);
  if (dte < limits.minDte || dte > limits.maxDte) return "dte_out_of_window";

  if (signal.openInterest < limits.minOpenInterest) return "low_open_interest";
  if (signal.underlyingPrice !== null) {
    const distance = Math.abs(signal.strike - signal.underlyingPrice) / signal.underlyingPrice;
    if (distance > limits.maxStrikeDistancePct) return "strike_too_far";
  }
  if (isCounterTrend(signal.optionType, ctx.trend)) return "counter_trend";
  return null;
}

/** Steps (a)-(e): dedupe, premium floor, exclusion list, DTE window, quality checks. */
export function screen(signals: readonly FlowSignal[], ctx: ScreenContext): ScreenResult {
  const passed: FlowSignal[] = [];
  const rejected: Partial<Record<RejectReason, number>> = {};
  for (const signal of signals) {
    const reason = rejectReason(signal, ctx);
    if (reason) {
      bump(rejected, reason);
      logFlow.debug({ id: signal.id, underlying: signal.underlying, reason }, "Signal rejected");
      continue;
    }
    passed.push(signal);
  }
  return { passed, rejected };
}

export interface RankResult {
  candidates: ScoredSignal[];
  rejected: Partial<Record<RejectReason, number>>;
}

/**
 * Score, apply the minimum, and keep the best `scanLimit`.
 * Ties break on premium then id so the order never depends on input order.
 */
export function rank(
  signals: readonly FlowSignal[],
  ctx: { trend: TrendLabel; asOf: string; limits: FlowLimits },
): RankResult {
  const rejected: Partial<Record<RejectReason, number>> = {};
  const scored: ScoredSignal[] = [];
  for (const signal of signals) {
    const s = withScore(signal, { trend: ctx.trend, asOf: ctx.asOf });
    if (s.score < ctx.limits.minScore) {
      bump(rejected, "score_below_minimum");
      logFlow.debug({ id: s.id, score: s.score, factors: s.scoreFactors }, "Signal below minimum score");
      continue;
    }
    scored.push(s);
  }
  scored.sort((a, b) => b.score - a.score || b.premium - a.premium || a.id.localeCompare(b.id));
  const overflow = scored.length - ctx.limits.scanLimit;
  if (overflow > 0) rejected.over_scan_limit = overflow;
  return { candidates: scored.slice(0, ctx.limits.scanLimit), rejected };
}

/** Screen then rank, merging rejection counts. */
export function prefilter(signals: readonly FlowSignal[], ctx: ScreenContext): RankResult {
  const screened = screen(signals, ctx);
  const ranked = rank(screened.passed, ctx);
  return { candidates: ranked.candidates, rejected: { ...screened.rejected, ...ranked.rejected } };
}
