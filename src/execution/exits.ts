import type { TrendLabel } from "../flow/types.js";
import type { HoldingAssessment } from "../oracle/types.js";
import { unrealizedPnlPct, type Position } from "../positions/types.js";
import type { Greeks } from "../risk/types.js";
import { venueDate } from "../time.js";

export type ExitAction = "HOLD" | "CLOSE" | "TRIM" | "ROLL";

export type ExitRuleName =
  | "hard_stop_loss"
  | "hard_profit_target"
  | "expiring"
  | "thesis_trend_reversal"
  | "conviction_collapse"
  | "dte_profit_target"
  | "gamma_risk";

export type ExitRuleKind = "hard" | "soft";

export interface ExitSnapshot {
  /** Current per-unit mark; null when no quote was available. */
  mark: number | null;
  greeks: Greeks;
  dte: number;
  trend: TrendLabel;
  review: HoldingAssessment | null;
  now: Date;
}

export interface ExitRulesConfig {
  stopLossPct: number;
  profitTargetPct: number;
  convictionFloor: number;
  gammaCriticalDte: number;
  gammaRiskThreshold: number;
  disabledRules: readonly string[];
  timezone: string;
}

export interface ExitEvaluation {
  action: ExitAction;
  rule: ExitRuleName | null;
  detail: string;
  /** Set when a soft exit matched but the override kept the position. */
  vetoedBy: "min_hold" | null;
  pnlPct: number | null;
}

interface ExitRule {
  name: ExitRuleName;
  kind: ExitRuleKind;
  check(p: Position, snap: ExitSnapshot, pnl: number | null, cfg: ExitRulesConfig): { action: ExitAction; detail: string } | null;
}

/** Tiered profit target by days to expiry. */
export function dteProfitTarget(dte: number): number {
  if (dte > 14) return 0.5;
  if (dte > 7) return 0.4;
  if (dte > 3) return 0.3;
  return 0.2;
}

function opposesTrend(p: Position, trend: TrendLabel): boolean {
  return (p.optionType === "call" && trend === "bearish") || (p.optionType === "put" && trend === "bullish");
}

const pct = (x: number) => `${(x * 100).toFixed(1)}%`;

/** Evaluated in order; the first match decides. Hard rules lead and cannot be disabled. */
export const EXIT_RULES: readonly ExitRule[] = [
  {
    name: "hard_stop_loss",
    kind: "hard",
    check: (_p, _s, pnl, cfg) =>
      pnl !== null && pnl <= -cfg.stopLossPct ? { action: "CLOSE", detail: `P&L ${pct(pnl)} ≤ -${pct(cfg.stopLossPct)}` } : null,
  },
  {
    name: "hard_profit_target",
    kind: "hard",
    check: (_p, _s, pnl, cfg) =>
      pnl !== null && pnl >= cfg.profitTargetPct ? { action: "CLOSE", detail: `P&L ${pct(pnl)} ≥ ${pct(cfg.profitTargetPct)}` } : null,
  },
  {
    name: "expiring",
    kind: "hard",
    check: (_p, s) => (s.dte <= 1 ? { action: "CLOSE", detail: `DTE ${s.dte}` } : null),
  },
  {
    name: "thesis_trend_reversal",
    kind: "soft",
    check: (p, s) => {
      if (opposesTrend(p, s.trend)) return { action: "CLOSE", detail: `${p.optionType} against ${s.trend} trend` };
      if (s.review && !s.review.thesisIntact) return { action: "CLOSE", detail: s.review.note ?? "thesis no longer intact" };
      return null;
    },
  },
  {
    name: "conviction_collapse",
    kind: "soft",
    check: (_p, s, _pnl, cfg) =>
      s.review && s.review.conviction < cfg.convictionFloor
        ? { action: "CLOSE", detail: `conviction ${s.review.conviction} < ${cfg.convictionFloor}` }
        : null,
  },
  {
    name: "dte_profit_target",
    kind: "soft",
    check: (p, s, pnl) => {
      const target = dteProfitTarget(s.dte);
      if (pnl === null || pnl < target) return null;
      return { action: p.quantity > 1 ? "TRIM" : "CLOSE", detail: `P&L ${pct(pnl)} ≥ ${pct(target)} at DTE ${s.dte}` };
    },
  },
  {
    name: "gamma_risk",
    kind: "soft",
    check: (_p, s, pnl, cfg) => {
      if (s.dte > cfg.gammaCriticalDte || Math.abs(s.greeks.gamma) <= cfg.gammaRiskThreshold) return null;
      if (pnl !== null && pnl >= 0.2) return null;
      return { action: "ROLL", detail: `gamma ${s.greeks.gamma.toFixed(3)} at DTE ${s.dte}` };
    },
  },
];

/** Override predicate: a position opened on the current venue date is not soft-exited. */
export function minHoldApplies(p: Position, now: Date, timezone: string): boolean {
  return venueDate(new Date(p.openedAt), timezone) === venueDate(now, timezone);
}

export function evaluateExit(p: Position, snap: ExitSnapshot, cfg: ExitRulesConfig): ExitEvaluation {
  const mark = snap.mark ?? p.lastMark;
  const pnl = mark === null ? null : unrealizedPnlPct(p, mark);
  const held = minHoldApplies(p, snap.now, cfg.timezone);

  for (const rule of EXIT_RULES) {
    if (rule.kind === "soft" && cfg.disabledRules.includes(rule.name)) continue;
    const hit = rule.check(p, snap, pnl, cfg);
    if (!hit) continue;
    if (rule.kind === "soft" && held) {
      return { action: "HOLD", rule: rule.name, detail: hit.detail, vetoedBy: "min_hold", pnlPct: pnl };
    }
    return { action: hit.action, rule: rule.name, detail: hit.detail, vetoedBy: null, pnlPct: pnl };
  }
  return { action: "HOLD", rule: null, detail: "no exit rule matched", vetoedBy: null, pnlPct: pnl };
}

/** Half the position, rounded down, at least one contract. */
export function trimQuantity(quantity: number): number {
  return Math.max(1, Math.floor(quantity / 2));
}
