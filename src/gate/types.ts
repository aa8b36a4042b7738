import type { ScoredSignal } from "../flow/types.js";
import type { MarketContext, UnderlyingFacts } from "../market/types.js";
import type { OracleVerdict } from "../oracle/types.js";
import type { Recommendation } from "../oracle/schema.js";
import type { PortfolioRiskState } from "../risk/types.js";

// ── State Machine ────────────────────────────────────────────────────────

/**
 * Per-signal lifecycle within one cycle:
 *
 *   RECEIVED → PRE_FILTERED → CONTEXT_ASSEMBLED → ORACLE_SCORED → GATE_EVALUATED
 *                                     ↘ ALERT (oracle error)          ↘ EXECUTE | ALERT | SKIP | BLOCKED
 *
 * Terminal states are final for the cycle.
 */
export type DecisionState =
  | "RECEIVED"
  | "PRE_FILTERED"
  | "CONTEXT_ASSEMBLED"
  | "ORACLE_SCORED"
  | "GATE_EVALUATED"
  | "EXECUTE"
  | "ALERT"
  | "SKIP"
  | "BLOCKED";

export type FinalAction = Extract<DecisionState, "EXECUTE" | "ALERT" | "SKIP" | "BLOCKED">;

export const VALID_TRANSITIONS: Record<DecisionState, DecisionState[]> = {
  RECEIVED:          ["PRE_FILTERED", "SKIP"],
  PRE_FILTERED:      ["CONTEXT_ASSEMBLED", "SKIP"],
  CONTEXT_ASSEMBLED: ["ORACLE_SCORED", "ALERT"],
  ORACLE_SCORED:     ["GATE_EVALUATED"],
  GATE_EVALUATED:    ["EXECUTE", "ALERT", "SKIP", "BLOCKED"],
  EXECUTE:           [],  // terminal
  ALERT:             [],  // terminal
  SKIP:              [],  // terminal
  BLOCKED:           [],  // terminal
};

// ── Context ──────────────────────────────────────────────────────────────

/** Frozen snapshot for one admission decision. No live lookups after this. */
export interface DecisionContext {
  readonly signal: ScoredSignal;
  readonly market: Readonly<MarketContext>;
  readonly portfolio: Readonly<PortfolioRiskState>;
  readonly facts: Readonly<UnderlyingFacts>;
  /** Estimated market value of the position if opened. */
  readonly candidateValue: number;
  readonly projectedConcentration: Readonly<{ sector: number; underlying: number }>;
  readonly assembledAt: string;
}

/** Mutable within a cycle: updated after each confirmed fill. */
export interface GateCounters {
  executionsToday: number;
  openPositionCount: number;
  openUnderlyings: ReadonlySet<string>;
}

export interface GateLimits {
  minConviction: number;
  exceptionalConviction: number;
  minRiskCapacity: number;
  maxExecutionsPerDay: number;
  maxPositions: number;
  maxOptionsAllocationPct: number;
  maxConcentration: number;
  earningsBlackoutDays: number;
}

// ── Checks & Decisions ───────────────────────────────────────────────────

export type GateCheckName =
  | "max_positions"
  | "options_allocation"
  | "daily_executions"
  | "risk_capacity"
  | "risk_level"
  | "concentration"
  | "earnings_blackout"
  | "existing_underlying";

export interface GateCheck {
  name: GateCheckName;
  passed: boolean;
  /** Failed on its own terms but passed via exceptional conviction. */
  overridden: boolean;
  detail: string;
}

export interface DecisionTransition {
  state: DecisionState;
  at: string;
}

export interface Decision {
  signalId: string;
  underlying: string;
  action: FinalAction;
  history: DecisionTransition[];
  recommendation: Recommendation | null;
  conviction: number | null;
  verdict: OracleVerdict | null;
  checks: GateCheck[];
  failedChecks: GateCheckName[];
  reasons: string[];
  usedOverride: boolean;
  oracleError: string | null;
  signalScore: number;
  scoreFactors: readonly string[];
  decidedAt: string;
}
