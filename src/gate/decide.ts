import { HardGateBlocked } from "../errors.js";
import { logGate } from "../logging.js";
import type { OracleOutcome } from "../oracle/types.js";
import { evaluateHardGate } from "./hard-gate.js";
import { walk } from "./state-machine.js";
import type { Decision, DecisionContext, FinalAction, GateCounters, GateLimits } from "./types.js";

const PRE_ORACLE = ["RECEIVED", "PRE_FILTERED", "CONTEXT_ASSEMBLED"] as const;

export type BlockReason = "circuit_breaker_open" | "fill_cap_reached";

export interface DecideInput {
  ctx: DecisionContext;
  outcome: OracleOutcome;
  counters: GateCounters;
  limits: GateLimits;
  /** Why execution is suppressed this cycle, or null when it is allowed. */
  blocked: BlockReason | null;
  now: Date;
}

/**
 * Resolve one candidate to EXECUTE / ALERT / SKIP / BLOCKED with a full reason trail.
 *
 * - oracle failure → ALERT (never SKIP)
 * - SKIP / ALERT from the oracle stand, but the gate still runs for the audit trail
 * - EXECUTE below minimum conviction → ALERT
 * - EXECUTE failing any hard check → ALERT, carrying every failed check
 * - EXECUTE while the breaker is open or the cycle's fill cap is spent → BLOCKED
 */
export function decide(input: DecideInput): Decision {
  const { ctx, outcome, counters, limits, now } = input;
  const at = now.toISOString();
  const base = {
    signalId: ctx.signal.id,
    underlying: ctx.signal.underlying,
    signalScore: ctx.signal.score,
    scoreFactors: ctx.signal.scoreFactors,
    decidedAt: at,
  };

  if (!outcome.ok) {
    logGate.warn({ signalId: ctx.signal.id, err: outcome.error }, "Oracle failed for signal; downgraded to ALERT");
    return {
      ...base,
      action: "ALERT",
      history: walk([...PRE_ORACLE, "ALERT"], at),
      recommendation: null,
      conviction: null,
      verdict: null,
      checks: [],
      failedChecks: [],
      reasons: ["oracle_error"],
      usedOverride: false,
      oracleError: outcome.error.message,
    };
  }

  const { verdict } = outcome;
  const checks = evaluateHardGate(ctx, verdict.conviction, counters, limits);
  const failed = checks.filter((c) => !c.passed);
  const reasons: string[] = [`oracle_${verdict.recommendation.toLowerCase()}`, `conviction_${verdict.conviction}`];

  let action: FinalAction;
  if (verdict.recommendation !== "EXECUTE") {
    action = verdict.recommendation;
  } else if (verdict.conviction < limits.minConviction) {
    action = "ALERT";
    reasons.push("conviction_below_minimum");
  } else if (failed.length > 0) {
    action = "ALERT";
    const blocked = new HardGateBlocked(ctx.signal.id, failed.map((c) => c.name));
    reasons.push(...blocked.failedChecks.map((n) => `gate_failed:${n}`));
    logGate.info(
      { signalId: ctx.signal.id, failed: failed.map((c) => ({ name: c.name, detail: c.detail })) },
      blocked.message,
    );
  } else if (input.blocked) {
    action = "BLOCKED";
    reasons.push(input.blocked);
  } else {
    action = "EXECUTE";
  }

  const usedOverride = action === "EXECUTE" && checks.some((c) => c.overridden);
  if (usedOverride) reasons.push("exceptional_conviction_override");

  return {
    ...base,
    action,
    history: walk([...PRE_ORACLE, "ORACLE_SCORED", "GATE_EVALUATED", action], at),
    recommendation: verdict.recommendation,
    conviction: verdict.conviction,
    verdict,
    checks,
    failedChecks: failed.map((c) => c.name),
    reasons,
    usedOverride,
    oracleError: null,
  };
}
