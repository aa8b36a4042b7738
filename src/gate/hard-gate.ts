import type { DecisionContext, GateCheck, GateCounters, GateLimits } from "./types.js";

function pct(x: number): string {
  return `${(x * 100).toFixed(1)}%`;
}

/**
 * The eight hard checks, evaluated in a fixed order regardless of what the
 * oracle recommended. Exceptional conviction can rescue only
 * daily_executions and risk_capacity; every other check is absolute.
 */
export function evaluateHardGate(
  ctx: DecisionContext,
  conviction: number,
  counters: GateCounters,
  limits: GateLimits,
): GateCheck[] {
  const exceptional = conviction >= limits.exceptionalConviction;
  const { portfolio, facts, signal } = ctx;
  const checks: GateCheck[] = [];

  checks.push({
    name: "max_positions",
    passed: counters.openPositionCount < limits.maxPositions,
    overridden: false,
    detail: `${counters.openPositionCount} open / max ${limits.maxPositions}`,
  });

  const allocation = portfolio.equity > 0 ? portfolio.optionsMarketValue / portfolio.equity : Infinity;
  checks.push({
    name: "options_allocation",
    passed: allocation < limits.maxOptionsAllocationPct,
    overridden: false,
    detail: `allocation ${Number.isFinite(allocation) ? pct(allocation) : "n/a (no equity)"} / max ${pct(limits.maxOptionsAllocationPct)}`,
  });

  const underDailyCap = counters.executionsToday < limits.maxExecutionsPerDay;
  checks.push({
    name: "daily_executions",
    passed: underDailyCap || exceptional,
    overridden: !underDailyCap && exceptional,
    detail: `${counters.executionsToday} today / max ${limits.maxExecutionsPerDay}`,
  });

  const enoughCapacity = portfolio.riskCapacity >= limits.minRiskCapacity;
  checks.push({
    name: "risk_capacity",
    passed: enoughCapacity || exceptional,
    overridden: !enoughCapacity && exceptional,
    detail: `capacity ${pct(portfolio.riskCapacity)} / min ${pct(limits.minRiskCapacity)}`,
  });

  checks.push({
    name: "risk_level",
    passed: portfolio.riskLevel !== "critical",
    overridden: false,
    detail: `level ${portfolio.riskLevel} (score ${portfolio.riskScore})`,
  });

  // With nothing open every projection is 100%; the check starts biting from the second position.
  const projected = ctx.projectedConcentration;
  const concentrationOk =
    counters.openPositionCount === 0 ||
    (projected.sector <= limits.maxConcentration && projected.underlying <= limits.maxConcentration);
  checks.push({
    name: "concentration",
    passed: concentrationOk,
    overridden: false,
    detail: `projected sector ${pct(projected.sector)}, underlying ${pct(projected.underlying)} / max ${pct(limits.maxConcentration)}`,
  });

  const inBlackout =
    facts.daysToEarnings !== null && facts.daysToEarnings >= 0 && facts.daysToEarnings <= limits.earningsBlackoutDays;
  checks.push({
    name: "earnings_blackout",
    passed: !inBlackout,
    overridden: false,
    detail:
      facts.daysToEarnings === null
        ? "no upcoming earnings date"
        : `earnings in ${facts.daysToEarnings}d / blackout ${limits.earningsBlackoutDays}d`,
  });

  const held = counters.openUnderlyings.has(signal.underlying);
  checks.push({
    name: "existing_underlying",
    passed: !held,
    overridden: false,
    detail: held ? `already holding ${signal.underlying}` : `no open ${signal.underlying} position`,
  });

  return checks;
}
