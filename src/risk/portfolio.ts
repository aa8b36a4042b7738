import { CONTRACT_MULTIPLIER } from "../positions/types.js";
import type { Greeks, PortfolioRiskState, RiskLevel, RiskLimits, RiskSubScores } from "./types.js";

export const SUB_SCORE_CAP = 25;
export const UNKNOWN_SECTOR = "unknown";

/** One open position as seen by the risk engine for this cycle. */
export interface PositionExposure {
  underlying: string;
  sector: string | null;
  quantity: number;
  /** Per-unit greeks from the latest estimate. */
  greeks: Greeks;
  /** Per-contract price (not multiplied). */
  mark: number;
}

export interface AggregateGreeks {
  netDelta: number;
  totalGamma: number;
  dailyTheta: number;
  totalVega: number;
}

export function aggregateGreeks(exposures: readonly PositionExposure[]): AggregateGreeks {
  const total: AggregateGreeks = { netDelta: 0, totalGamma: 0, dailyTheta: 0, totalVega: 0 };
  for (const e of exposures) {
    const scale = e.quantity * CONTRACT_MULTIPLIER;
    total.netDelta += e.greeks.delta * scale;
    total.totalGamma += e.greeks.gamma * scale;
    total.dailyTheta += e.greeks.theta * scale;
    total.totalVega += e.greeks.vega * scale;
  }
  return total;
}

export function marketValue(e: Pick<PositionExposure, "quantity" | "mark">): number {
  return Math.abs(e.quantity * e.mark * CONTRACT_MULTIPLIER);
}

export interface Concentration {
  bySector: Record<string, number>;
  byUnderlying: Record<string, number>;
  max: number;
  totalMarketValue: number;
}

function shares(values: Map<string, number>, total: number): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [k, v] of values) out[k] = total > 0 ? v / total : 0;
  return out;
}

/** Share of total options market value held per sector and per underlying. */
export function concentration(
  items: ReadonlyArray<{ underlying: string; sector: string | null; marketValue: number }>,
): Concentration {
  const sector = new Map<string, number>();
  const underlying = new Map<string, number>();
  let total = 0;
  for (const item of items) {
    const mv = Math.abs(item.marketValue);
    total += mv;
    const s = item.sector ?? UNKNOWN_SECTOR;
    sector.set(s, (sector.get(s) ?? 0) + mv);
    underlying.set(item.underlying, (underlying.get(item.underlying) ?? 0) + mv);
  }
  const bySector = shares(sector, total);
  const byUnderlying = shares(underlying, total);
  const max = Math.max(0, ...Object.values(bySector), ...Object.values(byUnderlying));
  return { bySector, byUnderlying, max, totalMarketValue: total };
}

/**
 * Concentration after hypothetically adding a position worth `marketValue`.
 */
export function projectedConcentration(
  current: ReadonlyArray<{ underlying: string; sector: string | null; marketValue: number }>,
  candidate: { underlying: string; sector: string | null; marketValue: number },
): { sector: number; underlying: number } {
  const after = concentration([...current, candidate]);
  return {
    sector: after.bySector[candidate.sector ?? UNKNOWN_SECTOR] ?? 0,
    underlying: after.byUnderlying[candidate.underlying] ?? 0,
  };
}

export function subScore(value: number, limit: number): number {
  if (limit <= 0 || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(SUB_SCORE_CAP, Math.floor((SUB_SCORE_CAP * value) / limit)));
}

export function riskLevelFor(score: number): RiskLevel {
  if (score <= 30) return "healthy";
  if (score <= 50) return "cautious";
  if (score <= 70) return "elevated";
  return "critical";
}

export function riskCapacityFor(score: number): number {
  return Math.max(0, Math.min(1, 1 - score / 100));
}

export function scoreRisk(
  greeks: AggregateGreeks,
  equity: number,
  maxConcentration: number,
  limits: RiskLimits,
): { riskScore: number; subScores: RiskSubScores } {
  const equity100k = Math.max(equity / 100_000, 0.1);
  const subScores: RiskSubScores = {
    delta: subScore(Math.abs(greeks.netDelta) / equity100k, limits.deltaLimitPer100k),
    gamma: subScore(Math.abs(greeks.totalGamma) / equity100k, limits.gammaLimitPer100k),
    theta: subScore(equity > 0 ? Math.abs(greeks.dailyTheta) / equity : 0, limits.thetaLimitPct),
    concentration: subScore(maxConcentration, limits.concentrationLimit),
  };
  const sum = subScores.delta + subScores.gamma + subScores.theta + subScores.concentration;
  return { riskScore: Math.max(0, Math.min(100, sum)), subScores };
}

export function buildRiskSnapshot(
  exposures: readonly PositionExposure[],
  equity: number,
  limits: RiskLimits,
  now: Date,
): PortfolioRiskState {
  const greeks = aggregateGreeks(exposures);
  const conc = concentration(
    exposures.map((e) => ({ underlying: e.underlying, sector: e.sector, marketValue: marketValue(e) })),
  );
  const { riskScore, subScores } = scoreRisk(greeks, equity, conc.max, limits);
  return {
    ...greeks,
    equity,
    optionsMarketValue: conc.totalMarketValue,
    riskScore,
    riskCapacity: riskCapacityFor(riskScore),
    riskLevel: riskLevelFor(riskScore),
    subScores,
    concentrationBySector: conc.bySector,
    concentrationByUnderlying: conc.byUnderlying,
    maxConcentration: conc.max,
    openPositionCount: exposures.length,
    computedAt: now.toISOString(),
  };
}
