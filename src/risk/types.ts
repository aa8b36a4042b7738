export interface Greeks {
  delta: number;
  gamma: number;
  /** Per calendar day, per unit of underlying. */
  theta: number;
  /** Per 1 vol point (0.01 IV). */
  vega: number;
}

export const ZERO_GREEKS: Greeks = Object.freeze({ delta: 0, gamma: 0, theta: 0, vega: 0 });

export type RiskLevel = "healthy" | "cautious" | "elevated" | "critical";

export interface RiskSubScores {
  delta: number;
  gamma: number;
  theta: number;
  concentration: number;
}

/** Derived every cycle from open positions; never the source of truth. */
export interface PortfolioRiskState {
  /** Share-equivalent delta (per-unit delta × qty × multiplier). */
  netDelta: number;
  totalGamma: number;
  /** Currency per day. */
  dailyTheta: number;
  totalVega: number;
  equity: number;
  optionsMarketValue: number;
  riskScore: number;
  riskCapacity: number;
  riskLevel: RiskLevel;
  subScores: RiskSubScores;
  concentrationBySector: Record<string, number>;
  concentrationByUnderlying: Record<string, number>;
  maxConcentration: number;
  openPositionCount: number;
  computedAt: string;
}

export interface RiskLimits {
  deltaLimitPer100k: number;
  gammaLimitPer100k: number;
  thetaLimitPct: number;
  concentrationLimit: number;
}
