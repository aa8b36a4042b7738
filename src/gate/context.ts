import type { ScoredSignal } from "../flow/types.js";
import type { MarketContext, UnderlyingFacts } from "../market/types.js";
import { projectedConcentration } from "../risk/portfolio.js";
import type { PortfolioRiskState } from "../risk/types.js";
import type { DecisionContext } from "./types.js";

export interface ExposureItem {
  underlying: string;
  sector: string | null;
  marketValue: number;
}

/**
 * Build the one snapshot an admission decision is made from.
 * The sector falls back from provider facts to the flow record.
 */
export function assembleContext(args: {
  signal: ScoredSignal;
  market: MarketContext;
  portfolio: PortfolioRiskState;
  facts: UnderlyingFacts;
  exposures: readonly ExposureItem[];
  candidateValue: number;
  now: Date;
}): DecisionContext {
  const sector = args.facts.sector ?? args.signal.sector;
  const projected = projectedConcentration(args.exposures, {
    underlying: args.signal.underlying,
    sector,
    marketValue: args.candidateValue,
  });
  return Object.freeze({
    signal: args.signal,
    market: Object.freeze({ ...args.market }),
    portfolio: Object.freeze({ ...args.portfolio }),
    facts: Object.freeze({ ...args.facts, sector }),
    candidateValue: args.candidateValue,
    projectedConcentration: Object.freeze(projected),
    assembledAt: args.now.toISOString(),
  });
}

/** Budget the sizer would start from; used to project concentration before a quote exists. */
export function estimateCandidateValue(
  equity: number,
  sizing: { maxPositionValue: number; maxEquityPct: number },
): number {
  return Math.max(0, Math.min(sizing.maxPositionValue, equity * sizing.maxEquityPct));
}
