import { CONTRACT_MULTIPLIER } from "../positions/types.js";

export interface SizingLimits {
  maxContractsPerTrade: number;
  maxPositionValue: number;
  maxEquityPct: number;
  lotSize: number;
}

export interface SizingInput {
  conviction: number;
  score: number;
  ivRank: number | null;
  /** Current share of options market value in the candidate's sector. */
  sectorExposure: number;
  equity: number;
  /** Per-unit option price. */
  price: number;
}

export interface SizingResult {
  contracts: number;
  budget: number;
  adjustments: string[];
}

export function sizePosition(input: SizingInput, limits: SizingLimits): SizingResult {
  const adjustments: string[] = [];
  let budget = Math.min(limits.maxPositionValue, input.equity * limits.maxEquityPct);
  budget *= 0.5 + 0.5 * (Math.min(Math.max(input.conviction, 0), 100) / 100);
  budget *= Math.min(1, input.score / 10 + 0.3);

  if (input.ivRank !== null && input.ivRank > 50) {
    budget *= 0.75;
    adjustments.push("high_iv_rank");
  }
  if (input.sectorExposure > 0.25) {
    budget *= 0.5;
    adjustments.push("sector_exposure");
  }
  budget = Math.max(0, budget);

  const unitCost = input.price * CONTRACT_MULTIPLIER;
  if (unitCost <= 0) return { contracts: 0, budget, adjustments };

  const raw = Math.min(Math.floor(budget / unitCost), limits.maxContractsPerTrade);
  const lot = Math.max(1, limits.lotSize);
  const contracts = Math.max(0, Math.floor(raw / lot) * lot);
  return { contracts, budget, adjustments };
}
