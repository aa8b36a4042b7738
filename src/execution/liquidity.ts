import type { OptionQuote } from "../broker/types.js";
import { LiquidityRejected } from "../errors.js";

export interface LiquidityLimits {
  maxSpreadPct: number;
  minBid: number;
  minBidSize: number;
}

export interface TwoSidedQuote {
  bid: number;
  ask: number;
  mid: number;
  spreadPct: number;
}

/**
 * Validate a quote before sizing. Every failing condition is collected into
 * one LiquidityRejected.
 */
export function checkLiquidity(contractSymbol: string, quote: OptionQuote, limits: LiquidityLimits): TwoSidedQuote {
  const { bid, ask } = quote;
  if (bid === null || ask === null || ask <= 0) {
    throw new LiquidityRejected(contractSymbol, ["no two-sided quote"]);
  }
  const reasons: string[] = [];
  if (ask < bid) reasons.push(`crossed market ${bid}/${ask}`);
  const mid = (bid + ask) / 2;
  const spreadPct = mid > 0 ? (ask - bid) / mid : Infinity;
  if (spreadPct > limits.maxSpreadPct) {
    reasons.push(`spread ${(spreadPct * 100).toFixed(1)}% > ${(limits.maxSpreadPct * 100).toFixed(1)}%`);
  }
  if (bid < limits.minBid) reasons.push(`bid ${bid} < ${limits.minBid}`);
  if ((quote.bidSize ?? 0) < limits.minBidSize) reasons.push(`bid size ${quote.bidSize ?? 0} < ${limits.minBidSize}`);
  if (reasons.length > 0) throw new LiquidityRejected(contractSymbol, reasons);
  return { bid, ask, mid, spreadPct };
}
