import { createHash } from "node:crypto";
import type { OracleBatch } from "./types.js";

export const SYSTEM_PROMPT = `You are an options-flow evaluation engine. You receive the current market context, a portfolio risk snapshot, a list of candidate unusual-options-activity signals and a list of open option positions. You return a structured JSON assessment.

You MUST respond with ONLY a valid JSON object matching this exact schema. No markdown, no code fences, no text outside the JSON.

{
  "evaluations": [
    {
      "signal_id": string (copy exactly from the candidate),
      "recommendation": "EXECUTE" | "ALERT" | "SKIP",
      "conviction": 0-100,
      "thesis": 1-3 sentences,
      "risk_factors": string[],
      "sizing_hint": string or null
    }
  ],
  "reviews": [
    {
      "contract_symbol": string (copy exactly from the holding),
      "conviction": 0-100 (conviction in the ORIGINAL thesis today),
      "thesis_intact": true or false,
      "note": short string
    }
  ]
}

Return exactly one evaluation per candidate and one review per holding.

Evaluation principles:
- EXECUTE only when the flow, trend and portfolio state agree; conviction 80+ is reserved for clear setups
- Sweeps and opening trades on the ask side signal urgency; floor prints signal institutional size
- Vol/OI above 3 means new positioning rather than rolling
- Counter-trend flow against the benchmark trend requires much stronger evidence
- Earnings within a few days adds binary risk; say so in risk_factors
- A portfolio at elevated or critical risk, or heavily concentrated in the candidate's sector, argues for ALERT over EXECUTE
- High IV rank makes premium expensive; prefer ALERT unless the flow is exceptional
- For holdings: lower conviction when the trend has reversed against the position or the flow that justified it has faded`;

/**
 * Construct the user prompt: one JSON payload covering every candidate and holding.
 */
export function buildUserPrompt(batch: OracleBatch): string {
  const payload = {
    market: batch.market,
    portfolio: {
      risk_score: batch.portfolio.riskScore,
      risk_level: batch.portfolio.riskLevel,
      risk_capacity: batch.portfolio.riskCapacity,
      net_delta: round(batch.portfolio.netDelta),
      total_gamma: round(batch.portfolio.totalGamma),
      daily_theta: round(batch.portfolio.dailyTheta),
      total_vega: round(batch.portfolio.totalVega),
      equity: batch.portfolio.equity,
      concentration_by_sector: batch.portfolio.concentrationBySector,
      open_positions: batch.portfolio.openPositionCount,
    },
    candidates: batch.candidates.map((c) => ({
      signal_id: c.signal.id,
      underlying: c.signal.underlying,
      option_type: c.signal.optionType,
      strike: c.signal.strike,
      expiration: c.signal.expiration,
      premium: c.signal.premium,
      volume: c.signal.volume,
      open_interest: c.signal.openInterest,
      vol_oi_ratio: c.signal.volOiRatio,
      sweep: c.signal.isSweep,
      ask_side: c.signal.isAskSide,
      floor: c.signal.isFloor,
      opening: c.signal.isOpening,
      otm: c.signal.isOtm,
      iv_rank: c.signal.ivRank,
      flow_score: c.signal.score,
      score_factors: c.signal.scoreFactors,
      underlying_price: c.facts.price,
      sector: c.facts.sector,
      days_to_earnings: c.facts.daysToEarnings,
      projected_sector_concentration: round(c.projectedConcentration.sector),
    })),
    holdings: batch.holdings.map((h) => ({
      contract_symbol: h.contractSymbol,
      underlying: h.underlying,
      option_type: h.optionType,
      strike: h.strike,
      expiration: h.expiration,
      quantity: h.quantity,
      entry_price: h.entryPrice,
      mark: h.mark,
      entry_conviction: h.entryConviction,
      entry_thesis: h.entryThesis,
    })),
  };
  return JSON.stringify(payload);
}

function round(n: number): number {
  return Math.round(n * 1000) / 1000;
}

export function hashPrompt(system: string, user: string): string {
  return createHash("sha256").update(system).update("\n").update(user).digest("hex").slice(0, 16);
}
