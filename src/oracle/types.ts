import type { OracleError } from "../errors.js";
import type { ScoredSignal } from "../flow/types.js";
import type { MarketContext, UnderlyingFacts } from "../market/types.js";
import type { PortfolioRiskState } from "../risk/types.js";
import type { Recommendation } from "./schema.js";

export interface OracleCandidate {
  signal: ScoredSignal;
  facts: UnderlyingFacts;
  projectedConcentration: { sector: number; underlying: number };
}

export interface OracleHolding {
  contractSymbol: string;
  underlying: string;
  optionType: string;
  strike: number;
  expiration: string;
  quantity: number;
  entryPrice: number;
  mark: number | null;
  entryConviction: number;
  entryThesis: string;
}

export interface OracleBatch {
  market: MarketContext;
  portfolio: PortfolioRiskState;
  candidates: OracleCandidate[];
  holdings: OracleHolding[];
}

export interface OracleVerdict {
  signalId: string;
  recommendation: Recommendation;
  conviction: number;
  thesis: string;
  riskFactors: string[];
  sizingHint: string | null;
}

export type OracleOutcome =
  | { ok: true; verdict: OracleVerdict }
  | { ok: false; error: OracleError };

export interface HoldingAssessment {
  contractSymbol: string;
  conviction: number;
  thesisIntact: boolean;
  note: string | null;
}

export interface OracleResult {
  /** Keyed by signal id; every candidate in the batch has an entry. */
  outcomes: Map<string, OracleOutcome>;
  reviews: Map<string, HoldingAssessment>;
  /** Set when the whole call failed (timeout, transport, envelope). */
  callError: OracleError | null;
  promptHash: string;
  latencyMs: number;
}

/** The external conviction scorer, treated as a black box. One call per cycle. */
export interface Oracle {
  evaluate(batch: OracleBatch): Promise<OracleResult>;
}
