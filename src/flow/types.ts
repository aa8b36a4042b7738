export type OptionType = "call" | "put";
export type TrendLabel = "bullish" | "bearish" | "neutral";

/** One parsed flow alert. Immutable; identity is the provider's alert id. */
export interface FlowSignal {
  readonly id: string;
  readonly underlying: string;
  /** OCC symbol when the provider supplies one. */
  readonly contractSymbol: string | null;
  readonly optionType: OptionType;
  readonly strike: number;
  /** YYYY-MM-DD */
  readonly expiration: string;
  readonly premium: number;
  readonly size: number;
  readonly volume: number;
  readonly openInterest: number;
  readonly volOiRatio: number;
  readonly isSweep: boolean;
  readonly isAskSide: boolean;
  readonly isFloor: boolean;
  readonly isOpening: boolean;
  readonly isOtm: boolean;
  readonly underlyingPrice: number | null;
  readonly ivRank: number | null;
  readonly sector: string | null;
  readonly timestamp: string;
}

export interface ScoredSignal extends FlowSignal {
  readonly score: number;
  readonly scoreFactors: readonly string[];
}

export type RejectReason =
  | "seen"
  | "premium_below_floor"
  | "excluded_ticker"
  | "dte_out_of_window"
  | "low_open_interest"
  | "strike_too_far"
  | "counter_trend"
  | "score_below_minimum"
  | "over_scan_limit";

export interface FlowLimits {
  minPremium: number;
  minDte: number;
  maxDte: number;
  minScore: number;
  minOpenInterest: number;
  maxStrikeDistancePct: number;
  scanLimit: number;
}
