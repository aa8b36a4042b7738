import type { OptionType } from "../flow/types.js";
import type { Recommendation } from "../oracle/schema.js";
import type { Greeks } from "../risk/types.js";

export type PositionStatus = "open" | "closed";

/** What the oracle believed when the position was opened. */
export interface EntryThesis {
  recommendation: Recommendation;
  conviction: number;
  thesis: string;
  riskFactors: string[];
  sizingHint: string | null;
  trendAtEntry: string;
}

export interface Position {
  id: number;
  /** OCC symbol; unique among open positions. */
  contractSymbol: string;
  underlying: string;
  optionType: OptionType;
  strike: number;
  expiration: string;
  quantity: number;
  entryPrice: number;
  entryGreeks: Greeks;
  entryIv: number | null;
  entryThesis: EntryThesis;
  signalId: string;
  signalScore: number;
  scoreFactors: string[];
  sector: string | null;
  status: PositionStatus;
  openedAt: string;
  /** Latest re-snapshot while open. */
  currentGreeks: Greeks | null;
  lastMark: number | null;
  lastSnapshotAt: string | null;
  closedAt: string | null;
  exitPrice: number | null;
  exitGreeks: Greeks | null;
  exitReason: string | null;
}

export type NewPosition = Omit<
  Position,
  "id" | "status" | "currentGreeks" | "lastMark" | "lastSnapshotAt" | "closedAt" | "exitPrice" | "exitGreeks" | "exitReason"
>;

export const CONTRACT_MULTIPLIER = 100;

export function markOf(p: Position): number {
  return p.lastMark ?? p.entryPrice;
}

/** Rounded to 6 places so prices quoted in cents land exactly on percentage thresholds. */
export function unrealizedPnlPct(p: Position, mark: number): number {
  if (p.entryPrice <= 0) return 0;
  return Math.round(((mark - p.entryPrice) / p.entryPrice) * 1e6) / 1e6;
}

/** Position fields known before the fill; quantity, price and greeks come from it. */
export type EntryTemplate = Omit<NewPosition, "quantity" | "entryPrice" | "entryGreeks" | "entryIv">;

/**
 * An entry order whose fill could not be confirmed by read-back. Kept until a
 * later cycle reads a terminal status for it; a fill then becomes a Position.
 */
export interface PendingEntry {
  orderId: string;
  clientTag: string;
  requestedQty: number;
  limitPrice: number;
  /** Underlying price at submission, for the entry greeks. */
  spot: number | null;
  usedOverride: boolean;
  submittedAt: string;
  template: EntryTemplate;
}
