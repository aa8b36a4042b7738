import type { PortfolioRiskState } from "../risk/types.js";
import { venueDate } from "../time.js";
import { CLOSED_BREAKER, type BreakerState } from "./circuit-breaker.js";

/**
 * The single record persisted wholesale each cycle and read at startup.
 * Date-scoped fields reset when the venue-local date advances.
 */
export interface CycleState {
  sessionId: string;
  /** Venue-local YYYY-MM-DD */
  tradingDate: string;
  executionsToday: number;
  exceptionalOverridesToday: number;
  /** Oldest first; capped, newest wins. */
  seenSignalIds: string[];
  breaker: BreakerState;
  lastCheck: string | null;
  /** Flow provider high-water mark. */
  newerThan: string | null;
  /** Informational only; risk is always re-derived from open positions. */
  lastPortfolio: PortfolioRiskState | null;
}

export function initialCycleState(sessionId: string, now: Date, timeZone: string): CycleState {
  return {
    sessionId,
    tradingDate: venueDate(now, timeZone),
    executionsToday: 0,
    exceptionalOverridesToday: 0,
    seenSignalIds: [],
    breaker: { ...CLOSED_BREAKER },
    lastCheck: null,
    newerThan: null,
    lastPortfolio: null,
  };
}

/**
 * Reset the per-day counters and dedupe set when the venue-local calendar
 * date differs from the stored one. Storing the new date makes this
 * idempotent within a day.
 */
export function ensureTradingDate(
  state: CycleState,
  now: Date,
  timeZone: string,
): { state: CycleState; reset: boolean } {
  const today = venueDate(now, timeZone);
  if (state.tradingDate === today) return { state, reset: false };
  return {
    state: {
      ...state,
      tradingDate: today,
      executionsToday: 0,
      exceptionalOverridesToday: 0,
      seenSignalIds: [],
    },
    reset: true,
  };
}

/** Append ids (re-seen ids move to the newest end), evicting the oldest past capacity. */
export function markSeen(state: CycleState, ids: readonly string[], capacity: number): CycleState {
  if (ids.length === 0) return state;
  const incoming = new Set(ids);
  const kept = state.seenSignalIds.filter((id) => !incoming.has(id));
  const merged = [...kept, ...incoming];
  const seenSignalIds = merged.length > capacity ? merged.slice(merged.length - capacity) : merged;
  return { ...state, seenSignalIds };
}

export function recordExecution(state: CycleState, usedOverride: boolean): CycleState {
  return {
    ...state,
    executionsToday: state.executionsToday + 1,
    exceptionalOverridesToday: state.exceptionalOverridesToday + (usedOverride ? 1 : 0),
  };
}
