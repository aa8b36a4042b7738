import type { BrokerClient, BrokerPosition } from "../broker/types.js";
import type { Store } from "../db/store.js";
import { ExecutionAmbiguous, errorMessage } from "../errors.js";
import { placeAndConfirm } from "../execution/orders.js";
import { logReversal } from "../logging.js";
import { rsi, sma } from "../market/indicators.js";
import type { DailyBar, MarketDataSource } from "../market/types.js";
import { daysBetween } from "../time.js";

export const MIN_BARS = 21;

export const REVERSAL_POINTS = {
  smaBearishCross: 3,
  weakClose: 2,
  distributionVolume: 3,
  rsiBreakdown: 2,
  failedBreakout: 3,
} as const;

export interface ReversalScore {
  score: number;
  signals: string[];
}

/** Score bearish-reversal evidence on daily bars, oldest first. */
export function scoreReversal(bars: readonly DailyBar[]): ReversalScore {
  if (bars.length < MIN_BARS) return { score: 0, signals: [] };
  const sorted = [...bars].sort((a, b) => a.date.localeCompare(b.date));
  const closes = sorted.map((b) => b.close);
  const today = sorted[sorted.length - 1];
  if (!today) return { score: 0, signals: [] };

  const signals: string[] = [];
  let score = 0;
  const isRed = today.close < today.open;

  const sma7 = sma(closes, 7);
  const sma20 = sma(closes, 20);
  if (sma7 !== null && sma20 !== null && sma7 < sma20) {
    signals.push("sma_bearish_cross");
    score += REVERSAL_POINTS.smaBearishCross;
  }

  const range = today.high - today.low;
  if (range > 0 && (today.close - today.low) / range < 0.3) {
    signals.push("weak_close");
    score += REVERSAL_POINTS.weakClose;
  }

  const prior20 = sorted.slice(-21, -1);
  const avgVolume = prior20.reduce((sum, b) => sum + b.volume, 0) / prior20.length;
  if (isRed && avgVolume > 0 && today.volume / avgVolume > 1.5) {
    signals.push("distribution_volume");
    score += REVERSAL_POINTS.distributionVolume;
  }

  const rsiNow = rsi(closes);
  const rsiPrev = rsi(closes.slice(0, -1));
  if (rsiNow !== null && rsiPrev !== null && rsiPrev > 70 && rsiNow < 60) {
    signals.push("rsi_breakdown");
    score += REVERSAL_POINTS.rsiBreakdown;
  }

  const prior5High = Math.max(...sorted.slice(-6, -1).map((b) => b.high));
  if (today.high > prior5High && isRed) {
    signals.push("failed_breakout");
    score += REVERSAL_POINTS.failedBreakout;
  }

  return { score, signals };
}

export interface ReversalSettings {
  alertThreshold: number;
  autoCloseThreshold: number;
  autoCloseEnabled: boolean;
  minHoldDays: number;
  limitBufferPct: number;
  shadowMode: boolean;
  orders: { pollIntervalMs: number; timeoutMs: number };
}

export type ReversalAction = "none" | "alert" | "close" | "close_blocked";

/**
 * Threshold ladder with a minimum-hold override: a strong score on a
 * holding younger than `minHoldDays` only alerts.
 */
export function reversalAction(score: number, heldDays: number, s: ReversalSettings): ReversalAction {
  if (score >= s.autoCloseThreshold && s.autoCloseEnabled) {
    return heldDays >= s.minHoldDays ? "close" : "close_blocked";
  }
  if (score >= s.alertThreshold) return "alert";
  return "none";
}

export interface ReversalResult {
  symbol: string;
  score: number;
  signals: string[];
  heldDays: number;
  action: ReversalAction;
  closed: boolean;
}

export interface ReversalDeps {
  broker: BrokerClient;
  market: MarketDataSource;
  store: Store;
  settings: ReversalSettings;
  submitted: Set<string>;
  sleep?: (ms: number) => Promise<void>;
}

async function closeStock(deps: ReversalDeps, p: BrokerPosition, score: number): Promise<boolean> {
  const prices = await deps.market.getQuotes([p.symbol]);
  const last = prices.get(p.symbol);
  if (last === undefined) {
    logReversal.warn({ symbol: p.symbol }, "No price for reversal close");
    return false;
  }
  const limit = Math.max(0.01, Math.ceil(last * (1 - deps.settings.limitBufferPct) * 100) / 100);
  if (deps.settings.shadowMode) {
    logReversal.info({ symbol: p.symbol, qty: p.quantity, limit }, "Shadow mode: reversal close not sent");
    return false;
  }
  try {
    const res = await placeAndConfirm(
      deps.broker,
      { symbol: p.symbol, secType: "STK", side: "SELL", quantity: p.quantity, limitPrice: limit, clientTag: `reversal:${p.symbol}:${score}` },
      { ...deps.settings.orders, submitted: deps.submitted, sleep: deps.sleep },
    );
    return res.kind === "filled";
  } catch (e: unknown) {
    if (e instanceof ExecutionAmbiguous) {
      logReversal.error({ err: e }, "Reversal close unconfirmed");
      return false;
    }
    throw e;
  }
}

/** Check every long stock holding; persist one row per check. */
export async function runReversalMonitor(
  deps: ReversalDeps,
  positions: readonly BrokerPosition[],
  today: string,
  now: Date,
): Promise<ReversalResult[]> {
  const stocks = positions.filter((p) => p.secType === "STK" && p.quantity > 0);
  const firstSeen = deps.store.syncStockHoldings(stocks.map((p) => p.symbol), today);
  const results: ReversalResult[] = [];

  for (const p of stocks) {
    let bars: DailyBar[];
    try {
      bars = await deps.market.getDailyBars(p.symbol, 30);
    } catch (e: unknown) {
      logReversal.warn({ symbol: p.symbol, err: errorMessage(e) }, "Bars unavailable; skipping");
      continue;
    }
    if (bars.length < MIN_BARS) {
      logReversal.debug({ symbol: p.symbol, bars: bars.length }, "Insufficient bars");
      continue;
    }
    const { score, signals } = scoreReversal(bars);
    const heldDays = daysBetween(firstSeen.get(p.symbol) ?? today, today);
    const action = reversalAction(score, heldDays, deps.settings);
    const closed = action === "close" ? await closeStock(deps, p, score) : false;

    deps.store.recordReversalCheck({ symbol: p.symbol, score, signals, action, checkedAt: now.toISOString() });
    if (action !== "none") logReversal.info({ symbol: p.symbol, score, signals, heldDays, action, closed }, "Reversal signal");
    results.push({ symbol: p.symbol, score, signals, heldDays, action, closed });
  }
  return results;
}
