import type { TrendLabel } from "../flow/types.js";

export interface MarketContext {
  benchmark: string;
  benchmarkLevel: number | null;
  benchmarkSma20: number | null;
  trend: TrendLabel;
  /** Volatility proxy (VIX). */
  volatility: number | null;
  asOf: string;
}

export interface UnderlyingFacts {
  symbol: string;
  price: number | null;
  sector: string | null;
  nextEarningsDate: string | null;
  /** Calendar days from the venue date to the next earnings date. */
  daysToEarnings: number | null;
}

export interface DailyBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Read-only market data used by context assembly and the reversal monitor. */
export interface MarketDataSource {
  getMarketContext(): Promise<MarketContext>;
  getUnderlyingFacts(symbol: string, asOf: string): Promise<UnderlyingFacts>;
  getQuotes(symbols: readonly string[]): Promise<Map<string, number>>;
  getDailyBars(symbol: string, days: number): Promise<DailyBar[]>;
}
