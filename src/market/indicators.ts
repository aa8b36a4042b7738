import type { TrendLabel } from "../flow/types.js";

/** Simple moving average of the last `n` values, or null if there are fewer. */
export function sma(values: readonly number[], n: number): number | null {
  if (n <= 0 || values.length < n) return null;
  let sum = 0;
  for (let i = values.length - n; i < values.length; i++) sum += values[i] ?? 0;
  return sum / n;
}

/**
 * RSI from simple averages of the last `period` gains and losses.
 * Returns null with fewer than period + 1 values.
 */
export function rsi(values: readonly number[], period = 14): number | null {
  if (values.length < period + 1) return null;
  let gain = 0;
  let loss = 0;
  for (let i = values.length - period; i < values.length; i++) {
    const d = (values[i] ?? 0) - (values[i - 1] ?? 0);
    if (d > 0) gain += d;
    else loss -= d;
  }
  if (loss === 0) return 100;
  const rs = gain / loss;
  return 100 - 100 / (1 + rs);
}

/** Trend label from a level and its moving average; inside ±band is neutral. */
export function trendFrom(level: number | null, average: number | null, band = 0.01): TrendLabel {
  if (level === null || average === null || average <= 0) return "neutral";
  const dev = (level - average) / average;
  if (dev > band) return "bullish";
  if (dev < -band) return "bearish";
  return "neutral";
}
