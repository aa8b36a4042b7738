import YahooFinance from "yahoo-finance2";
import { ProviderError, errorMessage } from "../errors.js";
import { logMarket } from "../logging.js";
import { withRetry, withTimeout } from "../retry.js";
import { daysBetween } from "../time.js";
import { sma, trendFrom } from "./indicators.js";
import type { DailyBar, MarketContext, MarketDataSource, UnderlyingFacts } from "./types.js";

const BENCHMARK = "SPY";
const VOLATILITY_INDEX = "^VIX";

export interface YahooMarketDataOptions {
  timeoutMs: number;
  retries?: number;
}

// Don't retry on client errors (bad symbol, invalid params)
function isRetryable(err: Error): boolean {
  const msg = err.message;
  return !(msg.includes("Not Found") || msg.includes("Invalid") || msg.includes("no data"));
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Market context, underlying facts and daily bars from Yahoo Finance. */
export class YahooMarketData implements MarketDataSource {
  private readonly yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });

  constructor(private readonly opts: YahooMarketDataOptions) {}

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(() => withTimeout(fn(), this.opts.timeoutMs, label), {
        retries: this.opts.retries ?? 2,
        label,
        shouldRetry: isRetryable,
      });
    } catch (e: unknown) {
      throw new ProviderError("yahoo", `${label}: ${errorMessage(e)}`, { cause: e });
    }
  }

  private async lastPrice(symbol: string): Promise<number | null> {
    const q = await this.call(`quote ${symbol}`, () => this.yf.quote(symbol));
    return q.regularMarketPrice ?? null;
  }

  async getMarketContext(): Promise<MarketContext> {
    const [level, bars, vix] = await Promise.all([
      this.lastPrice(BENCHMARK),
      this.getDailyBars(BENCHMARK, 40),
      this.lastPrice(VOLATILITY_INDEX).catch((e: unknown) => {
        logMarket.warn({ err: errorMessage(e) }, "VIX unavailable");
        return null;
      }),
    ]);
    const average = sma(bars.map((b) => b.close), 20);
    const ctx: MarketContext = {
      benchmark: BENCHMARK,
      benchmarkLevel: level,
      benchmarkSma20: average,
      trend: trendFrom(level, average),
      volatility: vix,
      asOf: new Date().toISOString(),
    };
    logMarket.debug({ trend: ctx.trend, level, sma20: average, vix }, "Market context");
    return ctx;
  }

  async getUnderlyingFacts(symbol: string, asOf: string): Promise<UnderlyingFacts> {
    const [price, summary] = await Promise.all([
      this.lastPrice(symbol),
      this.call(`quoteSummary ${symbol}`, () =>
        this.yf.quoteSummary(symbol, { modules: ["calendarEvents", "assetProfile"] }),
      ),
    ]);
    const upcoming = (summary.calendarEvents?.earnings?.earningsDate ?? [])
      .map(isoDate)
      .filter((d) => d >= asOf)
      .sort();
    const next = upcoming[0] ?? null;
    return {
      symbol,
      price,
      sector: summary.assetProfile?.sector ?? null,
      nextEarningsDate: next,
      daysToEarnings: next ? daysBetween(asOf, next) : null,
    };
  }

  async getQuotes(symbols: readonly string[]): Promise<Map<string, number>> {
    const out = new Map<string, number>();
    const results = await Promise.allSettled(symbols.map(async (s) => [s, await this.lastPrice(s)] as const));
    for (const r of results) {
      if (r.status === "rejected") {
        logMarket.warn({ err: errorMessage(r.reason) }, "Quote failed");
        continue;
      }
      const [symbol, price] = r.value;
      if (price !== null) out.set(symbol, price);
    }
    return out;
  }

  async getDailyBars(symbol: string, days: number): Promise<DailyBar[]> {
    const period2 = new Date();
    // Calendar padding for weekends and holidays.
    const period1 = new Date(period2.getTime() - Math.ceil(days * 1.6 + 7) * 86_400_000);
    const chart = await this.call(`chart ${symbol}`, () =>
      this.yf.chart(symbol, { period1, period2, interval: "1d" }),
    );
    const bars: DailyBar[] = [];
    for (const q of chart.quotes) {
      const { open, high, low, close } = q;
      if (typeof open !== "number" || typeof high !== "number" || typeof low !== "number" || typeof close !== "number") continue;
      bars.push({ date: isoDate(q.date), open, high, low, close, volume: q.volume ?? 0 });
    }
    return bars.slice(-days);
  }
}
