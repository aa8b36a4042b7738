import { ProviderError, errorMessage } from "../errors.js";
import { logFlow } from "../logging.js";
import type { FlowProvider } from "./client.js";
import { parseAlert } from "./parse.js";
import { rank, screen, type ScreenContext } from "./prefilter.js";
import type { FlowSignal, RejectReason, ScoredSignal } from "./types.js";

export interface IntakeBatch {
  signals: FlowSignal[];
  /** Every id fetched this cycle, parsed or not; all are marked seen. */
  fetchedIds: string[];
  watermark: string | null;
  malformed: number;
  error: ProviderError | null;
}

/** The high-water mark only moves forward. */
export function advanceWatermark(current: string | null, next: string | null): string | null {
  if (next === null) return current;
  if (current === null) return next;
  return next > current ? next : current;
}

/**
 * Fetch and parse new alerts. A provider failure yields an empty batch with
 * the error attached, so the cycle carries on without candidates.
 */
export async function intake(provider: FlowProvider, newerThan: string | null): Promise<IntakeBatch> {
  try {
    const res = await provider.fetchAlerts(newerThan);
    const signals: FlowSignal[] = [];
    let malformed = res.malformed;
    for (const raw of res.alerts) {
      const signal = parseAlert(raw);
      if (signal) signals.push(signal);
      else malformed++;
    }
    logFlow.info({ fetched: res.alerts.length, parsed: signals.length, malformed }, "Flow intake");
    return {
      signals,
      fetchedIds: res.alerts.map((a) => a.id),
      watermark: advanceWatermark(newerThan, res.watermark),
      malformed,
      error: null,
    };
  } catch (e: unknown) {
    const error = e instanceof ProviderError ? e : new ProviderError("flow", errorMessage(e), { cause: e });
    logFlow.warn({ err: error }, "Flow intake failed; no candidates this cycle");
    return { signals: [], fetchedIds: [], watermark: newerThan, malformed: 0, error };
  }
}

/** Fill in IV rank per underlying; a failed lookup leaves it unknown. */
export async function attachIvRanks(provider: FlowProvider, signals: readonly FlowSignal[]): Promise<FlowSignal[]> {
  const tickers = [...new Set(signals.map((s) => s.underlying))];
  const ranks = new Map<string, number | null>();
  await Promise.all(
    tickers.map(async (t) => {
      try {
        ranks.set(t, await provider.getIvRank(t));
      } catch (e: unknown) {
        logFlow.debug({ ticker: t, err: errorMessage(e) }, "IV rank unavailable");
        ranks.set(t, null);
      }
    }),
  );
  return signals.map((s) => Object.freeze({ ...s, ivRank: s.ivRank ?? ranks.get(s.underlying) ?? null }));
}

export interface Selection {
  candidates: ScoredSignal[];
  rejected: Partial<Record<RejectReason, number>>;
}

/** Screen, enrich the survivors with IV rank, then score and rank them. */
export async function selectCandidates(
  provider: FlowProvider,
  signals: readonly FlowSignal[],
  ctx: ScreenContext,
): Promise<Selection> {
  const screened = screen(signals, ctx);
  const enriched = await attachIvRanks(provider, screened.passed);
  const ranked = rank(enriched, ctx);
  return { candidates: ranked.candidates, rejected: { ...screened.rejected, ...ranked.rejected } };
}
