import { z } from "zod";
import { ProviderError, errorMessage } from "../errors.js";
import { logFlow } from "../logging.js";

const numeric = z.coerce.number().finite();

/** Unusual Whales flow-alert record. Numeric fields arrive as strings. */
export const RawFlowAlertSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  ticker: z.string().min(1),
  type: z.string(),
  strike: numeric,
  expiry: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  total_premium: numeric,
  total_size: numeric.optional(),
  volume: numeric.optional(),
  open_interest: numeric.optional(),
  volume_oi_ratio: numeric.nullish(),
  has_sweep: z.boolean().optional(),
  has_floor: z.boolean().optional(),
  all_opening_trades: z.boolean().optional(),
  total_ask_side_prem: numeric.optional(),
  total_bid_side_prem: numeric.optional(),
  underlying_price: numeric.nullish(),
  option_chain: z.string().optional(),
  sector: z.string().nullish(),
  created_at: z.string(),
});

export type RawFlowAlert = z.output<typeof RawFlowAlertSchema>;

const EnvelopeSchema = z.object({ data: z.array(z.unknown()) });

const IvRankRowSchema = z.object({
  iv_rank_1y: numeric.nullish(),
  iv_rank: numeric.nullish(),
});

const IvRankEnvelopeSchema = z.object({
  data: z.union([z.array(IvRankRowSchema), IvRankRowSchema]),
});

export interface FlowFetchResult {
  alerts: RawFlowAlert[];
  malformed: number;
  /** Largest created_at seen, or the input watermark when nothing newer arrived. */
  watermark: string | null;
}

export interface FlowProvider {
  fetchAlerts(newerThan: string | null): Promise<FlowFetchResult>;
  getIvRank(ticker: string): Promise<number | null>;
}

export interface FlowClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  minPremium: number;
  limit: number;
  fetchImpl?: typeof fetch;
}

export class UnusualWhalesClient implements FlowProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: FlowClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private async getJson(path: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`/api${path}`, this.opts.baseUrl);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { Authorization: `Bearer ${this.opts.apiKey}`, Accept: "application/json" },
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (e: unknown) {
      throw new ProviderError("unusual-whales", `request to ${path} failed: ${errorMessage(e)}`, { cause: e });
    }
    if (!res.ok) {
      throw new ProviderError("unusual-whales", `${path} returned HTTP ${res.status}`);
    }
    try {
      return await res.json();
    } catch (e: unknown) {
      throw new ProviderError("unusual-whales", `${path} returned invalid JSON`, { cause: e });
    }
  }

  async fetchAlerts(newerThan: string | null): Promise<FlowFetchResult> {
    const params: Record<string, string> = {
      min_premium: String(this.opts.minPremium),
      limit: String(this.opts.limit),
      issue_types: "Common Stock",
    };
    if (newerThan) params.newer_than = newerThan;

    const body = await this.getJson("/option-trades/flow-alerts", params);
    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new ProviderError("unusual-whales", `flow-alerts payload malformed: ${envelope.error.message}`);
    }

    const alerts: RawFlowAlert[] = [];
    let malformed = 0;
    let watermark = newerThan;
    for (const item of envelope.data.data) {
      const parsed = RawFlowAlertSchema.safeParse(item);
      if (!parsed.success) {
        malformed++;
        continue;
      }
      alerts.push(parsed.data);
      if (watermark === null || parsed.data.created_at > watermark) watermark = parsed.data.created_at;
    }
    if (malformed > 0) logFlow.warn({ malformed }, "Dropped malformed flow alerts");
    return { alerts, malformed, watermark };
  }

  async getIvRank(ticker: string): Promise<number | null> {
    const body = await this.getJson(`/stock/${encodeURIComponent(ticker)}/iv-rank`, {});
    const parsed = IvRankEnvelopeSchema.safeParse(body);
    if (!parsed.success) return null;
    const rows = Array.isArray(parsed.data.data) ? parsed.data.data : [parsed.data.data];
    const latest = rows[rows.length - 1];
    if (!latest) return null;
    const rank = latest.iv_rank_1y ?? latest.iv_rank ?? null;
    if (rank === null) return null;
    // Some responses report 0-1, others 0-100
    return rank <= 1 ? rank * 100 : rank;
  }
}
