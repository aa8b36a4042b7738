/**
 * Webhook notifier. Posts pipeline notifications to Discord/Slack.
 *
 * Deduplicates by key within a window, retries with exponential backoff,
 * honours 429 retry-after, and no-ops when no URL is configured.
 */
import { errorMessage } from "../errors.js";
import { logNotify } from "../logging.js";
import { sleep as defaultSleep } from "../retry.js";

export type Severity = "critical" | "warning" | "info";

export interface Notification {
  severity: Severity;
  title: string;
  body: string;
  /** Notifications sharing a key are sent at most once per dedup window. */
  dedupKey?: string;
}

export interface Notifier {
  send(n: Notification): Promise<boolean>;
}

const MAX_RETRIES = 3;
const RETRY_BASE_MS = 1000;
// Discord rejects content over 2000 characters
const MAX_CONTENT = 2000;

const SEVERITY_EMOJI: Record<Severity, string> = {
  critical: "\u{1F534}", // red circle
  warning: "\u{1F7E1}",  // yellow circle
  info: "\u{1F535}",      // blue circle
};

export function formatMessage(n: Notification): string {
  const text = `${SEVERITY_EMOJI[n.severity]} **${n.title}**\n${n.body}`;
  return text.length > MAX_CONTENT ? `${text.slice(0, MAX_CONTENT - 1)}…` : text;
}

export interface WebhookNotifierOptions {
  url: string;
  dedupWindowMs: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class WebhookNotifier implements Notifier {
  private readonly lastDispatched = new Map<string, number>();
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly opts: WebhookNotifierOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
    this.now = opts.now ?? Date.now;
  }

  /** Resolves false when skipped or undeliverable; never rejects. */
  async send(n: Notification): Promise<boolean> {
    if (!this.opts.url) return false;

    const t = this.now();
    if (n.dedupKey) {
      const last = this.lastDispatched.get(n.dedupKey);
      if (last !== undefined && t - last < this.opts.dedupWindowMs) {
        logNotify.debug({ key: n.dedupKey }, "Notification deduplicated");
        return false;
      }
      this.lastDispatched.set(n.dedupKey, t);
      for (const [key, ts] of this.lastDispatched) {
        if (t - ts > this.opts.dedupWindowMs * 2) this.lastDispatched.delete(key);
      }
    }

    // Discord webhook format: { content: string }
    const ok = await this.postWithRetry({ content: formatMessage(n) });
    if (!ok) logNotify.warn({ title: n.title }, "Webhook delivery failed");
    return ok;
  }

  private async postWithRetry(body: object): Promise<boolean> {
    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      try {
        const res = await this.fetchImpl(this.opts.url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(10_000),
        });
        if (res.ok || res.status === 204) return true;
        // Rate limited
        if (res.status === 429) {
          const retryAfter = parseInt(res.headers.get("retry-after") ?? "2", 10);
          await this.sleep((Number.isFinite(retryAfter) ? retryAfter : 2) * 1000);
          continue;
        }
        logNotify.debug({ status: res.status, attempt }, "Webhook rejected");
      } catch (e: unknown) {
        logNotify.debug({ attempt, err: errorMessage(e) }, "Webhook network error");
      }
      if (attempt < MAX_RETRIES - 1) {
        await this.sleep(RETRY_BASE_MS * Math.pow(2, attempt));
      }
    }
    return false;
  }
}
