import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Scheduler, type SchedulerDeps } from "../scheduler.js";
import { config, type AppConfig } from "../config.js";
import { Store } from "../db/store.js";
import { OracleError } from "../errors.js";
import type { FlowFetchResult, FlowProvider, RawFlowAlert } from "../flow/client.js";
import type { MarketDataSource } from "../market/types.js";
import type { Notification, Notifier } from "../notify/webhook.js";
import type { Oracle, OracleBatch, OracleOutcome, OracleResult } from "../oracle/types.js";
import { initialCycleState } from "../state/cycle-state.js";
import type { AccountSnapshot } from "../broker/types.js";
import { FakeBroker, LateFillBroker, makeFacts, makeMarket, makeNewPosition, twoSided } from "./helpers.js";

const SYMBOL = "AAPL250321C00200000";
const MSFT = "MSFT250321C00400000";
// Thursday, 10:00 in New York.
const NOW = new Date("2025-02-20T15:00:00Z");

const alert: RawFlowAlert = {
  id: "a1",
  ticker: "AAPL",
  type: "call",
  strike: 200,
  expiry: "2025-03-21",
  total_premium: 600_000,
  volume: 3000,
  open_interest: 1000,
  has_sweep: true,
  all_opening_trades: true,
  total_ask_side_prem: 500_000,
  total_bid_side_prem: 100_000,
  underlying_price: 200,
  option_chain: SYMBOL,
  sector: "Technology",
  created_at: "2025-02-20T14:55:00Z",
};

class FakeFlow implements FlowProvider {
  alerts: RawFlowAlert[] = [];
  calls: (string | null)[] = [];
  failing = false;

  async fetchAlerts(newerThan: string | null): Promise<FlowFetchResult> {
    this.calls.push(newerThan);
    if (this.failing) throw new Error("flow provider unreachable");
    const watermark = this.alerts.reduce<string | null>(
      (w, a) => (w === null || a.created_at > w ? a.created_at : w),
      newerThan,
    );
    return { alerts: this.alerts, malformed: 0, watermark };
  }

  async getIvRank(): Promise<number | null> {
    return 30;
  }
}

class FakeMarket implements MarketDataSource {
  failing = false;

  async getMarketContext() {
    if (this.failing) throw new Error("market data unreachable");
    return makeMarket();
  }
  async getUnderlyingFacts(symbol: string) {
    return makeFacts({ symbol });
  }
  async getQuotes(symbols: readonly string[]) {
    return new Map(symbols.map((s) => [s, 200]));
  }
  async getDailyBars() {
    return [];
  }
}

class FakeOracle implements Oracle {
  batches: OracleBatch[] = [];
  failing = false;
  convictions = new Map<string, number>();

  async evaluate(batch: OracleBatch): Promise<OracleResult> {
    this.batches.push(batch);
    const outcomes = new Map<string, OracleOutcome>();
    const callError = this.failing ? new OracleError("oracle timed out") : null;
    for (const c of batch.candidates) {
      outcomes.set(
        c.signal.id,
        callError
          ? { ok: false, error: callError }
          : {
              ok: true,
              verdict: {
                signalId: c.signal.id,
                recommendation: "EXECUTE",
                conviction: this.convictions.get(c.signal.id) ?? 85,
                thesis: "Opening sweep with the trend",
                riskFactors: [],
                sizingHint: null,
              },
            },
      );
    }
    return { outcomes, reviews: new Map(), callError, promptHash: "hash-1", latencyMs: 5 };
  }
}

class FakeNotifier implements Notifier {
  sent: Notification[] = [];
  async send(n: Notification): Promise<boolean> {
    this.sent.push(n);
    return true;
  }
}

class AccountlessBroker extends FakeBroker {
  override async getAccount(): Promise<AccountSnapshot> {
    throw new Error("not connected");
  }
}

function testConfig(overrides: (c: AppConfig) => void = () => {}): AppConfig {
  const c = structuredClone(config);
  c.shadowMode = false;
  c.reversal.enabled = false;
  c.scheduler.orderPollIntervalMs = 1;
  c.scheduler.orderConfirmTimeoutMs = 5;
  overrides(c);
  return c;
}

describe("Scheduler", () => {
  let store: Store;
  let broker: FakeBroker;
  let flow: FakeFlow;
  let oracle: FakeOracle;
  let notifier: FakeNotifier;

  function scheduler(extra: Partial<SchedulerDeps> = {}): Scheduler {
    return new Scheduler({
      flow,
      market: new FakeMarket(),
      broker,
      oracle,
      notifier,
      store,
      config: testConfig(),
      excluded: new Set(),
      sessionId: "session-test",
      clock: () => NOW,
      sleep: async () => {},
      ...extra,
    });
  }

  beforeEach(() => {
    store = new Store(":memory:");
    broker = new FakeBroker();
    broker.contracts = [
      { contractSymbol: SYMBOL, underlying: "AAPL", optionType: "call", strike: 200, expiration: "2025-03-21" },
    ];
    broker.quotes.set(SYMBOL, twoSided(4.9, 5.1));
    flow = new FakeFlow();
    flow.alerts = [alert];
    oracle = new FakeOracle();
    notifier = new FakeNotifier();
  });

  afterEach(() => {
    store.close();
  });

  it("runs a signal from intake to a confirmed fill", async () => {
    const s = scheduler();
    const summary = await s.runCycle();

    expect(summary.fetched).toBe(1);
    expect(summary.candidates).toBe(1);
    expect(summary.decisions).toEqual({ EXECUTE: 1, ALERT: 0, SKIP: 0, BLOCKED: 0 });
    expect(summary.executions).toEqual([{ signalId: "a1", result: "filled" }]);
    expect(summary.failures).toEqual([]);

    const [position] = store.getOpenPositions();
    expect(position?.quantity).toBe(9);
    expect(position?.entryPrice).toBe(5.1);
    expect(position?.signalScore).toBe(9);

    const state = s.getState();
    expect(state.executionsToday).toBe(1);
    expect(state.seenSignalIds).toEqual(["a1"]);
    expect(state.newerThan).toBe("2025-02-20T14:55:00Z");
    expect(state.lastCheck).toBe("2025-02-20T15:00:00.000Z");
    expect(store.loadState()?.executionsToday).toBe(1);

    expect(store.getDecisions()).toHaveLength(1);
    expect(oracle.batches).toHaveLength(1);
    const body = notifier.sent[0]?.body.split("\n") ?? [];
    expect(body.slice(0, 2)).toEqual([
      "candidates 1/1 · EXECUTE 1 · ALERT 0 · SKIP 0 · BLOCKED 0",
      "entry a1: filled",
    ]);
  });

  it("does not reprocess a signal it has already seen", async () => {
    const s = scheduler();
    await s.runCycle();
    broker.positions = [{ symbol: SYMBOL, secType: "OPT", quantity: 9, avgPrice: 5.1 }];
    const second = await s.runCycle();

    expect(flow.calls).toEqual([null, "2025-02-20T14:55:00Z"]);
    expect(second.candidates).toBe(0);
    expect(second.rejected).toEqual({ seen: 1 });
    expect(broker.placed).toHaveLength(1);
  });

  it("sends nothing in shadow mode but still counts the execution", async () => {
    const s = scheduler({ config: testConfig((c) => (c.shadowMode = true)) });
    const summary = await s.runCycle();

    expect(summary.executions).toEqual([{ signalId: "a1", result: "shadow" }]);
    expect(broker.placed).toHaveLength(0);
    expect(store.getOpenPositions()).toHaveLength(0);
    expect(s.getState().executionsToday).toBe(1);
  });

  it("downgrades to ALERT and counts a failure when the oracle fails", async () => {
    oracle.failing = true;
    const s = scheduler();
    const summary = await s.runCycle();

    expect(summary.decisions.ALERT).toBe(1);
    expect(summary.failures).toEqual(["oracle"]);
    expect(broker.placed).toHaveLength(0);
    expect(s.getState().breaker.consecutiveErrors).toBe(1);
  });

  it("blocks execution while the breaker is open", async () => {
    store.saveState({
      ...initialCycleState("previous", NOW, "America/New_York"),
      breaker: { status: "open", consecutiveErrors: 3, openedAt: NOW.toISOString() },
    });
    const s = scheduler();
    const summary = await s.runCycle();

    expect(summary.decisions.BLOCKED).toBe(1);
    expect(broker.placed).toHaveLength(0);
    // A clean cycle closes the breaker afterwards.
    expect(summary.breakerTransitions).toEqual(["closed"]);
    expect(s.getState().sessionId).toBe("session-test");
  });

  it("opens the breaker after three failing cycles and notifies once", async () => {
    broker = new AccountlessBroker();
    const s = scheduler();
    await s.runCycle();
    await s.runCycle();
    const third = await s.runCycle();

    expect(third.failures).toEqual(["broker"]);
    expect(third.breakerTransitions).toEqual(["opened"]);
    expect(s.getState().breaker.status).toBe("open");
    const breakerAlerts = notifier.sent.filter((n) => n.dedupKey === "breaker:opened");
    expect(breakerAlerts).toHaveLength(1);
    expect(breakerAlerts[0]?.severity).toBe("critical");
    expect(breakerAlerts[0]?.title).toBe("Circuit breaker opened");
  });

  it("counts a cycle with several failing sources as a single failure", async () => {
    broker = new AccountlessBroker();
    flow.failing = true;
    const market = new FakeMarket();
    market.failing = true;
    const s = scheduler({ market });
    const summary = await s.runCycle();

    expect(summary.failures).toEqual(["flow", "market", "broker"]);
    expect(summary.breakerTransitions).toEqual([]);
    expect(s.getState().breaker).toEqual({ status: "closed", consecutiveErrors: 1, openedAt: null });
  });

  it("settles an unconfirmed entry on a later cycle and gates on it meanwhile", async () => {
    const late = new LateFillBroker();
    late.contracts = broker.contracts;
    late.quotes = broker.quotes;
    broker = late;
    const s = scheduler();
    const first = await s.runCycle();

    expect(first.executions).toEqual([{ signalId: "a1", result: "ambiguous" }]);
    expect(store.getPendingEntries()).toHaveLength(1);
    expect(store.getOpenPositions()).toHaveLength(0);
    expect(s.getState().executionsToday).toBe(1);

    late.release();
    late.positions = [{ symbol: SYMBOL, secType: "OPT", quantity: 9, avgPrice: 5.1 }];
    flow.alerts = [{ ...alert, id: "a2", created_at: "2025-02-20T14:58:00Z" }];
    const second = await s.runCycle();

    expect(store.getPendingEntries()).toEqual([]);
    const open = store.getOpenPositions();
    expect(open).toHaveLength(1);
    expect(open[0]?.signalId).toBe("a1");
    expect(open[0]?.quantity).toBe(9);
    expect(open[0]?.entryPrice).toBe(5.1);
    expect(second.decisions.ALERT).toBe(1);
    expect(second.executions).toEqual([]);
    expect(late.placed).toHaveLength(1);
    expect(s.getState().executionsToday).toBe(1);
    const [latest] = store.getDecisions(1);
    expect(latest?.signal_id).toBe("a2");
    expect(JSON.parse(latest?.failed_checks ?? "[]")).toContain("existing_underlying");
  });

  describe("with a second underlying", () => {
    beforeEach(() => {
      broker.contracts.push({
        contractSymbol: MSFT,
        underlying: "MSFT",
        optionType: "call",
        strike: 400,
        expiration: "2025-03-21",
      });
      broker.quotes.set(MSFT, twoSided(4.9, 5.1));
      flow.alerts = [alert, { ...alert, id: "b1", ticker: "MSFT", strike: 400, underlying_price: 400, option_chain: MSFT }];
    });

    it("lets only an exceptional conviction past the daily cap and counts the override", async () => {
      oracle.convictions.set("b1", 95);
      store.saveState({ ...initialCycleState("previous", NOW, "America/New_York"), executionsToday: 1 });
      const s = scheduler({ config: testConfig((c) => (c.gate.maxExecutionsPerDay = 1)) });
      const summary = await s.runCycle();

      expect(summary.decisions).toEqual({ EXECUTE: 1, ALERT: 1, SKIP: 0, BLOCKED: 0 });
      expect(summary.executions).toEqual([{ signalId: "b1", result: "filled" }]);
      expect(s.getState().executionsToday).toBe(2);
      expect(s.getState().exceptionalOverridesToday).toBe(1);
      const bySignal = new Map(store.getDecisions().map((r) => [r.signal_id, r]));
      expect(bySignal.get("b1")?.used_override).toBe(1);
      expect(bySignal.get("a1")?.action).toBe("ALERT");
      expect(JSON.parse(bySignal.get("a1")?.failed_checks ?? "[]")).toContain("daily_executions");
    });

    it("gates a later candidate against the allocation an earlier fill added", async () => {
      const s = scheduler({ config: testConfig((c) => (c.gate.maxOptionsAllocationPct = 0.04)) });
      const summary = await s.runCycle();

      expect(summary.decisions.EXECUTE).toBe(1);
      expect(summary.decisions.ALERT).toBe(1);
      expect(summary.risk?.optionsMarketValue).toBeCloseTo(4590, 6);
      const alerted = store.getDecisions().find((r) => r.action === "ALERT");
      expect(JSON.parse(alerted?.failed_checks ?? "[]")).toContain("options_allocation");
    });
  });

  it("closes stored positions the broker no longer reports", async () => {
    flow.alerts = [];
    const stale = store.insertPosition(makeNewPosition());
    const s = scheduler();
    await s.runCycle();

    const closed = store.getPosition(stale.id);
    expect(closed?.status).toBe("closed");
    expect(closed?.exitReason).toBe("broker_reconcile");
    expect(oracle.batches).toHaveLength(0);
  });

  it("exits a position through its hard stop", async () => {
    flow.alerts = [];
    const p = store.insertPosition(makeNewPosition());
    broker.positions = [{ symbol: SYMBOL, secType: "OPT", quantity: 2, avgPrice: 5 }];
    broker.quotes.set(SYMBOL, twoSided(1.9, 2.1));
    const s = scheduler();
    const summary = await s.runCycle();

    expect(summary.exits).toHaveLength(1);
    expect(summary.exits[0]?.evaluation.rule).toBe("hard_stop_loss");
    expect(summary.exits[0]?.outcome).toEqual({ status: "closed", exitPrice: 1.96 });
    expect(store.getPosition(p.id)?.exitReason).toBe("hard_stop_loss");
    expect(oracle.batches[0]?.holdings.map((h) => h.contractSymbol)).toEqual([SYMBOL]);
  });

  it("skips a tick outside the session", async () => {
    const saturday = new Date("2025-02-22T15:00:00Z");
    const s = scheduler({ clock: () => saturday });
    expect(await s.tick()).toBeNull();
    expect(flow.calls).toHaveLength(0);
  });
});
