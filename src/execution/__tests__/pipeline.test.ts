import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { executeSignal, settlePendingEntry, type ExecutionDeps, type ExecutionSettings } from "../pipeline.js";
import { Store } from "../../db/store.js";
import { assembleContext } from "../../gate/context.js";
import { decide } from "../../gate/decide.js";
import type { Decision, DecisionContext, GateLimits } from "../../gate/types.js";
import { FakeBroker, LateFillBroker, makeFacts, makeMarket, makeRisk, makeScored, twoSided } from "../../__tests__/helpers.js";

const SYMBOL = "AAPL250321C00200000";
const now = new Date("2025-02-20T15:00:00Z");

const settings: ExecutionSettings = {
  sizing: {
    maxContractsPerTrade: 10,
    maxPositionValue: 5000,
    maxEquityPct: 0.05,
    lotSize: 1,
    strikeTolerancePct: 0.05,
    limitBufferPct: 0.02,
  },
  liquidity: { maxSpreadPct: 0.15, minBid: 0.1, minBidSize: 10 },
  dteWindow: { minDte: 14, maxDte: 45 },
  risk: { riskFreeRate: 0.04, defaultIv: 0.3 },
  orders: { pollIntervalMs: 1, timeoutMs: 5 },
  shadowMode: false,
};

const limits: GateLimits = {
  minConviction: 80,
  exceptionalConviction: 90,
  minRiskCapacity: 0.2,
  maxExecutionsPerDay: 3,
  maxPositions: 4,
  maxOptionsAllocationPct: 0.3,
  maxConcentration: 0.5,
  earningsBlackoutDays: 2,
};

function approved(): { decision: Decision; ctx: DecisionContext } {
  const ctx = assembleContext({
    signal: makeScored(),
    market: makeMarket(),
    portfolio: makeRisk(),
    facts: makeFacts(),
    exposures: [],
    candidateValue: 5000,
    now,
  });
  const decision = decide({
    ctx,
    outcome: {
      ok: true,
      verdict: { signalId: "sig-1", recommendation: "EXECUTE", conviction: 85, thesis: "Momentum", riskFactors: [], sizingHint: null },
    },
    counters: { executionsToday: 0, openPositionCount: 0, openUnderlyings: new Set() },
    limits,
    blocked: null,
    now,
  });
  return { decision, ctx };
}

describe("executeSignal", () => {
  let store: Store;
  let broker: FakeBroker;
  let deps: ExecutionDeps;

  beforeEach(() => {
    store = new Store(":memory:");
    broker = new FakeBroker();
    broker.contracts = [
      { contractSymbol: SYMBOL, underlying: "AAPL", optionType: "call", strike: 200, expiration: "2025-03-21" },
    ];
    broker.quotes.set(SYMBOL, twoSided(4.9, 5.1));
    deps = { broker, store, settings, submitted: new Set(), sleep: async () => {} };
  });

  afterEach(() => {
    store.close();
  });

  it("fills and records the position with its entry thesis", async () => {
    const r = await executeSignal(deps, { ...approved(), asOf: "2025-02-20", now });
    expect(r.status).toBe("filled");
    if (r.status !== "filled") return;
    expect(r.partial).toBe(false);
    expect(r.position.contractSymbol).toBe(SYMBOL);
    expect(r.position.quantity).toBe(9);
    expect(r.position.entryPrice).toBe(5.1);
    expect(r.position.entryThesis.trendAtEntry).toBe("bullish");
    expect(r.position.entryThesis.conviction).toBe(85);
    expect(r.position.openedAt).toBe("2025-02-20T15:00:00.000Z");
    expect(broker.placed).toEqual([
      { symbol: SYMBOL, secType: "OPT", side: "BUY", quantity: 9, limitPrice: 5.1, clientTag: "entry:sig-1" },
    ]);
    expect(store.getOpenPositions()).toHaveLength(1);
  });

  it("sends nothing in shadow mode", async () => {
    const r = await executeSignal(
      { ...deps, settings: { ...settings, shadowMode: true } },
      { ...approved(), asOf: "2025-02-20", now },
    );
    expect(r).toEqual({ status: "shadow", contractSymbol: SYMBOL, contracts: 9, limitPrice: 5.1 });
    expect(broker.placed).toHaveLength(0);
    expect(store.getOpenPositions()).toHaveLength(0);
  });

  it("stops when no listed contract fits", async () => {
    broker.contracts = [];
    const r = await executeSignal(deps, { ...approved(), asOf: "2025-02-20", now });
    expect(r).toEqual({ status: "no_contract" });
  });

  it("stops on an illiquid quote", async () => {
    broker.quotes.set(SYMBOL, twoSided(0.05, 0.5, 2));
    const r = await executeSignal(deps, { ...approved(), asOf: "2025-02-20", now });
    expect(r.status).toBe("illiquid");
    if (r.status === "illiquid") expect(r.error.reasons).toHaveLength(3);
    expect(broker.placed).toHaveLength(0);
  });

  it("stops when one contract exceeds the budget", async () => {
    broker.quotes.set(SYMBOL, twoSided(60, 60.5));
    const r = await executeSignal(deps, { ...approved(), asOf: "2025-02-20", now });
    expect(r).toEqual({ status: "zero_size", contractSymbol: SYMBOL });
  });

  it("records nothing for a rejected order", async () => {
    broker.fillMode = "reject";
    const r = await executeSignal(deps, { ...approved(), asOf: "2025-02-20", now });
    expect(r).toEqual({ status: "unfilled", contractSymbol: SYMBOL, orderStatus: "rejected" });
    expect(store.getOpenPositions()).toHaveLength(0);
  });

  describe("unconfirmed entries", () => {
    let late: LateFillBroker;

    beforeEach(() => {
      late = new LateFillBroker();
      late.contracts = broker.contracts;
      late.quotes = broker.quotes;
    });

    it("keeps the order as pending and records the position once it fills", async () => {
      const r = await executeSignal({ ...deps, broker: late }, { ...approved(), asOf: "2025-02-20", now });
      expect(r.status).toBe("ambiguous");
      expect(late.cancelled).toEqual(["1"]);
      expect(store.getOpenPositions()).toHaveLength(0);

      const [pending] = store.getPendingEntries();
      expect(pending).toMatchObject({
        orderId: "1",
        clientTag: "entry:sig-1",
        requestedQty: 9,
        limitPrice: 5.1,
        spot: 200,
        usedOverride: false,
      });
      expect(pending?.template.contractSymbol).toBe(SYMBOL);
      if (!pending) return;

      late.release();
      const report = await late.getOrderStatus("1");
      const position = settlePendingEntry(store, settings.risk, pending, report, "2025-02-20");
      expect(position?.quantity).toBe(9);
      expect(position?.entryPrice).toBe(5.1);
      expect(position?.signalId).toBe("sig-1");
      expect(position?.openedAt).toBe("2025-02-20T15:00:00.000Z");
      expect(store.getPendingEntries()).toEqual([]);
      expect(store.getOpenPositions()).toHaveLength(1);
    });

    it("drops a pending order that ended without a fill", async () => {
      await executeSignal({ ...deps, broker: late }, { ...approved(), asOf: "2025-02-20", now });
      const [pending] = store.getPendingEntries();
      if (!pending) throw new Error("expected a pending entry");

      const report = { orderId: "1", status: "cancelled" as const, filledQty: 0, avgFillPrice: null };
      expect(settlePendingEntry(store, settings.risk, pending, report, "2025-02-20")).toBeNull();
      expect(store.getPendingEntries()).toEqual([]);
      expect(store.getOpenPositions()).toHaveLength(0);
    });
  });

  it("refuses a decision that is not EXECUTE", async () => {
    const { decision, ctx } = approved();
    await expect(
      executeSignal(deps, { decision: { ...decision, action: "ALERT" }, ctx, asOf: "2025-02-20", now }),
    ).rejects.toThrow("executeSignal called for sig-1 with action ALERT");
  });
});
