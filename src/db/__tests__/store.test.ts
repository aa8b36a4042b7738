import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Store } from "../store.js";
import { initialCycleState } from "../../state/cycle-state.js";
import { makeNewPosition, makeRisk } from "../../__tests__/helpers.js";
import type { Decision } from "../../gate/types.js";

describe("Store", () => {
  let store: Store;

  beforeEach(() => {
    store = new Store(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  describe("cycle state", () => {
    it("is null before the first save", () => {
      expect(store.loadState()).toBeNull();
    });

    it("round-trips the whole record and keeps a single row", () => {
      const state = {
        ...initialCycleState("session-1", new Date("2025-02-20T15:00:00Z"), "America/New_York"),
        executionsToday: 2,
        seenSignalIds: ["a", "b"],
        lastPortfolio: makeRisk({ riskScore: 25, riskCapacity: 0.75 }),
      };
      store.saveState(state);
      store.saveState({ ...state, executionsToday: 3 });
      expect(store.loadState()).toEqual({ ...state, executionsToday: 3 });
    });
  });

  describe("positions", () => {
    it("inserts and reads back an open position", () => {
      const p = store.insertPosition(makeNewPosition());
      expect(p).toMatchObject({
        contractSymbol: "AAPL250321C00200000",
        status: "open",
        quantity: 2,
        currentGreeks: null,
        lastMark: null,
        exitReason: null,
      });
      expect(store.getOpenPositions().map((o) => o.id)).toEqual([p.id]);
    });

    it("allows only one open position per contract", () => {
      store.insertPosition(makeNewPosition());
      expect(() => store.insertPosition(makeNewPosition({ signalId: "sig-2" }))).toThrow(/UNIQUE/);
    });

    it("allows reopening a contract after the first is closed", () => {
      const first = store.insertPosition(makeNewPosition());
      store.closePosition(first.id, { exitPrice: 6, exitGreeks: null, exitReason: "profit_target", closedAt: "2025-02-20T16:00:00Z" });
      expect(() => store.insertPosition(makeNewPosition({ signalId: "sig-2" }))).not.toThrow();
    });

    it("writes exit fields exactly once", () => {
      const p = store.insertPosition(makeNewPosition());
      const first = store.closePosition(p.id, {
        exitPrice: 2.5,
        exitGreeks: { delta: 0.3, gamma: 0.01, theta: -0.04, vega: 0.1 },
        exitReason: "stop_loss",
        closedAt: "2025-02-20T16:00:00Z",
      });
      const second = store.closePosition(p.id, {
        exitPrice: 9,
        exitGreeks: null,
        exitReason: "profit_target",
        closedAt: "2025-02-21T16:00:00Z",
      });
      expect([first, second]).toEqual([true, false]);
      const closed = store.getPosition(p.id);
      expect(closed?.status).toBe("closed");
      expect(closed?.exitPrice).toBe(2.5);
      expect(closed?.exitReason).toBe("stop_loss");
      expect(closed?.exitGreeks).toEqual({ delta: 0.3, gamma: 0.01, theta: -0.04, vega: 0.1 });
      expect(store.getOpenPositions()).toEqual([]);
      expect(store.getClosedPositions().map((c) => c.id)).toEqual([p.id]);
    });

    it("records snapshots and keeps the last known mark when a new one is missing", () => {
      const p = store.insertPosition(makeNewPosition());
      const greeks = { delta: 0.6, gamma: 0.03, theta: -0.06, vega: 0.2 };
      store.updateSnapshot(p.id, { greeks, mark: 6.1, iv: 0.32, underlyingPrice: 205, takenAt: "2025-02-20T15:00:00Z" });
      store.updateSnapshot(p.id, { greeks, mark: null, iv: null, underlyingPrice: null, takenAt: "2025-02-20T15:05:00Z" });
      const updated = store.getPosition(p.id);
      expect(updated?.lastMark).toBe(6.1);
      expect(updated?.currentGreeks).toEqual(greeks);
      expect(updated?.lastSnapshotAt).toBe("2025-02-20T15:05:00Z");
      expect(store.getSnapshotCount(p.id)).toBe(2);
    });

    it("reduces quantity and refuses to reduce to zero", () => {
      const p = store.insertPosition(makeNewPosition({ quantity: 4 }));
      store.reduceQuantity(p.id, 2);
      expect(store.getPosition(p.id)?.quantity).toBe(2);
      expect(() => store.reduceQuantity(p.id, 0)).toThrow("Cannot reduce position");
    });
  });

  describe("audit", () => {
    it("records decisions with their reason trail", () => {
      const decision: Decision = {
        signalId: "sig-1",
        underlying: "AAPL",
        action: "ALERT",
        history: [{ state: "RECEIVED", at: "2025-02-20T15:00:00Z" }],
        recommendation: "EXECUTE",
        conviction: 95,
        verdict: null,
        checks: [],
        failedChecks: ["risk_level"],
        reasons: ["risk_level"],
        usedOverride: false,
        oracleError: null,
        signalScore: 7,
        scoreFactors: ["sweep"],
        decidedAt: "2025-02-20T15:00:00Z",
      };
      store.recordDecision(decision, "abc123");
      const [row] = store.getDecisions();
      expect(row?.action).toBe("ALERT");
      expect(row?.prompt_hash).toBe("abc123");
      expect(JSON.parse(row?.failed_checks ?? "null")).toEqual(["risk_level"]);
    });

    it("tracks first-seen dates for stock holdings and forgets sold ones", () => {
      expect(store.syncStockHoldings(["KO", "PEP"], "2025-02-18")).toEqual(
        new Map([
          ["KO", "2025-02-18"],
          ["PEP", "2025-02-18"],
        ]),
      );
      expect(store.syncStockHoldings(["KO"], "2025-02-20")).toEqual(new Map([["KO", "2025-02-18"]]));
      expect(store.syncStockHoldings(["KO", "PEP"], "2025-02-21").get("PEP")).toBe("2025-02-21");
    });
  });
});
