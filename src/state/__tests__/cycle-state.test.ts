import { describe, it, expect } from "vitest";
import { ensureTradingDate, initialCycleState, markSeen, recordExecution } from "../cycle-state.js";

const tz = "America/New_York";

describe("cycle state", () => {
  it("takes the trading date from the venue timezone", () => {
    // 03:30 UTC is still the previous evening in New York
    const state = initialCycleState("s", new Date("2025-02-21T03:30:00Z"), tz);
    expect(state.tradingDate).toBe("2025-02-20");
  });

  it("resets daily counters and the seen set when the venue date advances", () => {
    const state = {
      ...initialCycleState("s", new Date("2025-02-20T15:00:00Z"), tz),
      executionsToday: 3,
      exceptionalOverridesToday: 1,
      seenSignalIds: ["a"],
      newerThan: "2025-02-20T20:00:00Z",
    };
    const sameDay = ensureTradingDate(state, new Date("2025-02-21T04:00:00Z"), tz);
    expect(sameDay.reset).toBe(false);
    expect(sameDay.state).toBe(state);

    const nextDay = ensureTradingDate(state, new Date("2025-02-21T14:30:00Z"), tz);
    expect(nextDay.reset).toBe(true);
    expect(nextDay.state).toMatchObject({
      tradingDate: "2025-02-21",
      executionsToday: 0,
      exceptionalOverridesToday: 0,
      seenSignalIds: [],
      newerThan: "2025-02-20T20:00:00Z",
    });
  });

  it("caps the seen set, evicting the oldest ids", () => {
    let state = initialCycleState("s", new Date("2025-02-20T15:00:00Z"), tz);
    state = markSeen(state, ["a", "b", "c"], 4);
    state = markSeen(state, ["a", "d", "e"], 4);
    expect(state.seenSignalIds).toEqual(["c", "a", "d", "e"]);
  });

  it("counts exceptional overrides separately", () => {
    let state = initialCycleState("s", new Date("2025-02-20T15:00:00Z"), tz);
    state = recordExecution(state, false);
    state = recordExecution(state, true);
    expect(state.executionsToday).toBe(2);
    expect(state.exceptionalOverridesToday).toBe(1);
  });
});
