import type { OracleBatch } from "../types.js";
import { makeFacts, makeMarket, makeRisk, makeScored } from "../../__tests__/helpers.js";

export function makeBatch(ids: string[] = ["sig-1", "sig-2"]): OracleBatch {
  return {
    market: makeMarket(),
    portfolio: makeRisk(),
    candidates: ids.map((id) => ({
      signal: makeScored({ id }),
      facts: makeFacts(),
      projectedConcentration: { sector: 1, underlying: 1 },
    })),
    holdings: [
      {
        contractSymbol: "MSFT250321C00400000",
        underlying: "MSFT",
        optionType: "call",
        strike: 400,
        expiration: "2025-03-21",
        quantity: 1,
        entryPrice: 8,
        mark: 9,
        entryConviction: 84,
        entryThesis: "Cloud strength",
      },
    ],
  };
}

export function evaluation(id: string, conviction = 85) {
  return {
    signal_id: id,
    recommendation: "EXECUTE",
    conviction,
    thesis: "Aggressive opening call buying",
    risk_factors: ["macro"],
  };
}
