import { readFileSync } from "fs";

// Broad-market, leveraged, volatility and manipulation-prone symbols.
// Flow on these is mostly hedging and dilutes single-name conviction.
const DATA_FILE = new URL("../../data/excluded-tickers.json", import.meta.url);

let cached: ReadonlySet<string> | null = null;

export function loadExcludedTickers(): ReadonlySet<string> {
  if (cached) return cached;
  const parsed: unknown = JSON.parse(readFileSync(DATA_FILE, "utf-8"));
  const set = new Set<string>();
  if (parsed && typeof parsed === "object") {
    for (const group of Object.values(parsed)) {
      if (!Array.isArray(group)) continue;
      for (const t of group) {
        if (typeof t === "string") set.add(t.toUpperCase());
      }
    }
  }
  cached = set;
  return set;
}
