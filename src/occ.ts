import type { OptionType } from "./flow/types.js";

export interface OccParts {
  underlying: string;
  expiration: string; // YYYY-MM-DD
  optionType: OptionType;
  strike: number;
}

const OCC_RE = /^([A-Z.]{1,6})(\d{2})(\d{2})(\d{2})([CP])(\d{8})$/;

/** Parse an OCC option symbol such as AAPL250117C00150000. */
export function parseOcc(symbol: string): OccParts | null {
  const m = OCC_RE.exec(symbol.replace(/\s+/g, "").toUpperCase());
  if (!m) return null;
  const [, root, yy, mm, dd, cp, strike] = m;
  if (!root || !yy || !mm || !dd || !cp || !strike) return null;
  return {
    underlying: root,
    expiration: `20${yy}-${mm}-${dd}`,
    optionType: cp === "C" ? "call" : "put",
    strike: parseInt(strike, 10) / 1000,
  };
}

export function formatOcc(parts: OccParts): string {
  const [yyyy, mm, dd] = parts.expiration.split("-");
  const yy = (yyyy ?? "").slice(2);
  const cp = parts.optionType === "call" ? "C" : "P";
  const strike = String(Math.round(parts.strike * 1000)).padStart(8, "0");
  return `${parts.underlying.toUpperCase()}${yy}${mm ?? ""}${dd ?? ""}${cp}${strike}`;
}
