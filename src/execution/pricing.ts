import type { OrderSide } from "../broker/types.js";

const EPS = 1e-9;

function floorCents(x: number): number {
  return Math.floor(x * 100 + EPS) / 100;
}

function ceilCents(x: number): number {
  return Math.ceil(x * 100 - EPS) / 100;
}

/**
 * Marketable limit from the mid. A buy never pays above the ask and a
 * sell never offers below the bid.
 */
export function limitPrice(side: OrderSide, quote: { bid: number; ask: number }, bufferPct: number): number {
  const mid = (quote.bid + quote.ask) / 2;
  if (side === "BUY") return floorCents(Math.min(mid * (1 + bufferPct), quote.ask));
  return Math.max(ceilCents(Math.max(mid * (1 - bufferPct), quote.bid)), 0.01);
}
