import type { BrokerClient } from "../broker/types.js";
import type { Store } from "../db/store.js";
import { ExecutionAmbiguous, LiquidityRejected } from "../errors.js";
import { logExits } from "../logging.js";
import type { Position } from "../positions/types.js";
import type { Greeks } from "../risk/types.js";
import { addDays } from "../time.js";
import { findRollTarget } from "./contract.js";
import type { ExitEvaluation } from "./exits.js";
import { trimQuantity } from "./exits.js";
import { checkLiquidity, type LiquidityLimits, type TwoSidedQuote } from "./liquidity.js";
import { placeAndConfirm } from "./orders.js";
import { limitPrice } from "./pricing.js";

export interface ExitExecutionSettings {
  liquidity: LiquidityLimits;
  limitBufferPct: number;
  rollMinDaysOut: number;
  /** Furthest expiry searched for a roll, in days past the current one. */
  rollSearchDays: number;
  orders: { pollIntervalMs: number; timeoutMs: number };
  shadowMode: boolean;
}

export interface ExitDeps {
  broker: BrokerClient;
  store: Store;
  settings: ExitExecutionSettings;
  submitted: Set<string>;
  sleep?: (ms: number) => Promise<void>;
}

export type ExitOutcome =
  | { status: "closed"; exitPrice: number }
  | { status: "trimmed"; sold: number; remaining: number; exitPrice: number }
  | { status: "rolled"; closedPrice: number; opened: Position | null }
  | { status: "partial"; sold: number; remaining: number }
  | { status: "shadow"; action: ExitEvaluation["action"]; quantity: number; limitPrice: number }
  | { status: "no_quote" }
  | { status: "unfilled"; orderStatus: string }
  | { status: "duplicate" }
  | { status: "ambiguous"; error: ExecutionAmbiguous };

type SellResult =
  | { kind: "sold"; qty: number; price: number }
  | { kind: "failed"; outcome: ExitOutcome };

async function sell(
  deps: ExitDeps,
  p: Position,
  quantity: number,
  tag: string,
  action: ExitEvaluation["action"],
): Promise<SellResult> {
  const quote = await deps.broker.getOptionQuote(p.contractSymbol);
  if (quote.bid === null || quote.ask === null || quote.bid <= 0) {
    logExits.warn({ contract: p.contractSymbol }, "No bid to sell into; exit deferred");
    return { kind: "failed", outcome: { status: "no_quote" } };
  }
  const price = limitPrice("SELL", { bid: quote.bid, ask: Math.max(quote.ask, quote.bid) }, deps.settings.limitBufferPct);
  if (deps.settings.shadowMode) {
    logExits.info({ contract: p.contractSymbol, quantity, price, tag }, "Shadow mode: exit order not sent");
    return { kind: "failed", outcome: { status: "shadow", action, quantity, limitPrice: price } };
  }
  try {
    const res = await placeAndConfirm(
      deps.broker,
      { symbol: p.contractSymbol, secType: "OPT", side: "SELL", quantity, limitPrice: price, clientTag: tag },
      { ...deps.settings.orders, submitted: deps.submitted, sleep: deps.sleep },
    );
    if (res.kind === "duplicate") return { kind: "failed", outcome: { status: "duplicate" } };
    if (res.kind === "unfilled") return { kind: "failed", outcome: { status: "unfilled", orderStatus: res.status } };
    return { kind: "sold", qty: res.filledQty, price: res.avgFillPrice };
  } catch (e: unknown) {
    if (e instanceof ExecutionAmbiguous) return { kind: "failed", outcome: { status: "ambiguous", error: e } };
    throw e;
  }
}

/** Apply a confirmed sale; the position closes once, or shrinks on a partial. */
function applySale(deps: ExitDeps, p: Position, sold: number, price: number, greeks: Greeks, reason: string, now: Date): number {
  const remaining = p.quantity - sold;
  if (remaining <= 0) {
    deps.store.closePosition(p.id, { exitPrice: price, exitGreeks: greeks, exitReason: reason, closedAt: now.toISOString() });
    return 0;
  }
  deps.store.reduceQuantity(p.id, remaining);
  return remaining;
}

async function closeAll(deps: ExitDeps, p: Position, greeks: Greeks, reason: string, now: Date): Promise<ExitOutcome> {
  const res = await sell(deps, p, p.quantity, `exit:${p.id}:${reason}`, "CLOSE");
  if (res.kind === "failed") return res.outcome;
  const remaining = applySale(deps, p, res.qty, res.price, greeks, reason, now);
  if (remaining > 0) return { status: "partial", sold: res.qty, remaining };
  return { status: "closed", exitPrice: res.price };
}

async function openRoll(deps: ExitDeps, p: Position, contractSymbol: string, expiration: string, now: Date): Promise<Position | null> {
  const raw = await deps.broker.getOptionQuote(contractSymbol);
  let quote: TwoSidedQuote;
  try {
    quote = checkLiquidity(contractSymbol, raw, deps.settings.liquidity);
  } catch (e: unknown) {
    if (e instanceof LiquidityRejected) {
      logExits.warn({ contract: contractSymbol, reasons: e.reasons }, "Roll leg illiquid; not opened");
      return null;
    }
    throw e;
  }
  const price = limitPrice("BUY", quote, deps.settings.limitBufferPct);
  try {
    const res = await placeAndConfirm(
      deps.broker,
      { symbol: contractSymbol, secType: "OPT", side: "BUY", quantity: p.quantity, limitPrice: price, clientTag: `roll:${p.id}` },
      { ...deps.settings.orders, submitted: deps.submitted, sleep: deps.sleep },
    );
    if (res.kind !== "filled") {
      logExits.warn({ contract: contractSymbol, result: res.kind }, "Roll leg not filled");
      return null;
    }
    return deps.store.insertPosition({
      contractSymbol,
      underlying: p.underlying,
      optionType: p.optionType,
      strike: p.strike,
      expiration,
      quantity: res.filledQty,
      entryPrice: res.avgFillPrice,
      entryGreeks: p.currentGreeks ?? p.entryGreeks,
      entryIv: p.entryIv,
      entryThesis: p.entryThesis,
      signalId: p.signalId,
      signalScore: p.signalScore,
      scoreFactors: p.scoreFactors,
      sector: p.sector,
      openedAt: now.toISOString(),
    });
  } catch (e: unknown) {
    if (e instanceof ExecutionAmbiguous) {
      logExits.error({ err: e }, "Roll leg unconfirmed");
      return null;
    }
    throw e;
  }
}

/**
 * Carry out CLOSE, TRIM or ROLL for one position. A roll opens its new leg
 * only after the close is confirmed in full; without a later expiry it is
 * a plain close.
 */
export async function executeExit(
  deps: ExitDeps,
  p: Position,
  evaluation: ExitEvaluation,
  greeks: Greeks,
  now: Date,
): Promise<ExitOutcome> {
  const reason = evaluation.rule ?? "manual";
  const log = logExits.child({ positionId: p.id, contract: p.contractSymbol, rule: reason });

  switch (evaluation.action) {
    case "HOLD":
      throw new Error(`executeExit called with HOLD for position ${p.id}`);

    case "CLOSE": {
      const out = await closeAll(deps, p, greeks, reason, now);
      log.info({ outcome: out.status }, "Close processed");
      return out;
    }

    case "TRIM": {
      const qty = trimQuantity(p.quantity);
      const res = await sell(deps, p, qty, `trim:${p.id}`, "TRIM");
      if (res.kind === "failed") return res.outcome;
      const remaining = applySale(deps, p, res.qty, res.price, greeks, reason, now);
      log.info({ sold: res.qty, remaining }, "Trim processed");
      return { status: "trimmed", sold: res.qty, remaining, exitPrice: res.price };
    }

    case "ROLL": {
      const minExpiration = addDays(p.expiration, deps.settings.rollMinDaysOut);
      const target = await findRollTarget(
        deps.broker,
        p,
        minExpiration,
        addDays(p.expiration, deps.settings.rollSearchDays),
      );
      if (!target) {
        log.info({ minExpiration }, "No later expiry to roll into; closing");
        return closeAll(deps, p, greeks, reason, now);
      }
      const closed = await closeAll(deps, p, greeks, `${reason}:roll`, now);
      if (closed.status !== "closed") {
        log.warn({ outcome: closed.status }, "Roll close not confirmed; new leg not opened");
        return closed;
      }
      const opened = await openRoll(deps, p, target.contractSymbol, target.expiration, now);
      log.info({ into: target.contractSymbol, opened: opened !== null }, "Roll processed");
      return { status: "rolled", closedPrice: closed.exitPrice, opened };
    }
  }
}
