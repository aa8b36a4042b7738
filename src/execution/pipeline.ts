import type { BrokerClient, OrderReport } from "../broker/types.js";
import type { Store } from "../db/store.js";
import { ExecutionAmbiguous, LiquidityRejected } from "../errors.js";
import type { Decision, DecisionContext } from "../gate/types.js";
import { logExec } from "../logging.js";
import type { EntryTemplate, PendingEntry, Position } from "../positions/types.js";
import { greeksFromMark } from "../risk/greeks.js";
import { UNKNOWN_SECTOR } from "../risk/portfolio.js";
import { addDays, daysBetween } from "../time.js";
import { resolveContract } from "./contract.js";
import { checkLiquidity, type LiquidityLimits, type TwoSidedQuote } from "./liquidity.js";
import { placeAndConfirm, type ConfirmResult } from "./orders.js";
import { limitPrice } from "./pricing.js";
import { sizePosition, type SizingLimits } from "./sizing.js";

export interface ExecutionSettings {
  sizing: SizingLimits & { strikeTolerancePct: number; limitBufferPct: number };
  liquidity: LiquidityLimits;
  dteWindow: { minDte: number; maxDte: number };
  risk: { riskFreeRate: number; defaultIv: number };
  orders: { pollIntervalMs: number; timeoutMs: number };
  shadowMode: boolean;
}

export interface ExecutionDeps {
  broker: BrokerClient;
  store: Store;
  settings: ExecutionSettings;
  /** Per-cycle submission guard shared with the exit executor. */
  submitted: Set<string>;
  sleep?: (ms: number) => Promise<void>;
}

export type ExecutionResult =
  | { status: "filled"; position: Position; orderId: string; partial: boolean }
  | { status: "shadow"; contractSymbol: string; contracts: number; limitPrice: number }
  | { status: "no_contract" }
  | { status: "illiquid"; error: LiquidityRejected }
  | { status: "zero_size"; contractSymbol: string }
  | { status: "unfilled"; contractSymbol: string; orderStatus: string }
  | { status: "duplicate" }
  | { status: "ambiguous"; error: ExecutionAmbiguous; pending: PendingEntry };

/**
 * resolve → quote → liquidity → size → price → place → confirm.
 * Broker read failures propagate as ProviderError for the caller to count.
 */
export async function executeSignal(
  deps: ExecutionDeps,
  args: { decision: Decision; ctx: DecisionContext; asOf: string; now: Date },
): Promise<ExecutionResult> {
  const { decision, ctx, asOf, now } = args;
  const { settings, broker } = deps;
  const verdict = decision.verdict;
  if (decision.action !== "EXECUTE" || !verdict) {
    throw new Error(`executeSignal called for ${decision.signalId} with action ${decision.action}`);
  }
  const signal = ctx.signal;
  const log = logExec.child({ signalId: signal.id, underlying: signal.underlying });

  const contract = await resolveContract(broker, {
    underlying: signal.underlying,
    optionType: signal.optionType,
    strike: signal.strike,
    expiration: signal.expiration,
    minExpiration: addDays(asOf, settings.dteWindow.minDte),
    maxExpiration: addDays(asOf, settings.dteWindow.maxDte),
    strikeTolerancePct: settings.sizing.strikeTolerancePct,
  });
  if (!contract) return { status: "no_contract" };

  const rawQuote = await broker.getOptionQuote(contract.contractSymbol);
  let quote: TwoSidedQuote;
  try {
    quote = checkLiquidity(contract.contractSymbol, rawQuote, settings.liquidity);
  } catch (e: unknown) {
    if (e instanceof LiquidityRejected) {
      log.info({ contract: contract.contractSymbol, reasons: e.reasons }, "Liquidity rejected");
      return { status: "illiquid", error: e };
    }
    throw e;
  }

  const price = limitPrice("BUY", quote, settings.sizing.limitBufferPct);
  const sector = ctx.facts.sector;
  const sizing = sizePosition(
    {
      conviction: verdict.conviction,
      score: signal.score,
      ivRank: signal.ivRank,
      sectorExposure: ctx.portfolio.concentrationBySector[sector ?? UNKNOWN_SECTOR] ?? 0,
      equity: ctx.portfolio.equity,
      price,
    },
    settings.sizing,
  );
  if (sizing.contracts === 0) {
    log.info({ contract: contract.contractSymbol, budget: sizing.budget, price }, "Sized to zero contracts");
    return { status: "zero_size", contractSymbol: contract.contractSymbol };
  }

  const order = {
    symbol: contract.contractSymbol,
    secType: "OPT" as const,
    side: "BUY" as const,
    quantity: sizing.contracts,
    limitPrice: price,
    clientTag: `entry:${signal.id}`,
  };

  const spot = ctx.facts.price ?? signal.underlyingPrice;
  const template: EntryTemplate = {
    contractSymbol: contract.contractSymbol,
    underlying: contract.underlying,
    optionType: contract.optionType,
    strike: contract.strike,
    expiration: contract.expiration,
    entryThesis: {
      recommendation: verdict.recommendation,
      conviction: verdict.conviction,
      thesis: verdict.thesis,
      riskFactors: verdict.riskFactors,
      sizingHint: verdict.sizingHint,
      trendAtEntry: ctx.market.trend,
    },
    signalId: signal.id,
    signalScore: signal.score,
    scoreFactors: [...signal.scoreFactors],
    sector,
    openedAt: now.toISOString(),
  };

  if (settings.shadowMode) {
    log.info({ order, adjustments: sizing.adjustments }, "Shadow mode: order not sent");
    return { status: "shadow", contractSymbol: contract.contractSymbol, contracts: sizing.contracts, limitPrice: price };
  }

  let confirmed: ConfirmResult;
  try {
    confirmed = await placeAndConfirm(broker, order, {
      pollIntervalMs: settings.orders.pollIntervalMs,
      timeoutMs: settings.orders.timeoutMs,
      submitted: deps.submitted,
      sleep: deps.sleep,
    });
  } catch (e: unknown) {
    if (e instanceof ExecutionAmbiguous) {
      const pending: PendingEntry = {
        orderId: e.orderId,
        clientTag: order.clientTag,
        requestedQty: order.quantity,
        limitPrice: price,
        spot,
        usedOverride: decision.usedOverride,
        submittedAt: now.toISOString(),
        template,
      };
      deps.store.insertPendingEntry(pending);
      log.error({ err: e }, "Entry order unconfirmed; kept as pending");
      return { status: "ambiguous", error: e, pending };
    }
    throw e;
  }
  if (confirmed.kind === "duplicate") return { status: "duplicate" };
  if (confirmed.kind === "unfilled") {
    log.info({ orderId: confirmed.orderId, status: confirmed.status }, "Entry order not filled");
    return { status: "unfilled", contractSymbol: contract.contractSymbol, orderStatus: confirmed.status };
  }

  const position = recordEntryFill(deps.store, settings.risk, template, {
    filledQty: confirmed.filledQty,
    avgFillPrice: confirmed.avgFillPrice,
    spot,
    asOf,
  });
  log.info(
    { orderId: confirmed.orderId, contract: position.contractSymbol, qty: position.quantity, price: position.entryPrice },
    "Entry filled",
  );
  return { status: "filled", position, orderId: confirmed.orderId, partial: confirmed.partial };
}

function recordEntryFill(
  store: Store,
  risk: ExecutionSettings["risk"],
  template: EntryTemplate,
  fill: { filledQty: number; avgFillPrice: number; spot: number | null; asOf: string },
): Position {
  const entry = greeksFromMark({
    spot: fill.spot,
    strike: template.strike,
    dte: daysBetween(fill.asOf, template.expiration),
    optionType: template.optionType,
    mark: fill.avgFillPrice,
    rate: risk.riskFreeRate,
    fallbackIv: risk.defaultIv,
  });
  return store.insertPosition({
    ...template,
    quantity: fill.filledQty,
    entryPrice: fill.avgFillPrice,
    entryGreeks: entry.greeks,
    entryIv: entry.iv,
  });
}

/**
 * Resolve a pending entry from a terminal order report: any filled quantity
 * becomes a Position, and the pending record is dropped either way.
 * Returns the Position, or null when nothing filled.
 */
export function settlePendingEntry(
  store: Store,
  risk: ExecutionSettings["risk"],
  pending: PendingEntry,
  report: OrderReport,
  asOf: string,
): Position | null {
  if (report.filledQty <= 0) {
    store.removePendingEntry(pending.orderId);
    logExec.info({ orderId: pending.orderId, status: report.status }, "Pending entry ended unfilled");
    return null;
  }
  const position = store.transaction(() => {
    store.removePendingEntry(pending.orderId);
    return recordEntryFill(store, risk, pending.template, {
      filledQty: report.filledQty,
      avgFillPrice: report.avgFillPrice ?? pending.limitPrice,
      spot: pending.spot,
      asOf,
    });
  });
  logExec.info(
    { orderId: pending.orderId, contract: position.contractSymbol, qty: position.quantity, price: position.entryPrice },
    "Pending entry filled; position recorded",
  );
  return position;
}
