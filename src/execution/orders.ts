import { TERMINAL_ORDER_STATUSES, type BrokerClient, type LimitOrderRequest, type OrderReport } from "../broker/types.js";
import { ExecutionAmbiguous, errorMessage } from "../errors.js";
import { logExec } from "../logging.js";
import { sleep as defaultSleep } from "../retry.js";

export interface ConfirmOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  /** Tags already submitted this cycle; guards against a second submission. */
  submitted: Set<string>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type ConfirmResult =
  | { kind: "filled"; orderId: string; filledQty: number; avgFillPrice: number; partial: boolean }
  | { kind: "unfilled"; orderId: string; status: OrderReport["status"] }
  | { kind: "duplicate" };

function settle(report: OrderReport, req: LimitOrderRequest): ConfirmResult {
  if (report.filledQty > 0) {
    return {
      kind: "filled",
      orderId: report.orderId,
      filledQty: report.filledQty,
      avgFillPrice: report.avgFillPrice ?? req.limitPrice,
      partial: report.filledQty < req.quantity,
    };
  }
  return { kind: "unfilled", orderId: report.orderId, status: report.status };
}

/**
 * Submit one limit order and confirm it by read-back.
 *
 * Polls until a terminal status or the deadline; past the deadline the order
 * is cancelled and read once more. A status that is still not terminal raises
 * ExecutionAmbiguous. Nothing here ever re-submits.
 */
export async function placeAndConfirm(
  broker: BrokerClient,
  req: LimitOrderRequest,
  opts: ConfirmOptions,
): Promise<ConfirmResult> {
  const sleep = opts.sleep ?? defaultSleep;
  const now = opts.now ?? Date.now;

  if (opts.submitted.has(req.clientTag)) {
    logExec.warn({ tag: req.clientTag }, "Order already submitted this cycle; not re-submitting");
    return { kind: "duplicate" };
  }
  opts.submitted.add(req.clientTag);

  const { orderId } = await broker.placeLimitOrder(req);
  const deadline = now() + opts.timeoutMs;
  let last: OrderReport = { orderId, status: "pending", filledQty: 0, avgFillPrice: null };

  while (true) {
    try {
      last = await broker.getOrderStatus(orderId);
    } catch (e: unknown) {
      logExec.warn({ orderId, err: errorMessage(e) }, "Order status read failed");
    }
    if (TERMINAL_ORDER_STATUSES.has(last.status)) return settle(last, req);
    if (now() >= deadline) break;
    await sleep(opts.pollIntervalMs);
  }

  logExec.warn({ orderId, status: last.status }, "Order not terminal by deadline; cancelling");
  try {
    await broker.cancelOrder(orderId);
    last = await broker.getOrderStatus(orderId);
  } catch (e: unknown) {
    logExec.error({ orderId, err: errorMessage(e) }, "Cancel or read-back failed");
    throw new ExecutionAmbiguous(orderId, last.status);
  }
  if (!TERMINAL_ORDER_STATUSES.has(last.status)) throw new ExecutionAmbiguous(orderId, last.status);
  return settle(last, req);
}
