import {
  EventName,
  ErrorCode,
  Contract,
  ContractDetails,
  Order,
  OrderAction,
  OrderType,
  SecType,
  TimeInForce,
  OptionType as IbOptionType,
  isNonFatalError,
} from "@stoqey/ib";
import { ProviderError } from "../errors.js";
import { logBroker } from "../logging.js";
import { formatOcc, parseOcc } from "../occ.js";
import type { OptionType } from "../flow/types.js";
import { IbkrConnection } from "./ibkr-connection.js";
import type {
  AccountSnapshot,
  BrokerClient,
  BrokerPosition,
  LimitOrderRequest,
  OptionContract,
  OptionQuote,
  OrderReport,
  OrderStatus,
} from "./types.js";

// TickType is a type-only union; use numeric constants, NOT the enum.
const TICK_BID_SIZE = 0;
const TICK_BID = 1;
const TICK_ASK = 2;
const TICK_ASK_SIZE = 3;
const TICK_LAST = 4;

const ACCOUNT_TAGS = "NetLiquidation,BuyingPower";
const OPTION_MULTIPLIER = 100;

export interface IbkrBrokerOptions {
  host: string;
  port: number;
  clientId: number;
  account: string;
  requestTimeoutMs: number;
}

/** Map a TWS order status string onto the pipeline's order states. */
export function mapIbkrStatus(status: string, filled: number): OrderStatus {
  switch (status) {
    case "Filled":
      return "filled";
    case "Cancelled":
    case "ApiCancelled":
      return "cancelled";
    case "Inactive":
      return "rejected";
    case "Submitted":
    case "PreSubmitted":
      return filled > 0 ? "partially_filled" : "submitted";
    case "PendingSubmit":
    case "PendingCancel":
    case "ApiPending":
      return "pending";
    default:
      return "unknown";
  }
}

/** "20250117" -> "2025-01-17" */
export function fromIbDate(raw: string): string | null {
  const m = /^(\d{4})(\d{2})(\d{2})/.exec(raw);
  if (!m) return null;
  return `${m[1]}-${m[2]}-${m[3]}`;
}

function toIbDate(iso: string): string {
  return iso.replace(/-/g, "");
}

function toIbRight(t: OptionType): IbOptionType {
  return t === "call" ? IbOptionType.Call : IbOptionType.Put;
}

function fromIbRight(right: IbOptionType | undefined): OptionType | null {
  if (right === IbOptionType.Call) return "call";
  if (right === IbOptionType.Put) return "put";
  return null;
}

function optionContract(occ: string): Contract {
  const parts = parseOcc(occ);
  if (!parts) throw new ProviderError("ibkr", `not an OCC option symbol: ${occ}`);
  return {
    symbol: parts.underlying,
    secType: SecType.OPT,
    exchange: "SMART",
    currency: "USD",
    lastTradeDateOrContractMonth: toIbDate(parts.expiration),
    strike: parts.strike,
    right: toIbRight(parts.optionType),
    multiplier: OPTION_MULTIPLIER,
  };
}

function stockContract(symbol: string): Contract {
  return { symbol, secType: SecType.STK, exchange: "SMART", currency: "USD" };
}

/** OCC symbol for an IBKR option contract, or null when fields are missing. */
export function occFromContract(c: Contract): string | null {
  const expiration = fromIbDate(c.lastTradeDateOrContractMonth ?? "");
  const optionType = fromIbRight(c.right);
  if (!c.symbol || !expiration || !optionType || c.strike === undefined) return null;
  return formatOcc({ underlying: c.symbol, expiration, optionType, strike: c.strike });
}

/** BrokerClient over TWS / IB Gateway. */
export class IbkrBroker implements BrokerClient {
  private readonly conn: IbkrConnection;
  private readonly statuses = new Map<number, OrderReport>();
  private lastOrderId = 0;
  private listening = false;

  constructor(private readonly opts: IbkrBrokerOptions, conn?: IbkrConnection) {
    this.conn = conn ?? new IbkrConnection({ host: opts.host, port: opts.port, clientId: opts.clientId });
  }

  async connect(): Promise<void> {
    await this.conn.connect();
    this.listenForStatus();
  }

  disconnect(): void {
    this.conn.disconnect();
  }

  private async ready() {
    if (!this.conn.isConnected()) {
      try {
        await this.connect();
      } catch (e: unknown) {
        throw new ProviderError("ibkr", "not connected to TWS/Gateway", { cause: e });
      }
    }
    return this.conn.getIB();
  }

  private listenForStatus(): void {
    if (this.listening) return;
    this.listening = true;
    const ib = this.conn.getIB();
    ib.on(EventName.orderStatus, (orderId: number, status: string, filled: number, _remaining: number, avgFillPrice: number) => {
      const report: OrderReport = {
        orderId: String(orderId),
        status: mapIbkrStatus(status, filled),
        filledQty: filled,
        avgFillPrice: avgFillPrice > 0 ? avgFillPrice : null,
      };
      this.statuses.set(orderId, report);
      logBroker.debug({ orderId, status, filled }, "Order status");
    });
  }

  // ── Account ──────────────────────────────────────────────────────────

  async getAccount(): Promise<AccountSnapshot> {
    const ib = await this.ready();
    const reqId = this.conn.getNextReqId();

    return new Promise((resolve, reject) => {
      let settled = false;
      let equity: number | null = null;
      let buyingPower: number | null = null;

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        cleanup();
        ib.cancelAccountSummary(reqId);
        reject(new ProviderError("ibkr", `account summary timed out after ${this.opts.requestTimeoutMs}ms`));
      }, this.opts.requestTimeoutMs);

      const onSummary = (id: number, account: string, tag: string, value: string) => {
        if (id !== reqId) return;
        if (this.opts.account && account !== this.opts.account) return;
        const num = parseFloat(value);
        if (!Number.isFinite(num)) return;
        if (tag === "NetLiquidation") equity = num;
        else if (tag === "BuyingPower") buyingPower = num;
      };

      const onEnd = (id: number) => {
        if (id !== reqId) return;
        if (settled) return;
        settled = true;
        cleanup();
        ib.cancelAccountSummary(reqId);
        if (equity === null) {
          reject(new ProviderError("ibkr", "account summary returned no NetLiquidation"));
          return;
        }
        resolve({ equity, buyingPower });
      };

      const onError = (err: Error, code: ErrorCode, id: number) => {
        if (id !== reqId) return;
        if (isNonFatalError(code, err)) return;
        if (settled) return;
        settled = true;
        cleanup();
        ib.cancelAccountSummary(reqId);
        reject(new ProviderError("ibkr", `account summary error (${code}): ${err.message}`));
      };

      const cleanup = () => {
        clearTimeout(timeout);
        ib.off(EventName.accountSummary, onSummary);
        ib.off(EventName.accountSummaryEnd, onEnd);
        ib.off(EventName.error, onError);
      };

      ib.on(EventName.accountSummary, onSummary);
      ib.on(EventName.accountSummaryEnd, onEnd);
      ib.on(EventName.error, onError);

      ib.reqAccountSummary(reqId, "All", ACCOUNT_TAGS);
    });
  }

  async getPositions(): Promise<BrokerPosition[]> {
    const ib = await this.ready();

    return new Promise((resolve, reject) => {
      let settled = false;
      const positions: BrokerPosition[] = [];

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        cleanup();
        ib.cancelPositions();
        reject(new ProviderError("ibkr", `positions timed out after ${this.opts.requestTimeoutMs}ms`));
      }, this.opts.requestTimeoutMs);

      const onPosition = (account: string, contract: Contract, pos: number, avgCost?: number) => {
        if (this.opts.account && account !== this.opts.account) return;
        if (pos === 0) return;
        if (contract.secType === SecType.OPT) {
          const symbol = occFromContract(contract);
          if (!symbol) return;
          positions.push({ symbol, secType: "OPT", quantity: pos, avgPrice: (avgCost ?? 0) / OPTION_MULTIPLIER });
        } else if (contract.secType === SecType.STK && contract.symbol) {
          positions.push({ symbol: contract.symbol, secType: "STK", quantity: pos, avgPrice: avgCost ?? 0 });
        }
      };

      const onEnd = () => {
        if (settled) return;
        settled = true;
        cleanup();
        ib.cancelPositions();
        resolve(positions);
      };

      const onError = (err: Error, code: ErrorCode) => {
        if (isNonFatalError(code, err)) return;
        if (settled) return;
        settled = true;
        cleanup();
        ib.cancelPositions();
        reject(new ProviderError("ibkr", `positions error (${code}): ${err.message}`));
      };

      const cleanup = () => {
        clearTimeout(timeout);
        ib.off(EventName.position, onPosition);
        ib.off(EventName.positionEnd, onEnd);
        ib.off(EventName.error, onError);
      };

      ib.on(EventName.position, onPosition);
      ib.on(EventName.positionEnd, onEnd);
      ib.on(EventName.error, onError);

      ib.reqPositions();
    });
  }

  // ── Contracts & quotes ───────────────────────────────────────────────

  async listOptionContracts(
    underlying: string,
    optionType: OptionType,
    minExpiration: string,
    maxExpiration: string,
  ): Promise<OptionContract[]> {
    const ib = await this.ready();
    const reqId = this.conn.getNextReqId();
    const query: Contract = {
      symbol: underlying,
      secType: SecType.OPT,
      exchange: "SMART",
      currency: "USD",
      right: toIbRight(optionType),
      multiplier: OPTION_MULTIPLIER,
    };

    return new Promise((resolve, reject) => {
      let settled = false;
      const results: OptionContract[] = [];

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(new ProviderError("ibkr", `contract details for ${underlying} timed out`));
      }, this.opts.requestTimeoutMs);

      const onDetails = (id: number, details: ContractDetails) => {
        if (id !== reqId) return;
        const c = details.contract;
        const expiration = fromIbDate(c.lastTradeDateOrContractMonth ?? "");
        if (!expiration || c.strike === undefined) return;
        if (expiration < minExpiration || expiration > maxExpiration) return;
        const contractSymbol = occFromContract(c);
        if (!contractSymbol) return;
        results.push({ contractSymbol, underlying: underlying.toUpperCase(), optionType, strike: c.strike, expiration });
      };

      const onEnd = (id: number) => {
        if (id !== reqId) return;
        if (settled) return;
        settled = true;
        cleanup();
        results.sort((a, b) => a.expiration.localeCompare(b.expiration) || a.strike - b.strike);
        resolve(results);
      };

      const onError = (err: Error, code: ErrorCode, id: number) => {
        if (id !== reqId) return;
        if (isNonFatalError(code, err)) return;
        if (settled) return;
        settled = true;
        cleanup();
        reject(new ProviderError("ibkr", `contract details error (${code}): ${err.message}`));
      };

      const cleanup = () => {
        clearTimeout(timeout);
        ib.off(EventName.contractDetails, onDetails);
        ib.off(EventName.contractDetailsEnd, onEnd);
        ib.off(EventName.error, onError);
      };

      ib.on(EventName.contractDetails, onDetails);
      ib.on(EventName.contractDetailsEnd, onEnd);
      ib.on(EventName.error, onError);

      ib.reqContractDetails(reqId, query);
    });
  }

  async getOptionQuote(contractSymbol: string): Promise<OptionQuote> {
    const ib = await this.ready();
    const reqId = this.conn.getNextReqId();
    const contract = optionContract(contractSymbol);

    return new Promise((resolve, reject) => {
      let settled = false;
      const data: OptionQuote = { bid: null, ask: null, bidSize: null, askSize: null, last: null };

      // A partial snapshot is still usable; the liquidity check rejects missing sides.
      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        cleanup();
        ib.cancelMktData(reqId);
        resolve(data);
      }, this.opts.requestTimeoutMs);

      const onTickPrice = (id: number, field: number, value: number) => {
        if (id !== reqId || value < 0) return;
        switch (field) {
          case TICK_BID:  data.bid = value;  break;
          case TICK_ASK:  data.ask = value;  break;
          case TICK_LAST: data.last = value; break;
        }
      };

      const onTickSize = (id: number, field: number | undefined, value: number | undefined) => {
        if (id !== reqId || value === undefined) return;
        if (field === TICK_BID_SIZE) data.bidSize = value;
        else if (field === TICK_ASK_SIZE) data.askSize = value;
      };

      const onSnapshotEnd = (id: number) => {
        if (id !== reqId) return;
        if (settled) return;
        settled = true;
        cleanup();
        resolve(data);
      };

      const onError = (err: Error, code: ErrorCode, id: number) => {
        if (id !== reqId) return;
        if (isNonFatalError(code, err)) return;
        if (settled) return;
        settled = true;
        cleanup();
        ib.cancelMktData(reqId);
        reject(new ProviderError("ibkr", `quote error for ${contractSymbol} (${code}): ${err.message}`));
      };

      const cleanup = () => {
        clearTimeout(timeout);
        ib.off(EventName.tickPrice, onTickPrice);
        ib.off(EventName.tickSize, onTickSize);
        ib.off(EventName.tickSnapshotEnd, onSnapshotEnd);
        ib.off(EventName.error, onError);
      };

      ib.on(EventName.tickPrice, onTickPrice);
      ib.on(EventName.tickSize, onTickSize);
      ib.on(EventName.tickSnapshotEnd, onSnapshotEnd);
      ib.on(EventName.error, onError);

      ib.reqMktData(reqId, contract, "", true, false);
    });
  }

  // ── Orders ───────────────────────────────────────────────────────────

  private async nextOrderId(): Promise<number> {
    const ib = await this.ready();
    const issued = await new Promise<number>((resolve, reject) => {
      let settled = false;

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(new Error("Timed out waiting for next valid order ID"));
      }, 5000);

      const onNextId = (orderId: number) => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve(orderId);
      };

      const onError = (err: Error, code: ErrorCode) => {
        if (isNonFatalError(code, err)) return;
        if (settled) return;
        settled = true;
        cleanup();
        reject(new Error(`nextValidId error (${code}): ${err.message}`));
      };

      const cleanup = () => {
        clearTimeout(timeout);
        ib.off(EventName.nextValidId, onNextId);
        ib.off(EventName.error, onError);
      };

      ib.on(EventName.nextValidId, onNextId);
      ib.on(EventName.error, onError);

      ib.reqIds();
    });
    this.lastOrderId = Math.max(issued, this.lastOrderId + 1);
    return this.lastOrderId;
  }

  async placeLimitOrder(req: LimitOrderRequest): Promise<{ orderId: string }> {
    const ib = await this.ready();
    const orderId = await this.nextOrderId();
    const contract = req.secType === "OPT" ? optionContract(req.symbol) : stockContract(req.symbol);
    const order: Order = {
      action: req.side === "BUY" ? OrderAction.BUY : OrderAction.SELL,
      orderType: OrderType.LMT,
      totalQuantity: req.quantity,
      lmtPrice: req.limitPrice,
      tif: TimeInForce.DAY,
      orderRef: req.clientTag,
      transmit: true,
    };
    if (this.opts.account) order.account = this.opts.account;

    this.statuses.set(orderId, { orderId: String(orderId), status: "pending", filledQty: 0, avgFillPrice: null });
    logBroker.info(
      { orderId, symbol: req.symbol, side: req.side, qty: req.quantity, limit: req.limitPrice, tag: req.clientTag },
      "Placing limit order",
    );
    ib.placeOrder(orderId, contract, order);
    return { orderId: String(orderId) };
  }

  async getOrderStatus(orderId: string): Promise<OrderReport> {
    const id = parseInt(orderId, 10);
    const known = this.statuses.get(id);
    if (known && known.status !== "pending" && known.status !== "unknown") return known;
    await this.refreshOpenOrders();
    return this.statuses.get(id) ?? { orderId, status: "unknown", filledQty: 0, avgFillPrice: null };
  }

  /** Pull open-order states so orders placed before a reconnect are visible again. */
  private async refreshOpenOrders(): Promise<void> {
    const ib = await this.ready();
    await new Promise<void>((resolve) => {
      let settled = false;

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      }, this.opts.requestTimeoutMs);

      const onOpenOrder = (id: number, _contract: Contract, order: Order, state: { status?: string }) => {
        const filled = order.filledQuantity ?? 0;
        const prev = this.statuses.get(id);
        this.statuses.set(id, {
          orderId: String(id),
          status: mapIbkrStatus(state.status ?? "", filled),
          filledQty: filled,
          avgFillPrice: prev?.avgFillPrice ?? null,
        });
      };

      const onEnd = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };

      const cleanup = () => {
        clearTimeout(timeout);
        ib.off(EventName.openOrder, onOpenOrder);
        ib.off(EventName.openOrderEnd, onEnd);
      };

      ib.on(EventName.openOrder, onOpenOrder);
      ib.on(EventName.openOrderEnd, onEnd);

      ib.reqAllOpenOrders();
    });
  }

  async cancelOrder(orderId: string): Promise<void> {
    const ib = await this.ready();
    logBroker.info({ orderId }, "Cancelling order");
    ib.cancelOrder(parseInt(orderId, 10));
  }
}
