import type { OptionType } from "../flow/types.js";

export type OrderSide = "BUY" | "SELL";
export type SecurityKind = "OPT" | "STK";

export type OrderStatus =
  | "pending"
  | "submitted"
  | "partially_filled"
  | "filled"
  | "cancelled"
  | "rejected"
  | "unknown";

export const TERMINAL_ORDER_STATUSES: ReadonlySet<OrderStatus> = new Set(["filled", "cancelled", "rejected"]);

export interface AccountSnapshot {
  equity: number;
  buyingPower: number | null;
}

export interface BrokerPosition {
  /** OCC symbol for options, ticker for stock. */
  symbol: string;
  secType: SecurityKind;
  quantity: number;
  /** Per-unit average cost (per share, or per option unit before the multiplier). */
  avgPrice: number;
}

export interface OptionContract {
  contractSymbol: string;
  underlying: string;
  optionType: OptionType;
  strike: number;
  expiration: string;
}

export interface OptionQuote {
  bid: number | null;
  ask: number | null;
  bidSize: number | null;
  askSize: number | null;
  last: number | null;
}

export interface LimitOrderRequest {
  symbol: string;
  secType: SecurityKind;
  side: OrderSide;
  quantity: number;
  limitPrice: number;
  /** Caller's correlation tag (signal id or exit reason). */
  clientTag: string;
}

export interface OrderReport {
  orderId: string;
  status: OrderStatus;
  filledQty: number;
  avgFillPrice: number | null;
}

/** Brokerage surface the pipeline depends on. Limit orders only. */
export interface BrokerClient {
  getAccount(): Promise<AccountSnapshot>;
  getPositions(): Promise<BrokerPosition[]>;
  listOptionContracts(
    underlying: string,
    optionType: OptionType,
    minExpiration: string,
    maxExpiration: string,
  ): Promise<OptionContract[]>;
  getOptionQuote(contractSymbol: string): Promise<OptionQuote>;
  placeLimitOrder(req: LimitOrderRequest): Promise<{ orderId: string }>;
  getOrderStatus(orderId: string): Promise<OrderReport>;
  cancelOrder(orderId: string): Promise<void>;
}
