import type {
  AccountSnapshot,
  BrokerClient,
  BrokerPosition,
  LimitOrderRequest,
  OptionContract,
  OptionQuote,
  OrderReport,
} from "../broker/types.js";
import type { FlowSignal, ScoredSignal } from "../flow/types.js";
import type { MarketContext, UnderlyingFacts } from "../market/types.js";
import type { NewPosition, Position } from "../positions/types.js";
import type { PortfolioRiskState } from "../risk/types.js";

export function makeSignal(overrides: Partial<FlowSignal> = {}): FlowSignal {
  return {
    id: "sig-1",
    underlying: "AAPL",
    contractSymbol: "AAPL250321C00200000",
    optionType: "call",
    strike: 200,
    expiration: "2025-03-21",
    premium: 150_000,
    size: 500,
    volume: 2000,
    openInterest: 1000,
    volOiRatio: 2,
    isSweep: false,
    isAskSide: true,
    isFloor: false,
    isOpening: false,
    isOtm: false,
    underlyingPrice: 200,
    ivRank: null,
    sector: "Technology",
    timestamp: "2025-02-20T15:00:00Z",
    ...overrides,
  };
}

export function makeScored(overrides: Partial<ScoredSignal> = {}): ScoredSignal {
  return { ...makeSignal(overrides), score: 8, scoreFactors: ["sweep", "opening"], ...overrides };
}

export function makeMarket(overrides: Partial<MarketContext> = {}): MarketContext {
  return {
    benchmark: "SPY",
    benchmarkLevel: 600,
    benchmarkSma20: 590,
    trend: "bullish",
    volatility: 15,
    asOf: "2025-02-20T15:00:00.000Z",
    ...overrides,
  };
}

export function makeFacts(overrides: Partial<UnderlyingFacts> = {}): UnderlyingFacts {
  return {
    symbol: "AAPL",
    price: 200,
    sector: "Technology",
    nextEarningsDate: null,
    daysToEarnings: null,
    ...overrides,
  };
}

export function makeRisk(overrides: Partial<PortfolioRiskState> = {}): PortfolioRiskState {
  return {
    netDelta: 0,
    totalGamma: 0,
    dailyTheta: 0,
    totalVega: 0,
    equity: 100_000,
    optionsMarketValue: 0,
    riskScore: 0,
    riskCapacity: 1,
    riskLevel: "healthy",
    subScores: { delta: 0, gamma: 0, theta: 0, concentration: 0 },
    concentrationBySector: {},
    concentrationByUnderlying: {},
    maxConcentration: 0,
    openPositionCount: 0,
    computedAt: "2025-02-20T15:00:00.000Z",
    ...overrides,
  };
}

export function makeNewPosition(overrides: Partial<NewPosition> = {}): NewPosition {
  return {
    contractSymbol: "AAPL250321C00200000",
    underlying: "AAPL",
    optionType: "call",
    strike: 200,
    expiration: "2025-03-21",
    quantity: 2,
    entryPrice: 5,
    entryGreeks: { delta: 0.5, gamma: 0.02, theta: -0.05, vega: 0.2 },
    entryIv: 0.3,
    entryThesis: {
      recommendation: "EXECUTE",
      conviction: 85,
      thesis: "Sustained call buying",
      riskFactors: ["earnings"],
      sizingHint: null,
      trendAtEntry: "bullish",
    },
    signalId: "sig-1",
    signalScore: 8,
    scoreFactors: ["sweep"],
    sector: "Technology",
    openedAt: "2025-02-18T15:00:00.000Z",
    ...overrides,
  };
}

export function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    ...makeNewPosition(),
    id: 1,
    status: "open",
    currentGreeks: null,
    lastMark: null,
    lastSnapshotAt: null,
    closedAt: null,
    exitPrice: null,
    exitGreeks: null,
    exitReason: null,
    ...overrides,
  };
}

/**
 * In-process broker. Orders fill at their limit price on the first status
 * read unless `fillMode` says otherwise.
 */
export class FakeBroker implements BrokerClient {
  account: AccountSnapshot = { equity: 100_000, buyingPower: 200_000 };
  positions: BrokerPosition[] = [];
  contracts: OptionContract[] = [];
  quotes = new Map<string, OptionQuote>();
  fillMode: "fill" | "partial" | "rest" | "reject" = "fill";
  placed: LimitOrderRequest[] = [];
  cancelled: string[] = [];
  failPositions = false;
  private orders = new Map<string, { req: LimitOrderRequest; report: OrderReport }>();
  private nextId = 1;

  async getAccount(): Promise<AccountSnapshot> {
    return this.account;
  }

  async getPositions(): Promise<BrokerPosition[]> {
    if (this.failPositions) throw new Error("positions unavailable");
    return this.positions;
  }

  async listOptionContracts(
    underlying: string,
    optionType: OptionContract["optionType"],
    minExpiration: string,
    maxExpiration: string,
  ): Promise<OptionContract[]> {
    return this.contracts.filter(
      (c) =>
        c.underlying === underlying &&
        c.optionType === optionType &&
        c.expiration >= minExpiration &&
        c.expiration <= maxExpiration,
    );
  }

  async getOptionQuote(contractSymbol: string): Promise<OptionQuote> {
    return this.quotes.get(contractSymbol) ?? { bid: null, ask: null, bidSize: null, askSize: null, last: null };
  }

  async placeLimitOrder(req: LimitOrderRequest): Promise<{ orderId: string }> {
    const orderId = String(this.nextId++);
    this.placed.push(req);
    this.orders.set(orderId, { req, report: { orderId, status: "submitted", filledQty: 0, avgFillPrice: null } });
    return { orderId };
  }

  async getOrderStatus(orderId: string): Promise<OrderReport> {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`unknown order ${orderId}`);
    const { req } = order;
    if (order.report.status === "submitted") {
      if (this.fillMode === "fill") {
        order.report = { orderId, status: "filled", filledQty: req.quantity, avgFillPrice: req.limitPrice };
      } else if (this.fillMode === "reject") {
        order.report = { orderId, status: "rejected", filledQty: 0, avgFillPrice: null };
      } else if (this.fillMode === "partial") {
        order.report = { orderId, status: "partially_filled", filledQty: 1, avgFillPrice: req.limitPrice };
      }
    }
    return order.report;
  }

  async cancelOrder(orderId: string): Promise<void> {
    this.cancelled.push(orderId);
    const order = this.orders.get(orderId);
    if (order) order.report = { ...order.report, status: "cancelled" };
  }
}

export function twoSided(bid: number, ask: number, size = 50): OptionQuote {
  return { bid, ask, bidSize: size, askSize: size, last: (bid + ask) / 2 };
}

/** Orders keep working through a cancel until `release()`; the next read then fills them. */
export class LateFillBroker extends FakeBroker {
  private held = true;

  release(): void {
    this.held = false;
  }

  override async getOrderStatus(orderId: string): Promise<OrderReport> {
    if (this.held) return { orderId, status: "submitted", filledQty: 0, avgFillPrice: null };
    return super.getOrderStatus(orderId);
  }

  override async cancelOrder(orderId: string): Promise<void> {
    this.cancelled.push(orderId);
  }
}
