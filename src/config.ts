import dotenv from "dotenv";

dotenv.config();

function flag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  return raw === "true" || raw === "1";
}

// Broker, flow provider and oracle credentials are required; everything
// else has a working default. validateConfig() is the source of truth for
// what blocks startup.
export const config = {
  venue: {
    timezone: process.env.VENUE_TIMEZONE ?? "America/New_York",
    open: process.env.SESSION_OPEN ?? "09:30",
    close: process.env.SESSION_CLOSE ?? "16:00",
  },
  broker: {
    host: process.env.IBKR_HOST ?? "127.0.0.1",
    port: parseInt(process.env.IBKR_PORT ?? "7497", 10),
    clientId: parseInt(process.env.IBKR_CLIENT_ID ?? "7", 10),
    account: process.env.IBKR_ACCOUNT ?? "",
    requestTimeoutMs: parseInt(process.env.IBKR_REQUEST_TIMEOUT_MS ?? "10000", 10),
  },
  flow: {
    apiKey: process.env.UW_API_KEY ?? "",
    baseUrl: process.env.UW_BASE_URL ?? "https://api.unusualwhales.com",
    requestTimeoutMs: parseInt(process.env.UW_TIMEOUT_MS ?? "15000", 10),
    minPremium: parseFloat(process.env.FLOW_MIN_PREMIUM ?? "100000"),
    minDte: parseInt(process.env.FLOW_MIN_DTE ?? "14", 10),
    maxDte: parseInt(process.env.FLOW_MAX_DTE ?? "45", 10),
    minScore: parseInt(process.env.FLOW_MIN_SCORE ?? "7", 10),
    minOpenInterest: parseInt(process.env.FLOW_MIN_OPEN_INTEREST ?? "500", 10),
    maxStrikeDistancePct: parseFloat(process.env.FLOW_MAX_STRIKE_DISTANCE_PCT ?? "0.10"),
    scanLimit: parseInt(process.env.FLOW_SCAN_LIMIT ?? "30", 10),
    fetchLimit: parseInt(process.env.FLOW_FETCH_LIMIT ?? "100", 10),
    seenCapacity: parseInt(process.env.FLOW_SEEN_CAPACITY ?? "5000", 10),
  },
  oracle: {
    apiKey: process.env.ANTHROPIC_API_KEY ?? "",
    model: process.env.ORACLE_MODEL ?? "claude-sonnet-4-20250514",
    maxTokens: parseInt(process.env.ORACLE_MAX_TOKENS ?? "4096", 10),
    temperature: parseFloat(process.env.ORACLE_TEMPERATURE ?? "0"),
    timeoutMs: parseInt(process.env.ORACLE_TIMEOUT_MS ?? "90000", 10),
  },
  gate: {
    minConviction: parseFloat(process.env.GATE_MIN_CONVICTION ?? "80"),
    exceptionalConviction: parseFloat(process.env.GATE_EXCEPTIONAL_CONVICTION ?? "90"),
    minRiskCapacity: parseFloat(process.env.GATE_MIN_RISK_CAPACITY ?? "0.20"),
    maxExecutionsPerDay: parseInt(process.env.GATE_MAX_EXECUTIONS_PER_DAY ?? "3", 10),
    maxPositions: parseInt(process.env.GATE_MAX_POSITIONS ?? "4", 10),
    maxOptionsAllocationPct: parseFloat(process.env.GATE_MAX_OPTIONS_ALLOCATION_PCT ?? "0.30"),
    maxConcentration: parseFloat(process.env.GATE_MAX_CONCENTRATION ?? "0.50"),
    earningsBlackoutDays: parseInt(process.env.GATE_EARNINGS_BLACKOUT_DAYS ?? "2", 10),
  },
  liquidity: {
    maxSpreadPct: parseFloat(process.env.LIQUIDITY_MAX_SPREAD_PCT ?? "0.15"),
    minBid: parseFloat(process.env.LIQUIDITY_MIN_BID ?? "0.10"),
    minBidSize: parseInt(process.env.LIQUIDITY_MIN_BID_SIZE ?? "10", 10),
  },
  sizing: {
    maxContractsPerTrade: parseInt(process.env.SIZING_MAX_CONTRACTS ?? "10", 10),
    maxPositionValue: parseFloat(process.env.SIZING_MAX_POSITION_VALUE ?? "5000"),
    maxEquityPct: parseFloat(process.env.SIZING_MAX_EQUITY_PCT ?? "0.05"),
    lotSize: parseInt(process.env.SIZING_LOT_SIZE ?? "1", 10),
    strikeTolerancePct: parseFloat(process.env.SIZING_STRIKE_TOLERANCE_PCT ?? "0.05"),
    limitBufferPct: parseFloat(process.env.ORDER_LIMIT_BUFFER_PCT ?? "0.02"),
  },
  exits: {
    stopLossPct: parseFloat(process.env.EXIT_STOP_LOSS_PCT ?? "0.50"),
    profitTargetPct: parseFloat(process.env.EXIT_PROFIT_TARGET_PCT ?? "0.40"),
    convictionFloor: parseFloat(process.env.EXIT_CONVICTION_FLOOR ?? "50"),
    gammaCriticalDte: parseInt(process.env.EXIT_GAMMA_CRITICAL_DTE ?? "5", 10),
    gammaRiskThreshold: parseFloat(process.env.EXIT_GAMMA_RISK_THRESHOLD ?? "0.08"),
    rollMinDaysOut: parseInt(process.env.EXIT_ROLL_MIN_DAYS_OUT ?? "7", 10),
    rollSearchDays: parseInt(process.env.EXIT_ROLL_SEARCH_DAYS ?? "60", 10),
    disabledRules: (process.env.EXIT_DISABLED_RULES ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  },
  risk: {
    riskFreeRate: parseFloat(process.env.RISK_FREE_RATE ?? "0.045"),
    defaultIv: parseFloat(process.env.RISK_DEFAULT_IV ?? "0.35"),
    deltaLimitPer100k: parseFloat(process.env.RISK_DELTA_LIMIT_PER_100K ?? "150"),
    gammaLimitPer100k: parseFloat(process.env.RISK_GAMMA_LIMIT_PER_100K ?? "50"),
    thetaLimitPct: parseFloat(process.env.RISK_THETA_LIMIT_PCT ?? "0.003"),
    concentrationLimit: parseFloat(process.env.RISK_CONCENTRATION_LIMIT ?? "1.0"),
  },
  scheduler: {
    cycleIntervalMs: parseInt(process.env.CYCLE_INTERVAL_MS ?? "300000", 10),
    cycleDeadlineMs: parseInt(process.env.CYCLE_DEADLINE_MS ?? "240000", 10),
    fetchTimeoutMs: parseInt(process.env.CYCLE_FETCH_TIMEOUT_MS ?? "20000", 10),
    maxFillsPerCycle: parseInt(process.env.CYCLE_MAX_FILLS ?? "2", 10),
    orderPollIntervalMs: parseInt(process.env.ORDER_POLL_INTERVAL_MS ?? "2000", 10),
    orderConfirmTimeoutMs: parseInt(process.env.ORDER_CONFIRM_TIMEOUT_MS ?? "30000", 10),
  },
  breaker: {
    failureThreshold: parseInt(process.env.BREAKER_FAILURE_THRESHOLD ?? "3", 10),
    cooldownMs: parseInt(process.env.BREAKER_COOLDOWN_MS ?? "1800000", 10),
  },
  reversal: {
    enabled: flag("REVERSAL_ENABLED", true),
    alertThreshold: parseInt(process.env.REVERSAL_ALERT_THRESHOLD ?? "3", 10),
    autoCloseThreshold: parseInt(process.env.REVERSAL_AUTO_CLOSE_THRESHOLD ?? "5", 10),
    autoCloseEnabled: flag("REVERSAL_AUTO_CLOSE", false),
    minHoldDays: parseInt(process.env.REVERSAL_MIN_HOLD_DAYS ?? "2", 10),
  },
  notify: {
    webhookUrl: process.env.NOTIFY_WEBHOOK_URL ?? "",
    dedupWindowMs: parseInt(process.env.NOTIFY_DEDUP_WINDOW_MS ?? "300000", 10),
  },
  db: {
    path: process.env.DB_PATH ?? "data/flow-gate.db",
  },
  shadowMode: flag("SHADOW_MODE", true),
};

export type AppConfig = typeof config;
