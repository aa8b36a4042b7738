import Database, { type Database as DatabaseType } from "better-sqlite3";
import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Decision } from "../gate/types.js";
import { logDb } from "../logging.js";
import type { EntryThesis, NewPosition, PendingEntry, Position } from "../positions/types.js";
import type { Greeks } from "../risk/types.js";
import type { CycleState } from "../state/cycle-state.js";

// ── JSON column schemas ──────────────────────────────────────────────────

const GreeksSchema = z.object({
  delta: z.number(),
  gamma: z.number(),
  theta: z.number(),
  vega: z.number(),
});

const EntryThesisSchema = z.object({
  recommendation: z.enum(["EXECUTE", "ALERT", "SKIP"]),
  conviction: z.number(),
  thesis: z.string(),
  riskFactors: z.array(z.string()),
  sizingHint: z.string().nullable(),
  trendAtEntry: z.string(),
});

const RiskStateSchema = z.object({
  netDelta: z.number(),
  totalGamma: z.number(),
  dailyTheta: z.number(),
  totalVega: z.number(),
  equity: z.number(),
  optionsMarketValue: z.number(),
  riskScore: z.number(),
  riskCapacity: z.number(),
  riskLevel: z.enum(["healthy", "cautious", "elevated", "critical"]),
  subScores: z.object({ delta: z.number(), gamma: z.number(), theta: z.number(), concentration: z.number() }),
  concentrationBySector: z.record(z.number()),
  concentrationByUnderlying: z.record(z.number()),
  maxConcentration: z.number(),
  openPositionCount: z.number(),
  computedAt: z.string(),
});

const CycleStateSchema = z.object({
  sessionId: z.string(),
  tradingDate: z.string(),
  executionsToday: z.number().int().nonnegative(),
  exceptionalOverridesToday: z.number().int().nonnegative(),
  seenSignalIds: z.array(z.string()),
  breaker: z.object({
    status: z.enum(["closed", "open", "half_open"]),
    consecutiveErrors: z.number().int().nonnegative(),
    openedAt: z.string().nullable(),
  }),
  lastCheck: z.string().nullable(),
  newerThan: z.string().nullable(),
  lastPortfolio: RiskStateSchema.nullable(),
});

const StringArraySchema = z.array(z.string());

const PendingEntrySchema = z.object({
  orderId: z.string(),
  clientTag: z.string(),
  requestedQty: z.number().int().positive(),
  limitPrice: z.number(),
  spot: z.number().nullable(),
  usedOverride: z.boolean(),
  submittedAt: z.string(),
  template: z.object({
    contractSymbol: z.string(),
    underlying: z.string(),
    optionType: z.enum(["call", "put"]),
    strike: z.number(),
    expiration: z.string(),
    entryThesis: EntryThesisSchema,
    signalId: z.string(),
    signalScore: z.number(),
    scoreFactors: StringArraySchema,
    sector: z.string().nullable(),
    openedAt: z.string(),
  }),
});

// ── Row shapes ───────────────────────────────────────────────────────────

interface PositionRow {
  id: number;
  contract_symbol: string;
  underlying: string;
  option_type: string;
  strike: number;
  expiration: string;
  quantity: number;
  entry_price: number;
  entry_greeks: string;
  entry_iv: number | null;
  entry_thesis: string;
  signal_id: string;
  signal_score: number;
  score_factors: string;
  sector: string | null;
  status: string;
  opened_at: string;
  current_greeks: string | null;
  last_mark: number | null;
  last_snapshot_at: string | null;
  closed_at: string | null;
  exit_price: number | null;
  exit_greeks: string | null;
  exit_reason: string | null;
}

export interface DecisionRow {
  id: number;
  signal_id: string;
  underlying: string;
  action: string;
  recommendation: string | null;
  conviction: number | null;
  reasons: string;
  checks: string;
  failed_checks: string;
  history: string;
  used_override: number;
  oracle_error: string | null;
  signal_score: number;
  score_factors: string;
  prompt_hash: string | null;
  decided_at: string;
}

export interface ReversalCheckRecord {
  symbol: string;
  score: number;
  signals: string[];
  action: "none" | "alert" | "close" | "close_blocked";
  checkedAt: string;
}

export interface SnapshotRecord {
  greeks: Greeks;
  mark: number | null;
  iv: number | null;
  underlyingPrice: number | null;
  takenAt: string;
}

export interface CloseRecord {
  exitPrice: number;
  exitGreeks: Greeks | null;
  exitReason: string;
  closedAt: string;
}

function parseJson<T>(schema: z.ZodType<T>, raw: string, column: string): T {
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) throw new Error(`Corrupt ${column} column: ${parsed.error.message}`);
  return parsed.data;
}

function rowToPosition(r: PositionRow): Position {
  const thesis: EntryThesis = parseJson(EntryThesisSchema, r.entry_thesis, "entry_thesis");
  return {
    id: r.id,
    contractSymbol: r.contract_symbol,
    underlying: r.underlying,
    optionType: r.option_type === "put" ? "put" : "call",
    strike: r.strike,
    expiration: r.expiration,
    quantity: r.quantity,
    entryPrice: r.entry_price,
    entryGreeks: parseJson(GreeksSchema, r.entry_greeks, "entry_greeks"),
    entryIv: r.entry_iv,
    entryThesis: thesis,
    signalId: r.signal_id,
    signalScore: r.signal_score,
    scoreFactors: parseJson(StringArraySchema, r.score_factors, "score_factors"),
    sector: r.sector,
    status: r.status === "closed" ? "closed" : "open",
    openedAt: r.opened_at,
    currentGreeks: r.current_greeks ? parseJson(GreeksSchema, r.current_greeks, "current_greeks") : null,
    lastMark: r.last_mark,
    lastSnapshotAt: r.last_snapshot_at,
    closedAt: r.closed_at,
    exitPrice: r.exit_price,
    exitGreeks: r.exit_greeks ? parseJson(GreeksSchema, r.exit_greeks, "exit_greeks") : null,
    exitReason: r.exit_reason,
  };
}

// ── Store ────────────────────────────────────────────────────────────────

/**
 * All persistence for the pipeline. One instance, owned by the scheduler.
 * Pass ":memory:" for an ephemeral database.
 */
export class Store {
  private readonly db: DatabaseType;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    // WAL: readers never block the writer
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cycle_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        payload TEXT NOT NULL,        -- JSON CycleState
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS positions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        contract_symbol TEXT NOT NULL,
        underlying TEXT NOT NULL,
        option_type TEXT NOT NULL,
        strike REAL NOT NULL,
        expiration TEXT NOT NULL,
        quantity INTEGER NOT NULL,
        entry_price REAL NOT NULL,
        entry_greeks TEXT NOT NULL,   -- JSON Greeks
        entry_iv REAL,
        entry_thesis TEXT NOT NULL,   -- JSON EntryThesis
        signal_id TEXT NOT NULL,
        signal_score INTEGER NOT NULL,
        score_factors TEXT NOT NULL,  -- JSON array
        sector TEXT,
        status TEXT NOT NULL DEFAULT 'open',
        opened_at TEXT NOT NULL,
        current_greeks TEXT,
        last_mark REAL,
        last_snapshot_at TEXT,
        closed_at TEXT,
        exit_price REAL,
        exit_greeks TEXT,
        exit_reason TEXT
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_positions_open_contract
        ON positions(contract_symbol) WHERE status = 'open';

      CREATE TABLE IF NOT EXISTS greeks_snapshots (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        position_id INTEGER NOT NULL REFERENCES positions(id),
        delta REAL NOT NULL,
        gamma REAL NOT NULL,
        theta REAL NOT NULL,
        vega REAL NOT NULL,
        iv REAL,
        mark REAL,
        underlying_price REAL,
        taken_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS decisions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        signal_id TEXT NOT NULL,
        underlying TEXT NOT NULL,
        action TEXT NOT NULL,
        recommendation TEXT,
        conviction REAL,
        reasons TEXT NOT NULL,        -- JSON array
        checks TEXT NOT NULL,         -- JSON GateCheck[]
        failed_checks TEXT NOT NULL,  -- JSON array
        history TEXT NOT NULL,        -- JSON state transitions
        used_override INTEGER NOT NULL DEFAULT 0,
        oracle_error TEXT,
        signal_score INTEGER NOT NULL,
        score_factors TEXT NOT NULL,
        prompt_hash TEXT,
        decided_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS reversal_checks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        symbol TEXT NOT NULL,
        score INTEGER NOT NULL,
        signals TEXT NOT NULL,        -- JSON array
        action TEXT NOT NULL,
        checked_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS pending_entries (
        order_id TEXT PRIMARY KEY,
        payload TEXT NOT NULL,        -- JSON PendingEntry
        submitted_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS stock_holdings (
        symbol TEXT PRIMARY KEY,
        first_seen TEXT NOT NULL      -- venue date the holding was first observed
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_position ON greeks_snapshots(position_id, taken_at);
      CREATE INDEX IF NOT EXISTS idx_decisions_signal ON decisions(signal_id);
      CREATE INDEX IF NOT EXISTS idx_reversal_symbol ON reversal_checks(symbol, checked_at);
    `);
  }

  // ── Cycle state ──────────────────────────────────────────────────────

  loadState(): CycleState | null {
    const row = this.db.prepare<[], { payload: string }>("SELECT payload FROM cycle_state WHERE id = 1").get();
    if (!row) return null;
    return parseJson(CycleStateSchema, row.payload, "cycle_state.payload");
  }

  /** Replace the single state row atomically. */
  saveState(state: CycleState): void {
    const del = this.db.prepare("DELETE FROM cycle_state WHERE id = 1");
    const ins = this.db.prepare("INSERT INTO cycle_state (id, payload, updated_at) VALUES (1, ?, ?)");
    this.db.transaction(() => {
      del.run();
      ins.run(JSON.stringify(state), new Date().toISOString());
    })();
  }

  // ── Positions ────────────────────────────────────────────────────────

  insertPosition(p: NewPosition): Position {
    const info = this.db
      .prepare(
        `INSERT INTO positions (
           contract_symbol, underlying, option_type, strike, expiration, quantity, entry_price,
           entry_greeks, entry_iv, entry_thesis, signal_id, signal_score, score_factors, sector, opened_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        p.contractSymbol,
        p.underlying,
        p.optionType,
        p.strike,
        p.expiration,
        p.quantity,
        p.entryPrice,
        JSON.stringify(p.entryGreeks),
        p.entryIv,
        JSON.stringify(p.entryThesis),
        p.signalId,
        p.signalScore,
        JSON.stringify(p.scoreFactors),
        p.sector,
        p.openedAt,
      );
    const created = this.getPosition(Number(info.lastInsertRowid));
    if (!created) throw new Error(`Position ${String(info.lastInsertRowid)} vanished after insert`);
    logDb.info({ id: created.id, contract: created.contractSymbol, qty: created.quantity }, "Position opened");
    return created;
  }

  getPosition(id: number): Position | null {
    const row = this.db.prepare<[number], PositionRow>("SELECT * FROM positions WHERE id = ?").get(id);
    return row ? rowToPosition(row) : null;
  }

  getOpenPositions(): Position[] {
    return this.db
      .prepare<[], PositionRow>("SELECT * FROM positions WHERE status = 'open' ORDER BY opened_at, id")
      .all()
      .map(rowToPosition);
  }

  getClosedPositions(limit = 100): Position[] {
    return this.db
      .prepare<[number], PositionRow>("SELECT * FROM positions WHERE status = 'closed' ORDER BY closed_at DESC, id DESC LIMIT ?")
      .all(limit)
      .map(rowToPosition);
  }

  /** Record a greeks re-snapshot and update the position's live fields. */
  updateSnapshot(positionId: number, snap: SnapshotRecord): void {
    const insert = this.db.prepare(
      `INSERT INTO greeks_snapshots (position_id, delta, gamma, theta, vega, iv, mark, underlying_price, taken_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const update = this.db.prepare(
      `UPDATE positions SET current_greeks = ?, last_mark = COALESCE(?, last_mark), last_snapshot_at = ?
       WHERE id = ? AND status = 'open'`,
    );
    this.db.transaction(() => {
      const g = snap.greeks;
      insert.run(positionId, g.delta, g.gamma, g.theta, g.vega, snap.iv, snap.mark, snap.underlyingPrice, snap.takenAt);
      update.run(JSON.stringify(g), snap.mark, snap.takenAt, positionId);
    })();
  }

  getSnapshotCount(positionId: number): number {
    const row = this.db
      .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM greeks_snapshots WHERE position_id = ?")
      .get(positionId);
    return row?.n ?? 0;
  }

  /** Shrink an open position after a partial close. */
  reduceQuantity(positionId: number, quantity: number): void {
    if (quantity <= 0) throw new Error(`Cannot reduce position ${positionId} to ${quantity}`);
    this.db.prepare("UPDATE positions SET quantity = ? WHERE id = ? AND status = 'open'").run(quantity, positionId);
  }

  /**
   * Close an open position. Returns false when it was already closed,
   * so exit fields are written exactly once.
   */
  closePosition(positionId: number, rec: CloseRecord): boolean {
    const info = this.db
      .prepare(
        `UPDATE positions
           SET status = 'closed', exit_price = ?, exit_greeks = ?, exit_reason = ?, closed_at = ?
         WHERE id = ? AND status = 'open'`,
      )
      .run(rec.exitPrice, rec.exitGreeks ? JSON.stringify(rec.exitGreeks) : null, rec.exitReason, rec.closedAt, positionId);
    if (info.changes === 0) {
      logDb.warn({ positionId, reason: rec.exitReason }, "Close ignored; position not open");
      return false;
    }
    logDb.info({ positionId, reason: rec.exitReason, exitPrice: rec.exitPrice }, "Position closed");
    return true;
  }

  // ── Pending entries ──────────────────────────────────────────────────

  insertPendingEntry(p: PendingEntry): void {
    this.db
      .prepare("INSERT OR REPLACE INTO pending_entries (order_id, payload, submitted_at) VALUES (?, ?, ?)")
      .run(p.orderId, JSON.stringify(p), p.submittedAt);
    logDb.warn({ orderId: p.orderId, contract: p.template.contractSymbol }, "Pending entry recorded");
  }

  getPendingEntries(): PendingEntry[] {
    return this.db
      .prepare<[], { payload: string }>("SELECT payload FROM pending_entries ORDER BY submitted_at, order_id")
      .all()
      .map((r) => parseJson(PendingEntrySchema, r.payload, "pending_entries.payload"));
  }

  removePendingEntry(orderId: string): void {
    this.db.prepare("DELETE FROM pending_entries WHERE order_id = ?").run(orderId);
  }

  /** Run several writes as one SQLite transaction. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ── Audit ────────────────────────────────────────────────────────────

  recordDecision(d: Decision, promptHash: string | null): void {
    this.db
      .prepare(
        `INSERT INTO decisions (
           signal_id, underlying, action, recommendation, conviction, reasons, checks, failed_checks,
           history, used_override, oracle_error, signal_score, score_factors, prompt_hash, decided_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        d.signalId,
        d.underlying,
        d.action,
        d.recommendation,
        d.conviction,
        JSON.stringify(d.reasons),
        JSON.stringify(d.checks),
        JSON.stringify(d.failedChecks),
        JSON.stringify(d.history),
        d.usedOverride ? 1 : 0,
        d.oracleError,
        d.signalScore,
        JSON.stringify(d.scoreFactors),
        promptHash,
        d.decidedAt,
      );
  }

  getDecisions(limit = 100): DecisionRow[] {
    return this.db.prepare<[number], DecisionRow>("SELECT * FROM decisions ORDER BY id DESC LIMIT ?").all(limit);
  }

  recordReversalCheck(rec: ReversalCheckRecord): void {
    this.db
      .prepare("INSERT INTO reversal_checks (symbol, score, signals, action, checked_at) VALUES (?, ?, ?, ?, ?)")
      .run(rec.symbol, rec.score, JSON.stringify(rec.signals), rec.action, rec.checkedAt);
  }

  getReversalChecks(symbol: string): ReversalCheckRecord[] {
    const rows = this.db
      .prepare<[string], { symbol: string; score: number; signals: string; action: string; checked_at: string }>(
        "SELECT symbol, score, signals, action, checked_at FROM reversal_checks WHERE symbol = ? ORDER BY id",
      )
      .all(symbol);
    return rows.map((r) => ({
      symbol: r.symbol,
      score: r.score,
      signals: parseJson(StringArraySchema, r.signals, "reversal_checks.signals"),
      action: r.action === "alert" || r.action === "close" || r.action === "close_blocked" ? r.action : "none",
      checkedAt: r.checked_at,
    }));
  }

  /**
   * Track when each stock holding was first observed. Returns the first-seen
   * date per symbol and forgets symbols no longer held.
   */
  syncStockHoldings(symbols: readonly string[], today: string): Map<string, string> {
    const insert = this.db.prepare("INSERT OR IGNORE INTO stock_holdings (symbol, first_seen) VALUES (?, ?)");
    const all = this.db.prepare<[], { symbol: string; first_seen: string }>("SELECT symbol, first_seen FROM stock_holdings");
    const remove = this.db.prepare("DELETE FROM stock_holdings WHERE symbol = ?");
    const held = new Set(symbols);
    const out = new Map<string, string>();
    this.db.transaction(() => {
      for (const s of held) insert.run(s, today);
      for (const row of all.all()) {
        if (held.has(row.symbol)) out.set(row.symbol, row.first_seen);
        else remove.run(row.symbol);
      }
    })();
    return out;
  }

  close(): void {
    this.db.close();
  }
}
