import { TERMINAL_ORDER_STATUSES, type BrokerClient, type BrokerPosition, type OptionQuote, type OrderReport } from "./broker/types.js";
import type { AppConfig } from "./config.js";
import type { Store } from "./db/store.js";
import { OracleError, ProviderError, errorMessage } from "./errors.js";
import { executeExit, type ExitOutcome } from "./execution/exit-executor.js";
import { evaluateExit, type ExitEvaluation } from "./execution/exits.js";
import { executeSignal, settlePendingEntry, type ExecutionResult } from "./execution/pipeline.js";
import type { FlowProvider } from "./flow/client.js";
import { intake, selectCandidates } from "./flow/intake.js";
import type { RejectReason, ScoredSignal } from "./flow/types.js";
import { assembleContext, estimateCandidateValue, type ExposureItem } from "./gate/context.js";
import { decide, type BlockReason } from "./gate/decide.js";
import type { Decision, DecisionContext, FinalAction, GateCounters } from "./gate/types.js";
import { logScheduler } from "./logging.js";
import type { MarketContext, MarketDataSource, UnderlyingFacts } from "./market/types.js";
import type { Notifier, Severity } from "./notify/webhook.js";
import type { HoldingAssessment, Oracle, OracleHolding, OracleOutcome, OracleResult } from "./oracle/types.js";
import { markOf, type Position } from "./positions/types.js";
import { withTimeout } from "./retry.js";
import { runReversalMonitor, type ReversalResult } from "./reversal/engine.js";
import { greeksFromMark } from "./risk/greeks.js";
import { buildRiskSnapshot, marketValue, type PositionExposure } from "./risk/portfolio.js";
import type { PortfolioRiskState } from "./risk/types.js";
import {
  advanceCooldown,
  canExecute,
  recordFailure,
  recordSuccess,
  type BreakerTransition,
  type BreakerUpdate,
} from "./state/circuit-breaker.js";
import { ensureTradingDate, initialCycleState, markSeen, recordExecution, type CycleState } from "./state/cycle-state.js";
import { daysBetween, isSessionOpen } from "./time.js";

const log = logScheduler;

export interface SchedulerDeps {
  flow: FlowProvider;
  market: MarketDataSource;
  broker: BrokerClient;
  oracle: Oracle;
  notifier: Notifier;
  store: Store;
  config: AppConfig;
  excluded: ReadonlySet<string>;
  sessionId: string;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface ExitRecord {
  positionId: number;
  contractSymbol: string;
  evaluation: ExitEvaluation;
  outcome: ExitOutcome | null;
}

export interface CycleSummary {
  startedAt: string;
  finishedAt: string;
  tradingDate: string;
  dailyReset: boolean;
  aborted: boolean;
  fetched: number;
  candidates: number;
  rejected: Partial<Record<RejectReason, number>>;
  decisions: Record<FinalAction, number>;
  executions: { signalId: string; result: ExecutionResult["status"] }[];
  exits: ExitRecord[];
  reversals: ReversalResult[];
  failures: string[];
  breakerTransitions: BreakerTransition[];
  risk: PortfolioRiskState | null;
}

function emptySummary(now: Date, tradingDate: string): CycleSummary {
  return {
    startedAt: now.toISOString(),
    finishedAt: now.toISOString(),
    tradingDate,
    dailyReset: false,
    aborted: false,
    fetched: 0,
    candidates: 0,
    rejected: {},
    decisions: { EXECUTE: 0, ALERT: 0, SKIP: 0, BLOCKED: 0 },
    executions: [],
    exits: [],
    reversals: [],
    failures: [],
    breakerTransitions: [],
    risk: null,
  };
}

function midOf(q: OptionQuote): number | null {
  if (q.bid !== null && q.ask !== null && q.ask >= q.bid && q.ask > 0) return (q.bid + q.ask) / 2;
  return q.last;
}

function fallbackFacts(signal: ScoredSignal): UnderlyingFacts {
  return {
    symbol: signal.underlying,
    price: signal.underlyingPrice,
    sector: signal.sector,
    nextEarningsDate: null,
    daysToEarnings: null,
  };
}

/**
 * Runs the fixed-interval cycle: intake, risk, oracle, exits, reversal
 * monitor, admission and execution, then persistence and one summary.
 *
 * One cycle at a time; a tick that lands while a cycle runs is dropped.
 */
export class Scheduler {
  private state: CycleState;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<CycleSummary> | null = null;
  private controller: AbortController | null = null;
  private readonly clock: () => Date;
  /** Order tags submitted this cycle; reset at the start of each. */
  private submitted = new Set<string>();

  constructor(private readonly deps: SchedulerDeps) {
    this.clock = deps.clock ?? (() => new Date());
    const now = this.clock();
    const stored = deps.store.loadState();
    this.state = stored
      ? { ...stored, sessionId: deps.sessionId }
      : initialCycleState(deps.sessionId, now, deps.config.venue.timezone);
  }

  getState(): CycleState {
    return this.state;
  }

  start(): void {
    if (this.timer) return;
    const { cycleIntervalMs } = this.deps.config.scheduler;
    log.info({ intervalMs: cycleIntervalMs, shadowMode: this.deps.config.shadowMode }, "Scheduler started");
    this.timer = setInterval(() => {
      this.tick().catch((e: unknown) => log.error({ err: e }, "Tick failed"));
    }, cycleIntervalMs);
    this.tick().catch((e: unknown) => log.error({ err: e }, "Tick failed"));
  }

  /** Run a cycle if the session is open and none is in flight. */
  async tick(): Promise<CycleSummary | null> {
    if (this.running) {
      log.warn("Previous cycle still running; tick skipped");
      return null;
    }
    if (!isSessionOpen(this.clock(), this.deps.config.venue)) {
      log.debug("Outside session hours");
      return null;
    }
    return this.runCycle();
  }

  runCycle(): Promise<CycleSummary> {
    if (this.running) return this.running;
    const run = this.cycle().finally(() => {
      this.running = null;
      this.controller = null;
    });
    this.running = run;
    return run;
  }

  /** Cooperative stop: no new ticks, abort the current cycle, wait for it, persist. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    if (this.running) {
      try {
        await this.running;
      } catch (e: unknown) {
        log.error({ err: e }, "Cycle failed during stop");
      }
    }
    this.deps.store.saveState(this.state);
    log.info("Scheduler stopped");
  }

  // ── One cycle ────────────────────────────────────────────────────────

  private async cycle(): Promise<CycleSummary> {
    const { config } = this.deps;
    const now = this.clock();
    const tz = config.venue.timezone;

    const dated = ensureTradingDate(this.state, now, tz);
    this.state = dated.state;
    if (dated.reset) log.info({ tradingDate: this.state.tradingDate }, "New trading day; counters reset");

    this.submitted = new Set();
    const summary = emptySummary(now, this.state.tradingDate);
    summary.dailyReset = dated.reset;
    this.applyBreaker(advanceCooldown(this.state.breaker, now, config.breaker), summary);

    const controller = new AbortController();
    this.controller = controller;
    const deadline = setTimeout(() => controller.abort(), config.scheduler.cycleDeadlineMs);
    const failures = new Set<string>();

    try {
      await this.body(controller.signal, now, summary, failures);
    } catch (e: unknown) {
      failures.add("cycle");
      log.error({ err: e }, "Cycle fault");
    } finally {
      clearTimeout(deadline);
    }
    summary.aborted = controller.signal.aborted;
    if (summary.aborted) log.warn("Cycle deadline reached; remaining steps abandoned");

    // A failing cycle counts once, however many sources failed in it.
    if (failures.size > 0) {
      this.applyBreaker(recordFailure(this.state.breaker, this.clock(), config.breaker), summary);
      log.warn({ sources: [...failures] }, "Cycle failure recorded");
    } else {
      this.applyBreaker(recordSuccess(this.state.breaker), summary);
    }
    summary.failures = [...failures];

    this.state = { ...this.state, lastCheck: now.toISOString() };
    this.deps.store.saveState(this.state);
    summary.finishedAt = this.clock().toISOString();
    log.info(
      {
        fetched: summary.fetched,
        candidates: summary.candidates,
        decisions: summary.decisions,
        fills: summary.executions.filter((e) => e.result === "filled").length,
        exits: summary.exits.length,
        failures: summary.failures,
        breaker: this.state.breaker.status,
      },
      "Cycle complete",
    );
    await this.notifySummary(summary);
    return summary;
  }

  private applyBreaker(update: BreakerUpdate, summary: CycleSummary): void {
    this.state = { ...this.state, breaker: update.breaker };
    if (!update.transition) return;
    summary.breakerTransitions.push(update.transition);
    const severity: Severity = update.transition === "opened" ? "critical" : "warning";
    log.warn({ transition: update.transition, breaker: update.breaker }, "Circuit breaker transition");
    this.deps.notifier
      .send({
        severity,
        title: `Circuit breaker ${update.transition.replace("_", "-")}`,
        body: `consecutive errors: ${update.breaker.consecutiveErrors}`,
        dedupKey: `breaker:${update.transition}`,
      })
      .catch((e: unknown) => log.warn({ err: e }, "Breaker notification failed"));
  }

  private async fetchContext(failures: Set<string>) {
    const { market, broker, flow, config } = this.deps;
    const t = config.scheduler.fetchTimeoutMs;
    const [marketRes, accountRes, positionsRes, batch] = await Promise.allSettled([
      withTimeout(market.getMarketContext(), t, "market context"),
      withTimeout(broker.getAccount(), t, "account"),
      withTimeout(broker.getPositions(), t, "positions"),
      withTimeout(intake(flow, this.state.newerThan), t, "flow intake"),
    ]);
    const settled = <T>(r: PromiseSettledResult<T>, source: string): T | null => {
      if (r.status === "fulfilled") return r.value;
      failures.add(source);
      log.warn({ source, err: errorMessage(r.reason) }, "Fetch failed");
      return null;
    };
    const intakeBatch = settled(batch, "flow");
    if (intakeBatch?.error) failures.add("flow");
    return {
      market: settled(marketRes, "market"),
      account: settled(accountRes, "broker"),
      positions: settled(positionsRes, "broker"),
      intake: intakeBatch,
    };
  }

  private async body(signal: AbortSignal, now: Date, summary: CycleSummary, failures: Set<string>): Promise<void> {
    const { config, store } = this.deps;
    const today = this.state.tradingDate;

    const fetched = await this.fetchContext(failures);
    if (!fetched.account || !fetched.positions) {
      log.warn("Account or positions unavailable; cycle limited to bookkeeping");
      return;
    }
    const equity = fetched.account.equity;
    const brokerPositions = fetched.positions;
    const market: MarketContext | null = fetched.market;

    this.reconcile(brokerPositions, now);
    await this.settlePendingEntries(today, failures);

    // Re-snapshot greeks and build the risk picture from open positions.
    let open = await this.snapshotPositions(store.getOpenPositions(), today, now, failures);
    let risk = buildRiskSnapshot(this.exposures(open), equity, config.risk, now);
    this.state = { ...this.state, lastPortfolio: risk };
    summary.risk = risk;
    if (signal.aborted) return;

    // Candidates.
    const batch = fetched.intake;
    let candidates: ScoredSignal[] = [];
    if (batch) {
      summary.fetched = batch.fetchedIds.length;
      if (market && batch.signals.length > 0) {
        const selection = await selectCandidates(this.deps.flow, batch.signals, {
          seen: new Set(this.state.seenSignalIds),
          excluded: this.deps.excluded,
          trend: market.trend,
          asOf: today,
          limits: config.flow,
        });
        candidates = selection.candidates;
        summary.rejected = selection.rejected;
      }
      this.state = markSeen(this.state, batch.fetchedIds, config.flow.seenCapacity);
      this.state = { ...this.state, newerThan: batch.watermark };
    }
    summary.candidates = candidates.length;
    if (signal.aborted) return;

    // Context per candidate, then one oracle call covering candidates and holdings.
    const contexts = market ? await this.assemble(candidates, market, risk, this.exposureItems(open), today, now) : [];
    let oracle: OracleResult | null = null;
    if (market && (contexts.length > 0 || open.length > 0)) {
      oracle = await this.consultOracle(contexts, open, market, risk);
      if (oracle.callError || [...oracle.outcomes.values()].some((o) => !o.ok)) failures.add("oracle");
    }
    if (signal.aborted) return;

    // Exits run regardless of admission and of the breaker.
    await this.runExits(open, market, oracle?.reviews ?? new Map(), now, today, summary, failures, signal);
    if (signal.aborted) return;

    if (config.reversal.enabled) {
      try {
        summary.reversals = await runReversalMonitor(
          {
            broker: this.deps.broker,
            market: this.deps.market,
            store,
            settings: {
              ...config.reversal,
              limitBufferPct: config.sizing.limitBufferPct,
              shadowMode: config.shadowMode,
              orders: this.orderTiming(),
            },
            submitted: this.submitted,
            sleep: this.deps.sleep,
          },
          brokerPositions,
          today,
          now,
        );
      } catch (e: unknown) {
        failures.add("reversal");
        log.error({ err: e }, "Reversal monitor failed");
      }
    }
    if (signal.aborted) return;

    // Admission and execution, interleaved so counters and risk see each fill.
    // Unconfirmed entries hold a slot as if filled.
    open = store.getOpenPositions();
    risk = buildRiskSnapshot(this.exposures(open), equity, config.risk, now);
    summary.risk = risk;
    const pending = store.getPendingEntries();
    const counters: GateCounters = {
      executionsToday: this.state.executionsToday,
      openPositionCount: open.length + pending.length,
      openUnderlyings: new Set([...open.map((p) => p.underlying), ...pending.map((e) => e.template.underlying)]),
    };
    let fills = 0;
    for (const assembled of contexts) {
      if (signal.aborted) return;
      const ctx = assembleContext({
        signal: assembled.signal,
        market: assembled.market,
        portfolio: risk,
        facts: assembled.facts,
        exposures: this.exposureItems(open),
        candidateValue: assembled.candidateValue,
        now,
      });
      const outcome: OracleOutcome = oracle?.outcomes.get(ctx.signal.id) ?? {
        ok: false,
        error: new OracleError("no oracle outcome", ctx.signal.id),
      };
      let blocked: BlockReason | null = null;
      if (!canExecute(this.state.breaker)) blocked = "circuit_breaker_open";
      else if (fills >= config.scheduler.maxFillsPerCycle) blocked = "fill_cap_reached";

      const decision = decide({ ctx, outcome, counters, limits: config.gate, blocked, now: this.clock() });
      store.recordDecision(decision, oracle?.promptHash ?? null);
      summary.decisions[decision.action]++;
      if (decision.action !== "EXECUTE") continue;

      const result = await this.execute(decision, ctx, today, failures);
      if (!result) continue;
      summary.executions.push({ signalId: ctx.signal.id, result: result.status });
      if (result.status === "filled" || result.status === "shadow" || result.status === "ambiguous") {
        fills++;
        this.state = recordExecution(this.state, decision.usedOverride);
        counters.executionsToday = this.state.executionsToday;
        counters.openPositionCount++;
        counters.openUnderlyings = new Set([...counters.openUnderlyings, ctx.signal.underlying]);
      }
      if (result.status === "filled") {
        open = store.getOpenPositions();
        risk = buildRiskSnapshot(this.exposures(open), equity, config.risk, now);
        summary.risk = risk;
      }
    }
  }

  // ── Steps ────────────────────────────────────────────────────────────

  private orderTiming() {
    return {
      pollIntervalMs: this.deps.config.scheduler.orderPollIntervalMs,
      timeoutMs: this.deps.config.scheduler.orderConfirmTimeoutMs,
    };
  }

  /** Close stored positions the broker no longer reports. */
  private reconcile(brokerPositions: readonly BrokerPosition[], now: Date): void {
    const held = new Set(brokerPositions.filter((p) => p.secType === "OPT" && p.quantity !== 0).map((p) => p.symbol));
    for (const p of this.deps.store.getOpenPositions()) {
      if (held.has(p.contractSymbol)) continue;
      log.warn({ positionId: p.id, contract: p.contractSymbol }, "Open position missing at broker; closing record");
      this.deps.store.closePosition(p.id, {
        exitPrice: markOf(p),
        exitGreeks: p.currentGreeks,
        exitReason: "broker_reconcile",
        closedAt: now.toISOString(),
      });
    }
  }

  /**
   * Read back entry orders earlier cycles could not confirm. A terminal
   * report settles them; anything still working waits for the next cycle.
   * Their executions were counted at submission.
   */
  private async settlePendingEntries(today: string, failures: Set<string>): Promise<void> {
    const { broker, store, config } = this.deps;
    for (const pending of store.getPendingEntries()) {
      let report: OrderReport;
      try {
        report = await broker.getOrderStatus(pending.orderId);
      } catch (e: unknown) {
        failures.add("broker");
        log.warn({ orderId: pending.orderId, err: errorMessage(e) }, "Pending entry read-back failed");
        continue;
      }
      if (!TERMINAL_ORDER_STATUSES.has(report.status)) {
        log.warn({ orderId: pending.orderId, status: report.status }, "Pending entry still working");
        continue;
      }
      settlePendingEntry(store, config.risk, pending, report, today);
    }
  }

  private async snapshotPositions(open: Position[], today: string, now: Date, failures: Set<string>): Promise<Position[]> {
    if (open.length === 0) return open;
    const { broker, market, config, store } = this.deps;
    let spots = new Map<string, number>();
    try {
      spots = await market.getQuotes([...new Set(open.map((p) => p.underlying))]);
    } catch (e: unknown) {
      failures.add("market");
      log.warn({ err: errorMessage(e) }, "Underlying quotes unavailable for greeks");
    }
    for (const p of open) {
      let mark: number | null = null;
      try {
        mark = midOf(await broker.getOptionQuote(p.contractSymbol));
      } catch (e: unknown) {
        if (e instanceof ProviderError) failures.add("broker");
        log.warn({ contract: p.contractSymbol, err: errorMessage(e) }, "Option quote unavailable");
      }
      const { greeks, iv } = greeksFromMark({
        spot: spots.get(p.underlying) ?? null,
        strike: p.strike,
        dte: daysBetween(today, p.expiration),
        optionType: p.optionType,
        mark: mark ?? p.lastMark,
        rate: config.risk.riskFreeRate,
        fallbackIv: p.entryIv ?? config.risk.defaultIv,
      });
      store.updateSnapshot(p.id, {
        greeks,
        mark,
        iv,
        underlyingPrice: spots.get(p.underlying) ?? null,
        takenAt: now.toISOString(),
      });
    }
    return store.getOpenPositions();
  }

  private exposures(open: readonly Position[]): PositionExposure[] {
    return open.map((p) => ({
      underlying: p.underlying,
      sector: p.sector,
      quantity: p.quantity,
      greeks: p.currentGreeks ?? p.entryGreeks,
      mark: markOf(p),
    }));
  }

  private exposureItems(open: readonly Position[]): ExposureItem[] {
    return open.map((p) => ({
      underlying: p.underlying,
      sector: p.sector,
      marketValue: marketValue({ quantity: p.quantity, mark: markOf(p) }),
    }));
  }

  private async assemble(
    candidates: readonly ScoredSignal[],
    market: MarketContext,
    risk: PortfolioRiskState,
    exposures: readonly ExposureItem[],
    today: string,
    now: Date,
  ): Promise<DecisionContext[]> {
    const { config } = this.deps;
    const t = config.scheduler.fetchTimeoutMs;
    const candidateValue = estimateCandidateValue(risk.equity, config.sizing);
    const facts = await Promise.all(
      candidates.map(async (signal) => {
        try {
          return await withTimeout(this.deps.market.getUnderlyingFacts(signal.underlying, today), t, "underlying facts");
        } catch (e: unknown) {
          log.warn({ underlying: signal.underlying, err: errorMessage(e) }, "Underlying facts unavailable; using flow data");
          return fallbackFacts(signal);
        }
      }),
    );
    return candidates.map((signal, i) =>
      assembleContext({
        signal,
        market,
        portfolio: risk,
        facts: facts[i] ?? fallbackFacts(signal),
        exposures,
        candidateValue,
        now,
      }),
    );
  }

  private async consultOracle(
    contexts: readonly DecisionContext[],
    open: readonly Position[],
    market: MarketContext,
    risk: PortfolioRiskState,
  ): Promise<OracleResult> {
    const holdings: OracleHolding[] = open.map((p) => ({
      contractSymbol: p.contractSymbol,
      underlying: p.underlying,
      optionType: p.optionType,
      strike: p.strike,
      expiration: p.expiration,
      quantity: p.quantity,
      entryPrice: p.entryPrice,
      mark: p.lastMark,
      entryConviction: p.entryThesis.conviction,
      entryThesis: p.entryThesis.thesis,
    }));
    return this.deps.oracle.evaluate({
      market,
      portfolio: risk,
      candidates: contexts.map((c) => ({
        signal: c.signal,
        facts: c.facts,
        projectedConcentration: c.projectedConcentration,
      })),
      holdings,
    });
  }

  private async runExits(
    open: readonly Position[],
    market: MarketContext | null,
    reviews: ReadonlyMap<string, HoldingAssessment>,
    now: Date,
    today: string,
    summary: CycleSummary,
    failures: Set<string>,
    signal: AbortSignal,
  ): Promise<void> {
    const { config, broker, store } = this.deps;
    for (const p of open) {
      if (signal.aborted) return;
      const evaluation = evaluateExit(
        p,
        {
          mark: p.lastMark,
          greeks: p.currentGreeks ?? p.entryGreeks,
          dte: daysBetween(today, p.expiration),
          trend: market?.trend ?? "neutral",
          review: reviews.get(p.contractSymbol) ?? null,
          now,
        },
        { ...config.exits, timezone: config.venue.timezone },
      );
      if (evaluation.action === "HOLD") {
        if (evaluation.vetoedBy) {
          log.info({ positionId: p.id, rule: evaluation.rule }, "Soft exit held by minimum-hold override");
        }
        continue;
      }
      let outcome: ExitOutcome | null = null;
      try {
        outcome = await executeExit(
          {
            broker,
            store,
            settings: {
              liquidity: config.liquidity,
              limitBufferPct: config.sizing.limitBufferPct,
              rollMinDaysOut: config.exits.rollMinDaysOut,
              rollSearchDays: config.exits.rollSearchDays,
              orders: this.orderTiming(),
              shadowMode: config.shadowMode,
            },
            submitted: this.submitted,
            sleep: this.deps.sleep,
          },
          p,
          evaluation,
          p.currentGreeks ?? p.entryGreeks,
          now,
        );
        if (outcome.status === "ambiguous") failures.add("execution");
      } catch (e: unknown) {
        failures.add("broker");
        log.error({ positionId: p.id, err: e }, "Exit failed");
      }
      summary.exits.push({ positionId: p.id, contractSymbol: p.contractSymbol, evaluation, outcome });
    }
  }

  private async execute(
    decision: Decision,
    ctx: DecisionContext,
    today: string,
    failures: Set<string>,
  ): Promise<ExecutionResult | null> {
    const { config } = this.deps;
    try {
      const result = await executeSignal(
        {
          broker: this.deps.broker,
          store: this.deps.store,
          settings: {
            sizing: config.sizing,
            liquidity: config.liquidity,
            dteWindow: { minDte: config.flow.minDte, maxDte: config.flow.maxDte },
            risk: config.risk,
            orders: this.orderTiming(),
            shadowMode: config.shadowMode,
          },
          submitted: this.submitted,
          sleep: this.deps.sleep,
        },
        { decision, ctx, asOf: today, now: this.clock() },
      );
      if (result.status === "ambiguous") failures.add("execution");
      return result;
    } catch (e: unknown) {
      failures.add("broker");
      log.error({ signalId: decision.signalId, err: e }, "Execution failed");
      return null;
    }
  }

  // ── Notification ─────────────────────────────────────────────────────

  private async notifySummary(s: CycleSummary): Promise<void> {
    const fills = s.executions.filter((e) => e.result === "filled" || e.result === "shadow");
    const closes = s.exits.filter((e) => e.outcome !== null);
    const reversalHits = s.reversals.filter((r) => r.action !== "none");
    const notable =
      fills.length > 0 || closes.length > 0 || reversalHits.length > 0 || s.decisions.ALERT > 0 || s.failures.length > 0;
    if (!notable) return;

    const lines = [
      `candidates ${s.candidates}/${s.fetched} · EXECUTE ${s.decisions.EXECUTE} · ALERT ${s.decisions.ALERT} · SKIP ${s.decisions.SKIP} · BLOCKED ${s.decisions.BLOCKED}`,
    ];
    for (const f of fills) lines.push(`entry ${f.signalId}: ${f.result}`);
    for (const e of closes) {
      lines.push(`exit ${e.contractSymbol}: ${e.evaluation.action} (${e.evaluation.rule ?? "-"}) → ${e.outcome?.status ?? "-"}`);
    }
    for (const r of reversalHits) lines.push(`reversal ${r.symbol}: score ${r.score} ${r.action}${r.closed ? " (closed)" : ""}`);
    if (s.risk) lines.push(`risk ${s.risk.riskScore} (${s.risk.riskLevel}), capacity ${(s.risk.riskCapacity * 100).toFixed(0)}%`);
    if (s.failures.length > 0) lines.push(`failures: ${s.failures.join(", ")}`);
    if (this.deps.config.shadowMode) lines.push("shadow mode");

    const severity: Severity = s.failures.length > 0 ? "warning" : "info";
    try {
      await this.deps.notifier.send({ severity, title: `Cycle ${s.tradingDate} ${s.startedAt.slice(11, 16)}Z`, body: lines.join("\n") });
    } catch (e: unknown) {
      log.warn({ err: e }, "Summary notification failed");
    }
  }
}
