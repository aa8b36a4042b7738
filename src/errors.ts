/**
 * Error taxonomy for the signal-to-execution pipeline.
 *
 * Recoverable errors (everything except FatalConfig) are caught inside a
 * cycle and never stop the scheduler.
 */

export type PipelineErrorCode =
  | "provider_error"
  | "oracle_error"
  | "liquidity_rejected"
  | "hard_gate_blocked"
  | "execution_ambiguous"
  | "fatal_config";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Transient upstream failure (flow provider, market data, broker reads). */
export class ProviderError extends PipelineError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("provider_error", `${source}: ${message}`, options);
    this.source = source;
  }
}

/** Malformed, missing or timed-out oracle output. Never a SKIP. */
export class OracleError extends PipelineError {
  readonly signalId: string | null;

  constructor(message: string, signalId: string | null = null, options?: { cause?: unknown }) {
    super("oracle_error", message, options);
    this.signalId = signalId;
  }
}

export class LiquidityRejected extends PipelineError {
  readonly contractSymbol: string;
  readonly reasons: string[];

  constructor(contractSymbol: string, reasons: string[]) {
    super("liquidity_rejected", `${contractSymbol} failed liquidity: ${reasons.join("; ")}`);
    this.contractSymbol = contractSymbol;
    this.reasons = reasons;
  }
}

export class HardGateBlocked extends PipelineError {
  readonly failedChecks: string[];

  constructor(signalId: string, failedChecks: string[]) {
    super("hard_gate_blocked", `${signalId} blocked by: ${failedChecks.join(", ")}`);
    this.failedChecks = failedChecks;
  }
}

/** Order was submitted but its fill could not be confirmed by read-back. */
export class ExecutionAmbiguous extends PipelineError {
  readonly orderId: string;
  readonly lastStatus: string;

  constructor(orderId: string, lastStatus: string) {
    super("execution_ambiguous", `Order ${orderId} unconfirmed (last status: ${lastStatus})`);
    this.orderId = orderId;
    this.lastStatus = lastStatus;
  }
}

export class FatalConfig extends PipelineError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super("fatal_config", `Configuration invalid: ${errors.join("; ")}`);
    this.errors = errors;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
