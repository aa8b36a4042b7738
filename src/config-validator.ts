import type { AppConfig } from "./config.js";
import { FatalConfig } from "./errors.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Errors (startup aborts):
 * - missing flow provider or oracle credentials
 * - broker host/port/clientId out of range
 * - conviction thresholds outside 0-100, exceptional below minimum
 * - fractions (capacity, allocation, concentration, spread, exits) outside (0, 1]
 * - non-positive limits and timeouts
 * - cycle deadline not strictly below the cycle interval
 * - DTE window inverted
 *
 * Warnings:
 * - no notification webhook
 * - shadow mode on (no live orders)
 * - reversal alert threshold above auto-close threshold
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!cfg.flow.apiKey) errors.push("UW_API_KEY is required");
  if (!cfg.oracle.apiKey) errors.push("ANTHROPIC_API_KEY is required");

  if (!cfg.broker.host) errors.push("IBKR host is required");
  if (!isValidPort(cfg.broker.port)) {
    errors.push(`IBKR port must be between 1 and 65535, got ${cfg.broker.port}`);
  }
  if (!Number.isInteger(cfg.broker.clientId) || cfg.broker.clientId < 0 || cfg.broker.clientId > 999) {
    errors.push(`broker.clientId must be between 0 and 999, got ${cfg.broker.clientId}`);
  }

  if (!isValidScore(cfg.gate.minConviction)) {
    errors.push(`gate.minConviction must be between 0 and 100, got ${cfg.gate.minConviction}`);
  }
  if (!isValidScore(cfg.gate.exceptionalConviction)) {
    errors.push(`gate.exceptionalConviction must be between 0 and 100, got ${cfg.gate.exceptionalConviction}`);
  }
  if (cfg.gate.exceptionalConviction < cfg.gate.minConviction) {
    errors.push(
      `gate.exceptionalConviction (${cfg.gate.exceptionalConviction}) must be >= gate.minConviction (${cfg.gate.minConviction})`,
    );
  }

  const fractions: Array<[string, number]> = [
    ["gate.minRiskCapacity", cfg.gate.minRiskCapacity],
    ["gate.maxOptionsAllocationPct", cfg.gate.maxOptionsAllocationPct],
    ["gate.maxConcentration", cfg.gate.maxConcentration],
    ["liquidity.maxSpreadPct", cfg.liquidity.maxSpreadPct],
    ["sizing.maxEquityPct", cfg.sizing.maxEquityPct],
    ["exits.stopLossPct", cfg.exits.stopLossPct],
    ["flow.maxStrikeDistancePct", cfg.flow.maxStrikeDistancePct],
  ];
  for (const [name, value] of fractions) {
    if (!isValidFraction(value)) errors.push(`${name} must be in (0, 1], got ${value}`);
  }
  if (isNaN(cfg.exits.profitTargetPct) || cfg.exits.profitTargetPct <= 0) {
    errors.push(`exits.profitTargetPct must be positive, got ${cfg.exits.profitTargetPct}`);
  }

  const positiveInts: Array<[string, number]> = [
    ["gate.maxExecutionsPerDay", cfg.gate.maxExecutionsPerDay],
    ["gate.maxPositions", cfg.gate.maxPositions],
    ["sizing.maxContractsPerTrade", cfg.sizing.maxContractsPerTrade],
    ["sizing.lotSize", cfg.sizing.lotSize],
    ["flow.scanLimit", cfg.flow.scanLimit],
    ["flow.seenCapacity", cfg.flow.seenCapacity],
    ["scheduler.cycleIntervalMs", cfg.scheduler.cycleIntervalMs],
    ["scheduler.cycleDeadlineMs", cfg.scheduler.cycleDeadlineMs],
    ["scheduler.fetchTimeoutMs", cfg.scheduler.fetchTimeoutMs],
    ["scheduler.maxFillsPerCycle", cfg.scheduler.maxFillsPerCycle],
    ["scheduler.orderPollIntervalMs", cfg.scheduler.orderPollIntervalMs],
    ["scheduler.orderConfirmTimeoutMs", cfg.scheduler.orderConfirmTimeoutMs],
    ["breaker.failureThreshold", cfg.breaker.failureThreshold],
    ["breaker.cooldownMs", cfg.breaker.cooldownMs],
    ["oracle.timeoutMs", cfg.oracle.timeoutMs],
    ["broker.requestTimeoutMs", cfg.broker.requestTimeoutMs],
  ];
  for (const [name, value] of positiveInts) {
    if (!Number.isInteger(value) || value <= 0) errors.push(`${name} must be a positive integer, got ${value}`);
  }

  if (cfg.scheduler.cycleDeadlineMs >= cfg.scheduler.cycleIntervalMs) {
    errors.push(
      `scheduler.cycleDeadlineMs (${cfg.scheduler.cycleDeadlineMs}) must be < scheduler.cycleIntervalMs (${cfg.scheduler.cycleIntervalMs})`,
    );
  }

  if (cfg.flow.minDte > cfg.flow.maxDte) {
    errors.push(`flow.minDte (${cfg.flow.minDte}) must be <= flow.maxDte (${cfg.flow.maxDte})`);
  }

  if (isNaN(cfg.sizing.maxPositionValue) || cfg.sizing.maxPositionValue <= 0) {
    errors.push(`sizing.maxPositionValue must be positive, got ${cfg.sizing.maxPositionValue}`);
  }

  try {
    new Intl.DateTimeFormat("en-US", { timeZone: cfg.venue.timezone });
  } catch {
    errors.push(`venue.timezone is not a valid IANA timezone: ${cfg.venue.timezone}`);
  }

  if (!cfg.notify.webhookUrl) {
    warnings.push("NOTIFY_WEBHOOK_URL not set; summaries and breaker transitions will only be logged");
  }
  if (cfg.shadowMode) {
    warnings.push("Shadow mode is ON: decisions run end to end but no orders are sent");
  }
  if (cfg.reversal.alertThreshold > cfg.reversal.autoCloseThreshold) {
    warnings.push(
      `reversal.alertThreshold (${cfg.reversal.alertThreshold}) is above autoCloseThreshold (${cfg.reversal.autoCloseThreshold})`,
    );
  }

  return { errors, warnings };
}

/** Throws FatalConfig when validation produced any error. */
export function assertConfig(cfg: AppConfig): ValidationResult {
  const result = validateConfig(cfg);
  if (result.errors.length > 0) throw new FatalConfig(result.errors);
  return result;
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isValidScore(value: number): boolean {
  return !isNaN(value) && value >= 0 && value <= 100;
}

function isValidFraction(value: number): boolean {
  return !isNaN(value) && value > 0 && value <= 1;
}
