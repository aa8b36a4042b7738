import { ZERO_GREEKS, type Greeks } from "./types.js";
import type { OptionType } from "../flow/types.js";

export interface GreeksInput {
  spot: number;
  strike: number;
  /** Calendar days to expiration. */
  dte: number;
  /** Annualized implied volatility as a fraction (0.35 = 35%). */
  iv: number;
  rate: number;
  optionType: OptionType;
}

const DAYS_PER_YEAR = 365;

// Abramowitz & Stegun 7.1.26, |error| < 1.5e-7
function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const y =
    1 -
    ((((1.061405429 * t - 1.453152027) * t + 1.421413741) * t - 0.284496736) * t + 0.254829592) *
      t *
      Math.exp(-ax * ax);
  return sign * y;
}

export function normCdf(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

export function normPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

function d1d2(input: GreeksInput, t: number): { d1: number; d2: number } {
  const sqrtT = Math.sqrt(t);
  const d1 =
    (Math.log(input.spot / input.strike) + (input.rate + 0.5 * input.iv * input.iv) * t) / (input.iv * sqrtT);
  return { d1, d2: d1 - input.iv * sqrtT };
}

function degenerate(input: GreeksInput): boolean {
  return input.dte <= 0 || input.iv <= 0 || input.spot <= 0 || input.strike <= 0;
}

/**
 * Black-Scholes sensitivities per unit of underlying.
 * Expired or degenerate inputs yield zeros rather than NaN/Infinity.
 */
export function computeGreeks(input: GreeksInput): Greeks {
  if (degenerate(input)) return { ...ZERO_GREEKS };
  const t = input.dte / DAYS_PER_YEAR;
  const { d1, d2 } = d1d2(input, t);
  const sqrtT = Math.sqrt(t);
  const pdf = normPdf(d1);
  const discount = Math.exp(-input.rate * t);

  const gamma = pdf / (input.spot * input.iv * sqrtT);
  const vega = (input.spot * pdf * sqrtT) / 100;
  const decay = -(input.spot * pdf * input.iv) / (2 * sqrtT);

  if (input.optionType === "call") {
    return {
      delta: normCdf(d1),
      gamma,
      theta: (decay - input.rate * input.strike * discount * normCdf(d2)) / DAYS_PER_YEAR,
      vega,
    };
  }
  return {
    delta: normCdf(d1) - 1,
    gamma,
    theta: (decay + input.rate * input.strike * discount * normCdf(-d2)) / DAYS_PER_YEAR,
    vega,
  };
}

export function theoreticalPrice(input: GreeksInput): number {
  if (degenerate(input)) {
    const intrinsic =
      input.optionType === "call" ? input.spot - input.strike : input.strike - input.spot;
    return Math.max(0, intrinsic);
  }
  const t = input.dte / DAYS_PER_YEAR;
  const { d1, d2 } = d1d2(input, t);
  const discount = Math.exp(-input.rate * t);
  if (input.optionType === "call") {
    return input.spot * normCdf(d1) - input.strike * discount * normCdf(d2);
  }
  return input.strike * discount * normCdf(-d2) - input.spot * normCdf(-d1);
}

/**
 * Back out implied volatility from an observed option price by bisection.
 * Returns null when the price sits outside the model's range.
 */
export function impliedVolatility(
  price: number,
  input: Omit<GreeksInput, "iv">,
  opts: { low?: number; high?: number; tolerance?: number; maxIterations?: number } = {},
): number | null {
  const { low = 0.01, high = 5, tolerance = 1e-4, maxIterations = 100 } = opts;
  if (price <= 0 || input.dte <= 0 || input.spot <= 0) return null;
  let lo = low;
  let hi = high;
  if (price < theoreticalPrice({ ...input, iv: lo }) || price > theoreticalPrice({ ...input, iv: hi })) {
    return null;
  }
  for (let i = 0; i < maxIterations; i++) {
    const mid = (lo + hi) / 2;
    const diff = theoreticalPrice({ ...input, iv: mid }) - price;
    if (Math.abs(diff) < tolerance) return mid;
    if (diff > 0) hi = mid;
    else lo = mid;
  }
  return (lo + hi) / 2;
}

/**
 * Greeks for a held or candidate contract, using IV implied from its mark
 * when solvable and the fallback IV otherwise. Zero greeks without a spot.
 */
export function greeksFromMark(args: {
  spot: number | null;
  strike: number;
  dte: number;
  optionType: GreeksInput["optionType"];
  mark: number | null;
  rate: number;
  fallbackIv: number;
}): { greeks: Greeks; iv: number | null } {
  if (args.spot === null || args.spot <= 0) return { greeks: { ...ZERO_GREEKS }, iv: null };
  const base = { spot: args.spot, strike: args.strike, dte: args.dte, rate: args.rate, optionType: args.optionType };
  const implied = args.mark !== null ? impliedVolatility(args.mark, base) : null;
  const iv = implied ?? args.fallbackIv;
  return { greeks: computeGreeks({ ...base, iv }), iv };
}
