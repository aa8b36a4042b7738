import { parseOcc } from "../occ.js";
import type { RawFlowAlert } from "./client.js";
import type { FlowSignal, OptionType } from "./types.js";

function resolveOptionType(raw: RawFlowAlert): OptionType | null {
  const t = raw.type.toLowerCase();
  if (t === "call" || t === "put") return t;
  if (raw.option_chain) return parseOcc(raw.option_chain)?.optionType ?? null;
  return null;
}

/**
 * Convert a validated provider record into an unscored FlowSignal.
 * Returns null when the option type cannot be determined.
 */
export function parseAlert(raw: RawFlowAlert): FlowSignal | null {
  const optionType = resolveOptionType(raw);
  if (!optionType) return null;

  const volume = raw.volume ?? 0;
  const openInterest = raw.open_interest ?? 0;
  const volOiRatio =
    raw.volume_oi_ratio ?? (openInterest > 0 ? volume / openInterest : 0);

  const underlyingPrice = raw.underlying_price && raw.underlying_price > 0 ? raw.underlying_price : null;
  const isOtm =
    underlyingPrice === null
      ? false
      : optionType === "call"
        ? raw.strike > underlyingPrice
        : raw.strike < underlyingPrice;

  const askPrem = raw.total_ask_side_prem ?? 0;
  const bidPrem = raw.total_bid_side_prem ?? 0;

  return Object.freeze({
    id: raw.id,
    underlying: raw.ticker.toUpperCase(),
    contractSymbol: raw.option_chain ?? null,
    optionType,
    strike: raw.strike,
    expiration: raw.expiry,
    premium: raw.total_premium,
    size: raw.total_size ?? 0,
    volume,
    openInterest,
    volOiRatio: Math.round(volOiRatio * 100) / 100,
    isSweep: raw.has_sweep ?? false,
    isAskSide: askPrem > bidPrem,
    isFloor: raw.has_floor ?? false,
    isOpening: raw.all_opening_trades ?? false,
    isOtm,
    underlyingPrice,
    ivRank: null,
    sector: raw.sector ?? null,
    timestamp: raw.created_at,
  });
}
