import type { BrokerClient, OptionContract } from "../broker/types.js";
import type { OptionType } from "../flow/types.js";
import { logExec } from "../logging.js";
import { daysBetween } from "../time.js";

export interface ContractTarget {
  underlying: string;
  optionType: OptionType;
  strike: number;
  expiration: string;
  minExpiration: string;
  maxExpiration: string;
  strikeTolerancePct: number;
}

/**
 * Nearest strike first, then the expiration nearest the target.
 * Null when the closest listed strike is outside tolerance.
 */
export function pickContract(
  contracts: readonly OptionContract[],
  target: Pick<ContractTarget, "strike" | "expiration" | "strikeTolerancePct">,
): OptionContract | null {
  if (contracts.length === 0 || target.strike <= 0) return null;
  let bestDistance = Infinity;
  for (const c of contracts) bestDistance = Math.min(bestDistance, Math.abs(c.strike - target.strike));
  if (bestDistance / target.strike > target.strikeTolerancePct) return null;

  const atStrike = contracts.filter((c) => Math.abs(c.strike - target.strike) === bestDistance);
  atStrike.sort((a, b) => {
    const da = Math.abs(daysBetween(target.expiration, a.expiration));
    const db = Math.abs(daysBetween(target.expiration, b.expiration));
    return da - db || a.expiration.localeCompare(b.expiration) || a.strike - b.strike;
  });
  return atStrike[0] ?? null;
}

/** Map a flow signal onto a listed contract inside the DTE window. */
export async function resolveContract(broker: BrokerClient, target: ContractTarget): Promise<OptionContract | null> {
  const listed = await broker.listOptionContracts(
    target.underlying,
    target.optionType,
    target.minExpiration,
    target.maxExpiration,
  );
  const inWindow = listed.filter((c) => c.expiration >= target.minExpiration && c.expiration <= target.maxExpiration);
  const picked = pickContract(inWindow, target);
  if (!picked) {
    logExec.warn(
      { underlying: target.underlying, strike: target.strike, listed: inWindow.length },
      "No listed contract within strike tolerance",
    );
  }
  return picked;
}

/** First listed expiration at least `minDaysOut` after `fromExpiration`, same strike and type. */
export async function findRollTarget(
  broker: BrokerClient,
  current: { underlying: string; optionType: OptionType; strike: number; expiration: string },
  minExpiration: string,
  maxExpiration: string,
): Promise<OptionContract | null> {
  const listed = await broker.listOptionContracts(current.underlying, current.optionType, minExpiration, maxExpiration);
  const later = listed
    .filter((c) => c.strike === current.strike && c.expiration >= minExpiration && c.expiration > current.expiration)
    .sort((a, b) => a.expiration.localeCompare(b.expiration));
  return later[0] ?? null;
}
