export type BreakerStatus = "closed" | "open" | "half_open";

export interface BreakerState {
  status: BreakerStatus;
  consecutiveErrors: number;
  openedAt: string | null;
}

export type BreakerTransition = "opened" | "half_opened" | "closed";

export interface BreakerUpdate {
  breaker: BreakerState;
  transition: BreakerTransition | null;
}

export interface BreakerLimits {
  failureThreshold: number;
  cooldownMs: number;
}

export const CLOSED_BREAKER: BreakerState = Object.freeze({
  status: "closed",
  consecutiveErrors: 0,
  openedAt: null,
});

/**
 * Count one failure. Opens at exactly `failureThreshold` consecutive failures;
 * a failure while half-open re-opens immediately with a fresh cooldown.
 */
export function recordFailure(b: BreakerState, now: Date, limits: BreakerLimits): BreakerUpdate {
  const consecutiveErrors = b.consecutiveErrors + 1;
  if (b.status === "half_open") {
    return { breaker: { status: "open", consecutiveErrors, openedAt: now.toISOString() }, transition: "opened" };
  }
  if (b.status === "closed" && consecutiveErrors >= limits.failureThreshold) {
    return { breaker: { status: "open", consecutiveErrors, openedAt: now.toISOString() }, transition: "opened" };
  }
  return { breaker: { ...b, consecutiveErrors }, transition: null };
}

export function recordSuccess(b: BreakerState): BreakerUpdate {
  if (b.status === "closed") {
    return { breaker: { ...b, consecutiveErrors: 0 }, transition: null };
  }
  return { breaker: { ...CLOSED_BREAKER }, transition: "closed" };
}

/** Move an open breaker to half-open once its cooldown has elapsed. */
export function advanceCooldown(b: BreakerState, now: Date, limits: BreakerLimits): BreakerUpdate {
  if (b.status !== "open" || b.openedAt === null) return { breaker: b, transition: null };
  const elapsed = now.getTime() - Date.parse(b.openedAt);
  if (elapsed < limits.cooldownMs) return { breaker: b, transition: null };
  return { breaker: { ...b, status: "half_open" }, transition: "half_opened" };
}

/** New executions are suppressed only while fully open. Monitoring always runs. */
export function canExecute(b: BreakerState): boolean {
  return b.status !== "open";
}
