const MS_PER_DAY = 86_400_000;

/** YYYY-MM-DD in the venue's timezone, independent of the process TZ. */
export function venueDate(now: Date, timeZone: string): string {
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(now);
}

interface VenueClock {
  weekday: number; // 0 = Sunday
  minutes: number; // minutes since local midnight
}

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

function venueClock(now: Date, timeZone: string): VenueClock {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "short",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(now);
  let weekday = 0;
  let hour = 0;
  let minute = 0;
  for (const p of parts) {
    if (p.type === "weekday") weekday = WEEKDAYS[p.value] ?? 0;
    else if (p.type === "hour") hour = parseInt(p.value, 10);
    else if (p.type === "minute") minute = parseInt(p.value, 10);
  }
  return { weekday, minutes: hour * 60 + minute };
}

function parseHhMm(value: string): number {
  const [h, m] = value.split(":");
  return parseInt(h ?? "0", 10) * 60 + parseInt(m ?? "0", 10);
}

/** Regular session check: weekdays, [open, close) in venue time. Holidays are not modelled. */
export function isSessionOpen(
  now: Date,
  session: { timezone: string; open: string; close: string },
): boolean {
  const { weekday, minutes } = venueClock(now, session.timezone);
  if (weekday === 0 || weekday === 6) return false;
  return minutes >= parseHhMm(session.open) && minutes < parseHhMm(session.close);
}

/** Whole calendar days from `fromDate` to `toDate` (both YYYY-MM-DD). Negative if past. */
export function daysBetween(fromDate: string, toDate: string): number {
  return Math.round((Date.parse(`${toDate}T00:00:00Z`) - Date.parse(`${fromDate}T00:00:00Z`)) / MS_PER_DAY);
}

export function addDays(date: string, days: number): string {
  return new Date(Date.parse(`${date}T00:00:00Z`) + days * MS_PER_DAY).toISOString().slice(0, 10);
}
