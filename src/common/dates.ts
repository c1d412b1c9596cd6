const DAY_MS = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
  /** UTC midnight of the date. */
  epochMs: number;
}

export function parseIsoDate(value: string | undefined): CalendarDate | undefined {
  const text = String(value || "").trim();
  const match = text.match(ISO_DATE);
  if (!match) {
    return undefined;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const epochMs = Date.UTC(year, month - 1, day);
  const check = new Date(epochMs);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return undefined;
  }
  return { year, month, day, epochMs };
}

export function formatIsoDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

/** Monday = 0 ... Sunday = 6. */
export function weekdayIndex(date: CalendarDate): number {
  return (new Date(date.epochMs).getUTCDay() + 6) % 7;
}

export function addDays(date: CalendarDate, days: number): string {
  return formatIsoDate(date.epochMs + days * DAY_MS);
}

export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((to.epochMs - from.epochMs) / DAY_MS);
}
