export type DateRange = {
  start: string;
  end: string;
};

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const toIsoDate = (value: Date): string => value.toISOString().slice(0, 10);

export function parseIsoDate(value: string): Date {
  if (!DATE_RE.test(value)) {
    throw new Error(`Invalid ISO date: ${value}`);
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || toIsoDate(parsed) !== value) {
    throw new Error(`Invalid ISO date: ${value}`);
  }
  return parsed;
}

export function addDaysUtc(dateIso: string, days: number): string {
  const parsed = parseIsoDate(dateIso);
  return toIsoDate(new Date(parsed.getTime() + days * MS_PER_DAY));
}

export function enumerateDates(range: DateRange): string[] {
  const dates: string[] = [];
  let cursor = range.start;
  while (cursor <= range.end) {
    dates.push(cursor);
    cursor = addDaysUtc(cursor, 1);
  }
  return dates;
}

export function lookbackRange(now: Date, lookbackDays: number): DateRange {
  const end = toIsoDate(now);
  return { start: addDaysUtc(end, -lookbackDays), end };
}

export function isWithinRange(dateIso: string, range: DateRange): boolean {
  return dateIso >= range.start && dateIso <= range.end;
}

export function unixSecondsToIsoDate(seconds: number): string {
  return toIsoDate(new Date(seconds * 1000));
}

export function monthKey(dateIso: string): string {
  return dateIso.slice(0, 7);
}

/** ISO-8601 week label, e.g. 2026-W05. The year is the ISO week-numbering year. */
export function isoWeekKey(dateIso: string): string {
  const date = parseIsoDate(dateIso);
  const dayOfWeek = date.getUTCDay() || 7;
  const thursday = new Date(date.getTime() + (4 - dayOfWeek) * MS_PER_DAY);
  const weekYear = thursday.getUTCFullYear();
  const yearStart = Date.UTC(weekYear, 0, 1);
  const week = Math.floor((thursday.getTime() - yearStart) / MS_PER_DAY / 7) + 1;
  return `${weekYear}-W${String(week).padStart(2, "0")}`;
}

export function startOfMonthUtc(now: Date, monthOffset = 0): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + monthOffset, 1));
}

export function formatMonthLabel(date: Date): string {
  return date.toLocaleString("en-US", { month: "long", year: "numeric", timeZone: "UTC" });
}

/** `Jan 2 – Jan 31, 2026` */
export function formatRangeLabel(range: DateRange): string {
  const start = parseIsoDate(range.start).toLocaleString("en-US", { month: "short", day: "numeric", timeZone: "UTC" });
  const end = parseIsoDate(range.end).toLocaleString("en-US", {
    month: "short",
    day: "numeric",
    year: "numeric",
    timeZone: "UTC",
  });
  return `${start} – ${end}`;
}
