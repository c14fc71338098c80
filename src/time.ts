export const MINUTES_PER_DAY = 24 * 60;

export interface MinuteRange {
  start: number;
  end: number;
}

export function formatClock(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours.toString().padStart(2, "0")}:${mins.toString().padStart(2, "0")}`;
}

export function parseClock(value: string): number | null {
  const match = value.trim().match(/^(\d{1,2})(?::(\d{2}))?$/);
  if (!match || !match[1]) {
    return null;
  }
  const hours = parseInt(match[1], 10);
  const mins = match[2] ? parseInt(match[2], 10) : 0;
  if (mins >= 60) {
    return null;
  }
  const total = hours * 60 + mins;
  return total <= MINUTES_PER_DAY ? total : null;
}

const RANGE_PATTERN =
  /(\d{1,2})(?:[:.](\d{2}))?\s*(?:-|–|—|до)\s*(\d{1,2})(?:[:.](\d{2}))?/;

/**
 * Reads a time range out of an upstream label: "00:00-00:30", "05-06",
 * "8:00 – 12:00", "22:00-24:00". An end of "00:00" after a later start
 * closes the day.
 */
export function parseTimeRange(label: string): MinuteRange | null {
  const match = label.match(RANGE_PATTERN);
  if (!match || !match[1] || !match[3]) {
    return null;
  }

  const start = parseClock(`${match[1]}:${match[2] ?? "00"}`);
  let end = parseClock(`${match[3]}:${match[4] ?? "00"}`);
  if (start === null || end === null) {
    return null;
  }
  if (end === 0 && start > 0) {
    end = MINUTES_PER_DAY;
  }
  if (end <= start || start >= MINUTES_PER_DAY) {
    return null;
  }
  return { start, end };
}

export function buildGrid(slotMinutes: number): MinuteRange[] {
  const grid: MinuteRange[] = [];
  for (let start = 0; start < MINUTES_PER_DAY; start += slotMinutes) {
    grid.push({ start, end: start + slotMinutes });
  }
  return grid;
}

export function rangeLabel(range: MinuteRange): string {
  return `${formatClock(range.start)}-${formatClock(range.end)}`;
}

export interface ZonedClock {
  date: string; // "YYYY-MM-DD"
  minutes: number; // minutes since local midnight
}

/** Wall-clock date and minute of `instant` in `timezone`. */
export function zonedClock(instant: Date, timezone: string): ZonedClock {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(instant);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? "00";

  return {
    date: `${pick("year")}-${pick("month")}-${pick("day")}`,
    minutes: parseInt(pick("hour"), 10) * 60 + parseInt(pick("minute"), 10),
  };
}

/** Shifts a "YYYY-MM-DD" key by whole days. */
export function shiftDate(date: string, days: number): string {
  const base = new Date(`${date}T00:00:00Z`);
  base.setUTCDate(base.getUTCDate() + days);
  return base.toISOString().slice(0, 10);
}
