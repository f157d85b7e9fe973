/**
 * Calendar helpers for a fixed IANA time zone.
 *
 * Dates are plain `YYYY-MM-DD` strings and times `HH:MM[:SS]` strings, the
 * same shapes the task store uses for `due_date` / `due_time`.
 */

export interface ZonedParts {
  date: string; // YYYY-MM-DD
  hour: number;
  minute: number;
  second: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * Local calendar day and time-of-day of `instant` in `timeZone`.
 */
export function toZonedParts(instant: Date, timeZone: string): ZonedParts {
  const parts = getFormatter(timeZone).formatToParts(instant);
  const getPart = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = parts.find((part) => part.type === type)?.value;
    return value ? Number(value) : 0;
  };

  return {
    date: `${pad(getPart('year'), 4)}-${pad(getPart('month'))}-${pad(getPart('day'))}`,
    hour: getPart('hour') % 24,
    minute: getPart('minute'),
    second: getPart('second'),
  };
}

export function localDate(instant: Date, timeZone: string): string {
  return toZonedParts(instant, timeZone).date;
}

function parseDate(date: string): { year: number; month: number; day: number } {
  const match = date.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    throw new Error(`Invalid date: ${date}`);
  }
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
}

export function parseTimeOfDay(time: string): { hour: number; minute: number; second: number } {
  const match = time.match(/^(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/);
  if (!match) {
    throw new Error(`Invalid time: ${time}`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  const second = match[3] ? Number(match[3]) : 0;
  if (hour > 23 || minute > 59 || second > 59) {
    throw new Error(`Invalid time: ${time}`);
  }
  return { hour, minute, second };
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  const a = parseDate(from);
  const b = parseDate(to);
  const fromMs = Date.UTC(a.year, a.month - 1, a.day);
  const toMs = Date.UTC(b.year, b.month - 1, b.day);
  return Math.round((toMs - fromMs) / DAY_MS);
}

export function addDays(date: string, days: number): string {
  const { year, month, day } = parseDate(date);
  const shifted = new Date(Date.UTC(year, month - 1, day) + days * DAY_MS);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

function getTimezoneOffsetMinutes(instant: Date, timeZone: string): number {
  const { date, hour, minute, second } = toZonedParts(instant, timeZone);
  const { year, month, day } = parseDate(date);
  const reconstructedUtcMs = Date.UTC(year, month - 1, day, hour, minute, second);
  return Math.round((reconstructedUtcMs - Math.floor(instant.getTime() / 1000) * 1000) / 60000);
}

function wallClockMatches(timestamp: number, timeZone: string, date: string, time: ReturnType<typeof parseTimeOfDay>) {
  const parts = toZonedParts(new Date(timestamp), timeZone);
  return parts.date === date && parts.hour === time.hour && parts.minute === time.minute && parts.second === time.second;
}

/**
 * The instant at which the wall clock in `timeZone` reads `date` `time`.
 *
 * Local times are read with the offset in effect before any transition that
 * day: a repeated time resolves to its first occurrence, and a skipped time
 * lands after the gap.
 */
export function zonedTimeToInstant(date: string, time: string, timeZone: string): Date {
  const { year, month, day } = parseDate(date);
  const parsed = parseTimeOfDay(time);
  const utcGuessMs = Date.UTC(year, month - 1, day, parsed.hour, parsed.minute, parsed.second);

  // The real instant lies within a day of the guess on either side.
  const before = utcGuessMs - getTimezoneOffsetMinutes(new Date(utcGuessMs - DAY_MS), timeZone) * 60_000;
  const after = utcGuessMs - getTimezoneOffsetMinutes(new Date(utcGuessMs + DAY_MS), timeZone) * 60_000;
  if (before === after) {
    return new Date(before);
  }

  if (!wallClockMatches(before, timeZone, date, parsed) && wallClockMatches(after, timeZone, date, parsed)) {
    return new Date(after);
  }
  return new Date(before);
}

/**
 * Minutes since local midnight, used to compare against `HH:MM` slot times.
 */
export function minuteOfDay(instant: Date, timeZone: string): number {
  const { hour, minute } = toZonedParts(instant, timeZone);
  return hour * 60 + minute;
}
