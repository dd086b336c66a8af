/**
 * Time zone conversion on top of the platform's Intl zone data.
 *
 * Instants are epoch milliseconds. A local breakdown is always derived from
 * an instant plus a zone and is never stored on its own.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LocalDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface WallTime extends LocalDate {
  hour: number;
  minute: number;
  second: number;
}

export interface LocalDateTime extends WallTime {
  millisecond: number;
  /** Minutes east of UTC in effect at the instant */
  offsetMinutes: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const formatters = new Map<string, Intl.DateTimeFormat>();

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Remainder that is never negative, for instants before the epoch.
 */
export function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
      second: "numeric",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Epoch milliseconds of a wall time read as if it were UTC.
 * Avoids Date.UTC, which maps years 0-99 onto 1900-1999.
 */
function wallToEpoch(wall: WallTime): number {
  const date = new Date(0);
  date.setUTCFullYear(wall.year, wall.month - 1, wall.day);
  date.setUTCHours(wall.hour, wall.minute, wall.second, 0);
  return date.getTime();
}

function sameWall(local: LocalDateTime, wallEpoch: number): boolean {
  return wallToEpoch(local) === wallEpoch;
}

// ---------------------------------------------------------------------------
// Zone Queries
// ---------------------------------------------------------------------------

export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone.trim() === "") return false;
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Break an instant down into calendar and clock fields for a zone.
 */
export function toLocal(instant: number, timeZone: string): LocalDateTime {
  const millisecond = floorMod(instant, 1000);
  const wholeSecond = instant - millisecond;
  const parts = formatterFor(timeZone).formatToParts(new Date(wholeSecond));

  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number(part.value) : 0;
  };

  const wall: WallTime = {
    year: field("year"),
    month: field("month"),
    day: field("day"),
    hour: field("hour"),
    minute: field("minute"),
    second: field("second"),
  };

  return {
    ...wall,
    millisecond,
    offsetMinutes: (wallToEpoch(wall) - wholeSecond) / MINUTE_MS,
  };
}

export function toUtc(instant: number): LocalDateTime {
  const date = new Date(instant);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    millisecond: date.getUTCMilliseconds(),
    offsetMinutes: 0,
  };
}

export function offsetAt(instant: number, timeZone: string): number {
  return toLocal(instant, timeZone).offsetMinutes;
}

/**
 * Calendar date a number of days after the given one.
 */
export function addDays(date: LocalDate, days: number): LocalDate {
  const shifted = new Date(
    wallToEpoch({ ...date, hour: 0, minute: 0, second: 0 }) + days * DAY_MS
  );
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/**
 * Resolve a local wall time in a zone to an instant.
 *
 * A wall time repeated by a backward shift resolves to its earlier
 * occurrence. A wall time skipped by a forward shift resolves to the
 * transition instant, the first one that exists after it.
 */
export function localToInstant(wall: WallTime, timeZone: string): number {
  const wallEpoch = wallToEpoch(wall);
  const offsets = [
    ...new Set([
      offsetAt(wallEpoch - DAY_MS, timeZone),
      offsetAt(wallEpoch, timeZone),
      offsetAt(wallEpoch + DAY_MS, timeZone),
    ]),
  ];

  const matches = offsets
    .map((offset) => wallEpoch - offset * MINUTE_MS)
    .filter((candidate) => sameWall(toLocal(candidate, timeZone), wallEpoch))
    .sort((a, b) => a - b);

  if (matches.length > 0) {
    return matches[0];
  }

  // Skipped wall time: search the transition between the two readings.
  let lo = wallEpoch - Math.max(...offsets) * MINUTE_MS;
  let hi = wallEpoch - Math.min(...offsets) * MINUTE_MS;
  const offsetAfter = offsetAt(hi, timeZone);

  while (hi - lo > 1) {
    const mid = Math.floor((lo + hi) / 2);
    if (offsetAt(mid, timeZone) === offsetAfter) {
      hi = mid;
    } else {
      lo = mid;
    }
  }

  return hi;
}

/**
 * Instant of the first moment of the local day after the one containing
 * `instant`.
 */
export function startOfNextLocalDay(instant: number, timeZone: string): number {
  const tomorrow = addDays(toLocal(instant, timeZone), 1);
  return localToInstant({ ...tomorrow, hour: 0, minute: 0, second: 0 }, timeZone);
}
