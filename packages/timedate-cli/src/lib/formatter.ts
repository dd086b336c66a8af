import { assertNeverKind, type RepresentationKind } from "./representation.js";
import { DAY_MS, HOUR_MS, floorMod, toLocal, toUtc, type LocalDateTime } from "./zone.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Beat zero is midnight in Biel Mean Time (UTC+1). */
export const BIEL_OFFSET_MS = HOUR_MS;

/** One beat is 86.4 seconds. */
export const BEAT_MS = 86_400;

// ---------------------------------------------------------------------------
// Field Formatting
// ---------------------------------------------------------------------------

const pad = (value: number, width = 2): string =>
  value.toString().padStart(width, "0");

export function formatClock(fields: LocalDateTime): string {
  return `${pad(fields.hour)}:${pad(fields.minute)}`;
}

export function formatCalendarDate(fields: LocalDateTime): string {
  return `${pad(fields.year, 4)}-${pad(fields.month)}-${pad(fields.day)}`;
}

/**
 * Swatch Internet Time for an instant, 0-999.
 *
 * Integer division on milliseconds: the float form (seconds / 86.4)
 * lands one beat low on some boundaries, e.g. 63763.2 s.
 */
export function beatOf(instant: number): number {
  const msOfDay = floorMod(instant + BIEL_OFFSET_MS, DAY_MS);
  return (msOfDay - (msOfDay % BEAT_MS)) / BEAT_MS;
}

export function formatBeat(instant: number): string {
  return `@${pad(beatOf(instant), 3)}`;
}

// ---------------------------------------------------------------------------
// Representation Formatting
// ---------------------------------------------------------------------------

/**
 * Format one instant for a representation. Local and UTC fields both come
 * from the same instant.
 */
export function formatRepresentation(
  instant: number,
  kind: RepresentationKind,
  timeZone: string
): string {
  const local = toLocal(instant, timeZone);
  const utc = toUtc(instant);

  const time = formatClock(local);
  const date = formatCalendarDate(local);

  switch (kind) {
    case "time":
      return time;
    case "date":
      return date;
    case "date_time":
      return `${date}, ${time}`;
    case "date_time_utc":
      return `${formatCalendarDate(utc)}, ${formatClock(utc)}`;
    case "date_time_iso":
      return `${date}T${time}:00`;
    case "time_date":
      return `${time}, ${date}`;
    case "beat":
      return formatBeat(instant);
    case "time_utc":
      return formatClock(utc);
    default:
      return assertNeverKind(kind);
  }
}
