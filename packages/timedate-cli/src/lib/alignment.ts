import { BEAT_MS, BIEL_OFFSET_MS } from "./formatter.js";
import { assertNeverKind, type RepresentationKind } from "./representation.js";
import { MINUTE_MS, floorMod, startOfNextLocalDay } from "./zone.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface NextFire {
  /** Instant the next update is due */
  at: number;
  /** Milliseconds from `now` to `at`, always > 0 */
  delta: number;
}

// ---------------------------------------------------------------------------
// Cadence Alignment
// ---------------------------------------------------------------------------

/**
 * Time left until the next multiple of `cadence` after `phaseInstant`.
 * An exact boundary yields a full cadence, never zero.
 */
export function delayToBoundary(phaseInstant: number, cadence: number): number {
  const delta = cadence - floorMod(phaseInstant, cadence);
  return delta === 0 ? cadence : delta;
}

/**
 * Compute the next instant a representation must be recomputed.
 *
 * - date: first moment of the next local day
 * - beat: next 86.4 s tick, phased to Biel Mean Time
 * - everything else: next whole UTC minute
 */
export function nextFireInstant(
  now: number,
  kind: RepresentationKind,
  timeZone: string
): NextFire {
  switch (kind) {
    case "date": {
      const at = startOfNextLocalDay(now, timeZone);
      return { at, delta: at - now };
    }
    case "beat": {
      // The shift only sets the phase; the result stays relative to now.
      const delta = delayToBoundary(now + BIEL_OFFSET_MS, BEAT_MS);
      return { at: now + delta, delta };
    }
    case "time":
    case "date_time":
    case "date_time_utc":
    case "date_time_iso":
    case "time_date":
    case "time_utc": {
      const delta = delayToBoundary(now, MINUTE_MS);
      return { at: now + delta, delta };
    }
    default:
      return assertNeverKind(kind);
  }
}
