import { unhandledKind, unknownKind } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Every representation a sensor can publish, in display order.
 */
export const REPRESENTATION_KINDS = [
  "time",
  "date",
  "date_time",
  "date_time_utc",
  "date_time_iso",
  "time_date",
  "beat",
  "time_utc",
] as const;

export type RepresentationKind = (typeof REPRESENTATION_KINDS)[number];

export type IconName = "mdi:calendar-clock" | "mdi:calendar" | "mdi:clock";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const REPRESENTATION_LABELS: Record<RepresentationKind, string> = {
  time: "Time",
  date: "Date",
  date_time: "Date & Time",
  date_time_utc: "Date & Time (UTC)",
  date_time_iso: "Date & Time (ISO)",
  time_date: "Time & Date",
  beat: "Internet Time",
  time_utc: "Time (UTC)",
};

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

export function isRepresentationKind(value: unknown): value is RepresentationKind {
  return REPRESENTATION_KINDS.some((kind) => kind === value);
}

/**
 * Narrow user input to a kind, throwing a validation error otherwise.
 */
export function parseRepresentationKind(value: string): RepresentationKind {
  const normalized = value.trim().toLowerCase().replace(/-/g, "_");
  if (!isRepresentationKind(normalized)) {
    throw unknownKind(value, [...REPRESENTATION_KINDS]);
  }
  return normalized;
}

export function labelFor(kind: RepresentationKind): string {
  return REPRESENTATION_LABELS[kind];
}

/**
 * Icon derived from the name tokens of the kind.
 */
export function iconFor(kind: RepresentationKind): IconName {
  const tokens = kind.split("_");
  const hasDate = tokens.includes("date");
  const hasTime = tokens.includes("time");

  if (hasDate && hasTime) return "mdi:calendar-clock";
  if (hasDate) return "mdi:calendar";
  return "mdi:clock";
}

export function sensorIdFor(baseId: string, kind: RepresentationKind): string {
  return `${baseId}_${kind}`;
}

/**
 * Deduplicate kinds and put them in catalog order.
 */
export function orderKinds(kinds: Iterable<RepresentationKind>): RepresentationKind[] {
  const wanted = new Set(kinds);
  return REPRESENTATION_KINDS.filter((kind) => wanted.has(kind));
}

/**
 * Exhaustiveness guard for switches over a kind.
 */
export function assertNeverKind(kind: never): never {
  throw unhandledKind(String(kind));
}
