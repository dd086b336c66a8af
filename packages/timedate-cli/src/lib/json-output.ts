/**
 * Machine-readable output. One-shot commands print a single envelope;
 * `watch` streams one event per line.
 */

import { isJsonMode } from "./cli-context.js";
import type { IconName, RepresentationKind } from "./representation.js";

// ============================================================================
// Envelope
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

// ============================================================================
// Payloads
// ============================================================================

export interface SensorValueJson {
  id: string;
  kind: RepresentationKind;
  label: string;
  icon: IconName;
  value: string;
}

export interface ShowResultJson {
  timeZone: string;
  computedAt: string; // ISO 8601
  sensors: SensorValueJson[];
}

export interface KindsResultJson {
  kinds: Array<{
    kind: RepresentationKind;
    label: string;
    icon: IconName;
  }>;
}

export type WatchEventType = "start" | "update" | "remove" | "reload" | "stop";

export interface WatchEventJson {
  type: WatchEventType;
  timestamp: string; // ISO 8601
  data?: {
    sensor?: SensorValueJson;
    id?: string;
    timeZone?: string;
    kinds?: RepresentationKind[];
  };
}

// ============================================================================
// Writers
// ============================================================================

export function outputSuccess<T>(data: T): void {
  const envelope: JsonSuccess<T> = { success: true, data };
  console.log(JSON.stringify(envelope, null, 2));
}

/**
 * One compact line per event, so consumers can split on newlines.
 */
export function outputNdjson(event: WatchEventJson): void {
  console.log(JSON.stringify(event));
}

/**
 * Print `data` as an envelope when JSON output is on. Returns whether it did,
 * so callers can fall through to their text rendering.
 */
export function maybeOutputJson<T>(data: T): boolean {
  if (!isJsonMode()) return false;
  outputSuccess(data);
  return true;
}
