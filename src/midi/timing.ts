// ─── Tick → Seconds Conversion ──────────────────────────────────────────────
//
// Converts absolute tick positions into seconds at a fixed tempo.
// The tick resolution is assumed to be 96 ticks per quarter note; the file
// header's own resolution is not consulted.
// ─────────────────────────────────────────────────────────────────────────────

import { ConversionError } from "../errors.js";

/** Assumed ticks per quarter note. */
export const ASSUMED_TICKS_PER_BEAT = 96;

/** Ticks per second at 1 BPM (96 / 60). */
export const TICKS_PER_SECOND_PER_BPM = ASSUMED_TICKS_PER_BEAT / 60;

/**
 * Elapsed seconds for an absolute tick count at `bpm`.
 *
 * `bpm` must be strictly positive; see {@link assertValidBpm}.
 */
export function ticksToSeconds(ticks: number, bpm: number): number {
  const ticksPerSecond = bpm * TICKS_PER_SECOND_PER_BPM;
  return ticks / ticksPerSecond;
}

/** Throw an `invalid-bpm` error unless `bpm` is a finite number above zero. */
export function assertValidBpm(bpm: number): void {
  if (!Number.isFinite(bpm) || bpm <= 0) {
    throw new ConversionError(
      "invalid-bpm",
      `Invalid BPM: ${bpm}. Must be a number greater than 0.`,
    );
  }
}
