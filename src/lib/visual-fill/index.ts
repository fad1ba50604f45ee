import { SLOT_SECONDS } from '@/lib/block-calendar';
import { sumSeconds } from '@/lib/segments/ledger';
import type { Segment } from '@/lib/segments/types';

/** Fill rate of a session that owns a whole, untouched slot. */
export const BASELINE_SCALE_FACTOR = 1 / SLOT_SECONDS;

/** Fill reported at natural completion, regardless of accumulated floating-point residue. */
export const COMPLETE_FILL = 1;

/**
 * Scaling that maps real seconds of the current run onto the visual space
 * still left in the slot.
 */
export interface FillState {
  previousVisualProportion: number;
  scaleFactor: number;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** Fill implied by segments alone, at one slot-length per full bar. */
export function baselineProportion(segments: readonly Segment[]): number {
  return Math.min(1, sumSeconds(segments) / SLOT_SECONDS);
}

/**
 * `(1 − previous) / remainingRealSeconds`, so that the bar reaches exactly 1.0
 * when the remaining real time runs out.
 */
export function computeScaleFactor(previousVisualProportion: number, remainingRealSeconds: number): number {
  if (remainingRealSeconds <= 0) return BASELINE_SCALE_FACTOR;
  return Math.max(0, 1 - previousVisualProportion) / remainingRealSeconds;
}

/** `previous + Σ seconds × scale`, clamped to [0, 1]. */
export function currentVisualFill(
  previousVisualProportion: number,
  segments: readonly Segment[],
  scaleFactor: number,
): number {
  return clamp01(previousVisualProportion + sumSeconds(segments) * scaleFactor);
}

/** Fill state for a run that starts now with `remainingRealSeconds` (sub-second precision) to go. */
export function beginFill(previousVisualProportion: number, remainingRealSeconds: number): FillState {
  const previous = clamp01(previousVisualProportion);
  return {
    previousVisualProportion: previous,
    scaleFactor: computeScaleFactor(previous, remainingRealSeconds),
  };
}

export function fillFor(state: FillState, segments: readonly Segment[]): number {
  return currentVisualFill(state.previousVisualProportion, segments, state.scaleFactor);
}

/**
 * Fill state for a run resuming after a pause. The fill shown at the pause
 * becomes the new baseline as-is rather than being recomputed from seconds.
 */
export function resumeFill(
  state: FillState,
  segmentsAtPause: readonly Segment[],
  remainingRealSeconds: number,
): FillState {
  return beginFill(fillFor(state, segmentsAtPause), remainingRealSeconds);
}
