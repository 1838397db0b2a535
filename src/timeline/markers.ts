/**
 * Timeline Calculator
 *
 * Converts a predicted physical failure instant T0 into the four RFP markers:
 *
 *   T1 = T0 - Tc - 2dT   force link down, start buffering route updates
 *   T2 = T0 - dT         release buffered updates, trigger convergence
 *   T0                   physical failure (observational)
 *   T3 = T0 + dT         resume normal link detection
 *
 * When T1 would fall before the floor (0, or "now" for late registrations),
 * the whole timeline is re-anchored at floor + epsilon and derived forward with
 * the same spacing. The effective T0 is then later than requested.
 */

import type { TimelineMarkers } from '../types.js';

export const DEFAULT_CLAMP_EPSILON = 0.1;

export interface DeriveOptions {
  /** Earliest instant T1 may take (default 0) */
  floor?: number;
  epsilon?: number;
}

export function deriveMarkers(
  t0: number,
  convergenceTime: number,
  safetyMargin: number,
  options: DeriveOptions = {},
): TimelineMarkers {
  const floor = options.floor ?? 0;
  const epsilon = options.epsilon ?? DEFAULT_CLAMP_EPSILON;

  const t1 = t0 - convergenceTime - 2 * safetyMargin;
  if (t1 >= floor) {
    return {
      t0,
      t1,
      t2: t0 - safetyMargin,
      t3: t0 + safetyMargin,
      clamped: false,
    };
  }

  // Re-derivation order matters: T1 → T2 → T3 → T0
  const anchoredT1 = floor + epsilon;
  const t2 = anchoredT1 + convergenceTime + safetyMargin;
  const t3 = t2 + 2 * safetyMargin;
  return {
    t0: t3 - safetyMargin,
    t1: anchoredT1,
    t2,
    t3,
    clamped: true,
  };
}

/** Masking window: [T1, T3] */
export function isWithinMaskingWindow(markers: TimelineMarkers, now: number): boolean {
  return now >= markers.t1 && now <= markers.t3;
}

/** Buffering window: [T1, T2] */
export function isWithinBufferingWindow(markers: TimelineMarkers, now: number): boolean {
  return now >= markers.t1 && now <= markers.t2;
}

/** True when two masking windows share at least one instant */
export function masksOverlap(a: TimelineMarkers, b: TimelineMarkers): boolean {
  return a.t1 <= b.t3 && b.t1 <= a.t3;
}

export function formatMarkers(markers: TimelineMarkers): string {
  const fmt = (t: number) => t.toFixed(2);
  return `T1=${fmt(markers.t1)} T2=${fmt(markers.t2)} T0=${fmt(markers.t0)} T3=${fmt(markers.t3)}`
    + (markers.clamped ? ' (clamped)' : '');
}
