/**
 * Timeline Calculator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  deriveMarkers,
  isWithinMaskingWindow,
  isWithinBufferingWindow,
  masksOverlap,
  formatMarkers,
} from './markers.js';

// ---------------------------------------------------------------------------
// deriveMarkers: unclamped
// ---------------------------------------------------------------------------

describe('deriveMarkers()', () => {
  it('derives T1/T2/T3 from T0, Tc and dT', () => {
    const m = deriveMarkers(20, 2, 0.5);
    expect(m).toEqual({ t0: 20, t1: 17, t2: 19.5, t3: 20.5, clamped: false });
  });

  it('keeps strict ordering and T3 - T1 = Tc + 3dT when T0 > Tc + 2dT', () => {
    const cases: Array<[number, number, number]> = [
      [10, 2, 0.5],
      [3.5, 2, 0.5],
      [100, 5, 1],
      [7, 0.5, 2],
    ];
    for (const [t0, tc, dt] of cases) {
      const m = deriveMarkers(t0, tc, dt);
      expect(m.clamped).toBe(false);
      expect(m.t1).toBeLessThan(m.t2);
      expect(m.t2).toBeLessThan(m.t0);
      expect(m.t0).toBeLessThan(m.t3);
      expect(m.t3 - m.t1).toBeCloseTo(tc + 3 * dt, 9);
    }
  });

  it('accepts T1 exactly at the floor without clamping', () => {
    const m = deriveMarkers(3, 2, 0.5);
    expect(m.t1).toBe(0);
    expect(m.clamped).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// deriveMarkers: clamped
// ---------------------------------------------------------------------------

describe('deriveMarkers() clamping', () => {
  it('re-anchors T1 at epsilon and shifts T0 later', () => {
    const m = deriveMarkers(2, 2, 0.5);
    expect(m.clamped).toBe(true);
    expect(m.t1).toBe(0.1);
    expect(m.t2).toBeCloseTo(2.6, 9);
    expect(m.t3).toBeCloseTo(3.6, 9);
    expect(m.t0).toBeCloseTo(3.1, 9);
  });

  it('keeps ordering and spacing for every T0 <= Tc + 2dT', () => {
    for (const t0 of [-5, 0, 0.5, 1, 2.9]) {
      const m = deriveMarkers(t0, 2, 0.5);
      expect(m.clamped).toBe(true);
      expect(m.t1).toBe(0.1);
      expect(m.t1).toBeLessThan(m.t2);
      expect(m.t2).toBeLessThan(m.t0);
      expect(m.t0).toBeLessThan(m.t3);
      expect(m.t3 - m.t1).toBeCloseTo(3.5, 9);
      expect(m.t0 - m.t2).toBeCloseTo(0.5, 9);
    }
  });

  it('uses the supplied epsilon', () => {
    const m = deriveMarkers(1, 2, 0.5, { epsilon: 0.25 });
    expect(m.t1).toBe(0.25);
  });

  it('anchors at floor + epsilon for late registrations', () => {
    const m = deriveMarkers(52, 2, 0.5, { floor: 50 });
    expect(m.clamped).toBe(true);
    expect(m.t1).toBeCloseTo(50.1, 9);
    expect(m.t0).toBeCloseTo(53.1, 9);
  });

  it('never throws on degenerate input', () => {
    expect(() => deriveMarkers(Number.NaN, 2, 0.5)).not.toThrow();
    expect(() => deriveMarkers(5, 0, 0)).not.toThrow();
  });
});

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

describe('masking and buffering windows', () => {
  const m = deriveMarkers(20, 2, 0.5);

  it('masking window is [T1, T3] inclusive', () => {
    expect(isWithinMaskingWindow(m, 16.9)).toBe(false);
    expect(isWithinMaskingWindow(m, 17)).toBe(true);
    expect(isWithinMaskingWindow(m, 20.5)).toBe(true);
    expect(isWithinMaskingWindow(m, 20.6)).toBe(false);
  });

  it('buffering window is [T1, T2] inclusive', () => {
    expect(isWithinBufferingWindow(m, 17)).toBe(true);
    expect(isWithinBufferingWindow(m, 19.5)).toBe(true);
    expect(isWithinBufferingWindow(m, 20)).toBe(false);
  });

  it('detects overlapping masking windows', () => {
    expect(masksOverlap(m, deriveMarkers(22, 2, 0.5))).toBe(true);
    expect(masksOverlap(m, deriveMarkers(23.5, 2, 0.5))).toBe(true);
    expect(masksOverlap(m, deriveMarkers(24, 2, 0.5))).toBe(false);
  });

  it('formats markers for log lines', () => {
    expect(formatMarkers(m)).toBe('T1=17.00 T2=19.50 T0=20.00 T3=20.50');
    expect(formatMarkers(deriveMarkers(2, 2, 0.5))).toBe('T1=0.10 T2=2.60 T0=3.10 T3=3.60 (clamped)');
  });
});
