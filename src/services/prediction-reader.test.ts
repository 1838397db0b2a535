/**
 * Prediction Reader Tests
 */

import { describe, it, expect } from 'vitest';
import {
  PredictionReader,
  generatePredictionSchedule,
  parsePredictionPayload,
} from './prediction-reader.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function makeSettings(overrides: Partial<{ predictionCount: number; firstPredictionAt: number; predictionSpacing: number; stopTime: number }> = {}) {
  return {
    predictionCount: 6,
    firstPredictionAt: 10,
    predictionSpacing: 8,
    stopTime: 100,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// generatePredictionSchedule
// ---------------------------------------------------------------------------

describe('generatePredictionSchedule()', () => {
  it('schedules consecutive pairs at a fixed spacing', () => {
    expect(generatePredictionSchedule(makeSettings(), 25)).toEqual([
      { linkId: '1', nodeA: 0, nodeB: 1, failureTime: 18 },
      { linkId: '2', nodeA: 1, nodeB: 2, failureTime: 26 },
      { linkId: '3', nodeA: 2, nodeB: 3, failureTime: 34 },
      { linkId: '4', nodeA: 3, nodeB: 4, failureTime: 42 },
      { linkId: '5', nodeA: 4, nodeB: 5, failureTime: 50 },
      { linkId: '6', nodeA: 5, nodeB: 6, failureTime: 58 },
    ]);
  });

  it('wraps pairs around a small constellation', () => {
    const schedule = generatePredictionSchedule(makeSettings({ predictionCount: 3 }), 3);
    expect(schedule.map(p => [p.nodeA, p.nodeB])).toEqual([[0, 1], [1, 2], [2, 0]]);
  });

  it('skips failures too close to the end of the run', () => {
    const schedule = generatePredictionSchedule(makeSettings({ stopTime: 50 }), 25);
    // 50 - 15 = 35: only 18, 26 and 34 fit
    expect(schedule.map(p => p.failureTime)).toEqual([18, 26, 34]);
  });

  it('returns nothing with fewer than two nodes', () => {
    expect(generatePredictionSchedule(makeSettings(), 1)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// parsePredictionPayload
// ---------------------------------------------------------------------------

describe('parsePredictionPayload()', () => {
  it('accepts well-formed entries and stringifies numeric link ids', () => {
    const raw = JSON.stringify([
      { linkId: 'isl-3-4', nodeA: 3, nodeB: 4, failureTime: 42.5 },
      { linkId: 7, nodeA: 1, nodeB: 2, failureTime: 60 },
    ]);

    expect(parsePredictionPayload(raw)).toEqual({
      predictions: [
        { linkId: 'isl-3-4', nodeA: 3, nodeB: 4, failureTime: 42.5 },
        { linkId: '7', nodeA: 1, nodeB: 2, failureTime: 60 },
      ],
      dropped: [],
    });
  });

  it('drops malformed entries with a reason', () => {
    const raw = JSON.stringify([
      'nope',
      { nodeA: 1, nodeB: 2, failureTime: 10 },
      { linkId: 'a', nodeA: '1', nodeB: 2, failureTime: 10 },
      { linkId: 'b', nodeA: 1, nodeB: 2 },
      { linkId: 'c', nodeA: 1, nodeB: 2, failureTime: 10 },
    ]);

    const result = parsePredictionPayload(raw);
    expect(result.predictions).toEqual([{ linkId: 'c', nodeA: 1, nodeB: 2, failureTime: 10 }]);
    expect(result.dropped).toEqual([
      'entry 0: not an object',
      'entry 1: missing linkId',
      'entry 2: node ids must be numbers',
      'entry 3: failureTime must be a finite number',
    ]);
  });

  it('rejects payloads that are not a JSON list', () => {
    expect(parsePredictionPayload('{"linkId":1}')).toEqual({ predictions: [], dropped: ['payload is not a list'] });
    expect(parsePredictionPayload('not json').dropped[0]).toMatch(/^payload is not JSON: /);
  });
});

// ---------------------------------------------------------------------------
// PredictionReader
// ---------------------------------------------------------------------------

describe('PredictionReader without Redis', () => {
  it('falls back to the generated schedule', async () => {
    const reader = new PredictionReader({
      redisUrl: undefined,
      predictionKey: 'rfp:predictions',
      nodeCount: 25,
      simulation: {
        stopTime: 100,
        predictionCount: 2,
        firstPredictionAt: 10,
        predictionSpacing: 8,
        linkOutageSeconds: 10,
        unpredicted: [],
        trafficPacketsPerSecond: 10,
      },
    });

    const batch = await reader.getPredictions();
    expect(batch.source).toBe('generated');
    expect(batch.predictions).toHaveLength(2);
    await reader.close();
  });
});
