/**
 * Link Gate Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LinkGate, pairKey } from './link-gate.js';
import { SinkDispatcher } from '../services/dispatcher.js';
import { SimulatedSink } from '../services/simulated-sink.js';
import type { MaskingPredicate } from '../types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const neverMasked: MaskingPredicate = () => false;
const alwaysMasked: MaskingPredicate = () => true;

function makeGate(nodeCount = 5) {
  const sink = new SimulatedSink();
  const dispatcher = new SinkDispatcher(sink);
  const gate = new LinkGate(dispatcher, { nodeCount: () => nodeCount });
  return { sink, dispatcher, gate };
}

// ---------------------------------------------------------------------------
// pairKey
// ---------------------------------------------------------------------------

describe('pairKey()', () => {
  it('is order independent', () => {
    expect(pairKey(3, 1)).toBe('1-3');
    expect(pairKey(1, 3)).toBe('1-3');
  });

  it('compares numerically, not lexically', () => {
    expect(pairKey(10, 9)).toBe('9-10');
  });
});

// ---------------------------------------------------------------------------
// updateRealState
// ---------------------------------------------------------------------------

describe('LinkGate.updateRealState()', () => {
  let ctx: ReturnType<typeof makeGate>;

  beforeEach(() => {
    ctx = makeGate();
  });

  it('treats unseen links as up', () => {
    expect(ctx.gate.getReportedState(0, 1)).toBe(true);
    expect(ctx.gate.getRealState(0, 1)).toBe(true);
    expect(ctx.gate.getRecord(0, 1)).toBeUndefined();
  });

  it('discloses a change and propagates it to both endpoints', async () => {
    const outcome = ctx.gate.updateRealState(0, 1, false, 5, neverMasked);
    await ctx.dispatcher.drain();

    expect(outcome).toBe('disclosed');
    expect(ctx.gate.getReportedState(1, 0)).toBe(false);
    expect(ctx.sink.calls).toEqual([
      { kind: 'link', nodeId: 0, peerId: 1, up: false },
      { kind: 'link', nodeId: 1, peerId: 0, up: false },
    ]);
  });

  it('is idempotent when the value does not change', async () => {
    ctx.gate.updateRealState(0, 1, false, 5, neverMasked);
    const outcome = ctx.gate.updateRealState(1, 0, false, 6, neverMasked);
    await ctx.dispatcher.drain();

    expect(outcome).toBe('unchanged');
    expect(ctx.sink.calls).toHaveLength(2);
  });

  it('never changes reportedState inside a masking window', async () => {
    for (const [i, value] of [false, true, false, false, true, false].entries()) {
      const outcome = ctx.gate.updateRealState(2, 3, value, 10 + i, alwaysMasked);
      expect(outcome).toBe('absorbed-masked');
      expect(ctx.gate.getReportedState(2, 3)).toBe(true);
    }
    await ctx.dispatcher.drain();
    expect(ctx.sink.calls).toHaveLength(0);
    expect(ctx.gate.getRealState(2, 3)).toBe(false);
  });

  it('passes the raw pair and time to the masking predicate', () => {
    const seen: Array<[number, number, number]> = [];
    ctx.gate.updateRealState(4, 2, false, 7.5, (a, b, now) => {
      seen.push([a, b, now]);
      return false;
    });
    expect(seen).toEqual([[4, 2, 7.5]]);
  });

  it('converges to realState on the first update after masking ends', () => {
    ctx.gate.updateRealState(0, 1, false, 10, alwaysMasked);
    expect(ctx.gate.getReportedState(0, 1)).toBe(true);

    ctx.gate.updateRealState(0, 1, false, 20, neverMasked);
    expect(ctx.gate.getReportedState(0, 1)).toBe(false);
  });

  it('counts physical changes and records the time of the last one', () => {
    ctx.gate.updateRealState(0, 1, false, 3, neverMasked);
    ctx.gate.updateRealState(0, 1, false, 4, neverMasked);
    ctx.gate.updateRealState(0, 1, true, 9, neverMasked);

    const record = ctx.gate.getRecord(1, 0);
    expect(record?.changeCount).toBe(2);
    expect(record?.lastChangeTime).toBe(9);
  });
});

// ---------------------------------------------------------------------------
// forceDown / restoreNormal
// ---------------------------------------------------------------------------

describe('LinkGate.forceDown()', () => {
  it('discloses the link down and installs alternates through relays', async () => {
    const { gate, sink, dispatcher } = makeGate(5);
    gate.forceDown(0, 1, 17);
    await dispatcher.drain();

    expect(gate.getReportedState(0, 1)).toBe(false);
    expect(gate.isForcedDown(1, 0)).toBe(true);
    expect(sink.calls.slice(0, 2)).toEqual([
      { kind: 'link', nodeId: 0, peerId: 1, up: false },
      { kind: 'link', nodeId: 1, peerId: 0, up: false },
    ]);
    expect(sink.routeCalls()).toEqual([2, 3, 4].map(relay => ({
      nodeId: 0,
      change: { operation: 'ADD', prefix: '10.1.0.0/16', nexthop: `10.0.${relay}.1`, metric: 10 },
    })));
  });

  it('caps alternates at the configured fanout', async () => {
    const sink = new SimulatedSink();
    const dispatcher = new SinkDispatcher(sink);
    const gate = new LinkGate(dispatcher, { nodeCount: () => 25, alternatePathFanout: 4 });

    gate.forceDown(0, 1, 1);
    await dispatcher.drain();

    expect(sink.routeCalls().map(c => c.change.nexthop)).toEqual(['10.0.2.1', '10.0.3.1']);
  });

  it('keeps reportedState false even if the link is observed up right after', () => {
    const { gate } = makeGate();
    gate.forceDown(0, 1, 17);
    const outcome = gate.updateRealState(0, 1, true, 17.1, neverMasked);

    expect(outcome).toBe('absorbed-forced-down');
    expect(gate.getReportedState(0, 1)).toBe(false);
    expect(gate.getRealState(0, 1)).toBe(true);
  });
});

describe('LinkGate.restoreNormal()', () => {
  it('discloses the last physical state', async () => {
    const { gate, sink, dispatcher } = makeGate(2);
    gate.forceDown(0, 1, 17);
    gate.updateRealState(0, 1, false, 20, neverMasked);
    await dispatcher.drain();
    sink.reset();

    gate.restoreNormal(1, 0, 20.5);
    await dispatcher.drain();

    expect(gate.isForcedDown(0, 1)).toBe(false);
    expect(gate.getReportedState(0, 1)).toBe(gate.getRealState(0, 1));
    expect(gate.getReportedState(0, 1)).toBe(false);
    expect(sink.calls).toEqual([
      { kind: 'link', nodeId: 1, peerId: 0, up: false },
      { kind: 'link', nodeId: 0, peerId: 1, up: false },
    ]);
  });

  it('brings the link back up when it never failed physically', () => {
    const { gate } = makeGate();
    gate.forceDown(0, 1, 17);
    gate.restoreNormal(0, 1, 20.5);

    expect(gate.getReportedState(0, 1)).toBe(true);
    expect(gate.divergentPairs()).toEqual([]);
  });

  it('lists pairs whose disclosed state diverges', () => {
    const { gate } = makeGate();
    gate.forceDown(0, 1, 17);
    expect(gate.divergentPairs()).toEqual(['0-1']);
  });
});
