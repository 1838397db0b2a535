/**
 * Scenario and Probe Traffic Tests
 *
 * Full runs on the virtual clock against the simulated sink.
 */

import { describe, it, expect } from 'vitest';
import { ScenarioDriver } from './scenario.js';
import { ProbeTraffic, type LinkStateView } from './traffic.js';
import { VirtualScheduler } from './scheduler.js';
import { Orchestrator } from '../rfp/orchestrator.js';
import { MetricsRecorder } from '../metrics/recorder.js';
import { SinkDispatcher } from '../services/dispatcher.js';
import { SimulatedSink } from '../services/simulated-sink.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function makeRun() {
  const scheduler = new VirtualScheduler();
  const dispatcher = new SinkDispatcher(new SimulatedSink());
  const orchestrator = new Orchestrator({
    scheduler,
    sink: dispatcher,
    topology: { nodeCount: () => 5 },
    timeline: { convergenceTime: 2, safetyMargin: 0.5 },
    baseline: { detectionMs: 40_000, convergenceMs: 100, packetsLost: 15 },
  });
  const driver = new ScenarioDriver(orchestrator, scheduler, {
    linkOutageSeconds: 10,
    unpredicted: [{ nodeA: 3, nodeB: 4, time: 40 }],
  });
  return { scheduler, dispatcher, orchestrator, driver };
}

// ---------------------------------------------------------------------------
// ScenarioDriver
// ---------------------------------------------------------------------------

describe('ScenarioDriver', () => {
  it('separates predicted and unpredicted failures in the report', () => {
    const { scheduler, orchestrator, driver } = makeRun();

    driver.loadPredictions([{ linkId: '1', nodeA: 0, nodeB: 1, failureTime: 18 }]);
    driver.scheduleUnpredicted();
    scheduler.runUntil(60);

    const report = orchestrator.finalReport();
    expect(report.predicted.eventCount).toBe(1);
    expect(report.predicted.routeOutageTotalMs).toBe(0);
    expect(report.baseline.eventCount).toBe(1);
    expect(report.baseline.routeOutageTotalMs).toBe(40_100);
    expect(report.events).toEqual({ registered: 1, completed: 1, cancelled: 0, pending: 0 });
  });

  it('brings links back after the outage', () => {
    const { scheduler, orchestrator, driver } = makeRun();
    driver.loadPredictions([{ linkId: '1', nodeA: 0, nodeB: 1, failureTime: 18 }]);

    scheduler.runUntil(27);
    expect(orchestrator.getDisclosedState(0, 1)).toBe(false);

    scheduler.runUntil(28);
    expect(orchestrator.getDisclosedState(0, 1)).toBe(true);
    expect(orchestrator.gate.getRecord(0, 1)?.changeCount).toBe(2);
  });

  it('counts rejected predictions and tracks touched pairs', () => {
    const { driver } = makeRun();

    const summary = driver.loadPredictions([
      { linkId: '1', nodeA: 0, nodeB: 1, failureTime: 18 },
      { linkId: '2', nodeA: 0, nodeB: 9, failureTime: 26 },
    ]);
    driver.scheduleUnpredicted();

    expect(summary).toEqual({ registered: 1, rejected: 1, unpredicted: 0 });
    expect(driver.stats().unpredicted).toBe(1);
    expect(driver.pairs()).toEqual([[0, 1], [3, 4]]);
  });

  it('moves the physical failure with a clamped timeline', () => {
    const { scheduler, orchestrator, driver } = makeRun();
    driver.loadPredictions([{ linkId: '1', nodeA: 0, nodeB: 1, failureTime: 1 }]);

    // T1=0.1, T0=3.1: the link is still physically up at t=2
    scheduler.runUntil(2);
    expect(orchestrator.gate.getRealState(0, 1)).toBe(true);

    scheduler.runUntil(3.2);
    expect(orchestrator.gate.getRealState(0, 1)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// ProbeTraffic
// ---------------------------------------------------------------------------

describe('ProbeTraffic', () => {
  it('loses nothing when failures are masked ahead of time', () => {
    const { scheduler, orchestrator, driver } = makeRun();
    driver.loadPredictions([{ linkId: '1', nodeA: 0, nodeB: 1, failureTime: 18 }]);

    const traffic = new ProbeTraffic(scheduler, orchestrator.metrics, orchestrator.gate, () => driver.pairs(), 2);
    traffic.start(40);
    scheduler.runUntil(40);

    expect(traffic.counters()).toEqual({ sent: 80, lost: 0 });
    expect(orchestrator.finalReport().predicted.packetsLost).toBe(0);
  });

  it('drops probes while a dead link is still disclosed up', () => {
    const scheduler = new VirtualScheduler();
    const metrics = new MetricsRecorder(() => scheduler.now());
    const links: LinkStateView = {
      getRealState: (a) => a !== 0,
      getReportedState: () => true,
    };

    const traffic = new ProbeTraffic(scheduler, metrics, links, () => [[0, 1], [1, 2]], 2);
    traffic.start(2);
    scheduler.runUntil(2);

    expect(traffic.counters()).toEqual({ sent: 8, lost: 4 });
    expect(metrics.report().packets).toEqual({ sent: 8, received: 4 });
  });

  it('sends nothing at zero rate', () => {
    const scheduler = new VirtualScheduler();
    const traffic = new ProbeTraffic(
      scheduler,
      new MetricsRecorder(() => scheduler.now()),
      { getRealState: () => true, getReportedState: () => true },
      () => [[0, 1]],
      0,
    );

    traffic.start(10);
    expect(scheduler.pending()).toBe(0);
  });
});
