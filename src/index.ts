#!/usr/bin/env node
/**
 * Orbit RFP Controller
 *
 * Predictive failure masking for link-state routing on a satellite
 * constellation: predicted link failures are hidden from OSPF and traffic is
 * moved to alternates before the link physically breaks.
 *
 * Usage:
 *   npx tsx src/index.ts              # Virtual-time run, prints the report
 *   npx tsx src/index.ts --realtime   # Wall-clock run against live routers
 *
 * Data Flow:
 *   Orbit propagator → Redis → Controller (this) → vtysh over SSH
 *                                          ↘ Postgres (events)
 */

import { loadConfig, type Config } from './config.js';
import { Orchestrator } from './rfp/orchestrator.js';
import { VirtualScheduler, RealtimeScheduler, type Scheduler } from './sim/scheduler.js';
import { ScenarioDriver } from './sim/scenario.js';
import { ProbeTraffic } from './sim/traffic.js';
import { SinkDispatcher } from './services/dispatcher.js';
import { SimulatedSink } from './services/simulated-sink.js';
import { VtyshSink } from './services/vtysh-sink.js';
import type { RoutingSink } from './services/routing-sink.js';
import { PredictionReader } from './services/prediction-reader.js';
import { EventPublisher } from './services/events.js';
import type { FinalReport } from './rfp/orchestrator.js';
import { log } from './logger.js';

function createSink(config: Config): RoutingSink {
  if (config.routers.length === 0) {
    log('[Controller] No routers configured, running against the simulated sink');
    return new SimulatedSink();
  }
  log(`[Controller] Routers: ${config.routers.map(r => `${r.nodeId}(${r.host})`).join(', ')}${config.dryRun ? ' [dry run]' : ''}`);
  return new VtyshSink(config);
}

interface Clock {
  scheduler: Scheduler;
  /** Resolves once the clock reaches the stop time */
  run(stopTime: number): Promise<void>;
  stop(): void;
}

function createClock(config: Config): Clock {
  if (config.realtime) {
    const scheduler = new RealtimeScheduler(config.realtimeSpeed);
    return {
      scheduler,
      run: stopTime => scheduler.runUntil(stopTime),
      stop: () => scheduler.stop(),
    };
  }

  const scheduler = new VirtualScheduler();
  return {
    scheduler,
    run: async stopTime => {
      const executed = scheduler.runUntil(stopTime);
      log(`[Controller] Virtual run finished: ${executed} scheduled actions`);
    },
    stop: () => undefined,
  };
}

function printReport(report: FinalReport): void {
  log('==================== RFP REPORT ====================');
  log(`Events: ${report.events.registered} registered, ${report.events.completed} completed, ${report.events.cancelled} cancelled, ${report.events.pending} pending`);
  log(`Route updates: ${report.routeUpdates.blocked} buffered, ${report.routeUpdates.applied} applied`);
  log(`Sink (${report.sink.name}): ${report.sink.dispatched} commands, ${report.sink.applied} applied, ${report.sink.simulated} simulated, ${report.sink.failed} failed`);
  for (const line of report.summary) {
    log(line);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const predictionReader = new PredictionReader(config);
  const eventPublisher = new EventPublisher(config);

  log('Orbit RFP controller starting');
  log(`Nodes: ${config.nodeCount}, Tc=${config.timeline.convergenceTime}s, dT=${config.timeline.safetyMargin}s`);
  log(`Mode: ${config.realtime ? `realtime (x${config.realtimeSpeed})` : 'virtual time'}, stop at t=${config.simulation.stopTime}s`);

  await eventPublisher.publishLifecycle(true);

  const clock = createClock(config);
  const { scheduler } = clock;

  const dispatcher = new SinkDispatcher(createSink(config));
  const orchestrator = new Orchestrator({
    scheduler,
    sink: dispatcher,
    topology: { nodeCount: () => config.nodeCount },
    timeline: config.timeline,
    baseline: config.baseline,
    alternatePathFanout: config.alternatePathFanout,
    convergenceNodeLimit: config.convergenceNodeLimit,
    onTimelineEvent: eventPublisher.recordTimeline,
  });

  const batch = await predictionReader.getPredictions();
  log(`[Controller] ${batch.predictions.length} predictions from ${batch.source}`);

  const driver = new ScenarioDriver(orchestrator, scheduler, config.simulation);
  driver.loadPredictions(batch.predictions);
  const scenario = driver.scheduleUnpredicted();
  log(`[Controller] Scenario: ${scenario.registered} predicted (${scenario.rejected} rejected), ${scenario.unpredicted} unpredicted`);

  const traffic = new ProbeTraffic(
    scheduler,
    orchestrator.metrics,
    orchestrator.gate,
    () => driver.pairs(),
    config.simulation.trafficPacketsPerSecond,
  );
  traffic.start(config.simulation.stopTime);

  const shutdown = async (): Promise<void> => {
    log('[Controller] Shutting down...');
    clock.stop();
    await dispatcher.close();
    const report = orchestrator.finalReport();
    await eventPublisher.publishLifecycle(false, { ...report.events, summary: report.summary });
    await predictionReader.close();
    await eventPublisher.close();
  };

  if (config.realtime) {
    const onSignal = (): void => {
      shutdown()
        .then(() => process.exit(0))
        .catch(err => {
          log(`[Controller] Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
          process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  }
  await clock.run(config.simulation.stopTime);

  await dispatcher.drain();
  const probes = traffic.counters();
  log(`[Controller] Probes: ${probes.sent} sent, ${probes.lost} lost`);
  printReport(orchestrator.finalReport());
  await shutdown();
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
