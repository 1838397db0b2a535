/**
 * Metrics Recorder
 *
 * Passive observer of the RFP state machine. Keeps two aggregates, one for
 * predicted (masked) failures and one for unpredicted/baseline failures, and
 * never mixes them.
 *
 * Times are taken from the virtual clock (seconds) and stored in milliseconds.
 */

import type { AggregateMetrics, EventClass } from '../types.js';
import { log } from '../logger.js';

interface OpenEvent {
  isPredicted: boolean;
  startedAtMs: number;
  convergedAtMs: number;
  sentAtStart: number;
  receivedAtStart: number;
  packetsLost: number;
}

export interface ClassSummary extends AggregateMetrics {
  averageOutageMs: number;
  averageDetectionMs: number;
}

export interface MetricsReport {
  predicted: ClassSummary;
  baseline: ClassSummary;
  /** baseline average / predicted average, null without a baseline */
  outageImprovement: number | null;
  detectionImprovement: number | null;
  packets: { sent: number; received: number };
  summary: string[];
}

function emptyAggregate(): AggregateMetrics {
  return {
    eventCount: 0,
    routeOutageTotalMs: 0,
    detectionTimeTotalMs: 0,
    packetsLost: 0,
    externalModifications: 0,
  };
}

export class MetricsRecorder {
  private aggregates: Record<EventClass, AggregateMetrics> = {
    predicted: emptyAggregate(),
    baseline: emptyAggregate(),
  };
  private open = new Map<string, OpenEvent>();
  private packetsSent = 0;
  private packetsReceived = 0;

  /** `clock` returns the current virtual time in seconds */
  constructor(private readonly clock: () => number) {}

  recordPacketSent(): void {
    this.packetsSent++;
  }

  recordPacketReceived(): void {
    this.packetsReceived++;
  }

  /**
   * Predicted events start converged: alternates are installed before the
   * failure, so their outage is measured as 0 unless something moves it.
   */
  startEvent(key: string, isPredicted: boolean): void {
    const now = this.nowMs();
    if (this.open.has(key)) {
      log(`[Metrics] Event ${key} restarted before completion, previous measurement dropped`);
    }
    this.open.set(key, {
      isPredicted,
      startedAtMs: now,
      convergedAtMs: now,
      sentAtStart: this.packetsSent,
      receivedAtStart: this.packetsReceived,
      packetsLost: 0,
    });
    log(`[Metrics] Link event ${key} started at ${now.toFixed(0)}ms (${isPredicted ? 'predicted' : 'unpredicted'})`);
  }

  recordConvergence(key: string): void {
    const event = this.open.get(key);
    if (!event) return;
    if (!event.isPredicted) {
      event.convergedAtMs = this.nowMs();
    }
    event.packetsLost = Math.max(
      0,
      (this.packetsSent - event.sentAtStart) - (this.packetsReceived - event.receivedAtStart),
    );
  }

  completeEvent(key: string, modificationCount: number): void {
    const event = this.open.get(key);
    if (!event) {
      log(`[Metrics] completeEvent for unknown event ${key}, ignored`);
      return;
    }
    this.open.delete(key);

    const outageMs = Math.max(0, event.convergedAtMs - event.startedAtMs);
    // Detection time is only known for baseline records
    this.accumulate(
      event.isPredicted ? 'predicted' : 'baseline',
      outageMs,
      event.packetsLost,
      0,
      modificationCount,
    );
    log(`[Metrics] ${event.isPredicted ? 'Predicted' : 'Unpredicted'} event ${key}: outage=${outageMs.toFixed(0)}ms, packets_lost=${event.packetsLost}, modifications=${modificationCount}`);
  }

  /** Drop an open measurement without accounting it (cancelled prediction) */
  abandonEvent(key: string): void {
    this.open.delete(key);
  }

  recordBaselineEvent(
    outageMs: number,
    packetsLost: number,
    detectionMs: number,
    modificationCount: number,
  ): void {
    this.accumulate('baseline', outageMs, packetsLost, detectionMs, modificationCount);
    log(`[Metrics] Baseline event: outage=${outageMs}ms, detection=${detectionMs}ms, packets_lost=${packetsLost}`);
  }

  openEvents(): string[] {
    return [...this.open.keys()];
  }

  snapshot(): { predicted: AggregateMetrics; baseline: AggregateMetrics } {
    return {
      predicted: { ...this.aggregates.predicted },
      baseline: { ...this.aggregates.baseline },
    };
  }

  report(): MetricsReport {
    const predicted = summarize(this.aggregates.predicted);
    const baseline = summarize(this.aggregates.baseline);

    const outageImprovement = baseline.averageOutageMs > 0
      ? baseline.averageOutageMs / (predicted.averageOutageMs + 0.001)
      : null;
    const detectionImprovement = baseline.averageDetectionMs > 0
      ? baseline.averageDetectionMs / (predicted.averageDetectionMs + 0.001)
      : null;

    const summary = [
      `Baseline: ${baseline.eventCount} events, avg outage ${baseline.averageOutageMs.toFixed(1)}ms, avg detection ${baseline.averageDetectionMs.toFixed(1)}ms, ${baseline.packetsLost} packets lost, ${baseline.externalModifications} modifications`,
      `Predicted: ${predicted.eventCount} events, avg outage ${predicted.averageOutageMs.toFixed(1)}ms, avg detection ${predicted.averageDetectionMs.toFixed(1)}ms, ${predicted.packetsLost} packets lost, ${predicted.externalModifications} modifications`,
    ];
    if (outageImprovement !== null) {
      summary.push(`Route outage: ${baseline.averageOutageMs.toFixed(1)}ms -> ${predicted.averageOutageMs.toFixed(1)}ms (${outageImprovement.toFixed(1)}x)`);
    } else if (predicted.eventCount > 0) {
      summary.push(`Route outage: ${predicted.averageOutageMs.toFixed(1)}ms (no baseline)`);
    }
    if (detectionImprovement !== null) {
      summary.push(`Detection time: ${baseline.averageDetectionMs.toFixed(1)}ms -> ${predicted.averageDetectionMs.toFixed(1)}ms (${detectionImprovement.toFixed(1)}x)`);
    }
    summary.push(`Probe packets: sent=${this.packetsSent}, received=${this.packetsReceived}`);

    return {
      predicted,
      baseline,
      outageImprovement,
      detectionImprovement,
      packets: { sent: this.packetsSent, received: this.packetsReceived },
      summary,
    };
  }

  private accumulate(
    eventClass: EventClass,
    outageMs: number,
    packetsLost: number,
    detectionMs: number,
    modificationCount: number,
  ): void {
    const agg = this.aggregates[eventClass];
    agg.eventCount++;
    agg.routeOutageTotalMs += outageMs;
    agg.detectionTimeTotalMs += detectionMs;
    agg.packetsLost += packetsLost;
    agg.externalModifications += modificationCount;
  }

  private nowMs(): number {
    return this.clock() * 1000;
  }
}

function summarize(agg: AggregateMetrics): ClassSummary {
  return {
    ...agg,
    averageOutageMs: agg.eventCount > 0 ? agg.routeOutageTotalMs / agg.eventCount : 0,
    averageDetectionMs: agg.eventCount > 0 ? agg.detectionTimeTotalMs / agg.eventCount : 0,
  };
}
