/**
 * RFP Orchestrator
 *
 * Drives one timeline per predicted link failure on the shared clock:
 *
 *   scheduled ──T1──▶ masking-and-buffering ──T2──▶ masking-only ──T0──▶ (same) ──T3──▶ completed
 *
 * - T1: start measuring, force the link down, start buffering route updates
 * - T2: release the buffer (only when no other event still needs it)
 * - T0: physical failure; nothing is sent, convergence is recorded
 * - T3: restore normal detection, complete the measurement
 *
 * The buffering session is shared by every event, so it is reference counted:
 * it ends at the T2 of the last event that entered it. Predictions on the same
 * pair may not have overlapping masking windows.
 *
 * Scheduled actions only carry an immutable {eventId, pairKey, marker} message;
 * state is looked up when they fire, so a cancelled or finished event simply
 * ignores late markers.
 */

import type {
  GateOutcome,
  Marker,
  MarkerMessage,
  MaskingPredicate,
  NodeId,
  PairKey,
  PredictedFailure,
  TimelineMarkers,
  TopologyOracle,
} from '../types.js';
import { MARKER_ORDER } from '../types.js';
import type { Scheduler, ScheduledTask } from '../sim/scheduler.js';
import type { SinkDispatcher, DispatchStats } from '../services/dispatcher.js';
import { LinkGate, pairKey } from '../links/link-gate.js';
import { UpdateBuffer, type BufferCounters } from '../routes/update-buffer.js';
import { routeChangesFor } from '../routes/addressing.js';
import { MetricsRecorder, type MetricsReport } from '../metrics/recorder.js';
import {
  deriveMarkers,
  formatMarkers,
  isWithinMaskingWindow,
  masksOverlap,
} from '../timeline/markers.js';
import { validatePair, validateTime } from './validation.js';
import { at, log } from '../logger.js';

// ============================================================================
// Public types
// ============================================================================

export interface TimelineSettings {
  convergenceTime: number;
  safetyMargin: number;
  clampEpsilon?: number;
}

export interface BaselineSettings {
  detectionMs: number;
  convergenceMs: number;
  packetsLost: number;
}

export type TimelineEventType =
  | 'registered'
  | 'rejected'
  | 'marker'
  | 'cancelled'
  | 'baseline-failure';

/** Lifecycle notification for observers (event log, status page) */
export interface TimelineEvent {
  type: TimelineEventType;
  virtualTime: number;
  linkId?: string;
  nodeA?: NodeId;
  nodeB?: NodeId;
  marker?: Marker;
  message: string;
}

export interface OrchestratorOptions {
  scheduler: Scheduler;
  sink: SinkDispatcher;
  topology: TopologyOracle;
  timeline: TimelineSettings;
  baseline: BaselineSettings;
  metrics?: MetricsRecorder;
  alternatePathFanout?: number;
  convergenceNodeLimit?: number;
  onTimelineEvent?: (event: TimelineEvent) => void;
}

export type RegistrationResult =
  | { ok: true; failure: PredictedFailure; cancel: () => boolean }
  | { ok: false; reason: string };

export type ObservationClass = 'masked' | 'baseline' | 'normal';

export type ObservationResult =
  | {
    ok: true;
    outcome: GateOutcome;
    disclosedUp: boolean;
    classification: ObservationClass;
    submitted: number;
    buffered: number;
  }
  | { ok: false; reason: string };

export interface FinalReport extends MetricsReport {
  events: {
    registered: number;
    completed: number;
    cancelled: number;
    pending: number;
  };
  routeUpdates: BufferCounters;
  sink: DispatchStats & { name: string };
}

// ============================================================================
// Orchestrator
// ============================================================================

interface EventState {
  failure: PredictedFailure;
  tasks: ScheduledTask[];
  /** Sink commands dispatched before T1, to count this event's share */
  dispatchedAtStart: number;
}

const DEFAULT_CONVERGENCE_NODE_LIMIT = 20;

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export class Orchestrator {
  readonly gate: LinkGate;
  readonly buffer: UpdateBuffer;
  readonly metrics: MetricsRecorder;

  private readonly scheduler: Scheduler;
  private readonly sink: SinkDispatcher;
  private readonly topology: TopologyOracle;
  private readonly timeline: TimelineSettings;
  private readonly baseline: BaselineSettings;
  private readonly convergenceNodeLimit: number;
  private readonly onTimelineEvent?: (event: TimelineEvent) => void;

  private events = new Map<number, EventState>();
  private bufferingEvents = new Set<number>();
  private nextEventId = 1;
  private registeredCount = 0;
  private completedCount = 0;
  private cancelledCount = 0;

  /** Bound once so the gate can ask about masking windows */
  private readonly maskingPredicate: MaskingPredicate = (a, b, now) => this.isMasked(a, b, now);

  constructor(options: OrchestratorOptions) {
    const { convergenceTime, safetyMargin, clampEpsilon } = options.timeline;
    if (!isNonNegative(convergenceTime) || !isNonNegative(safetyMargin)) {
      throw new Error(`Convergence time and safety margin must be finite and non-negative (Tc=${convergenceTime}, dT=${safetyMargin})`);
    }
    if (clampEpsilon !== undefined && !isNonNegative(clampEpsilon)) {
      throw new Error(`Clamp epsilon must be finite and non-negative (got ${clampEpsilon})`);
    }

    this.scheduler = options.scheduler;
    this.sink = options.sink;
    this.topology = options.topology;
    this.timeline = options.timeline;
    this.baseline = options.baseline;
    this.convergenceNodeLimit = options.convergenceNodeLimit ?? DEFAULT_CONVERGENCE_NODE_LIMIT;
    this.onTimelineEvent = options.onTimelineEvent;

    this.metrics = options.metrics ?? new MetricsRecorder(() => this.scheduler.now());
    this.gate = new LinkGate(this.sink, {
      nodeCount: () => this.topology.nodeCount(),
      alternatePathFanout: options.alternatePathFanout,
    });
    this.buffer = new UpdateBuffer(this.sink, () => this.convergenceTargets());
  }

  // --------------------------------------------------------------------------
  // Registration API
  // --------------------------------------------------------------------------

  registerPredictedFailure(
    linkId: string | number,
    nodeA: NodeId,
    nodeB: NodeId,
    t0: number,
  ): RegistrationResult {
    const id = String(linkId);
    const now = this.scheduler.now();

    const plan = this.planRegistration(id, nodeA, nodeB, t0);
    if (!plan.ok) {
      log(`[RFP] Rejected prediction for link ${id} (${nodeA}<->${nodeB}): ${plan.reason}`);
      this.emit({ type: 'rejected', virtualTime: now, linkId: id, nodeA, nodeB, message: plan.reason });
      return { ok: false, reason: plan.reason };
    }
    const { key, markers } = plan;

    const eventId = this.nextEventId++;
    const failure: PredictedFailure = {
      eventId,
      linkId: id,
      nodeA,
      nodeB,
      pairKey: key,
      requestedT0: t0,
      markers,
      phase: 'scheduled',
      active: true,
    };

    const tasks = MARKER_ORDER.map(marker => {
      const message: MarkerMessage = Object.freeze({ eventId, pairKey: key, marker });
      return this.scheduler.scheduleAt(markerTime(failure, marker), () => this.onMarker(message));
    });

    this.events.set(eventId, { failure, tasks, dispatchedAtStart: 0 });
    this.registeredCount++;

    log(`[RFP] Predicted failure ${id} on ${nodeA}<->${nodeB}: ${formatMarkers(markers)}`);
    if (markers.clamped) {
      log(`[RFP] Failure ${id} requested at t=${t0}s was too close, effective T0 moved to ${at(markers.t0)}`);
    }
    this.emit({
      type: 'registered',
      virtualTime: now,
      linkId: id,
      nodeA,
      nodeB,
      message: formatMarkers(markers),
    });

    return { ok: true, failure: copyFailure(failure), cancel: () => this.cancelPredictedFailure(eventId) };
  }

  /**
   * Withdraw a prediction. Pending markers are dropped; if the timeline already
   * started, the link is restored and the buffer released as needed.
   */
  cancelPredictedFailure(eventId: number): boolean {
    const state = this.events.get(eventId);
    if (!state) return false;

    const now = this.scheduler.now();
    const { failure } = state;
    for (const task of state.tasks) task.cancel();

    if (failure.phase === 'masking-and-buffering') {
      this.releaseBuffering(eventId, now);
    }
    if (failure.phase === 'masking-and-buffering' || failure.phase === 'masking-only') {
      this.gate.restoreNormal(failure.nodeA, failure.nodeB, now);
      this.metrics.abandonEvent(failure.pairKey);
    }

    failure.phase = 'cancelled';
    failure.active = false;
    this.events.delete(eventId);
    this.cancelledCount++;

    log(`[RFP] Prediction ${failure.linkId} on ${failure.nodeA}<->${failure.nodeB} cancelled at ${at(now)}`);
    this.emit({
      type: 'cancelled',
      virtualTime: now,
      linkId: failure.linkId,
      nodeA: failure.nodeA,
      nodeB: failure.nodeB,
      message: 'prediction cancelled',
    });
    return true;
  }

  /** Re-plan a prediction whose failure time moved */
  revisePredictedFailure(eventId: number, t0: number): RegistrationResult {
    const state = this.events.get(eventId);
    if (!state) {
      return { ok: false, reason: `no pending prediction with event id ${eventId}` };
    }
    const { linkId, nodeA, nodeB } = state.failure;
    // The old timeline stays in place unless the new one would be accepted
    const plan = this.planRegistration(linkId, nodeA, nodeB, t0, eventId);
    if (!plan.ok) {
      log(`[RFP] Revision of ${linkId} to t=${t0}s rejected, keeping ${formatMarkers(state.failure.markers)}: ${plan.reason}`);
      this.emit({ type: 'rejected', virtualTime: this.scheduler.now(), linkId, nodeA, nodeB, message: plan.reason });
      return { ok: false, reason: plan.reason };
    }

    this.cancelPredictedFailure(eventId);
    return this.registerPredictedFailure(linkId, nodeA, nodeB, t0);
  }

  onObservedLinkChange(nodeA: NodeId, nodeB: NodeId, isUp: boolean, now: number): ObservationResult {
    const pair = validatePair(nodeA, nodeB, this.topology);
    if (!pair.valid) {
      log(`[RFP] Rejected link observation ${nodeA}<->${nodeB}: ${pair.reason}`);
      return { ok: false, reason: pair.reason };
    }
    const time = validateTime('now', now);
    if (!time.valid) return { ok: false, reason: time.reason };

    const masked = this.isMasked(nodeA, nodeB, now);
    const outcome = this.gate.updateRealState(nodeA, nodeB, isUp, now, this.maskingPredicate);
    const disclosedUp = this.gate.getReportedState(nodeA, nodeB);

    const changes = routeChangesFor(nodeA, nodeB, disclosedUp, this.topology.nodeCount());
    let buffered = 0;
    for (const change of changes) {
      if (this.buffer.submit(nodeA, change, now)) buffered++;
    }

    let classification: ObservationClass = 'normal';
    if (masked || outcome === 'absorbed-forced-down') {
      classification = 'masked';
    } else if (!isUp && outcome === 'disclosed') {
      classification = 'baseline';
      this.recordBaselineFailure(nodeA, nodeB, now, changes.length);
    }

    log(`[RFP] Physical=${isUp ? 'UP' : 'DOWN'}, OSPF=${disclosedUp ? 'UP' : 'DOWN'} for ${nodeA}<->${nodeB} at ${at(now)} (${classification})`);
    return { ok: true, outcome, disclosedUp, classification, submitted: changes.length, buffered };
  }

  getDisclosedState(nodeA: NodeId, nodeB: NodeId): boolean {
    return this.gate.getReportedState(nodeA, nodeB);
  }

  getPredictedFailure(eventId: number): PredictedFailure | undefined {
    const state = this.events.get(eventId);
    return state ? copyFailure(state.failure) : undefined;
  }

  /** Predictions whose masking window contains `now` */
  activeEvents(now = this.scheduler.now()): PredictedFailure[] {
    return [...this.events.values()]
      .filter(s => isWithinMaskingWindow(s.failure.markers, now))
      .map(s => copyFailure(s.failure));
  }

  /** Events currently holding the shared buffering session open */
  get bufferingEventCount(): number {
    return this.bufferingEvents.size;
  }

  finalReport(): FinalReport {
    return {
      ...this.metrics.report(),
      events: {
        registered: this.registeredCount,
        completed: this.completedCount,
        cancelled: this.cancelledCount,
        pending: this.events.size,
      },
      routeUpdates: this.buffer.counters(),
      sink: { name: this.sink.sinkName, ...this.sink.stats() },
    };
  }

  // --------------------------------------------------------------------------
  // Timeline actions
  // --------------------------------------------------------------------------

  private onMarker(message: MarkerMessage): void {
    const state = this.events.get(message.eventId);
    if (!state || state.failure.pairKey !== message.pairKey) {
      log(`[RFP] ${message.marker} for event ${message.eventId} ignored (no longer pending)`);
      return;
    }

    const now = this.scheduler.now();
    switch (message.marker) {
      case 'T1':
        this.executeT1(state, now);
        break;
      case 'T2':
        this.executeT2(state, now);
        break;
      case 'T0':
        this.executeT0(state, now);
        break;
      case 'T3':
        this.executeT3(state, now);
        break;
    }
  }

  private executeT1(state: EventState, now: number): void {
    const { failure } = state;
    if (failure.phase !== 'scheduled') return this.ignored(failure, 'T1');

    log(`[RFP] ===== T1 ${failure.linkId} ${failure.nodeA}<->${failure.nodeB} at ${at(now)}: starting predictive link avoidance =====`);
    this.metrics.startEvent(failure.pairKey, true);
    state.dispatchedAtStart = this.sink.dispatched;

    this.gate.forceDown(failure.nodeA, failure.nodeB, now);
    this.bufferingEvents.add(failure.eventId);
    this.buffer.enterBufferingMode(now);

    failure.phase = 'masking-and-buffering';
    this.emitMarker(failure, 'T1', now, 'link forced down, route updates buffered');
  }

  private executeT2(state: EventState, now: number): void {
    const { failure } = state;
    if (failure.phase !== 'masking-and-buffering') return this.ignored(failure, 'T2');

    log(`[RFP] ===== T2 ${failure.linkId} ${failure.nodeA}<->${failure.nodeB} at ${at(now)}: synchronizing forwarding tables =====`);
    this.releaseBuffering(failure.eventId, now);

    failure.phase = 'masking-only';
    this.emitMarker(failure, 'T2', now, 'buffered route updates released');
  }

  private executeT0(state: EventState, now: number): void {
    const { failure } = state;
    if (failure.phase !== 'masking-only') return this.ignored(failure, 'T0');

    log(`[RFP] ===== T0 ${failure.linkId} ${failure.nodeA}<->${failure.nodeB} at ${at(now)}: physical failure, traffic already on alternate paths =====`);
    this.metrics.recordConvergence(failure.pairKey);
    this.emitMarker(failure, 'T0', now, 'physical failure instant');
  }

  private executeT3(state: EventState, now: number): void {
    const { failure } = state;
    if (failure.phase !== 'masking-only') return this.ignored(failure, 'T3');

    log(`[RFP] ===== T3 ${failure.linkId} ${failure.nodeA}<->${failure.nodeB} at ${at(now)}: resuming normal link detection =====`);
    this.gate.restoreNormal(failure.nodeA, failure.nodeB, now);
    this.metrics.completeEvent(failure.pairKey, this.sink.dispatched - state.dispatchedAtStart);

    failure.phase = 'completed';
    failure.active = false;
    this.events.delete(failure.eventId);
    this.completedCount++;
    this.emitMarker(failure, 'T3', now, 'normal detection resumed');
  }

  private releaseBuffering(eventId: number, now: number): void {
    this.bufferingEvents.delete(eventId);
    if (this.bufferingEvents.size > 0) {
      log(`[RFP] Buffer release deferred at ${at(now)}: ${this.bufferingEvents.size} other event(s) still buffering`);
      return;
    }
    this.buffer.exitBufferingMode(now);
  }

  private ignored(failure: PredictedFailure, marker: Marker): void {
    log(`[RFP] ${marker} for ${failure.linkId} ignored in phase ${failure.phase}`);
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  /**
   * Validate a registration and derive its markers without touching any state.
   * `excludeEventId` is the event being revised, which does not conflict with itself.
   */
  private planRegistration(
    linkId: string,
    nodeA: NodeId,
    nodeB: NodeId,
    t0: number,
    excludeEventId?: number,
  ): { ok: true; key: PairKey; markers: TimelineMarkers } | { ok: false; reason: string } {
    const pair = validatePair(nodeA, nodeB, this.topology);
    if (!pair.valid) return { ok: false, reason: pair.reason };

    const time = validateTime('T0', t0);
    if (!time.valid) return { ok: false, reason: time.reason };

    const others = [...this.events.values()].filter(s => s.failure.eventId !== excludeEventId);
    const duplicate = others.find(s => s.failure.linkId === linkId);
    if (duplicate) {
      return { ok: false, reason: `link ${linkId} already has a pending prediction (event ${duplicate.failure.eventId})` };
    }

    const markers = deriveMarkers(t0, this.timeline.convergenceTime, this.timeline.safetyMargin, {
      floor: this.scheduler.now(),
      epsilon: this.timeline.clampEpsilon,
    });
    const key = pairKey(nodeA, nodeB);
    const overlapping = others.find(s => s.failure.pairKey === key && masksOverlap(s.failure.markers, markers));
    if (overlapping) {
      return { ok: false, reason: `masking window overlaps prediction ${overlapping.failure.linkId} on pair ${key}` };
    }
    return { ok: true, key, markers };
  }

  private isMasked(nodeA: NodeId, nodeB: NodeId, now: number): boolean {
    const key = pairKey(nodeA, nodeB);
    for (const state of this.events.values()) {
      if (state.failure.pairKey === key && isWithinMaskingWindow(state.failure.markers, now)) {
        return true;
      }
    }
    return false;
  }

  private recordBaselineFailure(nodeA: NodeId, nodeB: NodeId, now: number, modifications: number): void {
    const { detectionMs, convergenceMs, packetsLost } = this.baseline;
    log(`[RFP] Unpredicted link-down ${nodeA}<->${nodeB} at ${at(now)}, measured against baseline`);
    this.metrics.recordBaselineEvent(detectionMs + convergenceMs, packetsLost, detectionMs, modifications);
    this.emit({
      type: 'baseline-failure',
      virtualTime: now,
      nodeA,
      nodeB,
      message: `unpredicted failure, outage ${detectionMs + convergenceMs}ms`,
    });
  }

  private convergenceTargets(): NodeId[] {
    const count = Math.min(this.topology.nodeCount(), this.convergenceNodeLimit);
    return Array.from({ length: count }, (_, i) => i);
  }

  private emitMarker(failure: PredictedFailure, marker: Marker, now: number, message: string): void {
    this.emit({
      type: 'marker',
      virtualTime: now,
      linkId: failure.linkId,
      nodeA: failure.nodeA,
      nodeB: failure.nodeB,
      marker,
      message,
    });
  }

  private emit(event: TimelineEvent): void {
    if (!this.onTimelineEvent) return;
    try {
      this.onTimelineEvent(event);
    } catch (err) {
      log(`[RFP] Timeline observer failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

function markerTime(failure: PredictedFailure, marker: Marker): number {
  switch (marker) {
    case 'T1': return failure.markers.t1;
    case 'T2': return failure.markers.t2;
    case 'T0': return failure.markers.t0;
    case 'T3': return failure.markers.t3;
  }
}

function copyFailure(failure: PredictedFailure): PredictedFailure {
  return { ...failure, markers: { ...failure.markers } };
}
