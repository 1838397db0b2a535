/** Router / satellite identifier (index into the constellation) */
export type NodeId = number;

/** Canonical key of an unordered node pair, `min-max` */
export type PairKey = string;

/** Timeline marker identifiers, in firing order */
export type Marker = 'T1' | 'T2' | 'T0' | 'T3';

export const MARKER_ORDER: Marker[] = ['T1', 'T2', 'T0', 'T3'];

// ---------------------------------------------------------------------------
// Timeline
// ---------------------------------------------------------------------------

export interface TimelineMarkers {
  /** Effective physical failure instant (later than requested when clamped) */
  t0: number;
  /** Start of masking + buffering */
  t1: number;
  /** Buffer release / synchronization point */
  t2: number;
  /** End of masking */
  t3: number;
  clamped: boolean;
}

/**
 * Per-event state.
 * `scheduled` and `completed` are the Normal state of the timeline.
 */
export type EventPhase =
  | 'scheduled'
  | 'masking-and-buffering'
  | 'masking-only'
  | 'completed'
  | 'cancelled';

/** One scheduled future failure */
export interface PredictedFailure {
  eventId: number;
  linkId: string;
  nodeA: NodeId;
  nodeB: NodeId;
  pairKey: PairKey;
  /** Failure instant as requested by the caller */
  requestedT0: number;
  markers: TimelineMarkers;
  phase: EventPhase;
  active: boolean;
}

/** Message carried by each scheduled timeline action */
export interface MarkerMessage {
  readonly eventId: number;
  readonly pairKey: PairKey;
  readonly marker: Marker;
}

// ---------------------------------------------------------------------------
// Link state
// ---------------------------------------------------------------------------

export interface LinkRecord {
  /** Last observed physical state */
  realState: boolean;
  /** State disclosed to the routing protocol */
  reportedState: boolean;
  /** Override active between T1 and T3 */
  forcedDown: boolean;
  lastChangeTime: number;
  changeCount: number;
}

export type GateOutcome =
  | 'absorbed-forced-down'
  | 'absorbed-masked'
  | 'disclosed'
  | 'unchanged';

export type MaskingPredicate = (nodeA: NodeId, nodeB: NodeId, now: number) => boolean;

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export type RouteOperation = 'ADD' | 'DELETE' | 'UPDATE';

export interface RouteChange {
  operation: RouteOperation;
  prefix: string;
  nexthop: string;
  metric: number;
}

export interface PendingUpdate extends RouteChange {
  targetNode: NodeId;
  enqueuedAt: number;
}

// ---------------------------------------------------------------------------
// Routing sink
// ---------------------------------------------------------------------------

export type SinkStatus = 'applied' | 'simulated' | 'failed';

export interface SinkResult {
  status: SinkStatus;
  command: string;
  error?: string;
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export interface AggregateMetrics {
  eventCount: number;
  routeOutageTotalMs: number;
  detectionTimeTotalMs: number;
  packetsLost: number;
  externalModifications: number;
}

export type EventClass = 'predicted' | 'baseline';

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type Validation = { valid: true } | { valid: false; reason: string };

/** Answers which node ids currently exist */
export interface TopologyOracle {
  nodeCount(): number;
}
