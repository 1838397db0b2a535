/**
 * Link Gate
 *
 * Decides, for every physical link-state observation, whether the routing
 * protocol gets to see it. Holds the authoritative mapping from physical state
 * (realState) to disclosed state (reportedState) per unordered node pair.
 *
 *   forcedDown     → everything is absorbed, the link stays disclosed down
 *   masking window → changes are absorbed, disclosed state is frozen
 *   otherwise      → changes are disclosed when they differ from what was
 *                    last reported
 */

import type {
  GateOutcome,
  LinkRecord,
  MaskingPredicate,
  NodeId,
  PairKey,
} from '../types.js';
import type { SinkDispatcher } from '../services/dispatcher.js';
import { nexthopOf, prefixOf, relayCandidates, PRE_INSTALLED_METRIC } from '../routes/addressing.js';
import { at, log } from '../logger.js';

/** Canonical key, order-independent: (3,1) and (1,3) are both "1-3" */
export function pairKey(nodeA: NodeId, nodeB: NodeId): PairKey {
  return nodeA <= nodeB ? `${nodeA}-${nodeB}` : `${nodeB}-${nodeA}`;
}

export interface LinkGateOptions {
  /** Used to enumerate relays for alternate paths */
  nodeCount: () => number;
  alternatePathFanout?: number;
}

export class LinkGate {
  private records = new Map<PairKey, LinkRecord>();

  constructor(
    private readonly sink: SinkDispatcher,
    private readonly options: LinkGateOptions,
  ) {}

  /**
   * T1: hide the link from the protocol ahead of the failure and pre-install
   * alternates so traffic already avoids it.
   */
  forceDown(nodeA: NodeId, nodeB: NodeId, now: number): void {
    const record = this.record(nodeA, nodeB, now);
    record.forcedDown = true;
    record.reportedState = false;

    log(`[Gate] Forcing link ${nodeA}<->${nodeB} DOWN at ${at(now)} (real: ${upDown(record.realState)})`);
    this.sink.setLinkAdminState(nodeA, nodeB, false);
    this.sink.setLinkAdminState(nodeB, nodeA, false);
    this.installAlternates(nodeA, nodeB);
  }

  /** T3: drop the override and disclose the physical state again */
  restoreNormal(nodeA: NodeId, nodeB: NodeId, now: number): void {
    const record = this.record(nodeA, nodeB, now);
    record.forcedDown = false;
    record.reportedState = record.realState;

    log(`[Gate] Restored normal detection for ${nodeA}<->${nodeB} at ${at(now)} (real: ${upDown(record.realState)})`);
    this.sink.setLinkAdminState(nodeA, nodeB, record.realState);
    this.sink.setLinkAdminState(nodeB, nodeA, record.realState);
  }

  updateRealState(
    nodeA: NodeId,
    nodeB: NodeId,
    isUp: boolean,
    now: number,
    isMasked: MaskingPredicate,
  ): GateOutcome {
    const record = this.record(nodeA, nodeB, now);
    if (record.realState !== isUp) {
      record.realState = isUp;
      record.lastChangeTime = now;
      record.changeCount++;
    }

    if (record.forcedDown) return 'absorbed-forced-down';
    if (isMasked(nodeA, nodeB, now)) return 'absorbed-masked';
    if (record.reportedState === isUp) return 'unchanged';

    record.reportedState = isUp;
    log(`[Gate] Link ${nodeA}<->${nodeB} reported ${upDown(isUp)} at ${at(now)}`);
    this.sink.setLinkAdminState(nodeA, nodeB, isUp);
    this.sink.setLinkAdminState(nodeB, nodeA, isUp);
    return 'disclosed';
  }

  getReportedState(nodeA: NodeId, nodeB: NodeId): boolean {
    return this.records.get(pairKey(nodeA, nodeB))?.reportedState ?? true;
  }

  getRealState(nodeA: NodeId, nodeB: NodeId): boolean {
    return this.records.get(pairKey(nodeA, nodeB))?.realState ?? true;
  }

  isForcedDown(nodeA: NodeId, nodeB: NodeId): boolean {
    return this.records.get(pairKey(nodeA, nodeB))?.forcedDown ?? false;
  }

  /** Copy of the record, undefined for a pair never touched */
  getRecord(nodeA: NodeId, nodeB: NodeId): LinkRecord | undefined {
    const record = this.records.get(pairKey(nodeA, nodeB));
    return record ? { ...record } : undefined;
  }

  /** Pairs whose disclosed state differs from the physical one */
  divergentPairs(): PairKey[] {
    const keys: PairKey[] = [];
    for (const [key, record] of this.records) {
      if (record.realState !== record.reportedState) keys.push(key);
    }
    return keys;
  }

  /** Links are assumed up until observed otherwise */
  private record(nodeA: NodeId, nodeB: NodeId, now: number): LinkRecord {
    const key = pairKey(nodeA, nodeB);
    let record = this.records.get(key);
    if (!record) {
      record = {
        realState: true,
        reportedState: true,
        forcedDown: false,
        lastChangeTime: now,
        changeCount: 0,
      };
      this.records.set(key, record);
    }
    return record;
  }

  private installAlternates(nodeA: NodeId, nodeB: NodeId): void {
    const relays = relayCandidates(
      nodeA,
      nodeB,
      this.options.nodeCount(),
      this.options.alternatePathFanout,
    );
    if (relays.length === 0) {
      log(`[Gate] No relay available around ${nodeA}<->${nodeB}`);
      return;
    }

    log(`[Gate] Installing ${relays.length} alternate routes at node ${nodeA} towards ${prefixOf(nodeB)}`);
    for (const relay of relays) {
      this.sink.applyRouteChange(nodeA, {
        operation: 'ADD',
        prefix: prefixOf(nodeB),
        nexthop: nexthopOf(relay),
        metric: PRE_INSTALLED_METRIC,
      });
    }
  }
}

function upDown(state: boolean): string {
  return state ? 'UP' : 'DOWN';
}
