/**
 * Update Buffer
 *
 * Decouples receiving a routing-table change from applying it. Between T1 and
 * T2 every change is queued; at T2 the queue is flushed in submission order and
 * a global convergence is triggered, so all routers move to the new routes
 * from the same consistent base.
 *
 * The flush runs to completion inside one call: nothing can be submitted
 * between the first and the last applied entry.
 */

import type { NodeId, PendingUpdate, RouteChange } from '../types.js';
import type { SinkDispatcher } from '../services/dispatcher.js';
import { at, log } from '../logger.js';

export interface FlushResult {
  flushed: number;
  convergenceTargets: number;
}

export interface BufferCounters {
  blocked: number;
  applied: number;
  pending: number;
  buffering: boolean;
}

export class UpdateBuffer {
  private buffering = false;
  private queue: PendingUpdate[] = [];
  private blockedCount = 0;
  private appliedCount = 0;

  constructor(
    private readonly sink: SinkDispatcher,
    /** Routers that receive the convergence trigger on flush */
    private readonly convergenceTargets: () => NodeId[],
  ) {}

  get isBuffering(): boolean {
    return this.buffering;
  }

  enterBufferingMode(now: number): void {
    if (this.buffering) return;
    this.buffering = true;
    log(`[Buffer] Buffering route updates from ${at(now)}, they will be applied at the synchronization point`);
  }

  /** Returns true when the update was queued, false when applied right away */
  submit(targetNode: NodeId, change: RouteChange, now: number): boolean {
    if (this.buffering) {
      this.queue.push({ ...change, targetNode, enqueuedAt: now });
      this.blockedCount++;
      return true;
    }

    this.sink.applyRouteChange(targetNode, change);
    this.appliedCount++;
    return false;
  }

  exitBufferingMode(now: number): FlushResult {
    if (!this.buffering) {
      log(`[Buffer] exitBufferingMode at ${at(now)} while not buffering, nothing to flush`);
      return { flushed: 0, convergenceTargets: 0 };
    }

    this.buffering = false;
    const batch = this.queue;
    this.queue = [];

    log(`[Buffer] Releasing ${batch.length} buffered route updates at ${at(now)}`);
    for (const update of batch) {
      this.sink.applyRouteChange(update.targetNode, {
        operation: update.operation,
        prefix: update.prefix,
        nexthop: update.nexthop,
        metric: update.metric,
      });
      this.appliedCount++;
    }

    const targets = this.convergenceTargets();
    this.sink.triggerConvergence(targets);
    log(`[Buffer] Forwarding tables synchronized, convergence triggered on ${targets.length} nodes (${this.appliedCount} applied so far)`);

    return { flushed: batch.length, convergenceTargets: targets.length };
  }

  /** Queued entries, oldest first */
  pendingUpdates(): PendingUpdate[] {
    return this.queue.map(u => ({ ...u }));
  }

  counters(): BufferCounters {
    return {
      blocked: this.blockedCount,
      applied: this.appliedCount,
      pending: this.queue.length,
      buffering: this.buffering,
    };
  }
}
