/**
 * Sink Dispatcher
 *
 * Fire-and-forget channel between the RFP core and the routing sink. The core
 * runs to completion on the virtual clock and never waits for a router; commands
 * are queued here and executed strictly in submission order on a promise chain.
 *
 * Every outcome is turned into a SinkResult. A sink that rejects (it should
 * not) is recorded as `failed`, so nothing propagates back into the core.
 */

import type { NodeId, RouteChange, SinkResult, SinkStatus } from '../types.js';
import type { RoutingSink } from './routing-sink.js';
import { describeRouteChange } from './routing-sink.js';
import { log } from '../logger.js';

export interface DispatchStats {
  dispatched: number;
  applied: number;
  simulated: number;
  failed: number;
}

export class SinkDispatcher {
  private tail: Promise<void> = Promise.resolve();
  private counts: Record<SinkStatus, number> = { applied: 0, simulated: 0, failed: 0 };
  private dispatchedCount = 0;
  private lastFailure: string | null = null;

  constructor(private readonly sink: RoutingSink) {}

  get sinkName(): string {
    return this.sink.name;
  }

  /** Number of commands handed to the sink so far (counted at submission) */
  get dispatched(): number {
    return this.dispatchedCount;
  }

  setLinkAdminState(nodeId: NodeId, peerId: NodeId, up: boolean): void {
    this.enqueue(
      `node ${nodeId}: link to ${peerId} ${up ? 'up' : 'down'}`,
      () => this.sink.setLinkAdminState(nodeId, peerId, up),
    );
  }

  applyRouteChange(nodeId: NodeId, change: RouteChange): void {
    const snapshot = { ...change };
    this.enqueue(
      `node ${nodeId}: ${describeRouteChange(snapshot)}`,
      () => this.sink.applyRouteChange(nodeId, snapshot),
    );
  }

  triggerConvergence(nodeIds: NodeId[]): void {
    const targets = [...nodeIds];
    this.enqueue(
      `convergence on ${targets.length} nodes`,
      () => this.sink.triggerConvergence(targets),
    );
  }

  /** Resolves once every command submitted so far has settled */
  async drain(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.tail;
      await current;
    } while (current !== this.tail);
  }

  /** Let queued commands settle, then release the sink */
  async close(): Promise<void> {
    await this.drain();
    await this.sink.close();
  }

  stats(): DispatchStats {
    return { dispatched: this.dispatchedCount, ...this.counts };
  }

  /** Most recent failure message, if any */
  get lastError(): string | null {
    return this.lastFailure;
  }

  private enqueue(label: string, run: () => Promise<SinkResult>): void {
    this.dispatchedCount++;
    this.tail = this.tail.then(async () => {
      const result = await this.execute(label, run);
      this.counts[result.status]++;
      if (result.status === 'failed') {
        this.lastFailure = result.error ?? 'unknown error';
        log(`[Sink] ${label} failed (${this.lastFailure}), continuing in degraded mode`);
      }
    });
  }

  private async execute(label: string, run: () => Promise<SinkResult>): Promise<SinkResult> {
    try {
      return await run();
    } catch (err) {
      return {
        status: 'failed',
        command: label,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }
}
