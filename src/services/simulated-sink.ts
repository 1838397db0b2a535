/**
 * Simulated routing sink.
 *
 * Journals every command instead of touching a router. Used when no router is
 * reachable, in dry runs, and by the tests.
 */

import type { NodeId, RouteChange, SinkResult } from '../types.js';
import type { RoutingSink } from './routing-sink.js';
import { describeRouteChange } from './routing-sink.js';

export type SinkCall =
  | { kind: 'link'; nodeId: NodeId; peerId: NodeId; up: boolean }
  | { kind: 'route'; nodeId: NodeId; change: RouteChange }
  | { kind: 'converge'; nodeIds: NodeId[] };

export class SimulatedSink implements RoutingSink {
  readonly name = 'simulated';
  readonly calls: SinkCall[] = [];

  async setLinkAdminState(nodeId: NodeId, peerId: NodeId, up: boolean): Promise<SinkResult> {
    this.calls.push({ kind: 'link', nodeId, peerId, up });
    return { status: 'simulated', command: `node ${nodeId}: link to ${peerId} ${up ? 'up' : 'down'}` };
  }

  async applyRouteChange(nodeId: NodeId, change: RouteChange): Promise<SinkResult> {
    this.calls.push({ kind: 'route', nodeId, change: { ...change } });
    return { status: 'simulated', command: `node ${nodeId}: ${describeRouteChange(change)}` };
  }

  async triggerConvergence(nodeIds: NodeId[]): Promise<SinkResult> {
    this.calls.push({ kind: 'converge', nodeIds: [...nodeIds] });
    return { status: 'simulated', command: `converge ${nodeIds.length} nodes` };
  }

  async close(): Promise<void> {
    // nothing to release
  }

  /** Route calls only, in issue order */
  routeCalls(): Array<{ nodeId: NodeId; change: RouteChange }> {
    const routes: Array<{ nodeId: NodeId; change: RouteChange }> = [];
    for (const call of this.calls) {
      if (call.kind === 'route') routes.push({ nodeId: call.nodeId, change: call.change });
    }
    return routes;
  }

  reset(): void {
    this.calls.length = 0;
  }
}
