/**
 * Routing Sink
 *
 * Boundary to the routing daemon (Quagga/FRR ospfd+zebra). Implementations must
 * resolve with a SinkResult and never reject: an unavailable daemon is reported
 * as `simulated` or `failed`, never thrown.
 */

import type { NodeId, RouteChange, SinkResult } from '../types.js';

export interface RoutingSink {
  /** Short label for log lines ("vtysh", "simulated") */
  readonly name: string;

  /** Administratively bring the interface towards `peerId` up or down */
  setLinkAdminState(nodeId: NodeId, peerId: NodeId, up: boolean): Promise<SinkResult>;

  applyRouteChange(nodeId: NodeId, change: RouteChange): Promise<SinkResult>;

  /** Force the protocol to recompute from the current link-state base */
  triggerConvergence(nodeIds: NodeId[]): Promise<SinkResult>;

  /** Release connections to the routers */
  close(): Promise<void>;
}

export function describeRouteChange(change: RouteChange): string {
  return change.operation === 'DELETE'
    ? `DELETE ${change.prefix} via ${change.nexthop}`
    : `${change.operation} ${change.prefix} via ${change.nexthop} metric ${change.metric}`;
}
