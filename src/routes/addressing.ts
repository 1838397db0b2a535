/**
 * Constellation address plan.
 *
 * Every satellite `n` owns 10.n.0.0/16 and is reached as next hop 10.0.n.1 on
 * its inter-satellite links.
 */

import type { NodeId, RouteChange } from '../types.js';

/** Relays searched when looking for a bypass */
export const DEFAULT_RELAY_SEARCH_LIMIT = 10;

export const DIRECT_METRIC = 1;
export const ALTERNATE_METRIC = 5;
export const PRE_INSTALLED_METRIC = 10;

export function prefixOf(node: NodeId): string {
  return `10.${node}.0.0/16`;
}

export function nexthopOf(node: NodeId): string {
  return `10.0.${node}.1`;
}

/**
 * Candidate relays that can carry traffic around the link a<->b:
 * every node below min(nodeCount, limit) that is not an endpoint.
 */
export function relayCandidates(
  nodeA: NodeId,
  nodeB: NodeId,
  nodeCount: number,
  limit = DEFAULT_RELAY_SEARCH_LIMIT,
): NodeId[] {
  const max = Math.min(nodeCount, limit);
  const relays: NodeId[] = [];
  for (let i = 0; i < max; i++) {
    if (i !== nodeA && i !== nodeB) relays.push(i);
  }
  return relays;
}

/** First usable relay, or null when the constellation is too small */
export function findAlternateRelay(
  nodeA: NodeId,
  nodeB: NodeId,
  nodeCount: number,
  limit = DEFAULT_RELAY_SEARCH_LIMIT,
): NodeId | null {
  return relayCandidates(nodeA, nodeB, nodeCount, limit)[0] ?? null;
}

/**
 * Route changes node `a` needs after the link a<->b is disclosed as up/down.
 * Down yields the withdrawal followed by a best-effort bypass.
 */
export function routeChangesFor(
  nodeA: NodeId,
  nodeB: NodeId,
  disclosedUp: boolean,
  nodeCount: number,
): RouteChange[] {
  const prefix = prefixOf(nodeB);
  if (disclosedUp) {
    return [{ operation: 'ADD', prefix, nexthop: nexthopOf(nodeA), metric: DIRECT_METRIC }];
  }

  const changes: RouteChange[] = [
    { operation: 'DELETE', prefix, nexthop: nexthopOf(nodeA), metric: 0 },
  ];
  const relay = findAlternateRelay(nodeA, nodeB, nodeCount);
  if (relay !== null) {
    changes.push({ operation: 'ADD', prefix, nexthop: nexthopOf(relay), metric: ALTERNATE_METRIC });
  }
  return changes;
}
