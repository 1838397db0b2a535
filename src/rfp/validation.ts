/**
 * Boundary validation for the registration and observation APIs.
 * A rejected request mutates nothing.
 */

import type { NodeId, TopologyOracle, Validation } from '../types.js';

export function validateNodeId(id: NodeId, topology: TopologyOracle): Validation {
  if (!Number.isInteger(id)) {
    return { valid: false, reason: `node id ${id} is not an integer` };
  }
  if (id < 0) {
    return { valid: false, reason: `negative node id ${id}` };
  }
  const count = topology.nodeCount();
  if (id >= count) {
    return { valid: false, reason: `node id ${id} out of range (max: ${count - 1})` };
  }
  return { valid: true };
}

export function validatePair(nodeA: NodeId, nodeB: NodeId, topology: TopologyOracle): Validation {
  const a = validateNodeId(nodeA, topology);
  if (!a.valid) return a;
  const b = validateNodeId(nodeB, topology);
  if (!b.valid) return b;
  if (nodeA === nodeB) {
    return { valid: false, reason: `identical node ids ${nodeA}, ${nodeB}` };
  }
  return { valid: true };
}

export function validateTime(label: string, value: number): Validation {
  if (!Number.isFinite(value)) {
    return { valid: false, reason: `${label} must be a finite number (got ${value})` };
  }
  return { valid: true };
}
