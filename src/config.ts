/**
 * RFP controller configuration.
 *
 * All values can be overridden via environment variables.
 */

import type { NodeId } from './types.js';

export interface RouterConfig {
  /** Simulation node id this router backs */
  nodeId: NodeId;
  host: string;
}

/** A link failure nobody predicted, injected by the scenario driver */
export interface UnpredictedFailureConfig {
  nodeA: NodeId;
  nodeB: NodeId;
  time: number;
}

export interface Config {
  /** Number of routers in the constellation (valid ids are 0..nodeCount-1) */
  nodeCount: number;

  /** Timeline parameters, in virtual seconds */
  timeline: {
    convergenceTime: number;
    safetyMargin: number;
    clampEpsilon: number;
  };

  /** Relays considered when installing alternates at T1 */
  alternatePathFanout: number;
  /** Nodes that receive the convergence trigger at T2 */
  convergenceNodeLimit: number;

  /** Worst case of the un-augmented protocol (dead interval + SPF) */
  baseline: {
    detectionMs: number;
    convergenceMs: number;
    packetsLost: number;
  };

  /** Routers reachable over SSH; nodes without one run simulated */
  routers: RouterConfig[];
  interfaceTemplate: string;
  vtyshPath: string;
  sshKeyPath: string;
  sshUser: string;
  dryRun: boolean;

  /** Prediction feed (written by the orbit propagator) */
  redisUrl?: string;
  predictionKey: string;

  /** Event log for the status page */
  postgresUrl?: string;

  /** Scenario */
  simulation: {
    stopTime: number;
    predictionCount: number;
    firstPredictionAt: number;
    predictionSpacing: number;
    linkOutageSeconds: number;
    unpredicted: UnpredictedFailureConfig[];
    trafficPacketsPerSecond: number;
  };

  /** Run mode */
  realtime: boolean;
  realtimeSpeed: number;
}

export function loadConfig(): Config {
  return {
    nodeCount: int(process.env.NODE_COUNT, 25),

    timeline: {
      convergenceTime: num(process.env.RFP_TC, 2.0),
      safetyMargin: num(process.env.RFP_DT, 0.5),
      clampEpsilon: num(process.env.RFP_EPSILON, 0.1),
    },

    alternatePathFanout: int(process.env.ALTERNATE_PATH_FANOUT, 10),
    convergenceNodeLimit: int(process.env.CONVERGENCE_NODE_LIMIT, 20),

    baseline: {
      detectionMs: num(process.env.BASELINE_DETECTION_MS, 40_000),
      convergenceMs: num(process.env.BASELINE_CONVERGENCE_MS, 100),
      packetsLost: int(process.env.BASELINE_PACKETS_LOST, 15),
    },

    routers: parseRouters(process.env.ROUTER_HOSTS ?? ''),
    interfaceTemplate: process.env.INTERFACE_TEMPLATE ?? 'sat{peer}',
    vtyshPath: process.env.VTYSH_PATH ?? 'vtysh',
    sshKeyPath: process.env.SSH_KEY_PATH ?? '/root/.ssh/id_ed25519',
    sshUser: process.env.SSH_USER ?? 'root',
    dryRun: process.env.DRY_RUN === 'true',

    redisUrl: process.env.REDIS_URL,
    predictionKey: process.env.PREDICTION_KEY ?? 'rfp:predictions',

    postgresUrl: process.env.POSTGRES_URL,

    simulation: {
      stopTime: num(process.env.SIM_STOP, 100),
      predictionCount: int(process.env.PREDICTION_COUNT, 6),
      firstPredictionAt: num(process.env.FIRST_PREDICTION_AT, 10),
      predictionSpacing: num(process.env.PREDICTION_SPACING, 8),
      linkOutageSeconds: num(process.env.LINK_OUTAGE_SECONDS, 10),
      unpredicted: parseUnpredicted(process.env.UNPREDICTED_FAILURES ?? '3-4@55'),
      trafficPacketsPerSecond: num(process.env.TRAFFIC_PPS, 10),
    },

    realtime: process.argv.includes('--realtime'),
    realtimeSpeed: num(process.env.REALTIME_SPEED, 1),
  };
}

/** `0=10.0.0.1,1=10.0.0.2` → router list; malformed entries are skipped */
export function parseRouters(raw: string): RouterConfig[] {
  const routers: RouterConfig[] = [];
  for (const entry of raw.split(',')) {
    const match = entry.trim().match(/^(\d+)=(\S+)$/);
    if (match) {
      routers.push({ nodeId: parseInt(match[1], 10), host: match[2] });
    }
  }
  return routers;
}

/** `3-4@55,1-7@80.5` → unpredicted failures; malformed entries are skipped */
export function parseUnpredicted(raw: string): UnpredictedFailureConfig[] {
  const failures: UnpredictedFailureConfig[] = [];
  for (const entry of raw.split(',')) {
    const match = entry.trim().match(/^(\d+)-(\d+)@(\d+(?:\.\d+)?)$/);
    if (match) {
      failures.push({
        nodeA: parseInt(match[1], 10),
        nodeB: parseInt(match[2], 10),
        time: parseFloat(match[3]),
      });
    }
  }
  return failures;
}

function int(val: string | undefined, fallback: number): number {
  return val ? parseInt(val, 10) : fallback;
}

function num(val: string | undefined, fallback: number): number {
  return val ? parseFloat(val) : fallback;
}
