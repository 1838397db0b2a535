/**
 * Prediction Reader
 *
 * Reads predicted link failures from Redis, where the orbit propagator writes
 * them as a JSON list. Falls back to a generated schedule when Redis is not
 * configured, unreachable or empty.
 *
 * Primary data flow:
 *   Orbit propagator → Redis → Controller (this reader)
 *
 * Fallback:
 *   Consecutive-pair schedule derived from the scenario settings
 */

import { Redis } from 'ioredis';
import type { Config } from '../config.js';
import type { NodeId } from '../types.js';
import { log } from '../logger.js';

/** Failures closer than this to the end of the run are not scheduled */
export const END_OF_RUN_MARGIN = 15;

export interface PredictionInput {
  linkId: string;
  nodeA: NodeId;
  nodeB: NodeId;
  failureTime: number;
}

export interface PredictionBatch {
  predictions: PredictionInput[];
  source: 'redis' | 'generated';
  /** Entries dropped while parsing, with the reason */
  dropped: string[];
}

type ScheduleSettings = Pick<Config['simulation'], 'predictionCount' | 'firstPredictionAt' | 'predictionSpacing' | 'stopTime'>;

/**
 * Consecutive pairs (i, i+1 mod n) failing every `spacing` seconds after
 * `first`; events too close to the end of the run are skipped.
 */
export function generatePredictionSchedule(settings: ScheduleSettings, nodeCount: number): PredictionInput[] {
  if (nodeCount < 2) {
    log('[Predictions] Not enough nodes to schedule link failures');
    return [];
  }

  const predictions: PredictionInput[] = [];
  for (let i = 0; i < settings.predictionCount; i++) {
    const nodeA = i % nodeCount;
    const nodeB = (i + 1) % nodeCount;
    const failureTime = settings.firstPredictionAt + (predictions.length + 1) * settings.predictionSpacing;

    if (failureTime < settings.stopTime - END_OF_RUN_MARGIN) {
      predictions.push({ linkId: String(predictions.length + 1), nodeA, nodeB, failureTime });
    }
  }
  return predictions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse the Redis payload; malformed entries are dropped, not fatal */
export function parsePredictionPayload(raw: string): { predictions: PredictionInput[]; dropped: string[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { predictions: [], dropped: [`payload is not JSON: ${err instanceof Error ? err.message : String(err)}`] };
  }

  if (!Array.isArray(parsed)) {
    return { predictions: [], dropped: ['payload is not a list'] };
  }

  const predictions: PredictionInput[] = [];
  const dropped: string[] = [];
  parsed.forEach((entry: unknown, index) => {
    if (!isRecord(entry)) {
      dropped.push(`entry ${index}: not an object`);
      return;
    }
    const { linkId, nodeA, nodeB, failureTime } = entry;
    if (typeof linkId !== 'string' && typeof linkId !== 'number') {
      dropped.push(`entry ${index}: missing linkId`);
      return;
    }
    if (typeof nodeA !== 'number' || typeof nodeB !== 'number') {
      dropped.push(`entry ${index}: node ids must be numbers`);
      return;
    }
    if (typeof failureTime !== 'number' || !Number.isFinite(failureTime)) {
      dropped.push(`entry ${index}: failureTime must be a finite number`);
      return;
    }
    predictions.push({ linkId: String(linkId), nodeA, nodeB, failureTime });
  });

  return { predictions, dropped };
}

/**
 * PredictionReader class
 *
 * Manages the Redis connection and provides predictions with fallback.
 */
export class PredictionReader {
  private redis: Redis | null = null;
  private redisAvailable: boolean = true;

  constructor(private readonly config: Pick<Config, 'redisUrl' | 'predictionKey' | 'nodeCount' | 'simulation'>) {
    this.initRedis();
  }

  private initRedis(): void {
    if (!this.config.redisUrl) {
      log('[Predictions] No Redis URL configured, using generated schedule');
      this.redisAvailable = false;
      return;
    }

    try {
      this.redis = new Redis(this.config.redisUrl, {
        maxRetriesPerRequest: 1,
        connectTimeout: 5000,
        commandTimeout: 3000,
        lazyConnect: true,
        retryStrategy: (times: number) => {
          if (times > 3) {
            log('[Predictions] Redis connection failed, falling back to generated schedule');
            return null; // Stop retrying
          }
          return Math.min(times * 200, 1000);
        },
      });

      this.redis.on('error', (err: Error) => {
        if (this.redisAvailable) {
          log(`[Predictions] Redis error: ${err.message}`);
          this.redisAvailable = false;
        }
      });

      this.redis.on('connect', () => {
        if (!this.redisAvailable) {
          log('[Predictions] Redis reconnected');
        }
        this.redisAvailable = true;
      });
    } catch (err) {
      log(`[Predictions] Failed to initialize Redis: ${err instanceof Error ? err.message : String(err)}`);
      this.redisAvailable = false;
    }
  }

  /**
   * Get predictions.
   * Tries Redis first, falls back to the generated schedule.
   */
  async getPredictions(): Promise<PredictionBatch> {
    if (this.redis && this.redisAvailable) {
      try {
        const data = await this.redis.get(this.config.predictionKey);
        if (data) {
          const { predictions, dropped } = parsePredictionPayload(data);
          for (const reason of dropped) {
            log(`[Predictions] Dropped ${reason}`);
          }
          if (predictions.length > 0) {
            log(`[Predictions] Loaded ${predictions.length} predictions from Redis`);
            return { predictions, source: 'redis', dropped };
          }
          log('[Predictions] No usable predictions in Redis, using generated schedule');
        } else {
          log(`[Predictions] Key ${this.config.predictionKey} empty, using generated schedule`);
        }
      } catch (err) {
        log(`[Predictions] Redis read failed: ${err instanceof Error ? err.message : String(err)}, using generated schedule`);
      }
    }

    return {
      predictions: generatePredictionSchedule(this.config.simulation, this.config.nodeCount),
      source: 'generated',
      dropped: [],
    };
  }

  /**
   * Close connections.
   */
  async close(): Promise<void> {
    if (this.redis) {
      this.redis.disconnect();
      this.redis = null;
    }
  }
}
