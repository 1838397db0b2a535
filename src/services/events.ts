/**
 * Event Publisher
 *
 * Writes controller events (registrations, timeline markers, baseline
 * failures, lifecycle) directly to Postgres for the status page.
 *
 * The orchestrator calls `record()` synchronously from inside the virtual
 * clock; inserts are chained behind each other and `flush()` waits for them.
 */

import pg from 'pg';
import type { Config } from '../config.js';
import type { TimelineEvent, TimelineEventType } from '../rfp/orchestrator.js';
import { log } from '../logger.js';

const { Pool } = pg;

export type RfpEventType =
  | 'REGISTERED'
  | 'REJECTED'
  | 'MARKER'
  | 'CANCELLED'
  | 'BASELINE_FAILURE'
  | 'CONTROLLER_START'
  | 'CONTROLLER_STOP';

export interface RfpEvent {
  eventType: RfpEventType;
  virtualTime?: number;
  linkId?: string;
  nodeA?: number;
  nodeB?: number;
  marker?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const TYPE_MAP: Record<TimelineEventType, RfpEventType> = {
  'registered': 'REGISTERED',
  'rejected': 'REJECTED',
  'marker': 'MARKER',
  'cancelled': 'CANCELLED',
  'baseline-failure': 'BASELINE_FAILURE',
};

export function fromTimelineEvent(event: TimelineEvent): RfpEvent {
  return {
    eventType: TYPE_MAP[event.type],
    virtualTime: event.virtualTime,
    linkId: event.linkId,
    nodeA: event.nodeA,
    nodeB: event.nodeB,
    marker: event.marker,
    message: event.message,
  };
}

/** Positional parameters for the INSERT below */
export function eventRow(event: RfpEvent): unknown[] {
  return [
    event.eventType,
    event.virtualTime ?? null,
    event.linkId ?? null,
    event.nodeA ?? null,
    event.nodeB ?? null,
    event.marker ?? null,
    event.message ?? null,
    event.details ? JSON.stringify(event.details) : null,
  ];
}

/**
 * Event publisher that writes directly to Postgres.
 * Falls back gracefully if Postgres is unavailable.
 */
export class EventPublisher {
  private pool: pg.Pool | null = null;
  private postgresAvailable: boolean = true;
  private pending: Promise<void> = Promise.resolve();

  constructor(config: Pick<Config, 'postgresUrl'>) {
    this.initPostgres(config);
  }

  get enabled(): boolean {
    return this.pool !== null && this.postgresAvailable;
  }

  private initPostgres(config: Pick<Config, 'postgresUrl'>): void {
    if (!config.postgresUrl) {
      log('[Events] No Postgres URL configured, event publishing disabled');
      this.postgresAvailable = false;
      return;
    }

    try {
      this.pool = new Pool({
        connectionString: config.postgresUrl,
        max: 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
      });

      this.pool.on('error', (err) => {
        log(`[Events] Postgres pool error: ${err.message}`);
        this.postgresAvailable = false;
      });
    } catch (err) {
      log(`[Events] Failed to initialize Postgres: ${err instanceof Error ? err.message : String(err)}`);
      this.postgresAvailable = false;
    }
  }

  /**
   * Publish an event to the rfp_events table.
   * Fire-and-forget, doesn't throw on failure.
   */
  async publish(event: RfpEvent): Promise<void> {
    if (!this.pool || !this.postgresAvailable) return;

    try {
      await this.pool.query(
        `INSERT INTO rfp_events
         (event_type, virtual_time, link_id, node_a, node_b, marker, message, details)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        eventRow(event),
      );
    } catch (err) {
      if (err instanceof Error && err.message.includes('does not exist')) {
        log('[Events] rfp_events table does not exist, skipping event publishing');
        this.postgresAvailable = false;
      } else {
        log(`[Events] Failed to publish event: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /** Queue an event behind the ones already being written */
  record(event: RfpEvent): void {
    if (!this.enabled) return;
    this.pending = this.pending.then(() => this.publish(event));
  }

  /** Observer suitable for the orchestrator's onTimelineEvent */
  recordTimeline = (event: TimelineEvent): void => {
    this.record(fromTimelineEvent(event));
  };

  async publishLifecycle(started: boolean, details?: Record<string, unknown>): Promise<void> {
    await this.flush();
    await this.publish({
      eventType: started ? 'CONTROLLER_START' : 'CONTROLLER_STOP',
      message: started ? 'RFP controller started' : 'RFP controller stopped',
      details,
    });
  }

  /** Wait for queued inserts */
  async flush(): Promise<void> {
    await this.pending;
  }

  /**
   * Close the connection pool.
   */
  async close(): Promise<void> {
    await this.flush();
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
