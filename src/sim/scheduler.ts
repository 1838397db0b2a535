/**
 * Clock / scheduler boundary and the two drivers shipped with the controller.
 *
 * Callbacks fire in non-decreasing time order; callbacks scheduled for the
 * same instant fire in registration order.
 */

import { at, log } from '../logger.js';

export interface ScheduledTask {
  readonly time: number;
  cancel(): void;
}

export interface Scheduler {
  now(): number;
  scheduleAt(time: number, callback: () => void): ScheduledTask;
}

interface QueueEntry {
  time: number;
  seq: number;
  callback: () => void;
  cancelled: boolean;
}

/** Entries ordered by (time, registration sequence) */
class TaskQueue {
  private seq = 0;
  private entries: QueueEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  push(time: number, callback: () => void): QueueEntry {
    if (!Number.isFinite(time)) {
      throw new Error(`Cannot schedule at a non-finite time (got ${time})`);
    }
    const entry: QueueEntry = { time, seq: this.seq++, callback, cancelled: false };

    // Binary search for the first entry strictly later than this one
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const other = this.entries[mid];
      if (other.time < entry.time || (other.time === entry.time && other.seq < entry.seq)) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    this.entries.splice(lo, 0, entry);
    return entry;
  }

  /** Earliest live entry, dropping cancelled ones at the head */
  peek(): QueueEntry | undefined {
    while (this.entries.length > 0 && this.entries[0].cancelled) {
      this.entries.shift();
    }
    return this.entries[0];
  }

  shift(): QueueEntry | undefined {
    return this.entries.shift();
  }

  live(): number {
    return this.entries.filter(e => !e.cancelled).length;
  }

  clear(): void {
    this.entries = [];
  }
}

function runEntry(entry: QueueEntry): void {
  try {
    entry.callback();
  } catch (err) {
    log(`[Sim] Callback at ${at(entry.time)} failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Discrete-event scheduler over virtual time.
 * Time only moves when `runUntil` / `step` pop the next entry.
 */
export class VirtualScheduler implements Scheduler {
  private current: number;
  private queue = new TaskQueue();

  constructor(startTime = 0) {
    this.current = startTime;
  }

  now(): number {
    return this.current;
  }

  /** A time in the past runs at the current instant, after what is already due */
  scheduleAt(time: number, callback: () => void): ScheduledTask {
    const entry = this.queue.push(Math.max(time, this.current), callback);
    return {
      time: entry.time,
      cancel: () => { entry.cancelled = true; },
    };
  }

  /** Number of live (not cancelled) entries */
  pending(): number {
    return this.queue.live();
  }

  /** Run the next due entry; false when the queue is empty */
  step(): boolean {
    const entry = this.queue.shift();
    if (!entry) return false;
    this.current = entry.time;
    if (!entry.cancelled) runEntry(entry);
    return true;
  }

  /** Run everything scheduled up to and including `stopTime`, then park the clock there */
  runUntil(stopTime: number): number {
    let executed = 0;
    for (let next = this.queue.peek(); next && next.time <= stopTime; next = this.queue.peek()) {
      this.step();
      executed++;
    }
    this.current = Math.max(this.current, stopTime);
    return executed;
  }
}

/**
 * Wall-clock scheduler: one virtual second lasts `1 / speed` real seconds.
 * Used in --realtime mode against live routers.
 *
 * Entries share one queue and a single timer armed for the earliest of them,
 * so equal times keep registration order however long scheduling itself took.
 */
export class RealtimeScheduler implements Scheduler {
  private readonly startedAt: number;
  private queue = new TaskQueue();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private armedFor = 0;

  constructor(private readonly speed = 1, private readonly wallClock: () => number = Date.now) {
    this.startedAt = wallClock();
  }

  now(): number {
    return ((this.wallClock() - this.startedAt) / 1000) * this.speed;
  }

  scheduleAt(time: number, callback: () => void): ScheduledTask {
    const entry = this.queue.push(Math.max(time, this.now()), callback);
    this.arm();
    return {
      time: entry.time,
      cancel: () => {
        entry.cancelled = true;
        this.arm();
      },
    };
  }

  /** Number of live (not cancelled) entries */
  pending(): number {
    return this.queue.live();
  }

  /** Resolves once virtual time reaches `stopTime` */
  runUntil(stopTime: number): Promise<void> {
    return new Promise(resolve => {
      this.scheduleAt(stopTime, () => resolve());
    });
  }

  /** Cancel everything still pending */
  stop(): void {
    this.disarm();
    this.queue.clear();
  }

  private arm(): void {
    this.disarm();
    const next = this.queue.peek();
    if (!next) return;

    this.armedFor = next.time;
    const delayMs = Math.max(0, ((next.time - this.now()) / this.speed) * 1000);
    this.timer = setTimeout(() => this.fire(), delayMs);
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private fire(): void {
    this.timer = null;
    // The timer only fires once its entry is due, whatever the wall clock's rounding
    const due = Math.max(this.now(), this.armedFor);
    for (let next = this.queue.peek(); next && next.time <= due; next = this.queue.peek()) {
      this.queue.shift();
      runEntry(next);
    }
    this.arm();
  }
}
