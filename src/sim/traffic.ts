/**
 * Probe traffic over the scenario's links.
 *
 * A probe is lost when the link is physically down while the routing protocol
 * still believes it is up: traffic keeps being forwarded into the dead link.
 * Everything else is delivered, over the link or an alternate.
 */

import type { NodeId } from '../types.js';
import type { Scheduler } from './scheduler.js';
import type { MetricsRecorder } from '../metrics/recorder.js';

export interface LinkStateView {
  getRealState(nodeA: NodeId, nodeB: NodeId): boolean;
  getReportedState(nodeA: NodeId, nodeB: NodeId): boolean;
}

export class ProbeTraffic {
  private sent = 0;
  private lostCount = 0;

  constructor(
    private readonly scheduler: Scheduler,
    private readonly metrics: MetricsRecorder,
    private readonly links: LinkStateView,
    private readonly pairs: () => ReadonlyArray<readonly [NodeId, NodeId]>,
    private readonly packetsPerSecond: number,
  ) {}

  /** Send one probe per pair every 1/pps seconds until `stopTime` */
  start(stopTime: number): void {
    if (this.packetsPerSecond <= 0) return;
    const interval = 1 / this.packetsPerSecond;

    const scheduleNext = (): void => {
      const next = this.scheduler.now() + interval;
      if (next <= stopTime) this.scheduler.scheduleAt(next, tick);
    };
    const tick = (): void => {
      this.sendRound();
      scheduleNext();
    };
    scheduleNext();
  }

  sendRound(): void {
    for (const [a, b] of this.pairs()) {
      this.sent++;
      this.metrics.recordPacketSent();
      const blackholed = !this.links.getRealState(a, b) && this.links.getReportedState(a, b);
      if (blackholed) {
        this.lostCount++;
      } else {
        this.metrics.recordPacketReceived();
      }
    }
  }

  counters(): { sent: number; lost: number } {
    return { sent: this.sent, lost: this.lostCount };
  }
}
