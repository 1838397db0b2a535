/**
 * Scenario driver: turns predictions and configured unpredicted failures into
 * physical link transitions on the scheduler.
 *
 * A predicted link goes physically down at its effective T0 (later than
 * requested when the timeline was clamped) and comes back after the outage.
 */

import type { Config } from '../config.js';
import type { NodeId } from '../types.js';
import type { Scheduler } from './scheduler.js';
import type { Orchestrator } from '../rfp/orchestrator.js';
import type { PredictionInput } from '../services/prediction-reader.js';
import { pairKey } from '../links/link-gate.js';
import { at, log } from '../logger.js';

export type ScenarioSettings = Pick<Config['simulation'], 'linkOutageSeconds' | 'unpredicted'>;

export interface ScenarioSummary {
  registered: number;
  rejected: number;
  unpredicted: number;
}

export class ScenarioDriver {
  private scenarioPairs = new Map<string, [NodeId, NodeId]>();
  private summary: ScenarioSummary = { registered: 0, rejected: 0, unpredicted: 0 };

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly scheduler: Scheduler,
    private readonly settings: ScenarioSettings,
  ) {}

  /** Register every prediction and schedule its physical failure */
  loadPredictions(predictions: PredictionInput[]): ScenarioSummary {
    for (const p of predictions) {
      const result = this.orchestrator.registerPredictedFailure(p.linkId, p.nodeA, p.nodeB, p.failureTime);
      if (!result.ok) {
        this.summary.rejected++;
        continue;
      }
      this.summary.registered++;
      this.scheduleOutage(p.nodeA, p.nodeB, result.failure.markers.t0);
    }
    return this.stats();
  }

  /** Failures nobody predicted; the protocol has to find out by itself */
  scheduleUnpredicted(): ScenarioSummary {
    for (const failure of this.settings.unpredicted) {
      log(`[Scenario] Unpredicted failure ${failure.nodeA}<->${failure.nodeB} scheduled at ${at(failure.time)}`);
      this.scheduleOutage(failure.nodeA, failure.nodeB, failure.time);
      this.summary.unpredicted++;
    }
    return this.stats();
  }

  /** Every pair the scenario touches, for probe traffic */
  pairs(): Array<[NodeId, NodeId]> {
    return [...this.scenarioPairs.values()];
  }

  stats(): ScenarioSummary {
    return { ...this.summary };
  }

  private scheduleOutage(nodeA: NodeId, nodeB: NodeId, downAt: number): void {
    this.scenarioPairs.set(pairKey(nodeA, nodeB), [nodeA, nodeB]);
    this.scheduler.scheduleAt(downAt, () => this.observe(nodeA, nodeB, false));
    this.scheduler.scheduleAt(downAt + this.settings.linkOutageSeconds, () => this.observe(nodeA, nodeB, true));
  }

  private observe(nodeA: NodeId, nodeB: NodeId, isUp: boolean): void {
    const result = this.orchestrator.onObservedLinkChange(nodeA, nodeB, isUp, this.scheduler.now());
    if (!result.ok) {
      log(`[Scenario] Link ${nodeA}<->${nodeB} transition dropped: ${result.reason}`);
    }
  }
}
