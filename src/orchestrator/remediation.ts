/**
 * Remediation Orchestrator
 *
 * Drives each anomaly through four stages:
 *   context -> recommendation -> proposal -> notification
 *
 * Each anomaly ends as an explicit outcome (succeeded, failed at a stage,
 * or skipped because the run was cancelled). One anomaly failing never
 * stops the others. Pipelines run through a bounded worker pool, and every
 * stage call is bounded by a timeout.
 */

import pLimit from 'p-limit';
import type { Anomaly, Recommendation } from '../types/anomaly.js';
import { describeAnomaly } from '../types/anomaly.js';
import type { RemediationCollaborators } from '../types/collaborators.js';

export type PipelineStage = 'context' | 'recommendation' | 'proposal' | 'notification';

export type PipelineState =
  | 'received'
  | 'context_retrieved'
  | 'recommendation_generated'
  | 'change_proposed'
  | 'notified'
  | 'failed';

export interface SucceededOutcome {
  status: 'succeeded';
  anomaly: Anomaly;
  state: 'notified';
  recommendation: Recommendation;
  proposalRef: string;
}

export interface FailedOutcome {
  status: 'failed';
  anomaly: Anomaly;
  state: 'failed';
  stage: PipelineStage;
  /** Last state reached before the failing stage. */
  lastState: PipelineState;
  reason: string;
  /** Set when the proposal was created before a later stage failed. */
  proposalRef?: string;
}

export interface SkippedOutcome {
  status: 'skipped';
  anomaly: Anomaly;
  state: 'received';
}

export type AnomalyOutcome = SucceededOutcome | FailedOutcome | SkippedOutcome;

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  /** Sum of savings over succeeded anomalies only. */
  totalSavings: number;
  /** In input order. */
  outcomes: AnomalyOutcome[];
}

export interface RemediationOptions {
  /** Pipelines in flight at once. Default 4. */
  concurrency?: number;
  /** Bound for each stage call. Default 60s. */
  stageTimeoutMs?: number;
}

export class StageTimeoutError extends Error {
  constructor(
    public readonly stage: PipelineStage | 'summary',
    public readonly timeoutMs: number
  ) {
    super(`${stage} stage timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
  }
}

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_STAGE_TIMEOUT_MS = 60_000;

type StageResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export class RemediationOrchestrator {
  private concurrency: number;
  private stageTimeoutMs: number;

  constructor(
    private collaborators: RemediationCollaborators,
    options: RemediationOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.stageTimeoutMs = options.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
    if (this.stageTimeoutMs <= 0) {
      throw new RangeError(`stageTimeoutMs must be positive, got ${this.stageTimeoutMs}`);
    }
  }

  /**
   * Remediate a batch and send one summary notification for it.
   * An aborted signal stops new pipelines from starting; pipelines already
   * running finish their current stages.
   */
  async run(anomalies: readonly Anomaly[], signal?: AbortSignal): Promise<RunSummary> {
    if (anomalies.length === 0) {
      return summarizeOutcomes([]);
    }

    console.error(`[costguard] Processing ${anomalies.length} anomalies`);

    const limit = pLimit(this.concurrency);
    const outcomes = await Promise.all(
      anomalies.map((anomaly) =>
        limit((): Promise<AnomalyOutcome> => {
          if (signal?.aborted) {
            return Promise.resolve({ status: 'skipped', anomaly, state: 'received' });
          }
          return this.processAnomaly(anomaly);
        })
      )
    );

    const summary = summarizeOutcomes(outcomes);
    if (summary.skipped > 0) {
      console.error(`[costguard] Run cancelled: ${summary.skipped} anomalies not started`);
    }

    await this.sendSummary(anomalies, summary);

    console.error(
      `[costguard] Remediation complete: ${summary.total} anomalies, ${summary.succeeded} proposals, $${summary.totalSavings.toFixed(2)}/mo total savings`
    );
    return summary;
  }

  /**
   * Run one anomaly through all four stages. Never rejects.
   */
  async processAnomaly(anomaly: Anomaly): Promise<AnomalyOutcome> {
    const { contextRetriever, recommendationGenerator, proposalSink, notifier } =
      this.collaborators;
    const label = describeAnomaly(anomaly);

    const context = await this.runStage('context', (signal) =>
      contextRetriever.retrieve(anomaly, signal)
    );
    if (!context.ok) return this.fail(anomaly, 'context', 'received', context.reason);

    const recommendation = await this.runStage('recommendation', (signal) =>
      recommendationGenerator.generate(anomaly, context.value, signal)
    );
    if (!recommendation.ok) {
      return this.fail(anomaly, 'recommendation', 'context_retrieved', recommendation.reason);
    }

    const proposal = await this.runStage('proposal', (signal) =>
      proposalSink.propose(recommendation.value, signal)
    );
    if (!proposal.ok) {
      return this.fail(anomaly, 'proposal', 'recommendation_generated', proposal.reason);
    }

    const notified = await this.runStage('notification', (signal) =>
      notifier.notify(anomaly, recommendation.value, proposal.value, signal)
    );
    if (!notified.ok) {
      return this.fail(anomaly, 'notification', 'change_proposed', notified.reason, proposal.value);
    }

    console.error(
      `[costguard] Processed: ${label} -> savings $${recommendation.value.savingsEstimate.toFixed(2)}/mo -> ${proposal.value}`
    );
    return {
      status: 'succeeded',
      anomaly,
      state: 'notified',
      recommendation: recommendation.value,
      proposalRef: proposal.value,
    };
  }

  // ─── Internal Helpers ──────────────────────────────────────

  private fail(
    anomaly: Anomaly,
    stage: PipelineStage,
    lastState: PipelineState,
    reason: string,
    proposalRef?: string
  ): FailedOutcome {
    console.error(
      `[costguard] Failed to process ${describeAnomaly(anomaly)} at ${stage} stage: ${reason}`
    );
    const outcome: FailedOutcome = { status: 'failed', anomaly, state: 'failed', stage, lastState, reason };
    if (proposalRef !== undefined) outcome.proposalRef = proposalRef;
    return outcome;
  }

  private async sendSummary(anomalies: readonly Anomaly[], summary: RunSummary): Promise<void> {
    const result = await this.runStage('summary', () =>
      this.collaborators.notifier.notifySummary(anomalies, summary.totalSavings, summary.succeeded)
    );
    if (!result.ok) {
      console.error(`[costguard] Summary notification failed: ${result.reason}`);
    }
  }

  /**
   * Call a collaborator with a timeout. The signal handed to the call is
   * aborted when the timeout fires; a late result is ignored.
   */
  private async runStage<T>(
    stage: PipelineStage | 'summary',
    call: (signal: AbortSignal) => Promise<T>
  ): Promise<StageResult<T>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new StageTimeoutError(stage, this.stageTimeoutMs));
        controller.abort();
      }, this.stageTimeoutMs);
    });

    try {
      const value = await Promise.race([call(controller.signal), timeout]);
      return { ok: true, value };
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Fold per-anomaly outcomes into run totals.
 */
export function summarizeOutcomes(outcomes: AnomalyOutcome[]): RunSummary {
  return outcomes.reduce<RunSummary>(
    (summary, outcome) => {
      if (outcome.status === 'succeeded') {
        summary.succeeded++;
        summary.totalSavings += outcome.recommendation.savingsEstimate;
      } else if (outcome.status === 'failed') {
        summary.failed++;
      } else {
        summary.skipped++;
      }
      return summary;
    },
    { total: outcomes.length, succeeded: 0, failed: 0, skipped: 0, totalSavings: 0, outcomes }
  );
}
