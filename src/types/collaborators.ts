/**
 * Collaborator Contracts
 *
 * The external services the remediation pipeline calls. Every call that
 * may block takes an AbortSignal that fires when the stage times out.
 */

import type { Anomaly, Recommendation } from './anomaly.js';

export interface ContextRetriever {
  /** Best-effort: resolves with fallback text instead of rejecting. */
  retrieve(anomaly: Anomaly, signal?: AbortSignal): Promise<string>;
}

export interface RecommendationGenerator {
  /** Rejects on transport failure or a malformed answer. */
  generate(anomaly: Anomaly, context: string, signal?: AbortSignal): Promise<Recommendation>;
}

export interface ChangeProposalSink {
  /** Returns a reference to the created proposal (e.g. a PR URL). */
  propose(recommendation: Recommendation, signal?: AbortSignal): Promise<string>;
}

export interface Notifier {
  notify(
    anomaly: Anomaly,
    recommendation: Recommendation,
    proposalRef: string,
    signal?: AbortSignal
  ): Promise<void>;
  notifySummary(
    anomalies: readonly Anomaly[],
    totalSavings: number,
    successCount: number
  ): Promise<void>;
}

export interface RemediationCollaborators {
  contextRetriever: ContextRetriever;
  recommendationGenerator: RecommendationGenerator;
  proposalSink: ChangeProposalSink;
  notifier: Notifier;
}
