/**
 * Report Generator
 *
 * Turns anomalies, recommendations and run outcomes into Markdown (CLI,
 * MCP tools, pull request bodies) and Slack mrkdwn (notifications).
 * All functions are synchronous: no I/O, no API calls.
 */

import type {
  Anomaly,
  AnomalyRecord,
  AnomalyType,
  Recommendation,
  RecommendationRecord,
} from '../types/anomaly.js';
import {
  anomalyToRecord,
  estimatedMonthlyWaste,
  increasePct,
  recommendationToRecord,
} from '../types/anomaly.js';
import type { AnomalyOutcome, RunSummary } from '../orchestrator/remediation.js';

const ISSUE_LABELS: Record<AnomalyType, string> = {
  cost_spike: 'Cost spike',
  idle_resource: 'Idle resource',
  overprovisioned: 'Overprovisioned',
  stopped_but_billed: 'Stopped but billed',
  waste_pattern: 'Waste pattern',
};

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

function resourceLabel(anomaly: Anomaly): string {
  return anomaly.resourceId ? `${anomaly.service} \`${anomaly.resourceId}\`` : anomaly.service;
}

/**
 * One Markdown bullet per anomaly.
 */
export function formatAnomalyLine(anomaly: Anomaly): string {
  const label = ISSUE_LABELS[anomaly.issueType];
  if (anomaly.issueType === 'cost_spike') {
    return `- **${label}** ${resourceLabel(anomaly)}: ${money(anomaly.currentCost)} vs ${money(anomaly.expectedCost)} expected (+${increasePct(anomaly).toFixed(1)}%)`;
  }
  return `- **${label}** ${resourceLabel(anomaly)}: ${money(anomaly.currentCost)}/mo, waste score ${anomaly.wasteScore}, ~${money(estimatedMonthlyWaste(anomaly))}/mo wasted`;
}

/**
 * Detection report: spikes and waste patterns in separate sections.
 */
export function generateDetectionReport(anomalies: readonly Anomaly[], now: Date = new Date()): string {
  const parts: string[] = [];
  parts.push(`# Cost Anomaly Report - ${now.toISOString().slice(0, 10)}`);
  parts.push('');

  if (anomalies.length === 0) {
    parts.push('_No anomalies detected_');
    return parts.join('\n');
  }

  const spikes = anomalies.filter((a) => a.issueType === 'cost_spike');
  const waste = anomalies.filter((a) => a.issueType !== 'cost_spike');
  const wastedPerMonth = waste.reduce((sum, a) => sum + estimatedMonthlyWaste(a), 0);

  parts.push(
    `**${anomalies.length} anomalies** (${spikes.length} spikes, ${waste.length} waste patterns)`
  );
  parts.push('');

  if (spikes.length > 0) {
    parts.push('## Cost Spikes');
    parts.push('');
    for (const a of spikes) parts.push(formatAnomalyLine(a));
    parts.push('');
  }

  if (waste.length > 0) {
    parts.push('## Waste Patterns');
    parts.push('');
    for (const a of waste) parts.push(formatAnomalyLine(a));
    parts.push('');
    parts.push(`Estimated waste: ${money(wastedPerMonth)}/mo`);
    parts.push('');
  }

  return parts.join('\n').trimEnd();
}

// ─── Change Proposals ───────────────────────────────────────

export function formatProposalTitle(rec: Recommendation): string {
  const { anomaly } = rec;
  const target = anomaly.resourceId ? `${anomaly.service} ${anomaly.resourceId}` : anomaly.service;
  return `[costguard] ${ISSUE_LABELS[anomaly.issueType]}: ${target} (save ~${money(rec.savingsEstimate)}/mo)`;
}

/**
 * Pull request body for a recommendation.
 */
export function generateProposalBody(rec: Recommendation): string {
  const { anomaly } = rec;
  const parts: string[] = [];

  parts.push('## Summary');
  parts.push('');
  parts.push(formatAnomalyLine(anomaly));
  parts.push('');
  parts.push(
    `**Estimated savings:** ${money(rec.savingsEstimate)}/mo | **Risk:** ${rec.riskLevel} | **Confidence:** ${percent(rec.confidence)}`
  );
  parts.push('');

  parts.push('## Root Cause');
  parts.push('');
  parts.push(rec.rootCause);
  parts.push('');

  parts.push('## Actions');
  parts.push('');
  if (rec.actions.length > 0) {
    rec.actions.forEach((action, i) => parts.push(`${i + 1}. ${action}`));
  } else {
    parts.push('_No actions suggested_');
  }
  parts.push('');

  parts.push('## Rollback Plan');
  parts.push('');
  parts.push(rec.rollbackPlan);
  parts.push('');

  parts.push('## Anomaly Details');
  parts.push('');
  parts.push(`- Service: ${anomaly.service}`);
  if (anomaly.resourceId) parts.push(`- Resource: ${anomaly.resourceId}`);
  if (anomaly.account) parts.push(`- Account: ${anomaly.account}`);
  if (anomaly.region) parts.push(`- Region: ${anomaly.region}`);
  for (const [key, value] of Object.entries(anomaly.metrics)) {
    parts.push(`- ${key}: ${String(value)}`);
  }
  parts.push(`- Detected: ${anomaly.timestamp}`);
  parts.push('');
  parts.push('---');
  parts.push('_Review the plan output before merging._');

  return parts.join('\n');
}

// ─── Notifications (Slack mrkdwn) ───────────────────────────

export function formatAnomalyNotice(
  anomaly: Anomaly,
  rec: Recommendation,
  proposalRef: string
): string {
  const target = anomaly.resourceId ? `${anomaly.service} (${anomaly.resourceId})` : anomaly.service;
  return [
    `:rotating_light: *${ISSUE_LABELS[anomaly.issueType]}* on ${target}`,
    `Current cost: ${money(anomaly.currentCost)} | Expected: ${money(anomaly.expectedCost)}`,
    `Root cause: ${rec.rootCause}`,
    `Savings: ${money(rec.savingsEstimate)}/mo | Risk: ${rec.riskLevel} | Confidence: ${percent(rec.confidence)}`,
    `Proposal: ${proposalRef}`,
  ].join('\n');
}

export function formatSummaryNotice(
  anomalies: readonly Anomaly[],
  totalSavings: number,
  successCount: number
): string {
  const counts = new Map<AnomalyType, number>();
  for (const a of anomalies) {
    counts.set(a.issueType, (counts.get(a.issueType) ?? 0) + 1);
  }

  const lines = [
    '*Cost detection summary*',
    `• ${anomalies.length} anomalies detected`,
    `• ${successCount} change proposals opened`,
    `• ${money(totalSavings)}/mo potential savings`,
  ];
  for (const [type, count] of counts) {
    lines.push(`   - ${ISSUE_LABELS[type]}: ${count}`);
  }
  return lines.join('\n');
}

// ─── Run Summary ────────────────────────────────────────────

function formatOutcomeLine(outcome: AnomalyOutcome): string {
  const head = formatAnomalyLine(outcome.anomaly).slice(2);
  switch (outcome.status) {
    case 'succeeded':
      return `- [x] ${head} -> ${outcome.proposalRef} (${money(outcome.recommendation.savingsEstimate)}/mo)`;
    case 'failed':
      return `- [ ] ${head} -> failed at ${outcome.stage}: ${outcome.reason}`;
    case 'skipped':
      return `- [ ] ${head} -> skipped`;
  }
}

/**
 * Markdown summary of a remediation run.
 */
export function generateRunReport(summary: RunSummary): string {
  const parts: string[] = [];
  parts.push('# Remediation Run');
  parts.push('');

  if (summary.total === 0) {
    parts.push('_No anomalies to remediate_');
    return parts.join('\n');
  }

  parts.push(
    `**${summary.succeeded}/${summary.total} succeeded** (${summary.failed} failed, ${summary.skipped} skipped) | Savings: ${money(summary.totalSavings)}/mo`
  );
  parts.push('');
  for (const outcome of summary.outcomes) {
    parts.push(formatOutcomeLine(outcome));
  }
  return parts.join('\n');
}

// ─── JSON Records ───────────────────────────────────────────

export interface OutcomeRecord {
  status: AnomalyOutcome['status'];
  state: AnomalyOutcome['state'];
  anomaly: AnomalyRecord;
  recommendation?: RecommendationRecord;
  proposal_ref?: string;
  stage?: string;
  last_state?: string;
  reason?: string;
}

export interface RunSummaryRecord {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  total_savings: number;
  outcomes: OutcomeRecord[];
}

function outcomeToRecord(outcome: AnomalyOutcome): OutcomeRecord {
  const base = { status: outcome.status, state: outcome.state, anomaly: anomalyToRecord(outcome.anomaly) };
  switch (outcome.status) {
    case 'succeeded':
      return {
        ...base,
        recommendation: recommendationToRecord(outcome.recommendation),
        proposal_ref: outcome.proposalRef,
      };
    case 'failed':
      return {
        ...base,
        stage: outcome.stage,
        last_state: outcome.lastState,
        reason: outcome.reason,
        ...(outcome.proposalRef ? { proposal_ref: outcome.proposalRef } : {}),
      };
    case 'skipped':
      return base;
  }
}

/**
 * Snake_case form of a run summary for `--json` output.
 */
export function runSummaryToRecord(summary: RunSummary): RunSummaryRecord {
  return {
    total: summary.total,
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped,
    total_savings: summary.totalSavings,
    outcomes: summary.outcomes.map(outcomeToRecord),
  };
}
