import { describe, it, expect } from 'vitest';
import {
  formatAnomalyLine,
  formatAnomalyNotice,
  formatProposalTitle,
  formatSummaryNotice,
  generateDetectionReport,
  generateProposalBody,
  generateRunReport,
  runSummaryToRecord,
} from './report-generator.js';
import { createAnomaly } from '../types/anomaly.js';
import type { Recommendation } from '../types/anomaly.js';
import { summarizeOutcomes } from '../orchestrator/remediation.js';

const NOW = new Date('2026-03-10T12:00:00Z');

const spike = createAnomaly({
  service: 'Lambda',
  issueType: 'cost_spike',
  currentCost: 60,
  expectedCost: 24.8,
  timestamp: NOW,
});

const idle = createAnomaly({
  service: 'EC2',
  issueType: 'idle_resource',
  resourceId: 'i-0abc',
  account: '123456789012',
  region: 'us-east-1',
  currentCost: 140,
  wasteScore: 100,
  metrics: { cpu_utilization: 1.5, instance_type: 'm5.xlarge' },
  timestamp: NOW,
});

const rec: Recommendation = {
  anomaly: idle,
  rootCause: 'Instance left running after a load test',
  actions: ['Snapshot the volume', 'Stop the instance'],
  changeProposal: 'resource "aws_instance" "x" {}',
  savingsEstimate: 120,
  riskLevel: 'low',
  rollbackPlan: 'Start the instance again',
  confidence: 0.85,
};

describe('formatAnomalyLine', () => {
  it('shows increase over expected for a spike', () => {
    expect(formatAnomalyLine(spike)).toBe(
      '- **Cost spike** Lambda: $60.00 vs $24.80 expected (+141.9%)'
    );
  });

  it('shows waste for a resource finding', () => {
    expect(formatAnomalyLine(idle)).toBe(
      '- **Idle resource** EC2 `i-0abc`: $140.00/mo, waste score 100, ~$140.00/mo wasted'
    );
  });
});

describe('generateDetectionReport', () => {
  it('groups spikes and waste patterns', () => {
    const report = generateDetectionReport([spike, idle], NOW);

    expect(report.split('\n')).toEqual([
      '# Cost Anomaly Report - 2026-03-10',
      '',
      '**2 anomalies** (1 spikes, 1 waste patterns)',
      '',
      '## Cost Spikes',
      '',
      '- **Cost spike** Lambda: $60.00 vs $24.80 expected (+141.9%)',
      '',
      '## Waste Patterns',
      '',
      '- **Idle resource** EC2 `i-0abc`: $140.00/mo, waste score 100, ~$140.00/mo wasted',
      '',
      'Estimated waste: $140.00/mo',
    ]);
  });

  it('says so when nothing was found', () => {
    expect(generateDetectionReport([], NOW)).toBe(
      '# Cost Anomaly Report - 2026-03-10\n\n_No anomalies detected_'
    );
  });
});

describe('proposals', () => {
  it('titles the PR with target and savings', () => {
    expect(formatProposalTitle(rec)).toBe(
      '[costguard] Idle resource: EC2 i-0abc (save ~$120.00/mo)'
    );
  });

  it('renders every section of the PR body', () => {
    const body = generateProposalBody(rec);

    expect(body).toContain(
      '**Estimated savings:** $120.00/mo | **Risk:** low | **Confidence:** 85%'
    );
    expect(body).toContain('## Root Cause\n\nInstance left running after a load test\n');
    expect(body).toContain('## Actions\n\n1. Snapshot the volume\n2. Stop the instance\n');
    expect(body).toContain('## Rollback Plan\n\nStart the instance again\n');
    expect(body).toContain('- Region: us-east-1\n- cpu_utilization: 1.5\n- instance_type: m5.xlarge\n');
  });

  it('notes an empty action list', () => {
    expect(generateProposalBody({ ...rec, actions: [] })).toContain(
      '## Actions\n\n_No actions suggested_\n'
    );
  });
});

describe('notifications', () => {
  it('formats a per-anomaly notice', () => {
    expect(formatAnomalyNotice(idle, rec, 'https://github.com/acme/infra/pull/9')).toBe(
      [
        ':rotating_light: *Idle resource* on EC2 (i-0abc)',
        'Current cost: $140.00 | Expected: $0.00',
        'Root cause: Instance left running after a load test',
        'Savings: $120.00/mo | Risk: low | Confidence: 85%',
        'Proposal: https://github.com/acme/infra/pull/9',
      ].join('\n')
    );
  });

  it('formats the run summary with a per-type breakdown', () => {
    expect(formatSummaryNotice([spike, idle, idle], 240, 2)).toBe(
      [
        '*Cost detection summary*',
        '• 3 anomalies detected',
        '• 2 change proposals opened',
        '• $240.00/mo potential savings',
        '   - Cost spike: 1',
        '   - Idle resource: 2',
      ].join('\n')
    );
  });
});

describe('generateRunReport', () => {
  it('lists each outcome', () => {
    const summary = summarizeOutcomes([
      {
        status: 'succeeded',
        anomaly: idle,
        state: 'notified',
        recommendation: rec,
        proposalRef: 'https://github.com/acme/infra/pull/9',
      },
      {
        status: 'failed',
        anomaly: spike,
        state: 'failed',
        stage: 'recommendation',
        lastState: 'context_retrieved',
        reason: 'LLM API error: 529 Error',
      },
    ]);

    expect(generateRunReport(summary).split('\n')).toEqual([
      '# Remediation Run',
      '',
      '**1/2 succeeded** (1 failed, 0 skipped) | Savings: $120.00/mo',
      '',
      '- [x] **Idle resource** EC2 `i-0abc`: $140.00/mo, waste score 100, ~$140.00/mo wasted -> https://github.com/acme/infra/pull/9 ($120.00/mo)',
      '- [ ] **Cost spike** Lambda: $60.00 vs $24.80 expected (+141.9%) -> failed at recommendation: LLM API error: 529 Error',
    ]);
  });

  it('handles an empty run', () => {
    expect(generateRunReport(summarizeOutcomes([]))).toBe(
      '# Remediation Run\n\n_No anomalies to remediate_'
    );
  });
});

describe('runSummaryToRecord', () => {
  it('nests anomaly and recommendation records per outcome', () => {
    const record = runSummaryToRecord(
      summarizeOutcomes([
        {
          status: 'succeeded',
          anomaly: idle,
          state: 'notified',
          recommendation: rec,
          proposalRef: 'https://github.com/acme/infra/pull/9',
        },
        {
          status: 'failed',
          anomaly: spike,
          state: 'failed',
          stage: 'notification',
          lastState: 'change_proposed',
          reason: 'Slack webhook error: 500 Error',
          proposalRef: 'https://github.com/acme/infra/pull/10',
        },
        { status: 'skipped', anomaly: spike, state: 'received' },
      ])
    );

    expect(record).toEqual(
      expect.objectContaining({ total: 3, succeeded: 1, failed: 1, skipped: 1, total_savings: 120 })
    );
    expect(record.outcomes[0]?.recommendation).toEqual(
      expect.objectContaining({
        root_cause: 'Instance left running after a load test',
        terraform_code: 'resource "aws_instance" "x" {}',
        savings_estimate: 120,
        risk_level: 'low',
      })
    );
    expect(record.outcomes[0]?.recommendation?.anomaly.resource_id).toBe('i-0abc');
    expect(record.outcomes[0]?.proposal_ref).toBe('https://github.com/acme/infra/pull/9');
    expect(record.outcomes[1]).toEqual({
      status: 'failed',
      state: 'failed',
      anomaly: expect.objectContaining({ service: 'Lambda', increase_pct: 141.9 }),
      stage: 'notification',
      last_state: 'change_proposed',
      reason: 'Slack webhook error: 500 Error',
      proposal_ref: 'https://github.com/acme/infra/pull/10',
    });
    expect(record.outcomes[2]).toEqual({
      status: 'skipped',
      state: 'received',
      anomaly: expect.objectContaining({ service: 'Lambda' }),
    });
  });
});
