import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runPipeline } from './pipeline.js';
import { runDetection } from './detection-engine.js';
import type { TimeSeriesSource } from '../store/types.js';
import type { Anomaly, Recommendation } from '../types/anomaly.js';

vi.mock('./detection-engine.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./detection-engine.js')>();
  return { ...actual, runDetection: vi.fn(actual.runDetection) };
});

const NOW = new Date('2026-03-10T12:00:00Z');

function makeSource(costs: Map<string, number[]>): TimeSeriesSource {
  return {
    open: vi.fn(() =>
      Promise.resolve({
        queryDailyCosts: vi.fn(() => Promise.resolve(costs)),
        queryResourceSnapshots: vi.fn(() => Promise.resolve([])),
        close: vi.fn(),
      })
    ),
  };
}

function makeCollaborators() {
  return {
    contextRetriever: { retrieve: vi.fn(async () => 'context') },
    recommendationGenerator: {
      generate: vi.fn(
        async (anomaly: Anomaly): Promise<Recommendation> => ({
          anomaly,
          rootCause: 'Batch job left running',
          actions: ['Stop the job'],
          changeProposal: '',
          savingsEstimate: 75,
          riskLevel: 'low',
          rollbackPlan: 'Restart the job',
          confidence: 0.8,
        })
      ),
    },
    proposalSink: { propose: vi.fn(async () => 'https://github.com/acme/infra/pull/7') },
    notifier: {
      notify: vi.fn(async (): Promise<void> => undefined),
      notifySummary: vi.fn(async (): Promise<void> => undefined),
    },
  };
}

describe('runPipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('remediates every detected anomaly', async () => {
    const collaborators = makeCollaborators();
    const source = makeSource(new Map([['EC2', [10, 10, 10, 10, 10, 10, 100]]]));

    const result = await runPipeline({ source, collaborators, now: () => NOW });

    expect(result.anomalies).toHaveLength(1);
    expect(result.anomalies[0]).toEqual(
      expect.objectContaining({ service: 'EC2', issueType: 'cost_spike', currentCost: 100 })
    );
    expect(result.summary.succeeded).toBe(1);
    expect(collaborators.notifier.notifySummary).toHaveBeenCalledWith(result.anomalies, 75, 1);
  });

  it('sends no summary when nothing is detected', async () => {
    const collaborators = makeCollaborators();

    const result = await runPipeline({ source: makeSource(new Map()), collaborators, now: () => NOW });

    expect(result.anomalies).toEqual([]);
    expect(result.summary.total).toBe(0);
    expect(collaborators.notifier.notifySummary).not.toHaveBeenCalled();
  });

  it('treats a failed detection pass as zero anomalies', async () => {
    vi.mocked(runDetection).mockRejectedValueOnce(new Error('invalid thresholds'));
    const collaborators = makeCollaborators();

    const result = await runPipeline({ source: makeSource(new Map()), collaborators });

    expect(result.anomalies).toEqual([]);
    expect(collaborators.contextRetriever.retrieve).not.toHaveBeenCalled();
    expect(collaborators.notifier.notifySummary).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      '[costguard] Detection pass failed: invalid thresholds'
    );
  });

  it('skips remediation when the run is already cancelled', async () => {
    const collaborators = makeCollaborators();
    const controller = new AbortController();
    controller.abort();
    const source = makeSource(new Map([['EC2', [10, 10, 10, 10, 10, 10, 100]]]));

    const result = await runPipeline({ source, collaborators, now: () => NOW }, controller.signal);

    expect(result.summary.skipped).toBe(1);
    expect(collaborators.contextRetriever.retrieve).not.toHaveBeenCalled();
  });
});
