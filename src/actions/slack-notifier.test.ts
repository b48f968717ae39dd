import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LogNotifier, SlackNotifier, SlackNotifierError } from './slack-notifier.js';
import { createAnomaly } from '../types/anomaly.js';
import type { Recommendation } from '../types/anomaly.js';
import { formatAnomalyNotice, formatSummaryNotice } from '../generators/report-generator.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function textResponse(status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: new Headers(),
  } as Response;
}

const WEBHOOK = 'https://hooks.slack.test/services/T000/B000/test-secret';

const anomaly = createAnomaly({
  service: 'RDS',
  issueType: 'stopped_but_billed',
  resourceId: 'db-1',
  currentCost: 80,
  wasteScore: 60,
});

const rec: Recommendation = {
  anomaly,
  rootCause: 'Snapshot storage still billed',
  actions: [],
  changeProposal: '',
  savingsEstimate: 40,
  riskLevel: 'medium',
  rollbackPlan: 'Restore from snapshot',
  confidence: 0.6,
};

describe('SlackNotifier', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('posts the anomaly notice as text', async () => {
    mockFetch.mockResolvedValue(textResponse());

    await new SlackNotifier(WEBHOOK).notify(anomaly, rec, 'https://github.com/acme/infra/pull/3');

    expect(mockFetch).toHaveBeenCalledWith(
      WEBHOOK,
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({
          text: formatAnomalyNotice(anomaly, rec, 'https://github.com/acme/infra/pull/3'),
        }),
      })
    );
  });

  it('posts the summary notice', async () => {
    mockFetch.mockResolvedValue(textResponse());

    await new SlackNotifier(WEBHOOK).notifySummary([anomaly], 40, 1);

    expect(mockFetch).toHaveBeenCalledWith(
      WEBHOOK,
      expect.objectContaining({
        body: JSON.stringify({ text: formatSummaryNotice([anomaly], 40, 1) }),
      })
    );
  });

  it('throws SlackNotifierError on a non-2xx response', async () => {
    mockFetch.mockResolvedValue(textResponse(404));

    const error: unknown = await new SlackNotifier(WEBHOOK)
      .notifySummary([anomaly], 0, 0)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SlackNotifierError);
    expect(error).toEqual(expect.objectContaining({ statusCode: 404 }));
  });
});

describe('LogNotifier', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes notices to stderr', async () => {
    await new LogNotifier().notifySummary([anomaly], 40, 1);

    expect(console.error).toHaveBeenCalledWith(
      `[costguard] ${formatSummaryNotice([anomaly], 40, 1)}`
    );
  });
});
