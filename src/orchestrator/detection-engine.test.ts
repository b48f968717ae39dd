import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runDetection } from './detection-engine.js';
import { TimeSeriesUnavailableError } from '../store/types.js';
import type { TimeSeriesSession, TimeSeriesSource } from '../store/types.js';

const NOW = new Date('2026-03-10T12:00:00Z');

const SPIKING = new Map([['EC2', [10, 10, 10, 10, 10, 10, 100]]]);

const IDLE_RECORD = {
  instance_id: 'i-0abc',
  instance_type: 'm5.xlarge',
  state: 'running',
  cpu_utilization: 1,
  cost: 140,
  waste_score: 100,
};

interface FakeSessionOptions {
  costs?: Map<string, number[]> | Error;
  snapshots?: unknown[] | Error;
}

function makeSession(options: FakeSessionOptions = {}): TimeSeriesSession {
  const costs = options.costs ?? new Map<string, number[]>();
  const snapshots = options.snapshots ?? [];
  return {
    queryDailyCosts: vi.fn(() =>
      costs instanceof Error ? Promise.reject(costs) : Promise.resolve(costs)
    ),
    queryResourceSnapshots: vi.fn(() =>
      snapshots instanceof Error ? Promise.reject(snapshots) : Promise.resolve(snapshots)
    ),
    close: vi.fn(),
  };
}

/** A source that hands out the given sessions (or errors) in order. */
function makeSource(...sessions: Array<TimeSeriesSession | Error>): TimeSeriesSource {
  const queue = [...sessions];
  return {
    open: vi.fn(() => {
      const next = queue.shift() ?? new Error('no session left');
      return next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
    }),
  };
}

describe('detection-engine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('concatenates spikes then waste patterns', async () => {
    const spikeSession = makeSession({ costs: SPIKING, snapshots: [IDLE_RECORD] });
    const wasteSession = makeSession({ costs: SPIKING, snapshots: [IDLE_RECORD] });

    const anomalies = await runDetection(makeSource(spikeSession, wasteSession), { now: NOW });

    expect(anomalies.map((a) => a.issueType)).toEqual(['cost_spike', 'idle_resource']);
  });

  it('opens and closes one session per detector', async () => {
    const first = makeSession();
    const second = makeSession();
    const source = makeSource(first, second);

    await runDetection(source, { now: NOW });

    expect(source.open).toHaveBeenCalledTimes(2);
    expect(first.close).toHaveBeenCalledTimes(1);
    expect(second.close).toHaveBeenCalledTimes(1);
  });

  it('does not deduplicate the same service across detectors', async () => {
    const session = () =>
      makeSession({
        costs: SPIKING,
        snapshots: [{ ...IDLE_RECORD, service: 'EC2' }],
      });

    const anomalies = await runDetection(makeSource(session(), session()), { now: NOW });

    expect(anomalies).toHaveLength(2);
    expect(anomalies.every((a) => a.service === 'EC2')).toBe(true);
  });

  it('keeps waste results when the spike query fails', async () => {
    const broken = new TimeSeriesUnavailableError('timeout');
    const anomalies = await runDetection(
      makeSource(
        makeSession({ costs: broken, snapshots: broken }),
        makeSession({ costs: broken, snapshots: [IDLE_RECORD] })
      ),
      { now: NOW }
    );

    expect(anomalies).toHaveLength(1);
    expect(anomalies[0]?.issueType).toBe('idle_resource');
  });

  it('keeps spike results when a session cannot be opened', async () => {
    const anomalies = await runDetection(
      makeSource(makeSession({ costs: SPIKING }), new TimeSeriesUnavailableError('down')),
      { now: NOW }
    );

    expect(anomalies).toHaveLength(1);
    expect(anomalies[0]?.issueType).toBe('cost_spike');
  });

  it('returns empty when the store is unreachable', async () => {
    const down = new TimeSeriesUnavailableError('down');
    await expect(runDetection(makeSource(down, down))).resolves.toEqual([]);
  });

  it('closes the session even when the detector throws', async () => {
    const session = makeSession();
    vi.mocked(session.queryDailyCosts).mockImplementation(() => {
      throw new Error('synchronous failure');
    });

    const anomalies = await runDetection(makeSource(session, makeSession()), { now: NOW });

    expect(anomalies).toEqual([]);
    expect(session.close).toHaveBeenCalledTimes(1);
  });
});
