/**
 * Cost Spike Detector
 *
 * Flags entities whose latest daily cost sits more than
 * sigmaMultiplier standard deviations above the trailing-window mean.
 * analyzeCostSeries is pure; detectCostSpikes wraps it around a store query.
 */

import type { ThresholdConfig } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import type { TimeSeriesSession } from '../store/types.js';
import { createAnomaly } from '../types/anomaly.js';
import type { Anomaly } from '../types/anomaly.js';

export interface SeriesStats {
  mean: number;
  stdDev: number;
}

/** Population mean and standard deviation. */
export function seriesStats(values: readonly number[]): SeriesStats {
  if (values.length === 0) return { mean: 0, stdDev: 0 };
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
  return { mean, stdDev: Math.sqrt(variance) };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Test one entity's series (oldest first).
 * Returns null for short series, flat series and non-spikes.
 */
export function analyzeCostSeries(
  entity: string,
  costs: readonly number[],
  thresholds: Required<ThresholdConfig> = DEFAULT_THRESHOLDS,
  now: Date = new Date()
): Anomaly | null {
  const window = costs.slice(-thresholds.windowDays);
  if (window.length < thresholds.minObservations) return null;

  const latest = window[window.length - 1];
  if (latest === undefined) return null;

  const { mean, stdDev } = seriesStats(window);
  const threshold = mean + thresholds.sigmaMultiplier * stdDev;

  // A flat series never spikes
  if (stdDev <= 0 || latest <= threshold) return null;

  return createAnomaly({
    service: entity,
    issueType: 'cost_spike',
    currentCost: latest,
    expectedCost: round2(mean),
    metrics: {
      mean_30d: round2(mean),
      std_dev: round2(stdDev),
      threshold: round2(threshold),
      days_analyzed: window.length,
    },
    timestamp: now,
  });
}

/**
 * Run spike detection over every service in the store.
 * A failed query is logged and treated as "nothing observed".
 */
export async function detectCostSpikes(
  session: TimeSeriesSession,
  thresholds: Required<ThresholdConfig> = DEFAULT_THRESHOLDS,
  now: Date = new Date()
): Promise<Anomaly[]> {
  let series: Map<string, number[]>;
  try {
    series = await session.queryDailyCosts('service', thresholds.windowDays);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[costguard] Cost spike query failed: ${message}`);
    return [];
  }

  const anomalies: Anomaly[] = [];
  for (const [entity, costs] of series) {
    const anomaly = analyzeCostSeries(entity, costs, thresholds, now);
    if (anomaly) {
      console.error(
        `[costguard] Cost spike detected: ${entity} $${anomaly.currentCost.toFixed(2)} (threshold $${String(anomaly.metrics['threshold'])})`
      );
      anomalies.push(anomaly);
    }
  }

  console.error(`[costguard] Cost spike detection found ${anomalies.length} anomalies`);
  return anomalies;
}
