/**
 * Detection Engine
 *
 * Runs the spike detector and the waste-pattern classifier against the
 * time-series source and concatenates their findings (spikes first).
 * Each detector gets its own session, so one failing never blocks the other.
 * No deduplication: a resource can be both a spike and a waste pattern.
 */

import type { ThresholdConfig } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import { detectCostSpikes } from '../insights/spike-detector.js';
import { detectWastePatterns } from '../insights/waste-classifier.js';
import type { TimeSeriesSession, TimeSeriesSource } from '../store/types.js';
import type { Anomaly } from '../types/anomaly.js';

export interface DetectionOptions {
  thresholds?: Required<ThresholdConfig>;
  now?: Date;
}

type Detector = (
  session: TimeSeriesSession,
  thresholds: Required<ThresholdConfig>,
  now: Date
) => Promise<Anomaly[]>;

/**
 * Detect anomalies in current data.
 * Never rejects: unavailable data yields fewer (or zero) anomalies.
 */
export async function runDetection(
  source: TimeSeriesSource,
  options: DetectionOptions = {}
): Promise<Anomaly[]> {
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const now = options.now ?? new Date();

  console.error('[costguard] Starting anomaly detection pass');

  const [spikes, waste] = await Promise.all([
    runDetector('cost spike', detectCostSpikes, source, thresholds, now),
    runDetector('waste pattern', detectWastePatterns, source, thresholds, now),
  ]);

  console.error(
    `[costguard] Detection complete: ${spikes.length + waste.length} total anomalies (${spikes.length} spikes, ${waste.length} waste)`
  );

  return [...spikes, ...waste];
}

// ─── Internal Helpers ────────────────────────────────────────

/**
 * Open a session, run one detector, and always close the session.
 */
async function runDetector(
  label: string,
  detector: Detector,
  source: TimeSeriesSource,
  thresholds: Required<ThresholdConfig>,
  now: Date
): Promise<Anomaly[]> {
  let session: TimeSeriesSession;
  try {
    session = await source.open();
  } catch (error) {
    console.error(`[costguard] ${label} detection skipped, store unavailable: ${errorMessage(error)}`);
    return [];
  }

  try {
    return await detector(session, thresholds, now);
  } catch (error) {
    console.error(`[costguard] ${label} detection failed: ${errorMessage(error)}`);
    return [];
  } finally {
    closeQuietly(session, label);
  }
}

function closeQuietly(session: TimeSeriesSession, label: string): void {
  try {
    session.close();
  } catch (error) {
    console.error(`[costguard] Failed to close ${label} session: ${errorMessage(error)}`);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
