/**
 * Detection Thresholds
 *
 * Defines all detection thresholds in one place.
 * Any subset can be overridden via config.json settings.thresholds;
 * missing overrides fall back to defaults.
 */

export interface ThresholdConfig {
  /** Observations required before a series is analyzed. */
  minObservations?: number;
  /** Trailing window of daily costs, in days. */
  windowDays?: number;
  /** A spike is latest > mean + sigmaMultiplier * stddev. */
  sigmaMultiplier?: number;
  /** Resource snapshots at or below this waste score are ignored. */
  wasteScoreThreshold?: number;
  snapshotWindowHours?: number;
  /** CPU percent under which a running resource counts as idle. */
  idleCpuPercent?: number;
}

export const DEFAULT_THRESHOLDS: Required<ThresholdConfig> = {
  minObservations: 7,
  windowDays: 30,
  sigmaMultiplier: 2,
  wasteScoreThreshold: 70,
  snapshotWindowHours: 24,
  idleCpuPercent: 5,
};

/**
 * Merge user overrides onto defaults.
 * Returns a fully-resolved config with no optional fields.
 */
export function resolveThresholds(overrides?: ThresholdConfig): Required<ThresholdConfig> {
  if (!overrides) return { ...DEFAULT_THRESHOLDS };
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return { ...DEFAULT_THRESHOLDS, ...defined };
}
