/**
 * Waste Scorer
 *
 * Deterministic 0-100 waste score for a compute resource from its CPU
 * utilization, instance type and state. Higher means more waste.
 * Pure functions, no I/O.
 */

export type WasteClass = 'critical' | 'high' | 'medium' | 'low' | 'none';

const IDLE_RUNNING_POINTS = 80;
const OVERPROVISIONED_POINTS = 50;
const LARGE_UNDERUSED_POINTS = 60;
const STOPPED_POINTS = 40;

const MAX_SCORE = 100;

/**
 * Rules are additive and independent, then clamped to 100:
 *   - running with cpu < 5%            +80
 *   - cpu < 20%                        +50
 *   - "xlarge" type with cpu < 30%     +60
 *   - stopped (volumes still billed)   +40
 */
export function calculateWasteScore(cpuUtil: number, instanceType: string, state: string): number {
  let score = 0;

  if (state === 'running' && cpuUtil < 5) score += IDLE_RUNNING_POINTS;
  if (cpuUtil < 20) score += OVERPROVISIONED_POINTS;
  if (instanceType.toLowerCase().includes('xlarge') && cpuUtil < 30) {
    score += LARGE_UNDERUSED_POINTS;
  }
  if (state === 'stopped') score += STOPPED_POINTS;

  return Math.min(score, MAX_SCORE);
}

/** Tier for a score; lower bounds are inclusive. */
export function classifyWaste(score: number): WasteClass {
  if (score >= 80) return 'critical';
  if (score >= 60) return 'high';
  if (score >= 40) return 'medium';
  if (score >= 20) return 'low';
  return 'none';
}
