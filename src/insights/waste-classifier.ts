/**
 * Waste-Pattern Classifier
 *
 * Turns high-waste resource snapshots into anomalies. Snapshots arrive
 * pre-filtered by waste score; each one is validated, then classified
 * into exactly one issue type.
 */

import type { ThresholdConfig } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import type { TimeSeriesSession } from '../store/types.js';
import { createAnomaly } from '../types/anomaly.js';
import type { Anomaly, AnomalyType } from '../types/anomaly.js';
import { ResourceSnapshotSchema } from '../validators.js';
import type { ResourceSnapshot } from '../validators.js';

export type WasteIssueType = Extract<
  AnomalyType,
  'stopped_but_billed' | 'idle_resource' | 'overprovisioned'
>;

/**
 * Precedence is fixed: a stopped resource is stopped_but_billed even
 * when its CPU also reads as idle.
 */
export function classifyWasteIssue(
  snapshot: Pick<ResourceSnapshot, 'state' | 'cpu_utilization'>,
  idleCpuPercent: number = DEFAULT_THRESHOLDS.idleCpuPercent
): WasteIssueType {
  if (snapshot.state === 'stopped') return 'stopped_but_billed';
  if (snapshot.cpu_utilization < idleCpuPercent) return 'idle_resource';
  return 'overprovisioned';
}

export function snapshotToAnomaly(
  snapshot: ResourceSnapshot,
  idleCpuPercent: number = DEFAULT_THRESHOLDS.idleCpuPercent,
  now: Date = new Date()
): Anomaly {
  return createAnomaly({
    service: snapshot.service,
    issueType: classifyWasteIssue(snapshot, idleCpuPercent),
    resourceId: snapshot.instance_id,
    currentCost: snapshot.cost,
    wasteScore: snapshot.waste_score,
    account: snapshot.account,
    region: snapshot.region,
    metrics: {
      cpu_utilization: snapshot.cpu_utilization,
      instance_type: snapshot.instance_type,
      state: snapshot.state,
    },
    timestamp: now,
  });
}

export interface ClassifiedSnapshots {
  anomalies: Anomaly[];
  /** Records missing required fields; reported, never defaulted. */
  rejected: Array<{ resourceId: string; reason: string }>;
}

/**
 * Validate and classify raw snapshot records.
 */
export function classifySnapshots(
  records: readonly unknown[],
  idleCpuPercent: number = DEFAULT_THRESHOLDS.idleCpuPercent,
  now: Date = new Date()
): ClassifiedSnapshots {
  const anomalies: Anomaly[] = [];
  const rejected: ClassifiedSnapshots['rejected'] = [];

  for (const record of records) {
    const result = ResourceSnapshotSchema.safeParse(record);
    if (!result.success) {
      const reason = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      rejected.push({ resourceId: resourceIdOf(record), reason });
      continue;
    }
    anomalies.push(snapshotToAnomaly(result.data, idleCpuPercent, now));
  }

  return { anomalies, rejected };
}

/**
 * Query high-waste snapshots and classify them.
 * A failed query is logged and treated as "nothing observed".
 */
export async function detectWastePatterns(
  session: TimeSeriesSession,
  thresholds: Required<ThresholdConfig> = DEFAULT_THRESHOLDS,
  now: Date = new Date()
): Promise<Anomaly[]> {
  let records: unknown[];
  try {
    records = await session.queryResourceSnapshots(
      thresholds.wasteScoreThreshold,
      thresholds.snapshotWindowHours
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[costguard] Waste pattern query failed: ${message}`);
    return [];
  }

  const { anomalies, rejected } = classifySnapshots(records, thresholds.idleCpuPercent, now);

  for (const r of rejected) {
    console.error(`[costguard] Skipping malformed snapshot ${r.resourceId || '(unknown)'}: ${r.reason}`);
  }
  for (const a of anomalies) {
    console.error(`[costguard] Waste pattern detected: ${a.issueType} ${a.resourceId} waste=${a.wasteScore}`);
  }
  console.error(`[costguard] Waste detection found ${anomalies.length} anomalies`);

  return anomalies;
}

function resourceIdOf(record: unknown): string {
  if (typeof record === 'object' && record !== null && 'instance_id' in record) {
    const id = record.instance_id;
    return typeof id === 'string' ? id : '';
  }
  return '';
}
