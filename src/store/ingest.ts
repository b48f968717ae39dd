/**
 * Ingest
 *
 * Loads a JSON export of daily costs and resource snapshots into the
 * cost store. Resources without a waste score are scored on the way in.
 *
 * Export shape:
 *   { "daily_costs": [{ service, day, cost, account? }],
 *     "resources":   [{ instance_id, instance_type, state, cpu_utilization, cost, ... }] }
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { calculateWasteScore } from '../insights/waste-scorer.js';
import type { CostStore, ResourceSnapshotPoint } from './cost-store.js';

const DailyCostSchema = z.object({
  service: z.string().min(1),
  day: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'day must be YYYY-MM-DD'),
  cost: z.number().nonnegative(),
  account: z.string().optional(),
});

const ResourceSchema = z.object({
  instance_id: z.string().min(1),
  service: z.string().min(1).default('EC2'),
  account: z.string().default(''),
  region: z.string().default(''),
  instance_type: z.string().min(1),
  state: z.string().min(1),
  cpu_utilization: z.number().min(0).max(100),
  cost: z.number().nonnegative(),
  waste_score: z.number().int().min(0).max(100).optional(),
  observed_at: z.string().datetime({ offset: true }).optional(),
});

const ExportSchema = z.object({
  daily_costs: z.array(DailyCostSchema).default([]),
  resources: z.array(ResourceSchema).default([]),
});

export interface IngestResult {
  dailyCosts: number;
  resources: number;
}

/**
 * Validate an export and write it to the store.
 * Throws the zod error when the export is malformed. Both tables are written
 * in one transaction, so a failed write leaves the store unchanged.
 */
export function ingestExport(store: CostStore, data: unknown, now: Date = new Date()): IngestResult {
  const parsed = ExportSchema.parse(data);
  const observedAt = now.toISOString();

  const snapshots: ResourceSnapshotPoint[] = parsed.resources.map((r) => ({
    instanceId: r.instance_id,
    service: r.service,
    account: r.account,
    region: r.region,
    instanceType: r.instance_type,
    state: r.state,
    cpuUtilization: r.cpu_utilization,
    cost: r.cost,
    wasteScore: r.waste_score ?? calculateWasteScore(r.cpu_utilization, r.instance_type, r.state),
    observedAt: r.observed_at ? new Date(r.observed_at).toISOString() : observedAt,
  }));

  return store.recordExport(parsed.daily_costs, snapshots);
}

/**
 * Read an export file from disk and ingest it.
 */
export function ingestFile(store: CostStore, filePath: string, now: Date = new Date()): IngestResult {
  const raw = readFileSync(filePath, 'utf-8');
  const data: unknown = JSON.parse(raw);
  return ingestExport(store, data, now);
}
