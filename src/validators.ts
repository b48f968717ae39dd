/**
 * Zod schemas for data that arrives from outside the process:
 * resource snapshots from the time-series store and recommendation
 * payloads from the reasoning service.
 *
 * Recommendation fields use .default() so a partial answer still yields a
 * usable recommendation; a wrong type is a parse failure.
 */

import { z } from 'zod';
import { RISK_LEVELS } from './types/anomaly.js';
import type { Anomaly, Recommendation, RiskLevel } from './types/anomaly.js';

export class RecommendationParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecommendationParseError';
  }
}

// ─── Resource Snapshots ─────────────────────────────────────

export const ResourceSnapshotSchema = z.object({
  instance_id: z.string().default(''),
  service: z.string().min(1).default('EC2'),
  account: z.string().default(''),
  region: z.string().default(''),
  instance_type: z.string(),
  state: z.string(),
  cpu_utilization: z.number().min(0).max(100),
  cost: z.number().nonnegative(),
  waste_score: z.number().int().min(0).max(100).default(0),
});

export type ResourceSnapshot = z.infer<typeof ResourceSnapshotSchema>;

// ─── Recommendations ────────────────────────────────────────

function isRiskLevel(value: string): value is RiskLevel {
  return RISK_LEVELS.some((level) => level === value);
}

const RiskLevelSchema = z.unknown().transform((value): RiskLevel => {
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (isRiskLevel(lower)) return lower;
  }
  return 'medium';
});

const NumericSchema = z.union([z.number(), z.string()]).transform(Number);

const RecommendationPayloadSchema = z.object({
  root_cause: z.string().default('Unable to determine root cause'),
  actions: z.array(z.string()).default([]),
  terraform_code: z.string().optional(),
  change_proposal: z.string().optional(),
  savings_estimate: NumericSchema.pipe(z.number().finite().nonnegative()).default(0),
  risk_level: RiskLevelSchema,
  rollback_plan: z.string().default('Revert the change and apply'),
  confidence: NumericSchema.pipe(z.number().min(0).max(1)).default(0.5),
});

/**
 * Validate a recommendation payload and attach it to its anomaly.
 * Throws RecommendationParseError when the payload is not usable.
 */
export function parseRecommendation(anomaly: Anomaly, payload: unknown): Recommendation {
  const result = RecommendationPayloadSchema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RecommendationParseError(`Malformed recommendation payload: ${issues}`);
  }

  const data = result.data;
  return Object.freeze({
    anomaly,
    rootCause: data.root_cause,
    actions: Object.freeze([...data.actions]),
    changeProposal: data.terraform_code ?? data.change_proposal ?? '',
    savingsEstimate: data.savings_estimate,
    riskLevel: data.risk_level,
    rollbackPlan: data.rollback_plan,
    confidence: data.confidence,
  });
}
