/**
 * Anomaly Types
 *
 * The record that flows from detection through remediation, and the
 * recommendation produced for it. Both are plain frozen objects; derived
 * values are computed by the helpers below, never stored.
 */

export const ANOMALY_TYPES = [
  'cost_spike',
  'idle_resource',
  'overprovisioned',
  'stopped_but_billed',
  'waste_pattern',
] as const;

export type AnomalyType = (typeof ANOMALY_TYPES)[number];

export const RISK_LEVELS = ['low', 'medium', 'high'] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

export type MetricValue = string | number | boolean;

/** A single detected deviation awaiting remediation. */
export interface Anomaly {
  readonly service: string;
  readonly issueType: AnomalyType;
  readonly resourceId: string;
  readonly account: string;
  readonly region: string;
  readonly currentCost: number;
  readonly expectedCost: number;
  /** 0-100, only non-zero for resource-level findings. */
  readonly wasteScore: number;
  readonly metrics: Readonly<Record<string, MetricValue>>;
  readonly timestamp: string;
}

export interface AnomalyInput {
  service: string;
  issueType: AnomalyType;
  currentCost: number;
  resourceId?: string;
  account?: string;
  region?: string;
  expectedCost?: number;
  wasteScore?: number;
  metrics?: Record<string, MetricValue>;
  timestamp?: Date;
}

/** Structured fix proposal for one anomaly. */
export interface Recommendation {
  readonly anomaly: Anomaly;
  readonly rootCause: string;
  readonly actions: readonly string[];
  /** Generated infrastructure-as-code; never parsed here. */
  readonly changeProposal: string;
  readonly savingsEstimate: number;
  readonly riskLevel: RiskLevel;
  readonly rollbackPlan: string;
  readonly confidence: number;
}

export function createAnomaly(input: AnomalyInput): Anomaly {
  return Object.freeze({
    service: input.service,
    issueType: input.issueType,
    resourceId: input.resourceId ?? '',
    account: input.account ?? '',
    region: input.region ?? '',
    currentCost: input.currentCost,
    expectedCost: input.expectedCost ?? 0,
    wasteScore: input.wasteScore ?? 0,
    metrics: Object.freeze({ ...input.metrics }),
    timestamp: (input.timestamp ?? new Date()).toISOString(),
  });
}

/** Percentage above the expected cost; 0 when there is no baseline. */
export function increasePct(anomaly: Anomaly): number {
  if (anomaly.expectedCost <= 0) return 0;
  return ((anomaly.currentCost - anomaly.expectedCost) / anomaly.expectedCost) * 100;
}

export function estimatedMonthlyWaste(anomaly: Anomaly): number {
  return anomaly.currentCost * (anomaly.wasteScore / 100);
}

/**
 * Stable identity for branch and file names:
 * `service_resourceId`, or `service_issueType` when there is no resource.
 */
export function anomalyKey(anomaly: Anomaly): string {
  return `${anomaly.service}_${anomaly.resourceId || anomaly.issueType}`;
}

/** One-line label, e.g. `[idle_resource] EC2 (i-abc) $42.00 waste=95`. */
export function describeAnomaly(anomaly: Anomaly): string {
  const parts = [`[${anomaly.issueType}]`, anomaly.service];
  if (anomaly.resourceId) parts.push(`(${anomaly.resourceId})`);
  parts.push(`$${anomaly.currentCost.toFixed(2)}`);
  if (anomaly.wasteScore) parts.push(`waste=${anomaly.wasteScore}`);
  return parts.join(' ');
}

// ─── Serialization ──────────────────────────────────────────

export interface AnomalyRecord {
  service: string;
  resource_id: string;
  issue_type: AnomalyType;
  current_cost: number;
  expected_cost: number;
  increase_pct: number;
  waste_score: number;
  metrics: Record<string, MetricValue>;
  account: string;
  region: string;
  timestamp: string;
}

export interface RecommendationRecord {
  anomaly: AnomalyRecord;
  root_cause: string;
  actions: string[];
  terraform_code: string;
  savings_estimate: number;
  risk_level: RiskLevel;
  rollback_plan: string;
  confidence: number;
}

export function anomalyToRecord(anomaly: Anomaly): AnomalyRecord {
  return {
    service: anomaly.service,
    resource_id: anomaly.resourceId,
    issue_type: anomaly.issueType,
    current_cost: anomaly.currentCost,
    expected_cost: anomaly.expectedCost,
    increase_pct: Math.round(increasePct(anomaly) * 10) / 10,
    waste_score: anomaly.wasteScore,
    metrics: { ...anomaly.metrics },
    account: anomaly.account,
    region: anomaly.region,
    timestamp: anomaly.timestamp,
  };
}

export function recommendationToRecord(rec: Recommendation): RecommendationRecord {
  return {
    anomaly: anomalyToRecord(rec.anomaly),
    root_cause: rec.rootCause,
    actions: [...rec.actions],
    terraform_code: rec.changeProposal,
    savings_estimate: rec.savingsEstimate,
    risk_level: rec.riskLevel,
    rollback_plan: rec.rollbackPlan,
    confidence: rec.confidence,
  };
}
