/**
 * Configuration Types
 *
 * Defines the shape of settings and credentials.
 * These are the canonical types; Zod schemas in settings.ts and
 * credentials.ts validate against these.
 */

import type { ThresholdConfig } from './thresholds.js';

/** Remediation pipeline limits. */
export interface RemediationSettings {
  /** Anomaly pipelines allowed in flight at once. */
  concurrency: number;
  /** Upper bound for a single stage call. */
  stageTimeoutMs: number;
  contextTopK: number;
}

export interface ScheduleSettings {
  detectionCron: string;
  ingestCron: string;
  /** Export re-ingested on ingestCron; no ingest job when unset. */
  ingestFile?: string;
}

/** Where change proposals are opened. */
export interface GitHubSettings {
  /** owner/name */
  repo?: string;
  baseBranch?: string;
}

/** Messages-style reasoning endpoint used for recommendations. */
export interface LlmSettings {
  baseUrl: string;
  model: string;
  maxTokens: number;
}

export interface SearchSettings {
  url?: string;
}

/** Root settings, stored in ~/.costguard/config.json */
export interface CostguardSettings {
  version: 1;
  storePath?: string;
  thresholds?: ThresholdConfig;
  remediation: RemediationSettings;
  schedule: ScheduleSettings;
  github: GitHubSettings;
  llm: LlmSettings;
  search: SearchSettings;
}

/** Root credentials, stored in ~/.costguard/credentials.json */
export interface CredentialsConfig {
  githubToken?: string;
  slackWebhookUrl?: string;
  llmApiKey?: string;
}
