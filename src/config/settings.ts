/**
 * Settings Manager
 *
 * Reads and writes ~/.costguard/config.json.
 * Validates with Zod on read; every field has a default so a missing
 * file and an empty object resolve to the same settings.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { CostguardSettings } from './types.js';
import { ensureConfigDir, settingsPath } from './paths.js';

// ─── Zod Schemas ─────────────────────────────────────────────

const ThresholdConfigSchema = z
  .object({
    minObservations: z.number().int().positive().optional(),
    windowDays: z.number().int().positive().optional(),
    sigmaMultiplier: z.number().positive().optional(),
    wasteScoreThreshold: z.number().min(0).max(100).optional(),
    snapshotWindowHours: z.number().positive().optional(),
    idleCpuPercent: z.number().min(0).max(100).optional(),
  })
  .optional();

const RemediationSchema = z.object({
  concurrency: z.number().int().positive().default(4),
  stageTimeoutMs: z.number().int().positive().default(60_000),
  contextTopK: z.number().int().positive().default(5),
});

const ScheduleSchema = z.object({
  detectionCron: z.string().min(1).default('0 * * * *'),
  ingestCron: z.string().min(1).default('0 2 * * *'),
  ingestFile: z.string().min(1).optional(),
});

const GitHubSchema = z.object({
  repo: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, 'repo must look like owner/name')
    .optional(),
  baseBranch: z.string().min(1).optional(),
});

const LlmSchema = z.object({
  baseUrl: z.string().url().default('https://api.anthropic.com'),
  model: z.string().min(1).default('claude-sonnet-4-20250514'),
  maxTokens: z.number().int().positive().default(4096),
});

const SearchSchema = z.object({
  url: z.string().url().optional(),
});

const SettingsSchema = z.object({
  version: z.literal(1).default(1),
  storePath: z.string().min(1).optional(),
  thresholds: ThresholdConfigSchema,
  remediation: RemediationSchema.default({}),
  schedule: ScheduleSchema.default({}),
  github: GitHubSchema.default({}),
  llm: LlmSchema.default({}),
  search: SearchSchema.default({}),
});

export { SettingsSchema };

// ─── Read / Write ────────────────────────────────────────────

/**
 * Read and validate settings from ~/.costguard/config.json.
 * Returns null if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readSettings(): CostguardSettings | null {
  const filePath = settingsPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return SettingsSchema.parse(parsed);
}

/**
 * Settings from disk, or the defaults when no file exists.
 */
export function loadSettings(): CostguardSettings {
  return readSettings() ?? createDefaultSettings();
}

/**
 * Write settings to ~/.costguard/config.json.
 * Validates before writing to prevent corrupt configs.
 */
export function writeSettings(settings: CostguardSettings): void {
  SettingsSchema.parse(settings);
  ensureConfigDir();
  writeFileSync(settingsPath(), JSON.stringify(settings, null, 2) + '\n', 'utf-8');
}

export function settingsExist(): boolean {
  return existsSync(settingsPath());
}

export function createDefaultSettings(): CostguardSettings {
  return SettingsSchema.parse({});
}

/**
 * Write a starter config.json. Refuses to overwrite an existing file.
 * Returns the path written.
 */
export function initSettings(repo?: string): string {
  if (settingsExist()) {
    throw new Error(`Settings already exist at ${settingsPath()}`);
  }
  const settings = createDefaultSettings();
  writeSettings(repo ? { ...settings, github: { ...settings.github, repo } } : settings);
  return settingsPath();
}
