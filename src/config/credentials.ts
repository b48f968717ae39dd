/**
 * Credentials Resolver
 *
 * Resolves API credentials in order:
 * 1. Environment variables (GITHUB_TOKEN, SLACK_WEBHOOK_URL, LLM_API_KEY)
 * 2. ~/.costguard/credentials.json
 * 3. Returns undefined per credential if neither found
 *
 * Keep the credentials file at 600 (owner read/write only).
 */

import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { CredentialsConfig } from './types.js';
import { credentialsPath } from './paths.js';

// ─── Zod Schema ──────────────────────────────────────────────

const CredentialsSchema = z.object({
  githubToken: z.string().min(1).optional(),
  slackWebhookUrl: z.string().url().optional(),
  llmApiKey: z.string().min(1).optional(),
});

// ─── Environment Variable Names ──────────────────────────────

const CREDENTIAL_KEYS = ['githubToken', 'slackWebhookUrl', 'llmApiKey'] as const;

const ENV_NAMES: Record<(typeof CREDENTIAL_KEYS)[number], string> = {
  githubToken: 'GITHUB_TOKEN',
  slackWebhookUrl: 'SLACK_WEBHOOK_URL',
  llmApiKey: 'LLM_API_KEY',
};

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve all credentials. Env vars win over the credentials file,
 * field by field.
 */
export function resolveCredentials(): CredentialsConfig {
  const fileConfig = readCredentialsFile() ?? {};
  return {
    githubToken: process.env[ENV_NAMES.githubToken] || fileConfig.githubToken,
    slackWebhookUrl: process.env[ENV_NAMES.slackWebhookUrl] || fileConfig.slackWebhookUrl,
    llmApiKey: process.env[ENV_NAMES.llmApiKey] || fileConfig.llmApiKey,
  };
}

/**
 * Names of credentials that are not configured anywhere.
 */
export function missingCredentials(creds: CredentialsConfig): string[] {
  return CREDENTIAL_KEYS.filter((key) => !creds[key]).map((key) => ENV_NAMES[key]);
}

// ─── File Operations ─────────────────────────────────────────

/**
 * Read credentials from ~/.costguard/credentials.json.
 * Returns null if the file doesn't exist or fails validation.
 */
function readCredentialsFile(): CredentialsConfig | null {
  const filePath = credentialsPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  const result = CredentialsSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return result.data;
}
