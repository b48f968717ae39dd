/**
 * Runtime Wiring
 *
 * Builds the store, collaborators and pipeline dependencies from settings
 * and credentials. Shared by the CLI, the scheduler and the MCP server.
 */

import type { CostguardSettings, CredentialsConfig } from './config/types.js';
import { resolveThresholds } from './config/thresholds.js';
import { CostStore, createSqliteSource } from './store/cost-store.js';
import type { TimeSeriesSource } from './store/types.js';
import { KnowledgeBaseRetriever } from './rag/context-retriever.js';
import { LlmRecommendationGenerator } from './clients/recommendation-client.js';
import { GitHubClient } from './clients/github-client.js';
import { GitHubProposalSink } from './actions/github-proposal-sink.js';
import { LogNotifier, SlackNotifier } from './actions/slack-notifier.js';
import type { RemediationCollaborators } from './types/collaborators.js';
import type { PipelineDeps } from './orchestrator/pipeline.js';

export class ConfigurationError extends Error {
  constructor(public missing: string[]) {
    super(`Remediation is not configured. Missing: ${missing.join(', ')}`);
    this.name = 'ConfigurationError';
  }
}

export function openCostStore(settings: CostguardSettings): CostStore {
  return new CostStore(settings.storePath);
}

export function createSource(settings: CostguardSettings): TimeSeriesSource {
  return createSqliteSource(settings.storePath);
}

/**
 * Settings and credentials remediation cannot run without.
 * Slack is optional: notices go to stderr when no webhook is set.
 */
export function missingRemediationConfig(
  settings: CostguardSettings,
  creds: CredentialsConfig
): string[] {
  const missing: string[] = [];
  if (!settings.github.repo) missing.push('github.repo (config.json)');
  if (!creds.githubToken) missing.push('GITHUB_TOKEN');
  if (!creds.llmApiKey) missing.push('LLM_API_KEY');
  return missing;
}

export function createCollaborators(
  settings: CostguardSettings,
  creds: CredentialsConfig
): RemediationCollaborators {
  const { githubToken, llmApiKey } = creds;
  const repo = settings.github.repo;
  if (!repo || !githubToken || !llmApiKey) {
    throw new ConfigurationError(missingRemediationConfig(settings, creds));
  }

  return {
    contextRetriever: new KnowledgeBaseRetriever({
      searchUrl: settings.search.url,
      topK: settings.remediation.contextTopK,
    }),
    recommendationGenerator: new LlmRecommendationGenerator({
      apiKey: llmApiKey,
      baseUrl: settings.llm.baseUrl,
      model: settings.llm.model,
      maxTokens: settings.llm.maxTokens,
    }),
    proposalSink: new GitHubProposalSink(new GitHubClient(githubToken), {
      repo,
      baseBranch: settings.github.baseBranch,
    }),
    notifier: creds.slackWebhookUrl ? new SlackNotifier(creds.slackWebhookUrl) : new LogNotifier(),
  };
}

export function createPipelineDeps(
  settings: CostguardSettings,
  creds: CredentialsConfig
): PipelineDeps {
  return {
    source: createSource(settings),
    collaborators: createCollaborators(settings, creds),
    thresholds: resolveThresholds(settings.thresholds),
    remediation: {
      concurrency: settings.remediation.concurrency,
      stageTimeoutMs: settings.remediation.stageTimeoutMs,
    },
  };
}
