/**
 * Context Retriever
 *
 * Looks up optimization guidance for an anomaly in a knowledge-base search
 * service. Best-effort: when no search URL is configured, the search fails,
 * or nothing matches, canned per-service tips are returned instead.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Anomaly } from '../types/anomaly.js';
import type { ContextRetriever } from '../types/collaborators.js';

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_TOP_K = 5;
const FALLBACK_TIPS_URL = new URL('../../data/fallback-tips.json', import.meta.url);
const LAST_RESORT_TIP = 'Review resource utilization and right-size or remove underused capacity.';

const SearchResponseSchema = z.object({
  matches: z
    .array(
      z.object({
        score: z.number().default(0),
        metadata: z
          .object({
            source: z.string().default('Unknown'),
            text: z.string().default(''),
          })
          .default({}),
      })
    )
    .default([]),
});

const FallbackTipsSchema = z.object({
  services: z.record(z.array(z.string())),
  general: z.string(),
});

export type FallbackTips = z.infer<typeof FallbackTipsSchema>;

export interface KnowledgeBaseOptions {
  /** Search endpoint; unset means fallback tips only. */
  searchUrl?: string;
  topK?: number;
  timeoutMs?: number;
  tips?: FallbackTips;
}

/**
 * Natural-language search query for an anomaly, e.g.
 * `EC2 idle resource optimization cost reduction cpu utilization 1.2% instance m5.xlarge running instance waste score 95`.
 */
export function buildContextQuery(anomaly: Anomaly): string {
  const parts = [
    anomaly.service,
    anomaly.issueType.replace(/_/g, ' '),
    'optimization',
    'cost reduction',
  ];

  const { metrics } = anomaly;
  if (metrics.cpu_utilization !== undefined) parts.push(`cpu utilization ${metrics.cpu_utilization}%`);
  if (metrics.instance_type !== undefined) parts.push(`instance ${metrics.instance_type}`);
  if (metrics.state !== undefined) parts.push(`${metrics.state} instance`);
  if (anomaly.wasteScore > 0) parts.push(`waste score ${anomaly.wasteScore}`);

  return parts.join(' ');
}

let cachedTips: FallbackTips | undefined;

export function loadFallbackTips(): FallbackTips {
  cachedTips ??= FallbackTipsSchema.parse(JSON.parse(readFileSync(FALLBACK_TIPS_URL, 'utf-8')));
  return cachedTips;
}

export function fallbackContext(anomaly: Anomaly, tips: FallbackTips = loadFallbackTips()): string {
  const serviceTips = Object.hasOwn(tips.services, anomaly.service)
    ? tips.services[anomaly.service]
    : undefined;
  if (!serviceTips || serviceTips.length === 0) return tips.general;
  return [
    `General ${anomaly.service} optimization tips:`,
    ...serviceTips.map((tip) => `- ${tip}`),
  ].join('\n');
}

export class KnowledgeBaseRetriever implements ContextRetriever {
  private searchUrl?: string;
  private topK: number;
  private timeoutMs: number;
  private tips?: FallbackTips;

  constructor(options: KnowledgeBaseOptions = {}) {
    this.searchUrl = options.searchUrl;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.tips = options.tips;
  }

  async retrieve(anomaly: Anomaly, signal?: AbortSignal): Promise<string> {
    if (!this.searchUrl) {
      return this.fallback(anomaly);
    }

    const query = buildContextQuery(anomaly);
    try {
      const matches = await this.search(this.searchUrl, query, anomaly.service, signal);
      if (matches.length === 0) {
        console.error(`[costguard] No knowledge-base matches for query: ${query}`);
        return this.fallback(anomaly);
      }

      console.error(
        `[costguard] Retrieved ${matches.length} context chunks for ${anomaly.service} (top score: ${(matches[0]?.score ?? 0).toFixed(2)})`
      );
      return matches
        .map(
          (match, i) =>
            `[Source ${i + 1}: ${match.metadata.source}] (relevance: ${match.score.toFixed(2)})\n${match.metadata.text}`
        )
        .join('\n\n---\n\n');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[costguard] Knowledge-base search failed: ${message}`);
      return this.fallback(anomaly);
    }
  }

  private fallback(anomaly: Anomaly): string {
    try {
      return fallbackContext(anomaly, this.tips);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[costguard] Fallback tips unavailable: ${message}`);
      return LAST_RESORT_TIP;
    }
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async search(
    url: string,
    query: string,
    service: string,
    signal?: AbortSignal
  ): Promise<z.infer<typeof SearchResponseSchema>['matches']> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          query,
          top_k: this.topK,
          filter: { service: [service, 'General'] },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Search API error: ${response.status} ${response.statusText}`);
      }

      return SearchResponseSchema.parse(await response.json()).matches;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
