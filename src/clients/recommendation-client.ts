/**
 * Recommendation Client
 *
 * Asks a Messages-style LLM endpoint for a structured fix for one anomaly.
 * Uses native fetch. The reply's first JSON object is validated by
 * parseRecommendation.
 */

import { z } from 'zod';
import type { Anomaly, Recommendation } from '../types/anomaly.js';
import type { RecommendationGenerator } from '../types/collaborators.js';
import { RecommendationParseError, parseRecommendation } from '../validators.js';

const DEFAULT_TIMEOUT_MS = 60_000;
const API_VERSION = '2023-06-01';

export class LlmClientError extends Error {
  constructor(
    message: string,
    public statusCode: number
  ) {
    super(message);
    this.name = 'LlmClientError';
  }
}

export interface LlmClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  timeoutMs?: number;
}

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export const SYSTEM_PROMPT = `You are a senior cloud infrastructure engineer focused on cost optimization.
You receive an anomaly found by an automated detector together with reference
material retrieved from a knowledge base.

For each anomaly:
1. Explain the most likely root cause.
2. List concrete steps that reduce the cost.
3. Write Terraform HCL that implements the fix.
4. Estimate the monthly savings in USD.
5. Rate the risk of the change as low, medium or high.
6. Describe how to roll the change back.

The Terraform must be complete HCL that can be applied as is. Use variables for
tunable values and add cost-tracking tags. Always answer with the JSON object
described in the request and nothing else.`;

export function buildUserPrompt(anomaly: Anomaly, context: string): string {
  return `ANOMALY
  Service: ${anomaly.service}
  Resource: ${anomaly.resourceId || 'N/A'}
  Issue type: ${anomaly.issueType}
  Current cost: $${anomaly.currentCost.toFixed(2)}/month
  Expected cost: $${anomaly.expectedCost.toFixed(2)}/month
  Waste score: ${anomaly.wasteScore}/100
  Metrics: ${JSON.stringify(anomaly.metrics, null, 2)}
  Account: ${anomaly.account || 'N/A'}
  Region: ${anomaly.region || 'N/A'}

REFERENCE MATERIAL
${context}

Answer with this JSON object:
{
  "root_cause": "Why the anomaly happened",
  "actions": ["First step", "Second step"],
  "terraform_code": "Complete HCL as one string",
  "savings_estimate": 123.45,
  "risk_level": "low|medium|high",
  "rollback_plan": "How to undo the change",
  "confidence": 0.85
}`;
}

/**
 * Pull the outermost `{...}` block out of a reply that may wrap it in prose
 * or a code fence.
 */
export function extractJsonObject(text: string): unknown {
  const match = /\{[\s\S]*\}/.exec(text);
  if (!match) {
    throw new RecommendationParseError(
      `No JSON object in model reply: ${text.slice(0, 200)}`
    );
  }
  try {
    return JSON.parse(match[0]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RecommendationParseError(`Invalid JSON in model reply: ${message}`);
  }
}

export class LlmRecommendationGenerator implements RecommendationGenerator {
  private timeoutMs: number;

  constructor(private options: LlmClientOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async generate(anomaly: Anomaly, context: string, signal?: AbortSignal): Promise<Recommendation> {
    console.error(
      `[costguard] Requesting recommendation for ${anomaly.issueType} anomaly on ${anomaly.service}`
    );

    const text = await this.complete(buildUserPrompt(anomaly, context), signal);
    const recommendation = parseRecommendation(anomaly, extractJsonObject(text));

    console.error(
      `[costguard] Generated recommendation: savings=$${recommendation.savingsEstimate.toFixed(2)}/mo, risk=${recommendation.riskLevel}, confidence=${Math.round(recommendation.confidence * 100)}%`
    );
    return recommendation;
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async complete(userPrompt: string, signal?: AbortSignal): Promise<string> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/v1/messages`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.options.apiKey,
          'anthropic-version': API_VERSION,
        },
        body: JSON.stringify({
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: userPrompt }],
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new LlmClientError(
          `LLM API error: ${response.status} ${response.statusText}`,
          response.status
        );
      }

      const parsed = MessagesResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new RecommendationParseError('Unexpected LLM response shape');
      }
      return parsed.data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('');
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
