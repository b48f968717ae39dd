/**
 * Slack Notifier
 *
 * Posts anomaly and run-summary messages to an incoming webhook.
 * Uses native fetch; message text comes from the report generator.
 */

import type { Anomaly, Recommendation } from '../types/anomaly.js';
import type { Notifier } from '../types/collaborators.js';
import { formatAnomalyNotice, formatSummaryNotice } from '../generators/report-generator.js';

const DEFAULT_TIMEOUT_MS = 10_000;

export class SlackNotifierError extends Error {
  constructor(
    message: string,
    public statusCode: number
  ) {
    super(message);
    this.name = 'SlackNotifierError';
  }
}

export class SlackNotifier implements Notifier {
  constructor(
    private webhookUrl: string,
    private timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) {}

  async notify(
    anomaly: Anomaly,
    recommendation: Recommendation,
    proposalRef: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.post(formatAnomalyNotice(anomaly, recommendation, proposalRef), signal);
  }

  async notifySummary(
    anomalies: readonly Anomaly[],
    totalSavings: number,
    successCount: number
  ): Promise<void> {
    await this.post(formatSummaryNotice(anomalies, totalSavings, successCount));
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async post(text: string, signal?: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    try {
      const response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new SlackNotifierError(
          `Slack webhook error: ${response.status} ${response.statusText}`,
          response.status
        );
      }
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Stand-in used when no webhook is configured: messages go to stderr.
 */
export class LogNotifier implements Notifier {
  notify(anomaly: Anomaly, recommendation: Recommendation, proposalRef: string): Promise<void> {
    console.error(`[costguard] ${formatAnomalyNotice(anomaly, recommendation, proposalRef)}`);
    return Promise.resolve();
  }

  notifySummary(anomalies: readonly Anomaly[], totalSavings: number, successCount: number): Promise<void> {
    console.error(`[costguard] ${formatSummaryNotice(anomalies, totalSavings, successCount)}`);
    return Promise.resolve();
  }
}
