/**
 * Detection -> remediation pass, as run by the scheduler, CLI and MCP server.
 */

import type { ThresholdConfig } from '../config/thresholds.js';
import type { TimeSeriesSource } from '../store/types.js';
import type { Anomaly } from '../types/anomaly.js';
import type { RemediationCollaborators } from '../types/collaborators.js';
import { runDetection } from './detection-engine.js';
import { RemediationOrchestrator } from './remediation.js';
import type { RemediationOptions, RunSummary } from './remediation.js';

export interface PipelineDeps {
  source: TimeSeriesSource;
  collaborators: RemediationCollaborators;
  thresholds?: Required<ThresholdConfig>;
  remediation?: RemediationOptions;
  now?: () => Date;
}

export interface PipelineResult {
  anomalies: Anomaly[];
  summary: RunSummary;
}

/**
 * One full pass. A failure of detection itself is logged and treated as
 * zero anomalies, so no summary goes out for that pass.
 */
export async function runPipeline(deps: PipelineDeps, signal?: AbortSignal): Promise<PipelineResult> {
  let anomalies: Anomaly[];
  try {
    anomalies = await runDetection(deps.source, {
      thresholds: deps.thresholds,
      now: deps.now?.(),
    });
  } catch (error) {
    console.error(
      `[costguard] Detection pass failed: ${error instanceof Error ? error.message : String(error)}`
    );
    anomalies = [];
  }

  if (anomalies.length === 0) {
    console.error('[costguard] No anomalies detected');
  }

  const orchestrator = new RemediationOrchestrator(deps.collaborators, deps.remediation);
  const summary = await orchestrator.run(anomalies, signal);
  return { anomalies, summary };
}
