#!/usr/bin/env node

/**
 * costguard CLI
 *
 * Detect cloud cost anomalies and turn them into reviewable fixes.
 *
 * Usage:
 *   costguard init [--repo owner/name]
 *   costguard detect [--json]
 *   costguard run [--json]
 *   costguard schedule
 *   costguard score --cpu 2 --type m5.xlarge --state running
 *   costguard ingest --file export.json
 *   costguard status
 */

import { existsSync } from 'node:fs';
import { resolveConfigDir, resolveStorePath } from './config/paths.js';
import { initSettings, loadSettings, settingsExist } from './config/settings.js';
import { resolveCredentials, missingCredentials } from './config/credentials.js';
import { resolveThresholds } from './config/thresholds.js';
import { calculateWasteScore, classifyWaste } from './insights/waste-scorer.js';
import { runDetection } from './orchestrator/detection-engine.js';
import { runPipeline } from './orchestrator/pipeline.js';
import { ingestFile } from './store/ingest.js';
import { CostScheduler, installShutdownHandlers } from './scheduler/scheduler.js';
import { createPipelineDeps, createSource, missingRemediationConfig, openCostStore } from './runtime.js';
import {
  generateDetectionReport,
  generateRunReport,
  runSummaryToRecord,
} from './generators/report-generator.js';
import { anomalyToRecord } from './types/anomaly.js';

// ─── Argument Parsing ───────────────────────────────────────

function parseArgs(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let flagStart = 1;

  // "help detect" → "help-detect"
  const topic = args[1];
  if (command === 'help' && topic && !topic.startsWith('--')) {
    command = `help-${topic}`;
    flagStart = 2;
  }

  const flags: Record<string, string> = {};

  for (let i = flagStart; i < args.length; i++) {
    const arg = args[i];
    if (!arg?.startsWith('--')) continue;
    const key = arg.slice(2);
    const next = args[i + 1];
    // Boolean flags (e.g., --json) vs value flags (e.g., --cpu 2)
    if (next !== undefined && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = '';
    }
  }

  return { command, flags };
}

// ─── Commands ───────────────────────────────────────────────

function runInit(flags: Record<string, string>): string {
  const path = initSettings(flags['repo'] || undefined);
  return [
    `Wrote ${path}`,
    '',
    'Next steps:',
    '  export GITHUB_TOKEN=...     # token that can push branches and open PRs',
    '  export LLM_API_KEY=...      # recommendation model',
    '  costguard ingest --file <export.json>',
    '  costguard status',
  ].join('\n');
}

async function runDetect(flags: Record<string, string>): Promise<string> {
  const settings = loadSettings();
  const anomalies = await runDetection(createSource(settings), {
    thresholds: resolveThresholds(settings.thresholds),
  });

  if ('json' in flags) {
    return JSON.stringify(anomalies.map(anomalyToRecord), null, 2);
  }
  return generateDetectionReport(anomalies);
}

async function runRemediation(flags: Record<string, string>): Promise<string> {
  const settings = loadSettings();
  const deps = createPipelineDeps(settings, resolveCredentials());

  // First Ctrl-C stops launching new pipelines; in-flight ones finish.
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('[costguard] Cancelling: no new anomalies will be started');
    controller.abort();
  });

  const { summary } = await runPipeline(deps, controller.signal);
  if ('json' in flags) {
    return JSON.stringify(runSummaryToRecord(summary), null, 2);
  }
  return generateRunReport(summary);
}

function runSchedule(): void {
  const settings = loadSettings();
  const deps = createPipelineDeps(settings, resolveCredentials());
  const exportFile = settings.schedule.ingestFile;

  const scheduler = new CostScheduler({
    detectionCron: settings.schedule.detectionCron,
    detect: (signal) => runPipeline(deps, signal),
    ingestCron: settings.schedule.ingestCron,
    ingest: exportFile
      ? () => {
          const store = openCostStore(settings);
          try {
            return ingestFile(store, exportFile);
          } finally {
            store.close();
          }
        }
      : undefined,
  });

  scheduler.start();
  installShutdownHandlers(scheduler);
  console.error('[costguard] Scheduler running. Press Ctrl-C to stop.');
}

function runScore(flags: Record<string, string>): string {
  const cpu = Number(flags['cpu']);
  const type = flags['type'];
  const state = flags['state'];
  if (flags['cpu'] === undefined || Number.isNaN(cpu) || !type || !state) {
    throw new Error('score requires --cpu <percent> --type <instance type> --state <state>');
  }

  const score = calculateWasteScore(cpu, type, state);
  return `Waste score: ${score}/100 (${classifyWaste(score)})`;
}

function runIngest(flags: Record<string, string>): string {
  const file = flags['file'];
  if (!file) {
    throw new Error('ingest requires --file <export.json>');
  }

  const store = openCostStore(loadSettings());
  try {
    const result = ingestFile(store, file);
    return `Ingested ${result.dailyCosts} daily cost points and ${result.resources} resource snapshots from ${file}`;
  } finally {
    store.close();
  }
}

function runStatus(): string {
  const settings = loadSettings();
  const creds = resolveCredentials();
  const missingCreds = missingCredentials(creds);
  const missingRemediation = missingRemediationConfig(settings, creds);
  const storePath = resolveStorePath(settings.storePath);
  const thresholds = resolveThresholds(settings.thresholds);

  const lines: string[] = [];
  lines.push('# costguard Status');
  lines.push('');
  lines.push(`**Config directory:** ${resolveConfigDir()}`);
  lines.push(`**Settings:** ${settingsExist() ? 'config.json' : 'defaults (no config.json)'}`);
  lines.push(`**Cost store:** ${storePath}${existsSync(storePath) ? '' : ' (not created yet)'}`);
  lines.push('');

  lines.push('## Credentials');
  lines.push('');
  lines.push(`- GitHub token: ${creds.githubToken ? 'configured' : 'missing'}`);
  lines.push(`- LLM API key: ${creds.llmApiKey ? 'configured' : 'missing'}`);
  lines.push(`- Slack webhook: ${creds.slackWebhookUrl ? 'configured' : 'not set (notices go to stderr)'}`);
  if (missingCreds.length > 0) {
    lines.push('');
    lines.push(`Set via environment: ${missingCreds.join(', ')}`);
  }
  lines.push('');

  lines.push('## Remediation');
  lines.push('');
  lines.push(`- Repository: ${settings.github.repo ?? '_not set_'}`);
  lines.push(`- Concurrency: ${settings.remediation.concurrency}`);
  lines.push(`- Stage timeout: ${settings.remediation.stageTimeoutMs}ms`);
  lines.push(`- Knowledge base: ${settings.search.url ?? '_fallback tips only_'}`);
  lines.push(
    `- Ready: ${missingRemediation.length === 0 ? 'yes' : `no (missing ${missingRemediation.join(', ')})`}`
  );
  lines.push('');

  lines.push('## Detection');
  lines.push('');
  lines.push(`- Schedule: ${settings.schedule.detectionCron}`);
  lines.push(
    `- Spike rule: latest > mean + ${thresholds.sigmaMultiplier}σ over ${thresholds.windowDays} days (min ${thresholds.minObservations} points)`
  );
  lines.push(
    `- Waste rule: score > ${thresholds.wasteScoreThreshold} within ${thresholds.snapshotWindowHours}h, idle below ${thresholds.idleCpuPercent}% CPU`
  );
  if (settings.schedule.ingestFile) {
    lines.push(`- Ingest: ${settings.schedule.ingestFile} on ${settings.schedule.ingestCron}`);
  }

  return lines.join('\n');
}

// ─── Help ───────────────────────────────────────────────────

function showHelp(topic?: string): string {
  if (topic) {
    const text = COMMAND_HELP[topic];
    if (text) return text;
    return `Unknown command: ${topic}\n\n${GENERAL_HELP}`;
  }
  return GENERAL_HELP;
}

const GENERAL_HELP = `costguard — Cloud Cost Anomaly Detection & Remediation

Usage:
  costguard <command> [options]

Commands:
  init                 Write a starter config.json
  detect               Detect cost spikes and waste patterns
  run                  Detect, then propose and announce a fix per anomaly
  schedule             Run detection on a cron schedule until stopped
  score                Score a single resource for waste
  ingest               Load a cost export into the local store
  status               Show configuration and credential status
  help [command]       Show help for a command

Environment:
  COSTGUARD_HOME       Config directory (default: ~/.costguard)
  GITHUB_TOKEN         Token used to open pull requests
  LLM_API_KEY          Key for the recommendation model
  SLACK_WEBHOOK_URL    Incoming webhook for notifications (optional)`;

const COMMAND_HELP: Record<string, string> = {
  init: `costguard init — Write Starter Settings

  Create config.json in the config directory with default thresholds,
  schedule and remediation limits. Fails if the file already exists.

  Usage:
    costguard init [--repo owner/name]

  Options:
    --repo <owner/name>     Repository that receives fix pull requests`,

  detect: `costguard detect — Detect Anomalies

  Run the spike detector and the waste-pattern classifier against the local
  cost store and print what they found. Nothing is changed.

  Usage:
    costguard detect [--json]

  Options:
    --json                  Print anomalies as JSON records`,

  run: `costguard run — Detect and Remediate

  Detect anomalies, then for each one: retrieve optimization context, ask
  the model for a fix, open a pull request with the change and send a
  notification. One summary notification is sent per run.

  Usage:
    costguard run [--json]

  Options:
    --json                  Print the run summary as JSON records

  Ctrl-C stops new anomalies from starting; those in flight finish.`,

  schedule: `costguard schedule — Scheduled Runs

  Run "costguard run" on settings.schedule.detectionCron (hourly by default).
  When settings.schedule.ingestFile is set, that export is re-ingested on
  settings.schedule.ingestCron. Overlapping runs are skipped.

  Usage:
    costguard schedule`,

  score: `costguard score — Waste Score

  Usage:
    costguard score --cpu <percent> --type <instance type> --state <state>

  Example:
    costguard score --cpu 2 --type m5.xlarge --state running`,

  ingest: `costguard ingest — Load Cost Export

  Usage:
    costguard ingest --file <export.json>

  The export holds "daily_costs" ({ service, day, cost, account? }) and
  "resources" ({ instance_id, instance_type, state, cpu_utilization, cost, ... }).
  Resources without a waste_score are scored on the way in.`,

  status: `costguard status — Show Configuration Status

  Usage:
    costguard status`,
};

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'init':
        output = runInit(flags);
        break;
      case 'detect':
        output = await runDetect(flags);
        break;
      case 'run':
        output = await runRemediation(flags);
        break;
      case 'schedule':
        runSchedule();
        return;
      case 'score':
        output = runScore(flags);
        break;
      case 'ingest':
        output = runIngest(flags);
        break;
      case 'status':
        output = runStatus();
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
