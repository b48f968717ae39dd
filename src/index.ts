#!/usr/bin/env node

/**
 * costguard MCP Server
 *
 * Exposes cost anomaly detection and remediation to MCP clients.
 *
 * Tools:
 *   Detection:   detect_anomalies, score_resource
 *   Remediation: run_remediation
 *   Info:        get_capabilities
 */

import { z } from 'zod';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadSettings, settingsExist } from './config/settings.js';
import { resolveCredentials } from './config/credentials.js';
import { resolveConfigDir } from './config/paths.js';
import { resolveThresholds } from './config/thresholds.js';
import { calculateWasteScore, classifyWaste } from './insights/waste-scorer.js';
import { runDetection } from './orchestrator/detection-engine.js';
import { runPipeline } from './orchestrator/pipeline.js';
import { createPipelineDeps, createSource, missingRemediationConfig } from './runtime.js';
import { generateDetectionReport, generateRunReport } from './generators/report-generator.js';

const SERVER_INSTRUCTIONS = `costguard detects cloud cost anomalies (cost spikes and idle or oversized resources) and proposes infrastructure fixes as pull requests.

Use costguard tools when the user asks about:
- Unexpected cloud spend, cost spikes, idle or wasted resources → detect_anomalies
- Fixing or remediating cost anomalies, opening cost-saving PRs → run_remediation
- How wasteful a single instance is → score_resource
- Configuration and credential status → get_capabilities`;

const server = new Server(
  { name: 'costguard', version: '1.0.0' },
  {
    capabilities: { tools: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

type ToolResult = { content: Array<{ type: 'text'; text: string }> };

const ScoreResourceArgsSchema = z.object({
  cpuUtilization: z.number().min(0).max(100),
  instanceType: z.string().min(1),
  state: z.string().min(1),
});

// ─── Tool Definitions ────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, () => {
  return {
    tools: [
      {
        name: 'detect_anomalies',
        description:
          'Detect cost spikes and waste patterns in the local cost store. Read-only: nothing is proposed or sent.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
      {
        name: 'run_remediation',
        description:
          'Detect anomalies, then for each one retrieve optimization context, generate a fix, open a pull request and send a notification. Returns the run summary.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
      {
        name: 'score_resource',
        description:
          'Score one compute resource for waste (0-100) from its CPU utilization, instance type and state.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            cpuUtilization: {
              type: 'number' as const,
              description: 'Average CPU utilization in percent (0-100)',
            },
            instanceType: {
              type: 'string' as const,
              description: 'Instance type (e.g., "m5.xlarge")',
            },
            state: {
              type: 'string' as const,
              description: 'Resource state (e.g., "running", "stopped")',
            },
          },
          required: ['cpuUtilization', 'instanceType', 'state'],
        },
      },
      {
        name: 'get_capabilities',
        description: 'Show costguard configuration, credential status and available tools.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
    ],
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'detect_anomalies':
        return await handleDetectAnomalies();
      case 'run_remediation':
        return await handleRunRemediation();
      case 'score_resource':
        return handleScoreResource(args);
      case 'get_capabilities':
        return handleGetCapabilities();
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
});

// ─── Handlers ────────────────────────────────────────────────

async function handleDetectAnomalies(): Promise<ToolResult> {
  const settings = loadSettings();
  const anomalies = await runDetection(createSource(settings), {
    thresholds: resolveThresholds(settings.thresholds),
  });
  return { content: [{ type: 'text', text: generateDetectionReport(anomalies) }] };
}

async function handleRunRemediation(): Promise<ToolResult> {
  const settings = loadSettings();
  const deps = createPipelineDeps(settings, resolveCredentials());
  const { summary } = await runPipeline(deps);
  return { content: [{ type: 'text', text: generateRunReport(summary) }] };
}

function handleScoreResource(args: Record<string, unknown> | undefined): ToolResult {
  const parsed = ScoreResourceArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid arguments: ${issues.join('; ')}`);
  }

  const { cpuUtilization, instanceType, state } = parsed.data;
  const score = calculateWasteScore(cpuUtilization, instanceType, state);
  const text = [
    `**Waste score:** ${score}/100 (${classifyWaste(score)})`,
    '',
    `- Instance type: ${instanceType}`,
    `- State: ${state}`,
    `- CPU utilization: ${cpuUtilization}%`,
  ].join('\n');

  return { content: [{ type: 'text', text }] };
}

function handleGetCapabilities(): ToolResult {
  const settings = loadSettings();
  const creds = resolveCredentials();
  const missing = missingRemediationConfig(settings, creds);

  const parts: string[] = [];
  parts.push('# costguard');
  parts.push('');

  parts.push('## Status');
  parts.push('');
  parts.push(`| Component | Status |`);
  parts.push(`|-----------|--------|`);
  parts.push(`| Config directory | \`${resolveConfigDir()}\` |`);
  parts.push(`| Settings | ${settingsExist() ? '✅ config.json' : '⚪ Defaults'} |`);
  parts.push(`| GitHub repository | ${settings.github.repo ? `✅ ${settings.github.repo}` : '❌ Not configured'} |`);
  parts.push(`| GitHub token | ${creds.githubToken ? '✅ Configured' : '❌ Not configured'} |`);
  parts.push(`| LLM API key | ${creds.llmApiKey ? '✅ Configured' : '❌ Not configured'} |`);
  parts.push(
    `| Slack webhook | ${creds.slackWebhookUrl ? '✅ Configured' : '⚪ Not configured (optional)'} |`
  );
  parts.push('');

  if (missing.length > 0) {
    parts.push('## Getting Started');
    parts.push('');
    parts.push(`Remediation needs: ${missing.join(', ')}.`);
    parts.push('Detection and scoring work without them.');
    parts.push('');
  }

  parts.push('## Tools');
  parts.push('');
  parts.push('| Tool | Description |');
  parts.push('|------|-------------|');
  parts.push('| `detect_anomalies` | Find cost spikes and waste patterns |');
  parts.push('| `run_remediation` | Propose and announce a fix for each anomaly |');
  parts.push('| `score_resource` | Waste score for a single resource |');
  parts.push('| `get_capabilities` | This overview |');

  return { content: [{ type: 'text', text: parts.join('\n') }] };
}

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[costguard] MCP server v1.0.0 started');
}

main().catch((error) => {
  console.error('[costguard] Fatal error:', error);
  process.exit(1);
});
