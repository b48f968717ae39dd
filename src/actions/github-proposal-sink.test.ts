import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GitHubProposalSink, proposalNames, slugify } from './github-proposal-sink.js';
import { GitHubClient, GitHubClientError } from '../clients/github-client.js';
import { createAnomaly } from '../types/anomaly.js';
import type { Recommendation } from '../types/anomaly.js';

const NOW = new Date('2026-03-10T12:00:00Z');

const rec: Recommendation = {
  anomaly: createAnomaly({
    service: 'EC2',
    issueType: 'idle_resource',
    resourceId: 'i-0ABC',
    currentCost: 140,
    wasteScore: 100,
    timestamp: NOW,
  }),
  rootCause: 'Idle',
  actions: ['Stop it'],
  changeProposal: 'resource "aws_instance" "x" {}',
  savingsEstimate: 120,
  riskLevel: 'low',
  rollbackPlan: 'Start it',
  confidence: 0.8,
};

function makeClient(): GitHubClient {
  const client = new GitHubClient('test-token');
  vi.spyOn(client, 'getDefaultBranch').mockResolvedValue('main');
  vi.spyOn(client, 'getBranchSha').mockResolvedValue('abc123');
  vi.spyOn(client, 'createBranch').mockResolvedValue(undefined);
  vi.spyOn(client, 'putFile').mockResolvedValue('c1');
  vi.spyOn(client, 'createPullRequest').mockResolvedValue({
    number: 12,
    url: 'https://github.com/acme/infra/pull/12',
  });
  return client;
}

describe('slugify', () => {
  it('lowercases and collapses separators', () => {
    expect(slugify('EC2 / i-0ABC__x')).toBe('ec2-i-0abc-x');
  });
});

describe('proposalNames', () => {
  it('derives branch and file from the anomaly', () => {
    expect(proposalNames(rec)).toEqual({
      slug: 'ec2-i-0abc',
      branch: 'costguard/idle_resource-ec2-i-0abc-20260310',
      path: 'optimizations/ec2-i-0abc.tf',
    });
  });

  it('uses the issue type when there is no resource', () => {
    const spike = { ...rec, anomaly: createAnomaly({ service: 'S3', issueType: 'cost_spike', currentCost: 9, timestamp: NOW }) };
    expect(proposalNames(spike).branch).toBe('costguard/cost_spike-s3-cost-spike-20260310');
  });
});

describe('GitHubProposalSink', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('branches off the default branch, commits the change and opens a PR', async () => {
    const client = makeClient();
    const sink = new GitHubProposalSink(client, { repo: 'acme/infra' });

    const ref = await sink.propose(rec);

    expect(ref).toBe('https://github.com/acme/infra/pull/12');
    expect(client.getBranchSha).toHaveBeenCalledWith('acme', 'infra', 'main', undefined);
    expect(client.createBranch).toHaveBeenCalledWith(
      'acme',
      'infra',
      'costguard/idle_resource-ec2-i-0abc-20260310',
      'abc123',
      undefined
    );
    expect(client.putFile).toHaveBeenCalledWith(
      'acme',
      'infra',
      {
        path: 'optimizations/ec2-i-0abc.tf',
        content: 'resource "aws_instance" "x" {}\n',
        message: '[costguard] Idle resource: EC2 i-0ABC (save ~$120.00/mo)',
        branch: 'costguard/idle_resource-ec2-i-0abc-20260310',
      },
      undefined
    );
    expect(client.createPullRequest).toHaveBeenCalledWith(
      'acme',
      'infra',
      expect.objectContaining({
        head: 'costguard/idle_resource-ec2-i-0abc-20260310',
        base: 'main',
      }),
      undefined
    );
  });

  it('uses a configured base branch without looking up the default', async () => {
    const client = makeClient();
    const sink = new GitHubProposalSink(client, { repo: 'acme/infra', baseBranch: 'develop' });

    await sink.propose(rec);

    expect(client.getDefaultBranch).not.toHaveBeenCalled();
    expect(client.getBranchSha).toHaveBeenCalledWith('acme', 'infra', 'develop', undefined);
  });

  it('propagates API failures without opening a PR', async () => {
    const client = makeClient();
    vi.mocked(client.createBranch).mockRejectedValue(
      new GitHubClientError('GitHub API error: 422', 422)
    );
    const sink = new GitHubProposalSink(client, { repo: 'acme/infra' });

    await expect(sink.propose(rec)).rejects.toBeInstanceOf(GitHubClientError);
    expect(client.createPullRequest).not.toHaveBeenCalled();
  });

  it('rejects a malformed repo name', () => {
    expect(() => new GitHubProposalSink(makeClient(), { repo: 'infra' })).toThrow(
      'GitHub repo must look like owner/name, got "infra"'
    );
  });
});
