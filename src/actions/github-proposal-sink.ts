/**
 * GitHub Proposal Sink
 *
 * Opens a pull request per recommendation:
 *   branch costguard/<issue_type>-<slug>-<yyyymmdd> off the base branch,
 *   one commit adding optimizations/<slug>.tf, PR body from the report generator.
 */

import type { GitHubClient } from '../clients/github-client.js';
import type { Recommendation } from '../types/anomaly.js';
import { anomalyKey } from '../types/anomaly.js';
import type { ChangeProposalSink } from '../types/collaborators.js';
import { formatProposalTitle, generateProposalBody } from '../generators/report-generator.js';

export interface GitHubProposalSinkOptions {
  /** owner/name */
  repo: string;
  /** Defaults to the repository's default branch. */
  baseBranch?: string;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Branch and file names for a recommendation. Derived from the anomaly
 * alone, so re-proposing the same anomaly on the same day collides.
 */
export function proposalNames(rec: Recommendation): { slug: string; branch: string; path: string } {
  const { anomaly } = rec;
  const slug = slugify(anomalyKey(anomaly));
  const day = anomaly.timestamp.slice(0, 10).replace(/-/g, '');
  return {
    slug,
    branch: `costguard/${anomaly.issueType}-${slug}-${day}`,
    path: `optimizations/${slug}.tf`,
  };
}

export class GitHubProposalSink implements ChangeProposalSink {
  private owner: string;
  private repo: string;

  constructor(
    private client: GitHubClient,
    private options: GitHubProposalSinkOptions
  ) {
    const [owner, repo] = options.repo.split('/');
    if (!owner || !repo) {
      throw new Error(`GitHub repo must look like owner/name, got "${options.repo}"`);
    }
    this.owner = owner;
    this.repo = repo;
  }

  async propose(rec: Recommendation, signal?: AbortSignal): Promise<string> {
    const { branch, path } = proposalNames(rec);
    const base =
      this.options.baseBranch ?? (await this.client.getDefaultBranch(this.owner, this.repo, signal));
    const sha = await this.client.getBranchSha(this.owner, this.repo, base, signal);

    await this.client.createBranch(this.owner, this.repo, branch, sha, signal);
    await this.client.putFile(
      this.owner,
      this.repo,
      {
        path,
        content: rec.changeProposal.endsWith('\n') ? rec.changeProposal : `${rec.changeProposal}\n`,
        message: formatProposalTitle(rec),
        branch,
      },
      signal
    );

    const pr = await this.client.createPullRequest(
      this.owner,
      this.repo,
      { title: formatProposalTitle(rec), head: branch, base, body: generateProposalBody(rec) },
      signal
    );

    console.error(`[costguard] Opened PR #${pr.number} for ${rec.anomaly.service}: ${pr.url}`);
    return pr.url;
  }
}
