/**
 * GitHub REST API Client
 *
 * Uses native fetch (Node 18+). Covers the calls needed to turn a
 * recommendation into a pull request: read a branch head, create a branch,
 * commit a file, open the PR.
 */

import type {
  GitHubApiRepo,
  GitHubApiRef,
  GitHubApiContentResult,
  GitHubApiPullRequest,
} from './types.js';

const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode: number
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

export interface PullRequestInput {
  title: string;
  head: string;
  base: string;
  body: string;
}

export class GitHubClient {
  constructor(private token: string) {}

  // ─── Repository Methods ─────────────────────────────────

  async getDefaultBranch(owner: string, repo: string, signal?: AbortSignal): Promise<string> {
    const data = await this.request<GitHubApiRepo>('GET', repoPath(owner, repo), undefined, signal);
    return data.default_branch;
  }

  /**
   * SHA of the commit a branch points at.
   */
  async getBranchSha(
    owner: string,
    repo: string,
    branch: string,
    signal?: AbortSignal
  ): Promise<string> {
    const ref = await this.request<GitHubApiRef>(
      'GET',
      `${repoPath(owner, repo)}/git/ref/heads/${encodeURIComponent(branch)}`,
      undefined,
      signal
    );
    return ref.object.sha;
  }

  async createBranch(
    owner: string,
    repo: string,
    branch: string,
    sha: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.request<GitHubApiRef>(
      'POST',
      `${repoPath(owner, repo)}/git/refs`,
      { ref: `refs/heads/${branch}`, sha },
      signal
    );
  }

  /**
   * Create (or overwrite) a file on a branch in a single commit.
   */
  async putFile(
    owner: string,
    repo: string,
    params: { path: string; content: string; message: string; branch: string },
    signal?: AbortSignal
  ): Promise<string> {
    const path = params.path.split('/').map(encodeURIComponent).join('/');
    const result = await this.request<GitHubApiContentResult>(
      'PUT',
      `${repoPath(owner, repo)}/contents/${path}`,
      {
        message: params.message,
        content: Buffer.from(params.content, 'utf-8').toString('base64'),
        branch: params.branch,
      },
      signal
    );
    return result.commit.sha;
  }

  async createPullRequest(
    owner: string,
    repo: string,
    input: PullRequestInput,
    signal?: AbortSignal
  ): Promise<{ number: number; url: string }> {
    const pr = await this.request<GitHubApiPullRequest>(
      'POST',
      `${repoPath(owner, repo)}/pulls`,
      input,
      signal
    );
    return { number: pr.number, url: pr.html_url };
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async request<T>(
    method: 'GET' | 'POST' | 'PUT',
    path: string,
    body?: unknown,
    signal?: AbortSignal
  ): Promise<T> {
    const url = `${GITHUB_API}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    try {
      const response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${method} ${path}`,
          response.status
        );
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function repoPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}
