/**
 * API Response Types
 *
 * Shapes of the raw GitHub REST responses the proposal flow reads.
 * Only the fields we use are declared.
 */

// ─── GitHub API Responses ────────────────────────────────────

export interface GitHubApiRepo {
  name: string;
  full_name: string;
  default_branch: string;
}

export interface GitHubApiRef {
  ref: string;
  object: { sha: string; type: string };
}

export interface GitHubApiContentResult {
  content: { path: string; sha: string } | null;
  commit: { sha: string };
}

export interface GitHubApiPullRequest {
  number: number;
  html_url: string;
  title: string;
  state: string;
}
