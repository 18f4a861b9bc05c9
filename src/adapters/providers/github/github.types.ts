/**
 * Subset of GitHub webhook payloads read by the relay
 *
 * @see https://docs.github.com/en/webhooks/webhook-events-and-payloads
 */

export interface GitHubCommit {
  id?: string;
  message?: string;
  distinct?: boolean;
}

export interface GitHubPushEvent {
  ref?: string;
  deleted?: boolean;
  head_commit?: GitHubCommit | null;
}

export interface GitHubRepository {
  private?: boolean;
  clone_url?: string;
  ssh_url?: string;
  full_name?: string;
}

export interface GitHubBranchInfo {
  ref?: string;
  sha?: string;
  repo?: GitHubRepository | null;
}

export interface GitHubPullRequest {
  number?: number;
  state?: string;
  title?: string;
  body?: string | null;
  merged?: boolean;
  head?: GitHubBranchInfo;
  base?: GitHubBranchInfo;
}

export interface GitHubPullRequestEvent {
  action?: string;
  number?: number;
  pull_request?: GitHubPullRequest;
  changes?: {
    base?: {
      ref?: { from?: string };
    };
  };
}

export const GITHUB_EVENT_HEADER = 'x-github-event';
export const GITHUB_DELIVERY_HEADER = 'x-github-delivery';
