import {
  HookProvider,
  RawWebhookRequest,
  TransformError,
  TransformResult,
  TransformResults,
  TriggerApiParams,
} from '../../../core';
import {
  GITHUB_EVENT_HEADER,
  GitHubBranchInfo,
  GitHubPullRequestEvent,
  GitHubPushEvent,
} from './github.types';

const CONTENT_TYPE_JSON = 'application/json';
const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

const BRANCH_REF_PREFIX = 'refs/heads/';
const TAG_REF_PREFIX = 'refs/tags/';

const BUILDABLE_PR_ACTIONS = ['opened', 'reopened', 'synchronize', 'edited'];

/**
 * GitHub Provider Adapter
 *
 * Turns `push` and `pull_request` deliveries into trigger params.
 * Accepts both JSON and form-encoded (`payload=`) deliveries.
 *
 * @see https://docs.github.com/en/webhooks/webhook-events-and-payloads
 */
export class GitHubProviderAdapter implements HookProvider {
  readonly providerName = 'github';
  readonly supportedEvents = ['push', 'pull_request'] as const;

  transform(request: RawWebhookRequest): TransformResult {
    const contentType = request.headers['content-type'];
    if (!contentType) {
      return this.failure('No Content-Type Header found');
    }

    const mediaType = contentType.split(';')[0].trim().toLowerCase();
    if (mediaType !== CONTENT_TYPE_JSON && mediaType !== CONTENT_TYPE_FORM) {
      return this.failure(`Content-Type is not supported: ${contentType}`);
    }

    const eventType = request.headers[GITHUB_EVENT_HEADER];
    if (!eventType) {
      return this.failure('No X-Github-Event Header found');
    }

    if (eventType === 'ping') {
      return TransformResults.skip('Ping event received');
    }

    if (!this.supportedEvents.some((supported) => supported === eventType)) {
      return TransformResults.skip(
        `Unsupported GitHub Webhook event: ${eventType}`,
      );
    }

    if (request.body.length === 0) {
      return this.failure(
        'Failed to read content of request body: no or empty request body',
        eventType,
      );
    }

    let payload: unknown;
    try {
      payload = this.parsePayload(request.body, mediaType);
    } catch (error) {
      return this.failure(
        `Failed to parse request body: ${error instanceof Error ? error.message : String(error)}`,
        eventType,
      );
    }

    if (!isRecord(payload)) {
      return this.failure('Failed to parse request body: not a JSON object', eventType);
    }

    if (eventType === 'push') {
      return this.transformPushEvent(readPushEvent(payload));
    }
    return this.transformPullRequestEvent(readPullRequestEvent(payload));
  }

  private parsePayload(body: Buffer, mediaType: string): unknown {
    const text = body.toString('utf-8');
    if (mediaType === CONTENT_TYPE_FORM) {
      const form = new URLSearchParams(text).get('payload');
      if (form === null) {
        throw new Error('missing payload form field');
      }
      return JSON.parse(form);
    }
    return JSON.parse(text);
  }

  private transformPushEvent(event: GitHubPushEvent): TransformResult {
    if (event.deleted) {
      return TransformResults.skip(
        "This is a 'Deleted' event, no build can be started",
      );
    }

    const ref = event.ref ?? '';
    const headCommit = event.head_commit;

    if (ref.startsWith(BRANCH_REF_PREFIX)) {
      if (!headCommit?.id) {
        return this.failure('Missing commit hash', 'push');
      }
      if (!headCommit.distinct) {
        return TransformResults.skip('Head Commit is not Distinct');
      }

      return TransformResults.triggers([
        {
          build_params: {
            branch: ref.slice(BRANCH_REF_PREFIX.length),
            commit_hash: headCommit.id,
            commit_message: headCommit.message ?? '',
          },
        },
      ]);
    }

    if (ref.startsWith(TAG_REF_PREFIX)) {
      if (!headCommit?.id) {
        return this.failure('Missing commit hash', 'push');
      }

      return TransformResults.triggers([
        {
          build_params: {
            tag: ref.slice(TAG_REF_PREFIX.length),
            commit_hash: headCommit.id,
            commit_message: headCommit.message ?? '',
          },
        },
      ]);
    }

    return this.failure(`Ref (${ref}) is not a head nor a tag ref`, 'push');
  }

  private transformPullRequestEvent(event: GitHubPullRequestEvent): TransformResult {
    const action = event.action ?? '';
    if (!BUILDABLE_PR_ACTIONS.includes(action)) {
      return TransformResults.skip(
        `Pull Request action doesn't require a build: ${action}`,
      );
    }

    if (action === 'edited' && !event.changes?.base) {
      return TransformResults.skip(
        "Pull Request edit doesn't require a build: only title and/or description was changed",
      );
    }

    const pullRequest = event.pull_request;
    if (!pullRequest) {
      return this.failure('Missing pull_request object', 'pull_request');
    }

    if (pullRequest.merged) {
      return TransformResults.skip('Pull Request already merged');
    }

    if (pullRequest.state !== 'open') {
      return TransformResults.skip(
        `Pull Request state doesn't require a build: ${pullRequest.state ?? ''}`,
      );
    }

    const number = pullRequest.number ?? event.number;
    const headSha = pullRequest.head?.sha;
    const headRef = pullRequest.head?.ref;
    if (number === undefined || !headSha || !headRef) {
      return this.failure(
        'Missing pull request number, head commit or head branch',
        'pull_request',
      );
    }

    const headRepo = pullRequest.head?.repo;
    const repositoryUrl = headRepo?.private ? headRepo.ssh_url : headRepo?.clone_url;

    const commitMessage = pullRequest.body
      ? `${pullRequest.title ?? ''}\n\n${pullRequest.body}`
      : pullRequest.title ?? '';

    const params: TriggerApiParams = {
      build_params: {
        commit_hash: headSha,
        commit_message: commitMessage,
        branch: headRef,
        branch_dest: pullRequest.base?.ref,
        pull_request_id: number,
        pull_request_repository_url: repositoryUrl,
        pull_request_merge_branch: `pull/${number}/merge`,
        pull_request_head_branch: `pull/${number}/head`,
      },
    };

    return TransformResults.triggers([params]);
  }

  private failure(message: string, eventType?: string): TransformResult {
    return TransformResults.failure(
      new TransformError(message, this.providerName, eventType),
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function readPushEvent(payload: Record<string, unknown>): GitHubPushEvent {
  const headCommit = payload.head_commit;
  return {
    ref: asString(payload.ref),
    deleted: payload.deleted === true,
    head_commit: isRecord(headCommit)
      ? {
          id: asString(headCommit.id),
          message: asString(headCommit.message),
          distinct: headCommit.distinct === true,
        }
      : null,
  };
}

function readBranchInfo(value: unknown): GitHubBranchInfo | undefined {
  if (!isRecord(value)) return undefined;
  const repo = value.repo;
  return {
    ref: asString(value.ref),
    sha: asString(value.sha),
    repo: isRecord(repo)
      ? {
          private: repo.private === true,
          clone_url: asString(repo.clone_url),
          ssh_url: asString(repo.ssh_url),
          full_name: asString(repo.full_name),
        }
      : null,
  };
}

function readPullRequestEvent(payload: Record<string, unknown>): GitHubPullRequestEvent {
  const pullRequest = payload.pull_request;
  const changes = payload.changes;
  const baseChange = isRecord(changes) && isRecord(changes.base) ? changes.base : undefined;
  const baseRefChange = baseChange && isRecord(baseChange.ref) ? baseChange.ref : undefined;

  return {
    action: asString(payload.action),
    number: asNumber(payload.number),
    pull_request: isRecord(pullRequest)
      ? {
          number: asNumber(pullRequest.number),
          state: asString(pullRequest.state),
          title: asString(pullRequest.title),
          body: asString(pullRequest.body) ?? null,
          merged: pullRequest.merged === true,
          head: readBranchInfo(pullRequest.head),
          base: readBranchInfo(pullRequest.base),
        }
      : undefined,
    changes: baseChange
      ? { base: { ref: baseRefChange ? { from: asString(baseRefChange.from) } : undefined } }
      : undefined,
  };
}
