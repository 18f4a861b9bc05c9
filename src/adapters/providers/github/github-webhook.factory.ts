/**
 * GitHub Webhook Factory
 * Builds GitHub deliveries (headers + raw body) for tests and local runs
 */
export interface GitHubDelivery {
  body: Buffer;
  headers: Record<string, string>;
  payload: Record<string, unknown>;
}

export class GitHubWebhookFactory {
  /**
   * A push to a branch
   */
  static push(
    options: {
      branch?: string;
      commitHash?: string;
      message?: string;
      distinct?: boolean;
      deleted?: boolean;
    } = {},
  ): GitHubDelivery {
    return this.delivery('push', {
      ref: `refs/heads/${options.branch ?? 'main'}`,
      deleted: options.deleted ?? false,
      head_commit: {
        id: options.commitHash ?? '83b86e5f286f546dc5a4a58db66ceef44460c85e',
        message: options.message ?? 'Update README',
        distinct: options.distinct ?? true,
      },
    });
  }

  /**
   * A pushed tag
   */
  static tag(
    options: { tag?: string; commitHash?: string; message?: string } = {},
  ): GitHubDelivery {
    return this.delivery('push', {
      ref: `refs/tags/${options.tag ?? 'v1.0.0'}`,
      deleted: false,
      head_commit: {
        id: options.commitHash ?? '2e13c5bd1b4ea3e2a4c2c3dd5f3e2c7d9b0a1f22',
        message: options.message ?? 'Release v1.0.0',
        distinct: true,
      },
    });
  }

  /**
   * A pull request event
   */
  static pullRequest(
    options: {
      action?: string;
      number?: number;
      state?: string;
      merged?: boolean;
      title?: string;
      body?: string | null;
      headBranch?: string;
      baseBranch?: string;
      headSha?: string;
      privateRepo?: boolean;
      baseChanged?: boolean;
    } = {},
  ): GitHubDelivery {
    const number = options.number ?? 12;
    const payload: Record<string, unknown> = {
      action: options.action ?? 'opened',
      number,
      pull_request: {
        number,
        state: options.state ?? 'open',
        merged: options.merged ?? false,
        title: options.title ?? 'Add build badge',
        body: options.body === undefined ? null : options.body,
        head: {
          ref: options.headBranch ?? 'feature/badge',
          sha: options.headSha ?? 'b2d61c6d3b7a0c51ad1f8c8b7e0f3c4d5a6b7c8d',
          repo: {
            private: options.privateRepo ?? false,
            clone_url: 'https://github.com/octo-org/demo-app.git',
            ssh_url: 'git@github.com:octo-org/demo-app.git',
            full_name: 'octo-org/demo-app',
          },
        },
        base: {
          ref: options.baseBranch ?? 'main',
          sha: '1f0e9d8c7b6a5f4e3d2c1b0a9f8e7d6c5b4a3f2e',
          repo: {
            private: options.privateRepo ?? false,
            clone_url: 'https://github.com/octo-org/demo-app.git',
            ssh_url: 'git@github.com:octo-org/demo-app.git',
            full_name: 'octo-org/demo-app',
          },
        },
      },
    };

    if (options.baseChanged) {
      payload.changes = { base: { ref: { from: 'develop' } } };
    }

    return this.delivery('pull_request', payload);
  }

  /**
   * The ping GitHub sends when a hook is created
   */
  static ping(): GitHubDelivery {
    return this.delivery('ping', { zen: 'Keep it logically awesome.', hook_id: 1 });
  }

  /**
   * Any event with an arbitrary payload
   */
  static delivery(
    event: string,
    payload: Record<string, unknown>,
    contentType = 'application/json',
  ): GitHubDelivery {
    const json = JSON.stringify(payload);
    const body =
      contentType === 'application/x-www-form-urlencoded'
        ? Buffer.from(new URLSearchParams({ payload: json }).toString())
        : Buffer.from(json);

    return {
      body,
      headers: {
        'content-type': contentType,
        'x-github-event': event,
        'x-github-delivery': '72d3162e-cc78-11e3-81ab-4c9367dc0958',
      },
      payload,
    };
  }
}
