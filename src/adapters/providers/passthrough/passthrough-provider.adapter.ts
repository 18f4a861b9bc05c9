import {
  BuildParams,
  EnvironmentItem,
  HookProvider,
  RawWebhookRequest,
  TransformError,
  TransformResult,
  TransformResults,
  TriggerApiParams,
} from '../../../core';

/**
 * Passthrough Provider Adapter
 *
 * For callers that already speak the trigger format:
 * - `{ "build_params": {...} }` starts one build
 * - `{ "builds": [{ "build_params": {...} }, ...] }` starts one build per item
 * - `{ "skip": "reason" }` is acknowledged without a build
 */
export class PassthroughProviderAdapter implements HookProvider {
  readonly providerName = 'passthrough';
  readonly supportedEvents = ['build'] as const;

  transform(request: RawWebhookRequest): TransformResult {
    if (request.body.length === 0) {
      return this.failure('Failed to read content of request body: no or empty request body');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(request.body.toString('utf-8'));
    } catch (error) {
      return this.failure(
        `Failed to parse request body: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!isRecord(payload)) {
      return this.failure('Request body must be a JSON object');
    }

    if (typeof payload.skip === 'string') {
      return TransformResults.skip(payload.skip);
    }

    try {
      if (Array.isArray(payload.builds)) {
        return TransformResults.triggers(
          payload.builds.map((item, index) => this.readTrigger(item, `builds[${index}]`)),
        );
      }

      if ('build_params' in payload) {
        return TransformResults.triggers([this.readTrigger(payload, 'body')]);
      }
    } catch (error) {
      if (error instanceof TransformError) {
        return TransformResults.failure(error);
      }
      throw error;
    }

    return this.failure('Expected one of: build_params, builds, skip');
  }

  private readTrigger(value: unknown, path: string): TriggerApiParams {
    if (!isRecord(value) || !isRecord(value.build_params)) {
      throw new TransformError(`${path}.build_params must be an object`, this.providerName);
    }

    const raw = value.build_params;
    const buildParams: BuildParams = {};

    for (const key of STRING_PARAMS) {
      const field = raw[key];
      if (field === undefined) continue;
      if (typeof field !== 'string') {
        throw new TransformError(
          `${path}.build_params.${key} must be a string`,
          this.providerName,
        );
      }
      buildParams[key] = field;
    }

    if (raw.pull_request_id !== undefined) {
      if (typeof raw.pull_request_id !== 'number') {
        throw new TransformError(
          `${path}.build_params.pull_request_id must be a number`,
          this.providerName,
        );
      }
      buildParams.pull_request_id = raw.pull_request_id;
    }

    if (raw.environments !== undefined) {
      buildParams.environments = this.readEnvironments(raw.environments, path);
    }

    const params: TriggerApiParams = { build_params: buildParams };
    if (typeof value.triggered_by === 'string') {
      params.triggered_by = value.triggered_by;
    }
    return params;
  }

  private readEnvironments(value: unknown, path: string): EnvironmentItem[] {
    if (!Array.isArray(value)) {
      throw new TransformError(
        `${path}.build_params.environments must be an array`,
        this.providerName,
      );
    }

    return value.map((item, index) => {
      if (
        !isRecord(item) ||
        typeof item.mapped_to !== 'string' ||
        typeof item.value !== 'string'
      ) {
        throw new TransformError(
          `${path}.build_params.environments[${index}] needs string mapped_to and value`,
          this.providerName,
        );
      }
      const env: EnvironmentItem = { mapped_to: item.mapped_to, value: item.value };
      if (typeof item.is_expand === 'boolean') {
        env.is_expand = item.is_expand;
      }
      return env;
    });
  }

  private failure(message: string): TransformResult {
    return TransformResults.failure(new TransformError(message, this.providerName));
  }
}

const STRING_PARAMS = [
  'branch',
  'tag',
  'commit_hash',
  'commit_message',
  'workflow_id',
  'branch_dest',
  'pull_request_repository_url',
  'pull_request_merge_branch',
  'pull_request_head_branch',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
