/**
 * Environment variable passed to a triggered build
 */
export interface EnvironmentItem {
  mapped_to: string;
  value: string;
  is_expand?: boolean;
}

/**
 * Build parameters understood by the build-trigger API.
 * The relay core passes these through without reading them.
 */
export interface BuildParams {
  branch?: string;
  tag?: string;
  commit_hash?: string;
  commit_message?: string;
  workflow_id?: string;
  branch_dest?: string;
  pull_request_id?: number;
  pull_request_repository_url?: string;
  pull_request_merge_branch?: string;
  pull_request_head_branch?: string;
  environments?: EnvironmentItem[];
}

/**
 * One build to start, as produced by a hook provider
 */
export interface TriggerApiParams {
  build_params: BuildParams;
  triggered_by?: string;
}

/**
 * Hook metadata added by the trigger client, never by a provider
 */
export interface HookInfo {
  type: 'bitrise';
  api_token: string;
}

/**
 * Body posted to the build-trigger endpoint
 */
export interface TriggerRequestBody extends TriggerApiParams {
  triggered_by: string;
  hook_info: HookInfo;
}

export const DEFAULT_TRIGGERED_BY = 'webhook';

export class InvalidTriggerParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTriggerParamsError';
  }
}

/**
 * A trigger must name at least one of branch, tag or workflow
 */
export function validateTriggerParams(params: TriggerApiParams): void {
  const { branch, tag, workflow_id } = params.build_params;
  if (!branch && !tag && !workflow_id) {
    throw new InvalidTriggerParamsError(
      'Missing Branch, Tag and WorkflowID parameters - at least one of these is required',
    );
  }
}

/**
 * Build the JSON body for the trigger endpoint
 */
export function buildTriggerRequestBody(
  apiToken: string,
  params: TriggerApiParams,
): TriggerRequestBody {
  return {
    build_params: params.build_params,
    triggered_by: params.triggered_by || DEFAULT_TRIGGERED_BY,
    hook_info: {
      type: 'bitrise',
      api_token: apiToken,
    },
  };
}
