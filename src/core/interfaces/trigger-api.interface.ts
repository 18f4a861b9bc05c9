import { TriggerApiParams } from '../domain/models';
import { TriggerMode } from '../domain/enums';

/**
 * Response body of the build-trigger endpoint
 */
export interface TriggerApiResponse {
  status: string;
  message: string;
  slug?: string;
  service?: string;
  build_slug?: string;
  build_number?: number;
  build_url?: string;
  triggered_workflow?: string;
}

/**
 * Client for the downstream build-trigger API.
 * One call starts one build; failures are thrown.
 */
export interface TriggerApi {
  readonly mode: TriggerMode;

  trigger(
    url: URL,
    apiToken: string,
    params: TriggerApiParams,
  ): Promise<TriggerApiResponse>;
}
