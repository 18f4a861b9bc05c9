import { Logger, LoggerService } from '@nestjs/common';
import {
  TriggerApi,
  TriggerApiParams,
  TriggerApiResponse,
  TriggerMode,
  buildTriggerRequestBody,
  validateTriggerParams,
} from '../../core';

export const DEFAULT_TRIGGER_TIMEOUT_MS = 10000;

export interface HttpTriggerApiClientOptions {
  timeoutMs?: number;
  logger?: LoggerService;
}

/**
 * Error response of the build-trigger endpoint
 */
export class TriggerApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'TriggerApiError';
  }
}

/**
 * Build-trigger API client that performs real HTTP calls
 *
 * Each call is a JSON POST bounded by `timeoutMs`. Any non-2xx status
 * is raised as a TriggerApiError carrying the API's own message.
 */
export class HttpTriggerApiClient implements TriggerApi {
  readonly mode = TriggerMode.LIVE;
  private readonly timeoutMs: number;
  private readonly logger: LoggerService;

  constructor(options: HttpTriggerApiClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TRIGGER_TIMEOUT_MS;
    this.logger = options.logger ?? new Logger(HttpTriggerApiClient.name);
  }

  async trigger(
    url: URL,
    apiToken: string,
    params: TriggerApiParams,
  ): Promise<TriggerApiResponse> {
    validateTriggerParams(params);
    const body = buildTriggerRequestBody(apiToken, params);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      // The timer stays armed until the body has been read.
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TriggerApiError(`Request timed out after ${this.timeoutMs}ms`);
      }
      throw new TriggerApiError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = parseResponse(text);

    if (!response.ok) {
      const reason =
        parsed?.message ||
        parsed?.error_msg ||
        `${response.status} ${response.statusText}`.trim();
      this.logger.warn(`Build trigger rejected (${response.status}): ${reason}`);
      throw new TriggerApiError(reason, response.status, text);
    }

    return {
      status: parsed?.status || 'ok',
      message: parsed?.message || '',
      slug: parsed?.slug,
      service: parsed?.service,
      build_slug: parsed?.build_slug,
      build_number: parsed?.build_number,
      build_url: parsed?.build_url,
      triggered_workflow: parsed?.triggered_workflow,
    };
  }
}

interface RawTriggerResponse {
  status?: string;
  message?: string;
  error_msg?: string;
  slug?: string;
  service?: string;
  build_slug?: string;
  build_number?: number;
  build_url?: string;
  triggered_workflow?: string;
}

function parseResponse(text: string): RawTriggerResponse | undefined {
  if (!text) return undefined;

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }

  const result: RawTriggerResponse = {};
  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case 'build_number':
        if (typeof field === 'number') result.build_number = field;
        break;
      case 'status':
      case 'message':
      case 'error_msg':
      case 'slug':
      case 'service':
      case 'build_slug':
      case 'build_url':
      case 'triggered_workflow':
        if (typeof field === 'string') result[key] = field;
        break;
    }
  }
  return result;
}
