import { Logger, LoggerService } from '@nestjs/common';
import {
  TriggerApi,
  TriggerApiParams,
  TriggerApiResponse,
  TriggerMode,
  buildTriggerRequestBody,
  validateTriggerParams,
} from '../../core';

/**
 * Build-trigger API client that only logs what it would send.
 * Used outside production when no override URL is configured.
 */
export class LogOnlyTriggerApiClient implements TriggerApi {
  readonly mode = TriggerMode.LOG_ONLY;

  constructor(
    private readonly logger: LoggerService = new Logger(LogOnlyTriggerApiClient.name),
  ) {}

  async trigger(
    url: URL,
    apiToken: string,
    params: TriggerApiParams,
  ): Promise<TriggerApiResponse> {
    validateTriggerParams(params);
    const body = buildTriggerRequestBody(apiToken, params);

    this.logger.log(`===> Triggering Build: (url:${url.href})`);
    this.logger.log(
      `====> JSON body: ${JSON.stringify({
        ...body,
        hook_info: { ...body.hook_info, api_token: '[REDACTED]' },
      })}`,
    );

    return {
      status: 'ok',
      message: 'Only logged',
    };
  }
}
