import { LoggerService } from '@nestjs/common';
import { TriggerApi, TriggerMode } from '../../core';
import { HttpTriggerApiClient } from './http-trigger-api.client';
import { LogOnlyTriggerApiClient } from './log-only-trigger-api.client';

export interface TriggerModeOptions {
  sendRequestTo?: string;
  environment: string;
}

/**
 * Real calls happen when an override URL is configured or in production;
 * everything else only logs.
 */
export function resolveTriggerMode(options: TriggerModeOptions): TriggerMode {
  return options.sendRequestTo || options.environment === 'production'
    ? TriggerMode.LIVE
    : TriggerMode.LOG_ONLY;
}

export function createTriggerApi(
  mode: TriggerMode,
  options: { timeoutMs?: number; logger?: LoggerService } = {},
): TriggerApi {
  switch (mode) {
    case TriggerMode.LIVE:
      return new HttpTriggerApiClient(options);
    case TriggerMode.LOG_ONLY:
      return new LogOnlyTriggerApiClient(options.logger);
  }
}
