import { Logger, LoggerService } from '@nestjs/common';
import { TriggerApiParams } from '../domain/models';
import { DispatchStatus } from '../domain/enums';
import { TriggerApi, TriggerApiResponse } from '../interfaces';

export const NO_EVENT_DETECTED_MESSAGE =
  'After processing the webhook we failed to detect any event in it ' +
  'which could be turned into a build.';

/**
 * A valid webhook that produced no build to start
 */
export class NoEventDetectedError extends Error {
  constructor() {
    super(NO_EVENT_DETECTED_MESSAGE);
    this.name = 'NoEventDetectedError';
  }
}

/**
 * Failure of one trigger attempt; siblings are unaffected
 */
export class TriggerDispatchError extends Error {
  constructor(
    public readonly index: number,
    public readonly originalError: Error,
  ) {
    super(`Failed to Trigger the Build: ${originalError.message}`);
    this.name = 'TriggerDispatchError';
  }
}

interface BaseDispatchOutcome {
  index: number;
  params: TriggerApiParams;
  durationMs: number;
}

export interface TriggeredOutcome extends BaseDispatchOutcome {
  status: DispatchStatus.TRIGGERED;
  response: TriggerApiResponse;
}

export interface FailedOutcome extends BaseDispatchOutcome {
  status: DispatchStatus.FAILED;
  error: TriggerDispatchError;
}

export type DispatchOutcome = TriggeredOutcome | FailedOutcome;

export interface DispatchRequest {
  triggerUrl: URL;
  apiToken: string;
  triggerParams: TriggerApiParams[];
}

/**
 * Aggregate of one fan-out.
 * `outcomes` holds one entry per input param, in input order.
 * `errors` is empty exactly when every attempt succeeded.
 */
export interface DispatchReport {
  attempted: number;
  outcomes: DispatchOutcome[];
  errors: Error[];
}

export interface TriggerDispatcherOptions {
  /**
   * Maximum trigger calls in flight for one request. Defaults to 1 (sequential).
   */
  concurrency?: number;
  logger?: LoggerService;
}

/**
 * Submits every trigger param of a request to the build API.
 *
 * Each param is attempted regardless of how earlier ones went; failures
 * are collected, not thrown.
 */
export class TriggerDispatcher {
  private readonly concurrency: number;
  private readonly logger: LoggerService;

  constructor(
    private readonly triggerApi: TriggerApi,
    options: TriggerDispatcherOptions = {},
  ) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.logger = options.logger ?? new Logger(TriggerDispatcher.name);
  }

  async dispatch(request: DispatchRequest): Promise<DispatchReport> {
    const { triggerParams } = request;

    if (triggerParams.length === 0) {
      return {
        attempted: 0,
        outcomes: [],
        errors: [new NoEventDetectedError()],
      };
    }

    const outcomes: DispatchOutcome[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < triggerParams.length) {
        const index = next++;
        outcomes[index] = await this.attempt(request, index);
      }
    };

    const workerCount = Math.min(this.concurrency, triggerParams.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const errors: Error[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === DispatchStatus.FAILED) {
        errors.push(outcome.error);
      }
    }

    return {
      attempted: outcomes.length,
      outcomes,
      errors,
    };
  }

  private async attempt(
    request: DispatchRequest,
    index: number,
  ): Promise<DispatchOutcome> {
    const params = request.triggerParams[index];
    const startTime = Date.now();

    try {
      const response = await this.triggerApi.trigger(
        request.triggerUrl,
        request.apiToken,
        params,
      );
      return {
        index,
        params,
        status: DispatchStatus.TRIGGERED,
        response,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const position = `${index + 1}/${request.triggerParams.length}`;
      this.logger.warn(`Trigger ${position} failed: ${cause.message}`);

      return {
        index,
        params,
        status: DispatchStatus.FAILED,
        error: new TriggerDispatchError(index, cause),
        durationMs: Date.now() - startTime,
      };
    }
  }
}
