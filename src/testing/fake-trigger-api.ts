import {
  TriggerApi,
  TriggerApiParams,
  TriggerApiResponse,
  TriggerMode,
  validateTriggerParams,
} from '../core';

export interface RecordedTrigger {
  url: string;
  apiToken: string;
  params: TriggerApiParams;
}

/**
 * In-process trigger API for tests.
 * Records every call; calls listed in `failOn` (0-based) reject.
 */
export class FakeTriggerApi implements TriggerApi {
  readonly mode = TriggerMode.LIVE;
  readonly calls: RecordedTrigger[] = [];

  private readonly failOn: Map<number, string>;

  constructor(failOn: Record<number, string> = {}) {
    this.failOn = new Map(
      Object.entries(failOn).map(([index, message]): [number, string] => [Number(index), message]),
    );
  }

  async trigger(
    url: URL,
    apiToken: string,
    params: TriggerApiParams,
  ): Promise<TriggerApiResponse> {
    const callIndex = this.calls.length;
    this.calls.push({ url: url.href, apiToken, params });

    validateTriggerParams(params);

    const failure = this.failOn.get(callIndex);
    if (failure !== undefined) {
      throw new Error(failure);
    }

    return {
      status: 'ok',
      message: 'webhook processed',
      build_number: callIndex + 1,
    };
  }

  reset(): void {
    this.calls.length = 0;
  }
}
