import { TriggerApiParams } from './trigger-params.model';

/**
 * Raised (or returned) by a provider when a payload cannot be read
 */
export class TransformError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly eventType?: string,
  ) {
    super(message);
    this.name = 'TransformError';
  }
}

export interface SkipTransformResult {
  kind: 'skip';
  reason: string;
}

export interface ErrorTransformResult {
  kind: 'error';
  error: TransformError;
}

export interface TriggersTransformResult {
  kind: 'triggers';
  triggerParams: TriggerApiParams[];
}

/**
 * Normalized outcome of inspecting one webhook request.
 *
 * Exactly one variant applies: a recognized event that needs no build
 * (`skip`), a payload that could not be read (`error`), or the builds the
 * event asks for (`triggers`, possibly empty).
 */
export type TransformResult =
  | SkipTransformResult
  | ErrorTransformResult
  | TriggersTransformResult;

export const TransformResults = {
  skip(reason: string): SkipTransformResult {
    return { kind: 'skip', reason };
  },

  failure(error: TransformError): ErrorTransformResult {
    return { kind: 'error', error };
  },

  triggers(triggerParams: TriggerApiParams[]): TriggersTransformResult {
    return { kind: 'triggers', triggerParams };
  },

  shouldSkip(result: TransformResult): boolean {
    return result.kind === 'skip';
  },

  skipReason(result: TransformResult): string | undefined {
    return result.kind === 'skip' ? result.reason : undefined;
  },

  error(result: TransformResult): TransformError | undefined {
    return result.kind === 'error' ? result.error : undefined;
  },

  triggerParams(result: TransformResult): TriggerApiParams[] {
    return result.kind === 'triggers' ? result.triggerParams : [];
  },
};
