import { Logger, LoggerService } from '@nestjs/common';
import {
  PipelineStage,
  HookContext,
  StageResult,
  HookTransformError,
  PipelineError,
} from '../types';
import { TransformError, TransformResult } from '../../domain/models';

/**
 * Stage 3: Transform
 * Asks the provider which builds, if any, the webhook stands for
 */
export class TransformStage implements PipelineStage {
  name = 'transform';

  constructor(
    private readonly logger: LoggerService = new Logger(TransformStage.name),
  ) {}

  async execute(context: HookContext): Promise<StageResult> {
    const provider = context.provider;
    if (!provider) {
      throw new PipelineError('No provider resolved before transform', this.name);
    }

    let result: TransformResult;
    try {
      result = provider.transform(context.request);
    } catch (error) {
      // Providers should return errors; a thrown one is treated the same way
      const transformError =
        error instanceof TransformError
          ? error
          : new TransformError(
              error instanceof Error ? error.message : String(error),
              provider.providerName,
            );
      result = { kind: 'error', error: transformError };
    }

    context.transformResult = result;

    switch (result.kind) {
      case 'skip':
        context.skipReason = result.reason;
        return {
          success: true,
          context,
          shouldContinue: false,
          metadata: { skipped: true, reason: result.reason },
        };

      case 'error': {
        const error = new HookTransformError(result.error);
        this.logger.debug?.(
          `[${context.processingId}] ${error.message}`,
        );
        context.failure = error;
        return {
          success: false,
          context,
          error,
          shouldContinue: false,
          metadata: { eventType: result.error.eventType },
        };
      }

      case 'triggers':
        return {
          success: true,
          context,
          shouldContinue: true,
          metadata: { triggerCount: result.triggerParams.length },
        };
    }
  }
}
