import { Logger, LoggerService } from '@nestjs/common';
import { PipelineStage, HookContext, StageResult } from '../types';
import { TriggerUrlResolver, UrlResolutionError } from '../../dispatch';

/**
 * Stage 4: URL Resolution
 * Picks the build-trigger endpoint for the app
 */
export class UrlResolutionStage implements PipelineStage {
  name = 'url-resolution';

  constructor(
    private readonly resolver: TriggerUrlResolver,
    private readonly logger: LoggerService = new Logger(UrlResolutionStage.name),
  ) {}

  async execute(context: HookContext): Promise<StageResult> {
    try {
      context.triggerUrl = this.resolver.resolve(context.appSlug);
      return {
        success: true,
        context,
        shouldContinue: true,
      };
    } catch (error) {
      const resolutionError =
        error instanceof UrlResolutionError
          ? error
          : new UrlResolutionError(
              error instanceof Error ? error.message : String(error),
            );
      this.logger.error(
        `[${context.processingId}] ${resolutionError.message}`,
      );
      context.failure = resolutionError;
      return {
        success: false,
        context,
        error: resolutionError,
        shouldContinue: false,
      };
    }
  }
}
