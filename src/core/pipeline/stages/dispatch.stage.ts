import { Logger, LoggerService } from '@nestjs/common';
import {
  PipelineStage,
  HookContext,
  StageResult,
  PipelineError,
} from '../types';
import { TransformResults } from '../../domain/models';
import { DispatchStatus } from '../../domain/enums';
import { LifecycleHooks } from '../../interfaces';
import { DispatchReport, TriggerDispatcher } from '../../dispatch';

/**
 * Stage 5: Dispatch
 * Fans the trigger params out to the build API
 */
export class DispatchStage implements PipelineStage {
  name = 'dispatch';

  constructor(
    private readonly dispatcher: TriggerDispatcher,
    private readonly hooks?: LifecycleHooks,
    private readonly logger: LoggerService = new Logger(DispatchStage.name),
  ) {}

  async execute(context: HookContext): Promise<StageResult> {
    if (!context.triggerUrl || !context.transformResult) {
      throw new PipelineError(
        'Dispatch reached without a trigger URL or transform result',
        this.name,
      );
    }

    const triggerParams = TransformResults.triggerParams(context.transformResult);
    const report = await this.dispatcher.dispatch({
      triggerUrl: context.triggerUrl,
      apiToken: context.apiToken,
      triggerParams,
    });

    context.dispatchReport = report;
    await this.notifyTriggerResults(context.processingId, report);

    const failed = report.errors.length;
    return {
      success: failed === 0,
      context,
      shouldContinue: false, // Last stage
      metadata: {
        attempted: report.attempted,
        failed,
      },
    };
  }

  private async notifyTriggerResults(
    processingId: string,
    report: DispatchReport,
  ): Promise<void> {
    const onTriggerResult = this.hooks?.onTriggerResult;
    if (!onTriggerResult) {
      return;
    }

    for (const outcome of report.outcomes) {
      try {
        await onTriggerResult({
          processingId,
          index: outcome.index,
          status: outcome.status,
          durationMs: outcome.durationMs,
          error:
            outcome.status === DispatchStatus.FAILED ? outcome.error : undefined,
        });
      } catch (error) {
        this.logger.warn(
          `onTriggerResult hook failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }
}
