import { Logger, LoggerService } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  HookProcessorConfig,
  HookRequest,
  HookContext,
  HookProcessingResult,
  PipelineStage,
  ProcessingMetrics,
  PipelineError,
} from './types';
import { OutcomeComposer } from './outcome-composer';
import { ValidationStage } from './stages/validation.stage';
import { ProviderResolutionStage } from './stages/provider-resolution.stage';
import { TransformStage } from './stages/transform.stage';
import { UrlResolutionStage } from './stages/url-resolution.stage';
import { DispatchStage } from './stages/dispatch.stage';
import { HookOutcome } from '../domain/enums';

/**
 * HookProcessor runs one webhook through the relay pipeline
 *
 * Pipeline stages:
 * 1. Validation - Caller-supplied parameters present
 * 2. Provider Resolution - Registry lookup by service id
 * 3. Transform - Provider turns the webhook into trigger params
 * 4. URL Resolution - Build-trigger endpoint for the app
 * 5. Dispatch - One trigger call per param
 *
 * Every outcome, including unexpected stage failures, ends in a composed
 * response; nothing is thrown to the caller.
 */
export class HookProcessor {
  private readonly stages: PipelineStage[];
  private readonly composer = new OutcomeComposer();
  private readonly logger: LoggerService;

  constructor(private readonly config: HookProcessorConfig) {
    this.logger = config.logger ?? new Logger(HookProcessor.name);
    this.stages = this.initializeStages();
  }

  async process(request: HookRequest): Promise<HookProcessingResult> {
    const startTime = Date.now();

    const context: HookContext = {
      serviceId: request.serviceId ?? '',
      appSlug: request.appSlug ?? '',
      apiToken: request.apiToken ?? '',
      request: {
        headers: this.normalizeHeaders(request.headers),
        body: request.body,
      },
      receivedAt: new Date(),
      processingId: uuidv4(),
      metadata: {},
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
      transformed: false,
      triggerCount: 0,
    };

    await this.executePipeline(context, metrics);

    const { outcome, response } = this.composer.compose(context);
    metrics.totalDurationMs = Date.now() - startTime;
    metrics.triggerCount = context.dispatchReport?.attempted ?? 0;

    if (response.accepted) {
      this.logger.log(
        `[${context.processingId}] ${context.serviceId}: ${response.body.message}`,
      );
    } else {
      const errors = response.body.errors.join('; ');
      this.logger.warn(
        `[${context.processingId}] ${context.serviceId || '<none>'}: rejected (${errors})`,
      );
    }

    await this.notifyFate(context, outcome, response.statusCode, metrics);

    return {
      processingId: context.processingId,
      outcome,
      response,
      dispatchReport: context.dispatchReport,
      metrics,
    };
  }

  /**
   * Execute the pipeline stages sequentially
   */
  private async executePipeline(
    context: HookContext,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        if (stage.name === 'transform' && context.transformResult) {
          metrics.transformed = true;
        }

        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `[${context.processingId}] Stage '${stage.name}' failed: ${message}`,
          error instanceof Error ? error.stack : undefined,
        );
        context.failure = new PipelineError(
          `Stage '${stage.name}' failed: ${message}`,
          stage.name,
          error instanceof Error ? error : undefined,
        );
        break;
      }
    }
  }

  private initializeStages(): PipelineStage[] {
    return [
      new ValidationStage(),
      new ProviderResolutionStage(this.config.registry),
      new TransformStage(this.config.logger),
      new UrlResolutionStage(this.config.urlResolver, this.config.logger),
      new DispatchStage(
        this.config.dispatcher,
        this.config.hooks,
        this.config.logger,
      ),
    ];
  }

  private async notifyFate(
    context: HookContext,
    outcome: HookOutcome,
    statusCode: number,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    const onHookFate = this.config.hooks?.onHookFate;
    if (!onHookFate) {
      return;
    }

    const errorCount =
      context.dispatchReport?.errors.length ?? (context.failure ? 1 : 0);

    try {
      await onHookFate({
        processingId: context.processingId,
        serviceId: context.serviceId,
        outcome,
        statusCode,
        triggerCount: metrics.triggerCount,
        errorCount,
        latencyMs: metrics.totalDurationMs,
      });
    } catch (error) {
      this.logger.warn(
        `onHookFate hook failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Normalize headers to lowercase keys, joining repeated values
   */
  private normalizeHeaders(
    headers: HookRequest['headers'],
  ): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (value === undefined) continue;
      normalized[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
    }
    return normalized;
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): {
    stages: string[];
    providers: string[];
    triggerOverride: boolean;
  } {
    return {
      stages: this.stages.map((s) => s.name),
      providers: this.config.registry.ids(),
      triggerOverride: this.config.urlResolver.hasOverride,
    };
  }
}
