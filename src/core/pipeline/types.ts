import { HttpStatus, LoggerService } from '@nestjs/common';
import { TransformError, TransformResult } from '../domain/models';
import { HookOutcome } from '../domain/enums';
import { HookProvider, LifecycleHooks, RawWebhookRequest } from '../interfaces';
import { ProviderRegistry } from '../registry';
import {
  DispatchReport,
  TriggerDispatcher,
  TriggerUrlResolver,
} from '../dispatch';

/**
 * Caller-supplied values and raw webhook as received
 */
export interface HookRequest {
  serviceId?: string;
  appSlug?: string;
  apiToken?: string;
  headers: Record<string, string | string[] | undefined>;
  body: Buffer;
}

/**
 * Hook processing context passed through the pipeline
 */
export interface HookContext {
  // Caller-supplied
  serviceId: string;
  appSlug: string;
  apiToken: string;

  // Raw input
  request: RawWebhookRequest;
  receivedAt: Date;
  processingId: string;

  // Filled by stages
  provider?: HookProvider;
  transformResult?: TransformResult;
  triggerUrl?: URL;
  dispatchReport?: DispatchReport;

  // Early terminal states
  failure?: Error;
  skipReason?: string;

  metadata: Record<string, unknown>;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: HookContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: HookContext): Promise<StageResult>;
}

export interface HookSuccessBody {
  message: string;
}

export interface HookErrorBody {
  errors: string[];
}

/**
 * Client-facing response: accepted with a message, or rejected with
 * every error that caused it. No other status codes are used.
 */
export type HookResponse =
  | { accepted: true; statusCode: HttpStatus.OK; body: HookSuccessBody }
  | { accepted: false; statusCode: HttpStatus.BAD_REQUEST; body: HookErrorBody };

/**
 * Processor configuration
 */
export interface HookProcessorConfig {
  registry: ProviderRegistry;
  urlResolver: TriggerUrlResolver;
  dispatcher: TriggerDispatcher;
  hooks?: LifecycleHooks;
  logger?: LoggerService;
}

/**
 * Processing metrics
 */
export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
  transformed: boolean;
  triggerCount: number;
}

/**
 * Processing result returned by the processor
 */
export interface HookProcessingResult {
  processingId: string;
  outcome: HookOutcome;
  response: HookResponse;
  dispatchReport?: DispatchReport;
  metrics: ProcessingMetrics;
}

export type HookParameter = 'service-id' | 'app-slug' | 'api-token';

/**
 * A required caller-supplied parameter is missing
 */
export class HookValidationError extends Error {
  constructor(
    message: string,
    public readonly field: HookParameter,
  ) {
    super(message);
    this.name = 'HookValidationError';
  }
}

/**
 * No provider is registered for the requested service id
 */
export class UnsupportedProviderError extends Error {
  constructor(public readonly serviceId: string) {
    super(`Unsupported Webhook Type / Provider: ${serviceId}`);
    this.name = 'UnsupportedProviderError';
  }
}

/**
 * Provider rejected the payload; wraps the provider's TransformError
 */
export class HookTransformError extends Error {
  constructor(public readonly transformError: TransformError) {
    super(`Failed to transform the webhook: ${transformError.message}`);
    this.name = 'HookTransformError';
  }
}

/**
 * Unexpected failure inside a stage
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
