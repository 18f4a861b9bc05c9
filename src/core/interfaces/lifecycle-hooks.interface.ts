import { HookOutcome, DispatchStatus } from '../domain/enums';

/**
 * Emitted once per hook request after the response is composed
 */
export interface HookFateEvent {
  processingId: string;
  serviceId: string;
  outcome: HookOutcome;
  statusCode: number;
  triggerCount: number;
  errorCount: number;
  latencyMs: number;
}

/**
 * Emitted after each trigger attempt
 */
export interface TriggerResultEvent {
  processingId: string;
  index: number;
  status: DispatchStatus;
  durationMs: number;
  error?: Error;
}

/**
 * Optional observers of the relay pipeline.
 * Exceptions thrown here are logged and never change a response.
 */
export interface LifecycleHooks {
  onHookFate?: (event: HookFateEvent) => void | Promise<void>;
  onTriggerResult?: (event: TriggerResultEvent) => void | Promise<void>;
}
