/**
 * Hook relay pipeline
 *
 * validation -> provider resolution -> transform -> URL resolution -> dispatch,
 * then the outcome composer turns the final context into a response.
 */

// Main processor
export { HookProcessor } from './hook-processor';
export { OutcomeComposer, triggeredBuildsMessage, skipMessage } from './outcome-composer';
export type { ComposedOutcome } from './outcome-composer';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { ValidationStage } from './stages/validation.stage';
export { ProviderResolutionStage } from './stages/provider-resolution.stage';
export { TransformStage } from './stages/transform.stage';
export { UrlResolutionStage } from './stages/url-resolution.stage';
export { DispatchStage } from './stages/dispatch.stage';
