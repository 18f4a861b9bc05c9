import {
  PipelineStage,
  HookContext,
  StageResult,
  HookValidationError,
  HookParameter,
} from '../types';

const REQUIRED_PARAMETERS: ReadonlyArray<{
  field: HookParameter;
  key: 'serviceId' | 'appSlug' | 'apiToken';
  message: string;
}> = [
  { field: 'service-id', key: 'serviceId', message: 'No service-id defined' },
  { field: 'app-slug', key: 'appSlug', message: 'No App Slug parameter defined' },
  { field: 'api-token', key: 'apiToken', message: 'No API Token parameter defined' },
];

/**
 * Stage 1: Validation
 * Rejects the request on the first missing caller-supplied parameter
 */
export class ValidationStage implements PipelineStage {
  name = 'validation';

  async execute(context: HookContext): Promise<StageResult> {
    for (const { field, key, message } of REQUIRED_PARAMETERS) {
      if (!context[key]) {
        const error = new HookValidationError(message, field);
        context.failure = error;
        return {
          success: false,
          context,
          error,
          shouldContinue: false,
          metadata: { field },
        };
      }
    }

    return {
      success: true,
      context,
      shouldContinue: true,
    };
  }
}
