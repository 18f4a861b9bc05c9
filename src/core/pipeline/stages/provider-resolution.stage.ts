import {
  PipelineStage,
  HookContext,
  StageResult,
  UnsupportedProviderError,
} from '../types';
import { ProviderRegistry } from '../../registry';

/**
 * Stage 2: Provider Resolution
 * Looks up the hook provider registered for the service id
 */
export class ProviderResolutionStage implements PipelineStage {
  name = 'provider-resolution';

  constructor(private readonly registry: ProviderRegistry) {}

  async execute(context: HookContext): Promise<StageResult> {
    const provider = this.registry.lookup(context.serviceId);

    if (!provider) {
      const error = new UnsupportedProviderError(context.serviceId);
      context.failure = error;
      return {
        success: false,
        context,
        error,
        shouldContinue: false,
        metadata: { supported: this.registry.ids() },
      };
    }

    context.provider = provider;
    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { provider: provider.providerName },
    };
  }
}
