/**
 * Hook Relay NestJS Module
 */

// Main module
export { HookRelayModule, createProviderRegistry } from './hook-relay.module';

// Configuration
export {
  HookRelayModuleConfig,
  HookRelayModuleOptions,
  HookRelayModuleAsyncConfig,
  BuiltInProviderAdapter,
  RelayEnvironment,
  defaultHookRelayConfig,
  mergeHookRelayConfig,
} from './hook-relay.config';

// HTTP setup
export { HOOK_BODY_LIMIT, useRawHookBodies } from './hook-relay.http';

// Controllers
export { WebhookController, HealthController } from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';

// Decorators
export * from './decorators/hook.decorators';

// Interceptors
export { RawBodyInterceptor } from './interceptors/raw-body.interceptor';

export {
  HOOK_RELAY_CONFIG,
  PROVIDER_REGISTRY,
  TRIGGER_API,
  HOOK_PROCESSOR,
  HOOK_RELAY_VERSION,
} from './constants';
