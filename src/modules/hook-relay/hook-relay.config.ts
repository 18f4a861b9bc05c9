import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { HookProvider, LifecycleHooks } from '../../core';

/**
 * Built-in provider adapters that can be registered by name
 */
export type BuiltInProviderAdapter = 'github' | 'passthrough';

export type RelayEnvironment = 'development' | 'production' | 'test';

/**
 * Hook Relay Module Configuration
 */
export interface HookRelayModuleConfig {
  /**
   * Webhook sources, keyed by the service id used in the hook URL.
   * Fixed for the lifetime of the process.
   */
  providers: Array<{
    id: string;
    adapter: HookProvider | BuiltInProviderAdapter;
  }>;

  /**
   * Build-trigger API settings
   */
  trigger: {
    /**
     * Send every trigger to this URL instead of the app's endpoint.
     * Setting it also switches on real HTTP calls outside production.
     */
    sendRequestTo?: string;

    /**
     * Root of the build API, used to derive `<root>/app/<slug>/build/start.json`
     */
    apiRootUrl: string;

    /**
     * Timeout for one trigger call in milliseconds
     */
    timeoutMs: number;

    /**
     * Trigger calls in flight per request; 1 keeps them sequential
     */
    concurrency: number;
  };

  /**
   * Production performs real trigger calls; other modes only log them
   * unless `trigger.sendRequestTo` is set.
   */
  environment: RelayEnvironment;

  /**
   * Lifecycle hooks
   */
  hooks?: LifecycleHooks;

  /**
   * API configuration
   */
  api: {
    enableSwagger: boolean;
  };

  debug: boolean;
}

/**
 * Partial configuration accepted by forRoot / forRootAsync
 */
export type HookRelayModuleOptions = Partial<
  Omit<HookRelayModuleConfig, 'trigger' | 'api'>
> & {
  trigger?: Partial<HookRelayModuleConfig['trigger']>;
  api?: Partial<HookRelayModuleConfig['api']>;
};

/**
 * Async configuration factory
 */
export interface HookRelayModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<HookRelayModuleOptions>['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultHookRelayConfig: HookRelayModuleConfig = {
  providers: [
    { id: 'github', adapter: 'github' },
    { id: 'passthrough', adapter: 'passthrough' },
  ],
  trigger: {
    apiRootUrl: 'https://www.bitrise.io',
    timeoutMs: 10000,
    concurrency: 1,
  },
  environment: 'development',
  api: {
    enableSwagger: true,
  },
  debug: false,
};

export function mergeHookRelayConfig(
  options: HookRelayModuleOptions = {},
): HookRelayModuleConfig {
  return {
    ...defaultHookRelayConfig,
    ...options,
    providers: options.providers ?? defaultHookRelayConfig.providers,
    trigger: { ...defaultHookRelayConfig.trigger, ...options.trigger },
    api: { ...defaultHookRelayConfig.api, ...options.api },
  };
}
