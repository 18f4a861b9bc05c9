import { DynamicModule, Global, Logger, Module, Provider } from '@nestjs/common';
import {
  HookRelayModuleOptions,
  HookRelayModuleAsyncConfig,
  HookRelayModuleConfig,
  mergeHookRelayConfig,
} from './hook-relay.config';
import {
  HookProcessor,
  HookProvider,
  ProviderRegistry,
  TriggerApi,
  TriggerDispatcher,
  TriggerUrlResolver,
} from '../../core';
import { GitHubProviderAdapter } from '../../adapters/providers/github';
import { PassthroughProviderAdapter } from '../../adapters/providers/passthrough';
import { createTriggerApi, resolveTriggerMode } from '../../adapters/trigger-api';
import { WebhookController } from './controllers/webhook.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';
import {
  HOOK_PROCESSOR,
  HOOK_RELAY_CONFIG,
  PROVIDER_REGISTRY,
  TRIGGER_API,
} from './constants';

/**
 * Build the provider registry from configuration.
 * Duplicate ids and unknown adapter names fail start-up.
 */
export function createProviderRegistry(
  providers: HookRelayModuleConfig['providers'],
): ProviderRegistry {
  return new ProviderRegistry(
    providers.map(({ id, adapter }): [string, HookProvider] => {
      if (typeof adapter !== 'string') {
        return [id, adapter];
      }

      switch (adapter) {
        case 'github':
          return [id, new GitHubProviderAdapter()];
        case 'passthrough':
          return [id, new PassthroughProviderAdapter()];
        default:
          throw new Error(`Unknown provider adapter: ${String(adapter)}`);
      }
    }),
  );
}

/**
 * Hook Relay Module - Main NestJS Module
 *
 * Wires the provider registry, trigger API strategy and hook processor
 * from one configuration value.
 */
@Global()
@Module({})
export class HookRelayModule {
  /**
   * Configure the relay synchronously
   */
  static forRoot(options: HookRelayModuleOptions = {}): DynamicModule {
    return {
      module: HookRelayModule,
      providers: [
        {
          provide: HOOK_RELAY_CONFIG,
          useValue: mergeHookRelayConfig(options),
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: [HOOK_RELAY_CONFIG, PROVIDER_REGISTRY, HOOK_PROCESSOR, ConfigurationService],
    };
  }

  /**
   * Configure the relay asynchronously
   */
  static forRootAsync(options: HookRelayModuleAsyncConfig): DynamicModule {
    return {
      module: HookRelayModule,
      imports: options.imports || [],
      providers: [
        {
          provide: HOOK_RELAY_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeHookRelayConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: [HOOK_RELAY_CONFIG, PROVIDER_REGISTRY, HOOK_PROCESSOR, ConfigurationService],
    };
  }

  /**
   * Providers that depend only on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: PROVIDER_REGISTRY,
        useFactory: (config: HookRelayModuleConfig) =>
          createProviderRegistry(config.providers),
        inject: [HOOK_RELAY_CONFIG],
      },
      {
        provide: TRIGGER_API,
        useFactory: (config: HookRelayModuleConfig) => {
          const mode = resolveTriggerMode({
            sendRequestTo: config.trigger.sendRequestTo,
            environment: config.environment,
          });
          new Logger(HookRelayModule.name).log(`Trigger mode: ${mode}`);
          return createTriggerApi(mode, { timeoutMs: config.trigger.timeoutMs });
        },
        inject: [HOOK_RELAY_CONFIG],
      },
      {
        provide: HOOK_PROCESSOR,
        useFactory: (
          config: HookRelayModuleConfig,
          registry: ProviderRegistry,
          triggerApi: TriggerApi,
        ) =>
          new HookProcessor({
            registry,
            urlResolver: new TriggerUrlResolver({
              overrideUrl: config.trigger.sendRequestTo,
              apiRootUrl: config.trigger.apiRootUrl,
            }),
            dispatcher: new TriggerDispatcher(triggerApi, {
              concurrency: config.trigger.concurrency,
            }),
            hooks: config.hooks,
          }),
        inject: [HOOK_RELAY_CONFIG, PROVIDER_REGISTRY, TRIGGER_API],
      },
      {
        provide: ConfigurationService,
        useClass: ConfigurationService,
      },
    ];
  }
}
