import { Injectable, Inject, LogLevel } from '@nestjs/common';
import type { HookRelayModuleConfig, RelayEnvironment } from '../hook-relay.config';
import type { TriggerApi, TriggerMode } from '../../../core';
import { HOOK_RELAY_CONFIG, TRIGGER_API } from '../constants';

const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error'];
const DEBUG_LOG_LEVELS: LogLevel[] = [...DEFAULT_LOG_LEVELS, 'debug', 'verbose'];

/**
 * Configuration Service
 *
 * Read-only view of the relay configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(HOOK_RELAY_CONFIG)
    private readonly config: HookRelayModuleConfig,
    @Inject(TRIGGER_API)
    private readonly triggerApi: TriggerApi,
  ) {}

  getConfig(): HookRelayModuleConfig {
    return this.config;
  }

  getEnvironment(): RelayEnvironment {
    return this.config.environment;
  }

  /**
   * Whether trigger calls are sent or only logged
   */
  getTriggerMode(): TriggerMode {
    return this.triggerApi.mode;
  }

  hasTriggerOverride(): boolean {
    return Boolean(this.config.trigger.sendRequestTo);
  }

  isSwaggerEnabled(): boolean {
    return this.config.api.enableSwagger;
  }

  isDebugMode(): boolean {
    return this.config.debug;
  }

  getLogLevels(): LogLevel[] {
    return this.isDebugMode() ? [...DEBUG_LOG_LEVELS] : [...DEFAULT_LOG_LEVELS];
  }
}
