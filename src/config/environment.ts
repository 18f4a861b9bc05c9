import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import type { HookRelayModuleOptions, RelayEnvironment } from '../modules/hook-relay/hook-relay.config';

const ENVIRONMENTS: readonly RelayEnvironment[] = ['development', 'production', 'test'];

const URL_OPTIONS = { require_tld: false, require_protocol: true };

function emptyToUndefined({ value }: { value: unknown }): unknown {
  return value === '' ? undefined : value;
}

function toBoolean({ value }: { value: unknown }): unknown {
  if (value === undefined || value === '') return undefined;
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}

/**
 * Process environment recognised by the relay
 */
export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(ENVIRONMENTS)
  NODE_ENV?: RelayEnvironment;

  @IsOptional()
  @Transform(emptyToUndefined)
  @IsUrl(URL_OPTIONS)
  SEND_REQUEST_TO?: string;

  @IsOptional()
  @Transform(emptyToUndefined)
  @IsUrl(URL_OPTIONS)
  BUILD_API_ROOT_URL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  TRIGGER_TIMEOUT_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(64)
  TRIGGER_CONCURRENCY?: number;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  ENABLE_SWAGGER?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DEBUG?: boolean;
}

/**
 * `validate` callback for ConfigModule.forRoot
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return validated;
}

/**
 * Module options from validated environment. Unset variables are left
 * out so module defaults apply.
 */
export function hookRelayConfigFromEnvironment(
  env: EnvironmentVariables,
): HookRelayModuleOptions {
  const trigger: NonNullable<HookRelayModuleOptions['trigger']> = {};
  if (env.SEND_REQUEST_TO !== undefined) trigger.sendRequestTo = env.SEND_REQUEST_TO;
  if (env.BUILD_API_ROOT_URL !== undefined) trigger.apiRootUrl = env.BUILD_API_ROOT_URL;
  if (env.TRIGGER_TIMEOUT_MS !== undefined) trigger.timeoutMs = env.TRIGGER_TIMEOUT_MS;
  if (env.TRIGGER_CONCURRENCY !== undefined) trigger.concurrency = env.TRIGGER_CONCURRENCY;

  const options: HookRelayModuleOptions = { trigger };
  if (env.NODE_ENV !== undefined) options.environment = env.NODE_ENV;
  if (env.ENABLE_SWAGGER !== undefined) options.api = { enableSwagger: env.ENABLE_SWAGGER };
  if (env.DEBUG !== undefined) options.debug = env.DEBUG;

  return options;
}
