import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { HookRelayModule } from './modules';
import {
  EnvironmentVariables,
  hookRelayConfigFromEnvironment,
  validateEnvironment,
} from './config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    HookRelayModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) =>
        hookRelayConfigFromEnvironment({
          NODE_ENV: config.get('NODE_ENV', { infer: true }),
          SEND_REQUEST_TO: config.get('SEND_REQUEST_TO', { infer: true }),
          BUILD_API_ROOT_URL: config.get('BUILD_API_ROOT_URL', { infer: true }),
          TRIGGER_TIMEOUT_MS: config.get('TRIGGER_TIMEOUT_MS', { infer: true }),
          TRIGGER_CONCURRENCY: config.get('TRIGGER_CONCURRENCY', { infer: true }),
          ENABLE_SWAGGER: config.get('ENABLE_SWAGGER', { infer: true }),
          DEBUG: config.get('DEBUG', { infer: true }),
        }),
    }),
  ],
})
export class AppModule {}
