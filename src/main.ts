import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import type { EnvironmentVariables } from './config';
import {
  ConfigurationService,
  HOOK_RELAY_VERSION,
  useRawHookBodies,
} from './modules';

const DEFAULT_PORT = 4000;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    bufferLogs: true,
  });
  const configuration = app.get(ConfigurationService);
  app.useLogger(configuration.getLogLevels());
  useRawHookBodies(app);

  const logger = new Logger('Bootstrap');

  if (configuration.isSwaggerEnabled()) {
    const config = new DocumentBuilder()
      .setTitle('Build Hook Relay')
      .setDescription(
        'Turns source-control webhooks into build triggers. ' +
          'One hook in, one build per detected event out.',
      )
      .setVersion(HOOK_RELAY_VERSION)
      .addTag('Hooks', 'Receive and relay webhooks')
      .addTag('Health', 'Service banner and health')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api', app, document);
  }

  const env = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);
  const port = env.get('PORT', { infer: true }) ?? DEFAULT_PORT;
  await app.listen(port);

  logger.log(`Build hook relay is running on http://localhost:${port}`);
  logger.log(`Trigger mode: ${configuration.getTriggerMode()}`);
  if (configuration.isSwaggerEnabled()) {
    logger.log(
      `OpenAPI documentation available at http://localhost:${port}/api`,
    );
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
