import { BadRequestException, CallHandler } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of } from 'rxjs';
import {
  ConfigurationService,
  FakeTriggerApi,
  GitHubProviderAdapter,
  GitHubWebhookFactory,
  HealthController,
  HOOK_PROCESSOR,
  HookProcessor,
  HookRelayModule,
  LogOnlyTriggerApiClient,
  PROVIDER_REGISTRY,
  ProviderRegistry,
  RawBodyInterceptor,
  StaticHookProvider,
  TransformResults,
  TriggerDispatcher,
  TriggerMode,
  TriggerUrlResolver,
  WebhookController,
  hookRelayConfigFromEnvironment,
  mergeHookRelayConfig,
  validateEnvironment,
} from '../../src';
import { toBuffer } from '../../src/modules/hook-relay/controllers/webhook.controller';

const silentLogger = {
  log: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
};

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof BadRequestException) {
      return error.getResponse();
    }
    throw error;
  }
  throw new Error('Expected the hook to be rejected');
}

describe('WebhookController', () => {
  let triggerApi: FakeTriggerApi;
  let controller: WebhookController;

  beforeEach(() => {
    triggerApi = new FakeTriggerApi();
    const processor = new HookProcessor({
      registry: new ProviderRegistry([
        ['github', new GitHubProviderAdapter()],
        ['static', new StaticHookProvider(TransformResults.triggers([]))],
      ]),
      urlResolver: new TriggerUrlResolver({ apiRootUrl: 'https://www.bitrise.io' }),
      dispatcher: new TriggerDispatcher(triggerApi, { logger: silentLogger }),
      logger: silentLogger,
    });
    controller = new WebhookController(processor);
  });

  it('should answer with the message when builds are triggered', async () => {
    const { body, headers } = GitHubWebhookFactory.push();

    const response = await controller.handleHook('github', 'demo', 'test-token', body, headers);

    expect(response).toEqual({ message: 'Successfully triggered 1 build.' });
    expect(triggerApi.calls[0].url).toBe('https://www.bitrise.io/app/demo/build/start.json');
  });

  it('should throw a 400 carrying every error', async () => {
    const { body, headers } = GitHubWebhookFactory.push();

    const response = await rejectionOf(
      controller.handleHook('gitlab', 'demo', 'test-token', body, headers),
    );

    expect(response).toEqual({ errors: ['Unsupported Webhook Type / Provider: gitlab'] });
  });

  it('should reject a provider result with no builds', async () => {
    const response = await rejectionOf(
      controller.handleHook('static', 'demo', 'test-token', Buffer.from('{}'), {}),
    );

    expect(response).toEqual({
      errors: [
        'After processing the webhook we failed to detect any event in it which could be turned into a build.',
      ],
    });
  });

  it('should read parameters from the query form', async () => {
    const { body, headers } = GitHubWebhookFactory.tag();

    const response = await controller.handleHookByQuery(
      { service_id: 'github', app_slug: 'demo', api_token: 'test-token' },
      body,
      headers,
    );

    expect(response).toEqual({ message: 'Successfully triggered 1 build.' });
    expect(triggerApi.calls[0].params.build_params.tag).toBe('v1.0.0');
  });

  it('should reject a query without a service id', async () => {
    const response = await rejectionOf(
      controller.handleHookByQuery({ app_slug: 'demo' }, Buffer.from('{}'), {}),
    );

    expect(response).toEqual({ errors: ['No service-id defined'] });
  });

  describe('toBuffer', () => {
    it('should keep buffers as they are', () => {
      const body = Buffer.from('raw');

      expect(toBuffer(body)).toBe(body);
    });

    it('should convert strings and objects', () => {
      expect(toBuffer('payload=1').toString()).toBe('payload=1');
      expect(toBuffer({ ref: 'refs/heads/main' }).toString()).toBe('{"ref":"refs/heads/main"}');
    });

    it('should treat a missing body as empty', () => {
      expect(toBuffer(undefined)).toHaveLength(0);
    });
  });
});

describe('RawBodyInterceptor', () => {
  const interceptor = new RawBodyInterceptor();
  const next: CallHandler = { handle: () => of('handled') };

  function intercept(request: { body?: unknown; rawBody?: Buffer }) {
    return lastValueFrom(interceptor.intercept(new ExecutionContextHost([request]), next));
  }

  it('should replace a parsed body with the raw bytes', async () => {
    const request = { body: { a: 1 }, rawBody: Buffer.from('{ "a": 1 }') };

    await expect(intercept(request)).resolves.toBe('handled');
    expect(request.body).toBe(request.rawBody);
  });

  it('should re-serialize a parsed body without a raw copy', async () => {
    const request: { body?: unknown; rawBody?: Buffer } = { body: { a: 1 } };

    await intercept(request);

    expect(request.rawBody?.toString()).toBe('{"a":1}');
  });

  it('should use an empty buffer when there is no body', async () => {
    const request: { body?: unknown; rawBody?: Buffer } = { body: {} };

    await intercept(request);

    expect(request.rawBody).toEqual(Buffer.alloc(0));
  });
});

describe('HealthController', () => {
  it('should report providers and trigger mode', () => {
    const config = mergeHookRelayConfig({ environment: 'test' });
    const controller = new HealthController(
      new ProviderRegistry([['github', new GitHubProviderAdapter()]]),
      new ConfigurationService(config, new LogOnlyTriggerApiClient(silentLogger)),
    );

    const health = controller.health();

    expect(health.status).toBe('healthy');
    expect(health.providers).toEqual(['github']);
    expect(health.trigger_mode).toBe(TriggerMode.LOG_ONLY);
  });

  it('should greet with version and environment mode', () => {
    const config = mergeHookRelayConfig({ environment: 'production' });
    const controller = new HealthController(
      new ProviderRegistry([]),
      new ConfigurationService(config, new FakeTriggerApi()),
    );

    const welcome = controller.welcome();

    expect(welcome.message).toBe('Welcome to build-hook-relay!');
    expect(welcome.version).toBe('0.1.0');
    expect(welcome.environment_mode).toBe('production');
  });
});

describe('HookRelayModule', () => {
  it('should wire the registry and processor from configuration', async () => {
    const app = await NestFactory.createApplicationContext(
      HookRelayModule.forRoot({
        providers: [
          { id: 'github', adapter: 'github' },
          { id: 'custom', adapter: new StaticHookProvider(TransformResults.skip('noop')) },
        ],
        environment: 'test',
      }),
      { logger: false, abortOnError: false },
    );

    try {
      const registry = app.get<ProviderRegistry>(PROVIDER_REGISTRY);
      const processor = app.get<HookProcessor>(HOOK_PROCESSOR);
      const configuration = app.get(ConfigurationService);

      expect(registry.ids()).toEqual(['github', 'custom']);
      expect(processor.getStatistics().triggerOverride).toBe(false);
      expect(configuration.getTriggerMode()).toBe(TriggerMode.LOG_ONLY);
    } finally {
      await app.close();
    }
  });

  it('should switch to live calls when an override URL is configured', async () => {
    const app = await NestFactory.createApplicationContext(
      HookRelayModule.forRootAsync({
        useFactory: async () => ({
          environment: 'development',
          trigger: { sendRequestTo: 'http://localhost:8080/trigger' },
        }),
      }),
      { logger: false, abortOnError: false },
    );

    try {
      expect(app.get(ConfigurationService).getTriggerMode()).toBe(TriggerMode.LIVE);
      expect(app.get<HookProcessor>(HOOK_PROCESSOR).getStatistics().triggerOverride).toBe(true);
    } finally {
      await app.close();
    }
  });

  it.each([
    ['1', ['log', 'warn', 'error', 'debug', 'verbose']],
    ['false', ['log', 'warn', 'error']],
  ])('should pick log levels from DEBUG=%s', async (debug, levels) => {
    const app = await NestFactory.createApplicationContext(
      HookRelayModule.forRoot(
        hookRelayConfigFromEnvironment(
          validateEnvironment({ NODE_ENV: 'test', DEBUG: debug }),
        ),
      ),
      { logger: false, abortOnError: false },
    );

    try {
      expect(app.get(ConfigurationService).getLogLevels()).toEqual(levels);
    } finally {
      await app.close();
    }
  });

  it('should refuse duplicate service ids', async () => {
    await expect(
      NestFactory.createApplicationContext(
        HookRelayModule.forRoot({
          providers: [
            { id: 'github', adapter: 'github' },
            { id: 'github', adapter: 'passthrough' },
          ],
        }),
        { logger: false, abortOnError: false },
      ),
    ).rejects.toThrow('Provider already registered: github');
  });
});
