import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import {
  GitHubWebhookFactory,
  HookRelayModule,
  useRawHookBodies,
} from '../../src';

describe('Hook relay over HTTP', () => {
  let app: NestExpressApplication;
  let baseUrl: string;

  beforeAll(async () => {
    app = await NestFactory.create<NestExpressApplication>(
      HookRelayModule.forRoot({
        providers: [{ id: 'github', adapter: 'github' }],
        environment: 'test',
      }),
      { bodyParser: false, logger: false, abortOnError: false },
    );
    useRawHookBodies(app);
    await app.listen(0, '127.0.0.1');
    baseUrl = await app.getUrl();
  });

  afterAll(async () => {
    await app.close();
  });

  async function post(
    path: string,
    body: string,
    headers: Record<string, string>,
  ): Promise<{ status: number; json: unknown }> {
    const response = await fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers,
      body,
    });
    return { status: response.status, json: await response.json() };
  }

  it('should trigger a build for a valid push', async () => {
    const { body, headers } = GitHubWebhookFactory.push();

    const response = await post('/h/github/demo/test-token', body.toString(), headers);

    expect(response).toEqual({
      status: 200,
      json: { message: 'Successfully triggered 1 build.' },
    });
  });

  it('should answer malformed JSON with the transform error', async () => {
    const { headers } = GitHubWebhookFactory.push();

    const response = await post('/h/github/demo/test-token', '{"ref":', headers);

    expect(response.status).toBe(400);
    expect(response.json).toEqual({
      errors: [
        expect.stringMatching(
          /^Failed to transform the webhook: Failed to parse request body: /,
        ),
      ],
    });
  });

  it('should accept a delivery larger than the default parser limit', async () => {
    const { body, headers } = GitHubWebhookFactory.push({
      message: 'x'.repeat(150 * 1024),
    });

    const response = await post('/h/github/demo/test-token', body.toString(), headers);

    expect(response).toEqual({
      status: 200,
      json: { message: 'Successfully triggered 1 build.' },
    });
  });

  it('should read form-encoded deliveries', async () => {
    const { body, headers } = GitHubWebhookFactory.delivery(
      'push',
      GitHubWebhookFactory.push().payload,
      'application/x-www-form-urlencoded',
    );

    const response = await post(
      '/h?service_id=github&app_slug=demo&api_token=test-token',
      body.toString(),
      headers,
    );

    expect(response).toEqual({
      status: 200,
      json: { message: 'Successfully triggered 1 build.' },
    });
  });
});
