import type { NestExpressApplication } from '@nestjs/platform-express';

export const HOOK_BODY_LIMIT = '25mb';

/**
 * Installs one raw body parser for every content type so providers see
 * the delivery byte for byte. The application must be created with
 * `bodyParser: false`, otherwise the JSON and form parsers run first.
 */
export function useRawHookBodies(
  app: NestExpressApplication,
): NestExpressApplication {
  return app.useBodyParser('raw', {
    type: () => true,
    limit: HOOK_BODY_LIMIT,
  });
}
