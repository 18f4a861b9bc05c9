import {
  Controller,
  Param,
  Body,
  Headers,
  Query,
  Inject,
  BadRequestException,
  ValidationPipe,
  ValidationError,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { HookProcessor, HookRequest } from '../../../core';
import {
  ApiHookEndpoint,
  ApiHookQueryEndpoint,
  HookQueryDto,
  HookSuccessResponseDto,
} from '../../../_shared';
import { HookEndpoint } from '../decorators/hook.decorators';
import { HOOK_PROCESSOR } from '../constants';

const queryValidation = new ValidationPipe({
  transform: true,
  exceptionFactory: (errors: ValidationError[]) =>
    new BadRequestException({
      errors: errors.flatMap((error) => Object.values(error.constraints ?? {})),
    }),
});

/**
 * Webhook Controller
 *
 * Receives webhooks from source services. The caller picks the provider,
 * app and token through the URL; the body and headers go to the provider
 * untouched.
 */
@ApiTags('Hooks')
@Controller()
export class WebhookController {
  constructor(
    @Inject(HOOK_PROCESSOR)
    private readonly hookProcessor: HookProcessor,
  ) {}

  @HookEndpoint('h/:serviceId/:appSlug/:apiToken')
  @ApiHookEndpoint()
  async handleHook(
    @Param('serviceId') serviceId: string,
    @Param('appSlug') appSlug: string,
    @Param('apiToken') apiToken: string,
    @Body() body: unknown,
    @Headers() headers: Record<string, string | string[] | undefined>,
  ): Promise<HookSuccessResponseDto> {
    return this.relay({
      serviceId,
      appSlug,
      apiToken,
      headers,
      body: toBuffer(body),
    });
  }

  @HookEndpoint('h')
  @ApiHookQueryEndpoint()
  async handleHookByQuery(
    @Query(queryValidation) query: HookQueryDto,
    @Body() body: unknown,
    @Headers() headers: Record<string, string | string[] | undefined>,
  ): Promise<HookSuccessResponseDto> {
    return this.relay({
      serviceId: query.service_id,
      appSlug: query.app_slug,
      apiToken: query.api_token,
      headers,
      body: toBuffer(body),
    });
  }

  private async relay(request: HookRequest): Promise<HookSuccessResponseDto> {
    const { response } = await this.hookProcessor.process(request);

    if (!response.accepted) {
      throw new BadRequestException(response.body);
    }
    return response.body;
  }
}

/**
 * The raw-body interceptor leaves a Buffer; anything else means the
 * route was called without it (e.g. directly from code).
 */
export function toBuffer(body: unknown): Buffer {
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (typeof body === 'string') {
    return Buffer.from(body);
  }
  if (body === undefined || body === null) {
    return Buffer.alloc(0);
  }
  return Buffer.from(JSON.stringify(body));
}
