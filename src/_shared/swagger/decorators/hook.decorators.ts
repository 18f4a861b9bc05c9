import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam, ApiBody, ApiHeader } from '@nestjs/swagger';
import { HookErrorResponseDto, HookSuccessResponseDto } from '../../dto';

const hookBody = () =>
  ApiBody({
    description: 'Raw webhook payload, as sent by the source',
    required: false,
    schema: {
      type: 'object',
      additionalProperties: true,
      example: {
        ref: 'refs/heads/main',
        head_commit: {
          id: '83b86e5f286f546dc5a4a58db66ceef44460c85e',
          message: 'Update README',
          distinct: true,
        },
      },
    },
  });

const hookResponses = () =>
  applyDecorators(
    ApiResponse({
      status: 200,
      description: 'Builds triggered, or event acknowledged and skipped',
      type: HookSuccessResponseDto,
    }),
    ApiResponse({
      status: 400,
      description: 'Hook rejected; lists every error',
      type: HookErrorResponseDto,
    }),
  );

/**
 * Swagger decorator for the path-parameter hook endpoint
 */
export const ApiHookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Relay a webhook',
      description:
        'Transforms the webhook with the provider registered for serviceId and triggers one build per detected event.',
    }),
    ApiParam({
      name: 'serviceId',
      description: 'Webhook source',
      example: 'github',
    }),
    ApiParam({ name: 'appSlug', description: 'App identifier', example: 'a1b2c3d4e5f6' }),
    ApiParam({ name: 'apiToken', description: 'Build trigger token', example: 'test-token' }),
    ApiHeader({
      name: 'X-GitHub-Event',
      description: 'Event name, required by the github provider',
      required: false,
      example: 'push',
    }),
    hookBody(),
    hookResponses(),
  );
};

/**
 * Swagger decorator for the query-parameter hook endpoint
 */
export const ApiHookQueryEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Relay a webhook (query parameters)',
      description: 'Same as the path form, with service_id, app_slug and api_token in the query.',
    }),
    hookBody(),
    hookResponses(),
  );
};
