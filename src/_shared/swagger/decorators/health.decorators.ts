import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { HealthResponseDto, WelcomeResponseDto } from '../../dto';

/**
 * Swagger decorator for the root endpoint
 */
export const ApiWelcome = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Service banner with version and environment mode' }),
    ApiResponse({ status: 200, type: WelcomeResponseDto }),
  );
};

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health, uptime, registered providers and trigger mode',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      type: HealthResponseDto,
    }),
  );
};
