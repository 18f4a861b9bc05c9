import { IsOptional, IsString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Response DTO for an accepted hook
 */
export class HookSuccessResponseDto {
  @ApiProperty({
    description: 'What the relay did with the hook',
    example: 'Successfully triggered 1 build.',
  })
  message!: string;
}

/**
 * Response DTO for a rejected hook
 */
export class HookErrorResponseDto {
  @ApiProperty({
    description: 'Every error that caused the rejection, one per failed trigger',
    type: [String],
    example: ['Failed to Trigger the Build: 403 Forbidden'],
  })
  errors!: string[];
}

/**
 * Query form of the hook parameters, for callers that cannot use the path
 */
export class HookQueryDto {
  @ApiPropertyOptional({ description: 'Webhook source', example: 'github' })
  @IsOptional()
  @IsString()
  service_id?: string;

  @ApiPropertyOptional({ description: 'App identifier', example: 'a1b2c3d4e5f6' })
  @IsOptional()
  @IsString()
  app_slug?: string;

  @ApiPropertyOptional({ description: 'Build trigger token', example: 'test-token' })
  @IsOptional()
  @IsString()
  api_token?: string;
}
