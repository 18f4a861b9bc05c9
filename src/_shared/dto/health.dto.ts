import { ApiProperty } from '@nestjs/swagger';

export class WelcomeResponseDto {
  @ApiProperty({ example: 'Welcome to build-hook-relay!' })
  message!: string;

  @ApiProperty({ example: '0.1.0' })
  version!: string;

  @ApiProperty({ format: 'date-time' })
  time!: string;

  @ApiProperty({ enum: ['development', 'production', 'test'] })
  environment_mode!: string;
}

export class HealthResponseDto {
  @ApiProperty({ example: 'healthy' })
  status!: string;

  @ApiProperty({ format: 'date-time' })
  timestamp!: string;

  @ApiProperty({ description: 'Uptime in seconds' })
  uptime!: number;

  @ApiProperty({ type: [String], example: ['github', 'passthrough'] })
  providers!: string[];

  @ApiProperty({ enum: ['live', 'log_only'] })
  trigger_mode!: string;
}
