import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ProviderRegistry } from '../../../core';
import { PROVIDER_REGISTRY, HOOK_RELAY_VERSION } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import { ApiHealthCheck, ApiWelcome } from '../../../_shared/swagger/decorators';
import { HealthResponseDto, WelcomeResponseDto } from '../../../_shared/dto';

@ApiTags('Health')
@Controller()
export class HealthController {
  constructor(
    @Inject(PROVIDER_REGISTRY)
    private readonly registry: ProviderRegistry,
    private readonly configuration: ConfigurationService,
  ) {}

  @Get()
  @ApiWelcome()
  welcome(): WelcomeResponseDto {
    return {
      message: 'Welcome to build-hook-relay!',
      version: HOOK_RELAY_VERSION,
      time: new Date().toISOString(),
      environment_mode: this.configuration.getEnvironment(),
    };
  }

  @Get('health')
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): HealthResponseDto {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      providers: this.registry.ids(),
      trigger_mode: this.configuration.getTriggerMode(),
    };
  }
}
