import { Controller, Get, Inject } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';

import { APP_CONFIG, AppConfig } from '../config/app.config';
import { SERVICE_NAME, SERVICE_VERSION } from '@shared/constants';

@Controller()
@SkipThrottle()
export class HealthController {
  constructor(@Inject(APP_CONFIG) private readonly appConfig: AppConfig) {}

  @Get()
  root(): { message: string; version: string } {
    return { message: 'Event photo matching API', version: SERVICE_VERSION };
  }

  @Get('health')
  health(): { status: string; environment: string; service: string } {
    return {
      status: 'healthy',
      environment: this.appConfig.environment,
      service: SERVICE_NAME,
    };
  }
}
