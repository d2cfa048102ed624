import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../config/env.validation';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  version: string;
}

@Controller('health')
export class HealthController {
  constructor(private readonly config: ConfigService<Environment, true>) {}

  @Get()
  check(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: this.config.get('APP_VERSION', { infer: true }),
    };
  }
}
