import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  service: string;
  version: string;
}

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly configService: ConfigService) {}

  @Get('health')
  @ApiOperation({ summary: 'Application health status' })
  getHealth(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: this.configService.get<string>('app.name') ?? 'Shift Scheduling Backend',
      version: this.configService.get<string>('app.version') ?? '1.0.0',
    };
  }
}
