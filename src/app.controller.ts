import { Controller, Get } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AppService, HealthStatus } from './app.service';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  @SkipThrottle()
  @ApiOperation({ summary: 'Health check', description: 'Returns service health status and ledger totals' })
  @ApiResponse({ status: 200, description: 'Service is healthy' })
  getHealth(): HealthStatus {
    return this.appService.getHealth();
  }
}
