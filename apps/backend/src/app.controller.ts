import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation } from '@nestjs/swagger';
import { AppService, HealthStatus } from './app.service';

@ApiTags('health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('/api/health')
  @ApiOperation({ summary: 'Health check with database reachability' })
  getHealth(): Promise<HealthStatus> {
    return this.appService.getHealth();
  }
}
