import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service.js';
import { HealthCheckResponseDto } from './common/dto/health-check-response.dto.js';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  @ApiOperation({ summary: 'System health check' })
  @ApiResponse({ status: 500, description: 'Database configured but not connected' })
  getHealth(): HealthCheckResponseDto {
    return this.appService.getHealth();
  }
}
