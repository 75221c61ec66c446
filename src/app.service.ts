import { Injectable } from '@nestjs/common';
import { DatabaseService } from './common/database.service.js';
import { HealthCheckResponseDto } from './common/dto/health-check-response.dto.js';
import {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './common/errors/system-health-error.js';

export const SERVICE_NAME = 'pair-ratio-monitor';

@Injectable()
export class AppService {
  constructor(private readonly db: DatabaseService) {}

  getHealth(): HealthCheckResponseDto {
    if (!this.db.isEnabled()) {
      return this.healthy('disabled');
    }
    if (!this.db.isConnected()) {
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.DATABASE_FAILURE,
        'Database connection failed',
        'critical',
        'database',
      );
    }
    return this.healthy('connected');
  }

  private healthy(
    database: HealthCheckResponseDto['data']['database'],
  ): HealthCheckResponseDto {
    return {
      data: { status: 'ok', service: SERVICE_NAME, database },
      timestamp: new Date().toISOString(),
    };
  }
}
