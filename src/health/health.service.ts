import { Injectable, Logger, Optional } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { RedisService } from '@infra/redis/redis.service';

export type HealthStatus = 'ok' | 'degraded' | 'critical';

export interface HealthReport {
  status: HealthStatus;
  database: 'ok' | 'error';
  redis?: 'ok' | 'error';
}

/** The database is critical; Redis only backs bot sessions, so losing it degrades the bot. */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly dataSource: DataSource,
    @Optional() private readonly redisService?: RedisService,
  ) {}

  async check(): Promise<HealthReport> {
    const report: HealthReport = { status: 'ok', database: 'ok' };

    try {
      await this.dataSource.query('SELECT 1');
    } catch (error) {
      this.logger.error('Database health check failed', error instanceof Error ? error.message : String(error));
      report.status = 'critical';
      report.database = 'error';
    }

    if (this.redisService) {
      try {
        await this.redisService.ping();
        report.redis = 'ok';
      } catch (error) {
        this.logger.error('Redis health check failed', error instanceof Error ? error.message : String(error));
        report.redis = 'error';
        if (report.status === 'ok') {
          report.status = 'degraded';
        }
      }
    }

    return report;
  }
}
