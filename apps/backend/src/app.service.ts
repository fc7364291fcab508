import { Injectable, Logger } from '@nestjs/common';
import { sql } from 'drizzle-orm';
import { db } from './db/client';
import { AcmeTaskRunnerService } from './acme/acme-task-runner.service';

export interface HealthStatus {
  status: 'ok' | 'degraded';
  timestamp: string;
  version: string;
  database: { connected: boolean };
  // Tasks currently issuing on the auto-bind path in this process
  tasksInFlight: number;
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);

  constructor(private readonly runner: AcmeTaskRunnerService) {}

  async getHealth(): Promise<HealthStatus> {
    const connected = await this.pingDatabase();
    return {
      status: connected ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
      database: { connected },
      tasksInFlight: this.runner.inFlightTaskIds().length,
    };
  }

  private async pingDatabase(): Promise<boolean> {
    try {
      await db.execute(sql`select 1`);
      return true;
    } catch (error) {
      this.logger.warn(`Database ping failed: ${error instanceof Error ? error.message : error}`);
      return false;
    }
  }
}
