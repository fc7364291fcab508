import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AcmeConfig } from './acme.config';
import { AcmeTaskRunnerService } from './acme-task-runner.service';
import { AcmeTasksService } from './acme-tasks.service';

// Tasks renewed per scheduled run
const RENEWAL_BATCH_SIZE = 100;

@Injectable()
export class AcmeRenewalScheduler {
  private readonly logger = new Logger(AcmeRenewalScheduler.name);
  private isRunning = false;

  constructor(
    private readonly acmeConfig: AcmeConfig,
    private readonly tasksService: AcmeTasksService,
    private readonly runner: AcmeTaskRunnerService,
  ) {}

  /**
   * Renew expiring certificates at 3 AM daily
   */
  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  async renewExpiringCertificates(): Promise<void> {
    if (!this.acmeConfig.renewalEnabled) {
      this.logger.debug('Renewal scheduler is disabled via ACME_RENEWAL_ENABLED=false');
      return;
    }

    if (this.isRunning) {
      this.logger.warn('Renewal job already running, skipping this execution');
      return;
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      const tasks = await this.tasksService.findTasksToRenew(
        this.acmeConfig.renewalThresholdDays,
        RENEWAL_BATCH_SIZE,
      );
      if (tasks.length === 0) {
        this.logger.log('No certificates due for renewal');
        return;
      }

      let successCount = 0;
      // One at a time to stay under CA rate limits
      for (const task of tasks) {
        const result = await this.runner.runTask(task.id);
        if (result.isOk) {
          successCount++;
        }
      }

      this.logger.log({
        event: 'acme_renewal_run_completed',
        tasksProcessed: tasks.length,
        successCount,
        failCount: tasks.length - successCount,
        durationMs: Date.now() - startTime,
      });
    } catch (error) {
      this.logger.error({
        event: 'acme_renewal_run_failed',
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.isRunning = false;
    }
  }
}
