import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AcmeConfig } from './acme.config';
import { AcmeTaskRunnerService } from './acme-task-runner.service';
import { AcmeTasksService } from './acme-tasks.service';

/**
 * Picks up asynchronous tasks that have not been issued yet
 */
@Injectable()
export class AcmeTaskScheduler {
  private readonly logger = new Logger(AcmeTaskScheduler.name);
  private isRunning = false;

  constructor(
    private readonly acmeConfig: AcmeConfig,
    private readonly tasksService: AcmeTasksService,
    private readonly runner: AcmeTaskRunnerService,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async runIssuableTasks(): Promise<void> {
    if (!this.acmeConfig.schedulerEnabled) {
      return;
    }

    // Prevent overlapping runs
    if (this.isRunning) {
      this.logger.warn('Issuance poll already running, skipping this execution');
      return;
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      const tasks = await this.tasksService.listIssuableTasks(
        this.acmeConfig.schedulerStaleHours,
        this.acmeConfig.schedulerBatchSize,
        this.runner.inFlightTaskIds(),
      );
      if (tasks.length === 0) {
        return;
      }

      const results = await Promise.all(
        tasks.map((task) => this.runner.runTaskAndBind(task.id, task.domains)),
      );
      const successCount = results.filter((result) => result.isOk).length;

      this.logger.log({
        event: 'acme_issuance_poll_completed',
        tasksProcessed: tasks.length,
        successCount,
        failCount: tasks.length - successCount,
        durationMs: Date.now() - startTime,
      });
    } catch (error) {
      this.logger.error({
        event: 'acme_issuance_poll_failed',
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.isRunning = false;
    }
  }

  isCurrentlyRunning(): boolean {
    return this.isRunning;
  }
}
