import { Injectable, Logger } from '@nestjs/common';
import { AcmeTask } from '../db/schema';
import { AcmeTaskStatus } from './acme.constants';
import { AcmeAccountsService } from './acme-accounts.service';
import { AcmeTaskLogsService } from './acme-task-logs.service';
import { AcmeTaskError, describeError } from './acme-task.errors';
import { AcmeTasksService, normalizeDomains } from './acme-tasks.service';
import { BindingMergerService } from './binding/binding-merger.service';
import { IssuanceRecorderService } from './certs/issuance-recorder.service';
import { ChallengeDispatcherService } from './challenge-dispatcher.service';
import { KeyedRegistry } from './keyed-registry';

export interface AcmeRunResult {
  isOk: boolean;
  error: string;
  // 0 when no certificate is bound
  certId: number;
}

export interface AcmeBindRunResult {
  isOk: boolean;
  error: string;
}

interface RunOptions {
  rotateAccount: boolean;
}

function formatFailure(error: unknown): string {
  const taskError = AcmeTaskError.wrap('issuance', 'unexpected error', error);
  return `${taskError.stage} error: ${taskError.message}`;
}

/**
 * Entry points that execute a task end to end. Neither throws: every outcome is
 * returned as a result and appended to the task log.
 */
@Injectable()
export class AcmeTaskRunnerService {
  private readonly logger = new Logger(AcmeTaskRunnerService.name);
  // Tasks running on the auto-bind path in this process
  private readonly inFlight = new KeyedRegistry<number>();

  constructor(
    private readonly tasksService: AcmeTasksService,
    private readonly taskLogsService: AcmeTaskLogsService,
    private readonly accountsService: AcmeAccountsService,
    private readonly dispatcher: ChallengeDispatcherService,
    private readonly recorder: IssuanceRecorderService,
    private readonly bindingMerger: BindingMergerService,
  ) {}

  async runTask(taskId: number): Promise<AcmeRunResult> {
    const result = await this.execute(taskId, { rotateAccount: false });
    await this.writeLog(taskId, result);
    return result;
  }

  /**
   * Issue with a rotated account and bind the certificate to matching hosts.
   * A second call for a task already running here returns ok without doing anything.
   */
  async runTaskAndBind(taskId: number, domains: string[]): Promise<AcmeBindRunResult> {
    if (!this.inFlight.tryAcquire(taskId)) {
      this.logger.debug(`Task ${taskId} is already running, skipping`);
      return { isOk: true, error: '' };
    }

    try {
      const result = await this.execute(taskId, { rotateAccount: true });
      await this.writeLog(taskId, result);

      if (result.isOk && result.certId > 0) {
        await this.bindingMerger
          .bindCertificate(result.certId, normalizeDomains(domains))
          .catch((error: unknown) => {
            this.logger.error(`Failed to bind certificate ${result.certId}: ${describeError(error)}`);
          });
      }
      return { isOk: result.isOk, error: result.error };
    } finally {
      this.inFlight.release(taskId);
    }
  }

  inFlightTaskIds(): number[] {
    return this.inFlight.keys();
  }

  private async execute(taskId: number, options: RunOptions): Promise<AcmeRunResult> {
    if (!taskId || taskId <= 0) {
      return { isOk: false, error: 'invalid task id', certId: 0 };
    }

    const startedAt = Date.now();
    let task: AcmeTask | null;
    try {
      task = await this.tasksService.findEnabledTask(taskId);
    } catch (error) {
      const failure = AcmeTaskError.wrap('lookup', 'failed to load task', error);
      return { isOk: false, error: formatFailure(failure), certId: 0 };
    }
    if (!task) {
      return { isOk: false, error: 'lookup error: ACME task not found', certId: 0 };
    }
    if (!task.isOn) {
      return { isOk: false, error: 'lookup error: ACME task is disabled', certId: task.certId ?? 0 };
    }

    let certId = task.certId ?? 0;
    try {
      await this.tasksService.markRunning(task.id).catch((error: unknown) => {
        throw AcmeTaskError.wrap('lookup', 'failed to mark task running', error);
      });

      const account = await this.accountsService.resolveAccount(task.acmeUserId, {
        rotate: options.rotateAccount,
      });
      const issued = await this.dispatcher.issue(task, account);
      certId = await this.recorder.record(task, issued);

      await this.tasksService.finishRun(task.id, AcmeTaskStatus.Done).catch((error: unknown) => {
        throw AcmeTaskError.wrap('persistence', 'certificate saved but task status not updated', error);
      });

      this.logger.log({
        event: 'acme_task_run_completed',
        taskId,
        certId,
        renewed: task.certId !== null,
        durationMs: Date.now() - startedAt,
      });
      return { isOk: true, error: '', certId };
    } catch (error) {
      const message = formatFailure(error);
      // A task holding a certificate stays Done
      const status = certId > 0 ? AcmeTaskStatus.Done : AcmeTaskStatus.IssueFailed;
      await this.tasksService.finishRun(task.id, status).catch((statusError: unknown) => {
        this.logger.error(`Failed to write status for task ${taskId}: ${describeError(statusError)}`);
      });

      this.logger.warn({
        event: 'acme_task_run_failed',
        taskId,
        error: message,
        durationMs: Date.now() - startedAt,
      });
      return { isOk: false, error: message, certId };
    }
  }

  private async writeLog(taskId: number, result: AcmeRunResult): Promise<void> {
    if (taskId <= 0) {
      return;
    }
    try {
      await this.taskLogsService.createLog(taskId, result.isOk, result.error);
    } catch (error) {
      this.logger.error(`Failed to write log for task ${taskId}: ${describeError(error)}`);
    }
  }
}
