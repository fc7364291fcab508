import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AcmeConfig } from './acme.config';
import { AcmeRenewalScheduler } from './acme-renewal.scheduler';
import { AcmeTaskRunnerService } from './acme-task-runner.service';
import { AcmeTasksService } from './acme-tasks.service';
import { buildTask } from './testing/acme-fixtures';

jest.mock('../db/client', () => ({ db: {} }));

describe('AcmeRenewalScheduler', () => {
  let tasksService: { findTasksToRenew: jest.Mock };
  let runner: { runTask: jest.Mock };

  const createScheduler = async (env: Record<string, string>) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AcmeRenewalScheduler,
        AcmeConfig,
        { provide: ConfigService, useValue: new ConfigService(env) },
        { provide: AcmeTasksService, useValue: tasksService },
        { provide: AcmeTaskRunnerService, useValue: runner },
      ],
    }).compile();
    return module.get(AcmeRenewalScheduler);
  };

  beforeEach(() => {
    tasksService = {
      findTasksToRenew: jest.fn().mockResolvedValue([
        buildTask({ id: 1, certId: 100 }),
        buildTask({ id: 2, certId: 101 }),
      ]),
    };
    runner = { runTask: jest.fn().mockResolvedValue({ isOk: true, error: '', certId: 100 }) };
  });

  it('should renew due tasks one after another', async () => {
    const order: string[] = [];
    runner.runTask.mockImplementation(async (taskId: number) => {
      order.push(`start ${taskId}`);
      await new Promise((resolve) => setImmediate(resolve));
      order.push(`end ${taskId}`);
      return { isOk: taskId === 1, error: '', certId: 0 };
    });
    const scheduler = await createScheduler({ ACME_RENEWAL_THRESHOLD_DAYS: '14' });

    await scheduler.renewExpiringCertificates();

    expect(tasksService.findTasksToRenew).toHaveBeenCalledWith(14, 100);
    expect(order).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
  });

  it('should do nothing when disabled', async () => {
    const scheduler = await createScheduler({ ACME_RENEWAL_ENABLED: 'false' });

    await scheduler.renewExpiringCertificates();

    expect(tasksService.findTasksToRenew).not.toHaveBeenCalled();
  });

  it('should keep going after a task query failure', async () => {
    tasksService.findTasksToRenew.mockRejectedValue(new Error('db down'));
    const scheduler = await createScheduler({});

    await expect(scheduler.renewExpiringCertificates()).resolves.toBeUndefined();
    expect(runner.runTask).not.toHaveBeenCalled();
  });
});
