import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService, HealthStatus } from './app.service';
import { AcmeTaskRunnerService } from './acme/acme-task-runner.service';

jest.mock('./db/client', () => ({
  db: { execute: jest.fn() },
}));

import { db } from './db/client';

describe('AppController', () => {
  let controller: AppController;
  let runner: { inFlightTaskIds: jest.Mock };

  beforeEach(async () => {
    runner = { inFlightTaskIds: jest.fn().mockReturnValue([4, 9]) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [AppService, { provide: AcmeTaskRunnerService, useValue: runner }],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  describe('getHealth', () => {
    it('should report ok when the database answers', async () => {
      (db.execute as jest.Mock).mockResolvedValue([]);

      const result: HealthStatus = await controller.getHealth();

      expect(result).toEqual({
        status: 'ok',
        timestamp: expect.any(String),
        version: '1.0.0',
        database: { connected: true },
        tasksInFlight: 2,
      });
    });

    it('should report degraded when the database is unreachable', async () => {
      (db.execute as jest.Mock).mockRejectedValue(new Error('ECONNREFUSED'));

      const result = await controller.getHealth();

      expect(result.status).toBe('degraded');
      expect(result.database).toEqual({ connected: false });
    });
  });
});
