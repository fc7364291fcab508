import { Injectable } from '@nestjs/common';
import { desc, eq } from 'drizzle-orm';
import { db } from '../db/client';
import { acmeTaskLogs, AcmeTaskLog } from '../db/schema';

/**
 * Append-only execution log of issuance tasks
 */
@Injectable()
export class AcmeTaskLogsService {
  async createLog(taskId: number, isOk: boolean, error: string): Promise<void> {
    await db.insert(acmeTaskLogs).values({ taskId, isOk, error });
  }

  async listLogs(taskId: number, limit = 20): Promise<AcmeTaskLog[]> {
    return db
      .select()
      .from(acmeTaskLogs)
      .where(eq(acmeTaskLogs.taskId, taskId))
      .orderBy(desc(acmeTaskLogs.id))
      .limit(limit);
  }
}
