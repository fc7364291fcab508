import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import {
  and,
  asc,
  count,
  desc,
  eq,
  gt,
  gte,
  ilike,
  inArray,
  isNotNull,
  isNull,
  lt,
  lte,
  ne,
  notInArray,
  or,
  sql,
  SQL,
} from 'drizzle-orm';
import { db } from '../db/client';
import { acmeTasks, sslCerts, AcmeTask } from '../db/schema';
import { AcmeConfig } from './acme.config';
import { AcmeAuthType, AcmeTaskStatus, RowState } from './acme.constants';

export interface CreateAcmeTaskInput {
  adminId: number;
  userId: number;
  authType: AcmeAuthType;
  acmeUserId: number;
  dnsProviderId?: number | null;
  dnsDomain?: string;
  domains?: string[];
  autoRenew: boolean;
  authUrl?: string;
  async: boolean;
}

export interface UpdateAcmeTaskInput {
  acmeUserId: number;
  dnsProviderId?: number | null;
  dnsDomain?: string;
  domains?: string[];
  autoRenew: boolean;
  authUrl?: string;
}

export interface AcmeTaskListFilter {
  // > 0 restricts to one tenant
  userId?: number;
  // When userId is not set: true = user-owned tasks, false = admin-owned tasks
  userOnly?: boolean;
  // Bound certificate is inside its validity window
  isAvailable?: boolean;
  isExpired?: boolean;
  // Bound certificate expires within this many days
  expiringDays?: number;
  keyword?: string;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Lowercases, trims and de-duplicates a domain list, preserving order.
 * A missing list becomes an empty one.
 */
export function normalizeDomains(domains: string[] | undefined | null): string[] {
  const result: string[] = [];
  for (const raw of domains ?? []) {
    const domain = raw.trim().toLowerCase();
    if (domain.length > 0 && !result.includes(domain)) {
      result.push(domain);
    }
  }
  return result;
}

function escapeLike(keyword: string): string {
  return keyword.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Task Store: persisted issuance tasks and their status transitions.
 */
@Injectable()
export class AcmeTasksService {
  private readonly logger = new Logger(AcmeTasksService.name);

  constructor(private readonly acmeConfig: AcmeConfig) {}

  async createTask(input: CreateAcmeTaskInput): Promise<number> {
    const domains = normalizeDomains(input.domains);
    if (domains.length === 0) {
      throw new BadRequestException('At least one domain is required');
    }
    this.assertAuthInput(input.authType, input.dnsProviderId);

    const [task] = await db
      .insert(acmeTasks)
      .values({
        adminId: input.adminId,
        userId: input.userId,
        authType: input.authType,
        acmeUserId: input.acmeUserId,
        dnsProviderId: input.authType === 'dns' ? (input.dnsProviderId ?? null) : null,
        dnsDomain: input.dnsDomain ?? '',
        domains,
        autoRenew: input.autoRenew,
        authUrl: input.authUrl ?? '',
        isOn: true,
        state: RowState.Enabled,
        status: AcmeTaskStatus.Pending,
        async: input.async,
      })
      .returning({ id: acmeTasks.id });

    this.logger.log({
      event: 'acme_task_created',
      taskId: task.id,
      authType: input.authType,
      domains,
    });

    return task.id;
  }

  /**
   * Update the identity fields of a task. Status and certificate reference are
   * left untouched.
   */
  async updateTask(taskId: number, input: UpdateAcmeTaskInput): Promise<void> {
    if (!taskId || taskId <= 0) {
      throw new BadRequestException('Invalid task id');
    }
    const domains = normalizeDomains(input.domains);
    if (domains.length === 0) {
      throw new BadRequestException('At least one domain is required');
    }

    const task = await this.findEnabledTask(taskId);
    if (!task) {
      throw new BadRequestException(`Task ${taskId} not found`);
    }
    this.assertAuthInput(task.authType, input.dnsProviderId);

    await db
      .update(acmeTasks)
      .set({
        acmeUserId: input.acmeUserId,
        dnsProviderId: task.authType === 'dns' ? (input.dnsProviderId ?? null) : null,
        dnsDomain: input.dnsDomain ?? '',
        domains,
        autoRenew: input.autoRenew,
        authUrl: input.authUrl ?? '',
        updatedAt: new Date(),
      })
      .where(eq(acmeTasks.id, taskId));
  }

  async enableTask(taskId: number): Promise<void> {
    await this.setIsOn(taskId, true);
  }

  /**
   * Stops future selection of the task. A run already in flight is not cancelled.
   */
  async disableTask(taskId: number): Promise<void> {
    await this.setIsOn(taskId, false);
  }

  /**
   * Soft delete. The certificate the task produced is kept.
   */
  async deleteTask(taskId: number): Promise<void> {
    await db
      .update(acmeTasks)
      .set({ state: RowState.Disabled, updatedAt: new Date() })
      .where(eq(acmeTasks.id, taskId));
  }

  async findEnabledTask(taskId: number): Promise<AcmeTask | null> {
    const [task] = await db
      .select()
      .from(acmeTasks)
      .where(and(eq(acmeTasks.id, taskId), eq(acmeTasks.state, RowState.Enabled)))
      .limit(1);
    return task ?? null;
  }

  /**
   * Whether the task exists and belongs to the user (userId 0 skips the owner check)
   */
  async checkUserTask(userId: number, taskId: number): Promise<boolean> {
    const conditions: SQL[] = [eq(acmeTasks.id, taskId), eq(acmeTasks.state, RowState.Enabled)];
    if (userId > 0) {
      conditions.push(eq(acmeTasks.userId, userId));
    }
    const [row] = await db
      .select({ id: acmeTasks.id })
      .from(acmeTasks)
      .where(and(...conditions))
      .limit(1);
    return row !== undefined;
  }

  async countTasks(filter: AcmeTaskListFilter, now: Date = new Date()): Promise<number> {
    const [row] = await db
      .select({ count: count() })
      .from(acmeTasks)
      .where(this.buildListCondition(filter, now));
    return Number(row?.count ?? 0);
  }

  /**
   * One page of live tasks, newest first
   */
  async listTasks(
    filter: AcmeTaskListFilter,
    offset: number,
    size: number,
    now: Date = new Date(),
  ): Promise<AcmeTask[]> {
    return db
      .select()
      .from(acmeTasks)
      .where(this.buildListCondition(filter, now))
      .orderBy(desc(acmeTasks.id))
      .offset(offset)
      .limit(size);
  }

  /**
   * Tasks the scheduler may pick up: enabled, asynchronous, without a certificate,
   * created at least `staleHours` ago, not excluded by the caller and not holding
   * an unexpired Running lease. Oldest first.
   */
  async listIssuableTasks(
    staleHours: number,
    limit: number,
    excludeIds: number[] = [],
    now: Date = new Date(),
  ): Promise<AcmeTask[]> {
    if (limit <= 0) {
      return [];
    }

    const createdBefore = new Date(now.getTime() - staleHours * HOUR_MS);
    const conditions: SQL[] = [
      eq(acmeTasks.isOn, true),
      eq(acmeTasks.async, true),
      eq(acmeTasks.state, RowState.Enabled),
      isNull(acmeTasks.certId),
      lte(acmeTasks.createdAt, createdBefore),
    ];
    const leaseFree = or(
      ne(acmeTasks.status, AcmeTaskStatus.Running),
      isNull(acmeTasks.leaseExpiresAt),
      lt(acmeTasks.leaseExpiresAt, now),
    );
    if (leaseFree) {
      conditions.push(leaseFree);
    }
    if (excludeIds.length > 0) {
      conditions.push(notInArray(acmeTasks.id, excludeIds));
    }

    return db
      .select()
      .from(acmeTasks)
      .where(and(...conditions))
      .orderBy(asc(acmeTasks.id))
      .limit(limit);
  }

  /**
   * Done tasks with auto-renew whose certificate expires within the threshold
   */
  async findTasksToRenew(
    thresholdDays: number,
    limit: number,
    now: Date = new Date(),
  ): Promise<AcmeTask[]> {
    const expiresBefore = new Date(now.getTime() + thresholdDays * DAY_MS);
    const rows = await db
      .select({ task: acmeTasks })
      .from(acmeTasks)
      .innerJoin(sslCerts, eq(acmeTasks.certId, sslCerts.id))
      .where(
        and(
          eq(acmeTasks.isOn, true),
          eq(acmeTasks.state, RowState.Enabled),
          eq(acmeTasks.autoRenew, true),
          eq(acmeTasks.status, AcmeTaskStatus.Done),
          eq(sslCerts.isOn, true),
          eq(sslCerts.state, RowState.Enabled),
          lte(sslCerts.timeEndAt, expiresBefore),
        ),
      )
      .orderBy(asc(sslCerts.timeEndAt))
      .limit(limit);
    return rows.map((row) => row.task);
  }

  /**
   * Marks the task Running and takes a lease on it. Written before any external call.
   */
  async markRunning(taskId: number, now: Date = new Date()): Promise<void> {
    const leaseExpiresAt = new Date(now.getTime() + this.acmeConfig.taskLeaseMinutes * 60 * 1000);
    await db
      .update(acmeTasks)
      .set({ status: AcmeTaskStatus.Running, leaseExpiresAt, updatedAt: now })
      .where(eq(acmeTasks.id, taskId));
  }

  /**
   * Writes a terminal status and releases the lease
   */
  async finishRun(
    taskId: number,
    status: typeof AcmeTaskStatus.Done | typeof AcmeTaskStatus.IssueFailed,
  ): Promise<void> {
    await db
      .update(acmeTasks)
      .set({ status, leaseExpiresAt: null, updatedAt: new Date() })
      .where(eq(acmeTasks.id, taskId));
  }

  async bindCertificate(taskId: number, certId: number): Promise<void> {
    if (!taskId || taskId <= 0) {
      throw new BadRequestException('Invalid task id');
    }
    await db
      .update(acmeTasks)
      .set({ certId, updatedAt: new Date() })
      .where(eq(acmeTasks.id, taskId));
  }

  private async setIsOn(taskId: number, isOn: boolean): Promise<void> {
    await db
      .update(acmeTasks)
      .set({ isOn, updatedAt: new Date() })
      .where(eq(acmeTasks.id, taskId));
    this.logger.log({ event: isOn ? 'acme_task_enabled' : 'acme_task_disabled', taskId });
  }

  private assertAuthInput(authType: AcmeAuthType, dnsProviderId: number | null | undefined): void {
    if (authType === 'dns' && (!dnsProviderId || dnsProviderId <= 0)) {
      throw new BadRequestException('DNS-01 tasks require a DNS provider');
    }
  }

  private buildListCondition(filter: AcmeTaskListFilter, now: Date): SQL | undefined {
    const conditions: SQL[] = [eq(acmeTasks.state, RowState.Enabled)];

    if (filter.userId && filter.userId > 0) {
      conditions.push(eq(acmeTasks.userId, filter.userId));
    } else if (filter.userOnly) {
      conditions.push(gt(acmeTasks.userId, 0));
    } else {
      conditions.push(eq(acmeTasks.userId, 0));
    }

    const certConditions: SQL[] = [];
    if (filter.isAvailable) {
      certConditions.push(lte(sslCerts.timeBeginAt, now), gte(sslCerts.timeEndAt, now));
    }
    if (filter.isExpired) {
      certConditions.push(lt(sslCerts.timeEndAt, now));
    }
    if (filter.expiringDays && filter.expiringDays > 0) {
      const expiresBefore = new Date(now.getTime() + filter.expiringDays * DAY_MS);
      certConditions.push(gt(sslCerts.timeEndAt, now), lt(sslCerts.timeEndAt, expiresBefore));
    }
    if (certConditions.length > 0) {
      conditions.push(
        isNotNull(acmeTasks.certId),
        inArray(
          acmeTasks.certId,
          db
            .select({ id: sslCerts.id })
            .from(sslCerts)
            .where(and(...certConditions)),
        ),
      );
    }

    if (filter.keyword) {
      conditions.push(ilike(sql`${acmeTasks.domains}::text`, `%${escapeLike(filter.keyword)}%`));
    }

    return and(...conditions);
  }
}
