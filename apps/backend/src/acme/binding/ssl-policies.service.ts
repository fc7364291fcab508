import { Injectable } from '@nestjs/common';
import { and, eq, sql } from 'drizzle-orm';
import { db } from '../../db/client';
import { sslPolicies, SslCertRef, SslPolicy } from '../../db/schema';
import { DEFAULT_POLICY_MIN_VERSION, RowState } from '../acme.constants';

@Injectable()
export class SslPoliciesService {
  async findEnabledPolicy(policyId: number): Promise<SslPolicy | null> {
    const [policy] = await db
      .select()
      .from(sslPolicies)
      .where(and(eq(sslPolicies.id, policyId), eq(sslPolicies.state, RowState.Enabled)))
      .limit(1);
    return policy ?? null;
  }

  /**
   * New policy carrying only `certs`; every other setting takes its default
   */
  async createPolicy(userId: number, certs: SslCertRef[]): Promise<number> {
    const [policy] = await db
      .insert(sslPolicies)
      .values({ userId, certs, minVersion: DEFAULT_POLICY_MIN_VERSION })
      .returning({ id: sslPolicies.id });
    return policy.id;
  }

  /**
   * Compare-and-swap on `version`. Returns false when another writer got there first.
   */
  async updatePolicyCerts(
    policyId: number,
    certs: SslCertRef[],
    expectedVersion: number,
  ): Promise<boolean> {
    const updated = await db
      .update(sslPolicies)
      .set({ certs, version: sql`${sslPolicies.version} + 1`, updatedAt: new Date() })
      .where(and(eq(sslPolicies.id, policyId), eq(sslPolicies.version, expectedVersion)))
      .returning({ id: sslPolicies.id });
    return updated.length > 0;
  }
}
