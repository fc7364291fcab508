import { Injectable } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import { db } from '../../db/client';
import { dnsProviders, DnsProviderRecord } from '../../db/schema';
import { RowState } from '../acme.constants';

@Injectable()
export class DnsProvidersService {
  async findEnabledProvider(id: number): Promise<DnsProviderRecord | null> {
    const [provider] = await db
      .select()
      .from(dnsProviders)
      .where(and(eq(dnsProviders.id, id), eq(dnsProviders.state, RowState.Enabled)))
      .limit(1);
    return provider ?? null;
  }
}
