import { Injectable } from '@nestjs/common';
import { and, eq, sql } from 'drizzle-orm';
import { db } from '../../db/client';
import { servers, HttpsProtocolConfig, Server } from '../../db/schema';
import { RowState } from '../acme.constants';

@Injectable()
export class ServersService {
  /**
   * Live hosts whose plain server names include `serverName`
   */
  async findServersByServerName(serverName: string): Promise<Server[]> {
    return db
      .select()
      .from(servers)
      .where(
        and(
          eq(servers.state, RowState.Enabled),
          sql`${servers.plainServerNames} @> ${JSON.stringify([serverName])}::jsonb`,
        ),
      );
  }

  async findEnabledServer(serverId: number): Promise<Server | null> {
    const [server] = await db
      .select()
      .from(servers)
      .where(and(eq(servers.id, serverId), eq(servers.state, RowState.Enabled)))
      .limit(1);
    return server ?? null;
  }

  async updateServerHttps(serverId: number, https: HttpsProtocolConfig): Promise<void> {
    await db
      .update(servers)
      .set({ https, updatedAt: new Date() })
      .where(eq(servers.id, serverId));
  }
}
