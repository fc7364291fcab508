import { Injectable, Logger } from '@nestjs/common';
import { and, eq, inArray, sql } from 'drizzle-orm';
import { db } from '../db/client';
import {
  acmeProviderAccounts,
  acmeUsers,
  AcmeProviderAccount,
  AcmeRegistration,
  AcmeUser,
} from '../db/schema';
import { AcmeConfig } from './acme.config';
import { RowState } from './acme.constants';
import {
  AccountNotFoundError,
  AcmeTaskError,
  ProviderUnavailableError,
} from './acme-task.errors';
import { AcmeCaProvider, findCaProvider } from './acme-providers';

export interface ExternalAccountBinding {
  kid: string;
  hmacKey: string;
}

/**
 * Everything the ACME client needs to act as an account
 */
export interface ResolvedAcmeAccount {
  id: number;
  email: string;
  privateKeyPem: string;
  registration: AcmeRegistration | null;
  provider: AcmeCaProvider;
  eab: ExternalAccountBinding | null;
}

export interface ResolveAccountOptions {
  // Substitute a random enabled account of the same CA
  rotate?: boolean;
}

/**
 * Account Resolver: loads the ACME account a task runs under.
 */
@Injectable()
export class AcmeAccountsService {
  private readonly logger = new Logger(AcmeAccountsService.name);

  constructor(private readonly acmeConfig: AcmeConfig) {}

  async resolveAccount(
    acmeUserId: number,
    options: ResolveAccountOptions = {},
  ): Promise<ResolvedAcmeAccount> {
    let user = await this.load('failed to load ACME account', () =>
      this.findEnabledAccount(acmeUserId),
    );
    if (!user) {
      throw new AccountNotFoundError();
    }

    const providerCode = user.providerCode || this.acmeConfig.defaultProviderCode;

    if (options.rotate) {
      user = await this.load('failed to load ACME account', () =>
        this.findRandomAccountWithProvider(providerCode),
      );
      if (!user) {
        throw new AccountNotFoundError();
      }
      this.logger.debug(`Rotated task account ${acmeUserId} to account ${user.id}`);
    }

    const provider = findCaProvider(providerCode);
    if (!provider) {
      throw new ProviderUnavailableError(providerCode);
    }

    let eab: ExternalAccountBinding | null = null;
    if (user.accountId) {
      const accountId = user.accountId;
      const providerAccount = await this.load('failed to load ACME provider account', () =>
        this.findEnabledProviderAccount(accountId),
      );
      if (providerAccount) {
        eab = { kid: providerAccount.eabKid, hmacKey: providerAccount.eabKey };
      }
    }
    if (provider.requiresEab && !eab) {
      throw new AcmeTaskError(
        'account',
        `ACME provider '${provider.code}' requires external account binding credentials`,
      );
    }

    return {
      id: user.id,
      email: user.email,
      privateKeyPem: decodePrivateKey(user.privateKey),
      registration: user.registration ?? null,
      provider,
      eab,
    };
  }

  /**
   * Persist the registration resource returned by the CA on first registration
   */
  async saveRegistration(acmeUserId: number, registration: AcmeRegistration): Promise<void> {
    await db.update(acmeUsers).set({ registration }).where(eq(acmeUsers.id, acmeUserId));
    this.logger.log({ event: 'acme_account_registered', acmeUserId, uri: registration.uri });
  }

  async findEnabledAccount(acmeUserId: number): Promise<AcmeUser | null> {
    const [user] = await db
      .select()
      .from(acmeUsers)
      .where(and(eq(acmeUsers.id, acmeUserId), eq(acmeUsers.state, RowState.Enabled)))
      .limit(1);
    return user ?? null;
  }

  /**
   * Random enabled account of the CA. Accounts without a provider code belong to
   * the default CA.
   */
  async findRandomAccountWithProvider(providerCode: string): Promise<AcmeUser | null> {
    const codes =
      providerCode === this.acmeConfig.defaultProviderCode ? [providerCode, ''] : [providerCode];
    const [user] = await db
      .select()
      .from(acmeUsers)
      .where(and(eq(acmeUsers.state, RowState.Enabled), inArray(acmeUsers.providerCode, codes)))
      .orderBy(sql`random()`)
      .limit(1);
    return user ?? null;
  }

  async findEnabledProviderAccount(accountId: number): Promise<AcmeProviderAccount | null> {
    const [account] = await db
      .select()
      .from(acmeProviderAccounts)
      .where(
        and(
          eq(acmeProviderAccounts.id, accountId),
          eq(acmeProviderAccounts.isOn, true),
          eq(acmeProviderAccounts.state, RowState.Enabled),
        ),
      )
      .limit(1);
    return account ?? null;
  }

  private async load<T>(prefix: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw AcmeTaskError.wrap('lookup', prefix, error);
    }
  }
}

/**
 * Account keys are stored base64-encoded; plain PEM is accepted as well.
 */
export function decodePrivateKey(stored: string): string {
  const trimmed = stored.trim();
  const pem = trimmed.startsWith('-----BEGIN')
    ? trimmed
    : Buffer.from(trimmed, 'base64').toString('utf8').trim();
  if (!/-----BEGIN [A-Z ]*PRIVATE KEY-----/.test(pem)) {
    throw new AcmeTaskError('account', 'failed to decode account private key: not a PEM private key');
  }
  return pem;
}
