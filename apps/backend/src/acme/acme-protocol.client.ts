import { Injectable, Logger } from '@nestjs/common';
import * as acme from 'acme-client';
import { AcmeRegistration } from '../db/schema';
import { AcmeConfig } from './acme.config';
import { AcmeTaskError } from './acme-task.errors';
import { ResolvedAcmeAccount } from './acme-accounts.service';
import { resolveDirectoryUrl } from './acme-providers';
import { ChallengeBackend } from './challenges/challenge-backend.interface';

export interface AcmeAuthorizationMaterial {
  domain: string;
  token: string;
  key: string;
}

/**
 * Invoked once per authorization before the CA is asked to validate it
 */
export type AuthorizationHandler = (material: AcmeAuthorizationMaterial) => Promise<void>;

export type RegistrationHandler = (registration: AcmeRegistration) => Promise<void>;

export interface IssuedCertificate {
  certificatePem: string;
  privateKeyPem: string;
}

export interface RunChallengeOptions {
  account: ResolvedAcmeAccount;
  backend: ChallengeBackend;
  domains: string[];
  onAuthorization: AuthorizationHandler;
  // Called after the account was registered with the CA during this run
  onRegistered?: RegistrationHandler;
}

/**
 * Thin adapter over acme-client: account registration and the
 * order → authorize → finalize sequence. Failures surface as AcmeTaskError
 * tagged with the stage they happened in.
 */
@Injectable()
export class AcmeProtocolClient {
  private readonly logger = new Logger(AcmeProtocolClient.name);

  constructor(private readonly acmeConfig: AcmeConfig) {}

  async register(account: ResolvedAcmeAccount): Promise<AcmeRegistration> {
    const client = this.createClient(account);
    return this.registerWith(client, account);
  }

  async runChallenge(options: RunChallengeOptions): Promise<IssuedCertificate> {
    const { account, backend, domains } = options;
    let client = this.createClient(account);

    if (!account.registration) {
      const registration = await this.registerWith(client, account);
      if (options.onRegistered) {
        try {
          await options.onRegistered(registration);
        } catch (error) {
          throw AcmeTaskError.wrap('account', 'failed to save ACME registration', error);
        }
      }
      client = this.createClient({ ...account, registration });
    }

    const order = await this.stage('issuance', 'failed to create order', () =>
      client.createOrder({
        identifiers: domains.map((domain) => ({ type: 'dns', value: domain })),
      }),
    );
    const authorizations = await this.stage('issuance', 'failed to load authorizations', () =>
      client.getAuthorizations(order),
    );

    for (const authz of authorizations) {
      if (authz.status === 'valid') {
        continue;
      }
      const domain = authz.identifier.value;
      const challenge = authz.challenges.find((c) => c.type === backend.challengeType);
      if (!challenge) {
        throw new AcmeTaskError(
          'validation',
          `${backend.challengeType} challenge not available for ${domain}`,
        );
      }

      const key = await this.stage('validation', 'failed to compute key authorization', () =>
        client.getChallengeKeyAuthorization(challenge),
      );
      await this.stage('validation', `failed to record authorization for ${domain}`, () =>
        options.onAuthorization({ domain, token: challenge.token, key }),
      );

      try {
        await this.stage('validation', `failed to publish challenge for ${domain}`, () =>
          backend.present(domain, challenge.token, key),
        );
        await this.stage('validation', `challenge validation failed for ${domain}`, async () => {
          await client.completeChallenge(challenge);
          await client.waitForValidStatus(challenge);
        });
      } finally {
        await backend.cleanup(domain, challenge.token, key).catch((error: unknown) => {
          this.logger.warn(`Failed to clean up challenge for ${domain}: ${error}`);
        });
      }
    }

    const [privateKey, csr] = await this.stage('issuance', 'failed to create CSR', () =>
      acme.crypto.createCsr({ commonName: domains[0], altNames: domains }),
    );
    const certificatePem = await this.stage('issuance', 'failed to finalize order', async () => {
      let finalized = await client.finalizeOrder(order, csr);
      if (finalized.status !== 'valid') {
        finalized = await client.waitForValidStatus(finalized);
      }
      return client.getCertificate(finalized);
    });

    return { certificatePem, privateKeyPem: privateKey.toString() };
  }

  private createClient(account: ResolvedAcmeAccount): acme.Client {
    return new acme.Client({
      directoryUrl: resolveDirectoryUrl(account.provider, this.acmeConfig.useStaging),
      accountKey: account.privateKeyPem,
      accountUrl: account.registration?.uri,
      externalAccountBinding: account.eab ?? undefined,
    });
  }

  private async registerWith(
    client: acme.Client,
    account: ResolvedAcmeAccount,
  ): Promise<AcmeRegistration> {
    return this.stage('account', 'failed to register ACME account', async () => {
      const created = await client.createAccount({
        termsOfServiceAgreed: true,
        contact: [`mailto:${account.email}`],
      });
      this.logger.log(`Registered ACME account ${account.id} with ${account.provider.code}`);
      return {
        uri: client.getAccountUrl(),
        body: { status: created.status, contact: created.contact ?? [] },
      };
    });
  }

  private async stage<T>(
    stage: AcmeTaskError['stage'],
    prefix: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw AcmeTaskError.wrap(stage, prefix, error);
    }
  }
}
