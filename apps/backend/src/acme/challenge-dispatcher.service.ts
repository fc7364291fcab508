import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AcmeTask } from '../db/schema';
import { ACME_AUTHORIZATION_EVENT } from './acme.constants';
import { AcmeAccountsService, ResolvedAcmeAccount } from './acme-accounts.service';
import { AcmeAuthorizationEvent } from './acme-authorization.event';
import { AcmeProtocolClient, IssuedCertificate } from './acme-protocol.client';
import { AcmeTaskError } from './acme-task.errors';
import { ChallengeBackend } from './challenges/challenge-backend.interface';
import { DnsChallengeBackend } from './challenges/dns-challenge.backend';
import { HttpChallengeBackend } from './challenges/http-challenge.backend';
import { DnsProvidersService } from './dns/dns-providers.service';
import { createDnsProvider } from './dns/providers';

/**
 * Challenge Dispatcher: picks the validation backend for a task and drives the
 * ACME client through it.
 */
@Injectable()
export class ChallengeDispatcherService {
  private readonly logger = new Logger(ChallengeDispatcherService.name);

  constructor(
    private readonly protocolClient: AcmeProtocolClient,
    private readonly accountsService: AcmeAccountsService,
    private readonly dnsProvidersService: DnsProvidersService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async issue(task: AcmeTask, account: ResolvedAcmeAccount): Promise<IssuedCertificate> {
    const backend = await this.buildBackend(task);

    this.logger.debug(
      `Running ${backend.challengeType} for task ${task.id} (${task.domains.join(', ')})`,
    );

    return this.protocolClient.runChallenge({
      account,
      backend,
      domains: task.domains,
      onAuthorization: async ({ domain, token, key }) => {
        await this.eventEmitter.emitAsync(
          ACME_AUTHORIZATION_EVENT,
          new AcmeAuthorizationEvent(task.id, domain, token, key, task.authUrl),
        );
      },
      onRegistered: (registration) =>
        this.accountsService.saveRegistration(account.id, registration),
    });
  }

  async buildBackend(task: AcmeTask): Promise<ChallengeBackend> {
    if (task.authType === 'http') {
      return new HttpChallengeBackend();
    }

    if (!task.dnsProviderId) {
      throw new AcmeTaskError('provider', 'DNS provider not found');
    }
    const record = await this.dnsProvidersService
      .findEnabledProvider(task.dnsProviderId)
      .catch((error: unknown) => {
        throw AcmeTaskError.wrap('lookup', 'failed to load DNS provider', error);
      });
    if (!record) {
      throw new AcmeTaskError('provider', 'DNS provider not found');
    }

    const provider = createDnsProvider(record.type);
    if (!provider) {
      throw new AcmeTaskError('provider', `DNS provider type '${record.type}' is not supported`);
    }
    try {
      await provider.authenticate(record.apiParams);
    } catch (error) {
      throw AcmeTaskError.wrap('provider', 'failed to authenticate DNS provider', error);
    }
    if (record.minTtl > 0) {
      provider.setMinimumTtl(record.minTtl);
    }

    if (!task.dnsDomain) {
      throw new AcmeTaskError('provider', 'DNS zone is not set for the task');
    }
    return new DnsChallengeBackend(provider, task.dnsDomain);
  }
}
