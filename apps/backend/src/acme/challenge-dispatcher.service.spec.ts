import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DnsProviderRecord } from '../db/schema';
import { ACME_AUTHORIZATION_EVENT } from './acme.constants';
import { AcmeAccountsService } from './acme-accounts.service';
import { AcmeAuthorizationEvent } from './acme-authorization.event';
import { AcmeProtocolClient, RunChallengeOptions } from './acme-protocol.client';
import { ChallengeDispatcherService } from './challenge-dispatcher.service';
import { DnsChallengeBackend } from './challenges/dns-challenge.backend';
import { HttpChallengeBackend } from './challenges/http-challenge.backend';
import { DnsProvidersService } from './dns/dns-providers.service';
import { buildResolvedAccount, buildTask } from './testing/acme-fixtures';

jest.mock('../db/client', () => ({ db: {} }));

function buildProviderRecord(overrides: Partial<DnsProviderRecord> = {}): DnsProviderRecord {
  return {
    id: 5,
    adminId: 0,
    userId: 7,
    name: 'main zone',
    type: 'cloudflare',
    apiParams: { apiToken: 'test-secret' },
    minTtl: 0,
    state: 1,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('ChallengeDispatcherService', () => {
  let service: ChallengeDispatcherService;
  let protocolClient: jest.Mocked<AcmeProtocolClient>;
  let accountsService: jest.Mocked<AcmeAccountsService>;
  let dnsProvidersService: jest.Mocked<DnsProvidersService>;
  let eventEmitter: jest.Mocked<EventEmitter2>;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChallengeDispatcherService,
        {
          provide: AcmeProtocolClient,
          useValue: {
            runChallenge: jest.fn().mockResolvedValue({ certificatePem: 'c', privateKeyPem: 'k' }),
          },
        },
        { provide: AcmeAccountsService, useValue: { saveRegistration: jest.fn() } },
        {
          provide: DnsProvidersService,
          useValue: { findEnabledProvider: jest.fn().mockResolvedValue(buildProviderRecord()) },
        },
        { provide: EventEmitter2, useValue: { emitAsync: jest.fn().mockResolvedValue([]) } },
      ],
    }).compile();

    service = module.get(ChallengeDispatcherService);
    protocolClient = module.get(AcmeProtocolClient);
    accountsService = module.get(AcmeAccountsService);
    dnsProvidersService = module.get(DnsProvidersService);
    eventEmitter = module.get(EventEmitter2);
  });

  describe('buildBackend', () => {
    it('should use the HTTP backend for http tasks', async () => {
      const backend = await service.buildBackend(buildTask({ authType: 'http', dnsProviderId: null }));

      expect(backend).toBeInstanceOf(HttpChallengeBackend);
      expect(dnsProvidersService.findEnabledProvider).not.toHaveBeenCalled();
    });

    it('should build a DNS backend from the task provider', async () => {
      const backend = await service.buildBackend(buildTask());

      expect(backend).toBeInstanceOf(DnsChallengeBackend);
      expect(dnsProvidersService.findEnabledProvider).toHaveBeenCalledWith(5);
    });

    it('should fail when the DNS provider was deleted', async () => {
      dnsProvidersService.findEnabledProvider.mockResolvedValue(null);

      await expect(service.buildBackend(buildTask())).rejects.toMatchObject({
        stage: 'provider',
        message: 'DNS provider not found',
      });
    });

    it('should fail when the task has no DNS provider', async () => {
      await expect(service.buildBackend(buildTask({ dnsProviderId: null }))).rejects.toMatchObject({
        stage: 'provider',
        message: 'DNS provider not found',
      });
    });

    it('should reject provider types without an implementation', async () => {
      dnsProvidersService.findEnabledProvider.mockResolvedValue(
        buildProviderRecord({ type: 'unknown-dns' }),
      );

      await expect(service.buildBackend(buildTask())).rejects.toThrow(
        "DNS provider type 'unknown-dns' is not supported",
      );
    });

    it('should report provider credentials it cannot use', async () => {
      dnsProvidersService.findEnabledProvider.mockResolvedValue(
        buildProviderRecord({ apiParams: {} }),
      );

      await expect(service.buildBackend(buildTask())).rejects.toMatchObject({
        stage: 'provider',
        message: "failed to authenticate DNS provider: 'apiToken' should not be empty",
      });
    });

    it('should tag provider lookup failures', async () => {
      dnsProvidersService.findEnabledProvider.mockRejectedValue(new Error('timeout'));

      await expect(service.buildBackend(buildTask())).rejects.toMatchObject({
        stage: 'lookup',
        message: 'failed to load DNS provider: timeout',
      });
    });

    it('should require a DNS zone', async () => {
      await expect(service.buildBackend(buildTask({ dnsDomain: '' }))).rejects.toThrow(
        'DNS zone is not set for the task',
      );
    });
  });

  describe('issue', () => {
    it('should emit an authorization event for every challenge token', async () => {
      protocolClient.runChallenge.mockImplementation(async (options: RunChallengeOptions) => {
        await options.onAuthorization({ domain: 'a.example.com', token: 'tok', key: 'key-auth' });
        return { certificatePem: 'c', privateKeyPem: 'k' };
      });

      await service.issue(buildTask({ authUrl: 'https://hooks.example.com/acme' }), buildResolvedAccount());

      expect(eventEmitter.emitAsync).toHaveBeenCalledWith(
        ACME_AUTHORIZATION_EVENT,
        new AcmeAuthorizationEvent(1, 'a.example.com', 'tok', 'key-auth', 'https://hooks.example.com/acme'),
      );
    });

    it('should persist a registration made during the run', async () => {
      protocolClient.runChallenge.mockImplementation(async (options: RunChallengeOptions) => {
        await options.onRegistered?.({ uri: 'https://ca.test/acct/9' });
        return { certificatePem: 'c', privateKeyPem: 'k' };
      });

      await service.issue(buildTask(), buildResolvedAccount());

      expect(accountsService.saveRegistration).toHaveBeenCalledWith(3, {
        uri: 'https://ca.test/acct/9',
      });
    });

    it('should pass the task domains to the protocol client', async () => {
      const result = await service.issue(
        buildTask({ domains: ['a.example.com', 'b.example.com'] }),
        buildResolvedAccount(),
      );

      expect(result).toEqual({ certificatePem: 'c', privateKeyPem: 'k' });
      expect(protocolClient.runChallenge).toHaveBeenCalledWith(
        expect.objectContaining({ domains: ['a.example.com', 'b.example.com'] }),
      );
    });
  });
});
