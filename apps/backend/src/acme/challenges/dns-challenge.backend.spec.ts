import { DnsRecord, IDnsProvider } from '../dns/interfaces';
import { challengeRecordName, DnsChallengeBackend } from './dns-challenge.backend';

describe('challengeRecordName', () => {
  it('should place the record under the subdomain relative to the zone', () => {
    expect(challengeRecordName('www.example.com', 'example.com')).toBe('_acme-challenge.www');
    expect(challengeRecordName('a.b.example.com', 'example.com')).toBe('_acme-challenge.a.b');
  });

  it('should use the bare label for the zone apex and wildcards', () => {
    expect(challengeRecordName('example.com', 'example.com')).toBe('_acme-challenge');
    expect(challengeRecordName('*.example.com', 'example.com')).toBe('_acme-challenge');
  });

  it('should reject domains outside the zone', () => {
    expect(() => challengeRecordName('example.org', 'example.com')).toThrow(
      "domain 'example.org' is not in DNS zone 'example.com'",
    );
  });
});

describe('DnsChallengeBackend', () => {
  let provider: jest.Mocked<IDnsProvider>;
  let backend: DnsChallengeBackend;

  beforeEach(() => {
    provider = {
      providerType: 'cloudflare',
      authenticate: jest.fn(),
      setMinimumTtl: jest.fn(),
      queryRecord: jest.fn().mockResolvedValue(null),
      addRecord: jest.fn(async (_domain: string, record: DnsRecord) => ({ ...record, id: 'rec-1' })),
      updateRecord: jest.fn(),
      deleteRecord: jest.fn(),
      defaultRoute: jest.fn().mockReturnValue(''),
    };
    backend = new DnsChallengeBackend(provider, 'example.com');
  });

  it('should add a TXT record carrying the key authorization', async () => {
    await backend.present('www.example.com', 'token-1', 'digest-1');

    expect(provider.queryRecord).toHaveBeenCalledWith('example.com', '_acme-challenge.www', 'TXT');
    expect(provider.addRecord).toHaveBeenCalledWith('example.com', {
      id: '',
      name: '_acme-challenge.www',
      type: 'TXT',
      value: 'digest-1',
      route: '',
      ttl: 60,
    });
  });

  it('should overwrite a leftover challenge record', async () => {
    const leftover: DnsRecord = {
      id: 'old',
      name: '_acme-challenge.www',
      type: 'TXT',
      value: 'stale',
      route: '',
      ttl: 60,
    };
    provider.queryRecord.mockResolvedValue(leftover);

    await backend.present('www.example.com', 'token-1', 'digest-1');

    expect(provider.addRecord).not.toHaveBeenCalled();
    expect(provider.updateRecord).toHaveBeenCalledWith(
      'example.com',
      leftover,
      expect.objectContaining({ value: 'digest-1' }),
    );
  });

  it('should delete the record it published', async () => {
    await backend.present('www.example.com', 'token-1', 'digest-1');
    await backend.cleanup('www.example.com', 'token-1', 'digest-1');

    expect(provider.deleteRecord).toHaveBeenCalledWith(
      'example.com',
      expect.objectContaining({ id: 'rec-1', name: '_acme-challenge.www' }),
    );
  });

  it('should leave records it did not publish alone', async () => {
    await backend.cleanup('www.example.com', 'token-1', 'digest-1');

    expect(provider.deleteRecord).not.toHaveBeenCalled();
  });
});
