import axios from 'axios';
import { CloudflareProvider } from './cloudflare.provider';
import { createDnsProvider } from './index';

jest.mock('axios', () => {
  const actual = jest.requireActual('axios');
  return {
    __esModule: true,
    ...actual,
    default: { ...actual.default, create: jest.fn() },
  };
});

describe('CloudflareProvider', () => {
  let request: jest.Mock;
  let provider: CloudflareProvider;

  const ok = <T>(result: T) => ({ data: { success: true, errors: [], result } });

  beforeEach(async () => {
    jest.clearAllMocks();
    request = jest.fn();
    (axios.create as jest.Mock).mockReturnValue({ request });
    provider = new CloudflareProvider();
    await provider.authenticate({ apiToken: 'test-secret' });
  });

  it('should require an API token', async () => {
    await expect(new CloudflareProvider().authenticate({})).rejects.toThrow(
      "'apiToken' should not be empty",
    );
  });

  it('should send the token as a bearer credential', () => {
    expect(axios.create).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: 'https://api.cloudflare.com/client/v4',
        headers: expect.objectContaining({ Authorization: 'Bearer test-secret' }),
      }),
    );
  });

  it('should create a TXT record in the zone', async () => {
    request
      .mockResolvedValueOnce(ok([{ id: 'zone-1', name: 'example.com' }]))
      .mockResolvedValueOnce(ok({ id: 'rec-9' }));

    const created = await provider.addRecord('example.com', {
      id: '',
      name: '_acme-challenge.www',
      type: 'TXT',
      value: 'digest',
      route: '',
      ttl: 60,
    });

    expect(created.id).toBe('rec-9');
    expect(request).toHaveBeenLastCalledWith({
      method: 'post',
      url: '/zones/zone-1/dns_records',
      data: { type: 'TXT', name: '_acme-challenge.www.example.com', content: 'digest', ttl: 60 },
    });
  });

  it('should raise the TTL to the configured minimum', async () => {
    provider.setMinimumTtl(120);
    request
      .mockResolvedValueOnce(ok([{ id: 'zone-1', name: 'example.com' }]))
      .mockResolvedValueOnce(ok({ id: 'rec-9' }));

    await provider.addRecord('example.com', {
      id: '',
      name: '_acme-challenge',
      type: 'TXT',
      value: 'digest',
      route: '',
      ttl: 60,
    });

    expect(request.mock.calls[1][0].data.ttl).toBe(120);
  });

  it('should return null when the record does not exist', async () => {
    request
      .mockResolvedValueOnce(ok([{ id: 'zone-1', name: 'example.com' }]))
      .mockResolvedValueOnce(ok([]));

    await expect(provider.queryRecord('example.com', '_acme-challenge', 'TXT')).resolves.toBeNull();
  });

  it('should surface API errors', async () => {
    request.mockResolvedValueOnce({
      data: { success: false, errors: [{ code: 9109, message: 'Invalid access token' }], result: null },
    });

    await expect(provider.queryRecord('example.com', '_acme-challenge', 'TXT')).rejects.toThrow(
      '[9109] Invalid access token',
    );
  });

  it('should fail when the zone is not on the account', async () => {
    request.mockResolvedValueOnce(ok([]));

    await expect(
      provider.deleteRecord('example.com', {
        id: 'rec-1',
        name: '_acme-challenge',
        type: 'TXT',
        value: 'digest',
        route: '',
        ttl: 60,
      }),
    ).rejects.toThrow("Cloudflare zone 'example.com' not found");
  });
});

describe('createDnsProvider', () => {
  it('should build a provider for known types only', () => {
    expect(createDnsProvider('cloudflare')).toBeInstanceOf(CloudflareProvider);
    expect(createDnsProvider('unknown-dns')).toBeNull();
  });
});
