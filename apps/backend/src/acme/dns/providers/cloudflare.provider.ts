import axios, { AxiosInstance, isAxiosError } from 'axios';
import { DnsRecord, DnsRecordType, IDnsProvider } from '../interfaces';

interface CloudflareResponse<T> {
  success: boolean;
  errors: { code: number; message: string }[];
  result: T;
}

interface CloudflareRecord {
  id: string;
  name: string;
  type: DnsRecordType;
  content: string;
  ttl: number;
}

// Cloudflare treats ttl = 1 as "automatic"
const AUTO_TTL = 1;

/**
 * Cloudflare DNS Provider
 *
 * Uses the Cloudflare v4 API with a scoped API token (Zone.DNS edit).
 */
export class CloudflareProvider implements IDnsProvider {
  readonly providerType = 'cloudflare';

  private http: AxiosInstance | null = null;
  private minTtl = 0;
  private readonly zoneIds = new Map<string, string>();

  constructor(private readonly baseUrl = 'https://api.cloudflare.com/client/v4') {}

  async authenticate(params: Record<string, unknown>): Promise<void> {
    const apiToken = params.apiToken;
    if (typeof apiToken !== 'string' || apiToken.length === 0) {
      throw new Error("'apiToken' should not be empty");
    }
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: 10_000,
      headers: {
        Authorization: `Bearer ${apiToken}`,
        'Content-Type': 'application/json',
      },
    });
  }

  setMinimumTtl(ttl: number): void {
    this.minTtl = ttl;
  }

  async queryRecord(
    domain: string,
    name: string,
    type: DnsRecordType,
  ): Promise<DnsRecord | null> {
    const zoneId = await this.findZoneId(domain);
    const records = await this.request<CloudflareRecord[]>('get', `/zones/${zoneId}/dns_records`, {
      params: { type, name: `${name}.${domain}` },
    });
    const [record] = records;
    if (!record) {
      return null;
    }
    return {
      id: record.id,
      name,
      type: record.type,
      value: record.content,
      route: this.defaultRoute(),
      ttl: record.ttl,
    };
  }

  async addRecord(domain: string, record: DnsRecord): Promise<DnsRecord> {
    const zoneId = await this.findZoneId(domain);
    const created = await this.request<CloudflareRecord>('post', `/zones/${zoneId}/dns_records`, {
      data: this.toPayload(domain, record),
    });
    return { ...record, id: created.id };
  }

  async updateRecord(domain: string, record: DnsRecord, newRecord: DnsRecord): Promise<void> {
    const zoneId = await this.findZoneId(domain);
    await this.request<CloudflareRecord>('put', `/zones/${zoneId}/dns_records/${record.id}`, {
      data: this.toPayload(domain, newRecord),
    });
  }

  async deleteRecord(domain: string, record: DnsRecord): Promise<void> {
    const zoneId = await this.findZoneId(domain);
    await this.request<{ id: string }>('delete', `/zones/${zoneId}/dns_records/${record.id}`);
  }

  defaultRoute(): string {
    return '';
  }

  private toPayload(domain: string, record: DnsRecord): Record<string, unknown> {
    let ttl = record.ttl > 0 ? record.ttl : AUTO_TTL;
    if (this.minTtl > 0 && ttl < this.minTtl) {
      ttl = this.minTtl;
    }
    return {
      type: record.type,
      name: `${record.name}.${domain}`,
      content: record.value,
      ttl,
    };
  }

  private async findZoneId(domain: string): Promise<string> {
    const cached = this.zoneIds.get(domain);
    if (cached) {
      return cached;
    }
    const zones = await this.request<{ id: string; name: string }[]>('get', '/zones', {
      params: { name: domain },
    });
    const zone = zones.find((z) => z.name === domain);
    if (!zone) {
      throw new Error(`Cloudflare zone '${domain}' not found`);
    }
    this.zoneIds.set(domain, zone.id);
    return zone.id;
  }

  private async request<T>(
    method: 'get' | 'post' | 'put' | 'delete',
    url: string,
    options: { params?: Record<string, string>; data?: unknown } = {},
  ): Promise<T> {
    if (!this.http) {
      throw new Error('Cloudflare provider is not authenticated');
    }
    try {
      const response = await this.http.request<CloudflareResponse<T>>({ method, url, ...options });
      if (!response.data.success) {
        throw new Error(formatErrors(response.data.errors));
      }
      return response.data.result;
    } catch (error) {
      if (isAxiosError<CloudflareResponse<unknown>>(error) && error.response?.data?.errors) {
        throw new Error(`Cloudflare API error: ${formatErrors(error.response.data.errors)}`);
      }
      throw error;
    }
  }
}

function formatErrors(errors: { code: number; message: string }[]): string {
  if (errors.length === 0) {
    return 'unknown error';
  }
  return errors.map((e) => `[${e.code}] ${e.message}`).join(', ');
}
