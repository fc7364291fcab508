export type DnsRecordType = 'A' | 'AAAA' | 'CNAME' | 'TXT';

export interface DnsRecord {
  // Provider-assigned id, empty before the record is created
  id: string;
  // Name relative to the zone, e.g. `_acme-challenge.www`
  name: string;
  type: DnsRecordType;
  value: string;
  route: string;
  ttl: number;
}

/**
 * DNS Provider Interface
 *
 * Capability set the DNS-01 backend needs from a DNS hosting API. Every record
 * operation is scoped to a zone (`domain`).
 */
export interface IDnsProvider {
  readonly providerType: string;

  /**
   * Validate and keep the API credentials stored with the provider configuration
   */
  authenticate(params: Record<string, unknown>): Promise<void>;

  setMinimumTtl(ttl: number): void;

  queryRecord(domain: string, name: string, type: DnsRecordType): Promise<DnsRecord | null>;

  addRecord(domain: string, record: DnsRecord): Promise<DnsRecord>;

  updateRecord(domain: string, record: DnsRecord, newRecord: DnsRecord): Promise<void>;

  deleteRecord(domain: string, record: DnsRecord): Promise<void>;

  defaultRoute(): string;
}
