import { Logger } from '@nestjs/common';
import { DnsRecord, IDnsProvider } from '../dns/interfaces';
import { ChallengeBackend } from './challenge-backend.interface';

const CHALLENGE_LABEL = '_acme-challenge';
const CHALLENGE_TTL = 60;

/**
 * Name of the challenge TXT record relative to the zone.
 *
 * challengeRecordName('www.example.com', 'example.com') === '_acme-challenge.www'
 */
export function challengeRecordName(domain: string, zone: string): string {
  const host = domain.replace(/^\*\./, '').toLowerCase();
  const normalizedZone = zone.replace(/\.$/, '').toLowerCase();
  if (host === normalizedZone) {
    return CHALLENGE_LABEL;
  }
  if (!host.endsWith(`.${normalizedZone}`)) {
    throw new Error(`domain '${domain}' is not in DNS zone '${zone}'`);
  }
  const sub = host.slice(0, host.length - normalizedZone.length - 1);
  return `${CHALLENGE_LABEL}.${sub}`;
}

/**
 * DNS-01 backend: writes `_acme-challenge` TXT records into the task's zone
 * through a DNS provider and removes them once the CA has validated.
 */
export class DnsChallengeBackend implements ChallengeBackend {
  readonly challengeType = 'dns-01' as const;

  private readonly logger = new Logger(DnsChallengeBackend.name);
  // keyed by `${recordName}:${value}`
  private readonly published = new Map<string, DnsRecord>();

  constructor(
    private readonly provider: IDnsProvider,
    private readonly zone: string,
  ) {}

  async present(domain: string, _token: string, keyAuthorization: string): Promise<void> {
    const name = challengeRecordName(domain, this.zone);
    const record: DnsRecord = {
      id: '',
      name,
      type: 'TXT',
      value: keyAuthorization,
      route: this.provider.defaultRoute(),
      ttl: CHALLENGE_TTL,
    };

    const existing = await this.provider.queryRecord(this.zone, name, 'TXT');
    if (existing) {
      await this.provider.updateRecord(this.zone, existing, record);
      this.published.set(`${name}:${keyAuthorization}`, { ...record, id: existing.id });
    } else {
      const created = await this.provider.addRecord(this.zone, record);
      this.published.set(`${name}:${keyAuthorization}`, created);
    }
    this.logger.debug(`Published TXT ${name}.${this.zone}`);
  }

  async cleanup(domain: string, _token: string, keyAuthorization: string): Promise<void> {
    const name = challengeRecordName(domain, this.zone);
    const key = `${name}:${keyAuthorization}`;
    const record = this.published.get(key);
    if (!record) {
      return;
    }
    await this.provider.deleteRecord(this.zone, record);
    this.published.delete(key);
  }
}
