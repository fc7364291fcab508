import { Injectable, Logger } from '@nestjs/common';
import { Server, SslCert, SslCertRef } from '../../db/schema';
import { describeError } from '../acme-task.errors';
import { SslCertsService } from '../certs/ssl-certs.service';
import { KeyedMutex } from '../keyed-registry';
import { ServersService } from './servers.service';
import { SslPoliciesService } from './ssl-policies.service';

// Attempts at the policy compare-and-swap before a host is reported as failed
const MAX_POLICY_WRITE_ATTEMPTS = 5;

export type HostBindingOutcome = 'updated' | 'created' | 'skipped';

export interface BindingSummary {
  updated: number[];
  created: number[];
  skipped: number[];
  failed: number[];
}

export interface MergedCertRefs {
  certs: SslCertRef[];
  superseded: number[];
}

function isSubset(names: string[], of: string[]): boolean {
  return names.every((name) => of.includes(name));
}

/**
 * Drops references whose certificate is covered by `newCert` and expires
 * before it, then appends `newCert`. One reference per certificate.
 */
export function mergeCertRefs(
  current: SslCertRef[],
  certsById: ReadonlyMap<number, Pick<SslCert, 'dnsNames' | 'timeEndAt'>>,
  newCert: Pick<SslCert, 'id' | 'dnsNames' | 'timeEndAt'>,
): MergedCertRefs {
  const certs: SslCertRef[] = [];
  const superseded: number[] = [];
  const seen = new Set<number>([newCert.id]);

  for (const ref of current) {
    if (seen.has(ref.certId)) {
      continue;
    }
    seen.add(ref.certId);
    const cert = certsById.get(ref.certId);
    if (
      cert &&
      isSubset(cert.dnsNames, newCert.dnsNames) &&
      cert.timeEndAt.getTime() < newCert.timeEndAt.getTime()
    ) {
      superseded.push(ref.certId);
      continue;
    }
    certs.push(ref);
  }
  certs.push({ isOn: true, certId: newCert.id });

  return { certs, superseded };
}

/**
 * Binding Merger: points the TLS policy of every host serving one of the issued
 * domains at the new certificate.
 */
@Injectable()
export class BindingMergerService {
  private readonly logger = new Logger(BindingMergerService.name);
  private readonly hostLocks = new KeyedMutex<number>();

  constructor(
    private readonly serversService: ServersService,
    private readonly policiesService: SslPoliciesService,
    private readonly certsService: SslCertsService,
  ) {}

  async bindCertificate(certId: number, domains: string[]): Promise<BindingSummary> {
    const summary: BindingSummary = { updated: [], created: [], skipped: [], failed: [] };

    const newCert = await this.certsService.findEnabledCert(certId);
    if (!newCert) {
      this.logger.warn(`Certificate ${certId} not found, nothing to bind`);
      return summary;
    }

    const hosts = await this.findHosts(domains);
    for (const host of hosts) {
      try {
        const outcome = await this.hostLocks.runExclusive(host.id, () =>
          this.bindHost(host.id, newCert),
        );
        summary[outcome].push(host.id);
      } catch (error) {
        summary.failed.push(host.id);
        this.logger.error({
          event: 'acme_binding_host_failed',
          serverId: host.id,
          certId,
          error: describeError(error),
        });
      }
    }

    this.logger.log({ event: 'acme_binding_completed', certId, ...summary });
    return summary;
  }

  /**
   * Hosts matching any domain. Once a host matches, all of its server names
   * count as checked.
   */
  private async findHosts(domains: string[]): Promise<Server[]> {
    const checked = new Set<string>();
    const hosts = new Map<number, Server>();

    for (const domain of domains) {
      if (checked.has(domain)) {
        continue;
      }
      let matches: Server[];
      try {
        matches = await this.serversService.findServersByServerName(domain);
      } catch (error) {
        this.logger.warn(`Failed to look up hosts for ${domain}: ${describeError(error)}`);
        continue;
      }
      for (const server of matches) {
        for (const name of server.plainServerNames) {
          checked.add(name);
        }
        if (!hosts.has(server.id)) {
          hosts.set(server.id, server);
        }
      }
    }
    return [...hosts.values()];
  }

  private async bindHost(serverId: number, newCert: SslCert): Promise<HostBindingOutcome> {
    // Re-read under the host lock; the copy from the lookup may be stale
    const server = await this.serversService.findEnabledServer(serverId);
    if (!server || !server.https) {
      return 'skipped';
    }

    const policyId = server.https.sslPolicyRef?.sslPolicyId ?? 0;
    if (policyId > 0 && (await this.updateExistingPolicy(policyId, newCert))) {
      return 'updated';
    }

    const newPolicyId = await this.policiesService.createPolicy(server.userId, [
      { isOn: true, certId: newCert.id },
    ]);
    await this.serversService.updateServerHttps(server.id, {
      ...server.https,
      sslPolicyRef: { isOn: true, sslPolicyId: newPolicyId },
    });
    return 'created';
  }

  /**
   * Returns false when the policy no longer exists
   */
  private async updateExistingPolicy(policyId: number, newCert: SslCert): Promise<boolean> {
    for (let attempt = 1; attempt <= MAX_POLICY_WRITE_ATTEMPTS; attempt++) {
      const policy = await this.policiesService.findEnabledPolicy(policyId);
      if (!policy) {
        return false;
      }

      const referenced = await this.certsService.findEnabledCerts(
        policy.certs.map((ref) => ref.certId),
      );
      const { certs, superseded } = mergeCertRefs(
        policy.certs,
        new Map(referenced.map((cert) => [cert.id, cert])),
        newCert,
      );

      if (await this.policiesService.updatePolicyCerts(policy.id, certs, policy.version)) {
        for (const oldCertId of superseded) {
          await this.certsService.disableCert(oldCertId).catch((error: unknown) => {
            this.logger.warn(`Failed to disable superseded certificate ${oldCertId}: ${error}`);
          });
        }
        return true;
      }
      this.logger.debug(`Policy ${policyId} changed concurrently (attempt ${attempt})`);
    }
    throw new Error(`SSL policy ${policyId} kept changing, gave up after ${MAX_POLICY_WRITE_ATTEMPTS} attempts`);
  }
}
