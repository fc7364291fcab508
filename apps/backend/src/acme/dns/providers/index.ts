import { IDnsProvider } from '../interfaces';
import { CloudflareProvider } from './cloudflare.provider';

export { CloudflareProvider } from './cloudflare.provider';

/**
 * DNS Provider Factory
 *
 * Creates a provider client for the `type` stored with a DNS provider configuration.
 * Returns null for types without an implementation.
 */
export function createDnsProvider(providerType: string): IDnsProvider | null {
  switch (providerType) {
    case 'cloudflare':
      return new CloudflareProvider();
    default:
      return null;
  }
}

