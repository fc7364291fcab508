import * as acme from 'acme-client';

/**
 * Certificate authority reachable over ACME
 */
export interface AcmeCaProvider {
  code: string;
  name: string;
  directoryUrl: string;
  // Falls back to directoryUrl when the CA has no staging environment
  stagingDirectoryUrl?: string;
  // CA only accepts accounts bound to pre-provisioned EAB credentials
  requiresEab: boolean;
}

const CA_PROVIDERS: readonly AcmeCaProvider[] = [
  {
    code: 'letsencrypt',
    name: "Let's Encrypt",
    directoryUrl: acme.directory.letsencrypt.production,
    stagingDirectoryUrl: acme.directory.letsencrypt.staging,
    requiresEab: false,
  },
  {
    code: 'buypass',
    name: 'Buypass',
    directoryUrl: acme.directory.buypass.production,
    stagingDirectoryUrl: acme.directory.buypass.staging,
    requiresEab: false,
  },
  {
    code: 'zerossl',
    name: 'ZeroSSL',
    directoryUrl: acme.directory.zerossl.production,
    requiresEab: true,
  },
];

export function findCaProvider(code: string): AcmeCaProvider | null {
  return CA_PROVIDERS.find((provider) => provider.code === code) ?? null;
}

export function resolveDirectoryUrl(provider: AcmeCaProvider, staging: boolean): string {
  return staging && provider.stagingDirectoryUrl
    ? provider.stagingDirectoryUrl
    : provider.directoryUrl;
}
