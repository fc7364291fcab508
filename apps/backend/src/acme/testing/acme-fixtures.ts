import { generateKeyPairSync } from 'crypto';
import * as forge from 'node-forge';
import { AcmeTask, Server, SslCert, SslPolicy } from '../../db/schema';
import { AcmeTaskStatus, RowState } from '../acme.constants';
import { ResolvedAcmeAccount } from '../acme-accounts.service';

const BASE_DATE = new Date('2025-01-01T00:00:00Z');

export function buildTask(overrides: Partial<AcmeTask> = {}): AcmeTask {
  return {
    id: 1,
    adminId: 0,
    userId: 7,
    authType: 'dns',
    acmeUserId: 3,
    dnsProviderId: 5,
    dnsDomain: 'example.com',
    domains: ['a.example.com'],
    autoRenew: true,
    authUrl: '',
    isOn: true,
    state: RowState.Enabled,
    status: AcmeTaskStatus.Pending,
    certId: null,
    async: true,
    leaseExpiresAt: null,
    createdAt: BASE_DATE,
    updatedAt: BASE_DATE,
    ...overrides,
  };
}

export function buildResolvedAccount(
  overrides: Partial<ResolvedAcmeAccount> = {},
): ResolvedAcmeAccount {
  return {
    id: 3,
    email: 'ops@example.com',
    privateKeyPem: 'account-key-pem',
    registration: { uri: 'https://ca.test/acct/1' },
    provider: {
      code: 'letsencrypt',
      name: 'Test CA',
      directoryUrl: 'https://ca.test/directory',
      stagingDirectoryUrl: 'https://staging.ca.test/directory',
      requiresEab: false,
    },
    eab: null,
    ...overrides,
  };
}

export function buildCert(overrides: Partial<SslCert> = {}): SslCert {
  return {
    id: 100,
    adminId: 0,
    userId: 7,
    isOn: true,
    state: RowState.Enabled,
    name: 'cert',
    description: '',
    certData: 'cert-pem',
    keyData: 'key-pem',
    timeBeginAt: new Date('2025-01-01T00:00:00Z'),
    timeEndAt: new Date('2025-04-01T00:00:00Z'),
    dnsNames: ['a.example.com'],
    commonNames: ['Test CA'],
    isACME: true,
    acmeTaskId: 1,
    createdAt: BASE_DATE,
    updatedAt: BASE_DATE,
    ...overrides,
  };
}

export function buildPolicy(overrides: Partial<SslPolicy> = {}): SslPolicy {
  return {
    id: 50,
    adminId: 0,
    userId: 7,
    isOn: true,
    state: RowState.Enabled,
    certs: [],
    minVersion: 'TLS 1.2',
    http2Enabled: true,
    http3Enabled: false,
    hsts: null,
    ocspIsOn: false,
    clientAuthType: 0,
    clientCaCerts: null,
    cipherSuitesIsOn: false,
    cipherSuites: null,
    version: 1,
    createdAt: BASE_DATE,
    updatedAt: BASE_DATE,
    ...overrides,
  };
}

export function buildServer(overrides: Partial<Server> = {}): Server {
  return {
    id: 10,
    adminId: 0,
    userId: 7,
    name: 'site',
    isOn: true,
    state: RowState.Enabled,
    plainServerNames: ['a.example.com'],
    https: {
      isOn: true,
      listen: [{ protocol: 'https', host: '', portRange: '443' }],
      sslPolicyRef: { isOn: true, sslPolicyId: 50 },
    },
    updatedAt: BASE_DATE,
    ...overrides,
  };
}

export interface TestCertificateOptions {
  commonName: string;
  dnsNames: string[];
  notBefore: Date;
  notAfter: Date;
  issuerName?: string;
}

/**
 * Self-signed PEM certificate for parser and end-to-end tests
 */
export function createTestCertificate(options: TestCertificateOptions): {
  certificatePem: string;
  privateKeyPem: string;
} {
  const { privateKey: privateKeyPem } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  });
  const privateKey = forge.pki.privateKeyFromPem(privateKeyPem);

  const cert = forge.pki.createCertificate();
  cert.publicKey = forge.pki.setRsaPublicKey(privateKey.n, privateKey.e);
  cert.serialNumber = '01';
  cert.validity.notBefore = options.notBefore;
  cert.validity.notAfter = options.notAfter;
  cert.setSubject([{ name: 'commonName', value: options.commonName }]);
  cert.setIssuer([{ name: 'commonName', value: options.issuerName ?? options.commonName }]);
  if (options.dnsNames.length > 0) {
    cert.setExtensions([
      {
        name: 'subjectAltName',
        altNames: options.dnsNames.map((value) => ({ type: 2, value })),
      },
    ]);
  }
  cert.sign(privateKey, forge.md.sha256.create());

  return { certificatePem: forge.pki.certificateToPem(cert), privateKeyPem };
}
