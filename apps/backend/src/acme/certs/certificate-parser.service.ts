import { Injectable } from '@nestjs/common';
import { X509Certificate } from 'crypto';
import * as forge from 'node-forge';

export interface ParsedCertificate {
  timeBeginAt: Date;
  timeEndAt: Date;
  // SAN dNSName entries of the leaf certificate
  dnsNames: string[];
  // Issuer common names along the chain
  commonNames: string[];
}

// SubjectAltName GeneralName tag for dNSName
const SAN_DNS_NAME = 2;

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

interface AltName {
  type: number;
  value: string;
}

function isAltName(value: unknown): value is AltName {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'number' &&
    'value' in value &&
    typeof value.value === 'string'
  );
}

function readAltNames(extension: unknown): AltName[] {
  if (typeof extension !== 'object' || extension === null || !('altNames' in extension)) {
    return [];
  }
  const altNames: unknown = extension.altNames;
  return Array.isArray(altNames) ? altNames.filter(isAltName) : [];
}

function readCommonName(attributes: forge.pki.Certificate['subject']): string | null {
  const field: unknown = attributes.getField('CN');
  if (typeof field === 'object' && field !== null && 'value' in field) {
    return typeof field.value === 'string' ? field.value : null;
  }
  return null;
}

function parseIssuerCommonName(issuer: string): string | null {
  const cnMatch = issuer.match(/CN=([^,\n]+)/);
  return cnMatch ? cnMatch[1].trim() : null;
}

/**
 * Reads validity window and names out of issued PEM material
 */
@Injectable()
export class CertificateParserService {
  parse(certificatePem: string): ParsedCertificate {
    const blocks = certificatePem.match(PEM_CERTIFICATE);
    if (!blocks || blocks.length === 0) {
      throw new Error('no certificate found in PEM data');
    }
    // The leaf key comes from our own RSA CSR; forge cannot read EC keys, so the
    // rest of the chain is only read through X509Certificate
    const leaf = forge.pki.certificateFromPem(blocks[0]);

    const dnsNames: string[] = [];
    for (const altName of readAltNames(leaf.getExtension('subjectAltName'))) {
      const name = altName.value.toLowerCase();
      if (altName.type === SAN_DNS_NAME && !dnsNames.includes(name)) {
        dnsNames.push(name);
      }
    }
    if (dnsNames.length === 0) {
      const subjectName = readCommonName(leaf.subject);
      if (subjectName) {
        dnsNames.push(subjectName.toLowerCase());
      }
    }

    const commonNames: string[] = [];
    for (const block of blocks) {
      const issuerName = parseIssuerCommonName(new X509Certificate(block).issuer);
      if (issuerName && !commonNames.includes(issuerName)) {
        commonNames.push(issuerName);
      }
    }

    return {
      timeBeginAt: leaf.validity.notBefore,
      timeEndAt: leaf.validity.notAfter,
      dnsNames,
      commonNames,
    };
  }
}
