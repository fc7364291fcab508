import { Injectable, Logger } from '@nestjs/common';
import { and, eq, inArray } from 'drizzle-orm';
import { db } from '../../db/client';
import { sslCerts, NewSslCert, SslCert } from '../../db/schema';
import { RowState } from '../acme.constants';
import { ParsedCertificate } from './certificate-parser.service';

export interface CertificateMaterial extends ParsedCertificate {
  certData: string;
  keyData: string;
}

@Injectable()
export class SslCertsService {
  private readonly logger = new Logger(SslCertsService.name);

  async findEnabledCert(certId: number): Promise<SslCert | null> {
    const [cert] = await db
      .select()
      .from(sslCerts)
      .where(and(eq(sslCerts.id, certId), eq(sslCerts.state, RowState.Enabled)))
      .limit(1);
    return cert ?? null;
  }

  async findEnabledCerts(certIds: number[]): Promise<SslCert[]> {
    if (certIds.length === 0) {
      return [];
    }
    return db
      .select()
      .from(sslCerts)
      .where(and(inArray(sslCerts.id, certIds), eq(sslCerts.state, RowState.Enabled)));
  }

  async createCert(values: NewSslCert): Promise<number> {
    const [cert] = await db.insert(sslCerts).values(values).returning({ id: sslCerts.id });
    return cert.id;
  }

  /**
   * Replace material, validity window and names. Identity, owner and flags stay.
   */
  async updateCertMaterial(certId: number, material: CertificateMaterial): Promise<void> {
    await db
      .update(sslCerts)
      .set({
        certData: material.certData,
        keyData: material.keyData,
        timeBeginAt: material.timeBeginAt,
        timeEndAt: material.timeEndAt,
        dnsNames: material.dnsNames,
        commonNames: material.commonNames,
        updatedAt: new Date(),
      })
      .where(eq(sslCerts.id, certId));
  }

  /**
   * Switch a certificate off so its task stops renewing it. The row is kept.
   */
  async disableCert(certId: number): Promise<void> {
    await db
      .update(sslCerts)
      .set({ isOn: false, updatedAt: new Date() })
      .where(eq(sslCerts.id, certId));
    this.logger.log({ event: 'ssl_cert_disabled', certId });
  }
}
