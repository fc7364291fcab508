import { Injectable, Logger } from '@nestjs/common';
import { AcmeTask } from '../../db/schema';
import { AcmeTasksService } from '../acme-tasks.service';
import { AcmeTaskError, describeError } from '../acme-task.errors';
import { IssuedCertificate } from '../acme-protocol.client';
import { CertificateParserService, ParsedCertificate } from './certificate-parser.service';
import { CertificateMaterial, SslCertsService } from './ssl-certs.service';

const NOT_SAVED = 'certificate issued but not saved';

/**
 * Issuance Recorder: stores CA-issued material against the task's certificate.
 * Returns the certificate id; failures after issuance are `persistence` errors.
 */
@Injectable()
export class IssuanceRecorderService {
  private readonly logger = new Logger(IssuanceRecorderService.name);

  constructor(
    private readonly parser: CertificateParserService,
    private readonly certsService: SslCertsService,
    private readonly tasksService: AcmeTasksService,
  ) {}

  async record(task: AcmeTask, issued: IssuedCertificate): Promise<number> {
    let parsed: ParsedCertificate;
    try {
      parsed = this.parser.parse(issued.certificatePem);
    } catch (error) {
      throw AcmeTaskError.wrap('persistence', 'certificate issued but could not be parsed', error);
    }
    const material: CertificateMaterial = {
      ...parsed,
      certData: issued.certificatePem,
      keyData: issued.privateKeyPem,
    };

    if (task.certId) {
      return this.renew(task, task.certId, material);
    }

    const certId = await this.persist('failed to create certificate', () =>
      this.certsService.createCert({
        adminId: task.adminId,
        userId: task.userId,
        isOn: true,
        name: `ACME certificate for ${task.dnsDomain || task.domains[0]}`,
        description: 'Issued by ACME task',
        isACME: true,
        acmeTaskId: task.id,
        ...material,
      }),
    );
    await this.persist('failed to link certificate to task', () =>
      this.tasksService.bindCertificate(task.id, certId),
    );

    this.logger.log({ event: 'ssl_cert_created', taskId: task.id, certId });
    return certId;
  }

  private async renew(
    task: AcmeTask,
    certId: number,
    material: CertificateMaterial,
  ): Promise<number> {
    const existing = await this.persist('failed to load bound certificate', () =>
      this.certsService.findEnabledCert(certId),
    );
    if (!existing) {
      try {
        await this.tasksService.disableTask(task.id);
      } catch (error) {
        throw new AcmeTaskError(
          'persistence',
          `certificate was removed; failed to disable task: ${describeError(error)}`,
        );
      }
      throw new AcmeTaskError('persistence', 'certificate was removed');
    }

    await this.persist('failed to update certificate', () =>
      this.certsService.updateCertMaterial(certId, material),
    );
    this.logger.log({ event: 'ssl_cert_renewed', taskId: task.id, certId });
    return certId;
  }

  private async persist<T>(step: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new AcmeTaskError('persistence', `${NOT_SAVED}: ${step}: ${describeError(error)}`);
    }
  }
}
