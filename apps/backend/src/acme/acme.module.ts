import { Module } from '@nestjs/common';
import { AcmeConfig } from './acme.config';
import { AcmeAccountsService } from './acme-accounts.service';
import { AcmeProtocolClient } from './acme-protocol.client';
import { AcmeRenewalScheduler } from './acme-renewal.scheduler';
import { AcmeTaskLogsService } from './acme-task-logs.service';
import { AcmeTaskRunnerService } from './acme-task-runner.service';
import { AcmeTaskScheduler } from './acme-task.scheduler';
import { AcmeTasksController } from './acme-tasks.controller';
import { AcmeTasksService } from './acme-tasks.service';
import { AuthorizationListener } from './authorization.listener';
import { BindingMergerService } from './binding/binding-merger.service';
import { ServersService } from './binding/servers.service';
import { SslPoliciesService } from './binding/ssl-policies.service';
import { CertificateParserService } from './certs/certificate-parser.service';
import { IssuanceRecorderService } from './certs/issuance-recorder.service';
import { SslCertsService } from './certs/ssl-certs.service';
import { ChallengeDispatcherService } from './challenge-dispatcher.service';
import { DnsProvidersService } from './dns/dns-providers.service';

@Module({
  controllers: [AcmeTasksController],
  providers: [
    AcmeConfig,
    AcmeTasksService,
    AcmeTaskLogsService,
    AcmeAccountsService,
    AcmeProtocolClient,
    DnsProvidersService,
    ChallengeDispatcherService,
    AuthorizationListener,
    CertificateParserService,
    SslCertsService,
    IssuanceRecorderService,
    ServersService,
    SslPoliciesService,
    BindingMergerService,
    AcmeTaskRunnerService,
    AcmeTaskScheduler,
    AcmeRenewalScheduler,
  ],
  exports: [AcmeTasksService, AcmeTaskRunnerService],
})
export class AcmeModule {}
