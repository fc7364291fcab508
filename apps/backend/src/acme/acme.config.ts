import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Typed access to the engine's environment settings.
 */
@Injectable()
export class AcmeConfig {
  constructor(private readonly config: ConfigService) {}

  get defaultProviderCode(): string {
    return this.config.get<string>('ACME_DEFAULT_PROVIDER') || 'letsencrypt';
  }

  get useStaging(): boolean {
    return this.config.get<string>('ACME_USE_STAGING') === 'true';
  }

  get schedulerEnabled(): boolean {
    return this.config.get<string>('ACME_SCHEDULER_ENABLED') !== 'false';
  }

  get schedulerBatchSize(): number {
    return this.getInt('ACME_SCHEDULER_BATCH_SIZE', 10);
  }

  get schedulerStaleHours(): number {
    return this.getInt('ACME_SCHEDULER_STALE_HOURS', 1);
  }

  get renewalEnabled(): boolean {
    return this.config.get<string>('ACME_RENEWAL_ENABLED') !== 'false';
  }

  get renewalThresholdDays(): number {
    return this.getInt('ACME_RENEWAL_THRESHOLD_DAYS', 30);
  }

  get taskLeaseMinutes(): number {
    return this.getInt('ACME_TASK_LEASE_MINUTES', 30);
  }

  get userAgent(): string {
    return this.config.get<string>('ACME_USER_AGENT') || 'acme-orchestrator/1.0';
  }

  private getInt(key: string, fallback: number): number {
    const raw = this.config.get<string>(key);
    if (raw === undefined || raw === '') {
      return fallback;
    }
    const value = parseInt(raw, 10);
    return Number.isNaN(value) ? fallback : value;
  }
}
