/**
 * Stage of a task run that failed. Stored messages are prefixed so operators can
 * tell CA-side failures from local ones.
 */
export type AcmeTaskErrorStage =
  | 'lookup'
  | 'account'
  | 'provider'
  | 'validation'
  | 'issuance'
  | 'persistence';

export class AcmeTaskError extends Error {
  constructor(
    readonly stage: AcmeTaskErrorStage,
    message: string,
  ) {
    super(message);
    this.name = 'AcmeTaskError';
  }

  /**
   * Wrap an unknown failure with a stage-specific prefix
   */
  static wrap(stage: AcmeTaskErrorStage, prefix: string, error: unknown): AcmeTaskError {
    if (error instanceof AcmeTaskError) {
      return error;
    }
    return new AcmeTaskError(stage, `${prefix}: ${describeError(error)}`);
  }
}

/** Account missing, or no enabled account left for rotation */
export class AccountNotFoundError extends AcmeTaskError {
  constructor() {
    super('account', 'ACME account not found');
    this.name = 'AccountNotFoundError';
  }
}

/** The CA code has no registered implementation */
export class ProviderUnavailableError extends AcmeTaskError {
  constructor(providerCode: string) {
    super('account', `ACME provider '${providerCode}' is unavailable`);
    this.name = 'ProviderUnavailableError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error) || 'Unknown error';
}
