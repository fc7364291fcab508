/**
 * Lifecycle status of an issuance task.
 *
 * Pending(0) → Running(2) → Done(1) | IssueFailed(3)
 */
export const AcmeTaskStatus = {
  Pending: 0,
  Done: 1,
  Running: 2,
  IssueFailed: 3,
} as const;

export type AcmeTaskStatus = (typeof AcmeTaskStatus)[keyof typeof AcmeTaskStatus];

// Row state shared by every table the engine touches (soft delete)
export const RowState = {
  Disabled: 0,
  Enabled: 1,
} as const;

export type AcmeAuthType = 'dns' | 'http';

export const ACME_AUTH_TYPES: readonly AcmeAuthType[] = ['dns', 'http'];

/**
 * Event emitted once per domain when the CA hands out a challenge token
 */
export const ACME_AUTHORIZATION_EVENT = 'acme.authorization';

export const WEBHOOK_TIMEOUT_MS = 10_000;

// Minimum version written into TLS policies created by the binding merger
export const DEFAULT_POLICY_MIN_VERSION = 'TLS 1.1';
