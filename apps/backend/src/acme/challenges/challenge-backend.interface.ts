export type AcmeChallengeType = 'dns-01' | 'http-01';

/**
 * Publishes challenge material where the CA expects to find it
 */
export interface ChallengeBackend {
  readonly challengeType: AcmeChallengeType;

  present(domain: string, token: string, keyAuthorization: string): Promise<void>;

  cleanup(domain: string, token: string, keyAuthorization: string): Promise<void>;
}
