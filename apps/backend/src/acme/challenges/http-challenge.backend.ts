import { ChallengeBackend } from './challenge-backend.interface';

/**
 * HTTP-01 material is served from acme_authentications by the edge nodes, which
 * the authorization listener writes before validation starts. Nothing else to publish.
 */
export class HttpChallengeBackend implements ChallengeBackend {
  readonly challengeType = 'http-01' as const;

  async present(): Promise<void> {
    return;
  }

  async cleanup(): Promise<void> {
    return;
  }
}
