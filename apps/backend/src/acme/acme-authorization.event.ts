/**
 * Payload of ACME_AUTHORIZATION_EVENT
 */
export class AcmeAuthorizationEvent {
  constructor(
    readonly taskId: number,
    readonly domain: string,
    readonly token: string,
    readonly key: string,
    // Optional HTTP-01 webhook; empty when the task has none
    readonly authUrl: string,
  ) {}
}
