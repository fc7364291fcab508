import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import axios from 'axios';
import { db } from '../db/client';
import { acmeAuthentications } from '../db/schema';
import { AcmeConfig } from './acme.config';
import { ACME_AUTHORIZATION_EVENT, WEBHOOK_TIMEOUT_MS } from './acme.constants';
import { AcmeAuthorizationEvent } from './acme-authorization.event';

/**
 * Handles every challenge token the CA hands out: records it so edge nodes can
 * answer HTTP-01 requests, then notifies the task's webhook if it has one.
 */
@Injectable()
export class AuthorizationListener {
  private readonly logger = new Logger(AuthorizationListener.name);

  constructor(private readonly acmeConfig: AcmeConfig) {}

  // Persistence errors must reach the emitter so the run fails at validation
  @OnEvent(ACME_AUTHORIZATION_EVENT, { suppressErrors: false })
  async handleAuthorization(event: AcmeAuthorizationEvent): Promise<void> {
    await db.insert(acmeAuthentications).values({
      taskId: event.taskId,
      domain: event.domain,
      token: event.token,
      key: event.key,
    });

    if (event.authUrl) {
      await this.notifyWebhook(event);
    }
  }

  /**
   * POST {domain, token, key} to the task's webhook. Never throws.
   */
  async notifyWebhook(event: AcmeAuthorizationEvent): Promise<void> {
    try {
      await axios.post(
        event.authUrl,
        { domain: event.domain, token: event.token, key: event.key },
        {
          timeout: WEBHOOK_TIMEOUT_MS,
          headers: {
            'Content-Type': 'application/json',
            'User-Agent': this.acmeConfig.userAgent,
          },
        },
      );
      this.logger.debug(`Notified ${event.authUrl} for ${event.domain}`);
    } catch (error) {
      this.logger.warn({
        event: 'acme_webhook_failed',
        taskId: event.taskId,
        domain: event.domain,
        authUrl: event.authUrl,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}
