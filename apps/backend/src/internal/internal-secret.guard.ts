import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

export const INTERNAL_SECRET_HEADER = 'x-internal-secret';

/**
 * InternalSecretGuard
 *
 * Guards the control-plane endpoints. Compares the X-Internal-Secret header
 * with INTERNAL_API_SECRET; when no secret is configured every request is refused.
 */
@Injectable()
export class InternalSecretGuard implements CanActivate {
  constructor(private config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const secret = request.headers[INTERNAL_SECRET_HEADER];
    const expectedSecret = this.config.get<string>('INTERNAL_API_SECRET');

    if (!expectedSecret) {
      throw new UnauthorizedException('INTERNAL_API_SECRET not configured');
    }

    if (typeof secret !== 'string' || secret !== expectedSecret) {
      throw new UnauthorizedException('Invalid internal secret');
    }

    return true;
  }
}
