import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InternalSecretGuard } from './internal-secret.guard';

describe('InternalSecretGuard', () => {
  const contextWith = (headers: Record<string, string | string[]>): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => ({ headers }),
      }),
    }) as unknown as ExecutionContext;

  it('should accept a request carrying the configured secret', () => {
    const guard = new InternalSecretGuard(new ConfigService({ INTERNAL_API_SECRET: 'test-secret' }));

    expect(guard.canActivate(contextWith({ 'x-internal-secret': 'test-secret' }))).toBe(true);
  });

  it('should reject a wrong or missing secret', () => {
    const guard = new InternalSecretGuard(new ConfigService({ INTERNAL_API_SECRET: 'test-secret' }));

    expect(() => guard.canActivate(contextWith({ 'x-internal-secret': 'other' }))).toThrow(
      new UnauthorizedException('Invalid internal secret'),
    );
    expect(() => guard.canActivate(contextWith({}))).toThrow('Invalid internal secret');
    expect(() =>
      guard.canActivate(contextWith({ 'x-internal-secret': ['test-secret', 'test-secret'] })),
    ).toThrow('Invalid internal secret');
  });

  it('should refuse every request when no secret is configured', () => {
    const guard = new InternalSecretGuard(new ConfigService({}));

    expect(() => guard.canActivate(contextWith({ 'x-internal-secret': '' }))).toThrow(
      'INTERNAL_API_SECRET not configured',
    );
  });
});
