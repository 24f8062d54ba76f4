import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { WebhookSecretGuard } from './webhook-secret.guard';

describe('WebhookSecretGuard', () => {
  const secret = 'test-secret';

  const buildContext = (headers: Record<string, unknown>): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => ({ headers }),
      }),
    }) as unknown as ExecutionContext;

  const buildGuard = (configured: string | undefined) =>
    new WebhookSecretGuard({
      get: (key: string) => (key === 'TELEGRAM_WEBHOOK_SECRET' ? configured : undefined),
    } as unknown as ConfigService);

  it('lets every update through when no secret is configured', () => {
    expect(buildGuard('').canActivate(buildContext({}))).toBe(true);
    expect(buildGuard(undefined).canActivate(buildContext({}))).toBe(true);
  });

  it('accepts the matching secret header', () => {
    const guard = buildGuard(secret);

    expect(
      guard.canActivate(buildContext({ 'x-telegram-bot-api-secret-token': secret })),
    ).toBe(true);
  });

  it.each<[string, Record<string, unknown>]>([
    ['a missing header', {}],
    ['a wrong secret', { 'x-telegram-bot-api-secret-token': 'other-secret' }],
    ['a prefix of the secret', { 'x-telegram-bot-api-secret-token': 'test' }],
  ])('rejects %s', (_label, headers) => {
    const guard = buildGuard(secret);

    expect(() => guard.canActivate(buildContext(headers))).toThrow(UnauthorizedException);
  });
});
