import { timingSafeEqual } from 'node:crypto';

import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FastifyRequest } from 'fastify';

export const WEBHOOK_SECRET_HEADER = 'x-telegram-bot-api-secret-token';

/** Only enforced when TELEGRAM_WEBHOOK_SECRET is set. */
@Injectable()
export class WebhookSecretGuard implements CanActivate {
  private readonly secret: string;

  constructor(private readonly configService: ConfigService) {
    this.secret = this.configService.get<string>('TELEGRAM_WEBHOOK_SECRET') ?? '';
  }

  canActivate(context: ExecutionContext): boolean {
    if (this.secret.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const header = request.headers[WEBHOOK_SECRET_HEADER];
    const value = Array.isArray(header) ? header[0] : header;

    if (!value || !this.safeEquals(value, this.secret)) {
      throw new UnauthorizedException({ error: 'Invalid webhook secret' });
    }
    return true;
  }

  private safeEquals(candidate: string, expected: string): boolean {
    const left = Buffer.from(candidate);
    const right = Buffer.from(expected);
    if (left.length !== right.length) {
      return false;
    }

    return timingSafeEqual(left, right);
  }
}
