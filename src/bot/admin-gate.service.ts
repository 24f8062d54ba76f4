import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AdminAccessDeniedError } from './bot.errors';

@Injectable()
export class AdminGate {
  private readonly logger = new Logger(AdminGate.name);
  private readonly adminId: number | null;

  constructor(private readonly configService: ConfigService) {
    const configured = Number(this.configService.get<unknown>('ADMIN_ID'));
    this.adminId = Number.isInteger(configured) && configured !== 0 ? configured : null;
    if (this.adminId === null) {
      this.logger.warn('ADMIN_ID is not configured; every admin command will be denied.');
    }
  }

  /** Returns the audit identity of the admin, throws for everybody else. */
  requireAdmin(userId: number | undefined): string {
    if (this.adminId === null || userId !== this.adminId) {
      this.logger.warn(
        JSON.stringify({ event: 'admin_access_denied', userId: userId ?? null }),
      );
      throw new AdminAccessDeniedError(userId ?? null);
    }
    return `telegram:${userId}`;
  }
}
