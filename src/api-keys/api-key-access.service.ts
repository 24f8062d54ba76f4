import { Injectable, Logger } from '@nestjs/common';

import { fingerprintToken } from '../utils/hash';
import {
  ExpiredKeyError,
  InvalidKeyError,
  KeyNotFoundError,
  MissingCredentialError,
} from './api-key.errors';
import { KeyStore } from './key-store';
import { ApiKeyRecord, ApiKeyStatus } from './types';

/**
 * Per-request authorization. Expiry is enforced lazily: the first request
 * presenting an expired key deactivates it, there is no background sweep.
 */
@Injectable()
export class ApiKeyAccessService {
  private readonly logger = new Logger(ApiKeyAccessService.name);

  constructor(private readonly keyStore: KeyStore) {}

  async authorize(presentedKey: string | null | undefined): Promise<ApiKeyRecord> {
    // Tokens are matched exactly as presented; only blank input counts as missing.
    if (!presentedKey || presentedKey.trim().length === 0) {
      throw new MissingCredentialError();
    }
    const key = presentedKey;

    const record = await this.keyStore.findActiveByKey(key);
    if (!record) {
      throw new InvalidKeyError();
    }

    if (isExpired(record.expiresAt)) {
      await this.deactivate(key, record.name);
      throw new ExpiredKeyError();
    }

    return record;
  }

  private async deactivate(key: string, name: string): Promise<void> {
    try {
      await this.keyStore.updateActiveFlag(key, false);
      this.logger.log(`Deactivated expired key ${fingerprintToken(key)} of ${name}`);
    } catch (error) {
      // Deleted since the lookup: nothing left to deactivate.
      if (!(error instanceof KeyNotFoundError)) {
        throw error;
      }
      this.logger.warn(`Expired key ${fingerprintToken(key)} of ${name} was deleted concurrently`);
    }
  }
}

/** Unparsable timestamps count as expired. */
export function isExpired(expiresAt: string, now: number = Date.now()): boolean {
  const parsed = Date.parse(expiresAt);
  if (Number.isNaN(parsed)) {
    return true;
  }
  return now >= parsed;
}

export function statusOf(record: ApiKeyRecord, now: number = Date.now()): ApiKeyStatus {
  if (isExpired(record.expiresAt, now)) {
    return 'expired';
  }
  return record.active ? 'active' : 'revoked';
}
