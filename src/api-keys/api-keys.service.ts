import { randomBytes } from 'node:crypto';

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { fingerprintToken } from '../utils/hash';
import {
  DuplicateKeyError,
  InvalidKeyRequestError,
  TokenGenerationExhaustedError,
} from './api-key.errors';
import { KeyStore } from './key-store';
import { ApiKeyRecord } from './types';

const TOKEN_BYTES = 24;
const MAX_TOKEN_ATTEMPTS = 5;
const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class ApiKeysService {
  private readonly logger = new Logger(ApiKeysService.name);
  private readonly defaultLifetimeDays: number;

  constructor(
    private readonly keyStore: KeyStore,
    private readonly configService: ConfigService,
  ) {
    this.defaultLifetimeDays = this.parsePositiveInteger(
      this.configService.get<unknown>('KEY_DEFAULT_LIFETIME_DAYS'),
      30,
      'KEY_DEFAULT_LIFETIME_DAYS',
    );
  }

  /** URL-safe bearer token: 24 random bytes as 32 base64url characters. */
  generateKeyToken(): string {
    return randomBytes(TOKEN_BYTES).toString('base64url');
  }

  async createKey(name: string, lifetimeDays: number): Promise<ApiKeyRecord> {
    const owner = this.parseName(name);
    this.assertLifetime(lifetimeDays);

    for (let attempt = 1; attempt <= MAX_TOKEN_ATTEMPTS; attempt += 1) {
      const createdAt = new Date();
      const record: ApiKeyRecord = {
        key: this.generateKeyToken(),
        name: owner,
        createdAt: createdAt.toISOString(),
        expiresAt: new Date(createdAt.getTime() + lifetimeDays * DAY_MS).toISOString(),
        active: true,
        usage: 0,
      };

      try {
        return await this.keyStore.insert(record);
      } catch (error) {
        if (!(error instanceof DuplicateKeyError)) {
          throw error;
        }
        this.logger.warn(
          `Generated key ${fingerprintToken(record.key)} collided (attempt ${attempt}/${MAX_TOKEN_ATTEMPTS}). Regenerating.`,
        );
      }
    }

    throw new TokenGenerationExhaustedError(MAX_TOKEN_ATTEMPTS);
  }

  async revokeByName(name: string): Promise<number> {
    return this.keyStore.revokeByName(this.parseName(name));
  }

  /** Revokes every key of `name` and issues a fresh one; usage starts over. */
  async rotate(name: string, lifetimeDays: number = this.defaultLifetimeDays): Promise<ApiKeyRecord> {
    const owner = this.parseName(name);
    this.assertLifetime(lifetimeDays);

    const revoked = await this.keyStore.revokeByName(owner);
    if (revoked > 0) {
      this.logger.log(`Revoked ${revoked} key(s) of ${owner} before rotation`);
    }
    return this.createKey(owner, lifetimeDays);
  }

  async deleteByKeyOrName(token: string): Promise<number> {
    return this.keyStore.deleteByKeyOrName(this.parseName(token));
  }

  async getUsage(keyOrName: string): Promise<ApiKeyRecord | null> {
    const token = this.parseName(keyOrName);
    return (await this.keyStore.findByKey(token)) ?? this.keyStore.findByName(token);
  }

  async listAll(): Promise<ApiKeyRecord[]> {
    return this.keyStore.listAll();
  }

  private parseName(value: string): string {
    const normalized = value.trim();
    if (normalized.length === 0) {
      throw new InvalidKeyRequestError('A key or name is required');
    }
    return normalized;
  }

  private assertLifetime(days: number): void {
    if (!Number.isInteger(days) || days <= 0) {
      throw new InvalidKeyRequestError('Lifetime must be a positive whole number of days');
    }
  }

  private parsePositiveInteger(value: unknown, fallback: number, fieldName: string): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }

    this.logger.warn(`${fieldName} is invalid; using fallback ${fallback}`);
    return fallback;
  }
}
