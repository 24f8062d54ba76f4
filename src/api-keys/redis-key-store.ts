import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { RedisStoreClient } from '../store/store.service';
import { StoreService } from '../store/store.service';
import { AppError } from '../utils/app-error';
import { fingerprintToken } from '../utils/hash';
import { DuplicateKeyError, KeyNotFoundError, StoreUnavailableError } from './api-key.errors';
import { KeyStore } from './key-store';
import { ApiKeyRecord } from './types';

const KEYS_COLLECTION = 'api-keys';

type RecordHash = Record<keyof ApiKeyRecord, string>;

/**
 * Layout under `<STORE_DB_NAME>:api-keys`:
 * - `key:<token>`  hash holding the record
 * - `name:<name>`  set of tokens sharing a name
 * - `index`        set of every token
 */
@Injectable()
export class RedisKeyStore extends KeyStore {
  private readonly logger = new Logger(RedisKeyStore.name);
  private readonly prefix: string;

  constructor(
    private readonly storeService: StoreService,
    private readonly configService: ConfigService,
  ) {
    super();
    const dbName = this.configService.get<string>('STORE_DB_NAME') ?? 'alice';
    this.prefix = `${dbName}:${KEYS_COLLECTION}`;
  }

  async insert(record: ApiKeyRecord): Promise<ApiKeyRecord> {
    return this.run('insert', async (redis) => {
      const recordKey = this.recordKey(record.key);
      // HSETNX on the key field is the uniqueness check.
      const claimed = await redis.hSetNX(recordKey, 'key', record.key);
      if (!claimed) {
        throw new DuplicateKeyError();
      }

      await redis.hSet(recordKey, this.serialize(record));
      await redis.sAdd(this.nameKey(record.name), record.key);
      await redis.sAdd(this.indexKey(), record.key);
      return record;
    });
  }

  async findByKey(key: string): Promise<ApiKeyRecord | null> {
    return this.run('findByKey', (redis) => this.getRecord(key, redis));
  }

  async findByName(name: string): Promise<ApiKeyRecord | null> {
    return this.run('findByName', async (redis) => {
      const records = await this.getRecords(this.nameKey(name), redis);
      return records[0] ?? null;
    });
  }

  async findActiveByKey(key: string): Promise<ApiKeyRecord | null> {
    return this.run('findActiveByKey', async (redis) => {
      const record = await this.getRecord(key, redis);
      return record?.active ? record : null;
    });
  }

  async updateActiveFlag(key: string, active: boolean): Promise<void> {
    await this.run('updateActiveFlag', async (redis) => {
      const record = await this.getRecord(key, redis);
      if (!record) {
        throw new KeyNotFoundError();
      }
      await redis.hSet(this.recordKey(key), { active: active ? '1' : '0' });
    });
  }

  async incrementUsage(key: string): Promise<number> {
    return this.run('incrementUsage', async (redis) => {
      const recordKey = this.recordKey(key);
      if ((await redis.exists(recordKey)) === 0) {
        throw new KeyNotFoundError();
      }
      return redis.hIncrBy(recordKey, 'usage', 1);
    });
  }

  async revokeByName(name: string): Promise<number> {
    return this.run('revokeByName', async (redis) => {
      const records = await this.getRecords(this.nameKey(name), redis);
      let revoked = 0;

      for (const record of records) {
        if (!record.active) {
          continue;
        }
        await redis.hSet(this.recordKey(record.key), { active: '0' });
        revoked += 1;
      }

      return revoked;
    });
  }

  async deleteByKeyOrName(token: string): Promise<number> {
    return this.run('deleteByKeyOrName', async (redis) => {
      const keys = new Set(await redis.sMembers(this.nameKey(token)));
      keys.add(token);
      let deleted = 0;

      for (const key of keys) {
        const record = await this.getRecord(key, redis);
        deleted += await redis.del(this.recordKey(key));
        if (record) {
          await redis.sRem(this.nameKey(record.name), key);
        }
        await redis.sRem(this.indexKey(), key);
      }

      return deleted;
    });
  }

  async listAll(): Promise<ApiKeyRecord[]> {
    return this.run('listAll', (redis) => this.getRecords(this.indexKey(), redis));
  }

  private async run<T>(
    operation: string,
    command: (redis: RedisStoreClient) => Promise<T>,
  ): Promise<T> {
    const redis = this.storeService.getClient();
    if (!redis) {
      this.logger.error(`Key store backend unavailable for ${operation}`);
      throw new StoreUnavailableError();
    }

    try {
      return await command(redis);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      this.logger.error(
        `Key store ${operation} failed`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new StoreUnavailableError(error);
    }
  }

  /** Loads every record referenced by a token set, pruning dangling members. */
  private async getRecords(setKey: string, redis: RedisStoreClient): Promise<ApiKeyRecord[]> {
    const keys = await redis.sMembers(setKey);
    const records: ApiKeyRecord[] = [];

    for (const key of keys) {
      const record = await this.getRecord(key, redis);
      if (record) {
        records.push(record);
        continue;
      }
      await redis.sRem(setKey, key);
    }

    // Records created within the same millisecond (a rotation) rank the active one first.
    return records.sort(
      (a, b) => b.createdAt.localeCompare(a.createdAt) || Number(b.active) - Number(a.active),
    );
  }

  private async getRecord(key: string, redis: RedisStoreClient): Promise<ApiKeyRecord | null> {
    const hash = await redis.hGetAll(this.recordKey(key));
    if (Object.keys(hash).length === 0) {
      return null;
    }

    const record = this.deserialize(hash);
    if (!record) {
      this.logger.warn(`Incomplete API key record for key ${fingerprintToken(key)}`);
    }
    return record;
  }

  private serialize(record: ApiKeyRecord): RecordHash {
    return {
      key: record.key,
      name: record.name,
      createdAt: record.createdAt,
      expiresAt: record.expiresAt,
      active: record.active ? '1' : '0',
      usage: String(record.usage),
    };
  }

  private deserialize(hash: Record<string, string>): ApiKeyRecord | null {
    const { key, name, createdAt, expiresAt, active, usage } = hash;
    if (!key || name === undefined || !createdAt || !expiresAt || active === undefined) {
      return null;
    }

    const parsedUsage = Number(usage ?? '0');
    return {
      key,
      name,
      createdAt,
      expiresAt,
      active: active === '1',
      usage: Number.isInteger(parsedUsage) && parsedUsage >= 0 ? parsedUsage : 0,
    };
  }

  private recordKey(key: string): string {
    return `${this.prefix}:key:${key}`;
  }

  private nameKey(name: string): string {
    return `${this.prefix}:name:${name}`;
  }

  private indexKey(): string {
    return `${this.prefix}:index`;
  }
}
