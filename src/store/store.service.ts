import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { Cache } from 'cache-manager';

/**
 * The subset of node-redis commands the key store relies on. The client comes
 * from the cache-manager Redis store, so it is checked structurally at runtime.
 */
export type RedisStoreClient = {
  hSetNX: (key: string, field: string, value: string) => Promise<boolean>;
  hSet: (key: string, fields: Record<string, string>) => Promise<number>;
  hGetAll: (key: string) => Promise<Record<string, string>>;
  hIncrBy: (key: string, field: string, increment: number) => Promise<number>;
  exists: (key: string) => Promise<number>;
  del: (key: string) => Promise<number>;
  sAdd: (key: string, member: string) => Promise<number>;
  sRem: (key: string, member: string) => Promise<number>;
  sMembers: (key: string) => Promise<string[]>;
  ping: () => Promise<string>;
  quit?: () => Promise<unknown>;
  isOpen?: boolean;
};

const REQUIRED_COMMANDS = [
  'hSetNX',
  'hSet',
  'hGetAll',
  'hIncrBy',
  'exists',
  'del',
  'sAdd',
  'sRem',
  'sMembers',
  'ping',
] as const;

function isRedisStoreClient(value: unknown): value is RedisStoreClient {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return REQUIRED_COMMANDS.every(
    (command) => command in value && typeof Reflect.get(value, command) === 'function',
  );
}

@Injectable()
export class StoreService implements OnModuleDestroy {
  private readonly logger = new Logger(StoreService.name);

  constructor(@Inject(CACHE_MANAGER) private readonly cacheManager: Cache) {}

  getClient(): RedisStoreClient | null {
    const store: unknown = this.cacheManager.store;
    if (typeof store !== 'object' || store === null) {
      return null;
    }
    if ('isFallback' in store && store.isFallback === true) {
      return null;
    }
    const client = 'client' in store ? store.client : undefined;
    return isRedisStoreClient(client) ? client : null;
  }

  async checkHealth(): Promise<{ status: 'ok' | 'degraded'; message?: string }> {
    const client = this.getClient();
    if (!client) {
      return { status: 'degraded', message: 'Store client unavailable' };
    }

    try {
      await client.ping();
      return { status: 'ok' };
    } catch (error) {
      this.logger.warn('Store health check failed');
      return { status: 'degraded', message: 'Store backend unreachable' };
    }
  }

  async onModuleDestroy(): Promise<void> {
    const client = this.getClient();
    if (!client?.quit || client.isOpen === false) {
      return;
    }

    try {
      await client.quit();
    } catch (error) {
      this.logger.warn('Store connection did not close cleanly');
    }
  }
}
