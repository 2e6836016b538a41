import type { RedisService } from '@infra/redis/redis.service';

interface StoredValue {
  value: string;
  ttlSeconds?: number;
}

/** Stands in for {@link RedisService} in tests; expiry is recorded, not enforced. */
export class InMemoryRedisService implements Pick<RedisService, 'get' | 'set' | 'delete' | 'ping'> {
  private readonly store = new Map<string, StoredValue>();

  async get(key: string): Promise<string | null> {
    return this.store.get(key)?.value ?? null;
  }

  async set(key: string, value: string, options?: { EX: number }): Promise<void> {
    this.store.set(key, { value, ttlSeconds: options?.EX });
  }

  async delete(key: string): Promise<number> {
    return this.store.delete(key) ? 1 : 0;
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  ttl(key: string): number | undefined {
    return this.store.get(key)?.ttlSeconds;
  }

  has(key: string): boolean {
    return this.store.has(key);
  }
}
