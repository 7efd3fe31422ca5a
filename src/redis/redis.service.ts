import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

// Fallback cache bound: past MAX keys, expired entries are swept and, if that
// is not enough, the oldest entries are evicted down to EVICT_TO.
export const FALLBACK_MAX_KEYS = 10_000;
const FALLBACK_EVICT_TO = 9_000;

/**
 * Redis service with in-memory fallback for single-instance deployments.
 * GUARD: If MULTI_INSTANCE=true and Redis unavailable, operations fail hard.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private readonly fallbackCache = new Map<
    string,
    { value: string; expiresAt: number }
  >();
  private readonly fallbackLists = new Map<string, string[]>();
  private readonly multiInstance: boolean;
  private connected = false;

  constructor(private readonly config: ConfigService) {
    this.multiInstance = config.get<string>('MULTI_INSTANCE') === 'true';
    this.initializeClient();
  }

  private initializeClient() {
    const redisUrl = this.config.get<string>('REDIS_URL');

    if (!redisUrl) {
      this.logger.warn('REDIS_URL not configured, using in-memory fallback');
      return;
    }

    try {
      this.client = new Redis(redisUrl, {
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => {
          if (times > 3) return null;
          return Math.min(times * 100, 2000);
        },
        lazyConnect: true,
      });

      this.client.on('connect', () => {
        this.connected = true;
        this.logger.log('Redis connected');
      });

      this.client.on('error', (err: Error) => {
        this.connected = false;
        this.logger.error('Redis error', err.message);
      });

      this.client.on('close', () => {
        this.connected = false;
        this.logger.warn('Redis connection closed');
      });

      this.client.connect().catch((err: Error) => {
        this.logger.error('Failed to connect to Redis', err.message);
      });
    } catch (err) {
      this.logger.error('Failed to initialize Redis client', String(err));
    }
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
    }
  }

  /**
   * Returns the live client, or null when the in-memory fallback applies.
   * Throws in multi-instance mode, where a per-process fallback would split
   * state between instances.
   */
  private available(): Redis | null {
    if (this.connected && this.client) {
      return this.client;
    }
    if (this.multiInstance) {
      throw new Error('Redis unavailable in multi-instance mode');
    }
    return null;
  }

  async get(key: string): Promise<string | null> {
    const client = this.available();
    if (client) {
      return client.get(key);
    }

    const entry = this.fallbackCache.get(key);
    if (entry && entry.expiresAt > Date.now()) {
      return entry.value;
    }
    this.fallbackCache.delete(key);
    return null;
  }

  /**
   * Set value with TTL (seconds)
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = this.available();
    if (client) {
      await client.setex(key, ttlSeconds, value);
      return;
    }

    const now = Date.now();
    this.fallbackCache.set(key, {
      value,
      expiresAt: now + ttlSeconds * 1000,
    });
    if (this.fallbackCache.size > FALLBACK_MAX_KEYS) {
      this.compactFallback(now);
    }
  }

  private compactFallback(now: number) {
    for (const [key, entry] of this.fallbackCache) {
      if (entry.expiresAt <= now) this.fallbackCache.delete(key);
    }
    if (this.fallbackCache.size <= FALLBACK_MAX_KEYS) return;

    // Map iteration follows insertion order: oldest keys first.
    let evicted = 0;
    for (const key of this.fallbackCache.keys()) {
      if (this.fallbackCache.size <= FALLBACK_EVICT_TO) break;
      this.fallbackCache.delete(key);
      evicted++;
    }
    this.logger.warn(`Fallback cache full, evicted ${evicted} oldest keys`);
  }

  async del(key: string): Promise<void> {
    const client = this.available();
    if (client) {
      await client.del(key);
      return;
    }

    this.fallbackCache.delete(key);
    this.fallbackLists.delete(key);
  }

  /**
   * Appends to the tail of a list. Returns the new length.
   */
  async rpush(key: string, value: string): Promise<number> {
    const client = this.available();
    if (client) {
      return client.rpush(key, value);
    }

    const list = this.fallbackLists.get(key) ?? [];
    list.push(value);
    this.fallbackLists.set(key, list);
    return list.length;
  }

  /**
   * Inclusive range with Redis index semantics (negative counts from the tail).
   */
  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const client = this.available();
    if (client) {
      return client.lrange(key, start, stop);
    }

    const list = this.fallbackLists.get(key) ?? [];
    const range = resolveRange(list.length, start, stop);
    return range ? list.slice(range.from, range.to + 1) : [];
  }

  /**
   * Keeps only the given inclusive range of a list.
   */
  async ltrim(key: string, start: number, stop: number): Promise<void> {
    const client = this.available();
    if (client) {
      await client.ltrim(key, start, stop);
      return;
    }

    const list = this.fallbackLists.get(key);
    if (!list) return;
    const range = resolveRange(list.length, start, stop);
    if (!range) {
      this.fallbackLists.delete(key);
      return;
    }
    this.fallbackLists.set(key, list.slice(range.from, range.to + 1));
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client || !this.connected) {
      return !this.multiInstance; // Healthy in single-instance fallback mode
    }

    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch {
      return !this.multiInstance;
    }
  }

  getStatus(): {
    connected: boolean;
    mode: 'redis' | 'fallback';
    fallbackKeys: number;
  } {
    return {
      connected: this.connected,
      mode: this.connected && this.client ? 'redis' : 'fallback',
      fallbackKeys: this.fallbackCache.size,
    };
  }
}

function resolveRange(
  length: number,
  start: number,
  stop: number,
): { from: number; to: number } | null {
  const from = Math.max(start < 0 ? length + start : start, 0);
  const to = Math.min(stop < 0 ? length + stop : stop, length - 1);
  if (from > to || from >= length) return null;
  return { from, to };
}
