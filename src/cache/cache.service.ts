import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InMemoryCacheService } from './in-memory-cache.service';
import { RedisCacheService } from './redis-cache.service';

export type CacheStrategy = 'redis' | 'memory';

/**
 * Process-wide TTL cache for verification codes and captcha answers.
 *
 * Redis is used in staging/production when enabled; every operation falls
 * back to the in-memory store while Redis is unreachable.
 */
@Injectable()
export class AppCacheService {
  private readonly logger = new Logger(AppCacheService.name);
  private readonly strategy: CacheStrategy;
  private readonly defaultTtl: number;

  constructor(
    private readonly config: ConfigService,
    private readonly redisCache: RedisCacheService,
    private readonly memoryCache: InMemoryCacheService,
  ) {
    const nodeEnv = this.config.get<string>('app.env');
    const useRedis = this.config.get<boolean>('cache.redis.enabled');

    this.strategy =
      useRedis === true && (nodeEnv === 'production' || nodeEnv === 'staging')
        ? 'redis'
        : 'memory';
    this.defaultTtl = this.config.get<number>('cache.ttl', 300);

    this.logger.log(`Cache strategy: ${this.strategy}`);
  }

  private useRedis(op: string, key: string): boolean {
    if (this.strategy !== 'redis') return false;
    if (this.redisCache.isConnected()) return true;

    this.logger.warn(`Redis unavailable for ${op} ${key}, using memory`);
    return false;
  }

  async get<T>(key: string): Promise<T | null> {
    if (this.useRedis('GET', key)) {
      return this.redisCache.get<T>(key);
    }
    return this.memoryCache.get<T>(key);
  }

  async set(
    key: string,
    value: unknown,
    ttlSeconds = this.defaultTtl,
  ): Promise<void> {
    if (this.useRedis('SET', key)) {
      const success = await this.redisCache.set(key, value, ttlSeconds);
      if (success) return;
      this.logger.warn(`Redis SET failed for ${key}, falling back to memory`);
    }
    this.memoryCache.set(key, value, ttlSeconds);
  }

  /** Reads and removes an entry; a second call for the same key sees null. */
  async take<T>(key: string): Promise<T | null> {
    if (this.useRedis('TAKE', key)) {
      return this.redisCache.take<T>(key);
    }
    return this.memoryCache.take<T>(key);
  }

  async del(key: string): Promise<void> {
    if (this.useRedis('DEL', key)) {
      const success = await this.redisCache.del(key);
      if (success) return;
    }
    this.memoryCache.del(key);
  }

  async ttl(key: string): Promise<number> {
    if (this.useRedis('TTL', key)) {
      return this.redisCache.ttl(key);
    }
    return this.memoryCache.ttl(key);
  }

  getStrategy(): CacheStrategy {
    return this.strategy;
  }
}
