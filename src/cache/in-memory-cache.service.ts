import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
  lastAccessedAt: number;
}

@Injectable()
export class InMemoryCacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(InMemoryCacheService.name);
  private readonly cache = new Map<string, CacheEntry<unknown>>();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly maxSize: number;
  private readonly defaultTtl: number;

  constructor(private readonly config: ConfigService) {
    this.maxSize = this.config.get<number>('cache.max', 1000);
    this.defaultTtl = this.config.get<number>('cache.ttl', 300);
  }

  onModuleInit(): void {
    const cleanupIntervalMs = this.config.get<number>(
      'cache.cleanupInterval',
      5 * 60 * 1000,
    );

    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, cleanupIntervalMs);

    this.logger.log(
      `In-memory cache initialized (max: ${this.maxSize}, cleanup: ${cleanupIntervalMs}ms)`,
    );
  }

  onModuleDestroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }

  get<T>(key: string): T | null {
    const entry = this.cache.get(key) as CacheEntry<T> | undefined;
    if (!entry) return null;

    const now = Date.now();
    if (now >= entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    entry.lastAccessedAt = now;
    return entry.data;
  }

  set(key: string, value: unknown, ttlSeconds = this.defaultTtl): void {
    const now = Date.now();

    // Evict if cache is full
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      this.evictLRU();
    }

    this.cache.set(key, {
      data: value,
      expiresAt: now + ttlSeconds * 1000,
      lastAccessedAt: now,
    });
  }

  /** Reads and removes an entry in one step. */
  take<T>(key: string): T | null {
    const value = this.get<T>(key);
    this.cache.delete(key);
    return value;
  }

  del(key: string): void {
    this.cache.delete(key);
  }


  ttl(key: string): number {
    const entry = this.cache.get(key);
    if (!entry) return -2; // Key doesn't exist

    const now = Date.now();
    if (now >= entry.expiresAt) {
      this.cache.delete(key);
      return -2;
    }

    return Math.ceil((entry.expiresAt - now) / 1000);
  }

  size(): number {
    return this.cache.size;
  }

  private cleanup(): void {
    const now = Date.now();
    let cleanedCount = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      this.logger.debug(
        `Cleaned up ${cleanedCount} expired entries (${this.cache.size} remaining)`,
      );
    }
  }

  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of this.cache.entries()) {
      if (entry.lastAccessedAt < oldestTime) {
        oldestTime = entry.lastAccessedAt;
        oldestKey = key;
      }
    }

    if (oldestKey) {
      this.cache.delete(oldestKey);
      this.logger.debug(`Evicted LRU entry: ${oldestKey}`);
    }
  }
}
