import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';

@Injectable()
export class RedisCacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisCacheService.name);
  private redis: Redis | null = null;
  private _isConnected = false;
  private readonly maxReconnectAttempts = 10;

  constructor(private readonly config: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const enabled = this.config.get<boolean>('cache.redis.enabled');
    const redisUrl = this.config.get<string | null>('cache.redis.url');
    if (!enabled || !redisUrl) {
      this.logger.log('Redis cache disabled');
      return;
    }

    const options: RedisOptions = {
      retryStrategy: (times: number): number | null => {
        if (times > this.maxReconnectAttempts) {
          this.logger.error(
            `Max reconnect attempts (${this.maxReconnectAttempts}) reached. Giving up.`,
          );
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      connectTimeout: 10000,
      commandTimeout: 5000,
    };

    try {
      this.redis = new Redis(redisUrl, options);

      this.redis.on('ready', () => {
        this._isConnected = true;
        this.logger.log('Redis ready');
      });

      this.redis.on('error', (error: Error) => {
        this.logger.error('Redis connection error:', error.message);
        this._isConnected = false;
      });

      this.redis.on('close', () => {
        this._isConnected = false;
        this.logger.warn('Redis connection closed');
      });

      await this.redis.ping();
      this._isConnected = true;
    } catch (error) {
      this.logger.error(
        'Failed to initialize Redis:',
        error instanceof Error ? error.message : String(error),
      );
      this.redis?.disconnect();
      this.redis = null;
      this._isConnected = false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.redis) return;

    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.error(
        'Error closing Redis connection:',
        error instanceof Error ? error.message : String(error),
      );
      this.redis.disconnect();
    } finally {
      this.redis = null;
      this._isConnected = false;
    }
  }

  async get<T>(key: string): Promise<T | null> {
    if (!this.redis || !this._isConnected) return null;

    try {
      const value = await this.redis.get(key);
      return value === null ? null : (JSON.parse(value) as T);
    } catch (error) {
      this.logError('GET', key, error);
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
    if (!this.redis || !this._isConnected) return false;

    try {
      const result = await this.redis.setex(
        key,
        ttlSeconds,
        JSON.stringify(value),
      );
      return result === 'OK';
    } catch (error) {
      this.logError('SET', key, error);
      return false;
    }
  }

  async take<T>(key: string): Promise<T | null> {
    if (!this.redis || !this._isConnected) return null;

    try {
      const value = await this.redis.getdel(key);
      return value === null ? null : (JSON.parse(value) as T);
    } catch (error) {
      this.logError('GETDEL', key, error);
      return null;
    }
  }

  async del(key: string): Promise<boolean> {
    if (!this.redis || !this._isConnected) return false;

    try {
      await this.redis.del(key);
      return true;
    } catch (error) {
      this.logError('DEL', key, error);
      return false;
    }
  }

  async ttl(key: string): Promise<number> {
    if (!this.redis || !this._isConnected) return -1;

    try {
      return await this.redis.ttl(key);
    } catch (error) {
      this.logError('TTL', key, error);
      return -1;
    }
  }

  isConnected(): boolean {
    return (
      this._isConnected && this.redis !== null && this.redis.status === 'ready'
    );
  }

  private logError(op: string, key: string, error: unknown): void {
    this.logger.error(
      `Redis ${op} failed for "${key}":`,
      error instanceof Error ? error.message : String(error),
    );
  }
}
