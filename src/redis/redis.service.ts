import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { randomUUID } from 'crypto';

// Deletes the lock only while it still holds the caller's token
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private client: Redis | null = null;
  private readonly logger = new Logger(RedisService.name);

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    const client = new Redis({
      host: this.configService.get<string>('redis.host'),
      port: this.configService.get<number>('redis.port'),
      password: this.configService.get<string>('redis.password'),
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        this.logger.warn(`Redis connection retry attempt ${times}, waiting ${delay}ms`);
        return delay;
      },
      maxRetriesPerRequest: 3,
    });

    client.on('error', (err: Error) => {
      this.logger.error('Redis Client Error:', err);
    });

    client.on('connect', () => {
      this.logger.log('Redis connected');
    });

    client.on('close', () => {
      this.logger.warn('Redis connection closed');
    });

    this.client = client;
  }

  async onModuleDestroy() {
    try {
      if (this.client) {
        await this.client.quit();
        this.client = null;
        this.logger.log('Redis connection closed gracefully');
      }
    } catch (error) {
      this.logger.error('Error closing Redis connection:', error);
    }
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.getClient().get(key);
    } catch (error) {
      this.logger.error(`Error getting key ${key}:`, error);
      throw error;
    }
  }

  async setex(key: string, seconds: number, value: string): Promise<string> {
    try {
      return await this.getClient().setex(key, seconds, value);
    } catch (error) {
      this.logger.error(`Error setting key ${key} with expiry:`, error);
      throw error;
    }
  }

  async del(key: string): Promise<number> {
    try {
      return await this.getClient().del(key);
    } catch (error) {
      this.logger.error(`Error deleting key ${key}:`, error);
      throw error;
    }
  }

  async incr(key: string): Promise<number> {
    try {
      return await this.getClient().incr(key);
    } catch (error) {
      this.logger.error(`Error incrementing key ${key}:`, error);
      throw error;
    }
  }

  async expire(key: string, seconds: number): Promise<number> {
    try {
      return await this.getClient().expire(key, seconds);
    } catch (error) {
      this.logger.error(`Error setting expiry for key ${key}:`, error);
      throw error;
    }
  }

  /**
   * Reads a JSON value. A payload that no longer parses is dropped and reported as a miss.
   */
  async getJson(key: string): Promise<unknown> {
    const raw = await this.get(key);
    if (raw === null) {
      return null;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Discarding unreadable value at ${key}`);
      await this.del(key);
      return null;
    }
  }

  async setJson(key: string, seconds: number, value: unknown): Promise<void> {
    await this.setex(key, seconds, JSON.stringify(value));
  }

  /**
   * Takes a lock that expires after `ttlMs`. Returns the owner token, or null
   * while another holder has it.
   */
  async acquireLock(key: string, ttlMs: number): Promise<string | null> {
    const token = randomUUID();
    try {
      const reply = await this.getClient().set(key, token, 'PX', ttlMs, 'NX');
      return reply === 'OK' ? token : null;
    } catch (error) {
      this.logger.error(`Error acquiring lock ${key}:`, error);
      throw error;
    }
  }

  async releaseLock(key: string, token: string): Promise<boolean> {
    try {
      const released = await this.getClient().eval(RELEASE_LOCK_SCRIPT, 1, key, token);
      return released === 1;
    } catch (error) {
      this.logger.error(`Error releasing lock ${key}:`, error);
      throw error;
    }
  }

  private getClient(): Redis {
    if (!this.client) {
      throw new Error('Redis client not initialized');
    }
    return this.client;
  }
}
