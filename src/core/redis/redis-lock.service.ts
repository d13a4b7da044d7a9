import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import Redis, { RedisOptions } from 'ioredis';

// Deletes the key only while it still holds the caller's token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

@Injectable()
export class RedisLockService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisLockService.name);
  private readonly client: Redis | null;
  private isRedisAvailable = false;

  constructor(private readonly configService: ConfigService) {
    const redisUrl = this.configService.get<string>('database.redis.url');
    const redisHost = this.configService.get<string>('database.redis.host');

    // Skip Redis initialization if no connection info is available
    if (!redisUrl && (!redisHost || redisHost === 'disabled')) {
      this.logger.log('Redis disabled - shift writes are serialized in-process only');
      this.client = null;
      return;
    }

    const baseOptions: RedisOptions = {
      connectionName: 'shift-scheduling-lock',
      keyPrefix: this.configService.get<string>('database.redis.keyPrefix'),
      maxRetriesPerRequest: 3,
      connectTimeout: 10000,
      lazyConnect: true,
      showFriendlyErrorStack: true,
      reconnectOnError: (err) => err.message.includes('READONLY'),
    };

    if (redisUrl) {
      this.logger.log(
        `Connecting to Redis using URL: ${redisUrl.replace(/:([^:@]{2,})@/, ':***@')}`,
      );
      this.client = new Redis(redisUrl, baseOptions);
    } else {
      const port = this.configService.get<number>('database.redis.port');
      this.logger.log(`Connecting to Redis at ${redisHost}:${port}`);
      this.client = new Redis({
        ...baseOptions,
        host: redisHost,
        port,
        password: this.configService.get<string>('database.redis.password'),
        db: this.configService.get<number>('database.redis.db'),
        tls:
          this.configService.get<string>('app.env') === 'production'
            ? { rejectUnauthorized: false }
            : undefined,
      });
    }

    this.client.on('ready', () => {
      this.logger.log('Redis connected successfully');
      this.isRedisAvailable = true;
    });

    this.client.on('error', (err: Error) => {
      this.logger.warn(`Redis connection failed: ${err.message}. Falling back to in-process locking.`);
      this.isRedisAvailable = false;
    });

    this.client.on('close', () => {
      this.isRedisAvailable = false;
    });

    this.client.connect().catch((err: Error) => {
      this.logger.warn(`Failed to connect to Redis: ${err.message}. Running without distributed locks.`);
      this.isRedisAvailable = false;
    });
  }

  isAvailable(): boolean {
    return this.client !== null && this.isRedisAvailable;
  }

  /**
   * Tries once to take `key` for `ttlSeconds`.
   * Resolves to the owner token on success, `null` when the key is held or Redis is unusable.
   */
  async acquire(key: string, ttlSeconds: number): Promise<string | null> {
    if (!this.client || !this.isRedisAvailable) {
      this.logger.debug(`Redis unavailable - skipping lock for key: ${key}`);
      return null;
    }

    const token = randomUUID();
    try {
      const result = await this.client.set(key, token, 'EX', ttlSeconds, 'NX');
      return result === 'OK' ? token : null;
    } catch (error) {
      this.logger.warn(`Failed to acquire lock for key ${key}: ${describe(error)}`);
      return null;
    }
  }

  async release(key: string, token: string): Promise<void> {
    if (!this.client || !this.isRedisAvailable) {
      this.logger.debug(`Redis unavailable - skipping unlock for key: ${key}`);
      return;
    }

    try {
      await this.client.eval(RELEASE_SCRIPT, 1, key, token);
    } catch (error) {
      // The key still expires after its TTL
      this.logger.warn(`Failed to release lock for key ${key}: ${describe(error)}`);
    }
  }

  onModuleDestroy(): void {
    this.client?.disconnect();
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
