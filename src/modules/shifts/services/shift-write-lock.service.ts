import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RedisLockService } from '../../../core/redis/redis-lock.service';

/**
 * Serializes shift writes per doctor so the conflict check and the write that
 * follows it cannot interleave with another write for the same doctor.
 *
 * Within one process, writes queue on a per-doctor promise chain. When Redis is
 * reachable the queue head also holds `shift-lock:doctor:<id>`, which covers
 * other instances of the service.
 */
@Injectable()
export class ShiftWriteLockService {
  private readonly logger = new Logger(ShiftWriteLockService.name);
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly redisLockService: RedisLockService,
    private readonly configService: ConfigService,
  ) {}

  async runExclusive<T>(doctorId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(doctorId) ?? Promise.resolve();
    const run = previous.then(() => this.withDistributedLock(doctorId, work));
    // Queue position only: the caller still receives the rejection through `run`
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(doctorId, settled);

    try {
      return await run;
    } finally {
      if (this.queues.get(doctorId) === settled) {
        this.queues.delete(doctorId);
      }
    }
  }

  private async withDistributedLock<T>(doctorId: string, work: () => Promise<T>): Promise<T> {
    if (!this.redisLockService.isAvailable()) {
      return work();
    }

    const key = `shift-lock:doctor:${doctorId}`;
    const ttlSeconds = this.configService.get<number>('scheduling.lock.ttlSeconds') ?? 10;
    const retries = this.configService.get<number>('scheduling.lock.retries') ?? 20;
    const retryDelayMs = this.configService.get<number>('scheduling.lock.retryDelayMs') ?? 50;

    for (let attempt = 0; attempt <= retries; attempt++) {
      const token = await this.redisLockService.acquire(key, ttlSeconds);

      if (token) {
        this.logger.debug(`Acquired ${key} after ${attempt} retr${attempt === 1 ? 'y' : 'ies'}`);
        try {
          return await work();
        } finally {
          await this.redisLockService.release(key, token);
        }
      }

      if (!this.redisLockService.isAvailable()) {
        this.logger.warn(`Redis dropped while waiting for ${key}; continuing with in-process lock only`);
        return work();
      }

      if (attempt < retries) {
        await delay(retryDelayMs);
      }
    }

    this.logger.warn(`Gave up waiting for ${key} after ${retries} retries`);
    throw new ServiceUnavailableException(
      `Schedule for doctor ${doctorId} is being modified, please retry`,
    );
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
