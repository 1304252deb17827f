import { Logger, OnApplicationShutdown } from '@nestjs/common';
import Redis from 'ioredis';
import { errorMessage } from '../../common/database-errors';
import { QuotaCounter, QuotaReservation, QuotaUsage } from './quota-counter.interface';
import { quotaWindow } from './quota-window';

/**
 * Shared daily quota backed by a Redis counter per window. When Redis is
 * unreachable no reservation is granted.
 */
export class RedisQuotaCounter implements QuotaCounter, OnApplicationShutdown {
  private readonly logger = new Logger(RedisQuotaCounter.name);

  constructor(
    private readonly redis: Redis,
    private readonly limit: number,
    private readonly resetHourUtc: number = 0,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async tryConsume(): Promise<QuotaReservation> {
    const window = quotaWindow(this.clock(), this.resetHourUtc);

    try {
      const multi = this.redis.multi();
      multi.incr(window.key);
      multi.expireat(window.key, Math.floor(window.end.getTime() / 1000));
      const results = await multi.exec();

      const reply = results?.[0];
      if (!reply || reply[0] || typeof reply[1] !== 'number') {
        throw reply?.[0] ?? new Error('Quota transaction was discarded');
      }
      const used = reply[1];

      if (used > this.limit) {
        await this.redis.decr(window.key);
        return {
          granted: false,
          used: this.limit,
          limit: this.limit,
          resetsAt: window.end,
        };
      }
      return { granted: true, used, limit: this.limit, resetsAt: window.end };
    } catch (error: unknown) {
      this.logger.error(
        `Quota reservation failed, refusing call: ${errorMessage(error)}`,
      );
      return {
        granted: false,
        used: this.limit,
        limit: this.limit,
        resetsAt: window.end,
      };
    }
  }

  async peek(): Promise<QuotaUsage> {
    const window = quotaWindow(this.clock(), this.resetHourUtc);
    const value = await this.redis.get(window.key);
    return {
      used: Math.min(this.limit, Number(value ?? 0)),
      limit: this.limit,
      resetsAt: window.end,
    };
  }

  async onApplicationShutdown(): Promise<void> {
    await this.redis.quit();
  }
}
