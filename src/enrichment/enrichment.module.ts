import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import Redis from 'ioredis';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import { enrichmentMetricsProviders } from '../common/metrics.providers';
import { LEAD_ENGINE_CONFIG } from '../config/lead-engine.config';
import type { LeadEngineConfig } from '../config/lead-engine.config';
import { Lead } from '../leads/lead.entity';
import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { EnrichmentController } from './enrichment.controller';
import { EnrichmentLog } from './enrichment-log.entity';
import { EnrichmentOrchestrator } from './enrichment-orchestrator.service';
import { EnrichmentStatsService } from './enrichment-stats.service';
import { ENRICHMENT_QUEUE, EnrichmentProcessor } from './enrichment.processor';
import { EMAIL_FINDER } from './interfaces/email-finder.interface';
import type { EmailFinder } from './interfaces/email-finder.interface';
import { HunterEmailFinder } from './providers/hunter.provider';
import { MockEmailFinder } from './providers/mock.provider';
import { InMemoryQuotaCounter } from './quota/in-memory-quota.counter';
import { ENRICHMENT_QUOTA } from './quota/quota-counter.interface';
import type { QuotaCounter } from './quota/quota-counter.interface';
import { RedisQuotaCounter } from './quota/redis-quota.counter';

export const REDIS_CLIENT = 'REDIS_CLIENT';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forFeature([Lead, EnrichmentLog]),
    ReconciliationModule,
    BullModule.registerQueue({ name: ENRICHMENT_QUEUE }),
  ],
  controllers: [EnrichmentController],
  providers: [
    EnrichmentOrchestrator,
    EnrichmentStatsService,
    EnrichmentProcessor,
    CircuitBreakerFactory,
    {
      provide: EMAIL_FINDER,
      useFactory: (
        configService: ConfigService,
        engineConfig: LeadEngineConfig,
        breakerFactory: CircuitBreakerFactory,
      ): EmailFinder => {
        const provider = configService.get<string>(
          'ENRICHMENT_PROVIDER',
          'MOCK',
        );

        // Provider switch based on environment variable
        switch (provider.toUpperCase()) {
          case 'HUNTER':
            return new HunterEmailFinder(
              {
                apiKey: configService.get<string>('HUNTER_API_KEY'),
                minConfidence: engineConfig.minEnrichmentConfidence,
              },
              breakerFactory,
            );
          case 'MOCK':
          default:
            return new MockEmailFinder();
        }
      },
      inject: [ConfigService, LEAD_ENGINE_CONFIG, CircuitBreakerFactory],
    },
    {
      provide: REDIS_CLIENT,
      useFactory: (configService: ConfigService): Redis | null => {
        if (configService.get<string>('QUOTA_BACKEND', 'redis') !== 'redis') {
          return null;
        }
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: configService.get<number>('REDIS_PORT', 6379),
          lazyConnect: true,
        });
      },
      inject: [ConfigService],
    },
    {
      provide: ENRICHMENT_QUOTA,
      useFactory: (
        redis: Redis | null,
        engineConfig: LeadEngineConfig,
      ): QuotaCounter =>
        redis
          ? new RedisQuotaCounter(
              redis,
              engineConfig.dailyEnrichmentQuota,
              engineConfig.quotaResetHourUtc,
            )
          : new InMemoryQuotaCounter(
              engineConfig.dailyEnrichmentQuota,
              engineConfig.quotaResetHourUtc,
            ),
      inject: [REDIS_CLIENT, LEAD_ENGINE_CONFIG],
    },
    ...enrichmentMetricsProviders,
  ],
  exports: [EnrichmentOrchestrator],
})
export class EnrichmentModule {}
