import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Not, Repository } from 'typeorm';
import {
  CircuitBreakerFactory,
  CircuitHealth,
} from '../common/circuit-breaker.factory';
import { LEAD_ENGINE_CONFIG } from '../config/lead-engine.config';
import type { LeadEngineConfig } from '../config/lead-engine.config';
import { Lead } from '../leads/lead.entity';
import { EnrichmentCallStatus, EnrichmentLog } from './enrichment-log.entity';
import { EnrichmentOrchestrator } from './enrichment-orchestrator.service';
import { ENRICHMENT_QUOTA } from './quota/quota-counter.interface';
import type { QuotaCounter, QuotaUsage } from './quota/quota-counter.interface';
import { quotaWindow } from './quota/quota-window';

export interface EnrichmentStats {
  leads: {
    total: number;
    enriched: number;
    verified: number;
    pending: number;
  };
  quota: QuotaUsage & { remaining: number };
  /** Calls made since the current quota window opened */
  window: {
    since: Date;
    calls: number;
    found: number;
    empty: number;
    failed: number;
    applied: number;
  };
  circuits: Record<string, CircuitHealth>;
}

interface StatusRow {
  status: string;
  count: string | number;
  applied: string | number | null;
}

// UTC "YYYY-MM-DD HH:MM:SS", comparable with both postgres timestamps and sqlite datetime text
function toSqlTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

@Injectable()
export class EnrichmentStatsService {
  constructor(
    @InjectRepository(Lead)
    private readonly leadRepository: Repository<Lead>,
    @InjectRepository(EnrichmentLog)
    private readonly logRepository: Repository<EnrichmentLog>,
    private readonly orchestrator: EnrichmentOrchestrator,
    private readonly breakerFactory: CircuitBreakerFactory,
    @Inject(ENRICHMENT_QUOTA) private readonly quota: QuotaCounter,
    @Inject(LEAD_ENGINE_CONFIG) private readonly config: LeadEngineConfig,
  ) {}

  async getStats(now: Date = new Date()): Promise<EnrichmentStats> {
    const since = quotaWindow(now, this.config.quotaResetHourUtc).start;

    const [total, enriched, verified, pending, quota, byStatus] =
      await Promise.all([
        this.leadRepository.count(),
        this.leadRepository.count({ where: { enrichedAt: Not(IsNull()) } }),
        this.leadRepository.count({ where: { emailVerified: true } }),
        this.orchestrator.countPending(),
        this.quota.peek(),
        this.logRepository
          .createQueryBuilder('log')
          .select('log.status', 'status')
          .addSelect('COUNT(*)', 'count')
          .addSelect('SUM(CASE WHEN log.applied THEN 1 ELSE 0 END)', 'applied')
          .where('log.timestamp >= :since', { since: toSqlTimestamp(since) })
          .groupBy('log.status')
          .getRawMany<StatusRow>(),
      ]);

    const counts = new Map(
      byStatus.map((row) => [row.status, Number(row.count)]),
    );
    const found = counts.get(EnrichmentCallStatus.FOUND) ?? 0;
    const empty = counts.get(EnrichmentCallStatus.EMPTY) ?? 0;
    const failed = counts.get(EnrichmentCallStatus.FAILED) ?? 0;
    const applied = byStatus.reduce(
      (sum, row) => sum + Number(row.applied ?? 0),
      0,
    );

    return {
      leads: { total, enriched, verified, pending },
      quota: { ...quota, remaining: Math.max(0, quota.limit - quota.used) },
      window: {
        since,
        calls: found + empty + failed,
        found,
        empty,
        failed,
        applied,
      },
      circuits: this.breakerFactory.health(),
    };
  }
}
