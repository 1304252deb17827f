import {
  BadGatewayException,
  BadRequestException,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import {
  FindOptionsWhere,
  In,
  IsNull,
  LessThan,
  Not,
  Repository,
} from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../common/database-errors';
import {
  ENRICHMENT_ATTEMPTS_TOTAL,
  ENRICHMENT_CALL_DURATION,
} from '../common/metrics.providers';
import { LEAD_ENGINE_CONFIG } from '../config/lead-engine.config';
import type { LeadEngineConfig } from '../config/lead-engine.config';
import { Lead } from '../leads/lead.entity';
import { LeadReconciler } from '../reconciliation/lead-reconciler.service';
import { normalizeDomain } from '../reconciliation/domain-predictor';
import { ProvenancePolicy } from '../reconciliation/provenance.policy';
import {
  BatchSummary,
  emptySummary,
} from '../reconciliation/reconciliation.types';
import { EnrichmentCallStatus, EnrichmentLog } from './enrichment-log.entity';
import { EMAIL_FINDER } from './interfaces/email-finder.interface';
import type {
  EmailFinder,
  EmailLookup,
} from './interfaces/email-finder.interface';
import { ENRICHMENT_QUOTA } from './quota/quota-counter.interface';
import type { QuotaCounter } from './quota/quota-counter.interface';

export interface EnrichmentRunSummary extends BatchSummary {
  runId: string;
}

export interface DomainLookupResult extends EmailLookup {
  domain: string;
  provider: string;
}

export interface EnrichmentRunOptions {
  signal?: AbortSignal;
}

type LeadOutcome = 'updated' | 'skipped' | 'failed';

/**
 * Walks pending leads oldest first and spends at most one email finder call
 * per lead, each one reserved against the daily quota before it is made.
 */
@Injectable()
export class EnrichmentOrchestrator {
  private readonly logger = new Logger(EnrichmentOrchestrator.name);

  constructor(
    @InjectRepository(Lead)
    private readonly leadRepository: Repository<Lead>,
    @InjectRepository(EnrichmentLog)
    private readonly logRepository: Repository<EnrichmentLog>,
    private readonly leadReconciler: LeadReconciler,
    private readonly provenancePolicy: ProvenancePolicy,
    @Inject(EMAIL_FINDER) private readonly emailFinder: EmailFinder,
    @Inject(ENRICHMENT_QUOTA) private readonly quota: QuotaCounter,
    @Inject(LEAD_ENGINE_CONFIG) private readonly config: LeadEngineConfig,
    @InjectMetric(ENRICHMENT_ATTEMPTS_TOTAL)
    private readonly attemptsCounter: Counter<string>,
    @InjectMetric(ENRICHMENT_CALL_DURATION)
    private readonly callDuration: Histogram<string>,
  ) {}

  findPending(limit: number = this.config.enrichmentBatchSize): Promise<Lead[]> {
    return this.leadRepository.find({
      where: this.pendingWhere(),
      order: { createdAt: 'ASC', id: 'ASC' },
      take: limit,
    });
  }

  countPending(): Promise<number> {
    return this.leadRepository.count({ where: this.pendingWhere() });
  }

  history(limit = 100): Promise<EnrichmentLog[]> {
    return this.logRepository.find({
      order: { timestamp: 'DESC', id: 'DESC' },
      take: limit,
    });
  }

  /**
   * One-off lookup for a domain outside any lead. Spends quota and is
   * logged like a run call, but never touches lead rows.
   */
  async lookupDomain(rawDomain: string): Promise<DomainLookupResult> {
    const domain = normalizeDomain(rawDomain);
    if (!domain) {
      throw new BadRequestException(`Not a company domain: ${rawDomain}`);
    }

    const reservation = await this.quota.tryConsume();
    if (!reservation.granted) {
      throw new HttpException(
        `Daily enrichment quota exhausted, resets at ${reservation.resetsAt.toISOString()}`,
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }

    const runId = uuidv4();
    const startedAt = Date.now();
    try {
      const lookup = await this.emailFinder.findEmail(domain);
      await this.writeLog({
        runId,
        leadId: null,
        domain,
        status: lookup.best
          ? EnrichmentCallStatus.FOUND
          : EnrichmentCallStatus.EMPTY,
        emailsFound: lookup.emailsFound,
        applied: false,
        durationMs: Date.now() - startedAt,
        errorMessage: null,
      });
      return { domain, provider: this.emailFinder.name, ...lookup };
    } catch (error: unknown) {
      await this.writeLog({
        runId,
        leadId: null,
        domain,
        status: EnrichmentCallStatus.FAILED,
        emailsFound: 0,
        applied: false,
        durationMs: Date.now() - startedAt,
        errorMessage: errorMessage(error).slice(0, 500),
      });
      throw new BadGatewayException(
        `${this.emailFinder.name} lookup failed for ${domain}: ${errorMessage(error)}`,
      );
    }
  }

  async run(options: EnrichmentRunOptions = {}): Promise<EnrichmentRunSummary> {
    const runId = uuidv4();
    const summary: EnrichmentRunSummary = { runId, ...emptySummary() };
    const [pending, backlog] = await Promise.all([
      this.findPending(),
      this.countPending(),
    ]);

    this.logger.log(
      `[${runId}] Enrichment run started: ${pending.length} of ${backlog} pending leads in this batch`,
    );

    for (let index = 0; index < pending.length; index++) {
      if (options.signal?.aborted) {
        this.logger.warn(`[${runId}] Run aborted`);
        break;
      }

      const reservation = await this.quota.tryConsume();
      if (!reservation.granted) {
        this.logger.warn(
          `[${runId}] Daily quota exhausted (${reservation.used}/${reservation.limit}), resets at ${reservation.resetsAt.toISOString()}`,
        );
        break;
      }

      const lead = pending[index];
      summary.processed++;
      let outcome: LeadOutcome;
      try {
        outcome = await this.enrichLead(runId, lead);
      } catch (error: unknown) {
        this.logger.error(
          `[${runId}] Enrichment failed for lead ${lead.id}: ${errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
        outcome = 'failed';
      }
      summary[outcome]++;
    }

    // Everything not reached, including leads beyond this batch.
    summary.deferred = Math.max(0, backlog - summary.processed);

    this.logger.log(`[${runId}] Enrichment run complete: ${JSON.stringify(summary)}`);
    return summary;
  }

  private async enrichLead(runId: string, lead: Lead): Promise<LeadOutcome> {
    const domain = lead.domain;
    if (!domain) return 'skipped';

    await this.leadReconciler.recordEnrichmentAttempt(lead.id);

    const startedAt = Date.now();
    const endTimer = this.callDuration.startTimer();
    let lookup: EmailLookup;
    try {
      lookup = await this.emailFinder.findEmail(domain);
    } catch (error: unknown) {
      endTimer();
      this.attemptsCounter.inc({ status: 'failed' });
      this.logger.warn(
        `[${runId}] ${this.emailFinder.name} lookup failed for ${domain}: ${errorMessage(error)}`,
      );
      await this.writeLog({
        runId,
        leadId: lead.id,
        domain,
        status: EnrichmentCallStatus.FAILED,
        emailsFound: 0,
        applied: false,
        durationMs: Date.now() - startedAt,
        errorMessage: errorMessage(error).slice(0, 500),
      });
      return 'failed';
    }
    endTimer();
    const durationMs = Date.now() - startedAt;

    if (!lookup.best) {
      this.attemptsCounter.inc({ status: 'empty' });
      await this.writeLog({
        runId,
        leadId: lead.id,
        domain,
        status: EnrichmentCallStatus.EMPTY,
        emailsFound: lookup.emailsFound,
        applied: false,
        durationMs,
        errorMessage: null,
      });
      return 'skipped';
    }

    const applied = await this.leadReconciler.ingestEnrichment(
      lead.id,
      lookup.best,
    );
    this.attemptsCounter.inc({ status: applied ? 'applied' : 'refused' });
    await this.writeLog({
      runId,
      leadId: lead.id,
      domain,
      status: EnrichmentCallStatus.FOUND,
      emailsFound: lookup.emailsFound,
      applied,
      durationMs,
      errorMessage: null,
    });
    return applied ? 'updated' : 'skipped';
  }

  private async writeLog(
    entry: Omit<EnrichmentLog, 'id' | 'provider' | 'timestamp'>,
  ): Promise<void> {
    try {
      await this.logRepository.save(
        this.logRepository.create({ ...entry, provider: this.emailFinder.name }),
      );
    } catch (error: unknown) {
      this.logger.error(
        `[${entry.runId}] Failed to write enrichment log for ${entry.domain}: ${errorMessage(error)}`,
      );
    }
  }

  private pendingWhere(): FindOptionsWhere<Lead> {
    return {
      source: In(this.provenancePolicy.enrichableSources()),
      emailVerified: false,
      domain: Not(IsNull()),
      enrichmentAttempts: LessThan(this.config.maxEnrichmentAttempts),
    };
  }
}
