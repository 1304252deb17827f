import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { Repository } from 'typeorm';
import { KeyedMutex } from '../common/keyed-mutex';
import { errorMessage, isUniqueViolation } from '../common/database-errors';
import { LEADS_INGESTED_TOTAL } from '../common/metrics.providers';
import { Lead } from '../leads/lead.entity';
import {
  LeadSource,
  LeadStatus,
  PLACEHOLDER_EMAIL_PREFIX,
  isPlaceholderEmail,
} from '../leads/lead.enums';
import { DomainPredictor } from './domain-predictor';
import { LeadScorer } from './lead-scoring';
import { NicheClassifier, UNCATEGORIZED } from './niche-classifier';
import { ProvenancePolicy } from './provenance.policy';
import {
  BatchSummary,
  DiscoveryOutcome,
  DiscoveryRecord,
  DiscoveryRecordSchema,
  EnrichmentResultSchema,
  dedupe,
  emptySummary,
} from './reconciliation.types';

export function identityKey(source: LeadSource, externalId: string): string {
  return `${source}::${externalId}`;
}

export function leadLockKey(leadId: number): string {
  return `lead:${leadId}`;
}

export function placeholderEmail(
  candidateDomains: readonly string[],
  externalId: string,
): string {
  if (candidateDomains.length > 0) {
    return `${PLACEHOLDER_EMAIL_PREFIX}${candidateDomains[0]}`;
  }
  const label = externalId.toLowerCase().replace(/[^a-z0-9-]/g, '-');
  return `${PLACEHOLDER_EMAIL_PREFIX}${label}.invalid`;
}

/**
 * Single authority for turning discovery sightings and enrichment results
 * into lead rows. Guarantees at most one lead per (source, externalId) and
 * at most one lead per live email.
 */
@Injectable()
export class LeadReconciler {
  private readonly logger = new Logger(LeadReconciler.name);
  private readonly locks = new KeyedMutex();

  constructor(
    @InjectRepository(Lead)
    private readonly leadRepository: Repository<Lead>,
    private readonly provenancePolicy: ProvenancePolicy,
    private readonly nicheClassifier: NicheClassifier,
    private readonly domainPredictor: DomainPredictor,
    private readonly leadScorer: LeadScorer,
    @InjectMetric(LEADS_INGESTED_TOTAL)
    private readonly ingestedCounter: Counter<string>,
  ) {}

  async ingestDiscovery(record: DiscoveryRecord): Promise<DiscoveryOutcome> {
    const key = identityKey(record.source, record.externalId);

    return this.locks.runExclusive(key, async () => {
      try {
        return await this.upsertDiscovery(record);
      } catch (error: unknown) {
        if (!isUniqueViolation(error)) throw error;

        // Another process created the same identity between our lookup and insert.
        this.logger.warn(
          `Identity conflict for ${key}, retrying as update: ${errorMessage(error)}`,
        );
        const existing = await this.findByIdentity(record);
        if (!existing) throw error;
        return this.mergeExclusive(existing.id, record);
      }
    });
  }

  /**
   * Processes records one at a time in arrival order. Malformed records are
   * skipped, storage failures are counted, and an aborted signal defers
   * whatever has not been reached yet.
   */
  async ingestDiscoveries(
    records: readonly unknown[],
    signal?: AbortSignal,
  ): Promise<BatchSummary> {
    const summary = emptySummary();

    for (let index = 0; index < records.length; index++) {
      if (signal?.aborted) {
        summary.deferred = records.length - index;
        this.logger.warn(
          `Discovery batch aborted, ${summary.deferred} records deferred`,
        );
        break;
      }

      summary.processed++;
      const parsed = DiscoveryRecordSchema.safeParse(records[index]);
      if (!parsed.success) {
        summary.skipped++;
        this.ingestedCounter.inc({ outcome: 'skipped' });
        this.logger.warn(
          `Rejected discovery record #${index}: ${parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ')}`,
        );
        continue;
      }

      try {
        const outcome = await this.ingestDiscovery(parsed.data);
        if (outcome.created) {
          summary.created++;
        } else {
          summary.updated++;
        }
      } catch (error: unknown) {
        summary.failed++;
        this.ingestedCounter.inc({ outcome: 'failed' });
        this.logger.error(
          `Failed to ingest ${identityKey(parsed.data.source, parsed.data.externalId)}: ${errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
    }

    this.logger.log(`Discovery batch complete: ${JSON.stringify(summary)}`);
    return summary;
  }

  /**
   * Applies an email finder result if the provenance policy allows it.
   * A refusal is a normal outcome and is reported as `false`, never thrown.
   */
  async ingestEnrichment(
    leadId: number,
    result: unknown,
    incomingSource: LeadSource = LeadSource.HUNTER_ENRICHMENT,
  ): Promise<boolean> {
    const parsed = EnrichmentResultSchema.safeParse(result);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed enrichment result for lead ${leadId}`);
      this.ingestedCounter.inc({ outcome: 'enrichment_invalid' });
      return false;
    }
    const enrichment = parsed.data;

    return this.locks.runExclusive(leadLockKey(leadId), async () => {
      const lead = await this.leadRepository.findOne({ where: { id: leadId } });
      if (!lead) {
        this.logger.warn(`Enrichment for unknown lead ${leadId} ignored`);
        return false;
      }

      if (isPlaceholderEmail(enrichment.email)) {
        return false;
      }

      const allowed = this.provenancePolicy.mayOverwriteEmail({
        existingSource: lead.source,
        existingEmail: lead.email,
        incomingSource,
        incomingConfidence: enrichment.confidence,
      });
      if (!allowed) {
        this.logger.log(
          `Preserving email for lead ${lead.id} (source: ${lead.source}, incoming confidence: ${enrichment.confidence})`,
        );
        this.ingestedCounter.inc({ outcome: 'enrichment_refused' });
        return false;
      }

      if (enrichment.email !== lead.email.toLowerCase()) {
        const holder = await this.leadRepository.findOne({
          where: { email: enrichment.email },
        });
        if (holder && holder.id !== lead.id) {
          this.logger.warn(
            `Email for lead ${lead.id} already belongs to lead ${holder.id}, not applied`,
          );
          this.ingestedCounter.inc({ outcome: 'enrichment_conflict' });
          return false;
        }
      }

      lead.email = enrichment.email;
      lead.emailConfidence = enrichment.confidence;
      lead.emailVerified = enrichment.verified;
      lead.enrichedAt = new Date();
      if (!lead.domain) {
        lead.domain = enrichment.domain;
      }
      this.leadScorer.apply(lead);

      try {
        await this.leadRepository.save(lead);
      } catch (error: unknown) {
        if (!isUniqueViolation(error)) throw error;
        this.logger.warn(
          `Email for lead ${lead.id} was claimed concurrently, not applied`,
        );
        this.ingestedCounter.inc({ outcome: 'enrichment_conflict' });
        return false;
      }

      this.ingestedCounter.inc({ outcome: 'enriched' });
      this.logger.log(`Lead ${lead.id} enriched (score ${lead.leadScore})`);
      return true;
    });
  }

  async recordEnrichmentAttempt(leadId: number): Promise<void> {
    await this.leadRepository.increment({ id: leadId }, 'enrichmentAttempts', 1);
  }

  private async upsertDiscovery(
    record: DiscoveryRecord,
  ): Promise<DiscoveryOutcome> {
    const existing = await this.findByIdentity(record);
    if (existing) {
      return this.mergeExclusive(existing.id, record);
    }
    return this.createFromDiscovery(record);
  }

  /**
   * Merges under the same per-lead lock as enrichment, re-reading the row
   * so a concurrently applied email is carried into the save.
   */
  private mergeExclusive(
    leadId: number,
    record: DiscoveryRecord,
  ): Promise<DiscoveryOutcome> {
    return this.locks.runExclusive(leadLockKey(leadId), async () => {
      const lead = await this.leadRepository.findOne({ where: { id: leadId } });
      if (!lead) {
        throw new Error(`Lead ${leadId} disappeared during merge`);
      }
      return this.mergeDiscovery(lead, record);
    });
  }

  private findByIdentity(record: DiscoveryRecord): Promise<Lead | null> {
    return this.leadRepository.findOne({
      where: { source: record.source, externalId: record.externalId },
    });
  }

  private async createFromDiscovery(
    record: DiscoveryRecord,
  ): Promise<DiscoveryOutcome> {
    const candidateDomains = this.candidateDomainsFor(record);
    const classification = this.classify(record);

    const lead = this.leadRepository.create({
      email: placeholderEmail(candidateDomains, record.externalId),
      source: record.source,
      externalId: record.externalId,
      displayName: record.displayName,
      domain: candidateDomains[0] ?? null,
      candidateDomains,
      niche: classification?.niche ?? null,
      nicheConfidence: classification?.confidence ?? null,
      status: LeadStatus.NEW,
      emailConfidence: null,
      emailVerified: false,
      enrichmentAttempts: 0,
      enrichedAt: null,
    });
    this.leadScorer.apply(lead);

    const saved = await this.leadRepository.save(lead);
    this.ingestedCounter.inc({ outcome: 'created' });
    this.logger.log(
      `Created lead ${saved.id} for ${identityKey(record.source, record.externalId)}`,
    );
    return { leadId: saved.id, created: true };
  }

  private async mergeDiscovery(
    lead: Lead,
    record: DiscoveryRecord,
  ): Promise<DiscoveryOutcome> {
    let changed = false;

    if (lead.displayName !== record.displayName) {
      lead.displayName = record.displayName;
      changed = true;
    }

    const merged = dedupe([
      ...lead.candidateDomains,
      ...this.candidateDomainsFor(record),
    ]);
    if (merged.length !== lead.candidateDomains.length) {
      lead.candidateDomains = merged;
      changed = true;
    }
    if (!lead.domain && merged.length > 0) {
      lead.domain = merged[0];
      changed = true;
    }

    const classification = this.classify(record);
    if (
      classification &&
      (classification.niche !== lead.niche ||
        classification.confidence !== lead.nicheConfidence)
    ) {
      lead.niche = classification.niche;
      lead.nicheConfidence = classification.confidence;
      changed = true;
    }

    if (!changed) {
      this.ingestedCounter.inc({ outcome: 'unchanged' });
      return { leadId: lead.id, created: false };
    }

    this.leadScorer.apply(lead);
    await this.leadRepository.save(lead);
    this.ingestedCounter.inc({ outcome: 'updated' });
    return { leadId: lead.id, created: false };
  }

  private candidateDomainsFor(record: DiscoveryRecord): string[] {
    if (record.candidateDomains.length > 0) {
      return record.candidateDomains;
    }
    return this.domainPredictor.predict(record.displayName);
  }

  /**
   * Classifies from display name and free text. Falls back to the
   * collaborator's niche hint; returns null when neither says anything.
   */
  private classify(
    record: DiscoveryRecord,
  ): { niche: string; confidence: number } | null {
    const classification = this.nicheClassifier.classify(
      `${record.displayName} ${record.rawText}`,
    );
    if (classification.niche !== UNCATEGORIZED) {
      return classification;
    }
    if (record.nicheHint) {
      return { niche: record.nicheHint.toLowerCase(), confidence: 0 };
    }
    return null;
  }
}
