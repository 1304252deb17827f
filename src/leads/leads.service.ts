import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { isUniqueViolation } from '../common/database-errors';
import { normalizeDomain } from '../reconciliation/domain-predictor';
import { LeadReconciler } from '../reconciliation/lead-reconciler.service';
import { LeadScorer } from '../reconciliation/lead-scoring';
import type { BatchSummary } from '../reconciliation/reconciliation.types';
import { Lead } from './lead.entity';
import { LeadSource, LeadStatus, isPlaceholderEmail } from './lead.enums';
import { CreateLeadDto } from './dto/create-lead.dto';
import { QueryLeadsDto } from './dto/query-leads.dto';

export const DEFAULT_QUERY_LIMIT = 50;

@Injectable()
export class LeadsService {
  private readonly logger = new Logger(LeadsService.name);

  constructor(
    @InjectRepository(Lead)
    private readonly leadRepository: Repository<Lead>,
    private readonly leadScorer: LeadScorer,
    private readonly leadReconciler: LeadReconciler,
  ) {}

  /** Idempotent by email: a repeated create returns the stored lead. */
  async create(createLeadDto: CreateLeadDto): Promise<Lead> {
    const email = createLeadDto.email.trim().toLowerCase();
    if (isPlaceholderEmail(email)) {
      throw new BadRequestException('Placeholder emails cannot be submitted');
    }

    const existingLead = await this.leadRepository.findOne({
      where: { email },
    });
    if (existingLead) {
      return existingLead;
    }

    const [localPart, emailHost] = email.split('@');
    const domain =
      normalizeDomain(createLeadDto.domain ?? '') ?? normalizeDomain(emailHost);

    const lead = this.leadRepository.create({
      email,
      source: createLeadDto.source ?? LeadSource.MANUAL,
      externalId: null,
      displayName: createLeadDto.name?.trim() || localPart,
      domain,
      candidateDomains: domain ? [domain] : [],
      niche: null,
      nicheConfidence: null,
      status: LeadStatus.NEW,
      emailConfidence: null,
      emailVerified: false,
      enrichmentAttempts: 0,
      enrichedAt: null,
    });
    this.leadScorer.apply(lead);

    try {
      const savedLead = await this.leadRepository.save(lead);
      this.logger.log(`Created ${savedLead.source} lead ${savedLead.id}`);
      return savedLead;
    } catch (error: unknown) {
      if (!isUniqueViolation(error)) throw error;
      const raced = await this.leadRepository.findOne({ where: { email } });
      if (!raced) throw error;
      return raced;
    }
  }

  findAll(query: QueryLeadsDto): Promise<Lead[]> {
    const where: FindOptionsWhere<Lead> = {};
    if (query.status) {
      where.status = query.status;
    }
    if (query.qualificationLevel) {
      where.qualificationLevel = query.qualificationLevel;
    }
    if (query.minScore !== undefined && query.maxScore !== undefined) {
      where.leadScore = Between(query.minScore, query.maxScore);
    } else if (query.minScore !== undefined) {
      where.leadScore = MoreThanOrEqual(query.minScore);
    } else if (query.maxScore !== undefined) {
      where.leadScore = LessThanOrEqual(query.maxScore);
    }

    return this.leadRepository.find({
      where,
      order: { leadScore: 'DESC', id: 'ASC' },
      take: query.limit ?? DEFAULT_QUERY_LIMIT,
    });
  }

  async findOne(id: number): Promise<Lead> {
    const lead = await this.leadRepository.findOne({ where: { id } });
    if (!lead) {
      throw new NotFoundException(`Lead with ID ${id} not found`);
    }
    return lead;
  }

  async updateStatus(id: number, status: LeadStatus): Promise<Lead> {
    const lead = await this.findOne(id);
    lead.status = status;
    this.leadScorer.apply(lead);
    return this.leadRepository.save(lead);
  }

  ingestDiscoveries(records: unknown[]): Promise<BatchSummary> {
    return this.leadReconciler.ingestDiscoveries(records);
  }
}
