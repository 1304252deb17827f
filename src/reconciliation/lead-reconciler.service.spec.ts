import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { getToken } from '@willsoto/nestjs-prometheus';
import { DeepPartial, QueryFailedError } from 'typeorm';
import { LEADS_INGESTED_TOTAL } from '../common/metrics.providers';
import {
  LEAD_ENGINE_CONFIG,
  buildLeadEngineConfig,
} from '../config/lead-engine.config';
import { Lead } from '../leads/lead.entity';
import {
  LeadSource,
  LeadStatus,
  QualificationLevel,
} from '../leads/lead.enums';
import { DomainPredictor } from './domain-predictor';
import { LeadReconciler } from './lead-reconciler.service';
import { LeadScorer } from './lead-scoring';
import { NicheClassifier } from './niche-classifier';
import { ProvenancePolicy } from './provenance.policy';
import {
  DiscoveryRecordInput,
  DiscoveryRecordSchema,
} from './reconciliation.types';

function makeLead(overrides: DeepPartial<Lead> = {}): Lead {
  return Object.assign(new Lead(), {
    id: 1,
    email: 'unknown@fireship.io',
    source: LeadSource.YOUTUBE_CREATOR_SCRAPER,
    externalId: 'UC123',
    displayName: 'Fireship',
    domain: 'fireship.io',
    candidateDomains: ['fireship.io'],
    niche: null,
    nicheConfidence: null,
    status: LeadStatus.NEW,
    qualificationLevel: QualificationLevel.COLD,
    leadScore: 20,
    emailConfidence: null,
    emailVerified: false,
    enrichmentAttempts: 0,
    enrichedAt: null,
    ...overrides,
  });
}

function uniqueViolation(): QueryFailedError {
  return new QueryFailedError(
    'INSERT INTO "leads"',
    [],
    Object.assign(new Error('duplicate key value'), { code: '23505' }),
  );
}

const fireship: DiscoveryRecordInput = {
  source: LeadSource.YOUTUBE_CREATOR_SCRAPER,
  external_id: 'UC123',
  display_name: 'Fireship',
  candidate_domains: ['https://fireship.io'],
};

describe('LeadReconciler', () => {
  let reconciler: LeadReconciler;
  let mockLeadRepository: {
    findOne: jest.Mock;
    create: jest.Mock;
    save: jest.Mock;
    increment: jest.Mock;
  };
  const mockCounter = { inc: jest.fn() };

  beforeEach(async () => {
    mockLeadRepository = {
      findOne: jest.fn().mockResolvedValue(null),
      create: jest.fn((data: DeepPartial<Lead>) =>
        Object.assign(new Lead(), data),
      ),
      save: jest.fn((lead: Lead) =>
        Promise.resolve(Object.assign(lead, { id: lead.id ?? 1 })),
      ),
      increment: jest.fn().mockResolvedValue({ affected: 1 }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LeadReconciler,
        DomainPredictor,
        NicheClassifier,
        ProvenancePolicy,
        LeadScorer,
        {
          provide: LEAD_ENGINE_CONFIG,
          useValue: buildLeadEngineConfig(),
        },
        {
          provide: getRepositoryToken(Lead),
          useValue: mockLeadRepository,
        },
        {
          provide: getToken(LEADS_INGESTED_TOTAL),
          useValue: mockCounter,
        },
      ],
    }).compile();

    reconciler = module.get<LeadReconciler>(LeadReconciler);
  });

  describe('ingestDiscovery', () => {
    it('should create a lead with a placeholder from the first candidate', async () => {
      const record = DiscoveryRecordSchema.parse({
        ...fireship,
        raw_text: 'high-intensity code tutorials',
      });

      const result = await reconciler.ingestDiscovery(record);

      expect(result).toEqual({ leadId: 1, created: true });
      const saved: Lead = mockLeadRepository.save.mock.calls[0][0];
      expect(saved.email).toBe('unknown@fireship.io');
      expect(saved.domain).toBe('fireship.io');
      expect(saved.candidateDomains).toEqual(['fireship.io']);
      expect(saved.leadScore).toBe(20);
      expect(saved.qualificationLevel).toBe(QualificationLevel.COLD);
      expect(saved.niche).toBe('education');
      expect(saved.nicheConfidence).toBeCloseTo(2 / 13);
    });

    it('should predict domains when the record carries none', async () => {
      const record = DiscoveryRecordSchema.parse({
        source: LeadSource.YOUTUBE_CREATOR_SCRAPER,
        external_id: 'UC999',
        display_name: 'Business Basics',
        candidate_domains: ['https://youtube.com/@businessbasics'],
      });

      await reconciler.ingestDiscovery(record);

      const saved: Lead = mockLeadRepository.save.mock.calls[0][0];
      expect(saved.email).toBe('unknown@businessbasics.com');
      expect(saved.candidateDomains).toHaveLength(6);
      expect(saved.domain).toBe('businessbasics.com');
      expect(saved.leadScore).toBe(45);
      expect(saved.niche).toBe('business');
    });

    it('should derive a placeholder from the external id when nothing is predicted', async () => {
      const record = DiscoveryRecordSchema.parse({
        source: LeadSource.TWITTER_ENHANCEMENT,
        external_id: 'UC_Ab/9',
        display_name: 'X',
      });

      await reconciler.ingestDiscovery(record);

      const saved: Lead = mockLeadRepository.save.mock.calls[0][0];
      expect(saved.email).toBe('unknown@uc-ab-9.invalid');
      expect(saved.domain).toBeNull();
      expect(saved.candidateDomains).toEqual([]);
    });

    it('should merge a repeat sighting into the existing lead', async () => {
      mockLeadRepository.findOne.mockResolvedValue(makeLead({ id: 7 }));
      const record = DiscoveryRecordSchema.parse({
        ...fireship,
        display_name: 'Fireship.io',
        candidate_domains: ['fireship.dev', 'fireship.io'],
      });

      const result = await reconciler.ingestDiscovery(record);

      expect(result).toEqual({ leadId: 7, created: false });
      const saved: Lead = mockLeadRepository.save.mock.calls[0][0];
      expect(saved.displayName).toBe('Fireship.io');
      expect(saved.candidateDomains).toEqual(['fireship.io', 'fireship.dev']);
      expect(saved.domain).toBe('fireship.io');
      expect(saved.email).toBe('unknown@fireship.io');
      expect(mockLeadRepository.create).not.toHaveBeenCalled();
    });

    it('should not write when an identical record is ingested again', async () => {
      mockLeadRepository.findOne.mockResolvedValue(makeLead());

      const result = await reconciler.ingestDiscovery(
        DiscoveryRecordSchema.parse(fireship),
      );

      expect(result).toEqual({ leadId: 1, created: false });
      expect(mockLeadRepository.save).not.toHaveBeenCalled();
    });

    it('should retry as an update when another writer created the identity first', async () => {
      const existing = makeLead({ id: 3, displayName: 'Old Name' });
      mockLeadRepository.findOne
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(existing)
        .mockResolvedValueOnce(existing);
      mockLeadRepository.save
        .mockRejectedValueOnce(uniqueViolation())
        .mockImplementationOnce((lead: Lead) => Promise.resolve(lead));

      const result = await reconciler.ingestDiscovery(
        DiscoveryRecordSchema.parse(fireship),
      );

      expect(result).toEqual({ leadId: 3, created: false });
      expect(mockLeadRepository.save).toHaveBeenCalledTimes(2);
      expect(existing.displayName).toBe('Fireship');
    });

    it('should keep an enrichment applied while a sighting is being merged', async () => {
      let row = makeLead();
      mockLeadRepository.findOne.mockImplementation(
        ({ where }: { where: { email?: string } }) =>
          Promise.resolve(
            where.email === undefined || where.email === row.email
              ? Object.assign(new Lead(), row)
              : null,
          ),
      );
      // Writes of placeholder rows land last, as a slow merge would.
      mockLeadRepository.save.mockImplementation(async (lead: Lead) => {
        const latency = lead.email.startsWith('unknown@') ? 30 : 0;
        await new Promise((resolve) => setTimeout(resolve, latency));
        row = Object.assign(new Lead(), lead);
        return lead;
      });

      const [merged, applied] = await Promise.all([
        reconciler.ingestDiscovery(
          DiscoveryRecordSchema.parse({
            ...fireship,
            display_name: 'Fireship Renamed',
          }),
        ),
        reconciler.ingestEnrichment(1, {
          email: 'contact@fireship.io',
          confidence: 94,
          verified: true,
          domain: 'fireship.io',
        }),
      ]);

      expect(merged).toEqual({ leadId: 1, created: false });
      expect(applied).toBe(true);
      expect(row).toMatchObject({
        email: 'contact@fireship.io',
        emailConfidence: 94,
        emailVerified: true,
        displayName: 'Fireship Renamed',
        leadScore: 45,
      });
    });
  });

  describe('ingestDiscoveries', () => {
    const second: DiscoveryRecordInput = {
      source: LeadSource.GITHUB_ENHANCEMENT,
      external_id: 'octo',
      display_name: 'Octo Dev',
      candidate_domains: ['octo.dev'],
    };

    it('should skip malformed records and count failures without stopping', async () => {
      mockLeadRepository.save
        .mockImplementationOnce((lead: Lead) =>
          Promise.resolve(Object.assign(lead, { id: 1 })),
        )
        .mockRejectedValueOnce(new Error('connection lost'));

      const summary = await reconciler.ingestDiscoveries([
        fireship,
        { source: 'fax', external_id: 'x' },
        second,
      ]);

      expect(summary).toEqual({
        processed: 3,
        created: 1,
        updated: 0,
        skipped: 1,
        deferred: 0,
        failed: 1,
      });
    });

    it('should defer the rest of the batch once aborted', async () => {
      const controller = new AbortController();
      mockLeadRepository.save.mockImplementation((lead: Lead) => {
        controller.abort();
        return Promise.resolve(Object.assign(lead, { id: 1 }));
      });

      const summary = await reconciler.ingestDiscoveries(
        [fireship, second, { ...second, external_id: 'octo-2' }],
        controller.signal,
      );

      expect(summary).toEqual({
        processed: 1,
        created: 1,
        updated: 0,
        skipped: 0,
        deferred: 2,
        failed: 0,
      });
    });
  });

  describe('ingestEnrichment', () => {
    const result = {
      email: 'Contact@Fireship.io',
      confidence: 94,
      verified: true,
      domain: 'fireship.io',
    };

    it('should replace a placeholder and rescore', async () => {
      const lead = makeLead();
      mockLeadRepository.findOne
        .mockResolvedValueOnce(lead)
        .mockResolvedValueOnce(null);

      await expect(reconciler.ingestEnrichment(1, result)).resolves.toBe(true);

      expect(lead.email).toBe('contact@fireship.io');
      expect(lead.emailConfidence).toBe(94);
      expect(lead.emailVerified).toBe(true);
      expect(lead.enrichedAt).toBeInstanceOf(Date);
      expect(lead.leadScore).toBe(45);
      expect(lead.qualificationLevel).toBe(QualificationLevel.WARM);
      expect(mockLeadRepository.save).toHaveBeenCalledWith(lead);
    });

    it('should never overwrite a protected lead', async () => {
      mockLeadRepository.findOne.mockResolvedValueOnce(
        makeLead({ source: LeadSource.MANUAL, email: 'ceo@fireship.io' }),
      );

      await expect(reconciler.ingestEnrichment(1, result)).resolves.toBe(false);
      expect(mockLeadRepository.save).not.toHaveBeenCalled();
    });

    it('should refuse a low-confidence result for a live email', async () => {
      mockLeadRepository.findOne.mockResolvedValueOnce(
        makeLead({ email: 'old@fireship.io' }),
      );

      await expect(
        reconciler.ingestEnrichment(1, { ...result, confidence: 30 }),
      ).resolves.toBe(false);
      expect(mockLeadRepository.save).not.toHaveBeenCalled();
    });

    it('should refuse placeholder emails as results', async () => {
      mockLeadRepository.findOne.mockResolvedValueOnce(makeLead());

      await expect(
        reconciler.ingestEnrichment(1, { ...result, email: 'unknown@fireship.io' }),
      ).resolves.toBe(false);
    });

    it('should refuse an email that another lead already holds', async () => {
      mockLeadRepository.findOne
        .mockResolvedValueOnce(makeLead())
        .mockResolvedValueOnce(makeLead({ id: 2, email: 'contact@fireship.io' }));

      await expect(reconciler.ingestEnrichment(1, result)).resolves.toBe(false);
      expect(mockLeadRepository.save).not.toHaveBeenCalled();
    });

    it('should refuse when the email is claimed between check and write', async () => {
      mockLeadRepository.findOne.mockResolvedValueOnce(makeLead());
      mockLeadRepository.save.mockRejectedValueOnce(uniqueViolation());

      await expect(reconciler.ingestEnrichment(1, result)).resolves.toBe(false);
    });

    it('should ignore malformed results and missing leads', async () => {
      await expect(
        reconciler.ingestEnrichment(1, { email: 'nope', confidence: 120 }),
      ).resolves.toBe(false);
      expect(mockLeadRepository.findOne).not.toHaveBeenCalled();

      await expect(reconciler.ingestEnrichment(404, result)).resolves.toBe(false);
    });

    it('should propagate storage outages', async () => {
      mockLeadRepository.findOne.mockResolvedValueOnce(makeLead());
      mockLeadRepository.save.mockRejectedValueOnce(new Error('db down'));

      await expect(reconciler.ingestEnrichment(1, result)).rejects.toThrow(
        'db down',
      );
    });
  });

  describe('recordEnrichmentAttempt', () => {
    it('should increment the attempt counter atomically', async () => {
      await reconciler.recordEnrichmentAttempt(5);

      expect(mockLeadRepository.increment).toHaveBeenCalledWith(
        { id: 5 },
        'enrichmentAttempts',
        1,
      );
    });
  });
});
