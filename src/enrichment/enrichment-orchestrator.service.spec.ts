import {
  BadGatewayException,
  BadRequestException,
  HttpStatus,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { getToken } from '@willsoto/nestjs-prometheus';
import { DeepPartial } from 'typeorm';
import {
  ENRICHMENT_ATTEMPTS_TOTAL,
  ENRICHMENT_CALL_DURATION,
} from '../common/metrics.providers';
import {
  LEAD_ENGINE_CONFIG,
  buildLeadEngineConfig,
} from '../config/lead-engine.config';
import { Lead } from '../leads/lead.entity';
import { LeadSource } from '../leads/lead.enums';
import { LeadReconciler } from '../reconciliation/lead-reconciler.service';
import { ProvenancePolicy } from '../reconciliation/provenance.policy';
import { EnrichmentCallStatus, EnrichmentLog } from './enrichment-log.entity';
import { EnrichmentOrchestrator } from './enrichment-orchestrator.service';
import { EMAIL_FINDER } from './interfaces/email-finder.interface';
import { InMemoryQuotaCounter } from './quota/in-memory-quota.counter';
import { ENRICHMENT_QUOTA } from './quota/quota-counter.interface';

function pendingLeads(count: number): Lead[] {
  return Array.from({ length: count }, (_, index) =>
    Object.assign(new Lead(), {
      id: index + 1,
      email: `unknown@creator${index + 1}.io`,
      source: LeadSource.YOUTUBE_CREATOR_SCRAPER,
      domain: `creator${index + 1}.io`,
      emailVerified: false,
      enrichmentAttempts: 0,
    }),
  );
}

function found(domain: string) {
  return {
    best: {
      email: `hello@${domain}`,
      confidence: 90,
      verified: true,
      domain,
    },
    emailsFound: 1,
  };
}

describe('EnrichmentOrchestrator', () => {
  let mockLeadRepository: { find: jest.Mock; count: jest.Mock };
  let mockLogRepository: {
    create: jest.Mock;
    save: jest.Mock;
    find: jest.Mock;
  };
  let mockReconciler: {
    recordEnrichmentAttempt: jest.Mock;
    ingestEnrichment: jest.Mock;
  };
  let mockFinder: { name: string; findEmail: jest.Mock };
  const mockAttemptsCounter = { inc: jest.fn() };
  const mockCallDuration = { startTimer: jest.fn(() => jest.fn()) };

  async function createOrchestrator(
    quotaLimit: number,
  ): Promise<EnrichmentOrchestrator> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EnrichmentOrchestrator,
        ProvenancePolicy,
        { provide: LEAD_ENGINE_CONFIG, useValue: buildLeadEngineConfig() },
        { provide: getRepositoryToken(Lead), useValue: mockLeadRepository },
        {
          provide: getRepositoryToken(EnrichmentLog),
          useValue: mockLogRepository,
        },
        { provide: LeadReconciler, useValue: mockReconciler },
        { provide: EMAIL_FINDER, useValue: mockFinder },
        {
          provide: ENRICHMENT_QUOTA,
          useValue: new InMemoryQuotaCounter(quotaLimit),
        },
        {
          provide: getToken(ENRICHMENT_ATTEMPTS_TOTAL),
          useValue: mockAttemptsCounter,
        },
        {
          provide: getToken(ENRICHMENT_CALL_DURATION),
          useValue: mockCallDuration,
        },
      ],
    }).compile();

    return module.get<EnrichmentOrchestrator>(EnrichmentOrchestrator);
  }

  beforeEach(() => {
    mockLeadRepository = {
      find: jest.fn().mockResolvedValue(pendingLeads(5)),
      count: jest.fn().mockResolvedValue(5),
    };
    mockLogRepository = {
      create: jest.fn((entry: DeepPartial<EnrichmentLog>) => entry),
      save: jest.fn((entry: DeepPartial<EnrichmentLog>) =>
        Promise.resolve(entry),
      ),
      find: jest.fn().mockResolvedValue([]),
    };
    mockReconciler = {
      recordEnrichmentAttempt: jest.fn().mockResolvedValue(undefined),
      ingestEnrichment: jest.fn().mockResolvedValue(true),
    };
    mockFinder = {
      name: 'mock',
      findEmail: jest.fn((domain: string) => Promise.resolve(found(domain))),
    };
  });

  it('should query pending leads oldest first', async () => {
    const orchestrator = await createOrchestrator(25);

    await orchestrator.findPending();

    expect(mockLeadRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({
        order: { createdAt: 'ASC', id: 'ASC' },
        take: 100,
      }),
    );
  });

  it('should stop at the daily quota and defer the rest', async () => {
    const orchestrator = await createOrchestrator(2);

    const summary = await orchestrator.run();

    expect(summary).toEqual({
      runId: expect.stringMatching(/^[0-9a-f-]{36}$/),
      processed: 2,
      created: 0,
      updated: 2,
      skipped: 0,
      deferred: 3,
      failed: 0,
    });
    expect(mockFinder.findEmail).toHaveBeenCalledTimes(2);
    expect(mockFinder.findEmail).toHaveBeenNthCalledWith(1, 'creator1.io');
    expect(mockFinder.findEmail).toHaveBeenNthCalledWith(2, 'creator2.io');
    expect(mockReconciler.recordEnrichmentAttempt).toHaveBeenCalledTimes(2);
  });

  it('should count leads beyond the batch as deferred', async () => {
    mockLeadRepository.find.mockResolvedValue(pendingLeads(2));
    mockLeadRepository.count.mockResolvedValue(7);
    const orchestrator = await createOrchestrator(10);

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({ processed: 2, updated: 2, deferred: 5 });
  });

  it('should keep going after a failed lookup', async () => {
    mockLeadRepository.find.mockResolvedValue(pendingLeads(3));
    mockLeadRepository.count.mockResolvedValue(3);
    mockFinder.findEmail
      .mockRejectedValueOnce(new Error('Breaker is open'))
      .mockResolvedValueOnce(found('creator2.io'))
      .mockResolvedValueOnce({ best: null, emailsFound: 0 });
    const orchestrator = await createOrchestrator(10);

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({
      processed: 3,
      updated: 1,
      skipped: 1,
      failed: 1,
      deferred: 0,
    });
    expect(
      mockLogRepository.save.mock.calls.map(
        ([entry]: [DeepPartial<EnrichmentLog>]) => entry.status,
      ),
    ).toEqual([
      EnrichmentCallStatus.FAILED,
      EnrichmentCallStatus.FOUND,
      EnrichmentCallStatus.EMPTY,
    ]);
    expect(mockReconciler.ingestEnrichment).toHaveBeenCalledWith(
      2,
      found('creator2.io').best,
    );
  });

  it('should count a refused result as skipped', async () => {
    mockLeadRepository.find.mockResolvedValue(pendingLeads(1));
    mockReconciler.ingestEnrichment.mockResolvedValue(false);
    const orchestrator = await createOrchestrator(10);

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({ processed: 1, updated: 0, skipped: 1 });
    expect(mockAttemptsCounter.inc).toHaveBeenCalledWith({ status: 'refused' });
  });

  it('should count a storage failure while applying as failed', async () => {
    mockLeadRepository.find.mockResolvedValue(pendingLeads(2));
    mockReconciler.ingestEnrichment
      .mockRejectedValueOnce(new Error('db down'))
      .mockResolvedValueOnce(true);
    const orchestrator = await createOrchestrator(10);

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({ processed: 2, updated: 1, failed: 1 });
  });

  it('should not stop when the call log cannot be written', async () => {
    mockLeadRepository.find.mockResolvedValue(pendingLeads(2));
    mockLogRepository.save.mockRejectedValue(new Error('disk full'));
    const orchestrator = await createOrchestrator(10);

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({ processed: 2, updated: 2, failed: 0 });
  });

  it('should defer everything left once aborted', async () => {
    const controller = new AbortController();
    mockFinder.findEmail.mockImplementation((domain: string) => {
      controller.abort();
      return Promise.resolve(found(domain));
    });
    const orchestrator = await createOrchestrator(10);

    const summary = await orchestrator.run({ signal: controller.signal });

    expect(summary).toMatchObject({ processed: 1, updated: 1, deferred: 4 });
  });

  describe('history', () => {
    it('should list calls newest first', async () => {
      const orchestrator = await createOrchestrator(10);

      await orchestrator.history(20);

      expect(mockLogRepository.find).toHaveBeenCalledWith({
        order: { timestamp: 'DESC', id: 'DESC' },
        take: 20,
      });
    });
  });

  describe('lookupDomain', () => {
    it('should normalize the domain, spend quota and log the call', async () => {
      const orchestrator = await createOrchestrator(10);

      const result = await orchestrator.lookupDomain('https://www.Acme.io/about');

      expect(result).toEqual({
        domain: 'acme.io',
        provider: 'mock',
        ...found('acme.io'),
      });
      expect(mockFinder.findEmail).toHaveBeenCalledWith('acme.io');
      expect(mockLogRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({
          leadId: null,
          domain: 'acme.io',
          status: EnrichmentCallStatus.FOUND,
          applied: false,
        }),
      );
      expect(mockReconciler.ingestEnrichment).not.toHaveBeenCalled();
    });

    it('should reject values that are not company domains', async () => {
      const orchestrator = await createOrchestrator(10);

      await expect(orchestrator.lookupDomain('gmail.com')).rejects.toBeInstanceOf(
        BadRequestException,
      );
      expect(mockFinder.findEmail).not.toHaveBeenCalled();
    });

    it('should refuse once the quota is spent', async () => {
      const orchestrator = await createOrchestrator(0);

      await expect(orchestrator.lookupDomain('acme.io')).rejects.toMatchObject({
        status: HttpStatus.TOO_MANY_REQUESTS,
      });
      expect(mockFinder.findEmail).not.toHaveBeenCalled();
    });

    it('should log and report a failed lookup', async () => {
      mockFinder.findEmail.mockRejectedValueOnce(new Error('Breaker is open'));
      const orchestrator = await createOrchestrator(10);

      await expect(orchestrator.lookupDomain('acme.io')).rejects.toBeInstanceOf(
        BadGatewayException,
      );
      expect(mockLogRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({
          status: EnrichmentCallStatus.FAILED,
          errorMessage: 'Breaker is open',
        }),
      );
    });
  });
});
