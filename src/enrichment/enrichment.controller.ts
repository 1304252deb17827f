import {
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { Lead } from '../leads/lead.entity';
import { EnrichmentLog } from './enrichment-log.entity';
import {
  DomainLookupResult,
  EnrichmentOrchestrator,
  EnrichmentRunSummary,
} from './enrichment-orchestrator.service';
import {
  EnrichmentStats,
  EnrichmentStatsService,
} from './enrichment-stats.service';
import {
  ENRICHMENT_QUEUE,
  EnrichmentJobData,
  RUN_ENRICHMENT_JOB,
} from './enrichment.processor';

@Controller('enrichment')
export class EnrichmentController {
  constructor(
    private readonly orchestrator: EnrichmentOrchestrator,
    private readonly statsService: EnrichmentStatsService,
    @InjectQueue(ENRICHMENT_QUEUE)
    private readonly enrichmentQueue: Queue<EnrichmentJobData>,
  ) {}

  @Post('run')
  @HttpCode(HttpStatus.ACCEPTED)
  async enqueueRun(): Promise<{ jobId: string | undefined }> {
    const job = await this.enrichmentQueue.add(
      RUN_ENRICHMENT_JOB,
      { requestedAt: new Date().toISOString() },
      { removeOnComplete: 100, removeOnFail: 100 },
    );
    return { jobId: job.id };
  }

  @Post('run-sync')
  @HttpCode(HttpStatus.OK)
  runNow(): Promise<EnrichmentRunSummary> {
    return this.orchestrator.run();
  }

  @Get('pending')
  pending(
    @Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit: number,
  ): Promise<Lead[]> {
    return this.orchestrator.findPending(Math.min(Math.max(limit, 1), 500));
  }

  @Get('history')
  history(
    @Query('limit', new DefaultValuePipe(100), ParseIntPipe) limit: number,
  ): Promise<EnrichmentLog[]> {
    return this.orchestrator.history(Math.min(Math.max(limit, 1), 500));
  }

  @Post('domain/:domain')
  @HttpCode(HttpStatus.OK)
  lookupDomain(@Param('domain') domain: string): Promise<DomainLookupResult> {
    return this.orchestrator.lookupDomain(domain);
  }

  @Get('stats')
  stats(): Promise<EnrichmentStats> {
    return this.statsService.getStats();
  }
}
