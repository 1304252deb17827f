import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { Logger, OnApplicationShutdown } from '@nestjs/common';
import {
  EnrichmentOrchestrator,
  EnrichmentRunSummary,
} from './enrichment-orchestrator.service';

export const ENRICHMENT_QUEUE = 'lead-enrichment';
export const RUN_ENRICHMENT_JOB = 'run-enrichment';

/** Data payload for an enrichment run job */
export interface EnrichmentJobData {
  requestedAt: string;
}

/**
 * Runs the orchestrator off the request path. Shutting the app down aborts
 * the active runs, and leads they had not reached are left for the next one.
 */
@Processor(ENRICHMENT_QUEUE)
export class EnrichmentProcessor
  extends WorkerHost
  implements OnApplicationShutdown
{
  private readonly logger = new Logger(EnrichmentProcessor.name);
  private readonly active = new Set<AbortController>();

  constructor(private readonly orchestrator: EnrichmentOrchestrator) {
    super();
  }

  async process(
    job: Job<EnrichmentJobData, EnrichmentRunSummary, string>,
  ): Promise<EnrichmentRunSummary> {
    this.logger.log(
      `Job ${job.id ?? 'unknown'} requested at ${job.data.requestedAt}`,
    );

    const controller = new AbortController();
    this.active.add(controller);
    try {
      return await this.orchestrator.run({ signal: controller.signal });
    } finally {
      this.active.delete(controller);
    }
  }

  onApplicationShutdown(): void {
    for (const controller of this.active) {
      controller.abort();
    }
  }
}
