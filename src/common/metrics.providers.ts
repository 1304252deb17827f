import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const LEADS_INGESTED_TOTAL = 'leads_ingested_total';
export const ENRICHMENT_ATTEMPTS_TOTAL = 'enrichment_attempts_total';
export const ENRICHMENT_CALL_DURATION = 'enrichment_call_duration_seconds';

export const reconciliationMetricsProviders = [
  makeCounterProvider({
    name: LEADS_INGESTED_TOTAL,
    help: 'Discovery and enrichment records reconciled into leads',
    labelNames: ['outcome'],
  }),
];

export const enrichmentMetricsProviders = [
  makeCounterProvider({
    name: ENRICHMENT_ATTEMPTS_TOTAL,
    help: 'Email finder attempts by outcome',
    labelNames: ['status'],
  }),
  makeHistogramProvider({
    name: ENRICHMENT_CALL_DURATION,
    help: 'Duration of email finder calls in seconds',
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  }),
];
