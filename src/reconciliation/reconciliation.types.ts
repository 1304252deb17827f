import { z } from 'zod';
import { LeadSource } from '../leads/lead.enums';
import { normalizeDomain } from './domain-predictor';

/**
 * Discovery collaborators (YouTube, Twitter, GitHub scans) post records in
 * snake_case; the reconciler works on the camelCase shape.
 */
export const DiscoveryRecordSchema = z
  .object({
    source: z.nativeEnum(LeadSource),
    external_id: z.string().trim().min(1).max(255),
    display_name: z.string().trim().min(1).max(255),
    raw_text: z.string().default(''),
    candidate_domains: z.array(z.string()).default([]),
    niche: z.string().trim().min(1).max(50).optional(),
  })
  .transform((record) => ({
    source: record.source,
    externalId: record.external_id,
    displayName: record.display_name,
    rawText: record.raw_text,
    candidateDomains: dedupe(
      record.candidate_domains
        .map((domain) => normalizeDomain(domain))
        .filter((domain): domain is string => domain !== null),
    ),
    nicheHint: record.niche,
  }));

export type DiscoveryRecordInput = z.input<typeof DiscoveryRecordSchema>;
export type DiscoveryRecord = z.output<typeof DiscoveryRecordSchema>;

export const EnrichmentResultSchema = z.object({
  email: z
    .string()
    .trim()
    .toLowerCase()
    .email()
    .max(255),
  confidence: z.number().int().min(0).max(100),
  verified: z.boolean(),
  domain: z.string().trim().toLowerCase().min(1),
});

export type EnrichmentResult = z.infer<typeof EnrichmentResultSchema>;

export interface DiscoveryOutcome {
  leadId: number;
  created: boolean;
}

/** Returned by every batch entry point instead of raising on partial failure. */
export interface BatchSummary {
  processed: number;
  created: number;
  updated: number;
  skipped: number;
  deferred: number;
  failed: number;
}

export function emptySummary(): BatchSummary {
  return {
    processed: 0,
    created: 0,
    updated: 0,
    skipped: 0,
    deferred: 0,
    failed: 0,
  };
}

export function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
