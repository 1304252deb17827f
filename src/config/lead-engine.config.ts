import { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_PROTECTED_SOURCES, LeadSource } from '../leads/lead.enums';

export const LEAD_ENGINE_CONFIG = 'LEAD_ENGINE_CONFIG';

export const DEFAULT_NICHE_KEYWORDS_PATH = path.resolve(
  __dirname,
  '..',
  '..',
  'config',
  'niche-keywords.json',
);

/** niche label -> keyword -> weight */
export type NicheTable = Readonly<Record<string, Readonly<Record<string, number>>>>;

export interface DomainPredictionOptions {
  tlds: string[];
  prefixes: string[];
  suffixes: string[];
  maxCandidates: number;
}

export interface ScoringOptions {
  premiumTlds: string[];
  businessKeywords: string[];
}

export interface LeadEngineConfig {
  minEnrichmentConfidence: number;
  dailyEnrichmentQuota: number;
  quotaResetHourUtc: number;
  enrichmentBatchSize: number;
  maxEnrichmentAttempts: number;
  protectedSources: ReadonlySet<LeadSource>;
  niches: NicheTable;
  domainPrediction: DomainPredictionOptions;
  scoring: ScoringOptions;
}

export interface LeadEngineConfigInput {
  minEnrichmentConfidence?: number;
  dailyEnrichmentQuota?: number;
  quotaResetHourUtc?: number;
  enrichmentBatchSize?: number;
  maxEnrichmentAttempts?: number;
  protectedSources?: LeadSource[];
  niches?: unknown;
  domainPrediction?: Partial<DomainPredictionOptions>;
  scoring?: Partial<ScoringOptions>;
}

const tld = z
  .string()
  .regex(/^\.[a-z0-9-]+(\.[a-z0-9-]+)*$/, 'TLDs must look like ".com"');

export const NicheTableSchema = z
  .record(
    z.string().trim().min(1),
    z
      .record(z.string().trim().min(1), z.number().positive())
      .refine((keywords) => Object.keys(keywords).length > 0, {
        message: 'keyword set must not be empty',
      }),
  )
  .superRefine((table, ctx) => {
    const owners = new Map<string, string>();
    for (const [niche, keywords] of Object.entries(table)) {
      for (const keyword of Object.keys(keywords)) {
        const normalized = keyword.toLowerCase();
        const owner = owners.get(normalized);
        if (owner) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [niche, keyword],
            message: `keyword "${keyword}" is already assigned to niche "${owner}"`,
          });
        } else {
          owners.set(normalized, niche);
        }
      }
    }
  });

const LeadEngineConfigSchema = z.object({
  minEnrichmentConfidence: z.number().int().min(0).max(100),
  dailyEnrichmentQuota: z.number().int().min(0),
  quotaResetHourUtc: z.number().int().min(0).max(23),
  enrichmentBatchSize: z.number().int().positive(),
  maxEnrichmentAttempts: z.number().int().positive(),
  protectedSources: z.array(z.nativeEnum(LeadSource)),
  niches: NicheTableSchema,
  domainPrediction: z.object({
    tlds: z.array(tld).min(1),
    prefixes: z.array(z.string().regex(/^[a-z0-9]+$/)),
    suffixes: z.array(z.string().regex(/^[a-z0-9]+$/)),
    maxCandidates: z.number().int().positive(),
  }),
  scoring: z.object({
    premiumTlds: z.array(tld),
    businessKeywords: z.array(z.string().min(1)),
  }),
});

export const LEAD_ENGINE_DEFAULTS = {
  minEnrichmentConfidence: 50,
  dailyEnrichmentQuota: 25,
  quotaResetHourUtc: 0,
  enrichmentBatchSize: 100,
  maxEnrichmentAttempts: 3,
  domainPrediction: {
    tlds: ['.com', '.net', '.org', '.co'],
    prefixes: ['the'],
    suffixes: ['official'],
    maxCandidates: 6,
  },
  scoring: {
    premiumTlds: ['.com', '.org', '.net'],
    businessKeywords: [
      'business',
      'entrepreneur',
      'marketing',
      'consulting',
      'coach',
      'agency',
    ],
  },
} as const;

export function loadNicheTable(
  filePath: string = DEFAULT_NICHE_KEYWORDS_PATH,
): NicheTable {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  const parsed = NicheTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid niche keyword table at ${filePath}: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
  }
  return parsed.data;
}

/**
 * Merges overrides onto the defaults and validates the result. Throws on
 * anything the reconciliation engine could not run with.
 */
export function buildLeadEngineConfig(
  input: LeadEngineConfigInput = {},
): LeadEngineConfig {
  const candidate = {
    minEnrichmentConfidence:
      input.minEnrichmentConfidence ??
      LEAD_ENGINE_DEFAULTS.minEnrichmentConfidence,
    dailyEnrichmentQuota:
      input.dailyEnrichmentQuota ?? LEAD_ENGINE_DEFAULTS.dailyEnrichmentQuota,
    quotaResetHourUtc:
      input.quotaResetHourUtc ?? LEAD_ENGINE_DEFAULTS.quotaResetHourUtc,
    enrichmentBatchSize:
      input.enrichmentBatchSize ?? LEAD_ENGINE_DEFAULTS.enrichmentBatchSize,
    maxEnrichmentAttempts:
      input.maxEnrichmentAttempts ?? LEAD_ENGINE_DEFAULTS.maxEnrichmentAttempts,
    protectedSources: input.protectedSources ?? [...DEFAULT_PROTECTED_SOURCES],
    niches: input.niches ?? loadNicheTable(),
    domainPrediction: {
      tlds:
        input.domainPrediction?.tlds ?? [
          ...LEAD_ENGINE_DEFAULTS.domainPrediction.tlds,
        ],
      prefixes:
        input.domainPrediction?.prefixes ?? [
          ...LEAD_ENGINE_DEFAULTS.domainPrediction.prefixes,
        ],
      suffixes:
        input.domainPrediction?.suffixes ?? [
          ...LEAD_ENGINE_DEFAULTS.domainPrediction.suffixes,
        ],
      maxCandidates:
        input.domainPrediction?.maxCandidates ??
        LEAD_ENGINE_DEFAULTS.domainPrediction.maxCandidates,
    },
    scoring: {
      premiumTlds: input.scoring?.premiumTlds ?? [
        ...LEAD_ENGINE_DEFAULTS.scoring.premiumTlds,
      ],
      businessKeywords: (
        input.scoring?.businessKeywords ?? [
          ...LEAD_ENGINE_DEFAULTS.scoring.businessKeywords,
        ]
      ).map((keyword) => keyword.toLowerCase()),
    },
  };

  const parsed = LeadEngineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(
      `Invalid lead engine configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
  }

  return {
    ...parsed.data,
    protectedSources: new Set(parsed.data.protectedSources),
  };
}

export const leadEngineConfigProvider: FactoryProvider<LeadEngineConfig> = {
  provide: LEAD_ENGINE_CONFIG,
  useFactory: (configService: ConfigService) => {
    const nichePath = configService.get<string>('NICHE_KEYWORDS_PATH');
    return buildLeadEngineConfig({
      minEnrichmentConfidence: configService.get<number>(
        'HUNTER_MIN_CONFIDENCE',
      ),
      dailyEnrichmentQuota: configService.get<number>('HUNTER_DAILY_QUOTA'),
      quotaResetHourUtc: configService.get<number>(
        'HUNTER_QUOTA_RESET_HOUR_UTC',
      ),
      enrichmentBatchSize: configService.get<number>('ENRICHMENT_BATCH_SIZE'),
      maxEnrichmentAttempts: configService.get<number>(
        'ENRICHMENT_MAX_ATTEMPTS',
      ),
      protectedSources: configService.get<LeadSource[]>('PROTECTED_SOURCES'),
      niches: nichePath ? loadNicheTable(path.resolve(nichePath)) : undefined,
      domainPrediction: {
        tlds: configService.get<string[]>('DOMAIN_TLDS'),
        prefixes: configService.get<string[]>('DOMAIN_PREFIXES'),
        suffixes: configService.get<string[]>('DOMAIN_SUFFIXES'),
      },
      scoring: {
        premiumTlds: configService.get<string[]>('PREMIUM_TLDS'),
        businessKeywords: configService.get<string[]>('BUSINESS_KEYWORDS'),
      },
    });
  },
  inject: [ConfigService],
};
