import { z } from 'zod';
import { LeadSource } from '../leads/lead.enums';

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const EnvironmentSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  DB_TYPE: z.enum(['postgres', 'better-sqlite3']).default('postgres'),
  DATABASE_URL: z.string().optional(),
  DATABASE_PATH: z.string().optional(),

  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  QUOTA_BACKEND: z.enum(['redis', 'memory']).default('redis'),

  ENRICHMENT_PROVIDER: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(['MOCK', 'HUNTER']))
    .default('MOCK'),
  HUNTER_API_KEY: z.string().optional(),
  HUNTER_MIN_CONFIDENCE: z.coerce.number().int().min(0).max(100).optional(),
  HUNTER_DAILY_QUOTA: z.coerce.number().int().min(0).optional(),
  HUNTER_QUOTA_RESET_HOUR_UTC: z.coerce.number().int().min(0).max(23).optional(),
  ENRICHMENT_BATCH_SIZE: z.coerce.number().int().positive().optional(),
  ENRICHMENT_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),

  PROTECTED_SOURCES: commaList.pipe(z.array(z.nativeEnum(LeadSource))).optional(),
  BUSINESS_KEYWORDS: commaList.optional(),
  PREMIUM_TLDS: commaList.optional(),
  DOMAIN_TLDS: commaList.optional(),
  DOMAIN_PREFIXES: commaList.optional(),
  DOMAIN_SUFFIXES: commaList.optional(),
  NICHE_KEYWORDS_PATH: z.string().optional(),
});

export type EnvironmentVariables = z.infer<typeof EnvironmentSchema>;

/**
 * `validate` hook for ConfigModule.forRoot. Unknown variables pass through
 * untouched so the rest of process.env stays readable.
 */
export function validateEnv(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const result = EnvironmentSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return { ...config, ...result.data };
}
