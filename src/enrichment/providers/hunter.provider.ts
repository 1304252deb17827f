import { Logger } from '@nestjs/common';
import axios from 'axios';
import CircuitBreaker from 'opossum';
import { z } from 'zod';
import { CircuitBreakerFactory } from '../../common/circuit-breaker.factory';
import type { EnrichmentResult } from '../../reconciliation/reconciliation.types';
import { EmailFinder, EmailLookup } from '../interfaces/email-finder.interface';

export const HUNTER_API_BASE_URL = 'https://api.hunter.io/v2';
export const VERIFIED_CONFIDENCE = 70;
const VERIFICATION_BONUS = 10;
const RESULT_LIMIT = 10;

const HunterEmailSchema = z.object({
  value: z.string(),
  type: z.string().nullish(),
  confidence: z.number().nullish(),
  verification: z
    .object({ status: z.string().nullish() })
    .nullish(),
});

const HunterDomainSearchSchema = z.object({
  data: z
    .object({
      domain: z.string().nullish(),
      emails: z.array(HunterEmailSchema).default([]),
    })
    .nullish(),
  errors: z
    .array(z.object({ id: z.string().optional(), details: z.string().optional() }))
    .optional(),
});

export type HunterEmail = z.infer<typeof HunterEmailSchema>;

export interface HunterOptions {
  apiKey?: string;
  minConfidence: number;
  timeoutMs?: number;
}

function isValid(email: HunterEmail): boolean {
  return email.verification?.status === 'valid';
}

/**
 * Filters by minimum confidence, then ranks by confidence with a bonus for
 * emails Hunter has verified as valid.
 */
export function selectBestEmail(
  emails: HunterEmail[],
  domain: string,
  minConfidence: number,
): EnrichmentResult | null {
  let best: HunterEmail | null = null;
  let bestRank = -1;

  for (const email of emails) {
    const confidence = email.confidence ?? 0;
    if (confidence < minConfidence) continue;
    const rank = confidence + (isValid(email) ? VERIFICATION_BONUS : 0);
    if (rank > bestRank) {
      best = email;
      bestRank = rank;
    }
  }

  if (!best) return null;
  const confidence = Math.round(best.confidence ?? 0);
  return {
    email: best.value.trim().toLowerCase(),
    confidence,
    verified: isValid(best) || confidence >= VERIFIED_CONFIDENCE,
    domain,
  };
}

export class HunterEmailFinder implements EmailFinder {
  readonly name = 'hunter';
  private readonly logger = new Logger(HunterEmailFinder.name);
  private readonly breaker: CircuitBreaker<[string], HunterEmail[]>;

  constructor(
    private readonly options: HunterOptions,
    breakerFactory: CircuitBreakerFactory,
  ) {
    this.breaker = breakerFactory.createBreaker(
      'hunter',
      (domain: string) => this.domainSearch(domain),
      { timeout: options.timeoutMs ?? 15000 },
    );
  }

  async findEmail(domain: string): Promise<EmailLookup> {
    const emails = await this.breaker.fire(domain);
    const best = selectBestEmail(emails, domain, this.options.minConfidence);
    if (!best && emails.length > 0) {
      this.logger.log(`No email for ${domain} meets minimum confidence`);
    }
    return { best, emailsFound: emails.length };
  }

  private async domainSearch(domain: string): Promise<HunterEmail[]> {
    if (!this.options.apiKey) {
      throw new Error('Hunter.io API key not configured');
    }

    this.logger.log(`Searching domain: ${domain}`);
    const response = await axios.get<unknown>(
      `${HUNTER_API_BASE_URL}/domain-search`,
      {
        params: {
          domain,
          api_key: this.options.apiKey,
          limit: RESULT_LIMIT,
          type: 'personal',
        },
      },
    );

    const parsed = HunterDomainSearchSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Malformed Hunter.io response for ${domain}`);
    }
    if (parsed.data.errors && parsed.data.errors.length > 0) {
      const details = parsed.data.errors
        .map((error) => error.details ?? error.id ?? 'unknown error')
        .join('; ');
      throw new Error(`Hunter.io API errors for ${domain}: ${details}`);
    }
    return parsed.data.data?.emails ?? [];
  }
}
