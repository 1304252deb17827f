import { Inject, Injectable } from '@nestjs/common';
import {
  LEAD_ENGINE_CONFIG,
  LEAD_ENGINE_DEFAULTS,
  ScoringOptions,
} from '../config/lead-engine.config';
import type { LeadEngineConfig } from '../config/lead-engine.config';
import { LeadSource, LeadStatus, QualificationLevel } from '../leads/lead.enums';
import type { Lead } from '../leads/lead.entity';

export const SOURCE_BASE_SCORES: Readonly<Partial<Record<LeadSource, number>>> =
  {
    [LeadSource.MANUAL]: 30,
    [LeadSource.DEMO_CHAT]: 25,
    [LeadSource.API]: 25,
    [LeadSource.YOUTUBE_CREATOR_SCRAPER]: 20,
    [LeadSource.DOMAIN_SCRAPING]: 15,
  };
export const DEFAULT_SOURCE_SCORE = 10;

export const HIGH_CONFIDENCE_THRESHOLD = 80;
export const HIGH_CONFIDENCE_BONUS = 25;
export const MEDIUM_CONFIDENCE_THRESHOLD = 60;
export const MEDIUM_CONFIDENCE_BONUS = 15;
export const PREMIUM_TLD_BONUS = 10;
export const BUSINESS_KEYWORD_BONUS = 15;

export const HOT_THRESHOLD = 70;
export const WARM_THRESHOLD = 40;

export type ScorableLead = Pick<Lead, 'source' | 'emailConfidence' | 'domain'>;

const DEFAULT_OPTIONS: ScoringOptions = {
  premiumTlds: [...LEAD_ENGINE_DEFAULTS.scoring.premiumTlds],
  businessKeywords: [...LEAD_ENGINE_DEFAULTS.scoring.businessKeywords],
};

/**
 * Source base + email confidence bonus + domain quality bonus, clamped to
 * [0, 100]. Pure: the stored leadScore is always this function's output.
 */
export function scoreLead(
  lead: ScorableLead,
  options: ScoringOptions = DEFAULT_OPTIONS,
): number {
  let score = SOURCE_BASE_SCORES[lead.source] ?? DEFAULT_SOURCE_SCORE;

  const confidence = lead.emailConfidence;
  if (confidence !== null && confidence !== undefined) {
    if (confidence > HIGH_CONFIDENCE_THRESHOLD) {
      score += HIGH_CONFIDENCE_BONUS;
    } else if (confidence > MEDIUM_CONFIDENCE_THRESHOLD) {
      score += MEDIUM_CONFIDENCE_BONUS;
    }
  }

  const domain = lead.domain?.toLowerCase();
  if (domain) {
    if (options.premiumTlds.some((tld) => domain.endsWith(tld))) {
      score += PREMIUM_TLD_BONUS;
    }
    if (options.businessKeywords.some((keyword) => domain.includes(keyword))) {
      score += BUSINESS_KEYWORD_BONUS;
    }
  }

  return Math.min(100, Math.max(0, Math.round(score)));
}

export function qualify(score: number, status: LeadStatus): QualificationLevel {
  if (status === LeadStatus.CUSTOMER) return QualificationLevel.CUSTOMER;
  if (score >= HOT_THRESHOLD) return QualificationLevel.HOT;
  if (score >= WARM_THRESHOLD) return QualificationLevel.WARM;
  return QualificationLevel.COLD;
}

@Injectable()
export class LeadScorer {
  constructor(
    @Inject(LEAD_ENGINE_CONFIG) private readonly config: LeadEngineConfig,
  ) {}

  score(lead: ScorableLead): number {
    return scoreLead(lead, this.config.scoring);
  }

  /** Recomputes leadScore and qualificationLevel in place. */
  apply(lead: Lead): Lead {
    lead.leadScore = this.score(lead);
    lead.qualificationLevel = qualify(lead.leadScore, lead.status);
    return lead;
  }
}
