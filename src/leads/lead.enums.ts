export enum LeadSource {
  MANUAL = 'manual',
  DEMO_CHAT = 'demo_chat',
  API = 'api',
  YOUTUBE_CREATOR_SCRAPER = 'youtube_creator_scraper',
  DOMAIN_SCRAPING = 'domain_scraping',
  GITHUB_ENHANCEMENT = 'github_enhancement',
  TWITTER_ENHANCEMENT = 'twitter_enhancement',
  HUNTER_ENRICHMENT = 'hunter_enrichment',
}

export enum LeadStatus {
  NEW = 'new',
  CONTACTED = 'contacted',
  QUALIFIED = 'qualified',
  CUSTOMER = 'customer',
  UNSUBSCRIBED = 'unsubscribed',
}

export enum QualificationLevel {
  COLD = 'cold',
  WARM = 'warm',
  HOT = 'hot',
  CUSTOMER = 'customer',
}

/** Sources whose email is never overwritten once set. */
export const DEFAULT_PROTECTED_SOURCES: ReadonlySet<LeadSource> = new Set([
  LeadSource.MANUAL,
  LeadSource.DEMO_CHAT,
  LeadSource.API,
]);

/** Collaborators whose results may upgrade an enrichable lead's email. */
export const ENRICHMENT_SOURCES: ReadonlySet<LeadSource> = new Set([
  LeadSource.HUNTER_ENRICHMENT,
  LeadSource.GITHUB_ENHANCEMENT,
  LeadSource.TWITTER_ENHANCEMENT,
]);

export const PLACEHOLDER_EMAIL_PREFIX = 'unknown@';

export function isPlaceholderEmail(email: string | null | undefined): boolean {
  return (
    !!email && email.trim().toLowerCase().startsWith(PLACEHOLDER_EMAIL_PREFIX)
  );
}
