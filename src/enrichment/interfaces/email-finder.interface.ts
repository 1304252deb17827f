import type { EnrichmentResult } from '../../reconciliation/reconciliation.types';

export interface EmailLookup {
  /** Highest ranked email at or above the minimum confidence, if any */
  best: EnrichmentResult | null;
  emailsFound: number;
}

export interface EmailFinder {
  readonly name: string;
  findEmail(domain: string): Promise<EmailLookup>;
}

export const EMAIL_FINDER = 'EMAIL_FINDER';
