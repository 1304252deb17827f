import { Injectable } from '@nestjs/common';
import type { EnrichmentResult } from '../../reconciliation/reconciliation.types';
import { EmailFinder, EmailLookup } from '../interfaces/email-finder.interface';

@Injectable()
export class MockEmailFinder implements EmailFinder {
  readonly name = 'mock';

  // Fixed "Hunter-like" results for local runs
  private readonly mockDb: Record<string, EnrichmentResult> = {
    'example.com': {
      email: 'hello@example.com',
      confidence: 92,
      verified: true,
      domain: 'example.com',
    },
    'example.org': {
      email: 'team@example.org',
      confidence: 64,
      verified: false,
      domain: 'example.org',
    },
  };

  findEmail(domain: string): Promise<EmailLookup> {
    const best = this.mockDb[domain.toLowerCase()] ?? null;
    return Promise.resolve({ best, emailsFound: best ? 1 : 0 });
  }
}
