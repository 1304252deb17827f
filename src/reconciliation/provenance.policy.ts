import { Inject, Injectable } from '@nestjs/common';
import { LEAD_ENGINE_CONFIG } from '../config/lead-engine.config';
import type { LeadEngineConfig } from '../config/lead-engine.config';
import {
  DEFAULT_PROTECTED_SOURCES,
  ENRICHMENT_SOURCES,
  LeadSource,
  isPlaceholderEmail,
} from '../leads/lead.enums';

export interface EmailOverwriteRequest {
  existingSource: LeadSource;
  existingEmail: string;
  incomingSource: LeadSource;
  incomingConfidence: number;
}

export interface ProvenanceOptions {
  protectedSources: ReadonlySet<LeadSource>;
  minConfidence: number;
}

const DEFAULT_OPTIONS: ProvenanceOptions = {
  protectedSources: DEFAULT_PROTECTED_SOURCES,
  minConfidence: 50,
};

/**
 * Decides whether an incoming email may replace the stored one.
 *
 * Rules, first match wins:
 * 1. protected source: never
 * 2. placeholder email: always
 * 3. enrichable lead, enrichment collaborator at or above the minimum confidence: yes
 * 4. anything else: no
 */
export function mayOverwriteEmail(
  request: EmailOverwriteRequest,
  options: ProvenanceOptions = DEFAULT_OPTIONS,
): boolean {
  if (options.protectedSources.has(request.existingSource)) {
    return false;
  }
  if (isPlaceholderEmail(request.existingEmail)) {
    return true;
  }
  return (
    ENRICHMENT_SOURCES.has(request.incomingSource) &&
    request.incomingConfidence >= options.minConfidence
  );
}

@Injectable()
export class ProvenancePolicy {
  private readonly options: ProvenanceOptions;

  constructor(@Inject(LEAD_ENGINE_CONFIG) config: LeadEngineConfig) {
    this.options = {
      protectedSources: config.protectedSources,
      minConfidence: config.minEnrichmentConfidence,
    };
  }

  mayOverwriteEmail(request: EmailOverwriteRequest): boolean {
    return mayOverwriteEmail(request, this.options);
  }

  isProtected(source: LeadSource): boolean {
    return this.options.protectedSources.has(source);
  }

  enrichableSources(): LeadSource[] {
    return Object.values(LeadSource).filter(
      (source) => !this.options.protectedSources.has(source),
    );
  }
}
