import { Inject, Injectable } from '@nestjs/common';
import { LEAD_ENGINE_CONFIG } from '../config/lead-engine.config';
import type {
  LeadEngineConfig,
  NicheTable,
} from '../config/lead-engine.config';

export const UNCATEGORIZED = 'uncategorized';

export interface NicheClassification {
  niche: string;
  /** 0.0 - 1.0, matched weight over the niche's total weight */
  confidence: number;
}

export function classifyNiche(
  text: string,
  table: NicheTable,
): NicheClassification {
  const haystack = text.toLowerCase();
  let best: NicheClassification = { niche: UNCATEGORIZED, confidence: 0 };

  for (const niche of Object.keys(table).sort()) {
    const keywords = table[niche];
    let total = 0;
    let matched = 0;
    for (const [keyword, weight] of Object.entries(keywords)) {
      total += weight;
      if (haystack.includes(keyword.toLowerCase())) {
        matched += weight;
      }
    }
    if (total === 0 || matched === 0) continue;

    const confidence = matched / total;
    // Labels are visited in ascending order, so a tie keeps the earlier one.
    if (confidence > best.confidence) {
      best = { niche, confidence };
    }
  }

  return best;
}

@Injectable()
export class NicheClassifier {
  constructor(
    @Inject(LEAD_ENGINE_CONFIG) private readonly config: LeadEngineConfig,
  ) {}

  classify(text: string): NicheClassification {
    return classifyNiche(text, this.config.niches);
  }

  niches(): string[] {
    return Object.keys(this.config.niches).sort();
  }
}
