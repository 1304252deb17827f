import { Inject, Injectable } from '@nestjs/common';
import {
  DomainPredictionOptions,
  LEAD_ENGINE_CONFIG,
  LEAD_ENGINE_DEFAULTS,
} from '../config/lead-engine.config';
import type { LeadEngineConfig } from '../config/lead-engine.config';

const MAX_LABEL_LENGTH = 63;

/** Hosts that never identify a creator's own business. */
const NON_BUSINESS_HOSTS: ReadonlySet<string> = new Set([
  'youtube.com',
  'youtu.be',
  'twitter.com',
  'x.com',
  'instagram.com',
  'facebook.com',
  'tiktok.com',
  'linkedin.com',
  'discord.gg',
  'twitch.tv',
  'patreon.com',
  'ko-fi.com',
  'linktr.ee',
  'bit.ly',
  'gmail.com',
  'github.com',
]);

const DEFAULT_OPTIONS: DomainPredictionOptions = {
  tlds: [...LEAD_ENGINE_DEFAULTS.domainPrediction.tlds],
  prefixes: [...LEAD_ENGINE_DEFAULTS.domainPrediction.prefixes],
  suffixes: [...LEAD_ENGINE_DEFAULTS.domainPrediction.suffixes],
  maxCandidates: LEAD_ENGINE_DEFAULTS.domainPrediction.maxCandidates,
};

/**
 * Guesses the domains a display name is most likely to own, most likely
 * first. Consumers under quota pressure take only the head of the list.
 *
 * Names that normalize to fewer than two characters yield no candidates.
 */
export function predictDomains(
  displayName: string,
  options: DomainPredictionOptions = DEFAULT_OPTIONS,
): string[] {
  const words = displayName
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0);
  const bare = words.join('');
  if (bare.length < 2 || options.tlds.length === 0) {
    return [];
  }

  const [primaryTld, ...otherTlds] = options.tlds;
  const labels: string[] = [bare];
  if (words.length > 1) {
    labels.push(words.join('-'));
  }
  for (const prefix of options.prefixes) {
    if (!bare.startsWith(prefix)) {
      labels.push(`${prefix}${bare}`);
    }
  }
  for (const suffix of options.suffixes) {
    if (!bare.endsWith(suffix)) {
      labels.push(`${bare}${suffix}`);
    }
  }

  const candidates = [
    ...labels.map((label) => `${label}${primaryTld}`),
    ...otherTlds.map((tld) => `${bare}${tld}`),
  ];

  const seen = new Set<string>();
  const predicted: string[] = [];
  for (const domain of candidates) {
    const label = domain.split('.')[0];
    if (label.length > MAX_LABEL_LENGTH || seen.has(domain)) continue;
    seen.add(domain);
    predicted.push(domain);
    if (predicted.length >= options.maxCandidates) break;
  }
  return predicted;
}

/**
 * Reduces a URL or host to a bare lowercase domain. Returns null for values
 * that are not domains or that belong to social and link-shortener hosts.
 */
export function normalizeDomain(value: string): string | null {
  let host = value.trim().toLowerCase();
  if (!host) return null;

  host = host.replace(/^[a-z][a-z0-9+.-]*:\/\//, '');
  host = host.split(/[/?#]/)[0];
  host = host.split('@').pop() ?? host;
  host = host.replace(/:\d+$/, '');
  if (host.startsWith('www.')) {
    host = host.slice(4);
  }

  if (!/^[a-z0-9-]+(\.[a-z0-9-]+)+$/.test(host)) return null;
  const tld = host.slice(host.lastIndexOf('.') + 1);
  if (tld.length < 2 || NON_BUSINESS_HOSTS.has(host)) return null;

  return host;
}

@Injectable()
export class DomainPredictor {
  constructor(
    @Inject(LEAD_ENGINE_CONFIG) private readonly config: LeadEngineConfig,
  ) {}

  predict(displayName: string): string[] {
    return predictDomains(displayName, this.config.domainPrediction);
  }
}
