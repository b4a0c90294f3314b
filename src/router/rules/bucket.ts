/**
 * Context bucketing: language tier x topic criticality x complexity tier.
 */

import type { BucketConfig } from '../../config/routing-config.js';
import type { RequestContext } from '../router.types.js';
import { matchKeywords } from './keywords.js';

export const OTHER_LANGUAGE = 'other';

export type Criticality = 'critical' | 'standard';

export function languageTier(buckets: BucketConfig, language: string): string {
  const lower = language.toLowerCase();
  return buckets.languages.some(l => l.toLowerCase() === lower) ? lower : OTHER_LANGUAGE;
}

export function criticality(buckets: BucketConfig, context: Pick<RequestContext, 'category' | 'headline'>): Criticality {
  if (buckets.criticalCategories.includes(context.category)) return 'critical';
  if (matchKeywords(context.headline, buckets.criticalKeywords).length > 0) return 'critical';
  return 'standard';
}

export function complexityTier(buckets: BucketConfig, complexity: number): string {
  const tier = buckets.complexityTiers.find(t => complexity <= t.max);
  return (tier ?? buckets.complexityTiers[buckets.complexityTiers.length - 1]).name;
}

export function bucketKey(language: string, crit: Criticality, tier: string): string {
  return `${language}|${crit}|${tier}`;
}

export function bucketFor(buckets: BucketConfig, context: RequestContext): string {
  return bucketKey(
    languageTier(buckets, context.language),
    criticality(buckets, context),
    complexityTier(buckets, context.complexity)
  );
}

/**
 * Every bucket the configuration can produce.
 */
export function allBuckets(buckets: BucketConfig): string[] {
  const languages = [...buckets.languages.map(l => l.toLowerCase()), OTHER_LANGUAGE];
  const keys: string[] = [];
  for (const language of languages) {
    for (const crit of ['critical', 'standard'] as const) {
      for (const tier of buckets.complexityTiers) {
        keys.push(bucketKey(language, crit, tier.name));
      }
    }
  }
  return keys;
}
