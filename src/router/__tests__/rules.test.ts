import { describe, it, expect } from 'vitest';
import { matchKeywords } from '../rules/keywords.js';
import { findForcedRule, matchRule } from '../rules/hard-rules.js';
import { allBuckets, bucketFor, complexityTier } from '../rules/bucket.js';
import { eligibleProviders, ruleSurvives } from '../rules/throttle-gate.js';
import { RequestContextSchema, type RequestContext } from '../router.types.js';
import { testConfig } from '../../__tests__/fixtures.js';

const config = testConfig();

function context(overrides: Partial<RequestContext> = {}): RequestContext {
  return RequestContextSchema.parse({
    contentId: 'card-1',
    language: 'en',
    category: 'politics',
    complexity: 0.2,
    risk: 0.1,
    headline: 'Parliament votes on budget',
    ...overrides,
  });
}

describe('matchKeywords', () => {
  it('matches whole words regardless of case', () => {
    expect(matchKeywords('Markets brace for ecb decision', ['ECB', 'Fed'])).toEqual(['ECB']);
    expect(matchKeywords('Federal budget talks', ['Fed'])).toEqual([]);
    expect(matchKeywords('Rates (Fed) unchanged', ['Fed'])).toEqual(['Fed']);
    expect(matchKeywords(undefined, ['Fed'])).toEqual([]);
  });

  it('treats regex characters literally', () => {
    expect(matchKeywords('Price of C++ skills', ['C++'])).toEqual(['C++']);
  });
});

describe('hard rules', () => {
  it('requires every predicate of a rule', () => {
    const rule = { id: 'fi-risky', provider: 'gpt5', survivesHardThrottle: true, when: { languages: ['fi'], minRisk: 0.5 } };

    expect(matchRule(rule, context({ language: 'fi', risk: 0.6 }))).toEqual(['language:fi', 'risk>=0.5']);
    expect(matchRule(rule, context({ language: 'fi', risk: 0.4 }))).toBeNull();
    expect(matchRule(rule, { ...context({ risk: 0.6 }), language: 'FI' })).toEqual(['language:fi', 'risk>=0.5']);
  });

  it('returns the first matching rule', () => {
    const match = findForcedRule(config.rules, context({ language: 'fi', headline: 'ECB holds' }));

    expect(match?.rule.id).toBe('finnish-premium');
  });

  it('returns null when no rule matches', () => {
    expect(findForcedRule(config.rules, context())).toBeNull();
  });
});

describe('buckets', () => {
  it('combines language, criticality and complexity tier', () => {
    expect(bucketFor(config.buckets, context())).toBe('en|standard|low');
    expect(bucketFor(config.buckets, context({ language: 'de', complexity: 0.5 }))).toBe('other|standard|med');
    expect(bucketFor(config.buckets, context({ headline: 'ECB raises rates', complexity: 0.95 }))).toBe('en|critical|high');
    expect(bucketFor(config.buckets, context({ category: 'central_bank', headline: undefined }))).toBe('en|critical|low');
  });

  it('puts tier boundaries in the lower tier', () => {
    expect(complexityTier(config.buckets, 0.3)).toBe('low');
    expect(complexityTier(config.buckets, 0.31)).toBe('med');
  });

  it('enumerates every bucket', () => {
    const buckets = allBuckets(config.buckets);

    expect(buckets).toHaveLength(18);
    expect(buckets[0]).toBe('fi|critical|low');
    expect(buckets[buckets.length - 1]).toBe('other|standard|high');
  });
});

describe('throttle gate', () => {
  it('leaves every provider eligible below hard', () => {
    expect(eligibleProviders(config, 'soft', 'politics')).toEqual({ providers: config.providers, restricted: false });
  });

  it('restricts to the cheapest provider under hard unless allowlisted', () => {
    expect(eligibleProviders(config, 'hard', 'politics').providers.map(p => p.id)).toEqual(['deepseek']);
    expect(eligibleProviders(config, 'hard', 'central_bank').restricted).toBe(false);
    expect(eligibleProviders(config, 'emergency', 'central_bank').providers.map(p => p.id)).toEqual(['deepseek']);
  });

  it('drops rules by directive', () => {
    const [finnish, , veryComplex] = config.rules;

    expect(ruleSurvives(config, veryComplex, 'soft', 'politics')).toBe(true);
    expect(ruleSurvives(config, veryComplex, 'hard', 'politics')).toBe(false);
    expect(ruleSurvives(config, veryComplex, 'hard', 'central_bank')).toBe(true);
    expect(ruleSurvives(config, finnish, 'hard', 'politics')).toBe(true);
    expect(ruleSurvives(config, finnish, 'emergency', 'central_bank')).toBe(false);
  });
});
