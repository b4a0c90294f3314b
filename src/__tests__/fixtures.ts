/**
 * Shared test fixtures: a small routing configuration, a manual clock and
 * scripted random sources.
 */

import { parseRoutingConfig, type RoutingConfig, type RoutingConfigInput } from '../config/routing-config.js';
import type { ScoringOutcome } from '../evaluator/evaluator.types.js';
import type { Row, Queryable } from '../db/postgres.js';
import type { RandomSource } from '../utils/random.js';
import type { Clock } from '../utils/time.js';

export function testConfigInput(): RoutingConfigInput {
  return {
    providers: [
      { id: 'deepseek', tier: 'standard', costPer1kTokens: 0.0012 },
      { id: 'gpt5', tier: 'premium', costPer1kTokens: 0.02 },
    ],
    router: {
      safeProvider: 'gpt5',
      timeoutMs: 50,
      defaultEstimatedTokens: 1000,
      alwaysPremiumCategories: ['central_bank'],
    },
    rules: [
      { id: 'finnish-premium', provider: 'gpt5', when: { languages: ['fi'] } },
      { id: 'critical-topics', provider: 'gpt5', when: { keywords: ['ECB'] } },
      { id: 'very-complex', provider: 'gpt5', survivesHardThrottle: false, when: { minComplexity: 0.9 } },
    ],
    buckets: {
      languages: ['fi', 'en'],
      criticalCategories: ['central_bank'],
      criticalKeywords: ['ECB'],
      complexityTiers: [
        { name: 'low', max: 0.3 },
        { name: 'med', max: 0.6 },
        { name: 'high', max: 1 },
      ],
      maxBuckets: 50,
    },
    budget: {
      monthlyCap: 30,
      maxSingleRequestCost: 2,
    },
    bandit: { minSamplesPerBucket: 20 },
    prompter: {
      explorationRate: 0.1,
      minTrialsForExploit: 5,
      successThreshold: 0.6,
      variants: {
        default: [
          { id: 'structured-v1', template: 'Write a card about {title}.' },
          { id: 'analytical-v1', template: 'Analyse {title} for {audience}.' },
        ],
        central_bank: [{ id: 'rates-v1', template: 'Explain the rate decision: {title}.' }],
      },
    },
    evaluator: {
      requiredFields: ['headline', 'lede'],
      bannedPhrases: ['as an AI'],
      minSources: 1,
      hedgeTerms: ['reportedly', 'allegedly', 'sources say'],
      analyticalElements: [
        { id: 'impact', terms: ['impact', 'affects'] },
        { id: 'cause', terms: ['because', 'due to'] },
      ],
    },
  };
}

export function testConfig(mutate?: (raw: RoutingConfigInput) => void): RoutingConfig {
  const raw = testConfigInput();
  mutate?.(raw);
  return parseRoutingConfig(raw);
}

export interface ManualClock {
  clock: Clock;
  set(date: Date): void;
  advance(ms: number): void;
}

export function manualClock(start: Date): ManualClock {
  let now = start;
  return {
    clock: () => now,
    set: date => {
      now = date;
    },
    advance: ms => {
      now = new Date(now.getTime() + ms);
    },
  };
}

/**
 * Returns the given values in order, repeating the last one.
 */
export function scriptedRandom(values: number[]): RandomSource {
  let i = 0;
  return {
    next: () => {
      const value = values[Math.min(i, values.length - 1)];
      i += 1;
      return value;
    },
  };
}

export function outcome(overrides: Partial<ScoringOutcome> = {}): ScoringOutcome {
  return {
    contentId: 'card-1',
    decisionId: 'decision-1',
    bucket: 'en|standard|low',
    provider: 'deepseek',
    promptCategory: 'default',
    promptVariant: 'structured-v1',
    estimatedCost: 0.0012,
    decidedAt: new Date('2026-09-01T08:00:00Z'),
    ...overrides,
  };
}

/**
 * In-process stand-in for the pg pool: records every statement and answers
 * from a queue of canned result sets.
 */
export class FakeQueryable implements Queryable {
  readonly calls: Array<{ text: string; params: unknown[] }> = [];
  private readonly results: Row[][] = [];

  respondWith(...rows: Row[][]): this {
    this.results.push(...rows);
    return this;
  }

  async query(text: string, params: unknown[] = []): Promise<Row[]> {
    this.calls.push({ text, params });
    return this.results.shift() ?? [];
  }
}
