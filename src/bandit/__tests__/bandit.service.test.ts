import { describe, it, expect } from 'vitest';
import {
  BanditUpdate,
  bucketSampleCount,
  bucketStatistics,
  posteriorMean,
  providerStatistics,
  recommend,
} from '../bandit.service.js';
import type { BanditState } from '../bandit.types.js';
import { allBuckets } from '../../router/rules/bucket.js';
import { createRandom } from '../../utils/random.js';
import { testConfig } from '../../__tests__/fixtures.js';

const BUCKET = 'en|standard|low';

function warmState(gpt5: [number, number], deepseek: [number, number]): BanditState {
  return {
    [BUCKET]: {
      gpt5: { alpha: gpt5[0], beta: gpt5[1], count: 50, totalReward: gpt5[0] / 2 },
      deepseek: { alpha: deepseek[0], beta: deepseek[1], count: 50, totalReward: deepseek[0] / 2 },
    },
  };
}

describe('recommend', () => {
  const config = testConfig();
  const random = createRandom('bandit-test');

  it('returns the safe provider below the bucket sample minimum', () => {
    const result = recommend({}, BUCKET, config, random);

    expect(result).toEqual({ provider: 'gpt5', source: 'cold_start', scores: {}, bucketSamples: 0 });
  });

  it('falls back to the cheapest eligible provider when the safe one is not allowed', () => {
    const eligible = config.providers.filter(p => p.id === 'deepseek');
    const result = recommend({}, BUCKET, config, random, { eligible });

    expect(result.provider).toBe('deepseek');
    expect(result.source).toBe('cold_start');
  });

  it('follows the posterior once the bucket is warm', () => {
    const state = warmState([90, 10], [10, 90]);
    const picks = Array.from({ length: 200 }, () => recommend(state, BUCKET, config, random));

    expect(picks.every(p => p.provider === 'gpt5' && p.source === 'bandit')).toBe(true);
    expect(picks[0].bucketSamples).toBe(100);
  });

  it('scales premium draws down under soft throttle', () => {
    const state = warmState([60, 40], [55, 45]);

    const unscaled = recommend(state, BUCKET, config, random, { explore: false });
    const scaled = recommend(state, BUCKET, config, random, { explore: false, premiumScale: 0.5 });

    expect(unscaled.provider).toBe('gpt5');
    expect(scaled.provider).toBe('deepseek');
    expect(scaled.source).toBe('exploit');
    expect(scaled.scores.gpt5).toBeCloseTo(0.3);
    expect(scaled.scores.deepseek).toBeCloseTo(0.55);
  });

  it('breaks ties toward the cheaper provider', () => {
    const state = warmState([50, 50], [50, 50]);

    expect(recommend(state, BUCKET, config, random, { explore: false }).provider).toBe('deepseek');
  });
});

describe('BanditUpdate', () => {
  const config = testConfig();
  const buckets = new Set(allBuckets(config.buckets));

  it('applies fractional rewards without touching the published state', () => {
    const current: BanditState = Object.freeze({});
    const update = new BanditUpdate(current, config, buckets);

    expect(update.update({ bucket: BUCKET, provider: 'deepseek', reward: 0.75 })).toBe(true);
    expect(update.update({ bucket: BUCKET, provider: 'deepseek', reward: 1.4 })).toBe(true);
    const next = update.build();

    expect(current).toEqual({});
    expect(next[BUCKET].deepseek).toEqual({ alpha: 2.75, beta: 1.25, count: 2, totalReward: 1.75 });
    expect(bucketSampleCount(next, BUCKET)).toBe(2);
  });

  it('skips samples for buckets or providers no longer configured', () => {
    const update = new BanditUpdate({}, config, buckets);

    expect(update.update({ bucket: 'de|standard|low', provider: 'deepseek', reward: 1 })).toBe(false);
    expect(update.update({ bucket: BUCKET, provider: 'retired-model', reward: 1 })).toBe(false);
    expect(update.stats).toEqual({ applied: 0, skipped: 2 });
  });

  it('copies arms so later updates do not leak into the previous state', () => {
    const first = new BanditUpdate({}, config, buckets);
    first.update({ bucket: BUCKET, provider: 'gpt5', reward: 1 });
    const published = first.build();

    const second = new BanditUpdate(published, config, buckets);
    second.update({ bucket: BUCKET, provider: 'gpt5', reward: 0 });

    expect(published[BUCKET].gpt5.count).toBe(1);
    expect(second.build()[BUCKET].gpt5.count).toBe(2);
  });
});

describe('statistics', () => {
  const config = testConfig();

  it('summarises per provider and per bucket', () => {
    const state = warmState([60, 40], [20, 80]);

    const providers = providerStatistics(state, config);
    expect(providers.map(p => [p.provider, p.count, p.meanReward, p.buckets])).toEqual([
      ['deepseek', 50, 0.2, 1],
      ['gpt5', 50, 0.6, 1],
    ]);

    const [bucket] = bucketStatistics(state, config, [BUCKET]);
    expect(bucket.samples).toBe(100);
    expect(bucket.coldStart).toBe(false);
    expect(bucket.arms.gpt5.posteriorMean).toBeCloseTo(posteriorMean({ alpha: 60, beta: 40, count: 0, totalReward: 0 }));
  });
});
