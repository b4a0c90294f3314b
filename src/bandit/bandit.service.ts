/**
 * Bandit Service
 *
 * Thompson sampling over the providers eligible for a request, keyed by
 * context bucket. Published state is immutable: the learning cycle copies
 * it into a BanditUpdate, applies samples, and publishes the result.
 */

import type { ProviderConfig, RoutingConfig } from '../config/routing-config.js';
import { cheapestOf } from '../config/routing-config.js';
import { sampleBeta, type RandomSource } from '../utils/random.js';
import { clamp01 } from '../utils/stats.js';
import type {
  ArmPosterior,
  BanditSample,
  BanditState,
  BucketStatistics,
  ProviderStatistics,
  Recommendation,
} from './bandit.types.js';

export interface RecommendOptions {
  /** Providers the router allows for this request; defaults to all */
  eligible?: readonly ProviderConfig[];
  /** Multiplier applied to premium-tier draws (soft throttle) */
  premiumScale?: number;
  /** false freezes exploration: pick the best posterior mean */
  explore?: boolean;
}

function prior(config: RoutingConfig): ArmPosterior {
  return { alpha: config.bandit.priorAlpha, beta: config.bandit.priorBeta, count: 0, totalReward: 0 };
}

export function posteriorFor(state: BanditState, config: RoutingConfig, bucket: string, provider: string): ArmPosterior {
  return state[bucket]?.[provider] ?? prior(config);
}

export function posteriorMean(arm: ArmPosterior): number {
  return arm.alpha / (arm.alpha + arm.beta);
}

export function bucketSampleCount(state: BanditState, bucket: string): number {
  const arms = state[bucket];
  if (!arms) return 0;
  return Object.values(arms).reduce((sum, arm) => sum + arm.count, 0);
}

/**
 * Recommend a provider for a bucket.
 *
 * Below `minSamplesPerBucket` the safe provider is returned (or the
 * cheapest eligible one when the safe provider is not allowed).
 */
export function recommend(
  state: BanditState,
  bucket: string,
  config: RoutingConfig,
  random: RandomSource,
  options: RecommendOptions = {}
): Recommendation {
  const eligible = options.eligible && options.eligible.length > 0 ? options.eligible : config.providers;
  const premiumScale = options.premiumScale ?? 1;
  const samples = bucketSampleCount(state, bucket);

  if (samples < config.bandit.minSamplesPerBucket) {
    const safe = eligible.find(p => p.id === config.router.safeProvider);
    return {
      provider: (safe ?? cheapestOf(eligible)).id,
      source: 'cold_start',
      scores: {},
      bucketSamples: samples,
    };
  }

  const scores: Record<string, number> = {};
  let best: ProviderConfig | null = null;
  let bestScore = -Infinity;

  for (const provider of eligible) {
    const arm = posteriorFor(state, config, bucket, provider.id);
    const raw = options.explore === false
      ? posteriorMean(arm)
      : sampleBeta(arm.alpha, arm.beta, random);
    const value = provider.tier === 'premium' ? raw * premiumScale : raw;
    scores[provider.id] = value;

    // ties resolve to the cheaper provider
    if (value > bestScore || (value === bestScore && best !== null && provider.costPer1kTokens < best.costPer1kTokens)) {
      best = provider;
      bestScore = value;
    }
  }

  return {
    provider: (best ?? eligible[0]).id,
    source: options.explore === false ? 'exploit' : 'bandit',
    scores,
    bucketSamples: samples,
  };
}

// ============================================
// Updates
// ============================================

/**
 * Copy-on-write builder for the next bandit state.
 */
export class BanditUpdate {
  private readonly next: BanditState;
  private applied = 0;
  private skipped = 0;

  constructor(
    current: BanditState,
    private readonly config: RoutingConfig,
    private readonly knownBuckets: ReadonlySet<string>
  ) {
    this.next = {};
    for (const [bucket, arms] of Object.entries(current)) {
      this.next[bucket] = {};
      for (const [provider, arm] of Object.entries(arms)) {
        this.next[bucket][provider] = { ...arm };
      }
    }
  }

  /**
   * Apply one reward. Samples for buckets or providers that are no longer
   * configured are counted and skipped.
   */
  update(sample: BanditSample): boolean {
    const knownProvider = this.config.providers.some(p => p.id === sample.provider);
    if (!this.knownBuckets.has(sample.bucket) || !knownProvider) {
      this.skipped += 1;
      return false;
    }

    const reward = clamp01(sample.reward);
    const arms = (this.next[sample.bucket] ??= {});
    const arm = arms[sample.provider] ?? prior(this.config);
    arms[sample.provider] = {
      alpha: arm.alpha + reward,
      beta: arm.beta + (1 - reward),
      count: arm.count + 1,
      totalReward: arm.totalReward + reward,
    };
    this.applied += 1;
    return true;
  }

  get stats(): { applied: number; skipped: number } {
    return { applied: this.applied, skipped: this.skipped };
  }

  build(): BanditState {
    return this.next;
  }
}

// ============================================
// Statistics
// ============================================

export function providerStatistics(state: BanditState, config: RoutingConfig): ProviderStatistics[] {
  return config.providers.map(provider => {
    let count = 0;
    let totalReward = 0;
    let buckets = 0;
    for (const arms of Object.values(state)) {
      const arm = arms[provider.id];
      if (!arm || arm.count === 0) continue;
      count += arm.count;
      totalReward += arm.totalReward;
      buckets += 1;
    }
    return {
      provider: provider.id,
      count,
      meanReward: count === 0 ? 0 : totalReward / count,
      buckets,
    };
  });
}

export function bucketStatistics(state: BanditState, config: RoutingConfig, buckets: readonly string[]): BucketStatistics[] {
  return buckets.map(bucket => {
    const samples = bucketSampleCount(state, bucket);
    const arms: BucketStatistics['arms'] = {};
    for (const provider of config.providers) {
      const arm = posteriorFor(state, config, bucket, provider.id);
      arms[provider.id] = { count: arm.count, posteriorMean: posteriorMean(arm) };
    }
    return { bucket, samples, coldStart: samples < config.bandit.minSamplesPerBucket, arms };
  });
}
