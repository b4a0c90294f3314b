/**
 * Bandit Types
 *
 * One Beta posterior per (bucket, provider). Rewards are continuous in
 * [0, 1] and update the posterior fractionally: alpha += r, beta += 1 - r.
 */

import { z } from 'zod';

export const ArmPosteriorSchema = z.object({
  alpha: z.number().positive(),
  beta: z.number().positive(),
  count: z.number().int().nonnegative(),
  totalReward: z.number().nonnegative(),
});

/** bucket key -> provider id -> posterior */
export const BanditStateSchema = z.record(z.record(ArmPosteriorSchema));

export type ArmPosterior = z.infer<typeof ArmPosteriorSchema>;
export type BanditState = z.infer<typeof BanditStateSchema>;

export type RecommendationSource = 'cold_start' | 'bandit' | 'exploit';

export interface Recommendation {
  provider: string;
  source: RecommendationSource;
  /** Scaled Thompson draws (or posterior means when exploiting), per provider */
  scores: Record<string, number>;
  bucketSamples: number;
}

export interface ProviderStatistics {
  provider: string;
  count: number;
  meanReward: number;
  buckets: number;
}

export interface BucketStatistics {
  bucket: string;
  samples: number;
  coldStart: boolean;
  arms: Record<string, { count: number; posteriorMean: number }>;
}

/**
 * Minimal sample shape the bandit learns from.
 */
export interface BanditSample {
  bucket: string;
  provider: string;
  reward: number;
}
