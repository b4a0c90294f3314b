/**
 * Evaluator Types
 *
 * Reward samples are derived once per content id from the feedback that
 * arrived for it, and never change afterwards.
 */

import type { FeedbackSource } from '../collector/collector.types.js';

/**
 * The routing facts a reward is attributed to.
 */
export interface ScoringOutcome {
  contentId: string;
  decisionId: string;
  bucket: string;
  provider: string;
  promptCategory: string;
  promptVariant: string;
  estimatedCost: number;
  decidedAt: Date;
}

export interface ValidationResult {
  passed: boolean;
  issues: string[];
  missingFields: string[];
  bannedPhrases: string[];
  resolvableSources: number;
  /** Unresolvable references over all references; 1 when none were cited */
  referenceMissRate: number;
  hallucinationScore: number;
  distinctSentenceRatio: number;
  elementCoverage: number;
}

/**
 * Per-signal contributions. A null component had no signal and was left
 * out of the weighted mean.
 */
export interface RewardComponents {
  validation: number | null;
  heuristic: number | null;
  editorial: number | null;
  engagement: number | null;
  hallucinationScore: number | null;
  referenceMissRate: number | null;
  qualityFlag: string | null;
  penalty: number;
  /** costWeight x cost / costCeiling, capped at costWeight */
  costPenalty: number;
  issues: string[];
}

export interface RewardSample {
  contentId: string;
  decisionId: string;
  bucket: string;
  provider: string;
  promptCategory: string;
  promptVariant: string;
  reward: number;
  passed: boolean;
  hallucinated: boolean;
  referenceMissRate: number | null;
  components: RewardComponents;
  sources: FeedbackSource[];
  cost: number;
  decidedAt: Date;
  scoredAt: Date;
  cycleId: string;
  /**
   * Policy version this sample is folded into. Samples above the active
   * version were logged by a cycle that never published.
   */
  policyVersion: number;
}

export interface HalfStats {
  n: number;
  passes: number;
  passRate: number;
  meanReward: number;
  hallucinationRate: number;
  referenceMissRate: number | null;
  /** Wilson 95% interval, only reported from 30 samples up */
  passRateInterval: { lower: number; upper: number } | null;
}

export interface SubjectWindow {
  provider: string;
  /** `${category}:${variant}`, or null for the provider as a whole */
  variant: string | null;
  baseline: HalfStats;
  recent: HalfStats;
}

export interface QualityWindow {
  from: Date;
  midpoint: Date;
  to: Date;
  subjects: SubjectWindow[];
}

export type RegressionReason =
  | 'regression'
  | 'insufficient_samples'
  | 'no_drop'
  | 'not_significant'
  | 'effect_below_floor';

export interface RegressionFinding {
  provider: string;
  variant: string | null;
  baselinePassRate: number;
  recentPassRate: number;
  baselineN: number;
  recentN: number;
  drop: number;
  /** Lower confidence bound of the drop */
  adjustedEffect: number;
  z: number;
  pValue: number;
  meanRewardDelta: number;
  flagged: boolean;
  reason: RegressionReason;
}

export interface RegressionReport {
  checkedAt: Date;
  regressed: boolean;
  significance: number;
  minEffect: number;
  findings: RegressionFinding[];
  regressions: RegressionFinding[];
}

export interface QualityGateReport {
  passed: boolean;
  issues: string[];
}
