/**
 * Regression detection over a trailing quality window.
 *
 * The window is split into an older baseline half and a newer recent half,
 * per provider and per provider + prompt variant. A drop is flagged only
 * when it is statistically significant AND its lower confidence bound still
 * clears the minimum effect size, so small samples cannot trigger a
 * rollback on noise alone.
 */

import type { QualityGatesConfig, RegressionConfig } from '../config/routing-config.js';
import { mean, normalQuantile, twoProportionTest, wilsonInterval } from '../utils/stats.js';
import { addDays } from '../utils/time.js';
import type {
  HalfStats,
  QualityGateReport,
  QualityWindow,
  RegressionFinding,
  RegressionReport,
  RewardSample,
  SubjectWindow,
} from './evaluator.types.js';

const MIN_SAMPLES_FOR_INTERVAL = 30;

type WindowSample = Pick<
  RewardSample,
  'provider' | 'promptCategory' | 'promptVariant' | 'reward' | 'passed' | 'hallucinated' | 'referenceMissRate' | 'decidedAt'
>;

export function halfStats(samples: readonly WindowSample[]): HalfStats {
  const n = samples.length;
  const passes = samples.filter(s => s.passed).length;
  const referenceRates = samples
    .map(s => s.referenceMissRate)
    .filter((r): r is number => r !== null);

  return {
    n,
    passes,
    passRate: n === 0 ? 0 : passes / n,
    meanReward: mean(samples.map(s => s.reward)),
    hallucinationRate: n === 0 ? 0 : samples.filter(s => s.hallucinated).length / n,
    referenceMissRate: referenceRates.length === 0 ? null : mean(referenceRates),
    passRateInterval: n >= MIN_SAMPLES_FOR_INTERVAL ? wilsonInterval(passes, n) : null,
  };
}

/**
 * Split samples decided within [now - windowDays, now] into baseline and
 * recent halves for every provider and provider + variant seen.
 */
export function buildQualityWindow(samples: readonly WindowSample[], now: Date, windowDays: number): QualityWindow {
  const from = addDays(now, -windowDays);
  const midpoint = addDays(now, -windowDays / 2);

  const groups = new Map<string, { provider: string; variant: string | null; baseline: WindowSample[]; recent: WindowSample[] }>();
  const groupFor = (provider: string, variant: string | null) => {
    const key = `${provider}\u0000${variant ?? ''}`;
    let group = groups.get(key);
    if (!group) {
      group = { provider, variant, baseline: [], recent: [] };
      groups.set(key, group);
    }
    return group;
  };

  for (const sample of samples) {
    const t = sample.decidedAt.getTime();
    if (t < from.getTime() || t > now.getTime()) continue;
    const half = t < midpoint.getTime() ? 'baseline' : 'recent';
    groupFor(sample.provider, null)[half].push(sample);
    groupFor(sample.provider, `${sample.promptCategory}:${sample.promptVariant}`)[half].push(sample);
  }

  const subjects: SubjectWindow[] = Array.from(groups.values()).map(g => ({
    provider: g.provider,
    variant: g.variant,
    baseline: halfStats(g.baseline),
    recent: halfStats(g.recent),
  }));

  return { from, midpoint, to: now, subjects };
}

export function evaluateSubject(subject: SubjectWindow, config: RegressionConfig): RegressionFinding {
  const { baseline, recent } = subject;
  const base = {
    provider: subject.provider,
    variant: subject.variant,
    baselinePassRate: baseline.passRate,
    recentPassRate: recent.passRate,
    baselineN: baseline.n,
    recentN: recent.n,
    meanRewardDelta: recent.meanReward - baseline.meanReward,
  };

  if (baseline.n < config.minSamplesPerHalf || recent.n < config.minSamplesPerHalf) {
    return {
      ...base,
      drop: baseline.passRate - recent.passRate,
      adjustedEffect: 0,
      z: 0,
      pValue: 1,
      flagged: false,
      reason: 'insufficient_samples',
    };
  }

  const test = twoProportionTest(baseline.passRate, baseline.n, recent.passRate, recent.n);
  const adjustedEffect = test.drop - normalQuantile(1 - config.significance) * test.standardError;
  const finding = { ...base, drop: test.drop, adjustedEffect, z: test.z, pValue: test.pValue };

  if (test.drop <= 0) {
    return { ...finding, flagged: false, reason: 'no_drop' };
  }
  if (test.pValue >= config.significance) {
    return { ...finding, flagged: false, reason: 'not_significant' };
  }
  if (adjustedEffect < config.minEffect) {
    return { ...finding, flagged: false, reason: 'effect_below_floor' };
  }
  return { ...finding, flagged: true, reason: 'regression' };
}

export function checkRegression(window: QualityWindow, config: RegressionConfig): RegressionReport {
  const findings = window.subjects.map(subject => evaluateSubject(subject, config));
  const regressions = findings.filter(f => f.flagged);
  return {
    checkedAt: window.to,
    regressed: regressions.length > 0,
    significance: config.significance,
    minEffect: config.minEffect,
    findings,
    regressions,
  };
}

/**
 * Absolute quality floors on each provider's recent half.
 */
export function checkQualityGates(window: QualityWindow, gates: QualityGatesConfig): QualityGateReport {
  const issues: string[] = [];

  for (const subject of window.subjects) {
    if (subject.variant !== null) continue;
    const recent = subject.recent;
    if (recent.n < gates.minSamples) continue;

    if (recent.passRate < gates.minPassRate) {
      issues.push(`${subject.provider}: pass rate ${recent.passRate.toFixed(3)} below ${gates.minPassRate}`);
    }
    if (recent.hallucinationRate > gates.maxHallucinationRate) {
      issues.push(`${subject.provider}: hallucination rate ${recent.hallucinationRate.toFixed(3)} above ${gates.maxHallucinationRate}`);
    }
    if (recent.referenceMissRate !== null && recent.referenceMissRate > gates.maxReferenceMissRate) {
      issues.push(`${subject.provider}: reference miss rate ${recent.referenceMissRate.toFixed(3)} above ${gates.maxReferenceMissRate}`);
    }
  }

  return { passed: issues.length === 0, issues };
}
