/**
 * Evaluator Service - reward scoring
 *
 * Turns the feedback that arrived for one content id into a single reward
 * in [0, 1]. Component weights come from configuration and are
 * renormalised over the signals actually present, so a card with no
 * engagement data yet is not punished for it. With a cost weight set,
 * the normalised generation cost is subtracted as well.
 */

import type { EvaluatorConfig } from '../config/routing-config.js';
import type { FeedbackEvent, FeedbackSource } from '../collector/collector.types.js';
import { compareCursor } from '../collector/collector.types.js';
import { EvaluationError } from '../utils/errors.js';
import { clamp01, mean } from '../utils/stats.js';
import { validateGeneration } from './validation.js';
import type { RewardComponents, RewardSample, ScoringOutcome, ValidationResult } from './evaluator.types.js';

export interface ScoreOptions {
  cycleId: string;
  scoredAt: Date;
  /** Policy version the sample is applied in */
  policyVersion: number;
}

type EventOf<S extends FeedbackSource> = Extract<FeedbackEvent, { source: S }>;

interface FirstBySource {
  generation?: EventOf<'generation'>;
  engagement?: EventOf<'engagement'>;
  editorial?: EventOf<'editorial'>;
  quality_flag?: EventOf<'quality_flag'>;
}

const BLOCKING_FLAGS = new Set(['hallucination', 'factual_error']);

/**
 * Keep the earliest ingested event per source; later duplicates are ignored.
 */
export function firstEventPerSource(contentId: string, feedback: readonly FeedbackEvent[]): FirstBySource {
  const ordered = feedback
    .filter(e => e.contentId === contentId)
    .sort((a, b) => compareCursor(a, b));

  const first: FirstBySource = {};
  for (const event of ordered) {
    switch (event.source) {
      case 'generation':
        first.generation ??= event;
        break;
      case 'engagement':
        first.engagement ??= event;
        break;
      case 'editorial':
        first.editorial ??= event;
        break;
      case 'quality_flag':
        first.quality_flag ??= event;
        break;
    }
  }
  return first;
}

export function engagementScore(event: EventOf<'engagement'>, config: EvaluatorConfig): number {
  const { clicked, dwellSeconds, shared } = event.payload;
  const attention = clicked ? Math.min(1, dwellSeconds / config.dwellTargetSeconds) : 0;
  return clamp01(attention + (shared ? config.shareBonus : 0));
}

export function editorialScore(event: EventOf<'editorial'>, config: EvaluatorConfig): number {
  if (event.payload.decision === 'rejected') return 0;
  return clamp01(1 - event.payload.editRatio * config.editPenalty);
}

/**
 * Score one content id. Throws EvaluationError when none of the weighted
 * signals is present.
 */
export function score(
  outcome: ScoringOutcome,
  feedback: readonly FeedbackEvent[],
  config: EvaluatorConfig,
  options: ScoreOptions
): RewardSample {
  const events = firstEventPerSource(outcome.contentId, feedback);

  let validation: ValidationResult | null = null;
  if (events.generation) {
    validation = validateGeneration(events.generation.payload, config);
  }

  const flag = events.quality_flag?.payload.flag ?? null;
  const hallucinationScore = validation ? validation.hallucinationScore : null;
  const referenceMissRate = validation ? validation.referenceMissRate : null;

  const components: RewardComponents = {
    validation: validation ? (validation.passed ? 1 : 0) : null,
    heuristic: validation ? mean([validation.distinctSentenceRatio, validation.elementCoverage]) : null,
    editorial: events.editorial ? editorialScore(events.editorial, config) : null,
    engagement: events.engagement ? engagementScore(events.engagement, config) : null,
    hallucinationScore,
    referenceMissRate,
    qualityFlag: flag,
    penalty: 0,
    costPenalty: 0,
    issues: validation ? validation.issues : [],
  };

  const weighted: Array<[number | null, number]> = [
    [components.validation, config.weights.validation],
    [components.heuristic, config.weights.heuristic],
    [components.editorial, config.weights.editorial],
    [components.engagement, config.weights.engagement],
  ];

  let weightSum = 0;
  let total = 0;
  for (const [value, weight] of weighted) {
    if (value === null || weight <= 0) continue;
    weightSum += weight;
    total += value * weight;
  }

  if (weightSum === 0) {
    throw new EvaluationError(outcome.contentId, 'No weighted feedback signal to score');
  }

  components.penalty =
    config.penalties.hallucination * (hallucinationScore ?? 0) +
    config.penalties.referenceMiss * (referenceMissRate ?? 0) +
    (flag ? config.penalties.qualityFlag : 0);

  const cost = events.generation?.payload.cost ?? outcome.estimatedCost;
  components.costPenalty = config.costWeight * Math.min(1, cost / config.costCeiling);

  const hallucinated = (hallucinationScore ?? 0) >= config.hallucinationThreshold || flag === 'hallucination';

  const passed =
    (validation ? validation.passed : true) &&
    events.editorial?.payload.decision !== 'rejected' &&
    !hallucinated &&
    !(flag !== null && BLOCKING_FLAGS.has(flag));

  const sources: FeedbackSource[] = [];
  if (events.generation) sources.push('generation');
  if (events.engagement) sources.push('engagement');
  if (events.editorial) sources.push('editorial');
  if (events.quality_flag) sources.push('quality_flag');

  return {
    contentId: outcome.contentId,
    decisionId: outcome.decisionId,
    bucket: outcome.bucket,
    provider: outcome.provider,
    promptCategory: outcome.promptCategory,
    promptVariant: outcome.promptVariant,
    reward: clamp01(total / weightSum - components.penalty - components.costPenalty),
    passed,
    hallucinated,
    referenceMissRate,
    components,
    sources,
    cost,
    decidedAt: outcome.decidedAt,
    scoredAt: options.scoredAt,
    cycleId: options.cycleId,
    policyVersion: options.policyVersion,
  };
}

/**
 * Content is settled once an editor has ruled on it or the attribution
 * window since the decision has closed.
 */
export function isSettled(
  outcome: Pick<ScoringOutcome, 'decidedAt'>,
  events: FirstBySource,
  now: Date,
  config: EvaluatorConfig
): boolean {
  if (events.editorial) return true;
  const windowMs = config.attributionWindowHours * 60 * 60 * 1000;
  return now.getTime() - outcome.decidedAt.getTime() >= windowMs;
}
