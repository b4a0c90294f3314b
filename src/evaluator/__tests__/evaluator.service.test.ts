import { describe, it, expect } from 'vitest';
import { firstEventPerSource, isSettled, score } from '../evaluator.service.js';
import { EvaluationError } from '../../utils/errors.js';
import {
  FeedbackEventInputSchema,
  type FeedbackEvent,
  type FeedbackEventInput,
} from '../../collector/collector.types.js';
import { outcome, testConfig } from '../../__tests__/fixtures.js';

const evaluator = testConfig().evaluator;
const options = { cycleId: 'cycle-1', scoredAt: new Date('2026-09-05T00:00:00Z'), policyVersion: 1 };

let seq = 0;
function feedback(input: FeedbackEventInput): FeedbackEvent {
  seq += 1;
  const ingestedAt = new Date(Date.UTC(2026, 8, 2, 0, 0, seq));
  return { ...FeedbackEventInputSchema.parse(input), id: `event-${seq}`, seq, occurredAt: ingestedAt, ingestedAt };
}

const cleanGeneration: FeedbackEventInput = {
  contentId: 'card-1',
  source: 'generation',
  payload: {
    fields: {
      headline: 'Rates rise',
      lede: 'The central bank raised rates because inflation persisted. The impact on mortgages is immediate.',
    },
    sources: ['https://example.com/decision'],
  },
};

describe('score', () => {
  it('scores a clean generation on validation and heuristics alone', () => {
    const sample = score(outcome(), [feedback(cleanGeneration)], evaluator, options);

    expect(sample.reward).toBeCloseTo(1);
    expect(sample.passed).toBe(true);
    expect(sample.hallucinated).toBe(false);
    expect(sample.components).toMatchObject({
      validation: 1,
      heuristic: 1,
      editorial: null,
      engagement: null,
      hallucinationScore: 0,
      referenceMissRate: 0,
      penalty: 0,
      costPenalty: 0,
    });
    expect(sample.sources).toEqual(['generation']);
    expect(sample.cycleId).toBe('cycle-1');
    expect(sample.policyVersion).toBe(1);
  });

  it('renormalises weights over the signals present', () => {
    const events = [
      feedback(cleanGeneration),
      feedback({ contentId: 'card-1', source: 'editorial', payload: { decision: 'accepted', editRatio: 0.2 } }),
      feedback({ contentId: 'card-1', source: 'engagement', payload: { clicked: true, dwellSeconds: 30 } }),
    ];

    const sample = score(outcome(), events, evaluator, options);

    // (0.3 x 1 + 0.1 x 1 + 0.4 x 0.9 + 0.2 x 0.5) / 1.0
    expect(sample.reward).toBeCloseTo(0.86);
    expect(sample.components.editorial).toBeCloseTo(0.9);
    expect(sample.components.engagement).toBeCloseTo(0.5);
    expect(sample.sources).toEqual(['generation', 'engagement', 'editorial']);
  });

  it('fails an editorially rejected item and applies the flag penalty', () => {
    const events = [
      feedback(cleanGeneration),
      feedback({ contentId: 'card-1', source: 'editorial', payload: { decision: 'rejected' } }),
      feedback({ contentId: 'card-1', source: 'quality_flag', payload: { flag: 'factual_error' } }),
    ];

    const sample = score(outcome(), events, evaluator, options);

    // (0.3 + 0.1 + 0) / 0.8 - 0.3
    expect(sample.reward).toBeCloseTo(0.2);
    expect(sample.passed).toBe(false);
    expect(sample.hallucinated).toBe(false);
    expect(sample.components.qualityFlag).toBe('factual_error');
  });

  it('marks hedged text as hallucinated', () => {
    const sample = score(outcome(), [
      feedback({
        contentId: 'card-1',
        source: 'generation',
        payload: {
          fields: { headline: 'Cuts ahead', lede: 'Officials reportedly plan cuts. Sources say more is allegedly coming.' },
          sources: ['https://example.com/cuts'],
        },
      }),
    ], evaluator, options);

    expect(sample.components.hallucinationScore).toBe(1);
    expect(sample.hallucinated).toBe(true);
    expect(sample.passed).toBe(false);
  });

  it('keeps only the first event per source', () => {
    const events = [
      feedback({ contentId: 'card-1', source: 'engagement', payload: { clicked: false } }),
      feedback({ contentId: 'card-1', source: 'engagement', payload: { clicked: true, dwellSeconds: 120 } }),
    ];

    const sample = score(outcome(), [...events].reverse(), evaluator, options);

    expect(sample.reward).toBe(0);
    expect(sample.components.engagement).toBe(0);
    expect(sample.passed).toBe(true);
  });

  it('takes the reported cost over the estimate', () => {
    const withCost = feedback({
      contentId: 'card-1',
      source: 'generation',
      payload: { fields: { headline: 'h', lede: 'l' }, sources: [], cost: 0.05 },
    });

    expect(score(outcome(), [withCost], evaluator, options).cost).toBe(0.05);
    expect(score(outcome(), [feedback(cleanGeneration)], evaluator, options).cost).toBe(0.0012);
  });

  it('subtracts the weighted cost when a cost weight is set', () => {
    const costAware = testConfig(raw => {
      raw.evaluator = { ...raw.evaluator, costWeight: 0.5 };
    }).evaluator;
    const generation = (cost: number) => feedback({
      contentId: 'card-1',
      source: 'generation',
      payload: {
        fields: {
          headline: 'Rates rise',
          lede: 'The central bank raised rates because inflation persisted. The impact on mortgages is immediate.',
        },
        sources: ['https://example.com/decision'],
        cost,
      },
    });

    const cheap = score(outcome(), [generation(0.01)], costAware, options);
    const expensive = score(outcome(), [generation(0.2)], costAware, options);

    // 1 - 0.5 x 0.01 / 0.05
    expect(cheap.components.costPenalty).toBeCloseTo(0.1);
    expect(cheap.reward).toBeCloseTo(0.9);
    // capped at the cost weight
    expect(expensive.components.costPenalty).toBeCloseTo(0.5);
    expect(expensive.reward).toBeCloseTo(0.5);
  });

  it('throws when no weighted signal is present', () => {
    const onlyFlag = [feedback({ contentId: 'card-1', source: 'quality_flag', payload: { flag: 'tone' } })];

    expect(() => score(outcome(), onlyFlag, evaluator, options)).toThrow(EvaluationError);
  });

  it('ignores events for other content', () => {
    const other = feedback({ ...cleanGeneration, contentId: 'card-2' });

    expect(() => score(outcome(), [other], evaluator, options)).toThrow(EvaluationError);
  });
});

describe('isSettled', () => {
  const decidedAt = new Date('2026-09-01T00:00:00Z');

  it('settles immediately on an editorial decision', () => {
    const events = firstEventPerSource('card-1', [
      feedback({ contentId: 'card-1', source: 'editorial', payload: { decision: 'accepted' } }),
    ]);

    expect(isSettled({ decidedAt }, events, new Date('2026-09-01T01:00:00Z'), evaluator)).toBe(true);
  });

  it('settles when the attribution window closes', () => {
    expect(isSettled({ decidedAt }, {}, new Date('2026-09-03T23:59:59Z'), evaluator)).toBe(false);
    expect(isSettled({ decidedAt }, {}, new Date('2026-09-04T00:00:00Z'), evaluator)).toBe(true);
  });
});
