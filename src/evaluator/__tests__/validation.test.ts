import { describe, it, expect } from 'vitest';
import {
  distinctSentenceRatio,
  elementCoverage,
  hallucinationScore,
  isResolvableReference,
  validateGeneration,
} from '../validation.js';
import { GenerationPayloadSchema } from '../../collector/collector.types.js';
import { testConfig } from '../../__tests__/fixtures.js';

const evaluator = testConfig().evaluator;

describe('isResolvableReference', () => {
  it.each([
    ['https://example.com/story', true],
    ['http://news.example.org', true],
    ['ftp://example.com/file', false],
    ['http://localhost/x', false],
    ['see the report', false],
  ] as const)('%s -> %s', (reference, expected) => {
    expect(isResolvableReference(reference)).toBe(expected);
  });
});

describe('hallucinationScore', () => {
  it('treats empty text as uncertain', () => {
    expect(hallucinationScore('   ', ['reportedly'])).toBe(0.5);
  });

  it('counts distinct hedge terms per 50 words', () => {
    const text = Array.from({ length: 100 }, (_, i) => (i === 10 ? 'reportedly' : 'word')).join(' ');

    expect(hallucinationScore(text, ['reportedly', 'allegedly'])).toBe(0.5);
  });
});

describe('heuristics', () => {
  it('measures repeated sentences', () => {
    expect(distinctSentenceRatio('Rates rose. Rates rose! Markets fell.')).toBeCloseTo(2 / 3);
    expect(distinctSentenceRatio('')).toBe(0);
  });

  it('measures analytical element coverage', () => {
    expect(elementCoverage('The impact is large.', evaluator.analyticalElements)).toBe(0.5);
    expect(elementCoverage('anything', [])).toBe(1);
  });
});

describe('validateGeneration', () => {
  it('lists every failed check', () => {
    const payload = GenerationPayloadSchema.parse({
      fields: { headline: 'As an AI I cannot say', lede: '  ' },
    });

    const result = validateGeneration(payload, evaluator);

    expect(result.passed).toBe(false);
    expect(result.issues).toEqual(['missing_field:lede', 'banned_phrase:as an AI', 'insufficient_sources:0/1']);
    expect(result.referenceMissRate).toBe(1);
  });

  it('reports the share of unresolvable references', () => {
    const payload = GenerationPayloadSchema.parse({
      fields: { headline: 'h', lede: 'l' },
      sources: ['https://example.com/a', 'internal memo'],
    });

    const result = validateGeneration(payload, evaluator);

    expect(result.passed).toBe(true);
    expect(result.resolvableSources).toBe(1);
    expect(result.referenceMissRate).toBe(0.5);
  });
});
