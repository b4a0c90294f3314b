/**
 * Structural and content checks on a generated item.
 */

import type { EvaluatorConfig } from '../config/routing-config.js';
import type { GenerationPayload } from '../collector/collector.types.js';
import type { ValidationResult } from './evaluator.types.js';

const WORDS_PER_HEDGE_UNIT = 50;

export function generationText(payload: GenerationPayload): string {
  return Object.values(payload.fields).join('\n');
}

/**
 * An http(s) URL with a dotted host.
 */
export function isResolvableReference(reference: string): boolean {
  try {
    const url = new URL(reference.trim());
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.includes('.');
  } catch {
    return false;
  }
}

/**
 * Density of hedging language: distinct hedge terms present per 50 words,
 * capped at 1. Empty text is treated as uncertain (0.5).
 */
export function hallucinationScore(text: string, hedgeTerms: readonly string[]): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  if (words === 0) return 0.5;

  const lower = text.toLowerCase();
  const hits = hedgeTerms.filter(term => lower.includes(term.toLowerCase())).length;
  return Math.min(1, hits / Math.max(1, words / WORDS_PER_HEDGE_UNIT));
}

/**
 * Share of sentences that are not repeats of an earlier sentence.
 */
export function distinctSentenceRatio(text: string): number {
  const sentences = text
    .split(/[.!?\n]+/)
    .map(s => s.trim().toLowerCase().replace(/\s+/g, ' '))
    .filter(Boolean);
  if (sentences.length === 0) return 0;
  return new Set(sentences).size / sentences.length;
}

/**
 * Fraction of required analytical elements with at least one term present.
 */
export function elementCoverage(text: string, elements: EvaluatorConfig['analyticalElements']): number {
  if (elements.length === 0) return 1;
  const lower = text.toLowerCase();
  const covered = elements.filter(el => el.terms.some(term => lower.includes(term.toLowerCase())));
  return covered.length / elements.length;
}

export function validateGeneration(payload: GenerationPayload, config: EvaluatorConfig): ValidationResult {
  const text = generationText(payload);
  const lower = text.toLowerCase();
  const issues: string[] = [];

  const missingFields = config.requiredFields.filter(field => !payload.fields[field]?.trim());
  for (const field of missingFields) {
    issues.push(`missing_field:${field}`);
  }

  const bannedPhrases = config.bannedPhrases.filter(phrase => lower.includes(phrase.toLowerCase()));
  for (const phrase of bannedPhrases) {
    issues.push(`banned_phrase:${phrase}`);
  }

  const resolvableSources = payload.sources.filter(isResolvableReference).length;
  if (resolvableSources < config.minSources) {
    issues.push(`insufficient_sources:${resolvableSources}/${config.minSources}`);
  }

  const referenceMissRate = payload.sources.length === 0
    ? 1
    : (payload.sources.length - resolvableSources) / payload.sources.length;

  return {
    passed: issues.length === 0,
    issues,
    missingFields,
    bannedPhrases,
    resolvableSources,
    referenceMissRate,
    hallucinationScore: hallucinationScore(text, config.hedgeTerms),
    distinctSentenceRatio: distinctSentenceRatio(text),
    elementCoverage: elementCoverage(text, config.analyticalElements),
  };
}
