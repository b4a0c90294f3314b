/**
 * Hard Rules - Step 1
 *
 * An ordered table of predicate -> forced provider. Every predicate a rule
 * sets must hold; the first matching rule wins and the bandit is not
 * consulted.
 */

import type { RoutingRule } from '../../config/routing-config.js';
import type { RequestContext } from '../router.types.js';
import { matchKeywords } from './keywords.js';

export interface RuleMatch {
  rule: RoutingRule;
  /** Labels of the predicates that held, for logging */
  matched: string[];
}

/**
 * Evaluate one rule. Returns the matched predicate labels, or null.
 */
export function matchRule(rule: RoutingRule, context: RequestContext): string[] | null {
  const { when } = rule;
  const matched: string[] = [];

  if (when.languages) {
    const language = context.language.toLowerCase();
    if (!when.languages.some(l => l.toLowerCase() === language)) return null;
    matched.push(`language:${language}`);
  }

  if (when.categories) {
    if (!when.categories.includes(context.category)) return null;
    matched.push(`category:${context.category}`);
  }

  if (when.keywords) {
    const hits = matchKeywords(context.headline, when.keywords);
    if (hits.length === 0) return null;
    matched.push(...hits.map(k => `keyword:${k}`));
  }

  if (when.minComplexity !== undefined) {
    if (context.complexity < when.minComplexity) return null;
    matched.push(`complexity>=${when.minComplexity}`);
  }

  if (when.minRisk !== undefined) {
    if (context.risk < when.minRisk) return null;
    matched.push(`risk>=${when.minRisk}`);
  }

  return matched;
}

export function findForcedRule(rules: readonly RoutingRule[], context: RequestContext): RuleMatch | null {
  for (const rule of rules) {
    const matched = matchRule(rule, context);
    if (matched) return { rule, matched };
  }
  return null;
}
