/**
 * Whole-word, case-insensitive keyword matching shared by hard rules and
 * bucket criticality.
 */

const cache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function patternFor(keyword: string): RegExp {
  let pattern = cache.get(keyword);
  if (!pattern) {
    pattern = new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(keyword)}(?=$|[^\\p{L}\\p{N}])`, 'iu');
    cache.set(keyword, pattern);
  }
  return pattern;
}

export function matchKeywords(text: string | undefined, keywords: readonly string[]): string[] {
  if (!text) return [];
  return keywords.filter(keyword => patternFor(keyword).test(text));
}
