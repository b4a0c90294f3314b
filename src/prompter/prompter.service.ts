/**
 * Prompter Service
 *
 * Epsilon-greedy choice among operator-curated prompt templates per
 * category. Independent of provider choice; the two are combined at
 * generation time.
 */

import type { PromptVariant, RoutingConfig } from '../config/routing-config.js';
import { weightedIndex, type RandomSource } from '../utils/random.js';
import { clamp01 } from '../utils/stats.js';
import type { PrompterState, VariantReport, VariantSelection, VariantStats } from './prompter.types.js';

const DEFAULT_CATEGORY = 'default';

const EMPTY_STATS: VariantStats = { trials: 0, successes: 0, totalReward: 0 };

export function resolveCategory(config: RoutingConfig, category: string): string {
  return Object.prototype.hasOwnProperty.call(config.prompter.variants, category) ? category : DEFAULT_CATEGORY;
}

function statsFor(state: PrompterState, category: string, variantId: string): VariantStats {
  return state[category]?.[variantId] ?? EMPTY_STATS;
}

function meanReward(stats: VariantStats): number {
  return stats.trials === 0 ? 0 : stats.totalReward / stats.trials;
}

/**
 * Best mean reward among variants with enough trials; the first listed
 * variant when none qualifies yet.
 */
export function bestVariant(state: PrompterState, config: RoutingConfig, category: string): PromptVariant {
  const variants = config.prompter.variants[category];
  let best: PromptVariant | null = null;
  let bestMean = -Infinity;

  for (const variant of variants) {
    const stats = statsFor(state, category, variant.id);
    if (stats.trials < config.prompter.minTrialsForExploit) continue;
    const value = meanReward(stats);
    if (value > bestMean) {
      best = variant;
      bestMean = value;
    }
  }

  return best ?? variants[0];
}

export function selectVariant(
  state: PrompterState,
  category: string,
  config: RoutingConfig,
  random: RandomSource,
  options: { explore?: boolean } = {}
): VariantSelection {
  const resolved = resolveCategory(config, category);
  const variants = config.prompter.variants[resolved];
  const explore = options.explore !== false
    && variants.length > 1
    && random.next() < config.prompter.explorationRate;

  if (!explore) {
    return { category: resolved, variantId: bestVariant(state, config, resolved).id, mode: 'exploit' };
  }

  // Prefer variants that have not yet reached the exploit threshold
  const minTrials = config.prompter.minTrialsForExploit;
  const underTried = variants.filter(v => statsFor(state, resolved, v.id).trials < minTrials);
  const pool = underTried.length > 0 ? underTried : variants;
  const weights = pool.map(v => (underTried.length > 0 ? 1 / Math.max(1, statsFor(state, resolved, v.id).trials) : 1));

  return { category: resolved, variantId: pool[weightedIndex(weights, random)].id, mode: 'explore' };
}

/**
 * Fill {placeholder} tokens in a variant's template. Unknown placeholders
 * are left as written.
 */
export function renderPrompt(
  config: RoutingConfig,
  category: string,
  variantId: string,
  vars: Record<string, string>
): string | null {
  const resolved = resolveCategory(config, category);
  const variant = config.prompter.variants[resolved].find(v => v.id === variantId);
  if (!variant) return null;
  return variant.template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : match
  );
}

// ============================================
// Updates
// ============================================

/**
 * Copy-on-write builder for the next prompter state.
 */
export class PrompterUpdate {
  private readonly next: PrompterState;
  private skipped = 0;

  constructor(current: PrompterState, private readonly config: RoutingConfig) {
    this.next = {};
    for (const [category, variants] of Object.entries(current)) {
      this.next[category] = { ...variants };
    }
  }

  update(category: string, variantId: string, reward: number): boolean {
    const known = resolveCategory(this.config, category) === category
      && this.config.prompter.variants[category].some(v => v.id === variantId);
    if (!known) {
      this.skipped += 1;
      return false;
    }

    const r = clamp01(reward);
    const variants = (this.next[category] ??= {});
    const stats = variants[variantId] ?? EMPTY_STATS;
    variants[variantId] = {
      trials: stats.trials + 1,
      successes: stats.successes + (r >= this.config.prompter.successThreshold ? 1 : 0),
      totalReward: stats.totalReward + r,
    };
    return true;
  }

  get skippedCount(): number {
    return this.skipped;
  }

  build(): PrompterState {
    return this.next;
  }
}

export function variantReport(state: PrompterState, config: RoutingConfig): VariantReport[] {
  const report: VariantReport[] = [];
  for (const [category, variants] of Object.entries(config.prompter.variants)) {
    for (const variant of variants) {
      const stats = statsFor(state, category, variant.id);
      report.push({
        category,
        variantId: variant.id,
        trials: stats.trials,
        successRate: stats.trials === 0 ? 0 : stats.successes / stats.trials,
        meanReward: meanReward(stats),
      });
    }
  }
  return report;
}
