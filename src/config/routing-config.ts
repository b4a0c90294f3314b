/**
 * Routing policy configuration.
 *
 * The policy lives in a YAML file edited by operators. It is validated in
 * two passes (shape with zod, then cross-references and bounds) and
 * published as a versioned, frozen snapshot. A reload that fails
 * validation leaves the active version untouched.
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { SnapshotCell } from '../utils/snapshot.js';
import { systemClock, type Clock } from '../utils/time.js';
import logger from '../utils/logger.js';

// ============================================
// Schema
// ============================================

export const ProviderTierSchema = z.enum(['economy', 'standard', 'premium']);

const ProviderSchema = z.object({
  id: z.string().min(1),
  tier: ProviderTierSchema,
  costPer1kTokens: z.number().nonnegative(),
});

const RuleConditionSchema = z.object({
  languages: z.array(z.string().min(1)).min(1).optional(),
  categories: z.array(z.string().min(1)).min(1).optional(),
  keywords: z.array(z.string().min(1)).min(1).optional(),
  minComplexity: z.number().min(0).max(1).optional(),
  minRisk: z.number().min(0).max(1).optional(),
}).refine(
  c => Object.values(c).some(v => v !== undefined),
  { message: 'rule condition must set at least one predicate' }
);

const RuleSchema = z.object({
  id: z.string().min(1),
  provider: z.string().min(1),
  description: z.string().optional(),
  when: RuleConditionSchema,
  survivesHardThrottle: z.boolean().default(true),
});

const BucketSchema = z.object({
  languages: z.array(z.string().min(1)).default([]),
  criticalCategories: z.array(z.string().min(1)).default([]),
  criticalKeywords: z.array(z.string().min(1)).default([]),
  complexityTiers: z.array(z.object({
    name: z.string().min(1),
    max: z.number().min(0).max(1),
  })).min(1),
  maxBuckets: z.number().int().positive().default(50),
});

const RouterSchema = z.object({
  safeProvider: z.string().min(1),
  timeoutMs: z.number().positive().default(5),
  defaultEstimatedTokens: z.number().int().positive().default(1500),
  alwaysPremiumCategories: z.array(z.string().min(1)).default([]),
  /** Requests with a lower sourceTrust are routed validate-only; 0 disables */
  minSourceTrust: z.number().min(0).max(1).default(0),
});

const BudgetSchema = z.object({
  monthlyCap: z.number().positive(),
  currency: z.string().default('EUR'),
  softRatio: z.number().gt(1).default(1.1),
  hardRatio: z.number().gt(1).default(1.25),
  dailyHardCap: z.number().positive().optional(),
  maxSingleRequestCost: z.number().positive(),
  softPremiumMultiplier: z.number().gt(0).max(1).default(0.7),
}).refine(b => b.hardRatio > b.softRatio, { message: 'hardRatio must be greater than softRatio' });

const BanditSchema = z.object({
  minSamplesPerBucket: z.number().int().nonnegative().default(20),
  priorAlpha: z.number().positive().default(1),
  priorBeta: z.number().positive().default(1),
});

const VariantSchema = z.object({
  id: z.string().min(1),
  template: z.string().min(1),
});

const PrompterSchema = z.object({
  explorationRate: z.number().min(0).max(1).default(0.1),
  minTrialsForExploit: z.number().int().positive().default(5),
  successThreshold: z.number().min(0).max(1).default(0.6),
  variants: z.record(z.array(VariantSchema).min(1)),
});

const EvaluatorSchema = z.object({
  weights: z.object({
    validation: z.number().nonnegative().default(0.3),
    heuristic: z.number().nonnegative().default(0.1),
    editorial: z.number().nonnegative().default(0.4),
    engagement: z.number().nonnegative().default(0.2),
  }).default({}),
  penalties: z.object({
    hallucination: z.number().nonnegative().default(0.3),
    referenceMiss: z.number().nonnegative().default(0.1),
    qualityFlag: z.number().nonnegative().default(0.3),
  }).default({}),
  requiredFields: z.array(z.string().min(1)).default(['headline', 'lede', 'whyItMatters']),
  bannedPhrases: z.array(z.string().min(1)).default([]),
  minSources: z.number().int().nonnegative().default(1),
  hedgeTerms: z.array(z.string().min(1)).default([]),
  hallucinationThreshold: z.number().min(0).max(1).default(0.1),
  analyticalElements: z.array(z.object({
    id: z.string().min(1),
    terms: z.array(z.string().min(1)).min(1),
  })).default([]),
  dwellTargetSeconds: z.number().positive().default(60),
  shareBonus: z.number().min(0).max(1).default(0.2),
  editPenalty: z.number().min(0).max(1).default(0.5),
  attributionWindowHours: z.number().positive().default(72),
  /** Share of the reward traded against cost; 0 scores quality only */
  costWeight: z.number().min(0).max(1).default(0),
  /** Cost at which the cost term saturates */
  costCeiling: z.number().positive().default(0.05),
});

const RegressionSchema = z.object({
  windowDays: z.number().int().min(2).default(14),
  significance: z.number().gt(0).lt(0.5).default(0.05),
  minEffect: z.number().min(0).max(1).default(0.05),
  minSamplesPerHalf: z.number().int().positive().default(30),
});

const QualityGatesSchema = z.object({
  minPassRate: z.number().min(0).max(1).default(0.7),
  maxHallucinationRate: z.number().min(0).max(1).default(0.1),
  maxReferenceMissRate: z.number().min(0).max(1).default(0.2),
  minSamples: z.number().int().positive().default(10),
});

const LearningSchema = z.object({
  drainPageSize: z.number().int().positive().default(500),
  maxPendingContent: z.number().int().positive().default(10000),
  /** Re-read window before the watermark for events that committed late */
  drainOverlapSeconds: z.number().int().nonnegative().default(300),
});

export const RoutingConfigSchema = z.object({
  providers: z.array(ProviderSchema).min(1),
  router: RouterSchema,
  rules: z.array(RuleSchema).default([]),
  buckets: BucketSchema,
  budget: BudgetSchema,
  bandit: BanditSchema.default({}),
  prompter: PrompterSchema,
  evaluator: EvaluatorSchema.default({}),
  regression: RegressionSchema.default({}),
  qualityGates: QualityGatesSchema.default({}),
  learning: LearningSchema.default({}),
});

export type RoutingConfig = z.infer<typeof RoutingConfigSchema>;
export type RoutingConfigInput = z.input<typeof RoutingConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderSchema>;
export type ProviderTier = z.infer<typeof ProviderTierSchema>;
export type RoutingRule = z.infer<typeof RuleSchema>;
export type BucketConfig = z.infer<typeof BucketSchema>;
export type BudgetConfig = z.infer<typeof BudgetSchema>;
export type PromptVariant = z.infer<typeof VariantSchema>;
export type EvaluatorConfig = z.infer<typeof EvaluatorSchema>;
export type RegressionConfig = z.infer<typeof RegressionSchema>;
export type QualityGatesConfig = z.infer<typeof QualityGatesSchema>;

// ============================================
// Validation
// ============================================

const TIER_ORDER: Record<ProviderTier, number> = { economy: 0, standard: 1, premium: 2 };

/**
 * Number of distinct bandit buckets the configuration produces:
 * (configured languages + "other") x (critical, standard) x complexity tiers.
 */
export function bucketCardinality(buckets: BucketConfig): number {
  return (buckets.languages.length + 1) * 2 * buckets.complexityTiers.length;
}

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return Array.from(duplicates);
}

function crossCheck(config: RoutingConfig): string[] {
  const issues: string[] = [];
  const providerIds = new Set(config.providers.map(p => p.id));

  for (const id of findDuplicates(config.providers.map(p => p.id))) {
    issues.push(`providers: duplicate provider id "${id}"`);
  }

  if (!providerIds.has(config.router.safeProvider)) {
    issues.push(`router.safeProvider: unknown provider "${config.router.safeProvider}"`);
  }

  for (const id of findDuplicates(config.rules.map(r => r.id))) {
    issues.push(`rules: duplicate rule id "${id}"`);
  }
  for (const rule of config.rules) {
    if (!providerIds.has(rule.provider)) {
      issues.push(`rules.${rule.id}: unknown provider "${rule.provider}"`);
    }
  }

  const tiers = config.buckets.complexityTiers;
  for (let i = 1; i < tiers.length; i++) {
    if (tiers[i].max <= tiers[i - 1].max) {
      issues.push(`buckets.complexityTiers: "${tiers[i].name}" must have a larger max than "${tiers[i - 1].name}"`);
    }
  }
  if (tiers[tiers.length - 1].max !== 1) {
    issues.push('buckets.complexityTiers: the last tier must have max 1');
  }
  for (const name of findDuplicates(tiers.map(t => t.name))) {
    issues.push(`buckets.complexityTiers: duplicate tier "${name}"`);
  }

  const cardinality = bucketCardinality(config.buckets);
  if (cardinality > config.buckets.maxBuckets) {
    issues.push(`buckets: ${cardinality} buckets exceeds the bound of ${config.buckets.maxBuckets}`);
  }

  if (!config.prompter.variants.default) {
    issues.push('prompter.variants: a "default" category is required');
  }
  for (const [category, variants] of Object.entries(config.prompter.variants)) {
    for (const id of findDuplicates(variants.map(v => v.id))) {
      issues.push(`prompter.variants.${category}: duplicate variant id "${id}"`);
    }
  }

  const weights = config.evaluator.weights;
  if (weights.validation + weights.heuristic + weights.editorial + weights.engagement <= 0) {
    issues.push('evaluator.weights: at least one weight must be positive');
  }

  return issues;
}

/**
 * Validate raw (already parsed) configuration data.
 */
export function parseRoutingConfig(raw: unknown): RoutingConfig {
  const parsed = RoutingConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid routing configuration',
      parsed.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
    );
  }

  const issues = crossCheck(parsed.data);
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid routing configuration', issues);
  }

  return parsed.data;
}

/**
 * Load and validate the routing configuration from a YAML file.
 */
export async function loadRoutingConfigFile(filePath: string): Promise<RoutingConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read routing configuration at ${filePath}`, [errorMessage(error)]);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Malformed YAML in ${filePath}`, [errorMessage(error)]);
  }

  return parseRoutingConfig(raw);
}

// ============================================
// Provider helpers
// ============================================

/**
 * Lowest-cost provider; ties go to the lower tier, then declaration order.
 */
export function cheapestOf(providers: readonly ProviderConfig[]): ProviderConfig {
  return providers.reduce((best, candidate) => {
    if (candidate.costPer1kTokens < best.costPer1kTokens) return candidate;
    if (candidate.costPer1kTokens === best.costPer1kTokens && TIER_ORDER[candidate.tier] < TIER_ORDER[best.tier]) {
      return candidate;
    }
    return best;
  });
}

export function cheapestProvider(config: RoutingConfig): ProviderConfig {
  return cheapestOf(config.providers);
}

export function findProvider(config: RoutingConfig, id: string): ProviderConfig | undefined {
  return config.providers.find(p => p.id === id);
}

export function estimateCost(provider: ProviderConfig, tokens: number): number {
  return (provider.costPer1kTokens * tokens) / 1000;
}

// ============================================
// Versioned store
// ============================================

export interface RoutingConfigSnapshot {
  version: number;
  loadedAt: Date;
  source: string;
  config: RoutingConfig;
}

/**
 * Read side of the configuration store; services take this so tests can
 * hand them a fixed snapshot.
 */
export interface ConfigSource {
  current(): Readonly<RoutingConfigSnapshot>;
}

export function staticConfigSource(config: RoutingConfig, version = 1): ConfigSource {
  const snapshot: RoutingConfigSnapshot = { version, loadedAt: new Date(0), source: 'inline', config };
  return { current: () => snapshot };
}

export class RoutingConfigStore implements ConfigSource {
  private readonly cell: SnapshotCell<RoutingConfigSnapshot>;

  constructor(
    initial: RoutingConfig,
    private readonly filePath: string | null = null,
    private readonly clock: Clock = systemClock
  ) {
    this.cell = new SnapshotCell<RoutingConfigSnapshot>({
      version: 1,
      loadedAt: clock(),
      source: filePath ?? 'inline',
      config: initial,
    });
  }

  static async fromFile(filePath: string, clock: Clock = systemClock): Promise<RoutingConfigStore> {
    const config = await loadRoutingConfigFile(filePath);
    logger.info('Routing configuration loaded', {
      filePath,
      providers: config.providers.map(p => p.id),
      rules: config.rules.length,
      buckets: bucketCardinality(config.buckets),
    });
    return new RoutingConfigStore(config, filePath, clock);
  }

  current(): Readonly<RoutingConfigSnapshot> {
    return this.cell.get();
  }

  /**
   * Re-read the file and publish a new version. Throws ConfigurationError
   * (and keeps the active version) when the new content is invalid.
   */
  async reload(): Promise<Readonly<RoutingConfigSnapshot>> {
    if (!this.filePath) {
      throw new ConfigurationError('Routing configuration was not loaded from a file');
    }
    const source = this.filePath;

    try {
      const config = await loadRoutingConfigFile(source);
      return this.publish(config, source);
    } catch (error) {
      logger.error('Routing configuration reload rejected', {
        filePath: source,
        activeVersion: this.current().version,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Validate and publish a configuration object supplied in-process.
   */
  replace(raw: unknown): Readonly<RoutingConfigSnapshot> {
    return this.publish(parseRoutingConfig(raw), 'inline');
  }

  private publish(config: RoutingConfig, source: string): Readonly<RoutingConfigSnapshot> {
    const next = this.cell.update(current => ({
      version: current.version + 1,
      loadedAt: this.clock(),
      source,
      config,
    }));
    logger.info('Routing configuration published', { version: next.version, source });
    return next;
  }
}
