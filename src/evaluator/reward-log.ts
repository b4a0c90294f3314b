/**
 * Reward log: one append-only record per scored content id.
 *
 * Each sample carries the policy version it is applied in. A sample above
 * the active version was written by a cycle that failed before publishing,
 * and the next cycle applies it again.
 */

import { z } from 'zod';
import type { Queryable, Row } from '../db/postgres.js';
import { FEEDBACK_SOURCES } from '../collector/collector.types.js';
import type { RewardComponents, RewardSample } from './evaluator.types.js';

export interface RewardLog {
  /** Appends samples whose content id is new; returns the ids written. */
  append(samples: readonly RewardSample[]): Promise<Set<string>>;
  /** Samples whose decision was made at or after `from`. */
  decidedSince(from: Date): Promise<RewardSample[]>;
  existing(contentIds: readonly string[]): Promise<Set<string>>;
  /** Samples logged for a policy version above `version`, oldest first. */
  unpublished(version: number): Promise<RewardSample[]>;
}

export class InMemoryRewardLog implements RewardLog {
  private readonly samples = new Map<string, RewardSample>();

  async append(samples: readonly RewardSample[]): Promise<Set<string>> {
    const written = new Set<string>();
    for (const sample of samples) {
      if (this.samples.has(sample.contentId)) continue;
      this.samples.set(sample.contentId, sample);
      written.add(sample.contentId);
    }
    return written;
  }

  async decidedSince(from: Date): Promise<RewardSample[]> {
    return Array.from(this.samples.values())
      .filter(s => s.decidedAt.getTime() >= from.getTime())
      .sort((a, b) => a.decidedAt.getTime() - b.decidedAt.getTime());
  }

  async existing(contentIds: readonly string[]): Promise<Set<string>> {
    return new Set(contentIds.filter(id => this.samples.has(id)));
  }

  async unpublished(version: number): Promise<RewardSample[]> {
    return Array.from(this.samples.values()).filter(s => s.policyVersion > version);
  }

  all(): RewardSample[] {
    return Array.from(this.samples.values());
  }
}

// ============================================
// PostgreSQL
// ============================================

const ComponentsSchema: z.ZodType<RewardComponents> = z.object({
  validation: z.number().nullable(),
  heuristic: z.number().nullable(),
  editorial: z.number().nullable(),
  engagement: z.number().nullable(),
  hallucinationScore: z.number().nullable(),
  referenceMissRate: z.number().nullable(),
  qualityFlag: z.string().nullable(),
  penalty: z.number(),
  costPenalty: z.number(),
  issues: z.array(z.string()),
});

const RewardRowSchema = z.object({
  content_id: z.string(),
  decision_id: z.string(),
  bucket: z.string(),
  provider: z.string(),
  prompt_category: z.string(),
  prompt_variant: z.string(),
  // NUMERIC columns arrive as strings
  reward: z.coerce.number(),
  passed: z.boolean(),
  hallucinated: z.boolean(),
  reference_miss_rate: z.coerce.number().nullable(),
  components: ComponentsSchema,
  sources: z.array(z.enum(FEEDBACK_SOURCES)),
  cost: z.coerce.number(),
  decided_at: z.coerce.date(),
  scored_at: z.coerce.date(),
  cycle_id: z.string(),
  policy_version: z.number().int(),
});

export function rewardSampleFromRow(row: Row): RewardSample {
  const r = RewardRowSchema.parse(row);
  return {
    contentId: r.content_id,
    decisionId: r.decision_id,
    bucket: r.bucket,
    provider: r.provider,
    promptCategory: r.prompt_category,
    promptVariant: r.prompt_variant,
    reward: r.reward,
    passed: r.passed,
    hallucinated: r.hallucinated,
    referenceMissRate: r.reference_miss_rate,
    components: r.components,
    sources: r.sources,
    cost: r.cost,
    decidedAt: r.decided_at,
    scoredAt: r.scored_at,
    cycleId: r.cycle_id,
    policyVersion: r.policy_version,
  };
}

export class PostgresRewardLog implements RewardLog {
  constructor(private readonly db: Queryable) {}

  async append(samples: readonly RewardSample[]): Promise<Set<string>> {
    const written = new Set<string>();
    for (const s of samples) {
      const rows = await this.db.query(
        `INSERT INTO reward_samples (
           content_id, decision_id, bucket, provider, prompt_category, prompt_variant,
           reward, passed, hallucinated, reference_miss_rate, components, sources,
           cost, decided_at, scored_at, cycle_id, policy_version
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)
         ON CONFLICT (content_id) DO NOTHING
         RETURNING content_id`,
        [
          s.contentId, s.decisionId, s.bucket, s.provider, s.promptCategory, s.promptVariant,
          s.reward, s.passed, s.hallucinated, s.referenceMissRate, JSON.stringify(s.components), s.sources,
          s.cost, s.decidedAt, s.scoredAt, s.cycleId, s.policyVersion,
        ]
      );
      if (rows.length > 0) written.add(s.contentId);
    }
    return written;
  }

  async decidedSince(from: Date): Promise<RewardSample[]> {
    const rows = await this.db.query(
      `SELECT * FROM reward_samples WHERE decided_at >= $1 ORDER BY decided_at`,
      [from]
    );
    return rows.map(rewardSampleFromRow);
  }

  async existing(contentIds: readonly string[]): Promise<Set<string>> {
    if (contentIds.length === 0) return new Set();
    const rows = await this.db.query(
      'SELECT content_id FROM reward_samples WHERE content_id = ANY($1)',
      [Array.from(contentIds)]
    );
    return new Set(rows.map(row => String(row.content_id)));
  }

  async unpublished(version: number): Promise<RewardSample[]> {
    const rows = await this.db.query(
      'SELECT * FROM reward_samples WHERE policy_version > $1 ORDER BY scored_at, content_id',
      [version]
    );
    return rows.map(rewardSampleFromRow);
  }
}
