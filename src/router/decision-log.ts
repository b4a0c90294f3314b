/**
 * Append-only routing decision log, used for audit and reward attribution.
 */

import { z } from 'zod';
import type { Queryable, Row } from '../db/postgres.js';
import { ProviderTierSchema } from '../config/routing-config.js';
import { RequestContextSchema, type RoutingDecision } from './router.types.js';

export interface DecisionLog {
  append(decision: RoutingDecision): Promise<void>;
  /** Most recent decision per content id */
  latestFor(contentIds: readonly string[]): Promise<Map<string, RoutingDecision>>;
}

function keepLatest(map: Map<string, RoutingDecision>, decision: RoutingDecision): void {
  const existing = map.get(decision.contentId);
  if (!existing || existing.decidedAt.getTime() <= decision.decidedAt.getTime()) {
    map.set(decision.contentId, decision);
  }
}

export class InMemoryDecisionLog implements DecisionLog {
  private readonly decisions: RoutingDecision[] = [];

  async append(decision: RoutingDecision): Promise<void> {
    this.decisions.push(decision);
  }

  async latestFor(contentIds: readonly string[]): Promise<Map<string, RoutingDecision>> {
    const wanted = new Set(contentIds);
    const result = new Map<string, RoutingDecision>();
    for (const decision of this.decisions) {
      if (wanted.has(decision.contentId)) keepLatest(result, decision);
    }
    return result;
  }

  all(): RoutingDecision[] {
    return [...this.decisions];
  }
}

// ============================================
// PostgreSQL
// ============================================

const DecisionRowSchema = z.object({
  decision_id: z.string(),
  content_id: z.string(),
  provider: z.string(),
  prompt_variant: z.string(),
  prompt_category: z.string(),
  bucket: z.string(),
  source: z.enum(['hard_rule', 'bandit', 'cold_start', 'exploit', 'throttle', 'fallback', 'validate_only']),
  rule_id: z.string().nullable(),
  fallback_reason: z.enum(['timeout', 'error']).nullable(),
  throttle_state: z.enum(['normal', 'soft', 'hard', 'emergency']),
  estimated_cost: z.coerce.number(),
  cost_accepted: z.boolean(),
  provider_tier: ProviderTierSchema,
  context: z.unknown(),
  config_version: z.coerce.number().int(),
  policy_version: z.coerce.number().int(),
  decision_time_ms: z.coerce.number(),
  decided_at: z.coerce.date(),
});

export function decisionFromRow(row: Row): RoutingDecision {
  const r = DecisionRowSchema.parse(row);
  return {
    decisionId: r.decision_id,
    contentId: r.content_id,
    provider: r.provider,
    providerTier: r.provider_tier,
    promptCategory: r.prompt_category,
    promptVariant: r.prompt_variant,
    context: RequestContextSchema.parse(r.context),
    bucket: r.bucket,
    decidedAt: r.decided_at,
    throttleState: r.throttle_state,
    estimatedCost: r.estimated_cost,
    costAccepted: r.cost_accepted,
    source: r.source,
    ruleId: r.rule_id,
    fallbackReason: r.fallback_reason,
    configVersion: r.config_version,
    policyVersion: r.policy_version,
    decisionTimeMs: r.decision_time_ms,
  };
}

export class PostgresDecisionLog implements DecisionLog {
  constructor(private readonly db: Queryable) {}

  async append(d: RoutingDecision): Promise<void> {
    await this.db.query(
      `INSERT INTO routing_decisions (
         decision_id, content_id, provider, provider_tier, prompt_variant, prompt_category, bucket,
         source, rule_id, fallback_reason, throttle_state, estimated_cost, cost_accepted,
         context, config_version, policy_version, decision_time_ms, decided_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)`,
      [
        d.decisionId, d.contentId, d.provider, d.providerTier, d.promptVariant, d.promptCategory, d.bucket,
        d.source, d.ruleId, d.fallbackReason, d.throttleState, d.estimatedCost, d.costAccepted,
        JSON.stringify(d.context),
        d.configVersion, d.policyVersion, d.decisionTimeMs, d.decidedAt,
      ]
    );
  }

  async latestFor(contentIds: readonly string[]): Promise<Map<string, RoutingDecision>> {
    const result = new Map<string, RoutingDecision>();
    if (contentIds.length === 0) return result;

    const rows = await this.db.query(
      `SELECT DISTINCT ON (content_id) *
       FROM routing_decisions
       WHERE content_id = ANY($1)
       ORDER BY content_id, decided_at DESC`,
      [Array.from(contentIds)]
    );
    for (const row of rows) {
      keepLatest(result, decisionFromRow(row));
    }
    return result;
  }
}
