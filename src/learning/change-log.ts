/**
 * Policy change log: append-only record of exploration freezes, thaws and
 * premium multiplier changes, with the report that caused them.
 */

import { z } from 'zod';
import type { Queryable } from '../db/postgres.js';

export type PolicyChangeKind = 'exploration_frozen' | 'exploration_resumed' | 'premium_multiplier';

export interface PolicyChange {
  id: string;
  kind: PolicyChangeKind;
  /** Short machine-readable cause, e.g. 'regression' or 'quality_gate' */
  cause: string;
  details: Record<string, unknown>;
  policyVersion: number;
  cycleId: string | null;
  createdAt: Date;
}

export interface ChangeLog {
  append(change: PolicyChange): Promise<void>;
  recent(limit: number): Promise<PolicyChange[]>;
}

export class InMemoryChangeLog implements ChangeLog {
  private readonly changes: PolicyChange[] = [];

  async append(change: PolicyChange): Promise<void> {
    this.changes.push(change);
  }

  async recent(limit: number): Promise<PolicyChange[]> {
    return this.changes.slice(-limit).reverse();
  }
}

const ChangeRowSchema = z.object({
  id: z.string(),
  kind: z.enum(['exploration_frozen', 'exploration_resumed', 'premium_multiplier']),
  cause: z.string(),
  details: z.record(z.unknown()),
  policy_version: z.coerce.number().int(),
  cycle_id: z.string().nullable(),
  created_at: z.coerce.date(),
});

export class PostgresChangeLog implements ChangeLog {
  constructor(private readonly db: Queryable) {}

  async append(change: PolicyChange): Promise<void> {
    await this.db.query(
      `INSERT INTO policy_changes (id, kind, cause, details, policy_version, cycle_id, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        change.id,
        change.kind,
        change.cause,
        JSON.stringify(change.details),
        change.policyVersion,
        change.cycleId,
        change.createdAt,
      ]
    );
  }

  async recent(limit: number): Promise<PolicyChange[]> {
    const rows = await this.db.query(
      `SELECT id, kind, cause, details, policy_version, cycle_id, created_at
       FROM policy_changes
       ORDER BY created_at DESC
       LIMIT $1`,
      [limit]
    );
    return rows.map(row => {
      const r = ChangeRowSchema.parse(row);
      return {
        id: r.id,
        kind: r.kind,
        cause: r.cause,
        details: r.details,
        policyVersion: r.policy_version,
        cycleId: r.cycle_id,
        createdAt: r.created_at,
      };
    });
  }
}
