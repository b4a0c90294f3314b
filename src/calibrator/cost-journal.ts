/**
 * Append-only cost journal used to rebuild budget state after a restart.
 */

import { z } from 'zod';
import type { Queryable } from '../db/postgres.js';
import type { CostEntry } from './calibrator.types.js';

export interface CostJournal {
  append(entry: CostEntry): Promise<void>;
  /** Entries recorded at or after `from`, oldest first */
  since(from: Date): Promise<CostEntry[]>;
}

export class InMemoryCostJournal implements CostJournal {
  private readonly entries: CostEntry[] = [];

  async append(entry: CostEntry): Promise<void> {
    this.entries.push(entry);
  }

  async since(from: Date): Promise<CostEntry[]> {
    return this.entries
      .filter(e => e.recordedAt.getTime() >= from.getTime())
      .sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime());
  }

  all(): CostEntry[] {
    return [...this.entries];
  }
}

const CostRowSchema = z.object({
  amount: z.coerce.number(),
  provider: z.string().nullable(),
  content_id: z.string().nullable(),
  kind: z.enum(['estimate', 'adjustment']),
  recorded_at: z.coerce.date(),
});

export class PostgresCostJournal implements CostJournal {
  constructor(private readonly db: Queryable) {}

  async append(entry: CostEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO cost_events (amount, provider, content_id, kind, recorded_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [entry.amount, entry.provider, entry.contentId, entry.kind, entry.recordedAt]
    );
  }

  async since(from: Date): Promise<CostEntry[]> {
    const rows = await this.db.query(
      `SELECT amount, provider, content_id, kind, recorded_at
       FROM cost_events
       WHERE recorded_at >= $1
       ORDER BY recorded_at, id`,
      [from]
    );
    return rows.map(row => {
      const r = CostRowSchema.parse(row);
      return {
        amount: r.amount,
        provider: r.provider,
        contentId: r.content_id,
        kind: r.kind,
        recordedAt: r.recorded_at,
      };
    });
  }
}
