/**
 * Feedback event persistence.
 *
 * Both stores keep the same contract: insert is idempotent on
 * (contentId, source) and reads come back in (ingestedAt, seq) order.
 */

import { z } from 'zod';
import type { Queryable, Row } from '../db/postgres.js';
import { systemClock, type Clock } from '../utils/time.js';
import {
  FeedbackEventInputSchema,
  compareCursor,
  type DrainCursor,
  type FeedbackEvent,
  type NewFeedbackEvent,
} from './collector.types.js';

export interface FeedbackStore {
  /** Returns the stored event and whether this call created it. */
  insert(event: NewFeedbackEvent): Promise<{ inserted: boolean; event: FeedbackEvent }>;
  /** Events strictly after the cursor, oldest first. */
  pageAfter(cursor: DrainCursor, limit: number): Promise<FeedbackEvent[]>;
  findByContentIds(contentIds: readonly string[]): Promise<FeedbackEvent[]>;
}

// ============================================
// In-memory store
// ============================================

export class InMemoryFeedbackStore implements FeedbackStore {
  private readonly events: FeedbackEvent[] = [];
  private readonly byKey = new Map<string, FeedbackEvent>();
  private seq = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  async insert(event: NewFeedbackEvent): Promise<{ inserted: boolean; event: FeedbackEvent }> {
    const key = `${event.body.contentId}\u0000${event.body.source}`;
    const existing = this.byKey.get(key);
    if (existing) {
      return { inserted: false, event: existing };
    }

    this.seq += 1;
    const stored: FeedbackEvent = {
      ...event.body,
      id: event.id,
      seq: this.seq,
      occurredAt: event.occurredAt,
      ingestedAt: this.clock(),
    };
    this.byKey.set(key, stored);
    this.events.push(stored);
    return { inserted: true, event: stored };
  }

  async pageAfter(cursor: DrainCursor, limit: number): Promise<FeedbackEvent[]> {
    return this.events
      .filter(e => compareCursor({ ingestedAt: e.ingestedAt, seq: e.seq }, cursor) > 0)
      .sort((a, b) => compareCursor(a, b))
      .slice(0, limit);
  }

  async findByContentIds(contentIds: readonly string[]): Promise<FeedbackEvent[]> {
    const wanted = new Set(contentIds);
    return this.events
      .filter(e => wanted.has(e.contentId))
      .sort((a, b) => compareCursor(a, b));
  }

  size(): number {
    return this.events.length;
  }
}

// ============================================
// PostgreSQL store
// ============================================

const EVENT_COLUMNS = 'id, seq, content_id, source, payload, occurred_at, ingested_at';

const FeedbackRowSchema = z.object({
  id: z.string(),
  // BIGSERIAL arrives as a string
  seq: z.coerce.number().int(),
  content_id: z.string(),
  source: z.string(),
  payload: z.unknown(),
  occurred_at: z.coerce.date(),
  ingested_at: z.coerce.date(),
});

export function feedbackEventFromRow(row: Row): FeedbackEvent {
  const parsed = FeedbackRowSchema.parse(row);
  const body = FeedbackEventInputSchema.parse({
    contentId: parsed.content_id,
    source: parsed.source,
    payload: parsed.payload,
  });
  return {
    ...body,
    id: parsed.id,
    seq: parsed.seq,
    occurredAt: parsed.occurred_at,
    ingestedAt: parsed.ingested_at,
  };
}

export class PostgresFeedbackStore implements FeedbackStore {
  constructor(private readonly db: Queryable) {}

  async insert(event: NewFeedbackEvent): Promise<{ inserted: boolean; event: FeedbackEvent }> {
    const rows = await this.db.query(
      `INSERT INTO feedback_events (id, content_id, source, payload, occurred_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (content_id, source) DO NOTHING
       RETURNING ${EVENT_COLUMNS}`,
      [event.id, event.body.contentId, event.body.source, JSON.stringify(event.body.payload), event.occurredAt]
    );
    if (rows.length > 0) {
      return { inserted: true, event: feedbackEventFromRow(rows[0]) };
    }

    const existing = await this.db.query(
      `SELECT ${EVENT_COLUMNS} FROM feedback_events WHERE content_id = $1 AND source = $2`,
      [event.body.contentId, event.body.source]
    );
    if (existing.length === 0) {
      throw new Error(`Feedback event for ${event.body.contentId}/${event.body.source} conflicted but was not found`);
    }
    return { inserted: false, event: feedbackEventFromRow(existing[0]) };
  }

  async pageAfter(cursor: DrainCursor, limit: number): Promise<FeedbackEvent[]> {
    const rows = await this.db.query(
      `SELECT ${EVENT_COLUMNS} FROM feedback_events
       WHERE (ingested_at, seq) > ($1, $2)
       ORDER BY ingested_at, seq
       LIMIT $3`,
      [cursor.ingestedAt, cursor.seq, limit]
    );
    return rows.map(feedbackEventFromRow);
  }

  async findByContentIds(contentIds: readonly string[]): Promise<FeedbackEvent[]> {
    if (contentIds.length === 0) return [];
    const rows = await this.db.query(
      `SELECT ${EVENT_COLUMNS} FROM feedback_events
       WHERE content_id = ANY($1)
       ORDER BY ingested_at, seq`,
      [Array.from(contentIds)]
    );
    return rows.map(feedbackEventFromRow);
  }
}
