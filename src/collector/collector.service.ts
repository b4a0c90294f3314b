/**
 * Collector Service
 *
 * Durable append-only intake for feedback events. The learning cycle is
 * the only reader; it pulls events lazily through drainSince().
 */

import { randomUUID } from 'crypto';
import type { FeedbackStore } from './feedback-store.js';
import {
  FeedbackEventInputSchema,
  cursorOf,
  type DrainCursor,
  type FeedbackEvent,
  type IngestResult,
} from './collector.types.js';
import { systemClock, type Clock } from '../utils/time.js';
import logger from '../utils/logger.js';

export interface CollectorOptions {
  pageSize?: number;
  clock?: Clock;
}

export class CollectorService {
  private readonly pageSize: number;
  private readonly clock: Clock;

  constructor(private readonly store: FeedbackStore, options: CollectorOptions = {}) {
    this.pageSize = options.pageSize ?? 500;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Validate and append one event. Duplicate (contentId, source) pairs are
   * acknowledged without writing.
   */
  async ingest(input: unknown): Promise<IngestResult> {
    const parsed = FeedbackEventInputSchema.safeParse(input);
    if (!parsed.success) {
      const errors = parsed.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
      logger.warn('Rejected feedback event', { errors });
      return { accepted: false, duplicate: false, errors };
    }

    const body = parsed.data;
    const { inserted, event } = await this.store.insert({
      id: randomUUID(),
      body,
      occurredAt: body.occurredAt ?? this.clock(),
    });

    if (!inserted) {
      logger.debug('Duplicate feedback event ignored', {
        contentId: body.contentId,
        source: body.source,
      });
      return { accepted: true, duplicate: true, event };
    }

    logger.debug('Feedback event ingested', {
      contentId: event.contentId,
      source: event.source,
      seq: event.seq,
    });
    return { accepted: true, duplicate: false, event };
  }

  /**
   * Lazily page through events ingested at or after `from` (a timestamp) or
   * strictly after `from` (a cursor), in ingestion order. Restartable from
   * the cursor of the last event consumed.
   */
  async *drainSince(from: Date | DrainCursor, pageSize: number = this.pageSize): AsyncGenerator<FeedbackEvent> {
    // seq starts at 1, so (since, 0) includes every event stamped exactly at `since`
    let cursor: DrainCursor = from instanceof Date ? { ingestedAt: from, seq: 0 } : from;

    for (;;) {
      const page = await this.store.pageAfter(cursor, pageSize);
      for (const event of page) {
        yield event;
      }
      if (page.length < pageSize) return;
      cursor = cursorOf(page[page.length - 1]);
    }
  }

  async eventsFor(contentIds: readonly string[]): Promise<FeedbackEvent[]> {
    return this.store.findByContentIds(contentIds);
  }
}
