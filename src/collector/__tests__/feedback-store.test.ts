import { describe, it, expect } from 'vitest';
import { PostgresFeedbackStore, feedbackEventFromRow } from '../feedback-store.js';
import { FeedbackEventInputSchema } from '../collector.types.js';
import { FakeQueryable } from '../../__tests__/fixtures.js';

const row = {
  id: 'event-1',
  seq: '7',
  content_id: 'card-1',
  source: 'editorial',
  payload: { decision: 'accepted', editRatio: 0.1 },
  occurred_at: new Date('2026-09-01T09:00:00Z'),
  ingested_at: '2026-09-01T09:00:01.000Z',
};

const newEvent = {
  id: 'event-1',
  body: FeedbackEventInputSchema.parse({ contentId: 'card-1', source: 'editorial', payload: { decision: 'accepted', editRatio: 0.1 } }),
  occurredAt: new Date('2026-09-01T09:00:00Z'),
};

describe('PostgresFeedbackStore', () => {
  it('maps rows to typed events', () => {
    const event = feedbackEventFromRow(row);

    expect(event.seq).toBe(7);
    expect(event.ingestedAt.toISOString()).toBe('2026-09-01T09:00:01.000Z');
    expect(event.source).toBe('editorial');
    expect(event.payload).toEqual({ decision: 'accepted', editRatio: 0.1 });
  });

  it('inserts with ON CONFLICT and returns the new row', async () => {
    const db = new FakeQueryable().respondWith([row]);
    const store = new PostgresFeedbackStore(db);

    const result = await store.insert(newEvent);

    expect(result.inserted).toBe(true);
    expect(db.calls).toHaveLength(1);
    expect(db.calls[0].text).toContain('ON CONFLICT (content_id, source) DO NOTHING');
    expect(db.calls[0].params[3]).toBe('{"decision":"accepted","editRatio":0.1}');
  });

  it('returns the stored event on conflict', async () => {
    const db = new FakeQueryable().respondWith([], [row]);
    const store = new PostgresFeedbackStore(db);

    const result = await store.insert(newEvent);

    expect(result.inserted).toBe(false);
    expect(result.event.id).toBe('event-1');
    expect(db.calls[1].params).toEqual(['card-1', 'editorial']);
  });

  it('pages by (ingested_at, seq)', async () => {
    const db = new FakeQueryable().respondWith([row]);
    const store = new PostgresFeedbackStore(db);
    const cursor = { ingestedAt: new Date('2026-09-01T00:00:00Z'), seq: 3 };

    const page = await store.pageAfter(cursor, 100);

    expect(page).toHaveLength(1);
    expect(db.calls[0].text).toContain('WHERE (ingested_at, seq) > ($1, $2)');
    expect(db.calls[0].params).toEqual([cursor.ingestedAt, 3, 100]);
  });

  it('skips the query for an empty id list', async () => {
    const db = new FakeQueryable();

    expect(await new PostgresFeedbackStore(db).findByContentIds([])).toEqual([]);
    expect(db.calls).toHaveLength(0);
  });
});
