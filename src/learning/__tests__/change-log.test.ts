import { describe, it, expect } from 'vitest';
import { InMemoryChangeLog, PostgresChangeLog, type PolicyChange } from '../change-log.js';
import { FakeQueryable } from '../../__tests__/fixtures.js';

function change(id: string, kind: PolicyChange['kind'] = 'premium_multiplier'): PolicyChange {
  return {
    id,
    kind,
    cause: 'relax',
    details: { previous: 0.7, multiplier: 0.77 },
    policyVersion: 1,
    cycleId: 'cycle-1',
    createdAt: new Date('2026-09-01T00:00:00Z'),
  };
}

describe('InMemoryChangeLog', () => {
  it('returns the newest changes first', async () => {
    const log = new InMemoryChangeLog();
    for (const id of ['a', 'b', 'c']) await log.append(change(id));

    expect((await log.recent(2)).map(c => c.id)).toEqual(['c', 'b']);
  });
});

describe('PostgresChangeLog', () => {
  it('stores details as JSON', async () => {
    const db = new FakeQueryable();

    await new PostgresChangeLog(db).append(change('a'));

    expect(db.calls[0].params[3]).toBe('{"previous":0.7,"multiplier":0.77}');
  });

  it('reads recent changes', async () => {
    const db = new FakeQueryable().respondWith([{
      id: 'a',
      kind: 'exploration_frozen',
      cause: 'regression',
      details: { qualityGateIssues: [] },
      policy_version: '4',
      cycle_id: null,
      created_at: '2026-09-01T00:00:00.000Z',
    }]);

    const changes = await new PostgresChangeLog(db).recent(5);

    expect(db.calls[0].params).toEqual([5]);
    expect(changes).toEqual([{
      id: 'a',
      kind: 'exploration_frozen',
      cause: 'regression',
      details: { qualityGateIssues: [] },
      policyVersion: 4,
      cycleId: null,
      createdAt: new Date('2026-09-01T00:00:00Z'),
    }]);
  });
});
