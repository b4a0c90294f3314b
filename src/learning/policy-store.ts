/**
 * Policy snapshot persistence and the in-process active snapshot.
 */

import { SnapshotCell } from '../utils/snapshot.js';
import { errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import { PolicySnapshotSchema, type PolicySnapshot, type PolicySource } from './policy.types.js';

export interface PolicyStore {
  load(): Promise<PolicySnapshot | null>;
  save(snapshot: PolicySnapshot): Promise<void>;
}

/**
 * The subset of the ioredis client the store uses.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export class RedisPolicyStore implements PolicyStore {
  private readonly key: string;

  constructor(private readonly client: KeyValueClient, keyPrefix = 'router:') {
    this.key = `${keyPrefix}policy:snapshot`;
  }

  async load(): Promise<PolicySnapshot | null> {
    const data = await this.client.get(this.key);
    if (!data) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      logger.error('Stored policy snapshot is not valid JSON, ignoring it', { key: this.key, error: errorMessage(error) });
      return null;
    }

    const parsed = PolicySnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error('Stored policy snapshot failed validation, ignoring it', {
        key: this.key,
        issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
      });
      return null;
    }
    return parsed.data;
  }

  async save(snapshot: PolicySnapshot): Promise<void> {
    await this.client.set(this.key, JSON.stringify(snapshot));
  }
}

export class InMemoryPolicyStore implements PolicyStore {
  private stored: string | null = null;
  saves = 0;

  async load(): Promise<PolicySnapshot | null> {
    if (!this.stored) return null;
    return PolicySnapshotSchema.parse(JSON.parse(this.stored));
  }

  async save(snapshot: PolicySnapshot): Promise<void> {
    // Round-trip through JSON like the Redis store does
    this.stored = JSON.stringify(snapshot);
    this.saves += 1;
  }
}

/**
 * The snapshot the router reads. Replaced only by publish().
 */
export class ActivePolicy implements PolicySource {
  private readonly cell: SnapshotCell<PolicySnapshot>;

  constructor(initial: PolicySnapshot) {
    this.cell = new SnapshotCell(initial);
  }

  current(): Readonly<PolicySnapshot> {
    return this.cell.get();
  }

  publish(next: PolicySnapshot): void {
    const previous = this.cell.swap(next);
    logger.info('Policy snapshot published', {
      version: next.version,
      previousVersion: previous.version,
      exploration: next.exploration,
      premiumMultiplier: next.premiumMultiplier,
    });
  }
}
