/**
 * Policy snapshot: everything the learning cycle publishes for the router.
 */

import { z } from 'zod';
import type { RoutingConfig } from '../config/routing-config.js';
import { BanditStateSchema } from '../bandit/bandit.types.js';
import { PrompterStateSchema } from '../prompter/prompter.types.js';

export const DrainCursorSchema = z.object({
  ingestedAt: z.coerce.date(),
  seq: z.number().int().nonnegative(),
});

export const PolicySnapshotSchema = z.object({
  version: z.number().int().nonnegative(),
  createdAt: z.coerce.date(),
  bandit: BanditStateSchema,
  prompter: PrompterStateSchema,
  exploration: z.enum(['active', 'frozen']),
  frozenReason: z.string().nullable(),
  premiumMultiplier: z.number().gt(0).max(1),
  /** Position of the last feedback event consumed */
  watermark: DrainCursorSchema.nullable(),
  /** Decided content still inside its attribution window */
  pendingContentIds: z.array(z.string()),
  lastCycleId: z.string().nullable(),
});

export type PolicySnapshot = z.infer<typeof PolicySnapshotSchema>;
export type ExplorationState = PolicySnapshot['exploration'];

export interface PolicySource {
  current(): Readonly<PolicySnapshot>;
}

export function initialPolicy(config: RoutingConfig, now: Date): PolicySnapshot {
  return {
    version: 0,
    createdAt: now,
    bandit: {},
    prompter: {},
    exploration: 'active',
    frozenReason: null,
    premiumMultiplier: config.budget.softPremiumMultiplier,
    watermark: null,
    pendingContentIds: [],
    lastCycleId: null,
  };
}
