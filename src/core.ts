/**
 * Service wiring. Builds the routing core over either PostgreSQL + Redis or
 * in-memory stores; both sides implement the same interfaces.
 */

import type { RoutingConfigStore } from './config/routing-config.js';
import { CalibratorService } from './calibrator/calibrator.service.js';
import { InMemoryCostJournal, PostgresCostJournal, type CostJournal } from './calibrator/cost-journal.js';
import { CollectorService } from './collector/collector.service.js';
import { InMemoryFeedbackStore, PostgresFeedbackStore, type FeedbackStore } from './collector/feedback-store.js';
import { InMemoryRewardLog, PostgresRewardLog, type RewardLog } from './evaluator/reward-log.js';
import { InMemoryChangeLog, PostgresChangeLog, type ChangeLog } from './learning/change-log.js';
import { LearningCycleService } from './learning/learning-cycle.service.js';
import { ActivePolicy, InMemoryPolicyStore, RedisPolicyStore, type PolicyStore } from './learning/policy-store.js';
import { initialPolicy } from './learning/policy.types.js';
import { InMemoryDecisionLog, PostgresDecisionLog, type DecisionLog } from './router/decision-log.js';
import { RouterService } from './router/router.service.js';
import type { Queryable } from './db/postgres.js';
import type { KeyValueClient } from './learning/policy-store.js';
import type { RandomSource } from './utils/random.js';
import { systemClock, type Clock } from './utils/time.js';
import logger from './utils/logger.js';

export interface Storage {
  driver: 'postgres' | 'memory';
  feedback: FeedbackStore;
  decisions: DecisionLog;
  rewards: RewardLog;
  costs: CostJournal;
  changes: ChangeLog;
  policy: PolicyStore;
}

export function memoryStorage(clock: Clock = systemClock): Storage {
  return {
    driver: 'memory',
    feedback: new InMemoryFeedbackStore(clock),
    decisions: new InMemoryDecisionLog(),
    rewards: new InMemoryRewardLog(),
    costs: new InMemoryCostJournal(),
    changes: new InMemoryChangeLog(),
    policy: new InMemoryPolicyStore(),
  };
}

export function postgresStorage(db: Queryable, redis: KeyValueClient, keyPrefix: string): Storage {
  return {
    driver: 'postgres',
    feedback: new PostgresFeedbackStore(db),
    decisions: new PostgresDecisionLog(db),
    rewards: new PostgresRewardLog(db),
    costs: new PostgresCostJournal(db),
    changes: new PostgresChangeLog(db),
    policy: new RedisPolicyStore(redis, keyPrefix),
  };
}

export interface Core {
  configStore: RoutingConfigStore;
  storage: Storage;
  calibrator: CalibratorService;
  collector: CollectorService;
  policy: ActivePolicy;
  router: RouterService;
  learning: LearningCycleService;
}

export interface CoreOptions {
  configStore: RoutingConfigStore;
  storage: Storage;
  random: RandomSource;
  clock?: Clock;
}

/**
 * Build the services, restore this month's spend from the cost journal and
 * the last published policy snapshot.
 */
export async function createCore(options: CoreOptions): Promise<Core> {
  const { configStore, storage, random } = options;
  const clock = options.clock ?? systemClock;

  const calibrator = new CalibratorService(configStore, storage.costs, clock);
  await calibrator.hydrate();

  const collector = new CollectorService(storage.feedback, {
    pageSize: configStore.current().config.learning.drainPageSize,
    clock,
  });

  const stored = await storage.policy.load();
  const policy = new ActivePolicy(stored ?? initialPolicy(configStore.current().config, clock()));
  logger.info('Policy snapshot restored', {
    version: policy.current().version,
    fromStore: stored !== null,
    exploration: policy.current().exploration,
  });

  const router = new RouterService({
    config: configStore,
    policy,
    calibrator,
    decisionLog: storage.decisions,
    random,
    clock,
  });

  const learning = new LearningCycleService({
    config: configStore,
    policy,
    policyStore: storage.policy,
    collector,
    decisionLog: storage.decisions,
    rewardLog: storage.rewards,
    calibrator,
    changeLog: storage.changes,
    clock,
  });

  return { configStore, storage, calibrator, collector, policy, router, learning };
}
