/**
 * Learning Cycle Service
 *
 * Runs the learning path off the hot path:
 *   drain feedback -> score settled content -> append reward samples ->
 *   update bandit and prompter -> regression and quality gates ->
 *   calibrate premium multiplier -> persist snapshot -> publish.
 *
 * The new snapshot is built beside the active one and only published after
 * it has been persisted. A failure before that point leaves the router on
 * the previous snapshot. Re-running is safe: the watermark has not moved,
 * reward samples are written once per content id, and samples logged for
 * a version that never published are applied by the next cycle.
 */

import { randomUUID } from 'crypto';
import type { ConfigSource, RoutingConfig } from '../config/routing-config.js';
import type { CollectorService } from '../collector/collector.service.js';
import { compareCursor, cursorOf, type DrainCursor, type FeedbackEvent } from '../collector/collector.types.js';
import type { DecisionLog } from '../router/decision-log.js';
import { allBuckets } from '../router/rules/bucket.js';
import { firstEventPerSource, isSettled, score } from '../evaluator/evaluator.service.js';
import { buildQualityWindow, checkQualityGates, checkRegression } from '../evaluator/regression.js';
import type { RewardLog } from '../evaluator/reward-log.js';
import type { QualityGateReport, RegressionReport, RewardSample } from '../evaluator/evaluator.types.js';
import { BanditUpdate, bucketStatistics, providerStatistics } from '../bandit/bandit.service.js';
import type { BucketStatistics, ProviderStatistics } from '../bandit/bandit.types.js';
import { PrompterUpdate, variantReport } from '../prompter/prompter.service.js';
import type { VariantReport } from '../prompter/prompter.types.js';
import type { CalibratorService } from '../calibrator/calibrator.service.js';
import type { CalibrationResult, Directive } from '../calibrator/calibrator.types.js';
import { CycleInProgressError, EvaluationError, errorMessage } from '../utils/errors.js';
import { addDays, systemClock, type Clock } from '../utils/time.js';
import logger from '../utils/logger.js';
import type { ChangeLog, PolicyChange } from './change-log.js';
import type { ActivePolicy, PolicyStore } from './policy-store.js';
import type { ExplorationState, PolicySnapshot } from './policy.types.js';

export interface LearningCycleDependencies {
  config: ConfigSource;
  policy: ActivePolicy;
  policyStore: PolicyStore;
  collector: CollectorService;
  decisionLog: DecisionLog;
  rewardLog: RewardLog;
  calibrator: CalibratorService;
  changeLog: ChangeLog;
  clock?: Clock;
}

export type FreezeCause = 'regression' | 'quality_gate' | 'budget_emergency';

export interface CycleSummary {
  cycleId: string;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  drained: number;
  candidates: number;
  scored: number;
  /** Samples folded into the new snapshot */
  applied: number;
  /** Of those, samples logged by an earlier cycle that never published */
  reapplied: number;
  alreadyScored: number;
  pending: number;
  orphans: number;
  unscorable: number;
  failures: number;
  banditSkipped: number;
  prompterSkipped: number;
  regression: RegressionReport;
  qualityGates: QualityGateReport;
  calibration: CalibrationResult;
  directive: Directive;
  exploration: ExplorationState;
  freezeCauses: FreezeCause[];
  policyVersion: number;
}

export interface LearningStatus {
  running: boolean;
  lastRunAt: Date | null;
  lastError: string | null;
  lastSummary: CycleSummary | null;
  policy: {
    version: number;
    createdAt: Date;
    exploration: ExplorationState;
    frozenReason: string | null;
    premiumMultiplier: number;
    pendingContent: number;
    watermark: DrainCursor | null;
  };
  providers: ProviderStatistics[];
  buckets: BucketStatistics[];
  variants: VariantReport[];
  recentChanges: PolicyChange[];
}

interface ScoringPass {
  samples: RewardSample[];
  pending: string[];
  alreadyScored: number;
  orphans: number;
  unscorable: number;
  failures: number;
}

export class LearningCycleService {
  private readonly clock: Clock;
  private running = false;
  private lastRunAt: Date | null = null;
  private lastError: string | null = null;
  private lastSummary: CycleSummary | null = null;

  constructor(private readonly deps: LearningCycleDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one cycle. Throws CycleInProgressError when one is already running.
   */
  async runCycle(): Promise<CycleSummary> {
    if (this.running) {
      throw new CycleInProgressError();
    }
    this.running = true;
    this.lastRunAt = this.clock();

    try {
      const summary = await this.execute();
      this.lastSummary = summary;
      this.lastError = null;
      return summary;
    } catch (error) {
      this.lastError = errorMessage(error);
      logger.error('Learning cycle failed, previous policy stays active', { error: this.lastError });
      throw error;
    } finally {
      this.running = false;
    }
  }

  private async execute(): Promise<CycleSummary> {
    const cycleId = randomUUID();
    const startedAt = this.clock();
    const current = this.deps.policy.current();
    const config = this.deps.config.current().config;

    logger.info('Learning cycle started', { cycleId, policyVersion: current.version });

    // STEP 1: drain feedback since the watermark. The overlap window picks
    // up events that committed behind it; content already scored is skipped.
    const contentIds = new Set<string>(current.pendingContentIds);
    let watermark: DrainCursor | null = current.watermark;
    let drained = 0;
    const from = drainStart(current.watermark, config.learning.drainOverlapSeconds);
    for await (const event of this.deps.collector.drainSince(from, config.learning.drainPageSize)) {
      contentIds.add(event.contentId);
      const cursor = cursorOf(event);
      if (watermark === null || compareCursor(cursor, watermark) > 0) {
        watermark = cursor;
        drained += 1;
      }
    }
    const candidates = Array.from(contentIds);

    // STEP 2: score settled content
    const nextVersion = current.version + 1;
    const pass = await this.scoreCandidates(candidates, config, { cycleId, now: startedAt, policyVersion: nextVersion });

    // STEP 3: log samples, then apply everything no published snapshot holds yet
    const written = await this.deps.rewardLog.append(pass.samples);
    const toApply = await this.deps.rewardLog.unpublished(current.version);
    const reapplied = toApply.filter(s => !written.has(s.contentId)).length;
    if (reapplied > 0) {
      logger.warn('Applying reward samples from a cycle that did not publish', { cycleId, reapplied });
    }

    const bandit = new BanditUpdate(current.bandit, config, new Set(allBuckets(config.buckets)));
    const prompter = new PrompterUpdate(current.prompter, config);
    for (const sample of toApply) {
      bandit.update({ bucket: sample.bucket, provider: sample.provider, reward: sample.reward });
      prompter.update(sample.promptCategory, sample.promptVariant, sample.reward);
    }

    // STEP 4: regression and quality gates over the trailing window
    const windowDays = config.regression.windowDays;
    const windowSamples = await this.deps.rewardLog.decidedSince(addDays(startedAt, -windowDays));
    const window = buildQualityWindow(windowSamples, startedAt, windowDays);
    const regression = checkRegression(window, config.regression);
    const qualityGates = checkQualityGates(window, config.qualityGates);

    // STEP 5: budget calibration
    const calibration = this.deps.calibrator.calibrate(current.premiumMultiplier);
    const directive = this.deps.calibrator.directive();

    const freezeCauses: FreezeCause[] = [];
    if (regression.regressed) freezeCauses.push('regression');
    if (!qualityGates.passed) freezeCauses.push('quality_gate');
    if (directive === 'emergency') freezeCauses.push('budget_emergency');
    const exploration: ExplorationState = freezeCauses.length > 0 ? 'frozen' : 'active';

    const pending = pass.pending.slice(-config.learning.maxPendingContent);
    if (pending.length < pass.pending.length) {
      logger.warn('Pending content over limit, oldest dropped', {
        cycleId,
        dropped: pass.pending.length - pending.length,
      });
    }

    const next: PolicySnapshot = {
      version: nextVersion,
      createdAt: this.clock(),
      bandit: bandit.build(),
      prompter: prompter.build(),
      exploration,
      frozenReason: freezeCauses.length > 0 ? freezeCauses.join(',') : null,
      premiumMultiplier: calibration.multiplier,
      watermark,
      pendingContentIds: pending,
      lastCycleId: cycleId,
    };

    // STEP 6: persist, then publish
    await this.deps.policyStore.save(next);
    this.deps.policy.publish(next);

    await this.recordChanges(current, next, { cycleId, regression, qualityGates, calibration, directive });

    const finishedAt = this.clock();
    const summary: CycleSummary = {
      cycleId,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      drained,
      candidates: candidates.length,
      scored: pass.samples.length,
      applied: toApply.length,
      reapplied,
      alreadyScored: pass.alreadyScored + (pass.samples.length - written.size),
      pending: pending.length,
      orphans: pass.orphans,
      unscorable: pass.unscorable,
      failures: pass.failures,
      banditSkipped: bandit.stats.skipped,
      prompterSkipped: prompter.skippedCount,
      regression,
      qualityGates,
      calibration,
      directive,
      exploration,
      freezeCauses,
      policyVersion: next.version,
    };

    logger.info('Learning cycle completed', {
      cycleId,
      policyVersion: next.version,
      drained,
      applied: toApply.length,
      reapplied,
      pending: pending.length,
      orphans: pass.orphans,
      failures: pass.failures,
      exploration,
      premiumMultiplier: next.premiumMultiplier,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  private async scoreCandidates(
    candidates: string[],
    config: RoutingConfig,
    run: { cycleId: string; now: Date; policyVersion: number }
  ): Promise<ScoringPass> {
    const { cycleId, now } = run;
    const pass: ScoringPass = { samples: [], pending: [], alreadyScored: 0, orphans: 0, unscorable: 0, failures: 0 };
    if (candidates.length === 0) return pass;

    const [decisions, scored, events] = await Promise.all([
      this.deps.decisionLog.latestFor(candidates),
      this.deps.rewardLog.existing(candidates),
      this.deps.collector.eventsFor(candidates),
    ]);

    const byContent = new Map<string, FeedbackEvent[]>();
    for (const event of events) {
      const list = byContent.get(event.contentId);
      if (list) list.push(event);
      else byContent.set(event.contentId, [event]);
    }

    for (const contentId of candidates) {
      if (scored.has(contentId)) {
        pass.alreadyScored += 1;
        continue;
      }

      const decision = decisions.get(contentId);
      if (!decision) {
        pass.orphans += 1;
        logger.debug('Feedback for unknown content dropped', { cycleId, contentId });
        continue;
      }
      if (decision.source === 'validate_only') {
        pass.unscorable += 1;
        continue;
      }

      const feedback = byContent.get(contentId) ?? [];
      try {
        if (!isSettled(decision, firstEventPerSource(contentId, feedback), now, config.evaluator)) {
          pass.pending.push(contentId);
          continue;
        }
        pass.samples.push(score(decision, feedback, config.evaluator, { cycleId, scoredAt: now, policyVersion: run.policyVersion }));
      } catch (error) {
        if (error instanceof EvaluationError) {
          pass.unscorable += 1;
          logger.debug('Settled content has no scoreable feedback', { cycleId, contentId, error: error.message });
        } else {
          // keep it for the next cycle
          pass.failures += 1;
          pass.pending.push(contentId);
          logger.warn('Failed to score content', { cycleId, contentId, error: errorMessage(error) });
        }
      }
    }

    return pass;
  }

  private async recordChanges(
    previous: Readonly<PolicySnapshot>,
    next: PolicySnapshot,
    context: {
      cycleId: string;
      regression: RegressionReport;
      qualityGates: QualityGateReport;
      calibration: CalibrationResult;
      directive: Directive;
    }
  ): Promise<void> {
    const createdAt = next.createdAt;
    const changes: PolicyChange[] = [];

    if (next.exploration === 'frozen' && (previous.exploration !== 'frozen' || previous.frozenReason !== next.frozenReason)) {
      changes.push({
        id: randomUUID(),
        kind: 'exploration_frozen',
        cause: next.frozenReason ?? 'unknown',
        details: {
          regressions: context.regression.regressions,
          qualityGateIssues: context.qualityGates.issues,
          directive: context.directive,
        },
        policyVersion: next.version,
        cycleId: context.cycleId,
        createdAt,
      });
    } else if (next.exploration === 'active' && previous.exploration === 'frozen') {
      changes.push({
        id: randomUUID(),
        kind: 'exploration_resumed',
        cause: 'cleared',
        details: { previousReason: previous.frozenReason },
        policyVersion: next.version,
        cycleId: context.cycleId,
        createdAt,
      });
    }

    if (context.calibration.action !== 'hold') {
      changes.push({
        id: randomUUID(),
        kind: 'premium_multiplier',
        cause: context.calibration.action,
        details: {
          previous: context.calibration.previous,
          multiplier: context.calibration.multiplier,
          projectedUtilization: context.calibration.projectedUtilization,
        },
        policyVersion: next.version,
        cycleId: context.cycleId,
        createdAt,
      });
    }

    for (const change of changes) {
      logger.info('Policy change', { kind: change.kind, cause: change.cause, policyVersion: change.policyVersion });
      try {
        await this.deps.changeLog.append(change);
      } catch (error) {
        // the snapshot is already live; the log entry is best effort
        logger.error('Failed to record policy change', { kind: change.kind, error: errorMessage(error) });
      }
    }
  }

  async status(): Promise<LearningStatus> {
    const policy = this.deps.policy.current();
    const config = this.deps.config.current().config;

    return {
      running: this.running,
      lastRunAt: this.lastRunAt,
      lastError: this.lastError,
      lastSummary: this.lastSummary,
      policy: {
        version: policy.version,
        createdAt: policy.createdAt,
        exploration: policy.exploration,
        frozenReason: policy.frozenReason,
        premiumMultiplier: policy.premiumMultiplier,
        pendingContent: policy.pendingContentIds.length,
        watermark: policy.watermark,
      },
      providers: providerStatistics(policy.bandit, config),
      buckets: bucketStatistics(policy.bandit, config, allBuckets(config.buckets)).filter(b => b.samples > 0),
      variants: variantReport(policy.prompter, config),
      recentChanges: await this.deps.changeLog.recent(20),
    };
  }
}

function drainStart(watermark: DrainCursor | null, overlapSeconds: number): Date {
  if (!watermark) return new Date(0);
  return new Date(watermark.ingestedAt.getTime() - overlapSeconds * 1000);
}
