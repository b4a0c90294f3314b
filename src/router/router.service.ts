/**
 * Router Service - Main Entry Point
 *
 * Decides which provider and prompt variant serve one generation request.
 * Synchronous, reads one config snapshot and one policy snapshot per call,
 * and never throws: any failure or a missed local deadline falls open to
 * the cheapest provider.
 *
 * Order of evaluation:
 *   0. source trust (below the floor the item is only validated)
 *   1. hard rules (first match forces a provider)
 *   2. throttle gate (hard / emergency narrow the eligible providers)
 *   3. bandit (Thompson sampling per context bucket)
 *   4. soft throttle (premium draws scaled down before the argmax)
 */

import { randomUUID } from 'crypto';
import type { ConfigSource, ProviderConfig, RoutingConfig, RoutingConfigSnapshot } from '../config/routing-config.js';
import { cheapestProvider, estimateCost, findProvider } from '../config/routing-config.js';
import type { CalibratorService } from '../calibrator/calibrator.service.js';
import type { Directive } from '../calibrator/calibrator.types.js';
import { recommend } from '../bandit/bandit.service.js';
import { resolveCategory, selectVariant } from '../prompter/prompter.service.js';
import type { PolicySnapshot, PolicySource } from '../learning/policy.types.js';
import { RouteDeadlineError, errorMessage } from '../utils/errors.js';
import type { RandomSource } from '../utils/random.js';
import { systemClock, type Clock } from '../utils/time.js';
import logger from '../utils/logger.js';
import type { DecisionLog } from './decision-log.js';
import { findForcedRule } from './rules/hard-rules.js';
import { bucketFor } from './rules/bucket.js';
import { eligibleProviders, ruleSurvives } from './rules/throttle-gate.js';
import type {
  DecisionSource,
  FallbackReason,
  ReconcileOutcome,
  RequestContext,
  RoutingDecision,
} from './router.types.js';

const MAX_TRACKED_ESTIMATES = 10000;

export interface RouterDependencies {
  config: ConfigSource;
  policy: PolicySource;
  calibrator: CalibratorService;
  decisionLog: DecisionLog;
  random: RandomSource;
  clock?: Clock;
  /** Millisecond timer for the local deadline */
  timer?: () => number;
}

interface Choice {
  provider: ProviderConfig;
  source: DecisionSource;
  ruleId: string | null;
  matched: string[];
}

interface DecisionFrame {
  context: RequestContext;
  snapshot: Readonly<RoutingConfigSnapshot>;
  policy: Readonly<PolicySnapshot>;
  startedAt: number;
  decidedAt: Date;
  /** Set once read, so a fallback records the same state */
  directive?: Directive;
}

export class RouterService {
  private readonly clock: Clock;
  private readonly timer: () => number;
  private readonly estimates = new Map<string, { provider: string; estimatedCost: number }>();

  constructor(private readonly deps: RouterDependencies) {
    this.clock = deps.clock ?? systemClock;
    this.timer = deps.timer ?? (() => performance.now());
  }

  /**
   * Route one request. Always returns a decision.
   */
  route(context: RequestContext): RoutingDecision {
    const frame: DecisionFrame = {
      context,
      snapshot: this.deps.config.current(),
      policy: this.deps.policy.current(),
      startedAt: this.timer(),
      decidedAt: this.clock(),
    };

    try {
      return this.decide(frame);
    } catch (error) {
      return this.failOpen(frame, error);
    }
  }

  private checkDeadline(frame: DecisionFrame, step: string): void {
    const elapsed = this.timer() - frame.startedAt;
    if (elapsed > frame.snapshot.config.router.timeoutMs) {
      throw new RouteDeadlineError(step, elapsed);
    }
  }

  private choose(frame: DecisionFrame, bucket: string, directive: Directive): Choice {
    const { context, policy } = frame;
    const config = frame.snapshot.config;

    // STEP 1: hard rules
    const match = findForcedRule(config.rules, context);
    if (match && ruleSurvives(config, match.rule, directive, context.category)) {
      const forced = findProvider(config, match.rule.provider);
      if (!forced) {
        throw new Error(`Rule ${match.rule.id} names unknown provider ${match.rule.provider}`);
      }
      return { provider: forced, source: 'hard_rule', ruleId: match.rule.id, matched: match.matched };
    }

    // STEP 2: throttle gate
    const eligibility = eligibleProviders(config, directive, context.category);
    if (match || (eligibility.restricted && eligibility.providers.length === 1)) {
      return {
        provider: match ? cheapestProvider(config) : eligibility.providers[0],
        source: 'throttle',
        ruleId: match ? match.rule.id : null,
        matched: match ? match.matched : [],
      };
    }

    this.checkDeadline(frame, 'rules');

    // STEP 3 + 4: bandit, with premium draws scaled under soft throttle
    const explore = policy.exploration === 'active' && directive !== 'emergency';
    const recommendation = recommend(policy.bandit, bucket, config, this.deps.random, {
      eligible: eligibility.providers,
      premiumScale: directive === 'soft' ? policy.premiumMultiplier : 1,
      explore,
    });
    const provider = findProvider(config, recommendation.provider);
    if (!provider) {
      throw new Error(`Bandit recommended unknown provider ${recommendation.provider}`);
    }
    return { provider, source: recommendation.source, ruleId: null, matched: [] };
  }

  private decide(frame: DecisionFrame): RoutingDecision {
    const { context, policy } = frame;
    const config = frame.snapshot.config;

    const directive = this.deps.calibrator.directive();
    frame.directive = directive;
    const bucket = bucketFor(config.buckets, context);

    if (context.sourceTrust !== undefined && context.sourceTrust < config.router.minSourceTrust) {
      return this.validateOnly(frame, bucket, directive);
    }

    let choice = this.choose(frame, bucket, directive);
    this.checkDeadline(frame, 'provider');

    const variant = selectVariant(policy.prompter, context.category, config, this.deps.random, {
      explore: policy.exploration === 'active' && directive !== 'emergency',
    });
    this.checkDeadline(frame, 'prompter');

    const tokens = context.estimatedTokens ?? config.router.defaultEstimatedTokens;
    let estimatedCost = estimateCost(choice.provider, tokens);
    let cost = this.deps.calibrator.recordCost(estimatedCost, { provider: choice.provider.id, contentId: context.contentId });

    // The ledger refused the estimate: fall back to the cheapest provider
    const cheapest = cheapestProvider(config);
    if (!cost.accepted && choice.provider.id !== cheapest.id) {
      logger.warn('Budget refused estimate, downgrading to cheapest provider', {
        contentId: context.contentId,
        provider: choice.provider.id,
        reason: cost.reason,
      });
      choice = { ...choice, provider: cheapest, source: 'throttle' };
      estimatedCost = estimateCost(cheapest, tokens);
      cost = this.deps.calibrator.recordCost(estimatedCost, { provider: cheapest.id, contentId: context.contentId });
    }

    const decision = this.buildDecision(frame, {
      bucket,
      provider: choice.provider,
      source: choice.source,
      ruleId: choice.ruleId,
      fallbackReason: null,
      promptCategory: variant.category,
      promptVariant: variant.variantId,
      throttleState: directive,
      estimatedCost,
      costAccepted: cost.accepted,
    });

    logger.debug('Router decision', {
      contentId: context.contentId,
      provider: decision.provider,
      source: decision.source,
      bucket,
      rule: choice.ruleId,
      matched: choice.matched.slice(0, 5),
      variant: decision.promptVariant,
      throttle: decision.throttleState,
      timeMs: decision.decisionTimeMs,
    });

    return decision;
  }

  /**
   * Low-trust sources get no generation. No cost is recorded and the
   * decision is not scored by the learning cycle.
   */
  private validateOnly(frame: DecisionFrame, bucket: string, directive: Directive): RoutingDecision {
    const config = frame.snapshot.config;
    const promptCategory = resolveCategory(config, frame.context.category);

    logger.debug('Source trust below floor, validate only', {
      contentId: frame.context.contentId,
      sourceTrust: frame.context.sourceTrust,
      minSourceTrust: config.router.minSourceTrust,
    });

    return this.buildDecision(frame, {
      bucket,
      provider: cheapestProvider(config),
      source: 'validate_only',
      ruleId: null,
      fallbackReason: null,
      promptCategory,
      promptVariant: config.prompter.variants[promptCategory][0].id,
      throttleState: directive,
      estimatedCost: 0,
      costAccepted: true,
    });
  }

  private failOpen(frame: DecisionFrame, error: unknown): RoutingDecision {
    const { context } = frame;
    const config: RoutingConfig = frame.snapshot.config;
    const reason: FallbackReason = error instanceof RouteDeadlineError ? 'timeout' : 'error';

    logger.warn('Router failed open to cheapest provider', {
      contentId: context.contentId,
      reason,
      error: errorMessage(error),
    });

    const provider = cheapestProvider(config);
    const promptCategory = resolveCategory(config, context.category);
    const estimatedCost = estimateCost(provider, context.estimatedTokens ?? config.router.defaultEstimatedTokens);
    const throttleState = frame.directive ?? this.deps.calibrator.directive();
    const cost = this.deps.calibrator.recordCost(estimatedCost, { provider: provider.id, contentId: context.contentId });

    let bucket = 'unknown';
    try {
      bucket = bucketFor(config.buckets, context);
    } catch (bucketError) {
      logger.debug('Bucket unavailable for fallback decision', { error: errorMessage(bucketError) });
    }

    return this.buildDecision(frame, {
      bucket,
      provider,
      source: 'fallback',
      ruleId: null,
      fallbackReason: reason,
      promptCategory,
      promptVariant: config.prompter.variants[promptCategory][0].id,
      throttleState,
      estimatedCost,
      costAccepted: cost.accepted,
    });
  }

  private buildDecision(
    frame: DecisionFrame,
    parts: {
      bucket: string;
      provider: ProviderConfig;
      source: DecisionSource;
      ruleId: string | null;
      fallbackReason: FallbackReason | null;
      promptCategory: string;
      promptVariant: string;
      throttleState: Directive;
      estimatedCost: number;
      costAccepted: boolean;
    }
  ): RoutingDecision {
    const decision: RoutingDecision = {
      decisionId: randomUUID(),
      contentId: frame.context.contentId,
      provider: parts.provider.id,
      providerTier: parts.provider.tier,
      promptCategory: parts.promptCategory,
      promptVariant: parts.promptVariant,
      context: frame.context,
      bucket: parts.bucket,
      decidedAt: frame.decidedAt,
      throttleState: parts.throttleState,
      estimatedCost: parts.estimatedCost,
      costAccepted: parts.costAccepted,
      source: parts.source,
      ruleId: parts.ruleId,
      fallbackReason: parts.fallbackReason,
      configVersion: frame.snapshot.version,
      policyVersion: frame.policy.version,
      decisionTimeMs: this.timer() - frame.startedAt,
    };

    this.trackEstimate(decision);
    void this.deps.decisionLog.append(decision).catch((error: unknown) => {
      logger.error('Failed to persist routing decision', {
        decisionId: decision.decisionId,
        contentId: decision.contentId,
        error: errorMessage(error),
      });
    });

    return decision;
  }

  private trackEstimate(decision: RoutingDecision): void {
    if (!decision.costAccepted) return;
    this.estimates.delete(decision.contentId);
    this.estimates.set(decision.contentId, { provider: decision.provider, estimatedCost: decision.estimatedCost });
    if (this.estimates.size > MAX_TRACKED_ESTIMATES) {
      const oldest = this.estimates.keys().next();
      if (!oldest.done) this.estimates.delete(oldest.value);
    }
  }

  /**
   * Account the actual cost reported by the generation layer. Only the
   * amount above the routed estimate is added; over-estimates are not
   * refunded so spend stays monotonic.
   */
  reconcileCost(contentId: string, actualCost: number): ReconcileOutcome {
    if (!Number.isFinite(actualCost) || actualCost < 0) {
      logger.warn('Actual cost report dropped: invalid amount', { contentId, actualCost });
      return { accepted: false, reason: 'invalid_amount', adjustment: 0 };
    }

    const tracked = this.estimates.get(contentId);
    if (!tracked) {
      logger.warn('Actual cost report dropped: unknown content id', { contentId, actualCost });
      return { accepted: false, reason: 'unknown_content', adjustment: 0 };
    }
    this.estimates.delete(contentId);

    const adjustment = actualCost - tracked.estimatedCost;
    if (adjustment <= 0) {
      return { accepted: true, adjustment: 0 };
    }

    const result = this.deps.calibrator.recordCost(adjustment, {
      provider: tracked.provider,
      contentId,
      kind: 'adjustment',
    });
    if (!result.accepted) {
      return { accepted: false, reason: 'budget_refused', adjustment };
    }
    return { accepted: true, adjustment };
  }
}
