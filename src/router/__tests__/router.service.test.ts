import { describe, it, expect, beforeEach } from 'vitest';
import { staticConfigSource, type RoutingConfig } from '../../config/routing-config.js';
import { CalibratorService } from '../../calibrator/calibrator.service.js';
import { InMemoryCostJournal } from '../../calibrator/cost-journal.js';
import { ActivePolicy } from '../../learning/policy-store.js';
import { initialPolicy, type PolicySnapshot } from '../../learning/policy.types.js';
import type { BanditState } from '../../bandit/bandit.types.js';
import type { RandomSource } from '../../utils/random.js';
import { InMemoryDecisionLog } from '../decision-log.js';
import { RouterService } from '../router.service.js';
import { RequestContextSchema, type RequestContext } from '../router.types.js';
import { manualClock, scriptedRandom, testConfig } from '../../__tests__/fixtures.js';

const NOW = new Date('2026-09-01T12:00:00Z');

function context(overrides: Partial<RequestContext> = {}): RequestContext {
  return RequestContextSchema.parse({
    contentId: 'card-1',
    language: 'en',
    category: 'politics',
    complexity: 0.2,
    risk: 0.1,
    headline: 'Parliament votes on budget',
    ...overrides,
  });
}

function warmBandit(bucket: string, gpt5: [number, number], deepseek: [number, number]): BanditState {
  return {
    [bucket]: {
      gpt5: { alpha: gpt5[0], beta: gpt5[1], count: 50, totalReward: 0 },
      deepseek: { alpha: deepseek[0], beta: deepseek[1], count: 50, totalReward: 0 },
    },
  };
}

interface Harness {
  router: RouterService;
  calibrator: CalibratorService;
  decisions: InMemoryDecisionLog;
}

function harness(options: {
  config?: RoutingConfig;
  policy?: Partial<PolicySnapshot>;
  random?: RandomSource;
  timer?: () => number;
} = {}): Harness {
  const config = options.config ?? testConfig();
  const source = staticConfigSource(config);
  const clock = manualClock(NOW).clock;
  const calibrator = new CalibratorService(source, new InMemoryCostJournal(), clock);
  const decisions = new InMemoryDecisionLog();
  const policy = new ActivePolicy({ ...initialPolicy(config, NOW), ...options.policy });
  const router = new RouterService({
    config: source,
    policy,
    calibrator,
    decisionLog: decisions,
    // 0.5 never triggers prompt exploration
    random: options.random ?? scriptedRandom([0.5]),
    clock,
    timer: options.timer ?? (() => 0),
  });
  return { router, calibrator, decisions };
}

describe('RouterService.route', () => {
  let h: Harness;

  beforeEach(() => {
    h = harness();
  });

  it('sends a cold bucket to the safe provider', () => {
    const decision = h.router.route(context());

    expect(decision).toMatchObject({
      provider: 'gpt5',
      providerTier: 'premium',
      source: 'cold_start',
      bucket: 'en|standard|low',
      promptCategory: 'default',
      promptVariant: 'structured-v1',
      throttleState: 'normal',
      costAccepted: true,
      ruleId: null,
      fallbackReason: null,
      configVersion: 1,
      policyVersion: 0,
    });
    expect(decision.estimatedCost).toBeCloseTo(0.02);
  });

  it('lets a matching hard rule win over the bandit', () => {
    const warm = harness({
      policy: { bandit: warmBandit('fi|standard|low', [10, 90], [90, 10]), exploration: 'frozen' },
    });

    const decision = warm.router.route(context({ language: 'FI' }));

    expect(decision.provider).toBe('gpt5');
    expect(decision.source).toBe('hard_rule');
    expect(decision.ruleId).toBe('finnish-premium');
  });

  it('matches language rules whatever the case of an unparsed context', () => {
    const warm = harness({
      policy: { bandit: warmBandit('fi|standard|low', [10, 90], [90, 10]), exploration: 'frozen' },
    });
    const unparsed: RequestContext = { ...context(), language: 'FI' };

    expect(warm.router.route(unparsed)).toMatchObject({
      provider: 'gpt5',
      source: 'hard_rule',
      ruleId: 'finnish-premium',
      bucket: 'fi|standard|low',
    });
  });

  it('routes low-trust sources to validation only', () => {
    const config = testConfig(raw => {
      raw.router = { ...raw.router, minSourceTrust: 0.3 };
    });
    const guarded = harness({ config });

    const low = guarded.router.route(context({ sourceTrust: 0.2 }));
    const trusted = guarded.router.route(context({ contentId: 'card-2', sourceTrust: 0.9 }));

    expect(low).toMatchObject({
      provider: 'deepseek',
      source: 'validate_only',
      promptVariant: 'structured-v1',
      estimatedCost: 0,
      costAccepted: true,
      throttleState: 'normal',
    });
    expect(trusted.source).toBe('cold_start');
    expect(guarded.calibrator.status().spentMonth).toBeCloseTo(0.02);
  });

  it('matches keyword rules on whole words only', () => {
    expect(h.router.route(context({ headline: 'ECB holds rates' })).ruleId).toBe('critical-topics');
    expect(h.router.route(context({ contentId: 'card-2', headline: 'ECBX launches' })).ruleId).toBeNull();
  });

  it('records the estimate against the budget and persists the decision', () => {
    const decision = h.router.route(context({ estimatedTokens: 2000 }));

    expect(h.calibrator.status().spentMonth).toBeCloseTo(0.04);
    expect(h.decisions.all()).toEqual([decision]);
  });

  describe('under budget pressure', () => {
    it('keeps a surviving hard rule under hard throttle', () => {
      h.calibrator.recordCost(1.2);

      const decision = h.router.route(context({ language: 'fi' }));

      expect(decision.provider).toBe('gpt5');
      expect(decision.source).toBe('hard_rule');
      expect(decision.throttleState).toBe('hard');
    });

    it('records the throttle state the provider was chosen under', () => {
      h.calibrator.recordCost(1);

      // this estimate alone pushes the day past the emergency ratio
      const decision = h.router.route(context({ language: 'fi', estimatedTokens: 50_000 }));

      expect(decision).toMatchObject({ provider: 'gpt5', source: 'hard_rule', throttleState: 'normal' });
      expect(h.calibrator.directive()).toBe('emergency');
    });

    it('overrides every rule under emergency', () => {
      h.calibrator.recordCost(1.3);

      const decision = h.router.route(context({ language: 'fi' }));

      expect(decision.provider).toBe('deepseek');
      expect(decision.source).toBe('throttle');
      expect(decision.ruleId).toBe('finnish-premium');
      expect(decision.throttleState).toBe('emergency');
    });

    it('drops a rule marked not to survive hard throttle unless the category is allowlisted', () => {
      h.calibrator.recordCost(1.2);

      const politics = h.router.route(context({ complexity: 0.95 }));
      const rates = h.router.route(context({ contentId: 'card-2', complexity: 0.95, category: 'central_bank' }));

      expect(politics).toMatchObject({ provider: 'deepseek', source: 'throttle', ruleId: 'very-complex' });
      expect(rates).toMatchObject({ provider: 'gpt5', source: 'hard_rule', ruleId: 'very-complex' });
    });

    it('restricts the bandit to the cheapest provider under hard throttle', () => {
      h.calibrator.recordCost(1.2);

      expect(h.router.route(context()).provider).toBe('deepseek');
      // allowlisted categories keep every provider
      expect(h.router.route(context({ contentId: 'card-2', category: 'central_bank' })).provider).toBe('gpt5');
    });

    it('scales premium scores down under soft throttle', () => {
      const policy = {
        bandit: warmBandit('en|standard|low', [60, 40], [55, 45]),
        exploration: 'frozen' as const,
        premiumMultiplier: 0.5,
      };
      const normal = harness({ policy });
      const soft = harness({ policy });
      soft.calibrator.recordCost(1.05);

      expect(normal.router.route(context())).toMatchObject({ provider: 'gpt5', source: 'exploit' });
      expect(soft.router.route(context())).toMatchObject({ provider: 'deepseek', source: 'exploit', throttleState: 'soft' });
    });

    it('downgrades to the cheapest provider when the ledger refuses the estimate', () => {
      const config = testConfig(raw => {
        raw.budget = { monthlyCap: 30, maxSingleRequestCost: 0.01 };
      });
      const tight = harness({ config });

      const decision = tight.router.route(context({ language: 'fi' }));

      expect(decision).toMatchObject({ provider: 'deepseek', source: 'throttle', costAccepted: true });
      expect(decision.estimatedCost).toBeCloseTo(0.0012);
    });

    it('still decides once the cap is reached', () => {
      const config = testConfig(raw => {
        raw.budget = { monthlyCap: 1, maxSingleRequestCost: 2 };
      });
      const capped = harness({ config });
      capped.calibrator.recordCost(1);

      const decision = capped.router.route(context());

      expect(decision).toMatchObject({ provider: 'deepseek', costAccepted: false, throttleState: 'emergency' });
      expect(capped.calibrator.status().spentMonth).toBe(1);
    });
  });

  describe('fail-open', () => {
    it('falls back to the cheapest provider when the deadline passes', () => {
      let now = 0;
      const slow = harness({
        timer: () => {
          const value = now;
          now += 100;
          return value;
        },
      });

      const decision = slow.router.route(context());

      expect(decision).toMatchObject({
        provider: 'deepseek',
        source: 'fallback',
        fallbackReason: 'timeout',
        promptCategory: 'default',
        promptVariant: 'structured-v1',
        bucket: 'en|standard|low',
      });
      expect(slow.decisions.all()).toHaveLength(1);
    });

    it('falls back to the cheapest provider on an internal error', () => {
      const broken = harness({
        random: {
          next: () => {
            throw new Error('entropy exhausted');
          },
        },
      });

      const decision = broken.router.route(context());

      expect(decision.provider).toBe('deepseek');
      expect(decision.source).toBe('fallback');
      expect(decision.fallbackReason).toBe('error');
    });
  });
});

describe('RouterService.reconcileCost', () => {
  it('adds only the amount above the estimate', () => {
    const h = harness();
    h.router.route(context());

    const outcome = h.router.reconcileCost('card-1', 0.05);

    expect(outcome.accepted).toBe(true);
    expect(outcome.adjustment).toBeCloseTo(0.03);
    expect(h.calibrator.status().spentMonth).toBeCloseTo(0.05);
  });

  it('accepts an over-estimate without refunding', () => {
    const h = harness();
    h.router.route(context());

    expect(h.router.reconcileCost('card-1', 0.001)).toEqual({ accepted: true, adjustment: 0 });
    expect(h.calibrator.status().spentMonth).toBeCloseTo(0.02);
  });

  it('reconciles each content id once', () => {
    const h = harness();
    h.router.route(context());
    h.router.reconcileCost('card-1', 0.02);

    expect(h.router.reconcileCost('card-1', 0.05)).toEqual({ accepted: false, reason: 'unknown_content', adjustment: 0 });
  });

  it('rejects invalid amounts', () => {
    const h = harness();

    expect(h.router.reconcileCost('card-1', -1)).toEqual({ accepted: false, reason: 'invalid_amount', adjustment: 0 });
  });
});
