/**
 * Calibrator Service
 *
 * Tracks spend against the monthly cap and turns daily pacing into a
 * throttle directive for the router.
 *
 * All mutation happens in recordCost(), which reads the current state,
 * builds the next one and swaps it in without yielding, so concurrent
 * callers on the event loop are serialised and no update is lost. The cap
 * check happens in the same step: once spend reaches the cap every further
 * cost is refused, which bounds the overshoot by one request's cost.
 */

import type { BudgetConfig, ConfigSource } from '../config/routing-config.js';
import { SnapshotCell } from '../utils/snapshot.js';
import {
  dayKey,
  daysInMonth,
  monthKey,
  remainingDaysIncludingToday,
  startOfMonth,
  systemClock,
  type Clock,
} from '../utils/time.js';
import { errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type { CostJournal } from './cost-journal.js';
import type {
  BudgetState,
  BudgetStatus,
  CalibrationResult,
  CostEntry,
  CostForecast,
  CostMeta,
  Directive,
  RecordCostResult,
} from './calibrator.types.js';

// ============================================
// Pure budget arithmetic
// ============================================

export function emptyBudgetState(now: Date): BudgetState {
  return {
    monthKey: monthKey(now),
    dayKey: dayKey(now),
    spentMonth: 0,
    spentBeforeToday: 0,
    spentToday: 0,
    byProvider: {},
    entries: 0,
  };
}

/**
 * Move the state into the period containing `now`. A new month clears all
 * counters; a new day folds today's spend into spentBeforeToday.
 */
export function rollState(state: BudgetState, now: Date): BudgetState {
  const month = monthKey(now);
  const day = dayKey(now);
  if (state.monthKey !== month) {
    return emptyBudgetState(now);
  }
  if (state.dayKey !== day) {
    return { ...state, dayKey: day, spentBeforeToday: state.spentMonth, spentToday: 0 };
  }
  return state;
}

/**
 * Even split of the remaining budget over the remaining days, today included.
 */
export function pacingTarget(state: BudgetState, budget: BudgetConfig, now: Date): number {
  return Math.max(0, budget.monthlyCap - state.spentBeforeToday) / remainingDaysIncludingToday(now);
}

/**
 * Linear extrapolation of today's run-rate over the days left after today.
 */
export function projectMonthEnd(state: BudgetState, now: Date): number {
  return state.spentMonth + state.spentToday * (remainingDaysIncludingToday(now) - 1);
}

export function computeDirective(state: BudgetState, budget: BudgetConfig, now: Date): Directive {
  if (state.spentMonth >= budget.monthlyCap) return 'emergency';

  const target = pacingTarget(state, budget, now);
  const ratio = target > 0 ? state.spentToday / target : Infinity;

  let directive: Directive;
  if (ratio <= 1) directive = 'normal';
  else if (ratio <= budget.softRatio) directive = 'soft';
  else if (ratio <= budget.hardRatio) directive = 'hard';
  else directive = 'emergency';

  if (directive !== 'emergency' && budget.dailyHardCap !== undefined && state.spentToday >= budget.dailyHardCap) {
    directive = 'hard';
  }
  return directive;
}

// ============================================
// Service
// ============================================

export class CalibratorService {
  private readonly cell: SnapshotCell<BudgetState>;

  constructor(
    private readonly configSource: ConfigSource,
    private readonly journal: CostJournal,
    private readonly clock: Clock = systemClock
  ) {
    this.cell = new SnapshotCell(emptyBudgetState(clock()));
  }

  private get budget(): BudgetConfig {
    return this.configSource.current().config.budget;
  }

  /**
   * Current state, rolled into today's period if a boundary has passed.
   */
  state(now: Date = this.clock()): Readonly<BudgetState> {
    const current = this.cell.get();
    const rolled = rollState(current, now);
    if (rolled !== current) {
      this.cell.swap(rolled);
      if (rolled.monthKey !== current.monthKey) {
        logger.info('Budget month rollover', { previousMonth: current.monthKey, spent: current.spentMonth, month: rolled.monthKey });
      } else {
        logger.info('Budget day rollover', { previousDay: current.dayKey, spentToday: current.spentToday, spentMonth: rolled.spentMonth });
      }
    }
    return this.cell.get();
  }

  /**
   * Account one cost. Invalid amounts and amounts arriving after the cap is
   * reached are logged and dropped; spend never decreases.
   */
  recordCost(amount: number, meta: CostMeta = {}): RecordCostResult {
    const now = this.clock();
    const budget = this.budget;
    const current = this.state(now);

    const reject = (reason: RecordCostResult['reason']): RecordCostResult => {
      logger.warn('Cost report dropped', { amount, reason, provider: meta.provider, contentId: meta.contentId });
      return { accepted: false, reason, spentMonth: current.spentMonth, directive: computeDirective(current, budget, now) };
    };

    if (!Number.isFinite(amount) || amount < 0) {
      return reject('invalid_amount');
    }
    if (amount > budget.maxSingleRequestCost) {
      return reject('exceeds_single_request_limit');
    }
    if (current.spentMonth >= budget.monthlyCap) {
      return reject('cap_reached');
    }

    const byProvider = { ...current.byProvider };
    if (meta.provider) {
      byProvider[meta.provider] = (byProvider[meta.provider] ?? 0) + amount;
    }
    this.cell.swap({
      ...current,
      spentMonth: current.spentMonth + amount,
      spentToday: current.spentToday + amount,
      byProvider,
      entries: current.entries + 1,
    });
    const next = this.cell.get();

    const entry: CostEntry = {
      amount,
      provider: meta.provider ?? null,
      contentId: meta.contentId ?? null,
      kind: meta.kind ?? 'estimate',
      recordedAt: now,
    };
    void this.journal.append(entry).catch((error: unknown) => {
      logger.error('Failed to journal cost', { amount, provider: entry.provider, error: errorMessage(error) });
    });

    return { accepted: true, spentMonth: next.spentMonth, directive: computeDirective(next, budget, now) };
  }

  directive(): Directive {
    const now = this.clock();
    return computeDirective(this.state(now), this.budget, now);
  }

  projectMonthEnd(): number {
    const now = this.clock();
    return projectMonthEnd(this.state(now), now);
  }

  status(): BudgetStatus {
    const now = this.clock();
    const budget = this.budget;
    const state = this.state(now);
    const target = pacingTarget(state, budget, now);
    const projected = projectMonthEnd(state, now);

    return {
      directive: computeDirective(state, budget, now),
      currency: budget.currency,
      monthKey: state.monthKey,
      dayKey: state.dayKey,
      cap: budget.monthlyCap,
      spentMonth: state.spentMonth,
      spentToday: state.spentToday,
      spentBeforeToday: state.spentBeforeToday,
      remainingBudget: Math.max(0, budget.monthlyCap - state.spentMonth),
      remainingDays: remainingDaysIncludingToday(now),
      pacingTarget: target,
      pacingRatio: target > 0 ? state.spentToday / target : 0,
      projectedMonthEnd: projected,
      projectedUtilization: projected / budget.monthlyCap,
      dailyHardCap: budget.dailyHardCap ?? null,
      byProvider: { ...state.byProvider },
    };
  }

  /**
   * Linear forecast from this month's average daily spend.
   */
  forecast(daysAhead: number): CostForecast {
    const now = this.clock();
    const state = this.state(now);
    const dailyAverage = state.spentMonth / now.getUTCDate();
    const projectedSpend = state.spentMonth + dailyAverage * daysAhead;
    const projectedUtilization = projectedSpend / this.budget.monthlyCap;
    return {
      daysAhead,
      dailyAverage,
      projectedSpend,
      projectedUtilization,
      exceedsCap: projectedSpend > this.budget.monthlyCap,
    };
  }

  /**
   * Adjust the soft-throttle premium multiplier from projected utilisation.
   * Tightens in steps (x0.9 / x0.8 / x0.7 with floors 0.7 / 0.5 / 0.3)
   * while the month is projected to overrun or the directive is soft, and
   * relaxes by x1.1 up to 1 once the projection is back under the cap.
   */
  calibrate(currentMultiplier: number): CalibrationResult {
    const projectedUtilization = this.projectMonthEnd() / this.budget.monthlyCap;
    const directive = this.directive();

    let multiplier = currentMultiplier;
    let action: CalibrationResult['action'] = 'hold';

    if (projectedUtilization > 1 || directive === 'soft') {
      let factor = 0.9;
      let floor = 0.7;
      if (projectedUtilization > 1.2) {
        factor = 0.7;
        floor = 0.3;
      } else if (projectedUtilization > 1.1) {
        factor = 0.8;
        floor = 0.5;
      }
      multiplier = Math.min(currentMultiplier, Math.max(floor, currentMultiplier * factor));
      action = multiplier < currentMultiplier ? 'tighten' : 'hold';
    } else if (projectedUtilization < 1 && currentMultiplier < 1) {
      multiplier = Math.min(1, currentMultiplier * 1.1);
      action = 'relax';
    }

    if (action !== 'hold') {
      logger.info('Premium multiplier calibrated', {
        previous: currentMultiplier,
        multiplier,
        projectedUtilization,
        directive,
      });
    }

    return { previous: currentMultiplier, multiplier, projectedUtilization, action };
  }

  /**
   * Rebuild this month's state from the journal. Returns the entries applied.
   */
  async hydrate(): Promise<number> {
    const now = this.clock();
    const entries = await this.journal.since(startOfMonth(now));
    const today = dayKey(now);

    const state = emptyBudgetState(now);
    for (const entry of entries) {
      if (monthKey(entry.recordedAt) !== state.monthKey) continue;
      state.spentMonth += entry.amount;
      if (dayKey(entry.recordedAt) === today) {
        state.spentToday += entry.amount;
      } else {
        state.spentBeforeToday += entry.amount;
      }
      if (entry.provider) {
        state.byProvider[entry.provider] = (state.byProvider[entry.provider] ?? 0) + entry.amount;
      }
      state.entries += 1;
    }

    this.cell.swap(state);
    logger.info('Budget state hydrated', {
      month: state.monthKey,
      entries: state.entries,
      spentMonth: state.spentMonth,
      daysInMonth: daysInMonth(now),
    });
    return state.entries;
  }
}
