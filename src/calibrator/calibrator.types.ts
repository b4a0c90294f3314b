/**
 * Calibrator Types
 */

export type Directive = 'normal' | 'soft' | 'hard' | 'emergency';

export const DIRECTIVE_SEVERITY: Record<Directive, number> = {
  normal: 0,
  soft: 1,
  hard: 2,
  emergency: 3,
};

/**
 * Spend for the current period. Replaced wholesale on every accepted cost.
 */
export interface BudgetState {
  /** 'YYYY-MM' (UTC) */
  monthKey: string;
  /** 'YYYY-MM-DD' (UTC) */
  dayKey: string;
  spentMonth: number;
  spentBeforeToday: number;
  spentToday: number;
  byProvider: Record<string, number>;
  entries: number;
}

export type CostRejection = 'invalid_amount' | 'exceeds_single_request_limit' | 'cap_reached';

export type CostKind = 'estimate' | 'adjustment';

export interface CostMeta {
  provider?: string;
  contentId?: string;
  kind?: CostKind;
}

export interface RecordCostResult {
  accepted: boolean;
  reason?: CostRejection;
  spentMonth: number;
  directive: Directive;
}

export interface CostEntry {
  amount: number;
  provider: string | null;
  contentId: string | null;
  kind: CostKind;
  recordedAt: Date;
}

export interface BudgetStatus {
  directive: Directive;
  currency: string;
  monthKey: string;
  dayKey: string;
  cap: number;
  spentMonth: number;
  spentToday: number;
  spentBeforeToday: number;
  remainingBudget: number;
  remainingDays: number;
  pacingTarget: number;
  pacingRatio: number;
  projectedMonthEnd: number;
  projectedUtilization: number;
  dailyHardCap: number | null;
  byProvider: Record<string, number>;
}

export interface CostForecast {
  daysAhead: number;
  dailyAverage: number;
  projectedSpend: number;
  projectedUtilization: number;
  exceedsCap: boolean;
}

export interface CalibrationResult {
  previous: number;
  multiplier: number;
  projectedUtilization: number;
  action: 'tighten' | 'relax' | 'hold';
}
