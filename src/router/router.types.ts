/**
 * Router Types
 *
 * The router picks a provider and a prompt variant for one generation
 * request. It never calls a provider and never generates text.
 */

import { z } from 'zod';
import type { ProviderTier } from '../config/routing-config.js';
import type { Directive } from '../calibrator/calibrator.types.js';
import type { ScoringOutcome } from '../evaluator/evaluator.types.js';

export const RequestContextSchema = z.object({
  contentId: z.string().min(1).max(200),
  /** ISO 639-1 code, compared case-insensitively */
  language: z.string().min(2).max(16).transform(l => l.toLowerCase()),
  category: z.string().min(1).max(100),
  complexity: z.number().min(0).max(1),
  risk: z.number().min(0).max(1),
  /** Title text, used by keyword rules and criticality */
  headline: z.string().max(1000).optional(),
  /** Expected output size; the configured default applies when absent */
  estimatedTokens: z.number().int().positive().max(1_000_000).optional(),
  /** Trust in the originating source, 0-1 */
  sourceTrust: z.number().min(0).max(1).optional(),
});

export type RequestContext = z.infer<typeof RequestContextSchema>;

export type DecisionSource =
  | 'hard_rule'
  | 'bandit'
  | 'cold_start'
  | 'exploit'
  | 'throttle'
  | 'fallback'
  /** Source trust below the configured floor: validate, do not generate */
  | 'validate_only';

export type FallbackReason = 'timeout' | 'error';

export interface RoutingDecision extends ScoringOutcome {
  decisionId: string;
  contentId: string;
  provider: string;
  providerTier: ProviderTier;
  promptCategory: string;
  promptVariant: string;
  context: RequestContext;
  bucket: string;
  decidedAt: Date;
  /** Directive in effect when the provider was chosen */
  throttleState: Directive;
  estimatedCost: number;
  /** false when the budget ledger refused the estimate */
  costAccepted: boolean;
  source: DecisionSource;
  ruleId: string | null;
  fallbackReason: FallbackReason | null;
  configVersion: number;
  policyVersion: number;
  decisionTimeMs: number;
}

export type ReconcileOutcome =
  | { accepted: true; adjustment: number }
  | { accepted: false; reason: 'invalid_amount' | 'unknown_content' | 'budget_refused'; adjustment: number };
