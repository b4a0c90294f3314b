/**
 * Throttle Gate - Step 2
 *
 * Narrows the providers a request may use according to the budget
 * directive.
 */

import type { ProviderConfig, RoutingConfig, RoutingRule } from '../../config/routing-config.js';
import { cheapestProvider } from '../../config/routing-config.js';
import type { Directive } from '../../calibrator/calibrator.types.js';

export interface Eligibility {
  providers: ProviderConfig[];
  /** true when the directive removed providers */
  restricted: boolean;
}

export function isAllowlisted(config: RoutingConfig, category: string): boolean {
  return config.router.alwaysPremiumCategories.includes(category);
}

/**
 * Providers the bandit may choose from.
 *   emergency: cheapest only
 *   hard:      cheapest only, unless the category is allowlisted
 *   otherwise: all providers
 */
export function eligibleProviders(config: RoutingConfig, directive: Directive, category: string): Eligibility {
  const all = [...config.providers];
  if (directive === 'emergency' || (directive === 'hard' && !isAllowlisted(config, category))) {
    const cheapest = cheapestProvider(config);
    return { providers: [cheapest], restricted: all.length > 1 };
  }
  return { providers: all, restricted: false };
}

/**
 * Whether a forced rule still applies under the directive. Nothing
 * survives emergency; under hard a rule applies when it is marked to
 * survive or the request's category is allowlisted.
 */
export function ruleSurvives(config: RoutingConfig, rule: RoutingRule, directive: Directive, category: string): boolean {
  if (directive === 'emergency') return false;
  if (directive === 'hard') return rule.survivesHardThrottle || isAllowlisted(config, category);
  return true;
}
