import { z } from 'zod';

export const VariantStatsSchema = z.object({
  trials: z.number().int().nonnegative(),
  successes: z.number().int().nonnegative(),
  totalReward: z.number().nonnegative(),
});

/** category -> variant id -> stats */
export const PrompterStateSchema = z.record(z.record(VariantStatsSchema));

export type VariantStats = z.infer<typeof VariantStatsSchema>;
export type PrompterState = z.infer<typeof PrompterStateSchema>;

export interface VariantSelection {
  /** Category whose templates were used ("default" when the request's category has none) */
  category: string;
  variantId: string;
  mode: 'explore' | 'exploit';
}

export interface VariantReport {
  category: string;
  variantId: string;
  trials: number;
  successRate: number;
  meanReward: number;
}
