import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { RouterService } from '../router/router.service.js';
import type { ActivePolicy } from '../learning/policy-store.js';
import { errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type { CalibratorService } from './calibrator.service.js';

const forecastQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

const actualCostSchema = z.object({
  contentId: z.string().min(1).max(200),
  actualCost: z.number().nonnegative().finite(),
});

export function createBudgetRoutes(deps: {
  calibrator: CalibratorService;
  router: RouterService;
  policy: ActivePolicy;
}): Router {
  const routes = Router();

  // Directive, spend, pacing and projection
  routes.get('/budget', (_req: Request, res: Response) => {
    res.json({
      ...deps.calibrator.status(),
      premiumMultiplier: deps.policy.current().premiumMultiplier,
    });
  });

  routes.get('/budget/forecast', (req: Request, res: Response) => {
    const parsed = forecastQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation error', details: parsed.error.errors });
      return;
    }
    res.json(deps.calibrator.forecast(parsed.data.days));
  });

  // Actual cost reported by the generation layer
  routes.post('/costs', (req: Request, res: Response) => {
    try {
      const { contentId, actualCost } = actualCostSchema.parse(req.body);
      const outcome = deps.router.reconcileCost(contentId, actualCost);
      res.status(outcome.accepted ? 200 : 422).json(outcome);
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({ error: 'Validation error', details: error.errors });
        return;
      }
      logger.error('Cost report failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to record cost' });
    }
  });

  return routes;
}

export default createBudgetRoutes;
