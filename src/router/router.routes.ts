import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { ConfigSource } from '../config/routing-config.js';
import { renderPrompt } from '../prompter/prompter.service.js';
import { errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type { RouterService } from './router.service.js';
import { RequestContextSchema } from './router.types.js';

export function createRouteRoutes(router: RouterService, configSource: ConfigSource): Router {
  const routes = Router();

  // Decide provider and prompt variant for one request
  routes.post('/route', (req: Request, res: Response) => {
    try {
      const context = RequestContextSchema.parse(req.body);
      const decision = router.route(context);
      const prompt = decision.source === 'validate_only'
        ? null
        : renderPrompt(
          configSource.current().config,
          decision.promptCategory,
          decision.promptVariant,
          { title: context.headline ?? '', category: context.category, language: context.language }
        );
      res.json({ ...decision, prompt });
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({ error: 'Validation error', details: error.errors });
        return;
      }
      logger.error('Route request failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to route request' });
    }
  });

  return routes;
}

export default createRouteRoutes;
