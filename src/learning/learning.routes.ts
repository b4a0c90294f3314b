import { Router, Request, Response } from 'express';
import { CycleInProgressError, errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type { LearningCycleService } from './learning-cycle.service.js';

export function createLearningRoutes(learning: LearningCycleService): Router {
  const routes = Router();

  // Run a learning cycle now
  routes.post('/run', async (_req: Request, res: Response) => {
    try {
      const summary = await learning.runCycle();
      res.json(summary);
    } catch (error) {
      if (error instanceof CycleInProgressError) {
        res.status(409).json({ error: error.message });
        return;
      }
      logger.error('Manual learning cycle failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Learning cycle failed' });
    }
  });

  routes.get('/status', async (_req: Request, res: Response) => {
    try {
      res.json(await learning.status());
    } catch (error) {
      logger.error('Failed to read learning status', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to read learning status' });
    }
  });

  return routes;
}

export default createLearningRoutes;
