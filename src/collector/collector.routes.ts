import { Router, Request, Response } from 'express';
import { errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type { CollectorService } from './collector.service.js';

export function createCollectorRoutes(collector: CollectorService): Router {
  const routes = Router();

  // Ingest one feedback event; re-sending the same (contentId, source) is a no-op
  routes.post('/feedback', async (req: Request, res: Response) => {
    try {
      const result = await collector.ingest(req.body);
      if (!result.accepted) {
        res.status(400).json({ error: 'Validation error', details: result.errors ?? [] });
        return;
      }
      res.status(result.duplicate ? 200 : 201).json(result);
    } catch (error) {
      logger.error('Feedback ingest failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to ingest feedback' });
    }
  });

  return routes;
}

export default createCollectorRoutes;
