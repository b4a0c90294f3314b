import { Router, Request, Response } from 'express';
import { errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import { getJobStatus, triggerJob } from './job-runner.js';

export function createJobRoutes(): Router {
  const routes = Router();

  routes.get('/', (_req: Request, res: Response) => {
    res.json({ jobs: getJobStatus() });
  });

  // Run a background job now, outside its schedule
  routes.post('/:name/run', async (req: Request, res: Response) => {
    try {
      const found = await triggerJob(req.params.name);
      if (!found) {
        res.status(404).json({ error: 'Unknown job' });
        return;
      }
      res.json({ job: getJobStatus().find(j => j.name === req.params.name) });
    } catch (error) {
      logger.error('Manual job trigger failed', { job: req.params.name, error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to run job' });
    }
  });

  return routes;
}

export default createJobRoutes;
