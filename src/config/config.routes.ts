import { Router, Request, Response } from 'express';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import { bucketCardinality, type RoutingConfigStore } from './routing-config.js';

export function createConfigRoutes(store: RoutingConfigStore): Router {
  const routes = Router();

  routes.get('/', (_req: Request, res: Response) => {
    const { version, loadedAt, source, config } = store.current();
    res.json({
      version,
      loadedAt,
      source,
      providers: config.providers,
      rules: config.rules.map(r => r.id),
      buckets: bucketCardinality(config.buckets),
    });
  });

  // Re-read the routing file; an invalid file leaves the active version in place
  routes.post('/reload', async (_req: Request, res: Response) => {
    try {
      const snapshot = await store.reload();
      res.json({ version: snapshot.version, loadedAt: snapshot.loadedAt, source: snapshot.source });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        res.status(400).json({
          error: 'Invalid routing configuration',
          details: error.issues,
          activeVersion: store.current().version,
        });
        return;
      }
      logger.error('Routing configuration reload failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to reload configuration', activeVersion: store.current().version });
    }
  });

  return routes;
}

export default createConfigRoutes;
