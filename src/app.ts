import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import logger from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import type { Core } from './core.js';
import createRouteRoutes from './router/router.routes.js';
import createBudgetRoutes from './calibrator/budget.routes.js';
import createCollectorRoutes from './collector/collector.routes.js';
import createLearningRoutes from './learning/learning.routes.js';
import createConfigRoutes from './config/config.routes.js';
import createJobRoutes from './jobs/jobs.routes.js';

export type HealthProbe = () => Promise<boolean>;

export interface AppOptions {
  corsOrigin: string;
  /** Backing services reported by /api/health; all must be up for 200 */
  healthProbes?: Record<string, HealthProbe>;
}

export function createApp(core: Core, options: AppOptions): express.Express {
  const app = express();

  app.set('trust proxy', 1);

  // SECURITY: JSON-only API, no content is rendered
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000,  // 1 year
      includeSubDomains: true,
    },
    referrerPolicy: { policy: 'no-referrer' },
  }));

  app.use(cors({
    origin: options.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.debug(`${req.method} ${req.path}`, {
        status: res.statusCode,
        duration: `${duration}ms`,
      });
    });
    next();
  });

  // Health check endpoint
  app.get('/api/health', async (_req, res) => {
    try {
      const probes = Object.entries(options.healthProbes ?? {});
      const results = await Promise.all(probes.map(async ([name, probe]) => [name, await runProbe(name, probe)] as const));
      const healthy = results.every(([, up]) => up);

      const services: Record<string, string> = {};
      for (const [name, up] of results) {
        services[name] = up ? 'up' : 'down';
      }

      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'healthy' : 'unhealthy',
        storage: core.storage.driver,
        configVersion: core.configStore.current().version,
        policyVersion: core.policy.current().version,
        directive: core.calibrator.directive(),
        services,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.error('Health check failed', { error: errorMessage(error) });
      res.status(503).json({ status: 'unhealthy', timestamp: new Date().toISOString() });
    }
  });

  // API routes
  app.use('/api', createRouteRoutes(core.router, core.configStore));
  app.use('/api', createBudgetRoutes({ calibrator: core.calibrator, router: core.router, policy: core.policy }));
  app.use('/api', createCollectorRoutes(core.collector));
  app.use('/api/learning', createLearningRoutes(core.learning));
  app.use('/api/config', createConfigRoutes(core.configStore));
  app.use('/api/jobs', createJobRoutes());

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // body-parser rejects malformed JSON with a 400-class status
    const status = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;
    if (status >= 500) {
      logger.error('Unhandled error', { error: err.message, stack: err.stack });
      res.status(500).json({ error: 'Internal server error' });
      return;
    }
    res.status(status).json({ error: err.message });
  });

  return app;
}

async function runProbe(name: string, probe: HealthProbe): Promise<boolean> {
  try {
    return await probe();
  } catch (error) {
    logger.warn('Health probe failed', { probe: name, error: errorMessage(error) });
    return false;
  }
}
