import express from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import { createIntakeRouter, type IntakeRouterDependencies } from './adapters/http/intakeRouter.js';

const logger = createLogger({ component: 'server' });

export function createApp(deps: IntakeRouterDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/', createIntakeRouter(deps));

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Body-parser failures carry their own 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) {
      logger.error({ error: err }, 'Unhandled error in Express');
      res.status(500).json({ error: 'Internal server error' });
      return;
    }
    logger.warn({ error: err.message, status }, 'Rejected request');
    res.status(status).json({ error: err.message });
  });

  return app;
}

export async function startServer(
  deps: IntakeRouterDependencies,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  const app = createApp(deps);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
