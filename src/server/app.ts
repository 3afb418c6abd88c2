import express from 'express';
import { Server } from 'http';
import chartRoutes from './routes/chart.routes';
import { VIEWS_PATH } from '../services/chart.service';
import { logger } from '../utils/logger';

// ═══════════════════════════════════════════════════════════
// Chart Server
// ═══════════════════════════════════════════════════════════

export interface ChartAppOptions {
  storagePath: string;
  exposeErrors?: boolean;
}

export function createChartApp(options: ChartAppOptions): express.Express {
  const app = express();
  app.locals.storagePath = options.storagePath;

  app.set('view engine', 'ejs');
  app.set('views', VIEWS_PATH);

  app.use('/', chartRoutes);

  // 404 handler
  app.use((_req, res) => {
    res.status(404).send('Page not found');
  });

  // Global error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error:', err);
    res.status(500).send(options.exposeErrors ? err.message : 'Internal server error');
  });

  return app;
}

export function startChartServer(options: ChartAppOptions & { port: number }): Promise<Server> {
  const app = createChartApp(options);

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, () => {
      logger.info('───────────────────────────────────────────────────────────');
      logger.info(`Chart: http://localhost:${options.port}/`);
      logger.info(`Data:  http://localhost:${options.port}/api/followers`);
      logger.info('───────────────────────────────────────────────────────────');
      resolve(server);
    });
    server.once('error', reject);
  });
}
