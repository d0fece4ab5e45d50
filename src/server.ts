import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createPortfolioRoutes } from './routes/portfolio.js';
import logger from './lib/logger.js';
import type { ModelGateway } from './lib/model-gateway.js';
import type { DataAnalyzer } from './agents/analyzer.js';
import type { PageGenerator } from './agents/page-generator.js';

export interface AppDeps {
  gateway: ModelGateway;
  analyzer: DataAnalyzer;
  generator: PageGenerator;
  /** Comma-separated origin list; unset allows any origin */
  allowedOrigins?: string;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  app.use('*', requestIdMiddleware);
  app.use('*', cors({
    origin: deps.allowedOrigins ? deps.allowedOrigins.split(',').map((o) => o.trim()) : '*',
    exposeHeaders: ['X-Request-ID'],
  }));

  app.get('/health', async (c) => {
    c.header('Cache-Control', 'no-store');
    const runtimeAvailable = await deps.gateway.isAvailable();
    return c.json({
      status: runtimeAvailable ? 'ok' : 'degraded',
      runtime_available: runtimeAvailable,
    });
  });

  app.route('/api/portfolio', createPortfolioRoutes({
    analyzer: deps.analyzer,
    generator: deps.generator,
  }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

export type PortfolioApp = ReturnType<typeof createApp>;

export function startServer(app: PortfolioApp, port: number) {
  let shuttingDown = false;

  logger.info({ port }, 'Portfolio server starting');
  const server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Graceful shutdown initiated');

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // A generation in progress can hold the connection for minutes
    setTimeout(() => {
      logger.warn('Forcing exit after shutdown timeout');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}
