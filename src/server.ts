/**
 * Express server configuration.
 *
 * Assembles the run API over an engine. The server only accepts and reports
 * runs; execution happens in-process on the engine.
 */

import http from 'http';
import express from 'express';
import { createRunRoutes } from './api/runs';
import { errorHandler, requestLogger } from './api/middleware';
import { Engine } from './bootstrap';
import { logger } from './logger';

const startTime = Date.now();

export const SERVICE_VERSION = '0.1.0';

/** Create and configure the Express application. */
export function createApp(engine: Engine): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: SERVICE_VERSION,
      uptimeMs: Date.now() - startTime,
      stageTypes: engine.registry.types(),
      lockMode: engine.config.lockMode,
    });
  });

  app.use('/api', createRunRoutes(engine.executor, engine.publisher));
  app.use(errorHandler);

  return app;
}

/** Listen on `port` (0 picks a free one). Resolves once the socket is bound. */
export function startServer(engine: Engine, port = engine.config.port, host?: string): Promise<http.Server> {
  const app = createApp(engine);
  return new Promise<http.Server>((resolve, reject) => {
    const server = http.createServer(app);
    server.once('error', reject);
    const onListening = () => {
      server.off('error', reject);
      const address = server.address();
      logger.info('Pipeline server listening', {
        port: typeof address === 'object' && address ? address.port : port,
      });
      resolve(server);
    };
    if (host) server.listen(port, host, onListening);
    else server.listen(port, onListening);
  });
}
