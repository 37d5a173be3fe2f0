import Fastify, { type FastifyInstance } from 'fastify';

import type { AppConfig } from './config.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerStatusRoutes, type StatusSources } from './routes/status.js';

/** Status API only; DNS is served by its own sockets. */
export async function buildApp(config: Pick<AppConfig, 'env' | 'logLevel'>, sources: StatusSources): Promise<FastifyInstance> {
  const app = Fastify({
    logger: config.env === 'test' ? false : { level: config.logLevel }
  });

  await registerHealthRoutes(app, config, sources.now);
  await registerStatusRoutes(app, sources);

  app.setNotFoundHandler(async (_req, reply) => {
    reply.code(404);
    return { error: 'NOT_FOUND' };
  });

  return app;
}
