import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';

export async function registerHealthRoutes(
  app: FastifyInstance,
  config: Pick<AppConfig, 'env'>,
  now: () => Date = () => new Date()
): Promise<void> {
  app.get('/api/health', async () => {
    return {
      ok: true,
      env: config.env,
      time: now().toISOString()
    };
  });
}
