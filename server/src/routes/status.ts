import type { FastifyInstance } from 'fastify';

import type { DnsRuntimeStats } from '../dns/handler.js';
import type { GeoIndex } from '../geo/geoIndex.js';
import type { ServiceSet } from '../services/index.js';

export type StatusSources = {
  services: Pick<ServiceSet, 'enabled' | 'fx' | 'weather'>;
  geo: GeoIndex | null;
  dns: DnsRuntimeStats;
  now?: () => Date;
};

function fxStatus(services: StatusSources['services'], now: Date) {
  const fx = services.fx;
  if (!fx) return null;
  const table = fx.snapshot();
  return {
    base: table?.base ?? null,
    currencies: table?.rates.size ?? 0,
    updatedAt: table?.updatedAt.toISOString() ?? null,
    ageSeconds: table ? Math.max(0, Math.floor((now.getTime() - table.updatedAt.getTime()) / 1000)) : null,
    lastAttemptAt: fx.lastAttemptAt?.toISOString() ?? null,
    lastError: fx.lastError
  };
}

/** Read-only runtime view: enabled services, data freshness and DNS counters. */
export async function registerStatusRoutes(app: FastifyInstance, sources: StatusSources): Promise<void> {
  const now = sources.now ?? (() => new Date());

  app.get('/api/status', async (_req, reply) => {
    const at = now();
    const weather = sources.services.weather;

    reply.header('cache-control', 'no-store');
    return {
      services: sources.services.enabled,
      geo: sources.geo ? { locations: sources.geo.count() } : null,
      fx: fxStatus(sources.services, at),
      weather: weather ? { cached: weather.cacheSize(), ...weather.cacheStats() } : null,
      dns: { ...sources.dns, byRcode: { ...sources.dns.byRcode } }
    };
  });
}
