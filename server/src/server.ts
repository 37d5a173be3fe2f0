import type { FastifyInstance } from 'fastify';

import { buildApp } from './app.js';
import { needsGeoIndex, type AppConfig } from './config.js';
import { startDnsServer, type DnsServerHandle } from './dns/dnsServer.js';
import { createMessageHandler, createRuntimeStats, type DnsRuntimeStats } from './dns/handler.js';
import { HELP_ZONE, ZoneRouter } from './dns/router.js';
import type { GeoIndex } from './geo/geoIndex.js';
import { loadGeoIndex } from './geo/loadGeo.js';
import type { JsonGetter } from './http/httpClient.js';
import type { Logger } from './logger.js';
import { buildHelpEntries, HelpService } from './services/help.js';
import { buildServices, type ServiceSet } from './services/index.js';

export type RunningServer = {
  dns: DnsServerHandle;
  http: FastifyInstance | null;
  services: ServiceSet;
  geo: GeoIndex | null;
  stats: DnsRuntimeStats;
  close: () => Promise<void>;
};

export type StartOptions = {
  getJson?: JsonGetter;
  now?: () => Date;
};

export function buildRouter(services: ServiceSet, domain: string): ZoneRouter {
  const router = new ZoneRouter();
  for (const [zone, handler] of services.handlers) router.register(zone, handler);
  router.register(HELP_ZONE, new HelpService(buildHelpEntries(services.enabled), domain));
  return router;
}

/**
 * Loads data, builds the enabled services and starts the listeners. Any failure before
 * the sockets are bound is thrown to the caller with nothing left running.
 */
export async function startServer(config: AppConfig, logger: Logger, opts: StartOptions = {}): Promise<RunningServer> {
  let geo: GeoIndex | null = null;
  if (needsGeoIndex(config)) {
    const loaded = await loadGeoIndex(config.timezones.geoFilePath);
    geo = loaded.index;
    logger.info({ file: config.timezones.geoFilePath, ...loaded.stats }, 'geo index loaded');
  }

  const services = buildServices({ config, logger, geo, getJson: opts.getJson, now: opts.now });
  logger.info({ services: services.enabled }, 'services enabled');

  const stats = createRuntimeStats(opts.now?.());
  const router = buildRouter(services, config.server.domain);
  const handleMessage = createMessageHandler({
    router,
    domain: config.server.domain,
    logger: logger.child({ module: 'dns' }),
    stats,
    now: opts.now
  });

  let dns: DnsServerHandle;
  try {
    dns = await startDnsServer(config, handleMessage, logger);
  } catch (err) {
    await services.close();
    throw err;
  }

  let http: FastifyInstance | null = null;
  if (config.http.enabled) {
    try {
      http = await buildApp(config, { services, geo, dns: stats, now: opts.now });
      await http.listen({ host: config.http.host, port: config.http.port });
    } catch (err) {
      await dns.close();
      await services.close();
      throw err;
    }
  }

  const close = async (): Promise<void> => {
    await services.close();
    if (http) await http.close();
    await dns.close();
  };

  return { dns, http, services, geo, stats, close };
}
