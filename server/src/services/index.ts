import { UpstreamCache } from '../cache/upstreamCache.js';
import type { AppConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import type { GeoIndex } from '../geo/geoIndex.js';
import { getJson as defaultGetJson, type JsonGetter } from '../http/httpClient.js';
import type { Logger } from '../logger.js';
import { createOpenExchangeRatesFetcher, FxService } from './fx.js';
import { MyIpService } from './myip.js';
import { TimeService } from './time.js';
import { SERVICE_NAMES, type QueryHandler, type ServiceName } from './types.js';
import { createMetNoFetcher, WeatherService, type WeatherReport } from './weather.js';

export type ServiceDeps = {
  config: AppConfig;
  logger: Logger;
  geo: GeoIndex | null;
  getJson?: JsonGetter;
  now?: () => Date;
};

export type ServiceSet = {
  enabled: ServiceName[];
  handlers: ReadonlyMap<ServiceName, QueryHandler>;
  fx: FxService | null;
  weather: WeatherService | null;
  close: () => Promise<void>;
};

export function enabledServices(config: AppConfig): ServiceName[] {
  const flags: Record<ServiceName, boolean> = {
    time: config.timezones.enabled,
    fx: config.fx.enabled,
    myip: config.myip.enabled,
    weather: config.weather.enabled
  };
  return SERVICE_NAMES.filter((name) => flags[name]);
}

function requireGeo(deps: ServiceDeps, service: ServiceName): GeoIndex {
  if (!deps.geo) throw new ConfigError(`${service} is enabled but no geo index was loaded`);
  return deps.geo;
}

const factories: { [K in ServiceName]: (deps: ServiceDeps) => QueryHandler } = {
  time: (deps) => new TimeService({ geo: requireGeo(deps, 'time'), now: deps.now }),

  fx: (deps) =>
    new FxService({
      fetchRates: createOpenExchangeRatesFetcher({
        apiUrl: deps.config.fx.apiUrl,
        apiKey: deps.config.fx.apiKey,
        userAgent: deps.config.server.domain,
        getJson: deps.getJson ?? defaultGetJson
      }),
      refreshIntervalMs: deps.config.fx.refreshIntervalMs,
      requestTimeoutMs: deps.config.fx.requestTimeoutMs,
      logger: deps.logger
    }),

  myip: () => new MyIpService(),

  weather: (deps) =>
    new WeatherService({
      geo: requireGeo(deps, 'weather'),
      cache: new UpstreamCache<WeatherReport>({
        maxEntries: deps.config.weather.maxEntries,
        ttlMs: deps.config.weather.cacheTtlMs,
        timeoutMs: deps.config.weather.requestTimeoutMs
      }),
      fetchForecast: createMetNoFetcher({
        apiUrl: deps.config.weather.apiUrl,
        userAgent: deps.config.server.domain,
        getJson: deps.getJson ?? defaultGetJson
      }),
      now: deps.now
    })
};

/** Instantiates a handler for every enabled service, keyed by its zone label. */
export function buildServices(deps: ServiceDeps): ServiceSet {
  const enabled = enabledServices(deps.config);
  const handlers = new Map<ServiceName, QueryHandler>();
  for (const name of enabled) {
    handlers.set(name, factories[name](deps));
  }

  const fx = handlers.get('fx');
  const weather = handlers.get('weather');

  return {
    enabled,
    handlers,
    fx: fx instanceof FxService ? fx : null,
    weather: weather instanceof WeatherService ? weather : null,
    close: async () => {
      if (fx instanceof FxService) await fx.close();
    }
  };
}
