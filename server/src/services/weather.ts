import { z } from 'zod';

import type { UpstreamCache, UpstreamCacheStats } from '../cache/upstreamCache.js';
import { ResolutionError, UpstreamError } from '../errors.js';
import type { GeoIndex } from '../geo/geoIndex.js';
import type { GeoLocation } from '../geo/types.js';
import type { JsonGetter } from '../http/httpClient.js';
import { formatHourAndDay } from './clock.js';
import { expectParamCount, parsePlaceLabel } from './grammar.js';
import type { Query, QueryHandler, ServiceResult } from './types.js';

export const FORECAST_STEPS = 5;
export const FORECAST_STEP_HOURS = 3;

export type Forecast = {
  time: Date;
  tempC: number;
  humidity: number | null;
  symbol: string;
};

export type WeatherReport = {
  placeKey: string;
  forecasts: Forecast[];
  fetchedAt: Date;
};

export type ForecastFetcher = (location: GeoLocation, signal: AbortSignal) => Promise<Forecast[]>;

const summarySchema = z.object({ summary: z.object({ symbol_code: z.string() }) });

const locationForecastSchema = z.object({
  properties: z.object({
    timeseries: z.array(
      z.object({
        time: z.string().datetime(),
        data: z.object({
          instant: z.object({
            details: z.object({
              air_temperature: z.number(),
              relative_humidity: z.number().optional()
            })
          }),
          next_1_hours: summarySchema.optional(),
          next_6_hours: summarySchema.optional()
        })
      })
    )
  })
});

/** Keeps the first point and then one every `stepHours`, up to `steps` points. */
export function pickForecastSteps(points: Forecast[], steps = FORECAST_STEPS, stepHours = FORECAST_STEP_HOURS): Forecast[] {
  const sorted = [...points].sort((a, b) => a.time.getTime() - b.time.getTime());
  const out: Forecast[] = [];
  let next = Number.NEGATIVE_INFINITY;
  for (const p of sorted) {
    if (out.length >= steps) break;
    if (p.time.getTime() < next) continue;
    out.push(p);
    next = p.time.getTime() + stepHours * 3_600_000;
  }
  return out;
}

/** MET Norway `locationforecast/2.0/compact` client. */
export function createMetNoFetcher(opts: { apiUrl: string; userAgent: string; getJson: JsonGetter }): ForecastFetcher {
  return async (location, signal) => {
    const url = new URL(opts.apiUrl);
    // The API rejects more than 4 decimals.
    url.searchParams.set('lat', location.lat.toFixed(4));
    url.searchParams.set('lon', location.lon.toFixed(4));

    const body = await opts.getJson(url.toString(), { headers: { 'user-agent': opts.userAgent }, signal });
    const parsed = locationForecastSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(`unexpected forecast payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    return parsed.data.properties.timeseries.map((ts) => ({
      time: new Date(ts.time),
      tempC: ts.data.instant.details.air_temperature,
      humidity: ts.data.instant.details.relative_humidity ?? null,
      symbol: ts.data.next_1_hours?.summary.symbol_code ?? ts.data.next_6_hours?.summary.symbol_code ?? 'unknown'
    }));
  };
}

/** Cache identity of a resolved place, shared by all names and aliases resolving to it. */
export function placeKey(loc: GeoLocation): string {
  return `${loc.country}:${loc.name.toLowerCase()}:${loc.lat.toFixed(4)},${loc.lon.toFixed(4)}`;
}

export type WeatherServiceOptions = {
  geo: GeoIndex;
  cache: UpstreamCache<WeatherReport>;
  fetchForecast: ForecastFetcher;
  now?: () => Date;
};

export class WeatherService implements QueryHandler {
  private readonly geo: GeoIndex;
  private readonly cache: UpstreamCache<WeatherReport>;
  private readonly fetchForecast: ForecastFetcher;
  private readonly now: () => Date;

  constructor(opts: WeatherServiceOptions) {
    this.geo = opts.geo;
    this.cache = opts.cache;
    this.fetchForecast = opts.fetchForecast;
    this.now = opts.now ?? (() => new Date());
  }

  async handle(query: Query): Promise<ServiceResult> {
    const [label = ''] = expectParamCount(query, 1);
    const place = parsePlaceLabel(label);

    const match = this.geo.resolveQuery(place);
    if (!match) throw new ResolutionError(`unknown place "${place}"`);
    const loc = match.location;

    const entry = await this.cache.get(placeKey(loc), async (key, signal) => {
      const points = await this.fetchForecast(loc, signal);
      const forecasts = pickForecastSteps(points.filter((p) => p.time.getTime() >= this.now().getTime() - 3_600_000));
      if (!forecasts.length) throw new UpstreamError(`no forecast data for ${loc.name}`);
      return { placeKey: key, forecasts, fetchedAt: this.now() };
    });

    return {
      records: entry.value.forecasts.map((f) => ({
        type: 'TXT' as const,
        data: [
          `${loc.name} (${loc.country})`,
          `${f.tempC.toFixed(2)}C (${((f.tempC * 9) / 5 + 32).toFixed(2)}F)`,
          f.humidity === null ? 'n/a hu.' : `${Math.round(f.humidity)}% hu.`,
          f.symbol,
          formatHourAndDay(f.time, loc.timezone)
        ]
      })),
      ttl: this.cache.remainingTtlSeconds(entry)
    };
  }

  cacheSize(): number {
    return this.cache.size;
  }

  cacheStats(): Readonly<UpstreamCacheStats> {
    return this.cache.stats;
  }
}
