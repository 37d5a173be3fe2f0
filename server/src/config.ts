import { z } from 'zod';
import dotenv from 'dotenv';

import { ConfigError } from './errors.js';

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000
};

/**
 * Parses durations such as `500ms`, `90s`, `30m`, `6h`, `1h30m`.
 * A bare number is taken as seconds.
 */
export function parseDuration(raw: string): number | null {
  const value = raw.trim().toLowerCase();
  if (!value) return null;
  if (/^\d+(\.\d+)?$/.test(value)) return Math.round(Number(value) * 1000);

  const re = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;
  let total = 0;
  let consumed = 0;
  for (const match of value.matchAll(re)) {
    if (match.index !== consumed) return null;
    const unit = DURATION_UNITS_MS[match[2] ?? ''];
    if (unit === undefined) return null;
    total += Number(match[1]) * unit;
    consumed += match[0].length;
  }
  if (consumed !== value.length) return null;
  return Math.round(total);
}

const duration = z.string().transform((raw, ctx) => {
  const ms = parseDuration(raw);
  if (ms === null || ms <= 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${raw}"` });
    return z.NEVER;
  }
  return ms;
});

// z.coerce.boolean() turns "false" into true; spell the accepted values out instead.
const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off', '']))
  .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  SERVER_DOMAIN: z.string().trim().optional().default(''),
  SERVER_ADDRESS: z.string().trim().optional().default('0.0.0.0:53'),

  TIMEZONES_ENABLED: flag.optional().default('false'),
  TIMEZONES_GEO_FILEPATH: z.string().trim().optional().default(''),

  FX_ENABLED: flag.optional().default('false'),
  FX_API_KEY: z.string().trim().optional().default(''),
  FX_API_URL: z.string().url().optional().default('https://openexchangerates.org/api/latest.json'),
  FX_REFRESH_INTERVAL: duration.optional().default('6h'),
  FX_REQUEST_TIMEOUT: duration.optional().default('10s'),

  MYIP_ENABLED: flag.optional().default('false'),

  WEATHER_ENABLED: flag.optional().default('false'),
  WEATHER_MAX_ENTRIES: z.coerce.number().int().positive().optional().default(1000),
  WEATHER_CACHE_TTL: duration.optional().default('3h'),
  WEATHER_API_URL: z
    .string()
    .url()
    .optional()
    .default('https://api.met.no/weatherapi/locationforecast/2.0/compact'),
  WEATHER_REQUEST_TIMEOUT: duration.optional().default('3s'),

  // Optional read-only status API (health + runtime counters).
  HTTP_ENABLED: flag.optional().default('false'),
  HTTP_HOST: z.string().optional().default('127.0.0.1'),
  HTTP_PORT: z.coerce.number().int().min(0).max(65535).optional().default(8053)
});

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type AppConfig = {
  env: 'development' | 'test' | 'production';
  logLevel: LogLevel;
  server: { domain: string; address: string };
  timezones: { enabled: boolean; geoFilePath: string };
  fx: { enabled: boolean; apiKey: string; apiUrl: string; refreshIntervalMs: number; requestTimeoutMs: number };
  myip: { enabled: boolean };
  weather: { enabled: boolean; maxEntries: number; cacheTtlMs: number; apiUrl: string; requestTimeoutMs: number };
  http: { enabled: boolean; host: string; port: number };
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Builds the application config from an environment map. Throws ConfigError listing
 * every invalid or missing key (required keys depend on which services are enabled).
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(parsed.error).join('; ')}`);
  }
  const e = parsed.data;

  const cfg: AppConfig = {
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === 'test' ? 'silent' : e.NODE_ENV === 'production' ? 'info' : 'debug'),
    server: { domain: e.SERVER_DOMAIN, address: e.SERVER_ADDRESS },
    timezones: { enabled: e.TIMEZONES_ENABLED, geoFilePath: e.TIMEZONES_GEO_FILEPATH },
    fx: {
      enabled: e.FX_ENABLED,
      apiKey: e.FX_API_KEY,
      apiUrl: e.FX_API_URL,
      refreshIntervalMs: e.FX_REFRESH_INTERVAL,
      requestTimeoutMs: e.FX_REQUEST_TIMEOUT
    },
    myip: { enabled: e.MYIP_ENABLED },
    weather: {
      enabled: e.WEATHER_ENABLED,
      maxEntries: e.WEATHER_MAX_ENTRIES,
      cacheTtlMs: e.WEATHER_CACHE_TTL,
      apiUrl: e.WEATHER_API_URL,
      requestTimeoutMs: e.WEATHER_REQUEST_TIMEOUT
    },
    http: { enabled: e.HTTP_ENABLED, host: e.HTTP_HOST, port: e.HTTP_PORT }
  };

  const missing: string[] = [];
  if (!cfg.server.domain) missing.push('server.domain');
  if ((cfg.timezones.enabled || cfg.weather.enabled) && !cfg.timezones.geoFilePath) {
    missing.push('timezones.geo_filepath');
  }
  if (cfg.fx.enabled && !cfg.fx.apiKey) missing.push('fx.api_key');

  if (missing.length) {
    throw new ConfigError(`missing required configuration: ${missing.join(', ')}`);
  }

  return Object.freeze(cfg);
}

export function loadConfig(): AppConfig {
  dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });
  return parseConfig(process.env);
}

/** Geo data backs both the time and the weather service. */
export function needsGeoIndex(cfg: AppConfig): boolean {
  return cfg.timezones.enabled || cfg.weather.enabled;
}
