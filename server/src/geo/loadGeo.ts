import fs from 'node:fs';
import readline from 'node:readline';

import { ConfigError } from '../errors.js';
import { GeoIndex } from './geoIndex.js';
import type { GeoLocation } from './types.js';

// GeoNames dump columns (tab separated).
const COL = {
  name: 1,
  asciiName: 2,
  alternateNames: 3,
  lat: 4,
  lon: 5,
  country: 8,
  population: 14,
  timezone: 17
} as const;

const MIN_COLUMNS = COL.timezone + 1;

export type GeoLoadStats = {
  loaded: number;
  skipped: number;
};

export function parseGeoLine(raw: string): GeoLocation | null {
  const line = raw.replace(/\r$/, '');
  if (!line.trim() || line.startsWith('#')) return null;

  const cols = line.split('\t');
  if (cols.length < MIN_COLUMNS) return null;

  const name = (cols[COL.name] ?? '').trim();
  const country = (cols[COL.country] ?? '').trim().toUpperCase();
  const timezone = (cols[COL.timezone] ?? '').trim();
  const lat = Number(cols[COL.lat]);
  const lon = Number(cols[COL.lon]);
  if (!name || !/^[A-Z]{2}$/.test(country) || !timezone) return null;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;

  const populationRaw = Number(cols[COL.population]);
  const priority = Number.isFinite(populationRaw) && populationRaw > 0 ? populationRaw : 0;

  const aliases = new Set<string>();
  const asciiName = (cols[COL.asciiName] ?? '').trim();
  if (asciiName && asciiName !== name) aliases.add(asciiName);
  for (const alt of (cols[COL.alternateNames] ?? '').split(',')) {
    const a = alt.trim();
    if (a && a !== name) aliases.add(a);
  }

  return { name, aliases: Array.from(aliases), country, lat, lon, timezone, priority };
}

/**
 * Streams a GeoNames-style dump into memory. Malformed lines are skipped, a missing
 * or unreadable file is a ConfigError.
 */
export async function loadGeoLocations(filePath: string): Promise<{ locations: GeoLocation[]; stats: GeoLoadStats }> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (err) {
    throw new ConfigError(`geo dataset not readable: ${filePath}`, { cause: err });
  }

  const locations: GeoLocation[] = [];
  let skipped = 0;

  const input = fs.createReadStream(filePath, { encoding: 'utf8' });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      if (!line.trim() || line.startsWith('#')) continue;
      const loc = parseGeoLine(line);
      if (loc) locations.push(loc);
      else skipped++;
    }
  } catch (err) {
    throw new ConfigError(`error reading geo dataset ${filePath}`, { cause: err });
  } finally {
    rl.close();
    input.destroy();
  }

  if (!locations.length) {
    throw new ConfigError(`geo dataset ${filePath} has no usable entries`);
  }

  return { locations, stats: { loaded: locations.length, skipped } };
}

export async function loadGeoIndex(filePath: string): Promise<{ index: GeoIndex; stats: GeoLoadStats }> {
  const { locations, stats } = await loadGeoLocations(filePath);
  return { index: new GeoIndex(locations), stats };
}
