import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { beforeAll, describe, expect, it } from 'vitest';

import { ConfigError } from '../../src/errors.js';
import { boundedLevenshtein, levenshtein, normalizedDistance } from '../../src/geo/editDistance.js';
import { GeoIndex, MAX_FUZZY_COMPARISONS, normalizePlaceName } from '../../src/geo/geoIndex.js';
import { loadGeoLocations, parseGeoLine } from '../../src/geo/loadGeo.js';
import type { GeoLocation } from '../../src/geo/types.js';
import { loadSampleGeo, SAMPLE_GEO_FILE } from './_geo.js';

function place(name: string, country: string, priority = 0): GeoLocation {
  return { name, aliases: [], country, lat: 0, lon: 0, timezone: 'UTC', priority };
}

describe('geo loading', () => {
  it('parses a GeoNames row into a location', () => {
    const cols = new Array<string>(19).fill('');
    cols[1] = 'Berlin';
    cols[2] = 'Berlin';
    cols[3] = 'Berlino,Berlin';
    cols[4] = '52.52437';
    cols[5] = '13.41053';
    cols[8] = 'de';
    cols[14] = '3426354';
    cols[17] = 'Europe/Berlin';

    expect(parseGeoLine(cols.join('\t'))).toEqual({
      name: 'Berlin',
      aliases: ['Berlino'],
      country: 'DE',
      lat: 52.52437,
      lon: 13.41053,
      timezone: 'Europe/Berlin',
      priority: 3426354
    });
  });

  it('rejects short or incomplete rows', () => {
    expect(parseGeoLine('broken\tline')).toBeNull();
    expect(parseGeoLine('# comment')).toBeNull();
    const noTz = new Array<string>(19).fill('x');
    noTz[4] = '1';
    noTz[5] = '2';
    noTz[8] = 'DE';
    noTz[17] = '';
    expect(parseGeoLine(noTz.join('\t'))).toBeNull();
  });

  it('loads the sample file and counts skipped rows', async () => {
    const { locations, stats } = await loadGeoLocations(SAMPLE_GEO_FILE);
    expect(stats).toEqual({ loaded: 9, skipped: 1 });
    expect(locations.map((l) => l.name)).toContain('São Paulo');
  });

  it('fails with ConfigError for a missing file', async () => {
    await expect(loadGeoLocations(path.join(os.tmpdir(), 'no-such-geo-file.tsv'))).rejects.toBeInstanceOf(ConfigError);
  });

  it('fails with ConfigError when nothing usable is in the file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dns-geo-'));
    const file = path.join(dir, 'empty.tsv');
    fs.writeFileSync(file, '# nothing here\n\nbroken\tline\n', 'utf8');
    try {
      await expect(loadGeoLocations(file)).rejects.toThrow(/no usable entries/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('GeoIndex', () => {
  let geo: GeoIndex;

  beforeAll(async () => {
    geo = await loadSampleGeo();
  });

  it('normalizes separators and case', () => {
    expect(normalizePlaceName('  New_York--City ')).toBe('new york city');
    expect(normalizedDistance('berln', 'berlin')).toBeCloseTo(1 / 6);
  });

  it('resolves canonical names and aliases exactly', () => {
    expect(geo.count()).toBe(9);
    expect(geo.resolve('MUMBAI')).toMatchObject({ location: { name: 'Mumbai' }, exact: true });
    expect(geo.resolve('calcutta')).toMatchObject({ location: { name: 'Kolkata' }, matched: 'calcutta', exact: true });
    expect(geo.resolve('sao paulo')?.location.name).toBe('São Paulo');
  });

  it('falls back to fuzzy matches within the threshold', () => {
    expect(geo.resolve('mumbay')).toMatchObject({ location: { name: 'Mumbai' }, matched: 'mumbai', exact: false });
    expect(geo.resolve('berln')?.location.name).toBe('Berlin');
    // Transposition costs two edits: 2/6 is over the threshold.
    expect(geo.resolve('berlni')).toBeNull();
    expect(geo.resolve('xyzzy')).toBeNull();
  });

  it('prefers the more important place on a tie, unless a country hint says otherwise', () => {
    expect(geo.resolve('paris')?.location.country).toBe('FR');
    expect(geo.resolve('paris', 'us')?.location).toMatchObject({ country: 'US', timezone: 'America/Chicago' });
  });

  it('breaks full ties by name then country', () => {
    const idx = new GeoIndex([place('Alpha', 'ZZ'), place('Alpha', 'AA'), place('Alphb', 'BB')]);
    expect(idx.resolve('alpha')?.location.country).toBe('AA');
    expect(idx.resolve('alphc')?.location).toMatchObject({ name: 'Alpha', country: 'AA' });
  });

  it('reads a trailing country code in free text', () => {
    expect(geo.resolveQuery('paris-us')?.location.country).toBe('US');
    expect(geo.resolveQuery('paris')?.location.country).toBe('FR');
    expect(geo.resolveQuery('new-york')?.location.name).toBe('New York City');
  });

  it('lists one location per timezone for a country, most important first', () => {
    expect(geo.hasCountry('us')).toBe(true);
    expect(geo.hasCountry('xx')).toBe(false);
    expect(geo.countryLocations('US').map((l) => l.name)).toEqual(['New York City', 'Los Angeles', 'Springfield']);
    expect(geo.countryLocations('in').map((l) => l.name)).toEqual(['Mumbai']);
    expect(geo.countryLocations('xx')).toEqual([]);
  });

  it('is not affected by later changes to the input', () => {
    const input = [place('Alpha', 'AA')];
    const idx = new GeoIndex(input);
    input.push(place('Beta', 'BB'));
    const first = input[0];
    if (first) first.name = 'Changed';
    expect(idx.count()).toBe(1);
    expect(idx.resolve('alpha')?.location.name).toBe('Alpha');
  });
});

describe('edit distance', () => {
  it('computes plain Levenshtein distances', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('flaw', 'lawn')).toBe(2);
  });

  it('caps the distance at max + 1', () => {
    expect(boundedLevenshtein('kitten', 'sitting', 3)).toBe(3);
    expect(boundedLevenshtein('kitten', 'sitting', 2)).toBe(3);
    expect(boundedLevenshtein('abcdefgh', 'zyxwvuts', 2)).toBe(3);
    expect(boundedLevenshtein('abc', 'abcdefg', 2)).toBe(3);
    expect(boundedLevenshtein('springfeld', 'springfield', 2)).toBe(1);
  });
});

describe('GeoIndex on a large dataset', () => {
  const LOCATIONS = 50_000;
  let geo: GeoIndex;

  // Deterministic pseudo-random names, lengths 6..20.
  function syntheticNames(count: number): string[] {
    let seed = 12345;
    const next = () => {
      seed = (seed * 48271) % 2147483647;
      return seed;
    };
    const out: string[] = [];
    for (let i = 0; i < count; i++) {
      const len = 6 + (next() % 15);
      let name = '';
      for (let c = 0; c < len; c++) name += String.fromCharCode(97 + (next() % 26));
      out.push(name);
    }
    return out;
  }

  beforeAll(() => {
    const names = syntheticNames(LOCATIONS * 4);
    const locations: GeoLocation[] = [];
    for (let i = 0; i < LOCATIONS; i++) {
      locations.push({ ...place(names[i * 4] ?? 'x', 'ZZ', i), aliases: names.slice(i * 4 + 1, i * 4 + 4) });
    }
    locations.push(place('Springfield', 'US', 116250));
    geo = new GeoIndex(locations);
  });

  it('answers a miss without scanning the whole index', () => {
    const started = performance.now();
    for (const name of ['qqqqqqqqq', 'jjjjjjjjjjjj', 'xxxxxxx']) {
      expect(geo.resolve(name)).toBeNull();
    }
    expect(performance.now() - started).toBeLessThan(500);
  });

  it('still finds near matches among nearby lengths', () => {
    expect(MAX_FUZZY_COMPARISONS).toBeGreaterThan(40_000);
    expect(geo.resolve('springfeld')).toMatchObject({ location: { name: 'Springfield' }, exact: false });
  });
});
