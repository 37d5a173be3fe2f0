import { beforeAll, describe, expect, it } from 'vitest';

import { FormatError, ResolutionError } from '../../src/errors.js';
import type { GeoIndex } from '../../src/geo/geoIndex.js';
import { formatHourAndDay, formatRfc1123Z, timezoneOffsetMinutes } from '../../src/services/clock.js';
import { toQuery } from '../../src/services/grammar.js';
import { TimeService } from '../../src/services/time.js';
import { loadSampleGeo, REFERENCE_TIME } from './_geo.js';

describe('clock formatting', () => {
  it('computes offsets for the instant given', () => {
    expect(timezoneOffsetMinutes('Asia/Kolkata', REFERENCE_TIME)).toBe(330);
    expect(timezoneOffsetMinutes('America/New_York', REFERENCE_TIME)).toBe(-240);
    expect(timezoneOffsetMinutes('America/New_York', new Date('2026-12-01T12:00:00Z'))).toBe(-300);
    expect(timezoneOffsetMinutes('UTC', REFERENCE_TIME)).toBe(0);
  });

  it('formats RFC 1123 with a numeric zone', () => {
    expect(formatRfc1123Z(REFERENCE_TIME, 'Asia/Kolkata')).toBe('Mon, 19 Oct 2026 17:30:00 +0530');
    expect(formatRfc1123Z(REFERENCE_TIME, 'Europe/Berlin')).toBe('Mon, 19 Oct 2026 14:00:00 +0200');
    expect(formatHourAndDay(new Date('2026-10-19T23:30:00Z'), 'Europe/Berlin')).toBe('01:30, Tue');
  });
});

describe('TimeService', () => {
  let service: TimeService;
  let geo: GeoIndex;

  beforeAll(async () => {
    geo = await loadSampleGeo();
    service = new TimeService({ geo, now: () => REFERENCE_TIME });
  });

  const ask = (name: string) => service.handle(toQuery(name, 'TXT', '192.0.2.1'));

  it('answers local time for a city', async () => {
    await expect(ask('mumbai.time')).resolves.toEqual({
      records: [{ type: 'TXT', data: ['Mumbai (Asia/Kolkata, IN)', 'Mon, 19 Oct 2026 17:30:00 +0530'] }],
      ttl: 1
    });
  });

  it('accepts aliases and misspellings', async () => {
    const alias = await ask('bombay.time');
    const typo = await ask('mumbay.time');
    expect(alias.records).toEqual((await ask('mumbai.time')).records);
    expect(typo.records).toEqual(alias.records);
  });

  it('answers every timezone of a country code', async () => {
    const res = await ask('us.time');
    expect(res.records).toEqual([
      { type: 'TXT', data: ['New York City (America/New_York, US)', 'Mon, 19 Oct 2026 08:00:00 -0400'] },
      { type: 'TXT', data: ['Los Angeles (America/Los_Angeles, US)', 'Mon, 19 Oct 2026 05:00:00 -0700'] },
      { type: 'TXT', data: ['Springfield (America/Chicago, US)', 'Mon, 19 Oct 2026 07:00:00 -0500'] }
    ]);
  });

  it('treats two letters that are not a country as a place name', async () => {
    const res = await ask('la.time');
    expect(res.records[0]).toEqual({
      type: 'TXT',
      data: ['Los Angeles (America/Los_Angeles, US)', 'Mon, 19 Oct 2026 05:00:00 -0700']
    });
  });

  it('honours a country suffix', async () => {
    const res = await ask('paris-us.time');
    expect(res.records[0]?.type === 'TXT' && res.records[0].data[0]).toBe('Paris (America/Chicago, US)');
  });

  it('rejects unknown places and malformed questions', async () => {
    await expect(ask('atlantis.time')).rejects.toBeInstanceOf(ResolutionError);
    await expect(ask('time')).rejects.toBeInstanceOf(FormatError);
    await expect(ask('paris.france.time')).rejects.toBeInstanceOf(FormatError);
    await expect(ask('x$y.time')).rejects.toBeInstanceOf(FormatError);
  });
});
