import { ResolutionError } from '../errors.js';
import type { GeoIndex } from '../geo/geoIndex.js';
import type { GeoLocation } from '../geo/types.js';
import { formatRfc1123Z } from './clock.js';
import { expectParamCount, parsePlaceLabel } from './grammar.js';
import { TTL, type Query, type QueryHandler, type ServiceResult } from './types.js';

export type TimeServiceOptions = {
  geo: GeoIndex;
  now?: () => Date;
};

/**
 * `<place>.time` or `<cc>.time`. A two-letter label naming a known country answers
 * with one record per timezone of that country.
 */
export class TimeService implements QueryHandler {
  private readonly geo: GeoIndex;
  private readonly now: () => Date;

  constructor(opts: TimeServiceOptions) {
    this.geo = opts.geo;
    this.now = opts.now ?? (() => new Date());
  }

  async handle(query: Query): Promise<ServiceResult> {
    const [label = ''] = expectParamCount(query, 1);
    const place = parsePlaceLabel(label);

    const locations = this.lookup(place);
    if (!locations.length) {
      throw new ResolutionError(`unknown place "${place}"`);
    }

    const at = this.now();
    return {
      records: locations.map((loc) => ({
        type: 'TXT' as const,
        data: [`${loc.name} (${loc.timezone}, ${loc.country})`, formatRfc1123Z(at, loc.timezone)]
      })),
      ttl: TTL.LIVE
    };
  }

  private lookup(place: string): GeoLocation[] {
    if (/^[a-z]{2}$/.test(place) && this.geo.hasCountry(place)) {
      return this.geo.countryLocations(place);
    }
    const match = this.geo.resolveQuery(place);
    return match ? [match.location] : [];
  }
}
