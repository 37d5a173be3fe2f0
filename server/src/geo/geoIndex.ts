import { boundedLevenshtein } from './editDistance.js';
import type { GeoLocation, GeoMatch } from './types.js';

/** Maximum normalized edit distance accepted by fuzzy lookups. */
export const FUZZY_THRESHOLD = 0.25;

const MAX_COUNTRY_ZONES = 10;

/** Upper bound on names compared by one fuzzy lookup. Nearest lengths are tried first. */
export const MAX_FUZZY_COMPARISONS = 100_000;

export function normalizePlaceName(raw: string): string {
  return String(raw ?? '')
    .trim()
    .toLowerCase()
    .replace(/[-_]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

type Candidate = { location: GeoLocation; matched: string; distance: number };

function compareCandidates(a: Candidate, b: Candidate, hint: string | null): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (hint) {
    const ah = a.location.country === hint ? 0 : 1;
    const bh = b.location.country === hint ? 0 : 1;
    if (ah !== bh) return ah - bh;
  }
  if (a.location.priority !== b.location.priority) return b.location.priority - a.location.priority;
  if (a.location.name !== b.location.name) return a.location.name < b.location.name ? -1 : 1;
  if (a.location.country !== b.location.country) return a.location.country < b.location.country ? -1 : 1;
  return 0;
}

/**
 * Read-only place-name index. Built once; lookups never mutate it, so concurrent
 * queries share it freely.
 *
 * Resolution: exact (case-insensitive) on canonical names and aliases, then fuzzy by
 * normalized Levenshtein distance <= FUZZY_THRESHOLD, comparing at most
 * MAX_FUZZY_COMPARISONS names per lookup. Ties go to the country hint, then the
 * highest priority, then the lexicographically first name.
 */
export class GeoIndex {
  private readonly locations: readonly GeoLocation[];
  private readonly byName = new Map<string, GeoLocation[]>();
  private readonly byCountry = new Map<string, GeoLocation[]>();
  private readonly namesByLength = new Map<number, string[]>();

  constructor(locations: GeoLocation[]) {
    this.locations = Object.freeze(locations.map((l) => Object.freeze({ ...l, aliases: [...l.aliases] })));

    for (const loc of this.locations) {
      const keys = new Set<string>();
      for (const n of [loc.name, ...loc.aliases]) {
        const key = normalizePlaceName(n);
        if (key) keys.add(key);
      }
      for (const key of keys) {
        const list = this.byName.get(key);
        if (list) list.push(loc);
        else this.byName.set(key, [loc]);
      }

      const cc = loc.country.toUpperCase();
      const inCountry = this.byCountry.get(cc);
      if (inCountry) inCountry.push(loc);
      else this.byCountry.set(cc, [loc]);
    }

    for (const key of this.byName.keys()) {
      const bucket = this.namesByLength.get(key.length);
      if (bucket) bucket.push(key);
      else this.namesByLength.set(key.length, [key]);
    }

    for (const list of this.byCountry.values()) {
      list.sort((a, b) => b.priority - a.priority || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    }
  }

  count(): number {
    return this.locations.length;
  }

  hasCountry(code: string): boolean {
    return this.byCountry.has(String(code ?? '').toUpperCase());
  }

  resolve(name: string, hint?: string): GeoMatch | null {
    const key = normalizePlaceName(name);
    if (!key) return null;
    const h = hint ? hint.toUpperCase() : null;

    const exact = this.pick(this.exactCandidates(key), h);
    if (exact) return { location: exact.location, matched: exact.matched, exact: true };

    const fuzzy = this.pick(this.fuzzyCandidates(key), h);
    if (fuzzy) return { location: fuzzy.location, matched: fuzzy.matched, exact: false };

    return null;
  }

  /**
   * Resolves free query text which may carry a trailing country code segment
   * ("paris-fr"). The full text wins when it matches exactly.
   */
  resolveQuery(text: string): GeoMatch | null {
    const key = normalizePlaceName(text);
    if (!key) return null;

    const exact = this.pick(this.exactCandidates(key), null);
    if (exact) return { location: exact.location, matched: exact.matched, exact: true };

    const parts = key.split(' ');
    const last = parts[parts.length - 1] ?? '';
    if (parts.length > 1 && /^[a-z]{2}$/.test(last) && this.hasCountry(last)) {
      const hinted = this.resolve(parts.slice(0, -1).join(' '), last);
      if (hinted) return hinted;
    }

    return this.resolve(key);
  }

  /** Most important location for each distinct timezone of a country. */
  countryLocations(code: string): GeoLocation[] {
    const list = this.byCountry.get(String(code ?? '').toUpperCase());
    if (!list) return [];

    const seen = new Set<string>();
    const out: GeoLocation[] = [];
    for (const loc of list) {
      if (seen.has(loc.timezone)) continue;
      seen.add(loc.timezone);
      out.push(loc);
      if (out.length >= MAX_COUNTRY_ZONES) break;
    }
    return out;
  }

  private exactCandidates(key: string): Candidate[] {
    const hits = this.byName.get(key) ?? [];
    return hits.map((location) => ({ location, matched: key, distance: 0 }));
  }

  private fuzzyCandidates(key: string): Candidate[] {
    // distance >= |len(a) - len(b)|, so only nearby lengths can pass the threshold.
    const maxLen = Math.floor(key.length / (1 - FUZZY_THRESHOLD));
    const minLen = Math.ceil(key.length * (1 - FUZZY_THRESHOLD));
    const lengths: number[] = [];
    for (let len = minLen; len <= maxLen; len++) lengths.push(len);
    lengths.sort((a, b) => Math.abs(a - key.length) - Math.abs(b - key.length) || a - b);

    const best = new Map<GeoLocation, Candidate>();
    let budget = MAX_FUZZY_COMPARISONS;
    for (const len of lengths) {
      const longest = Math.max(key.length, len);
      const maxEdits = Math.floor(FUZZY_THRESHOLD * longest);

      for (const name of this.namesByLength.get(len) ?? []) {
        if (budget-- <= 0) return Array.from(best.values());
        const edits = boundedLevenshtein(key, name, maxEdits);
        if (edits > maxEdits) continue;

        const distance = edits / longest;
        for (const location of this.byName.get(name) ?? []) {
          const prev = best.get(location);
          if (!prev || distance < prev.distance || (distance === prev.distance && name < prev.matched)) {
            best.set(location, { location, matched: name, distance });
          }
        }
      }
    }
    return Array.from(best.values());
  }

  private pick(candidates: Candidate[], hint: string | null): Candidate | null {
    if (!candidates.length) return null;
    const sorted = [...candidates].sort((a, b) => compareCandidates(a, b, hint));
    return sorted[0] ?? null;
  }
}
