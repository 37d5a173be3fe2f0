import fs from 'node:fs';
import { z } from 'zod';

import { FormatError, UpstreamError } from '../errors.js';
import type { JsonGetter } from '../http/httpClient.js';
import { withTimeout } from '../http/timeout.js';
import type { Logger } from '../logger.js';
import { formatIsoDate } from './clock.js';
import { MAX_FX_AMOUNT, parseFxLabel, type FxRequest } from './grammar.js';
import { TTL, type Query, type QueryHandler, type ServiceResult } from './types.js';

/** Converted amounts are rounded half-to-even at this many decimals. */
export const FX_DECIMALS = 2;

export type ExchangeRateTable = {
  base: string;
  rates: ReadonlyMap<string, number>;
  updatedAt: Date;
};

export type RatesFetcher = (signal: AbortSignal) => Promise<ExchangeRateTable>;

const CURRENCIES_FILE = new URL('../../data/currencies.json', import.meta.url);

export function loadCurrencyCodes(file: URL | string = CURRENCIES_FILE): ReadonlySet<string> {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  const codes = z.array(z.string().regex(/^[A-Z]{3}$/)).parse(raw);
  return new Set(codes);
}

export function roundHalfEven(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  // toPrecision drops binary noise such as 2.675 * 100 = 267.49999999999997.
  const scaled = Number((value * factor).toPrecision(15));
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;
  return rounded / factor;
}

/** Input amounts are echoed digit for digit, padded to at least two decimals. */
export function formatAmount(text: string): string {
  const [whole = '0', frac = ''] = text.split('.');
  return `${whole}.${frac.padEnd(FX_DECIMALS, '0')}`;
}

const openExchangeRatesSchema = z.object({
  timestamp: z.number().int().positive(),
  base: z.string().regex(/^[A-Z]{3}$/),
  rates: z.record(z.number().positive())
});

/** Rates from an Open Exchange Rates compatible `latest.json` endpoint. */
export function createOpenExchangeRatesFetcher(opts: {
  apiUrl: string;
  apiKey: string;
  userAgent: string;
  getJson: JsonGetter;
}): RatesFetcher {
  return async (signal) => {
    const url = new URL(opts.apiUrl);
    url.searchParams.set('app_id', opts.apiKey);
    const body = await opts.getJson(url.toString(), { headers: { 'user-agent': opts.userAgent }, signal });

    const parsed = openExchangeRatesSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(`unexpected rates payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const rates = new Map(Object.entries(parsed.data.rates));
    rates.set(parsed.data.base, 1);
    return { base: parsed.data.base, rates, updatedAt: new Date(parsed.data.timestamp * 1000) };
  };
}

export type FxServiceOptions = {
  fetchRates: RatesFetcher;
  refreshIntervalMs: number;
  requestTimeoutMs: number;
  logger: Logger;
  currencies?: ReadonlySet<string>;
};

export type FxConversion = FxRequest & {
  result: number;
  table: ExchangeRateTable | null;
};

/**
 * Currency conversion against an in-memory rate table. The table is fetched at
 * construction and then every `refreshIntervalMs`; a failed refresh keeps the
 * previous snapshot. Snapshots are replaced whole, never edited.
 */
export class FxService implements QueryHandler {
  private table: ExchangeRateTable | null = null;
  private refreshing: Promise<boolean> | null = null;
  private closed = false;
  private readonly inFlight = new Set<AbortController>();
  private readonly timer: ReturnType<typeof setInterval>;
  private readonly fetchRates: RatesFetcher;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly currencies: ReadonlySet<string>;

  lastError: string | null = null;
  lastAttemptAt: Date | null = null;

  constructor(opts: FxServiceOptions) {
    this.fetchRates = opts.fetchRates;
    this.requestTimeoutMs = opts.requestTimeoutMs;
    this.logger = opts.logger.child({ module: 'fx' });
    this.currencies = opts.currencies ?? loadCurrencyCodes();

    void this.refresh();
    this.timer = setInterval(() => void this.refresh(), opts.refreshIntervalMs);
    // Don't keep the process alive solely for rate refreshes.
    this.timer.unref?.();
  }

  snapshot(): ExchangeRateTable | null {
    return this.table;
  }

  /**
   * Fetches a new table. Overlapping calls share one fetch. Resolves false (and keeps
   * the current snapshot) when the fetch fails; never rejects.
   */
  refresh(): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);
    if (this.refreshing) return this.refreshing;

    this.refreshing = this.runRefresh().finally(() => {
      this.refreshing = null;
    });
    return this.refreshing;
  }

  convert(req: FxRequest): FxConversion {
    for (const code of [req.from, req.to]) {
      if (!this.currencies.has(code)) throw new FormatError(`unknown currency "${code}"`);
    }

    const table = this.table;
    if (req.from === req.to) {
      return { ...req, result: req.amount, table };
    }

    if (!table) {
      throw new UpstreamError('exchange rates not available yet');
    }

    const fromRate = table.rates.get(req.from);
    const toRate = table.rates.get(req.to);
    if (fromRate === undefined) throw new FormatError(`unsupported currency "${req.from}"`);
    if (toRate === undefined) throw new FormatError(`unsupported currency "${req.to}"`);

    const result = roundHalfEven((req.amount * toRate) / fromRate, FX_DECIMALS);
    // Past this toFixed loses whole-number digits and, from 1e21, switches to exponent form.
    if (!Number.isFinite(result) || result > MAX_FX_AMOUNT) {
      throw new FormatError(`converted amount out of range for ${req.amountText} ${req.from}-${req.to}`);
    }
    return { ...req, result, table };
  }

  async handle(query: Query): Promise<ServiceResult> {
    if (!query.params.length) throw new FormatError('fx expects a conversion, e.g. 25USD-EUR');
    const conv = this.convert(parseFxLabel(query.params.join('.')));

    const amount = formatAmount(conv.amountText);
    const line =
      conv.from === conv.to
        ? `${amount} ${conv.from} = ${amount} ${conv.to}`
        : `${amount} ${conv.from} = ${conv.result.toFixed(FX_DECIMALS)} ${conv.to}`;

    return {
      records: [{ type: 'TXT', data: conv.table ? [line, formatIsoDate(conv.table.updatedAt)] : [line] }],
      ttl: TTL.FX
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    clearInterval(this.timer);
    for (const ac of this.inFlight) ac.abort();
    this.inFlight.clear();
  }

  private async runRefresh(): Promise<boolean> {
    const ac = new AbortController();
    this.inFlight.add(ac);
    this.lastAttemptAt = new Date();

    try {
      const next = await withTimeout((signal) => this.fetchRates(signal), this.requestTimeoutMs, ac.signal);
      if (this.closed) return false;
      if (!next.rates.size) throw new UpstreamError('empty rate table');

      this.table = Object.freeze({ base: next.base, rates: new Map(next.rates), updatedAt: next.updatedAt });
      this.lastError = null;
      this.logger.info(
        { base: next.base, currencies: next.rates.size, updatedAt: next.updatedAt.toISOString() },
        'exchange rates refreshed'
      );
      return true;
    } catch (err) {
      this.lastError = err instanceof Error ? err.message : String(err);
      this.logger.warn(
        { err: this.lastError, hasSnapshot: this.table !== null },
        'exchange rate refresh failed; keeping previous table'
      );
      return false;
    } finally {
      this.inFlight.delete(ac);
    }
  }
}
