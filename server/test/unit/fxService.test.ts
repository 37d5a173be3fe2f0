import { afterEach, describe, expect, it, vi } from 'vitest';

import { FormatError, UpstreamError } from '../../src/errors.js';
import type { JsonGetter } from '../../src/http/httpClient.js';
import {
  createOpenExchangeRatesFetcher,
  formatAmount,
  FxService,
  loadCurrencyCodes,
  roundHalfEven,
  type ExchangeRateTable,
  type RatesFetcher
} from '../../src/services/fx.js';
import { toQuery } from '../../src/services/grammar.js';
import { silentLogger } from '../../src/logger.js';

const UPDATED_AT = new Date('2026-10-19T06:00:00Z');

function table(rates: Record<string, number>): ExchangeRateTable {
  return { base: 'USD', rates: new Map(Object.entries(rates)), updatedAt: UPDATED_AT };
}

const RATES = { USD: 1, EUR: 0.9, INR: 83.1234, JPY: 150 };

describe('fx helpers', () => {
  it('rounds half to even at two decimals', () => {
    expect(roundHalfEven(0.125, 2)).toBe(0.12);
    expect(roundHalfEven(0.135, 2)).toBe(0.14);
    expect(roundHalfEven(2.675, 2)).toBe(2.68);
    expect(roundHalfEven(55.138522, 2)).toBe(55.14);
    expect(roundHalfEven(22.5, 2)).toBe(22.5);
  });

  it('keeps input precision beyond two decimals', () => {
    expect(formatAmount('25')).toBe('25.00');
    expect(formatAmount('99.5')).toBe('99.50');
    expect(formatAmount('1.234')).toBe('1.234');
    expect(formatAmount('123456789.123456789')).toBe('123456789.123456789');
  });

  it('loads the ISO currency list', () => {
    const codes = loadCurrencyCodes();
    expect(codes.has('USD')).toBe(true);
    expect(codes.has('INR')).toBe(true);
    expect(codes.has('ABC')).toBe(false);
  });

  it('reads an Open Exchange Rates payload', async () => {
    const getJson = vi.fn<JsonGetter>(async () => ({ timestamp: 1_792_396_800, base: 'USD', rates: { EUR: 0.9, INR: 83.1 } }));
    const fetchRates = createOpenExchangeRatesFetcher({
      apiUrl: 'https://rates.example.test/api/latest.json',
      apiKey: 'test-secret',
      userAgent: 'dns.example.test',
      getJson
    });

    const result = await fetchRates(new AbortController().signal);

    expect(getJson).toHaveBeenCalledWith('https://rates.example.test/api/latest.json?app_id=test-secret', {
      headers: { 'user-agent': 'dns.example.test' },
      signal: expect.any(AbortSignal)
    });
    expect(result.base).toBe('USD');
    expect(result.rates.get('USD')).toBe(1);
    expect(result.rates.get('INR')).toBe(83.1);
    expect(result.updatedAt.toISOString()).toBe('2026-10-19T08:00:00.000Z');
  });

  it('rejects a payload that is not a rate table', async () => {
    const fetchRates = createOpenExchangeRatesFetcher({
      apiUrl: 'https://rates.example.test/api/latest.json',
      apiKey: 'test-secret',
      userAgent: 'dns.example.test',
      getJson: async () => ({ error: true, message: 'invalid_app_id' })
    });
    await expect(fetchRates(new AbortController().signal)).rejects.toBeInstanceOf(UpstreamError);
  });
});

describe('FxService', () => {
  let service: FxService | null = null;

  afterEach(async () => {
    await service?.close();
    service = null;
    vi.useRealTimers();
  });

  function start(fetchRates: RatesFetcher, refreshIntervalMs = 60_000): FxService {
    service = new FxService({ fetchRates, refreshIntervalMs, requestTimeoutMs: 1000, logger: silentLogger() });
    return service;
  }

  const ask = (svc: FxService, name: string) => svc.handle(toQuery(name, 'TXT', '192.0.2.1'));

  it('converts with the current table', async () => {
    const svc = start(async () => table(RATES));
    await svc.refresh();

    await expect(ask(svc, '25USD-EUR.fx')).resolves.toEqual({
      records: [{ type: 'TXT', data: ['25.00 USD = 22.50 EUR', '2026-10-19'] }],
      ttl: 60
    });
  });

  it('cross-converts through the base and joins decimal labels', async () => {
    const svc = start(async () => table(RATES));
    await svc.refresh();

    const res = await ask(svc, '99.5JPY-INR.fx');
    expect(res.records[0]).toEqual({ type: 'TXT', data: ['99.50 JPY = 55.14 INR', '2026-10-19'] });
  });

  it('returns the amount unchanged for identical currencies', async () => {
    const svc = start(async () => table(RATES));
    await svc.refresh();
    expect(svc.convert({ amount: 10, amountText: '10', from: 'EUR', to: 'EUR' }).result).toBe(10);

    const res = await ask(svc, '123456789.123456789USD-USD.fx');
    expect(res.records[0]).toEqual({
      type: 'TXT',
      data: ['123456789.123456789 USD = 123456789.123456789 USD', '2026-10-19']
    });
  });

  it('rejects conversions whose result is out of range', async () => {
    const svc = start(async () => table({ USD: 1, BTC: 0.000015, IRR: 42000 }));
    await svc.refresh();

    await expect(ask(svc, '999999999999999BTC-IRR.fx')).rejects.toThrow(FormatError);
    const res = await ask(svc, '1BTC-USD.fx');
    expect(res.records[0]).toEqual({ type: 'TXT', data: ['1.00 BTC = 66666.67 USD', '2026-10-19'] });
  });

  it('rejects malformed or unknown currencies without touching the table', async () => {
    const svc = start(async () => table(RATES));
    await svc.refresh();
    const before = svc.snapshot();

    await expect(ask(svc, 'USDEUR.fx')).rejects.toBeInstanceOf(FormatError);
    await expect(ask(svc, '5ABC-EUR.fx')).rejects.toThrow('unknown currency "ABC"');
    await expect(ask(svc, '5GBP-EUR.fx')).rejects.toThrow('unsupported currency "GBP"');
    await expect(ask(svc, 'fx')).rejects.toBeInstanceOf(FormatError);
    expect(svc.snapshot()).toBe(before);
  });

  it('fails as upstream error until a table has loaded', async () => {
    const svc = start(async () => {
      throw new Error('connection refused');
    });
    await expect(svc.refresh()).resolves.toBe(false);

    expect(svc.snapshot()).toBeNull();
    expect(svc.lastError).toBe('connection refused');
    await expect(ask(svc, '1USD-EUR.fx')).rejects.toBeInstanceOf(UpstreamError);
  });

  it('keeps the previous table when a refresh fails', async () => {
    const fetchRates = vi
      .fn<RatesFetcher>()
      .mockResolvedValueOnce(table(RATES))
      .mockRejectedValueOnce(new Error('HTTP_500'));
    const svc = start(fetchRates);
    await svc.refresh();
    const first = svc.snapshot();

    await expect(svc.refresh()).resolves.toBe(false);

    expect(svc.snapshot()).toBe(first);
    expect((await ask(svc, '25USD-EUR.fx')).records[0]).toEqual({ type: 'TXT', data: ['25.00 USD = 22.50 EUR', '2026-10-19'] });
  });

  it('refreshes on its interval', async () => {
    vi.useFakeTimers();
    const fetchRates = vi.fn<RatesFetcher>(async () => table(RATES));
    const svc = start(fetchRates, 60_000);
    await svc.refresh();
    expect(fetchRates).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(fetchRates).toHaveBeenCalledTimes(2);
  });

  it('gives up on a refresh that exceeds the request timeout', async () => {
    vi.useFakeTimers();
    const svc = start(() => new Promise<ExchangeRateTable>(() => undefined));

    const done = svc.refresh();
    await vi.advanceTimersByTimeAsync(1000);

    await expect(done).resolves.toBe(false);
    expect(svc.lastError).toMatch(/timed out/);
  });

  it('stops refreshing once closed', async () => {
    const fetchRates = vi.fn<RatesFetcher>(async () => table(RATES));
    const svc = start(fetchRates);
    await svc.refresh();
    await svc.close();

    await expect(svc.refresh()).resolves.toBe(false);
    expect(fetchRates).toHaveBeenCalledTimes(1);
  });
});
