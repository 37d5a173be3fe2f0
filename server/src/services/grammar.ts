import { FormatError } from '../errors.js';
import type { Query } from './types.js';

export function normalizeName(name: string): string {
  const n = String(name ?? '').trim();
  return n.endsWith('.') ? n.slice(0, -1) : n;
}

/** Splits a question name into zone (last label) and parameter labels. */
export function toQuery(name: string, qtype: string, clientIp: string): Query {
  const normalized = normalizeName(name);
  const labels = normalized ? normalized.split('.') : [];
  const zone = (labels.pop() ?? '').toLowerCase();
  return { name: normalized, zone, params: Object.freeze(labels), qtype: String(qtype || 'A').toUpperCase(), clientIp };
}

export function expectParamCount(query: Query, count: number): readonly string[] {
  if (query.params.length !== count) {
    throw new FormatError(
      count === 0
        ? `${query.zone} takes no parameters`
        : `${query.zone} expects ${count} label${count === 1 ? '' : 's'}, got ${query.params.length}`
    );
  }
  return query.params;
}

const PLACE_LABEL = /^[\p{L}\p{N}](?:[\p{L}\p{N}\p{M}'_-]*[\p{L}\p{N}\p{M}])?$/u;

/** A place label: letters/digits with hyphen or underscore in place of spaces. */
export function parsePlaceLabel(label: string): string {
  const raw = String(label ?? '').trim();
  if (!raw || raw.length > 63 || !PLACE_LABEL.test(raw)) {
    throw new FormatError(`invalid place name "${raw}"`);
  }
  return raw.replace(/[-_]+/g, ' ').toLowerCase();
}

export type FxRequest = {
  amount: number;
  /** The amount as written, leading zeros dropped; "1" when omitted. */
  amountText: string;
  from: string;
  to: string;
};

const FX_LABEL = /^(\d+(?:\.\d+)?)?([a-z]{3})-([a-z]{3})$/i;
export const MAX_FX_AMOUNT = 1e15;

/**
 * `<amount><FROM>-<TO>`, amount optional (default 1). A decimal amount spans two DNS
 * labels ("99.5JPY-INR"), so the caller passes the labels joined back with dots.
 */
export function parseFxLabel(text: string): FxRequest {
  const m = FX_LABEL.exec(String(text ?? '').trim());
  if (!m) {
    throw new FormatError(`invalid conversion "${text}", expected e.g. 25USD-EUR`);
  }

  const amountText = m[1] === undefined ? '1' : m[1].replace(/^0+(?=\d)/, '');
  const amount = Number(amountText);
  if (!Number.isFinite(amount) || amount > MAX_FX_AMOUNT) {
    throw new FormatError(`invalid amount "${m[1]}"`);
  }

  return { amount, amountText, from: (m[2] ?? '').toUpperCase(), to: (m[3] ?? '').toUpperCase() };
}
