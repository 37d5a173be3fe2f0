import type { ServiceError } from '../errors.js';

export const SERVICE_NAMES = ['time', 'fx', 'myip', 'weather'] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

/** A decoded DNS question, split into routing zone and parameter labels. */
export type Query = {
  /** Question name as received, trailing dot removed. */
  name: string;
  /** Top-level label, lower-cased. */
  zone: string;
  /** Labels preceding the zone, as sent. */
  params: readonly string[];
  /** Question record type, e.g. "A" or "TXT". */
  qtype: string;
  clientIp: string;
};

export type AnswerRecord =
  | { type: 'TXT'; data: string[] }
  | { type: 'A'; data: string }
  | { type: 'AAAA'; data: string };

export type ServiceResult = {
  records: AnswerRecord[];
  /** Seconds the answer may be cached by resolvers. */
  ttl: number;
};

export type Outcome =
  | { status: 'answer'; result: ServiceResult }
  | { status: 'error'; error: ServiceError }
  | { status: 'unknown_zone' };

export interface QueryHandler {
  handle(query: Query): Promise<ServiceResult>;
}

export type HelpEntry = {
  service: ServiceName;
  description: string;
  /** Example question, without the server suffix, e.g. "mumbai.time". */
  example: string;
};

export const TTL = {
  /** Help catalog; depends only on the enabled-service set. */
  STATIC: 3600,
  /** Values that change every second (clock, caller address). */
  LIVE: 1,
  FX: 60,
  /** Negative and failure answers. */
  ERROR: 1
} as const;
