import dnsPacket, { type Answer, type Packet } from 'dns-packet';

import { isNegativeError } from '../errors.js';
import { TTL, type AnswerRecord, type Outcome } from '../services/types.js';

export const RCODE = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4
} as const;

export type RcodeName = keyof typeof RCODE;

/** Plain UDP payload limit without EDNS. */
export const UDP_MAX_SIZE = 512;

const TXT_CHUNK_BYTES = 255;

/** The subset of a decoded query the assembler echoes back. */
export type QueryPacket = Pick<Packet, 'id' | 'flags' | 'questions' | 'additionals'>;

function responseFlags(query: QueryPacket, rcode: number, extra = 0): number {
  const baseFlags = typeof query.flags === 'number' ? query.flags : 0;
  // dns-packet encodes the header RCODE in the low 4 bits of `flags`. Keep the query's
  // opcode and RD bit, drop anything that only makes sense on a response.
  const kept = baseFlags & (0x7800 | dnsPacket.RECURSION_DESIRED | dnsPacket.CHECKING_DISABLED);
  return kept | dnsPacket.AUTHORITATIVE_ANSWER | extra | (rcode & 0xf);
}

/** TXT character-strings are limited to 255 bytes; longer strings are split. */
export function txtChunks(value: string): string[] {
  const buf = Buffer.from(value, 'utf8');
  if (buf.length <= TXT_CHUNK_BYTES) return [value];
  const out: string[] = [];
  let start = 0;
  while (start < buf.length) {
    let end = Math.min(start + TXT_CHUNK_BYTES, buf.length);
    // Don't cut a multi-byte character in half.
    while (end < buf.length && end > start && (buf[end] & 0xc0) === 0x80) end--;
    out.push(buf.subarray(start, end).toString('utf8'));
    start = end;
  }
  return out;
}

function toAnswer(name: string, ttl: number, rec: AnswerRecord): Answer {
  switch (rec.type) {
    case 'TXT':
      return { type: 'TXT', name, ttl, class: 'IN', data: rec.data.flatMap(txtChunks) };
    case 'A':
      return { type: 'A', name, ttl, class: 'IN', data: rec.data };
    case 'AAAA':
      return { type: 'AAAA', name, ttl, class: 'IN', data: rec.data };
  }
}

/** SOA for the authority section of negative answers; `minimum` sets the negative-cache TTL. */
function negativeSoa(zone: string, domain: string): Answer {
  return {
    type: 'SOA',
    name: zone || '.',
    ttl: TTL.ERROR,
    class: 'IN',
    data: {
      mname: domain,
      rname: `hostmaster.${domain}`,
      serial: 1,
      refresh: 3600,
      retry: 600,
      expire: 86400,
      minimum: TTL.ERROR
    }
  };
}

export function buildAnswerResponse(query: QueryPacket, answers: Answer[]): Buffer {
  return dnsPacket.encode({
    type: 'response',
    id: query.id,
    flags: responseFlags(query, RCODE.NOERROR),
    questions: query.questions,
    answers,
    authorities: [],
    additionals: []
  });
}

export function buildErrorResponse(
  query: QueryPacket,
  rcode: RcodeName,
  soa?: { zone: string; domain: string }
): Buffer {
  return dnsPacket.encode({
    type: 'response',
    id: query.id,
    flags: responseFlags(query, RCODE[rcode]),
    questions: query.questions ?? [],
    answers: [],
    authorities: soa && soa.domain ? [negativeSoa(soa.zone, soa.domain)] : [],
    additionals: []
  });
}

/** FORMERR for a message whose body could not be decoded; only the id is echoed. */
export function buildFormErrFromRaw(msg: Buffer): Buffer | null {
  if (msg.length < 2) return null;
  return buildErrorResponse({ id: msg.readUInt16BE(0), flags: 0, questions: [] }, 'FORMERR');
}

/** Same header and question with TC set and no records; tells the client to retry over TCP. */
export function buildTruncatedResponse(query: QueryPacket): Buffer {
  return dnsPacket.encode({
    type: 'response',
    id: query.id,
    flags: responseFlags(query, RCODE.NOERROR, dnsPacket.TRUNCATED_RESPONSE),
    questions: query.questions,
    answers: [],
    authorities: [],
    additionals: []
  });
}

/** Largest UDP response the client accepts (EDNS payload size or 512). */
export function maxUdpSize(query: QueryPacket): number {
  for (const add of query.additionals ?? []) {
    // Only OPT pseudo-records carry a payload size.
    if ('udpPayloadSize' in add && typeof add.udpPayloadSize === 'number') {
      return Math.max(UDP_MAX_SIZE, add.udpPayloadSize);
    }
  }
  return UDP_MAX_SIZE;
}

export function rcodeForOutcome(outcome: Outcome): RcodeName {
  if (outcome.status === 'answer') return 'NOERROR';
  if (outcome.status === 'unknown_zone') return 'NXDOMAIN';
  return isNegativeError(outcome.error) ? 'NXDOMAIN' : 'SERVFAIL';
}

/**
 * Turns a dispatch outcome into a wire response. Every outcome maps to a valid
 * message: answers on success, an SOA with NOERROR when there is nothing to answer, and
 * NXDOMAIN/SERVFAIL with an SOA otherwise.
 */
export function assembleResponse(
  query: QueryPacket,
  answerName: string,
  zone: string,
  outcome: Outcome,
  domain: string
): Buffer {
  if (outcome.status === 'answer') {
    // NODATA: the name exists but has nothing of the asked type.
    if (!outcome.result.records.length) return buildErrorResponse(query, 'NOERROR', { zone, domain });
    const ttl = Math.max(0, Math.floor(outcome.result.ttl));
    return buildAnswerResponse(
      query,
      outcome.result.records.map((rec) => toAnswer(answerName, ttl, rec))
    );
  }
  return buildErrorResponse(query, rcodeForOutcome(outcome), { zone, domain });
}
