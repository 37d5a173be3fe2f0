import ipaddr from 'ipaddr.js';

import { InternalError } from '../errors.js';
import { expectParamCount } from './grammar.js';
import { TTL, type AnswerRecord, type Query, type QueryHandler, type ServiceResult } from './types.js';

/** Strips IPv6 zone ids and unwraps IPv4-mapped IPv6 addresses. */
export function normalizeClientIp(ipRaw: string): string {
  const raw = String(ipRaw ?? '').trim();
  const noZone = raw.includes('%') ? raw.slice(0, raw.indexOf('%')) : raw;
  if (!ipaddr.isValid(noZone)) return noZone;
  const addr = ipaddr.parse(noZone);
  if (addr instanceof ipaddr.IPv6 && addr.isIPv4MappedAddress()) {
    return addr.toIPv4Address().toString();
  }
  return addr.toString();
}

export class MyIpService implements QueryHandler {
  async handle(query: Query): Promise<ServiceResult> {
    expectParamCount(query, 0);

    const ip = normalizeClientIp(query.clientIp);
    if (!ipaddr.isValid(ip)) {
      throw new InternalError(`unusable client address "${query.clientIp}"`);
    }

    const address: AnswerRecord =
      ipaddr.parse(ip).kind() === 'ipv4' ? { type: 'A', data: ip } : { type: 'AAAA', data: ip };

    let records: AnswerRecord[];
    if (query.qtype === 'TXT') records = [{ type: 'TXT', data: [ip] }];
    else if (query.qtype === 'ANY' || query.qtype === address.type) records = [address];
    // A for an IPv6 caller, AAAA for an IPv4 one, or another type: no data.
    else records = [];

    return { records, ttl: TTL.LIVE };
  }
}
