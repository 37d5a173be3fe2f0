import dnsPacket, { type Packet } from 'dns-packet';

import { isNegativeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { toQuery } from '../services/grammar.js';
import type { Outcome, Query } from '../services/types.js';
import {
  assembleResponse,
  buildErrorResponse,
  buildFormErrFromRaw,
  buildTruncatedResponse,
  maxUdpSize,
  rcodeForOutcome,
  type RcodeName
} from './response.js';
import type { ZoneRouter } from './router.js';

export type Transport = 'udp' | 'tcp';

export type MessageContext = { clientIp: string; transport: Transport };

/** Resolves to the wire response, or null when nothing should be sent back. */
export type MessageHandler = (msg: Buffer, ctx: MessageContext) => Promise<Buffer | null>;

export type DnsRuntimeStats = {
  startedAt: string;
  lastQueryAt: string | null;
  lastClientIp: string | null;
  lastTransport: Transport | null;
  totalQueries: number;
  truncated: number;
  byRcode: Record<RcodeName, number>;
};

export function createRuntimeStats(now: Date = new Date()): DnsRuntimeStats {
  return {
    startedAt: now.toISOString(),
    lastQueryAt: null,
    lastClientIp: null,
    lastTransport: null,
    totalQueries: 0,
    truncated: 0,
    byRcode: { NOERROR: 0, FORMERR: 0, SERVFAIL: 0, NXDOMAIN: 0, NOTIMP: 0 }
  };
}

function opcodeOf(flags: number | undefined): number {
  return typeof flags === 'number' ? (flags >> 11) & 0xf : 0;
}

function logOutcome(logger: Logger, query: Query, outcome: Outcome): void {
  if (outcome.status === 'answer') {
    logger.debug({ name: query.name, qtype: query.qtype, zone: query.zone }, '[dns] answered');
    return;
  }
  if (outcome.status === 'unknown_zone') {
    logger.debug({ name: query.name, zone: query.zone }, '[dns] unknown zone');
    return;
  }
  const err = outcome.error;
  const fields = { name: query.name, zone: query.zone, code: err.code, err: err.message };
  if (isNegativeError(err)) logger.debug(fields, '[dns] rejected query');
  else if (err.code === 'UPSTREAM_FAILED') logger.warn(fields, '[dns] upstream failure');
  else logger.error({ ...fields, stack: err.stack }, '[dns] handler failed');
}

export type MessageHandlerOptions = {
  router: ZoneRouter;
  domain: string;
  logger: Logger;
  stats?: DnsRuntimeStats;
  now?: () => Date;
};

/**
 * Decodes one DNS message, dispatches its first question through the router and
 * encodes the reply. Never rejects.
 */
export function createMessageHandler(opts: MessageHandlerOptions): MessageHandler {
  const { router, domain, logger } = opts;
  const stats = opts.stats ?? createRuntimeStats();
  const now = opts.now ?? (() => new Date());

  const count = (rcode: RcodeName): void => {
    stats.byRcode[rcode] += 1;
  };

  return async (msg, ctx) => {
    stats.totalQueries += 1;
    stats.lastQueryAt = now().toISOString();
    stats.lastClientIp = ctx.clientIp;
    stats.lastTransport = ctx.transport;

    let packet: Packet;
    try {
      packet = dnsPacket.decode(msg);
    } catch (err) {
      logger.debug({ err: err instanceof Error ? err.message : String(err), bytes: msg.length }, '[dns] undecodable message');
      const resp = buildFormErrFromRaw(msg);
      if (resp) count('FORMERR');
      return resp;
    }

    // Stray responses are dropped rather than answered.
    if (packet.type === 'response') return null;

    if (opcodeOf(packet.flags) !== 0) {
      count('NOTIMP');
      return buildErrorResponse(packet, 'NOTIMP');
    }

    const question = packet.questions?.[0];
    if (!question) {
      count('FORMERR');
      return buildErrorResponse(packet, 'FORMERR');
    }

    const query = toQuery(question.name, question.type, ctx.clientIp);
    const outcome = await router.dispatch(query);
    logOutcome(logger, query, outcome);

    let resp: Buffer;
    try {
      resp = assembleResponse(packet, question.name, query.zone, outcome, domain);
    } catch (err) {
      logger.error({ name: query.name, err: err instanceof Error ? err.message : String(err) }, '[dns] encode failed');
      count('SERVFAIL');
      return buildErrorResponse(packet, 'SERVFAIL');
    }

    count(rcodeForOutcome(outcome));

    if (ctx.transport === 'udp' && resp.length > maxUdpSize(packet)) {
      stats.truncated += 1;
      return buildTruncatedResponse(packet);
    }
    return resp;
  };
}
