import dgram from 'node:dgram';
import net from 'node:net';

import type { AppConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import type { Logger } from '../logger.js';
import { normalizeClientIp } from '../services/myip.js';
import type { MessageHandler } from './handler.js';

const TCP_IDLE_TIMEOUT_MS = 5000;
const DEFAULT_DNS_PORT = 53;

export type ListenAddress = { transport: 'udp' | 'tcp'; address: string; family: string; port: number };

export type DnsServerHandle = {
  close: () => Promise<void>;
  addresses: () => ListenAddress[];
};

/** Accepts `host:port`, `[v6]:port`, `:port` (all interfaces) or a bare host. */
function parseHostPort(value: string): { host: string; port: number } {
  const trimmed = value.trim();
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (bracketed) {
    return { host: bracketed[1] ?? '', port: bracketed[2] ? Number(bracketed[2]) : DEFAULT_DNS_PORT };
  }
  const idx = trimmed.lastIndexOf(':');
  // A bare IPv6 literal has several colons and no port.
  if (idx < 0 || trimmed.indexOf(':') !== idx) return { host: trimmed, port: DEFAULT_DNS_PORT };
  const host = trimmed.slice(0, idx);
  const port = Number(trimmed.slice(idx + 1));
  return { host, port: Number.isInteger(port) && port >= 0 && port <= 65535 ? port : Number.NaN };
}

type BindPlan = { mode: 'v4' | 'v6'; hosts: string[] } | { mode: 'dual'; hosts: [string, string] };

function resolveBindHosts(hostRaw: string): BindPlan {
  const host = String(hostRaw ?? '').trim();

  // Explicit IPv6 bind.
  if (host && host.includes(':')) return { mode: 'v6', hosts: [host] };

  // Explicit IPv4 (or hostname) bind.
  if (host) return { mode: 'v4', hosts: [host] };

  // ":53" means every interface; separate v4/v6 sockets avoid dual-stack quirks.
  return { mode: 'dual', hosts: ['0.0.0.0', '::'] };
}

/**
 * Serves DNS over UDP and TCP (RFC 1035 two-byte length framing) on `server.address`.
 * Each message is answered in its own task; a failing message never stops a socket.
 */
export async function startDnsServer(
  config: Pick<AppConfig, 'server'>,
  handleMessage: MessageHandler,
  logger: Logger
): Promise<DnsServerHandle> {
  const { host, port } = parseHostPort(config.server.address);
  if (!Number.isFinite(port)) throw new ConfigError(`invalid server.address "${config.server.address}"`);

  const plan = resolveBindHosts(host);

  const udpSockets: dgram.Socket[] = plan.hosts.map((h) =>
    h.includes(':') ? dgram.createSocket({ type: 'udp6', ipv6Only: true }) : dgram.createSocket('udp4')
  );

  for (const udp of udpSockets) {
    udp.on('message', (msg, rinfo) => {
      const clientIp = normalizeClientIp(rinfo.address);
      handleMessage(msg, { clientIp, transport: 'udp' })
        .then((resp) => {
          if (resp) udp.send(resp, rinfo.port, rinfo.address);
        })
        .catch((err: unknown) => {
          logger.warn({ err: err instanceof Error ? err.message : String(err), clientIp }, '[dns] udp reply failed');
        });
    });
    udp.on('error', (err) => {
      logger.error({ err: err.message }, '[dns] udp socket error');
    });
  }

  const createTcpServer = (): net.Server =>
    net.createServer((socket) => {
      socket.setTimeout(TCP_IDLE_TIMEOUT_MS);
      socket.setNoDelay(true);

      const clientIp = normalizeClientIp(socket.remoteAddress ?? '0.0.0.0');
      let buf = Buffer.alloc(0);

      const answer = async (msg: Buffer): Promise<void> => {
        const resp = await handleMessage(msg, { clientIp, transport: 'tcp' });
        if (!resp || socket.destroyed) return;
        const outLen = Buffer.alloc(2);
        outLen.writeUInt16BE(resp.length, 0);
        socket.write(Buffer.concat([outLen, resp]));
      };

      socket.on('data', (data) => {
        buf = Buffer.concat([buf, data]);
        while (buf.length >= 2) {
          const len = buf.readUInt16BE(0);
          if (buf.length < 2 + len) return;
          const msg = buf.subarray(2, 2 + len);
          buf = buf.subarray(2 + len);
          answer(msg).catch((err: unknown) => {
            logger.warn({ err: err instanceof Error ? err.message : String(err), clientIp }, '[dns] tcp reply failed');
          });
        }
      });

      socket.on('timeout', () => socket.end());
      socket.on('error', (err) => {
        logger.debug({ err: err.message, clientIp }, '[dns] tcp connection error');
      });
    });

  const tcpServers = plan.hosts.map(() => createTcpServer());

  const bindUdp = (udp: dgram.Socket, bindHost: string): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      udp.once('error', reject);
      udp.bind(port, bindHost, () => {
        udp.off('error', reject);
        resolve();
      });
    });

  const listenTcp = (tcp: net.Server, bindHost: string): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      tcp.once('error', reject);
      tcp.listen({ port, host: bindHost, ipv6Only: bindHost.includes(':') ? true : undefined }, () => {
        tcp.off('error', reject);
        resolve();
      });
    });

  async function close(): Promise<void> {
    for (const udp of udpSockets) {
      await new Promise<void>((resolve) => {
        try {
          udp.close(() => resolve());
        } catch (err) {
          // Never bound or already closed.
          logger.debug({ err: err instanceof Error ? err.message : String(err) }, '[dns] udp close');
          resolve();
        }
      });
    }

    for (const tcp of tcpServers) {
      if (!tcp.listening) continue;
      await new Promise<void>((resolve) => tcp.close(() => resolve()));
    }
  }

  try {
    for (const [i, bindHost] of plan.hosts.entries()) {
      const udp = udpSockets[i];
      const tcp = tcpServers[i];
      if (!udp || !tcp) continue;
      await bindUdp(udp, bindHost);
      await listenTcp(tcp, bindHost);
    }
  } catch (err) {
    await close();
    throw err;
  }

  const addresses = (): ListenAddress[] => {
    const out: ListenAddress[] = [];
    for (const udp of udpSockets) {
      const a = udp.address();
      out.push({ transport: 'udp', address: a.address, family: a.family, port: a.port });
    }
    for (const tcp of tcpServers) {
      const a = tcp.address();
      if (a && typeof a !== 'string') out.push({ transport: 'tcp', address: a.address, family: a.family, port: a.port });
    }
    return out;
  };

  logger.info({ mode: plan.mode, listen: addresses() }, '[dns] listening');

  return { close, addresses };
}

export const __testing = {
  parseHostPort,
  resolveBindHosts
};
