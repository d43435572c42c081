import * as dgram from 'node:dgram';

import { unrefBestEffort } from '../unrefSafe.js';

export type UdpUpstream = Readonly<{ host: string; port: number; label: string }>;

/**
 * Resolves with the first datagram received, rejects on timeout (`UpstreamTimeoutError`)
 * or transport failure.
 */
export type DnsTransport = (upstream: UdpUpstream, query: Buffer, timeoutMs: number) => Promise<Buffer>;

export class UpstreamTimeoutError extends Error {
  override name = 'UpstreamTimeoutError';
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`UDP upstream timeout after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

const MAX_UPSTREAM_ENTRY_LEN = 4096;

export function parsePortNumber(rawPort: string, input: string): number {
  const portStr = rawPort.trim();
  if (portStr.length < 1 || portStr.length > 5) throw new Error(`Invalid upstream port: ${input}`);
  for (let i = 0; i < portStr.length; i += 1) {
    const c = portStr.charCodeAt(i);
    if (c < 0x30 || c > 0x39) throw new Error(`Invalid upstream port: ${input}`);
  }
  const port = Number(portStr);
  if (!Number.isInteger(port) || port < 1 || port > 65535) throw new Error(`Invalid upstream port: ${input}`);
  return port;
}

function normalizeUpstreamHost(rawHost: string, input: string): string {
  const trimmed = rawHost.trim();
  if (!trimmed || trimmed.length > MAX_UPSTREAM_ENTRY_LEN) throw new Error(`Invalid upstream host: ${input}`);
  if (trimmed.startsWith('[')) {
    if (!trimmed.endsWith(']') || trimmed.length < 3) throw new Error(`Invalid upstream host: ${input}`);
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

export function makeUdpUpstream(rawHost: string, port: number): UdpUpstream {
  const host = normalizeUpstreamHost(rawHost, rawHost);
  if (!Number.isInteger(port) || port < 1 || port > 65535) throw new Error(`Invalid upstream port: ${port}`);
  const label = host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
  return { host, port, label };
}

/**
 * Parses the positional `<host> <port>` pair the forwarder accepts on its command line.
 */
export function parseUpstreamArgs(rawHost: string, rawPort: string): UdpUpstream {
  const port = parsePortNumber(rawPort, `${rawHost} ${rawPort}`);
  return makeUdpUpstream(rawHost, port);
}

function closeSocket(socket: dgram.Socket): void {
  try {
    socket.close();
  } catch {
    // already closed
  }
}

/**
 * Sends `query` from a fresh ephemeral socket and settles on the first of: a datagram,
 * a socket or send error, or the timeout. The socket is closed exactly once either way.
 */
export async function queryUdpUpstream(
  upstream: UdpUpstream,
  query: Buffer,
  timeoutMs: number,
  opts: Readonly<{ createSocket?: typeof dgram.createSocket }> = {},
): Promise<Buffer> {
  const createSocket = opts.createSocket ?? dgram.createSocket;
  const socket = createSocket(upstream.host.includes(':') ? 'udp6' : 'udp4');

  return await new Promise<Buffer>((resolve, reject) => {
    let done = false;

    const settle = (complete: () => void): void => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      socket.off('message', onMessage);
      closeSocket(socket);
      complete();
    };

    const onMessage = (msg: Buffer): void => settle(() => resolve(Buffer.from(msg)));
    // Stays attached after settling so a late socket error is not unhandled.
    const onError = (err: unknown): void => settle(() => reject(err));

    const timer = setTimeout(() => onError(new UpstreamTimeoutError(timeoutMs)), timeoutMs);
    unrefBestEffort(timer);

    socket.on('message', onMessage);
    socket.on('error', onError);

    try {
      socket.send(query, upstream.port, upstream.host, (err) => {
        if (err) onError(err);
      });
    } catch (err) {
      onError(err);
    }
  });
}
