import * as dgram from 'node:dgram';
import type { AddressInfo } from 'node:net';

import type { Config } from './config.js';
import { DnsDecodeError } from './dns/codec.js';
import { DnsForwarder } from './dns/forwarder.js';
import { ForwardingRelay } from './dns/relay.js';
import type { DnsTransport } from './dns/upstream.js';
import type { Logger } from './logger.js';
import type { DropReason, ForwarderMetrics } from './metrics.js';
import { formatOneLineError } from './util/text.js';

const MAX_LOGGED_ERROR_BYTES = 256;

export type StartDnsForwarderOptions = Readonly<{
  config: Config;
  logger: Logger;
  metrics?: ForwarderMetrics;
  transport?: DnsTransport;
  createSocket?: typeof dgram.createSocket;
}>;

export type DnsForwarderServer = Readonly<{
  socket: dgram.Socket;
  address: AddressInfo;
  /** Resolves once every datagram received so far has been answered or dropped. */
  idle: () => Promise<void>;
  /** Stops accepting datagrams, drains the queue, then closes the socket. */
  close: () => Promise<void>;
}>;

function formatClient(rinfo: dgram.RemoteInfo): string {
  return rinfo.family === 'IPv6' ? `[${rinfo.address}]:${rinfo.port}` : `${rinfo.address}:${rinfo.port}`;
}

async function bindSocket(socket: dgram.Socket, port: number, host: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    socket.once('error', onError);
    socket.bind(port, host, () => {
      socket.off('error', onError);
      resolve();
    });
  });
}

async function sendReply(socket: dgram.Socket, response: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    socket.send(response, rinfo.port, rinfo.address, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/**
 * Binds the forwarder's UDP socket and answers queries strictly one at a time in arrival
 * order: a datagram is decoded, relayed and answered before the next one is looked at.
 */
export async function startDnsForwarder(opts: StartDnsForwarderOptions): Promise<DnsForwarderServer> {
  const { config, logger } = opts;
  const metrics = opts.metrics ?? null;
  const createSocket = opts.createSocket ?? dgram.createSocket;

  const relay = new ForwardingRelay({
    upstream: config.UPSTREAM,
    timeoutMs: config.UPSTREAM_TIMEOUT_MS,
    maxResponseBytes: config.MAX_RESPONSE_BYTES,
    transport: opts.transport,
    logger,
    metrics: opts.metrics,
  });
  const forwarder = new DnsForwarder(relay, opts.metrics);

  const socket = createSocket(config.HOST.includes(':') ? 'udp6' : 'udp4');
  await bindSocket(socket, config.PORT, config.HOST);
  const address = socket.address();

  const drop = (reason: DropReason, client: string, bytes: number, err?: unknown) => {
    metrics?.droppedTotal.inc({ reason });
    const fields = {
      client,
      bytes,
      reason,
      ...(err === undefined ? {} : { error: formatOneLineError(err, MAX_LOGGED_ERROR_BYTES) }),
    };
    if (reason === 'internal') logger.error({ ...fields, err }, 'Dropped DNS query');
    else logger.warn(fields, 'Dropped DNS query');
  };

  const handleDatagram = async (msg: Buffer, rinfo: dgram.RemoteInfo, client: string): Promise<void> => {
    try {
      const result = await forwarder.handle(msg);
      await sendReply(socket, result.response, rinfo);
      logger.debug({ client, bytes: msg.length, result: result.kind, responseBytes: result.response.length }, 'Answered DNS query');
    } catch (err) {
      drop(err instanceof DnsDecodeError ? 'malformed' : 'internal', client, msg.length, err);
    }
  };

  let chain: Promise<void> = Promise.resolve();
  let pending = 0;
  let closing = false;

  socket.on('message', (msg, rinfo) => {
    if (closing) return;
    const client = formatClient(rinfo);
    if (msg.length > config.MAX_QUERY_BYTES) {
      drop('too_large', client, msg.length);
      return;
    }
    if (pending >= config.MAX_PENDING_QUERIES) {
      drop('queue_full', client, msg.length);
      return;
    }

    pending += 1;
    chain = chain
      .then(() => handleDatagram(msg, rinfo, client))
      .finally(() => {
        pending -= 1;
      });
  });

  socket.on('error', (err) => {
    logger.error({ err }, 'DNS forwarder socket error');
  });

  const idle = async (): Promise<void> => {
    // New datagrams may extend the chain while we wait on it.
    for (;;) {
      const current = chain;
      await current;
      if (current === chain) return;
    }
  };

  let closePromise: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (closePromise) return closePromise;
    closing = true;
    closePromise = idle().then(
      () =>
        new Promise<void>((resolve) => {
          socket.close(() => resolve());
        }),
    );
    return closePromise;
  };

  logger.info(
    { host: address.address, port: address.port, upstream: config.UPSTREAM.label, timeoutMs: config.UPSTREAM_TIMEOUT_MS },
    'DNS forwarder listening',
  );

  return { socket, address, idle, close };
}
