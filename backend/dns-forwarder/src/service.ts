import type * as dgram from 'node:dgram';

import type { Config } from './config.js';
import type { DnsTransport } from './dns/upstream.js';
import type { Logger } from './logger.js';
import type { ForwarderMetrics } from './metrics.js';
import { buildServer } from './server.js';
import { startDnsForwarder, type DnsForwarderServer } from './udpServer.js';

export type ForwarderService = Readonly<{
  forwarder: DnsForwarderServer;
  admin: ReturnType<typeof buildServer> | null;
  close: () => Promise<void>;
}>;

export type StartForwarderServiceOptions = Readonly<{
  config: Config;
  logger: Logger;
  metrics: ForwarderMetrics;
  transport?: DnsTransport;
  createSocket?: typeof dgram.createSocket;
}>;

/**
 * Binds the DNS socket, then the admin listener when enabled. If the admin listener
 * cannot start, the DNS socket is closed again before the error propagates.
 */
export async function startForwarderService(opts: StartForwarderServiceOptions): Promise<ForwarderService> {
  const { config, logger, metrics } = opts;
  const forwarder = await startDnsForwarder({
    config,
    logger,
    metrics,
    transport: opts.transport,
    createSocket: opts.createSocket,
  });
  const admin = config.ADMIN_ENABLED ? buildServer({ config, metrics, logger }) : null;

  if (admin) {
    try {
      await admin.app.listen({ host: config.ADMIN_HOST, port: config.ADMIN_PORT });
    } catch (err) {
      await Promise.all([forwarder.close(), admin.app.close()]);
      throw err;
    }
  }

  const close = async (): Promise<void> => {
    await Promise.all([forwarder.close(), admin?.app.close()]);
  };

  return { forwarder, admin, close };
}
