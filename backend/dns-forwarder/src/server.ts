import fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyReply } from 'fastify';
import type { Config } from './config.js';
import { createLogger } from './logger.js';
import type { ForwarderMetrics } from './metrics.js';
import { getVersionInfo } from './version.js';

type ServerBundle = {
  app: FastifyInstance;
  markShuttingDown: () => void;
};

export type BuildServerOptions = Readonly<{
  config: Config;
  metrics: ForwarderMetrics;
  logger?: FastifyBaseLogger;
}>;

/**
 * Admin HTTP surface for the forwarder: liveness, readiness, build info and Prometheus
 * metrics. DNS traffic never goes through here.
 */
export function buildServer(opts: BuildServerOptions): ServerBundle {
  const { config, metrics } = opts;
  let shuttingDown = false;

  const loggerInstance: FastifyBaseLogger = opts.logger ?? createLogger(config.LOG_LEVEL, 'dns-forwarder-admin');
  const app: FastifyInstance = fastify({
    loggerInstance,
    requestIdHeader: 'x-request-id',
  });

  const handleHealthz = async () => ({ ok: true });
  const handleReadyz = async (_request: unknown, reply: FastifyReply) => {
    if (shuttingDown) return reply.code(503).send({ ok: false });
    return { ok: true };
  };
  const handleVersion = async () => getVersionInfo();
  const handleMetrics = async (_request: unknown, reply: FastifyReply) => {
    reply.header('content-type', metrics.registry.contentType);
    return metrics.registry.metrics();
  };

  app.get('/healthz', handleHealthz);
  app.get('/readyz', handleReadyz);
  app.get('/version', handleVersion);
  app.get('/metrics', handleMetrics);

  return {
    app,
    markShuttingDown: () => {
      shuttingDown = true;
    },
  };
}
