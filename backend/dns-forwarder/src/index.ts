#!/usr/bin/env node
import { loadConfig, type Config } from './config.js';
import { createLogger } from './logger.js';
import { createForwarderMetrics } from './metrics.js';
import { startForwarderService } from './service.js';
import { unrefBestEffort } from './unrefSafe.js';
import { formatOneLineError } from './util/text.js';

function loadConfigOrReport(): Config | null {
  try {
    return loadConfig(process.env, process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return null;
  }
}

async function main(): Promise<void> {
  const loaded = loadConfigOrReport();
  if (!loaded) {
    process.exitCode = 1;
    return;
  }
  const config: Config = loaded;

  const logger = createLogger(config.LOG_LEVEL);
  const metrics = createForwarderMetrics();
  const service = await startForwarderService({ config, logger, metrics });

  let forceExitTimer: NodeJS.Timeout | null = null;

  async function shutdown(signal: string): Promise<void> {
    service.admin?.markShuttingDown();
    logger.info({ signal }, 'Shutdown requested');

    const graceMs = config.SHUTDOWN_GRACE_MS;
    forceExitTimer = setTimeout(() => {
      logger.error({ graceMs }, 'Graceful shutdown timed out; forcing exit');
      process.exit(1);
    }, graceMs);
    unrefBestEffort(forceExitTimer);

    try {
      // In-flight queries get to finish (bounded by the upstream timeout).
      await service.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  }

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  process.once('exit', () => {
    if (forceExitTimer) clearTimeout(forceExitTimer);
  });
}

main().catch((err: unknown) => {
  console.error(`dns-forwarder failed to start: ${formatOneLineError(err, 1024)}`);
  process.exit(1);
});
