import { z } from 'zod';
import { makeUdpUpstream, parseUpstreamArgs, type UdpUpstream } from './dns/upstream.js';
import { formatOneLineError } from './util/text.js';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

export type Config = Readonly<{
  HOST: string;
  PORT: number;
  LOG_LEVEL: LogLevel;
  SHUTDOWN_GRACE_MS: number;

  UPSTREAM: UdpUpstream;
  UPSTREAM_TIMEOUT_MS: number;

  // Queries above MAX_QUERY_BYTES are dropped; upstream replies above
  // MAX_RESPONSE_BYTES are treated as a failed relay.
  MAX_QUERY_BYTES: number;
  MAX_RESPONSE_BYTES: number;
  // Datagrams queued or in flight; arrivals beyond this are dropped.
  MAX_PENDING_QUERIES: number;

  ADMIN_ENABLED: boolean;
  ADMIN_HOST: string;
  ADMIN_PORT: number;
}>;

type Env = Record<string, string | undefined>;

export const USAGE = 'Usage: dns-forwarder [<upstream-host> <upstream-port>]';

const MAX_CONFIG_ERROR_MESSAGE_BYTES = 256;

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(2053),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(10_000),

  UPSTREAM_HOST: z.string().min(1).default('8.8.8.8'),
  UPSTREAM_PORT: z.coerce.number().int().min(1).max(65535).default(53),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),

  MAX_QUERY_BYTES: z.coerce.number().int().min(12).max(65535).default(512),
  MAX_RESPONSE_BYTES: z.coerce.number().int().min(12).max(65535).default(4096),
  MAX_PENDING_QUERIES: z.coerce.number().int().min(1).default(256),

  ADMIN_ENABLED: z.enum(['0', '1']).optional().default('0'),
  ADMIN_HOST: z.string().min(1).default('127.0.0.1'),
  ADMIN_PORT: z.coerce.number().int().min(0).max(65535).default(9153),
});

function resolveUpstream(envUpstream: () => UdpUpstream, argv: readonly string[]): UdpUpstream {
  if (argv.length === 0) return envUpstream();
  if (argv.length !== 2) {
    throw new Error(USAGE);
  }

  const [rawHost, rawPort] = argv;
  try {
    return parseUpstreamArgs(rawHost, rawPort);
  } catch (err) {
    throw new Error(`${formatOneLineError(err, MAX_CONFIG_ERROR_MESSAGE_BYTES)}\n${USAGE}`);
  }
}

/**
 * Builds the runtime configuration from the environment plus the optional
 * positional `<upstream-host> <upstream-port>` pair (already stripped of the
 * node/script entries of `process.argv`).
 */
export function loadConfig(env: Env = process.env, argv: readonly string[] = []): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;

  const upstream = resolveUpstream(() => {
    try {
      return makeUdpUpstream(raw.UPSTREAM_HOST, raw.UPSTREAM_PORT);
    } catch (err) {
      throw new Error(`Invalid UPSTREAM_HOST: ${formatOneLineError(err, MAX_CONFIG_ERROR_MESSAGE_BYTES)}`);
    }
  }, argv);

  return {
    HOST: raw.HOST,
    PORT: raw.PORT,
    LOG_LEVEL: raw.LOG_LEVEL,
    SHUTDOWN_GRACE_MS: raw.SHUTDOWN_GRACE_MS,

    UPSTREAM: upstream,
    UPSTREAM_TIMEOUT_MS: raw.UPSTREAM_TIMEOUT_MS,

    MAX_QUERY_BYTES: raw.MAX_QUERY_BYTES,
    MAX_RESPONSE_BYTES: raw.MAX_RESPONSE_BYTES,
    MAX_PENDING_QUERIES: raw.MAX_PENDING_QUERIES,

    ADMIN_ENABLED: raw.ADMIN_ENABLED === '1',
    ADMIN_HOST: raw.ADMIN_HOST,
    ADMIN_PORT: raw.ADMIN_PORT,
  };
}
