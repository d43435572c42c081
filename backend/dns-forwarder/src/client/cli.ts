import type * as dgram from 'node:dgram';

import { parseDnsRecordType } from '../dns/recordTypes.js';
import { parsePortNumber, UpstreamTimeoutError } from '../dns/upstream.js';
import { formatOneLineError } from '../util/text.js';
import {
  DEFAULT_QUERY_HOST,
  DEFAULT_QUERY_PORT,
  DEFAULT_QUERY_TIMEOUT_MS,
  buildDnsQuery,
  describeDnsResponse,
  sendDnsQuery,
} from './query.js';

const MAX_PRINTED_ERROR_BYTES = 512;

export type DnsQueryCliDeps = Readonly<{
  log: (line: string) => void;
  host?: string;
  timeoutMs?: number;
  createSocket?: typeof dgram.createSocket;
}>;

function usage(): string[] {
  return [
    'Usage: dns-query <domain_name> [port] [type]',
    '  domain_name: The domain name to query',
    `  port: The port to connect to (default: ${DEFAULT_QUERY_PORT})`,
    '  type: Record type mnemonic or number (default: A)',
  ];
}

/**
 * Runs `dns-query` against `argv` (without the node/script entries) and returns the exit
 * code.
 */
export async function runDnsQueryCli(argv: readonly string[], deps: DnsQueryCliDeps): Promise<number> {
  const { log } = deps;
  const [domain, rawPort, rawType] = argv;
  if (domain === undefined || domain.trim() === '') {
    usage().forEach((line) => log(line));
    return 1;
  }

  let port = DEFAULT_QUERY_PORT;
  if (rawPort !== undefined) {
    try {
      port = parsePortNumber(rawPort, rawPort);
    } catch {
      log(`Error: Invalid port number '${rawPort}'`);
      return 1;
    }
  }

  let type: number | undefined;
  if (rawType !== undefined) {
    try {
      type = parseDnsRecordType(rawType);
    } catch (err) {
      log(`Error: ${formatOneLineError(err, MAX_PRINTED_ERROR_BYTES)}`);
      return 1;
    }
  }

  const host = deps.host ?? DEFAULT_QUERY_HOST;
  try {
    const query = buildDnsQuery(domain, { type });
    log(`Sending DNS query for ${domain} to ${host}:${port}...`);

    const response = await sendDnsQuery(
      query,
      { host, port, timeoutMs: deps.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS },
      { createSocket: deps.createSocket },
    );

    log('');
    log(`Received response (${response.length} bytes):`);
    describeDnsResponse(response).forEach((line) => log(line));
    return 0;
  } catch (err) {
    if (err instanceof UpstreamTimeoutError) {
      log('Error: Timeout waiting for response');
    } else {
      log(`Error: ${formatOneLineError(err, MAX_PRINTED_ERROR_BYTES)}`);
    }
    return 1;
  }
}
