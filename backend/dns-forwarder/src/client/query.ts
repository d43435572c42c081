import type * as dgram from 'node:dgram';

import { createDnsHeader, decodeDnsMessage, encodeDnsFlags, encodeDnsMessage } from '../dns/codec.js';
import { DNS_CLASS_IN, DNS_RECORD_TYPES, qtypeToString } from '../dns/recordTypes.js';
import { makeUdpUpstream, queryUdpUpstream } from '../dns/upstream.js';

export const DEFAULT_QUERY_ID = 1234;
export const DEFAULT_QUERY_PORT = 2053;
export const DEFAULT_QUERY_HOST = '127.0.0.1';
export const DEFAULT_QUERY_TIMEOUT_MS = 5000;

export type BuildDnsQueryOptions = Readonly<{
  type?: number;
  id?: number;
  recursionDesired?: boolean;
}>;

/** Single-question query; RD is left clear unless asked for. */
export function buildDnsQuery(name: string, opts: BuildDnsQueryOptions = {}): Buffer {
  return encodeDnsMessage({
    header: createDnsHeader({ id: opts.id ?? DEFAULT_QUERY_ID, rd: opts.recursionDesired ?? false }),
    questions: [{ name, type: opts.type ?? DNS_RECORD_TYPES.A, class: DNS_CLASS_IN }],
    answers: [],
  });
}

export async function sendDnsQuery(
  query: Buffer,
  target: Readonly<{ host?: string; port?: number; timeoutMs?: number }> = {},
  opts: Readonly<{ createSocket?: typeof dgram.createSocket }> = {},
): Promise<Buffer> {
  const upstream = makeUdpUpstream(target.host ?? DEFAULT_QUERY_HOST, target.port ?? DEFAULT_QUERY_PORT);
  return await queryUdpUpstream(upstream, query, target.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS, opts);
}

function formatRdata(type: number, rdata: Buffer): string {
  if (type === DNS_RECORD_TYPES.A && rdata.length === 4) {
    return `  IP Address: ${Array.from(rdata).join('.')}`;
  }
  return `  Data: ${rdata.toString('hex')}`;
}

function formatRecordType(type: number): string {
  const name = qtypeToString(type);
  return name === String(type) ? name : `${name} (${type})`;
}

/**
 * Human-readable dump of a response: header counters first, then either the error rcode
 * or one block per answer record.
 */
export function describeDnsResponse(response: Buffer): string[] {
  const message = decodeDnsMessage(response);
  const { header } = message;

  const lines = [
    `Transaction ID: ${header.id}`,
    `Flags: 0x${encodeDnsFlags(header).toString(16).padStart(4, '0')}`,
    `Questions: ${header.qdcount}`,
    `Answer RRs: ${header.ancount}`,
    `Authority RRs: ${header.nscount}`,
    `Additional RRs: ${header.arcount}`,
  ];

  if (!header.qr) {
    lines.push('Warning: This is not a response packet!');
  }

  if (header.rcode !== 0) {
    lines.push(`Error: Response code is ${header.rcode}`);
    return lines;
  }

  message.answers.forEach((answer, i) => {
    lines.push(
      '',
      `Answer ${i + 1}:`,
      `  Name: ${answer.name}`,
      `  Type: ${formatRecordType(answer.type)}`,
      `  Class: ${answer.class}`,
      `  TTL: ${answer.ttl} seconds`,
      `  Data length: ${answer.rdata.length} bytes`,
      formatRdata(answer.type, answer.rdata),
    );
  });

  return lines;
}
