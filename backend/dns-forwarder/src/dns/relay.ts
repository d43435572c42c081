import { performance } from 'node:perf_hooks';

import type { Logger } from '../logger.js';
import type { ForwarderMetrics, UpstreamErrorKind } from '../metrics.js';
import { formatOneLineError } from '../util/text.js';
import { queryUdpUpstream, UpstreamTimeoutError, type DnsTransport, type UdpUpstream } from './upstream.js';

export const DEFAULT_RELAY_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_RESPONSE_BYTES = 4096;

const MAX_LOGGED_ERROR_BYTES = 256;

export type ForwardingRelayOptions = Readonly<{
  upstream: UdpUpstream;
  logger: Logger;
  timeoutMs?: number;
  maxResponseBytes?: number;
  transport?: DnsTransport;
  metrics?: ForwarderMetrics;
}>;

export class UpstreamResponseTooLargeError extends Error {
  override name = 'UpstreamResponseTooLargeError';

  constructor(bytes: number, maxBytes: number) {
    super(`Upstream response too large: ${bytes} > ${maxBytes} bytes`);
  }
}

function classifyUpstreamError(err: unknown): UpstreamErrorKind {
  if (err instanceof UpstreamTimeoutError) return 'timeout';
  if (err instanceof UpstreamResponseTooLargeError) return 'too_large';
  return 'error';
}

/**
 * Sends a query unchanged to one upstream resolver and hands back the first datagram it
 * returns. Every failure collapses to `null`; callers decide what to answer instead.
 */
export class ForwardingRelay {
  readonly upstream: UdpUpstream;
  readonly timeoutMs: number;
  readonly maxResponseBytes: number;
  private readonly transport: DnsTransport;
  private readonly logger: Logger;
  private readonly metrics: ForwarderMetrics | null;

  constructor(opts: ForwardingRelayOptions) {
    this.upstream = opts.upstream;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_RELAY_TIMEOUT_MS;
    this.maxResponseBytes = opts.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
    this.transport = opts.transport ?? queryUdpUpstream;
    this.logger = opts.logger;
    this.metrics = opts.metrics ?? null;
  }

  async forward(query: Buffer): Promise<Buffer | null> {
    const start = performance.now();
    try {
      const response = await this.transport(this.upstream, query, this.timeoutMs);
      if (response.length > this.maxResponseBytes) {
        throw new UpstreamResponseTooLargeError(response.length, this.maxResponseBytes);
      }
      this.observeLatency(start, 'ok');
      return response;
    } catch (err) {
      const kind = classifyUpstreamError(err);
      this.observeLatency(start, kind);
      this.metrics?.upstreamErrorsTotal.inc({ upstream: this.upstream.label, kind });
      this.logger.warn(
        { upstream: this.upstream.label, kind, error: formatOneLineError(err, MAX_LOGGED_ERROR_BYTES) },
        'Upstream relay failed',
      );
      return null;
    }
  }

  private observeLatency(start: number, outcome: 'ok' | UpstreamErrorKind): void {
    const durationSeconds = (performance.now() - start) / 1000;
    this.metrics?.upstreamLatencySeconds.observe({ upstream: this.upstream.label, outcome }, durationSeconds);
  }
}
