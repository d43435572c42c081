import type { ForwarderMetrics, QueryResult } from '../metrics.js';
import { decodeDnsMessage } from './codec.js';
import type { ForwardingRelay } from './relay.js';
import { buildServfailResponse } from './servfail.js';

export type ForwardResult = Readonly<{ kind: QueryResult; response: Buffer }>;

export class DnsForwarder {
  private readonly relay: ForwardingRelay;
  private readonly metrics: ForwarderMetrics | null;

  constructor(relay: ForwardingRelay, metrics?: ForwarderMetrics) {
    this.relay = relay;
    this.metrics = metrics ?? null;
  }

  /**
   * Decodes the query (a `DnsDecodeError` propagates), relays the original bytes and
   * falls back to SERVFAIL when the upstream gives nothing usable.
   */
  async handle(query: Buffer): Promise<ForwardResult> {
    const request = decodeDnsMessage(query);

    const upstreamResponse = await this.relay.forward(query);
    const result: ForwardResult =
      upstreamResponse === null
        ? { kind: 'servfail', response: buildServfailResponse(request) }
        : { kind: 'upstream', response: upstreamResponse };

    this.metrics?.queriesTotal.inc({ result: result.kind });
    return result;
  }
}
