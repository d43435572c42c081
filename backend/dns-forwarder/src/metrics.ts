import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type QueryResult = 'upstream' | 'servfail';
export type DropReason = 'too_large' | 'queue_full' | 'malformed' | 'internal';
export type UpstreamErrorKind = 'timeout' | 'error' | 'too_large';

export type ForwarderMetrics = Readonly<{
  registry: Registry;
  queriesTotal: Counter<'result'>;
  droppedTotal: Counter<'reason'>;
  upstreamErrorsTotal: Counter<'upstream' | 'kind'>;
  upstreamLatencySeconds: Histogram<'upstream' | 'outcome'>;
}>;

export function createForwarderMetrics(opts: Readonly<{ collectDefaults?: boolean }> = {}): ForwarderMetrics {
  // Per-forwarder registry: tests start several forwarders in one process.
  const registry = new Registry();
  if (opts.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const queriesTotal = new Counter({
    name: 'dns_forwarder_queries_total',
    help: 'Total number of DNS queries answered, by answer source',
    labelNames: ['result'] as const,
    registers: [registry],
  });

  const droppedTotal = new Counter({
    name: 'dns_forwarder_dropped_total',
    help: 'Total number of inbound datagrams dropped without a reply',
    labelNames: ['reason'] as const,
    registers: [registry],
  });

  const upstreamErrorsTotal = new Counter({
    name: 'dns_forwarder_upstream_errors_total',
    help: 'Total number of failed upstream relays',
    labelNames: ['upstream', 'kind'] as const,
    registers: [registry],
  });

  const upstreamLatencySeconds = new Histogram({
    name: 'dns_forwarder_upstream_latency_seconds',
    help: 'Upstream relay latency in seconds',
    labelNames: ['upstream', 'outcome'] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry],
  });

  return { registry, queriesTotal, droppedTotal, upstreamErrorsTotal, upstreamLatencySeconds };
}
