import { MeterProvider } from '@opentelemetry/sdk-metrics';
import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { logger, toError } from './logger.js';

export type MetricsConfig = {
  enabled: boolean;
  prometheusPort?: number;
};

const SERVICE_NAME = 'dnserver';
const SERVICE_VERSION = '1.0.0';

interface Instruments {
  queries: Counter;
  upstreamQueries: Counter;
  upstreamErrors: Counter;
  upstreamResponseTime: Histogram;
}

let meterProvider: MeterProvider | null = null;
let instruments: Instruments | null = null;

function createInstruments(meter: Meter): Instruments {
  return {
    queries: meter.createCounter('dns.queries', {
      description: 'Number of DNS queries handled',
    }),
    upstreamQueries: meter.createCounter('dns.upstream.queries', {
      description: 'Number of upstream DNS queries',
    }),
    upstreamErrors: meter.createCounter('dns.upstream.errors', {
      description: 'Number of upstream DNS errors',
    }),
    upstreamResponseTime: meter.createHistogram('dns.upstream.response_time', {
      description: 'Upstream DNS response time in milliseconds',
      unit: 'ms',
    }),
  };
}

/**
 * Starts the Prometheus exporter. Until this runs every `record*` call is a
 * no-op.
 */
export function initializeMetrics(config: MetricsConfig): void {
  if (!config.enabled) {
    logger.info('OpenTelemetry metrics disabled');
    return;
  }

  try {
    const port = config.prometheusPort || 9464;
    const exporter = new PrometheusExporter({ port, endpoint: '/metrics' }, () => {
      logger.info(`Prometheus metrics endpoint started on port ${port}`);
    });

    meterProvider = new MeterProvider({
      resource: resourceFromAttributes({
        [ATTR_SERVICE_NAME]: SERVICE_NAME,
        [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
      }),
      readers: [exporter],
    });
    instruments = createInstruments(meterProvider.getMeter(SERVICE_NAME, SERVICE_VERSION));
  } catch (error) {
    logger.error('Failed to initialize OpenTelemetry metrics', { error: toError(error) });
  }
}

export async function shutdownMetrics(): Promise<void> {
  const provider = meterProvider;
  meterProvider = null;
  instruments = null;
  if (provider) {
    await provider.shutdown();
  }
}

export function recordDNSQuery(attributes: { type: string; result: string; protocol: 'udp' | 'tcp' }): void {
  instruments?.queries.add(1, {
    'dns.query.type': attributes.type,
    'dns.query.result': attributes.result,
    'network.transport': attributes.protocol,
  });
}

export function recordUpstreamMetrics(attributes: {
  upstream: string;
  success: boolean;
  responseTime?: number;
  queryType?: string;
}): void {
  if (!instruments) return;

  const queryAttributes: Record<string, string> = {
    'dns.upstream.server': attributes.upstream,
  };
  if (attributes.queryType) queryAttributes['dns.query.type'] = attributes.queryType;

  instruments.upstreamQueries.add(1, queryAttributes);
  if (!attributes.success) {
    instruments.upstreamErrors.add(1, queryAttributes);
  }
  if (attributes.responseTime !== undefined) {
    instruments.upstreamResponseTime.record(attributes.responseTime, queryAttributes);
  }
}
