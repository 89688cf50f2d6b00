// This module records per-response HTTP metrics and exposes the registry in Prometheus format.

import type { FastifyInstance } from 'fastify';
import { Counter, Histogram, type Registry } from 'prom-client';

export const METRICS_PATH = '/metrics';

export function registerMetrics(app: FastifyInstance, registry: Registry): void {
  const httpRequestsTotal = new Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'] as const,
    registers: [registry]
  });

  const httpRequestDuration = new Histogram({
    name: 'http_request_duration_ms',
    help: 'HTTP request duration in milliseconds',
    labelNames: ['method', 'route', 'status_code'] as const,
    buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
    registers: [registry]
  });

  app.addHook('onResponse', async (request, reply) => {
    const labels = {
      method: request.method,
      // Unmatched requests share one label value to keep cardinality bounded.
      route: request.routeOptions.url ?? 'unmatched',
      status_code: String(reply.statusCode)
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, reply.elapsedTime);
  });

  app.get(METRICS_PATH, async (_request, reply) => {
    reply.type(registry.contentType);
    return registry.metrics();
  });
}
