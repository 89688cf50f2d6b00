// This module records span durations and outcomes into a prom-client histogram.

import { Histogram, type Registry } from 'prom-client';
import { childSpanContext, type Span, type SpanContext, type TagValue, type Tracer } from './tracer.js';

export const ENDPOINT_DURATION_METRIC = 'endpoint_request_duration_seconds';

export function createMetricsTracer(registry: Registry): Tracer {
  const histogram = new Histogram({
    name: ENDPOINT_DURATION_METRIC,
    help: 'Endpoint call duration in seconds',
    labelNames: ['operation', 'kind', 'success'] as const,
    buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
    registers: [registry]
  });

  return {
    name: 'metrics',
    startSpan(operation: string, parent?: SpanContext): Span {
      const context = childSpanContext(parent);
      const tags = new Map<string, TagValue>();
      const stopTimer = histogram.startTimer();
      let finished = false;

      return {
        context,
        setTag(key: string, value: TagValue): void {
          tags.set(key, value);
        },
        finish(error?: unknown): void {
          if (finished) {
            return;
          }
          finished = true;

          stopTimer({
            operation,
            kind: String(tags.get('span.kind') ?? 'unknown'),
            success: error === undefined ? 'true' : 'false'
          });
        }
      };
    }
  };
}
