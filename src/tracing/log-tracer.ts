// This module records finished spans as structured pino log events.

import type { FastifyBaseLogger } from 'fastify';
import { errorForLog } from '../utils/logger.js';
import { childSpanContext, type Span, type SpanContext, type TagValue, type Tracer } from './tracer.js';

export function createLogTracer(logger: FastifyBaseLogger): Tracer {
  const tracerLogger = logger.child({ component: 'log_tracer' });

  return {
    name: 'log',
    startSpan(operation: string, parent?: SpanContext): Span {
      const context = childSpanContext(parent);
      const tags: Record<string, TagValue> = {};
      const startedAt = process.hrtime.bigint();
      let finished = false;

      return {
        context,
        setTag(key: string, value: TagValue): void {
          tags[key] = value;
        },
        finish(error?: unknown): void {
          if (finished) {
            return;
          }
          finished = true;

          const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
          tracerLogger.debug(
            {
              event: 'span_finished',
              operation,
              traceId: context.traceId,
              spanId: context.spanId,
              parentSpanId: context.parentSpanId ?? null,
              durationMs,
              tags,
              error: error === undefined ? null : errorForLog(error)
            },
            'span_finished'
          );
        }
      };
    }
  };
}
