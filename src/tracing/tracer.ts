// This module defines the tracing backend contract and the endpoint middleware that drives it.

import { randomUUID } from 'node:crypto';
import type { CallContext, Endpoint, Middleware } from '../endpoints/endpoint.js';

export interface SpanContext {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
}

export type SpanKind = 'server' | 'client';

export type TagValue = string | number | boolean;

export interface Span {
  readonly context: SpanContext;
  setTag(key: string, value: TagValue): void;
  finish(error?: unknown): void;
}

export interface Tracer {
  readonly name: string;
  startSpan(operation: string, parent?: SpanContext): Span;
}

function newId(length: 16 | 32): string {
  return randomUUID().replaceAll('-', '').slice(0, length);
}

// This helper derives a child span context, starting a new trace when there is no parent.
export function childSpanContext(parent?: SpanContext): SpanContext {
  if (!parent) {
    return { traceId: newId(32), spanId: newId(16) };
  }

  return { traceId: parent.traceId, spanId: newId(16), parentSpanId: parent.spanId };
}

/**
 * Wraps an endpoint in one span of the given tracer. The span carries the
 * operation and kind tags, an `error` tag on failure, and is always finished.
 * Errors pass through unchanged.
 */
export function traceEndpoint(tracer: Tracer, operation: string, kind: SpanKind): Middleware {
  return <Req, Res>(next: Endpoint<Req, Res>): Endpoint<Req, Res> =>
    async (context: CallContext, request: Req): Promise<Res> => {
      const span = tracer.startSpan(operation, context.trace);
      span.setTag('operation', operation);
      span.setTag('span.kind', kind);

      try {
        const response = await next({ ...context, trace: span.context }, request);
        span.finish();
        return response;
      } catch (error) {
        span.setTag('error', true);
        span.finish(error);
        throw error;
      }
    };
}
