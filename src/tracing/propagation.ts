// This module carries span contexts across HTTP using B3 single-value headers.

import type { CallContext } from '../endpoints/endpoint.js';
import type { SpanContext } from './tracer.js';

export const TRACE_ID_HEADER = 'x-b3-traceid';
export const SPAN_ID_HEADER = 'x-b3-spanid';
export const PARENT_SPAN_ID_HEADER = 'x-b3-parentspanid';
export const SAMPLED_HEADER = 'x-b3-sampled';

const TRACE_ID_PATTERN = /^[0-9a-f]{16}([0-9a-f]{16})?$/;
const SPAN_ID_PATTERN = /^[0-9a-f]{16}$/;

type IncomingHeaders = Record<string, string | string[] | undefined>;

function firstHeader(headers: IncomingHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

// This helper reads a remote parent span from inbound headers and ignores malformed ids.
export function spanContextFromHeaders(headers: IncomingHeaders): SpanContext | undefined {
  const traceId = firstHeader(headers, TRACE_ID_HEADER)?.toLowerCase();
  const spanId = firstHeader(headers, SPAN_ID_HEADER)?.toLowerCase();

  if (!traceId || !spanId || !TRACE_ID_PATTERN.test(traceId) || !SPAN_ID_PATTERN.test(spanId)) {
    return undefined;
  }

  return { traceId, spanId };
}

// This function writes the current span of the call context onto outgoing request headers.
export function contextToTraceHeaders(context: CallContext, headers: Headers): void {
  if (!context.trace) {
    return;
  }

  headers.set(TRACE_ID_HEADER, context.trace.traceId);
  headers.set(SPAN_ID_HEADER, context.trace.spanId);
  if (context.trace.parentSpanId) {
    headers.set(PARENT_SPAN_ID_HEADER, context.trace.parentSpanId);
  }
  headers.set(SAMPLED_HEADER, '1');
}
