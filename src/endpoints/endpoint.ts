// This module defines the transport-agnostic endpoint contract and its middleware composition.

import type { SpanContext } from '../tracing/tracer.js';

/**
 * Per-call state. A new record is derived for every step that adds to it;
 * nothing is mutated or shared between calls.
 */
export interface CallContext {
  readonly signal?: AbortSignal;
  readonly token?: string;
  readonly trace?: SpanContext;
}

// A failed call rejects with the original error value.
export type Endpoint<Req, Res> = (context: CallContext, request: Req) => Promise<Res>;

export type Middleware = <Req, Res>(next: Endpoint<Req, Res>) => Endpoint<Req, Res>;

/**
 * Composes middleware so that the first argument is the outermost decorator:
 * `chain(a, b)(e)` behaves as `a(b(e))`.
 */
export function chain(...middlewares: readonly Middleware[]): Middleware {
  return <Req, Res>(next: Endpoint<Req, Res>): Endpoint<Req, Res> =>
    middlewares.reduceRight<Endpoint<Req, Res>>((endpoint, middleware) => middleware(endpoint), next);
}
