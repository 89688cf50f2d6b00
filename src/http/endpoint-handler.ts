// This module binds an endpoint to a Fastify route through a decoder, an encoder, and request functions.

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { CallContext, Endpoint } from '../endpoints/endpoint.js';
import { spanContextFromHeaders } from '../tracing/propagation.js';

// Request functions run in order before decoding and may only add to the call context.
export type ServerRequestFunc = (request: FastifyRequest, context: CallContext) => CallContext;

export type DecodeRequestFunc<Req> = (body: unknown) => Req;

export type EncodeResponseFunc<Res> = (reply: FastifyReply, response: Res) => FastifyReply;

export interface EndpointHandlerOptions<Req, Res> {
  endpoint: Endpoint<Req, Res>;
  decode: DecodeRequestFunc<Req>;
  encode: EncodeResponseFunc<Res>;
  before?: readonly ServerRequestFunc[];
}

export type RouteHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>;

// This request function continues a trace started by the caller, when its headers carry one.
export function traceHeadersToContext(request: FastifyRequest, context: CallContext): CallContext {
  const trace = spanContextFromHeaders(request.headers);
  return trace ? { ...context, trace } : context;
}

// This helper ties the call's abort signal to the connection closing before the response is finished.
function requestSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('client closed the connection before the response was written'));
    }
  });
  return controller.signal;
}

/**
 * Builds the route handler. Decode, endpoint and encode failures are all
 * rethrown untouched so the server error handler translates them exactly once.
 */
export function createEndpointHandler<Req, Res>(options: EndpointHandlerOptions<Req, Res>): RouteHandler {
  const before = options.before ?? [];

  return async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    let context: CallContext = { signal: requestSignal(reply) };
    for (const requestFunc of before) {
      context = requestFunc(request, context);
    }

    const decoded = options.decode(request.body);
    const response = await options.endpoint(context, decoded);
    return options.encode(reply, response);
  };
}
