// This module calls a remote add service over HTTP through the same endpoint and middleware contracts as the server.

import type { FastifyBaseLogger } from 'fastify';
import type { CallContext, Endpoint } from '../endpoints/endpoint.js';
import { decorateEndpoints, endpointsAsService } from '../endpoints/endpoints.js';
import { DomainError } from '../errors/model.js';
import { contextToTraceHeaders } from '../tracing/propagation.js';
import { traceEndpoint, type Tracer } from '../tracing/tracer.js';
import type { AddService } from '../types/add.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import {
  decodeConcatResponse,
  decodeSumResponse,
  encodeJsonRequest,
  JSON_CONTENT_TYPE
} from './codec.js';
import { CONCAT_PATH, SUM_PATH } from './routes.js';

export type ClientRequestFunc = (context: CallContext, headers: Headers) => void;

export type EncodeRequestFunc<Req> = (request: Req) => string;

export type DecodeResponseFunc<Res> = (response: Response) => Promise<Res>;

export interface AddClientOptions {
  // Tracers are listed outermost first, matching the server ordering.
  tracers?: readonly Tracer[];
  logger?: FastifyBaseLogger;
  requestTimeoutMs?: number;
}

interface ClientEndpointOptions<Req, Res> {
  method: 'POST';
  url: URL;
  encode: EncodeRequestFunc<Req>;
  decode: DecodeResponseFunc<Res>;
  before: readonly ClientRequestFunc[];
  timeoutMs: number;
  logger?: FastifyBaseLogger;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const SCHEME_PATTERN = /^https?:\/\//i;

// This helper turns a bare host[:port] into a base URL and rejects anything that is not HTTP.
export function normalizeInstance(instance: string): URL {
  const trimmed = instance.trim();
  const candidate = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;

  let url: URL;
  try {
    url = new URL(candidate);
  } catch (error) {
    throw new DomainError('invalid_instance', `invalid instance URL: ${instance}`, [
      { field: 'instance', message: error instanceof Error ? error.message : String(error) }
    ]);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new DomainError('invalid_instance', `invalid instance URL: ${instance}`, [
      { field: 'instance', message: `unsupported protocol ${url.protocol}` }
    ]);
  }

  return url;
}

function copyUrl(base: URL, path: string): URL {
  const next = new URL(base.href);
  next.pathname = path;
  next.search = '';
  next.hash = '';
  return next;
}

function log(
  logger: FastifyBaseLogger | undefined,
  level: 'debug' | 'info' | 'warn' | 'error',
  event: string,
  details: Record<string, unknown>
): void {
  const sanitizedDetails = sanitizeForLog(details);
  logger?.[level]({ event, details: sanitizedDetails }, event);
}

/**
 * Builds one HTTP call as an endpoint. The call is aborted when the caller's
 * signal aborts or the timeout elapses; failures are returned to the caller
 * without retry.
 */
export function makeClientEndpoint<Req, Res>(options: ClientEndpointOptions<Req, Res>): Endpoint<Req, Res> {
  return async (context: CallContext, request: Req): Promise<Res> => {
    const headers = new Headers({
      'content-type': JSON_CONTENT_TYPE,
      accept: 'application/json'
    });
    for (const requestFunc of options.before) {
      requestFunc(context, headers);
    }

    const abortController = new AbortController();
    const timer = setTimeout(() => abortController.abort(), options.timeoutMs);
    const onCallerAbort = (): void => abortController.abort(context.signal?.reason);
    if (context.signal?.aborted) {
      abortController.abort(context.signal.reason);
    } else {
      context.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const startedAt = Date.now();
    const path = options.url.pathname;
    log(options.logger, 'debug', 'add_client_request_started', { method: options.method, path });

    try {
      const response = await fetch(options.url, {
        method: options.method,
        headers,
        body: options.encode(request),
        signal: abortController.signal
      });

      log(options.logger, 'debug', 'add_client_request_response', {
        method: options.method,
        path,
        status: response.status,
        durationMs: Date.now() - startedAt
      });

      return await options.decode(response);
    } catch (error) {
      log(options.logger, 'warn', 'add_client_request_failed', {
        method: options.method,
        path,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      });
      throw error;
    } finally {
      clearTimeout(timer);
      context.signal?.removeEventListener('abort', onCallerAbort);
    }
  };
}

/**
 * Returns an add service backed by the HTTP server living at `instance`,
 * typically of the form "host:port". Malformed instances fail here, not on
 * the first call.
 */
export function createAddClient(instance: string, options: AddClientOptions = {}): AddService {
  const baseUrl = normalizeInstance(instance);
  const tracers = options.tracers ?? [];
  const timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const logger = options.logger?.child({ component: 'add_client' });
  const before: readonly ClientRequestFunc[] = [contextToTraceHeaders];

  const endpoints = decorateEndpoints(
    {
      sum: makeClientEndpoint({
        method: 'POST',
        url: copyUrl(baseUrl, SUM_PATH),
        encode: encodeJsonRequest,
        decode: decodeSumResponse,
        before,
        timeoutMs,
        logger
      }),
      concat: makeClientEndpoint({
        method: 'POST',
        url: copyUrl(baseUrl, CONCAT_PATH),
        encode: encodeJsonRequest,
        decode: decodeConcatResponse,
        before,
        timeoutMs,
        logger
      })
    },
    (operation) => tracers.map((tracer) => traceEndpoint(tracer, operation, 'client'))
  );

  return endpointsAsService(endpoints);
}
