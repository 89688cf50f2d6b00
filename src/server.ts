// This module wires all HTTP routes, hooks, and error translation into one Fastify application.

import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { Registry } from 'prom-client';
import type { AppConfig } from './config/config.js';
import type { Middleware } from './endpoints/endpoint.js';
import { createAddEndpoints, type AddEndpoints } from './endpoints/endpoints.js';
import { translateError, writeErrorResponse, type DomainStatusRule, type ErrorTranslation } from './errors/translator.js';
import { RouteNotFoundError } from './errors/transport.js';
import { requireToken } from './http/auth.js';
import { registerMetrics } from './http/metrics.js';
import { registerAddRoutes } from './http/routes.js';
import { createAddService } from './service/add-service.js';
import { createLogTracer } from './tracing/log-tracer.js';
import { createMetricsTracer } from './tracing/metrics-tracer.js';
import { traceEndpoint, type Tracer } from './tracing/tracer.js';
import type { AddService, OperationName } from './types/add.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';

export interface LogStream {
  write(line: string): void;
}

export interface ServerOverrides {
  service?: AddService;
  domainStatusRules?: readonly DomainStatusRule[];
  // Destination for log lines instead of stdout.
  logStream?: LogStream;
}

export interface ServerResources {
  app: FastifyInstance;
  registry: Registry;
  endpoints: AddEndpoints;
}

// The request fields read when logging; router failures hand over a request that has matched no route.
export type FailedRequest = Pick<FastifyRequest, 'id' | 'method' | 'url' | 'log'>;

export type ErrorLogger = (request: FailedRequest, error: unknown, translation: ErrorTranslation) => void;

// This helper builds a safe header snapshot for request diagnostics without leaking secrets.
function buildRequestHeaderSnapshot(headers: Record<string, unknown>): unknown {
  return sanitizeForLog({
    host: headers.host ?? null,
    'user-agent': headers['user-agent'] ?? null,
    'content-type': headers['content-type'] ?? null,
    'content-length': headers['content-length'] ?? null,
    authorization: headers.authorization === undefined ? null : headers.authorization
  });
}

// This logger observes every translated error; it never touches the reply.
const logTranslatedError: ErrorLogger = (request, error, translation) => {
  const level = translation.statusCode >= 500 ? 'error' : 'warn';
  request.log[level](
    {
      event: 'http_request_failed',
      requestId: request.id,
      method: request.method,
      path: request.url,
      statusCode: translation.statusCode,
      errors: sanitizeForLog(translation.body.error.errors),
      error: errorForLog(error)
    },
    'http_request_failed'
  );
};

/**
 * Middleware of one server endpoint, outermost first: token guard (when
 * required), then each tracer in the given order, then the domain call.
 */
function serverMiddleware(config: AppConfig, tracers: readonly Tracer[]) {
  return (operation: OperationName): Middleware[] => [
    ...(config.authRequired ? [requireToken()] : []),
    ...tracers.map((tracer) => traceEndpoint(tracer, operation, 'server'))
  ];
}

// This function builds and configures the full HTTP application.
export function createServer(config: AppConfig, overrides: ServerOverrides = {}): ServerResources {
  const translateOptions = { domainStatusRules: overrides.domainStatusRules ?? [] };

  // This helper is the single place where failures from any stage become an HTTP response.
  const replyWithError = (request: FailedRequest, reply: FastifyReply, error: unknown): FastifyReply => {
    const translation = translateError(error, translateOptions);
    logTranslatedError(request, error, translation);
    return writeErrorResponse(reply, translation);
  };

  const loggerOptions = buildLoggerOptions(config.logLevel);
  const app = Fastify({
    logger: overrides.logStream ? { ...loggerOptions, stream: overrides.logStream } : loggerOptions,
    bodyLimit: config.bodyLimit,
    // Router failures such as malformed percent-encoding bypass the error handler otherwise.
    frameworkErrors: (error, request, reply) => {
      replyWithError(request, reply, error);
    }
  });
  const registry = new Registry();

  // The codec owns decoding: every body reaches the route decoder as raw text.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.addHook('onRequest', async (request) => {
    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        headers: buildRequestHeaderSnapshot(request.headers)
      },
      'http_request_start'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs: reply.elapsedTime
      },
      'http_request_complete'
    );
  });

  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  // Tracers are listed outermost first.
  const tracers: readonly Tracer[] = [
    createMetricsTracer(registry),
    createLogTracer(app.log.child({ component: 'tracing' }))
  ];
  const service = overrides.service ?? createAddService({ concatMaxLength: config.concatMaxLength });
  const endpoints = createAddEndpoints(service, serverMiddleware(config, tracers));

  registerAddRoutes(app, endpoints);
  registerMetrics(app, registry);

  app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) =>
    replyWithError(request, reply, error)
  );

  app.setNotFoundHandler((request, reply) =>
    replyWithError(request, reply, new RouteNotFoundError(request.method, request.url))
  );

  app.log.debug(
    {
      event: 'server_configured',
      authRequired: config.authRequired,
      concatMaxLength: config.concatMaxLength,
      bodyLimit: config.bodyLimit,
      tracers: tracers.map((tracer) => tracer.name)
    },
    'server_configured'
  );

  return {
    app,
    registry,
    endpoints
  };
}
