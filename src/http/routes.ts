// This module registers the operation routes of the add service.

import type { FastifyInstance } from 'fastify';
import type { AddEndpoints } from '../endpoints/endpoints.js';
import { bearerTokenToContext } from './auth.js';
import { decodeConcatRequest, decodeSumRequest, encodeJsonResponse } from './codec.js';
import { createEndpointHandler, traceHeadersToContext, type ServerRequestFunc } from './endpoint-handler.js';

export const SUM_PATH = '/api/add/sum';
export const CONCAT_PATH = '/api/add/concat';

const SERVER_BEFORE: readonly ServerRequestFunc[] = [traceHeadersToContext, bearerTokenToContext];

export function registerAddRoutes(app: FastifyInstance, endpoints: AddEndpoints): void {
  app.post(
    SUM_PATH,
    createEndpointHandler({
      endpoint: endpoints.sum,
      decode: decodeSumRequest,
      encode: encodeJsonResponse,
      before: SERVER_BEFORE
    })
  );

  app.post(
    CONCAT_PATH,
    createEndpointHandler({
      endpoint: endpoints.concat,
      decode: decodeConcatRequest,
      encode: encodeJsonResponse,
      before: SERVER_BEFORE
    })
  );
}
