// This module exposes each add operation as an endpoint and glues endpoint sets back into a service.

import type {
  AddService,
  ConcatRequest,
  ConcatResponse,
  OperationName,
  SumRequest,
  SumResponse
} from '../types/add.js';
import { chain, type CallContext, type Endpoint, type Middleware } from './endpoint.js';

export interface AddEndpoints {
  readonly sum: Endpoint<SumRequest, SumResponse>;
  readonly concat: Endpoint<ConcatRequest, ConcatResponse>;
}

// Returns the middleware of one operation, outermost first.
export type MiddlewareFactory = (operation: OperationName) => readonly Middleware[];

export function makeSumEndpoint(service: AddService): Endpoint<SumRequest, SumResponse> {
  return async (context, request) => ({ res: await service.sum(context, request.a, request.b) });
}

export function makeConcatEndpoint(service: AddService): Endpoint<ConcatRequest, ConcatResponse> {
  return async (context, request) => ({ res: await service.concat(context, request.a, request.b) });
}

export function decorateEndpoints(
  endpoints: AddEndpoints,
  middlewareFor: MiddlewareFactory = () => []
): AddEndpoints {
  return Object.freeze({
    sum: chain(...middlewareFor('Sum'))(endpoints.sum),
    concat: chain(...middlewareFor('Concat'))(endpoints.concat)
  });
}

// This function builds the immutable endpoint set shared by every request.
export function createAddEndpoints(service: AddService, middlewareFor?: MiddlewareFactory): AddEndpoints {
  return decorateEndpoints(
    {
      sum: makeSumEndpoint(service),
      concat: makeConcatEndpoint(service)
    },
    middlewareFor
  );
}

// This helper lets an endpoint set, such as the HTTP client's, be used wherever a service is expected.
export function endpointsAsService(endpoints: AddEndpoints): AddService {
  return {
    async sum(context: CallContext, a: number, b: number): Promise<number> {
      const response = await endpoints.sum(context, { a, b });
      return response.res;
    },

    async concat(context: CallContext, a: string, b: string): Promise<string> {
      const response = await endpoints.concat(context, { a, b });
      return response.res;
    }
  };
}
