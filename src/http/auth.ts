// This module propagates bearer tokens from inbound requests into the call context and guards endpoints on them.

import type { FastifyRequest } from 'fastify';
import type { CallContext, Endpoint, Middleware } from '../endpoints/endpoint.js';
import { TokenContextMissingError } from '../errors/transport.js';

// This helper extracts bearer tokens from Authorization headers.
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const [scheme, token] = authHeader.split(' ', 2);
  if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
    return null;
  }

  return token;
}

// This request function copies the bearer token, when present, into the call context before decoding.
export function bearerTokenToContext(request: FastifyRequest, context: CallContext): CallContext {
  const token = extractBearerToken(request.headers.authorization);
  return token === null ? context : { ...context, token };
}

/**
 * Rejects calls whose context carries no token. The token is not verified here;
 * verification belongs to the authentication scheme.
 */
export function requireToken(): Middleware {
  return <Req, Res>(next: Endpoint<Req, Res>): Endpoint<Req, Res> =>
    async (context: CallContext, request: Req): Promise<Res> => {
      if (!context.token) {
        throw new TokenContextMissingError();
      }

      return next(context, request);
    };
}
