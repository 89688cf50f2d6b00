// This module defines failures raised by the HTTP transport before or around the endpoint call.

export type DecodeErrorKind = 'syntax' | 'type';

// This error covers malformed JSON (syntax) and well-formed JSON of the wrong shape (type).
export class DecodeError extends Error {
  public readonly kind: DecodeErrorKind;

  public constructor(kind: DecodeErrorKind, message: string) {
    super(message);
    this.name = 'DecodeError';
    this.kind = kind;
  }
}

export class UnexpectedEndOfBodyError extends Error {
  public constructor() {
    super('unexpected end of request body');
    this.name = 'UnexpectedEndOfBodyError';
  }
}

// This error is raised when a protected endpoint runs without a bearer token in its call context.
export class TokenContextMissingError extends Error {
  public constructor() {
    super('bearer token was not passed through the request context');
    this.name = 'TokenContextMissingError';
  }
}

export class RouteNotFoundError extends Error {
  public readonly method: string;
  public readonly url: string;

  public constructor(method: string, url: string) {
    super(`route not found: ${method} ${url}`);
    this.name = 'RouteNotFoundError';
    this.method = method;
    this.url = url;
  }
}

export interface FrameworkTransportError extends Error {
  code: string;
  statusCode: number;
}

// This helper recognizes Fastify failures (body parsing, malformed URLs) that carry a client status.
export function isFrameworkTransportError(value: unknown): value is FrameworkTransportError {
  return (
    value instanceof Error &&
    'code' in value &&
    typeof value.code === 'string' &&
    value.code.startsWith('FST_ERR_') &&
    'statusCode' in value &&
    typeof value.statusCode === 'number' &&
    value.statusCode >= 400 &&
    value.statusCode <= 499
  );
}
