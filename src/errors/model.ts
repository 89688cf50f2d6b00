// This module defines the canonical error shapes shared by the server, the client, and the translator.

export interface ErrorDetail {
  field?: string;
  message: string;
}

// This tuple type keeps the "never empty" envelope invariant visible to the compiler.
export type ErrorDetails = [ErrorDetail, ...ErrorDetail[]];

export interface ErrorResItem {
  code: number;
  message: string;
  errors: ErrorDetails;
}

export interface ErrorRes {
  error: ErrorResItem;
}

const UNKNOWN_ERROR_MESSAGE = 'unknown error';

// This class carries a human message plus ordered structured details raised by the domain layer.
export class DomainError extends Error {
  public readonly code: string;
  public readonly errors: readonly ErrorDetail[];

  public constructor(code: string, message: string, errors: readonly ErrorDetail[] = []) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.errors = errors;
  }
}

// This class is a domain error rebuilt by the client from a remote error envelope.
export class RemoteError extends DomainError {
  public readonly statusCode: number;

  public constructor(statusCode: number, message: string, errors: readonly ErrorDetail[] = []) {
    super('remote_error', message, errors);
    this.name = 'RemoteError';
    this.statusCode = statusCode;
  }
}

/**
 * Generic error-string parser used whenever a failure has no structured detail.
 * Always returns exactly one entry carrying the original text.
 */
export function parseErrorString(text: string): ErrorDetails {
  return [{ message: text === '' ? UNKNOWN_ERROR_MESSAGE : text }];
}

// This helper copies details into the wire shape and returns undefined for an empty list.
export function toErrorDetails(details: readonly ErrorDetail[]): ErrorDetails | undefined {
  const [first, ...rest] = details.map(toWireDetail);
  if (first === undefined) {
    return undefined;
  }

  return [first, ...rest];
}

function toWireDetail(detail: ErrorDetail): ErrorDetail {
  return detail.field === undefined ? { message: detail.message } : { field: detail.field, message: detail.message };
}
