// This module maps any failure value into one HTTP status and one structured error envelope.

import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { DomainError, parseErrorString, toErrorDetails, type ErrorDetails, type ErrorRes } from './model.js';
import { httpStatusFromRpcCode, isRpcStatusError } from './rpc-status.js';
import {
  DecodeError,
  isFrameworkTransportError,
  RouteNotFoundError,
  TokenContextMissingError,
  UnexpectedEndOfBodyError
} from './transport.js';

export const ERROR_CONTENT_TYPE = 'application/json';

const STATUS_BAD_REQUEST = 400;
const STATUS_UNAUTHORIZED = 401;
const STATUS_NOT_FOUND = 404;
const STATUS_INTERNAL_SERVER_ERROR = 500;

/**
 * Operation-specific override for domain errors. Returning a status claims the
 * error; returning undefined passes it to the next rule.
 */
export type DomainStatusRule = (error: DomainError) => number | undefined;

export interface TranslateOptions {
  domainStatusRules?: readonly DomainStatusRule[];
}

export interface ErrorTranslation {
  statusCode: number;
  body: ErrorRes;
}

export type ClassifiedError =
  | { kind: 'rpc'; code: number; details: string }
  | { kind: 'domain'; error: DomainError }
  | { kind: 'transport'; statusCode: number; message: string }
  | { kind: 'unknown'; message: string };

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (error === undefined || error === null) {
    return '';
  }

  return String(error);
}

// This helper returns the status of well-known transport failures and undefined for anything else.
function transportStatusOf(error: unknown): number | undefined {
  if (error instanceof UnexpectedEndOfBodyError) {
    return STATUS_BAD_REQUEST;
  }

  if (error instanceof TokenContextMissingError) {
    return STATUS_UNAUTHORIZED;
  }

  if (error instanceof DecodeError || error instanceof ZodError) {
    return STATUS_BAD_REQUEST;
  }

  if (error instanceof RouteNotFoundError) {
    return STATUS_NOT_FOUND;
  }

  if (isFrameworkTransportError(error)) {
    return error.statusCode;
  }

  return undefined;
}

// This function sorts a failure into exactly one kind; the order of checks is the precedence order.
export function classifyError(error: unknown): ClassifiedError {
  if (isRpcStatusError(error)) {
    return { kind: 'rpc', code: error.code, details: error.details };
  }

  if (error instanceof DomainError) {
    return { kind: 'domain', error };
  }

  const transportStatus = transportStatusOf(error);
  if (transportStatus !== undefined) {
    return { kind: 'transport', statusCode: transportStatus, message: messageOf(error) };
  }

  return { kind: 'unknown', message: messageOf(error) };
}

function resolveDomainStatus(error: DomainError, rules: readonly DomainStatusRule[]): number {
  for (const rule of rules) {
    const status = rule(error);
    if (status !== undefined) {
      return status;
    }
  }

  return STATUS_INTERNAL_SERVER_ERROR;
}

function buildTranslation(statusCode: number, message: string, errors: ErrorDetails): ErrorTranslation {
  return {
    statusCode,
    body: {
      error: {
        code: statusCode,
        message,
        errors
      }
    }
  };
}

// The message of unstructured failures is the first parsed entry, even when more entries exist.
function fromErrorString(statusCode: number, text: string): ErrorTranslation {
  const errors = parseErrorString(text);
  return buildTranslation(statusCode, errors[0].message, errors);
}

export function translateError(error: unknown, options: TranslateOptions = {}): ErrorTranslation {
  const classified = classifyError(error);

  switch (classified.kind) {
    case 'rpc':
      return fromErrorString(httpStatusFromRpcCode(classified.code), classified.details);

    case 'domain': {
      const domainError = classified.error;
      const statusCode = resolveDomainStatus(domainError, options.domainStatusRules ?? []);
      const errors = toErrorDetails(domainError.errors) ?? parseErrorString(domainError.message);
      const message = domainError.message === '' ? errors[0].message : domainError.message;
      return buildTranslation(statusCode, message, errors);
    }

    case 'transport':
      return fromErrorString(classified.statusCode, classified.message);

    case 'unknown':
      return fromErrorString(STATUS_INTERNAL_SERVER_ERROR, classified.message);
  }
}

export function encodeErrorEnvelope(translation: ErrorTranslation): string {
  return JSON.stringify(translation.body);
}

// This helper is the only writer of error responses.
export function writeErrorResponse(reply: FastifyReply, translation: ErrorTranslation): FastifyReply {
  const payload = encodeErrorEnvelope(translation);
  return reply.code(translation.statusCode).type(ERROR_CONTENT_TYPE).send(payload);
}
