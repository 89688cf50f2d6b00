// This module converts between HTTP bodies and the typed records of each operation.

import type { FastifyReply } from 'fastify';
import { z } from 'zod';
import { RemoteError } from '../errors/model.js';
import { DecodeError, UnexpectedEndOfBodyError } from '../errors/transport.js';
import {
  concatRequestSchema,
  concatResponseSchema,
  sumRequestSchema,
  sumResponseSchema,
  type ConcatRequest,
  type ConcatResponse,
  type SumRequest,
  type SumResponse
} from '../types/add.js';

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

const STATUS_OK = 200;
const STATUS_NO_CONTENT = 204;

const errorResSchema = z.object({
  error: z.object({
    code: z.number().int(),
    message: z.string(),
    errors: z.array(
      z.object({
        field: z.string().optional(),
        message: z.string()
      })
    )
  })
});

// Optional response capabilities honored by the server encoder.
export interface Headerer {
  headers(): Record<string, readonly string[]>;
}

export interface StatusCoder {
  statusCode(): number;
}

export interface Responser {
  response(): unknown;
}

function hasMethod<K extends string>(value: unknown, name: K): value is Record<K, (...args: never[]) => unknown> {
  return typeof value === 'object' && value !== null && name in value && typeof Reflect.get(value, name) === 'function';
}

function isHeaderer(value: unknown): value is Headerer {
  return hasMethod(value, 'headers');
}

function isStatusCoder(value: unknown): value is StatusCoder {
  return hasMethod(value, 'statusCode');
}

function isResponser(value: unknown): value is Responser {
  return hasMethod(value, 'response');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// This helper parses JSON text and validates its shape, reporting syntax and shape failures separately.
export function decodeJsonText<T>(text: string, schema: z.ZodType<T>, label: string): T {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new DecodeError('syntax', `invalid JSON ${label}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DecodeError('type', `invalid ${label}: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}

// This helper accepts the raw body handed over by the catch-all content-type parser.
function decodeRequestBody<T>(body: unknown, schema: z.ZodType<T>): T {
  if (body === undefined || body === null) {
    throw new UnexpectedEndOfBodyError();
  }

  const text = Buffer.isBuffer(body) ? body.toString('utf8') : typeof body === 'string' ? body : JSON.stringify(body);
  if (text.trim() === '') {
    throw new UnexpectedEndOfBodyError();
  }

  return decodeJsonText(text, schema, 'body');
}

export function decodeSumRequest(body: unknown): SumRequest {
  return decodeRequestBody(body, sumRequestSchema);
}

export function decodeConcatRequest(body: unknown): ConcatRequest {
  return decodeRequestBody(body, concatRequestSchema);
}

/**
 * Writes a successful response. Headers and status come from the optional
 * capabilities of the value; a 204 writes no body. The payload is serialized
 * before anything touches the reply, so a serialization failure leaves the
 * reply untouched for the error handler.
 */
export function encodeJsonResponse(reply: FastifyReply, response: unknown): FastifyReply {
  const statusCode = isStatusCoder(response) ? response.statusCode() : STATUS_OK;
  const headers = isHeaderer(response) ? response.headers() : {};
  const payload =
    statusCode === STATUS_NO_CONTENT
      ? undefined
      : (JSON.stringify(isResponser(response) ? response.response() : response) ?? 'null');

  reply.header('content-type', JSON_CONTENT_TYPE);
  for (const [name, values] of Object.entries(headers)) {
    reply.header(name, [...values]);
  }

  reply.code(statusCode);
  return payload === undefined ? reply.send() : reply.send(payload);
}

export function encodeJsonRequest(request: unknown): string {
  return JSON.stringify(request);
}

/**
 * Rebuilds an error from a non-success response. A body that is not JSON is a
 * protocol violation reported as a plain error naming the content type.
 */
export async function decodeErrorResponse(response: Response): Promise<Error> {
  const contentType = response.headers.get('content-type') ?? '';
  if (!contentType.includes('application/json')) {
    // The body is not read, so release the connection.
    await response.body?.cancel();
    return new Error(`expected JSON formatted error, got Content-Type ${contentType}`);
  }

  const text = await response.text();
  try {
    const envelope = decodeJsonText(text, errorResSchema, 'error response');
    return new RemoteError(envelope.error.code, envelope.error.message, envelope.error.errors);
  } catch (error) {
    if (error instanceof DecodeError) {
      return error;
    }
    throw error;
  }
}

async function decodeJsonResponse<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
  if (!response.ok) {
    throw await decodeErrorResponse(response);
  }

  return decodeJsonText(await response.text(), schema, 'response');
}

export function decodeSumResponse(response: Response): Promise<SumResponse> {
  return decodeJsonResponse(response, sumResponseSchema);
}

export function decodeConcatResponse(response: Response): Promise<ConcatResponse> {
  return decodeJsonResponse(response, concatResponseSchema);
}
