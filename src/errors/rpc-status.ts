// This module models canonical RPC status codes and their fixed HTTP status mapping.

export const RpcCode = {
  Ok: 0,
  Cancelled: 1,
  Unknown: 2,
  InvalidArgument: 3,
  DeadlineExceeded: 4,
  NotFound: 5,
  AlreadyExists: 6,
  PermissionDenied: 7,
  ResourceExhausted: 8,
  FailedPrecondition: 9,
  Aborted: 10,
  OutOfRange: 11,
  Unimplemented: 12,
  Internal: 13,
  Unavailable: 14,
  DataLoss: 15,
  Unauthenticated: 16
} as const;

export type RpcCode = (typeof RpcCode)[keyof typeof RpcCode];

// Ok maps to 500: a status that reached the error path is a failure whatever its code says.
const HTTP_STATUS_BY_RPC_CODE: Readonly<Record<RpcCode, number>> = {
  [RpcCode.Ok]: 500,
  [RpcCode.Cancelled]: 408,
  [RpcCode.Unknown]: 500,
  [RpcCode.InvalidArgument]: 400,
  [RpcCode.DeadlineExceeded]: 504,
  [RpcCode.NotFound]: 404,
  [RpcCode.AlreadyExists]: 409,
  [RpcCode.PermissionDenied]: 403,
  [RpcCode.ResourceExhausted]: 429,
  [RpcCode.FailedPrecondition]: 412,
  [RpcCode.Aborted]: 409,
  [RpcCode.OutOfRange]: 400,
  [RpcCode.Unimplemented]: 501,
  [RpcCode.Internal]: 500,
  [RpcCode.Unavailable]: 503,
  [RpcCode.DataLoss]: 500,
  [RpcCode.Unauthenticated]: 401
};

const RPC_CODE_NAMES: Readonly<Record<RpcCode, string>> = {
  [RpcCode.Ok]: 'Ok',
  [RpcCode.Cancelled]: 'Cancelled',
  [RpcCode.Unknown]: 'Unknown',
  [RpcCode.InvalidArgument]: 'InvalidArgument',
  [RpcCode.DeadlineExceeded]: 'DeadlineExceeded',
  [RpcCode.NotFound]: 'NotFound',
  [RpcCode.AlreadyExists]: 'AlreadyExists',
  [RpcCode.PermissionDenied]: 'PermissionDenied',
  [RpcCode.ResourceExhausted]: 'ResourceExhausted',
  [RpcCode.FailedPrecondition]: 'FailedPrecondition',
  [RpcCode.Aborted]: 'Aborted',
  [RpcCode.OutOfRange]: 'OutOfRange',
  [RpcCode.Unimplemented]: 'Unimplemented',
  [RpcCode.Internal]: 'Internal',
  [RpcCode.Unavailable]: 'Unavailable',
  [RpcCode.DataLoss]: 'DataLoss',
  [RpcCode.Unauthenticated]: 'Unauthenticated'
};

const DEFAULT_HTTP_STATUS = 500;

export function isRpcCode(value: number): value is RpcCode {
  return Number.isInteger(value) && value >= RpcCode.Ok && value <= RpcCode.Unauthenticated;
}

// This helper resolves the HTTP status for any status code, including codes outside the canonical set.
export function httpStatusFromRpcCode(code: number): number {
  return isRpcCode(code) ? HTTP_STATUS_BY_RPC_CODE[code] : DEFAULT_HTTP_STATUS;
}

export function rpcCodeName(code: number): string {
  return isRpcCode(code) ? RPC_CODE_NAMES[code] : `Code(${code})`;
}

// This class represents a failed RPC-style call carrying a status code and a detail message.
export class RpcStatusError extends Error {
  public readonly code: number;
  public readonly details: string;

  public constructor(code: number, details: string) {
    super(`rpc error: code = ${rpcCodeName(code)} desc = ${details}`);
    this.name = 'RpcStatusError';
    this.code = code;
    this.details = details;
  }
}

export interface RpcStatusLike {
  code: number;
  details: string;
}

/**
 * Recognizes both {@link RpcStatusError} and errors thrown by RPC libraries
 * that expose the same numeric `code` and string `details` pair.
 */
export function isRpcStatusError(value: unknown): value is Error & RpcStatusLike {
  if (value instanceof RpcStatusError) {
    return true;
  }

  return (
    value instanceof Error &&
    'code' in value &&
    typeof value.code === 'number' &&
    'details' in value &&
    typeof value.details === 'string'
  );
}
