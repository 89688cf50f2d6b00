// This file defines the wire contracts of the sum and concat operations and the service they front.

import { z } from 'zod';
import type { CallContext } from '../endpoints/endpoint.js';

export const sumRequestSchema = z.object({
  // Operands beyond the safe range have already lost precision in JSON.parse.
  a: z.number().int().safe(),
  b: z.number().int().safe()
});

export const sumResponseSchema = z.object({
  res: z.number()
});

export const concatRequestSchema = z.object({
  a: z.string(),
  b: z.string()
});

export const concatResponseSchema = z.object({
  res: z.string()
});

export type SumRequest = z.infer<typeof sumRequestSchema>;
export type SumResponse = z.infer<typeof sumResponseSchema>;
export type ConcatRequest = z.infer<typeof concatRequestSchema>;
export type ConcatResponse = z.infer<typeof concatResponseSchema>;

export type OperationName = 'Sum' | 'Concat';

export interface AddService {
  sum(context: CallContext, a: number, b: number): Promise<number>;
  concat(context: CallContext, a: string, b: string): Promise<string>;
}
