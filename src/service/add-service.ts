// This module implements the sum and concat operations behind the gateway.

import type { CallContext } from '../endpoints/endpoint.js';
import { DomainError } from '../errors/model.js';
import type { AddService } from '../types/add.js';

export interface AddServiceOptions {
  concatMaxLength: number;
}

export function createAddService(options: AddServiceOptions): AddService {
  return {
    async sum(context: CallContext, a: number, b: number): Promise<number> {
      context.signal?.throwIfAborted();

      const result = a + b;
      if (!Number.isSafeInteger(result)) {
        throw new DomainError('integer_overflow', 'integer overflow', [
          { field: 'res', message: `sum of ${a} and ${b} exceeds the safe integer range` }
        ]);
      }

      return result;
    },

    async concat(context: CallContext, a: string, b: string): Promise<string> {
      context.signal?.throwIfAborted();

      const result = a + b;
      if (result.length > options.concatMaxLength) {
        throw new DomainError('max_size_exceeded', 'result exceeds maximum size', [
          {
            field: 'res',
            message: `concatenated length ${result.length} exceeds ${options.concatMaxLength}`
          }
        ]);
      }

      return result;
    }
  };
}
