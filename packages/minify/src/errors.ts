import type { MinifyErrorKind } from './types.js';

export class MinifyError extends Error {
  readonly kind: MinifyErrorKind;
  readonly offset?: number;

  constructor(kind: MinifyErrorKind, message: string, options?: { offset?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'MinifyError';
    this.kind = kind;
    this.offset = options?.offset;
  }
}

export function malformed(message: string, offset: number): MinifyError {
  return new MinifyError('MalformedInput', `${message} at offset ${offset}`, { offset });
}
