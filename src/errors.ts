export type StoreOperation = 'insert' | 'fetch';

export class StoreError extends Error {
  readonly operation: StoreOperation;

  constructor(operation: StoreOperation, cause: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'StoreError';
    this.operation = operation;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || 'unknown error';
  if (typeof e === 'string' && e) return e;
  return 'unknown error';
}
