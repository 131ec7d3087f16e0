export type StoreOperation = 'get' | 'set';

export class StoreUnavailableError extends Error {
  public readonly code = 'store_unavailable';
  public readonly operation: StoreOperation;
  public readonly key: string;

  public constructor({operation, key, cause}: {operation: StoreOperation; key: string; cause?: unknown}) {
    super(`Shared store ${operation} failed for key ${key}`, {cause});
    this.name = 'StoreUnavailableError';
    this.operation = operation;
    this.key = key;
  }
}

export const isStoreUnavailableError = (value: unknown): value is StoreUnavailableError =>
  value instanceof StoreUnavailableError;
