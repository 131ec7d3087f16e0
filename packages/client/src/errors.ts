export class PkiServiceClientError extends Error {
  public readonly code: string;
  public readonly status: number;
  public readonly correlationId: string | undefined;

  public constructor({
    code,
    message,
    status,
    correlationId,
    cause
  }: {
    code: string;
    message: string;
    status: number;
    correlationId?: string;
    cause?: unknown;
  }) {
    super(message, {cause});
    this.name = 'PkiServiceClientError';
    this.code = code;
    this.status = status;
    this.correlationId = correlationId;
  }
}

export const isPkiServiceClientError = (error: unknown): error is PkiServiceClientError =>
  error instanceof PkiServiceClientError;
