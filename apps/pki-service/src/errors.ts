export type ErrorStatus = 400 | 404 | 405 | 415 | 500 | 503

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus
  public readonly headers: Record<string, string>

  public constructor({
    code,
    message,
    status,
    headers
  }: {
    code: string
    message: string
    status: ErrorStatus
    headers?: Record<string, string>
  }) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
    this.headers = headers ?? {}
  }
}

export const badRequest = (code: string, message: string) =>
  new AppError({code, message, status: 400})

export const notFound = (code: string, message: string) =>
  new AppError({code, message, status: 404})

export const methodNotAllowed = (code: string, message: string, allowedMethods: string[]) =>
  new AppError({code, message, status: 405, headers: {allow: allowedMethods.join(', ')}})

export const unsupportedMediaType = (code: string, message: string) =>
  new AppError({code, message, status: 415})

export const internal = (code: string, message: string) =>
  new AppError({code, message, status: 500})

export const serviceUnavailable = (code: string, message: string) =>
  new AppError({code, message, status: 503})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError

// Raised for shared-store bytes this service wrote but can no longer decode.
export class CorruptStoreEntryError extends Error {
  public readonly code = 'store_entry_corrupt'
  public readonly key: string

  public constructor({key, cause}: {key: string; cause?: unknown}) {
    super(`Shared store entry ${key} cannot be decoded`, {cause})
    this.name = 'CorruptStoreEntryError'
    this.key = key
  }
}

export const isCorruptStoreEntryError = (value: unknown): value is CorruptStoreEntryError =>
  value instanceof CorruptStoreEntryError
