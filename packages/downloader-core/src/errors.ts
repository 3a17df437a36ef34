export type DownloaderErrorKind =
  | 'InvalidInput'
  | 'ToolUnavailable'
  | 'ProcessSpawnFailure'
  | 'RuntimeFailure'
  | 'NetworkFailure'
  | 'Cancelled'

export class DownloaderError extends Error {
  readonly kind: DownloaderErrorKind

  constructor(kind: DownloaderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DownloaderError'
    this.kind = kind
  }
}

export const isDownloaderError = (value: unknown): value is DownloaderError =>
  value instanceof DownloaderError

export const toDownloaderError = (
  error: unknown,
  fallbackKind: DownloaderErrorKind
): DownloaderError => {
  if (isDownloaderError(error)) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new DownloaderError(fallbackKind, message, { cause: error })
}
