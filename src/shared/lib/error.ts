export type ErrorCode = 'config_invalid' | 'fatal_io' | 'list_failed' | 'batch_failed'

export type NormalizedError = Error & {
  code?: string
  details?: unknown
  raw?: unknown
}

export type BatchFailure = {
  path: string
  message: string
}

type ErrorLike = {
  code?: unknown
  message?: unknown
  details?: unknown
}

const asRecord = (value: unknown): Record<string, unknown> | null => {
  if (value && typeof value === 'object') return value as Record<string, unknown>
  return null
}

const asErrorLike = (value: unknown): ErrorLike | null => {
  const record = asRecord(value)
  if (!record) return null
  return {
    code: record.code,
    message: record.message,
    details: record.details,
  }
}

export const normalizeError = (value: unknown): NormalizedError => {
  if (value instanceof Error) {
    return value as NormalizedError
  }

  const like = asErrorLike(value)
  const message =
    typeof like?.message === 'string'
      ? like.message
      : typeof value === 'string'
        ? value
        : (() => {
            try {
              return JSON.stringify(value)
            } catch {
              return String(value)
            }
          })()

  const error = new Error(message || 'Unknown error') as NormalizedError
  if (typeof like?.code === 'string') error.code = like.code
  if (like && 'details' in like) error.details = like.details
  error.raw = value
  return error
}

export const createAppError = (
  code: ErrorCode,
  message: string,
  opts: { details?: unknown; cause?: unknown } = {},
): NormalizedError => {
  const error = new Error(message, { cause: opts.cause }) as NormalizedError
  error.code = code
  if (opts.details !== undefined) error.details = opts.details
  if (opts.cause !== undefined) error.raw = opts.cause
  return error
}

export const createBatchError = (verb: string, total: number, failures: BatchFailure[]) =>
  createAppError('batch_failed', `Failed to ${verb} ${failures.length} of ${total} entries`, {
    details: failures,
  })

export const getErrorMessage = (value: unknown): string => normalizeError(value).message
export const getErrorCode = (value: unknown): string | undefined => normalizeError(value).code
