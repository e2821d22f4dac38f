/**
 * Error taxonomy for the sync job.
 *
 * Everything below the runner throws one of these; runSync() is the only
 * place that catches and classifies them.
 */

export type ApiErrorKind = 'timeout' | 'connection' | 'http' | 'protocol'

/** Transport or HTTP failure from the seller API or the supplier download */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly kind: ApiErrorKind,
    public readonly url: string,
    public readonly statusCode?: number
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export class MalformedQuantityError extends Error {
  constructor(
    public readonly raw: string,
    public readonly code?: string
  ) {
    super(`Unparseable quantity "${raw}"${code ? ` for ${code}` : ''}`)
    this.name = 'MalformedQuantityError'
  }
}

export class MalformedPriceError extends Error {
  constructor(
    public readonly raw: string,
    public readonly code?: string
  ) {
    super(`Unparseable price "${raw}"${code ? ` for ${code}` : ''}`)
    this.name = 'MalformedPriceError'
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export type FailureKind = 'timeout' | 'connection' | 'other'

export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof ApiError) {
    if (err.kind === 'timeout') return 'timeout'
    if (err.kind === 'connection') return 'connection'
  }
  return 'other'
}
