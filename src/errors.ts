export interface FieldIssue {
  field: string
  message: string
}

/**
 * Base class for failures that map to a user-visible HTTP response.
 * `code` is the stable machine-readable name rendered as `error`.
 */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class UnauthenticatedError extends ApiError {
  constructor(message: string) {
    super(401, 'Unauthenticated', message)
  }
}

export class ForbiddenError extends ApiError {
  constructor(message: string) {
    super(403, 'Forbidden', message)
  }
}

export class RateLimitedError extends ApiError {
  constructor(readonly limitPerMinute: number) {
    super(429, 'RateLimited', `Rate limit exceeded. Limit: ${limitPerMinute} requests/minute`)
  }
}

export class QuotaExceededError extends ApiError {
  constructor(
    readonly chunksLimit: number,
    pricingUrl: string,
  ) {
    super(
      429,
      'QuotaExceeded',
      `Monthly chunk limit exceeded. Limit: ${chunksLimit.toLocaleString('en-US')} chunks. Upgrade at ${pricingUrl}`,
    )
  }
}

export class ValidationError extends ApiError {
  constructor(readonly details: FieldIssue[]) {
    super(422, 'ValidationError', 'Request validation failed')
  }
}

export class GeneratorUnavailableError extends ApiError {
  constructor() {
    super(500, 'GeneratorUnavailable', 'Generator library not available')
  }
}

export class InternalError extends ApiError {
  constructor(message: string) {
    super(500, 'InternalError', message)
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
