// Error model shared by every entry point.
//
// Internal helpers throw RewriteError; the exported operations catch it at the
// boundary and hand back a Result so callers never need try/catch for the
// expected failure kinds.

export enum ErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  SYNTAX_ERROR = 'SYNTAX_ERROR',
  ALLOCATION_FAILURE = 'ALLOCATION_FAILURE',
  PATCH_CONFLICT = 'PATCH_CONFLICT',
}

export interface ErrorDetails {
  tokenIndex?: number
  offset?: number
  [key: string]: unknown
}

export class RewriteError extends Error {
  readonly code: ErrorCode
  readonly details: ErrorDetails

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}) {
    super(message)
    this.name = 'RewriteError'
    this.code = code
    this.details = details
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: RewriteError }

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function fail<T>(error: RewriteError): Result<T> {
  return { ok: false, error }
}

export function invalidArgument(message: string, details?: ErrorDetails): RewriteError {
  return new RewriteError(ErrorCode.INVALID_ARGUMENT, message, details)
}

export function syntaxError(message: string, details?: ErrorDetails): RewriteError {
  return new RewriteError(ErrorCode.SYNTAX_ERROR, message, details)
}

export function patchConflict(message: string, details?: ErrorDetails): RewriteError {
  return new RewriteError(ErrorCode.PATCH_CONFLICT, message, details)
}

// V8 reports failed string/array growth as a RangeError with one of these messages.
function isAllocationRangeError(error: unknown): error is RangeError {
  return (
    error instanceof RangeError &&
    (error.message.includes('Invalid string length') ||
      error.message.includes('Invalid array length') ||
      error.message.includes('Array buffer allocation failed'))
  )
}

/**
 * Run `fn` and convert the expected failure kinds into a Result.
 * Anything else is a programming error and propagates.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn())
  } catch (error) {
    if (error instanceof RewriteError) {
      return fail(error)
    }
    if (isAllocationRangeError(error)) {
      return fail(new RewriteError(ErrorCode.ALLOCATION_FAILURE, error.message))
    }
    throw error
  }
}

/** Unwrap a Result inside code that already runs under `attempt`. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error
  }
  return result.value
}

/** Message of any thrown value, for log lines. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
