/**
 * Library errors
 *
 * Every failure raised by this library (as opposed to one propagated from a
 * sink, a deferred callable or the regex engine) is an InterpolationError
 * carrying a discriminating code.
 */

export type InterpolationErrorCode =
  | 'INVALID_SHAPE'
  | 'INVALID_CLOSURE_ARITY'
  | 'SINK_FAILURE'
  | 'UNSUPPORTED_ENCODING'
  | 'MISSING_CAPABILITY'
  | 'INVALID_ARGUMENTS'
  | 'INVALID_RECORD'
  | 'INVALID_CONFIG'

export class InterpolationError extends Error {
  readonly code: InterpolationErrorCode
  readonly context?: Record<string, unknown>

  constructor(
    code: InterpolationErrorCode,
    message: string,
    options?: { context?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'InterpolationError'
    this.code = code
    this.context = options?.context
  }
}

/** Narrow an unknown error to an InterpolationError, optionally of a given code */
export const isInterpolationError = (
  error: unknown,
  code?: InterpolationErrorCode,
): error is InterpolationError =>
  error instanceof InterpolationError && (code === undefined || error.code === code)
