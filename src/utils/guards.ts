/**
 * Runtime Guards and Validation
 *
 * Centralized validation guards for construction and render-time checks.
 * Guards are always called at call sites and self-gate internally.
 * Dev-only guards are tree-shaken in production builds.
 */

import { InterpolationError } from '../core/errors'

/**
 * Development mode flag.
 *
 * - Bundlers (Vite, Next.js, Webpack, esbuild) replace at build time
 * - typeof check prevents ReferenceError in edge runtimes
 * - Evaluates to `false` in production → dead-code eliminated
 */
export const __DEV__ =
  typeof process !== 'undefined' &&
  typeof process.env !== 'undefined' &&
  process.env.NODE_ENV !== 'production'

/**
 * Centralized guard object: always call, it internally decides whether to act.
 *
 * - `shape`: Always runs (a bad fragment/value count breaks interleaving)
 * - `fragments`: Dev-only (typed callers cannot pass non-strings)
 * - `deferredArity`: Always runs, at render time only
 * - `index`: Always runs
 */
export const guard = {
  /**
   * Rejects fragment/value arrays that cannot interleave.
   *
   * Valid shapes are `strings.length === values.length` (ends in a value)
   * and `strings.length === values.length + 1` (ends in a literal).
   *
   * @throws InterpolationError `INVALID_SHAPE`
   *
   * @example
   * ```typescript
   * guard.shape(['a', 'b'], [1]) // OK
   * guard.shape(['a'], [1]) // OK
   * guard.shape([], [1]) // throws
   * ```
   */
  shape: (
    strings: readonly unknown[],
    values: readonly unknown[],
  ): void => {
    const diff = strings.length - values.length
    if (diff !== 0 && diff !== 1) {
      throw new InterpolationError(
        'INVALID_SHAPE',
        `Interpolated string needs ${String(values.length)} or ${String(values.length + 1)} fragments for ${String(values.length)} values, got ${String(strings.length)}.`,
        { context: { strings: strings.length, values: values.length } },
      )
    }
  },

  /**
   * Rejects non-string fragments in development mode.
   *
   * @throws InterpolationError `INVALID_SHAPE`
   */
  fragments: (strings: readonly unknown[]): void => {
    if (!__DEV__) return
    for (const [index, fragment] of strings.entries()) {
      if (typeof fragment !== 'string') {
        throw new InterpolationError(
          'INVALID_SHAPE',
          `Fragment ${String(index)} must be a string, got ${typeof fragment}.`,
          { context: { index } },
        )
      }
    }
  },

  /**
   * Rejects deferred callables that are neither thunks nor sink writers.
   *
   * Never called at construction: an instance that is never rendered may
   * legally hold such a value.
   *
   * @throws InterpolationError `INVALID_CLOSURE_ARITY`
   */
  deferredArity: (fn: (...args: never[]) => unknown, slot: number): void => {
    if (fn.length > 1) {
      throw new InterpolationError(
        'INVALID_CLOSURE_ARITY',
        `Trying to evaluate an interpolated string containing a deferred callable taking ${String(fn.length)} parameters`,
        { context: { slot, parameters: fn.length } },
      )
    }
  },

  /**
   * Rejects indexes outside `[0, length)`.
   *
   * @throws RangeError
   */
  index: (index: number, length: number, what: string): void => {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new RangeError(
        `${what} index out of range: ${String(index)} (length ${String(length)})`,
      )
    }
  },
} as const
