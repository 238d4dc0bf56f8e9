/**
 * Tagged template factory
 *
 * ```typescript
 * const gs = gstr`a${1}b`
 * gs.strings // ["a", "b"]
 * gs.values  // [1]
 * ```
 *
 * A template literal always has one more fragment than values, so an
 * instance built here always ends in a literal (possibly "").
 *
 * Deferred slots are chosen by declared parameter count, which default and
 * rest parameters do not contribute to: `${(out = sink) => …}` is a
 * zero-parameter callable.
 */

import { InterpolatedString } from '../core/interpolated-string'

const cooked = (
  strings: TemplateStringsArray,
  ...values: unknown[]
): InterpolatedString => new InterpolatedString(values, strings)

/** Same as gstr but keeps escape sequences as written (`\n` stays two characters) */
const raw = (
  strings: TemplateStringsArray,
  ...values: unknown[]
): InterpolatedString => new InterpolatedString(values, strings.raw)

export const gstr = Object.assign(cooked, { raw })
