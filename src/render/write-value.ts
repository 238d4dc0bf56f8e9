/**
 * Value-to-text coercion
 *
 * Writes the textual form of an arbitrary slot value to a sink.
 * Collections are formatted as bracketed lists (`[a, b]`) and maps
 * (`[k:v]`), writables stream themselves, everything else goes through
 * `String()`.
 */

import { getConfig } from '../core/config'
import type { InterpolationConfig, Sink } from '../core/types'
import { is } from '../utils/is'
import { StringSink } from './sink'

export type CoercionOptions = Pick<
  InterpolationConfig,
  'nullText' | 'undefinedText'
>

const SELF_COLLECTION = '(this Collection)'
const SELF_MAP = '(this Map)'

const writeEntries = (
  sink: Sink,
  entries: Iterable<readonly [unknown, unknown]>,
  options: CoercionOptions,
  seen: Set<object>,
): void => {
  let first = true
  let empty = true
  sink.write('[')
  for (const [key, value] of entries) {
    empty = false
    if (!first) sink.write(', ')
    first = false
    writeNested(sink, key, options, seen, SELF_MAP)
    sink.write(':')
    writeNested(sink, value, options, seen, SELF_MAP)
  }
  if (empty) sink.write(':')
  sink.write(']')
}

const writeItems = (
  sink: Sink,
  items: Iterable<unknown>,
  options: CoercionOptions,
  seen: Set<object>,
): void => {
  let first = true
  sink.write('[')
  for (const item of items) {
    if (!first) sink.write(', ')
    first = false
    writeNested(sink, item, options, seen, SELF_COLLECTION)
  }
  sink.write(']')
}

const writeNested = (
  sink: Sink,
  value: unknown,
  options: CoercionOptions,
  seen: Set<object>,
  selfText: string,
): void => {
  if (typeof value === 'object' && value !== null && seen.has(value)) {
    sink.write(selfText)
    return
  }
  write(sink, value, options, seen)
}

const write = (
  sink: Sink,
  value: unknown,
  options: CoercionOptions,
  seen: Set<object>,
): void => {
  if (is.null(value)) {
    sink.write(options.nullText)
    return
  }
  if (is.undefined(value)) {
    sink.write(options.undefinedText)
    return
  }
  if (is.string(value)) {
    sink.write(value)
    return
  }
  // numbers, booleans, bigints, symbols, functions nested in collections
  if (typeof value !== 'object' || value === null) {
    sink.write(String(value))
    return
  }
  if (is.writable(value)) {
    value.writeTo(sink)
    return
  }

  seen.add(value)
  try {
    if (is.array(value) || is.set(value)) {
      writeItems(sink, value, options, seen)
    } else if (is.map(value)) {
      writeEntries(sink, value, options, seen)
    } else if (is.object(value) && !is.customToString(value)) {
      writeEntries(sink, Object.entries(value), options, seen)
    } else {
      sink.write(String(value))
    }
  } finally {
    seen.delete(value)
  }
}

/**
 * Write the textual form of `value` to `sink`.
 *
 * @example
 * ```typescript
 * writeValue(sink, [1, 'a', null]) // writes "[1, a, null]"
 * writeValue(sink, new Map([['k', 1]])) // writes "[k:1]"
 * ```
 */
export const writeValue = (
  sink: Sink,
  value: unknown,
  options: CoercionOptions = getConfig(),
): void => {
  write(sink, value, options, new Set())
}

/** Textual form of `value` as a string */
export const formatValue = (
  value: unknown,
  options: CoercionOptions = getConfig(),
): string => {
  const sink = new StringSink()
  writeValue(sink, value, options)
  return sink.toString()
}
