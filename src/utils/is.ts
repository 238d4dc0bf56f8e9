/**
 * Type checking utilities, similar to lodash type guards
 *
 * Provides type-safe predicates for the value shapes the renderer
 * distinguishes between.
 */
import type {
  DeferredValue,
  DeferredWriter,
  Sink,
  Writable,
} from '../core/types'

export type Primitive =
  | string
  | number
  | boolean
  | symbol
  | bigint
  | null
  | undefined

/** Check if value is null or undefined */
const isNil = (value: unknown): value is null | undefined => value == null

/** Check if value is undefined */
const isUndefined = (value: unknown): value is undefined => value === undefined

/** Check if value is null */
const isNull = (value: unknown): value is null => value === null

/** Check if value is a plain object (not null, array, Date, RegExp, class instances, etc.) */
const isObject = (value: unknown): value is Record<string, unknown> => {
  if (value == null || typeof value !== 'object' || Array.isArray(value))
    return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/** Check if value is an array */
const isArray = (value: unknown): value is readonly unknown[] =>
  Array.isArray(value)

/** Check if value is a string */
const isString = (value: unknown): value is string => typeof value === 'string'

/** Check if value is a function */
const isFunction = (value: unknown): value is (...args: never[]) => unknown =>
  typeof value === 'function'

/**
 * Check if value is a class constructor: `class` syntax, or a native
 * constructor such as `Map` whose prototype carries methods
 */
const isClassConstructor = (value: unknown): boolean => {
  if (typeof value !== 'function') return false
  const source = Function.prototype.toString.call(value)
  if (source.startsWith('class')) return true
  if (!source.includes('[native code]')) return false
  const proto: unknown = value.prototype
  return (
    typeof proto === 'object' &&
    proto !== null &&
    Object.getOwnPropertyNames(proto).length > 1
  )
}

/** Check if value is a Map */
const isMap = (value: unknown): value is ReadonlyMap<unknown, unknown> =>
  value instanceof Map

/** Check if value is a Set */
const isSet = (value: unknown): value is ReadonlySet<unknown> =>
  value instanceof Set

/** Check if value is a primitive (string, number, boolean, symbol, bigint, null, undefined) */
const isPrimitive = (value: unknown): value is Primitive => {
  const type = typeof value
  return (
    type === 'string' ||
    type === 'number' ||
    type === 'boolean' ||
    type === 'symbol' ||
    type === 'bigint' ||
    value == null
  )
}

/** Check if value exposes a writeTo(sink) method */
const isWritable = (value: unknown): value is Writable =>
  typeof value === 'object' &&
  value !== null &&
  'writeTo' in value &&
  typeof value.writeTo === 'function'

/** Check if value can be used as a render sink */
const isSink = (value: unknown): value is Sink =>
  typeof value === 'object' &&
  value !== null &&
  'write' in value &&
  typeof value.write === 'function'

/** Check if value is a deferred callable declaring no parameters */
const isDeferredValue = (value: unknown): value is DeferredValue =>
  typeof value === 'function' && value.length === 0

/** Check if value is a deferred callable declaring exactly one (sink) parameter */
const isDeferredWriter = (value: unknown): value is DeferredWriter =>
  typeof value === 'function' && value.length === 1

/** Check if a plain object or class instance overrides Object.prototype.toString */
const hasCustomToString = (value: object): boolean =>
  value.toString !== Object.prototype.toString

/** Check if value is not null or undefined */
const isNotNil = <T>(value: T | null | undefined): value is T => value != null

/** Check if value is not a string */
const isNotString = <T>(value: T): value is Exclude<T, string> =>
  typeof value !== 'string'

/** Check if value is not a function */
const isNotFunction = <T>(
  value: T,
): value is Exclude<T, (...args: never[]) => unknown> =>
  typeof value !== 'function'

/**
 * Unified namespace for type checking
 *
 * @example
 * ```typescript
 * import { is } from './utils/is'
 *
 * if (is.writable(value)) value.writeTo(sink)
 * if (is.not.nil(value)) { ... }
 * ```
 */
export const is = {
  nil: isNil,
  undefined: isUndefined,
  null: isNull,
  object: isObject,
  array: isArray,
  string: isString,
  function: isFunction,
  classConstructor: isClassConstructor,
  map: isMap,
  set: isSet,
  primitive: isPrimitive,
  writable: isWritable,
  sink: isSink,
  deferredValue: isDeferredValue,
  deferredWriter: isDeferredWriter,
  customToString: hasCustomToString,
  not: {
    nil: isNotNil,
    string: isNotString,
    function: isNotFunction,
  },
}
