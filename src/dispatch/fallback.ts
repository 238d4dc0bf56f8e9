/**
 * Two-tier capability dispatch
 *
 * Tier one: a fixed set of operations an InterpolatedString handles itself.
 * Tier two: everything else is answered by the rendered string.
 *
 * dispatch() only reports `unsupported`; forwarding is the caller's choice,
 * made by invokeWithFallback().
 *
 * @example
 * ```typescript
 * const gs = gstr`Hello ${name}`
 *
 * dispatch(gs, 'toUpperCase', []) // { kind: 'unsupported', name: 'toUpperCase', args: [] }
 * invokeWithFallback(gs, 'toUpperCase') // "HELLO ALICE"
 * invokeWithFallback(gs, 'concat', ['!']) // InterpolatedString (native, not String#concat)
 * ```
 */

import { z } from 'zod'

import { InterpolationError } from '../core/errors'
import { InterpolatedString } from '../core/interpolated-string'
import { is } from '../utils/is'

export const NATIVE_OPERATIONS = [
  'toString',
  'length',
  'charAt',
  'subSequence',
  'compareTo',
  'equals',
  'hashCode',
  'concat',
  'plus',
  'toPattern',
  'negate',
  'getBytes',
  'getValue',
  'getValues',
  'getStrings',
  'valueCount',
] as const

export type NativeOperation = (typeof NATIVE_OPERATIONS)[number]

export type DispatchResult =
  | { kind: 'handled'; name: NativeOperation; value: unknown }
  | { kind: 'unsupported'; name: string; args: readonly unknown[] }

type Handler = (target: InterpolatedString, args: readonly unknown[]) => unknown

const NATIVE_SET: ReadonlySet<string> = new Set(NATIVE_OPERATIONS)

export const isNativeOperation = (name: string): name is NativeOperation =>
  NATIVE_SET.has(name)

// ---------------------------------------------------------------------------
// Argument schemas
// ---------------------------------------------------------------------------

const operandSchema = z.union([
  z.string(),
  z.instanceof(InterpolatedString),
])

const noArgs = z.tuple([])
const indexArgs = z.tuple([z.number().int()])
const rangeArgs = z.tuple([z.number().int(), z.number().int()])
const operandArgs = z.tuple([operandSchema])
const anyArgs = z.tuple([z.unknown()])
const optionalStringArgs = z.array(z.string()).max(1)

const parseArgs = <T extends z.ZodTypeAny>(
  name: NativeOperation,
  schema: T,
  args: readonly unknown[],
): z.output<T> => {
  const result = schema.safeParse(args)
  if (!result.success) {
    throw new InterpolationError(
      'INVALID_ARGUMENTS',
      `Invalid arguments for ${name}: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
      { cause: result.error, context: { name, count: args.length } },
    )
  }
  return result.data
}

// ---------------------------------------------------------------------------
// Native tier
// ---------------------------------------------------------------------------

const HANDLERS: { [K in NativeOperation]: Handler } = {
  toString: (target, args) => {
    parseArgs('toString', noArgs, args)
    return target.toString()
  },
  length: (target, args) => {
    parseArgs('length', noArgs, args)
    return target.length
  },
  charAt: (target, args) => {
    const [index] = parseArgs('charAt', indexArgs, args)
    return target.charAt(index)
  },
  subSequence: (target, args) => {
    const [start, end] = parseArgs('subSequence', rangeArgs, args)
    return target.subSequence(start, end)
  },
  compareTo: (target, args) => {
    const [other] = parseArgs('compareTo', operandArgs, args)
    return target.compareTo(other)
  },
  equals: (target, args) => {
    const [other] = parseArgs('equals', anyArgs, args)
    return target.equals(other)
  },
  hashCode: (target, args) => {
    parseArgs('hashCode', noArgs, args)
    return target.hashCode()
  },
  concat: (target, args) => {
    const [other] = parseArgs('concat', operandArgs, args)
    return target.concat(other)
  },
  plus: (target, args) => {
    const [other] = parseArgs('plus', operandArgs, args)
    return target.plus(other)
  },
  toPattern: (target, args) => {
    const [flags] = parseArgs('toPattern', optionalStringArgs, args)
    return target.toPattern(flags)
  },
  negate: (target, args) => {
    const [flags] = parseArgs('negate', optionalStringArgs, args)
    return target.negate(flags)
  },
  getBytes: (target, args) => {
    const [encoding] = parseArgs('getBytes', optionalStringArgs, args)
    return encoding === undefined ? target.getBytes() : target.getBytes(encoding)
  },
  getValue: (target, args) => {
    const [index] = parseArgs('getValue', indexArgs, args)
    return target.getValue(index)
  },
  getValues: (target, args) => {
    parseArgs('getValues', noArgs, args)
    return target.getValues()
  },
  getStrings: (target, args) => {
    parseArgs('getStrings', noArgs, args)
    return target.getStrings()
  },
  valueCount: (target, args) => {
    parseArgs('valueCount', noArgs, args)
    return target.valueCount
  },
}

/**
 * Run `name` on `target` if it is a native operation.
 * Never renders for unsupported names.
 *
 * @throws InterpolationError `INVALID_ARGUMENTS` for a native operation
 *   called with the wrong arguments
 */
export const dispatch = (
  target: InterpolatedString,
  name: string,
  args: readonly unknown[] = [],
): DispatchResult => {
  if (!isNativeOperation(name)) {
    return { kind: 'unsupported', name, args }
  }
  return { kind: 'handled', name, value: HANDLERS[name](target, args) }
}

// ---------------------------------------------------------------------------
// Text tier
// ---------------------------------------------------------------------------

/**
 * Look `name` up on `text` the way a property access would: methods are
 * called with `text` as receiver, other properties are returned.
 *
 * @throws InterpolationError `MISSING_CAPABILITY`
 */
export const forwardToText = (
  text: string,
  name: string,
  args: readonly unknown[] = [],
): unknown => {
  const boxed: object = Object(text)
  const member: unknown = Reflect.get(boxed, name)

  if (is.function(member)) {
    return Reflect.apply(member, text, args)
  }
  if (member !== undefined) {
    return member
  }
  throw new InterpolationError(
    'MISSING_CAPABILITY',
    `No capability '${name}' on interpolated string or its rendered text`,
    { context: { name } },
  )
}

/**
 * Caller-side adapter: native operations run on `target`, anything else is
 * forwarded to its rendered text.
 */
export const invokeWithFallback = (
  target: InterpolatedString,
  name: string,
  args: readonly unknown[] = [],
): unknown => {
  const result = dispatch(target, name, args)
  if (result.kind === 'handled') return result.value
  return forwardToText(target.toString(), result.name, result.args)
}
