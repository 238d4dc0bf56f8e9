/**
 * JSON round trip
 *
 * Slot values that JSON cannot carry are replaced by tagged placeholders
 * on the way out and restored by a walk over the parsed tree on the way in:
 *
 * | value                        | encoded as                                   |
 * | ---------------------------- | -------------------------------------------- |
 * | `undefined`                  | `{ "$type": "undefined" }`                   |
 * | `10n`                        | `{ "$type": "bigint", "value": "10" }`       |
 * | nested InterpolatedString    | `{ "$type": "interpolated", strings, values }` |
 * | plain object with a `$type`  | `{ "$type": "object", "value": { ... } }`    |
 *
 * Anything else travels through JSON's own encoding: callables in the
 * values array become null, dates become ISO strings.
 */

import { z } from 'zod'

import { InterpolationError } from '../core/errors'
import { InterpolatedString } from '../core/interpolated-string'
import { is } from '../utils/is'

const TAG = '$type'

const taggedSchema = z.discriminatedUnion(TAG, [
  z.object({ [TAG]: z.literal('undefined') }),
  z.object({
    [TAG]: z.literal('bigint'),
    value: z.string().regex(/^-?\d+$/),
  }),
  z.object({
    [TAG]: z.literal('interpolated'),
    strings: z.array(z.unknown()),
    values: z.array(z.unknown()),
  }),
  z.object({
    [TAG]: z.literal('object'),
    value: z.record(z.unknown()),
  }),
])

const invalidRecord = (reason: string, cause?: unknown): InterpolationError =>
  new InterpolationError(
    'INVALID_RECORD',
    `Invalid interpolated string record: ${reason}`,
    cause === undefined ? undefined : { cause },
  )

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

const encodeValue = (value: unknown, seen: Set<object>): unknown => {
  if (is.undefined(value)) return { [TAG]: 'undefined' }
  if (typeof value === 'bigint') return { [TAG]: 'bigint', value: String(value) }
  if (typeof value !== 'object' || value === null) return value

  if (seen.has(value)) throw invalidRecord('values contain a cycle')
  seen.add(value)
  try {
    if (value instanceof InterpolatedString) {
      return {
        [TAG]: 'interpolated',
        strings: [...value.strings],
        values: value.values.map((item) => encodeValue(item, seen)),
      }
    }
    if (is.array(value)) return value.map((item) => encodeValue(item, seen))
    if (is.object(value)) {
      const encoded = Object.fromEntries(
        Object.entries(value).map(([key, item]): [string, unknown] => [
          key,
          encodeValue(item, seen),
        ]),
      )
      return TAG in value ? { [TAG]: 'object', value: encoded } : encoded
    }
    return value
  } finally {
    seen.delete(value)
  }
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

const decodeEntries = (
  record: Record<string, unknown>,
): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(record).map(([key, item]): [string, unknown] => [
      key,
      decodeValue(item),
    ]),
  )

const decodeValue = (value: unknown): unknown => {
  if (is.array(value)) return value.map(decodeValue)
  if (!is.object(value)) return value
  if (!(TAG in value)) return decodeEntries(value)

  const parsed = taggedSchema.safeParse(value)
  if (!parsed.success) {
    throw invalidRecord(`malformed ${TAG} placeholder`, parsed.error)
  }
  const tagged = parsed.data
  switch (tagged.$type) {
    case 'undefined':
      return undefined
    case 'bigint':
      return BigInt(tagged.value)
    case 'interpolated':
      return InterpolatedString.fromRecord({
        strings: tagged.strings,
        values: tagged.values.map(decodeValue),
      })
    case 'object':
      return decodeEntries(tagged.value)
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * JSON text that deserialize() turns back into an equal instance.
 *
 * @throws InterpolationError `INVALID_RECORD` for cyclic values or values
 *   JSON.stringify rejects
 */
export const serialize = (gs: InterpolatedString): string => {
  const seen = new Set<object>()
  const record = {
    strings: [...gs.strings],
    values: gs.values.map((value) => encodeValue(value, seen)),
  }
  try {
    return JSON.stringify(record)
  } catch (error) {
    throw invalidRecord(errorMessage(error), error)
  }
}

/**
 * @throws InterpolationError `INVALID_RECORD` for malformed JSON, a
 *   malformed placeholder or a record failing validation
 */
export const deserialize = (json: string): InterpolatedString => {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (error) {
    throw invalidRecord(errorMessage(error), error)
  }
  if (!is.object(parsed)) return InterpolatedString.fromRecord(parsed)
  const { values } = parsed
  return InterpolatedString.fromRecord(
    is.array(values) ? { ...parsed, values: values.map(decodeValue) } : parsed,
  )
}
