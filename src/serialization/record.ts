/**
 * Serialized record schema
 *
 * An interpolated string serializes as `{ strings, values }`. Values are
 * carried as-is; encoding them is left to whatever serializes the record
 * (serialize() adds placeholders for what JSON cannot carry).
 */

import { z } from 'zod'

import { InterpolationError } from '../core/errors'
import type { InterpolatedStringRecord } from '../core/types'

export const interpolatedStringRecordSchema = z
  .object({
    strings: z.array(z.string()),
    values: z.array(z.unknown()),
  })
  .superRefine((record, ctx) => {
    const diff = record.strings.length - record.values.length
    if (diff !== 0 && diff !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['strings'],
        message: `expected ${String(record.values.length)} or ${String(record.values.length + 1)} strings for ${String(record.values.length)} values`,
      })
    }
  })

/**
 * Validate an unknown input as a record.
 *
 * @throws InterpolationError `INVALID_RECORD`
 */
export const parseRecord = (input: unknown): InterpolatedStringRecord => {
  const result = interpolatedStringRecordSchema.safeParse(input)
  if (!result.success) {
    throw new InterpolationError(
      'INVALID_RECORD',
      `Invalid interpolated string record: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
      { cause: result.error },
    )
  }
  return result.data
}
