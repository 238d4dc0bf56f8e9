/**
 * Type tests for the public InterpolatedString API
 */

import { describe, expectTypeOf, test } from 'vitest'

import type { Sink } from '~/core/types'
import { InterpolatedString } from '~/core/interpolated-string'
import { dispatch, type DispatchResult } from '~/dispatch/fallback'
import { StringSink } from '~/render/sink'
import { gstr } from '~/template/tag'

describe('construction', () => {
  test('tagged templates produce InterpolatedString', () => {
    expectTypeOf(gstr`a${1}`).toEqualTypeOf<InterpolatedString>()
    expectTypeOf(gstr.raw`a${1}`).toEqualTypeOf<InterpolatedString>()
  })

  test('fragments and values are read-only', () => {
    expectTypeOf(gstr`a`.strings).toEqualTypeOf<readonly string[]>()
    expectTypeOf(gstr`a`.values).toEqualTypeOf<readonly unknown[]>()
  })
})

describe('render', () => {
  test('render returns the sink type it was given', () => {
    expectTypeOf(gstr`a`.render(new StringSink())).toEqualTypeOf<StringSink>()
    expectTypeOf(gstr`a`.render<Sink>({ write: () => undefined })).toEqualTypeOf<Sink>()
  })
})

describe('concat', () => {
  test('accepts strings and instances only', () => {
    expectTypeOf(gstr`a`.concat).parameter(0).toEqualTypeOf<
      InterpolatedString | string
    >()
    expectTypeOf(gstr`a`.concat('b')).toEqualTypeOf<InterpolatedString>()
  })
})

describe('dispatch', () => {
  test('returns a discriminated result', () => {
    expectTypeOf(dispatch(gstr`a`, 'length')).toEqualTypeOf<DispatchResult>()
    expectTypeOf<Extract<DispatchResult, { kind: 'handled' }>['name']>()
      .toEqualTypeOf<
        | 'toString'
        | 'length'
        | 'charAt'
        | 'subSequence'
        | 'compareTo'
        | 'equals'
        | 'hashCode'
        | 'concat'
        | 'plus'
        | 'toPattern'
        | 'negate'
        | 'getBytes'
        | 'getValue'
        | 'getValues'
        | 'getStrings'
        | 'valueCount'
      >()
  })
})
