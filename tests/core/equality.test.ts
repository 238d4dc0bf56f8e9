/**
 * Tests for InterpolatedString text semantics
 *
 * Equality, hashing and ordering are defined on the rendered text, not on
 * fragments and values.
 *
 * Tests:
 * - equals / hashCode
 * - compareTo / compare
 * - length / charAt / subSequence
 * - toPattern
 */

import { describe, expect, it } from 'vitest'

import { hashText, InterpolatedString } from '~/core/interpolated-string'
import { gstr } from '~/template/tag'

describe('equals', () => {
  it('should equal a structurally different instance with the same text', () => {
    const a = InterpolatedString.of(['ab'])
    const b = InterpolatedString.of(['a', ''], ['b'])

    expect(a.equals(b)).toBe(true)
    expect(b.equals(a)).toBe(true)
    expect(a.hashCode()).toBe(b.hashCode())
  })

  it('should not equal an instance rendering different text', () => {
    expect(gstr`a${1}`.equals(gstr`a${2}`)).toBe(false)
  })

  it('should not equal a plain string with the same text', () => {
    expect(InterpolatedString.of(['ab']).equals('ab')).toBe(false)
  })

  it('should compare unequal to itself when a callable changes its output', () => {
    let n = 0
    const gs = gstr`${() => ++n}`
    expect(gs.equals(gs)).toBe(false)
  })
})

describe('hashCode', () => {
  it('should offset the text hash by 37', () => {
    // 'a' = 97, 'b' = 98 → 97 * 31 + 98 = 3105
    expect(hashText('ab')).toBe(3105)
    expect(InterpolatedString.of(['a', ''], ['b']).hashCode()).toBe(3142)
  })

  it('should hash the empty text to 37', () => {
    expect(InterpolatedString.EMPTY.hashCode()).toBe(37)
  })

  it('should stay within signed 32-bit range', () => {
    const hash = InterpolatedString.of(['x'.repeat(100)]).hashCode()
    expect(Number.isInteger(hash)).toBe(true)
    expect(hash).toBe(hash | 0)
  })
})

describe('ordering', () => {
  it('should order by rendered text', () => {
    const apple = gstr`a${'pple'}`
    const banana = InterpolatedString.of(['banana'])

    expect(apple.compareTo(banana)).toBe(-1)
    expect(banana.compareTo(apple)).toBe(1)
    expect(apple.compareTo(InterpolatedString.of(['apple']))).toBe(0)
  })

  it('should compare against plain strings', () => {
    expect(gstr`b`.compareTo('a')).toBe(1)
    expect(gstr`b`.compareTo('b')).toBe(0)
  })

  it('should compare by code unit, not locale', () => {
    expect(gstr`Z`.compareTo('a')).toBe(-1)
  })

  it('should sort with the static comparator', () => {
    const items = [gstr`${'c'}`, 'a', gstr`b`]
    const sorted = [...items].sort(InterpolatedString.compare)
    expect(sorted.map(String)).toEqual(['a', 'b', 'c'])
  })
})

describe('text access', () => {
  const gs = gstr`a${12}b`

  it('should report the rendered length', () => {
    expect(gs.length).toBe(4)
  })

  it('should return characters of the rendered text', () => {
    expect(gs.charAt(0)).toBe('a')
    expect(gs.charAt(2)).toBe('2')
    expect(gs.charAt(3)).toBe('b')
  })

  it('should reject characters outside the rendered text', () => {
    expect(() => gs.charAt(4)).toThrow(
      'Character index out of range: 4 (length 4)',
    )
  })

  it('should slice the rendered text', () => {
    expect(gs.subSequence(1, 3)).toBe('12')
    expect(gs.subSequence(0, 0)).toBe('')
    expect(gs.subSequence(0, 4)).toBe('a12b')
  })

  it('should reject invalid ranges', () => {
    expect(() => gs.subSequence(3, 1)).toThrow(RangeError)
    expect(() => gs.subSequence(0, 5)).toThrow(
      'Subsequence range out of bounds: [0, 5) (length 4)',
    )
  })

  it('should render again for every access', () => {
    let n = 0
    const growing = gstr`${() => 'x'.repeat(++n)}`
    expect(growing.length).toBe(1)
    expect(growing.length).toBe(2)
  })
})

describe('toPattern', () => {
  it('should compile the rendered text', () => {
    const pattern = gstr`^${'ab'}+$`.toPattern()
    expect(pattern.source).toBe('^ab+$')
    expect(pattern.test('abbb')).toBe(true)
  })

  it('should pass flags through', () => {
    expect(gstr`x`.toPattern('gi').flags).toBe('gi')
    expect(gstr`x`.negate('i').test('X')).toBe(true)
  })

  it('should propagate the regex engine error', () => {
    expect(() => gstr`(${'unclosed'}`.toPattern()).toThrow(SyntaxError)
  })
})
