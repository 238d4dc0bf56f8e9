/**
 * Tests for process-wide configuration
 *
 * Tests:
 * - Defaults, merging, frozen snapshots
 * - zod validation of input
 * - resetConfig
 */

import { describe, expect, it } from 'vitest'

import {
  configure,
  DEFAULT_CONFIG,
  getConfig,
  resetConfig,
} from '~/core/config'
import { InterpolationError } from '~/core/errors'

describe('getConfig', () => {
  it('should start with defaults', () => {
    expect(getConfig()).toEqual({
      nullText: 'null',
      undefinedText: 'undefined',
      defaultEncoding: 'utf-8',
      debug: {},
    })
  })

  it('should return a frozen snapshot', () => {
    expect(Object.isFrozen(getConfig())).toBe(true)
    expect(Object.isFrozen(getConfig().debug)).toBe(true)
  })
})

describe('configure', () => {
  it('should merge options into the current configuration', () => {
    configure({ nullText: '' })
    configure({ undefinedText: '-' })

    expect(getConfig().nullText).toBe('')
    expect(getConfig().undefinedText).toBe('-')
    expect(getConfig().defaultEncoding).toBe('utf-8')
  })

  it('should merge debug flags', () => {
    configure({ debug: { log: true } })
    configure({ debug: { timingThreshold: 10 } })

    expect(getConfig().debug).toEqual({ log: true, timingThreshold: 10 })
  })

  it('should return the new configuration', () => {
    expect(configure({ defaultEncoding: 'latin1' }).defaultEncoding).toBe(
      'latin1',
    )
  })

  it('should reject unknown keys', () => {
    expect(() => configure(JSON.parse('{"nulltext":"x"}'))).toThrow(
      InterpolationError,
    )
  })

  it('should reject invalid values with the failing path', () => {
    expect(() =>
      configure({ debug: { timingThreshold: -1 } }),
    ).toThrow(/^Invalid configuration: debug\.timingThreshold: /)
    expect(() => configure({ defaultEncoding: '' })).toThrow(
      expect.objectContaining({ code: 'INVALID_CONFIG' }),
    )
  })

  it('should reject unsupported default encodings up front', () => {
    expect(() => configure({ defaultEncoding: 'klingon' })).toThrow(
      /^Invalid configuration: defaultEncoding: Unsupported encoding \(supported: utf-8, /,
    )
    expect(getConfig().defaultEncoding).toBe('utf-8')
  })

  it('should keep the previous configuration when validation fails', () => {
    configure({ nullText: 'kept' })
    expect(() => configure(JSON.parse('{"nullText":1}'))).toThrow()
    expect(getConfig().nullText).toBe('kept')
  })
})

describe('resetConfig', () => {
  it('should restore defaults', () => {
    configure({ nullText: 'x', debug: { log: true } })
    resetConfig()
    expect(getConfig()).toEqual(DEFAULT_CONFIG)
  })
})
