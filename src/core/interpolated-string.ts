/**
 * InterpolatedString
 *
 * A string template held as literal fragments (`strings`) alternating with
 * embedded values (`values`), rendered only when text is asked for. Rendering
 * late lets slots hold deferred callables that compute or stream their text
 * at that moment, and lets templates be concatenated structurally before
 * anything is stringified.
 *
 * @example
 * ```typescript
 * const user = 'Alice'
 * let calls = 0
 * const greeting = gstr`hello ${user}, call #${() => ++calls}`
 *
 * greeting.toString() // "hello Alice, call #1"
 * greeting.toString() // "hello Alice, call #2"
 * ```
 */

import { encodeText } from '../render/encode'
import { renderTo } from '../render/render'
import { StringSink } from '../render/sink'
import { parseRecord } from '../serialization/record'
import { guard } from '../utils/guards'
import { getConfig, getLogger } from './config'
import type {
  Builder,
  InterpolatedStringRecord,
  Sink,
  Writable,
} from './types'

export type Comparison = -1 | 0 | 1

const compareText = (a: string, b: string): Comparison =>
  a < b ? -1 : a > b ? 1 : 0

/** Polynomial hash over UTF-16 code units in signed 32-bit arithmetic */
export const hashText = (text: string): number => {
  let hash = 0
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0
  }
  return hash
}

/**
 * Immutable interpolated string.
 *
 * Invariant: `strings.length === values.length` (ends in a value slot) or
 * `strings.length === values.length + 1` (ends in a literal).
 *
 * **Equality, hashing and ordering are defined on the rendered text.**
 * Two instances built from different fragments and values are equal when
 * they happen to render the same text, and because deferred callables may
 * produce different text on every render, an instance holding one can
 * compare unequal to itself. `length`, `charAt` and `subSequence` render
 * on every call as well.
 */
export class InterpolatedString implements Writable {
  /** One empty fragment, no values */
  static readonly EMPTY: InterpolatedString = new InterpolatedString([], [''])

  readonly strings: readonly string[]
  readonly values: readonly unknown[]

  /**
   * @param values - slot values, in order
   * @param strings - literal fragments; `values.length` or `values.length + 1` of them
   * @throws InterpolationError `INVALID_SHAPE`
   */
  constructor(values: readonly unknown[], strings: readonly string[]) {
    guard.shape(strings, values)
    guard.fragments(strings)
    this.strings = Object.freeze([...strings])
    this.values = Object.freeze([...values])
    Object.freeze(this)
  }

  /** Build from fragments and values given in template order */
  static of(
    strings: readonly string[],
    values: readonly unknown[] = [],
  ): InterpolatedString {
    return new InterpolatedString(values, strings)
  }

  /** Wrap plain text as a single fragment; instances pass through */
  static from(value: InterpolatedString | string): InterpolatedString {
    return value instanceof InterpolatedString
      ? value
      : new InterpolatedString([], [value])
  }

  /**
   * Concatenate parts, inserting `separator` between them.
   * Nothing is rendered.
   *
   * @example
   * ```typescript
   * InterpolatedString.join([gstr`a${1}`, 'b'], ', ').toString() // "a1, b"
   * ```
   */
  static join(
    parts: Iterable<InterpolatedString | string>,
    separator: InterpolatedString | string = '',
  ): InterpolatedString {
    let result = InterpolatedString.EMPTY
    let first = true
    for (const part of parts) {
      if (!first && separator !== '') result = result.concat(separator)
      first = false
      result = result.concat(part)
    }
    return result
  }

  /** Three-way comparator on rendered text, usable with Array.prototype.sort */
  static compare(
    a: InterpolatedString | string,
    b: InterpolatedString | string,
  ): Comparison {
    return compareText(a.toString(), b.toString())
  }

  /**
   * Rebuild an instance from its serialized record.
   *
   * @throws InterpolationError `INVALID_RECORD`
   */
  static fromRecord(input: unknown): InterpolatedString {
    const { strings, values } = parseRecord(input)
    return new InterpolatedString(values, strings)
  }

  get valueCount(): number {
    return this.values.length
  }

  getValue(index: number): unknown {
    guard.index(index, this.values.length, 'Value')
    return this.values[index]
  }

  getValues(): readonly unknown[] {
    return this.values
  }

  getStrings(): readonly string[] {
    return this.strings
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  /**
   * Write the expansion to `sink` and return it.
   * Failures raised by the sink or by a deferred callable propagate unchanged.
   *
   * @throws InterpolationError `INVALID_CLOSURE_ARITY` for a slot callable
   *   declaring two or more parameters
   */
  render<S extends Sink>(sink: S): S {
    return renderTo(sink, this)
  }

  /** Writable protocol; lets an instance stream into another render */
  writeTo<S extends Sink>(sink: S): S {
    return renderTo(sink, this)
  }

  toString(): string {
    return this.render(new StringSink()).toString()
  }

  valueOf(): string {
    return this.toString()
  }

  [Symbol.toPrimitive](): string {
    return this.toString()
  }

  // ---------------------------------------------------------------------------
  // Concatenation
  // ---------------------------------------------------------------------------

  /**
   * This template followed by `other`, without rendering either.
   *
   * When this template ends in a literal, its last fragment and the first
   * fragment of `other` become one fragment, so no empty fragment ever sits
   * between two value slots.
   *
   * @example
   * ```typescript
   * InterpolatedString.of(['foo']).concat('bar').strings // ["foobar"]
   * InterpolatedString.of(['x', 'y'], [1]).concat('z').strings // ["x", "yz"]
   * ```
   */
  concat(other: InterpolatedString | string): InterpolatedString {
    const that = InterpolatedString.from(other)
    const strings = [...this.strings]
    const thatStrings = [...that.strings]

    const merged =
      strings.length > this.values.length && thatStrings.length > 0
    if (merged) {
      const last = strings.length - 1
      strings[last] = `${strings[last] ?? ''}${thatStrings.shift() ?? ''}`
    }
    strings.push(...thatStrings)

    getLogger().logConcat({
      left: { fragments: this.strings.length, values: this.values.length },
      right: { fragments: that.strings.length, values: that.values.length },
      merged,
    })

    return new InterpolatedString([...this.values, ...that.values], strings)
  }

  /** Alias of concat() */
  plus(other: InterpolatedString | string): InterpolatedString {
    return this.concat(other)
  }

  // ---------------------------------------------------------------------------
  // Text semantics
  // ---------------------------------------------------------------------------

  /** Equal when `other` is an InterpolatedString rendering the same text */
  equals(other: unknown): boolean {
    return (
      other instanceof InterpolatedString &&
      this.toString() === other.toString()
    )
  }

  /** Hash of the rendered text, consistent with equals() */
  hashCode(): number {
    return (37 + hashText(this.toString())) | 0
  }

  compareTo(other: InterpolatedString | string): Comparison {
    return compareText(this.toString(), other.toString())
  }

  get length(): number {
    return this.toString().length
  }

  /** @throws RangeError when `index` is outside the rendered text */
  charAt(index: number): string {
    const text = this.toString()
    guard.index(index, text.length, 'Character')
    return text.charAt(index)
  }

  /** @throws RangeError unless `0 <= start <= end <= length` */
  subSequence(start: number, end: number): string {
    const text = this.toString()
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      end > text.length ||
      start > end
    ) {
      throw new RangeError(
        `Subsequence range out of bounds: [${String(start)}, ${String(end)}) (length ${String(text.length)})`,
      )
    }
    return text.slice(start, end)
  }

  // ---------------------------------------------------------------------------
  // Derived operations
  // ---------------------------------------------------------------------------

  /** Compile the rendered text as a regular expression; SyntaxError propagates */
  toPattern(flags?: string): RegExp {
    return new RegExp(this.toString(), flags)
  }

  /** Alias of toPattern() */
  negate(flags?: string): RegExp {
    return this.toPattern(flags)
  }

  /**
   * Rendered text as bytes.
   *
   * @param encoding - charset name, case-insensitive (default from configure())
   * @throws InterpolationError `UNSUPPORTED_ENCODING`
   */
  getBytes(encoding: string = getConfig().defaultEncoding): Uint8Array {
    return encodeText(this.toString(), encoding)
  }

  /**
   * Emit fragments and values to `builder` as separate events, in
   * document order. Values are passed through unrendered.
   */
  build(builder: Builder): void {
    const { strings, values } = this
    for (const [index, fragment] of strings.entries()) {
      builder.yield(fragment, 'literal')
      if (index < values.length) {
        builder.yield(values[index], 'value')
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  toRecord(): InterpolatedStringRecord {
    return { strings: [...this.strings], values: [...this.values] }
  }

  toJSON(): InterpolatedStringRecord {
    return this.toRecord()
  }
}
