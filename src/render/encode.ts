/**
 * Text to bytes
 */

import { Buffer } from 'node:buffer'

import { InterpolationError } from '../core/errors'

interface Charset {
  encoding: BufferEncoding
  /** Code points the charset cannot represent; written as `?` */
  unmappable?: RegExp
}

const UTF8: Charset = { encoding: 'utf8' }
const UTF16LE: Charset = { encoding: 'utf16le' }
const LATIN1: Charset = { encoding: 'latin1', unmappable: /[^\u0000-\u00ff]/gu }
const ASCII: Charset = { encoding: 'ascii', unmappable: /[^\u0000-\u007f]/gu }

/** Charset names accepted by getBytes(), lower-cased */
const CHARSETS = new Map<string, Charset>([
  ['utf-8', UTF8],
  ['utf8', UTF8],
  ['utf-16le', UTF16LE],
  ['utf16le', UTF16LE],
  ['ucs-2', UTF16LE],
  ['ucs2', UTF16LE],
  ['iso-8859-1', LATIN1],
  ['latin1', LATIN1],
  ['binary', LATIN1],
  ['us-ascii', ASCII],
  ['ascii', ASCII],
])

const REPLACEMENT = '?'

export const SUPPORTED_ENCODINGS: readonly string[] = [...CHARSETS.keys()]

const resolve = (encoding: string): Charset | undefined =>
  CHARSETS.get(encoding.trim().toLowerCase())

/** Whether getBytes() accepts `encoding` (case-insensitive) */
export const isSupportedEncoding = (encoding: string): boolean =>
  resolve(encoding) !== undefined

/**
 * Encode `text` with the named charset. Characters the charset cannot
 * represent are written as `?`, one per code point.
 *
 * @throws InterpolationError `UNSUPPORTED_ENCODING`
 *
 * @example
 * ```typescript
 * encodeText('hé', 'latin1') // Uint8Array [0x68, 0xe9]
 * encodeText('h€', 'latin1') // Uint8Array [0x68, 0x3f]
 * ```
 */
export const encodeText = (text: string, encoding: string): Uint8Array => {
  const charset = resolve(encoding)
  if (charset === undefined) {
    throw new InterpolationError(
      'UNSUPPORTED_ENCODING',
      `Unsupported encoding: ${encoding}`,
      { context: { encoding, supported: SUPPORTED_ENCODINGS } },
    )
  }
  const mappable =
    charset.unmappable === undefined
      ? text
      : text.replace(charset.unmappable, REPLACEMENT)
  return new Uint8Array(Buffer.from(mappable, charset.encoding))
}
