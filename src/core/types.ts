/**
 * Core Types
 *
 * Collaborator contracts shared across the library: output sinks,
 * deferred callables, structured-output builders and serialized records.
 */

/**
 * Incremental text destination.
 *
 * `write` may throw; render() propagates such failures to its caller unchanged.
 */
export interface Sink {
  write: (text: string) => void
}

/** Deferred slot computing its text at render time */
export type DeferredValue = () => unknown

/** Deferred slot streaming its text straight into the render sink */
export type DeferredWriter = (sink: Sink) => unknown

export type Deferred = DeferredValue | DeferredWriter

/** Anything that knows how to write itself to a sink */
export interface Writable {
  writeTo: (sink: Sink) => unknown
}

export type BuildEventKind = 'literal' | 'value'

/**
 * Receiver of structured-output emission events.
 * Fragments arrive as 'literal', slot values (unrendered) as 'value'.
 */
export interface Builder {
  yield: (piece: unknown, kind: BuildEventKind) => void
}

export interface BuildEvent {
  kind: BuildEventKind
  piece: unknown
}

/** Flat serialized form of an interpolated string */
export interface InterpolatedStringRecord {
  strings: string[]
  values: unknown[]
}

/**
 * Debug configuration for development tooling
 */
export interface DebugConfig {
  /** Log every render and concat to the console */
  log?: boolean
  /** Enable timing measurement for deferred slots */
  timing?: boolean
  /** Threshold in milliseconds for slow deferred slot warnings (default: 5ms) */
  timingThreshold?: number
}

export interface InterpolationConfig {
  /** Text written for null slot values (default: "null") */
  nullText: string
  /** Text written for undefined slot values (default: "undefined") */
  undefinedText: string
  /** Encoding used by getBytes() when none is given (default: "utf-8") */
  defaultEncoding: string
  /** Debug configuration for development tooling */
  debug: DebugConfig
}
