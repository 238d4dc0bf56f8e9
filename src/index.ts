/**
 * lazy-interpolated-string
 *
 * Interpolated strings rendered on demand:
 * - Fragments and values kept apart until text is needed
 * - Deferred slots computed or streamed at render time
 * - Structural concatenation without rendering
 * - Equality, hashing and ordering on the rendered text
 */

// =============================================================================
// CORE PUBLIC API
// =============================================================================

export {
  type Comparison,
  hashText,
  InterpolatedString,
} from './core/interpolated-string'
export { gstr } from './template/tag'

export type {
  BuildEvent,
  BuildEventKind,
  Builder,
  DebugConfig,
  Deferred,
  DeferredValue,
  DeferredWriter,
  InterpolatedStringRecord,
  InterpolationConfig,
  Sink,
  Writable,
} from './core/types'

// =============================================================================
// ERRORS & CONFIGURATION
// =============================================================================

export {
  InterpolationError,
  type InterpolationErrorCode,
  isInterpolationError,
} from './core/errors'
export {
  type ConfigHooks,
  type ConfigInput,
  configure,
  DEFAULT_CONFIG,
  getConfig,
  resetConfig,
} from './core/config'

// =============================================================================
// RENDERING
// =============================================================================

export { createWritableSink, StringSink } from './render/sink'
export {
  type CoercionOptions,
  formatValue,
  writeValue,
} from './render/write-value'
export {
  encodeText,
  isSupportedEncoding,
  SUPPORTED_ENCODINGS,
} from './render/encode'

// =============================================================================
// DISPATCH, BUILDERS, SERIALIZATION
// =============================================================================

export {
  dispatch,
  type DispatchResult,
  forwardToText,
  invokeWithFallback,
  isNativeOperation,
  NATIVE_OPERATIONS,
  type NativeOperation,
} from './dispatch/fallback'
export {
  collectBuildEvents,
  createEventCollector,
  type EventCollector,
  type ParameterizedText,
  parameterize,
  type Placeholder,
} from './build/builder'
export { deserialize, serialize } from './serialization/json'
export { interpolatedStringRecordSchema } from './serialization/record'

// =============================================================================
// DEBUG UTILITIES
// =============================================================================

export type {
  OnSlowOperation,
  OnTimingSummary,
  TimingEvent,
  TimingSummary,
} from './utils/timing'
export type {
  ConcatLogData,
  InterpolationLogger,
  RenderLogData,
} from './utils/log'
export { is } from './utils/is'
