/**
 * @tessera/types -- shared building blocks for the Tessera packages.
 *
 * Provides the error code system, a Result type, structured and debug
 * logging, and runtime guards.
 *
 * @packageDocumentation
 */

// ─── Result type ────────────────────────────────────────────────────────────────

/**
 * A discriminated union representing either a successful value or an error:
 *   - `{ ok: true, value: T }`
 *   - `{ ok: false, error: E }`
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Construct a successful Result.
 *
 * @example
 * ```typescript
 * const result = ok(42);
 * if (result.ok) console.log(result.value); // 42
 * ```
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Construct a failed Result.
 *
 * @example
 * ```typescript
 * const result = err(new Error('not found'));
 * if (!result.ok) console.log(result.error.message); // 'not found'
 * ```
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ─── Errors ─────────────────────────────────────────────────────────────────────
export { TesseraErrorCode, TesseraError, formatError, isTesseraError } from './errors.js';
export type { TesseraErrorOptions } from './errors.js';

// ─── Guards ─────────────────────────────────────────────────────────────────────
export {
  isNonEmptyString,
  isIdentifier,
  isPlainObject,
  isOneOf,
} from './guards.js';

// ─── Structured logging ─────────────────────────────────────────────────────────
export { Logger, createLogger, defaultLogger, LogLevel, parseLogLevel } from './logger.js';
export type { LogEntry, LogOutput, LoggerOptions } from './logger.js';

// ─── Debug logging ──────────────────────────────────────────────────────────────
export { isDebugEnabled, createDebugLogger } from './debug.js';
export type { DebugLogger } from './debug.js';
