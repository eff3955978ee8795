/**
 * Error code system for Tessera.
 *
 * Every error carries a unique code (TESSERA_Exxx) that maps to one
 * documented failure mode, so callers can branch on `code` instead of
 * parsing messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Tessera error codes. */
export enum TesseraErrorCode {
  // Input (1xx)
  /** A required input was empty, missing, or otherwise invalid. */
  INVALID_INPUT = 'TESSERA_E100',

  // Dispatch (2xx)
  /** A well-formed call names a directive absent from the registry. */
  UNKNOWN_DIRECTIVE = 'TESSERA_E200',
  /** A directive handler reported a failure. */
  DIRECTIVE_FAILED = 'TESSERA_E201',
  /** A handler is already registered under that name, or the name is not an identifier. */
  REGISTRY_CONFLICT = 'TESSERA_E202',
  /** The registry was frozen and can no longer be modified. */
  REGISTRY_FROZEN = 'TESSERA_E203',

  // Handler arguments (21x)
  /** A required argument was not supplied. */
  ARGUMENT_MISSING = 'TESSERA_E210',
  /** An argument was supplied with a literal of the wrong type. */
  ARGUMENT_TYPE = 'TESSERA_E211',

  // Placeholders (22x)
  /** The number of placeholders does not match the number of rendered calls. */
  PLACEHOLDER_MISMATCH = 'TESSERA_E220',

  // Configuration (3xx)
  /** The configuration file could not be read or parsed. */
  CONFIG_UNREADABLE = 'TESSERA_E300',
  /** The configuration file contains an invalid field. */
  CONFIG_INVALID = 'TESSERA_E301',
}

// ─── Error class ────────────────────────────────────────────────────────────────

/** Options for constructing a TesseraError. */
export interface TesseraErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error. */
  cause?: unknown;
}

/**
 * Base error class for all Tessera errors.
 *
 * @example
 * ```typescript
 * throw new TesseraError(
 *   TesseraErrorCode.UNKNOWN_DIRECTIVE,
 *   'Unknown directive "gallery"',
 *   { hint: 'Register a handler named "gallery"' },
 * );
 * ```
 */
export class TesseraError extends Error {
  readonly code: TesseraErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: TesseraErrorCode, message: string, options?: TesseraErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TesseraError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Structured representation for log entries. */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for terminal or build-log output.
 *
 * @example
 * ```typescript
 * formatError(new TesseraError(TesseraErrorCode.UNKNOWN_DIRECTIVE, 'Unknown directive "x"', { hint: 'Register it' }));
 * // [TESSERA_E200] Unknown directive "x"
 * // Hint: Register it
 * ```
 */
export function formatError(error: TesseraError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.cause instanceof Error) {
    lines.push(`Caused by: ${error.cause.message}`);
  }
  return lines.join('\n');
}

/** Narrow an unknown thrown value to a {@link TesseraError}. */
export function isTesseraError(value: unknown): value is TesseraError {
  return value instanceof TesseraError;
}
