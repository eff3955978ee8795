import { TesseraError, TesseraErrorCode } from '@tessera/types';

export class UnknownDirectiveError extends TesseraError {
  readonly directive: string;
  readonly line: number;
  readonly column: number;
  constructor(directive: string, line: number, column: number) {
    super(
      TesseraErrorCode.UNKNOWN_DIRECTIVE,
      `Unknown directive "${directive}" at ${line}:${column}`,
      {
        context: { directive, line, column },
        hint: `Register a handler named "${directive}" or remove the call`,
      },
    );
    this.name = 'UnknownDirectiveError';
    this.directive = directive;
    this.line = line;
    this.column = column;
  }
}

export class DirectiveFailedError extends TesseraError {
  readonly directive: string;
  readonly line: number;
  readonly column: number;
  constructor(directive: string, line: number, column: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      TesseraErrorCode.DIRECTIVE_FAILED,
      `Directive "${directive}" at ${line}:${column} failed: ${reason}`,
      { context: { directive, line, column }, cause },
    );
    this.name = 'DirectiveFailedError';
    this.directive = directive;
    this.line = line;
    this.column = column;
  }
}

/** Failures the evaluator surfaces to the embedder. */
export type ShortcodeError = UnknownDirectiveError | DirectiveFailedError;

export class RegistryError extends TesseraError {
  constructor(code: TesseraErrorCode.REGISTRY_CONFLICT | TesseraErrorCode.REGISTRY_FROZEN, message: string) {
    super(code, message);
    this.name = 'RegistryError';
  }
}

export class ArgumentError extends TesseraError {
  readonly argument: string;
  constructor(
    code: TesseraErrorCode.ARGUMENT_MISSING | TesseraErrorCode.ARGUMENT_TYPE,
    argument: string,
    message: string,
  ) {
    super(code, message, { context: { argument } });
    this.name = 'ArgumentError';
    this.argument = argument;
  }
}

export class PlaceholderError extends TesseraError {
  readonly expected: number;
  readonly found: number;
  constructor(expected: number, found: number) {
    super(
      TesseraErrorCode.PLACEHOLDER_MISMATCH,
      `Expected ${expected} placeholder(s) but found ${found}`,
      {
        context: { expected, found },
        hint: 'The text between extract() and restore() must keep every placeholder intact, and must not introduce new ones',
      },
    );
    this.name = 'PlaceholderError';
    this.expected = expected;
    this.found = found;
  }
}

export class ConfigError extends TesseraError {
  readonly path: string;
  constructor(
    code: TesseraErrorCode.CONFIG_UNREADABLE | TesseraErrorCode.CONFIG_INVALID,
    path: string,
    message: string,
    cause?: unknown,
  ) {
    super(code, `${path}: ${message}`, { context: { path }, cause });
    this.name = 'ConfigError';
    this.path = path;
  }
}
