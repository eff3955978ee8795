import { TesseraErrorCode } from '@tessera/types';
import type {
  Argument,
  ArrayLiteral,
  Literal,
  LiteralKind,
  LiteralValue,
} from './types.js';
import { ArgumentError } from './errors.js';
import { literalToValue } from './literal.js';

/**
 * Read-only view over a call's arguments, handed to every handler.
 *
 * The engine checks neither arity nor types; handlers use the typed
 * accessors below, which throw {@link ArgumentError} on a missing or
 * mistyped argument. When a name occurs more than once, every by-name
 * lookup sees the last occurrence; {@link ShortcodeArgs.list} keeps all of
 * them in source order.
 *
 * @example
 * ```typescript
 * const figure: ShortcodeHandler = (args) => {
 *   const src = args.string('src');
 *   const width = args.optionalInt('width', 640);
 *   return `<img src="${src}" width="${width}">`;
 * };
 * ```
 */
export class ShortcodeArgs {
  /** Arguments exactly as parsed. */
  readonly list: readonly Argument[];
  private readonly byName: Map<string, Literal>;

  constructor(args: readonly Argument[]) {
    this.list = args;
    this.byName = new Map();
    for (const arg of args) {
      this.byName.set(arg.name, arg.value);
    }
  }

  get size(): number {
    return this.list.length;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): Literal | undefined {
    return this.byName.get(name);
  }

  /** Distinct argument names in order of first appearance. */
  names(): string[] {
    return [...this.byName.keys()];
  }

  // ── Required accessors ──────────────────────────────────────────────────────

  string(name: string): string {
    return this.expect(name, 'string').value;
  }

  int(name: string): number {
    return this.expect(name, 'int').value;
  }

  /** A float, or an int widened to a number. */
  float(name: string): number {
    const literal = this.require(name);
    if (literal.kind === 'float' || literal.kind === 'int') {
      return literal.value;
    }
    throw this.typeError(name, 'float', literal.kind);
  }

  bool(name: string): boolean {
    return this.expect(name, 'bool').value;
  }

  /** Array items as plain values. */
  array(name: string): LiteralValue[] {
    const literal: ArrayLiteral = this.expect(name, 'array');
    return literal.items.map(literalToValue);
  }

  // ── Optional accessors ──────────────────────────────────────────────────────

  optionalString(name: string, fallback: string): string {
    return this.has(name) ? this.string(name) : fallback;
  }

  optionalInt(name: string, fallback: number): number {
    return this.has(name) ? this.int(name) : fallback;
  }

  optionalFloat(name: string, fallback: number): number {
    return this.has(name) ? this.float(name) : fallback;
  }

  optionalBool(name: string, fallback: boolean): boolean {
    return this.has(name) ? this.bool(name) : fallback;
  }

  optionalArray(name: string, fallback: LiteralValue[]): LiteralValue[] {
    return this.has(name) ? this.array(name) : fallback;
  }

  /** Plain-value record of the arguments (last occurrence wins). */
  toObject(): Record<string, LiteralValue> {
    // fromEntries defines own properties, so `__proto__` stays an ordinary key.
    return Object.fromEntries(
      [...this.byName].map(([name, literal]): [string, LiteralValue] => [name, literalToValue(literal)]),
    );
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private require(name: string): Literal {
    const literal = this.byName.get(name);
    if (literal === undefined) {
      throw new ArgumentError(
        TesseraErrorCode.ARGUMENT_MISSING,
        name,
        `Missing required argument "${name}"`,
      );
    }
    return literal;
  }

  private expect<K extends LiteralKind>(name: string, kind: K): Extract<Literal, { kind: K }> {
    const literal = this.require(name);
    if (isKind(literal, kind)) {
      return literal;
    }
    throw this.typeError(name, kind, literal.kind);
  }

  private typeError(name: string, expected: LiteralKind, actual: LiteralKind): ArgumentError {
    return new ArgumentError(
      TesseraErrorCode.ARGUMENT_TYPE,
      name,
      `Argument "${name}" must be ${describeKind(expected)}, got ${describeKind(actual)}`,
    );
  }
}

function isKind<K extends LiteralKind>(literal: Literal, kind: K): literal is Extract<Literal, { kind: K }> {
  return literal.kind === kind;
}

function describeKind(kind: LiteralKind): string {
  switch (kind) {
    case 'bool':
      return 'a boolean';
    case 'string':
      return 'a string';
    case 'int':
      return 'an integer';
    case 'float':
      return 'a float';
    case 'array':
      return 'an array';
  }
}
