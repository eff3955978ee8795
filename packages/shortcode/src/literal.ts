import { createDebugLogger, err, ok } from '@tessera/types';
import type { Result } from '@tessera/types';
import type {
  ArrayLiteral,
  Literal,
  LiteralFailure,
  LiteralValue,
  QuoteChar,
} from './types.js';
import { Scanner, isDigit } from './scanner.js';

/** Arrays nested deeper than this fail to match instead of exhausting the stack. */
export const MAX_ARRAY_DEPTH = 256;

const dbg = createDebugLogger('tessera:shortcode');

type LiteralMatch = Result<Literal, LiteralFailure>;

/**
 * Ordered-choice literal matcher.
 *
 * Grammar:
 *   literal = bool | string | float | int | array
 *   bool    = "true" | "false"
 *   string  = '"' (!'"' ANY)* '"' | "'" (!"'" ANY)* "'" | "`" (!"`" ANY)* "`"
 *   float   = "-"? int_part "." DIGIT+
 *   int     = "-"? int_part
 *   int_part = "0" | [1-9] DIGIT*
 *   array   = "[" ws [ literal (ws "," ws literal)* (ws ",")? ] ws "]"
 *
 * The first alternative that matches in full wins. On failure the scanner
 * is left where it started, so callers can try something else.
 */
export function scanLiteral(scanner: Scanner, depth = 0): LiteralMatch {
  const start = scanner.pos;
  let furthest = start;
  let overflow = false;

  const alternatives: ((s: Scanner, d: number) => LiteralMatch)[] = [
    scanBool,
    scanString,
    scanFloat,
    scanInt,
    scanArray,
  ];

  for (const alternative of alternatives) {
    const result = alternative(scanner, depth);
    if (result.ok) {
      return result;
    }
    scanner.pos = start;
    furthest = Math.max(furthest, result.error.offset);
    if (result.error.kind === 'numeric-overflow') {
      overflow = true;
    }
  }

  return err<LiteralFailure>({ kind: overflow ? 'numeric-overflow' : 'no-match', offset: furthest });
}

/**
 * Parse a single literal that spans the whole of `text` (surrounding
 * whitespace allowed). Never throws.
 *
 * @example
 * ```typescript
 * const result = parseLiteral('[1, 2, 3,]');
 * if (result.ok) console.log(literalToValue(result.value)); // [1, 2, 3]
 * ```
 */
export function parseLiteral(text: string): Result<Literal, LiteralFailure> {
  const scanner = new Scanner(text);
  scanner.skipWhitespace();
  const result = scanLiteral(scanner);
  if (!result.ok) {
    return result;
  }
  scanner.skipWhitespace();
  if (!scanner.atEnd) {
    return err<LiteralFailure>({ kind: 'trailing-input', offset: scanner.pos });
  }
  return result;
}

/** Convert a literal into the equivalent plain JavaScript value. */
export function literalToValue(literal: Literal): LiteralValue {
  switch (literal.kind) {
    case 'bool':
    case 'string':
    case 'int':
    case 'float':
      return literal.value;
    case 'array':
      return literal.items.map(literalToValue);
  }
}

// ─── Alternatives ───────────────────────────────────────────────────────────────

function noMatch(offset: number): LiteralMatch {
  return err<LiteralFailure>({ kind: 'no-match', offset });
}

function scanBool(scanner: Scanner): LiteralMatch {
  if (scanner.eat('true')) {
    return ok<Literal>({ kind: 'bool', value: true });
  }
  if (scanner.eat('false')) {
    return ok<Literal>({ kind: 'bool', value: false });
  }
  return noMatch(scanner.pos);
}

function scanString(scanner: Scanner): LiteralMatch {
  const quote = asQuote(scanner.peek());
  if (quote === undefined) {
    return noMatch(scanner.pos);
  }
  const close = scanner.source.indexOf(quote, scanner.pos + 1);
  if (close === -1) {
    return noMatch(scanner.source.length);
  }
  const value = scanner.source.slice(scanner.pos + 1, close);
  scanner.pos = close + 1;
  return ok<Literal>({ kind: 'string', value, quote });
}

function asQuote(ch: string): QuoteChar | undefined {
  switch (ch) {
    case '"':
      return '"';
    case "'":
      return "'";
    case '`':
      return '`';
    default:
      return undefined;
  }
}

/** Consume `"-"? ("0" | [1-9] DIGIT*)`; returns false without a match. */
function scanIntPart(scanner: Scanner): boolean {
  scanner.eat('-');
  const first = scanner.peek();
  if (first === '0') {
    scanner.pos++;
    return true;
  }
  if (!isDigit(first)) {
    return false;
  }
  scanner.readDigits();
  return true;
}

function scanFloat(scanner: Scanner): LiteralMatch {
  const start = scanner.pos;
  if (!scanIntPart(scanner) || !scanner.eat('.')) {
    return noMatch(scanner.pos);
  }
  if (scanner.readDigits() === '') {
    return noMatch(scanner.pos);
  }
  const raw = scanner.slice(start);
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    dbg.log('float literal out of range', raw.length > 32 ? `${raw.slice(0, 32)}...` : raw);
    return err<LiteralFailure>({ kind: 'numeric-overflow', offset: start });
  }
  return ok<Literal>({ kind: 'float', value, raw });
}

function scanInt(scanner: Scanner): LiteralMatch {
  const start = scanner.pos;
  if (!scanIntPart(scanner)) {
    return noMatch(scanner.pos);
  }
  const raw = scanner.slice(start);
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    dbg.log('int literal out of range', raw.length > 32 ? `${raw.slice(0, 32)}...` : raw);
    return err<LiteralFailure>({ kind: 'numeric-overflow', offset: start });
  }
  // `-0` is an integer zero, not a signed one.
  return ok<Literal>({ kind: 'int', value: value === 0 ? 0 : value, raw });
}

function scanArray(scanner: Scanner, depth: number): LiteralMatch {
  if (scanner.peek() !== '[' || depth >= MAX_ARRAY_DEPTH) {
    return noMatch(scanner.pos);
  }
  scanner.pos++;
  const array: ArrayLiteral = { kind: 'array', items: [] };

  scanner.skipWhitespace();
  if (scanner.eat(']')) {
    return ok(array);
  }

  for (;;) {
    const item = scanLiteral(scanner, depth + 1);
    if (!item.ok) {
      return item;
    }
    array.items.push(item.value);

    scanner.skipWhitespace();
    if (scanner.eat(']')) {
      return ok(array);
    }
    if (!scanner.eat(',')) {
      return noMatch(scanner.pos);
    }
    scanner.skipWhitespace();
    // A single trailing comma is allowed after the last element.
    if (scanner.eat(']')) {
      return ok(array);
    }
  }
}
