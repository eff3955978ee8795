/** Delimiters accepted around string literals. */
export type QuoteChar = '"' | "'" | '`';

/** A half-open range of source offsets (`end` is exclusive). */
export interface Span {
  start: number;
  end: number;
}

/** `true` or `false`. */
export interface BoolLiteral {
  kind: 'bool';
  value: boolean;
}

/** Raw text between a matching pair of quotes. No escapes are recognized. */
export interface StringLiteral {
  kind: 'string';
  value: string;
  /** The delimiter the literal was written with. */
  quote: QuoteChar;
}

/** An integer within the safe integer range. */
export interface IntLiteral {
  kind: 'int';
  value: number;
  /** The lexeme as written (e.g. `"-42"`). */
  raw: string;
}

/** A number written with a mandatory fractional part. */
export interface FloatLiteral {
  kind: 'float';
  value: number;
  /** The lexeme as written (e.g. `"3.50"`). */
  raw: string;
}

/** An ordered, possibly heterogeneous and nested, list of literals. */
export interface ArrayLiteral {
  kind: 'array';
  items: Literal[];
}

/** Union of all literal kinds an argument can hold. */
export type Literal = BoolLiteral | StringLiteral | IntLiteral | FloatLiteral | ArrayLiteral;

/** The kind tag of each literal variant. */
export type LiteralKind = Literal['kind'];

/** A literal converted to a plain JavaScript value. */
export type LiteralValue = boolean | string | number | LiteralValue[];

/** A named argument of a call. */
export interface Argument {
  name: string;
  value: Literal;
}

/** A run of document text copied verbatim into the output. */
export interface TextNode {
  type: 'text';
  /** The characters of the run; never empty. */
  value: string;
  span: Span;
}

/** A successfully recognized `{{ name(args) }}` directive. */
export interface CallNode {
  type: 'call';
  /** Directive name. */
  name: string;
  /** Arguments in source order, duplicates included. */
  args: Argument[];
  /** The exact source text of the directive, delimiters included. */
  raw: string;
  span: Span;
  /** 1-based line of the opening `{{`. */
  line: number;
  /** 1-based column of the opening `{{`. */
  column: number;
}

/** A unit of parsed document structure. */
export type Node = TextNode | CallNode;

/**
 * The result of parsing a document.
 *
 * `nodes` holds every node in source order; their spans tile the input.
 * `calls` is a pre-filtered view of the call nodes, also in source order.
 */
export interface ShortcodeDocument {
  nodes: Node[];
  calls: CallNode[];
}

/** Why a literal could not be parsed. */
export type LiteralFailureKind = 'no-match' | 'numeric-overflow' | 'trailing-input';

/** Failure report from {@link parseLiteral}. */
export interface LiteralFailure {
  kind: LiteralFailureKind;
  /** Offset at which parsing stopped. */
  offset: number;
}
