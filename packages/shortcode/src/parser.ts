import { createDebugLogger } from '@tessera/types';
import type { Argument, CallNode, Node, ShortcodeDocument, TextNode } from './types.js';
import { LineIndex, Scanner } from './scanner.js';
import { scanLiteral } from './literal.js';

const dbg = createDebugLogger('tessera:shortcode');

const OPEN = '{{';
const CLOSE = '}}';

/**
 * Parse document text into text runs and directive calls. Never throws.
 *
 * Grammar:
 *   document = ( call | TEXT_CHAR )*
 *   call     = "{{" ws ident ws "(" ws [ arg ( ws "," ws arg )* ] ws ")" ws "}}"
 *   arg      = ident ws "=" ws literal
 *   ws       = ( " " | "\t" | "\r" | "\n" )*
 *
 * At every `{{` a full call match is attempted; if any part of it fails the
 * opening brace becomes text and scanning resumes one character later.
 * Consecutive text characters coalesce into a single text node, so the
 * node spans always tile the input.
 *
 * @example
 * ```typescript
 * const doc = parse('Hello {{ name(x=1, y="a") }}!');
 * doc.nodes.map((n) => n.type); // ['text', 'call', 'text']
 * ```
 */
export function parse(source: string): ShortcodeDocument {
  const stop = dbg.time('parse');
  const document = new DocumentParser(source).parse();
  stop();
  return document;
}

/**
 * Reassemble the source text of a parsed document: text nodes contribute
 * their value and call nodes their raw directive text.
 */
export function reconstruct(document: ShortcodeDocument): string {
  let out = '';
  for (const node of document.nodes) {
    out += node.type === 'text' ? node.value : node.raw;
  }
  return out;
}

export function isTextNode(node: Node): node is TextNode {
  return node.type === 'text';
}

export function isCallNode(node: Node): node is CallNode {
  return node.type === 'call';
}

class DocumentParser {
  private readonly source: string;
  private readonly scanner: Scanner;
  private readonly lines: LineIndex;
  private readonly nodes: Node[] = [];
  private readonly calls: CallNode[] = [];

  constructor(source: string) {
    this.source = source;
    this.scanner = new Scanner(source);
    this.lines = new LineIndex(source);
  }

  parse(): ShortcodeDocument {
    const length = this.source.length;
    let textStart = 0;
    let pos = this.source.indexOf(OPEN);

    while (pos !== -1) {
      const call = this.tryCall(pos);
      if (call) {
        this.pushText(textStart, pos);
        this.nodes.push(call);
        this.calls.push(call);
        pos = call.span.end;
        textStart = pos;
      } else {
        // Not a call: the character at `pos` is text. Only another `{{` can
        // start a call, so skip straight to the next one.
        pos += 1;
      }
      pos = this.source.indexOf(OPEN, pos);
    }

    this.pushText(textStart, length);
    dbg.log('parsed document', { nodes: this.nodes.length, calls: this.calls.length });
    return { nodes: this.nodes, calls: this.calls };
  }

  private pushText(start: number, end: number): void {
    if (end > start) {
      this.nodes.push({
        type: 'text',
        value: this.source.slice(start, end),
        span: { start, end },
      });
    }
  }

  /** Attempt a complete call at `start`; `undefined` if any part fails. */
  private tryCall(start: number): CallNode | undefined {
    const s = this.scanner;
    s.pos = start;
    if (!s.eat(OPEN)) {
      return undefined;
    }

    s.skipWhitespace();
    const name = s.readIdentifier();
    if (name === undefined) {
      return undefined;
    }

    s.skipWhitespace();
    if (!s.eat('(')) {
      return undefined;
    }

    s.skipWhitespace();
    const args: Argument[] = [];
    if (!s.eat(')')) {
      for (;;) {
        const arg = this.scanArgument();
        if (arg === undefined) {
          return undefined;
        }
        args.push(arg);

        s.skipWhitespace();
        if (s.eat(')')) {
          break;
        }
        if (!s.eat(',')) {
          return undefined;
        }
        // No trailing comma: another argument must follow.
        s.skipWhitespace();
      }
    }

    s.skipWhitespace();
    if (!s.eat(CLOSE)) {
      return undefined;
    }

    const end = s.pos;
    const { line, column } = this.lines.locate(start);
    return {
      type: 'call',
      name,
      args,
      raw: this.source.slice(start, end),
      span: { start, end },
      line,
      column,
    };
  }

  private scanArgument(): Argument | undefined {
    const s = this.scanner;
    const name = s.readIdentifier();
    if (name === undefined) {
      return undefined;
    }
    s.skipWhitespace();
    if (!s.eat('=')) {
      return undefined;
    }
    s.skipWhitespace();
    const literal = scanLiteral(s);
    if (!literal.ok) {
      if (literal.error.kind === 'numeric-overflow') {
        dbg.log('numeric overflow in argument; call degrades to text', { argument: name });
      }
      return undefined;
    }
    return { name, value: literal.value };
  }
}
