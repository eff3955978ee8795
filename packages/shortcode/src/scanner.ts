/**
 * Cursor over document source with the character classes shared by the
 * literal and directive grammars. All reads are bounds-checked: past the
 * end of input `peek()` returns `''`.
 */
export class Scanner {
  readonly source: string;
  pos: number;

  constructor(source: string, pos = 0) {
    this.source = source;
    this.pos = pos;
  }

  get atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  peek(): string {
    return this.source.charAt(this.pos);
  }

  /** Whether the input continues with `text` at the cursor. */
  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.pos);
  }

  /** Consume `text` if the input continues with it. */
  eat(text: string): boolean {
    if (!this.startsWith(text)) {
      return false;
    }
    this.pos += text.length;
    return true;
  }

  /** Skip any run of space, tab, CR and LF. */
  skipWhitespace(): void {
    while (isWhitespace(this.peek())) {
      this.pos++;
    }
  }

  /** Read `[A-Za-z_][A-Za-z0-9_]*`, or return `undefined` without moving. */
  readIdentifier(): string | undefined {
    if (!isIdentStart(this.peek())) {
      return undefined;
    }
    const start = this.pos;
    while (isIdentPart(this.peek())) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  /** Read a possibly empty run of ASCII digits. */
  readDigits(): string {
    const start = this.pos;
    while (isDigit(this.peek())) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  slice(start: number): string {
    return this.source.slice(start, this.pos);
  }
}

/**
 * Maps source offsets to 1-based line and column numbers. Line starts are
 * computed on first use, so documents without calls never pay for them.
 */
export class LineIndex {
  private readonly source: string;
  private starts: number[] | undefined;

  constructor(source: string) {
    this.source = source;
  }

  locate(offset: number): { line: number; column: number } {
    const starts = this.lineStarts();
    let lo = 0;
    let hi = starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((starts[mid] ?? 0) <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return { line: lo + 1, column: offset - (starts[lo] ?? 0) + 1 };
  }

  private lineStarts(): number[] {
    if (this.starts === undefined) {
      const starts = [0];
      for (let i = 0; i < this.source.length; i++) {
        if (this.source.charCodeAt(i) === 10) {
          starts.push(i + 1);
        }
      }
      this.starts = starts;
    }
    return this.starts;
  }
}

export function isIdentStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') ||
         (ch >= 'A' && ch <= 'Z') ||
         ch === '_';
}

export function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

export function isDigit(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}
