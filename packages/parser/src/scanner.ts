import { BibtexSyntaxError } from '@bibkit/shared';

// names double as XML tag names on export
const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /[A-Za-z0-9_.\-]/;
const DIGIT = /[0-9]/;

/**
 * Cursor over BibTeX source text.
 *
 * Every read either consumes what it returns or throws a
 * `BibtexSyntaxError` carrying the absolute offset of the problem.
 */
export class Scanner {
  private readonly text: string;
  position: number;

  constructor(text: string, position = 0) {
    this.text = text;
    this.position = position;
  }

  get eof(): boolean {
    return this.position >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.position);
  }

  skipWhitespace(): void {
    while (!this.eof && /\s/.test(this.peek())) {
      this.position++;
    }
  }

  /**
   * Consume `char` or fail.
   */
  expect(char: string): void {
    if (this.peek() !== char) {
      throw this.error(`Expected '${char}'`);
    }
    this.position++;
  }

  /**
   * Consume `char` if it is next.
   */
  accept(char: string): boolean {
    if (this.peek() !== char) {
      return false;
    }
    this.position++;
    return true;
  }

  isIdentifierStart(): boolean {
    const char = this.peek();
    return NAME_START.test(char);
  }

  isDigit(): boolean {
    return DIGIT.test(this.peek());
  }

  /**
   * Object type, field name or string name: a letter or underscore, then
   * letters, digits, `_`, `.` or `-`.
   */
  readIdentifier(what: string): string {
    const start = this.position;
    if (!this.isIdentifierStart()) {
      throw this.error(`Expected ${what}`);
    }
    while (!this.eof && NAME_CHAR.test(this.peek())) {
      this.position++;
    }
    return this.text.slice(start, this.position);
  }

  /**
   * Citation key: everything up to a comma, whitespace or the closing delimiter.
   */
  readKey(close: string): string {
    const start = this.position;
    while (!this.eof && !/[\s,]/.test(this.peek()) && this.peek() !== close) {
      this.position++;
    }
    return this.text.slice(start, this.position);
  }

  readDigits(): string {
    const start = this.position;
    while (this.isDigit()) {
      this.position++;
    }
    return this.text.slice(start, this.position);
  }

  /**
   * Content between `open` and its matching `close`, nested pairs kept.
   */
  readBalanced(open: string, close: string): string {
    const start = this.position;
    this.expect(open);

    let depth = 1;
    while (!this.eof) {
      const char = this.peek();
      this.position++;
      if (char === open) {
        depth++;
      } else if (char === close) {
        depth--;
        if (depth === 0) {
          return this.text.slice(start + 1, this.position - 1);
        }
      }
    }
    throw new BibtexSyntaxError(`Unterminated '${open}'`, start);
  }

  /**
   * Content of a `"..."` string. Quotes inside braces do not end it.
   */
  readQuoted(): string {
    const start = this.position;
    this.expect('"');

    let depth = 0;
    while (!this.eof) {
      const char = this.peek();
      this.position++;
      if (char === '{') {
        depth++;
      } else if (char === '}') {
        depth--;
      } else if (char === '"' && depth === 0) {
        return this.text.slice(start + 1, this.position - 1);
      }
    }
    throw new BibtexSyntaxError('Unterminated quoted string', start);
  }

  error(message: string): BibtexSyntaxError {
    const found = this.eof ? 'end of input' : `'${this.peek()}'`;
    return new BibtexSyntaxError(`${message}, found ${found}`, this.position);
  }
}
