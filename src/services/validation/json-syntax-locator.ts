/**
 * Pinpoints where a JSON document stops conforming to RFC 8259.
 *
 * `JSON.parse` decides validity; its error messages differ between V8 releases and often
 * omit the position, so the first offending offset is found by rescanning the text.
 */

export type SyntaxLocation = {
  column: number;
  line: number;
  offset: number;
  reason: string;
};

const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const BYTE_ORDER_MARK = 0xfe_ff;
const SIMPLE_ESCAPES = new Set(['"', '\\', '/', 'b', 'f', 'n', 'r', 't']);

type Container = '{' | '[';

class ScanFailure extends Error {
  constructor(
    readonly offset: number,
    readonly reason: string,
  ) {
    super(reason);
    this.name = 'ScanFailure';
  }
}

/**
 * 1-based line and column of a UTF-16 offset. LF, CRLF and a lone CR each end a line.
 */
export function lineColumnAt(text: string, offset: number): { column: number; line: number } {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, text.length);

  for (let index = 0; index < end; index++) {
    const code = text.charCodeAt(index);
    if (code === CARRIAGE_RETURN && text.charCodeAt(index + 1) === LINE_FEED) {
      continue;
    }
    if (code === LINE_FEED || code === CARRIAGE_RETURN) {
      line++;
      lineStart = index + 1;
    }
  }

  return { line, column: offset - lineStart + 1 };
}

class JsonScanner {
  private _position = 0;

  constructor(private readonly _text: string) {}

  scan(): void {
    if (this._text.charCodeAt(0) === BYTE_ORDER_MARK) {
      this._fail(0, 'unexpected byte order mark');
    }
    this._skipWhitespace();
    this._document();
    this._skipWhitespace();
    if (!this._atEnd()) {
      this._fail(this._position, 'unexpected content after JSON value');
    }
  }

  private _atEnd(): boolean {
    return this._position >= this._text.length;
  }

  private _peek(): string {
    return this._text.charAt(this._position);
  }

  private _fail(offset: number, reason: string): never {
    throw new ScanFailure(offset, reason);
  }

  private _expectMore(): void {
    if (this._atEnd()) {
      this._fail(this._position, 'unexpected end of input');
    }
  }

  private _skipWhitespace(): void {
    while (!this._atEnd()) {
      const char = this._peek();
      if (char !== ' ' && char !== '\t' && char !== '\n' && char !== '\r') {
        return;
      }
      this._position++;
    }
  }

  /**
   * One top-level value. Open objects and arrays live on an explicit stack, so nesting
   * depth is bounded by memory rather than the call stack.
   */
  private _document(): void {
    const open: Container[] = [];

    for (;;) {
      this._skipWhitespace();
      this._expectMore();
      const char = this._peek();

      if (char === '{' || char === '[') {
        this._position++;
        this._skipWhitespace();
        const close = char === '{' ? '}' : ']';
        if (this._peek() !== close) {
          open.push(char);
          if (char === '{') {
            this._propertyName();
          }
          continue;
        }
        this._position++;
      } else {
        this._scalar(char);
      }

      // A value just ended: consume separators and closers until the next value starts
      for (;;) {
        const container = open[open.length - 1];
        if (container === undefined) {
          return;
        }

        this._skipWhitespace();
        this._expectMore();
        const separator = this._peek();
        this._position++;

        if (container === '{') {
          if (separator === '}') {
            open.pop();
            continue;
          }
          if (separator !== ',') {
            this._fail(this._position - 1, "expected ',' or '}' after property value");
          }
          this._propertyName();
          break;
        }

        if (separator === ']') {
          open.pop();
          continue;
        }
        if (separator !== ',') {
          this._fail(this._position - 1, "expected ',' or ']' after array element");
        }
        break;
      }
    }
  }

  private _propertyName(): void {
    this._skipWhitespace();
    this._expectMore();
    if (this._peek() !== '"') {
      this._fail(this._position, 'expected double-quoted property name');
    }
    this._string();

    this._skipWhitespace();
    this._expectMore();
    if (this._peek() !== ':') {
      this._fail(this._position, "expected ':' after property name");
    }
    this._position++;
  }

  private _scalar(char: string): void {
    if (char === '"') {
      this._string();
    } else if (char === '-' || isDigit(char)) {
      this._number();
    } else if (char === 't') {
      this._literal('true');
    } else if (char === 'f') {
      this._literal('false');
    } else if (char === 'n') {
      this._literal('null');
    } else {
      this._fail(this._position, `unexpected character ${describeChar(char)}`);
    }
  }

  private _string(): void {
    // Opening quote
    this._position++;

    for (;;) {
      if (this._atEnd()) {
        this._fail(this._position, 'unterminated string');
      }
      const char = this._peek();

      if (char === '"') {
        this._position++;
        return;
      }

      if (char === '\\') {
        this._escape();
        continue;
      }

      if (char.charCodeAt(0) < 0x20) {
        this._fail(this._position, 'unescaped control character in string');
      }
      this._position++;
    }
  }

  private _escape(): void {
    const start = this._position;
    const marker = this._text.charAt(start + 1);

    if (marker === '') {
      this._fail(start + 1, 'unterminated string');
    }
    if (SIMPLE_ESCAPES.has(marker)) {
      this._position += 2;
      return;
    }
    if (marker === 'u' && /^[\dA-Fa-f]{4}$/.test(this._text.slice(start + 2, start + 6))) {
      this._position += 6;
      return;
    }
    this._fail(start, 'invalid escape sequence');
  }

  private _number(): void {
    if (this._peek() === '-') {
      this._position++;
    }

    if (this._peek() === '0') {
      this._position++;
    } else if (isDigit(this._peek())) {
      this._digits();
    } else {
      this._fail(this._position, 'invalid number');
    }

    if (this._peek() === '.') {
      this._position++;
      this._requireDigits();
    }

    if (this._peek() === 'e' || this._peek() === 'E') {
      this._position++;
      if (this._peek() === '+' || this._peek() === '-') {
        this._position++;
      }
      this._requireDigits();
    }
  }

  private _requireDigits(): void {
    if (!isDigit(this._peek())) {
      this._fail(this._position, 'invalid number');
    }
    this._digits();
  }

  private _digits(): void {
    while (isDigit(this._peek())) {
      this._position++;
    }
  }

  private _literal(word: 'true' | 'false' | 'null'): void {
    for (let index = 0; index < word.length; index++) {
      const offset = this._position + index;
      if (offset >= this._text.length) {
        this._fail(offset, 'unexpected end of input');
      }
      if (this._text.charAt(offset) !== word.charAt(index)) {
        this._fail(offset, `unexpected character ${describeChar(this._text.charAt(offset))}`);
      }
    }
    this._position += word.length;
  }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9' && char.length === 1;
}

function describeChar(char: string): string {
  const code = char.charCodeAt(0);
  if (code < 0x20 || code === 0x7f) {
    return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
  }
  return `'${char}'`;
}

/**
 * First grammar violation in `text`, or undefined when the text is valid JSON.
 */
export function locateSyntaxError(text: string): SyntaxLocation | undefined {
  try {
    new JsonScanner(text).scan();
    return undefined;
  } catch (error) {
    if (error instanceof ScanFailure) {
      return { ...lineColumnAt(text, error.offset), offset: error.offset, reason: error.reason };
    }
    throw error;
  }
}

/**
 * Location for a document `JSON.parse` rejected. Falls back to the parser's own message,
 * positioned where it says or at end of input, if the rescan finds no violation.
 */
export function locateParseFailure(text: string, parseError: unknown): SyntaxLocation {
  const located = locateSyntaxError(text);
  if (located !== undefined) {
    return located;
  }

  const message = parseError instanceof Error ? parseError.message : String(parseError);
  const positionMatch = /at position (\d+)/.exec(message);
  const offset = positionMatch?.[1] !== undefined ? Number(positionMatch[1]) : text.length;
  const reason = message
    .replace(/\s*in JSON at position \d+.*$/s, '')
    .replace(/\s*\(line \d+ column \d+\)/, '')
    .trim();

  return { ...lineColumnAt(text, offset), offset, reason: reason.length > 0 ? reason : message };
}
