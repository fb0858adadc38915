/**
 * Content stream tokenizer.
 *
 * Splits decoded page content into operations, keeping the byte range of
 * each one so a rewriter can splice replacements into the original bytes.
 */

export type Operand =
  | { type: 'number'; value: number }
  | { type: 'string'; value: Uint8Array }
  | { type: 'name'; value: string }
  | { type: 'array'; value: Operand[] }
  | { type: 'other' };

export interface ContentOperation {
  readonly operator: string;
  readonly operands: Operand[];
  /** Offset of the first operand (or of the operator when it has none). */
  readonly start: number;
  /** Offset just past the operator keyword. */
  readonly end: number;
}

type Token =
  | { kind: 'operand'; operand: Operand; offset: number }
  | { kind: 'keyword'; value: string; offset: number }
  | { kind: 'arrayStart'; offset: number }
  | { kind: 'arrayEnd'; offset: number }
  | { kind: 'dictStart'; offset: number }
  | { kind: 'dictEnd'; offset: number }
  | { kind: 'eof'; offset: number };

const WHITESPACE = new Set([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20]);
const DELIMITERS = new Set([0x28, 0x29, 0x3c, 0x3e, 0x5b, 0x5d, 0x7b, 0x7d, 0x2f, 0x25]);

function isWhitespace(byte: number): boolean {
  return WHITESPACE.has(byte);
}

function isDelimiter(byte: number): boolean {
  return DELIMITERS.has(byte);
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

function isOctalDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x37;
}

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

export class ContentLexer {
  private pos = 0;

  constructor(private readonly data: Uint8Array) {}

  get position(): number {
    return this.pos;
  }

  private byteAt(offset: number): number {
    return offset < this.data.length ? (this.data[offset] ?? -1) : -1;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.data.length) {
      const byte = this.byteAt(this.pos);
      if (isWhitespace(byte)) {
        this.pos += 1;
        continue;
      }
      if (byte === 0x25) {
        while (this.pos < this.data.length) {
          const next = this.byteAt(this.pos++);
          if (next === 0x0a || next === 0x0d) break;
        }
        continue;
      }
      break;
    }
  }

  nextToken(): Token {
    this.skipWhitespaceAndComments();
    const offset = this.pos;

    if (this.pos >= this.data.length) {
      return { kind: 'eof', offset };
    }

    const byte = this.byteAt(this.pos);
    const next = this.byteAt(this.pos + 1);

    if (byte === 0x3c && next === 0x3c) {
      this.pos += 2;
      return { kind: 'dictStart', offset };
    }
    if (byte === 0x3e && next === 0x3e) {
      this.pos += 2;
      return { kind: 'dictEnd', offset };
    }
    if (byte === 0x3c) {
      return { kind: 'operand', operand: { type: 'string', value: this.readHexString() }, offset };
    }
    if (byte === 0x28) {
      return { kind: 'operand', operand: { type: 'string', value: this.readLiteralString() }, offset };
    }
    if (byte === 0x5b) {
      this.pos += 1;
      return { kind: 'arrayStart', offset };
    }
    if (byte === 0x5d) {
      this.pos += 1;
      return { kind: 'arrayEnd', offset };
    }
    if (byte === 0x2f) {
      return { kind: 'operand', operand: { type: 'name', value: this.readName() }, offset };
    }
    if (isDigit(byte) || byte === 0x2d || byte === 0x2b || byte === 0x2e) {
      const value = this.readNumber();
      if (value !== null) {
        return { kind: 'operand', operand: { type: 'number', value }, offset };
      }
    }

    const word = this.readRegular();
    if (word.length === 0) {
      // Stray delimiter such as '{', '}' or ')'.
      this.pos += 1;
      return this.nextToken();
    }
    if (word === 'true' || word === 'false' || word === 'null') {
      return { kind: 'operand', operand: { type: 'other' }, offset };
    }
    return { kind: 'keyword', value: word, offset };
  }

  private readHexString(): Uint8Array {
    this.pos += 1;
    const bytes: number[] = [];
    let high = -1;

    while (this.pos < this.data.length) {
      const byte = this.byteAt(this.pos++);
      if (byte === 0x3e) break;
      const value = hexValue(byte);
      if (value < 0) continue;
      if (high < 0) {
        high = value;
      } else {
        bytes.push((high << 4) | value);
        high = -1;
      }
    }

    if (high >= 0) {
      bytes.push(high << 4);
    }
    return Uint8Array.from(bytes);
  }

  private readLiteralString(): Uint8Array {
    this.pos += 1;
    const bytes: number[] = [];
    let depth = 1;

    while (this.pos < this.data.length) {
      const byte = this.byteAt(this.pos++);

      if (byte === 0x28) {
        depth += 1;
        bytes.push(byte);
        continue;
      }
      if (byte === 0x29) {
        depth -= 1;
        if (depth === 0) break;
        bytes.push(byte);
        continue;
      }
      if (byte !== 0x5c) {
        bytes.push(byte);
        continue;
      }

      const escaped = this.byteAt(this.pos++);
      switch (escaped) {
        case 0x6e: bytes.push(0x0a); break;
        case 0x72: bytes.push(0x0d); break;
        case 0x74: bytes.push(0x09); break;
        case 0x62: bytes.push(0x08); break;
        case 0x66: bytes.push(0x0c); break;
        case 0x0a: break;
        case 0x0d:
          if (this.byteAt(this.pos) === 0x0a) this.pos += 1;
          break;
        case -1: break;
        default:
          if (isOctalDigit(escaped)) {
            let code = escaped - 0x30;
            for (let count = 0; count < 2 && isOctalDigit(this.byteAt(this.pos)); count += 1) {
              code = (code << 3) | (this.byteAt(this.pos++) - 0x30);
            }
            bytes.push(code & 0xff);
          } else {
            bytes.push(escaped);
          }
      }
    }

    return Uint8Array.from(bytes);
  }

  private readName(): string {
    this.pos += 1;
    let name = '';

    while (this.pos < this.data.length) {
      const byte = this.byteAt(this.pos);
      if (isWhitespace(byte) || isDelimiter(byte)) break;

      if (byte === 0x23) {
        const high = hexValue(this.byteAt(this.pos + 1));
        const low = hexValue(this.byteAt(this.pos + 2));
        if (high >= 0 && low >= 0) {
          name += String.fromCharCode((high << 4) | low);
          this.pos += 3;
          continue;
        }
      }

      name += String.fromCharCode(byte);
      this.pos += 1;
    }

    return name;
  }

  private readNumber(): number | null {
    const start = this.pos;
    let text = '';

    if (this.byteAt(this.pos) === 0x2d || this.byteAt(this.pos) === 0x2b) {
      text += String.fromCharCode(this.byteAt(this.pos++));
    }

    let seenPoint = false;
    while (this.pos < this.data.length) {
      const byte = this.byteAt(this.pos);
      if (isDigit(byte)) {
        text += String.fromCharCode(byte);
      } else if (byte === 0x2e && !seenPoint) {
        seenPoint = true;
        text += '.';
      } else {
        break;
      }
      this.pos += 1;
    }

    const value = Number.parseFloat(text);
    if (Number.isNaN(value)) {
      // A lone sign or point; some writers emit "-.5" or "." glitches.
      if (text === '-' || text === '+' || text === '.' || text === '-.' || text === '+.') {
        return 0;
      }
      this.pos = start;
      return null;
    }
    return value;
  }

  private readRegular(): string {
    let word = '';
    while (this.pos < this.data.length) {
      const byte = this.byteAt(this.pos);
      if (isWhitespace(byte) || isDelimiter(byte)) break;
      word += String.fromCharCode(byte);
      this.pos += 1;
    }
    return word;
  }

  /**
   * Skip inline image data after the `ID` keyword, leaving the lexer just past
   * the closing `EI`.
   */
  skipInlineImageData(): void {
    this.pos += 1;
    while (this.pos + 1 < this.data.length) {
      const isEnd = this.byteAt(this.pos) === 0x45
        && this.byteAt(this.pos + 1) === 0x49
        && isWhitespace(this.byteAt(this.pos - 1))
        && (this.pos + 2 >= this.data.length || isWhitespace(this.byteAt(this.pos + 2)) || isDelimiter(this.byteAt(this.pos + 2)));
      if (isEnd) {
        this.pos += 2;
        return;
      }
      this.pos += 1;
    }
    this.pos = this.data.length;
  }
}

function collectArray(lexer: ContentLexer): Operand[] {
  const items: Operand[] = [];

  for (;;) {
    const token = lexer.nextToken();
    switch (token.kind) {
      case 'eof':
      case 'arrayEnd':
        return items;
      case 'arrayStart':
        items.push({ type: 'array', value: collectArray(lexer) });
        break;
      case 'dictStart':
        skipDictionary(lexer);
        items.push({ type: 'other' });
        break;
      case 'operand':
        items.push(token.operand);
        break;
      default:
        items.push({ type: 'other' });
    }
  }
}

function skipDictionary(lexer: ContentLexer): void {
  let depth = 1;
  while (depth > 0) {
    const token = lexer.nextToken();
    if (token.kind === 'eof') return;
    if (token.kind === 'dictStart') depth += 1;
    if (token.kind === 'dictEnd') depth -= 1;
  }
}

export function parseContentOperations(data: Uint8Array): ContentOperation[] {
  const lexer = new ContentLexer(data);
  const operations: ContentOperation[] = [];
  let operands: Operand[] = [];
  let operandStart = -1;

  const markStart = (offset: number): void => {
    if (operandStart < 0) operandStart = offset;
  };

  for (;;) {
    const token = lexer.nextToken();

    if (token.kind === 'eof') break;

    switch (token.kind) {
      case 'operand':
        markStart(token.offset);
        operands.push(token.operand);
        continue;
      case 'arrayStart':
        markStart(token.offset);
        operands.push({ type: 'array', value: collectArray(lexer) });
        continue;
      case 'dictStart':
        markStart(token.offset);
        skipDictionary(lexer);
        operands.push({ type: 'other' });
        continue;
      case 'arrayEnd':
      case 'dictEnd':
        continue;
      case 'keyword': {
        const start = operandStart >= 0 ? operandStart : token.offset;

        if (token.value === 'BI') {
          // Inline image: dictionary entries up to ID, then raw bytes up to EI.
          for (;;) {
            const inner = lexer.nextToken();
            if (inner.kind === 'eof') break;
            if (inner.kind === 'keyword' && inner.value === 'ID') {
              lexer.skipInlineImageData();
              break;
            }
          }
        }

        operations.push({ operator: token.value, operands, start, end: lexer.position });
        operands = [];
        operandStart = -1;
      }
    }
  }

  return operations;
}
