// Applesoft and Integer BASIC detokenizers

import applesoftTokens from './data/applesoft-tokens.json' with { type: 'json' };
import integerTokens from './data/integer-basic-tokens.json' with { type: 'json' };
import { ByteReader } from './bytereader.js';
import { CorruptDocumentError, DecodeError, TooShortError } from './errors.js';
import { hexByte, printableChar } from './textio.js';

export type BasicDialect = 'applesoft' | 'integer';

export type FragmentKind = 'text' | 'keyword' | 'string' | 'comment';

export interface TokenFragment {
  kind: FragmentKind;
  text: string;
}

export interface TokenLine {
  lineNumber: number;
  fragments: TokenFragment[];
}

export const MAX_LINE_NUMBER = 63999;

const APPLESOFT_FIRST_TOKEN = applesoftTokens.firstToken;
const APPLESOFT_TOKENS: string[] = applesoftTokens.tokens;
const INTEGER_TOKENS: string[] = integerTokens.tokens;

// Keywords followed by one space
const STATEMENT_KEYWORDS = new Set([
  'GOTO', 'GOSUB', 'THEN', 'IF', 'FOR', 'NEXT', 'TO', 'STEP',
  'LET', 'DIM', 'DEF', 'ON', 'PRINT', 'INPUT', 'READ', 'DATA',
  'POKE', 'CALL', 'HTAB', 'VTAB', 'HCOLOR=', 'COLOR=', 'SPEED=',
  'HPLOT', 'PLOT', 'DRAW', 'XDRAW', 'AT', 'ONERR', 'RESUME',
  'HIMEM:', 'LOMEM:', 'WAIT', 'GET', 'HOME', 'TEXT', 'GR', 'HGR', 'HGR2',
  'LOAD', 'SAVE', 'DEL', 'RUN', 'LIST', 'ROT=', 'SCALE=', 'PR#', 'IN#',
]);

// Comparison and logical operators: one space on each side
const SPACED_OPERATORS = new Set(['=', '<', '>', 'AND', 'OR', 'NOT']);

// Never given a space before them
const TIGHT_OPERATORS = new Set(['+', '-', '*', '/', '^', '(', ')', ',', ';']);

const APPLESOFT_QUOTE = 0x22;
const APPLESOFT_COLON = 0x3a;

const INTEGER_EOL = 0x01;
const INTEGER_OPEN_QUOTE = 0x28;
const INTEGER_CLOSE_QUOTE = 0x29;
const INTEGER_REM = 0x5d;

class LineBuilder {
  readonly fragments: TokenFragment[] = [];

  push(kind: FragmentKind, text: string): void {
    if (text.length === 0) {
      return;
    }
    const last = this.fragments[this.fragments.length - 1];
    if (last && last.kind === kind && kind !== 'keyword') {
      last.text += text;
    } else {
      this.fragments.push({ kind, text });
    }
  }

  lastChar(): string {
    const last = this.fragments[this.fragments.length - 1];
    return last ? last.text.charAt(last.text.length - 1) : '';
  }

  finish(lineNumber: number): TokenLine {
    const last = this.fragments[this.fragments.length - 1];
    if (last && last.kind === 'text') {
      last.text = last.text.replace(/ +$/, '');
      if (last.text.length === 0) {
        this.fragments.pop();
      }
    }
    return { lineNumber, fragments: this.fragments };
  }
}

export function applesoftToken(byte: number): string | undefined {
  const index = byte - APPLESOFT_FIRST_TOKEN;
  return index >= 0 && index < APPLESOFT_TOKENS.length ? APPLESOFT_TOKENS[index] : undefined;
}

const APPLESOFT_START = 0x0801;

// A first word of $0801 cannot be line 1's next-line pointer (it would point at itself),
// so it is the program's start address stored ahead of the lines
function applesoftStart(data: Uint8Array): number {
  return data.length >= 2 && (data[0] | (data[1] << 8)) === APPLESOFT_START ? 2 : 0;
}

function emitApplesoftKeyword(line: LineBuilder, keyword: string): void {
  // The line number's separator counts as the previous character
  const previous = line.lastChar() || ' ';

  if (SPACED_OPERATORS.has(keyword)) {
    if (previous !== ' ' && previous !== '(') {
      line.push('text', ' ');
    }
  } else if (/[A-Za-z0-9]/.test(previous)) {
    // TAB( and HCOLOR= style keywords attach to what comes before
    const attaches = TIGHT_OPERATORS.has(keyword) || keyword.endsWith('(') || keyword.endsWith('=') || keyword.endsWith(':');
    if (!attaches) {
      line.push('text', ' ');
    }
  }

  line.push('keyword', keyword);
  if (SPACED_OPERATORS.has(keyword) || STATEMENT_KEYWORDS.has(keyword)) {
    line.push('text', ' ');
  }
}

type LexState = 'normal' | 'quote' | 'rem' | 'data';

function readApplesoftLine(reader: ByteReader, lineNumber: number): TokenLine {
  const line = new LineBuilder();
  let state: LexState = 'normal';
  // A quote opened inside DATA returns to DATA when it closes
  let afterQuote: LexState = 'normal';

  for (;;) {
    if (reader.remaining() === 0) {
      throw new CorruptDocumentError(`line ${lineNumber} has no terminating zero byte`);
    }
    const byte = reader.readU8();
    if (byte === 0x00) {
      break;
    }

    switch (state) {
      case 'quote':
        line.push('string', byte === APPLESOFT_QUOTE ? '"' : printableChar(byte));
        if (byte === APPLESOFT_QUOTE) {
          state = afterQuote;
        }
        break;

      case 'rem':
        line.push('comment', printableChar(byte));
        break;

      case 'data':
        if (byte === APPLESOFT_COLON) {
          line.push('text', ':');
          state = 'normal';
        } else if (byte === APPLESOFT_QUOTE) {
          line.push('string', '"');
          afterQuote = 'data';
          state = 'quote';
        } else {
          line.push('text', printableChar(byte));
        }
        break;

      case 'normal':
        if (byte >= 0x80) {
          const keyword = applesoftToken(byte);
          if (keyword === undefined) {
            line.push('text', `[?${hexByte(byte)}]`);
            break;
          }
          emitApplesoftKeyword(line, keyword);
          if (keyword === 'REM') {
            state = 'rem';
          } else if (keyword === 'DATA') {
            state = 'data';
          }
        } else if (byte === APPLESOFT_QUOTE) {
          line.push('string', '"');
          afterQuote = 'normal';
          state = 'quote';
        } else if (byte === APPLESOFT_COLON) {
          line.push('text', ' : ');
        } else {
          line.push('text', printableChar(byte));
        }
        break;
    }
  }

  return line.finish(lineNumber);
}

export function* applesoftLines(data: Uint8Array): Generator<TokenLine> {
  if (data.length < 2) {
    throw new TooShortError(`Applesoft program of ${data.length} bytes has no line header`);
  }

  const reader = new ByteReader(data, applesoftStart(data));
  while (reader.remaining() >= 2) {
    // Next-line pointers are absolute memory addresses; only zero matters here
    const nextLine = reader.readU16LE();
    if (nextLine === 0) {
      return;
    }
    if (reader.remaining() < 2) {
      throw new CorruptDocumentError(`line header at offset ${reader.offset - 2} is truncated`);
    }
    const lineNumber = reader.readU16LE();
    if (lineNumber > MAX_LINE_NUMBER) {
      throw new CorruptDocumentError(`line number ${lineNumber} at offset ${reader.offset - 2} is out of range`);
    }
    yield readApplesoftLine(reader, lineNumber);
  }
}

function readIntegerLine(data: Uint8Array, start: number, end: number, lineNumber: number): TokenLine {
  const reader = new ByteReader(data.subarray(0, end), start);
  const line = new LineBuilder();
  // The line number separator counts as a trailing space
  let trailingSpace = true;

  while (reader.remaining() > 0) {
    const byte = reader.readU8();
    if (byte === INTEGER_EOL) {
      break;
    }
    let nextTrailingSpace = false;

    if (byte === INTEGER_OPEN_QUOTE) {
      let literal = '"';
      while (reader.remaining() > 0 && reader.peek() !== INTEGER_CLOSE_QUOTE && reader.peek() !== INTEGER_EOL) {
        literal += printableChar(reader.readU8());
      }
      if (reader.remaining() > 0 && reader.peek() === INTEGER_CLOSE_QUOTE) {
        reader.skip(1);
      }
      line.push('string', literal + '"');
    } else if (byte === INTEGER_REM) {
      if (!trailingSpace) {
        line.push('text', ' ');
      }
      line.push('keyword', 'REM');
      line.push('text', ' ');
      let comment = '';
      while (reader.remaining() > 0 && reader.peek() !== INTEGER_EOL) {
        comment += printableChar(reader.readU8());
      }
      line.push('comment', comment);
    } else if (byte >= 0xb0 && byte <= 0xb9) {
      // Integer constant: the digit byte is followed by its 16-bit value
      line.push('text', String(reader.readU16LE()));
    } else if (byte >= 0xc1 && byte <= 0xda) {
      let name = String.fromCharCode(byte & 0x7f);
      while (reader.remaining() > 0) {
        const next = reader.peek();
        if (!((next >= 0xc1 && next <= 0xda) || (next >= 0xb0 && next <= 0xb9))) {
          break;
        }
        name += String.fromCharCode(reader.readU8() & 0x7f);
      }
      line.push('text', name);
    } else if (byte < 0x80) {
      const token = INTEGER_TOKENS[byte];
      if (token.length > 0) {
        const first = token.charCodeAt(0);
        const punctuation = (first >= 0x21 && first <= 0x3f) || byte < 0x12;
        if (!punctuation && !trailingSpace) {
          line.push('text', ' ');
        }
        const word = token.trimEnd();
        line.push(/^[A-Z]/.test(word) ? 'keyword' : 'text', word);
        if (token.endsWith(' ')) {
          line.push('text', ' ');
          nextTrailingSpace = true;
        }
      }
    } else {
      line.push('text', printableChar(byte));
    }

    trailingSpace = nextTrailingSpace;
  }

  return line.finish(lineNumber);
}

export function* integerBasicLines(data: Uint8Array): Generator<TokenLine> {
  if (data.length < 4) {
    throw new TooShortError(`Integer BASIC program of ${data.length} bytes is shorter than one line`);
  }

  let offset = 0;
  while (offset < data.length) {
    const lineLength = data[offset];
    if (lineLength === 0) {
      return;
    }
    if (lineLength < 4 || offset + lineLength > data.length) {
      throw new CorruptDocumentError(`line at offset ${offset} declares ${lineLength} bytes, ${data.length - offset} remain`);
    }
    const lineNumber = data[offset + 1] | (data[offset + 2] << 8);
    yield readIntegerLine(data, offset + 3, offset + lineLength, lineNumber);
    offset += lineLength;
  }
}

export function basicLines(data: Uint8Array, dialect: BasicDialect): Generator<TokenLine> {
  return dialect === 'applesoft' ? applesoftLines(data) : integerBasicLines(data);
}

// Whole-program decode; a damaged line fails the program
export function detokenize(data: Uint8Array, dialect: BasicDialect): TokenLine[] {
  return Array.from(basicLines(data, dialect));
}

export function lineText(line: TokenLine): string {
  return `${String(line.lineNumber).padStart(5)} ${line.fragments.map(fragment => fragment.text).join('')}`;
}

export function basicListing(data: Uint8Array, dialect: BasicDialect): string {
  try {
    return detokenize(data, dialect).map(lineText).join('\n');
  } catch (error) {
    if (error instanceof DecodeError) {
      return `// Invalid program (${error.message})`;
    }
    throw error;
  }
}

export function isApplesoftProgram(data: Uint8Array): boolean {
  const start = applesoftStart(data);
  if (data.length < start + 4) {
    return false;
  }
  const pointer = data[start] | (data[start + 1] << 8);
  const lineNumber = data[start + 2] | (data[start + 3] << 8);
  return pointer >= 0x0800 && pointer < 0xc000 && lineNumber <= MAX_LINE_NUMBER;
}

export function isIntegerBasicProgram(data: Uint8Array): boolean {
  if (data.length < 4) {
    return false;
  }
  const lineLength = data[0];
  if (lineLength < 4 || lineLength > data.length || data[lineLength - 1] !== INTEGER_EOL) {
    return false;
  }
  return (data[1] | (data[2] << 8)) <= 32767;
}
