// Teach documents: Mac OS Roman text with TextEdit styles in the resource fork

import type { DecodeOptions } from './types.js';
import type { DocumentLine, EnhancedRun, EnhancedWordProcessorDoc } from './appleworks.js';
import { ByteReader } from './bytereader.js';
import { CorruptDocumentError, asCorruptDocument, attempt } from './errors.js';
import { IIGS_STANDARD_PALETTE } from './graphics.js';
import { IIgsResourceForkParser, findResource } from './resfork.js';
import { resolveOptions, warn } from './options.js';
import { macRomanChar } from './textio.js';

export const TEACH_FILE_TYPE = 0x50;
export const TEACH_AUX_TYPE = 0x5445;

const R_STYLE_BLOCK = 0x8012;
const TE_STYLE_SIZE = 12;
const UNUSED_STYLE_ITEM = 0xffffffff;

const DEFAULT_FAMILY = 0x0003; // Geneva
const DEFAULT_SIZE = 12;

const STYLE_BOLD = 0x01;
const STYLE_ITALIC = 0x02;
const STYLE_UNDERLINE = 0x04;
const STYLE_SUPERSCRIPT = 0x40;
const STYLE_SUBSCRIPT = 0x80;

export interface TeachStyle {
  fontFamily: number;
  styleFlags: number;
  fontSize: number;
  foreColor: number;
}

export interface TeachStyleItem {
  length: number;
  style: TeachStyle;
}

// Text from the data fork runs through the items in order
export interface TeachFormat {
  styles: TeachStyle[];
  items: TeachStyleItem[];
}

export function isTeachDocument(fileType: number, auxType: number): boolean {
  return fileType === TEACH_FILE_TYPE && auxType === TEACH_AUX_TYPE;
}

// TEFormat record as saved in rStyleBlock
export function readTeachFormat(block: Uint8Array): TeachFormat {
  return asCorruptDocument('Teach style block', () => {
    const reader = new ByteReader(block);
    const version = reader.readU16LE();
    if (version !== 0) {
      throw new CorruptDocumentError(`style block version ${version} is not 0`);
    }
    reader.skip(reader.readU32LE()); // rulers

    const styleListLength = reader.readU32LE();
    const styleEnd = reader.offset + styleListLength;
    const styles: TeachStyle[] = [];
    while (reader.offset + TE_STYLE_SIZE <= styleEnd) {
      const fontFamily = reader.readU16LE();
      const styleFlags = reader.readU8();
      const fontSize = reader.readU8() || DEFAULT_SIZE;
      const foreColor = reader.readU16LE();
      reader.skip(6); // back colour, user data
      styles.push({ fontFamily, styleFlags, fontSize, foreColor });
    }
    reader.seek(styleEnd);
    if (styles.length === 0) {
      throw new CorruptDocumentError('style block holds no styles');
    }

    const itemCount = reader.readU32LE();
    const items: TeachStyleItem[] = [];
    for (let i = 0; i < itemCount && reader.remaining() >= 8; i++) {
      const length = reader.readU32LE();
      const styleOffset = reader.readU32LE();
      if (length === UNUSED_STYLE_ITEM) {
        continue;
      }
      items.push({ length, style: styles[Math.floor(styleOffset / TE_STYLE_SIZE)] ?? styles[0] });
    }
    return { styles, items };
  });
}

export function readTeachResourceFork(resourceFork: Uint8Array): TeachFormat {
  const fork = IIgsResourceForkParser.fromBytes(resourceFork);
  const block = findResource(fork, R_STYLE_BLOCK, 1);
  if (!block) {
    throw new CorruptDocumentError('resource fork has no style block');
  }
  return readTeachFormat(block.data);
}

function styledRun(text: string, style: TeachStyle): EnhancedRun {
  return {
    text,
    bold: (style.styleFlags & STYLE_BOLD) !== 0,
    italic: (style.styleFlags & STYLE_ITALIC) !== 0,
    underline: (style.styleFlags & STYLE_UNDERLINE) !== 0,
    superscript: (style.styleFlags & STYLE_SUPERSCRIPT) !== 0,
    subscript: (style.styleFlags & STYLE_SUBSCRIPT) !== 0,
    fontFamily: style.fontFamily,
    fontSize: style.fontSize,
    colorIndex: style.foreColor & 0x0f,
  };
}

function teachChar(byte: number): string {
  if (byte === 0x09) {
    return '\t';
  }
  return byte >= 0x20 ? macRomanChar(byte) : '';
}

export function decodeTeachText(data: Uint8Array): string {
  let text = '';
  for (const byte of data) {
    text += byte === 0x0d ? '\n' : teachChar(byte);
  }
  return text;
}

// Byte ranges of the data fork paired with the style that covers them
function styleSpans(length: number, format: TeachFormat | undefined): { start: number; end: number; style: TeachStyle }[] {
  const plain: TeachStyle = {
    fontFamily: format?.styles[0].fontFamily ?? DEFAULT_FAMILY,
    styleFlags: 0,
    fontSize: format?.styles[0].fontSize ?? DEFAULT_SIZE,
    foreColor: 0,
  };
  const spans: { start: number; end: number; style: TeachStyle }[] = [];
  let start = 0;
  for (const item of format?.items ?? []) {
    const end = Math.min(start + item.length, length);
    if (end > start) {
      spans.push({ start, end, style: item.style });
      start = end;
    }
  }
  if (start < length) {
    spans.push({ start, end: length, style: plain });
  }
  return spans;
}

export function decodeTeachDocument(data: Uint8Array, resourceFork?: Uint8Array, options: DecodeOptions = {}): EnhancedWordProcessorDoc {
  let format: TeachFormat | undefined;
  if (resourceFork && resourceFork.length > 0) {
    const result = attempt(() => readTeachResourceFork(resourceFork));
    if (result.ok) {
      format = result.value;
    } else {
      warn(resolveOptions(options), `Teach styles unreadable, showing plain text: ${result.error.message}`);
    }
  }

  const lines: DocumentLine<EnhancedRun>[] = [];
  let runs: EnhancedRun[] = [];
  for (const { start, end, style } of styleSpans(data.length, format)) {
    let text = '';
    for (let i = start; i < end; i++) {
      if (data[i] !== 0x0d) {
        text += teachChar(data[i]);
        continue;
      }
      if (text) {
        runs.push(styledRun(text, style));
        text = '';
      }
      lines.push({ runs, alignment: 'left', pageBreak: false });
      runs = [];
    }
    if (text) {
      runs.push(styledRun(text, style));
    }
  }
  if (runs.length > 0 || lines.length === 0) {
    lines.push({ runs, alignment: 'left', pageBreak: false });
  }

  return {
    kind: 'wordProcessor',
    variant: 'enhanced',
    lines,
    palette: [...IIGS_STANDARD_PALETTE],
    plainText: decodeTeachText(data),
  };
}
