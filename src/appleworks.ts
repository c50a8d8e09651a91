// AppleWorks word processor, database and spreadsheet documents

import type { DecodeOptions, RGB } from './types.js';
import { ByteReader } from './bytereader.js';
import { CorruptDocumentError, TooShortError, UnrecognizedFormatError, asCorruptDocument } from './errors.js';
import { appleWorksChar, macRomanChar } from './textio.js';
import { iigsColor } from './graphics.js';
import { TEACH_AUX_TYPE, decodeTeachDocument } from './teach.js';

export type DocumentKind = 'wordProcessor' | 'gsWordProcessor' | 'teach' | 'database' | 'spreadsheet';

export type Alignment = 'left' | 'center' | 'right' | 'justify';

export interface RunStyle {
  bold: boolean;
  italic: boolean;
  underline: boolean;
  superscript: boolean;
  subscript: boolean;
}

// Classic runs are fixed pitch: there is no font, size or colour to carry
export interface ClassicRun extends RunStyle {
  text: string;
}

export interface EnhancedRun extends ClassicRun {
  fontFamily: number;
  fontSize: number;
  colorIndex: number;
}

export interface DocumentLine<Run extends ClassicRun> {
  runs: Run[];
  alignment: Alignment;
  pageBreak: boolean;
}

export interface ClassicWordProcessorDoc {
  kind: 'wordProcessor';
  variant: 'classic';
  lines: DocumentLine<ClassicRun>[];
  plainText: string;
}

export interface EnhancedWordProcessorDoc {
  kind: 'wordProcessor';
  variant: 'enhanced';
  lines: DocumentLine<EnhancedRun>[];
  palette: RGB[];
  plainText: string;
}

export type WordProcessorDoc = ClassicWordProcessorDoc | EnhancedWordProcessorDoc;

export interface DatabaseDoc {
  kind: 'database';
  categories: string[];
  // Every record has one field per category
  records: string[][];
  plainText: string;
}

export interface SpreadsheetDoc {
  kind: 'spreadsheet';
  // -1 for a sheet without cells
  maxColumn: number;
  // Row n of the sheet is rows[n - 1]; every row holds maxColumn + 1 cells
  rows: string[][];
  plainText: string;
}

export type DocumentModel = WordProcessorDoc | DatabaseDoc | SpreadsheetDoc;

export function documentKindFor(fileType: number, auxType: number = 0): DocumentKind | undefined {
  switch (fileType) {
    case 0x19: return 'database';
    case 0x1a: return 'wordProcessor';
    case 0x1b: return 'spreadsheet';
    case 0x50:
      if (auxType === 0x8010) {
        return 'gsWordProcessor';
      }
      return auxType === TEACH_AUX_TYPE ? 'teach' : undefined;
    default: return undefined;
  }
}

// Only Teach documents read the resource fork, for their styles
export function decodeDocumentAs(
  data: Uint8Array,
  kind: DocumentKind,
  resourceFork?: Uint8Array,
  options: DecodeOptions = {}
): DocumentModel {
  switch (kind) {
    case 'wordProcessor': return decodeWordProcessor(data);
    case 'gsWordProcessor': return decodeGSWordProcessor(data);
    case 'teach': return decodeTeachDocument(data, resourceFork, options);
    case 'database': return decodeDatabase(data);
    case 'spreadsheet': return decodeSpreadsheet(data);
  }
}

export function decodeDocument(data: Uint8Array, fileType: number, auxType: number = 0, resourceFork?: Uint8Array): DocumentModel {
  const kind = documentKindFor(fileType, auxType);
  if (kind === undefined) {
    throw new UnrecognizedFormatError(`File type $${fileType.toString(16).toUpperCase()} is not an AppleWorks document`);
  }
  return decodeDocumentAs(data, kind, resourceFork);
}

const PLAIN_STYLE: RunStyle = { bold: false, italic: false, underline: false, superscript: false, subscript: false };

// Collects text under a changing style and cuts a run at every style change
class RunBuilder<Run extends ClassicRun> {
  readonly runs: Run[] = [];
  text = '';
  private pending = '';
  private readonly makeRun: (text: string) => Run;

  constructor(makeRun: (text: string) => Run) {
    this.makeRun = makeRun;
  }

  append(text: string): void {
    this.pending += text;
    this.text += text;
  }

  flush(): void {
    if (this.pending.length > 0) {
      this.runs.push(this.makeRun(this.pending));
      this.pending = '';
    }
  }
}

function alignmentOf(center: boolean, right: boolean, justify: boolean): Alignment {
  if (justify) {
    return 'justify';
  }
  if (right) {
    return 'right';
  }
  return center ? 'center' : 'left';
}

// Classic word processor

const AWP_HEADER_SIZE = 300;
const AWP_SIGNATURE_OFFSET = 4;
const AWP_SIGNATURE = 79;
const AWP_MIN_VERSION_OFFSET = 183;

const AWP_CODE_TEXT = 0x00;
const AWP_CODE_CARRIAGE_RETURN = 0xd0;
const AWP_CODE_RIGHT_JUSTIFY = 0xd7;
const AWP_CODE_JUSTIFY = 0xdf;
const AWP_CODE_UNJUSTIFY = 0xe0;
const AWP_CODE_CENTER = 0xe1;
const AWP_CODE_NEW_PAGE = 0xe9;
const AWP_RULER = 0xff;

function readAWPText(text: Uint8Array): { runs: ClassicRun[]; text: string } {
  const style: RunStyle = { ...PLAIN_STYLE };
  const builder = new RunBuilder<ClassicRun>(runText => ({ text: runText, ...style }));

  const setStyle = (key: keyof RunStyle, value: boolean) => {
    builder.flush();
    style[key] = value;
  };

  for (const byte of text) {
    switch (byte) {
      case 0x01: setStyle('bold', true); break;
      case 0x02: setStyle('bold', false); break;
      case 0x03: setStyle('superscript', true); break;
      case 0x04: setStyle('superscript', false); break;
      case 0x05: setStyle('subscript', true); break;
      case 0x06: setStyle('subscript', false); break;
      case 0x07: setStyle('underline', true); break;
      case 0x08: setStyle('underline', false); break;
      case 0x09: builder.append('#'); break;
      case 0x0b: builder.append(' '); break;
      case 0x0e: builder.append('[DATE]'); break;
      case 0x0f: builder.append('[TIME]'); break;
      case 0x16:
      case 0x17:
        builder.append('\t');
        break;
      default:
        if (byte >= 0x20) {
          builder.append(appleWorksChar(byte));
        }
    }
  }

  builder.flush();
  return { runs: builder.runs, text: builder.text };
}

export function decodeWordProcessor(data: Uint8Array): ClassicWordProcessorDoc {
  if (data.length < AWP_HEADER_SIZE) {
    throw new TooShortError(`AppleWorks WP file of ${data.length} bytes is shorter than its ${AWP_HEADER_SIZE}-byte header`);
  }
  if (data[AWP_SIGNATURE_OFFSET] !== AWP_SIGNATURE) {
    throw new UnrecognizedFormatError('AppleWorks WP signature byte is missing');
  }

  return asCorruptDocument('AppleWorks WP document', () => {
    const reader = new ByteReader(data, AWP_HEADER_SIZE);
    // Version 3.0 files carry an extra word ahead of the first line record
    if (data[AWP_MIN_VERSION_OFFSET] >= 30) {
      reader.skip(2);
    }

    const lines: DocumentLine<ClassicRun>[] = [];
    const plainLines: string[] = [];
    let alignment: Alignment = 'left';

    for (;;) {
      if (reader.remaining() === 0) {
        throw new CorruptDocumentError('AppleWorks WP document ends without its end marker');
      }
      const recordData = reader.readU8();
      const recordCode = reader.readU8();
      if (recordData === 0xff && recordCode === 0xff) {
        break;
      }

      if (recordCode === AWP_CODE_TEXT) {
        const record = reader.readBytes(recordData);
        if (record.length === 0 || record[0] === AWP_RULER) {
          continue;
        }
        if (record.length < 2) {
          throw new CorruptDocumentError(`text record at offset ${reader.offset - recordData} is ${recordData} byte long`);
        }
        const textLength = record[1] & 0x7f;
        if (2 + textLength > record.length) {
          throw new CorruptDocumentError(`text record at offset ${reader.offset - recordData} declares ${textLength} characters in ${record.length - 2} bytes`);
        }
        const decoded = readAWPText(record.subarray(2, 2 + textLength));
        lines.push({ runs: decoded.runs, alignment, pageBreak: false });
        plainLines.push(decoded.text);
        continue;
      }

      switch (recordCode) {
        case AWP_CODE_CARRIAGE_RETURN:
          lines.push({ runs: [], alignment, pageBreak: false });
          plainLines.push('');
          break;
        case AWP_CODE_CENTER: alignment = 'center'; break;
        case AWP_CODE_RIGHT_JUSTIFY: alignment = 'right'; break;
        case AWP_CODE_JUSTIFY: alignment = 'justify'; break;
        case AWP_CODE_UNJUSTIFY: alignment = 'left'; break;
        case AWP_CODE_NEW_PAGE:
          lines.push({ runs: [], alignment, pageBreak: true });
          plainLines.push('');
          break;
        default:
          // Printer commands live in $D4..$FF and carry no text
          if (recordCode < 0xd4) {
            throw new CorruptDocumentError(`line record code $${recordCode.toString(16).toUpperCase()} at offset ${reader.offset - 1} is not valid`);
          }
      }
    }

    return { kind: 'wordProcessor', variant: 'classic', lines, plainText: plainLines.join('\n') };
  });
}

// AppleWorks GS word processor

const GWP_HEADER_SIZE = 282;
const GWP_GLOBALS_SIZE = 386;
const GWP_RULER_SIZE = 52;
const GWP_PALETTE_OFFSET = 0x38;
const GWP_VERSIONS = [0x1011, 0x0006];
const GWP_DEFAULT_SIZE = 12;

const GWP_STYLE_BOLD = 0x01;
const GWP_STYLE_ITALIC = 0x02;
const GWP_STYLE_UNDERLINE = 0x04;
const GWP_STYLE_SUPERSCRIPT = 0x40;
const GWP_STYLE_SUBSCRIPT = 0x80;

interface Paragraph {
  line: DocumentLine<EnhancedRun>;
  text: string;
}

function readGWPParagraph(reader: ByteReader, end: number, alignment: Alignment): Paragraph {
  let fontFamily = reader.readU16LE();
  let styleFlags = reader.readU8();
  let fontSize = reader.readU8() || GWP_DEFAULT_SIZE;
  let colorIndex = reader.readU8();
  reader.skip(2);

  const builder = new RunBuilder<EnhancedRun>(text => ({
    text,
    bold: (styleFlags & GWP_STYLE_BOLD) !== 0,
    italic: (styleFlags & GWP_STYLE_ITALIC) !== 0,
    underline: (styleFlags & GWP_STYLE_UNDERLINE) !== 0,
    superscript: (styleFlags & GWP_STYLE_SUPERSCRIPT) !== 0,
    subscript: (styleFlags & GWP_STYLE_SUBSCRIPT) !== 0,
    fontFamily,
    fontSize,
    colorIndex,
  }));

  while (reader.offset < end) {
    const byte = reader.readU8();
    if (byte === 0x0d) {
      break;
    }
    switch (byte) {
      case 0x01:
        builder.flush();
        fontFamily = reader.readU16LE();
        break;
      case 0x02:
        builder.flush();
        styleFlags = reader.readU8();
        break;
      case 0x03:
        builder.flush();
        fontSize = reader.readU8() || GWP_DEFAULT_SIZE;
        break;
      case 0x04:
        builder.flush();
        colorIndex = reader.readU8();
        break;
      case 0x05: builder.append('#'); break;
      case 0x06: builder.append('[DATE]'); break;
      case 0x07: builder.append('[TIME]'); break;
      case 0x09: builder.append('\t'); break;
      default:
        if (byte >= 0x20) {
          builder.append(macRomanChar(byte));
        }
    }
  }

  builder.flush();
  return { line: { runs: builder.runs, alignment, pageBreak: false }, text: builder.text };
}

export function decodeGSWordProcessor(data: Uint8Array): EnhancedWordProcessorDoc {
  if (data.length < GWP_HEADER_SIZE + GWP_GLOBALS_SIZE + 2) {
    throw new TooShortError(`AppleWorks GS document of ${data.length} bytes is shorter than its header and globals`);
  }
  const header = new ByteReader(data);
  const version = header.u16At(0);
  if (!GWP_VERSIONS.includes(version) || header.u16At(2) !== GWP_HEADER_SIZE) {
    throw new UnrecognizedFormatError(`AppleWorks GS version $${version.toString(16).toUpperCase()} or header size is not recognized`);
  }

  const palette: RGB[] = [];
  for (let i = 0; i < 16; i++) {
    palette.push(iigsColor(header.u16At(GWP_PALETTE_OFFSET + i * 2)));
  }

  return asCorruptDocument('AppleWorks GS document body', () => {
    const reader = new ByteReader(data, GWP_HEADER_SIZE + GWP_GLOBALS_SIZE);
    const paragraphCount = reader.readU16LE();
    if (paragraphCount === 0 || paragraphCount === 0xffff) {
      throw new CorruptDocumentError(`document body declares ${paragraphCount} paragraphs`);
    }

    // SaveArray: one 12-byte entry per paragraph
    const entries: { pageBreak: boolean; ruler: number }[] = [];
    for (let i = 0; i < paragraphCount; i++) {
      reader.skip(4); // text block, offset
      const attributes = reader.readU16LE();
      const ruler = reader.readU16LE();
      reader.skip(4); // pixel height, line count
      entries.push({ pageBreak: attributes === 1, ruler });
    }

    const rulerCount = Math.max(...entries.map(entry => entry.ruler)) + 1;
    const alignments: Alignment[] = [];
    for (let i = 0; i < rulerCount; i++) {
      const status = reader.u16At(reader.offset + 2);
      reader.skip(GWP_RULER_SIZE);
      alignments.push(alignmentOf((status & 0x20) !== 0, (status & 0x40) !== 0, (status & 0x80) !== 0));
    }

    const textLength = reader.readU32LE();
    reader.skip(4);
    if (textLength > reader.remaining()) {
      throw new CorruptDocumentError(`text block of ${textLength} bytes runs past the end of the file`);
    }
    const end = reader.offset + textLength;

    const lines: DocumentLine<EnhancedRun>[] = [];
    const plainLines: string[] = [];
    for (const entry of entries) {
      if (reader.offset >= end) {
        break;
      }
      if (entry.pageBreak) {
        lines.push({ runs: [], alignment: 'left', pageBreak: true });
        plainLines.push('');
        continue;
      }
      if (reader.offset + 7 > end) {
        throw new CorruptDocumentError(`paragraph header at offset ${reader.offset} runs past the text block`);
      }
      const paragraph = readGWPParagraph(reader, end, alignments[entry.ruler] ?? 'left');
      lines.push(paragraph.line);
      plainLines.push(paragraph.text);
    }

    return { kind: 'wordProcessor', variant: 'enhanced', lines, palette, plainText: plainLines.join('\n') };
  });
}

// Database

const ADB_MIN_HEADER_SIZE = 379;
const ADB_CATEGORY_OFFSET = 357;
const ADB_CATEGORY_SIZE = 22;
const ADB_REPORT_SIZE = 600;
const ADB_MAX_CATEGORIES = 30;
const ADB_DATE_TAG = 0xc0;
const ADB_TIME_TAG = 0xd4;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function asciiPair(first: number, second: number): string {
  return String.fromCharCode(first & 0x7f, second & 0x7f);
}

// Stored as the tag, two year digits, a month letter from 'A' and two day digits
function formatADBDate(field: Uint8Array): string {
  const month = MONTHS[field[3] - 0x41] ?? '???';
  return `${asciiPair(field[4], field[5])}-${month}-${asciiPair(field[1], field[2])}`;
}

// Stored as the tag, an hour letter from 'A' and two minute digits
function formatADBTime(field: Uint8Array): string {
  const hour = field[1] - 0x41;
  const hour12 = hour === 0 ? 12 : hour > 12 ? hour - 12 : hour;
  return `${hour12}:${asciiPair(field[2], field[3])} ${hour < 12 ? 'AM' : 'PM'}`;
}

function readADBRecord(record: Uint8Array, categoryCount: number): string[] {
  const fields = new Array<string>(categoryCount).fill('');
  const reader = new ByteReader(record);
  let category = 0;

  while (reader.remaining() > 0 && category < categoryCount) {
    const control = reader.readU8();
    if (control === 0xff) {
      break;
    }
    if (control >= 0x81 && control <= 0x9e) {
      category += control - 0x80;
    } else if (control >= 0x01 && control <= 0x7f) {
      const field = reader.readBytes(control);
      if (field.length === 6 && field[0] === ADB_DATE_TAG) {
        fields[category] = formatADBDate(field);
      } else if (field.length === 4 && field[0] === ADB_TIME_TAG) {
        fields[category] = formatADBTime(field);
      } else {
        fields[category] = Array.from(field, appleWorksChar).join('');
      }
      category++;
    } else {
      throw new CorruptDocumentError(`record control byte $${control.toString(16).toUpperCase()} is not valid`);
    }
  }
  return fields;
}

export function decodeDatabase(data: Uint8Array): DatabaseDoc {
  if (data.length < ADB_MIN_HEADER_SIZE) {
    throw new TooShortError(`AppleWorks DB file of ${data.length} bytes is shorter than its header`);
  }

  return asCorruptDocument('AppleWorks DB document', () => {
    const reader = new ByteReader(data);
    const headerLength = reader.u16At(0);
    const categoryCount = reader.u8At(35);
    // Bit 15 only flags a version 3.0 file
    const recordCount = reader.u16At(36) & 0x7fff;
    const reportCount = reader.u8At(38);

    if (headerLength < ADB_MIN_HEADER_SIZE || headerLength > data.length) {
      throw new CorruptDocumentError(`header length ${headerLength} does not fit a ${data.length}-byte file`);
    }
    if (categoryCount < 1 || categoryCount > ADB_MAX_CATEGORIES) {
      throw new CorruptDocumentError(`category count ${categoryCount} is out of range`);
    }

    const categories: string[] = [];
    for (let i = 0; i < categoryCount; i++) {
      const offset = ADB_CATEGORY_OFFSET + i * ADB_CATEGORY_SIZE;
      const nameLength = reader.u8At(offset);
      categories.push(nameLength > 0 && nameLength <= 20
        ? Array.from(reader.bytesAt(offset + 1, nameLength), appleWorksChar).join('')
        : `Category ${i + 1}`);
    }

    reader.seek(headerLength);
    reader.skip(reportCount * ADB_REPORT_SIZE);
    // The standard-values record comes first and is not data
    reader.skip(reader.readU16LE());

    const records: string[][] = [];
    for (let i = 0; i < recordCount; i++) {
      const length = reader.readU16LE();
      if (length === 0xffff) {
        break;
      }
      records.push(readADBRecord(reader.readBytes(length), categoryCount));
    }

    const plainText = [categories, ...records].map(row => row.join('\t')).join('\n');
    return { kind: 'database', categories, records, plainText };
  });
}

// Spreadsheet

const ASP_HEADER_SIZE = 300;
const ASP_MIN_VERSION_OFFSET = 242;
const REPEATED_LABEL_WIDTH = 8;

// printf %g: six significant digits, trailing zeros dropped, exponent outside 1e-4..1e6
export function formatGeneral(value: number, precision: number = 6): string {
  if (!Number.isFinite(value) || value === 0) {
    return String(value);
  }
  const [mantissa, exponentText] = value.toExponential(precision - 1).split('e');
  const exponent = Number(exponentText);
  const trimZeros = (digits: string) => (digits.includes('.') ? digits.replace(/\.?0+$/, '') : digits);

  if (exponent < -4 || exponent >= precision) {
    const sign = exponent < 0 ? '-' : '+';
    return `${trimZeros(mantissa)}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }
  return trimZeros(value.toFixed(precision - 1 - exponent));
}

export function formatCellNumber(value: number): string {
  return Number.isInteger(value) && Math.abs(value) < 1e10 ? value.toFixed(0) : formatGeneral(value);
}

function readASPCell(cell: Uint8Array): string {
  if (cell.length === 0) {
    return '';
  }
  const reader = new ByteReader(cell);
  const flags = reader.readU8();

  if ((flags & 0x80) === 0) {
    if ((flags & 0x20) !== 0) {
      return appleWorksChar(reader.readU8()).repeat(REPEATED_LABEL_WIDTH);
    }
    return Array.from(reader.readBytes(reader.remaining()), appleWorksChar).join('');
  }

  const valueFlags = reader.readU8();
  if ((flags & 0x20) === 0 && (valueFlags & 0x08) !== 0) {
    // Formula with a text result
    return Array.from(reader.readBytes(reader.readU8()), appleWorksChar).join('');
  }
  // Constant, or a formula's last computed value
  return formatCellNumber(reader.readF64LE());
}

export function decodeSpreadsheet(data: Uint8Array): SpreadsheetDoc {
  if (data.length < ASP_HEADER_SIZE) {
    throw new TooShortError(`AppleWorks SS file of ${data.length} bytes is shorter than its header`);
  }

  return asCorruptDocument('AppleWorks SS document', () => {
    const reader = new ByteReader(data, ASP_HEADER_SIZE);
    if (data[ASP_MIN_VERSION_OFFSET] !== 0) {
      reader.skip(2);
    }

    const sparse: string[][] = [];
    let maxColumn = -1;

    for (;;) {
      const rowLength = reader.readU16LE();
      if (rowLength === 0xffff) {
        break;
      }
      if (rowLength < 2) {
        throw new CorruptDocumentError(`row record at offset ${reader.offset - 2} is ${rowLength} bytes long`);
      }
      const rowNumber = reader.readU16LE();
      if (rowNumber === 0) {
        throw new CorruptDocumentError(`row record at offset ${reader.offset - 4} has row number 0`);
      }

      const row = new ByteReader(reader.readBytes(rowLength - 2));
      const cells = sparse[rowNumber - 1] ?? [];
      let column = 0;
      while (row.remaining() > 0) {
        const control = row.readU8();
        if (control === 0xff) {
          break;
        }
        if (control >= 0x81) {
          column += control - 0x80;
        } else if (control >= 0x01) {
          cells[column] = readASPCell(row.readBytes(control));
          maxColumn = Math.max(maxColumn, column);
          column++;
        } else {
          throw new CorruptDocumentError(`row ${rowNumber} has a zero cell control byte`);
        }
      }
      sparse[rowNumber - 1] = cells;
    }

    const rows = Array.from(sparse, cells => Array.from({ length: maxColumn + 1 }, (_, column) => cells?.[column] ?? ''));
    const plainText = rows.map(row => row.join('\t')).join('\n');
    return { kind: 'spreadsheet', maxColumn, rows, plainText };
  });
}
