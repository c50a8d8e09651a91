import {
  decodeDatabase,
  decodeDocument,
  decodeGSWordProcessor,
  decodeSpreadsheet,
  decodeWordProcessor,
  documentKindFor,
  formatCellNumber,
  formatGeneral,
} from './appleworks.js';
import { CorruptDocumentError, TooShortError, UnrecognizedFormatError } from './errors.js';
import {
  ascii,
  aspRow,
  awpTextRecord,
  buildAppleWorksDB,
  buildAppleWorksSS,
  buildAppleWorksWP,
  buildGSWordProcessor,
  f64,
} from './testutil.js';
import { describe, it, expect } from 'vitest';

const plain = { bold: false, italic: false, underline: false, superscript: false, subscript: false };

describe('AppleWorks word processor', () => {
  const document = buildAppleWorksWP([
    [0x00, 0xe1],
    awpTextRecord([0x01, ...ascii('HI'), 0x02, 0x20, 0x07, ...ascii('X'), 0x08, 0x20, 0x0e]),
    [0x00, 0xe0],
    [0x00, 0xd0],
    [0x00, 0xe9],
    [0x03, 0x00, 0xff, 0x00, 0x00],
    awpTextRecord([0x61, 0x81, 0xe2]),
    [0x05, 0xd8],
  ]);

  it('should split runs at style changes and keep the paragraph alignment', () => {
    const doc = decodeWordProcessor(document);

    expect(doc.variant).toBe('classic');
    expect(doc.lines[0]).toEqual({
      alignment: 'center',
      pageBreak: false,
      runs: [
        { ...plain, text: 'HI', bold: true },
        { ...plain, text: ' ' },
        { ...plain, text: 'X', underline: true },
        { ...plain, text: ' [DATE]' },
      ],
    });
  });

  it('should emit blank lines, page breaks and skip rulers', () => {
    const doc = decodeWordProcessor(document);

    expect(doc.lines.map(line => [line.alignment, line.pageBreak, line.runs.length])).toEqual([
      ['center', false, 4],
      ['left', false, 0],
      ['left', true, 0],
      ['left', false, 1],
    ]);
    expect(doc.plainText).toBe('HI X [DATE]\n\n\naAb');
  });

  it('should skip the extra word of version 3 files', () => {
    const doc = decodeWordProcessor(buildAppleWorksWP([awpTextRecord(ascii('V3'))], 30));
    expect(doc.plainText).toBe('V3');
  });

  it('should fail the whole document on a bad record', () => {
    expect(() => decodeWordProcessor(buildAppleWorksWP([awpTextRecord(ascii('OK')), [0x00, 0x42]]))).toThrow(CorruptDocumentError);
    expect(() => decodeWordProcessor(buildAppleWorksWP([[0x03, 0x00, 0x00, 0x85, 0x41]]))).toThrow(CorruptDocumentError);
    expect(() => decodeWordProcessor(document.subarray(0, document.length - 2))).toThrow(CorruptDocumentError);
  });

  it('should tell a short file from a foreign one', () => {
    expect(() => decodeWordProcessor(new Uint8Array(100))).toThrow(TooShortError);
    expect(() => decodeWordProcessor(new Uint8Array(400))).toThrow(UnrecognizedFormatError);
  });
});

describe('AppleWorks GS word processor', () => {
  const document = buildGSWordProcessor(
    [0x0f00, 0x00f0, 0x0abc],
    [{ ruler: 0 }, { pageBreak: true, ruler: 0 }, { ruler: 1 }],
    [0x0000, 0x0020],
    [
      { font: 0x0014, style: 0x01, size: 0, color: 2, body: [...ascii('Hi'), 0x02, 0x02, ...ascii('there'), 0x03, 18, 0x04, 1, 0x21, 0x8e, 0x0d] },
      { font: 0x0003, style: 0x00, size: 10, color: 0, body: [0x41, 0x09, 0x42, 0x06, 0x0d] },
    ],
  );

  it('should read the document palette as $0RGB words', () => {
    const doc = decodeGSWordProcessor(document);

    expect(doc.palette).toHaveLength(16);
    expect(doc.palette.slice(0, 4)).toEqual([
      { r: 255, g: 0, b: 0 },
      { r: 0, g: 255, b: 0 },
      { r: 170, g: 187, b: 204 },
      { r: 0, g: 0, b: 0 },
    ]);
  });

  it('should carry font, size and colour on every run', () => {
    const doc = decodeGSWordProcessor(document);

    expect(doc.variant).toBe('enhanced');
    expect(doc.lines[0].runs).toEqual([
      { ...plain, text: 'Hi', bold: true, fontFamily: 20, fontSize: 12, colorIndex: 2 },
      { ...plain, text: 'there', italic: true, fontFamily: 20, fontSize: 12, colorIndex: 2 },
      { ...plain, text: '!é', italic: true, fontFamily: 20, fontSize: 18, colorIndex: 1 },
    ]);
  });

  it('should take alignment from the paragraph ruler', () => {
    const doc = decodeGSWordProcessor(document);

    expect(doc.lines.map(line => [line.alignment, line.pageBreak])).toEqual([
      ['left', false],
      ['left', true],
      ['center', false],
    ]);
    expect(doc.plainText).toBe('Hithere!é\n\nA\tB[DATE]');
  });

  it('should reject unknown versions and truncated bodies', () => {
    const foreign = document.slice();
    foreign[1] = 0x20;

    expect(() => decodeGSWordProcessor(foreign)).toThrow(UnrecognizedFormatError);
    expect(() => decodeGSWordProcessor(document.subarray(0, 282 + 386 + 10))).toThrow(CorruptDocumentError);
  });
});

describe('AppleWorks database', () => {
  const document = buildAppleWorksDB(
    ['Name', 'When'],
    [
      [0x05, ...ascii('ALICE'), 0x06, 0xc0, ...ascii('86C14'), 0xff],
      [0x81, 0x04, 0xd4, ...ascii('N05'), 0xff],
    ],
    0x8002,
  );

  it('should decode categories and pad skipped fields', () => {
    const doc = decodeDatabase(document);

    expect(doc.categories).toEqual(['Name', 'When']);
    expect(doc.records).toEqual([
      ['ALICE', '14-Mar-86'],
      ['', '1:05 PM'],
    ]);
    expect(doc.plainText).toBe('Name\tWhen\nALICE\t14-Mar-86\n\t1:05 PM');
  });

  it('should fail on an invalid field tag', () => {
    const bad = buildAppleWorksDB(['Name'], [[0x00, 0x41]]);
    expect(() => decodeDatabase(bad)).toThrow(CorruptDocumentError);
  });

  it('should fail on a record that runs past the file', () => {
    expect(() => decodeDatabase(document.subarray(0, document.length - 6))).toThrow(CorruptDocumentError);
  });

  it('should reject files shorter than the header', () => {
    expect(() => decodeDatabase(new Uint8Array(200))).toThrow(TooShortError);
  });
});

describe('AppleWorks spreadsheet', () => {
  const document = buildAppleWorksSS([
    aspRow(1, [0x05, 0x00, ...ascii('Item'), 0x0a, 0xa0, 0x00, ...f64(3.25), 0xff]),
    aspRow(3, [0x84, 0x02, 0x20, 0x2d, 0xff]),
    aspRow(2, [0x06, 0x80, 0x08, 0x03, ...ascii('YES'), 0x0a, 0x80, 0x00, ...f64(1234567.5), 0xff]),
  ]);

  it('should pad every row to the widest column', () => {
    const doc = decodeSpreadsheet(document);

    expect(doc.maxColumn).toBe(4);
    expect(doc.rows).toEqual([
      ['Item', '3.25', '', '', ''],
      ['YES', '1.23457e+06', '', '', ''],
      ['', '', '', '', '--------'],
    ]);
    expect(doc.rows.every(row => row.length === 5)).toBe(true);
  });

  it('should decode an empty sheet', () => {
    const doc = decodeSpreadsheet(buildAppleWorksSS([]));

    expect(doc.maxColumn).toBe(-1);
    expect(doc.rows).toEqual([]);
  });

  it('should fail on row zero and on cells past the row end', () => {
    expect(() => decodeSpreadsheet(buildAppleWorksSS([aspRow(0, [0xff])]))).toThrow(CorruptDocumentError);
    expect(() => decodeSpreadsheet(buildAppleWorksSS([aspRow(1, [0x09, 0x00, 0x41])]))).toThrow(CorruptDocumentError);
    expect(() => decodeSpreadsheet(document.subarray(0, document.length - 2))).toThrow(CorruptDocumentError);
  });

  it('should give equal results on repeated decodes', () => {
    expect(decodeSpreadsheet(document)).toEqual(decodeSpreadsheet(document));
  });
});

describe('number formatting', () => {
  it('should print integers without a fraction', () => {
    expect(formatCellNumber(42)).toBe('42');
    expect(formatCellNumber(-7)).toBe('-7');
    expect(formatCellNumber(1e12)).toBe('1e+12');
  });

  it('should follow printf %g', () => {
    expect(formatGeneral(3.25)).toBe('3.25');
    expect(formatGeneral(0.0001234)).toBe('0.0001234');
    expect(formatGeneral(0.00001)).toBe('1e-05');
    expect(formatGeneral(2 / 3)).toBe('0.666667');
  });
});

describe('decodeDocument', () => {
  it('should route by file and aux type', () => {
    expect(documentKindFor(0x50, 0x8010)).toBe('gsWordProcessor');
    expect(documentKindFor(0x50, 0x0000)).toBeUndefined();
    expect(decodeDocument(buildAppleWorksSS([]), 0x1b).kind).toBe('spreadsheet');
    expect(() => decodeDocument(new Uint8Array(400), 0x04)).toThrow(UnrecognizedFormatError);
  });
});
