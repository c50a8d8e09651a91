import { decodeIIgsFont, fontGlyph, renderCharacterGrid, renderFontText, renderGlyph } from './iigsfont.js';
import { decodeContent } from './a2decode.js';
import { CorruptDocumentError, UnrecognizedFormatError } from './errors.js';
import { buildIIgsFont, pixelAt } from './testutil.js';
import type { FontRecordFields } from './testutil.js';
import { describe, it, expect } from 'vitest';

const INK = [0, 0, 0, 255];
const PAPER = [255, 255, 255, 255];
const CLEAR = [0, 0, 0, 0];

// 'A' is three pixels wide, 'B' two, the missing glyph two; the strike is one word wide
const RECORD: FontRecordFields = { firstChar: 0x41, lastChar: 0x42, widMax: 4, height: 2, rowWords: 1 };
const STRIKE = [0xbe, 0x00, 0x4c, 0x00];
const LOCATIONS = [0, 3, 5, 7];
const OFFSET_WIDTHS = [0x0004, 0x0103, 0x0003, 0xffff];

const FONT_FILE = buildIIgsFont('Test', RECORD, STRIKE, LOCATIONS, OFFSET_WIDTHS);

describe('decodeIIgsFont', () => {
  it('should read the family header and font record', () => {
    const font = decodeIIgsFont(FONT_FILE);

    expect(font).toMatchObject({
      familyName: 'Test',
      familyId: 0x1234,
      pointSize: 8,
      version: 0x0101,
      firstChar: 0x41,
      lastChar: 0x42,
      widMax: 4,
      kernMax: 0,
      height: 2,
      rowWords: 1,
      locations: LOCATIONS,
      offsetWidths: OFFSET_WIDTHS,
    });
    expect(Array.from(font.strike)).toEqual(STRIKE);
  });

  it('should reject an inverted character range', () => {
    const file = buildIIgsFont('Bad', { ...RECORD, firstChar: 0x50 }, STRIKE, LOCATIONS, OFFSET_WIDTHS);

    expect(() => decodeIIgsFont(file)).toThrow(UnrecognizedFormatError);
  });

  it('should report truncated tables as corruption', () => {
    expect(() => decodeIIgsFont(FONT_FILE.subarray(0, FONT_FILE.length - 3))).toThrow(CorruptDocumentError);
  });

  it('should reject locations past the strike', () => {
    const file = buildIIgsFont('Test', RECORD, STRIKE, [0, 3, 5, 40], OFFSET_WIDTHS);

    expect(() => decodeIIgsFont(file)).toThrow('font location table entry 3 is 40, outside the 16-pixel strike');
  });
});

describe('font glyphs', () => {
  const font = decodeIIgsFont(FONT_FILE);

  it('should place each glyph by its location, offset and advance', () => {
    expect(fontGlyph(font, 0x41)).toEqual({ charCode: 0x41, present: true, strikeX: 0, imageWidth: 3, offset: 0, advance: 4 });
    expect(fontGlyph(font, 0x42)).toEqual({ charCode: 0x42, present: true, strikeX: 3, imageWidth: 2, offset: 1, advance: 3 });
  });

  it('should substitute the missing glyph outside the range', () => {
    expect(fontGlyph(font, 0x5a)).toEqual({ charCode: 0x5a, present: false, strikeX: 5, imageWidth: 2, offset: 0, advance: 3 });
  });

  it('should render one glyph black on transparent', () => {
    const image = renderGlyph(font, 0x41);

    expect([image.width, image.height]).toEqual([3, 2]);
    expect(pixelAt(image, 0, 0)).toEqual(INK);
    expect(pixelAt(image, 1, 0)).toEqual(CLEAR);
    expect(pixelAt(image, 1, 1)).toEqual(INK);
  });

  it('should set text with each glyph at the pen plus its offset', () => {
    const image = renderFontText(font, 'AB');

    expect([image.width, image.height]).toEqual([7, 2]);
    expect(pixelAt(image, 4, 0)).toEqual(PAPER);
    expect(pixelAt(image, 5, 0)).toEqual(INK);
    expect(pixelAt(image, 5, 1)).toEqual(PAPER);
    expect(pixelAt(image, 6, 1)).toEqual(INK);
  });

  it('should lay out every character in a grid of padded cells', () => {
    const image = renderCharacterGrid(font);

    expect([image.width, image.height]).toEqual([128, 6]);
    expect(pixelAt(image, 0, 0)).toEqual([240, 240, 240, 255]);
    expect(pixelAt(image, 2, 2)).toEqual(INK);
    expect(pixelAt(image, 3, 2)).toEqual(PAPER);
  });
});

describe('font files through decodeContent', () => {
  it('should decode file type $C8 as a font', () => {
    const decoded = decodeContent({ fileType: 0xc8, auxType: 0, data: FONT_FILE });

    expect(decoded.kind === 'font' && decoded.font.familyName).toBe('Test');
  });
});
