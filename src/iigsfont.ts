// QuickDraw II bitmap fonts ($C8): family name, IIgs font header, then a Macintosh font record

import type { RGB } from './types.js';
import { RgbaCanvas } from './graphics.js';
import { ByteReader } from './bytereader.js';
import { CorruptDocumentError, TooShortError, UnrecognizedFormatError, asCorruptDocument } from './errors.js';
import { pascalString } from './textio.js';

const MISSING_GLYPH = 0xffff;
const MAX_CHAR = 255;

const INK: RGB = { r: 0, g: 0, b: 0 };
const PAPER: RGB = { r: 255, g: 255, b: 255 };
const GRID: RGB = { r: 240, g: 240, b: 240 };

export interface IIgsFont {
  familyName: string;
  familyId: number;
  style: number;
  pointSize: number;
  version: number;
  fontType: number;
  firstChar: number;
  lastChar: number;
  widMax: number;
  kernMax: number;
  rectWidth: number;
  height: number;
  ascent: number;
  descent: number;
  leading: number;
  rowWords: number;
  // One bit per pixel, leftmost pixel in the high bit, rowWords * 2 bytes per row
  strike: Uint8Array;
  // Strike x of every glyph from firstChar, then the missing glyph, then the end
  locations: number[];
  // High byte image offset, low byte advance; $FFFF where the font has no glyph
  offsetWidths: number[];
}

export interface FontGlyph {
  charCode: number;
  // False when the missing-character glyph stands in
  present: boolean;
  strikeX: number;
  imageWidth: number;
  // Pen position to image left, kernMax included
  offset: number;
  advance: number;
}

export interface FontImage {
  readonly width: number;
  readonly height: number;
  // RGBA
  readonly pixels: Uint8Array;
}

function signed16(value: number): number {
  return value >= 0x8000 ? value - 0x10000 : value;
}

export function decodeIIgsFont(data: Uint8Array): IIgsFont {
  if (data.length < 2) {
    throw new TooShortError(`font file of ${data.length} bytes has no family name`);
  }
  const familyName = pascalString(data);
  const headerStart = 1 + data[0];

  return asCorruptDocument('IIgs font', () => {
    const reader = new ByteReader(data, headerStart);
    const offsetToRecord = reader.readU16LE();
    const familyId = reader.readU16LE();
    const style = reader.readU16LE();
    const pointSize = reader.readU16LE();
    const version = reader.readU16LE();
    reader.skip(2); // fbrExtent

    reader.seek(headerStart + offsetToRecord * 2);
    const fontType = reader.readU16LE();
    const firstChar = reader.readU16LE();
    const lastChar = reader.readU16LE();
    const widMax = reader.readU16LE();
    const kernMax = signed16(reader.readU16LE());
    reader.skip(2); // nDescent
    const rectWidth = reader.readU16LE();
    const height = reader.readU16LE();
    reader.skip(2); // owTLoc
    const ascent = reader.readU16LE();
    const descent = reader.readU16LE();
    const leading = reader.readU16LE();
    const rowWords = reader.readU16LE();

    if (lastChar > MAX_CHAR || firstChar > lastChar) {
      throw new UnrecognizedFormatError(`font character range ${firstChar}..${lastChar} is not valid`);
    }
    if (rowWords === 0 || height === 0) {
      throw new CorruptDocumentError(`font strike of ${rowWords} words by ${height} rows is empty`);
    }

    const strike = reader.readBytes(rowWords * 2 * height);
    const tableLength = lastChar - firstChar + 3;
    const locations: number[] = [];
    for (let i = 0; i < tableLength; i++) {
      locations.push(reader.readU16LE());
    }
    const offsetWidths: number[] = [];
    for (let i = 0; i < tableLength; i++) {
      offsetWidths.push(reader.readU16LE());
    }

    const strikeWidth = rowWords * 16;
    for (let i = 1; i < tableLength; i++) {
      if (locations[i] < locations[i - 1] || locations[i] > strikeWidth) {
        throw new CorruptDocumentError(`font location table entry ${i} is ${locations[i]}, outside the ${strikeWidth}-pixel strike`);
      }
    }

    return {
      familyName,
      familyId,
      style,
      pointSize,
      version,
      fontType,
      firstChar,
      lastChar,
      widMax,
      kernMax,
      rectWidth,
      height,
      ascent,
      descent,
      leading,
      rowWords,
      strike,
      locations,
      offsetWidths,
    };
  });
}

function glyphAt(font: IIgsFont, index: number, charCode: number, present: boolean): FontGlyph {
  const offsetWidth = font.offsetWidths[index];
  return {
    charCode,
    present,
    strikeX: font.locations[index],
    imageWidth: font.locations[index + 1] - font.locations[index],
    offset: font.kernMax + (offsetWidth >> 8),
    advance: offsetWidth & 0xff,
  };
}

// Characters outside the font, or without a glyph, draw the missing-character glyph
export function fontGlyph(font: IIgsFont, charCode: number): FontGlyph {
  const index = charCode - font.firstChar;
  if (index >= 0 && charCode <= font.lastChar && font.offsetWidths[index] !== MISSING_GLYPH) {
    return glyphAt(font, index, charCode, true);
  }
  const missing = font.lastChar - font.firstChar + 1;
  if (font.offsetWidths[missing] === MISSING_GLYPH) {
    return { charCode, present: false, strikeX: 0, imageWidth: 0, offset: 0, advance: font.widMax };
  }
  return glyphAt(font, missing, charCode, false);
}

export function fontPixel(font: IIgsFont, x: number, y: number): boolean {
  const byte = font.strike[y * font.rowWords * 2 + (x >> 3)];
  return ((byte >> (7 - (x & 7))) & 1) !== 0;
}

function drawGlyph(canvas: RgbaCanvas, font: IIgsFont, glyph: FontGlyph, left: number, top: number): void {
  for (let y = 0; y < font.height; y++) {
    for (let x = 0; x < glyph.imageWidth; x++) {
      if (fontPixel(font, glyph.strikeX + x, y)) {
        canvas.set(left + x, top + y, INK);
      }
    }
  }
}

function toFontImage(canvas: RgbaCanvas): FontImage {
  return { width: canvas.width, height: canvas.height, pixels: canvas.pixels };
}

function fill(canvas: RgbaCanvas, left: number, top: number, width: number, height: number, color: RGB): void {
  for (let y = top; y < top + height; y++) {
    for (let x = left; x < left + width; x++) {
      canvas.set(x, y, color);
    }
  }
}

// Black on transparent, as wide as the glyph image
export function renderGlyph(font: IIgsFont, charCode: number): FontImage {
  const glyph = fontGlyph(font, charCode);
  const canvas = new RgbaCanvas(Math.max(glyph.imageWidth, 1), font.height);
  drawGlyph(canvas, font, glyph, 0, 0);
  return toFontImage(canvas);
}

// Black on white, one line, each character placed at the pen plus its offset
export function renderFontText(font: IIgsFont, text: string): FontImage {
  const glyphs = Array.from(text, char => fontGlyph(font, char.charCodeAt(0)));
  const width = glyphs.reduce((total, glyph) => total + glyph.advance, 0);
  const canvas = new RgbaCanvas(Math.max(width, 1), font.height);
  fill(canvas, 0, 0, canvas.width, canvas.height, PAPER);

  let pen = 0;
  for (const glyph of glyphs) {
    drawGlyph(canvas, font, glyph, pen + glyph.offset, 0);
    pen += glyph.advance;
  }
  return toFontImage(canvas);
}

// Every character from firstChar to lastChar in white cells on a light grey sheet
export function renderCharacterGrid(font: IIgsFont, columns: number = 16, padding: number = 2): FontImage {
  const count = font.lastChar - font.firstChar + 1;
  const rows = Math.ceil(count / columns);
  const cellWidth = font.widMax + padding * 2;
  const cellHeight = font.height + padding * 2;
  const canvas = new RgbaCanvas(cellWidth * columns, cellHeight * rows);
  fill(canvas, 0, 0, canvas.width, canvas.height, GRID);

  for (let i = 0; i < count; i++) {
    const cellX = (i % columns) * cellWidth;
    const cellY = Math.floor(i / columns) * cellHeight;
    fill(canvas, cellX + 1, cellY + 1, cellWidth - 2, cellHeight - 2, PAPER);

    const glyph = fontGlyph(font, font.firstChar + i);
    if (glyph.present) {
      const centering = Math.max(0, Math.floor((font.widMax - glyph.imageWidth) / 2));
      drawGlyph(canvas, font, glyph, cellX + padding + centering, cellY + padding);
    }
  }
  return toFontImage(canvas);
}
