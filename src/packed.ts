// PackBytes-compressed super hi-res pictures: Apple Preferred Format, Paintworks and plain packed screens

import type { RGB } from './types.js';
import type { RasterImage } from './graphics.js';
import {
  IIGS_STANDARD_PALETTE,
  RgbaCanvas,
  SHR_PIXEL_BYTES,
  SHR_SIZE,
  decodeSHR,
  paintNibbleLine,
  readColorTable,
} from './graphics.js';
import { ByteReader } from './bytereader.js';
import { CorruptDocumentError, TooShortError, asCorruptDocument } from './errors.js';

const APF_BLOCK_NAMES = ['MAIN', 'PATS', 'SCIB', 'PALETTES', 'MASK', 'MULTIPAL', 'NOTE'];
const MAX_SCAN_LINES = 400;
const MAX_PIXELS_PER_LINE = 1280;

const PAINTWORKS_PIXELS = 0x222;
const PAINTWORKS_MAX_LINES = 396;

/**
 * Expands the IIgs toolbox PackBytes encoding. The top two bits of each
 * flag byte pick the run kind, the low six bits hold count - 1:
 * 00 literal bytes, 01 one byte repeated, 10 a four-byte pattern repeated,
 * 11 one byte repeated four times count.
 */
export function unpackBytes(data: Uint8Array, maxOutput: number = 65536): Uint8Array {
  const output = new Uint8Array(maxOutput);
  let out = 0;
  let pos = 0;

  while (pos < data.length && out < maxOutput) {
    const flag = data[pos++];
    const count = (flag & 0x3f) + 1;

    switch (flag & 0xc0) {
      case 0x00: {
        const n = Math.min(count, data.length - pos, maxOutput - out);
        output.set(data.subarray(pos, pos + n), out);
        pos += n;
        out += n;
        break;
      }
      case 0x40:
      case 0xc0: {
        if (pos >= data.length) {
          break;
        }
        const value = data[pos++];
        const n = Math.min((flag & 0xc0) === 0x40 ? count : count * 4, maxOutput - out);
        output.fill(value, out, out + n);
        out += n;
        break;
      }
      case 0x80: {
        if (pos + 4 > data.length) {
          pos = data.length;
          break;
        }
        const pattern = data.subarray(pos, pos + 4);
        pos += 4;
        for (let i = 0; i < count * 4 && out < maxOutput; i++) {
          output[out++] = pattern[i % 4];
        }
        break;
      }
    }
  }
  return output.slice(0, out);
}

export interface APFBlock {
  name: string;
  data: Uint8Array;
}

interface ScanLine {
  packedBytes: number;
  mode: number;
}

interface MainBlock {
  pixelsPerLine: number;
  colorTables: RGB[][];
  scanLines: ScanLine[];
  pixels: Uint8Array;
}

function blockNameAt(data: Uint8Array, offset: number, length: number): string {
  let name = '';
  for (const byte of data.subarray(offset, offset + length)) {
    if (byte < 0x20 || byte > 0x7e) {
      return '';
    }
    name += String.fromCharCode(byte);
  }
  return name;
}

export function isAPF(data: Uint8Array): boolean {
  if (data.length < 20) {
    return false;
  }
  const reader = new ByteReader(data);
  const blockLength = reader.u32At(0);
  const nameLength = data[4];
  if (blockLength < 10 || blockLength > data.length || nameLength < 4 || nameLength > 15) {
    return false;
  }
  return APF_BLOCK_NAMES.includes(blockNameAt(data, 5, nameLength));
}

// Blocks are [u32 length][pstring name][payload]; listing stops at the first inconsistent block
export function readAPFBlocks(data: Uint8Array): APFBlock[] {
  const reader = new ByteReader(data);
  const blocks: APFBlock[] = [];
  let pos = 0;

  while (pos + 5 <= data.length) {
    const blockLength = reader.u32At(pos);
    const nameLength = data[pos + 4];
    if (blockLength < 5 || pos + blockLength > data.length) {
      break;
    }
    if (nameLength === 0 || nameLength > 20 || 5 + nameLength > blockLength) {
      break;
    }
    const name = blockNameAt(data, pos + 5, nameLength);
    const payload = data.subarray(pos + 5 + nameLength, pos + blockLength);
    if (payload.length > 0) {
      blocks.push({ name, data: payload });
    }
    pos += blockLength;
  }
  return blocks;
}

function parseMainBlock(data: Uint8Array): MainBlock {
  const reader = new ByteReader(data);
  reader.skip(2); // master mode
  const pixelsPerLine = reader.readU16LE();
  const tableCount = reader.readU16LE();
  if (pixelsPerLine === 0 || pixelsPerLine > MAX_PIXELS_PER_LINE) {
    throw new CorruptDocumentError(`APF MAIN block has ${pixelsPerLine} pixels per line`);
  }

  const colorTables: RGB[][] = [];
  for (let i = 0; i < tableCount; i++) {
    colorTables.push(readColorTable(reader.readBytes(32), 0));
  }

  const lineCount = reader.readU16LE();
  if (lineCount === 0 || lineCount > MAX_SCAN_LINES) {
    throw new CorruptDocumentError(`APF MAIN block has ${lineCount} scan lines`);
  }
  const scanLines: ScanLine[] = [];
  for (let i = 0; i < lineCount; i++) {
    scanLines.push({ packedBytes: reader.readU16LE(), mode: reader.readU16LE() });
  }

  const bytesPerLine = pixelsPerLine >> 1;
  const pixels = new Uint8Array(bytesPerLine * lineCount);
  scanLines.forEach((line, y) => {
    // A short final line leaves the rest of the picture blank
    if (line.packedBytes > reader.remaining()) {
      return;
    }
    const unpacked = unpackBytes(reader.readBytes(line.packedBytes), bytesPerLine);
    pixels.set(unpacked, y * bytesPerLine);
  });

  return { pixelsPerLine, colorTables, scanLines, pixels };
}

function parseMultipal(data: Uint8Array): RGB[][] {
  const reader = new ByteReader(data);
  const count = reader.readU16LE();
  const palettes: RGB[][] = [];
  for (let i = 0; i < count && reader.remaining() >= 32; i++) {
    palettes.push(readColorTable(reader.readBytes(32), 0));
  }
  return palettes;
}

export function decodeAPF(data: Uint8Array): RasterImage {
  const blocks = readAPFBlocks(data);
  const mainBlock = blocks.find(block => block.name === 'MAIN');
  if (!mainBlock) {
    throw new CorruptDocumentError('Apple Preferred Format picture has no MAIN block');
  }
  const main = asCorruptDocument('APF MAIN block', () => parseMainBlock(mainBlock.data));
  const multipalBlock = blocks.find(block => block.name === 'MULTIPAL');
  const multipal = multipalBlock ? parseMultipal(multipalBlock.data) : [];
  const perLine = multipal.length >= main.scanLines.length;

  const width = main.pixelsPerLine;
  const bytesPerLine = width >> 1;
  const canvas = new RgbaCanvas(width, main.scanLines.length);
  const fallback = main.colorTables[0] ?? IIGS_STANDARD_PALETTE;

  main.scanLines.forEach((line, y) => {
    const palette = perLine ? multipal[y] : main.colorTables[line.mode & 0x0f] ?? fallback;
    paintNibbleLine(canvas, y, main.pixels.subarray(y * bytesPerLine, (y + 1) * bytesPerLine), palette);
  });
  return canvas.toImage('apf', perLine ? undefined : fallback);
}

// Paintworks files open with a palette of 16 $0RGB words, so every high byte is below $10
export function isPaintworks(data: Uint8Array): boolean {
  if (data.length < PAINTWORKS_PIXELS) {
    return false;
  }
  for (let i = 0; i < 16; i++) {
    if ((data[i * 2 + 1] & 0xf0) !== 0) {
      return false;
    }
  }
  return true;
}

export function decodePaintworks(data: Uint8Array): RasterImage {
  if (data.length < PAINTWORKS_PIXELS) {
    throw new TooShortError(`Paintworks picture needs at least ${PAINTWORKS_PIXELS} bytes, got ${data.length}`);
  }
  const palette = readColorTable(data, 0);
  const body = data.subarray(PAINTWORKS_PIXELS);

  let pixels = unpackBytes(body, 64000);
  if (pixels.length < SHR_PIXEL_BYTES) {
    if (body.length < SHR_PIXEL_BYTES || body.length > 33000) {
      throw new CorruptDocumentError(`Paintworks picture unpacks to ${pixels.length} bytes`);
    }
    pixels = body.subarray(0, SHR_PIXEL_BYTES);
  }

  const height = Math.min(Math.floor(pixels.length / 160), PAINTWORKS_MAX_LINES);
  const canvas = new RgbaCanvas(320, height);
  for (let y = 0; y < height; y++) {
    paintNibbleLine(canvas, y, pixels.subarray(y * 160, (y + 1) * 160), palette);
  }
  return canvas.toImage('paintworks', palette);
}

// A whole 32 KB screen image (pixels, control bytes, palettes) run through PackBytes
export function decodePackedSHR(data: Uint8Array): RasterImage {
  const unpacked = unpackBytes(data, SHR_SIZE);
  if (unpacked.length < SHR_PIXEL_BYTES) {
    throw new CorruptDocumentError(`Packed super hi-res picture unpacks to ${unpacked.length} bytes`);
  }
  return decodeSHR(unpacked, 'packedShr');
}

// $C0 files say little in their aux type, so the body picks the layout
export function decodePackedPicture(data: Uint8Array): RasterImage {
  if (isAPF(data)) {
    return decodeAPF(data);
  }
  if (isPaintworks(data)) {
    return decodePaintworks(data);
  }
  return decodePackedSHR(data);
}
