// Apple II and IIgs screen-memory images rendered to RGBA pixel buffers

import type { RGB } from './types.js';
import { TooShortError } from './errors.js';

export type RasterFormat =
  | 'hgr'
  | 'dhgr'
  | 'shr'
  | 'shr3200'
  | 'packedShr'
  | 'apf'
  | 'paintworks'
  | 'macPaint';

export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly format: RasterFormat;
  // RGBA, four bytes per pixel, rows top to bottom
  readonly pixels: Uint8Array;
  readonly palette?: readonly RGB[];
}

export const HGR_SIZE = 8184;
export const DHGR_SIZE = 16384;
export const SHR_PIXEL_BYTES = 32000;
export const SHR_SIZE = 32768;
export const SHR3200_SIZE = 38400;

const SHR_WIDTH = 320;
const SHR_HEIGHT = 200;
const SHR_BYTES_PER_LINE = 160;
const SHR_SCB_OFFSET = 32000;
const SHR_PALETTE_OFFSET = 32256;

const HGR_BLACK: RGB = { r: 0, g: 0, b: 0 };
const HGR_WHITE: RGB = { r: 255, g: 255, b: 255 };
const HGR_GREEN: RGB = { r: 32, g: 192, b: 32 };
const HGR_VIOLET: RGB = { r: 160, g: 32, b: 240 };
const HGR_ORANGE: RGB = { r: 255, g: 100, b: 0 };
const HGR_BLUE: RGB = { r: 60, g: 60, b: 255 };

export const HGR_PALETTE: readonly RGB[] = [HGR_BLACK, HGR_WHITE, HGR_GREEN, HGR_VIOLET, HGR_ORANGE, HGR_BLUE];

export const DHGR_PALETTE: readonly RGB[] = [
  { r: 0, g: 0, b: 0 },
  { r: 134, g: 18, b: 192 },
  { r: 0, g: 101, b: 43 },
  { r: 48, g: 48, b: 255 },
  { r: 165, g: 95, b: 0 },
  { r: 172, g: 172, b: 172 },
  { r: 0, g: 226, b: 0 },
  { r: 0, g: 255, b: 146 },
  { r: 224, g: 0, b: 39 },
  { r: 223, g: 17, b: 212 },
  { r: 81, g: 81, b: 81 },
  { r: 78, g: 158, b: 255 },
  { r: 255, g: 39, b: 0 },
  { r: 255, g: 150, b: 153 },
  { r: 255, g: 253, b: 0 },
  { r: 255, g: 255, b: 255 },
];

// IIgs colour words are $0RGB with 4 bits per channel
export function iigsColor(word: number): RGB {
  return { r: ((word >> 8) & 0x0f) * 17, g: ((word >> 4) & 0x0f) * 17, b: (word & 0x0f) * 17 };
}

// Colour table the IIgs Finder and QuickDraw II start with
export const IIGS_STANDARD_PALETTE: readonly RGB[] = [
  0x000, 0xd03, 0x009, 0xd2d, 0x072, 0x555, 0x22f, 0x6af,
  0x850, 0xf60, 0xaaa, 0xf98, 0x1d0, 0xff0, 0x4f9, 0xfff,
].map(iigsColor);

export function grayPalette(): RGB[] {
  return Array.from({ length: 16 }, (_, i) => ({ r: i * 17, g: i * 17, b: i * 17 }));
}

// Fixed-size RGBA surface the decoders paint into
export class RgbaCanvas {
  readonly pixels: Uint8Array;

  constructor(readonly width: number, readonly height: number) {
    this.pixels = new Uint8Array(width * height * 4);
  }

  set(x: number, y: number, color: RGB, alpha: number = 255): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return;
    }
    const index = (y * this.width + x) * 4;
    this.pixels[index] = color.r;
    this.pixels[index + 1] = color.g;
    this.pixels[index + 2] = color.b;
    this.pixels[index + 3] = alpha;
  }

  toImage(format: RasterFormat, palette?: readonly RGB[]): RasterImage {
    return { width: this.width, height: this.height, format, pixels: this.pixels, palette };
  }
}

// Sixteen $0RGB words, two bytes each
export function readColorTable(data: Uint8Array, offset: number, reversed: boolean = false): RGB[] {
  if (offset + 32 > data.length) {
    return grayPalette();
  }
  const colors: RGB[] = [];
  for (let i = 0; i < 16; i++) {
    colors.push(iigsColor(data[offset + i * 2] | (data[offset + i * 2 + 1] << 8)));
  }
  return reversed ? colors.reverse() : colors;
}

// Paints one line of 4-bit pixels, high nibble first
export function paintNibbleLine(canvas: RgbaCanvas, y: number, line: Uint8Array, palette: readonly RGB[]): void {
  for (let xByte = 0; xByte < line.length; xByte++) {
    const byte = line[xByte];
    canvas.set(xByte * 2, y, palette[byte >> 4]);
    canvas.set(xByte * 2 + 1, y, palette[byte & 0x0f]);
  }
}

// Hi-res screen rows are interleaved in thirds and eighths
export function hiresLineOffset(y: number): number {
  return ((y & 7) << 10) | (((y >> 3) & 7) << 7) | ((y >> 6) * 40);
}

export function decodeHGR(data: Uint8Array): RasterImage {
  if (data.length < HGR_SIZE) {
    throw new TooShortError(`Hi-res picture needs ${HGR_SIZE} bytes, got ${data.length}`);
  }
  const canvas = new RgbaCanvas(280, 192);
  for (let y = 0; y < 192; y++) {
    const lineStart = hiresLineOffset(y);
    for (let xByte = 0; xByte < 40; xByte++) {
      const current = data[lineStart + xByte];
      const next = xByte < 39 ? data[lineStart + xByte + 1] : 0;
      const shifted = (current & 0x80) !== 0;

      for (let bit = 0; bit < 7; bit++) {
        const x = xByte * 7 + bit;
        const on = (current >> bit) & 1;
        const neighbour = bit === 6 ? next & 1 : (current >> (bit + 1)) & 1;

        let color: RGB;
        if (on === neighbour) {
          color = on ? HGR_WHITE : HGR_BLACK;
        } else {
          // Bit 7 shifts the byte half a dot, swapping violet/green for blue/orange
          const litHere = (on === 1) === (x % 2 === 0);
          if (shifted) {
            color = litHere ? HGR_BLUE : HGR_ORANGE;
          } else {
            color = litHere ? HGR_VIOLET : HGR_GREEN;
          }
        }
        canvas.set(x, y, color);
      }
    }
  }
  return canvas.toImage('hgr', HGR_PALETTE);
}

// Auxiliary bank first, then main; on screen each aux byte precedes its main byte
export function decodeDHGR(data: Uint8Array): RasterImage {
  if (data.length < DHGR_SIZE) {
    throw new TooShortError(`Double hi-res picture needs ${DHGR_SIZE} bytes, got ${data.length}`);
  }
  const aux = data.subarray(0, 8192);
  const main = data.subarray(8192, 16384);
  const canvas = new RgbaCanvas(280, 192);

  for (let y = 0; y < 192; y++) {
    const lineStart = hiresLineOffset(y);
    const bits: number[] = [];
    for (let xByte = 0; xByte < 40; xByte++) {
      for (const bank of [aux, main]) {
        const byte = bank[lineStart + xByte];
        for (let bit = 0; bit < 7; bit++) {
          bits.push((byte >> bit) & 1);
        }
      }
    }
    // 560 dots make 140 four-dot colour cells, two output pixels each
    for (let cell = 0; cell < 140; cell++) {
      const base = cell * 4;
      const index = bits[base] | (bits[base + 1] << 1) | (bits[base + 2] << 2) | (bits[base + 3] << 3);
      canvas.set(cell * 2, y, DHGR_PALETTE[index]);
      canvas.set(cell * 2 + 1, y, DHGR_PALETTE[index]);
    }
  }
  return canvas.toImage('dhgr', DHGR_PALETTE);
}

// 320x200 with a scan-line control byte per row picking one of 16 palettes
export function decodeSHR(data: Uint8Array, format: RasterFormat = 'shr'): RasterImage {
  if (data.length < SHR_PIXEL_BYTES) {
    throw new TooShortError(`Super hi-res picture needs ${SHR_PIXEL_BYTES} bytes, got ${data.length}`);
  }
  const palettes: RGB[][] = [];
  for (let i = 0; i < 16; i++) {
    palettes.push(readColorTable(data, SHR_PALETTE_OFFSET + i * 32));
  }

  const canvas = new RgbaCanvas(SHR_WIDTH, SHR_HEIGHT);
  for (let y = 0; y < SHR_HEIGHT; y++) {
    const scb = SHR_SCB_OFFSET + y < data.length ? data[SHR_SCB_OFFSET + y] : 0;
    const line = data.subarray(y * SHR_BYTES_PER_LINE, (y + 1) * SHR_BYTES_PER_LINE);
    paintNibbleLine(canvas, y, line, palettes[scb & 0x0f]);
  }
  return canvas.toImage(format, palettes[0]);
}

// Brooks format: one palette per scan line, stored with colour 15 first
export function decodeSHR3200(data: Uint8Array): RasterImage {
  if (data.length < SHR3200_SIZE) {
    throw new TooShortError(`3200-colour picture needs ${SHR3200_SIZE} bytes, got ${data.length}`);
  }
  const canvas = new RgbaCanvas(SHR_WIDTH, SHR_HEIGHT);
  for (let y = 0; y < SHR_HEIGHT; y++) {
    const palette = readColorTable(data, SHR_PIXEL_BYTES + y * 32, true);
    const line = data.subarray(y * SHR_BYTES_PER_LINE, (y + 1) * SHR_BYTES_PER_LINE);
    paintNibbleLine(canvas, y, line, palette);
  }
  return canvas.toImage('shr3200');
}
