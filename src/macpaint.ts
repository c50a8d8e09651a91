// MacPaint documents: 512-byte header then 720 PackBits rows of 72 bytes

import type { RGB } from './types.js';
import type { RasterImage } from './graphics.js';
import { RgbaCanvas } from './graphics.js';
import { ByteReader } from './bytereader.js';
import { TooShortError, UnrecognizedFormatError } from './errors.js';

export const MACPAINT_WIDTH = 576;
export const MACPAINT_HEIGHT = 720;
const ROW_BYTES = 72;
const HEADER_SIZE = 512;
const MIN_SIZE = HEADER_SIZE + 100;
const VERSIONS = [0, 2, 3];
const PROBE_ROWS = 10;

const BLACK: RGB = { r: 0, g: 0, b: 0 };
const WHITE: RGB = { r: 255, g: 255, b: 255 };

/**
 * Unpacks one PackBits row into `row`, zero-filling whatever the source
 * runs out before providing. Returns the offset after the row, or -1 when
 * a repeat run has lost its value byte.
 */
export function unpackBitsRow(data: Uint8Array, offset: number, row: Uint8Array): number {
  let src = offset;
  let dst = 0;
  row.fill(0);

  while (dst < row.length && src < data.length) {
    const flag = data[src++];
    if (flag === 0x80) {
      continue;
    }
    if (flag > 0x80) {
      const count = 257 - flag;
      if (src >= data.length) {
        return -1;
      }
      const value = data[src++];
      const n = Math.min(count, row.length - dst);
      row.fill(value, dst, dst + n);
      dst += n;
    } else {
      const count = Math.min(flag + 1, data.length - src, row.length - dst);
      row.set(data.subarray(src, src + count), dst);
      src += count;
      dst += count;
    }
  }
  return src;
}

export function isMacPaint(data: Uint8Array): boolean {
  if (data.length < MIN_SIZE || !VERSIONS.includes(new ByteReader(data).u32BEAt(0))) {
    return false;
  }
  const row = new Uint8Array(ROW_BYTES);
  let offset = HEADER_SIZE;
  for (let i = 0; i < PROBE_ROWS; i++) {
    offset = unpackBitsRow(data, offset, row);
    if (offset < 0) {
      return false;
    }
  }
  return true;
}

// Set bits are black; rows after a damaged run stay white
export function decodeMacPaint(data: Uint8Array): RasterImage {
  if (data.length < MIN_SIZE) {
    throw new TooShortError(`MacPaint document needs at least ${MIN_SIZE} bytes, got ${data.length}`);
  }
  if (!isMacPaint(data)) {
    throw new UnrecognizedFormatError('Not a MacPaint document');
  }
  const canvas = new RgbaCanvas(MACPAINT_WIDTH, MACPAINT_HEIGHT);
  const row = new Uint8Array(ROW_BYTES);
  let offset = HEADER_SIZE;

  for (let y = 0; y < MACPAINT_HEIGHT; y++) {
    if (offset >= 0) {
      offset = unpackBitsRow(data, offset, row);
    }
    if (offset < 0) {
      row.fill(0);
    }
    for (let x = 0; x < MACPAINT_WIDTH; x++) {
      const bit = (row[x >> 3] >> (7 - (x & 7))) & 1;
      canvas.set(x, y, bit ? BLACK : WHITE);
    }
  }
  return canvas.toImage('macPaint', [WHITE, BLACK]);
}
