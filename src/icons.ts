// Finder icon files ($CA): a 26-byte header followed by variable-length icon records

import type { RGB } from './types.js';
import { IIGS_STANDARD_PALETTE, RgbaCanvas } from './graphics.js';
import { ByteReader } from './bytereader.js';
import { TooShortError, UnrecognizedFormatError } from './errors.js';
import { pascalString } from './textio.js';

const FILE_HEADER = 0x1a;
const RECORD_PATHNAME = 0x02;
const RECORD_NAME_FILTER = 0x42;
const RECORD_LARGE_ICON = 0x56;
const MIN_RECORD = 0x60;
const MAX_RECORD = 0x4000;
const ICON_HEADER = 8;
const MIN_DIMENSION = 4;
const MAX_DIMENSION = 128;

export interface IconImage {
  readonly width: number;
  readonly height: number;
  // RGBA with alpha 0 wherever the mask is clear
  readonly pixels: Uint8Array;
  // One byte per pixel: 1 where the icon is drawn, 0 where it is transparent
  readonly mask: Uint8Array;
  readonly palette: readonly RGB[];
}

export type IconSlot =
  | { readonly decoded: true; readonly image: IconImage }
  | { readonly decoded: false; readonly reason: string };

export interface IconResource {
  readonly pathname: string;
  readonly nameFilter: string;
  readonly large?: IconSlot;
  readonly small?: IconSlot;
}

export interface IconFile {
  readonly icons: readonly IconResource[];
  readonly problems: readonly string[];
}

interface ParsedSlot {
  slot: IconSlot;
  // Undefined when the slot's extent could not be established
  end?: number;
}

// Pixels and mask are both 4 bits per pixel, left pixel in the high nibble; a zero mask nibble is transparent
function compositeIcon(width: number, height: number, rowBytes: number, pixels: Uint8Array, mask: Uint8Array): IconImage {
  const canvas = new RgbaCanvas(width, height);
  const opaque = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const index = y * rowBytes + (x >> 1);
      const shift = x & 1 ? 0 : 4;
      const color = (pixels[index] >> shift) & 0x0f;
      const drawn = ((mask[index] >> shift) & 0x0f) !== 0;
      opaque[y * width + x] = drawn ? 1 : 0;
      canvas.set(x, y, IIGS_STANDARD_PALETTE[color], drawn ? 255 : 0);
    }
  }
  return { width, height, pixels: canvas.pixels, mask: opaque, palette: IIGS_STANDARD_PALETTE };
}

function parseIcon(reader: ByteReader, offset: number, limit: number): ParsedSlot {
  if (offset + ICON_HEADER > limit) {
    return { slot: { decoded: false, reason: `icon header at ${offset} runs past its record` } };
  }
  const size = reader.u16At(offset + 2);
  const height = reader.u16At(offset + 4);
  const width = reader.u16At(offset + 6);
  const dataStart = offset + ICON_HEADER;
  const end = dataStart + size * 2;

  if (end > limit) {
    return { slot: { decoded: false, reason: `icon at ${offset} declares ${size} bytes of pixels and mask past its record` } };
  }
  if (width < MIN_DIMENSION || width > MAX_DIMENSION || height < MIN_DIMENSION || height > MAX_DIMENSION) {
    return { slot: { decoded: false, reason: `icon at ${offset} is ${width}x${height}` }, end };
  }
  const rowBytes = size / height;
  if (!Number.isInteger(rowBytes) || rowBytes < Math.ceil(width / 2)) {
    return {
      slot: { decoded: false, reason: `icon at ${offset} holds ${size} bytes, which does not fit ${height} rows of ${width} pixels` },
      end,
    };
  }

  const pixels = reader.bytesAt(dataStart, size);
  const mask = reader.bytesAt(dataStart + size, size);
  return { slot: { decoded: true, image: compositeIcon(width, height, rowBytes, pixels, mask) }, end };
}

function fieldString(reader: ByteReader, offset: number, fieldLength: number): string {
  const text = pascalString(reader.bytesAt(offset, fieldLength));
  return /^[\x20-\x7e]*$/.test(text) ? text : '';
}

function readRecord(reader: ByteReader, offset: number, recordEnd: number): IconResource {
  const pathname = fieldString(reader, offset + RECORD_PATHNAME, 64);
  const nameFilter = fieldString(reader, offset + RECORD_NAME_FILTER, 16);

  const large = parseIcon(reader, offset + RECORD_LARGE_ICON, recordEnd);
  // The small icon follows the large one directly, when there is room for it
  if (large.end === undefined || large.end + ICON_HEADER >= recordEnd) {
    return { pathname, nameFilter, large: large.slot };
  }
  return { pathname, nameFilter, large: large.slot, small: parseIcon(reader, large.end, recordEnd).slot };
}

export function decodeIconFile(data: Uint8Array): IconFile {
  if (data.length < FILE_HEADER + MIN_RECORD) {
    throw new TooShortError(`Icon file needs at least ${FILE_HEADER + MIN_RECORD} bytes, got ${data.length}`);
  }
  const reader = new ByteReader(data);
  const icons: IconResource[] = [];
  const problems: string[] = [];
  let offset = FILE_HEADER;

  while (offset + 2 <= data.length) {
    const recordLength = reader.u16At(offset);
    if (recordLength === 0) {
      break;
    }
    if (recordLength < MIN_RECORD || recordLength > MAX_RECORD || offset + recordLength > data.length) {
      problems.push(`icon record at ${offset} has implausible length ${recordLength}`);
      break;
    }
    icons.push(readRecord(reader, offset, offset + recordLength));
    offset += recordLength;
  }

  if (icons.length === 0) {
    throw new UnrecognizedFormatError(problems[0] ?? 'Icon file has no icon records');
  }
  return { icons, problems };
}
