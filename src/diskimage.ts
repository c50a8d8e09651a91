// Block and sector addressing over raw disk images, plus 2IMG unwrapping

import type { SectorOrder } from './types.js';
import { StructTemplateParser } from './structtemplate.js';
import { MalformedHeaderError, OutOfBoundsError, UnrecognizedFormatError } from './errors.js';
import { highAsciiString } from './textio.js';

export const BLOCK_SIZE = 512;
export const SECTOR_SIZE = 256;
export const SECTORS_PER_TRACK = 16;
export const FLOPPY_140K = 35 * SECTORS_PER_TRACK * SECTOR_SIZE;
export const FLOPPY_800K = 1600 * BLOCK_SIZE;

// ProDOS block n of a track is stored in these two DOS 3.3 logical sectors
const BLOCK_TO_DOS_SECTORS: readonly (readonly [number, number])[] = [
  [0, 14], [13, 12], [11, 10], [9, 8], [7, 6], [5, 4], [3, 2], [1, 15],
];

export class DiskImage {
  readonly data: Uint8Array;
  readonly order: SectorOrder;

  constructor(data: Uint8Array, order: SectorOrder) {
    this.data = data;
    this.order = order;
  }

  get blockCount(): number {
    return Math.floor(this.data.length / BLOCK_SIZE);
  }

  get trackCount(): number {
    return Math.floor(this.data.length / (SECTORS_PER_TRACK * SECTOR_SIZE));
  }

  hasBlock(block: number): boolean {
    return Number.isInteger(block) && block >= 0 && block < this.blockCount;
  }

  readBlock(block: number): Uint8Array {
    if (!this.hasBlock(block)) {
      throw new OutOfBoundsError(`block ${block} is outside a ${this.blockCount}-block image`);
    }

    if (this.order === 'prodos') {
      return this.data.subarray(block * BLOCK_SIZE, (block + 1) * BLOCK_SIZE);
    }

    const track = Math.floor(block / 8);
    const [first, second] = BLOCK_TO_DOS_SECTORS[block % 8];
    const result = new Uint8Array(BLOCK_SIZE);
    result.set(this.readSector(track, first), 0);
    result.set(this.readSector(track, second), SECTOR_SIZE);
    return result;
  }

  // A view for ProDOS-ordered images, a copy when sectors have to be reassembled
  readBlocks(first: number, count: number): Uint8Array {
    if (count === 0) {
      return new Uint8Array(0);
    }
    if (!this.hasBlock(first) || !this.hasBlock(first + count - 1)) {
      throw new OutOfBoundsError(`blocks ${first}..${first + count - 1} are outside a ${this.blockCount}-block image`);
    }
    if (this.order === 'prodos') {
      return this.data.subarray(first * BLOCK_SIZE, (first + count) * BLOCK_SIZE);
    }
    const result = new Uint8Array(count * BLOCK_SIZE);
    for (let i = 0; i < count; i++) {
      result.set(this.readBlock(first + i), i * BLOCK_SIZE);
    }
    return result;
  }

  readSector(track: number, sector: number): Uint8Array {
    if (!Number.isInteger(track) || !Number.isInteger(sector) || sector < 0 || sector >= SECTORS_PER_TRACK || track < 0) {
      throw new OutOfBoundsError(`track ${track} sector ${sector} is not a valid sector address`);
    }

    const offset = this.order === 'dos'
      ? (track * SECTORS_PER_TRACK + sector) * SECTOR_SIZE
      : this.prodosOrderSectorOffset(track, sector);

    if (offset + SECTOR_SIZE > this.data.length) {
      throw new OutOfBoundsError(`track ${track} sector ${sector} is outside a ${this.data.length}-byte image`);
    }
    return this.data.subarray(offset, offset + SECTOR_SIZE);
  }

  private prodosOrderSectorOffset(track: number, sector: number): number {
    for (let i = 0; i < BLOCK_TO_DOS_SECTORS.length; i++) {
      const half = BLOCK_TO_DOS_SECTORS[i].indexOf(sector);
      if (half >= 0) {
        return (track * 8 + i) * BLOCK_SIZE + half * SECTOR_SIZE;
      }
    }
    throw new OutOfBoundsError(`sector ${sector} has no block mapping`);
  }
}

const twoImgHeader = StructTemplateParser.fromTemplateString(
  '4s 4s H H I I I I I:magic,creator,headerSize,version,imageFormat,flags,blocks,dataOffset,dataLength'
);

const TWO_IMG_FLAG_LOCKED = 0x80000000;
const TWO_IMG_FLAG_VOLUME_VALID = 0x100;

export interface TwoImgHeader {
  creator: string;
  version: number;
  format: number;
  locked: boolean;
  volumeNumber?: number;
  dataOffset: number;
  dataLength: number;
}

export interface UnwrappedImage {
  image: Uint8Array;
  // Known only when a container header says so
  order?: SectorOrder;
  twoImg?: TwoImgHeader;
}

export function is2img(data: Uint8Array): boolean {
  return data.length >= 4 && data[0] === 0x32 && data[1] === 0x49 && data[2] === 0x4d && data[3] === 0x47;
}

export function unwrap2img(data: Uint8Array): UnwrappedImage {
  if (!is2img(data)) {
    throw new UnrecognizedFormatError('Not a 2IMG disk image');
  }
  if (data.length < 64) {
    throw new MalformedHeaderError(`2IMG header needs 64 bytes, image has ${data.length}`);
  }

  const record = StructTemplateParser.unpackRecord(data, 0, twoImgHeader);
  const format = record.num('imageFormat');
  const flags = record.num('flags');
  const dataOffset = record.num('dataOffset') || record.num('headerSize');
  let dataLength = record.num('dataLength');
  if (dataLength === 0 && format === 1) {
    // Some writers leave the length empty for ProDOS-order images
    dataLength = record.num('blocks') * BLOCK_SIZE;
  }

  if (format !== 0 && format !== 1) {
    throw new UnrecognizedFormatError(`2IMG image format ${format} (nibble data) is not supported`);
  }
  if (dataOffset + dataLength > data.length || dataLength === 0) {
    throw new MalformedHeaderError(`2IMG data span ${dataOffset}+${dataLength} does not fit a ${data.length}-byte file`);
  }

  return {
    image: data.subarray(dataOffset, dataOffset + dataLength),
    order: format === 0 ? 'dos' : 'prodos',
    twoImg: {
      creator: highAsciiString(record.bytes('creator')),
      version: record.num('version'),
      format,
      locked: (flags & TWO_IMG_FLAG_LOCKED) !== 0,
      volumeNumber: (flags & TWO_IMG_FLAG_VOLUME_VALID) !== 0 ? flags & 0xff : undefined,
      dataOffset,
      dataLength,
    },
  };
}

export function unwrapDiskImage(data: Uint8Array): UnwrappedImage {
  return is2img(data) ? unwrap2img(data) : { image: data };
}

// Orders worth trying for a raw image, hinted order first
export function candidateOrders(length: number, hint?: SectorOrder): SectorOrder[] {
  const first: SectorOrder = hint ?? 'prodos';
  if (length !== FLOPPY_140K) {
    return [first];
  }
  return first === 'prodos' ? ['prodos', 'dos'] : ['dos', 'prodos'];
}

const IMAGE_EXTENSIONS = ['.po', '.do', '.dsk', '.2mg', '.2img', '.hdv'];

// Cheap signature checks only; the catalog walker does the real detection
export function looksLikeDiskImage(name: string, data: Uint8Array): boolean {
  if (is2img(data)) {
    return true;
  }
  const lower = name.toLowerCase();
  if (IMAGE_EXTENSIONS.some(ext => lower.endsWith(ext))) {
    return true;
  }
  if (data.length === FLOPPY_140K) {
    const vtoc = 17 * SECTORS_PER_TRACK * SECTOR_SIZE;
    if (data[vtoc + 0x01] === 17 && data[vtoc + 0x35] === SECTORS_PER_TRACK) {
      return true;
    }
  }
  if (data.length === FLOPPY_140K || data.length === FLOPPY_800K) {
    return (data[2 * BLOCK_SIZE + 4] >> 4) === 0xf || (data[11 * SECTOR_SIZE + 4] >> 4) === 0xf;
  }
  return false;
}
