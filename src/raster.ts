// Picks a picture format from file type, aux type and size, then decodes it

import type { RasterFormat, RasterImage } from './graphics.js';
import {
  DHGR_SIZE,
  HGR_SIZE,
  SHR3200_SIZE,
  SHR_PIXEL_BYTES,
  SHR_SIZE,
  decodeDHGR,
  decodeHGR,
  decodeSHR,
  decodeSHR3200,
} from './graphics.js';
import { decodeAPF, decodePackedSHR, decodePaintworks, isAPF, isPaintworks, unpackBytes } from './packed.js';
import { decodeMacPaint, isMacPaint } from './macpaint.js';
import { UnrecognizedFormatError } from './errors.js';

export interface RasterHints {
  fileType?: number;
  auxType?: number;
  name?: string;
}

const TYPE_UNTYPED = 0x00;
const TYPE_BIN = 0x06;
const TYPE_FOT = 0x08;
const TYPE_PNT = 0xc0;
const TYPE_PIC = 0xc1;

const FOT_PACKED_HGR = 0x4000;
const FOT_PACKED_DHGR = 0x4001;

const HGR_MAX_SIZE = 8200;
const SHR3200_MAX_SIZE = 39000;
const MACPAINT_EXTENSIONS = ['.mac', '.pntg'];

function between(value: number, low: number, high: number): boolean {
  return value >= low && value <= high;
}

// Sizes that only one screen layout produces
function formatBySize(length: number): RasterFormat | undefined {
  if (between(length, HGR_SIZE, HGR_MAX_SIZE)) {
    return 'hgr';
  }
  if (length === DHGR_SIZE) {
    return 'dhgr';
  }
  if (between(length, SHR_PIXEL_BYTES, SHR_SIZE)) {
    return 'shr';
  }
  if (between(length, SHR3200_SIZE, SHR3200_MAX_SIZE)) {
    return 'shr3200';
  }
  return undefined;
}

function mayBeMacPaint(hints: RasterHints): boolean {
  const name = hints.name?.toLowerCase() ?? '';
  return hints.fileType === undefined || hints.fileType === TYPE_UNTYPED || MACPAINT_EXTENSIONS.some(ext => name.endsWith(ext));
}

export function identifyRaster(data: Uint8Array, hints: RasterHints = {}): RasterFormat | undefined {
  const { fileType, auxType = 0 } = hints;
  const length = data.length;

  switch (fileType) {
    case TYPE_FOT:
      if (auxType === FOT_PACKED_HGR) {
        return 'hgr';
      }
      if (auxType === FOT_PACKED_DHGR) {
        return 'dhgr';
      }
      break;
    case TYPE_PNT:
      if (auxType === 0x0000) {
        return 'paintworks';
      }
      if (auxType === 0x0001) {
        return 'packedShr';
      }
      if (auxType === 0x0002 || isAPF(data)) {
        return 'apf';
      }
      return isPaintworks(data) ? 'paintworks' : 'packedShr';
    case TYPE_PIC:
      if (auxType === 0x0002) {
        return 'shr3200';
      }
      return length >= SHR_PIXEL_BYTES ? 'shr' : undefined;
    case TYPE_BIN:
      // Hi-res pages load at $2000 or $4000; double hi-res splits across both banks
      if ((auxType === 0x2000 || auxType === 0x4000) && between(length, HGR_SIZE, HGR_MAX_SIZE)) {
        return 'hgr';
      }
      if (between(auxType, 0x2000, 0x3fff) && length === DHGR_SIZE) {
        return 'dhgr';
      }
      break;
    case undefined:
    case TYPE_UNTYPED:
      break;
    default:
      if (!mayBeMacPaint(hints)) {
        return undefined;
      }
  }

  if (mayBeMacPaint(hints) && isMacPaint(data)) {
    return 'macPaint';
  }
  if (fileType === undefined || fileType === TYPE_UNTYPED || fileType === TYPE_BIN || fileType === TYPE_FOT) {
    return formatBySize(length);
  }
  return undefined;
}

export function decodeRasterAs(data: Uint8Array, format: RasterFormat): RasterImage {
  switch (format) {
    case 'hgr':
      return decodeHGR(data);
    case 'dhgr':
      return decodeDHGR(data);
    case 'shr':
      return decodeSHR(data);
    case 'shr3200':
      return decodeSHR3200(data);
    case 'packedShr':
      return decodePackedSHR(data);
    case 'apf':
      return decodeAPF(data);
    case 'paintworks':
      return decodePaintworks(data);
    case 'macPaint':
      return decodeMacPaint(data);
  }
}

export function decodeRaster(data: Uint8Array, hints: RasterHints = {}): RasterImage {
  const format = identifyRaster(data, hints);
  if (format === undefined) {
    throw new UnrecognizedFormatError(`No picture format matches ${data.length} bytes`);
  }
  // FOT $4000 and $4001 hold a screen run through PackBytes; a full-size body is taken as already unpacked
  if (hints.fileType === TYPE_FOT && format === 'hgr' && data.length < HGR_SIZE) {
    return decodeHGR(unpackBytes(data, 8192));
  }
  if (hints.fileType === TYPE_FOT && format === 'dhgr' && data.length < DHGR_SIZE) {
    return decodeDHGR(unpackBytes(data, DHGR_SIZE));
  }
  return decodeRasterAs(data, format);
}
