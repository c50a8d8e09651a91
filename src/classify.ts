// Chooses the decoder for a file from its type, aux type and a look at its bytes

import type { CatalogEntry, CatalogFormat } from './types.js';
import type { DocumentKind } from './appleworks.js';
import type { RasterFormat } from './graphics.js';
import { documentKindFor } from './appleworks.js';
import { identifyRaster } from './raster.js';
import { isApplesoftProgram, isIntegerBasicProgram } from './basic.js';
import { isGzip, isZip } from './archive.js';
import { isBinaryII } from './binaryii.js';
import { isNuFX } from './nufx.js';
import { looksLikeDiskImage } from './diskimage.js';
import { dos33EquivalentType, ucsdEquivalentType } from './filetypes.js';
import { isPrintable } from './textio.js';

export type ContentKind =
  | 'catalog'
  | 'archive'
  | 'applesoft'
  | 'integerBasic'
  | 'appleworks'
  | 'raster'
  | 'icons'
  | 'font'
  | 'text'
  | 'pascalText'
  | 'binary';

export type Classification =
  | { readonly kind: 'appleworks'; readonly document: DocumentKind }
  | { readonly kind: 'raster'; readonly format: RasterFormat }
  | { readonly kind: Exclude<ContentKind, 'appleworks' | 'raster'> };

export interface ContentSample {
  fileType: number;
  auxType: number;
  data: Uint8Array;
  system?: CatalogFormat;
  name?: string;
  resourceFork?: Uint8Array;
}

const TYPE_TXT = 0x04;
const TYPE_FNT = 0xc8;
const TYPE_ICN = 0xca;
const TYPE_INT = 0xfa;
const TYPE_BAS = 0xfc;

const TEXT_SAMPLE = 256;
const TEXT_THRESHOLD = 0.8;

export function equivalentProDOSType(fileType: number, system: CatalogFormat = 'prodos'): number {
  switch (system) {
    case 'dos33':
      return dos33EquivalentType(fileType);
    case 'ucsd':
      return ucsdEquivalentType(fileType);
    case 'prodos':
      return fileType;
  }
}

// More than 80% of the first 256 bytes printable once the high bit is stripped
export function looksLikeText(data: Uint8Array): boolean {
  const sample = data.subarray(0, TEXT_SAMPLE);
  if (sample.length === 0) {
    return false;
  }
  let printable = 0;
  for (const byte of sample) {
    if (isPrintable(byte)) {
      printable++;
    }
  }
  return printable / sample.length > TEXT_THRESHOLD;
}

export function classifyContent(sample: ContentSample): Classification {
  const { auxType, data, system, name = '' } = sample;
  const fileType = equivalentProDOSType(sample.fileType, system);

  if (isGzip(data) || isZip(data) || isBinaryII(data) || isNuFX(data)) {
    return { kind: 'archive' };
  }
  if (looksLikeDiskImage(name, data)) {
    return { kind: 'catalog' };
  }
  if (system === 'ucsd' && fileType === TYPE_TXT) {
    return { kind: 'pascalText' };
  }
  if (fileType === TYPE_BAS && isApplesoftProgram(data)) {
    return { kind: 'applesoft' };
  }
  if (fileType === TYPE_INT && isIntegerBasicProgram(data)) {
    return { kind: 'integerBasic' };
  }

  const document = documentKindFor(fileType, auxType);
  if (document) {
    return { kind: 'appleworks', document };
  }
  if (fileType === TYPE_ICN) {
    return { kind: 'icons' };
  }
  if (fileType === TYPE_FNT) {
    return { kind: 'font' };
  }
  const format = identifyRaster(data, { fileType, auxType, name });
  if (format) {
    return { kind: 'raster', format };
  }

  if (fileType === TYPE_TXT || looksLikeText(data)) {
    return { kind: 'text' };
  }
  return { kind: 'binary' };
}

export function entrySample(entry: CatalogEntry): ContentSample {
  return {
    fileType: entry.fileType,
    auxType: entry.auxType,
    data: entry.data,
    system: entry.system,
    name: entry.name,
    resourceFork: entry.resourceFork,
  };
}

export function classifyEntry(entry: CatalogEntry): Classification {
  if (entry.isDirectory) {
    return { kind: 'catalog' };
  }
  return classifyContent(entrySample(entry));
}
