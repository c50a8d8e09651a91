// Type definitions shared across the a2decode decoders

import type { DecodeErrorKind } from './errors.js';

export type SectorOrder = 'prodos' | 'dos';

export type CatalogFormat = 'prodos' | 'dos33' | 'ucsd';

// Takes a raw deflate stream; expectedSize is a hint and may be absent
export type Inflate = (compressed: Uint8Array, expectedSize?: number) => Uint8Array;

export interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface ProDOSEntryInfo {
  storageType: number;
  keyPointer: number;
  access: number;
  version: number;
  minVersion: number;
  headerPointer: number;
}

export interface DOS33EntryInfo {
  rawType: number;
  locked: boolean;
  trackSectorList: { track: number; sector: number };
}

export interface UCSDEntryInfo {
  firstBlock: number;
  lastBlock: number;
  kind: number;
  bytesInLastBlock: number;
}

// A damaged part of a catalog that the walk stepped over
export interface CatalogProblem {
  readonly path?: string;
  readonly kind: DecodeErrorKind;
  readonly message: string;
}

export interface CatalogEntry {
  readonly name: string;
  readonly path: string;
  readonly system: CatalogFormat;
  readonly fileType: number;
  readonly fileTypeLabel: string;
  readonly auxType: number;
  readonly size: number;
  readonly blocks: number;
  readonly loadAddress?: number;
  readonly length?: number;
  readonly data: Uint8Array;
  // Only ProDOS extended files carry one
  readonly resourceFork?: Uint8Array;
  readonly isDirectory: boolean;
  readonly isImage: boolean;
  readonly children: readonly CatalogEntry[];
  readonly created?: DateTimeParts;
  readonly modified?: DateTimeParts;
  readonly prodos?: ProDOSEntryInfo;
  readonly dos33?: DOS33EntryInfo;
  readonly ucsd?: UCSDEntryInfo;
  // Set on a subdirectory placeholder whose own directory could not be read
  readonly problem?: CatalogProblem;
}

export interface DiskCatalog {
  readonly format: CatalogFormat;
  readonly order: SectorOrder;
  readonly volumeName: string;
  readonly diskSize: number;
  readonly totalBlocks: number;
  readonly created?: DateTimeParts;
  readonly root: CatalogEntry;
  readonly problems: readonly CatalogProblem[];
}

export interface DecodeOptions {
  inflate?: Inflate;
  strict?: boolean;
  order?: SectorOrder;
  format?: CatalogFormat;
  quiet?: boolean;
}

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface StructTemplate {
  format: string;
  fieldNames: (string | null)[];
  isList: boolean;
  recordLength: number;
}

// What a filesystem reader hands back to the catalog walker
export interface VolumeListing {
  volumeName: string;
  totalBlocks: number;
  created?: DateTimeParts;
  entries: CatalogEntry[];
  problems: CatalogProblem[];
}
