// File type tables for ProDOS, DOS 3.3 and UCSD Pascal catalogs

import fileTypeData from './data/filetypes.json' with { type: 'json' };

export interface FileTypeInfo {
  shortName: string;
  description: string;
  category: string;
  isGraphics: boolean;
}

interface FileTypeTable {
  types: Record<string, string[]>;
  aux: Record<string, string[]>;
}

const table: FileTypeTable = fileTypeData;

function hex(value: number, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, '0');
}

function toInfo(row: string[]): FileTypeInfo {
  const [shortName = '', description = '', category = ''] = row;
  return { shortName, description, category, isGraphics: category === 'Graphics' };
}

export function fileTypeInfo(fileType: number, auxType?: number): FileTypeInfo {
  if (auxType !== undefined) {
    const byAux = table.aux[`${hex(fileType, 2)}/${hex(auxType, 4)}`];
    if (byAux) {
      return toInfo(byAux);
    }
  }

  const byType = table.types[hex(fileType, 2)];
  if (byType) {
    return toInfo(byType);
  }

  return { shortName: `$${hex(fileType, 2)}`, description: 'Unknown Type', category: 'Unknown', isGraphics: false };
}

export function storageTypeDescription(storageType: number): string {
  switch (storageType) {
    case 0x0: return 'Deleted';
    case 0x1: return 'Seedling';
    case 0x2: return 'Sapling';
    case 0x3: return 'Tree';
    case 0x4: return 'Pascal Area';
    case 0x5: return 'Extended';
    case 0xD: return 'Subdirectory';
    case 0xE: return 'Subdirectory Header';
    case 0xF: return 'Volume Directory Header';
    default: return `Unknown ($${hex(storageType, 1)})`;
  }
}

const ACCESS_FLAGS: [number, string][] = [
  [0x80, 'destroy'],
  [0x40, 'rename'],
  [0x20, 'backup'],
  [0x02, 'write'],
  [0x01, 'read'],
];

export function accessFlagNames(access: number): string[] {
  return ACCESS_FLAGS.filter(([bit]) => (access & bit) !== 0).map(([, name]) => name);
}

// DOS 3.3 catalog type byte, high bit (lock) already stripped
export function dos33TypeLabel(rawType: number): string {
  switch (rawType) {
    case 0x00: return 'T';
    case 0x01: return 'I';
    case 0x02: return 'A';
    case 0x04: return 'B';
    case 0x08: return 'S';
    case 0x10: return 'R';
    case 0x20: return 'AA';
    case 0x40: return 'BB';
    default: return `$${hex(rawType, 2)}`;
  }
}

// Closest ProDOS type for a DOS 3.3 file, used when routing content to a decoder
export function dos33EquivalentType(rawType: number): number {
  switch (rawType) {
    case 0x00: return 0x04;
    case 0x01: return 0xFA;
    case 0x02: return 0xFC;
    case 0x04: return 0x06;
    case 0x10: return 0xFE;
    default: return 0x00;
  }
}

export const UCSD_KINDS = ['NONE', 'BAD', 'CODE', 'TEXT', 'INFO', 'DATA', 'GRAF', 'FOTO', 'SDIR'] as const;

export type UCSDKindName = (typeof UCSD_KINDS)[number];

export function ucsdKindLabel(kind: number): string {
  return kind >= 0 && kind < UCSD_KINDS.length ? UCSD_KINDS[kind] : `$${hex(kind, 2)}`;
}

// Closest ProDOS type for a UCSD Pascal file kind
export function ucsdEquivalentType(kind: number): number {
  switch (ucsdKindLabel(kind)) {
    case 'TEXT': return 0x04;
    case 'CODE': return 0x02;
    case 'FOTO': return 0x08;
    case 'DATA': return 0x06;
    default: return 0x00;
  }
}
