// Binary II archives: a 128-byte attribute block before each file, data padded to 128 bytes

import type { DateTimeParts } from './types.js';
import type { ArchiveListing } from './archive.js';
import type { DecodeResult } from './errors.js';
import { StructTemplateParser } from './structtemplate.js';
import { MalformedHeaderError, UnrecognizedFormatError, UnsupportedMethodError, attempt } from './errors.js';
import { decodeProDOSDateTime } from './prodos.js';
import { highAsciiString } from './textio.js';

export const BINARY_II_HEADER_SIZE = 128;

const MAGIC = [0x0a, 0x47, 0x4c];
const ID_BYTE = 0x02;
const MAX_NAME_LENGTH = 64;

const DATA_FLAG_SQUEEZED = 0x80;
const DATA_FLAG_ENCRYPTED = 0x40;
const DATA_FLAG_SPARSE = 0x01;

const STORAGE_DIRECTORY = 0x0d;
const TYPE_DIRECTORY = 0x0f;

const binaryIIHeader = StructTemplateParser.fromTemplateString(
  '3s B B H B H H H H H B x T B 64s 21x H B B B H B I B H B B B B:' +
    'magic,access,fileType,auxType,storageType,blocks,modDate,modTime,createDate,createTime,idByte,eof,nameLength,name,' +
    'auxHigh,accessHigh,fileTypeHigh,storageHigh,blocksHigh,eofHigh,diskSpace,osType,nativeType,phantom,dataFlags,version,filesToFollow'
);

export interface BinaryIIEntry {
  // Partial ProDOS pathname, '/' separated
  filename: string;
  access: number;
  fileType: number;
  auxType: number;
  storageType: number;
  blocks: number;
  eof: number;
  created?: DateTimeParts;
  modified?: DateTimeParts;
  isDirectory: boolean;
  squeezed: boolean;
  encrypted: boolean;
  sparse: boolean;
  version: number;
  filesToFollow: number;
  dataOffset: number;
}

export interface BinaryIIMember {
  entry: BinaryIIEntry;
  result: DecodeResult<Uint8Array>;
}

export function isBinaryII(data: Uint8Array): boolean {
  return data.length >= BINARY_II_HEADER_SIZE && MAGIC.every((byte, i) => data[i] === byte) && data[18] === ID_BYTE;
}

function paddedLength(length: number): number {
  return Math.ceil(length / BINARY_II_HEADER_SIZE) * BINARY_II_HEADER_SIZE;
}

function readBinaryIIHeader(data: Uint8Array, offset: number): { entry: BinaryIIEntry; phantom: boolean; next: number } {
  if (offset + BINARY_II_HEADER_SIZE > data.length) {
    throw new MalformedHeaderError(`Binary II header at offset ${offset} is truncated`);
  }
  const record = StructTemplateParser.unpackRecord(data, offset, binaryIIHeader);
  const magic = record.bytes('magic');
  if (!MAGIC.every((byte, i) => magic[i] === byte) || record.num('idByte') !== ID_BYTE) {
    throw new MalformedHeaderError(`Binary II header at offset ${offset} has no signature`);
  }

  const nameLength = record.num('nameLength');
  if (nameLength === 0 || nameLength > MAX_NAME_LENGTH) {
    throw new MalformedHeaderError(`Binary II header at offset ${offset} has a ${nameLength}-character name`);
  }

  const storageType = record.num('storageType');
  const fileType = record.num('fileType');
  const isDirectory = storageType === STORAGE_DIRECTORY || fileType === TYPE_DIRECTORY;
  const eof = record.num('eofHigh') * 0x1000000 + record.num('eof');
  const dataFlags = record.num('dataFlags');
  const dataOffset = offset + BINARY_II_HEADER_SIZE;
  const dataLength = isDirectory ? 0 : eof;
  if (dataOffset + dataLength > data.length) {
    throw new MalformedHeaderError(`Binary II entry at offset ${offset} declares ${eof} bytes past the end of the archive`);
  }

  const entry: BinaryIIEntry = {
    filename: highAsciiString(record.bytes('name').subarray(0, nameLength)),
    access: record.num('access'),
    fileType,
    auxType: record.num('auxHigh') * 0x10000 + record.num('auxType'),
    storageType,
    blocks: record.num('blocksHigh') * 0x10000 + record.num('blocks'),
    eof,
    created: decodeProDOSDateTime(record.num('createDate'), record.num('createTime')),
    modified: decodeProDOSDateTime(record.num('modDate'), record.num('modTime')),
    isDirectory,
    squeezed: (dataFlags & DATA_FLAG_SQUEEZED) !== 0,
    encrypted: (dataFlags & DATA_FLAG_ENCRYPTED) !== 0,
    sparse: (dataFlags & DATA_FLAG_SPARSE) !== 0,
    version: record.num('version'),
    filesToFollow: record.num('filesToFollow'),
    dataOffset,
  };
  return { entry, phantom: record.num('phantom') !== 0, next: dataOffset + paddedLength(dataLength) };
}

// Phantom entries carry data for other programs and are stepped over
export function listBinaryII(data: Uint8Array): ArchiveListing<BinaryIIEntry> {
  if (!isBinaryII(data)) {
    throw new UnrecognizedFormatError('Not a Binary II archive');
  }

  const listing: ArchiveListing<BinaryIIEntry> = { entries: [], problems: [] };
  let offset = 0;
  let first = true;
  while (offset + BINARY_II_HEADER_SIZE <= data.length) {
    let header: ReturnType<typeof readBinaryIIHeader>;
    try {
      header = readBinaryIIHeader(data, offset);
    } catch (error) {
      if (!(error instanceof MalformedHeaderError) || first) {
        throw error;
      }
      listing.problems.push(error.message);
      break;
    }

    first = false;
    if (!header.phantom) {
      listing.entries.push(header.entry);
    }
    offset = header.next;
    if (header.entry.filesToFollow === 0) {
      break;
    }
  }
  return listing;
}

export function extractBinaryIIEntry(data: Uint8Array, entry: BinaryIIEntry): Uint8Array {
  if (entry.squeezed) {
    throw new UnsupportedMethodError(`Binary II entry '${entry.filename}' is squeezed`);
  }
  if (entry.encrypted) {
    throw new UnsupportedMethodError(`Binary II entry '${entry.filename}' is encrypted`);
  }
  return data.subarray(entry.dataOffset, entry.dataOffset + (entry.isDirectory ? 0 : entry.eof));
}

// One result per file; directories carry no data
export function extractAllBinaryIIEntries(data: Uint8Array): ArchiveListing<BinaryIIMember> {
  const { entries, problems } = listBinaryII(data);
  return {
    entries: entries
      .filter(entry => !entry.isDirectory)
      .map(entry => ({ entry, result: attempt(() => extractBinaryIIEntry(data, entry)) })),
    problems,
  };
}
