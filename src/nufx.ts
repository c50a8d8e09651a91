// NuFX (ShrinkIt) archive listing and extraction of uncompressed threads

import type { DateTimeParts } from './types.js';
import type { ArchiveListing } from './archive.js';
import type { DecodeResult } from './errors.js';
import { ByteReader } from './bytereader.js';
import { StructTemplateParser } from './structtemplate.js';
import { MalformedHeaderError, UnrecognizedFormatError, UnsupportedMethodError, attempt } from './errors.js';
import { highAsciiString } from './textio.js';

const MASTER_ID = [0x4e, 0xf5, 0x46, 0xe9, 0x6c, 0xe5];
const RECORD_ID = [0x4e, 0xf5, 0x46, 0xd8];

export const NUFX_MASTER_HEADER_SIZE = 48;
const THREAD_HEADER_SIZE = 16;
const RECORD_FIXED_SIZE = 56;

const masterHeader = StructTemplateParser.fromTemplateString(
  '6s H I 8s 8s H 8x I 6x:id,crc,totalRecords,created,modified,version,masterEof'
);

const recordHeader = StructTemplateParser.fromTemplateString(
  '4s H H H I H H I I I H 8s 8s 8s:' +
    'id,crc,attribCount,version,totalThreads,fileSystem,fileSystemInfo,access,fileType,auxType,storageType,created,modified,archived'
);

const threadHeader = StructTemplateParser.fromTemplateString('H H H H I I+:threadClass,format,kind,crc,eof,compressedEof');

export type NuFXThreadClass = 'message' | 'control' | 'data' | 'filename' | 'unknown';

// Data thread kinds
export type NuFXPart = 'dataFork' | 'diskImage' | 'resourceFork';

export const NUFX_FORMATS: readonly string[] = [
  'uncompressed',
  'Squeeze',
  'LZW/1',
  'LZW/2',
  'LZC 12-bit',
  'LZC 16-bit',
  'deflate',
];

export interface NuFXThread {
  threadClass: NuFXThreadClass;
  format: number;
  kind: number;
  crc: number;
  eof: number;
  compressedEof: number;
  dataOffset: number;
}

export interface NuFXRecord {
  filename: string;
  fileSystem: number;
  // Path separator character
  separator: string;
  access: number;
  fileType: number;
  auxType: number;
  storageType: number;
  created?: DateTimeParts;
  modified?: DateTimeParts;
  archived?: DateTimeParts;
  version: number;
  threads: NuFXThread[];
}

export interface NuFXArchive {
  version: number;
  totalRecords: number;
  created?: DateTimeParts;
  modified?: DateTimeParts;
  records: NuFXRecord[];
  problems: string[];
}

export interface NuFXMember {
  record: NuFXRecord;
  part: NuFXPart;
  result: DecodeResult<Uint8Array>;
}

function matches(data: Uint8Array, offset: number, signature: number[]): boolean {
  return signature.every((byte, i) => data[offset + i] === byte);
}

export function isNuFX(data: Uint8Array): boolean {
  return data.length >= NUFX_MASTER_HEADER_SIZE && matches(data, 0, MASTER_ID);
}

// Second, minute, hour, year since 1900, day and month from zero, filler, weekday
export function decodeNuFXDateTime(bytes: Uint8Array): DateTimeParts | undefined {
  if (bytes.every(byte => byte === 0)) {
    return undefined;
  }
  return {
    year: 1900 + bytes[3],
    month: bytes[5] + 1,
    day: bytes[4] + 1,
    hour: bytes[2],
    minute: bytes[1],
    second: bytes[0],
  };
}

function threadClassOf(value: number): NuFXThreadClass {
  switch (value) {
    case 0: return 'message';
    case 1: return 'control';
    case 2: return 'data';
    case 3: return 'filename';
    default: return 'unknown';
  }
}

export function nufxFormatName(format: number): string {
  return NUFX_FORMATS[format] ?? `format ${format}`;
}

function readNuFXRecord(data: Uint8Array, offset: number): { record: NuFXRecord; next: number } {
  if (offset + RECORD_FIXED_SIZE > data.length || !matches(data, offset, RECORD_ID)) {
    throw new MalformedHeaderError(`NuFX record header at offset ${offset} is missing or truncated`);
  }
  const header = StructTemplateParser.unpackRecord(data, offset, recordHeader);
  const attribCount = header.num('attribCount');
  if (attribCount < RECORD_FIXED_SIZE + 2 || offset + attribCount > data.length) {
    throw new MalformedHeaderError(`NuFX record at offset ${offset} has a ${attribCount}-byte attribute section`);
  }

  const reader = new ByteReader(data);
  const filenameLength = reader.u16At(offset + attribCount - 2);
  const threadStart = offset + attribCount + filenameLength;
  const totalThreads = header.num('totalThreads');
  const dataStart = threadStart + totalThreads * THREAD_HEADER_SIZE;
  if (dataStart > data.length) {
    throw new MalformedHeaderError(`NuFX record at offset ${offset} declares ${totalThreads} threads past the end of the archive`);
  }

  // Thread data follows all thread headers, in header order
  const threads: NuFXThread[] = [];
  let dataOffset = dataStart;
  for (const thread of StructTemplateParser.unpackList(data, threadStart, totalThreads, threadHeader)) {
    const compressedEof = thread.num('compressedEof');
    threads.push({
      threadClass: threadClassOf(thread.num('threadClass')),
      format: thread.num('format'),
      kind: thread.num('kind'),
      crc: thread.num('crc'),
      eof: thread.num('eof'),
      compressedEof,
      dataOffset,
    });
    dataOffset += compressedEof;
  }
  if (dataOffset > data.length) {
    throw new MalformedHeaderError(`NuFX record at offset ${offset} has thread data past the end of the archive`);
  }

  let filename = highAsciiString(data.subarray(offset + attribCount, offset + attribCount + filenameLength));
  const filenameThread = threads.find(thread => thread.threadClass === 'filename');
  if (filenameThread) {
    const length = Math.min(filenameThread.eof, filenameThread.compressedEof);
    filename = highAsciiString(data.subarray(filenameThread.dataOffset, filenameThread.dataOffset + length));
  }

  const record: NuFXRecord = {
    filename,
    fileSystem: header.num('fileSystem'),
    separator: String.fromCharCode(header.num('fileSystemInfo') & 0x7f),
    access: header.num('access'),
    fileType: header.num('fileType'),
    auxType: header.num('auxType'),
    storageType: header.num('storageType'),
    created: decodeNuFXDateTime(header.bytes('created')),
    modified: decodeNuFXDateTime(header.bytes('modified')),
    archived: decodeNuFXDateTime(header.bytes('archived')),
    version: header.num('version'),
    threads,
  };
  return { record, next: dataOffset };
}

// Throws only when the master header or the first record is unreadable
export function readNuFXArchive(data: Uint8Array): NuFXArchive {
  if (!isNuFX(data)) {
    throw new UnrecognizedFormatError('Not a NuFX archive');
  }
  const master = StructTemplateParser.unpackRecord(data, 0, masterHeader);
  const archive: NuFXArchive = {
    version: master.num('version'),
    totalRecords: master.num('totalRecords'),
    created: decodeNuFXDateTime(master.bytes('created')),
    modified: decodeNuFXDateTime(master.bytes('modified')),
    records: [],
    problems: [],
  };

  let offset = NUFX_MASTER_HEADER_SIZE;
  for (let i = 0; i < archive.totalRecords; i++) {
    try {
      const { record, next } = readNuFXRecord(data, offset);
      archive.records.push(record);
      offset = next;
    } catch (error) {
      if (!(error instanceof MalformedHeaderError) || archive.records.length === 0) {
        throw error;
      }
      archive.problems.push(error.message);
      break;
    }
  }
  return archive;
}

export function partOf(thread: NuFXThread): NuFXPart | undefined {
  if (thread.threadClass !== 'data') {
    return undefined;
  }
  switch (thread.kind) {
    case 0: return 'dataFork';
    case 1: return 'diskImage';
    case 2: return 'resourceFork';
    default: return undefined;
  }
}

export function extractNuFXThread(data: Uint8Array, thread: NuFXThread): Uint8Array {
  if (thread.format !== 0) {
    throw new UnsupportedMethodError(`NuFX thread is compressed with ${nufxFormatName(thread.format)}`);
  }
  // Disk image threads may leave eof zero and fill the whole allocation
  const length = thread.eof === 0 && partOf(thread) === 'diskImage' ? thread.compressedEof : thread.eof;
  if (length > thread.compressedEof) {
    throw new MalformedHeaderError(`NuFX thread of ${length} bytes does not fit its ${thread.compressedEof}-byte allocation`);
  }
  return data.subarray(thread.dataOffset, thread.dataOffset + length);
}

export function extractNuFXRecord(data: Uint8Array, record: NuFXRecord): NuFXMember[] {
  const members: NuFXMember[] = [];
  for (const thread of record.threads) {
    const part = partOf(thread);
    if (part) {
      members.push({ record, part, result: attempt(() => extractNuFXThread(data, thread)) });
    }
  }
  return members;
}

export function extractAllNuFXRecords(data: Uint8Array): ArchiveListing<NuFXMember> {
  const archive = readNuFXArchive(data);
  return {
    entries: archive.records.flatMap(record => extractNuFXRecord(data, record)),
    problems: archive.problems,
  };
}
