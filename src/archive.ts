// Gzip and ZIP container framing around an injected inflate primitive

import { inflateSync } from 'fflate';
import type { DateTimeParts, Inflate } from './types.js';
import { ByteReader } from './bytereader.js';
import { StructTemplateParser } from './structtemplate.js';
import {
  CorruptDocumentError,
  DecodeError,
  MalformedHeaderError,
  OutOfBoundsError,
  UnrecognizedFormatError,
  UnsupportedMethodError,
  attempt,
} from './errors.js';
import type { DecodeResult } from './errors.js';

export const defaultInflate: Inflate = compressed => inflateSync(compressed);

const GZIP_FTEXT = 0x01;
const GZIP_FHCRC = 0x02;
const GZIP_FEXTRA = 0x04;
const GZIP_FNAME = 0x08;
const GZIP_FCOMMENT = 0x10;

const ZIP_LOCAL_HEADER = 0x04034b50;
const ZIP_FLAG_DATA_DESCRIPTOR = 0x0008;
const ZIP_FLAG_UTF8 = 0x0800;

const zipLocalHeader = StructTemplateParser.fromTemplateString(
  'I H H H H H I I I H H:signature,version,flags,method,time,date,crc32,compressedSize,uncompressedSize,nameLength,extraLength'
);

export interface GzipHeader {
  flags: number;
  isText: boolean;
  mtime: number;
  filename?: string;
  comment?: string;
  dataOffset: number;
  dataLength: number;
  crc32: number;
  originalSize: number;
}

export interface ArchiveEntry {
  filename: string;
  compressedSize: number;
  uncompressedSize: number;
  method: number;
  crc32: number;
  dataOffset: number;
  isDirectory: boolean;
  modified?: DateTimeParts;
}

export interface ExtractedEntry {
  entry: ArchiveEntry;
  result: DecodeResult<Uint8Array>;
}

export function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

export function isZip(data: Uint8Array): boolean {
  return data.length >= 4 && new ByteReader(data).u32At(0) === ZIP_LOCAL_HEADER;
}

function latin1(bytes: Uint8Array): string {
  let result = '';
  for (const byte of bytes) {
    result += String.fromCharCode(byte);
  }
  return result;
}

function readZeroTerminated(reader: ByteReader, what: string): string {
  const start = reader.offset;
  while (reader.remaining() > 0) {
    if (reader.readU8() === 0) {
      return latin1(reader.bytesAt(start, reader.offset - start - 1));
    }
  }
  throw new MalformedHeaderError(`gzip ${what} runs off the end of the data`);
}

export function readGzipHeader(data: Uint8Array): GzipHeader {
  if (!isGzip(data)) {
    throw new UnrecognizedFormatError('Not a gzip stream');
  }
  if (data.length < 18) {
    throw new MalformedHeaderError(`gzip stream of ${data.length} bytes is shorter than header and trailer`);
  }

  const reader = new ByteReader(data, 2);
  const method = reader.readU8();
  if (method !== 8) {
    throw new UnsupportedMethodError(`gzip compression method ${method} is not deflate`);
  }

  const flags = reader.readU8();
  const mtime = reader.readU32LE();
  reader.skip(2); // extra flags, OS

  // The optional fields are walked in this fixed order
  const header: GzipHeader = {
    flags,
    isText: (flags & GZIP_FTEXT) !== 0,
    mtime,
    dataOffset: 0,
    dataLength: 0,
    crc32: reader.u32At(data.length - 8),
    originalSize: reader.u32At(data.length - 4),
  };

  try {
    if (flags & GZIP_FEXTRA) {
      reader.skip(reader.readU16LE());
    }
    if (flags & GZIP_FNAME) {
      header.filename = readZeroTerminated(reader, 'filename');
    }
    if (flags & GZIP_FCOMMENT) {
      header.comment = readZeroTerminated(reader, 'comment');
    }
    if (flags & GZIP_FHCRC) {
      reader.skip(2);
    }
  } catch (error) {
    if (error instanceof OutOfBoundsError) {
      throw new MalformedHeaderError('gzip optional header field runs off the end of the data', { cause: error });
    }
    throw error;
  }

  if (reader.offset > data.length - 8) {
    throw new MalformedHeaderError('gzip header overlaps the trailer');
  }

  header.dataOffset = reader.offset;
  header.dataLength = data.length - 8 - reader.offset;
  return header;
}

function runInflate(inflate: Inflate, compressed: Uint8Array, expectedSize: number, what: string): Uint8Array {
  try {
    return inflate(compressed, expectedSize);
  } catch (error) {
    if (error instanceof DecodeError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorruptDocumentError(`${what}: deflate stream is corrupt (${reason})`, { cause: error });
  }
}

export function gunzip(data: Uint8Array, inflate: Inflate = defaultInflate): Uint8Array {
  const header = readGzipHeader(data);
  const compressed = data.subarray(header.dataOffset, header.dataOffset + header.dataLength);
  const output = runInflate(inflate, compressed, header.originalSize, 'gzip');

  // The trailer stores the size modulo 2^32
  if (output.length % 0x100000000 !== header.originalSize) {
    throw new MalformedHeaderError(`gzip trailer declares ${header.originalSize} bytes but stream inflated to ${output.length}`);
  }
  return output;
}

// DOS packed date and time; a zero date means no timestamp was recorded
export function decodeDosDateTime(date: number, time: number): DateTimeParts | undefined {
  if (date === 0) {
    return undefined;
  }
  return {
    year: ((date >> 9) & 0x7f) + 1980,
    month: (date >> 5) & 0x0f,
    day: date & 0x1f,
    hour: (time >> 11) & 0x1f,
    minute: (time >> 5) & 0x3f,
    second: (time & 0x1f) * 2,
  };
}

// A walk that stops early keeps what it read before the damage
export interface ArchiveListing<Entry> {
  entries: Entry[];
  problems: string[];
}

function readZipLocalEntry(data: Uint8Array, offset: number): { entry: ArchiveEntry; next: number } {
  if (offset + zipLocalHeader.recordLength > data.length) {
    throw new MalformedHeaderError(`ZIP local header at offset ${offset} is truncated`);
  }

  const record = StructTemplateParser.unpackRecord(data, offset, zipLocalHeader);
  const flags = record.num('flags');
  const nameStart = offset + zipLocalHeader.recordLength;
  const dataOffset = nameStart + record.num('nameLength') + record.num('extraLength');
  if (dataOffset > data.length) {
    throw new MalformedHeaderError(`ZIP entry name at offset ${nameStart} runs off the end of the data`);
  }

  const compressedSize = record.num('compressedSize');
  if ((flags & ZIP_FLAG_DATA_DESCRIPTOR) !== 0 && compressedSize === 0) {
    throw new MalformedHeaderError(`ZIP entry at offset ${offset} keeps its sizes in a trailing data descriptor`);
  }

  const nameBytes = data.subarray(nameStart, nameStart + record.num('nameLength'));
  const filename = (flags & ZIP_FLAG_UTF8) !== 0 ? new TextDecoder('utf-8').decode(nameBytes) : latin1(nameBytes);

  const entry: ArchiveEntry = {
    filename,
    compressedSize,
    uncompressedSize: record.num('uncompressedSize'),
    method: record.num('method'),
    crc32: record.num('crc32'),
    dataOffset,
    isDirectory: filename.endsWith('/'),
    modified: decodeDosDateTime(record.num('date'), record.num('time')),
  };
  return { entry, next: dataOffset + compressedSize };
}

// Throws only when the first local header is unreadable
export function listZipEntries(data: Uint8Array): ArchiveListing<ArchiveEntry> {
  const reader = new ByteReader(data);
  const listing: ArchiveListing<ArchiveEntry> = { entries: [], problems: [] };
  let offset = 0;

  // Local headers are walked by signature; the central directory ends the walk
  while (offset + 4 <= data.length && reader.u32At(offset) === ZIP_LOCAL_HEADER) {
    try {
      const { entry, next } = readZipLocalEntry(data, offset);
      listing.entries.push(entry);
      offset = next;
    } catch (error) {
      if (!(error instanceof MalformedHeaderError) || listing.entries.length === 0) {
        throw error;
      }
      listing.problems.push(error.message);
      break;
    }
  }

  return listing;
}

export function extractZipEntry(data: Uint8Array, entry: ArchiveEntry, inflate: Inflate = defaultInflate): Uint8Array {
  if (entry.dataOffset + entry.compressedSize > data.length) {
    throw new MalformedHeaderError(`ZIP entry '${entry.filename}' data runs off the end of the archive`);
  }
  const compressed = data.subarray(entry.dataOffset, entry.dataOffset + entry.compressedSize);

  switch (entry.method) {
    case 0: // stored
      return compressed;
    case 8: { // deflate
      const output = runInflate(inflate, compressed, entry.uncompressedSize, `ZIP entry '${entry.filename}'`);
      if (output.length !== entry.uncompressedSize) {
        throw new MalformedHeaderError(`ZIP entry '${entry.filename}' inflated to ${output.length} bytes, header declares ${entry.uncompressedSize}`);
      }
      return output;
    }
    default:
      throw new UnsupportedMethodError(`ZIP entry '${entry.filename}' uses unsupported compression method ${entry.method}`);
  }
}

// One result per file entry; a failed entry does not stop the others
export function extractAllZipEntries(data: Uint8Array, inflate: Inflate = defaultInflate): ArchiveListing<ExtractedEntry> {
  const { entries, problems } = listZipEntries(data);
  return {
    entries: entries
      .filter(entry => !entry.isDirectory)
      .map(entry => ({ entry, result: attempt(() => extractZipEntry(data, entry, inflate)) })),
    problems,
  };
}

export function extractFirstZipEntry(
  data: Uint8Array,
  inflate: Inflate = defaultInflate,
  accept: (entry: ArchiveEntry) => boolean = () => true,
): { entry: ArchiveEntry; data: Uint8Array } | undefined {
  for (const { entry, result } of extractAllZipEntries(data, inflate).entries) {
    if (result.ok && entry.uncompressedSize > 0 && accept(entry)) {
      return { entry, data: result.value };
    }
  }
  return undefined;
}
