// ProDOS volume directory, subdirectory and file storage parsing

import type { CatalogEntry, CatalogProblem, DateTimeParts, VolumeListing } from './types.js';
import type { ResolvedOptions } from './options.js';
import { DiskImage, BLOCK_SIZE, looksLikeDiskImage } from './diskimage.js';
import { StructTemplateParser } from './structtemplate.js';
import type { StructRecord } from './structtemplate.js';
import { CircularDirectoryError, DecodeError, UnrecognizedFormatError } from './errors.js';
import { fileTypeInfo } from './filetypes.js';
import { highAsciiString } from './textio.js';
import { warn } from './options.js';

export const VOLUME_DIRECTORY_BLOCK = 2;

export const STORAGE_SEEDLING = 0x1;
export const STORAGE_SAPLING = 0x2;
export const STORAGE_TREE = 0x3;
export const STORAGE_EXTENDED = 0x5;
export const STORAGE_SUBDIRECTORY = 0xd;
export const STORAGE_SUBDIRECTORY_HEADER = 0xe;
export const STORAGE_VOLUME_HEADER = 0xf;

const FILE_TYPE_DIRECTORY = 0x0f;

const volumeHeader = StructTemplateParser.fromTemplateString(
  'B 15s 8x H H B B B B B H H H:storageAndNameLength,name,createdDate,createdTime,version,minVersion,access,entryLength,entriesPerBlock,fileCount,bitmapPointer,totalBlocks'
);

const subdirectoryHeader = StructTemplateParser.fromTemplateString(
  'B 15s 8x H H B B B B B H H B B:storageAndNameLength,name,createdDate,createdTime,version,minVersion,access,entryLength,entriesPerBlock,fileCount,parentPointer,parentEntry,parentEntryLength'
);

const fileEntry = StructTemplateParser.fromTemplateString(
  'B 15s B H H T H H B B B H H H H:storageAndNameLength,name,fileType,keyPointer,blocksUsed,eof,createdDate,createdTime,version,minVersion,access,auxType,modifiedDate,modifiedTime,headerPointer'
);

// Fork mini-entries in an extended key block: data fork at 0, resource fork at 256
const DATA_FORK_ENTRY = 0;
const RESOURCE_FORK_ENTRY = 256;
const forkEntry = StructTemplateParser.fromTemplateString('B H H T:storageType,keyPointer,blocksUsed,eof');

export interface ProDOSVolumeHeader {
  name: string;
  created?: DateTimeParts;
  version: number;
  minVersion: number;
  access: number;
  entryLength: number;
  entriesPerBlock: number;
  fileCount: number;
  bitmapPointer: number;
  totalBlocks: number;
}

export function decodeProDOSDateTime(date: number, time: number): DateTimeParts | undefined {
  if (date === 0) {
    return undefined;
  }
  const year = (date >> 9) & 0x7f;
  return {
    year: year < 40 ? 2000 + year : 1900 + year,
    month: (date >> 5) & 0x0f,
    day: date & 0x1f,
    hour: (time >> 8) & 0x1f,
    minute: time & 0x3f,
    second: 0,
  };
}

function entryName(record: StructRecord): string {
  const nameLength = record.num('storageAndNameLength') & 0x0f;
  return highAsciiString(record.bytes('name').subarray(0, nameLength));
}

function plausibleLayout(entryLength: number, entriesPerBlock: number): boolean {
  return entryLength >= 0x27 && entriesPerBlock >= 1 && 4 + entryLength * entriesPerBlock <= BLOCK_SIZE;
}

// Returns the volume header when the image carries a plausible ProDOS volume directory
export function probeProDOS(image: DiskImage): ProDOSVolumeHeader | undefined {
  if (!image.hasBlock(VOLUME_DIRECTORY_BLOCK)) {
    return undefined;
  }

  const block = image.readBlock(VOLUME_DIRECTORY_BLOCK);
  const previous = block[0] | (block[1] << 8);
  const record = StructTemplateParser.unpackRecord(block, 4, volumeHeader);
  const storageAndNameLength = record.num('storageAndNameLength');
  const nameLength = storageAndNameLength & 0x0f;
  const entryLength = record.num('entryLength');
  const entriesPerBlock = record.num('entriesPerBlock');

  if (previous !== 0 || storageAndNameLength >> 4 !== STORAGE_VOLUME_HEADER || nameLength === 0) {
    return undefined;
  }
  if (!plausibleLayout(entryLength, entriesPerBlock)) {
    return undefined;
  }

  const name = entryName(record);
  if (!/^[A-Z][A-Z0-9.]*$/i.test(name)) {
    return undefined;
  }

  return {
    name,
    created: decodeProDOSDateTime(record.num('createdDate'), record.num('createdTime')),
    version: record.num('version'),
    minVersion: record.num('minVersion'),
    access: record.num('access'),
    entryLength,
    entriesPerBlock,
    fileCount: record.num('fileCount'),
    bitmapPointer: record.num('bitmapPointer'),
    totalBlocks: record.num('totalBlocks'),
  };
}

class ProDOSWalker {
  private readonly image: DiskImage;
  private readonly options: ResolvedOptions;
  private readonly visited = new Set<number>();
  readonly problems: CatalogProblem[] = [];

  constructor(image: DiskImage, options: ResolvedOptions) {
    this.image = image;
    this.options = options;
  }

  walkDirectory(keyBlock: number, path: string, depth: number): CatalogEntry[] {
    if (depth > this.image.blockCount) {
      throw new CircularDirectoryError(`directory nesting at '${path}' exceeds the image's ${this.image.blockCount} blocks`);
    }

    const entries: CatalogEntry[] = [];
    let block = keyBlock;
    let entryLength = 0x27;
    let entriesPerBlock = 0x0d;
    let firstBlock = true;

    while (block !== 0) {
      if (this.visited.has(block)) {
        throw new CircularDirectoryError(`directory block ${block} is reached twice while reading '${path || '/'}'`);
      }
      this.visited.add(block);

      const data = this.image.readBlock(block);
      let slot = 0;

      if (firstBlock) {
        // The key block's first slot is the directory header
        const header = StructTemplateParser.unpackRecord(data, 4, depth === 0 ? volumeHeader : subdirectoryHeader);
        const storageType = header.num('storageAndNameLength') >> 4;
        const expected = depth === 0 ? STORAGE_VOLUME_HEADER : STORAGE_SUBDIRECTORY_HEADER;
        if (storageType !== expected) {
          warn(this.options, `Directory header for '${path}' has storage type $${storageType.toString(16).toUpperCase()}`);
        }
        if (plausibleLayout(header.num('entryLength'), header.num('entriesPerBlock'))) {
          entryLength = header.num('entryLength');
          entriesPerBlock = header.num('entriesPerBlock');
        }
        slot = 1;
        firstBlock = false;
      }

      for (; slot < entriesPerBlock; slot++) {
        const offset = 4 + slot * entryLength;
        const storageAndNameLength = data[offset];
        if (storageAndNameLength >> 4 === 0 || (storageAndNameLength & 0x0f) === 0) {
          continue;
        }
        entries.push(this.readEntry(StructTemplateParser.unpackRecord(data, offset, fileEntry), path, depth));
      }

      block = data[2] | (data[3] << 8);
    }

    return entries;
  }

  private readEntry(record: StructRecord, parentPath: string, depth: number): CatalogEntry {
    const storageType = record.num('storageAndNameLength') >> 4;
    const name = entryName(record);
    const path = parentPath ? `${parentPath}/${name}` : name;
    const fileType = record.num('fileType');
    const auxType = record.num('auxType');
    const keyPointer = record.num('keyPointer');
    const eof = record.num('eof');

    const common = {
      name,
      path,
      system: 'prodos' as const,
      fileType,
      fileTypeLabel: fileTypeInfo(fileType, auxType).shortName,
      auxType,
      blocks: record.num('blocksUsed'),
      created: decodeProDOSDateTime(record.num('createdDate'), record.num('createdTime')),
      modified: decodeProDOSDateTime(record.num('modifiedDate'), record.num('modifiedTime')),
      prodos: {
        storageType,
        keyPointer,
        access: record.num('access'),
        version: record.num('version'),
        minVersion: record.num('minVersion'),
        headerPointer: record.num('headerPointer'),
      },
    };

    if (storageType === STORAGE_SUBDIRECTORY || fileType === FILE_TYPE_DIRECTORY) {
      const directory = { ...common, size: eof, data: new Uint8Array(0), isDirectory: true, isImage: false };
      try {
        return { ...directory, children: this.walkDirectory(keyPointer, path, depth + 1) };
      } catch (error) {
        if (this.options.strict || !(error instanceof DecodeError)) {
          throw error;
        }
        // Siblings survive a damaged subdirectory; it is kept as an empty placeholder
        const problem: CatalogProblem = { path, kind: error.kind, message: error.message };
        this.problems.push(problem);
        warn(this.options, `Skipping contents of subdirectory ${path}: ${error.message}`);
        return { ...directory, children: [], problem };
      }
    }

    const data = this.readFork(storageType, keyPointer, eof, path);
    const hasResourceFork = storageType === STORAGE_EXTENDED && this.image.hasBlock(keyPointer);
    return {
      ...common,
      resourceFork: hasResourceFork ? this.extendedFork(keyPointer, RESOURCE_FORK_ENTRY, path) : undefined,
      size: data.length,
      loadAddress: fileType === 0x06 ? auxType : undefined,
      length: eof,
      data,
      isDirectory: false,
      isImage: looksLikeDiskImage(name, data),
      children: [],
    };
  }

  private readFork(storageType: number, keyPointer: number, eof: number, path: string): Uint8Array {
    switch (storageType) {
      case STORAGE_SEEDLING: {
        const block = this.dataBlock(keyPointer, path);
        return block.subarray(0, Math.min(eof, BLOCK_SIZE));
      }
      case STORAGE_SAPLING:
        return this.collect(this.indexPointers(keyPointer, path), eof, path);
      case STORAGE_TREE: {
        const pointers: number[] = [];
        for (const index of this.indexPointers(keyPointer, path).slice(0, 128)) {
          if (index === 0) {
            pointers.push(...new Array<number>(256).fill(0));
          } else {
            pointers.push(...this.indexPointers(index, path));
          }
        }
        return this.collect(pointers, eof, path);
      }
      case STORAGE_EXTENDED:
        if (!this.image.hasBlock(keyPointer)) {
          warn(this.options, `${path}: extended key block ${keyPointer} is outside the image`);
          return new Uint8Array(0);
        }
        return this.extendedFork(keyPointer, DATA_FORK_ENTRY, path);
      default:
        return new Uint8Array(0);
    }
  }

  private extendedFork(keyPointer: number, entryOffset: number, path: string): Uint8Array {
    const fork = StructTemplateParser.unpackRecord(this.image.readBlock(keyPointer), entryOffset, forkEntry);
    const forkStorage = fork.num('storageType') & 0x0f;
    if (forkStorage === STORAGE_EXTENDED) {
      return new Uint8Array(0);
    }
    return this.readFork(forkStorage, fork.num('keyPointer'), fork.num('eof'), path);
  }

  private dataBlock(block: number, path: string): Uint8Array {
    if (block === 0) {
      return new Uint8Array(BLOCK_SIZE);
    }
    if (!this.image.hasBlock(block)) {
      warn(this.options, `${path}: block ${block} is outside the image, reading zeros`);
      return new Uint8Array(BLOCK_SIZE);
    }
    return this.image.readBlock(block);
  }

  // Index blocks keep low bytes in the first half and high bytes in the second
  private indexPointers(indexBlock: number, path: string): number[] {
    const block = this.dataBlock(indexBlock, path);
    const pointers: number[] = [];
    for (let i = 0; i < 256; i++) {
      pointers.push(block[i] | (block[256 + i] << 8));
    }
    return pointers;
  }

  private collect(pointers: number[], eof: number, path: string): Uint8Array {
    const size = Math.min(eof, pointers.length * BLOCK_SIZE);
    const result = new Uint8Array(size);
    for (let i = 0; i * BLOCK_SIZE < size; i++) {
      // Sparse blocks stay zero-filled
      if (pointers[i] !== 0) {
        const block = this.dataBlock(pointers[i], path);
        result.set(block.subarray(0, Math.min(BLOCK_SIZE, size - i * BLOCK_SIZE)), i * BLOCK_SIZE);
      }
    }
    return result;
  }
}

export function readProDOSVolume(image: DiskImage, options: ResolvedOptions): VolumeListing {
  const header = probeProDOS(image);
  if (!header) {
    throw new UnrecognizedFormatError('No ProDOS volume directory header in block 2');
  }

  const walker = new ProDOSWalker(image, options);
  const entries = walker.walkDirectory(VOLUME_DIRECTORY_BLOCK, '', 0);
  return {
    volumeName: header.name,
    totalBlocks: header.totalBlocks || image.blockCount,
    created: header.created,
    entries,
    problems: walker.problems,
  };
}
