// UCSD Pascal volume directory parsing and text file expansion

import type { CatalogEntry, CatalogProblem, DateTimeParts, VolumeListing } from './types.js';
import type { ResolvedOptions } from './options.js';
import { DiskImage, BLOCK_SIZE, looksLikeDiskImage } from './diskimage.js';
import { StructTemplateParser } from './structtemplate.js';
import { UnrecognizedFormatError } from './errors.js';
import { ucsdKindLabel } from './filetypes.js';
import { highAsciiString } from './textio.js';
import { warn } from './options.js';

export const UCSD_DIRECTORY_BLOCK = 2;
export const UCSD_MAX_FILES = 77;
const TEXT_HEADER_SIZE = 1024;
const DLE = 0x10;

const volumeHeader = StructTemplateParser.fromTemplateString(
  'H H H B 7s H H H H:firstBlock,nextBlock,kind,nameLength,name,lastBlock,fileCount,accessTime,lastBoot'
);

const fileEntry = StructTemplateParser.fromTemplateString(
  'H H H B 15s H H+:firstBlock,nextBlock,kind,nameLength,name,bytesInLastBlock,modified'
);

const ENTRY_SIZE = 26;

export interface UCSDVolumeHeader {
  name: string;
  directoryEnd: number;
  lastBlock: number;
  fileCount: number;
}

export function decodeUCSDDate(word: number): DateTimeParts | undefined {
  const month = word & 0x0f;
  const day = (word >> 4) & 0x1f;
  const year = (word >> 9) & 0x7f;
  if (month === 0 || day === 0) {
    return undefined;
  }
  return { year: 1900 + year, month, day, hour: 0, minute: 0, second: 0 };
}

export function probeUCSD(image: DiskImage): UCSDVolumeHeader | undefined {
  if (!image.hasBlock(UCSD_DIRECTORY_BLOCK)) {
    return undefined;
  }

  const record = StructTemplateParser.unpackRecord(image.readBlock(UCSD_DIRECTORY_BLOCK), 0, volumeHeader);
  const nameLength = record.num('nameLength');
  const directoryEnd = record.num('nextBlock');
  const lastBlock = record.num('lastBlock');
  const fileCount = record.num('fileCount');

  if (record.num('firstBlock') !== 0 || (record.num('kind') & 0x0f) !== 0) {
    return undefined;
  }
  if (nameLength < 1 || nameLength > 7 || fileCount > UCSD_MAX_FILES) {
    return undefined;
  }
  if (directoryEnd <= UCSD_DIRECTORY_BLOCK || directoryEnd > image.blockCount || lastBlock < directoryEnd) {
    return undefined;
  }

  const nameBytes = record.bytes('name').subarray(0, nameLength);
  if (!nameBytes.every(byte => byte > 0x20 && byte < 0x7f)) {
    return undefined;
  }

  return { name: highAsciiString(nameBytes), directoryEnd, lastBlock, fileCount };
}

export function readUCSDVolume(image: DiskImage, options: ResolvedOptions): VolumeListing {
  const header = probeUCSD(image);
  if (!header) {
    throw new UnrecognizedFormatError('No UCSD Pascal volume header in block 2');
  }

  const directory = image.readBlocks(UCSD_DIRECTORY_BLOCK, header.directoryEnd - UCSD_DIRECTORY_BLOCK);
  const count = Math.min(header.fileCount, Math.floor(directory.length / ENTRY_SIZE) - 1);
  const entries: CatalogEntry[] = [];
  const problems: CatalogProblem[] = [];

  for (const record of StructTemplateParser.unpackList(directory, ENTRY_SIZE, count, fileEntry)) {
    const nameLength = Math.min(record.num('nameLength'), 15);
    const name = highAsciiString(record.bytes('name').subarray(0, nameLength));
    const firstBlock = record.num('firstBlock');
    let nextBlock = record.num('nextBlock');
    const kind = record.num('kind') & 0x0f;
    const bytesInLastBlock = record.num('bytesInLastBlock');

    if (nameLength === 0 || nextBlock <= firstBlock) {
      continue;
    }
    if (firstBlock >= image.blockCount) {
      const message = `starts at block ${firstBlock} past the end of the image`;
      problems.push({ path: name, kind: 'OutOfBounds', message });
      warn(options, `Skipping ${name}: ${message}`);
      continue;
    }
    if (nextBlock > image.blockCount) {
      const message = `extends to block ${nextBlock} past the end of the image`;
      problems.push({ path: name, kind: 'OutOfBounds', message });
      warn(options, `${name}: ${message}`);
      nextBlock = image.blockCount;
    }

    const blocks = image.readBlocks(firstBlock, nextBlock - firstBlock);
    const size = Math.max(0, Math.min(blocks.length, (nextBlock - firstBlock - 1) * BLOCK_SIZE + bytesInLastBlock));
    const data = blocks.subarray(0, size);

    entries.push({
      name,
      path: name,
      system: 'ucsd',
      fileType: kind,
      fileTypeLabel: ucsdKindLabel(kind),
      auxType: 0,
      size,
      blocks: nextBlock - firstBlock,
      data,
      isDirectory: false,
      isImage: looksLikeDiskImage(name, data),
      children: [],
      modified: decodeUCSDDate(record.num('modified')),
      ucsd: { firstBlock, lastBlock: nextBlock - 1, kind, bytesInLastBlock },
    });
  }

  return { volumeName: header.name, totalBlocks: header.lastBlock, entries, problems };
}

// Skips the editor header, expands DLE space runs, and turns CR into LF
export function decodeUCSDText(data: Uint8Array): string {
  let result = '';
  let i = data.length > TEXT_HEADER_SIZE ? TEXT_HEADER_SIZE : 0;

  while (i < data.length) {
    const byte = data[i++];
    if (byte === DLE) {
      if (i < data.length) {
        result += ' '.repeat(Math.max(data[i++] - 32, 0));
      }
    } else if (byte === 0x0d) {
      result += '\n';
    } else if (byte !== 0x00) {
      const low = byte & 0x7f;
      result += low >= 0x20 && low < 0x7f ? String.fromCharCode(low) : low === 0x09 ? '\t' : '.';
    }
  }
  return result;
}
