// DOS 3.3 VTOC, catalog sector chain and track/sector list parsing

import type { CatalogEntry, CatalogProblem, VolumeListing } from './types.js';
import type { ResolvedOptions } from './options.js';
import { DiskImage, SECTORS_PER_TRACK, SECTOR_SIZE, looksLikeDiskImage } from './diskimage.js';
import { StructTemplateParser } from './structtemplate.js';
import { CircularDirectoryError, UnrecognizedFormatError } from './errors.js';
import { dos33TypeLabel } from './filetypes.js';
import { highAsciiString } from './textio.js';
import { warn } from './options.js';

export const VTOC_TRACK = 17;
export const VTOC_SECTOR = 0;
const ENTRIES_PER_SECTOR = 7;
const PAIRS_PER_LIST = 122;

const vtocTemplate = StructTemplateParser.fromTemplateString(
  'x B B B 2x B 32x B 8x B b 2x B B H:catalogTrack,catalogSector,dosVersion,volumeNumber,maxPairs,lastTrack,direction,tracksPerDisk,sectorsPerTrack,bytesPerSector'
);

const catalogEntry = StructTemplateParser.fromTemplateString('B B B 30s H:tsTrack,tsSector,type,name,sectorCount');

export interface VTOC {
  catalogTrack: number;
  catalogSector: number;
  dosVersion: number;
  volumeNumber: number;
  tracksPerDisk: number;
  sectorsPerTrack: number;
}

export function probeDOS33(image: DiskImage): VTOC | undefined {
  if (image.trackCount < 35) {
    return undefined;
  }

  const record = StructTemplateParser.unpackRecord(image.readSector(VTOC_TRACK, VTOC_SECTOR), 0, vtocTemplate);
  const vtoc: VTOC = {
    catalogTrack: record.num('catalogTrack'),
    catalogSector: record.num('catalogSector'),
    dosVersion: record.num('dosVersion'),
    volumeNumber: record.num('volumeNumber'),
    tracksPerDisk: record.num('tracksPerDisk'),
    sectorsPerTrack: record.num('sectorsPerTrack'),
  };

  if (vtoc.sectorsPerTrack !== SECTORS_PER_TRACK) {
    return undefined;
  }
  if (vtoc.catalogTrack === 0 || vtoc.catalogTrack >= image.trackCount || vtoc.catalogSector >= SECTORS_PER_TRACK) {
    return undefined;
  }
  const bytesPerSector = record.num('bytesPerSector');
  if (bytesPerSector !== 0 && bytesPerSector !== SECTOR_SIZE) {
    return undefined;
  }
  return vtoc;
}

function sectorKey(track: number, sector: number): number {
  return track * SECTORS_PER_TRACK + sector;
}

// Concatenates the sectors named by a file's track/sector list chain
function readSectorChain(image: DiskImage, track: number, sector: number, path: string, options: ResolvedOptions): Uint8Array {
  const pairs: [number, number][] = [];
  const visited = new Set<number>();

  while (track !== 0) {
    if (visited.has(sectorKey(track, sector))) {
      warn(options, `${path}: track/sector list loops back to T${track} S${sector}`);
      break;
    }
    visited.add(sectorKey(track, sector));

    if (track >= image.trackCount || sector >= SECTORS_PER_TRACK) {
      warn(options, `${path}: track/sector list points outside the image at T${track} S${sector}`);
      break;
    }

    const list = image.readSector(track, sector);
    for (let i = 0; i < PAIRS_PER_LIST; i++) {
      pairs.push([list[0x0c + i * 2], list[0x0d + i * 2]]);
    }
    track = list[0x01];
    sector = list[0x02];
  }

  // Trailing zero pairs are unused slots, interior ones are sparse sectors
  while (pairs.length > 0 && pairs[pairs.length - 1][0] === 0) {
    pairs.pop();
  }

  const result = new Uint8Array(pairs.length * SECTOR_SIZE);
  pairs.forEach(([dataTrack, dataSector], i) => {
    if (dataTrack === 0) {
      return;
    }
    if (dataTrack >= image.trackCount || dataSector >= SECTORS_PER_TRACK) {
      warn(options, `${path}: data sector T${dataTrack} S${dataSector} is outside the image`);
      return;
    }
    result.set(image.readSector(dataTrack, dataSector), i * SECTOR_SIZE);
  });
  return result;
}

function buildEntry(rawType: number, locked: boolean, name: string, sectorCount: number, tsTrack: number, tsSector: number, raw: Uint8Array): CatalogEntry {
  let data = raw;
  let loadAddress: number | undefined;
  let length: number | undefined;

  // Binary files carry address and length, BASIC files a length, ahead of the contents
  if (rawType === 0x04 && raw.length >= 4) {
    loadAddress = raw[0] | (raw[1] << 8);
    length = raw[2] | (raw[3] << 8);
    data = raw.subarray(4, 4 + length);
  } else if ((rawType === 0x01 || rawType === 0x02) && raw.length >= 2) {
    length = raw[0] | (raw[1] << 8);
    data = raw.subarray(2, 2 + length);
  }

  return {
    name,
    path: name,
    system: 'dos33',
    fileType: rawType,
    fileTypeLabel: dos33TypeLabel(rawType),
    auxType: loadAddress ?? 0,
    size: data.length,
    blocks: sectorCount,
    loadAddress,
    length,
    data,
    isDirectory: false,
    isImage: looksLikeDiskImage(name, data),
    children: [],
    dos33: { rawType, locked, trackSectorList: { track: tsTrack, sector: tsSector } },
  };
}

export function readDOS33Volume(image: DiskImage, options: ResolvedOptions): VolumeListing {
  const vtoc = probeDOS33(image);
  if (!vtoc) {
    throw new UnrecognizedFormatError('No DOS 3.3 VTOC on track 17');
  }

  const entries: CatalogEntry[] = [];
  const problems: CatalogProblem[] = [];
  const visited = new Set<number>();
  let track = vtoc.catalogTrack;
  let sector = vtoc.catalogSector;

  while (track !== 0) {
    if (visited.has(sectorKey(track, sector))) {
      throw new CircularDirectoryError(`catalog sector T${track} S${sector} is reached twice`);
    }
    visited.add(sectorKey(track, sector));

    const catalogSector = image.readSector(track, sector);
    for (let i = 0; i < ENTRIES_PER_SECTOR; i++) {
      const record = StructTemplateParser.unpackRecord(catalogSector, 0x0b + i * catalogEntry.recordLength, catalogEntry);
      const tsTrack = record.num('tsTrack');
      // 0 marks a never-used slot, 0xFF a deleted file
      if (tsTrack === 0 || tsTrack === 0xff) {
        continue;
      }

      const typeByte = record.num('type');
      const name = highAsciiString(record.bytes('name')).replace(/ +$/, '');
      const tsSector = record.num('tsSector');
      const raw = readSectorChain(image, tsTrack, tsSector, name, options);
      entries.push(buildEntry(typeByte & 0x7f, (typeByte & 0x80) !== 0, name, record.num('sectorCount'), tsTrack, tsSector, raw));
    }

    track = catalogSector[0x01];
    sector = catalogSector[0x02];
    if (track >= image.trackCount || sector >= SECTORS_PER_TRACK) {
      const message = `Catalog chain points outside the image at T${track} S${sector}`;
      problems.push({ kind: 'OutOfBounds', message });
      warn(options, message);
      break;
    }
  }

  return {
    volumeName: `DISK VOLUME ${vtoc.volumeNumber}`,
    totalBlocks: image.blockCount,
    entries,
    problems,
  };
}
