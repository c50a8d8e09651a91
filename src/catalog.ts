// Catalog format detection and the volume walk entry point

import type { CatalogEntry, CatalogFormat, DecodeOptions, DiskCatalog, SectorOrder, VolumeListing } from './types.js';
import type { ResolvedOptions } from './options.js';
import { DiskImage, candidateOrders, unwrapDiskImage } from './diskimage.js';
import { OutOfBoundsError, UnrecognizedFormatError } from './errors.js';
import { probeProDOS, readProDOSVolume } from './prodos.js';
import { probeDOS33, readDOS33Volume } from './dos33.js';
import { probeUCSD, readUCSDVolume } from './ucsd.js';
import { resolveOptions } from './options.js';

interface CatalogReader {
  format: CatalogFormat;
  preferredOrder: SectorOrder;
  probe(image: DiskImage): unknown;
  read(image: DiskImage, options: ResolvedOptions): VolumeListing;
}

// Tried in this order; the first plausible signature wins
const READERS: readonly CatalogReader[] = [
  { format: 'prodos', preferredOrder: 'prodos', probe: probeProDOS, read: readProDOSVolume },
  { format: 'dos33', preferredOrder: 'dos', probe: probeDOS33, read: readDOS33Volume },
  { format: 'ucsd', preferredOrder: 'prodos', probe: probeUCSD, read: readUCSDVolume },
];

export interface DetectedCatalog {
  format: CatalogFormat;
  order: SectorOrder;
  image: DiskImage;
}

function probes(reader: CatalogReader, image: DiskImage): boolean {
  try {
    return reader.probe(image) !== undefined;
  } catch (error) {
    // A signature that lies outside a small image simply does not match
    if (error instanceof OutOfBoundsError) {
      return false;
    }
    throw error;
  }
}

export function detectCatalogFormat(image: Uint8Array, options: DecodeOptions = {}): DetectedCatalog {
  const readers = options.format ? READERS.filter(reader => reader.format === options.format) : READERS;

  for (const reader of readers) {
    for (const order of candidateOrders(image.length, options.order ?? reader.preferredOrder)) {
      const disk = new DiskImage(image, order);
      if (probes(reader, disk)) {
        return { format: reader.format, order, image: disk };
      }
    }
  }

  throw new UnrecognizedFormatError(`No ProDOS, DOS 3.3 or UCSD Pascal catalog found in ${image.length} bytes`);
}

export function walkCatalog(bytes: Uint8Array, options: DecodeOptions = {}): DiskCatalog {
  const resolved = resolveOptions(options);
  const unwrapped = unwrapDiskImage(bytes);
  const detected = detectCatalogFormat(unwrapped.image, { ...options, order: unwrapped.order ?? options.order });
  const reader = READERS.find(candidate => candidate.format === detected.format);
  if (!reader) {
    throw new UnrecognizedFormatError(`No reader for catalog format ${detected.format}`);
  }

  const listing = reader.read(detected.image, resolved);
  const root: CatalogEntry = {
    name: listing.volumeName,
    path: '',
    system: detected.format,
    fileType: 0x0f,
    fileTypeLabel: 'DIR',
    auxType: 0,
    size: 0,
    blocks: listing.totalBlocks,
    data: new Uint8Array(0),
    isDirectory: true,
    isImage: false,
    children: listing.entries,
    created: listing.created,
  };

  return {
    format: detected.format,
    order: detected.order,
    volumeName: listing.volumeName,
    diskSize: unwrapped.image.length,
    totalBlocks: listing.totalBlocks,
    created: listing.created,
    root,
    problems: listing.problems,
  };
}

export function countFiles(entry: CatalogEntry): number {
  return entry.children.reduce((count, child) => count + (child.isDirectory ? countFiles(child) : 1), 0);
}

// Depth-first, in on-disk slot order
export function flattenCatalog(entry: CatalogEntry): CatalogEntry[] {
  const result: CatalogEntry[] = [];
  for (const child of entry.children) {
    result.push(child);
    if (child.isDirectory) {
      result.push(...flattenCatalog(child));
    }
  }
  return result;
}

export function findEntry(root: CatalogEntry, path: string): CatalogEntry | undefined {
  const wanted = path.replace(/^\/+/, '').toUpperCase();
  return flattenCatalog(root).find(entry => entry.path.toUpperCase() === wanted);
}
