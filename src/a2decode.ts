// Main API for the a2decode library

import type { CatalogEntry, DecodeOptions, DiskCatalog } from './types.js';
import type { BasicDialect, TokenLine } from './basic.js';
import type { DocumentModel } from './appleworks.js';
import type { RasterImage } from './graphics.js';
import type { IconFile } from './icons.js';
import type { IIgsFont } from './iigsfont.js';
import type { ContentKind, ContentSample, Classification } from './classify.js';
import type { ExtractedEntry } from './archive.js';
import type { BinaryIIMember } from './binaryii.js';
import type { NuFXMember } from './nufx.js';
import type { ResolvedOptions } from './options.js';
import type { DecodeError, DecodeResult } from './errors.js';
import { UnrecognizedFormatError, attempt } from './errors.js';
import { resolveOptions, warn } from './options.js';
import { extractAllZipEntries, gunzip, isGzip, isZip, readGzipHeader } from './archive.js';
import { extractAllBinaryIIEntries, isBinaryII } from './binaryii.js';
import { extractAllNuFXRecords, isNuFX } from './nufx.js';
import { looksLikeDiskImage } from './diskimage.js';
import { walkCatalog } from './catalog.js';
import { classifyContent, entrySample, equivalentProDOSType } from './classify.js';
import { detokenize, lineText } from './basic.js';
import { decodeDocumentAs } from './appleworks.js';
import { decodeRaster } from './raster.js';
import { decodeIconFile } from './icons.js';
import { decodeIIgsFont } from './iigsfont.js';
import { decodeUCSDText } from './ucsd.js';
import { appleText } from './textio.js';

export * from './errors.js';
export * from './types.js';
export * from './bytereader.js';
export * from './structtemplate.js';
export * from './textio.js';
export * from './filetypes.js';
export * from './options.js';
export * from './archive.js';
export * from './binaryii.js';
export * from './nufx.js';
export * from './resfork.js';
export * from './diskimage.js';
export * from './catalog.js';
export * from './prodos.js';
export * from './dos33.js';
export * from './ucsd.js';
export * from './basic.js';
export * from './appleworks.js';
export * from './teach.js';
export * from './graphics.js';
export * from './packed.js';
export * from './macpaint.js';
export * from './icons.js';
export * from './iigsfont.js';
export * from './raster.js';
export * from './classify.js';
export * from './jsonio.js';
export * from './disasm.js';

export type DecodedContent =
  | { readonly kind: 'directory'; readonly entries: readonly CatalogEntry[] }
  | { readonly kind: 'catalog'; readonly catalog: DiskCatalog }
  | { readonly kind: 'gzip'; readonly filename?: string; readonly data: Uint8Array }
  | { readonly kind: 'zip'; readonly entries: readonly ExtractedEntry[]; readonly problems: readonly string[] }
  | { readonly kind: 'binaryII'; readonly entries: readonly BinaryIIMember[]; readonly problems: readonly string[] }
  | { readonly kind: 'nufx'; readonly entries: readonly NuFXMember[]; readonly problems: readonly string[] }
  | { readonly kind: 'basic'; readonly dialect: BasicDialect; readonly lines: readonly TokenLine[]; readonly listing: string }
  | { readonly kind: 'document'; readonly document: DocumentModel }
  | { readonly kind: 'raster'; readonly image: RasterImage }
  | { readonly kind: 'icons'; readonly icons: IconFile }
  | { readonly kind: 'font'; readonly font: IIgsFont }
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'binary'; readonly data: Uint8Array }
  | { readonly kind: 'error'; readonly content: ContentKind; readonly error: DecodeError };

interface ArchiveMember {
  name: string;
  result: DecodeResult<Uint8Array>;
}

function archiveMembers(bytes: Uint8Array, options: ResolvedOptions): { members: ArchiveMember[]; problems: string[] } {
  if (isZip(bytes)) {
    const { entries, problems } = extractAllZipEntries(bytes, options.inflate);
    return { members: entries.map(({ entry, result }) => ({ name: entry.filename, result })), problems };
  }
  if (isBinaryII(bytes)) {
    const { entries, problems } = extractAllBinaryIIEntries(bytes);
    return { members: entries.map(({ entry, result }) => ({ name: entry.filename, result })), problems };
  }
  const { entries, problems } = extractAllNuFXRecords(bytes);
  return { members: entries.map(({ record, result }) => ({ name: record.filename, result })), problems };
}

// Gzip yields its one member; the other archives yield the first member that looks like a disk image
function unwrapArchive(bytes: Uint8Array, options: ResolvedOptions): Uint8Array {
  if (isGzip(bytes)) {
    return gunzip(bytes, options.inflate);
  }
  if (!isZip(bytes) && !isBinaryII(bytes) && !isNuFX(bytes)) {
    return bytes;
  }
  const { members, problems } = archiveMembers(bytes, options);
  for (const problem of problems) {
    warn(options, problem);
  }
  for (const { name, result } of members) {
    if (!result.ok) {
      warn(options, `${name}: ${result.error.message}`);
      continue;
    }
    if (looksLikeDiskImage(name, result.value)) {
      return result.value;
    }
  }
  throw new UnrecognizedFormatError('Archive holds no disk image');
}

export function openDiskImage(bytes: Uint8Array, options: DecodeOptions = {}): DiskCatalog {
  return walkCatalog(unwrapArchive(bytes, resolveOptions(options)), options);
}

function decodeClassified(sample: ContentSample, classification: Classification, options: ResolvedOptions): DecodedContent {
  const { data } = sample;

  switch (classification.kind) {
    case 'catalog':
      return { kind: 'catalog', catalog: walkCatalog(data, options) };
    case 'archive':
      if (isGzip(data)) {
        return { kind: 'gzip', filename: readGzipHeader(data).filename, data: gunzip(data, options.inflate) };
      }
      if (isBinaryII(data)) {
        return { kind: 'binaryII', ...extractAllBinaryIIEntries(data) };
      }
      if (isNuFX(data)) {
        return { kind: 'nufx', ...extractAllNuFXRecords(data) };
      }
      return { kind: 'zip', ...extractAllZipEntries(data, options.inflate) };
    case 'applesoft':
    case 'integerBasic': {
      const dialect: BasicDialect = classification.kind === 'applesoft' ? 'applesoft' : 'integer';
      const lines = detokenize(data, dialect);
      return { kind: 'basic', dialect, lines, listing: lines.map(lineText).join('\n') };
    }
    case 'appleworks':
      return {
        kind: 'document',
        document: decodeDocumentAs(data, classification.document, sample.resourceFork, { quiet: options.quiet }),
      };
    case 'raster':
      return {
        kind: 'raster',
        image: decodeRaster(data, {
          fileType: equivalentProDOSType(sample.fileType, sample.system),
          auxType: sample.auxType,
          name: sample.name,
        }),
      };
    case 'icons':
      return { kind: 'icons', icons: decodeIconFile(data) };
    case 'font':
      return { kind: 'font', font: decodeIIgsFont(data) };
    case 'text':
      return { kind: 'text', text: appleText(data) };
    case 'pascalText':
      return { kind: 'text', text: decodeUCSDText(data) };
    case 'binary':
      return { kind: 'binary', data };
  }
}

// Decode failures come back as an 'error' value; anything else still throws
export function decodeContent(sample: ContentSample, options: DecodeOptions = {}): DecodedContent {
  const classification = classifyContent(sample);
  const result = attempt(() => decodeClassified(sample, classification, resolveOptions(options)));
  return result.ok ? result.value : { kind: 'error', content: classification.kind, error: result.error };
}

export function decodeEntry(entry: CatalogEntry, options: DecodeOptions = {}): DecodedContent {
  if (entry.isDirectory) {
    return { kind: 'directory', entries: entry.children };
  }
  return decodeContent(entrySample(entry), options);
}
