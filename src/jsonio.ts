// JSON inspector output for a walked disk catalog

import type { CatalogEntry, DateTimeParts, DiskCatalog } from './types.js';
import { accessFlagNames, fileTypeInfo, storageTypeDescription } from './filetypes.js';
import { hexWord, toHex } from './textio.js';

export interface JsonExportOptions {
  quiet?: boolean;
  // Adds each file's contents as base16
  includeData?: boolean;
}

export interface EntryJson {
  name: string;
  type: string;
  fileType: number;
  auxType: number;
  size: number;
  resourceForkSize?: number;
  blocks: number;
  description?: string;
  storage?: string;
  access?: string[];
  loadAddress?: number;
  created?: string;
  modified?: string;
  locked?: boolean;
  problem?: ProblemJson;
  data?: string;
  children?: EntryJson[];
}

export interface ProblemJson {
  path?: string;
  kind: string;
  message: string;
}

export interface CatalogJson {
  volume: {
    name: string;
    format: string;
    order: string;
    diskSize: number;
    totalBlocks: number;
    created?: string;
  };
  problems: ProblemJson[];
  files: number;
  entries: EntryJson[];
}

export function formatDateTime(parts: DateTimeParts | undefined): string | undefined {
  if (!parts) {
    return undefined;
  }
  const two = (value: number) => value.toString().padStart(2, '0');
  return `${parts.year}-${two(parts.month)}-${two(parts.day)} ${two(parts.hour)}:${two(parts.minute)}`;
}

function entryToJson(entry: CatalogEntry, options: JsonExportOptions, counter: { files: number }): EntryJson {
  if (!options.quiet) {
    console.log(
      `${entry.fileTypeLabel.padEnd(4)} $${hexWord(entry.auxType)} ${entry.size.toString().padStart(8)}  ${entry.path}${entry.isDirectory ? '/' : ''}`,
    );
  }

  const json: EntryJson = {
    name: entry.name,
    type: entry.fileTypeLabel,
    fileType: entry.fileType,
    auxType: entry.auxType,
    size: entry.size,
    blocks: entry.blocks,
  };

  if (entry.resourceFork) {
    json.resourceForkSize = entry.resourceFork.length;
  }
  if (entry.system === 'prodos') {
    json.description = fileTypeInfo(entry.fileType, entry.auxType).description;
  }
  if (entry.prodos) {
    json.storage = storageTypeDescription(entry.prodos.storageType);
    json.access = accessFlagNames(entry.prodos.access);
  }
  if (entry.loadAddress !== undefined) {
    json.loadAddress = entry.loadAddress;
  }
  json.created = formatDateTime(entry.created);
  json.modified = formatDateTime(entry.modified);
  if (entry.dos33?.locked) {
    json.locked = true;
  }
  if (entry.problem) {
    json.problem = { ...entry.problem };
  }

  if (entry.isDirectory) {
    json.children = entry.children.map(child => entryToJson(child, options, counter));
  } else {
    counter.files++;
    if (options.includeData) {
      json.data = toHex(entry.data);
    }
  }
  return json;
}

export function catalogToJson(catalog: DiskCatalog, options: JsonExportOptions = {}): string {
  const counter = { files: 0 };
  const entries = catalog.root.children.map(entry => entryToJson(entry, options, counter));

  const blob: CatalogJson = {
    volume: {
      name: catalog.volumeName,
      format: catalog.format,
      order: catalog.order,
      diskSize: catalog.diskSize,
      totalBlocks: catalog.totalBlocks,
      created: formatDateTime(catalog.created),
    },
    problems: catalog.problems.map(problem => ({ ...problem })),
    files: counter.files,
    entries,
  };

  return JSON.stringify(blob, null, '\t');
}
