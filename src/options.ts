// Decode options with their defaults resolved in one place

import type { CatalogFormat, DecodeOptions, Inflate, SectorOrder } from './types.js';
import { defaultInflate } from './archive.js';

export interface ResolvedOptions {
  inflate: Inflate;
  strict: boolean;
  quiet: boolean;
  order?: SectorOrder;
  format?: CatalogFormat;
}

export function resolveOptions(options: DecodeOptions = {}): ResolvedOptions {
  return {
    inflate: options.inflate ?? defaultInflate,
    strict: options.strict ?? false,
    quiet: options.quiet ?? false,
    order: options.order,
    format: options.format,
  };
}

export function warn(options: ResolvedOptions, message: string): void {
  if (!options.quiet) {
    console.warn(message);
  }
}
