// Synthetic disk images and documents for the test suites

export function putU16(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = value & 0xff;
  buf[offset + 1] = (value >> 8) & 0xff;
}

export function putU24(buf: Uint8Array, offset: number, value: number): void {
  putU16(buf, offset, value & 0xffff);
  buf[offset + 2] = (value >> 16) & 0xff;
}

export function putU32(buf: Uint8Array, offset: number, value: number): void {
  putU16(buf, offset, value & 0xffff);
  putU16(buf, offset + 2, (value >>> 16) & 0xffff);
}

export function putAscii(buf: Uint8Array, offset: number, text: string, highBit: boolean = false): void {
  for (let i = 0; i < text.length; i++) {
    buf[offset + i] = text.charCodeAt(i) | (highBit ? 0x80 : 0);
  }
}

export function ascii(text: string): Uint8Array {
  const buf = new Uint8Array(text.length);
  putAscii(buf, 0, text);
  return buf;
}

export function concat(...parts: (Uint8Array | number[])[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

// ProDOS

export function prodosDate(year: number, month: number, day: number): number {
  return ((year % 100) << 9) | (month << 5) | day;
}

export function prodosTime(hour: number, minute: number): number {
  return (hour << 8) | minute;
}

export interface ProDOSEntryFields {
  storageType: number;
  name: string;
  fileType: number;
  keyPointer: number;
  blocksUsed: number;
  eof: number;
  auxType?: number;
  access?: number;
  created?: [number, number];
  modified?: [number, number];
  headerPointer: number;
}

export function writeProDOSEntry(block: Uint8Array, offset: number, fields: ProDOSEntryFields): void {
  block[offset] = (fields.storageType << 4) | fields.name.length;
  putAscii(block, offset + 1, fields.name);
  block[offset + 16] = fields.fileType;
  putU16(block, offset + 17, fields.keyPointer);
  putU16(block, offset + 19, fields.blocksUsed);
  putU24(block, offset + 21, fields.eof);
  putU16(block, offset + 24, fields.created?.[0] ?? 0);
  putU16(block, offset + 26, fields.created?.[1] ?? 0);
  block[offset + 30] = fields.access ?? 0xc3;
  putU16(block, offset + 31, fields.auxType ?? 0);
  putU16(block, offset + 33, fields.modified?.[0] ?? 0);
  putU16(block, offset + 35, fields.modified?.[1] ?? 0);
  putU16(block, offset + 37, fields.headerPointer);
}

export function writeDirectoryHeader(
  block: Uint8Array,
  storageType: 0xe | 0xf,
  name: string,
  fileCount: number,
  tail: { totalBlocks?: number; parentPointer?: number; parentEntry?: number },
): void {
  const offset = 4;
  block[offset] = (storageType << 4) | name.length;
  putAscii(block, offset + 1, name);
  block[offset + 31] = 0x27;
  block[offset + 32] = 0x0d;
  putU16(block, offset + 33, fileCount);
  if (storageType === 0xf) {
    putU16(block, offset + 35, 6);
    putU16(block, offset + 37, tail.totalBlocks ?? 280);
  } else {
    putU16(block, offset + 35, tail.parentPointer ?? 2);
    block[offset + 37] = tail.parentEntry ?? 1;
    block[offset + 38] = 0x27;
  }
}

export function blockOf(image: Uint8Array, block: number): Uint8Array {
  return image.subarray(block * 512, (block + 1) * 512);
}

export const HELLO_TEXT = 'HELLO\rWORLD\r';

// Volume TESTVOL: two seedlings and a subdirectory holding a two-block sapling
export function buildProDOSVolume(): Uint8Array {
  const image = new Uint8Array(280 * 512);
  const root = blockOf(image, 2);
  writeDirectoryHeader(root, 0xf, 'TESTVOL', 3, { totalBlocks: 280 });
  putU16(image, 2 * 512 + 2, 3);
  putU16(image, 3 * 512, 2);

  writeProDOSEntry(root, 4 + 39, {
    storageType: 1, name: 'README', fileType: 0x04, keyPointer: 7, blocksUsed: 1,
    eof: HELLO_TEXT.length, created: [prodosDate(2024, 3, 15), prodosTime(10, 30)], headerPointer: 2,
  });
  writeProDOSEntry(root, 4 + 2 * 39, {
    storageType: 1, name: 'STARTUP', fileType: 0xfc, keyPointer: 8, blocksUsed: 1,
    eof: 14, auxType: 0x0801, modified: [prodosDate(1987, 11, 2), prodosTime(23, 5)], headerPointer: 2,
  });
  writeProDOSEntry(root, 4 + 3 * 39, {
    storageType: 0xd, name: 'DOCS', fileType: 0x0f, keyPointer: 9, blocksUsed: 1, eof: 512, headerPointer: 2,
  });

  putAscii(image, 7 * 512, HELLO_TEXT);
  image.set([0x01, 0x08, 0x00, 0x08, 0x0a, 0x00, 0xba, 0x22, 0x48, 0x49, 0x22, 0x00, 0x00, 0x00], 8 * 512);

  const sub = blockOf(image, 9);
  writeDirectoryHeader(sub, 0xe, 'DOCS', 1, { parentPointer: 2, parentEntry: 3 });
  writeProDOSEntry(sub, 4 + 39, {
    storageType: 2, name: 'BIG.BIN', fileType: 0x06, keyPointer: 10, blocksUsed: 3, eof: 600, auxType: 0x2000, headerPointer: 9,
  });

  // Sapling index: data blocks 11 and 12
  image[10 * 512] = 11;
  image[10 * 512 + 1] = 12;
  image.fill(0xaa, 11 * 512, 12 * 512);
  image.fill(0xbb, 12 * 512, 13 * 512);
  return image;
}

// ProDOS block n of a track lives in these DOS 3.3 sectors
const BLOCK_TO_DOS: [number, number][] = [[0, 14], [13, 12], [11, 10], [9, 8], [7, 6], [5, 4], [3, 2], [1, 15]];

export function toDosOrder(prodosImage: Uint8Array): Uint8Array {
  const result = new Uint8Array(prodosImage.length);
  const tracks = prodosImage.length / 4096;
  for (let track = 0; track < tracks; track++) {
    BLOCK_TO_DOS.forEach(([first, second], i) => {
      const source = (track * 8 + i) * 512;
      result.set(prodosImage.subarray(source, source + 256), (track * 16 + first) * 256);
      result.set(prodosImage.subarray(source + 256, source + 512), (track * 16 + second) * 256);
    });
  }
  return result;
}

// DOS 3.3, DOS sector order

export function dosSectorOffset(track: number, sector: number): number {
  return (track * 16 + sector) * 256;
}

// Catalog on T17 S15 with a locked binary file and an Applesoft program
export function buildDOS33Image(): Uint8Array {
  const image = new Uint8Array(35 * 16 * 256);
  const vtoc = dosSectorOffset(17, 0);
  image[vtoc + 0x01] = 17;
  image[vtoc + 0x02] = 15;
  image[vtoc + 0x03] = 3;
  image[vtoc + 0x06] = 254;
  image[vtoc + 0x27] = 122;
  image[vtoc + 0x34] = 35;
  image[vtoc + 0x35] = 16;
  putU16(image, vtoc + 0x36, 256);

  const catalog = dosSectorOffset(17, 15);
  const writeEntry = (slot: number, tsTrack: number, tsSector: number, type: number, name: string, sectors: number) => {
    const offset = catalog + 0x0b + slot * 35;
    image[offset] = tsTrack;
    image[offset + 1] = tsSector;
    image[offset + 2] = type;
    image.fill(0xa0, offset + 3, offset + 33);
    putAscii(image, offset + 3, name, true);
    putU16(image, offset + 33, sectors);
  };

  writeEntry(0, 18, 0, 0x84, 'GAME LOADER', 2);
  writeEntry(1, 0xff, 0, 0x02, 'DELETED', 2);
  writeEntry(2, 19, 0, 0x02, 'HELLO', 2);

  // Binary: T/S list on T18 S0, data on T18 S1, load $0300, 3 bytes
  image[dosSectorOffset(18, 0) + 0x0c] = 18;
  image[dosSectorOffset(18, 0) + 0x0d] = 1;
  image.set([0x00, 0x03, 0x03, 0x00, 0xa9, 0x01, 0x60], dosSectorOffset(18, 1));

  // Applesoft: T/S list on T19 S0, data on T19 S1
  image[dosSectorOffset(19, 0) + 0x0c] = 19;
  image[dosSectorOffset(19, 0) + 0x0d] = 1;
  image.set([0x0e, 0x00, 0x01, 0x08, 0x00, 0x08, 0x0a, 0x00, 0xba, 0x22, 0x48, 0x49, 0x22, 0x00, 0x00, 0x00], dosSectorOffset(19, 1));
  return image;
}

// UCSD Pascal, ProDOS block order

export function buildUCSDImage(): Uint8Array {
  const image = new Uint8Array(280 * 512);
  const dir = 2 * 512;
  putU16(image, dir + 2, 6);
  image[dir + 6] = 5;
  putAscii(image, dir + 7, 'PASC1');
  putU16(image, dir + 14, 280);
  putU16(image, dir + 16, 2);

  const writeEntry = (slot: number, first: number, next: number, kind: number, name: string, lastBytes: number, date: number) => {
    const offset = dir + 26 * (slot + 1);
    putU16(image, offset, first);
    putU16(image, offset + 2, next);
    putU16(image, offset + 4, kind);
    image[offset + 6] = name.length;
    putAscii(image, offset + 7, name);
    putU16(image, offset + 22, lastBytes);
    putU16(image, offset + 24, date);
  };

  // TEXT: 2 header blocks plus one text block holding 10 bytes
  writeEntry(0, 6, 9, 3, 'NOTES.TEXT', 10, (86 << 9) | (12 << 4) | 7);
  writeEntry(1, 9, 10, 2, 'PROG.CODE', 512, 0);
  image.set([0x10, 0x22, 0x48, 0x49, 0x0d, 0x4f, 0x4b, 0x0d, 0x00, 0x00], 8 * 512);
  image.fill(0x42, 9 * 512, 10 * 512);
  return image;
}

// BASIC

// Lays out Applesoft lines at $0801 with real next-line pointers and the end marker
export function applesoftProgram(lines: [number, number[]][]): Uint8Array {
  const bytes: number[] = [];
  let address = 0x0801;
  for (const [lineNumber, body] of lines) {
    const next = address + 4 + body.length + 1;
    bytes.push(next & 0xff, next >> 8, lineNumber & 0xff, lineNumber >> 8, ...body, 0x00);
    address = next;
  }
  bytes.push(0x00, 0x00);
  return new Uint8Array(bytes);
}

export function integerLine(lineNumber: number, body: number[]): number[] {
  return [body.length + 4, lineNumber & 0xff, lineNumber >> 8, ...body, 0x01];
}

// AppleWorks

export function f64(value: number): number[] {
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setFloat64(0, value, true);
  return Array.from(bytes);
}

export function awpTextRecord(text: number[] | Uint8Array): number[] {
  return [text.length + 2, 0x00, 0x00, 0x80 | text.length, ...text];
}

export function buildAppleWorksWP(records: number[][], minVersion: number = 0): Uint8Array {
  const header = new Uint8Array(300);
  header[4] = 79;
  header[183] = minVersion;
  const extra = minVersion >= 30 ? [0x00, 0x00] : [];
  return concat(header, extra, ...records, [0xff, 0xff]);
}

export interface GWPParagraphFields {
  font: number;
  style: number;
  size: number;
  color: number;
  body: number[];
}

export function buildGSWordProcessor(
  palette: number[],
  entries: { pageBreak?: boolean; ruler: number }[],
  rulerStatus: number[],
  paragraphs: GWPParagraphFields[],
): Uint8Array {
  const header = new Uint8Array(282);
  putU16(header, 0, 0x1011);
  putU16(header, 2, 282);
  palette.forEach((word, i) => putU16(header, 0x38 + i * 2, word));

  const saveArray = new Uint8Array(2 + entries.length * 12);
  putU16(saveArray, 0, entries.length);
  entries.forEach((entry, i) => {
    putU16(saveArray, 2 + i * 12 + 4, entry.pageBreak ? 1 : 0);
    putU16(saveArray, 2 + i * 12 + 6, entry.ruler);
  });

  const rulers = new Uint8Array(rulerStatus.length * 52);
  rulerStatus.forEach((status, i) => putU16(rulers, i * 52 + 2, status));

  const text = concat(...paragraphs.map(p => [p.font & 0xff, p.font >> 8, p.style, p.size, p.color, 0, 0, ...p.body]));
  const textHeader = new Uint8Array(8);
  putU32(textHeader, 0, text.length);

  return concat(header, new Uint8Array(386), saveArray, rulers, textHeader, text);
}

export function buildAppleWorksDB(categories: string[], records: number[][], recordCountWord: number = records.length): Uint8Array {
  const headerLength = 357 + categories.length * 22;
  const header = new Uint8Array(Math.max(headerLength, 379));
  putU16(header, 0, header.length);
  header[35] = categories.length;
  putU16(header, 36, recordCountWord);
  categories.forEach((name, i) => {
    header[357 + i * 22] = name.length;
    putAscii(header, 358 + i * 22, name);
  });
  const standardValues = [0x03, 0x00, 0xff, 0xff, 0xff];
  const body = records.map(record => [record.length & 0xff, record.length >> 8, ...record]);
  return concat(header, standardValues, ...body, [0xff, 0xff]);
}

export function aspRow(rowNumber: number, cells: number[]): number[] {
  const length = cells.length + 2;
  return [length & 0xff, length >> 8, rowNumber & 0xff, rowNumber >> 8, ...cells];
}

export function buildAppleWorksSS(rows: number[][]): Uint8Array {
  return concat(new Uint8Array(300), ...rows, [0xff, 0xff]);
}

// RGBA of one pixel in a decoded picture
export function pixelAt(image: { width: number; pixels: Uint8Array }, x: number, y: number): number[] {
  const index = (y * image.width + x) * 4;
  return Array.from(image.pixels.subarray(index, index + 4));
}

// PackBytes runs of one repeated byte, longest runs first
export function packedRepeat(value: number, count: number): number[] {
  const out: number[] = [];
  let left = count;
  while (left >= 4) {
    const quads = Math.min(64, left >> 2);
    out.push(0xc0 | (quads - 1), value);
    left -= quads * 4;
  }
  if (left > 0) {
    out.push(0x40 | (left - 1), value);
  }
  return out;
}

// IIgs resource forks and Teach styles

export interface ResourceFields {
  type: number;
  id: number;
  data: Uint8Array | number[];
}

// Header, map, index with its terminating empty slot, then the resource data
export function buildIIgsResourceFork(resources: ResourceFields[]): Uint8Array {
  const mapOffset = 140;
  const indexSize = resources.length + 1;
  const dataStart = mapOffset + 32 + indexSize * 20;

  const header = new Uint8Array(140);
  putU32(header, 4, mapOffset);
  putU32(header, 8, 32 + indexSize * 20);

  const map = new Uint8Array(32 + indexSize * 20);
  putU16(map, 14, 32);
  putU32(map, 20, indexSize);
  putU32(map, 24, resources.length);

  let dataOffset = dataStart;
  resources.forEach((resource, i) => {
    const entry = 32 + i * 20;
    putU16(map, entry, resource.type);
    putU32(map, entry + 2, resource.id);
    putU32(map, entry + 6, dataOffset);
    putU32(map, entry + 12, resource.data.length);
    dataOffset += resource.data.length;
  });

  return concat(header, map, ...resources.map(resource => resource.data));
}

export interface TeachStyleFields {
  family: number;
  flags: number;
  size: number;
  color: number;
}

// TEFormat with a 4-byte ruler list; items are [length, style index]
export function teachStyleBlock(styles: TeachStyleFields[], items: [number, number][]): Uint8Array {
  const block = new Uint8Array(2 + 4 + 4 + 4 + styles.length * 12 + 4 + items.length * 8);
  putU32(block, 2, 4);
  let offset = 10;
  putU32(block, offset, styles.length * 12);
  offset += 4;
  for (const style of styles) {
    putU16(block, offset, style.family);
    block[offset + 2] = style.flags;
    block[offset + 3] = style.size;
    putU16(block, offset + 4, style.color);
    offset += 12;
  }
  putU32(block, offset, items.length);
  offset += 4;
  for (const [length, styleIndex] of items) {
    putU32(block, offset, length);
    putU32(block, offset + 4, styleIndex * 12);
    offset += 8;
  }
  return block;
}

// Binary II

export interface BinaryIIFields {
  name: string;
  fileType: number;
  auxType?: number;
  storageType?: number;
  data?: Uint8Array;
  phantom?: boolean;
  dataFlags?: number;
}

export function binaryIIHeader(file: BinaryIIFields, filesToFollow: number): Uint8Array {
  const header = new Uint8Array(128);
  header.set([0x0a, 0x47, 0x4c], 0);
  header[3] = 0xc3;
  header[4] = file.fileType;
  putU16(header, 5, file.auxType ?? 0);
  header[7] = file.storageType ?? 1;
  putU16(header, 8, Math.ceil((file.data?.length ?? 0) / 512));
  putU16(header, 10, prodosDate(89, 6, 15));
  putU16(header, 12, prodosTime(13, 30));
  header[18] = 0x02;
  putU24(header, 20, file.data?.length ?? 0);
  header[23] = file.name.length;
  putAscii(header, 24, file.name);
  header[124] = file.phantom ? 1 : 0;
  header[125] = file.dataFlags ?? 0;
  header[126] = 1;
  header[127] = filesToFollow;
  return header;
}

export function buildBinaryII(files: BinaryIIFields[]): Uint8Array {
  return concat(
    ...files.flatMap((file, i) => {
      const data = file.data ?? new Uint8Array(0);
      const padded = new Uint8Array(Math.ceil(data.length / 128) * 128);
      padded.set(data);
      return [binaryIIHeader(file, files.length - 1 - i), padded];
    })
  );
}

// NuFX

export interface NuFXThreadFields {
  threadClass: number;
  kind: number;
  format?: number;
  data: Uint8Array;
  // Allocation larger than the data, as filename threads have
  allocation?: number;
}

export interface NuFXRecordFields {
  name: string;
  fileType: number;
  auxType?: number;
  nameInThread?: boolean;
  threads: NuFXThreadFields[];
}

// Created 15 June 2024 12:30:45
export const NUFX_TEST_DATE = [45, 30, 12, 124, 14, 5, 0, 0];

function nufxRecord(record: NuFXRecordFields): Uint8Array {
  const threads: NuFXThreadFields[] = record.nameInThread
    ? [{ threadClass: 3, kind: 0, data: ascii(record.name), allocation: 32 }, ...record.threads]
    : record.threads;
  const inlineName = record.nameInThread ? new Uint8Array(0) : ascii(record.name);

  const header = new Uint8Array(58);
  header.set([0x4e, 0xf5, 0x46, 0xd8], 0);
  putU16(header, 6, 58);
  putU16(header, 8, 3);
  putU32(header, 10, threads.length);
  putU16(header, 14, 1);
  putU16(header, 16, 0x2f);
  putU32(header, 18, 0xe3);
  putU32(header, 22, record.fileType);
  putU32(header, 26, record.auxType ?? 0);
  putU16(header, 30, 1);
  header.set(NUFX_TEST_DATE, 32);
  putU16(header, 56, inlineName.length);

  const threadHeaders = new Uint8Array(threads.length * 16);
  const bodies: Uint8Array[] = [];
  threads.forEach((thread, i) => {
    const allocation = thread.allocation ?? thread.data.length;
    putU16(threadHeaders, i * 16, thread.threadClass);
    putU16(threadHeaders, i * 16 + 2, thread.format ?? 0);
    putU16(threadHeaders, i * 16 + 4, thread.kind);
    putU32(threadHeaders, i * 16 + 8, thread.data.length);
    putU32(threadHeaders, i * 16 + 12, allocation);
    const body = new Uint8Array(allocation);
    body.set(thread.data);
    bodies.push(body);
  });

  return concat(header, inlineName, threadHeaders, ...bodies);
}

export function buildNuFX(records: NuFXRecordFields[], totalRecords: number = records.length): Uint8Array {
  const master = new Uint8Array(48);
  master.set([0x4e, 0xf5, 0x46, 0xe9, 0x6c, 0xe5], 0);
  putU32(master, 8, totalRecords);
  master.set(NUFX_TEST_DATE, 12);
  putU16(master, 28, 2);
  const body = concat(...records.map(nufxRecord));
  putU32(master, 38, 48 + body.length);
  return concat(master, body);
}

// TESTVOL with a fourth root entry: an extended Teach file whose forks are seedlings
export function buildProDOSVolumeWithTeachFile(): Uint8Array {
  const image = buildProDOSVolume();
  const root = blockOf(image, 2);
  putU16(root, 4 + 33, 4);
  const text = ascii('Bold\rplain');
  const fork = buildIIgsResourceFork([
    { type: 0x8012, id: 1, data: teachStyleBlock([{ family: 0x14, flags: 0x01, size: 12, color: 0 }], [[4, 0]]) },
  ]);
  writeProDOSEntry(root, 4 + 4 * 39, {
    storageType: 5, name: 'NOTES', fileType: 0x50, auxType: 0x5445, keyPointer: 20, blocksUsed: 3, eof: 512, headerPointer: 2,
  });

  const key = blockOf(image, 20);
  key[0] = 1;
  putU16(key, 1, 21);
  putU24(key, 5, text.length);
  key[256] = 1;
  putU16(key, 257, 22);
  putU24(key, 261, fork.length);
  image.set(text, 21 * 512);
  image.set(fork, 22 * 512);
  return image;
}

// IIgs fonts

export interface FontRecordFields {
  firstChar: number;
  lastChar: number;
  widMax: number;
  kernMax?: number;
  height: number;
  rowWords: number;
}

// Family name, a six-word IIgs header, then the font record and its tables
export function buildIIgsFont(name: string, record: FontRecordFields, strike: number[], locations: number[], offsetWidths: number[]): Uint8Array {
  const header = new Uint8Array(12);
  putU16(header, 0, 6);
  putU16(header, 2, 0x1234);
  putU16(header, 6, 8);
  putU16(header, 8, 0x0101);

  const fields = new Uint8Array(26);
  putU16(fields, 2, record.firstChar);
  putU16(fields, 4, record.lastChar);
  putU16(fields, 6, record.widMax);
  putU16(fields, 8, (record.kernMax ?? 0) & 0xffff);
  putU16(fields, 12, record.widMax * (record.lastChar - record.firstChar + 1));
  putU16(fields, 14, record.height);
  putU16(fields, 18, record.height);
  putU16(fields, 24, record.rowWords);

  const tables = new Uint8Array((locations.length + offsetWidths.length) * 2);
  [...locations, ...offsetWidths].forEach((word, i) => putU16(tables, i * 2, word));

  return concat([name.length], ascii(name), header, fields, strike, tables);
}
