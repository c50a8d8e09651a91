import { decodeNuFXDateTime, extractAllNuFXRecords, extractNuFXThread, isNuFX, readNuFXArchive } from './nufx.js';
import { MalformedHeaderError, UnrecognizedFormatError, UnsupportedMethodError } from './errors.js';
import { NUFX_TEST_DATE, ascii, buildNuFX, putU32 } from './testutil.js';
import { describe, it, expect } from 'vitest';

const SHRUNK = buildNuFX([
  { name: 'HELLO', fileType: 0xfc, auxType: 0x0801, threads: [{ threadClass: 2, kind: 0, data: ascii('PRINT') }] },
  {
    name: 'PIC',
    fileType: 0xc1,
    nameInThread: true,
    threads: [
      { threadClass: 2, kind: 0, data: new Uint8Array([1, 2, 3]) },
      { threadClass: 2, kind: 2, data: new Uint8Array([9, 9]) },
    ],
  },
  { name: 'PACKED', fileType: 0x04, threads: [{ threadClass: 2, kind: 0, format: 3, data: new Uint8Array([0xaa]) }] },
]);

describe('readNuFXArchive', () => {
  it('should read the master header and every record', () => {
    const archive = readNuFXArchive(SHRUNK);

    expect(archive.version).toBe(2);
    expect(archive.totalRecords).toBe(3);
    expect(archive.created).toEqual({ year: 2024, month: 6, day: 15, hour: 12, minute: 30, second: 45 });
    expect(archive.problems).toEqual([]);
    expect(archive.records.map(record => [record.filename, record.fileType, record.separator])).toEqual([
      ['HELLO', 0xfc, '/'],
      ['PIC', 0xc1, '/'],
      ['PACKED', 0x04, '/'],
    ]);
    expect(archive.records[0]).toMatchObject({ auxType: 0x0801, access: 0xe3, storageType: 1, fileSystem: 1, version: 3 });
    expect(archive.records[0].threads).toEqual([
      { threadClass: 'data', format: 0, kind: 0, crc: 0, eof: 5, compressedEof: 5, dataOffset: 48 + 58 + 5 + 16 },
    ]);
  });

  it('should take the name from a filename thread', () => {
    const pic = readNuFXArchive(SHRUNK).records[1];

    expect(pic.filename).toBe('PIC');
    expect(pic.threads.map(thread => thread.threadClass)).toEqual(['filename', 'data', 'data']);
  });

  it('should keep the records read before a missing one', () => {
    const bytes = buildNuFX([{ name: 'ONLY', fileType: 0x04, threads: [{ threadClass: 2, kind: 0, data: ascii('X') }] }], 2);

    const archive = readNuFXArchive(bytes);

    expect(archive.records.map(record => record.filename)).toEqual(['ONLY']);
    expect(archive.problems).toEqual([`NuFX record header at offset ${bytes.length} is missing or truncated`]);
  });

  it('should throw when the first record is unreadable', () => {
    expect(() => readNuFXArchive(buildNuFX([], 1))).toThrow(MalformedHeaderError);
  });

  it('should reject data without the master signature', () => {
    expect(isNuFX(new Uint8Array(48))).toBe(false);
    expect(() => readNuFXArchive(new Uint8Array(48))).toThrow(UnrecognizedFormatError);
  });
});

describe('NuFX extraction', () => {
  it('should extract uncompressed forks and report compressed ones', () => {
    const { entries } = extractAllNuFXRecords(SHRUNK);

    expect(entries.map(member => [member.record.filename, member.part, member.result.ok])).toEqual([
      ['HELLO', 'dataFork', true],
      ['PIC', 'dataFork', true],
      ['PIC', 'resourceFork', true],
      ['PACKED', 'dataFork', false],
    ]);
    const resource = entries[2].result;
    expect(resource.ok && Array.from(resource.value)).toEqual([9, 9]);
    const packed = entries[3].result;
    expect(!packed.ok && packed.error).toBeInstanceOf(UnsupportedMethodError);
    expect(!packed.ok && packed.error.message).toBe('NuFX thread is compressed with LZW/2');
  });

  it('should read a disk image thread that leaves its length zero', () => {
    const bytes = buildNuFX([{ name: 'DISK', fileType: 0xe0, threads: [{ threadClass: 2, kind: 1, data: new Uint8Array(512).fill(7) }] }]);
    // eof field of the only thread header
    putU32(bytes, 48 + 58 + 4 + 8, 0);

    const [thread] = readNuFXArchive(bytes).records[0].threads;

    expect(extractNuFXThread(bytes, thread)).toHaveLength(512);
  });
});

describe('decodeNuFXDateTime', () => {
  it('should treat an all-zero stamp as missing', () => {
    expect(decodeNuFXDateTime(new Uint8Array(8))).toBeUndefined();
    expect(decodeNuFXDateTime(new Uint8Array(NUFX_TEST_DATE))?.year).toBe(2024);
  });
});
