import { extractAllBinaryIIEntries, extractBinaryIIEntry, isBinaryII, listBinaryII } from './binaryii.js';
import { MalformedHeaderError, UnrecognizedFormatError, UnsupportedMethodError } from './errors.js';
import { ascii, buildBinaryII, putU24 } from './testutil.js';
import { describe, it, expect } from 'vitest';

const program = new Uint8Array(200).fill(0x41);

describe('listBinaryII', () => {
  it('should list files and directories with their ProDOS attributes', () => {
    const archive = buildBinaryII([
      { name: 'HELLO', fileType: 0xfc, auxType: 0x0801, data: program },
      { name: 'DOCS', fileType: 0x0f, storageType: 0x0d },
      { name: 'DOCS/README', fileType: 0x04, data: ascii('HI\r') },
    ]);

    const { entries, problems } = listBinaryII(archive);

    expect(problems).toEqual([]);
    expect(entries.map(entry => [entry.filename, entry.fileType, entry.eof, entry.isDirectory, entry.dataOffset])).toEqual([
      ['HELLO', 0xfc, 200, false, 128],
      ['DOCS', 0x0f, 0, true, 512],
      ['DOCS/README', 0x04, 3, false, 640],
    ]);
    expect(entries[0]).toMatchObject({
      access: 0xc3,
      auxType: 0x0801,
      blocks: 1,
      filesToFollow: 2,
      modified: { year: 1989, month: 6, day: 15, hour: 13, minute: 30, second: 0 },
      created: undefined,
    });
  });

  it('should step over phantom entries', () => {
    const archive = buildBinaryII([
      { name: 'A', fileType: 0x06, data: ascii('AAA') },
      { name: 'SHADOW', fileType: 0x06, data: new Uint8Array(300), phantom: true },
      { name: 'B', fileType: 0x06, data: ascii('BB') },
    ]);

    const { entries } = listBinaryII(archive);

    expect(entries.map(entry => entry.filename)).toEqual(['A', 'B']);
    expect(Array.from(extractBinaryIIEntry(archive, entries[1]))).toEqual([0x42, 0x42]);
  });

  it('should keep the entries read before a damaged header', () => {
    const archive = buildBinaryII([
      { name: 'GOOD', fileType: 0x06, data: new Uint8Array(100) },
      { name: 'BAD', fileType: 0x06, data: new Uint8Array(10) },
    ]);
    archive[256] = 0;

    expect(listBinaryII(archive)).toMatchObject({
      entries: [{ filename: 'GOOD' }],
      problems: ['Binary II header at offset 256 has no signature'],
    });
  });

  it('should report an entry whose data runs off the end', () => {
    const archive = buildBinaryII([
      { name: 'GOOD', fileType: 0x06, data: new Uint8Array(100) },
      { name: 'LONG', fileType: 0x06, data: new Uint8Array(10) },
    ]);
    putU24(archive, 256 + 20, 5000);

    expect(listBinaryII(archive).problems).toEqual([
      'Binary II entry at offset 256 declares 5000 bytes past the end of the archive',
    ]);
  });

  it('should throw when the first header is damaged', () => {
    const archive = buildBinaryII([{ name: 'X', fileType: 0x06, data: ascii('X') }]);
    archive[23] = 0;

    expect(() => listBinaryII(archive)).toThrow(MalformedHeaderError);
  });

  it('should reject data without the signature', () => {
    expect(isBinaryII(new Uint8Array(128))).toBe(false);
    expect(() => listBinaryII(new Uint8Array(128))).toThrow(UnrecognizedFormatError);
  });
});

describe('extractAllBinaryIIEntries', () => {
  it('should extract file data and leave directories out', () => {
    const archive = buildBinaryII([
      { name: 'DOCS', fileType: 0x0f, storageType: 0x0d },
      { name: 'DOCS/README', fileType: 0x04, data: ascii('HI\r') },
    ]);

    const { entries } = extractAllBinaryIIEntries(archive);
    const [readme] = entries;

    expect(entries).toHaveLength(1);
    expect(readme.entry.filename).toBe('DOCS/README');
    expect(readme.result.ok && Array.from(readme.result.value)).toEqual([0x48, 0x49, 0x0d]);
  });

  it('should report squeezed entries as unsupported', () => {
    const archive = buildBinaryII([{ name: 'SQ', fileType: 0x04, data: ascii('ZZZ'), dataFlags: 0x80 }]);

    const [member] = extractAllBinaryIIEntries(archive).entries;

    expect(member.entry.squeezed).toBe(true);
    expect(member.result.ok).toBe(false);
    expect(!member.result.ok && member.result.error).toBeInstanceOf(UnsupportedMethodError);
  });
});
