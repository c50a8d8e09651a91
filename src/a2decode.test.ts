import { gzipSync, zipSync } from 'fflate';
import { decodeContent, decodeEntry, openDiskImage } from './a2decode.js';
import { findEntry } from './catalog.js';
import { CorruptDocumentError, TooShortError, UnrecognizedFormatError } from './errors.js';
import {
  ascii,
  awpTextRecord,
  buildAppleWorksWP,
  buildBinaryII,
  buildDOS33Image,
  buildNuFX,
  buildProDOSVolume,
  buildProDOSVolumeWithTeachFile,
  buildUCSDImage,
} from './testutil.js';
import { describe, it, expect } from 'vitest';

describe('openDiskImage', () => {
  it('should walk a bare disk image', () => {
    const catalog = openDiskImage(buildProDOSVolume(), { quiet: true });

    expect(catalog.format).toBe('prodos');
    expect(catalog.volumeName).toBe('TESTVOL');
  });

  it('should unwrap a gzipped image', () => {
    const catalog = openDiskImage(gzipSync(buildDOS33Image(), { filename: 'GAMES.DSK' }), { quiet: true });

    expect(catalog.format).toBe('dos33');
    expect(catalog.root.children.map(entry => entry.name)).toEqual(['GAME LOADER', 'HELLO']);
  });

  it('should pick the disk image out of a ZIP archive', () => {
    const archive = zipSync({ 'READ.ME': ascii('SEE DISK'), 'PASCAL.PO': buildUCSDImage() });

    const catalog = openDiskImage(archive, { quiet: true });

    expect(catalog.format).toBe('ucsd');
    expect(catalog.volumeName).toBe('PASC1');
  });

  it('should pick the disk image out of Binary II and NuFX archives', () => {
    const binaryII = buildBinaryII([
      { name: 'README', fileType: 0x04, data: ascii('SEE DISK') },
      { name: 'GAMES.DSK', fileType: 0xe0, data: buildDOS33Image() },
    ]);
    const shrunk = buildNuFX([{ name: 'PASCAL.PO', fileType: 0xe0, threads: [{ threadClass: 2, kind: 1, data: buildUCSDImage() }] }]);

    expect(openDiskImage(binaryII, { quiet: true }).format).toBe('dos33');
    expect(openDiskImage(shrunk, { quiet: true }).format).toBe('ucsd');
  });

  it('should reject a ZIP archive without a disk image', () => {
    const archive = zipSync({ 'READ.ME': ascii('NOTHING HERE') });

    expect(() => openDiskImage(archive, { quiet: true })).toThrow(UnrecognizedFormatError);
    expect(() => openDiskImage(archive, { quiet: true })).toThrow('Archive holds no disk image');
  });
});

describe('decodeEntry', () => {
  const prodos = openDiskImage(buildProDOSVolume(), { quiet: true });

  it('should turn text files into strings with newlines', () => {
    const readme = findEntry(prodos.root, 'README');

    expect(readme && decodeEntry(readme)).toEqual({ kind: 'text', text: 'HELLO\nWORLD\n' });
  });

  it('should list BASIC programs', () => {
    const startup = findEntry(prodos.root, 'STARTUP');

    expect(startup && decodeEntry(startup)).toMatchObject({ kind: 'basic', dialect: 'applesoft', listing: '   10 PRINT "HI"' });
  });

  it('should hand back the children of a directory', () => {
    const docs = findEntry(prodos.root, 'DOCS');
    const decoded = docs && decodeEntry(docs);

    expect(decoded?.kind).toBe('directory');
    expect(decoded?.kind === 'directory' && decoded.entries.map(entry => entry.name)).toEqual(['BIG.BIN']);
  });

  it('should show printable binaries as text', () => {
    const big = findEntry(prodos.root, 'DOCS/BIG.BIN');

    expect(big && decodeEntry(big)).toEqual({ kind: 'text', text: '*'.repeat(512) + ';'.repeat(88) });
  });

  it('should decode DOS 3.3 files through their ProDOS equivalents', () => {
    const [loader, hello] = openDiskImage(buildDOS33Image(), { quiet: true }).root.children;

    expect(decodeEntry(loader)).toEqual({ kind: 'binary', data: new Uint8Array([0xa9, 0x01, 0x60]) });
    expect(decodeEntry(hello)).toMatchObject({ kind: 'basic', listing: '   10 PRINT "HI"' });
  });

  it('should expand UCSD Pascal text', () => {
    const [notes] = openDiskImage(buildUCSDImage(), { quiet: true }).root.children;

    expect(decodeEntry(notes)).toEqual({ kind: 'text', text: '  HI\nOK\n' });
  });
});

describe('extended files', () => {
  it('should read both forks and style a Teach document from its resource fork', () => {
    const catalog = openDiskImage(buildProDOSVolumeWithTeachFile(), { quiet: true });
    const notes = findEntry(catalog.root, 'NOTES');

    expect(notes?.data).toEqual(ascii('Bold\rplain'));
    expect(notes?.resourceFork?.length).toBe(140 + 32 + 40 + 38);

    const decoded = notes && decodeEntry(notes);
    expect(decoded?.kind === 'document' && decoded.document.plainText).toBe('Bold\nplain');
    expect(decoded?.kind === 'document' && decoded.document.kind === 'wordProcessor' && decoded.document.lines[0].runs[0]).toMatchObject({
      text: 'Bold',
      bold: true,
    });
  });
});

describe('decodeContent', () => {
  it('should list Binary II and NuFX archives', () => {
    const binaryII = decodeContent({
      fileType: 0xe0,
      auxType: 0x8000,
      data: buildBinaryII([{ name: 'HELLO', fileType: 0x04, data: ascii('HI') }]),
    });
    const shrunk = decodeContent({
      fileType: 0xe0,
      auxType: 0x8002,
      data: buildNuFX([{ name: 'HELLO', fileType: 0x04, threads: [{ threadClass: 2, kind: 0, data: ascii('HI') }] }]),
    });

    expect(binaryII).toMatchObject({ kind: 'binaryII', entries: [{ entry: { filename: 'HELLO' } }], problems: [] });
    expect(shrunk).toMatchObject({ kind: 'nufx', entries: [{ record: { filename: 'HELLO' }, part: 'dataFork' }], problems: [] });
  });

  it('should decode AppleWorks documents', () => {
    const decoded = decodeContent({ fileType: 0x1a, auxType: 0, data: buildAppleWorksWP([awpTextRecord(ascii('V3'))], 30) });

    expect(decoded.kind === 'document' && decoded.document.plainText).toBe('V3');
  });

  it('should decode pictures', () => {
    const decoded = decodeContent({ fileType: 0x06, auxType: 0x2000, data: new Uint8Array(8192) });

    expect(decoded).toMatchObject({ kind: 'raster', image: { format: 'hgr', width: 280, height: 192 } });
  });

  it('should open nested archives and disk images', () => {
    const gzipped = decodeContent({ fileType: 0x00, auxType: 0, data: gzipSync(ascii('HI'), { filename: 'HI.TXT' }) });
    const nested = decodeContent({ fileType: 0xe0, auxType: 0, data: buildProDOSVolume() });

    expect(gzipped).toEqual({ kind: 'gzip', filename: 'HI.TXT', data: ascii('HI') });
    expect(nested.kind === 'catalog' && nested.catalog.volumeName).toBe('TESTVOL');
  });

  it('should return decode failures as values', () => {
    const picture = decodeContent({ fileType: 0xc1, auxType: 0x0002, data: new Uint8Array(100) });
    const document = decodeContent({
      fileType: 0x1a,
      auxType: 0,
      data: buildAppleWorksWP([awpTextRecord(ascii('OK')), [0x00, 0x42]]),
    });

    expect(picture).toMatchObject({ kind: 'error', content: 'raster' });
    expect(picture.kind === 'error' && picture.error).toBeInstanceOf(TooShortError);
    expect(document).toMatchObject({ kind: 'error', content: 'appleworks' });
    expect(document.kind === 'error' && document.error).toBeInstanceOf(CorruptDocumentError);
  });
});
