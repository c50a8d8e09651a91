import { gzipSync } from 'fflate';
import { classifyContent, classifyEntry, equivalentProDOSType, looksLikeText } from './classify.js';
import { findEntry, walkCatalog } from './catalog.js';
import {
  ascii,
  buildBinaryII,
  buildDOS33Image,
  buildNuFX,
  buildProDOSVolume,
  buildUCSDImage,
  concat,
  integerLine,
} from './testutil.js';
import { describe, it, expect } from 'vitest';

function sample(fileType: number, data: Uint8Array | number[], auxType: number = 0) {
  return { fileType, auxType, data: data instanceof Uint8Array ? data : new Uint8Array(data) };
}

describe('equivalentProDOSType', () => {
  it('should map DOS 3.3 and UCSD types onto ProDOS ones', () => {
    expect(equivalentProDOSType(0x04, 'dos33')).toBe(0x06);
    expect(equivalentProDOSType(0x02, 'dos33')).toBe(0xfc);
    expect(equivalentProDOSType(0x03, 'ucsd')).toBe(0x04);
    expect(equivalentProDOSType(0xc1)).toBe(0xc1);
  });
});

describe('looksLikeText', () => {
  it('should need more than 80% printable bytes', () => {
    expect(looksLikeText(ascii('HELLO\r'))).toBe(true);
    expect(looksLikeText(concat(ascii('ABCD'), [0x01]))).toBe(false);
    expect(looksLikeText(concat(ascii('ABCDE'), [0x01]))).toBe(true);
    expect(looksLikeText(new Uint8Array(0))).toBe(false);
  });

  it('should only look at the first 256 bytes', () => {
    expect(looksLikeText(concat(new Uint8Array(256).fill(0xc1), new Uint8Array(1000)))).toBe(true);
  });
});

describe('classifyContent', () => {
  it('should check for archives and disk images before the file type', () => {
    expect(classifyContent(sample(0xfc, gzipSync(ascii('HELLO'))))).toEqual({ kind: 'archive' });
    expect(classifyContent({ ...sample(0xe0, buildProDOSVolume()), name: 'INNER' })).toEqual({ kind: 'catalog' });
  });

  it('should treat Binary II and NuFX archives as archives', () => {
    const binaryII = buildBinaryII([{ name: 'A', fileType: 0x04, data: ascii('A') }]);
    const shrunk = buildNuFX([{ name: 'A', fileType: 0x04, threads: [{ threadClass: 2, kind: 0, data: ascii('A') }] }]);

    expect(classifyContent(sample(0xe0, binaryII, 0x8000))).toEqual({ kind: 'archive' });
    expect(classifyContent(sample(0xe0, shrunk, 0x8002))).toEqual({ kind: 'archive' });
  });

  it('should only treat BASIC files as programs when their first line is plausible', () => {
    expect(classifyContent(sample(0xfa, integerLine(10, [0x5d, 0x40])))).toEqual({ kind: 'integerBasic' });
    expect(classifyContent(sample(0xfc, [0xff, 0xff, 0xff, 0xff, 0xff]))).toEqual({ kind: 'binary' });
  });

  it('should pick the AppleWorks document kind from type and aux type', () => {
    expect(classifyContent(sample(0x1a, new Uint8Array(10)))).toEqual({ kind: 'appleworks', document: 'wordProcessor' });
    expect(classifyContent(sample(0x50, new Uint8Array(10), 0x8010))).toEqual({ kind: 'appleworks', document: 'gsWordProcessor' });
    expect(classifyContent(sample(0x50, ascii('NOTES'), 0x5445))).toEqual({ kind: 'appleworks', document: 'teach' });
    expect(classifyContent(sample(0x50, new Uint8Array(10)))).toEqual({ kind: 'binary' });
  });

  it('should recognize icon files and pictures', () => {
    expect(classifyContent(sample(0xca, new Uint8Array(10)))).toEqual({ kind: 'icons' });
    expect(classifyContent(sample(0xc8, new Uint8Array(10)))).toEqual({ kind: 'font' });
    expect(classifyContent(sample(0xc1, new Uint8Array(32768)))).toEqual({ kind: 'raster', format: 'shr' });
    expect(classifyContent(sample(0x06, new Uint8Array(8192), 0x2000))).toEqual({ kind: 'raster', format: 'hgr' });
  });

  it('should fall back to text for TXT files and printable bytes', () => {
    expect(classifyContent(sample(0x04, [0x00, 0x01, 0x02]))).toEqual({ kind: 'text' });
    expect(classifyContent(sample(0x00, ascii('JUST SOME WORDS')))).toEqual({ kind: 'text' });
    expect(classifyContent(sample(0x00, [0x00, 0x01, 0x02, 0x03, 0x80, 0xff]))).toEqual({ kind: 'binary' });
  });
});

describe('classifyEntry', () => {
  it('should classify ProDOS entries', () => {
    const { root } = walkCatalog(buildProDOSVolume(), { quiet: true });

    expect(root.children.map(entry => classifyEntry(entry).kind)).toEqual(['text', 'applesoft', 'catalog']);
  });

  it('should translate DOS 3.3 types before classifying', () => {
    const { root } = walkCatalog(buildDOS33Image(), { quiet: true });

    expect(classifyEntry(root.children[0])).toEqual({ kind: 'binary' });
    expect(classifyEntry(root.children[1])).toEqual({ kind: 'applesoft' });
  });

  it('should treat UCSD text files as Pascal editor text', () => {
    const { root } = walkCatalog(buildUCSDImage(), { quiet: true });
    const notes = findEntry(root, 'NOTES.TEXT');

    expect(notes && classifyEntry(notes)).toEqual({ kind: 'pascalText' });
  });
});
