import {
  decodeAPF,
  decodePackedPicture,
  decodePackedSHR,
  decodePaintworks,
  isAPF,
  isPaintworks,
  readAPFBlocks,
  unpackBytes,
} from './packed.js';
import { CorruptDocumentError } from './errors.js';
import { ascii, concat, packedRepeat, pixelAt, putU16, putU32 } from './testutil.js';
import { describe, it, expect } from 'vitest';

function apfBlock(name: string, payload: number[]): Uint8Array {
  const block = new Uint8Array(5 + name.length + payload.length);
  putU32(block, 0, block.length);
  block[4] = name.length;
  block.set(ascii(name), 5);
  block.set(payload, 5 + name.length);
  return block;
}

function colorTable(entries: Record<number, number>): number[] {
  const table = new Uint8Array(32);
  for (const [index, word] of Object.entries(entries)) {
    putU16(table, Number(index) * 2, word);
  }
  return Array.from(table);
}

function u16(value: number): number[] {
  return [value & 0xff, value >> 8];
}

// Four pixels wide, two lines: red green green red, then all green
const MAIN_PAYLOAD = [
  ...u16(0),
  ...u16(4),
  ...u16(1),
  ...colorTable({ 1: 0x0f00, 2: 0x00f0 }),
  ...u16(2),
  ...u16(3), ...u16(0),
  ...u16(2), ...u16(0),
  0x01, 0x12, 0x21,
  0x41, 0x22,
];

const RED = [255, 0, 0, 255];
const GREEN = [0, 255, 0, 255];

describe('unpackBytes', () => {
  it('should expand all four run kinds', () => {
    const packed = new Uint8Array([0x02, 1, 2, 3, 0x43, 9, 0x81, 1, 2, 3, 4, 0xc0, 7]);

    expect(Array.from(unpackBytes(packed))).toEqual([1, 2, 3, 9, 9, 9, 9, 1, 2, 3, 4, 1, 2, 3, 4, 7, 7, 7, 7]);
  });

  it('should stop at the output limit', () => {
    expect(Array.from(unpackBytes(new Uint8Array([0x43, 9]), 2))).toEqual([9, 9]);
  });

  it('should keep what a truncated literal run provides', () => {
    expect(Array.from(unpackBytes(new Uint8Array([0x05, 1, 2])))).toEqual([1, 2]);
  });
});

describe('Apple Preferred Format', () => {
  it('should list blocks and recognize the file by its first block name', () => {
    const file = concat(apfBlock('MAIN', MAIN_PAYLOAD), apfBlock('NOTE', [0x41]));

    expect(isAPF(file)).toBe(true);
    expect(readAPFBlocks(file).map(block => [block.name, block.data.length])).toEqual([
      ['MAIN', MAIN_PAYLOAD.length],
      ['NOTE', 1],
    ]);
  });

  it('should unpack each scan line with its own colour table', () => {
    const image = decodeAPF(apfBlock('MAIN', MAIN_PAYLOAD));

    expect(image.format).toBe('apf');
    expect(image.width).toBe(4);
    expect(image.height).toBe(2);
    expect([0, 1, 2, 3].map(x => pixelAt(image, x, 0))).toEqual([RED, GREEN, GREEN, RED]);
    expect([0, 1, 2, 3].map(x => pixelAt(image, x, 1))).toEqual([GREEN, GREEN, GREEN, GREEN]);
    expect(image.palette?.[2]).toEqual({ r: 0, g: 255, b: 0 });
  });

  it('should give every line its own palette when MULTIPAL covers the picture', () => {
    const multipal = [...u16(2), ...colorTable({ 1: 0x000f }), ...colorTable({ 2: 0x0fff })];
    const image = decodeAPF(concat(apfBlock('MAIN', MAIN_PAYLOAD), apfBlock('MULTIPAL', multipal)));

    expect(pixelAt(image, 0, 0)).toEqual([0, 0, 255, 255]);
    expect(pixelAt(image, 1, 0)).toEqual([0, 0, 0, 255]);
    expect(pixelAt(image, 0, 1)).toEqual([255, 255, 255, 255]);
    expect(image.palette).toBeUndefined();
  });

  it('should treat a missing or damaged MAIN block as corrupt', () => {
    expect(() => decodeAPF(apfBlock('NOTE', [0x41, 0x42]))).toThrow(CorruptDocumentError);
    expect(() => decodeAPF(apfBlock('MAIN', [...u16(0), ...u16(0), ...u16(0), ...u16(1)]))).toThrow(
      'APF MAIN block has 0 pixels per line',
    );
    expect(() => decodeAPF(apfBlock('MAIN', [...u16(0), ...u16(4), ...u16(1), 0, 0, 0, 0]))).toThrow(
      CorruptDocumentError,
    );
  });
});

describe('Paintworks', () => {
  const header = new Uint8Array(0x222);
  putU16(header, 2, 0x0f00);

  it('should unpack a packed body under the leading palette', () => {
    const file = concat(header, packedRepeat(0x11, 160), packedRepeat(0, 31840));

    expect(isPaintworks(file)).toBe(true);
    const image = decodePaintworks(file);

    expect(image.format).toBe('paintworks');
    expect(image.width).toBe(320);
    expect(image.height).toBe(200);
    expect(pixelAt(image, 0, 0)).toEqual(RED);
    expect(pixelAt(image, 0, 1)).toEqual([0, 0, 0, 255]);
  });

  it('should accept an unpacked screen body', () => {
    const body = new Uint8Array(32000);
    body[0] = 0x10;

    const image = decodePaintworks(concat(header, body));

    expect(image.height).toBe(200);
    expect(pixelAt(image, 0, 0)).toEqual(RED);
  });

  it('should reject a body too small for a screen', () => {
    expect(() => decodePaintworks(concat(header, new Uint8Array(10)))).toThrow(CorruptDocumentError);
  });
});

describe('packed super hi-res', () => {
  it('should unpack a whole screen image', () => {
    const image = decodePackedSHR(new Uint8Array(packedRepeat(0, 32768)));

    expect(image.format).toBe('packedShr');
    expect(image.width).toBe(320);
  });

  it('should reject a stream that unpacks short of a screen', () => {
    expect(() => decodePackedSHR(new Uint8Array([0x41, 5]))).toThrow(
      'Packed super hi-res picture unpacks to 2 bytes',
    );
  });

  it('should route by content when the aux type does not say', () => {
    expect(decodePackedPicture(apfBlock('MAIN', MAIN_PAYLOAD)).format).toBe('apf');
  });
});
