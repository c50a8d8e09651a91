import { decodeDHGR, decodeHGR, decodeSHR, decodeSHR3200, hiresLineOffset } from './graphics.js';
import { decodeRaster, identifyRaster } from './raster.js';
import { TooShortError, UnrecognizedFormatError } from './errors.js';
import { concat, packedRepeat, pixelAt } from './testutil.js';
import { describe, it, expect } from 'vitest';

const WHITE = [255, 255, 255, 255];
const BLACK = [0, 0, 0, 255];
const GREEN = [32, 192, 32, 255];
const VIOLET = [160, 32, 240, 255];
const ORANGE = [255, 100, 0, 255];

describe('hi-res screen layout', () => {
  it('should interleave rows by eighths and thirds', () => {
    expect(hiresLineOffset(0)).toBe(0);
    expect(hiresLineOffset(1)).toBe(1024);
    expect(hiresLineOffset(8)).toBe(128);
    expect(hiresLineOffset(64)).toBe(40);
    expect(hiresLineOffset(191)).toBe(8144);
  });
});

describe('decodeHGR', () => {
  const screen = new Uint8Array(8192);
  screen[0] = 0x03;
  screen[1] = 0x81;
  screen[1024] = 0x01;

  it('should render adjacent lit dots white and lone dots in colour', () => {
    const image = decodeHGR(screen);

    expect(image.width).toBe(280);
    expect(image.height).toBe(192);
    expect(image.format).toBe('hgr');
    expect(pixelAt(image, 0, 0)).toEqual(WHITE);
    expect(pixelAt(image, 1, 0)).toEqual(GREEN);
    expect(pixelAt(image, 2, 0)).toEqual(BLACK);
    expect(pixelAt(image, 6, 0)).toEqual(GREEN);
    expect(pixelAt(image, 7, 0)).toEqual(ORANGE);
    expect(pixelAt(image, 0, 1)).toEqual(VIOLET);
  });

  it('should reject a partial screen', () => {
    expect(() => decodeHGR(new Uint8Array(8000))).toThrow(TooShortError);
  });
});

describe('decodeDHGR', () => {
  it('should read four-dot colour cells starting in the auxiliary bank', () => {
    const screen = new Uint8Array(16384);
    screen[0] = 0x0f;
    screen[8192] = 0x01;

    const image = decodeDHGR(screen);

    expect(image.width).toBe(280);
    expect(pixelAt(image, 0, 0)).toEqual(WHITE);
    expect(pixelAt(image, 1, 0)).toEqual(WHITE);
    expect(pixelAt(image, 2, 0)).toEqual([224, 0, 39, 255]);
    expect(pixelAt(image, 3, 0)).toEqual([224, 0, 39, 255]);
    expect(pixelAt(image, 4, 0)).toEqual(BLACK);
    expect(image.palette?.[8]).toEqual({ r: 224, g: 0, b: 39 });
  });
});

describe('decodeSHR', () => {
  it('should pick each line palette from its control byte', () => {
    const screen = new Uint8Array(32768);
    screen.set([0x00, 0x0f], 32256 + 2);
    screen.set([0xf0, 0x00], 32256 + 32 + 4);
    screen[32001] = 1;
    screen[0] = 0x12;
    screen[160] = 0x21;

    const image = decodeSHR(screen);

    expect(image.width).toBe(320);
    expect(image.height).toBe(200);
    expect(pixelAt(image, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(image, 1, 0)).toEqual(BLACK);
    expect(pixelAt(image, 0, 1)).toEqual([0, 255, 0, 255]);
    expect(pixelAt(image, 1, 1)).toEqual(BLACK);
    expect(image.palette?.[1]).toEqual({ r: 255, g: 0, b: 0 });
  });

  it('should fall back to grey palettes when only pixel data is present', () => {
    const screen = new Uint8Array(32000);
    screen[0] = 0x12;

    expect(pixelAt(decodeSHR(screen), 0, 0)).toEqual([17, 17, 17, 255]);
  });

  it('should read 3200-colour palettes with colour 15 stored first', () => {
    const screen = new Uint8Array(38400);
    screen.set([0x00, 0x0f], 32000);
    screen[0] = 0xf0;

    const image = decodeSHR3200(screen);

    expect(image.format).toBe('shr3200');
    expect(pixelAt(image, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(image, 1, 0)).toEqual(BLACK);
  });
});

describe('identifyRaster', () => {
  it('should use the load address for binary screen dumps', () => {
    expect(identifyRaster(new Uint8Array(8192), { fileType: 0x06, auxType: 0x2000 })).toBe('hgr');
    expect(identifyRaster(new Uint8Array(16384), { fileType: 0x06, auxType: 0x2000 })).toBe('dhgr');
    expect(identifyRaster(new Uint8Array(32768), { fileType: 0x06, auxType: 0x0800 })).toBe('shr');
  });

  it('should follow the picture file types', () => {
    expect(identifyRaster(new Uint8Array(32768), { fileType: 0xc1, auxType: 0 })).toBe('shr');
    expect(identifyRaster(new Uint8Array(38400), { fileType: 0xc1, auxType: 2 })).toBe('shr3200');
    expect(identifyRaster(new Uint8Array(40), { fileType: 0xc0, auxType: 1 })).toBe('packedShr');
  });

  it('should leave other file types alone', () => {
    expect(identifyRaster(new Uint8Array(8192), { fileType: 0x04 })).toBeUndefined();
  });
});

describe('decodeRaster', () => {
  it('should unpack a packed hi-res graphics file', () => {
    const packed = concat([0x00, 0x7f], packedRepeat(0, 8191));

    const image = decodeRaster(packed, { fileType: 0x08, auxType: 0x4000 });

    expect(image.format).toBe('hgr');
    expect(pixelAt(image, 0, 0)).toEqual(WHITE);
    expect(pixelAt(image, 6, 0)).toEqual(VIOLET);
    expect(pixelAt(image, 7, 0)).toEqual(BLACK);
  });

  it('should report an unknown size as unrecognized', () => {
    expect(() => decodeRaster(new Uint8Array(100))).toThrow(UnrecognizedFormatError);
  });

  it('should produce identical pixels on repeated decodes', () => {
    const screen = new Uint8Array(8192).fill(0x55);

    expect(decodeRaster(screen, { fileType: 0x06, auxType: 0x2000 })).toEqual(
      decodeRaster(screen, { fileType: 0x06, auxType: 0x2000 }),
    );
  });
});
