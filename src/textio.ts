// Utilities for Apple II character sets and printable text

import charsets from './data/charsets.json' with { type: 'json' };

const macRomanHigh: string[] = charsets.macRomanHigh;
const mouseText: string[] = charsets.mouseText;

// Strips the high bit and replaces anything outside 0x20..0x7E with '.'
export function printableChar(byte: number): string {
  const low = byte & 0x7f;
  return low >= 0x20 && low < 0x7f ? String.fromCharCode(low) : '.';
}

export function isPrintable(byte: number): boolean {
  const low = byte & 0x7f;
  return (low >= 0x20 && low < 0x7f) || low === 0x0d || low === 0x0a || low === 0x09;
}

// Names on DOS 3.3 and ProDOS disks are stored with or without the high bit set
export function highAsciiString(bytes: Uint8Array): string {
  let result = '';
  for (const byte of bytes) {
    result += String.fromCharCode(byte & 0x7f);
  }
  return result;
}

// Length-prefixed string with the length byte at offset 0, clamped to maxLength
export function pascalString(bytes: Uint8Array, maxLength: number = bytes.length - 1): string {
  if (bytes.length === 0) {
    return '';
  }
  const length = Math.min(bytes[0], maxLength, bytes.length - 1);
  return highAsciiString(bytes.subarray(1, 1 + length));
}

// Text files keep Apple II carriage returns; convert them to newlines
export function appleText(bytes: Uint8Array): string {
  let result = '';
  for (const byte of bytes) {
    const low = byte & 0x7f;
    if (low === 0x0d) {
      result += '\n';
    } else if (low === 0x00) {
      break;
    } else if (low === 0x09 || (low >= 0x20 && low < 0x7f)) {
      result += String.fromCharCode(low);
    }
  }
  return result;
}

export function appleWorksChar(byte: number): string {
  if (byte >= 0x20 && byte <= 0x7f) {
    return String.fromCharCode(byte);
  }
  if (byte >= 0x80 && byte <= 0x9f) {
    // Inverse uppercase
    return String.fromCharCode(byte - 0x40);
  }
  if (byte >= 0xa0 && byte <= 0xbf) {
    // Inverse symbols and digits
    return String.fromCharCode(byte - 0x80);
  }
  if (byte >= 0xc0 && byte <= 0xdf) {
    return mouseText[byte - 0xc0];
  }
  if (byte >= 0xe0) {
    // Inverse lowercase
    return String.fromCharCode(byte - 0x80);
  }
  return '?';
}

export function macRomanChar(byte: number): string {
  if (byte >= 0x20 && byte < 0x80) {
    return String.fromCharCode(byte);
  }
  if (byte >= 0x80 && byte <= 0xff) {
    return macRomanHigh[byte - 0x80];
  }
  return '?';
}

export function toHex(data: Uint8Array): string {
  let result = '';
  for (const byte of data) {
    result += byte.toString(16).padStart(2, '0');
  }
  return result;
}

export function hexByte(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}

export function hexWord(value: number): string {
  return value.toString(16).toUpperCase().padStart(4, '0');
}
