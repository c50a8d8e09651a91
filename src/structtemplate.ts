// Struct template parsing for fixed-layout directory and header records

import type { StructTemplate } from './types.js';
import { ByteReader } from './bytereader.js';

export type StructValue = number | Uint8Array;

export class StructRecord {
  private readonly values: Map<string, StructValue>;

  constructor(values: Map<string, StructValue>) {
    this.values = values;
  }

  num(name: string): number {
    const value = this.values.get(name);
    if (typeof value !== 'number') {
      throw new Error(`Field '${name}' is not a numeric field`);
    }
    return value;
  }

  bytes(name: string): Uint8Array {
    const value = this.values.get(name);
    if (!(value instanceof Uint8Array)) {
      throw new Error(`Field '${name}' is not a byte-string field`);
    }
    return value;
  }

  names(): string[] {
    return Array.from(this.values.keys());
  }
}

export class StructTemplateParser {
  static fromTemplateString(template: string): StructTemplate {
    const [formatStr = '', namesStr] = template.split(':', 2);

    if (!formatStr.trim()) {
      throw new Error('Empty format string');
    }

    const fieldNames = namesStr ? namesStr.split(',').map(name => name.trim()) : [];
    return new StructTemplateParser(formatStr, fieldNames).build();
  }

  private formatStr: string;
  private fieldNames: string[];
  private isList: boolean = false;

  constructor(formatStr: string, fieldNames: string[]) {
    this.formatStr = formatStr.trim();
    this.fieldNames = fieldNames;

    // Handle list indicator
    if (this.formatStr.endsWith('+')) {
      this.isList = true;
      this.formatStr = this.formatStr.slice(0, -1);
    }

    // Add endianness if not specified (disk structures are little-endian)
    if (!/^[<>]/.test(this.formatStr)) {
      this.formatStr = '<' + this.formatStr;
    }
  }

  build(): StructTemplate {
    const fields = splitStructFormatFields(this.formatStr);
    const fieldNames: (string | null)[] = [];
    let nameIndex = 0;

    for (const field of fields) {
      // Padding takes a slot but never a name
      if (field === 'x') {
        fieldNames.push(null);
        continue;
      }
      fieldNames.push(this.fieldNames[nameIndex] || null);
      nameIndex++;
    }

    if (nameIndex < this.fieldNames.length) {
      throw new Error(`Template has ${this.fieldNames.length} names for ${nameIndex} fields`);
    }

    return {
      format: this.formatStr,
      fieldNames,
      isList: this.isList,
      recordLength: fields.reduce((length, field) => length + fieldLength(field), 0),
    };
  }

  static unpackRecord(data: Uint8Array, offset: number, template: StructTemplate): StructRecord {
    const reader = new ByteReader(data, offset);
    const bigEndian = template.format.startsWith('>');
    const fields = splitStructFormatFields(template.format);
    const values = new Map<string, StructValue>();

    fields.forEach((field, i) => {
      let value: StructValue;
      switch (field) {
        case 'B': // unsigned char
          value = reader.readU8();
          break;
        case 'b': { // signed char
          const byte = reader.readU8();
          value = byte >= 0x80 ? byte - 0x100 : byte;
          break;
        }
        case 'H': // unsigned short
          value = bigEndian ? reader.readU16BE() : reader.readU16LE();
          break;
        case 'T': // unsigned 24-bit (little-endian only)
          value = reader.readU24();
          break;
        case 'I': // unsigned int
          value = bigEndian ? reader.readU32BE() : reader.readU32LE();
          break;
        case 'x': // pad byte
          reader.skip(1);
          return;
        default:
          // Byte string like "15s", kept raw so callers can apply their own charset
          value = reader.readBytes(fieldLength(field));
      }

      const name = template.fieldNames[i];
      if (name) {
        values.set(name, value);
      }
    });

    return new StructRecord(values);
  }

  static unpackList(data: Uint8Array, offset: number, count: number, template: StructTemplate): StructRecord[] {
    if (!template.isList) {
      throw new Error(`Template '${template.format}' is not a list template`);
    }

    const records: StructRecord[] = [];
    for (let i = 0; i < count; i++) {
      records.push(this.unpackRecord(data, offset + i * template.recordLength, template));
    }
    return records;
  }
}

function splitStructFormatFields(fmt: string): string[] {
  const fields: string[] = [];
  let repeat = 0;

  for (const c of fmt.replace(/^[<>]/, '')) {
    // Ignore whitespace
    if (/\s/.test(c)) {
      continue;
    }

    // Calculate repeat count
    if (/\d/.test(c)) {
      repeat = repeat * 10 + parseInt(c, 10);
      continue;
    }

    if ('BbHTIx'.includes(c)) {
      for (let j = 0; j < Math.max(repeat, 1); j++) {
        fields.push(c);
      }
    } else if (c === 's') {
      fields.push(`${Math.max(repeat, 1)}s`);
    } else {
      throw new Error(`Unsupported struct format character '${c}'`);
    }
    repeat = 0;
  }

  return fields;
}

function fieldLength(field: string): number {
  switch (field) {
    case 'B':
    case 'b':
    case 'x':
      return 1;
    case 'H':
      return 2;
    case 'T':
      return 3;
    case 'I':
      return 4;
    default:
      return parseInt(field.slice(0, -1), 10);
  }
}
