// 6502 and 65816 disassemblers with Apple II and IIgs address names

import type { CatalogEntry } from './types.js';
import opcodes6502 from './data/opcodes-6502.json' with { type: 'json' };
import opcodes65816 from './data/opcodes-65816.json' with { type: 'json' };
import apple2Symbols from './data/apple2-symbols.json' with { type: 'json' };
import iigsSymbols from './data/iigs-symbols.json' with { type: 'json' };
import { hexByte } from './textio.js';

const MODES_6502 = [
  'implied', 'accumulator', 'immediate', 'zeroPage', 'zeroPageX', 'zeroPageY',
  'absolute', 'absoluteX', 'absoluteY', 'indirect', 'indexedIndirect', 'indirectIndexed',
  'relative', 'invalid',
] as const;

const MODES_65816 = [
  'implied', 'accumulator', 'immediate8', 'immediateM', 'immediateX',
  'directPage', 'directPageX', 'directPageY', 'dpIndirect', 'dpIndirectLong',
  'dpIndexedIndirect', 'dpIndirectIndexed', 'dpIndirectLongY',
  'absolute', 'absoluteX', 'absoluteY', 'absoluteLong', 'absoluteLongX',
  'absoluteIndirect', 'absoluteIndirectX', 'absoluteIndirectLong',
  'relative', 'relativeLong', 'stackRelative', 'stackRelIndirectY', 'blockMove', 'wdm', 'invalid',
] as const;

export type AddressMode6502 = (typeof MODES_6502)[number];
export type AddressMode65816 = (typeof MODES_65816)[number];

export interface Opcode<Mode extends string> {
  mnemonic: string;
  mode: Mode;
  // With 8-bit A and index registers
  length: number;
  cycles: number;
}

export interface Instruction {
  address: number;
  bytes: Uint8Array;
  mnemonic: string;
  operand: string;
  comment?: string;
}

export interface Disassemble65816Options {
  // Emulation mode forces 8-bit registers until an XCE
  native?: boolean;
  maxInstructions?: number;
}

interface RawOpcode {
  mnemonic: string;
  mode: string;
  length: number;
  cycles: number;
}

function opcodeTable<Mode extends string>(rows: RawOpcode[], modes: readonly Mode[]): Opcode<Mode>[] {
  return rows.map((row, opcode) => {
    const mode = modes.find((candidate): candidate is Mode => candidate === row.mode);
    if (mode === undefined) {
      throw new Error(`opcode $${hexByte(opcode)} has unknown addressing mode ${row.mode}`);
    }
    return { ...row, mode };
  });
}

function symbolTable(entries: Record<string, string>): Map<number, string> {
  return new Map(Object.entries(entries).map(([address, name]) => [parseInt(address, 16), name]));
}

export const OPCODES_6502: readonly Opcode<AddressMode6502>[] = opcodeTable(opcodes6502, MODES_6502);
export const OPCODES_65816: readonly Opcode<AddressMode65816>[] = opcodeTable(opcodes65816, MODES_65816);

const APPLE2_SYMBOLS = symbolTable(apple2Symbols);
const IIGS_SYMBOLS = symbolTable(iigsSymbols);

export function apple2Symbol(address: number): string | undefined {
  return APPLE2_SYMBOLS.get(address);
}

// IIgs names first, then the 8-bit machine's for bank 0
export function iigsSymbol(address: number): string | undefined {
  return IIGS_SYMBOLS.get(address) ?? (address < 0x10000 ? APPLE2_SYMBOLS.get(address) : undefined);
}

// Little-endian operand value, undefined when the data ends first
function operandValue(bytes: Uint8Array, from: number, count: number): number | undefined {
  if (bytes.length < from + count) {
    return undefined;
  }
  let value = 0;
  for (let i = count - 1; i >= 0; i--) {
    value = value * 0x100 + bytes[from + i];
  }
  return value;
}

function hex(value: number | undefined, digits: number): string {
  return value === undefined ? '?'.repeat(digits) : value.toString(16).toUpperCase().padStart(digits, '0');
}

function signed8(value: number): number {
  return value >= 0x80 ? value - 0x100 : value;
}

function signed16(value: number): number {
  return value >= 0x8000 ? value - 0x10000 : value;
}

interface Operand {
  text: string;
  target?: number;
}

function operand6502(mode: AddressMode6502, bytes: Uint8Array, address: number): Operand {
  const byte = operandValue(bytes, 1, 1);
  const word = operandValue(bytes, 1, 2);
  switch (mode) {
    case 'implied':
    case 'invalid':
      return { text: '' };
    case 'accumulator':
      return { text: 'A' };
    case 'immediate':
      return { text: `#$${hex(byte, 2)}` };
    case 'zeroPage':
      return { text: `$${hex(byte, 2)}`, target: byte };
    case 'zeroPageX':
      return { text: `$${hex(byte, 2)},X`, target: byte };
    case 'zeroPageY':
      return { text: `$${hex(byte, 2)},Y`, target: byte };
    case 'absolute':
      return { text: `$${hex(word, 4)}`, target: word };
    case 'absoluteX':
      return { text: `$${hex(word, 4)},X`, target: word };
    case 'absoluteY':
      return { text: `$${hex(word, 4)},Y`, target: word };
    case 'indirect':
      return { text: `($${hex(word, 4)})`, target: word };
    case 'indexedIndirect':
      return { text: `($${hex(byte, 2)},X)` };
    case 'indirectIndexed':
      return { text: `($${hex(byte, 2)}),Y` };
    case 'relative': {
      const target = byte === undefined ? undefined : (address + 2 + signed8(byte)) & 0xffff;
      return { text: `$${hex(target, 4)}`, target };
    }
  }
}

export function disassemble6502(data: Uint8Array, startAddress: number, maxInstructions: number = 1000): Instruction[] {
  const instructions: Instruction[] = [];
  let offset = 0;
  while (offset < data.length && instructions.length < maxInstructions) {
    const address = (startAddress + offset) & 0xffff;
    const opcode = OPCODES_6502[data[offset]];
    const bytes = data.subarray(offset, offset + opcode.length);
    const { text, target } = operand6502(opcode.mode, bytes, address);
    instructions.push({
      address,
      bytes,
      mnemonic: opcode.mnemonic,
      operand: text,
      comment: target === undefined ? undefined : apple2Symbol(target),
    });
    offset += opcode.length;
  }
  return instructions;
}

interface RegisterWidths {
  emulation: boolean;
  // Set: 8-bit accumulator
  m: boolean;
  // Set: 8-bit index registers
  x: boolean;
}

const FLAG_M = 0x20;
const FLAG_X = 0x10;

const OP_REP = 0xc2;
const OP_SEP = 0xe2;
const OP_XCE = 0xfb;

function instructionLength(opcode: Opcode<AddressMode65816>, widths: RegisterWidths): number {
  switch (opcode.mode) {
    case 'immediateM':
      return widths.m ? 2 : 3;
    case 'immediateX':
      return widths.x ? 2 : 3;
    default:
      return opcode.length;
  }
}

function applyStatusChange(widths: RegisterWidths, opcode: number, mask: number | undefined): void {
  if (mask === undefined || widths.emulation) {
    return;
  }
  if (opcode === OP_SEP) {
    widths.m ||= (mask & FLAG_M) !== 0;
    widths.x ||= (mask & FLAG_X) !== 0;
  } else if (opcode === OP_REP) {
    widths.m &&= (mask & FLAG_M) === 0;
    widths.x &&= (mask & FLAG_X) === 0;
  }
}

function operand65816(mode: AddressMode65816, bytes: Uint8Array, address: number): Operand {
  const byte = operandValue(bytes, 1, 1);
  const word = operandValue(bytes, 1, 2);
  const long = operandValue(bytes, 1, 3);
  const bank = address & 0xff0000;
  const inBank = word === undefined ? undefined : bank | word;
  switch (mode) {
    case 'implied':
    case 'invalid':
      return { text: '' };
    case 'accumulator':
      return { text: 'A' };
    case 'immediate8':
      return { text: `#$${hex(byte, 2)}` };
    case 'immediateM':
    case 'immediateX':
      return bytes.length === 2 ? { text: `#$${hex(byte, 2)}` } : { text: `#$${hex(word, 4)}` };
    case 'directPage':
      return { text: `$${hex(byte, 2)}`, target: byte };
    case 'directPageX':
      return { text: `$${hex(byte, 2)},X`, target: byte };
    case 'directPageY':
      return { text: `$${hex(byte, 2)},Y`, target: byte };
    case 'dpIndirect':
      return { text: `($${hex(byte, 2)})`, target: byte };
    case 'dpIndirectLong':
      return { text: `[$${hex(byte, 2)}]`, target: byte };
    case 'dpIndexedIndirect':
      return { text: `($${hex(byte, 2)},X)`, target: byte };
    case 'dpIndirectIndexed':
      return { text: `($${hex(byte, 2)}),Y`, target: byte };
    case 'dpIndirectLongY':
      return { text: `[$${hex(byte, 2)}],Y`, target: byte };
    case 'absolute':
      return { text: `$${hex(word, 4)}`, target: inBank };
    case 'absoluteX':
      return { text: `$${hex(word, 4)},X`, target: inBank };
    case 'absoluteY':
      return { text: `$${hex(word, 4)},Y`, target: inBank };
    case 'absoluteLong':
      return { text: `$${hex(long, 6)}`, target: long };
    case 'absoluteLongX':
      return { text: `$${hex(long, 6)},X`, target: long };
    case 'absoluteIndirect':
      return { text: `($${hex(word, 4)})`, target: inBank };
    case 'absoluteIndirectX':
      return { text: `($${hex(word, 4)},X)`, target: inBank };
    case 'absoluteIndirectLong':
      return { text: `[$${hex(word, 4)}]`, target: inBank };
    case 'relative': {
      const target = byte === undefined ? undefined : (address + 2 + signed8(byte)) & 0xffff;
      return { text: `$${hex(target, 4)}` };
    }
    case 'relativeLong': {
      const target = word === undefined ? undefined : (address + 3 + signed16(word)) & 0xffff;
      return { text: `$${hex(target, 4)}` };
    }
    case 'stackRelative':
      return { text: `$${hex(byte, 2)},S` };
    case 'stackRelIndirectY':
      return { text: `($${hex(byte, 2)},S),Y` };
    case 'blockMove':
      return { text: `$${hex(byte, 2)},$${hex(operandValue(bytes, 2, 1), 2)}` };
    case 'wdm':
      return { text: `$${hex(byte, 2)}` };
  }
}

const STATUS_BITS: [bit: number, whenSet: string, whenClear: string][] = [
  [0x80, 'N', 'N'],
  [0x40, 'V', 'V'],
  [FLAG_M, 'M (8-bit A)', 'M (16-bit A)'],
  [FLAG_X, 'X (8-bit XY)', 'X (16-bit XY)'],
  [0x08, 'D', 'D'],
  [0x04, 'I', 'I'],
  [0x02, 'Z', 'Z'],
  [0x01, 'C', 'C'],
];

// SEP and REP masks, named as the register widths they leave
export function describeStatusChange(opcode: number, mask: number): string {
  const set = opcode === OP_SEP;
  const names = STATUS_BITS.filter(([bit]) => (mask & bit) !== 0).map(([, whenSet, whenClear]) => (set ? whenSet : whenClear));
  return `${set ? 'Set' : 'Clear'}: ${names.join(', ')}`;
}

// Register widths follow SEP, REP and XCE in program order; branches are not traced
export function disassemble65816(data: Uint8Array, startAddress: number, options: Disassemble65816Options = {}): Instruction[] {
  const native = options.native ?? true;
  const maxInstructions = options.maxInstructions ?? 2000;
  const widths: RegisterWidths = { emulation: !native, m: true, x: true };

  const instructions: Instruction[] = [];
  const bank = startAddress & 0xff0000;
  let offset = 0;
  while (offset < data.length && instructions.length < maxInstructions) {
    const address = bank | ((startAddress + offset) & 0xffff);
    const opcodeByte = data[offset];
    const opcode = OPCODES_65816[opcodeByte];
    const length = instructionLength(opcode, widths);
    const bytes = data.subarray(offset, offset + length);
    const mask = operandValue(bytes, 1, 1);

    applyStatusChange(widths, opcodeByte, mask);
    // The carry is unknown here, so XCE is taken to enter native mode
    if (opcodeByte === OP_XCE) {
      widths.emulation = false;
    }

    const { text, target } = operand65816(opcode.mode, bytes, address);
    let comment: string | undefined;
    if ((opcodeByte === OP_SEP || opcodeByte === OP_REP) && mask !== undefined) {
      comment = describeStatusChange(opcodeByte, mask);
    } else if (target !== undefined) {
      comment = iigsSymbol(target);
    }

    instructions.push({ address, bytes, mnemonic: opcode.mnemonic, operand: text, comment });
    offset += length;
  }
  return instructions;
}

function instructionText(instruction: Instruction): string {
  return instruction.operand ? `${instruction.mnemonic} ${instruction.operand}` : instruction.mnemonic;
}

function listingLine(address: string, instruction: Instruction, bytesWidth: number, textWidth: number): string {
  const bytes = Array.from(instruction.bytes, hexByte).join(' ').padEnd(bytesWidth);
  const line = `${address}: ${bytes} ${instructionText(instruction).padEnd(textWidth)}`;
  return instruction.comment ? `${line} ; ${instruction.comment}\n` : `${line}\n`;
}

export function disassemblyText(instructions: readonly Instruction[]): string {
  return instructions.map(instruction => listingLine(hex(instruction.address, 4), instruction, 9, 14)).join('');
}

// Addresses shown as bank/offset
export function disassembly65816Text(instructions: readonly Instruction[]): string {
  return instructions
    .map(instruction => {
      const address = `${hexByte(instruction.address >> 16)}/${hex(instruction.address & 0xffff, 4)}`;
      return listingLine(address, instruction, 12, 16);
    })
    .join('');
}

const TYPE_SYS = 0xff;
const IIGS_CODE_TYPES = { first: 0xb3, last: 0xbe };

export function isIIgsCode(fileType: number): boolean {
  return fileType >= IIGS_CODE_TYPES.first && fileType <= IIGS_CODE_TYPES.last;
}

// Load address, then the aux type, then where ProDOS runs system files or Applesoft programs live
export function entryStartAddress(entry: CatalogEntry): number {
  if (entry.loadAddress !== undefined) {
    return entry.loadAddress;
  }
  if (entry.auxType !== 0) {
    return entry.auxType;
  }
  return entry.fileType === TYPE_SYS ? 0x2000 : 0x0800;
}

export function disassembleEntry(entry: CatalogEntry): string {
  const start = entryStartAddress(entry);
  if (isIIgsCode(entry.fileType)) {
    return disassembly65816Text(disassemble65816(entry.data, start));
  }
  return disassemblyText(disassemble6502(entry.data, start));
}
