import {
  OPCODES_6502,
  OPCODES_65816,
  describeStatusChange,
  disassemble6502,
  disassemble65816,
  disassembleEntry,
  disassembly65816Text,
  disassemblyText,
  entryStartAddress,
  iigsSymbol,
} from './disasm.js';
import type { Instruction } from './disasm.js';
import { walkCatalog } from './catalog.js';
import { buildDOS33Image } from './testutil.js';
import { describe, it, expect } from 'vitest';

function summary(instructions: Instruction[]): string[] {
  return instructions.map(instruction => `${instruction.mnemonic} ${instruction.operand}`.trim());
}

describe('6502 disassembler', () => {
  it('should carry a full opcode table', () => {
    expect(OPCODES_6502).toHaveLength(256);
    expect(OPCODES_6502[0x6c]).toEqual({ mnemonic: 'JMP', mode: 'indirect', length: 3, cycles: 5 });
  });

  it('should decode operands and name monitor routines', () => {
    const code = new Uint8Array([0xa9, 0xc1, 0x20, 0xed, 0xfd, 0xd0, 0xfb, 0x60]);
    const instructions = disassemble6502(code, 0x0300);

    expect(instructions.map(instruction => instruction.address)).toEqual([0x0300, 0x0302, 0x0305, 0x0307]);
    expect(summary(instructions)).toEqual(['LDA #$C1', 'JSR $FDED', 'BNE $0302', 'RTS']);
    expect(instructions[1].comment).toBe('COUT');
    expect(Array.from(instructions[1].bytes)).toEqual([0x20, 0xed, 0xfd]);
  });

  it('should format the remaining addressing modes', () => {
    const code = new Uint8Array([0x0a, 0xa5, 0x24, 0xb1, 0x28, 0xa1, 0x30, 0x6c, 0xfe, 0x03, 0xbd, 0x00, 0xc0]);

    const instructions = disassemble6502(code, 0x0800);

    expect(summary(instructions)).toEqual(['ASL A', 'LDA $24', 'LDA ($28),Y', 'LDA ($30,X)', 'JMP ($03FE)', 'LDA $C000,X']);
    expect(instructions.map(instruction => instruction.comment)).toEqual([undefined, 'CH', undefined, undefined, undefined, 'KBD']);
  });

  it('should show undefined opcodes as single bytes', () => {
    const instructions = disassemble6502(new Uint8Array([0x02, 0xea]), 0x1000);

    expect(summary(instructions)).toEqual(['???', 'NOP']);
    expect(instructions[1].address).toBe(0x1001);
  });

  it('should wrap branch targets and mark operands cut off by the end of the data', () => {
    expect(summary(disassemble6502(new Uint8Array([0xf0, 0xfc]), 0x0000))).toEqual(['BEQ $FFFE']);

    const cut = disassemble6502(new Uint8Array([0x20, 0xed]), 0x0300);
    expect(summary(cut)).toEqual(['JSR $????']);
    expect(cut[0].comment).toBeUndefined();
  });

  it('should stop after the instruction limit', () => {
    expect(disassemble6502(new Uint8Array(10).fill(0xea), 0x0300, 3)).toHaveLength(3);
  });

  it('should lay out a listing with addresses and bytes in columns', () => {
    const text = disassemblyText(disassemble6502(new Uint8Array([0xa9, 0x01, 0x20, 0xed, 0xfd]), 0x0300));

    expect(text).toBe('0300: A9 01     LDA #$01      \n' + '0302: 20 ED FD  JSR $FDED      ; COUT\n');
  });
});

describe('65816 disassembler', () => {
  it('should carry a full opcode table', () => {
    expect(OPCODES_65816).toHaveLength(256);
    expect(OPCODES_65816[0x22]).toEqual({ mnemonic: 'JSL', mode: 'absoluteLong', length: 4, cycles: 8 });
  });

  it('should follow REP and SEP when sizing immediate operands', () => {
    const code = new Uint8Array([
      0xc2, 0x30,
      0xa9, 0x34, 0x12,
      0xa2, 0x00, 0x01,
      0xe2, 0x20,
      0xa9, 0xff,
      0xa0, 0x01, 0x00,
    ]);

    const instructions = disassemble65816(code, 0x2000);

    expect(summary(instructions)).toEqual(['REP #$30', 'LDA #$1234', 'LDX #$0100', 'SEP #$20', 'LDA #$FF', 'LDY #$0001']);
    expect(instructions[0].comment).toBe('Clear: M (16-bit A), X (16-bit XY)');
    expect(instructions[3].comment).toBe('Set: M (8-bit A)');
  });

  it('should keep 8-bit registers in emulation mode until XCE', () => {
    const emulated = disassemble65816(new Uint8Array([0xc2, 0x30, 0xa9, 0x34]), 0x0800, { native: false });
    expect(summary(emulated)).toEqual(['REP #$30', 'LDA #$34']);

    const switched = disassemble65816(new Uint8Array([0xfb, 0xc2, 0x30, 0xa9, 0x34, 0x12]), 0x0800, { native: false });
    expect(summary(switched)).toEqual(['XCE', 'REP #$30', 'LDA #$1234']);
  });

  it('should format long, stack and block move operands', () => {
    const code = new Uint8Array([0x22, 0xa8, 0x00, 0xe1, 0x82, 0xfd, 0xff, 0x54, 0x01, 0x02, 0xa3, 0x03, 0xb3, 0x05, 0xb7, 0x10]);

    const instructions = disassemble65816(code, 0x1000);

    expect(summary(instructions)).toEqual(['JSL $E100A8', 'BRL $1004', 'MVN $01,$02', 'LDA $03,S', 'LDA ($05,S),Y', 'LDA [$10],Y']);
    expect(instructions[0].comment).toBe('GSOS');
  });

  it('should name absolute targets in the bank of the instruction', () => {
    const instructions = disassemble65816(new Uint8Array([0xad, 0x00, 0x20, 0x8d, 0x34, 0xc0]), 0xe10000);

    expect(instructions.map(instruction => instruction.address)).toEqual([0xe10000, 0xe10003]);
    expect(instructions[0].comment).toBe('SHRSCB');
    expect(instructions[1].comment).toBeUndefined();
  });

  it('should fall back to Apple II names in bank 0', () => {
    expect(iigsSymbol(0x00c034)).toBe('BORDER');
    expect(iigsSymbol(0xfded)).toBe('COUT');
    expect(iigsSymbol(0x01fded)).toBeUndefined();
  });

  it('should list every flag a status mask touches', () => {
    expect(describeStatusChange(0xe2, 0xff)).toBe('Set: N, V, M (8-bit A), X (8-bit XY), D, I, Z, C');
    expect(describeStatusChange(0xc2, 0x01)).toBe('Clear: C');
  });

  it('should lay out a listing with bank and offset', () => {
    const text = disassembly65816Text(disassemble65816(new Uint8Array([0xc2, 0x30, 0xa9, 0x34, 0x12]), 0x2000));

    expect(text).toBe(
      '00/2000: C2 30        REP #$30         ; Clear: M (16-bit A), X (16-bit XY)\n' + '00/2002: A9 34 12     LDA #$1234      \n'
    );
  });
});

describe('Disassembling catalog entries', () => {
  const loader = walkCatalog(buildDOS33Image(), { quiet: true }).root.children[0];

  it('should start binary files at their load address', () => {
    expect(entryStartAddress(loader)).toBe(0x0300);
    expect(disassembleEntry(loader)).toBe('0300: A9 01     LDA #$01      \n' + '0302: 60        RTS           \n');
  });

  it('should fall back to the system and program addresses', () => {
    const bare = { ...loader, loadAddress: undefined, auxType: 0 };

    expect(entryStartAddress({ ...bare, fileType: 0xff })).toBe(0x2000);
    expect(entryStartAddress(bare)).toBe(0x0800);
    expect(entryStartAddress({ ...bare, auxType: 0x4000 })).toBe(0x4000);
  });

  it('should use the 65816 listing for IIgs code files', () => {
    const entry = { ...loader, loadAddress: undefined, auxType: 0, fileType: 0xb3, data: new Uint8Array([0xfb]) };

    expect(disassembleEntry(entry)).toBe('00/0800: FB           XCE             \n');
  });
});
