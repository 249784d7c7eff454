import type { IMemoryBus, Byte, Word } from '../emulator/types';
import { AddressFault } from '../emulator/errors';
import { FONT_END, FONT_START, PROGRAM_START, RAM_SIZE } from '../emulator/constants';
import fontSet from './font.json';

export const FONT_SET: readonly number[] = fontSet;

// 4 KiB address space. Font glyphs live at 0x000-0x04F and are read-only after construction.
export class Ram implements IMemoryBus {
  readonly bytes: Uint8Array;

  constructor() {
    this.bytes = new Uint8Array(RAM_SIZE);
    this.bytes.set(FONT_SET, FONT_START);
  }

  read8(addr: number): Byte {
    this.checkRange(addr, 1, 'read');
    return this.bytes[addr];
  }

  read16(addr: number): Word {
    this.checkRange(addr, 2, 'read');
    return (this.bytes[addr] << 8) | this.bytes[addr + 1];
  }

  write8(addr: number, value: Byte): void {
    this.checkRange(addr, 1, 'write');
    this.bytes[addr] = value & 0xff;
  }

  // Throws unless [addr, addr+length) is a valid span for the access.
  checkRange(addr: number, length: number, access: 'read' | 'write'): void {
    if (addr < 0 || addr + length > RAM_SIZE) {
      const bad = addr < 0 ? addr : Math.max(addr, RAM_SIZE);
      throw new AddressFault(bad, access);
    }
    if (access === 'write' && addr < FONT_END) {
      throw new AddressFault(addr, access, 'font region is read-only');
    }
  }

  loadProgram(program: ArrayLike<number>, offset = PROGRAM_START): void {
    this.checkRange(offset, program.length, 'write');
    for (let i = 0; i < program.length; i++) this.bytes[offset + i] = program[i] & 0xff;
  }
}
