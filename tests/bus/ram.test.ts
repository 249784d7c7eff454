import { describe, it, expect } from 'vitest';
import { Ram, FONT_SET } from '../../src/bus/ram';
import { AddressFault } from '../../src/emulator/errors';

describe('Ram', () => {
  it('starts with the font at 0x000 and zeros elsewhere', () => {
    const ram = new Ram();
    expect(FONT_SET.length).toBe(80);
    expect(Array.from(ram.bytes.slice(0, 5))).toEqual([0xf0, 0x90, 0x90, 0x90, 0xf0]);
    expect(Array.from(ram.bytes.slice(75, 80))).toEqual([0xf0, 0x80, 0xf0, 0x80, 0x80]); // F
    expect(ram.bytes[0x50]).toBe(0);
    expect(ram.bytes.length).toBe(4096);
  });

  it('reads words big-endian and masks written bytes', () => {
    const ram = new Ram();
    ram.write8(0x300, 0x12);
    ram.write8(0x301, 0x1ab);
    expect(ram.read8(0x301)).toBe(0xab);
    expect(ram.read16(0x300)).toBe(0x12ab);
  });

  it('rejects writes into the font region', () => {
    const ram = new Ram();
    expect(() => ram.write8(0x4f, 1)).toThrow('Invalid write at 0x004F (font region is read-only)');
    expect(() => ram.write8(0x50, 1)).not.toThrow();
    expect(ram.read8(0x4f)).toBe(0x80);
  });

  it('rejects accesses past the end of memory', () => {
    const ram = new Ram();
    expect(() => ram.read8(0x1000)).toThrow(AddressFault);
    expect(() => ram.read16(0xfff)).toThrow('Invalid read at 0x1000');
    expect(() => ram.read8(-1)).toThrow(AddressFault);
    expect(ram.read8(0xfff)).toBe(0);
  });

  it('loads a program at 0x200 and refuses one that does not fit', () => {
    const ram = new Ram();
    ram.loadProgram([0x00, 0xe0, 0x12, 0x00]);
    expect(ram.read16(0x200)).toBe(0x00e0);
    expect(ram.read16(0x202)).toBe(0x1200);

    const big = new Uint8Array(4096 - 0x200 + 1);
    expect(() => new Ram().loadProgram(big)).toThrow('Invalid write at 0x1000');
    expect(() => new Ram().loadProgram(new Uint8Array(4096 - 0x200))).not.toThrow();
  });
});
