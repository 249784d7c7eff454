import { describe, it, expect } from 'vitest';
import { mkCpu } from '../helpers/romKit';

describe('Quirk: shiftFromVy', () => {
  it('8XY6 shifts Vy into Vx', () => {
    const cpu = mkCpu([0x8126], { quirks: { shiftFromVy: true } });
    cpu.registers.set(2, 0x03);
    cpu.cycle();
    expect(cpu.registers.get(1)).toBe(0x01);
    expect(cpu.registers.get(2)).toBe(0x03);
    expect(cpu.registers.get(0xf)).toBe(1);
  });

  it('8XYE shifts Vy into Vx', () => {
    const cpu = mkCpu([0x812e], { quirks: { shiftFromVy: true } });
    cpu.registers.set(1, 0xff);
    cpu.registers.set(2, 0x40);
    cpu.cycle();
    expect(cpu.registers.get(1)).toBe(0x80);
    expect(cpu.registers.get(0xf)).toBe(0);
  });
});

describe('Quirk: logicResetsVF', () => {
  it('clears VF after OR when enabled', () => {
    const cpu = mkCpu([0x8121], { quirks: { logicResetsVF: true } });
    cpu.registers.set(0xf, 5);
    cpu.cycle();
    expect(cpu.registers.get(0xf)).toBe(0);
  });

  it('leaves VF alone by default', () => {
    const cpu = mkCpu([0x8121]);
    cpu.registers.set(0xf, 5);
    cpu.cycle();
    expect(cpu.registers.get(0xf)).toBe(5);
  });
});

describe('Quirk: jumpOffset', () => {
  it('v0-low-nibble masks V0 before adding', () => {
    const cpu = mkCpu([0xb300], { quirks: { jumpOffset: 'v0-low-nibble' } });
    cpu.registers.set(0, 0x1f);
    cpu.cycle();
    expect(cpu.pc).toBe(0x30f);
  });

  it('vx uses the register named by the top nibble of nnn', () => {
    const cpu = mkCpu([0xb200], { quirks: { jumpOffset: 'vx' } });
    cpu.registers.set(0, 0x40);
    cpu.registers.set(2, 0x10);
    cpu.cycle();
    expect(cpu.pc).toBe(0x210);
  });
});

describe('Quirk: indexIncrement', () => {
  it("'x+1' advances I past the last register stored", () => {
    const cpu = mkCpu([0xf255], { quirks: { indexIncrement: 'x+1' } });
    cpu.registers.I = 0x300;
    cpu.cycle();
    expect(cpu.registers.I).toBe(0x303);
  });

  it("'x' advances I by x on load", () => {
    const cpu = mkCpu([0xf265], { quirks: { indexIncrement: 'x' } });
    cpu.registers.I = 0x300;
    cpu.cycle();
    expect(cpu.registers.I).toBe(0x302);
  });
});

describe('Quirk: wrapSprites', () => {
  it('wraps pixels past the right edge to column 0', () => {
    const cpu = mkCpu([0xd011], { quirks: { wrapSprites: true } });
    cpu.ram.bytes[0x300] = 0xff;
    cpu.registers.I = 0x300;
    cpu.registers.set(0, 62);
    cpu.cycle();
    expect(cpu.framebuffer.litCount()).toBe(8);
    expect(cpu.framebuffer.getPixel(0, 0)).toBe(true);
    expect(cpu.framebuffer.getPixel(5, 0)).toBe(true);
    expect(cpu.framebuffer.getPixel(6, 0)).toBe(false);
  });

  it('wraps rows past the bottom edge to row 0', () => {
    const cpu = mkCpu([0xd012], { quirks: { wrapSprites: true } });
    cpu.ram.bytes[0x300] = 0x80;
    cpu.ram.bytes[0x301] = 0x80;
    cpu.registers.I = 0x300;
    cpu.registers.set(1, 31);
    cpu.cycle();
    expect(cpu.framebuffer.getPixel(0, 31)).toBe(true);
    expect(cpu.framebuffer.getPixel(0, 0)).toBe(true);
  });
});

describe('Quirk: vblankWait', () => {
  it('holds DXYN until vblank and allows one draw per signal', () => {
    const cpu = mkCpu([0xd011, 0xd011], { quirks: { vblankWait: true } });
    cpu.ram.bytes[0x300] = 0x80;
    cpu.registers.I = 0x300;

    cpu.cycle();
    expect(cpu.pc).toBe(0x200);
    expect(cpu.framebuffer.litCount()).toBe(0);

    cpu.signalVBlank();
    cpu.cycle();
    expect(cpu.pc).toBe(0x202);
    expect(cpu.framebuffer.litCount()).toBe(1);

    cpu.cycle();
    expect(cpu.pc).toBe(0x202);
    expect(cpu.framebuffer.litCount()).toBe(1);
  });
});
