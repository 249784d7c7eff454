import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { mkCpu } from '../helpers/romKit';

const byte = fc.integer({ min: 0, max: 255 });
const reg = fc.integer({ min: 0, max: 15 });

describe('Property-based: arithmetic and data movement', () => {
  it('6XKK loads kk into Vx and advances PC by one instruction', () => {
    fc.assert(
      fc.property(reg, byte, (x, kk) => {
        const cpu = mkCpu([0x6000 | (x << 8) | kk]);
        cpu.cycle();
        expect(cpu.registers.get(x)).toBe(kk);
        expect(cpu.pc).toBe(0x202);
      }),
      { numRuns: 200 }
    );
  });

  it('8XY4 matches (a+b) mod 256 with carry iff a+b > 255', () => {
    fc.assert(
      fc.property(byte, byte, (a, b) => {
        const cpu = mkCpu([0x8124]);
        cpu.registers.set(1, a);
        cpu.registers.set(2, b);
        cpu.cycle();
        expect(cpu.registers.get(1)).toBe((a + b) % 256);
        expect(cpu.registers.get(0xf)).toBe(a + b > 255 ? 1 : 0);
      }),
      { numRuns: 300 }
    );
  });

  it('8XY5 matches (a-b) mod 256 with VF=1 iff a >= b', () => {
    fc.assert(
      fc.property(byte, byte, (a, b) => {
        const cpu = mkCpu([0x8125]);
        cpu.registers.set(1, a);
        cpu.registers.set(2, b);
        cpu.cycle();
        expect(cpu.registers.get(1)).toBe((a - b + 256) % 256);
        expect(cpu.registers.get(0xf)).toBe(a >= b ? 1 : 0);
      }),
      { numRuns: 300 }
    );
  });

  it('8XY7 matches (b-a) mod 256 with VF=1 iff b >= a', () => {
    fc.assert(
      fc.property(byte, byte, (a, b) => {
        const cpu = mkCpu([0x8127]);
        cpu.registers.set(1, a);
        cpu.registers.set(2, b);
        cpu.cycle();
        expect(cpu.registers.get(1)).toBe((b - a + 256) % 256);
        expect(cpu.registers.get(0xf)).toBe(b >= a ? 1 : 0);
      }),
      { numRuns: 300 }
    );
  });

  it('FX33 digits recombine to the original value', () => {
    for (let v = 0; v <= 255; v++) {
      const cpu = mkCpu([0xf533]);
      cpu.registers.set(5, v);
      cpu.registers.I = 0x400;
      cpu.cycle();
      const [d0, d1, d2] = cpu.ram.bytes.slice(0x400, 0x403);
      expect(100 * d0 + 10 * d1 + d2).toBe(v);
      expect(Math.max(d0, d1, d2)).toBeLessThan(10);
    }
  });

  it('2NNN followed by 00EE returns to the instruction after the call', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0x202, max: 0xffe }), (target) => {
        const cpu = mkCpu([0x2000 | target]);
        cpu.ram.bytes[target] = 0x00;
        cpu.ram.bytes[target + 1] = 0xee;
        cpu.cycle();
        expect(cpu.pc).toBe(target);
        cpu.cycle();
        expect(cpu.pc).toBe(0x202);
        expect(cpu.stack.pointer).toBe(0);
      }),
      { numRuns: 200 }
    );
  });
});
