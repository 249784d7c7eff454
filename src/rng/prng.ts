import { randomBytes } from 'node:crypto';
import type { Byte } from '../emulator/types';

export interface RandomSource {
  nextByte(): Byte;
}

// mulberry32: small 32-bit state generator, deterministic for a given seed.
export class Mulberry32 implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  nextByte(): Byte {
    return this.nextUint32() >>> 24;
  }
}

export function seedFromEntropy(): number {
  return randomBytes(4).readUInt32LE(0);
}
