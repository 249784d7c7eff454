import type { Word } from './types';

export type FaultKind = 'decode' | 'stack' | 'address';

function hex(n: number, w: number): string {
  return (n >>> 0).toString(16).toUpperCase().padStart(w, '0');
}

// Conditions an instruction can raise; Chip8CPU.cycle() reports these as results.
export abstract class Chip8Fault extends Error {
  abstract readonly kind: FaultKind;
}

export class DecodeError extends Chip8Fault {
  readonly kind = 'decode' as const;

  constructor(readonly opcode: Word) {
    super(`Unmapped opcode 0x${hex(opcode, 4)}`);
    this.name = 'DecodeError';
  }
}

export type StackFaultReason = 'overflow' | 'underflow';

export class StackFault extends Chip8Fault {
  readonly kind = 'stack' as const;

  constructor(readonly reason: StackFaultReason, readonly pointer: number) {
    super(reason === 'overflow'
      ? `Call stack overflow (pointer=${pointer})`
      : `Return with empty call stack (pointer=${pointer})`);
    this.name = 'StackFault';
  }
}

export type MemoryAccess = 'read' | 'write';

export class AddressFault extends Chip8Fault {
  readonly kind = 'address' as const;

  constructor(readonly address: number, readonly access: MemoryAccess, detail?: string) {
    super(`Invalid ${access} at 0x${hex(address, 4)}${detail ? ` (${detail})` : ''}`);
    this.name = 'AddressFault';
  }
}

// Host-side: reading a ROM image failed. Never produced by the core itself.
export class RomLoadError extends Error {
  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = 'RomLoadError';
  }
}
