import type { Word } from '../emulator/types';
import { DecodeError } from '../emulator/errors';
import type { Instruction } from './instruction';

/**
 * Maps a 16-bit opcode to its instruction. Pure: no CPU state is consulted.
 *
 * Groups 0x8, 0xE and 0xF dispatch further on the low nibble / low byte and throw
 * {@link DecodeError} for codes they do not define. Group 0x0 decodes anything but
 * 00E0/00EE as a no-op.
 */
export function decode(opcode: Word): Instruction {
  const op = opcode & 0xffff;
  const x = (op >>> 8) & 0xf;
  const y = (op >>> 4) & 0xf;
  const n = op & 0xf;
  const kk = op & 0xff;
  const nnn = op & 0xfff;

  switch (op >>> 12) {
    case 0x0:
      if (op === 0x00e0) return { kind: 'ClearScreen' };
      if (op === 0x00ee) return { kind: 'ReturnFromSubroutine' };
      return { kind: 'Noop', nnn };
    case 0x1: return { kind: 'Jump', nnn };
    case 0x2: return { kind: 'CallSubroutine', nnn };
    case 0x3: return { kind: 'SkipIfXEqualsKK', x, kk };
    case 0x4: return { kind: 'SkipIfXNotEqualsKK', x, kk };
    case 0x5: return { kind: 'SkipIfXEqualsY', x, y };
    case 0x6: return { kind: 'LoadX', x, kk };
    case 0x7: return { kind: 'AddToX', x, kk };
    case 0x8:
      switch (n) {
        case 0x0: return { kind: 'LoadYIntoX', x, y };
        case 0x1: return { kind: 'OrXY', x, y };
        case 0x2: return { kind: 'AndXY', x, y };
        case 0x3: return { kind: 'XorXY', x, y };
        case 0x4: return { kind: 'AddYToX', x, y };
        case 0x5: return { kind: 'SubYFromX', x, y };
        case 0x6: return { kind: 'ShiftRight', x, y };
        case 0x7: return { kind: 'SubXFromY', x, y };
        case 0xe: return { kind: 'ShiftLeft', x, y };
        default: throw new DecodeError(op);
      }
    case 0x9: return { kind: 'SkipIfXNotEqualsY', x, y };
    case 0xa: return { kind: 'SetIndex', nnn };
    case 0xb: return { kind: 'JumpPlusV0', x, nnn };
    case 0xc: return { kind: 'SetRandom', x, kk };
    case 0xd: return { kind: 'Display', x, y, n };
    case 0xe:
      switch (kk) {
        case 0x9e: return { kind: 'SkipIfPressed', x };
        case 0xa1: return { kind: 'SkipIfNotPressed', x };
        default: throw new DecodeError(op);
      }
    default: // 0xF
      switch (kk) {
        case 0x07: return { kind: 'SetXToDelayTimer', x };
        case 0x0a: return { kind: 'WaitForKeyPressed', x };
        case 0x15: return { kind: 'SetDelayTimerToX', x };
        case 0x18: return { kind: 'SetSoundTimerToX', x };
        case 0x1e: return { kind: 'AddXToI', x };
        case 0x29: return { kind: 'SetIToSpriteX', x };
        case 0x33: return { kind: 'LoadBCDOfX', x };
        case 0x55: return { kind: 'Write0ThroughX', x };
        case 0x65: return { kind: 'Load0ThroughX', x };
        default: throw new DecodeError(op);
      }
  }
}
