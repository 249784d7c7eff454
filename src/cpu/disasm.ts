import type { Word } from '../emulator/types';
import { DecodeError } from '../emulator/errors';
import type { Instruction } from './instruction';
import { decode } from './decoder';

function h(n: number, w: number): string {
  return '0x' + (n >>> 0).toString(16).toUpperCase().padStart(w, '0');
}

const V = (r: number) => `V${r.toString(16).toUpperCase()}`;

// Conventional Cowgod-style mnemonics.
export function formatInstruction(ins: Instruction): string {
  switch (ins.kind) {
    case 'Noop': return `SYS ${h(ins.nnn, 3)}`;
    case 'ClearScreen': return 'CLS';
    case 'ReturnFromSubroutine': return 'RET';
    case 'Jump': return `JP ${h(ins.nnn, 3)}`;
    case 'CallSubroutine': return `CALL ${h(ins.nnn, 3)}`;
    case 'SkipIfXEqualsKK': return `SE ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'SkipIfXNotEqualsKK': return `SNE ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'SkipIfXEqualsY': return `SE ${V(ins.x)}, ${V(ins.y)}`;
    case 'LoadX': return `LD ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'AddToX': return `ADD ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'LoadYIntoX': return `LD ${V(ins.x)}, ${V(ins.y)}`;
    case 'OrXY': return `OR ${V(ins.x)}, ${V(ins.y)}`;
    case 'AndXY': return `AND ${V(ins.x)}, ${V(ins.y)}`;
    case 'XorXY': return `XOR ${V(ins.x)}, ${V(ins.y)}`;
    case 'AddYToX': return `ADD ${V(ins.x)}, ${V(ins.y)}`;
    case 'SubYFromX': return `SUB ${V(ins.x)}, ${V(ins.y)}`;
    case 'ShiftRight': return `SHR ${V(ins.x)}, ${V(ins.y)}`;
    case 'SubXFromY': return `SUBN ${V(ins.x)}, ${V(ins.y)}`;
    case 'ShiftLeft': return `SHL ${V(ins.x)}, ${V(ins.y)}`;
    case 'SkipIfXNotEqualsY': return `SNE ${V(ins.x)}, ${V(ins.y)}`;
    case 'SetIndex': return `LD I, ${h(ins.nnn, 3)}`;
    case 'JumpPlusV0': return `JP V0, ${h(ins.nnn, 3)}`;
    case 'SetRandom': return `RND ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'Display': return `DRW ${V(ins.x)}, ${V(ins.y)}, ${ins.n}`;
    case 'SkipIfPressed': return `SKP ${V(ins.x)}`;
    case 'SkipIfNotPressed': return `SKNP ${V(ins.x)}`;
    case 'SetXToDelayTimer': return `LD ${V(ins.x)}, DT`;
    case 'WaitForKeyPressed': return `LD ${V(ins.x)}, K`;
    case 'SetDelayTimerToX': return `LD DT, ${V(ins.x)}`;
    case 'SetSoundTimerToX': return `LD ST, ${V(ins.x)}`;
    case 'AddXToI': return `ADD I, ${V(ins.x)}`;
    case 'SetIToSpriteX': return `LD F, ${V(ins.x)}`;
    case 'LoadBCDOfX': return `LD B, ${V(ins.x)}`;
    case 'Write0ThroughX': return `LD [I], ${V(ins.x)}`;
    case 'Load0ThroughX': return `LD ${V(ins.x)}, [I]`;
  }
}

// Like formatInstruction(decode(op)) but renders unmapped opcodes as data.
export function disassembleOpcode(opcode: Word): string {
  try {
    return formatInstruction(decode(opcode));
  } catch (e) {
    if (e instanceof DecodeError) return `DW ${h(opcode, 4)}`;
    throw e;
  }
}

export interface DisassemblyLine {
  addr: number;
  opcode: Word;
  text: string;
}

// Linear sweep over a program image loaded at `origin`. A trailing odd byte is emitted as DB.
export function disassemble(program: ArrayLike<number>, origin: number): DisassemblyLine[] {
  const out: DisassemblyLine[] = [];
  let i = 0;
  for (; i + 1 < program.length; i += 2) {
    const opcode = ((program[i] & 0xff) << 8) | (program[i + 1] & 0xff);
    out.push({ addr: origin + i, opcode, text: disassembleOpcode(opcode) });
  }
  if (i < program.length) {
    const b = program[i] & 0xff;
    out.push({ addr: origin + i, opcode: b, text: `DB ${h(b, 2)}` });
  }
  return out;
}
