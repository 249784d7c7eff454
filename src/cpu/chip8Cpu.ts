import type { Byte, IClocked, TimerMode, Word } from '../emulator/types';
import { Chip8Fault } from '../emulator/errors';
import {
  DISPLAY_HEIGHT, DISPLAY_WIDTH, FONT_GLYPH_BYTES, FONT_START, PROGRAM_START, RAM_SIZE,
} from '../emulator/constants';
import { resolveQuirks } from '../emulator/quirks';
import type { Quirks } from '../emulator/quirks';
import { Ram } from '../bus/ram';
import { Framebuffer } from '../ppu/framebuffer';
import type { FramebufferView } from '../ppu/framebuffer';
import { Keypad } from '../input/keypad';
import { Mulberry32, seedFromEntropy } from '../rng/prng';
import type { RandomSource } from '../rng/prng';
import { RegisterFile } from './registers';
import { CallStack } from './stack';
import type { Instruction } from './instruction';
import { decode } from './decoder';
import { formatInstruction } from './disasm';

export interface CPUOptions {
  quirks?: Partial<Quirks>;
  seed?: number;          // ignored when `random` is given
  random?: RandomSource;
  timerMode?: TimerMode;  // default 'cycle'
  debug?: boolean;        // log faults as they are raised
}

export type CycleResult =
  | { ok: true; pc: Word; opcode: Word; instruction: Instruction }
  | { ok: false; pc: Word; opcode: Word | null; fault: Chip8Fault };

export class Chip8CPU implements IClocked {
  readonly ram = new Ram();
  readonly registers = new RegisterFile();
  readonly stack = new CallStack();
  readonly framebuffer = new Framebuffer();
  readonly keypad = new Keypad();
  readonly quirks: Readonly<Quirks>;
  readonly timerMode: TimerMode;

  private programCounter: Word = PROGRAM_START;
  private random: RandomSource;
  private vblankReady = false;
  private readonly debug: boolean;

  constructor(rom: ArrayLike<number>, opts: CPUOptions = {}) {
    this.ram.loadProgram(rom, PROGRAM_START);
    this.quirks = resolveQuirks(opts.quirks);
    this.timerMode = opts.timerMode ?? 'cycle';
    this.random = opts.random ?? new Mulberry32(opts.seed ?? seedFromEntropy());
    this.debug = opts.debug ?? false;
  }

  get pc(): Word { return this.programCounter; }
  set pc(value: Word) { this.programCounter = value & 0xffff; }

  get soundTimer(): Byte { return this.registers.soundTimer; }
  get delayTimer(): Byte { return this.registers.delayTimer; }

  get display(): FramebufferView { return this.framebuffer; }

  setKey(key: number, pressed: boolean): void {
    this.keypad.setKey(key, pressed);
  }

  tickTimers(): void {
    this.registers.decrementTimers();
  }

  // Opens the draw window for the vblankWait quirk; the next DXYN consumes it.
  signalVBlank(): void {
    this.vblankReady = true;
  }

  /**
   * Fetch, decode and execute one instruction, then run the per-cycle timer step.
   *
   * Faults come back as `{ ok: false }`; timers do not move on a faulting cycle.
   * When the fetch itself succeeded PC is already past the offending instruction.
   */
  cycle(): CycleResult {
    const pc = this.programCounter;
    let opcode: Word | null = null;
    try {
      opcode = this.ram.read16(pc);
      this.pc = pc + 2;
      const instruction = decode(opcode);
      this.execute(instruction);
      if (this.timerMode === 'cycle') this.registers.decrementTimers();
      return { ok: true, pc, opcode, instruction };
    } catch (e) {
      if (e instanceof Chip8Fault) {
        this.dbg(`[CPU] fault at PC=${hex(pc, 4)} op=${opcode === null ? '----' : hex(opcode, 4)}: ${e.message}`);
        return { ok: false, pc, opcode, fault: e };
      }
      throw e;
    }
  }

  execute(ins: Instruction): void {
    const r = this.registers;
    switch (ins.kind) {
      case 'Noop':
        break;
      case 'ClearScreen':
        this.framebuffer.clear();
        break;
      case 'ReturnFromSubroutine':
        this.pc = this.stack.pop();
        break;
      case 'Jump':
        this.pc = ins.nnn;
        break;
      case 'CallSubroutine':
        this.stack.push(this.programCounter);
        this.pc = ins.nnn;
        break;
      case 'SkipIfXEqualsKK':
        if (r.get(ins.x) === ins.kk) this.skip();
        break;
      case 'SkipIfXNotEqualsKK':
        if (r.get(ins.x) !== ins.kk) this.skip();
        break;
      case 'SkipIfXEqualsY':
        if (r.get(ins.x) === r.get(ins.y)) this.skip();
        break;
      case 'SkipIfXNotEqualsY':
        if (r.get(ins.x) !== r.get(ins.y)) this.skip();
        break;
      case 'LoadX':
        r.set(ins.x, ins.kk);
        break;
      case 'AddToX':
        r.set(ins.x, (r.get(ins.x) + ins.kk) & 0xff);
        break;
      case 'LoadYIntoX':
        r.set(ins.x, r.get(ins.y));
        break;
      case 'OrXY':
        r.set(ins.x, r.get(ins.x) | r.get(ins.y));
        if (this.quirks.logicResetsVF) r.setFlag(false);
        break;
      case 'AndXY':
        r.set(ins.x, r.get(ins.x) & r.get(ins.y));
        if (this.quirks.logicResetsVF) r.setFlag(false);
        break;
      case 'XorXY':
        r.set(ins.x, r.get(ins.x) ^ r.get(ins.y));
        if (this.quirks.logicResetsVF) r.setFlag(false);
        break;
      case 'AddYToX': {
        const sum = r.get(ins.x) + r.get(ins.y);
        r.set(ins.x, sum & 0xff);
        r.setFlag(sum > 0xff);
        break;
      }
      case 'SubYFromX': {
        const vx = r.get(ins.x);
        const vy = r.get(ins.y);
        r.set(ins.x, (vx - vy) & 0xff);
        r.setFlag(vx >= vy); // VF=1 means "no borrow"
        break;
      }
      case 'SubXFromY': {
        const vx = r.get(ins.x);
        const vy = r.get(ins.y);
        r.set(ins.x, (vy - vx) & 0xff);
        r.setFlag(vy >= vx);
        break;
      }
      case 'ShiftRight': {
        const src = r.get(this.quirks.shiftFromVy ? ins.y : ins.x);
        r.set(ins.x, src >>> 1);
        r.setFlag((src & 0x01) !== 0);
        break;
      }
      case 'ShiftLeft': {
        const src = r.get(this.quirks.shiftFromVy ? ins.y : ins.x);
        r.set(ins.x, (src << 1) & 0xff);
        r.setFlag((src & 0x80) !== 0);
        break;
      }
      case 'SetIndex':
        r.I = ins.nnn;
        break;
      case 'JumpPlusV0':
        this.pc = ins.nnn + this.jumpOffset(ins.x);
        break;
      case 'SetRandom':
        r.set(ins.x, this.random.nextByte() & ins.kk);
        break;
      case 'Display':
        this.draw(ins.x, ins.y, ins.n);
        break;
      case 'SkipIfPressed':
        if (this.keypad.isPressed(r.get(ins.x))) this.skip();
        break;
      case 'SkipIfNotPressed':
        if (!this.keypad.isPressed(r.get(ins.x))) this.skip();
        break;
      case 'WaitForKeyPressed': {
        const key = this.keypad.firstPressed();
        if (key === null) this.pc = this.programCounter - 2; // re-run next cycle
        else r.set(ins.x, key);
        break;
      }
      case 'SetXToDelayTimer':
        r.set(ins.x, r.delayTimer);
        break;
      case 'SetDelayTimerToX':
        r.delayTimer = r.get(ins.x);
        break;
      case 'SetSoundTimerToX':
        r.soundTimer = r.get(ins.x);
        break;
      case 'AddXToI':
        r.I = r.I + r.get(ins.x);
        break;
      case 'SetIToSpriteX':
        r.I = FONT_START + r.get(ins.x) * FONT_GLYPH_BYTES;
        break;
      case 'LoadBCDOfX': {
        const vx = r.get(ins.x);
        this.ram.checkRange(r.I, 3, 'write');
        this.ram.write8(r.I, Math.floor(vx / 100));
        this.ram.write8(r.I + 1, Math.floor(vx / 10) % 10);
        this.ram.write8(r.I + 2, vx % 10);
        break;
      }
      case 'Write0ThroughX':
        this.ram.checkRange(r.I, ins.x + 1, 'write');
        for (let i = 0; i <= ins.x; i++) this.ram.write8(r.I + i, r.get(i));
        this.advanceIndex(ins.x);
        break;
      case 'Load0ThroughX':
        this.ram.checkRange(r.I, ins.x + 1, 'read');
        for (let i = 0; i <= ins.x; i++) r.set(i, this.ram.read8(r.I + i));
        this.advanceIndex(ins.x);
        break;
    }
  }

  private skip(): void {
    this.pc = this.programCounter + 2;
  }

  private jumpOffset(x: number): number {
    switch (this.quirks.jumpOffset) {
      case 'v0': return this.registers.get(0);
      case 'v0-low-nibble': return this.registers.get(0) & 0x0f;
      case 'vx': return this.registers.get(x);
    }
  }

  private advanceIndex(x: number): void {
    switch (this.quirks.indexIncrement) {
      case 'none': break;
      case 'x': this.registers.I = this.registers.I + x; break;
      case 'x+1': this.registers.I = this.registers.I + x + 1; break;
    }
  }

  // XOR an 8xN sprite from memory[I..] at (Vx mod 64, Vy mod 32); VF <- collision.
  private draw(x: number, y: number, n: number): void {
    if (this.quirks.vblankWait) {
      if (!this.vblankReady) {
        this.pc = this.programCounter - 2;
        return;
      }
      this.vblankReady = false;
    }
    const r = this.registers;
    const startX = r.get(x) % DISPLAY_WIDTH;
    const startY = r.get(y) % DISPLAY_HEIGHT;
    const base = r.I;
    let collision = false;
    for (let row = 0; row < n; row++) {
      const addr = base + row;
      if (addr >= RAM_SIZE) break; // partial draw
      const sprite = this.ram.bytes[addr];
      let py = startY + row;
      if (py >= DISPLAY_HEIGHT) {
        if (!this.quirks.wrapSprites) continue;
        py %= DISPLAY_HEIGHT;
      }
      for (let col = 0; col < 8; col++) {
        if (((sprite >>> (7 - col)) & 1) === 0) continue;
        let px = startX + col;
        if (px >= DISPLAY_WIDTH) {
          if (!this.quirks.wrapSprites) continue;
          px %= DISPLAY_WIDTH;
        }
        if (this.framebuffer.xorPixel(px, py)) collision = true;
      }
    }
    r.setFlag(collision);
  }

  private dbg(msg: string): void {
    if (this.debug) console.log(msg);
  }
}

function hex(n: number, w: number): string {
  return (n >>> 0).toString(16).toUpperCase().padStart(w, '0');
}

// One-line register dump used by trace logging.
export function describeState(cpu: Chip8CPU, ins?: Instruction): string {
  const r = cpu.registers;
  const regs = Array.from(r.v, (b, i) => `V${i.toString(16).toUpperCase()}=${hex(b, 2)}`).join(' ');
  const text = ins ? ` ${formatInstruction(ins)}` : '';
  return `PC=${hex(cpu.pc, 4)}${text} I=${hex(r.I, 4)} SP=${cpu.stack.pointer} DT=${hex(r.delayTimer, 2)} ST=${hex(r.soundTimer, 2)} ${regs}`;
}
