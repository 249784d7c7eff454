import type { Byte, Word } from '../emulator/types';
import { FLAG_REGISTER, NUM_REGISTERS } from '../emulator/constants';

export class RegisterFile {
  readonly v = new Uint8Array(NUM_REGISTERS);
  private index: Word = 0;
  private delay: Byte = 0;
  private sound: Byte = 0;

  get(reg: number): Byte { return this.v[reg & 0xf]; }
  set(reg: number, value: Byte): void { this.v[reg & 0xf] = value & 0xff; }

  // VF doubles as the flag output; callers write it last.
  setFlag(on: boolean): void { this.v[FLAG_REGISTER] = on ? 1 : 0; }

  get I(): Word { return this.index; }
  set I(value: Word) { this.index = value & 0xffff; }

  get delayTimer(): Byte { return this.delay; }
  set delayTimer(value: Byte) { this.delay = value & 0xff; }

  get soundTimer(): Byte { return this.sound; }
  set soundTimer(value: Byte) { this.sound = value & 0xff; }

  decrementTimers(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
  }
}
