import type { Word } from '../emulator/types';
import { STACK_DEPTH } from '../emulator/constants';
import { StackFault } from '../emulator/errors';

// Fixed-depth return stack. pointer is the number of live entries (0..16).
export class CallStack {
  readonly values = new Uint16Array(STACK_DEPTH);
  private sp = 0;

  get pointer(): number { return this.sp; }

  get(slot: number): Word { return this.values[slot]; }

  push(returnAddr: Word): void {
    if (this.sp >= STACK_DEPTH) throw new StackFault('overflow', this.sp);
    this.values[this.sp] = returnAddr & 0xffff;
    this.sp++;
  }

  pop(): Word {
    if (this.sp <= 0) throw new StackFault('underflow', this.sp);
    this.sp--;
    return this.values[this.sp];
  }
}
