import { NUM_KEYS } from '../emulator/constants';

// Hex keypad: logical keys 0x0-0xF. Host input maps physical keys onto these.
export class Keypad {
  private state = new Array<boolean>(NUM_KEYS).fill(false);

  setKey(key: number, pressed: boolean): void {
    if (!Number.isInteger(key) || key < 0 || key >= NUM_KEYS) {
      throw new RangeError(`Key index out of range: ${key}`);
    }
    this.state[key] = pressed;
  }

  isPressed(key: number): boolean {
    return this.state[key & 0xf];
  }

  // Lowest-numbered pressed key, or null when none is held.
  firstPressed(): number | null {
    const idx = this.state.indexOf(true);
    return idx >= 0 ? idx : null;
  }

  releaseAll(): void {
    this.state.fill(false);
  }
}
