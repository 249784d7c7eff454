import { Chip8CPU } from '../cpu/chip8Cpu';
import type { CPUOptions, CycleResult } from '../cpu/chip8Cpu';
import type { FramebufferView } from '../ppu/framebuffer';
import type { Byte } from './types';
import type { EmulatorConfig } from './config';

// Host-facing facade: program load, per-cycle step, read-only video, keypad input, sound timer.
export class Emulator {
  constructor(public readonly cpu: Chip8CPU) {}

  static fromRom(rom: ArrayLike<number>, opts: CPUOptions = {}): Emulator {
    return new Emulator(new Chip8CPU(rom, opts));
  }

  // For hosts driven by Scheduler: timers run off the 60 Hz frame clock, not per instruction.
  static fromConfig(rom: ArrayLike<number>, cfg: EmulatorConfig): Emulator {
    return Emulator.fromRom(rom, { quirks: cfg.quirks, seed: cfg.seed, debug: cfg.debug, timerMode: 'external' });
  }

  cycle(): CycleResult {
    return this.cpu.cycle();
  }

  get framebuffer(): FramebufferView {
    return this.cpu.display;
  }

  setKey(key: number, pressed: boolean): void {
    this.cpu.setKey(key, pressed);
  }

  get soundTimer(): Byte {
    return this.cpu.soundTimer;
  }

  isSoundActive(): boolean {
    return this.cpu.soundTimer > 0;
  }
}
