import { Emulator } from './core';
import type { Chip8Fault } from './errors';
import type { CpuErrorMode } from './config';
import { CYCLES_PER_FRAME, TIMER_HZ } from './constants';
import { TimerClock } from '../timing/timerClock';
import { describeState } from '../cpu/chip8Cpu';

export type { CpuErrorMode } from './config';

export interface SchedulerOptions {
  cyclesPerFrame?: number;
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
  timerHz?: number;
}

// Deterministic frame driver. One frame = vblank signal, a burst of cycles, one 60 Hz timer tick.
// - ignore: skip the faulting instruction and keep going (a failed fetch halts instead)
// - record: remember the fault and end the current frame early
// - halt:   remember the fault and stop stepping until resume()
// - throw:  rethrow the fault to the caller
export class Scheduler {
  readonly cyclesPerFrame: number;
  private onCpuError: CpuErrorMode;
  private traceEveryInstr: number;
  private clock: TimerClock;
  public lastFault: Chip8Fault | undefined;
  private halted = false;
  private execCount = 0;
  private frameCount = 0;

  constructor(private emu: Emulator, opts: SchedulerOptions = {}) {
    this.cyclesPerFrame = Math.max(1, Math.floor(opts.cyclesPerFrame ?? CYCLES_PER_FRAME));
    this.onCpuError = opts.onCpuError ?? 'record';
    this.traceEveryInstr = Math.max(0, Math.floor(opts.traceEveryInstr ?? 0));
    this.clock = new TimerClock(opts.timerHz ?? TIMER_HZ);
  }

  get isHalted(): boolean { return this.halted; }
  get frames(): number { return this.frameCount; }
  get instructions(): number { return this.execCount; }

  resume(): void {
    this.halted = false;
    this.lastFault = undefined;
  }

  stepFrame(): void {
    if (this.halted) return;
    this.lastFault = undefined;
    const cpu = this.emu.cpu;
    cpu.signalVBlank();
    for (let i = 0; i < this.cyclesPerFrame; i++) {
      const res = cpu.cycle();
      this.execCount++;
      if (this.traceEveryInstr > 0 && (this.execCount % this.traceEveryInstr) === 0) {
        console.log(`[TRACE] ${describeState(cpu, res.ok ? res.instruction : undefined)}`);
      }
      if (res.ok) continue;
      this.lastFault = res.fault;
      // A failed fetch leaves PC in place, so skipping it cannot make progress.
      const mode = res.opcode === null && this.onCpuError === 'ignore' ? 'halt' : this.onCpuError;
      if (mode === 'throw') throw res.fault;
      if (mode === 'ignore') continue;
      if (mode === 'halt') {
        this.halted = true;
        console.error(`[scheduler] halted: ${res.fault.message}`);
      }
      break;
    }
    if (cpu.timerMode === 'external') cpu.tickTimers();
    this.frameCount++;
  }

  // Run as many whole frames as `elapsedMs` of wall time covers at the timer rate.
  advance(elapsedMs: number): number {
    const due = this.clock.advance(elapsedMs);
    let ran = 0;
    for (; ran < due && !this.halted; ran++) this.stepFrame();
    return ran;
  }
}
