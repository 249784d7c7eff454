import { TIMER_HZ } from '../emulator/constants';

// Converts elapsed wall time into whole ticks of a fixed-rate clock (60 Hz by default).
// Remainders carry over, so uneven host callbacks still average out to the target rate.
export class TimerClock {
  private acc = 0; // elapsed ms scaled by hz; one tick per 1000
  private readonly hz: number;

  constructor(hz = TIMER_HZ) {
    this.hz = Math.max(1, hz);
  }

  advance(elapsedMs: number): number {
    if (!(elapsedMs > 0)) return 0;
    this.acc += elapsedMs * this.hz;
    const ticks = Math.floor(this.acc / 1000);
    this.acc -= ticks * 1000;
    return ticks;
  }

  reset(): void {
    this.acc = 0;
  }
}
