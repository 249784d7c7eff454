export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Address = number; // 0..0xFFF for program-visible addresses

export interface IMemoryBus {
  read8(addr: number): Byte;
  read16(addr: number): Word; // big-endian
  write8(addr: number, value: Byte): void;
}

export interface IClocked {
  tickTimers(): void; // advance the 60 Hz delay/sound timers by one tick
}

// 'cycle': timers decrement once per executed instruction.
// 'external': timers only move when a clock calls tickTimers().
export type TimerMode = 'cycle' | 'external';
