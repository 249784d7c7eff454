export const RAM_SIZE = 4096;
export const PROGRAM_START = 0x200;
export const MAX_ROM_SIZE = RAM_SIZE - PROGRAM_START;

export const FONT_START = 0x000;
export const FONT_GLYPH_BYTES = 5;
export const FONT_END = 0x050; // exclusive

export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

export const NUM_REGISTERS = 16;
export const FLAG_REGISTER = 0xf;
export const NUM_KEYS = 16;
export const STACK_DEPTH = 16;

// Host pacing: instructions executed per 60 Hz frame
export const CYCLES_PER_FRAME = 10;
export const TIMER_HZ = 60;
