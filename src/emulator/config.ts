import { CYCLES_PER_FRAME } from './constants';
import { parseQuirks, resolveQuirks } from './quirks';
import type { Quirks } from './quirks';

export type CpuErrorMode = 'ignore' | 'record' | 'halt' | 'throw';

export interface EmulatorConfig {
  seed: number | undefined;  // undefined => seed from entropy
  cyclesPerFrame: number;
  quirks: Quirks;
  onCpuError: CpuErrorMode;
  debug: boolean;
  traceEveryInstr: number;   // 0 = off
  warnings: string[];        // settings that were present but could not be used
}

type Env = Record<string, string | undefined>;

// Accepts 0x1F, $1F or plain decimal.
export function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const cleaned = raw.trim().toLowerCase().replace(/^\$/, '0x');
  if (!cleaned) return undefined;
  if (cleaned.startsWith('0x')) {
    const digits = cleaned.slice(2);
    return /^[0-9a-f]+$/.test(digits) ? parseInt(digits, 16) : undefined;
  }
  const v = Number(cleaned);
  return Number.isFinite(v) ? v : undefined;
}

function parseFlag(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  const v = raw.trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

function isErrorMode(v: string): v is CpuErrorMode {
  return v === 'ignore' || v === 'record' || v === 'halt' || v === 'throw';
}

/**
 * Reads host settings from the environment:
 * CHIP8_SEED, CHIP8_CYCLES_PER_FRAME, CHIP8_QUIRKS, CHIP8_ON_ERROR, CHIP8_DEBUG, CHIP8_TRACE.
 */
export function loadConfig(env: Env = process.env): EmulatorConfig {
  const warnings: string[] = [];

  const seedRaw = env.CHIP8_SEED;
  let seed = parseNumber(seedRaw);
  if (seedRaw !== undefined && seed === undefined) warnings.push(`CHIP8_SEED: not a number: ${seedRaw}`);
  if (seed !== undefined) seed = seed >>> 0;

  const cpfRaw = env.CHIP8_CYCLES_PER_FRAME;
  const cpf = parseNumber(cpfRaw);
  let cyclesPerFrame = CYCLES_PER_FRAME;
  if (cpf !== undefined && cpf >= 1) cyclesPerFrame = Math.floor(cpf);
  else if (cpfRaw !== undefined) warnings.push(`CHIP8_CYCLES_PER_FRAME: expected a positive number: ${cpfRaw}`);

  let quirks = resolveQuirks();
  if (env.CHIP8_QUIRKS !== undefined) {
    const parsed = parseQuirks(env.CHIP8_QUIRKS);
    quirks = parsed.quirks;
    for (const u of parsed.unknown) warnings.push(`CHIP8_QUIRKS: unknown token: ${u}`);
  }

  let onCpuError: CpuErrorMode = 'record';
  const modeRaw = env.CHIP8_ON_ERROR?.trim().toLowerCase();
  if (modeRaw !== undefined) {
    if (isErrorMode(modeRaw)) onCpuError = modeRaw;
    else warnings.push(`CHIP8_ON_ERROR: unknown mode: ${modeRaw}`);
  }

  const trace = parseNumber(env.CHIP8_TRACE);
  const traceEveryInstr = trace !== undefined && trace > 0 ? Math.floor(trace) : 0;

  return {
    seed,
    cyclesPerFrame,
    quirks,
    onCpuError,
    debug: parseFlag(env.CHIP8_DEBUG),
    traceEveryInstr,
    warnings,
  };
}
