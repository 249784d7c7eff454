import fs from 'fs';
import { PNG } from 'pngjs';
import { loadRomFile } from '../src/rom/loader';
import { loadConfig, parseNumber } from '../src/emulator/config';
import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { renderFramebufferRGBA } from '../src/ppu/renderer';
import { framebufferFingerprint } from '../src/utils/hash';

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

// --keys=1,4,f holds those hex keys for the whole run
function parseKeys(raw: string | undefined): number[] {
  if (!raw) return [];
  return raw.split(',').map((k) => parseInt(k.trim(), 16)).filter((k) => Number.isInteger(k) && k >= 0 && k <= 0xf);
}

async function main() {
  const args = parseArgs(process.argv);
  const romPath = args.rom || process.env.CHIP8_ROM;
  const outPath = args.out || 'screenshot.png';
  const frames = Math.max(1, parseNumber(args.frames) ?? 120);
  const scale = Math.max(1, parseNumber(args.scale) ?? 8);

  if (!romPath) {
    console.error('Usage: npm run screenshot -- --rom=path/to/game.ch8 --out=./out.png [--frames=120] [--scale=8] [--keys=1,4]');
    process.exit(1);
  }

  const cfg = loadConfig();
  if (args.seed !== undefined) cfg.seed = parseNumber(args.seed);
  if (args.cpf !== undefined) cfg.cyclesPerFrame = Math.max(1, parseNumber(args.cpf) ?? cfg.cyclesPerFrame);
  for (const w of cfg.warnings) console.error(`[screenshot] config: ${w}`);

  const rom = loadRomFile(romPath);
  console.log(`[screenshot] ROM: ${romPath} (${rom.length} bytes)  out: ${outPath}  frames: ${frames}  cpf: ${cfg.cyclesPerFrame}  onCpuError=${cfg.onCpuError}`);

  const emu = Emulator.fromConfig(rom, cfg);
  for (const k of parseKeys(args.keys)) emu.setKey(k, true);
  const sched = new Scheduler(emu, {
    cyclesPerFrame: cfg.cyclesPerFrame,
    onCpuError: cfg.onCpuError,
    traceEveryInstr: cfg.traceEveryInstr,
  });

  for (let i = 0; i < frames && !sched.isHalted; i++) {
    sched.stepFrame();
    if (sched.lastFault && cfg.debug) console.log(`[screenshot] frame ${i}: ${sched.lastFault.message}`);
  }
  if (sched.lastFault) console.error(`[screenshot] last fault: ${sched.lastFault.message}`);

  const { width, height, rgba } = renderFramebufferRGBA(emu.framebuffer, { scale });
  const png = new PNG({ width, height });
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);

  await new Promise<void>((resolve, reject) => {
    const s = fs.createWriteStream(outPath);
    png.pack().pipe(s);
    s.on('finish', () => resolve());
    s.on('error', (e) => reject(e));
  });

  console.log(`Wrote ${outPath} (${width}x${height}) after ${sched.frames} frames, ${sched.instructions} instructions, fb=${framebufferFingerprint(emu.framebuffer)}`);
}

main().catch((e) => {
  console.error('[screenshot] Unhandled error:', e);
  process.exit(1);
});
