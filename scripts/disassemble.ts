#!/usr/bin/env tsx
import { loadRomFile } from '../src/rom/loader';
import { disassemble } from '../src/cpu/disasm';
import { PROGRAM_START } from '../src/emulator/constants';

function hex(n: number, w: number) { return (n >>> 0).toString(16).toUpperCase().padStart(w, '0'); }

function main() {
  const args = Object.fromEntries(process.argv.slice(2).map((a): [string, string] => {
    const m = a.match(/^--([^=]+)=(.*)$/); return m ? [m[1], m[2]] : [a, '1'];
  }));
  const romPath = String(args.rom || '');
  if (!romPath) { console.error('Usage: tsx scripts/disassemble.ts --rom=path.ch8'); process.exit(2); }
  const rom = loadRomFile(romPath);
  for (const line of disassemble(rom, PROGRAM_START)) {
    const raw = line.text.startsWith('DB') ? hex(line.opcode, 2).padEnd(4, ' ') : hex(line.opcode, 4);
    console.log(`${hex(line.addr, 3)}  ${raw}  ${line.text}`);
  }
}

main();
