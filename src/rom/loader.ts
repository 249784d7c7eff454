import fs from 'node:fs';
import { RomLoadError } from '../emulator/errors';
import { MAX_ROM_SIZE } from '../emulator/constants';

// Checks a raw image fits the program area (0x200-0xFFF).
export function validateRom(rom: Uint8Array, path = '<memory>'): Uint8Array {
  if (rom.length === 0) throw new RomLoadError(path, 'ROM is empty');
  if (rom.length > MAX_ROM_SIZE) {
    throw new RomLoadError(path, `ROM is ${rom.length} bytes; at most ${MAX_ROM_SIZE} fit above 0x200`);
  }
  return rom;
}

export function loadRomFile(path: string): Uint8Array {
  let raw: Buffer;
  try {
    raw = fs.readFileSync(path);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new RomLoadError(path, `cannot read file: ${reason}`, { cause: e });
  }
  return validateRom(new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength), path);
}
