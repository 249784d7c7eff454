import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadRomFile, validateRom } from '../../src/rom/loader';
import { RomLoadError } from '../../src/emulator/errors';

let dir = '';

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chip8-rom-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('ROM loading', () => {
  it('reads a program image from disk', () => {
    const p = path.join(dir, 'ok.ch8');
    fs.writeFileSync(p, Buffer.from([0x00, 0xe0, 0x12, 0x00]));
    expect(Array.from(loadRomFile(p))).toEqual([0x00, 0xe0, 0x12, 0x00]);
  });

  it('rejects an empty file', () => {
    const p = path.join(dir, 'empty.ch8');
    fs.writeFileSync(p, Buffer.alloc(0));
    expect(() => loadRomFile(p)).toThrow(`${p}: ROM is empty`);
  });

  it('rejects images that do not fit above 0x200', () => {
    expect(() => validateRom(new Uint8Array(3585))).toThrow('<memory>: ROM is 3585 bytes; at most 3584 fit above 0x200');
    expect(validateRom(new Uint8Array(3584)).length).toBe(3584);
  });

  it('wraps read failures with the cause attached', () => {
    const p = path.join(dir, 'missing.ch8');
    let err: unknown;
    try {
      loadRomFile(p);
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(RomLoadError);
    if (!(err instanceof RomLoadError)) return;
    expect(err.path).toBe(p);
    expect(err.message).toContain('cannot read file:');
    expect(err.cause).toBeInstanceOf(Error);
  });
});
