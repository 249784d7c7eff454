import type { FramebufferView } from '../ppu/framebuffer';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

// FNV-1a 32-bit over byte values
export function fnv1a32(bytes: ArrayLike<number>, seed = FNV_OFFSET): number {
  let hash = seed >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i] & 0xff;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function toHex32(h: number): string {
  return (h >>> 0).toString(16).padStart(8, '0');
}

// Stable fingerprint of a display state: one byte (0/1) per pixel, row-major.
export function framebufferFingerprint(fb: FramebufferView): string {
  return toHex32(fnv1a32(fb.bytes()));
}
