import type { FramebufferView } from './framebuffer';

export type RGBA = readonly [number, number, number, number];

export interface RenderOptions {
  scale?: number; // integer pixel magnification, default 1
  on?: RGBA;      // lit pixel colour
  off?: RGBA;     // unlit pixel colour
}

const WHITE: RGBA = [0xff, 0xff, 0xff, 0xff];
const BLACK: RGBA = [0x00, 0x00, 0x00, 0xff];

// Expand the monochrome framebuffer into an RGBA8 image of (width*scale) x (height*scale).
export function renderFramebufferRGBA(fb: FramebufferView, opts: RenderOptions = {}): { width: number; height: number; rgba: Uint8Array } {
  const scale = Math.max(1, Math.floor(opts.scale ?? 1));
  const on = opts.on ?? WHITE;
  const off = opts.off ?? BLACK;
  const width = fb.width * scale;
  const height = fb.height * scale;
  const rgba = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    const sy = Math.floor(y / scale);
    for (let x = 0; x < width; x++) {
      const c = fb.getPixel(Math.floor(x / scale), sy) ? on : off;
      const o = (y * width + x) * 4;
      rgba[o] = c[0];
      rgba[o + 1] = c[1];
      rgba[o + 2] = c[2];
      rgba[o + 3] = c[3];
    }
  }
  return { width, height, rgba };
}
