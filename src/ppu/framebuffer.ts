import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '../emulator/constants';

// Read-only access handed to renderers between cycles.
export interface FramebufferView {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): boolean;
  snapshot(): boolean[][]; // fresh rows[y][x] copy
  bytes(): Uint8Array;
}

// 64x32 monochrome display, one byte per pixel, row-major.
export class Framebuffer implements FramebufferView {
  readonly width = DISPLAY_WIDTH;
  readonly height = DISPLAY_HEIGHT;
  private pixels = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);

  clear(): void {
    this.pixels.fill(0);
  }

  getPixel(x: number, y: number): boolean {
    return this.pixels[y * this.width + x] !== 0;
  }

  setPixel(x: number, y: number, on: boolean): void {
    this.pixels[y * this.width + x] = on ? 1 : 0;
  }

  // XOR a lit sprite bit into (x, y); returns true when a lit pixel was turned off.
  xorPixel(x: number, y: number): boolean {
    const i = y * this.width + x;
    const was = this.pixels[i];
    this.pixels[i] = was ^ 1;
    return was !== 0;
  }

  litCount(): number {
    let c = 0;
    for (let i = 0; i < this.pixels.length; i++) if (this.pixels[i] !== 0) c++;
    return c;
  }

  // Raw bytes (0/1) for hashing; a copy, not the live buffer.
  bytes(): Uint8Array {
    return this.pixels.slice();
  }

  snapshot(): boolean[][] {
    const rows: boolean[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: boolean[] = new Array(this.width);
      for (let x = 0; x < this.width; x++) row[x] = this.pixels[y * this.width + x] !== 0;
      rows.push(row);
    }
    return rows;
  }
}
