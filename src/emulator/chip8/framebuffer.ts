/**
 * CHIP-8 Framebuffer — 64×32 monochrome pixel grid
 *
 * Pixels are addressed by (x, y) with x to the right and y down. Both
 * coordinates wrap: x = 64 is column 0 again, y = -1 is row 31. Wrapping
 * applies to every pixel a sprite touches, so a sprite drawn near an edge
 * continues on the opposite side rather than being clipped.
 *
 * Two sprite rules are supported:
 *
 *   "set"  a sprite bit turns an off pixel on and leaves an on pixel on.
 *          The draw reports true if any pixel was newly turned on.
 *   "xor"  a sprite bit toggles the pixel (the COSMAC VIP rule).
 *          The draw reports true if any pixel was turned off.
 */

import type { Display } from '@/cpu/chip8';

export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

export type DrawMode = 'set' | 'xor';

/** Read-only view of the pixel grid handed to renderers. */
export interface PixelGrid {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): boolean;
}

/** Host-side presenter, called once per frame with the current grid. */
export interface RenderSurface {
  present(grid: PixelGrid): void;
}

/** Characters used by the text rendering. */
export const PIXEL_ON = '█';
export const PIXEL_OFF = ' ';

function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}

export class Framebuffer implements Display, PixelGrid {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;

  private readonly pixels = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);

  constructor(readonly mode: DrawMode = 'set') {}

  getPixel(x: number, y: number): boolean {
    return this.pixels[this.offset(x, y)] !== 0;
  }

  setPixel(x: number, y: number, on: boolean): void {
    this.pixels[this.offset(x, y)] = on ? 1 : 0;
  }

  clear(): void {
    this.pixels.fill(0);
  }

  /**
   * Draw a sprite — one byte per row, most significant bit leftmost — with
   * its top-left corner at (x, y).
   */
  drawSprite(x: number, y: number, rows: Uint8Array): boolean {
    let flag = false;

    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row];
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;

        const px = x + col;
        const py = y + row;
        const wasOn = this.getPixel(px, py);

        if (this.mode === 'xor') {
          this.setPixel(px, py, !wasOn);
          if (wasOn) flag = true;
        } else if (!wasOn) {
          this.setPixel(px, py, true);
          flag = true;
        }
      }
    }

    return flag;
  }

  /** Number of pixels currently on. */
  countLit(): number {
    let lit = 0;
    for (const pixel of this.pixels) lit += pixel;
    return lit;
  }

  private offset(x: number, y: number): number {
    return wrap(y, SCREEN_HEIGHT) * SCREEN_WIDTH + wrap(x, SCREEN_WIDTH);
  }
}

/** Render any pixel grid as text rows (PIXEL_ON / PIXEL_OFF). */
export function renderRows(grid: PixelGrid): string[] {
  const lines: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    let line = '';
    for (let x = 0; x < grid.width; x++) {
      line += grid.getPixel(x, y) ? PIXEL_ON : PIXEL_OFF;
    }
    lines.push(line);
  }
  return lines;
}
