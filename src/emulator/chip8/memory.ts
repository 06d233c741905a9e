/**
 * CHIP-8 Memory — 4K flat address space
 *
 *   $000-$04F  Hex digit font (16 glyphs × 5 bytes)
 *   $050-$1FF  Unused (interpreter area on the original hardware)
 *   $200-$FFF  Program ROM and working RAM
 *
 * Every address outside $000-$FFF is a fatal MemoryAccessError; nothing
 * is masked or mirrored.
 */

import {
  FONT_ADDRESS,
  MEMORY_SIZE,
  MemoryAccessError,
  PROGRAM_START,
  RomLoadError,
  type Memory,
} from '@/cpu/chip8';
import fontData from './roms/font.json';

/** Largest program that fits between PROGRAM_START and the top of memory. */
export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START;

/** The 80-byte hex digit font, glyph 0 first. */
export const FONT: Uint8Array = Uint8Array.from(fontData.glyphs.flat());

export class Chip8Memory implements Memory {
  private readonly data = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.loadFont();
  }

  static inRange(address: number): boolean {
    return Number.isInteger(address) && address >= 0 && address < MEMORY_SIZE;
  }

  read(address: number): number {
    if (!Chip8Memory.inRange(address)) {
      throw new MemoryAccessError(address);
    }
    return this.data[address];
  }

  write(address: number, value: number): void {
    if (!Chip8Memory.inRange(address)) {
      throw new MemoryAccessError(address);
    }
    this.data[address] = value & 0xff;
  }

  /**
   * Copy a program image to $200. Accepts up to MAX_ROM_SIZE bytes; the
   * rest of program memory is cleared so a smaller ROM leaves no stale code.
   */
  loadROM(rom: Uint8Array): void {
    if (rom.length > MAX_ROM_SIZE) {
      throw new RomLoadError(`ROM too large (${rom.length} bytes, max ${MAX_ROM_SIZE})`, rom.length);
    }
    this.data.fill(0, PROGRAM_START);
    this.data.set(rom, PROGRAM_START);
  }

  /** Zero all memory and restore the font. */
  reset(): void {
    this.data.fill(0);
    this.loadFont();
  }

  /** Copy of a memory range for inspection. */
  slice(start: number, end: number): Uint8Array {
    return this.data.slice(start, end);
  }

  private loadFont(): void {
    this.data.set(FONT, FONT_ADDRESS);
  }
}
