/**
 * CHIP-8 Software Catalog — built-in demo programs
 */

import { HEX_DIGITS_ROM, KEY_ECHO_ROM } from './roms/demos';

export type Chip8SoftwareCategory = 'demo' | 'utility';

export interface Chip8SoftwareEntry {
  id: string;
  name: string;
  description: string;
  category: Chip8SoftwareCategory;
  /** Program image, loaded at $200. */
  data: Uint8Array;
  sizeBytes: number;
  /** How to interact with the program, shown next to the keypad. */
  controls?: string;
}

export const CHIP8_SOFTWARE_CATALOG: Chip8SoftwareEntry[] = [
  {
    id: 'hex-digits',
    name: 'HEX DIGITS',
    description: 'Draws the sixteen built-in font glyphs, 0-7 on the first row and 8-F on the second.',
    category: 'demo',
    data: HEX_DIGITS_ROM,
    sizeBytes: HEX_DIGITS_ROM.length,
  },
  {
    id: 'key-echo',
    name: 'KEY ECHO',
    description:
      'Waits for a key, then shows the key that was released together with a running count of presses.',
    category: 'utility',
    data: KEY_ECHO_ROM,
    sizeBytes: KEY_ECHO_ROM.length,
    controls: 'Press and release any key 0-F. The key registers on release.',
  },
];

export function findSoftware(id: string): Chip8SoftwareEntry | undefined {
  return CHIP8_SOFTWARE_CATALOG.find((entry) => entry.id === id);
}
