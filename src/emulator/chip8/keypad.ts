/**
 * CHIP-8 Keypad — 16 keys, 0-F
 *
 * The COSMAC VIP hex keypad was laid out as:
 *
 *   1 2 3 C
 *   4 5 6 D
 *   7 8 9 E
 *   A 0 B F
 *
 * Physical keyboards map the characters 0-9 and A-F straight onto the
 * key with the same hex value.
 */

import type { KeypadState } from '@/cpu/chip8';

export const KEY_COUNT = 16;

/** On-screen keypad rows, top to bottom. */
export const KEYPAD_LAYOUT: readonly (readonly number[])[] = [
  [0x1, 0x2, 0x3, 0xc],
  [0x4, 0x5, 0x6, 0xd],
  [0x7, 0x8, 0x9, 0xe],
  [0xa, 0x0, 0xb, 0xf],
];

/** Map a typed character to its logical key, or null if it is not a hex digit. */
export function keyFromChar(ch: string): number | null {
  if (ch.length !== 1) return null;
  const value = parseInt(ch, 16);
  return Number.isNaN(value) ? null : value;
}

/** Format a logical key as its single hex digit. */
export function keyLabel(key: number): string {
  return key.toString(16).toUpperCase();
}

export class Chip8Keypad implements KeypadState {
  private readonly keys: boolean[] = new Array<boolean>(KEY_COUNT).fill(false);

  static isKey(key: number): boolean {
    return Number.isInteger(key) && key >= 0 && key < KEY_COUNT;
  }

  /** Keys outside 0-F are never pressed. */
  isPressed(key: number): boolean {
    return Chip8Keypad.isKey(key) && this.keys[key];
  }

  keyDown(key: number): void {
    if (Chip8Keypad.isKey(key)) this.keys[key] = true;
  }

  keyUp(key: number): void {
    if (Chip8Keypad.isKey(key)) this.keys[key] = false;
  }

  /** Currently pressed keys in ascending order. */
  pressedKeys(): number[] {
    const pressed: number[] = [];
    for (let key = 0; key < KEY_COUNT; key++) {
      if (this.keys[key]) pressed.push(key);
    }
    return pressed;
  }

  reset(): void {
    this.keys.fill(false);
  }
}
