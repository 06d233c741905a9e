/**
 * Built-in CHIP-8 demo programs, hand-assembled.
 *
 * Both load at $200 and use only the core instruction set, so they run
 * the same under either sprite rule.
 */

/**
 * HEX DIGITS — draws the sixteen font glyphs in two rows of eight
 * (0-7 at y=1, 8-F at y=8, one glyph every 8 columns) and then idles.
 */
export const HEX_DIGITS_ROM = new Uint8Array([
  0x60, 0x00, // 200: LD V0, 0x00     ; digit
  0x61, 0x01, // 202: LD V1, 0x01     ; x
  0x62, 0x01, // 204: LD V2, 0x01     ; y
  // next:
  0xf0, 0x29, // 206: LD F, V0
  0xd1, 0x25, // 208: DRW V1, V2, 5
  0x70, 0x01, // 20A: ADD V0, 0x01
  0x71, 0x08, // 20C: ADD V1, 0x08
  0x30, 0x08, // 20E: SE V0, 0x08     ; second row starts at digit 8
  0x12, 0x16, // 210: JP 0x216
  0x61, 0x01, // 212: LD V1, 0x01
  0x62, 0x08, // 214: LD V2, 0x08
  0x30, 0x10, // 216: SE V0, 0x10
  0x12, 0x06, // 218: JP next
  // idle:
  0x12, 0x1a, // 21A: JP idle
]);

/** Address of the idle loop HEX DIGITS ends in. */
export const HEX_DIGITS_IDLE = 0x21a;

/**
 * KEY ECHO — waits for a key, then shows the released key at the top left
 * and a three-digit count of presses (BCD via FX33/FX65) to its right.
 */
export const KEY_ECHO_ROM = new Uint8Array([
  0x63, 0x00, // 200: LD V3, 0x00     ; press counter
  // wait:
  0xf0, 0x0a, // 202: LD V0, K
  0x00, 0xe0, // 204: CLS
  0x73, 0x01, // 206: ADD V3, 0x01
  0xf0, 0x29, // 208: LD F, V0
  0x61, 0x01, // 20A: LD V1, 0x01
  0x62, 0x01, // 20C: LD V2, 0x01
  0xd1, 0x25, // 20E: DRW V1, V2, 5   ; the key
  0xa3, 0x00, // 210: LD I, 0x300
  0xf3, 0x33, // 212: LD B, V3
  0xf2, 0x65, // 214: LD V2, [I]      ; V0-V2 = hundreds, tens, ones
  0x64, 0x14, // 216: LD V4, 0x14
  0x65, 0x01, // 218: LD V5, 0x01
  0xf0, 0x29, // 21A: LD F, V0
  0xd4, 0x55, // 21C: DRW V4, V5, 5
  0x74, 0x05, // 21E: ADD V4, 0x05
  0xf1, 0x29, // 220: LD F, V1
  0xd4, 0x55, // 222: DRW V4, V5, 5
  0x74, 0x05, // 224: ADD V4, 0x05
  0xf2, 0x29, // 226: LD F, V2
  0xd4, 0x55, // 228: DRW V4, V5, 5
  0x12, 0x02, // 22A: JP wait
]);
