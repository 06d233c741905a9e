export interface Memory {
  read(address: number): number;
  write(address: number, value: number): void;
}

/** The drawing surface as seen by the CLS and DRW instructions. */
export interface Display {
  clear(): void;
  /** Draw sprite rows at (x, y). Returns the value VF receives. */
  drawSprite(x: number, y: number, rows: Uint8Array): boolean;
}

export interface KeypadState {
  isPressed(key: number): boolean;
}

export interface DelayTimer {
  value: number;
}

/** Collaborators the CPU reads and writes besides its own registers. */
export interface Chip8Bus {
  memory: Memory;
  display: Display;
  keypad: KeypadState;
  timer: DelayTimer;
}

export enum ExecutionState {
  Running = 'running',
  WaitingForKey = 'waiting-for-key',
}

/** Address programs are loaded at and execution starts from. */
export const PROGRAM_START = 0x200;

/** Size of the addressable memory. */
export const MEMORY_SIZE = 0x1000;

/** Address of the first font glyph. */
export const FONT_ADDRESS = 0x000;

/** Bytes per hex-digit font glyph. */
export const GLYPH_BYTES = 5;

/** Index of the flag register VF. */
export const VF = 0xf;

export interface CpuState {
  pc: number;
  i: number;
  v: number[];
  stack: number[];
  state: ExecutionState;
  wakeRegister: number;
}

/**
 * Decoded instruction — one variant per opcode pattern.
 *
 * Field names follow the usual CHIP-8 notation: `x`/`y` register nibbles,
 * `nn` an 8-bit immediate, `n` a 4-bit immediate and `addr` a 12-bit address.
 */
export type Instruction =
  | { op: 'ClearScreen' }
  | { op: 'Return' }
  | { op: 'Jump'; addr: number }
  | { op: 'Call'; addr: number }
  | { op: 'SkipIfEqualImmediate'; x: number; nn: number }
  | { op: 'SkipIfNotEqualImmediate'; x: number; nn: number }
  | { op: 'SkipIfEqualRegister'; x: number; y: number }
  | { op: 'LoadImmediate'; x: number; nn: number }
  | { op: 'AddImmediate'; x: number; nn: number }
  | { op: 'Move'; x: number; y: number }
  | { op: 'Or'; x: number; y: number }
  | { op: 'And'; x: number; y: number }
  | { op: 'Xor'; x: number; y: number }
  | { op: 'AddRegister'; x: number; y: number }
  | { op: 'Subtract'; x: number; y: number }
  | { op: 'ShiftRight'; x: number; y: number }
  | { op: 'SubtractReverse'; x: number; y: number }
  | { op: 'ShiftLeft'; x: number; y: number }
  | { op: 'SkipIfNotEqualRegister'; x: number; y: number }
  | { op: 'LoadIndex'; addr: number }
  | { op: 'JumpOffset'; addr: number }
  | { op: 'Random'; x: number; nn: number }
  | { op: 'Draw'; x: number; y: number; n: number }
  | { op: 'SkipIfKeyPressed'; x: number }
  | { op: 'SkipIfKeyNotPressed'; x: number }
  | { op: 'ReadDelayTimer'; x: number }
  | { op: 'WaitForKey'; x: number }
  | { op: 'SetDelayTimer'; x: number }
  | { op: 'SetSoundTimer'; x: number }
  | { op: 'AddToIndex'; x: number }
  | { op: 'LoadFontGlyph'; x: number }
  | { op: 'StoreBcd'; x: number }
  | { op: 'StoreRegisters'; x: number }
  | { op: 'LoadRegisters'; x: number };

export type Opcode = Instruction['op'];
