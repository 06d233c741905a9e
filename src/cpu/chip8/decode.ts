/**
 * CHIP-8 instruction decoder and disassembler.
 *
 * Instruction words are 16-bit big-endian. The top nibble selects the
 * instruction family; families 0, 8, E and F are further split on their
 * low nibble or low byte:
 *
 *   0x0NNN  00E0 CLS, 00EE RET
 *   0x8XYN  N selects the ALU operation
 *   0xEXNN  NN = 9E / A1 key skips
 *   0xFXNN  NN selects timer, key-wait, index and memory operations
 */

import { UnknownInstructionError } from './errors';
import { hex } from './format';
import type { Instruction, Memory } from './types';

function decodeAlu(word: number, x: number, y: number): Instruction {
  switch (word & 0xf) {
    case 0x0: return { op: 'Move', x, y };
    case 0x1: return { op: 'Or', x, y };
    case 0x2: return { op: 'And', x, y };
    case 0x3: return { op: 'Xor', x, y };
    case 0x4: return { op: 'AddRegister', x, y };
    case 0x5: return { op: 'Subtract', x, y };
    case 0x6: return { op: 'ShiftRight', x, y };
    case 0x7: return { op: 'SubtractReverse', x, y };
    case 0xe: return { op: 'ShiftLeft', x, y };
    default:
      throw new UnknownInstructionError(word);
  }
}

function decodeMisc(word: number, x: number): Instruction {
  switch (word & 0xff) {
    case 0x07: return { op: 'ReadDelayTimer', x };
    case 0x0a: return { op: 'WaitForKey', x };
    case 0x15: return { op: 'SetDelayTimer', x };
    case 0x18: return { op: 'SetSoundTimer', x };
    case 0x1e: return { op: 'AddToIndex', x };
    case 0x29: return { op: 'LoadFontGlyph', x };
    case 0x33: return { op: 'StoreBcd', x };
    case 0x55: return { op: 'StoreRegisters', x };
    case 0x65: return { op: 'LoadRegisters', x };
    default:
      throw new UnknownInstructionError(word);
  }
}

/** Decode an instruction word. Throws UnknownInstructionError for unmatched patterns. */
export function decode(word: number): Instruction {
  word &= 0xffff;
  const x = (word >> 8) & 0xf;
  const y = (word >> 4) & 0xf;
  const n = word & 0xf;
  const nn = word & 0xff;
  const addr = word & 0xfff;

  switch (word >> 12) {
    case 0x0:
      if (word === 0x00e0) return { op: 'ClearScreen' };
      if (word === 0x00ee) return { op: 'Return' };
      throw new UnknownInstructionError(word);
    case 0x1: return { op: 'Jump', addr };
    case 0x2: return { op: 'Call', addr };
    case 0x3: return { op: 'SkipIfEqualImmediate', x, nn };
    case 0x4: return { op: 'SkipIfNotEqualImmediate', x, nn };
    case 0x5:
      if (n !== 0) throw new UnknownInstructionError(word);
      return { op: 'SkipIfEqualRegister', x, y };
    case 0x6: return { op: 'LoadImmediate', x, nn };
    case 0x7: return { op: 'AddImmediate', x, nn };
    case 0x8: return decodeAlu(word, x, y);
    case 0x9:
      if (n !== 0) throw new UnknownInstructionError(word);
      return { op: 'SkipIfNotEqualRegister', x, y };
    case 0xa: return { op: 'LoadIndex', addr };
    case 0xb: return { op: 'JumpOffset', addr };
    case 0xc: return { op: 'Random', x, nn };
    case 0xd: return { op: 'Draw', x, y, n };
    case 0xe:
      if (nn === 0x9e) return { op: 'SkipIfKeyPressed', x };
      if (nn === 0xa1) return { op: 'SkipIfKeyNotPressed', x };
      throw new UnknownInstructionError(word);
    case 0xf: return decodeMisc(word, x);
    default:
      throw new UnknownInstructionError(word);
  }
}

function reg(index: number): string {
  return `V${index.toString(16).toUpperCase()}`;
}

/** Render an instruction in conventional CHIP-8 assembler notation. */
export function disassemble(instr: Instruction): string {
  switch (instr.op) {
    case 'ClearScreen': return 'CLS';
    case 'Return': return 'RET';
    case 'Jump': return `JP ${hex(instr.addr, 3)}`;
    case 'Call': return `CALL ${hex(instr.addr, 3)}`;
    case 'SkipIfEqualImmediate': return `SE ${reg(instr.x)}, ${hex(instr.nn, 2)}`;
    case 'SkipIfNotEqualImmediate': return `SNE ${reg(instr.x)}, ${hex(instr.nn, 2)}`;
    case 'SkipIfEqualRegister': return `SE ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'LoadImmediate': return `LD ${reg(instr.x)}, ${hex(instr.nn, 2)}`;
    case 'AddImmediate': return `ADD ${reg(instr.x)}, ${hex(instr.nn, 2)}`;
    case 'Move': return `LD ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'Or': return `OR ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'And': return `AND ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'Xor': return `XOR ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'AddRegister': return `ADD ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'Subtract': return `SUB ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'ShiftRight': return `SHR ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'SubtractReverse': return `SUBN ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'ShiftLeft': return `SHL ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'SkipIfNotEqualRegister': return `SNE ${reg(instr.x)}, ${reg(instr.y)}`;
    case 'LoadIndex': return `LD I, ${hex(instr.addr, 3)}`;
    case 'JumpOffset': return `JP V0, ${hex(instr.addr, 3)}`;
    case 'Random': return `RND ${reg(instr.x)}, ${hex(instr.nn, 2)}`;
    case 'Draw': return `DRW ${reg(instr.x)}, ${reg(instr.y)}, ${instr.n}`;
    case 'SkipIfKeyPressed': return `SKP ${reg(instr.x)}`;
    case 'SkipIfKeyNotPressed': return `SKNP ${reg(instr.x)}`;
    case 'ReadDelayTimer': return `LD ${reg(instr.x)}, DT`;
    case 'WaitForKey': return `LD ${reg(instr.x)}, K`;
    case 'SetDelayTimer': return `LD DT, ${reg(instr.x)}`;
    case 'SetSoundTimer': return `LD ST, ${reg(instr.x)}`;
    case 'AddToIndex': return `ADD I, ${reg(instr.x)}`;
    case 'LoadFontGlyph': return `LD F, ${reg(instr.x)}`;
    case 'StoreBcd': return `LD B, ${reg(instr.x)}`;
    case 'StoreRegisters': return `LD [I], ${reg(instr.x)}`;
    case 'LoadRegisters': return `LD ${reg(instr.x)}, [I]`;
  }
}

/** Read the big-endian instruction word at an address. */
export function readWord(memory: Memory, address: number): number {
  return (memory.read(address) << 8) | memory.read(address + 1);
}

/**
 * Disassemble the word at an address. Words that are not instructions are
 * shown as data (`DW 0x1234`).
 */
export function disassembleAt(memory: Memory, address: number): string {
  const word = readWord(memory, address);
  try {
    return disassemble(decode(word));
  } catch (error) {
    if (error instanceof UnknownInstructionError) {
      return `DW ${hex(word, 4)}`;
    }
    throw error;
  }
}
