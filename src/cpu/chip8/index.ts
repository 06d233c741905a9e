export { Chip8Cpu } from './cpu';
export type { Chip8CpuOptions, TraceCallback } from './cpu';
export { CallStack, DEFAULT_STACK_DEPTH } from './call-stack';
export { Registers, REGISTER_COUNT } from './registers';
export { decode, disassemble, disassembleAt, readWord } from './decode';
export { hex } from './format';
export * from './errors';
export { ExecutionState, PROGRAM_START, MEMORY_SIZE, FONT_ADDRESS, GLYPH_BYTES, VF } from './types';
export type { Memory, Display, KeypadState, DelayTimer, Chip8Bus, CpuState, Instruction, Opcode } from './types';
