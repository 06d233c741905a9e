/**
 * CHIP-8 error types.
 *
 * Every fatal condition the virtual machine can hit is a Chip8Error with a
 * stable `code`. Errors raised while executing a single instruction are
 * wrapped in an ExecutionFault that records the opcode word and the address
 * it was fetched from, so the host can show where the program died.
 */

import { hex } from './format';

export class Chip8Error extends Error {
  /** Error code for programmatic handling. */
  readonly code: string;
  /** Additional context about the error. */
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'Chip8Error';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** The decoder found no handler for an instruction word. */
export class UnknownInstructionError extends Chip8Error {
  readonly opcode: number;

  constructor(opcode: number) {
    super(`Unknown instruction ${hex(opcode, 4)}`, 'UNKNOWN_INSTRUCTION', { opcode });
    this.name = 'UnknownInstructionError';
    this.opcode = opcode;
  }
}

/** A subroutine call would exceed the call stack's capacity. */
export class StackOverflowError extends Chip8Error {
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Call stack overflow (capacity ${capacity})`, 'STACK_OVERFLOW', { capacity });
    this.name = 'StackOverflowError';
    this.capacity = capacity;
  }
}

/** A return was executed with no pending call. */
export class StackUnderflowError extends Chip8Error {
  constructor() {
    super('Return with empty call stack', 'STACK_UNDERFLOW');
    this.name = 'StackUnderflowError';
  }
}

/** An address outside the 4K address space was read or written. */
export class MemoryAccessError extends Chip8Error {
  readonly address: number;

  constructor(address: number) {
    super(`Memory address ${hex(address, 4)} out of range`, 'MEMORY_OUT_OF_RANGE', { address });
    this.name = 'MemoryAccessError';
    this.address = address;
  }
}

/** A program image could not be loaded. */
export class RomLoadError extends Chip8Error {
  readonly size?: number;

  constructor(message: string, size?: number) {
    super(message, 'ROM_LOAD_ERROR', { size });
    this.name = 'RomLoadError';
    if (size !== undefined) {
      this.size = size;
    }
  }
}

/** Emulator settings failed validation. */
export class ConfigurationError extends Chip8Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG_ERROR', {
      issues,
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

function faultLocation(opcode: number | null, pc: number): string {
  return opcode === null ? `at ${hex(pc, 3)}` : `opcode ${hex(opcode, 4)} at ${hex(pc, 3)}`;
}

/**
 * A fatal error raised while executing one instruction.
 * Execution cannot continue past it; the host must reset the machine.
 */
export class ExecutionFault extends Chip8Error {
  /** The underlying error (unknown opcode, stack or memory fault). */
  readonly reason: Chip8Error;
  /** The instruction word being executed, or null when the fetch itself failed. */
  readonly opcode: number | null;
  /** Address the instruction was fetched from. */
  readonly pc: number;

  constructor(reason: Chip8Error, opcode: number | null, pc: number) {
    super(`${reason.message} (${faultLocation(opcode, pc)})`, 'EXECUTION_FAULT', {
      reason: reason.code,
      opcode,
      pc,
    });
    this.name = 'ExecutionFault';
    this.reason = reason;
    this.opcode = opcode;
    this.pc = pc;
  }
}

export function isChip8Error(error: unknown): error is Chip8Error {
  return error instanceof Chip8Error;
}

/** Gets a displayable message from any thrown value. */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
