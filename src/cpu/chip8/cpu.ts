import {
  type Chip8Bus,
  type CpuState,
  type Instruction,
  ExecutionState,
  PROGRAM_START,
} from './types';
import { CallStack, DEFAULT_STACK_DEPTH } from './call-stack';
import { Registers } from './registers';
import { decode } from './decode';
import { execute } from './opcodes';
import { Chip8Error, ExecutionFault } from './errors';

/** Called before each instruction executes. */
export type TraceCallback = (pc: number, word: number, instr: Instruction) => void;

export interface Chip8CpuOptions {
  /** Call stack capacity. */
  stackDepth?: number;
  /** Source of random bytes for CXNN (0-255). */
  random?: () => number;
  trace?: TraceCallback;
  /** Receives the value written by FX18; there is no sound channel. */
  onSoundTimer?: (value: number) => void;
}

function randomByte(): number {
  return Math.floor(Math.random() * 0x100);
}

export class Chip8Cpu {
  pc = PROGRAM_START;
  state = ExecutionState.Running;

  readonly registers = new Registers();
  readonly stack: CallStack;
  readonly bus: Chip8Bus;
  readonly random: () => number;
  readonly onSoundTimer?: (value: number) => void;

  private readonly trace?: TraceCallback;

  constructor(bus: Chip8Bus, options: Chip8CpuOptions = {}) {
    this.bus = bus;
    this.stack = new CallStack(options.stackDepth ?? DEFAULT_STACK_DEPTH);
    this.random = options.random ?? randomByte;
    this.trace = options.trace;
    this.onSoundTimer = options.onSoundTimer;
  }

  // --- Memory access ---
  read(address: number): number {
    return this.bus.memory.read(address);
  }

  write(address: number, value: number): void {
    this.bus.memory.write(address, value & 0xff);
  }

  /** Read the big-endian word at PC and advance PC past it. */
  fetch(): number {
    const word = (this.read(this.pc) << 8) | this.read(this.pc + 1);
    this.pc = (this.pc + 2) & 0xffff;
    return word;
  }

  /**
   * Execute a single instruction.
   *
   * Returns false without touching any state while waiting for a key.
   * Any error raised by the fetch, decode or execute is rethrown as an
   * ExecutionFault carrying the opcode and the address it came from.
   */
  step(): boolean {
    if (this.state === ExecutionState.WaitingForKey) return false;

    const pc = this.pc;
    let word: number | null = null;
    try {
      word = this.fetch();
      const instr = decode(word);
      this.trace?.(pc, word, instr);
      execute(this, instr);
    } catch (error) {
      if (error instanceof Chip8Error) {
        throw new ExecutionFault(error, word, pc);
      }
      throw error;
    }
    return true;
  }

  /**
   * Complete a pending key-wait: the released key is written to the
   * register FX0A named and execution resumes after the FX0A.
   */
  resumeWithKey(key: number): boolean {
    if (this.state !== ExecutionState.WaitingForKey) return false;
    this.registers.set(this.registers.wakeRegister, key);
    this.state = ExecutionState.Running;
    return true;
  }

  reset(): void {
    this.registers.reset();
    this.stack.clear();
    this.pc = PROGRAM_START;
    this.state = ExecutionState.Running;
  }

  getPC(): number {
    return this.pc;
  }

  getState(): CpuState {
    return {
      pc: this.pc,
      i: this.registers.i,
      v: this.registers.toArray(),
      stack: this.stack.toArray(),
      state: this.state,
      wakeRegister: this.registers.wakeRegister,
    };
  }
}
