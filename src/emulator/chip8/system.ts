/**
 * CHIP-8 System Integration
 *
 * Wires the CPU to memory, framebuffer, keypad and delay timer, and gives
 * the host a frame-oriented interface:
 *
 *   - runFrame() executes a batch of instructions, then decrements the
 *     delay timer once and presents the framebuffer. Timer rate is tied to
 *     the host's frame rate, not to instruction throughput.
 *   - keyDown()/keyUp() update the keypad. Releasing a key while the CPU
 *     is blocked on FX0A writes that key into the waiting register and
 *     resumes execution.
 *
 * A fault (unknown opcode, stack or memory error) stops the machine. Every
 * later step()/runFrame() rethrows the same fault until reset().
 */

import {
  Chip8Cpu,
  ExecutionFault,
  ExecutionState,
  RomLoadError,
  disassemble,
  disassembleAt,
  hex,
  type Instruction,
} from '@/cpu/chip8';
import { logger as rootLogger, type Logger } from '@/lib/logger';
import { resolveChip8Config, type Chip8Config, type Chip8ConfigInput } from './config';
import { Framebuffer, type RenderSurface } from './framebuffer';
import { Chip8Keypad } from './keypad';
import { Chip8Memory } from './memory';
import { Chip8Timer } from './timer';

export interface Chip8SystemOptions {
  config?: Chip8ConfigInput;
  logger?: Logger;
  /** Random byte source for CXNN; defaults to Math.random. */
  random?: () => number;
}

/** Point-in-time copy of the machine state for display. */
export interface Chip8Snapshot {
  pc: number;
  i: number;
  v: number[];
  delayTimer: number;
  stack: number[];
  state: ExecutionState;
  /** Disassembly of the instruction at PC, or null if PC is outside memory. */
  nextInstruction: string | null;
  fault: string | null;
  romName: string | null;
}

export class Chip8System {
  readonly cpu: Chip8Cpu;
  readonly memory: Chip8Memory;
  readonly display: Framebuffer;
  readonly keypad: Chip8Keypad;
  readonly timer: Chip8Timer;
  readonly config: Chip8Config;

  private readonly log: Logger;
  private rom: Uint8Array = new Uint8Array(0);
  private romName: string | null = null;
  private fault: ExecutionFault | null = null;
  private soundWarned = false;

  constructor(options: Chip8SystemOptions = {}) {
    this.config = resolveChip8Config(options.config);
    this.log = (options.logger ?? rootLogger).child({ component: 'chip8' });
    this.memory = new Chip8Memory();
    this.display = new Framebuffer(this.config.drawMode);
    this.keypad = new Chip8Keypad();
    this.timer = new Chip8Timer();
    this.cpu = new Chip8Cpu(
      {
        memory: this.memory,
        display: this.display,
        keypad: this.keypad,
        timer: this.timer,
      },
      {
        stackDepth: this.config.stackDepth,
        random: options.random,
        trace: (pc, word, instr) => this.traceInstruction(pc, word, instr),
        onSoundTimer: (value) => this.warnSound(value),
      }
    );
  }

  /** Load a program image at $200 and reset the machine to run it. */
  loadROM(data: Uint8Array, name?: string): void {
    if (data.length === 0) {
      throw new RomLoadError('ROM is empty', 0);
    }
    // Validates the size before any state is touched
    this.memory.loadROM(data);
    this.rom = data.slice();
    this.romName = name ?? null;
    this.reset();
    this.log.info({ size: data.length, rom: this.romName }, 'ROM loaded');
  }

  /** Cold reset: clears all state and reloads the current ROM image. */
  reset(): void {
    this.memory.reset();
    if (this.rom.length > 0) {
      this.memory.loadROM(this.rom);
    }
    this.display.clear();
    this.keypad.reset();
    this.timer.reset();
    this.cpu.reset();
    this.fault = null;
    this.soundWarned = false;
    this.log.info({ rom: this.romName }, 'reset');
  }

  /** Execute one instruction. Returns false while waiting for a key. */
  step(): boolean {
    if (this.fault) throw this.fault;
    try {
      return this.cpu.step();
    } catch (error) {
      if (error instanceof ExecutionFault) {
        this.fault = error;
      }
      throw error;
    }
  }

  /**
   * One host tick: up to instructionsPerFrame instructions (fewer if FX0A
   * suspends execution), one delay timer decrement, then present.
   * Returns the number of instructions executed.
   */
  runFrame(surface?: RenderSurface): number {
    if (this.fault) throw this.fault;

    let executed = 0;
    while (executed < this.config.instructionsPerFrame && this.step()) {
      executed++;
    }

    this.timer.tick();
    surface?.present(this.display);
    return executed;
  }

  /** Press a key (0-F). */
  keyDown(key: number): void {
    this.keypad.keyDown(key);
  }

  /** Release a key (0-F). Completes a pending FX0A key-wait. */
  keyUp(key: number): void {
    this.keypad.keyUp(key);
    if (Chip8Keypad.isKey(key) && this.cpu.resumeWithKey(key)) {
      this.log.debug({ key, register: this.cpu.registers.wakeRegister }, 'key-wait resumed');
    }
  }

  getPC(): number {
    return this.cpu.getPC();
  }

  isWaitingForKey(): boolean {
    return this.cpu.state === ExecutionState.WaitingForKey;
  }

  getFault(): ExecutionFault | null {
    return this.fault;
  }

  getRomName(): string | null {
    return this.romName;
  }

  getState(): Chip8Snapshot {
    const cpuState = this.cpu.getState();
    return {
      pc: cpuState.pc,
      i: cpuState.i,
      v: cpuState.v,
      delayTimer: this.timer.value,
      stack: cpuState.stack,
      state: cpuState.state,
      nextInstruction: this.peekInstruction(cpuState.pc),
      fault: this.fault?.message ?? null,
      romName: this.romName,
    };
  }

  private peekInstruction(pc: number): string | null {
    if (!Chip8Memory.inRange(pc) || !Chip8Memory.inRange(pc + 1)) return null;
    return disassembleAt(this.memory, pc);
  }

  private traceInstruction(pc: number, word: number, instr: Instruction): void {
    if (this.log.isLevelEnabled('trace')) {
      this.log.trace({ pc: hex(pc, 3), opcode: hex(word, 4) }, disassemble(instr));
    }
    switch (instr.op) {
      case 'Call':
        this.log.debug({ pc: hex(pc, 3), target: hex(instr.addr, 3), depth: this.cpu.stack.depth }, 'call');
        break;
      case 'Return':
        this.log.debug({ pc: hex(pc, 3), depth: this.cpu.stack.depth }, 'return');
        break;
      case 'WaitForKey':
        this.log.debug({ register: instr.x }, 'waiting for key');
        break;
    }
  }

  private warnSound(value: number): void {
    if (this.soundWarned) return;
    this.soundWarned = true;
    this.log.warn({ value }, 'sound timer (FX18) is not implemented');
  }
}
