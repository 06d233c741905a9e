import {
  ExecutionState,
  FONT_ADDRESS,
  GLYPH_BYTES,
  MEMORY_SIZE,
  VF,
  type Instruction,
} from './types';
import type { Chip8Cpu } from './cpu';

function skipIf(cpu: Chip8Cpu, condition: boolean): void {
  if (condition) {
    cpu.pc = (cpu.pc + 2) & 0xffff;
  }
}

// --- ALU ---
// The result register is written before VF, so when X is F the flag wins.

function logical(cpu: Chip8Cpu, x: number, value: number): void {
  cpu.registers.set(x, value);
  cpu.registers.set(VF, 0);
}

function addWithCarry(cpu: Chip8Cpu, x: number, y: number): void {
  const sum = cpu.registers.get(x) + cpu.registers.get(y);
  cpu.registers.set(x, sum);
  cpu.registers.set(VF, sum > 0xff ? 1 : 0);
}

// VF = 1 means no borrow
function subtract(cpu: Chip8Cpu, x: number, minuend: number, subtrahend: number): void {
  cpu.registers.set(x, minuend - subtrahend);
  cpu.registers.set(VF, subtrahend > minuend ? 0 : 1);
}

function shiftRight(cpu: Chip8Cpu, x: number, y: number): void {
  const vy = cpu.registers.get(y);
  cpu.registers.set(x, vy >> 1);
  cpu.registers.set(VF, vy & 0x01);
}

function shiftLeft(cpu: Chip8Cpu, x: number, y: number): void {
  const vy = cpu.registers.get(y);
  cpu.registers.set(x, vy << 1);
  cpu.registers.set(VF, (vy >> 7) & 0x01);
}

// --- Display ---

function draw(cpu: Chip8Cpu, x: number, y: number, n: number): void {
  const rows = new Uint8Array(n);
  for (let row = 0; row < n; row++) {
    rows[row] = cpu.read(cpu.registers.i + row);
  }
  const flag = cpu.bus.display.drawSprite(cpu.registers.get(x), cpu.registers.get(y), rows);
  cpu.registers.set(VF, flag ? 1 : 0);
}

// --- Memory ---

function storeBcd(cpu: Chip8Cpu, x: number): void {
  const value = cpu.registers.get(x);
  const i = cpu.registers.i;
  cpu.write(i, Math.floor(value / 100));
  cpu.write(i + 1, Math.floor(value / 10) % 10);
  cpu.write(i + 2, value % 10);
}

function storeRegisters(cpu: Chip8Cpu, x: number): void {
  for (let r = 0; r <= x; r++) {
    cpu.write(cpu.registers.i, cpu.registers.get(r));
    cpu.registers.i += 1;
  }
}

function loadRegisters(cpu: Chip8Cpu, x: number): void {
  for (let r = 0; r <= x; r++) {
    cpu.registers.set(r, cpu.read(cpu.registers.i));
    cpu.registers.i += 1;
  }
}

/** Apply one decoded instruction to the CPU and its bus. */
export function execute(cpu: Chip8Cpu, instr: Instruction): void {
  const regs = cpu.registers;

  switch (instr.op) {
    // --- Flow control ---
    case 'ClearScreen':
      cpu.bus.display.clear();
      return;
    case 'Return':
      cpu.pc = cpu.stack.pop();
      return;
    case 'Jump':
      cpu.pc = instr.addr;
      return;
    case 'Call':
      cpu.stack.push(cpu.pc);
      cpu.pc = instr.addr;
      return;
    case 'JumpOffset':
      cpu.pc = instr.addr + regs.get(0);
      return;

    // --- Conditional skips ---
    case 'SkipIfEqualImmediate':
      skipIf(cpu, regs.get(instr.x) === instr.nn);
      return;
    case 'SkipIfNotEqualImmediate':
      skipIf(cpu, regs.get(instr.x) !== instr.nn);
      return;
    case 'SkipIfEqualRegister':
      skipIf(cpu, regs.get(instr.x) === regs.get(instr.y));
      return;
    case 'SkipIfNotEqualRegister':
      skipIf(cpu, regs.get(instr.x) !== regs.get(instr.y));
      return;
    case 'SkipIfKeyPressed':
      skipIf(cpu, cpu.bus.keypad.isPressed(regs.get(instr.x)));
      return;
    case 'SkipIfKeyNotPressed':
      skipIf(cpu, !cpu.bus.keypad.isPressed(regs.get(instr.x)));
      return;

    // --- Register loads and arithmetic ---
    case 'LoadImmediate':
      regs.set(instr.x, instr.nn);
      return;
    case 'AddImmediate':
      regs.set(instr.x, regs.get(instr.x) + instr.nn);
      return;
    case 'Move':
      regs.set(instr.x, regs.get(instr.y));
      return;
    case 'Or':
      logical(cpu, instr.x, regs.get(instr.x) | regs.get(instr.y));
      return;
    case 'And':
      logical(cpu, instr.x, regs.get(instr.x) & regs.get(instr.y));
      return;
    case 'Xor':
      logical(cpu, instr.x, regs.get(instr.x) ^ regs.get(instr.y));
      return;
    case 'AddRegister':
      addWithCarry(cpu, instr.x, instr.y);
      return;
    case 'Subtract':
      subtract(cpu, instr.x, regs.get(instr.x), regs.get(instr.y));
      return;
    case 'SubtractReverse':
      subtract(cpu, instr.x, regs.get(instr.y), regs.get(instr.x));
      return;
    case 'ShiftRight':
      shiftRight(cpu, instr.x, instr.y);
      return;
    case 'ShiftLeft':
      shiftLeft(cpu, instr.x, instr.y);
      return;
    case 'Random':
      regs.set(instr.x, cpu.random() & instr.nn);
      return;

    // --- Index register ---
    case 'LoadIndex':
      regs.i = instr.addr;
      return;
    case 'AddToIndex':
      regs.i += regs.get(instr.x);
      return;
    case 'LoadFontGlyph':
      regs.i = (FONT_ADDRESS + regs.get(instr.x) * GLYPH_BYTES) % MEMORY_SIZE;
      return;

    // --- Display ---
    case 'Draw':
      draw(cpu, instr.x, instr.y, instr.n);
      return;

    // --- Timers and keys ---
    case 'ReadDelayTimer':
      regs.set(instr.x, cpu.bus.timer.value);
      return;
    case 'SetDelayTimer':
      cpu.bus.timer.value = regs.get(instr.x);
      return;
    case 'SetSoundTimer':
      // No sound channel; the value is only reported
      cpu.onSoundTimer?.(regs.get(instr.x));
      return;
    case 'WaitForKey':
      regs.wakeRegister = instr.x;
      cpu.state = ExecutionState.WaitingForKey;
      return;

    // --- Memory ---
    case 'StoreBcd':
      storeBcd(cpu, instr.x);
      return;
    case 'StoreRegisters':
      storeRegisters(cpu, instr.x);
      return;
    case 'LoadRegisters':
      loadRegisters(cpu, instr.x);
      return;
  }
}
