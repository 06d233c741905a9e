import { describe, it, expect, vi } from 'vitest';
import { createCpu, run } from './cpu-test-harness';
import {
  ExecutionFault,
  MemoryAccessError,
  StackOverflowError,
  StackUnderflowError,
  UnknownInstructionError,
} from '../errors';
import { ExecutionState, VF } from '../types';

describe('Chip8Cpu', () => {
  describe('initialization', () => {
    it('should start at $200 in the running state', () => {
      const { cpu } = createCpu();
      expect(cpu.getPC()).toBe(0x200);
      expect(cpu.state).toBe(ExecutionState.Running);
      expect(cpu.registers.toArray()).toEqual(new Array(16).fill(0));
      expect(cpu.registers.i).toBe(0);
      expect(cpu.stack.depth).toBe(0);
    });

    it('should advance PC by 2 per instruction', () => {
      const { cpu } = createCpu([0x6001, 0x6102]);
      expect(cpu.step()).toBe(true);
      expect(cpu.getPC()).toBe(0x202);
      cpu.step();
      expect(cpu.getPC()).toBe(0x204);
    });
  });

  describe('flow control', () => {
    it('1NNN jumps', () => {
      const { cpu } = createCpu([0x1300]);
      cpu.step();
      expect(cpu.getPC()).toBe(0x300);
    });

    it('2NNN pushes the return address and 00EE pops it', () => {
      const { cpu, memory } = createCpu([0x2300]);
      memory.loadWords(0x300, [0x00ee]);

      cpu.step();
      expect(cpu.getPC()).toBe(0x300);
      expect(cpu.stack.toArray()).toEqual([0x202]);

      cpu.step();
      expect(cpu.getPC()).toBe(0x202);
      expect(cpu.stack.depth).toBe(0);
    });

    it('BNNN jumps to NNN plus V0', () => {
      const { cpu } = createCpu([0x6004, 0xb300]);
      run(cpu, 2);
      expect(cpu.getPC()).toBe(0x304);
    });

    it('00E0 clears the display', () => {
      const { cpu, display } = createCpu([0x00e0]);
      cpu.step();
      expect(display.clears).toBe(1);
    });
  });

  describe('conditional skips', () => {
    it('3XNN skips when VX equals NN', () => {
      const { cpu } = createCpu([0x6005, 0x3005]);
      run(cpu, 2);
      expect(cpu.getPC()).toBe(0x206);
    });

    it('3XNN does not skip when VX differs', () => {
      const { cpu } = createCpu([0x6005, 0x3006]);
      run(cpu, 2);
      expect(cpu.getPC()).toBe(0x204);
    });

    it('4XNN skips when VX differs from NN', () => {
      const { cpu } = createCpu([0x6005, 0x4006]);
      run(cpu, 2);
      expect(cpu.getPC()).toBe(0x206);
    });

    it('5XY0 skips when VX equals VY', () => {
      const { cpu } = createCpu([0x6007, 0x6107, 0x5010]);
      run(cpu, 3);
      expect(cpu.getPC()).toBe(0x208);
    });

    it('9XY0 skips when VX differs from VY', () => {
      const { cpu } = createCpu([0x6007, 0x6108, 0x9010]);
      run(cpu, 3);
      expect(cpu.getPC()).toBe(0x208);
    });

    it('EX9E skips when the key in VX is pressed', () => {
      const { cpu, keypad } = createCpu([0x6a0b, 0xea9e]);
      keypad.pressed.add(0xb);
      run(cpu, 2);
      expect(cpu.getPC()).toBe(0x206);
    });

    it('EXA1 skips when the key in VX is not pressed', () => {
      const { cpu } = createCpu([0x6a0b, 0xeaa1]);
      run(cpu, 2);
      expect(cpu.getPC()).toBe(0x206);
    });

    it('EXA1 does not skip when the key is pressed', () => {
      const { cpu, keypad } = createCpu([0x6a0b, 0xeaa1]);
      keypad.pressed.add(0xb);
      run(cpu, 2);
      expect(cpu.getPC()).toBe(0x204);
    });
  });

  describe('register arithmetic', () => {
    it('7XNN wraps modulo 256 and leaves VF alone', () => {
      const { cpu } = createCpu([0x6aff, 0x7a02]);
      run(cpu, 2);
      expect(cpu.registers.get(0xa)).toBe(0x01);
      expect(cpu.registers.get(VF)).toBe(0);
    });

    it('8XY0 copies VY into VX', () => {
      const { cpu } = createCpu([0x6142, 0x8010]);
      run(cpu, 2);
      expect(cpu.registers.get(0)).toBe(0x42);
    });

    it('8XY1/8XY2/8XY3 combine bits and clear VF', () => {
      const { cpu } = createCpu([0x6f01, 0x600f, 0x613c, 0x8011]);
      run(cpu, 4);
      expect(cpu.registers.get(0)).toBe(0x3f);
      expect(cpu.registers.get(VF)).toBe(0);

      const and = createCpu([0x6f01, 0x600f, 0x613c, 0x8012]);
      run(and.cpu, 4);
      expect(and.cpu.registers.get(0)).toBe(0x0c);
      expect(and.cpu.registers.get(VF)).toBe(0);

      const xor = createCpu([0x6f01, 0x600f, 0x613c, 0x8013]);
      run(xor.cpu, 4);
      expect(xor.cpu.registers.get(0)).toBe(0x33);
      expect(xor.cpu.registers.get(VF)).toBe(0);
    });

    it('8XY4 sets VF on carry', () => {
      const { cpu } = createCpu([0x60ff, 0x6102, 0x8014]);
      run(cpu, 3);
      expect(cpu.registers.get(0)).toBe(0x01);
      expect(cpu.registers.get(VF)).toBe(1);
    });

    it('8XY4 clears VF without carry', () => {
      const { cpu } = createCpu([0x6f01, 0x6001, 0x6102, 0x8014]);
      run(cpu, 4);
      expect(cpu.registers.get(0)).toBe(0x03);
      expect(cpu.registers.get(VF)).toBe(0);
    });

    it('8XY5 sets VF to 1 when there is no borrow', () => {
      const { cpu } = createCpu([0x6005, 0x6103, 0x8015]);
      run(cpu, 3);
      expect(cpu.registers.get(0)).toBe(0x02);
      expect(cpu.registers.get(VF)).toBe(1);
    });

    it('8XY5 sets VF to 0 on borrow', () => {
      const { cpu } = createCpu([0x6003, 0x6105, 0x8015]);
      run(cpu, 3);
      expect(cpu.registers.get(0)).toBe(0xfe);
      expect(cpu.registers.get(VF)).toBe(0);
    });

    it('8XY5 with equal operands gives 0 and no borrow', () => {
      const { cpu } = createCpu([0x6004, 0x6104, 0x8015]);
      run(cpu, 3);
      expect(cpu.registers.get(0)).toBe(0);
      expect(cpu.registers.get(VF)).toBe(1);
    });

    it('8XY7 subtracts VX from VY', () => {
      const { cpu } = createCpu([0x6003, 0x6105, 0x8017]);
      run(cpu, 3);
      expect(cpu.registers.get(0)).toBe(0x02);
      expect(cpu.registers.get(VF)).toBe(1);

      const borrow = createCpu([0x6005, 0x6103, 0x8017]);
      run(borrow.cpu, 3);
      expect(borrow.cpu.registers.get(0)).toBe(0xfe);
      expect(borrow.cpu.registers.get(VF)).toBe(0);
    });

    it('8XY6 shifts VY right into VX with the low bit in VF', () => {
      const { cpu } = createCpu([0x6099, 0x6105, 0x8016]);
      run(cpu, 3);
      expect(cpu.registers.get(0)).toBe(0x02);
      expect(cpu.registers.get(1)).toBe(0x05);
      expect(cpu.registers.get(VF)).toBe(1);
    });

    it('8XYE shifts VY left into VX with the high bit in VF', () => {
      const { cpu } = createCpu([0x6181, 0x801e]);
      run(cpu, 2);
      expect(cpu.registers.get(0)).toBe(0x02);
      expect(cpu.registers.get(VF)).toBe(1);
    });

    it('captures the shifted-out bit when VX and VY are the same register', () => {
      const right = createCpu([0x6103, 0x8116]);
      run(right.cpu, 2);
      expect(right.cpu.registers.get(1)).toBe(0x01);
      expect(right.cpu.registers.get(VF)).toBe(1);

      const left = createCpu([0x6181, 0x811e]);
      run(left.cpu, 2);
      expect(left.cpu.registers.get(1)).toBe(0x02);
      expect(left.cpu.registers.get(VF)).toBe(1);

      const flag = createCpu([0x6f03, 0x8ff6]);
      run(flag.cpu, 2);
      expect(flag.cpu.registers.get(VF)).toBe(1);
    });

    it('writes the flag after the result when X is F', () => {
      const { cpu } = createCpu([0x6f05, 0x6103, 0x8f14]);
      run(cpu, 3);
      expect(cpu.registers.get(VF)).toBe(0);

      const carry = createCpu([0x6fff, 0x6102, 0x8f14]);
      run(carry.cpu, 3);
      expect(carry.cpu.registers.get(VF)).toBe(1);
    });

    it('CXNN masks the random byte with NN', () => {
      const { cpu } = createCpu([0xc00f], { random: () => 0xab });
      cpu.step();
      expect(cpu.registers.get(0)).toBe(0x0b);
    });
  });

  describe('index register', () => {
    it('ANNN loads I', () => {
      const { cpu } = createCpu([0xa123]);
      cpu.step();
      expect(cpu.registers.i).toBe(0x123);
    });

    it('FX1E adds VX to I without wrapping at 12 bits', () => {
      const { cpu } = createCpu([0xafff, 0x6002, 0xf01e]);
      run(cpu, 3);
      expect(cpu.registers.i).toBe(0x1001);
      expect(cpu.registers.get(VF)).toBe(0);
    });

    it('FX29 points I at the glyph for VX', () => {
      const { cpu } = createCpu([0x600a, 0xf029]);
      run(cpu, 2);
      expect(cpu.registers.i).toBe(50);
    });
  });

  describe('DXYN', () => {
    it('reads N bytes at I and draws them at (VX, VY)', () => {
      const { cpu, memory, display } = createCpu([0xa300, 0x603c, 0x6102, 0xd012]);
      memory.load(0x300, [0xff, 0x81]);
      display.collision = true;
      run(cpu, 4);

      expect(display.draws).toEqual([{ x: 60, y: 2, rows: [0xff, 0x81] }]);
      expect(cpu.registers.get(VF)).toBe(1);
    });

    it('clears VF when the display reports no flag', () => {
      const { cpu, display } = createCpu([0x6f01, 0xa300, 0xd001]);
      run(cpu, 3);
      expect(display.draws).toHaveLength(1);
      expect(cpu.registers.get(VF)).toBe(0);
    });
  });

  describe('memory transfers', () => {
    it('FX33 stores the decimal digits of VX', () => {
      const { cpu, memory } = createCpu([0x609d, 0xa300, 0xf033]);
      run(cpu, 3);
      expect([memory.read(0x300), memory.read(0x301), memory.read(0x302)]).toEqual([1, 5, 7]);
      expect(cpu.registers.i).toBe(0x300);
    });

    it('FX55 stores V0..VX and advances I', () => {
      const { cpu, memory } = createCpu([0x6001, 0x6102, 0x6203, 0xa300, 0xf255]);
      run(cpu, 5);
      expect([memory.read(0x300), memory.read(0x301), memory.read(0x302)]).toEqual([1, 2, 3]);
      expect(cpu.registers.i).toBe(0x303);
    });

    it('FX65 loads V0..VX and advances I', () => {
      const { cpu, memory } = createCpu([0xa300, 0xf265]);
      memory.load(0x300, [0x11, 0x22, 0x33, 0x44]);
      run(cpu, 2);
      expect(cpu.registers.toArray().slice(0, 4)).toEqual([0x11, 0x22, 0x33, 0]);
      expect(cpu.registers.i).toBe(0x303);
    });
  });

  describe('timers and sound', () => {
    it('FX15 and FX07 write and read the delay timer', () => {
      const { cpu, timer } = createCpu([0x6042, 0xf015, 0xf107]);
      run(cpu, 3);
      expect(timer.value).toBe(0x42);
      expect(cpu.registers.get(1)).toBe(0x42);
    });

    it('FX18 reports the value and changes nothing else', () => {
      const onSoundTimer = vi.fn();
      const { cpu, timer } = createCpu([0x6230, 0xf218], { onSoundTimer });
      run(cpu, 2);
      expect(onSoundTimer).toHaveBeenCalledWith(0x30);
      expect(timer.value).toBe(0);
      expect(cpu.getPC()).toBe(0x204);
    });
  });

  describe('FX0A key-wait', () => {
    it('suspends execution until a key is delivered', () => {
      const { cpu } = createCpu([0xf30a, 0x6001]);
      expect(cpu.step()).toBe(true);
      expect(cpu.state).toBe(ExecutionState.WaitingForKey);
      expect(cpu.getPC()).toBe(0x202);

      expect(cpu.step()).toBe(false);
      expect(cpu.getPC()).toBe(0x202);

      expect(cpu.resumeWithKey(0xb)).toBe(true);
      expect(cpu.registers.get(3)).toBe(0xb);
      expect(cpu.state).toBe(ExecutionState.Running);

      cpu.step();
      expect(cpu.registers.get(0)).toBe(1);
    });

    it('ignores resumeWithKey while running', () => {
      const { cpu } = createCpu([0x6001]);
      expect(cpu.resumeWithKey(5)).toBe(false);
      expect(cpu.registers.toArray()).toEqual(new Array(16).fill(0));
    });
  });

  describe('arithmetic over all operand pairs', () => {
    function runAlu(word: number, a: number, b: number) {
      const { cpu } = createCpu([word]);
      cpu.registers.set(0, a);
      cpu.registers.set(1, b);
      cpu.step();
      return { result: cpu.registers.get(0), flag: cpu.registers.get(VF) };
    }

    it('7XNN and 8XY4 add modulo 256 with carry only on 8XY4', () => {
      for (let a = 0; a < 256; a++) {
        for (let b = 0; b < 256; b += 5) {
          const immediate = createCpu([0x7000 | b]);
          immediate.cpu.registers.set(0, a);
          immediate.cpu.step();
          expect(immediate.cpu.registers.get(0)).toBe((a + b) % 256);
          expect(immediate.cpu.registers.get(VF)).toBe(0);

          const { result, flag } = runAlu(0x8014, a, b);
          expect(result).toBe((a + b) % 256);
          expect(flag).toBe(a + b > 255 ? 1 : 0);
        }
      }
    });

    it('8XY5 clears VF exactly when VY exceeds VX', () => {
      for (let a = 0; a < 256; a += 3) {
        for (let b = 0; b < 256; b += 7) {
          const { result, flag } = runAlu(0x8015, a, b);
          expect(result).toBe((a - b + 256) % 256);
          expect(flag).toBe(b > a ? 0 : 1);
        }
      }
    });

    it('FX33 splits every byte into three decimal digits', () => {
      for (let value = 0; value < 256; value++) {
        const { cpu, memory } = createCpu([0xa300, 0xf033]);
        cpu.registers.set(0, value);
        run(cpu, 2);
        const digits = [memory.read(0x300), memory.read(0x301), memory.read(0x302)];
        expect(digits.every((d) => d >= 0 && d <= 9)).toBe(true);
        expect(digits[0] * 100 + digits[1] * 10 + digits[2]).toBe(value);
      }
    });
  });

  describe('faults', () => {
    it('wraps an unknown instruction with its opcode and address', () => {
      const { cpu } = createCpu([0x0123]);
      let fault: unknown;
      try {
        cpu.step();
      } catch (error) {
        fault = error;
      }
      expect(fault).toBeInstanceOf(ExecutionFault);
      if (!(fault instanceof ExecutionFault)) return;
      expect(fault.reason).toBeInstanceOf(UnknownInstructionError);
      expect(fault.opcode).toBe(0x0123);
      expect(fault.pc).toBe(0x200);
      expect(fault.message).toBe('Unknown instruction 0x0123 (opcode 0x0123 at 0x200)');
    });

    it('faults on return with an empty stack', () => {
      const { cpu } = createCpu([0x00ee]);
      expect(() => cpu.step()).toThrow('Return with empty call stack (opcode 0x00EE at 0x200)');
    });

    it('faults on a call beyond the stack capacity', () => {
      const { cpu } = createCpu([0x2200], { stackDepth: 12 });
      run(cpu, 12);
      expect(cpu.stack.depth).toBe(12);

      try {
        cpu.step();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ExecutionFault);
        if (error instanceof ExecutionFault) {
          expect(error.reason).toBeInstanceOf(StackOverflowError);
          expect(error.message).toBe('Call stack overflow (capacity 12) (opcode 0x2200 at 0x200)');
        }
      }
    });

    it('faults when the fetch runs off the end of memory', () => {
      const { cpu } = createCpu([0x1fff]);
      cpu.step();
      try {
        cpu.step();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ExecutionFault);
        if (error instanceof ExecutionFault) {
          expect(error.reason).toBeInstanceOf(MemoryAccessError);
          expect(error.opcode).toBeNull();
          expect(error.message).toBe('Memory address 0x1000 out of range (at 0xFFF)');
        }
      }
    });

    it('faults when FX55 writes past the top of memory', () => {
      const { cpu } = createCpu([0xafff, 0xf155]);
      cpu.step();
      expect(() => cpu.step()).toThrow(
        'Memory address 0x1000 out of range (opcode 0xF155 at 0x202)'
      );
    });
  });

  describe('reset', () => {
    it('restores the power-on state', () => {
      const { cpu } = createCpu([0x6005, 0xa123, 0x2300, 0xf00a]);
      cpu.step();
      cpu.step();
      cpu.reset();
      expect(cpu.getState()).toEqual({
        pc: 0x200,
        i: 0,
        v: new Array(16).fill(0),
        stack: [],
        state: ExecutionState.Running,
        wakeRegister: 0,
      });
    });
  });
});
