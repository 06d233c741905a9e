import type { DelayTimer } from '@/cpu/chip8';

/**
 * 8-bit delay timer. The host calls tick() once per rendered frame,
 * independent of how many instructions ran in that frame.
 */
export class Chip8Timer implements DelayTimer {
  private current = 0;

  get value(): number {
    return this.current;
  }

  set value(value: number) {
    this.current = value & 0xff;
  }

  /** Count down by one, stopping at zero. */
  tick(): void {
    if (this.current > 0) {
      this.current--;
    }
  }

  reset(): void {
    this.current = 0;
  }
}
