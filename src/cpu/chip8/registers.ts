/** Number of general-purpose registers V0-VF. */
export const REGISTER_COUNT = 16;

/**
 * CHIP-8 register file.
 *
 * V0-VF are 8-bit; VF doubles as the flag register. I is the 16-bit address
 * register. The wake register remembers which V register receives the key
 * code when a key-wait (FX0A) completes.
 */
export class Registers {
  private readonly v = new Uint8Array(REGISTER_COUNT);
  private index = 0;
  wakeRegister = 0;

  get(register: number): number {
    return this.v[register & 0xf];
  }

  set(register: number, value: number): void {
    this.v[register & 0xf] = value & 0xff;
  }

  get i(): number {
    return this.index;
  }

  set i(value: number) {
    this.index = value & 0xffff;
  }

  toArray(): number[] {
    return Array.from(this.v);
  }

  reset(): void {
    this.v.fill(0);
    this.index = 0;
    this.wakeRegister = 0;
  }
}
