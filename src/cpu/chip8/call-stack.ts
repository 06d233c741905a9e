import { StackOverflowError, StackUnderflowError } from './errors';

/** Default number of nested subroutine calls (the COSMAC VIP allowed 12, most later interpreters 16). */
export const DEFAULT_STACK_DEPTH = 16;

/** Bounded stack of subroutine return addresses. */
export class CallStack {
  private readonly entries: number[] = [];

  constructor(readonly capacity: number = DEFAULT_STACK_DEPTH) {}

  get depth(): number {
    return this.entries.length;
  }

  push(address: number): void {
    if (this.entries.length >= this.capacity) {
      throw new StackOverflowError(this.capacity);
    }
    this.entries.push(address & 0xffff);
  }

  pop(): number {
    const address = this.entries.pop();
    if (address === undefined) {
      throw new StackUnderflowError();
    }
    return address;
  }

  /** Copy of the return addresses, oldest first. */
  toArray(): number[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }
}
