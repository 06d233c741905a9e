/** Format a value as an upper-case hex literal, e.g. hex(0x2a, 3) → '0x02A'. */
export function hex(value: number, digits: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(digits, '0')}`;
}
