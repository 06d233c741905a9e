"use client";

import { KEYPAD_LAYOUT, keyLabel } from "@/emulator/chip8/keypad";

interface Chip8KeypadProps {
  pressedKeys: number[];
  onPress: (key: number) => void;
  onRelease: (key: number) => void;
}

/** On-screen hex keypad in the COSMAC VIP arrangement. */
export function Chip8Keypad({ pressedKeys, onPress, onRelease }: Chip8KeypadProps) {
  return (
    <div className="grid grid-cols-4 gap-1 w-48 select-none" data-testid="chip8-keypad">
      {KEYPAD_LAYOUT.flat().map((key) => {
        const pressed = pressedKeys.includes(key);
        return (
          <button
            key={key}
            type="button"
            data-testid={`chip8-key-${keyLabel(key)}`}
            aria-pressed={pressed}
            className={`font-mono text-sm border px-2 py-2 ${
              pressed
                ? "bg-terminal-green text-terminal-bg border-terminal-green"
                : "text-terminal-green border-terminal-border hover:border-terminal-green"
            }`}
            onPointerDown={() => onPress(key)}
            onPointerUp={() => onRelease(key)}
            onPointerLeave={() => {
              if (pressed) onRelease(key);
            }}
          >
            {keyLabel(key)}
          </button>
        );
      })}
    </div>
  );
}
