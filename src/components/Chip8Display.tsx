"use client";

import { SCREEN_HEIGHT, SCREEN_WIDTH } from "@/emulator/chip8/framebuffer";

interface Chip8DisplayProps {
  /** One string per pixel row, "█" for lit pixels. */
  lines: string[];
  softwareName: string;
  status: string;
}

export function Chip8Display({ lines, softwareName, status }: Chip8DisplayProps) {
  return (
    <div
      className="chip8-screen border border-terminal-border bg-terminal-bg flex flex-col mx-auto"
      data-testid="chip8-display"
    >
      <div className="flex items-center justify-between px-3 py-1 border-b border-terminal-border select-none">
        <span className="text-xs text-terminal-border truncate" data-testid="chip8-software">
          {softwareName}
        </span>
        <span className="text-xs text-terminal-border" data-testid="chip8-status">
          {status}
        </span>
        <span className="text-xs text-terminal-border">
          {SCREEN_WIDTH}&times;{SCREEN_HEIGHT}
        </span>
      </div>
      <pre
        className="p-3 font-mono text-xs leading-none text-terminal-green whitespace-pre"
        data-testid="chip8-screen"
        aria-label="CHIP-8 screen"
      >
        {lines.map((line, row) => (
          <div key={row} data-testid="chip8-row">
            {line}
          </div>
        ))}
      </pre>
    </div>
  );
}
