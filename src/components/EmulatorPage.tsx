"use client";

import { useEffect, useRef } from "react";
import { Pause, Play, RotateCcw, Upload } from "lucide-react";
import { useChip8 } from "@/hooks/useChip8";
import { Chip8Display } from "@/components/Chip8Display";
import { Chip8Keypad } from "@/components/Chip8Keypad";
import { RegisterPanel } from "@/components/RegisterPanel";
import { CHIP8_SOFTWARE_CATALOG, findSoftware } from "@/emulator/chip8/software-catalog";
import { ExecutionState } from "@/cpu/chip8";

const buttonClass =
  "inline-flex items-center gap-1 text-xs text-terminal-border hover:text-terminal-green border border-terminal-border hover:border-terminal-green px-2 py-0.5";

export function EmulatorPage() {
  const {
    state,
    onKeyDown,
    onKeyUp,
    pressKey,
    releaseKey,
    reset,
    loadRomFile,
    loadSoftware,
    togglePause,
  } = useChip8();
  const fileInputRef = useRef<HTMLInputElement | null>(null);

  useEffect(() => {
    window.addEventListener("keydown", onKeyDown);
    window.addEventListener("keyup", onKeyUp);
    return () => {
      window.removeEventListener("keydown", onKeyDown);
      window.removeEventListener("keyup", onKeyUp);
    };
  }, [onKeyDown, onKeyUp]);

  const current = state.currentSoftware ? findSoftware(state.currentSoftware) : undefined;
  const softwareName = current?.name ?? state.registers?.romName ?? "No program";

  let status = "RUNNING";
  if (state.fault) status = "HALTED";
  else if (state.paused) status = "PAUSED";
  else if (state.registers?.state === ExecutionState.WaitingForKey) status = "WAITING FOR KEY";

  return (
    <div className="min-h-screen flex flex-col items-center p-4">
      <main className="w-full max-w-4xl flex-1 flex flex-col gap-3">
        <div className="flex items-center justify-between gap-3">
          <h1 className="text-sm font-mono text-terminal-green whitespace-nowrap">
            CHIP-8 Emulator
          </h1>
          <div className="flex gap-2 items-center">
            <select
              className="text-xs font-mono bg-terminal-bg text-terminal-green border border-terminal-border px-1 py-0.5"
              data-testid="software-select"
              value={state.currentSoftware ?? ""}
              onChange={(e) => {
                const entry = findSoftware(e.target.value);
                if (entry) loadSoftware(entry);
              }}
            >
              <option value="" disabled>
                Select program
              </option>
              {CHIP8_SOFTWARE_CATALOG.map((entry) => (
                <option key={entry.id} value={entry.id}>
                  {entry.name}
                </option>
              ))}
            </select>
            <button type="button" className={buttonClass} onClick={() => fileInputRef.current?.click()}>
              <Upload size={12} aria-hidden />
              LOAD ROM
            </button>
            <input
              ref={fileInputRef}
              type="file"
              accept=".ch8,.c8,.rom,.bin,.zip"
              className="hidden"
              data-testid="rom-file-input"
              onChange={(e) => {
                const file = e.target.files?.[0];
                if (file) void loadRomFile(file);
                e.target.value = "";
              }}
            />
            <button type="button" className={buttonClass} onClick={reset}>
              <RotateCcw size={12} aria-hidden />
              RESET
            </button>
            <button type="button" className={buttonClass} onClick={togglePause}>
              {state.paused ? <Play size={12} aria-hidden /> : <Pause size={12} aria-hidden />}
              {state.paused ? "RESUME" : "PAUSE"}
            </button>
          </div>
        </div>

        {state.fault && (
          <div
            role="alert"
            className="border border-red-500 text-red-400 font-mono text-xs px-3 py-2"
            data-testid="fault-banner"
          >
            {state.fault}
          </div>
        )}
        {state.loadError && (
          <div
            role="alert"
            className="border border-yellow-500 text-yellow-400 font-mono text-xs px-3 py-2"
            data-testid="load-error"
          >
            {state.loadError}
          </div>
        )}

        <Chip8Display lines={state.lines} softwareName={softwareName} status={status} />

        <div className="flex gap-4 items-start">
          <div className="flex flex-col gap-2">
            <Chip8Keypad
              pressedKeys={state.pressedKeys}
              onPress={pressKey}
              onRelease={releaseKey}
            />
            {current?.controls && (
              <p className="font-mono text-xs text-terminal-border w-48">{current.controls}</p>
            )}
          </div>
          <div className="flex-1">
            <RegisterPanel registers={state.registers} />
          </div>
        </div>
      </main>
    </div>
  );
}
