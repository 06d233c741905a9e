"use client";

import { useRef, useEffect, useCallback, useState } from "react";
import { ConfigurationError, getErrorMessage } from "@/cpu/chip8";
import { Chip8System, type Chip8Snapshot } from "@/emulator/chip8/system";
import {
  loadChip8Config,
  resolveChip8Config,
  type Chip8Config,
  type Chip8ConfigInput,
} from "@/emulator/chip8/config";
import { renderRows, SCREEN_HEIGHT, SCREEN_WIDTH, PIXEL_OFF } from "@/emulator/chip8/framebuffer";
import { keyFromChar } from "@/emulator/chip8/keypad";
import {
  CHIP8_SOFTWARE_CATALOG,
  type Chip8SoftwareEntry,
} from "@/emulator/chip8/software-catalog";
import { parseRom, readRomFile } from "@/lib/rom-loader";
import { createLogger, logger, type Logger } from "@/lib/logger";

export interface Chip8State {
  lines: string[];
  registers: Chip8Snapshot | null;
  /** Diagnostic of the fault that stopped execution. */
  fault: string | null;
  /** Why the last ROM could not be loaded. */
  loadError: string | null;
  paused: boolean;
  pressedKeys: number[];
  currentSoftware: string | null;
}

const BLANK_LINES: string[] = Array<string>(SCREEN_HEIGHT).fill(PIXEL_OFF.repeat(SCREEN_WIDTH));

/** Build the machine, or return the ConfigurationError that stopped it. */
function createSystem(
  overrides: Chip8ConfigInput | undefined
): { emu: Chip8System; log: Logger } | ConfigurationError {
  let config: Chip8Config;
  try {
    config = resolveChip8Config({ ...loadChip8Config(), ...overrides });
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  const log = createLogger(config.logLevel);
  return { emu: new Chip8System({ config, logger: log }), log };
}

/**
 * React hook that manages a CHIP-8 emulator instance.
 *
 * - Creates the machine on mount and boots the first catalog program
 * - Runs one frame per requestAnimationFrame tick (instructions, then the
 *   delay timer, then the display)
 * - Stops executing when the program faults, until reset or a new ROM
 * - Returns keyDown/keyUp handlers mapping 0-9 and A-F to the keypad
 */
export function useChip8(config?: Chip8ConfigInput) {
  const emulatorRef = useRef<Chip8System | null>(null);
  const rafRef = useRef<number>(0);
  const pausedRef = useRef(false);
  const configRef = useRef(config);
  const [state, setState] = useState<Chip8State>({
    lines: BLANK_LINES,
    registers: null,
    fault: null,
    loadError: null,
    paused: false,
    pressedKeys: [],
    currentSoftware: null,
  });

  // Initialize emulator once
  useEffect(() => {
    const created = createSystem(configRef.current);
    if (created instanceof Error) {
      logger.error({ err: created }, "invalid configuration");
      setState((prev) => ({ ...prev, fault: created.message }));
      return;
    }
    const { emu, log } = created;
    emulatorRef.current = emu;

    const boot = CHIP8_SOFTWARE_CATALOG[0];
    emu.loadROM(boot.data, boot.name);
    setState((prev) => ({ ...prev, currentSoftware: boot.id }));

    const surface = {
      present: () => {
        setState((prev) => ({
          ...prev,
          lines: renderRows(emu.display),
          registers: emu.getState(),
          pressedKeys: emu.keypad.pressedKeys(),
        }));
      },
    };

    let running = true;
    const tick = () => {
      if (!running) return;
      if (!pausedRef.current && !emu.getFault()) {
        try {
          emu.runFrame(surface);
        } catch (error) {
          log.error({ err: error, pc: emu.getPC() }, "execution stopped");
          setState((prev) => ({
            ...prev,
            fault: getErrorMessage(error),
            registers: emu.getState(),
          }));
        }
      }
      rafRef.current = requestAnimationFrame(tick);
    };
    rafRef.current = requestAnimationFrame(tick);

    return () => {
      running = false;
      cancelAnimationFrame(rafRef.current);
      emulatorRef.current = null;
    };
  }, []);

  const syncDisplay = useCallback((emu: Chip8System) => {
    setState((prev) => ({
      ...prev,
      lines: renderRows(emu.display),
      registers: emu.getState(),
      pressedKeys: emu.keypad.pressedKeys(),
      fault: null,
    }));
  }, []);

  /** Press a logical key (0-F). */
  const pressKey = useCallback((key: number) => {
    const emu = emulatorRef.current;
    if (!emu) return;
    emu.keyDown(key);
    setState((prev) => ({ ...prev, pressedKeys: emu.keypad.pressedKeys() }));
  }, []);

  /** Release a logical key (0-F). */
  const releaseKey = useCallback((key: number) => {
    const emu = emulatorRef.current;
    if (!emu) return;
    emu.keyUp(key);
    setState((prev) => ({ ...prev, pressedKeys: emu.keypad.pressedKeys() }));
  }, []);

  /** Handle keydown — 0-9 and A-F (either case) press the matching key. */
  const onKeyDown = useCallback((e: KeyboardEvent) => {
    if (e.ctrlKey || e.metaKey || e.altKey) return;
    const key = keyFromChar(e.key);
    if (key === null) return;
    e.preventDefault();
    if (e.repeat) return;
    pressKey(key);
  }, [pressKey]);

  /** Handle keyup — release the matching key. */
  const onKeyUp = useCallback((e: KeyboardEvent) => {
    const key = keyFromChar(e.key);
    if (key === null) return;
    releaseKey(key);
  }, [releaseKey]);

  /** Cold reset, keeping the loaded program. */
  const reset = useCallback(() => {
    const emu = emulatorRef.current;
    if (!emu) return;
    emu.reset();
    syncDisplay(emu);
  }, [syncDisplay]);

  /** Load a raw program image and start it from $200. */
  const loadRom = useCallback((data: Uint8Array, name?: string) => {
    const emu = emulatorRef.current;
    if (!emu) return;
    try {
      emu.loadROM(parseRom(data), name);
    } catch (error) {
      setState((prev) => ({ ...prev, loadError: getErrorMessage(error) }));
      return;
    }
    syncDisplay(emu);
    setState((prev) => ({ ...prev, loadError: null, currentSoftware: null }));
  }, [syncDisplay]);

  /** Load a program chosen with the file picker. */
  const loadRomFile = useCallback(async (file: File) => {
    let data: Uint8Array;
    try {
      data = await readRomFile(file);
    } catch (error) {
      setState((prev) => ({ ...prev, loadError: getErrorMessage(error) }));
      return;
    }
    loadRom(data, file.name);
  }, [loadRom]);

  /** Load a catalog entry. */
  const loadSoftware = useCallback((entry: Chip8SoftwareEntry) => {
    const emu = emulatorRef.current;
    if (!emu) return;
    emu.loadROM(entry.data, entry.name);
    syncDisplay(emu);
    setState((prev) => ({ ...prev, loadError: null, currentSoftware: entry.id }));
  }, [syncDisplay]);

  const togglePause = useCallback(() => {
    pausedRef.current = !pausedRef.current;
    setState((prev) => ({ ...prev, paused: pausedRef.current }));
  }, []);

  return {
    state,
    onKeyDown,
    onKeyUp,
    pressKey,
    releaseKey,
    reset,
    loadRom,
    loadRomFile,
    loadSoftware,
    togglePause,
    emulator: emulatorRef,
  };
}
