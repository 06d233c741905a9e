/**
 * CHIP-8 emulator settings.
 *
 * Defaults reproduce the original host loop: 8 instructions per frame
 * (roughly 500 Hz at 60 fps), the set-only sprite rule and a 16-entry
 * call stack. Deployments can override them with NEXT_PUBLIC_CHIP8_*
 * environment variables.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/cpu/chip8';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const chip8ConfigSchema = z.object({
  instructionsPerFrame: z.number().int().min(1).max(1000).default(8),
  drawMode: z.enum(['set', 'xor']).default('set'),
  stackDepth: z.number().int().min(12).max(16).default(16),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Chip8Config = z.infer<typeof chip8ConfigSchema>;
export type Chip8ConfigInput = z.input<typeof chip8ConfigSchema>;

export const ENV_VARS = {
  INSTRUCTIONS_PER_FRAME: 'NEXT_PUBLIC_CHIP8_INSTRUCTIONS_PER_FRAME',
  DRAW_MODE: 'NEXT_PUBLIC_CHIP8_DRAW_MODE',
  STACK_DEPTH: 'NEXT_PUBLIC_CHIP8_STACK_DEPTH',
  LOG_LEVEL: 'NEXT_PUBLIC_CHIP8_LOG_LEVEL',
} as const;

export type Chip8Env = Partial<Record<(typeof ENV_VARS)[keyof typeof ENV_VARS], string>>;

/**
 * Next.js only inlines NEXT_PUBLIC_* variables into client bundles when
 * they are referenced by name, so each one is read explicitly.
 */
function readProcessEnv(): Chip8Env {
  return {
    NEXT_PUBLIC_CHIP8_INSTRUCTIONS_PER_FRAME: process.env.NEXT_PUBLIC_CHIP8_INSTRUCTIONS_PER_FRAME,
    NEXT_PUBLIC_CHIP8_DRAW_MODE: process.env.NEXT_PUBLIC_CHIP8_DRAW_MODE,
    NEXT_PUBLIC_CHIP8_STACK_DEPTH: process.env.NEXT_PUBLIC_CHIP8_STACK_DEPTH,
    NEXT_PUBLIC_CHIP8_LOG_LEVEL: process.env.NEXT_PUBLIC_CHIP8_LOG_LEVEL,
  };
}

function parseConfig(input: unknown): Chip8Config {
  const result = chip8ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid CHIP-8 configuration', issues);
  }
  return result.data;
}

/** Merge overrides with defaults. Throws ConfigurationError on invalid values. */
export function resolveChip8Config(input: Chip8ConfigInput = {}): Chip8Config {
  return parseConfig(input);
}

function parseInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError('Invalid CHIP-8 configuration', [`${name}: expected an integer, got "${raw}"`]);
  }
  return value;
}

/** Load configuration from environment variables; unset or empty values use defaults. */
export function loadChip8Config(env: Chip8Env = readProcessEnv()): Chip8Config {
  const input: Record<string, unknown> = {};

  const perFrame = env[ENV_VARS.INSTRUCTIONS_PER_FRAME];
  if (perFrame) {
    input.instructionsPerFrame = parseInteger(ENV_VARS.INSTRUCTIONS_PER_FRAME, perFrame);
  }

  const drawMode = env[ENV_VARS.DRAW_MODE];
  if (drawMode) {
    input.drawMode = drawMode;
  }

  const stackDepth = env[ENV_VARS.STACK_DEPTH];
  if (stackDepth) {
    input.stackDepth = parseInteger(ENV_VARS.STACK_DEPTH, stackDepth);
  }

  const logLevel = env[ENV_VARS.LOG_LEVEL];
  if (logLevel) {
    input.logLevel = logLevel;
  }

  return parseConfig(input);
}
