"use client";

import { ExecutionState, hex } from "@/cpu/chip8";
import type { Chip8Snapshot } from "@/emulator/chip8/system";

interface RegisterPanelProps {
  registers: Chip8Snapshot | null;
}

function Field({ label, value, testId }: { label: string; value: string; testId: string }) {
  return (
    <div className="flex justify-between gap-2">
      <span className="text-terminal-border">{label}</span>
      <span className="text-terminal-green" data-testid={testId}>
        {value}
      </span>
    </div>
  );
}

export function RegisterPanel({ registers }: RegisterPanelProps) {
  if (!registers) {
    return (
      <div className="font-mono text-xs text-terminal-border" data-testid="register-panel">
        No program loaded
      </div>
    );
  }

  const waiting = registers.state === ExecutionState.WaitingForKey;

  return (
    <div
      className="font-mono text-xs border border-terminal-border p-2 flex flex-col gap-2"
      data-testid="register-panel"
    >
      <div className="grid grid-cols-4 gap-x-3">
        {registers.v.map((value, index) => (
          <Field
            key={index}
            label={`V${keyName(index)}`}
            value={hex(value, 2)}
            testId={`reg-v${keyName(index)}`}
          />
        ))}
      </div>
      <div className="grid grid-cols-2 gap-x-3">
        <Field label="PC" value={hex(registers.pc, 3)} testId="reg-pc" />
        <Field label="I" value={hex(registers.i, 3)} testId="reg-i" />
        <Field label="DT" value={String(registers.delayTimer)} testId="reg-dt" />
        <Field label="SP" value={String(registers.stack.length)} testId="reg-sp" />
      </div>
      <Field
        label="STATE"
        value={waiting ? "WAITING FOR KEY" : "RUNNING"}
        testId="reg-state"
      />
      <Field label="NEXT" value={registers.nextInstruction ?? "--"} testId="reg-next" />
    </div>
  );
}

function keyName(index: number): string {
  return index.toString(16).toUpperCase();
}
